import path from "node:path";
import { promises as fs } from "node:fs";
import {ImageProcessor} from "./image-processor";
import {openSharp, describeSource} from "../utils/open-sharp";
import {ImageSource} from "../types/image.types";
import {errorMessage, InputError, WriteError} from "../types/errors";

export const DEFAULT_MIN_WIDTH = 1200;
export const DEFAULT_MIN_HEIGHT = 600;
export const DEFAULT_SCALE_FACTOR = 4;
/** DPI written into upscaled copies. */
export const UPSCALED_DENSITY = 300;

export type GuardOptions = {
    minWidth?: number;
    minHeight?: number;
    scaleFactor?: number;
    outputDir?: string;     // Where <name>_upscaled.<ext> goes; defaults to the input's directory
};

export type GuardResult = {
    path: string;           // Image to hand to the recognizer
    width: number;
    height: number;
    originalWidth: number;
    originalHeight: number;
    scaleFactor: number;    // 1 when the input was used as-is
    upscaled: boolean;
};

export function needsUpscale(
    width: number,
    height: number,
    minWidth = DEFAULT_MIN_WIDTH,
    minHeight = DEFAULT_MIN_HEIGHT
): boolean {
    return width < minWidth || height < minHeight;
}

export function upscaledPathFor(inputPath: string, outputDir?: string): string {
    const { dir, name, ext } = path.parse(inputPath);
    return path.join(outputDir ?? dir, `${name}_upscaled${ext}`);
}

/** Lanczos upscale by an integer factor, keeping the input's format. */
export async function upscaleImage(
    src: ImageSource,
    scaleFactor = DEFAULT_SCALE_FACTOR,
    imageProcessor = new ImageProcessor()
): Promise<Buffer> {
    if (!Number.isInteger(scaleFactor) || scaleFactor < 1) {
        throw new RangeError(`Scale factor must be a positive integer, got ${scaleFactor}`);
    }
    const { width, height } = await imageProcessor.getImageMetadata(src);
    const { sh } = openSharp(src);
    try {
        return await sh
            .resize(width * scaleFactor, height * scaleFactor, { fit: 'fill', kernel: 'lanczos3' })
            .withMetadata({ density: UPSCALED_DENSITY })
            .toBuffer();
    } catch (err) {
        throw new InputError(`Cannot upscale ${describeSource(src)}: ${errorMessage(err)}`, { cause: err });
    }
}

export class ResolutionGuard {
    private readonly minWidth: number;
    private readonly minHeight: number;
    private readonly scaleFactor: number;

    constructor(
        options: Omit<GuardOptions, 'outputDir'> = {},
        private readonly imageProcessor = new ImageProcessor()
    ) {
        this.minWidth = options.minWidth ?? DEFAULT_MIN_WIDTH;
        this.minHeight = options.minHeight ?? DEFAULT_MIN_HEIGHT;
        this.scaleFactor = options.scaleFactor ?? DEFAULT_SCALE_FACTOR;
    }

    /** Path the recognizer will be given for an image of this size. */
    plannedPath(inputPath: string, width: number, height: number, outputDir?: string): string {
        return needsUpscale(width, height, this.minWidth, this.minHeight)
            ? upscaledPathFor(inputPath, outputDir)
            : inputPath;
    }

    /**
     * Returns the input untouched when it meets the minimum size, otherwise writes
     * an upscaled copy next to it (or into `outputDir`) and returns that.
     */
    async ensureResolution(inputPath: string, outputDir?: string): Promise<GuardResult> {
        const { width, height } = await this.imageProcessor.getImageMetadata(inputPath);

        if (!needsUpscale(width, height, this.minWidth, this.minHeight)) {
            return {
                path: inputPath,
                width,
                height,
                originalWidth: width,
                originalHeight: height,
                scaleFactor: 1,
                upscaled: false,
            };
        }

        const buffer = await upscaleImage(inputPath, this.scaleFactor, this.imageProcessor);
        const outPath = upscaledPathFor(inputPath, outputDir);
        try {
            if (outputDir) await fs.mkdir(outputDir, { recursive: true });
            await fs.writeFile(outPath, buffer);
        } catch (err) {
            throw new WriteError(`Cannot write upscaled image ${outPath}: ${errorMessage(err)}`, { cause: err });
        }

        return {
            path: outPath,
            width: width * this.scaleFactor,
            height: height * this.scaleFactor,
            originalWidth: width,
            originalHeight: height,
            scaleFactor: this.scaleFactor,
            upscaled: true,
        };
    }
}

export async function guardResolution(inputPath: string, options: GuardOptions = {}): Promise<GuardResult> {
    return new ResolutionGuard(options).ensureResolution(inputPath, options.outputDir);
}
