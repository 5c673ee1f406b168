import path from "path";
import {openSharp, describeSource} from "../utils/open-sharp";
import {ImageMetadata, ImageSource} from "../types/image.types";
import {errorMessage, InputError} from "../types/errors";

export class ImageProcessor {
    async getImageMetadata(src: ImageSource): Promise<ImageMetadata> {
        const { sh } = openSharp(src);
        const meta = await sh.metadata().catch((err: unknown) => {
            throw new InputError(`Cannot read image ${describeSource(src)}: ${errorMessage(err)}`, { cause: err });
        });
        const width  = meta.width  ?? 0;
        const height = meta.height ?? 0;
        if (width === 0 || height === 0) {
            throw new InputError(`Invalid image dimensions for ${describeSource(src)}: ${width}x${height}`);
        }
        return {
            width,
            height,
            format: meta.format || "unknown",
            colorspace: meta.space || "srgb",
            hasAlpha: meta.hasAlpha || false,
            density: meta.density,
        };
    }

    async getImageBuffer(src: ImageSource): Promise<Buffer> {
        const { sh } = openSharp(src);
        try {
            return await sh.toBuffer();
        } catch (err) {
            throw new InputError(`Cannot decode image ${describeSource(src)}: ${errorMessage(err)}`, { cause: err });
        }
    }

    isValidImageFile(filename: string): boolean {
        const validExtensions = [".jpg", ".jpeg", ".png", ".webp", ".tif", ".tiff"];
        const ext = path.extname(filename).toLowerCase();
        return validExtensions.includes(ext);
    }
}
