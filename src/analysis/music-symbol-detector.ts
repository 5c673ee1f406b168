import path from "path";
import { promises as fs } from "fs";
import {IRecognizer} from "../interfaces/recognizer.interface";
import {DetectionRunResult} from "../interfaces/detection-result";
import {AudiverisRecognizer} from "../recognizers/audiveris.recognizer";
import {ImageProcessor} from "../processors/image-processor";
import {
    DEFAULT_MIN_HEIGHT,
    DEFAULT_MIN_WIDTH,
    DEFAULT_SCALE_FACTOR,
    ResolutionGuard,
} from "../processors/resolution-guard";
import {OmrSymbolExtractor} from "../extractors/omr-symbol-extractor";
import {AnnotateOptions, annotateImage} from "../utils/draw-detections";
import {mapToOriginal} from "../utils/coordinate-mapping";
import {formatSummary, summarizeDetections} from "./symbol-summary";
import {CoordinateSpace} from "../types/detection.types";
import {InputError, WriteError} from "../types/errors";
import {Logger, logger as rootLogger} from "../utils/logger";

export type DetectorSettings = {
    minWidth?: number;
    minHeight?: number;
    scaleFactor?: number;
    coordinateSpace?: CoordinateSpace;
    logger?: Logger;
};

export type ProcessOptions = {
    outputPath?: string;        // Defaults to <input dir>/<name>_detected<ext>
    workingDir?: string;        // Defaults to <input dir>/audiveris_output
    coordinateSpace?: CoordinateSpace;
    annotate?: AnnotateOptions;
};

export const WORKING_DIR_NAME = 'audiveris_output';

export function detectedPathFor(inputPath: string): string {
    const { dir, name, ext } = path.parse(inputPath);
    return path.join(dir, `${name}_detected${ext}`);
}

/**
 * Guard -> recognizer -> extractor -> annotator, once per image.
 * The recognizer is initialised before anything is written, so a missing
 * executable leaves no files behind.
 */
export class MusicSymbolDetector {
    private readonly guard: ResolutionGuard;
    private readonly coordinateSpace: CoordinateSpace;
    private readonly log: Logger;

    constructor(
        private readonly recognizer: IRecognizer = new AudiverisRecognizer(),
        settings: DetectorSettings = {},
        private readonly imageProcessor = new ImageProcessor(),
        private readonly extractor = new OmrSymbolExtractor(settings.logger?.child({ component: 'extractor' }))
    ) {
        this.guard = new ResolutionGuard({
            minWidth: settings.minWidth ?? DEFAULT_MIN_WIDTH,
            minHeight: settings.minHeight ?? DEFAULT_MIN_HEIGHT,
            scaleFactor: settings.scaleFactor ?? DEFAULT_SCALE_FACTOR,
        }, imageProcessor);
        this.coordinateSpace = settings.coordinateSpace ?? 'recognizer';
        this.log = (settings.logger ?? rootLogger).child({ component: 'pipeline' });
    }

    async process(inputPath: string, opts: ProcessOptions = {}): Promise<DetectionRunResult> {
        const imagePath = path.resolve(inputPath);
        const exists = await fs.access(imagePath).then(() => true, () => false);
        if (!exists) {
            throw new InputError(`Image not found: ${imagePath}`);
        }
        if (!this.imageProcessor.isValidImageFile(imagePath)) {
            this.log.warn('Unexpected image extension, trying anyway', { image: imagePath });
        }

        this.log.info('Processing', { image: imagePath });
        const meta = await this.imageProcessor.getImageMetadata(imagePath);

        // neither the input nor the upscaled copy may be the annotated output
        const outputPath = path.resolve(opts.outputPath ?? detectedPathFor(imagePath));
        const recognizedPath = this.guard.plannedPath(imagePath, meta.width, meta.height);
        if (outputPath === imagePath || outputPath === recognizedPath) {
            throw new WriteError(`Output path would overwrite ${outputPath === imagePath ? 'the input image' : 'the upscaled copy'}: ${outputPath}`);
        }

        if (!this.recognizer.isReady()) {
            await this.recognizer.initialize();
        }

        // 1) Resolution guard
        const guarded = await this.guard.ensureResolution(imagePath);
        if (guarded.upscaled) {
            this.log.info('Upscaled input', {
                from: `${guarded.originalWidth}x${guarded.originalHeight}`,
                to: `${guarded.width}x${guarded.height}`,
                path: guarded.path,
            });
        }

        // 2) Recognizer
        const workingDir = path.resolve(opts.workingDir ?? path.join(path.dirname(imagePath), WORKING_DIR_NAME));
        const omrPath = await this.recognizer.recognize(guarded.path, workingDir);

        // 3) Extraction
        this.log.info('Parsing symbols', { omr: omrPath });
        const raw = await this.extractor.extract(omrPath);

        // 4) Annotation, in the requested coordinate space
        const coordinateSpace = opts.coordinateSpace ?? this.coordinateSpace;
        const onOriginal = coordinateSpace === 'original';
        const detections = onOriginal
            ? mapToOriginal(raw, guarded.scaleFactor, { width: guarded.originalWidth, height: guarded.originalHeight })
            : raw;
        const annotateSource = onOriginal ? imagePath : guarded.path;

        this.log.info('Drawing bounding boxes', { on: annotateSource, symbols: detections.length });
        const { outPath } = await annotateImage(annotateSource, detections, outputPath, opts.annotate, this.imageProcessor);

        const summary = summarizeDetections(detections);
        this.log.info('Output saved', { output: outPath, total: summary.total });
        for (const line of formatSummary(summary)) {
            this.log.info(`  ${line}`);
        }

        return {
            source: {
                filename: path.basename(imagePath),
                path: imagePath,
            },
            timestamp: new Date().toISOString(),
            input: {
                width: meta.width,
                height: meta.height,
                format: meta.format,
                density: meta.density,
            },
            recognized: {
                path: guarded.path,
                width: guarded.width,
                height: guarded.height,
                upscaled: guarded.upscaled,
            },
            upscaledPath: guarded.upscaled ? guarded.path : undefined,
            scaleFactor: guarded.scaleFactor,
            recognizer: this.recognizer.name,
            omrPath,
            outputPath: outPath,
            coordinateSpace,
            detections,
            summary,
        };
    }
}
