export {MusicSymbolDetector, detectedPathFor} from "./analysis/music-symbol-detector";
export type {DetectorSettings, ProcessOptions} from "./analysis/music-symbol-detector";
export {summarizeDetections, formatSummary} from "./analysis/symbol-summary";
export {AudiverisRecognizer} from "./recognizers/audiveris.recognizer";
export type {AudiverisOptions, SpawnFn, RecognizerProcess} from "./recognizers/audiveris.recognizer";
export {OmrSymbolExtractor, extractSymbols, classifyShape} from "./extractors/omr-symbol-extractor";
export {ImageProcessor} from "./processors/image-processor";
export {ResolutionGuard, guardResolution, needsUpscale, upscaleImage} from "./processors/resolution-guard";
export type {GuardOptions, GuardResult} from "./processors/resolution-guard";
export {annotateImage, drawDetectionsOnBuffer, SYMBOL_STYLES} from "./utils/draw-detections";
export {mapToOriginal, clampBox} from "./utils/coordinate-mapping";
export {createLogger, logger} from "./utils/logger";
export {loadEnv} from "./config/env";
export * from "./types/errors";
export * from "./types/detection.types";
export type {ImageSource, ImageMetadata, ImageSize} from "./types/image.types";
export type {IRecognizer} from "./interfaces/recognizer.interface";
export type {DetectionRunResult} from "./interfaces/detection-result";
