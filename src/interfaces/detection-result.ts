import type {CoordinateSpace, Detection, SymbolSummary} from '../types/detection.types';

export interface DetectionRunResult {
    // 1) Where the image came from
    source: {
        filename: string;
        path: string;
    };

    timestamp: string;            // ISO 8601 timestamp

    // 2) Input as read from disk
    input: {
        width: number;
        height: number;
        format: string;
        density?: number;
    };

    // 3) Image the recognizer actually ran on
    recognized: {
        path: string;
        width: number;
        height: number;
        upscaled: boolean;
    };
    upscaledPath?: string;
    scaleFactor: number;          // 1 when no upscaling happened

    // 4) Recognizer output and annotation
    recognizer: string;
    omrPath: string;
    outputPath: string;
    coordinateSpace: CoordinateSpace;   // Space of the boxes in `detections`

    detections: Detection[];
    summary: SymbolSummary;
}
