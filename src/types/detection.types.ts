export const SYMBOL_TYPES = ['notehead', 'sharp', 'flat', 'natural'] as const;

export type SymbolType = typeof SYMBOL_TYPES[number];

/** Axis-aligned box in pixels of the image it was measured on. */
export type BoundingBox = {
    x: number;
    y: number;
    width: number;
    height: number;
};

export type Detection = {
    symbolType: SymbolType;
    box: BoundingBox;
    shape?: string;     // Recognizer shape name, e.g. NOTEHEAD_BLACK
    sheet?: number;     // 1-based sheet number inside the book
};

/**
 * Which image the annotation is drawn on.
 * - recognizer: the (possibly upscaled) image the recognizer saw, boxes as reported
 * - original: the input image, boxes divided by the scale factor
 */
export type CoordinateSpace = 'recognizer' | 'original';

export type SymbolSummary = {
    total: number;
    counts: Record<SymbolType, number>;
};

export function isSymbolType(value: string): value is SymbolType {
    const known: readonly string[] = SYMBOL_TYPES;
    return known.includes(value);
}
