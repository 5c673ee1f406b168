import {BoundingBox, Detection} from "../types/detection.types";
import {ImageSize} from "../types/image.types";

/** Clamps a box to the image; returns null when nothing of it is left. */
export function clampBox(box: BoundingBox, size: ImageSize): BoundingBox | null {
    const x1 = Math.max(0, Math.min(size.width, Math.round(box.x)));
    const y1 = Math.max(0, Math.min(size.height, Math.round(box.y)));
    const x2 = Math.max(0, Math.min(size.width, Math.round(box.x + box.width)));
    const y2 = Math.max(0, Math.min(size.height, Math.round(box.y + box.height)));
    if (x2 <= x1 || y2 <= y1) return null;
    return { x: x1, y: y1, width: x2 - x1, height: y2 - y1 };
}

/**
 * Maps boxes measured on an image upscaled by `scaleFactor` back onto the
 * original image. Edges are rounded independently so adjacent boxes stay adjacent.
 * Every box is clamped to the original, whatever the factor.
 */
export function mapToOriginal(detections: Detection[], scaleFactor: number, original: ImageSize): Detection[] {
    const mapped: Detection[] = [];
    for (const det of detections) {
        const x1 = Math.round(det.box.x / scaleFactor);
        const y1 = Math.round(det.box.y / scaleFactor);
        const x2 = Math.round((det.box.x + det.box.width) / scaleFactor);
        const y2 = Math.round((det.box.y + det.box.height) / scaleFactor);
        const box = clampBox({ x: x1, y: y1, width: x2 - x1, height: y2 - y1 }, original);
        if (box) mapped.push({ ...det, box });
    }
    return mapped;
}
