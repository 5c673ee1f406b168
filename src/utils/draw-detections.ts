import path from "node:path";
import { promises as fs } from "node:fs";
import sharp from "sharp";
import {Detection, SymbolType} from "../types/detection.types";
import {ImageSource} from "../types/image.types";
import {ImageProcessor} from "../processors/image-processor";
import {clampBox} from "./coordinate-mapping";
import {errorMessage, WriteError} from "../types/errors";

export const SYMBOL_STYLES: Record<SymbolType, { color: string; label: string }> = {
    notehead: { color: '#FF00FF', label: 'o' },   // magenta
    sharp:    { color: '#FF0000', label: '#' },   // red
    flat:     { color: '#00FF00', label: 'b' },   // green
    natural:  { color: '#0000FF', label: 'n' },   // blue
};

export type AnnotateOptions = {
    /** Top-left info banner. `true` (default) shows "Detected: N symbols", a string replaces the text. */
    banner?: boolean | string;
};

const escape = (s: string) => s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

/** SVG overlay the size of the image: one box + label tag per detection, plus the banner. */
export function buildOverlaySvg(width: number, height: number, detections: Detection[], options: AnnotateOptions = {}): string {
    const W = width, H = height;

    // ~0.3% of the short side for strokes, ~2.5% for label text
    const strokeWidth = Math.max(2, Math.floor(Math.min(W, H) * 0.003));
    const fontSize = Math.max(14, Math.floor(Math.min(W, H) * 0.025));
    const padX = Math.max(6, Math.floor(fontSize * 0.5));
    const padY = Math.max(4, Math.floor(fontSize * 0.35));

    let svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${W}" height="${H}">
    <style>.lbl{font-family:Helvetica,Arial,DejaVu Sans,sans-serif;font-weight:600;}</style>`;

    for (const det of detections) {
        const box = clampBox(det.box, { width: W, height: H });
        if (!box) continue;

        const { color, label } = SYMBOL_STYLES[det.symbolType];
        const approxW = Math.ceil(label.length * fontSize * 0.6);
        const bgW = approxW + padX * 2, bgH = fontSize + padY * 2;
        // tag sits above the box, pushed inside the image near the top edge
        const bgX = Math.min(box.x, Math.max(0, W - bgW));
        const bgY = Math.max(0, box.y - bgH - Math.max(2, strokeWidth));
        const labelX = bgX + padX, labelY = bgY + padY + Math.floor(fontSize * 0.8);

        svg += `
      <rect x="${box.x}" y="${box.y}" width="${box.width}" height="${box.height}" fill="none" stroke="${color}" stroke-width="${strokeWidth}"/>
      <rect x="${bgX}" y="${bgY}" width="${Math.min(bgW, W - bgX)}" height="${bgH}" fill="${color}" opacity="0.85" rx="${Math.floor(bgH * 0.2)}"/>
      <text x="${labelX}" y="${labelY}" class="lbl" font-size="${fontSize}" fill="#ffffff">${escape(label)}</text>`;
    }

    if (options.banner !== false) {
        const text = typeof options.banner === 'string' ? options.banner : `Detected: ${detections.length} symbols`;
        const bannerFont = Math.max(12, Math.floor(fontSize * 0.6));
        const bannerW = Math.min(W - 10, Math.ceil(text.length * bannerFont * 0.6) + 12);
        const bannerH = bannerFont + 8;
        svg += `
      <rect x="10" y="10" width="${Math.max(0, bannerW)}" height="${bannerH}" fill="#FFFF00"/>
      <text x="16" y="${10 + 4 + Math.floor(bannerFont * 0.85)}" class="lbl" font-size="${bannerFont}" fill="#000000">${escape(text)}</text>`;
    }

    svg += `
</svg>`;
    return svg;
}

/** Returns an annotated copy in the input's format; dimensions never change. */
export async function drawDetectionsOnBuffer(
    imageBuffer: Buffer,
    detections: Detection[],
    options: AnnotateOptions = {},
    imageProcessor = new ImageProcessor()
): Promise<Buffer> {
    const { width, height } = await imageProcessor.getImageMetadata(imageBuffer);
    const svg = buildOverlaySvg(width, height, detections, options);
    return await sharp(imageBuffer).composite([{ input: Buffer.from(svg), left: 0, top: 0 }]).toBuffer();
}

/** Draws `detections` on a copy of `src` and writes it to `outputPath` (format from its extension). */
export async function annotateImage(
    src: ImageSource,
    detections: Detection[],
    outputPath: string,
    options: AnnotateOptions = {},
    imageProcessor = new ImageProcessor()
): Promise<{ outPath: string; width: number; height: number }> {
    const outPath = path.resolve(outputPath);
    if (typeof src === 'string' && path.resolve(src) === outPath) {
        throw new WriteError(`Refusing to overwrite the input image: ${outPath}`);
    }

    const buffer = await imageProcessor.getImageBuffer(src);
    const annotated = await drawDetectionsOnBuffer(buffer, detections, options, imageProcessor);

    try {
        await fs.mkdir(path.dirname(outPath), { recursive: true });
        const info = await sharp(annotated).toFile(outPath);
        return { outPath, width: info.width, height: info.height };
    } catch (err) {
        throw new WriteError(`Cannot write annotated image ${outPath}: ${errorMessage(err)}`, { cause: err });
    }
}
