import sharp, { Sharp } from 'sharp';
import type { ImageSource } from '../types/image.types';

export function openSharp(src: ImageSource): { sh: Sharp } {
    if (typeof src === 'string' || Buffer.isBuffer(src)) {
        return { sh: sharp(src) };
    }
    return { sh: sharp(src.data) };
}

/** Human-readable name for error messages. */
export function describeSource(src: ImageSource): string {
    if (typeof src === 'string') return src;
    if (Buffer.isBuffer(src)) return `<buffer ${src.length} bytes>`;
    return src.filename ?? `<buffer ${src.data.length} bytes>`;
}
