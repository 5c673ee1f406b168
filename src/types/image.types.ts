export type ImageSource =
    | string                  // path
    | Buffer                  // raw bytes
    | { data: Buffer; filename?: string; mime?: string };

export interface ImageMetadata {
    width: number;
    height: number;
    format: string;
    colorspace: string;
    hasAlpha: boolean;
    density?: number;
}

export type ImageSize = { width: number; height: number };
