import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import sharp from "sharp";
import JSZip from "jszip";
import {createLogger} from "../utils/logger";

export const quietLogger = () => createLogger({ level: 'error', format: 'json', service: 'test' });

export async function makeTempDir(prefix = 'omr-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export function whiteImage(width: number, height: number) {
    return sharp({ create: { width, height, channels: 3, background: { r: 255, g: 255, b: 255 } } });
}

export async function writeWhitePng(filePath: string, width: number, height: number): Promise<string> {
    await whiteImage(width, height).png().toFile(filePath);
    return filePath;
}

export async function whitePngBuffer(width: number, height: number): Promise<Buffer> {
    return whiteImage(width, height).png().toBuffer();
}

export async function sizeOf(src: string | Buffer): Promise<{ width: number; height: number }> {
    const meta = await sharp(src).metadata();
    return { width: meta.width ?? 0, height: meta.height ?? 0 };
}

export async function pixelAt(src: string | Buffer, x: number, y: number): Promise<number[]> {
    const { data, info } = await sharp(src).raw().toBuffer({ resolveWithObject: true });
    const offset = (y * info.width + x) * info.channels;
    return [data[offset], data[offset + 1], data[offset + 2]];
}

export type InterSpec = {
    tag: string;
    shape?: string;
    bounds?: { x?: number; y?: number; w?: number; h?: number };
};

function interXml(inter: InterSpec, id: number): string {
    const shape = inter.shape ? ` shape="${inter.shape}"` : '';
    if (!inter.bounds) return `<${inter.tag} id="${id}"${shape}/>`;
    const attrs = (['x', 'y', 'w', 'h'] as const)
        .filter((k) => inter.bounds?.[k] !== undefined)
        .map((k) => `${k}="${inter.bounds?.[k]}"`)
        .join(' ');
    return `<${inter.tag} id="${id}"${shape} grade="0.8"><bounds ${attrs}/></${inter.tag}>`;
}

/** Audiveris-like sheet XML; each inner array becomes one system's <sig><inters>. */
export function sheetXml(number: number, systems: InterSpec[][]): string {
    let id = 1;
    const body = systems
        .map((inters) => `    <system id="${id}">
      <sig>
        <inters>
${inters.map((i) => `          ${interXml(i, id++)}`).join('\n')}
        </inters>
        <relations/>
      </sig>
    </system>`)
        .join('\n');
    return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<sheet number="${number}">
  <picture width="1600" height="1200"/>
  <page id="1">
${body}
  </page>
</sheet>
`;
}

/** Writes an .omr book (ZIP) containing the given sheets. */
export async function writeOmrBook(filePath: string, sheets: Record<number, string>): Promise<string> {
    const zip = new JSZip();
    zip.file('book.xml', '<?xml version="1.0"?><book software-name="Audiveris"/>');
    for (const [n, xml] of Object.entries(sheets)) {
        zip.file(`sheet#${n}/sheet#${n}.xml`, xml);
        zip.file(`sheet#${n}/BINARY.png`, Buffer.from([0]));
    }
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, await zip.generateAsync({ type: 'nodebuffer' }));
    return filePath;
}

/** Awaits a promise that must reject with `type` and returns the error. */
export async function rejectionOf<E extends Error>(promise: Promise<unknown>, type: new (...args: never[]) => E): Promise<E> {
    const err = await promise.then(() => undefined, (e: unknown) => e);
    if (!(err instanceof type)) {
        throw new Error(`Expected ${type.name}, got ${String(err)}`);
    }
    return err;
}
