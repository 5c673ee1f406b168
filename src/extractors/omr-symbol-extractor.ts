import { promises as fs } from "node:fs";
import JSZip from "jszip";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import {BoundingBox, Detection, SymbolType} from "../types/detection.types";
import {errorMessage, OutputParseError} from "../types/errors";
import {Logger, logger as rootLogger} from "../utils/logger";

type XmlNode = Record<string, unknown>;

const ATTRS = ':@';
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const SHEET_ENTRY = /^sheet#(\d+)\/sheet#(\d+)\.xml$/;

/** Inter elements that can carry one of the symbols we draw. */
const SYMBOL_TAGS = new Set(['head', 'alter', 'key-alter', 'inter']);

const DEFAULT_BOUNDS = { x: 0, y: 0, w: 20, h: 20 };

const isNode = (v: unknown): v is XmlNode => typeof v === 'object' && v !== null && !Array.isArray(v);

function tagOf(node: XmlNode): string | undefined {
    return Object.keys(node).find((k) => k !== ATTRS && k !== '#text');
}

function childrenOf(node: XmlNode, tag: string): XmlNode[] {
    const children = node[tag];
    return Array.isArray(children) ? children.filter(isNode) : [];
}

function attrsOf(node: XmlNode): Record<string, string> {
    const raw = node[ATTRS];
    if (!isNode(raw)) return {};
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(raw)) {
        if (typeof v === 'string' || typeof v === 'number') out[k] = String(v);
    }
    return out;
}

function intAttr(attrs: Record<string, string>, key: keyof typeof DEFAULT_BOUNDS): number {
    const value = Number(attrs[key]);
    return attrs[key] !== undefined && Number.isFinite(value) ? Math.round(value) : DEFAULT_BOUNDS[key];
}

/**
 * Maps an Audiveris shape name to one of our symbol types.
 * SHARP, DOUBLE_SHARP, KEY_SHARP -> sharp; NOTEHEAD_BLACK, NOTEHEAD_VOID -> notehead; CLEF_G -> null.
 */
export function classifyShape(shape: string): SymbolType | null {
    const s = shape.toLowerCase();
    if (s.includes('sharp')) return 'sharp';
    if (s.includes('flat')) return 'flat';
    if (s.includes('natural')) return 'natural';
    if (s.includes('head')) return 'notehead';
    return null;
}

function isZip(buffer: Buffer): boolean {
    return buffer.length >= ZIP_SIGNATURE.length && ZIP_SIGNATURE.every((byte, i) => buffer[i] === byte);
}

export class OmrSymbolExtractor {
    private readonly parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: '',
        preserveOrder: true,
    });
    private readonly log: Logger;

    constructor(log?: Logger) {
        this.log = log ?? rootLogger.child({ component: 'extractor' });
    }

    /** Reads an .omr book (ZIP) or a bare sheet XML file. */
    async extract(omrPath: string): Promise<Detection[]> {
        let buffer: Buffer;
        try {
            buffer = await fs.readFile(omrPath);
        } catch (err) {
            throw new OutputParseError(`Cannot read recognizer output ${omrPath}: ${errorMessage(err)}`, { cause: err });
        }
        if (buffer.length === 0) {
            throw new OutputParseError(`Recognizer output is empty: ${omrPath}`);
        }

        const sheets = isZip(buffer)
            ? await this.readBook(buffer, omrPath)
            : [{ number: undefined, xml: buffer.toString('utf8') }];

        const detections: Detection[] = [];
        for (const sheet of sheets) {
            detections.push(...this.parseSheetXml(sheet.xml, sheet.number, omrPath));
        }
        this.log.debug('Symbols extracted', { omr: omrPath, sheets: sheets.length, symbols: detections.length });
        return detections;
    }

    private async readBook(buffer: Buffer, omrPath: string): Promise<Array<{ number: number; xml: string }>> {
        let zip: JSZip;
        try {
            zip = await JSZip.loadAsync(buffer);
        } catch (err) {
            throw new OutputParseError(`Recognizer output is not a readable .omr archive: ${omrPath}: ${errorMessage(err)}`, { cause: err });
        }

        const entries: Array<{ number: number; file: JSZip.JSZipObject }> = [];
        zip.forEach((relativePath, file) => {
            const m = SHEET_ENTRY.exec(relativePath);
            if (m && m[1] === m[2] && !file.dir) {
                entries.push({ number: Number(m[1]), file });
            }
        });
        if (entries.length === 0) {
            throw new OutputParseError(`No sheet XML found in ${omrPath}`);
        }
        entries.sort((a, b) => a.number - b.number);

        const sheets: Array<{ number: number; xml: string }> = [];
        for (const entry of entries) {
            sheets.push({ number: entry.number, xml: await entry.file.async('string') });
        }
        return sheets;
    }

    /**
     * Walks every <sig><inters> section in document order and returns one
     * detection per recognised symbol element that has <bounds>.
     */
    parseSheetXml(xml: string, sheetNumber?: number, source = '<sheet>'): Detection[] {
        const validation = XMLValidator.validate(xml);
        if (validation !== true) {
            const { msg, line, col } = validation.err;
            throw new OutputParseError(`Malformed sheet XML in ${source} (line ${line}, col ${col}): ${msg}`);
        }

        const doc: unknown = this.parser.parse(xml);
        const roots = Array.isArray(doc) ? doc.filter(isNode) : [];
        const sheet = sheetNumber ?? this.sheetNumberOf(roots);

        const detections: Detection[] = [];
        let intersSections = 0;

        const visit = (nodes: XmlNode[], parentTag: string | undefined) => {
            for (const node of nodes) {
                const tag = tagOf(node);
                if (!tag) continue;
                if (tag === 'inters' && parentTag === 'sig') {
                    intersSections++;
                    this.collectSymbols(childrenOf(node, tag), sheet, detections);
                    continue;
                }
                visit(childrenOf(node, tag), tag);
            }
        };
        visit(roots, undefined);

        if (intersSections === 0) {
            this.log.warn('No inters section found in sheet XML', { source, sheet });
        }
        return detections;
    }

    private collectSymbols(nodes: XmlNode[], sheet: number, out: Detection[]): void {
        for (const node of nodes) {
            const tag = tagOf(node);
            if (!tag) continue;
            if (!SYMBOL_TAGS.has(tag)) {
                this.collectSymbols(childrenOf(node, tag), sheet, out);
                continue;
            }

            const attrs = attrsOf(node);
            const shape = attrs.shape;
            const symbolType: SymbolType | null = tag === 'head' ? 'notehead' : shape ? classifyShape(shape) : null;
            if (!symbolType) continue;

            const bounds = childrenOf(node, tag).find((child) => tagOf(child) === 'bounds');
            if (!bounds) continue;

            const b = attrsOf(bounds);
            const box: BoundingBox = {
                x: intAttr(b, 'x'),
                y: intAttr(b, 'y'),
                width: intAttr(b, 'w'),
                height: intAttr(b, 'h'),
            };
            out.push({ symbolType, box, shape: shape ?? (tag === 'head' ? 'NOTEHEAD' : undefined), sheet });
        }
    }

    private sheetNumberOf(roots: XmlNode[]): number {
        const sheetNode = roots.find((n) => tagOf(n) === 'sheet');
        const n = sheetNode ? Number(attrsOf(sheetNode).number) : NaN;
        return Number.isInteger(n) && n > 0 ? n : 1;
    }
}

export async function extractSymbols(omrPath: string): Promise<Detection[]> {
    return new OmrSymbolExtractor().extract(omrPath);
}
