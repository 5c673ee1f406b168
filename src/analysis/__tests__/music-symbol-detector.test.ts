import path from "node:path";
import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {detectedPathFor, MusicSymbolDetector} from "../music-symbol-detector";
import {IRecognizer} from "../../interfaces/recognizer.interface";
import {InputError, RecognizerNotFoundError, WriteError} from "../../types/errors";
import {
    makeTempDir,
    pixelAt,
    quietLogger,
    rejectionOf,
    removeDir,
    sheetXml,
    sizeOf,
    writeOmrBook,
    writeWhitePng,
} from "../../__tests__/helpers";

/** Stands in for Audiveris: writes a book with one notehead at (100,100,50,50). */
class StubRecognizer implements IRecognizer {
    readonly name = "stub";
    ready = false;
    readonly calls: Array<{ imagePath: string; workingDir: string }> = [];

    isReady() { return this.ready; }

    async initialize() { this.ready = true; }

    async recognize(imagePath: string, workingDir: string): Promise<string> {
        this.calls.push({ imagePath, workingDir });
        const stem = path.parse(imagePath).name;
        return writeOmrBook(path.join(workingDir, `${stem}.omr`), {
            1: sheetXml(1, [[{ tag: "head", shape: "NOTEHEAD_BLACK", bounds: { x: 100, y: 100, w: 50, h: 50 } }]]),
        });
    }
}

class MissingRecognizer extends StubRecognizer {
    async initialize(): Promise<void> {
        throw new RecognizerNotFoundError("/nowhere/audiveris");
    }
}

describe("detectedPathFor", () => {
    it("derives <name>_detected.<ext> beside the input", () => {
        expect(detectedPathFor("/scores/page.jpg")).toBe(path.join("/scores", "page_detected.jpg"));
    });
});

describe("MusicSymbolDetector", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it("upscales a 400x300 scan, recognises it and marks the notehead in magenta", async () => {
        const input = await writeWhitePng(path.join(dir, "scan.png"), 400, 300);
        const recognizer = new StubRecognizer();
        const detector = new MusicSymbolDetector(recognizer, { logger: quietLogger() });

        const result = await detector.process(input);

        const upscaled = path.join(dir, "scan_upscaled.png");
        const output = path.join(dir, "scan_detected.png");
        expect(recognizer.ready).toBe(true);
        expect(recognizer.calls).toEqual([{ imagePath: upscaled, workingDir: path.join(dir, "audiveris_output") }]);
        expect(result.upscaledPath).toBe(upscaled);
        expect(result.scaleFactor).toBe(4);
        expect(result.recognized).toEqual({ path: upscaled, width: 1600, height: 1200, upscaled: true });
        expect(await sizeOf(upscaled)).toEqual({ width: 1600, height: 1200 });
        expect(result.outputPath).toBe(output);
        expect(await sizeOf(output)).toEqual({ width: 1600, height: 1200 });
        expect(await pixelAt(output, 100, 125)).toEqual([255, 0, 255]);
        expect(result.detections).toEqual([
            { symbolType: "notehead", box: { x: 100, y: 100, width: 50, height: 50 }, shape: "NOTEHEAD_BLACK", sheet: 1 },
        ]);
        expect(result.summary.counts.notehead).toBe(1);
        expect(result.coordinateSpace).toBe("recognizer");
    });

    it("uses large images as they are", async () => {
        const input = await writeWhitePng(path.join(dir, "page.png"), 1600, 1200);
        const recognizer = new StubRecognizer();
        const detector = new MusicSymbolDetector(recognizer, { logger: quietLogger() });

        const result = await detector.process(input, { workingDir: path.join(dir, "work") });

        expect(recognizer.calls[0].imagePath).toBe(input);
        expect(result.upscaledPath).toBeUndefined();
        expect(result.scaleFactor).toBe(1);
        expect(result.omrPath).toBe(path.join(dir, "work", "page.omr"));
    });

    it("maps boxes back onto the original image when asked", async () => {
        const input = await writeWhitePng(path.join(dir, "scan.png"), 400, 300);
        const detector = new MusicSymbolDetector(new StubRecognizer(), { logger: quietLogger() });
        const output = path.join(dir, "mapped.png");

        const result = await detector.process(input, { outputPath: output, coordinateSpace: "original" });

        expect(result.coordinateSpace).toBe("original");
        expect(result.detections[0].box).toEqual({ x: 25, y: 25, width: 13, height: 13 });
        expect(await sizeOf(output)).toEqual({ width: 400, height: 300 });
    });

    it("stops before writing anything when the recognizer is missing", async () => {
        const input = await writeWhitePng(path.join(dir, "scan.png"), 400, 300);
        const recognizer = new MissingRecognizer();
        const recognize = vi.spyOn(recognizer, "recognize");
        const detector = new MusicSymbolDetector(recognizer, { logger: quietLogger() });

        await expect(detector.process(input)).rejects.toBeInstanceOf(RecognizerNotFoundError);

        expect(recognize).not.toHaveBeenCalled();
        expect(await fs.readdir(dir)).toEqual(["scan.png"]);
    });

    it("refuses an output path equal to the input image", async () => {
        const input = await writeWhitePng(path.join(dir, "scan.png"), 400, 300);
        const recognizer = new StubRecognizer();
        const detector = new MusicSymbolDetector(recognizer, { logger: quietLogger() });

        const err = await rejectionOf(detector.process(input, { outputPath: input }), WriteError);

        expect(err.message).toBe(`Output path would overwrite the input image: ${input}`);
        expect(recognizer.calls).toEqual([]);
        expect(await sizeOf(input)).toEqual({ width: 400, height: 300 });
        expect(await fs.readdir(dir)).toEqual(["scan.png"]);
    });

    it("refuses an output path equal to the upscaled copy", async () => {
        const input = await writeWhitePng(path.join(dir, "scan.png"), 400, 300);
        const detector = new MusicSymbolDetector(new StubRecognizer(), { logger: quietLogger() });
        const upscaled = path.join(dir, "scan_upscaled.png");

        await expect(detector.process(input, { outputPath: upscaled })).rejects.toBeInstanceOf(WriteError);
        expect(await fs.readdir(dir)).toEqual(["scan.png"]);
    });

    it("allows <name>_upscaled as output when no upscale is needed", async () => {
        const input = await writeWhitePng(path.join(dir, "page.png"), 1600, 1200);
        const detector = new MusicSymbolDetector(new StubRecognizer(), { logger: quietLogger() });
        const output = path.join(dir, "page_upscaled.png");

        const result = await detector.process(input, { outputPath: output });

        expect(result.outputPath).toBe(output);
    });

    it("rejects a missing input with InputError", async () => {
        const detector = new MusicSymbolDetector(new StubRecognizer(), { logger: quietLogger() });

        await expect(detector.process(path.join(dir, "missing.png"))).rejects.toBeInstanceOf(InputError);
    });
});
