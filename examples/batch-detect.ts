import path from "node:path";
import { promises as fs } from "node:fs";
import {MusicSymbolDetector} from "../src/analysis/music-symbol-detector";
import {AudiverisRecognizer} from "../src/recognizers/audiveris.recognizer";
import {ImageProcessor} from "../src/processors/image-processor";
import {SymbolSummary} from "../src/types/detection.types";
import {errorMessage} from "../src/types/errors";

async function run() {
    const [, , inputDirArg, audiverisArg] = process.argv;
    if (!inputDirArg) {
        console.error("Usage: tsx examples/batch-detect.ts path/to/scores_dir [path/to/audiveris]");
        process.exit(1);
    }
    const inputDir = path.resolve(process.cwd(), inputDirArg);
    const outDir = path.resolve(process.cwd(), "images/processed");
    await fs.mkdir(outDir, { recursive: true });

    const processor = new ImageProcessor();
    const detector = new MusicSymbolDetector(
        new AudiverisRecognizer({ executablePath: audiverisArg ?? process.env.AUDIVERIS_PATH }),
        {},
        processor
    );

    // skip our own artefacts from earlier runs
    const files = (await fs.readdir(inputDir))
        .filter((f) => processor.isValidImageFile(f))
        .filter((f) => !/_(upscaled|detected)\.[^.]+$/.test(f));
    console.log(`Found ${files.length} images`);

    const allResults: Array<{
        filename: string;
        outputPath?: string;
        summary?: SymbolSummary;
        error?: string;
    }> = [];

    for (const filename of files) {
        const { name, ext } = path.parse(filename);
        try {
            const result = await detector.process(path.join(inputDir, filename), {
                outputPath: path.join(outDir, `${name}_detected${ext}`),
                workingDir: path.join(outDir, "audiveris_output"),
            });
            allResults.push({ filename, outputPath: result.outputPath, summary: result.summary });
            console.log(`✔ ${filename}: ${result.summary.total} symbols`);
        } catch (e) {
            const message = errorMessage(e);
            console.error(`❌ ${filename}: ${message}`);
            allResults.push({ filename, error: message });
        }
    }

    const resultJsonPath = path.join(outDir, "result.json");
    await fs.writeFile(
        resultJsonPath,
        JSON.stringify({ timestamp: new Date().toISOString(), inputDir, total: files.length, results: allResults }, null, 2),
        "utf8"
    );
    console.log(`\nReport saved: ${resultJsonPath}`);
}

run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
