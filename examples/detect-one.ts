import path from "node:path";
import {MusicSymbolDetector} from "../src/analysis/music-symbol-detector";
import {AudiverisRecognizer} from "../src/recognizers/audiveris.recognizer";

async function run() {
    const [, , imagePathArg, audiverisArg] = process.argv;
    if (!imagePathArg) {
        console.error("Usage: tsx examples/detect-one.ts path/to/score.png [path/to/audiveris]");
        process.exit(1);
    }
    const imagePath = path.resolve(process.cwd(), imagePathArg);

    const detector = new MusicSymbolDetector(
        new AudiverisRecognizer({ executablePath: audiverisArg ?? process.env.AUDIVERIS_PATH })
    );
    const result = await detector.process(imagePath);
    console.log("Summary:", JSON.stringify(result.summary, null, 2));
    console.log("Saved overlay:", result.outputPath);
}

run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
