import path from "node:path";
import { promises as fs } from "node:fs";
import { z } from "zod";
import {annotateImage} from "../src/utils/draw-detections";
import {summarizeDetections, formatSummary} from "../src/analysis/symbol-summary";
import {SYMBOL_TYPES} from "../src/types/detection.types";

// Preview of the annotation without Audiveris: draws a fixed list of boxes.
const fixtureSchema = z.array(z.object({
    symbolType: z.enum(SYMBOL_TYPES),
    box: z.object({
        x: z.number(),
        y: z.number(),
        width: z.number().positive(),
        height: z.number().positive(),
    }),
}));

async function run() {
    const [, , imagePathArg, fixtureArg] = process.argv;
    if (!imagePathArg) {
        console.error("Usage: tsx examples/annotate-fixture.ts path/to/image.png [detections.json]");
        process.exit(1);
    }
    const imagePath = path.resolve(process.cwd(), imagePathArg);
    const fixturePath = fixtureArg
        ? path.resolve(process.cwd(), fixtureArg)
        : path.join(__dirname, "fixtures", "mock-detections.json");

    const detections = fixtureSchema.parse(JSON.parse(await fs.readFile(fixturePath, "utf8")));

    const { name, ext } = path.parse(imagePath);
    const outPath = path.join(path.dirname(imagePath), `${name}_test_output${ext}`);
    await annotateImage(imagePath, detections, outPath, {
        banner: "MOCK DATA - Install Audiveris for real detection",
    });

    console.log("Saved overlay:", outPath);
    for (const line of formatSummary(summarizeDetections(detections))) {
        console.log(`  ${line}`);
    }
}

run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
