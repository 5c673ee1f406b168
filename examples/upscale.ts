import path from "node:path";
import { promises as fs } from "node:fs";
import {upscaleImage} from "../src/processors/resolution-guard";
import {ImageProcessor} from "../src/processors/image-processor";

// Unconditional upscale, independent of the resolution guard's threshold.
async function run() {
    const [, , inputArg, outputArg, scaleArg] = process.argv;
    if (!inputArg || !outputArg) {
        console.error("Usage: tsx examples/upscale.ts input.png output.png [scale_factor]");
        process.exit(1);
    }
    const scale = scaleArg ? Number.parseInt(scaleArg, 10) : 4;
    const processor = new ImageProcessor();

    const before = await processor.getImageMetadata(inputArg);
    console.log(`Original size: ${before.width}x${before.height}`);

    const buffer = await upscaleImage(inputArg, scale, processor);
    const outPath = path.resolve(process.cwd(), outputArg);
    await fs.writeFile(outPath, buffer);

    const after = await processor.getImageMetadata(buffer);
    console.log(`New size: ${after.width}x${after.height}`);
    console.log(`Saved to: ${outPath}`);
}

run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
