import "dotenv/config";
import path from "node:path";
import { promises as fs } from "node:fs";
import { loadConfig } from "../src/config/app-config";
import { DetectionPipeline } from "../src/analysis/detection-pipeline";
import { serializeResult } from "../src/analysis/result-serializer";
import { createLogger } from "../src/utils/logger";

const [, , imagePathArg] = process.argv;
if (!imagePathArg) {
    console.error("Usage: tsx examples/predict-one.ts path/to/image.png");
    process.exit(1);
}
const imagePath = path.resolve(process.cwd(), imagePathArg);
const outDir = path.resolve(process.cwd(), "images/processed");
await fs.mkdir(outDir, { recursive: true });

const config = loadConfig();
const pipeline = await DetectionPipeline.create(config, createLogger("predict-one", { debug: config.server.debug }));

const run = await pipeline.run(imagePath);
const summary = {
    ...serializeResult(run.result),
    simulated: run.mode === "simulated",
    processingTimeMs: Number(run.elapsedMs.toFixed(2)),
    original: run.original,
};
console.log("Result:", JSON.stringify(summary, null, 2));

const { name } = path.parse(imagePath);
await fs.writeFile(path.join(outDir, `${name}.json`), JSON.stringify(summary, null, 2));
if (run.annotatedImage) {
    const outPath = path.join(outDir, `${name}.png`);
    await fs.writeFile(outPath, run.annotatedImage.data);
    console.log("Saved overlay:", outPath);
} else {
    console.log("No finding; no overlay written.");
}
