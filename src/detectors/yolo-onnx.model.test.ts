import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { YoloOnnxModel } from "./yolo-onnx.model";
import { InferenceFault } from "../errors/pipeline-errors";

let dir = "";

beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "yolo-model-"));
    await writeFile(path.join(dir, "classes.txt"), "finding\r\n\nartifact\n");
});

afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
});

describe("YoloOnnxModel", () => {
    it("reads class names from classes.txt beside the model", () => {
        const model = new YoloOnnxModel({ modelPath: path.join(dir, "model.onnx") });

        expect(model.classNames).toEqual(["finding", "artifact"]);
        expect(model.isReady()).toBe(false);
    });

    it("prefers class names passed in", () => {
        const model = new YoloOnnxModel({ modelPath: path.join(dir, "model.onnx"), classNames: ["lesion"] });

        expect(model.classNames).toEqual(["lesion"]);
    });

    it("has no class names when there is no classes.txt", () => {
        const model = new YoloOnnxModel({ modelPath: path.join(tmpdir(), "elsewhere", "model.onnx") });

        expect(model.classNames).toEqual([]);
    });

    it("refuses to predict before initialize", async () => {
        const model = new YoloOnnxModel({ modelPath: path.join(dir, "model.onnx") });
        const tensor = { data: new Float32Array(3 * 4 * 4), dims: [3, 4, 4] as const };

        await expect(model.predict(tensor, { confidence: 0.5, iou: 0.45 })).rejects.toBeInstanceOf(InferenceFault);
    });

    it("fails to initialize when the model file is missing", async () => {
        const model = new YoloOnnxModel({ modelPath: path.join(dir, "missing.onnx") });

        await expect(model.initialize()).rejects.toThrow();
        expect(model.isReady()).toBe(false);
    });
});
