import { describe, it, expect, vi } from "vitest";
import { DetectionAdapter, selectFinding } from "./detection-adapter";
import type { DetectionThresholds, IDetectionModel } from "../interfaces/detector.interface";
import type { RawDetection } from "../types/detection.types";
import type { NormalizedTensor } from "../types/tensor.types";
import { createLogger } from "../utils/logger";

const tensor: NormalizedTensor = { data: new Float32Array(3 * 4 * 4), dims: [3, 4, 4] };

function fakeModel(predict: IDetectionModel["predict"]): IDetectionModel {
    return {
        name: "fake-model",
        classNames: ["finding"],
        isReady: () => true,
        initialize: async () => undefined,
        predict,
    };
}

const raw: RawDetection[] = [
    { box: { x1: 10, y1: 20, x2: 60, y2: 90 }, confidence: 0.3, classId: 0 },
    { box: { x1: 100.7, y1: 200.2, x2: 180.9, y2: 260.5 }, confidence: 0.9, classId: 1 },
    { box: { x1: 300, y1: 300, x2: 340, y2: 320 }, confidence: 0.6, classId: 0 },
];

describe("selectFinding", () => {
    it("picks the most confident box and keeps every raw detection", () => {
        const result = selectFinding(raw);

        expect(result.found).toBe(true);
        expect(result.confidence).toBe(90);
        expect(result.box).toEqual([100, 200, 80, 60]);
        expect(result.count).toBe(3);
        expect(result.all).toEqual([
            { box: [10, 20, 50, 70], confidence: 0.3, classId: 0 },
            { box: [100, 200, 80, 60], confidence: 0.9, classId: 1 },
            { box: [300, 300, 40, 20], confidence: 0.6, classId: 0 },
        ]);
        expect(result.source).toBe("detector");
    });

    it("keeps the first of equally confident boxes", () => {
        const result = selectFinding([
            { box: { x1: 0, y1: 0, x2: 5, y2: 5 }, confidence: 0.7, classId: 0 },
            { box: { x1: 9, y1: 9, x2: 19, y2: 19 }, confidence: 0.7, classId: 0 },
        ]);
        expect(result.box).toEqual([0, 0, 5, 5]);
    });

    it("reports percentages with two decimals", () => {
        const result = selectFinding([{ box: { x1: 0, y1: 0, x2: 1, y2: 1 }, confidence: 0.876543, classId: 0 }]);
        expect(result.confidence).toBe(87.65);
    });

    it("drops boxes whose confidence rounds to zero percent", () => {
        const faint: RawDetection = { box: { x1: 0, y1: 0, x2: 10, y2: 10 }, confidence: 0.00004, classId: 0 };

        expect(selectFinding([faint])).toEqual({ found: false, confidence: 0, box: [], count: 0, all: [], source: "detector" });

        const mixed = selectFinding([faint, raw[2]]);
        expect(mixed.found).toBe(true);
        expect(mixed.count).toBe(1);
        expect(mixed.confidence).toBe(60);
    });

    it("returns the empty shape when nothing was detected", () => {
        expect(selectFinding([])).toEqual({
            found: false,
            confidence: 0,
            box: [],
            count: 0,
            all: [],
            source: "detector",
        });
    });
});

describe("DetectionAdapter", () => {
    it("passes its construction-time thresholds to the model", async () => {
        const predict = vi.fn(async (_t: NormalizedTensor, _th: DetectionThresholds) => raw);
        const adapter = new DetectionAdapter(fakeModel(predict), { confidenceThreshold: 0.25, iouThreshold: 0.6 });

        const { result, elapsedMs } = await adapter.infer(tensor);

        expect(predict).toHaveBeenCalledWith(tensor, { confidence: 0.25, iou: 0.6 });
        expect(result.found).toBe(true);
        expect(result.count).toBe(3);
        expect(elapsedMs).toBeGreaterThanOrEqual(0);
    });

    it("turns a model failure into an empty result with an error", async () => {
        const sink = vi.fn();
        const adapter = new DetectionAdapter(
            fakeModel(async () => { throw new Error("session crashed"); }),
            { logger: createLogger("test", { sink }) },
        );

        const { result } = await adapter.detect(tensor);

        expect(result).toEqual({
            found: false,
            confidence: 0,
            box: [],
            count: 0,
            all: [],
            source: "detector",
            error: "Detection model failed: session crashed",
        });
        expect(sink).toHaveBeenCalledWith("error", expect.stringContaining("fake-model"), expect.anything());
    });

    it("describes itself for status reporting", () => {
        const adapter = new DetectionAdapter(fakeModel(async () => []));
        expect(adapter.describe()).toEqual({
            mode: "detector",
            model: "fake-model",
            classes: ["finding"],
            thresholds: { confidence: 0.5, iou: 0.45 },
        });
    });
});
