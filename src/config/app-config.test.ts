import { describe, it, expect } from "vitest";
import { loadConfig } from "./app-config";
import { ConfigError } from "../errors/pipeline-errors";

describe("loadConfig", () => {
    it("falls back to the service defaults", () => {
        const config = loadConfig({});

        expect(config.model).toEqual({
            path: "models/detector.onnx",
            classNames: [],
            confidenceThreshold: 0.5,
            iouThreshold: 0.45,
            inputSize: 640,
        });
        expect(config.server).toEqual({
            host: "0.0.0.0",
            port: 5000,
            corsOrigins: "*",
            maxImageSize: 10485760,
            debug: false,
        });
        expect(config.simulation).toEqual({ seed: undefined, minLatencyMs: 300 });
        expect(config.annotationSpace).toBe("tensor");
    });

    it("parses numbers, flags and lists from strings", () => {
        const config = loadConfig({
            CONFIDENCE_THRESHOLD: "0.25",
            PORT: "8080",
            DEBUG: "TRUE",
            MODEL_CLASSES: "finding, artifact ,",
            CORS_ORIGINS: "http://a.test,http://b.test",
            ANNOTATION_SPACE: "original",
            SIMULATION_SEED: "42",
        });

        expect(config.model.confidenceThreshold).toBe(0.25);
        expect(config.server.port).toBe(8080);
        expect(config.server.debug).toBe(true);
        expect(config.model.classNames).toEqual(["finding", "artifact"]);
        expect(config.server.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
        expect(config.annotationSpace).toBe("original");
        expect(config.simulation.seed).toBe(42);
    });

    it("reports every invalid key", () => {
        let caught: unknown;
        try {
            loadConfig({ IOU_THRESHOLD: "1.5", PORT: "0", ANNOTATION_SPACE: "pixels" });
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        const issues = caught instanceof ConfigError ? caught.issues : [];
        expect(issues).toHaveLength(3);
        expect(issues.some((i) => i.startsWith("IOU_THRESHOLD:"))).toBe(true);
        expect(issues.some((i) => i.startsWith("PORT:"))).toBe(true);
        expect(issues.some((i) => i.startsWith("ANNOTATION_SPACE:"))).toBe(true);
    });

    it("treats blank values as unset", () => {
        const config = loadConfig({ DEBUG: "", SIMULATION_SEED: "", PORT: " ", MODEL_PATH: "" });

        expect(config.server.debug).toBe(false);
        expect(config.server.port).toBe(5000);
        expect(config.model.path).toBe("models/detector.onnx");
        expect(config.simulation.seed).toBeUndefined();
    });
});
