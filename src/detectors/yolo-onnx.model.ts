import { promises as fs } from "node:fs";
import * as syncFs from "node:fs";
import path from "node:path";
import * as ort from "onnxruntime-web";
import type { NormalizedTensor } from "../types/tensor.types";
import type { RawDetection } from "../types/detection.types";
import type { DetectionThresholds, IDetectionModel } from "../interfaces/detector.interface";
import { InferenceFault, errorMessage } from "../errors/pipeline-errors";
import { type Logger, silentLogger } from "../utils/logger";
import { decodeDetections, pickDetectionOutput, type OutputTensor } from "./yolo-output";

export interface YoloOnnxModelOptions {
    modelPath: string;
    classNames?: string[];
    logger?: Logger;
}

/**
 * YOLO ONNX export run through onnxruntime (WASM backend).
 *
 * Input is the already normalized `[3, H, W]` tensor, fed as `[1, 3, H, W]`.
 * The head's raw class scores are compared as-is; do NOT apply sigmoid to them.
 */
export class YoloOnnxModel implements IDetectionModel {
    readonly name = 'yolo-onnx';
    private readonly modelPath: string;
    private readonly logger: Logger;
    private session: ort.InferenceSession | null = null;
    private classes: string[];

    constructor(options: YoloOnnxModelOptions) {
        this.modelPath = options.modelPath;
        this.logger = options.logger ?? silentLogger;
        this.classes = options.classNames ?? [];
        if (this.classes.length === 0) {
            this.classes = this.readClassesTxt();
        }
    }

    isReady(): boolean { return this.session !== null; }

    get classNames(): readonly string[] { return this.classes; }

    /** Optional `classes.txt` beside the model, one name per line. */
    private readClassesTxt(): string[] {
        const classesPath = path.join(path.dirname(this.modelPath), 'classes.txt');
        if (!syncFs.existsSync(classesPath)) {
            this.logger.debug(`classes.txt not found at ${classesPath}; class count will come from the output shape`);
            return [];
        }
        const lines = syncFs.readFileSync(classesPath, 'utf8').split(/\r?\n/).map(s => s.trim()).filter(Boolean);
        this.logger.debug(`Loaded ${lines.length} class names`);
        return lines;
    }

    async initialize(): Promise<void> {
        this.logger.info(`Loading detection model: ${this.modelPath}`);

        const bytes = await fs.readFile(this.modelPath);
        this.session = await ort.InferenceSession.create(bytes);

        this.logger.info('Detection model loaded');
        this.logger.debug(`   Inputs: ${JSON.stringify(this.session.inputNames)}`);
        this.logger.debug(`   Outputs: ${JSON.stringify(this.session.outputNames)}`);
    }

    async predict(tensor: NormalizedTensor, thresholds: DetectionThresholds): Promise<RawDetection[]> {
        const session = this.session;
        if (!session) {
            throw new InferenceFault('Detection model is not initialized');
        }

        const [, height, width] = tensor.dims;
        const input = new ort.Tensor('float32', tensor.data, [1, ...tensor.dims]);

        let outputs: ort.InferenceSession.OnnxValueMapType;
        try {
            outputs = await session.run({ [session.inputNames[0]]: input });
        } catch (err) {
            throw new InferenceFault(`ONNX session run failed: ${errorMessage(err)}`, err);
        }

        const output = pickDetectionOutput(this.toFloatOutputs(outputs), this.classes.length);
        this.logger.debug(`Using detection output with shape ${output.dims.join('x')}`);

        const detections = decodeDetections(output, {
            confidence: thresholds.confidence,
            iou: thresholds.iou,
            width,
            height,
            numClasses: this.classes.length,
        });
        this.logger.debug(`Detections after NMS: ${detections.length}`);
        return detections;
    }

    private toFloatOutputs(outputs: ort.InferenceSession.OnnxValueMapType): Record<string, OutputTensor> {
        const floats: Record<string, OutputTensor> = {};
        for (const [name, value] of Object.entries(outputs)) {
            if (value.data instanceof Float32Array) {
                floats[name] = { data: value.data, dims: value.dims };
            }
        }
        return floats;
    }
}
