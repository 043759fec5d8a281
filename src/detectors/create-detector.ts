import { promises as fs } from "node:fs";
import type { AppConfig } from "../config/app-config";
import type { IDetectionModel, IDetector } from "../interfaces/detector.interface";
import { errorMessage } from "../errors/pipeline-errors";
import { type Logger, silentLogger } from "../utils/logger";
import { type RandomSource, seededRandom } from "../utils/random";
import { DetectionAdapter } from "./detection-adapter";
import { SimulatedDetector } from "./simulated.detector";
import type { YoloOnnxModelOptions } from "./yolo-onnx.model";

export type ModelFactory = (options: YoloOnnxModelOptions) => IDetectionModel | Promise<IDetectionModel>;

// onnxruntime is only pulled in when there is a model file to load
const loadYoloModel: ModelFactory = async (options) => {
    const { YoloOnnxModel } = await import("./yolo-onnx.model");
    return new YoloOnnxModel(options);
};

export interface CreateDetectorDeps {
    modelFactory?: ModelFactory;
    random?: RandomSource;
}

/**
 * Chooses the detection strategy once, at startup. A missing or unloadable
 * model means simulated detections for the lifetime of the process.
 */
export async function createDetector(
    config: Pick<AppConfig, 'model' | 'simulation'>,
    logger: Logger = silentLogger,
    deps: CreateDetectorDeps = {},
): Promise<IDetector> {
    const simulated = (reason: string) => {
        logger.warn(reason);
        logger.warn('Running in SIMULATED mode: results are synthetic, not model output');
        const random = deps.random
            ?? (config.simulation.seed !== undefined ? seededRandom(config.simulation.seed) : Math.random);
        return new SimulatedDetector({
            random,
            minLatencyMs: config.simulation.minLatencyMs,
            logger: logger.child('simulator'),
        });
    };

    const modelPath = config.model.path;
    const exists = await fs.access(modelPath).then(() => true, () => false);
    if (!exists) {
        return simulated(`Model file not found: ${modelPath}`);
    }

    let model: IDetectionModel;
    try {
        model = await (deps.modelFactory ?? loadYoloModel)({
            modelPath,
            classNames: config.model.classNames.length ? config.model.classNames : undefined,
            logger: logger.child('model'),
        });
        if (!model.isReady()) await model.initialize();
    } catch (err) {
        return simulated(`Failed to load detection model ${modelPath}: ${errorMessage(err)}`);
    }
    if (!model.isReady()) {
        return simulated(`Detection model ${modelPath} did not become ready`);
    }

    logger.info(`Detector ready: ${model.name} (${modelPath})`);
    return new DetectionAdapter(model, {
        confidenceThreshold: config.model.confidenceThreshold,
        iouThreshold: config.model.iouThreshold,
        logger: logger.child('adapter'),
    });
}
