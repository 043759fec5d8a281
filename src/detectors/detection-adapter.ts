import type { NormalizedTensor } from "../types/tensor.types";
import { emptyResult, type Detection, type DetectionResult, type RawDetection } from "../types/detection.types";
import type {
    DetectionOutcome,
    DetectionThresholds,
    DetectorDescription,
    IDetectionModel,
    IDetector,
} from "../interfaces/detector.interface";
import { InferenceFault, errorMessage } from "../errors/pipeline-errors";
import { cornersToXywh, roundTo } from "../utils/box-geometry";
import { type Logger, silentLogger } from "../utils/logger";

export interface DetectionAdapterOptions {
    confidenceThreshold?: number;
    iouThreshold?: number;
    logger?: Logger;
}

const asPercent = (confidence: number) => roundTo(confidence * 100, 2);

/**
 * Picks the single best finding out of raw detections.
 * Every raw box stays in `all`; ties keep the first one seen. Boxes that
 * report as 0.00% are dropped so `found` and a non-zero confidence go together.
 */
export function selectFinding(raw: readonly RawDetection[]): DetectionResult {
    const visible = raw.filter((d) => asPercent(d.confidence) > 0);
    if (visible.length === 0) return emptyResult('detector');

    const all: Detection[] = visible.map((d) => ({
        box: cornersToXywh(d.box),
        confidence: d.confidence,
        classId: d.classId,
    }));
    const best = all.reduce((top, cur) => (cur.confidence > top.confidence ? cur : top));

    return {
        found: true,
        confidence: asPercent(best.confidence),
        box: [...best.box],
        count: all.length,
        all,
        source: 'detector',
    };
}

/**
 * Wraps a loaded detection model. Inference failures never escape: they come
 * back as an empty result carrying `error`.
 */
export class DetectionAdapter implements IDetector {
    readonly mode = 'detector' as const;
    private readonly thresholds: DetectionThresholds;
    private readonly logger: Logger;

    constructor(private readonly model: IDetectionModel, options: DetectionAdapterOptions = {}) {
        this.thresholds = {
            confidence: options.confidenceThreshold ?? 0.5,
            iou: options.iouThreshold ?? 0.45,
        };
        this.logger = options.logger ?? silentLogger;
    }

    describe(): DetectorDescription {
        return {
            mode: this.mode,
            model: this.model.name,
            classes: this.model.classNames,
            thresholds: { ...this.thresholds },
        };
    }

    detect(tensor: NormalizedTensor): Promise<DetectionOutcome> {
        return this.infer(tensor);
    }

    async infer(tensor: NormalizedTensor): Promise<DetectionOutcome> {
        const started = performance.now();
        try {
            const raw = await this.model.predict(tensor, this.thresholds);
            const result = selectFinding(raw);
            const elapsedMs = performance.now() - started;

            if (result.found) {
                this.logger.info(`Finding detected with confidence ${result.confidence}% (${result.count} raw boxes)`);
            } else {
                this.logger.info('No finding detected');
            }
            this.logger.debug(`Inference completed in ${elapsedMs.toFixed(2)}ms`);
            return { result, elapsedMs };
        } catch (err) {
            const fault = err instanceof InferenceFault
                ? err
                : new InferenceFault(`Detection model failed: ${errorMessage(err)}`, err);
            this.logger.error(`Error during inference with ${this.model.name}`, fault);
            return { result: emptyResult('detector', fault.message), elapsedMs: performance.now() - started };
        }
    }
}
