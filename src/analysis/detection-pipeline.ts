import type { AnnotationSpace, AppConfig } from "../config/app-config";
import type { DetectorMode, IDetector } from "../interfaces/detector.interface";
import type { ImageSource } from "../types/image-source";
import type { DetectionResult } from "../types/detection.types";
import type { OriginalDimensions } from "../types/tensor.types";
import { ImagePreprocessor } from "../processors/image-preprocessor";
import { createDetector } from "../detectors/create-detector";
import { type AnnotatedImage, Annotator } from "../utils/draw-finding";
import { denormalizeBox } from "../utils/box-geometry";
import { loadRawImage } from "../utils/open-sharp";
import { type Logger, silentLogger } from "../utils/logger";

export interface PipelineRun {
    result: DetectionResult;
    annotatedImage: AnnotatedImage | null;
    elapsedMs: number;
    mode: DetectorMode;
    original: OriginalDimensions;
}

export interface DetectionPipelineOptions {
    annotationSpace?: AnnotationSpace;
    logger?: Logger;
}

/**
 * bytes → tensor → detector strategy → result → annotation (only on a finding).
 * Holds no per-request state; one instance serves every request.
 */
export class DetectionPipeline {
    private readonly annotationSpace: AnnotationSpace;
    private readonly logger: Logger;

    constructor(
        readonly preprocessor: ImagePreprocessor,
        readonly detector: IDetector,
        private readonly annotator: Annotator,
        options: DetectionPipelineOptions = {},
    ) {
        this.annotationSpace = options.annotationSpace ?? 'tensor';
        this.logger = options.logger ?? silentLogger;
    }

    static async create(config: AppConfig, logger: Logger = silentLogger): Promise<DetectionPipeline> {
        const size = config.model.inputSize;
        const preprocessor = new ImagePreprocessor({
            targetSize: { width: size, height: size },
            logger: logger.child('preprocessor'),
        });
        const detector = await createDetector(config, logger.child('detector'));
        const annotator = new Annotator({ logger: logger.child('annotator') });
        return new DetectionPipeline(preprocessor, detector, annotator, {
            annotationSpace: config.annotationSpace,
            logger,
        });
    }

    get mode(): DetectorMode {
        return this.detector.mode;
    }

    /** DecodeError and PreprocessError propagate; detector faults come back inside the result. */
    async run(src: ImageSource): Promise<PipelineRun> {
        const image = await loadRawImage(src);
        const { tensor, original } = await this.preprocessor.preprocess(image);
        const { result, elapsedMs } = await this.detector.detect(tensor);

        let annotatedImage: AnnotatedImage | null = null;
        if (result.found) {
            // boxes are in tensor space; 'tensor' draws them on the original as-is
            const box = this.annotationSpace === 'original'
                ? denormalizeBox(result.box, original, this.preprocessor.targetSize)
                : result.box;
            const label = this.detector.mode === 'simulated' ? 'SIMULATED' : undefined;
            annotatedImage = await this.annotator.annotate(image.data, box, true, label);
        }

        this.logger.info(
            `Detection (${this.detector.mode}): found=${result.found}, confidence=${result.confidence}%, ` +
            `time=${elapsedMs.toFixed(2)}ms`
        );
        return { result, annotatedImage, elapsedMs, mode: this.detector.mode, original };
    }
}
