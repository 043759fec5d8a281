import type { NormalizedTensor } from "../types/tensor.types";
import type { DetectionResult, RawDetection } from "../types/detection.types";

export type DetectorMode = 'detector' | 'simulated';

export interface DetectionThresholds {
    confidence: number;   // drop candidates at or below this score
    iou: number;          // overlap above which the weaker box of a class is suppressed
}

/**
 * The opaque model capability: fixed-size tensor in, corner boxes out
 * (tensor-space pixels, already thresholded and overlap-suppressed).
 */
export interface IDetectionModel {
    readonly name: string;
    readonly classNames: readonly string[];
    isReady(): boolean;
    initialize(): Promise<void>;
    predict(tensor: NormalizedTensor, thresholds: DetectionThresholds): Promise<RawDetection[]>;
}

export interface DetectionOutcome {
    result: DetectionResult;
    elapsedMs: number;
}

export interface DetectorDescription {
    mode: DetectorMode;
    model?: string;
    classes?: readonly string[];
    thresholds?: DetectionThresholds;
}

/** Strategy chosen once at startup: a real model behind the adapter, or the simulator. */
export interface IDetector {
    readonly mode: DetectorMode;
    describe(): DetectorDescription;
    detect(tensor: NormalizedTensor): Promise<DetectionOutcome>;
}
