import { setTimeout as sleepFor } from "node:timers/promises";
import type { NormalizedTensor } from "../types/tensor.types";
import { emptyResult, type BoxXYWH, type DetectionResult } from "../types/detection.types";
import type { DetectionOutcome, DetectorDescription, IDetector } from "../interfaces/detector.interface";
import { roundTo } from "../utils/box-geometry";
import { type RandomSource, randomInt, uniform } from "../utils/random";
import { type Logger, silentLogger } from "../utils/logger";

export interface TensorStatistics {
    mean: number;
    std: number;
    variance: number;
}

type Range = readonly [lo: number, hi: number];

interface DrawProfile {
    positiveRate: number;
    positiveConfidence: Range;
    negativeConfidence: Range;
}

// Almost anything with some contrast passes as a scan.
const PLAUSIBLE_SCAN: DrawProfile = { positiveRate: 0.90, positiveConfidence: [0.80, 0.98], negativeConfidence: [0.05, 0.20] };
const OTHER_IMAGE: DrawProfile = { positiveRate: 0.20, positiveConfidence: [0.40, 0.70], negativeConfidence: [0.05, 0.30] };

// Tensor-space pixels
const CENTER_RANGE: Range = [200, 400];
const SIZE_RANGE: Range = [80, 150];

/** Population mean / variance / std over every value, two passes in double precision. */
export function computeTensorStatistics(data: Float32Array): TensorStatistics {
    if (data.length === 0) return { mean: 0.5, std: 0.1, variance: 0 };

    let sum = 0;
    for (let i = 0; i < data.length; i++) sum += data[i];
    const mean = sum / data.length;

    let sq = 0;
    for (let i = 0; i < data.length; i++) {
        const d = data[i] - mean;
        sq += d * d;
    }
    const variance = sq / data.length;
    return { mean, std: Math.sqrt(variance), variance };
}

export function isPlausibleScan(stats: TensorStatistics): boolean {
    const contrastRatio = stats.std / (stats.mean + 1e-5);
    return contrastRatio > 0.01
        && stats.mean > 0.05 && stats.mean < 1.0
        && stats.std > 0.01
        && stats.variance > 0.0001;
}

export interface SimulatedDetectorOptions {
    random?: RandomSource;
    minLatencyMs?: number;
    sleep?: (ms: number) => Promise<unknown>;
    logger?: Logger;
}

/**
 * Stand-in used when no model could be loaded. Draws plausible-looking results
 * from tensor statistics alone; everything it returns is tagged `simulated`.
 */
export class SimulatedDetector implements IDetector {
    readonly mode = 'simulated' as const;
    private readonly random: RandomSource;
    private readonly minLatencyMs: number;
    private readonly sleep: (ms: number) => Promise<unknown>;
    private readonly logger: Logger;

    constructor(options: SimulatedDetectorOptions = {}) {
        this.random = options.random ?? Math.random;
        this.minLatencyMs = options.minLatencyMs ?? 300;
        this.sleep = options.sleep ?? ((ms) => sleepFor(ms));
        this.logger = options.logger ?? silentLogger;
    }

    describe(): DetectorDescription {
        return { mode: this.mode, model: 'simulated' };
    }

    /** Pads to the minimum latency so timing shown downstream looks like real inference. */
    async detect(tensor: NormalizedTensor): Promise<DetectionOutcome> {
        const started = performance.now();
        const result = this.simulate(tensor);
        const remaining = this.minLatencyMs - (performance.now() - started);
        if (remaining > 0) await this.sleep(remaining);
        return { result, elapsedMs: performance.now() - started };
    }

    simulate(tensor: NormalizedTensor): DetectionResult {
        const stats = computeTensorStatistics(tensor.data);
        const plausible = isPlausibleScan(stats);
        const profile = plausible ? PLAUSIBLE_SCAN : OTHER_IMAGE;

        // Draw order is fixed so a seeded source replays the same results.
        const found = this.random() < profile.positiveRate;
        const [lo, hi] = found ? profile.positiveConfidence : profile.negativeConfidence;
        const confidence = uniform(this.random, lo, hi);

        this.logger.info(
            `[SIMULATED] found=${found}, confidence=${confidence.toFixed(2)}, plausibleScan=${plausible}`
        );
        if (!found) return emptyResult('simulated');

        const box = this.drawBox();
        return {
            found: true,
            confidence: roundTo(confidence * 100, 2),
            box,
            count: 1,
            all: [{ box: [...box], confidence, classId: 0 }],
            source: 'simulated',
        };
    }

    private drawBox(): BoxXYWH {
        const cx = randomInt(this.random, CENTER_RANGE[0], CENTER_RANGE[1]);
        const cy = randomInt(this.random, CENTER_RANGE[0], CENTER_RANGE[1]);
        const w = randomInt(this.random, SIZE_RANGE[0], SIZE_RANGE[1]);
        const h = randomInt(this.random, SIZE_RANGE[0], SIZE_RANGE[1]);
        return [Math.max(0, cx - Math.floor(w / 2)), Math.max(0, cy - Math.floor(h / 2)), w, h];
    }
}
