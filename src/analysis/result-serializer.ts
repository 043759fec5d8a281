import type { DetectionResult } from "../types/detection.types";

export interface SerializedDetection {
    box: number[];
    confidence: number;
    class: number;
}

/** Wire shape of a result; `source` travels separately as the `simulated` flag. */
export interface SerializedResult {
    found: boolean;
    confidence: number;
    box: number[];
    count: number;
    all: SerializedDetection[];
    error?: string;
}

export function serializeResult(result: DetectionResult): SerializedResult {
    const out: SerializedResult = {
        found: result.found,
        confidence: result.confidence,
        box: [...result.box],
        count: result.count,
        all: result.all.map((d) => ({ box: [...d.box], confidence: d.confidence, class: d.classId })),
    };
    if (!result.found && result.error !== undefined) out.error = result.error;
    return out;
}
