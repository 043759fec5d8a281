import type { CornerBox, RawDetection } from "../types/detection.types";
import { iou } from "../utils/box-geometry";

export type OutputTensor = { data: Float32Array; dims: readonly number[] };

/** One anchor after class argmax: centre x/y and size in tensor pixels. */
export type Candidate = { x: number; y: number; w: number; h: number; classId: number; confidence: number };

type Layout = { channelFirst: boolean; anchors: number; classes: number };

/**
 * Works out the layout of a YOLO head: `[1, 4+C, N]` (channel-first) or `[1, N, 4+C]`.
 * With no class count the smaller axis is taken as the channel axis.
 */
export function matchLayout(dims: readonly number[], numClasses?: number): Layout | null {
    if (dims.length !== 3 || dims[0] !== 1) return null;
    if (numClasses && numClasses > 0) {
        const expected = 4 + numClasses;
        if (dims[1] === expected) return { channelFirst: true, anchors: dims[2], classes: numClasses };
        if (dims[2] === expected) return { channelFirst: false, anchors: dims[1], classes: numClasses };
        return null;
    }
    const channelFirst = dims[1] <= dims[2];
    const channels = channelFirst ? dims[1] : dims[2];
    if (channels < 5) return null;
    return { channelFirst, anchors: channelFirst ? dims[2] : dims[1], classes: channels - 4 };
}

export function resolveLayout(dims: readonly number[], numClasses?: number): Layout {
    const layout = matchLayout(dims, numClasses);
    if (!layout) {
        const suffix = numClasses ? ` for ${numClasses} classes` : '';
        throw new Error(`Unexpected output shape: ${dims.join('x')}${suffix}`);
    }
    return layout;
}

/**
 * Raw head → candidates sorted by score, best first.
 * Scores are taken as exported (no sigmoid); anchors with no positive score are skipped.
 */
export function parseYoloOutput(output: OutputTensor, numClasses?: number): Candidate[] {
    const { data, dims } = output;
    const { channelFirst, anchors: N, classes } = resolveLayout(dims, numClasses);
    const stride = 4 + classes;
    const at = channelFirst
        ? (i: number, ch: number) => data[ch * N + i]
        : (i: number, ch: number) => data[i * stride + ch];

    const results: Candidate[] = [];
    for (let i = 0; i < N; i++) {
        const w = at(i, 2);
        const h = at(i, 3);
        if (w <= 0 || h <= 0) continue;

        let bestScore = -Infinity, bestClass = -1;
        for (let c = 0; c < classes; c++) {
            const s = at(i, 4 + c);
            if (s > bestScore) { bestScore = s; bestClass = c; }
        }

        if (bestScore > 0) {
            results.push({ x: at(i, 0), y: at(i, 1), w, h, classId: bestClass, confidence: bestScore });
        }
    }

    results.sort((a, b) => b.confidence - a.confidence);
    return results;
}

function toCorners(c: Candidate): CornerBox {
    return { x1: c.x - c.w / 2, y1: c.y - c.h / 2, x2: c.x + c.w / 2, y2: c.y + c.h / 2 };
}

/** Greedy NMS, per class only: a box survives unless a stronger box of its class overlaps it at `iouThreshold` or more. */
export function suppressOverlaps(candidates: readonly Candidate[], iouThreshold: number): Candidate[] {
    let pending = [...candidates].sort((a, b) => b.confidence - a.confidence);
    const selected: Candidate[] = [];

    while (pending.length > 0) {
        const [current, ...rest] = pending;
        selected.push(current);
        const currentBox = toCorners(current);
        pending = rest.filter((box) =>
            box.classId !== current.classId || iou(currentBox, toCorners(box)) < iouThreshold
        );
    }

    return selected;
}

/** Threshold, suppress and convert to corner boxes clamped to the tensor bounds. */
export function decodeDetections(
    output: OutputTensor,
    opts: { confidence: number; iou: number; width: number; height: number; numClasses?: number }
): RawDetection[] {
    const parsed = parseYoloOutput(output, opts.numClasses);
    const kept = suppressOverlaps(parsed.filter((p) => p.confidence > opts.confidence), opts.iou);

    return kept.map((c) => {
        const box = toCorners(c);
        return {
            box: {
                x1: Math.max(0, box.x1),
                y1: Math.max(0, box.y1),
                x2: Math.min(opts.width, box.x2),
                y2: Math.min(opts.height, box.y2),
            },
            confidence: c.confidence,
            classId: c.classId,
        };
    });
}

/** Picks the output whose shape matches a detection head; falls back to the first one. */
export function pickDetectionOutput(
    results: Record<string, OutputTensor>,
    numClasses?: number
): OutputTensor {
    const names = Object.keys(results);
    if (names.length === 0) throw new Error('Model produced no outputs');

    const head = names.find((name) => matchLayout(results[name].dims, numClasses) !== null);
    return results[head ?? names[0]];
}
