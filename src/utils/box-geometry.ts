import type { BoxXYWH, CornerBox } from "../types/detection.types";
import type { OriginalDimensions, TargetSize } from "../types/tensor.types";

export function roundTo(value: number, digits: number): number {
    const f = 10 ** digits;
    return Math.round(value * f) / f;
}

/** Corner box → integer [x, y, w, h]; fractions are truncated, sizes never negative. */
export function cornersToXywh(box: CornerBox): BoxXYWH {
    return [
        Math.trunc(box.x1),
        Math.trunc(box.y1),
        Math.max(0, Math.trunc(box.x2 - box.x1)),
        Math.max(0, Math.trunc(box.y2 - box.y1)),
    ];
}

export function area(box: CornerBox) {
    return Math.max(0, box.x2 - box.x1) * Math.max(0, box.y2 - box.y1);
}

export function iou(a: CornerBox, b: CornerBox) {
    const inter = area({
        x1: Math.max(a.x1, b.x1),
        y1: Math.max(a.y1, b.y1),
        x2: Math.min(a.x2, b.x2),
        y2: Math.min(a.y2, b.y2),
    });
    const union = area(a) + area(b) - inter;
    return union > 0 ? inter / union : 0;
}

/**
 * Scales a tensor-space box to original-image pixels (independent x/y factors,
 * since preprocessing stretches without keeping the aspect ratio).
 */
export function denormalizeBox(box: BoxXYWH, original: OriginalDimensions, target: TargetSize): BoxXYWH {
    const sx = original.width / target.width;
    const sy = original.height / target.height;
    const [x, y, w, h] = box;
    return [Math.trunc(x * sx), Math.trunc(y * sy), Math.trunc(w * sx), Math.trunc(h * sy)];
}
