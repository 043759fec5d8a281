export type TensorDims = readonly [channels: number, height: number, width: number];

/** Channel-first float tensor, standardized per channel. Not mutated after creation. */
export interface NormalizedTensor {
    readonly data: Float32Array;
    readonly dims: TensorDims;
}

/** Source image size captured before any resize. */
export interface OriginalDimensions {
    readonly height: number;
    readonly width: number;
}

export interface TargetSize {
    readonly width: number;
    readonly height: number;
}
