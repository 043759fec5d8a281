import { openSharp } from "../utils/open-sharp";
import type { RawImage } from "../types/image-source";
import type { NormalizedTensor, OriginalDimensions, TargetSize } from "../types/tensor.types";
import { DecodeError, PipelineError, PreprocessError, errorMessage } from "../errors/pipeline-errors";
import { type Logger, silentLogger } from "../utils/logger";

type Triplet = readonly [number, number, number];

// ImageNet statistics
export const IMAGENET_MEAN: Triplet = [0.485, 0.456, 0.406];
export const IMAGENET_STD: Triplet = [0.229, 0.224, 0.225];

export interface PreprocessorOptions {
    targetSize?: TargetSize;
    mean?: Triplet;
    std?: Triplet;
    logger?: Logger;
}

export interface PreprocessedImage {
    tensor: NormalizedTensor;
    original: OriginalDimensions;
}

/**
 * Bytes → CHW float tensor.
 *
 * The image is stretched to the target size (aspect ratio is NOT kept) with a
 * linear kernel, scaled to [0..1], then standardized per RGB channel.
 */
export class ImagePreprocessor {
    readonly targetSize: TargetSize;
    readonly mean: Triplet;
    readonly std: Triplet;
    private readonly logger: Logger;

    constructor(options: PreprocessorOptions = {}) {
        this.targetSize = options.targetSize ?? { width: 640, height: 640 };
        this.mean = options.mean ?? IMAGENET_MEAN;
        this.std = options.std ?? IMAGENET_STD;
        this.logger = options.logger ?? silentLogger;

        const { width, height } = this.targetSize;
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            throw new RangeError(`Target size must be positive integers, got ${width}x${height}`);
        }
        if (this.std.some((s) => s === 0)) {
            throw new RangeError('Normalization std must be non-zero');
        }
        this.logger.debug(`ImagePreprocessor initialized with target size: ${width}x${height}`);
    }

    async preprocess(src: Buffer | RawImage): Promise<PreprocessedImage> {
        const image: RawImage = Buffer.isBuffer(src) ? { data: src } : src;
        const original = await this.decode(image);

        try {
            const { pixels, channels } = await this.resizeToRgb(image);
            const tensor = this.toTensor(pixels, channels);
            this.logger.debug(
                `Preprocessing complete. Original size: ${original.width}x${original.height}, ` +
                `target size: ${this.targetSize.width}x${this.targetSize.height}`
            );
            return { tensor, original };
        } catch (err) {
            if (err instanceof PipelineError) throw err;
            this.logger.error('Error in preprocessing pipeline', err);
            throw new PreprocessError(`Image preprocessing failed: ${errorMessage(err)}`, err);
        }
    }

    /** Reads the header; size is captured here, before any resize, as displayed after EXIF orientation. */
    private async decode(image: RawImage): Promise<OriginalDimensions> {
        const sh = openSharp(image);
        let width = 0, height = 0;
        try {
            const meta = await sh.metadata();
            // orientations 5..8 turn the image by 90 degrees
            const turned = (meta.orientation ?? 1) >= 5;
            width = (turned ? meta.height : meta.width) ?? 0;
            height = (turned ? meta.width : meta.height) ?? 0;
        } catch (err) {
            const what = image.filename ? ` ${image.filename}` : '';
            throw new DecodeError(`Failed to decode image${what}: ${errorMessage(err)}`, err);
        }
        if (width === 0 || height === 0) {
            throw new DecodeError(`Invalid image dimensions: ${width}x${height}`);
        }
        return { height, width };
    }

    private async resizeToRgb(image: RawImage): Promise<{ pixels: Buffer; channels: number }> {
        const { width, height } = this.targetSize;
        const { data, info } = await openSharp(image)
            .rotate()
            .toColorspace('srgb')
            .removeAlpha()
            .resize(width, height, { fit: 'fill', kernel: 'linear' })
            .raw()
            .toBuffer({ resolveWithObject: true });

        if (info.width !== width || info.height !== height) {
            throw new PreprocessError(`Resize produced ${info.width}x${info.height}, expected ${width}x${height}`);
        }
        return { pixels: data, channels: info.channels };
    }

    /** HWC bytes → CHW floats, `(v / 255 - mean[c]) / std[c]`. Greyscale is replicated to RGB. */
    private toTensor(pixels: Buffer, channels: number): NormalizedTensor {
        const { width, height } = this.targetSize;
        const plane = width * height;
        const data = new Float32Array(3 * plane);

        for (let c = 0; c < 3; c++) {
            const src = channels >= 3 ? c : 0;
            const mean = this.mean[c];
            const std = this.std[c];
            const offset = c * plane;
            for (let i = 0; i < plane; i++) {
                data[offset + i] = (pixels[i * channels + src] / 255 - mean) / std;
            }
        }

        return { data, dims: [3, height, width] };
    }
}
