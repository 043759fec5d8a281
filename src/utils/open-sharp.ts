import sharp, { type Sharp } from 'sharp';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import type { ImageSource, RawImage } from '../types/image-source';
import { DecodeError, errorMessage } from '../errors/pipeline-errors';

/** Resolves any accepted source to bytes. Paths are read once here and never again. */
export async function loadRawImage(src: ImageSource): Promise<RawImage> {
    if (typeof src === 'string') {
        try {
            return { data: await fs.readFile(src), filename: path.basename(src) };
        } catch (err) {
            throw new DecodeError(`Cannot read image ${src}: ${errorMessage(err)}`, err);
        }
    }
    if (Buffer.isBuffer(src)) {
        return { data: src };
    }
    return src;
}

export function openSharp(image: RawImage): Sharp {
    if (image.data.length === 0) {
        throw new DecodeError('Empty image data');
    }
    return sharp(image.data);
}
