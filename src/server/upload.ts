import path from "node:path";
import type { Request } from "express";
import type { RawImage } from "../types/image-source";
import { errorMessage } from "../errors/pipeline-errors";

export const ALLOWED_EXTENSIONS = ['jpg', 'jpeg', 'png', 'bmp', 'gif', 'tiff', 'tif'] as const;

/** Rejected upload; `status` is the HTTP status the caller should answer with. */
export class UploadError extends Error {
    readonly name = "UploadError";
    constructor(message: string, readonly status: 400 | 413) {
        super(message);
    }
}

export function hasAllowedExtension(filename: string): boolean {
    const ext = path.extname(filename).slice(1).toLowerCase();
    return ext !== '' && ALLOWED_EXTENSIONS.some((allowed) => allowed === ext);
}

function checkSize(size: number, maxSize: number): void {
    if (size > maxSize) {
        throw new UploadError(`File size exceeds maximum allowed size (${maxSize} bytes).`, 413);
    }
    if (size === 0) {
        throw new UploadError('Empty file received.', 400);
    }
}

/**
 * Pulls the uploaded image out of a request whose body `express.raw` has
 * already buffered: either multipart field `image` or a bare `image/*` body.
 */
export async function readUploadedImage(req: Request, maxSize: number): Promise<RawImage> {
    const contentType = req.headers['content-type'] ?? '';
    const body: unknown = req.body;
    const bytes = Buffer.isBuffer(body) ? body : Buffer.alloc(0);

    if (contentType.startsWith('image/')) {
        const header = req.headers['x-filename'];
        const filename = typeof header === 'string' && header !== '' ? header : undefined;
        if (filename !== undefined && !hasAllowedExtension(filename)) {
            throw new UploadError(`Invalid file type. Allowed: ${ALLOWED_EXTENSIONS.join(', ')}`, 400);
        }
        checkSize(bytes.length, maxSize);
        return { data: bytes, filename, mime: contentType };
    }

    if (!contentType.startsWith('multipart/form-data') || bytes.length === 0) {
        throw new UploadError("No image file provided. Use key 'image' in form-data.", 400);
    }

    let form: FormData;
    try {
        form = await new Response(bytes, { headers: { 'content-type': contentType } }).formData();
    } catch (err) {
        throw new UploadError(`Malformed multipart body: ${errorMessage(err)}`, 400);
    }

    const entry = form.get('image');
    if (entry === null || typeof entry === 'string') {
        throw new UploadError("No image file provided. Use key 'image' in form-data.", 400);
    }
    if (entry.name === '') {
        throw new UploadError('No image file selected.', 400);
    }
    if (!hasAllowedExtension(entry.name)) {
        throw new UploadError(`Invalid file type. Allowed: ${ALLOWED_EXTENSIONS.join(', ')}`, 400);
    }
    checkSize(entry.size, maxSize);

    return {
        data: Buffer.from(await entry.arrayBuffer()),
        filename: entry.name,
        mime: entry.type || undefined,
    };
}
