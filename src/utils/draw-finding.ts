import sharp from "sharp";
import { AnnotationFailure, errorMessage } from "../errors/pipeline-errors";
import { type Logger, silentLogger } from "./logger";

export interface AnnotatedImage {
    mimeType: 'image/png';
    data: Buffer;
    dataUri: string;
}

export interface AnnotatorOptions {
    label?: string;
    color?: string;
    strokeWidth?: number;
    logger?: Logger;
}

const escape = (s: string) => s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

/**
 * Draws the finding box and its label onto the original image and re-encodes it as PNG.
 * The box is drawn where it says, in whatever space the caller computed it.
 */
export class Annotator {
    private readonly label: string;
    private readonly color: string;
    private readonly strokeWidth: number;
    private readonly logger: Logger;

    constructor(options: AnnotatorOptions = {}) {
        this.label = options.label ?? 'FINDING';
        this.color = options.color ?? '#ff0000';
        this.strokeWidth = options.strokeWidth ?? 4;
        this.logger = options.logger ?? silentLogger;
    }

    /** `label` overrides the configured one for this image only. */
    async annotate(
        original: Buffer,
        box: readonly number[],
        found: boolean,
        label: string = this.label,
    ): Promise<AnnotatedImage | null> {
        if (!found || box.length < 4) return null;

        try {
            const data = await this.draw(original, box, label);
            this.logger.debug(`Annotated image encoded (${data.length} bytes)`);
            return {
                mimeType: 'image/png',
                data,
                dataUri: `data:image/png;base64,${data.toString('base64')}`,
            };
        } catch (err) {
            const failure = new AnnotationFailure(`Error drawing finding box: ${errorMessage(err)}`, err);
            this.logger.error(failure.message, failure);
            return null;
        }
    }

    private async draw(original: Buffer, box: readonly number[], label: string): Promise<Buffer> {
        const meta = await sharp(original).metadata();
        const W = meta.width ?? 0;
        const H = meta.height ?? 0;
        if (!W || !H) throw new Error('Cannot determine image size');

        const [x, y] = [Math.trunc(box[0]), Math.trunc(box[1])];
        const w = Math.max(0, Math.trunc(box[2]));
        const h = Math.max(0, Math.trunc(box[3]));
        this.logger.debug(`Drawing box at x=${x}, y=${y}, w=${w}, h=${h}`);

        const fontSize = Math.max(14, Math.floor(Math.min(W, H) * 0.025));
        const padY = Math.max(4, Math.floor(fontSize * 0.35));
        // baseline never sits above fontSize, so the glyphs stay inside the image
        const labelY = Math.max(fontSize, y - padY - Math.max(2, this.strokeWidth));

        const svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${W}" height="${H}">
      <rect x="${x}" y="${y}" width="${w}" height="${h}" fill="none" stroke="${this.color}" stroke-width="${this.strokeWidth}"/>
      <text x="${Math.max(0, x)}" y="${labelY}" font-family="sans-serif" font-size="${fontSize}" font-weight="600" fill="${this.color}">${escape(label)}</text>
    </svg>`;

        return await sharp(original)
            .composite([{ input: Buffer.from(svg), left: 0, top: 0 }])
            .png()
            .toBuffer();
    }
}
