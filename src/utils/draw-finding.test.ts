import { describe, it, expect, vi } from "vitest";
import sharp from "sharp";
import { Annotator } from "./draw-finding";
import { createLogger } from "./logger";

const grey = () =>
    sharp({ create: { width: 100, height: 100, channels: 3, background: { r: 128, g: 128, b: 128 } } })
        .png()
        .toBuffer();

async function pixelAt(png: Buffer, x: number, y: number): Promise<number[]> {
    const { data, info } = await sharp(png).removeAlpha().raw().toBuffer({ resolveWithObject: true });
    const i = (y * info.width + x) * info.channels;
    return [data[i], data[i + 1], data[i + 2]];
}

describe("Annotator", () => {
    it("draws the box outline in red and leaves the inside untouched", async () => {
        const annotated = await new Annotator().annotate(await grey(), [10, 10, 40, 40], true);

        expect(annotated).not.toBeNull();
        if (!annotated) return;
        expect(annotated.mimeType).toBe("image/png");
        expect(annotated.dataUri.startsWith("data:image/png;base64,")).toBe(true);
        expect(await pixelAt(annotated.data, 10, 30)).toEqual([255, 0, 0]);
        expect(await pixelAt(annotated.data, 30, 30)).toEqual([128, 128, 128]);
    });

    it("keeps the original image size", async () => {
        const annotated = await new Annotator().annotate(await grey(), [60, 60, 80, 80], true);
        if (!annotated) throw new Error("expected an annotated image");

        const meta = await sharp(annotated.data).metadata();
        expect([meta.width, meta.height, meta.format]).toEqual([100, 100, "png"]);
    });

    it("returns null when nothing was found or the box is short", async () => {
        const annotator = new Annotator();
        const bytes = await grey();

        expect(await annotator.annotate(bytes, [], false)).toBeNull();
        expect(await annotator.annotate(bytes, [1, 2], true)).toBeNull();
        expect(await annotator.annotate(bytes, [10, 10, 40, 40], false)).toBeNull();
    });

    it("logs and returns null for bytes that are not an image", async () => {
        const sink = vi.fn();
        const annotator = new Annotator({ logger: createLogger("annotator", { sink }) });

        expect(await annotator.annotate(Buffer.from("not an image"), [0, 0, 5, 5], true)).toBeNull();
        expect(sink).toHaveBeenCalledTimes(1);
        expect(sink.mock.calls[0][0]).toBe("error");
        expect(sink.mock.calls[0][1]).toContain("Error drawing finding box");
    });
});
