/** Uploaded bytes plus whatever the transport told us about them. */
export type RawImage = { data: Buffer; filename?: string; mime?: string };

export type ImageSource =
    | string                  // path
    | Buffer                  // raw bytes
    | RawImage;
