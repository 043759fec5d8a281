export type FaultKind = 'client' | 'system';

/**
 * Base for everything the detection pipeline throws on purpose.
 * `client` faults mean the caller sent something unusable; `system` faults are ours.
 */
export class PipelineError extends Error {
    readonly name: string = "PipelineError";

    constructor(message: string, readonly fault: FaultKind, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
    }
}

/** Bytes are empty or not a raster image the decoder understands. */
export class DecodeError extends PipelineError {
    readonly name = "DecodeError";
    constructor(message: string, cause?: unknown) {
        super(message, 'client', cause);
    }
}

/** The image decoded, but colour conversion, resize or normalization failed. */
export class PreprocessError extends PipelineError {
    readonly name = "PreprocessError";
    constructor(message: string, cause?: unknown) {
        super(message, 'client', cause);
    }
}

export class InferenceFault extends PipelineError {
    readonly name = "InferenceFault";
    constructor(message: string, cause?: unknown) {
        super(message, 'system', cause);
    }
}

/** Never leaves the annotator; it only shows up in logs. */
export class AnnotationFailure extends PipelineError {
    readonly name = "AnnotationFailure";
    constructor(message: string, cause?: unknown) {
        super(message, 'system', cause);
    }
}

export class ConfigError extends Error {
    readonly name = "ConfigError";
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
    }
}

export function isClientFault(err: unknown): err is PipelineError {
    return err instanceof PipelineError && err.fault === 'client';
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
