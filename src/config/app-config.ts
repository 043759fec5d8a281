import { z } from "zod";
import { ConfigError } from "../errors/pipeline-errors";

export const SERVICE_NAME = "Scan Finding Detection Service";
export const SERVICE_VERSION = "1.0.0";

export type AnnotationSpace = 'tensor' | 'original';

// `KEY=` in a .env file counts as unset
const unsetIfBlank = <T extends z.ZodTypeAny>(schema: T) =>
    z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema);

const flag = (fallback: 'true' | 'false') =>
    z.string()
        .trim()
        .toLowerCase()
        .pipe(z.enum(['true', 'false', '1', '0']))
        .default(fallback)
        .transform((v) => v === 'true' || v === '1');

const threshold = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z.object({
    MODEL_PATH: unsetIfBlank(z.string().min(1).default('models/detector.onnx')),
    MODEL_CLASSES: unsetIfBlank(z.string().optional()),
    CONFIDENCE_THRESHOLD: unsetIfBlank(threshold(0.5)),
    IOU_THRESHOLD: unsetIfBlank(threshold(0.45)),
    INPUT_SIZE: unsetIfBlank(z.coerce.number().int().positive().default(640)),
    MAX_IMAGE_SIZE: unsetIfBlank(z.coerce.number().int().positive().default(10 * 1024 * 1024)),
    HOST: unsetIfBlank(z.string().min(1).default('0.0.0.0')),
    PORT: unsetIfBlank(z.coerce.number().int().min(1).max(65535).default(5000)),
    DEBUG: unsetIfBlank(flag('false')),
    CORS_ORIGINS: unsetIfBlank(z.string().min(1).default('*')),
    ANNOTATION_SPACE: unsetIfBlank(z.enum(['tensor', 'original']).default('tensor')),
    SIMULATION_SEED: unsetIfBlank(z.coerce.number().int().optional()),
    SIMULATION_MIN_LATENCY_MS: unsetIfBlank(z.coerce.number().min(0).default(300)),
});

export interface AppConfig {
    server: {
        host: string;
        port: number;
        corsOrigins: string | string[];
        maxImageSize: number;       // bytes
        debug: boolean;
    };
    model: {
        path: string;
        classNames: string[];       // empty: read classes.txt or infer from output shape
        confidenceThreshold: number;
        iouThreshold: number;
        inputSize: number;
    };
    simulation: {
        seed?: number;
        minLatencyMs: number;
    };
    annotationSpace: AnnotationSpace;
}

function splitList(value: string | undefined): string[] {
    return (value ?? '').split(',').map((s) => s.trim()).filter(Boolean);
}

/**
 * Reads settings from the environment (already populated by dotenv at startup).
 * Every invalid key is reported at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    const e = parsed.data;
    const origins = splitList(e.CORS_ORIGINS);

    return {
        server: {
            host: e.HOST,
            port: e.PORT,
            corsOrigins: origins.length === 1 ? origins[0] : origins,
            maxImageSize: e.MAX_IMAGE_SIZE,
            debug: e.DEBUG,
        },
        model: {
            path: e.MODEL_PATH,
            classNames: splitList(e.MODEL_CLASSES),
            confidenceThreshold: e.CONFIDENCE_THRESHOLD,
            iouThreshold: e.IOU_THRESHOLD,
            inputSize: e.INPUT_SIZE,
        },
        simulation: {
            seed: e.SIMULATION_SEED,
            minLatencyMs: e.SIMULATION_MIN_LATENCY_MS,
        },
        annotationSpace: e.ANNOTATION_SPACE,
    };
}
