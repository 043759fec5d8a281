import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { type AppConfig, SERVICE_NAME, SERVICE_VERSION } from "../config/app-config";
import type { DetectionPipeline, PipelineRun } from "../analysis/detection-pipeline";
import { serializeResult } from "../analysis/result-serializer";
import { errorMessage, isClientFault } from "../errors/pipeline-errors";
import type { RawImage } from "../types/image-source";
import { roundTo } from "../utils/box-geometry";
import { type Logger, silentLogger } from "../utils/logger";
import { UploadError, readUploadedImage } from "./upload";

// room for multipart boundaries and part headers on top of the image itself
const MULTIPART_OVERHEAD = 64 * 1024;

const fail = (res: Response, status: number, error: string, extra: Record<string, unknown> = {}) =>
    res.status(status).json({ error, status: 'error', ...extra });

function hasStatus(err: unknown): err is { status: number; type?: unknown } {
    return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

export function createApp(pipeline: DetectionPipeline, config: AppConfig, logger: Logger = silentLogger): Express {
    const app = express();
    const { debug, maxImageSize, corsOrigins } = config.server;

    app.use(cors({ origin: corsOrigins }));

    app.use((req, res, next) => {
        const started = performance.now();
        res.on('finish', () => {
            logger.debug(
                `${req.method} ${req.path} - Status: ${res.statusCode} - Time: ${(performance.now() - started).toFixed(2)}ms`
            );
        });
        next();
    });

    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            modelLoaded: pipeline.mode === 'detector',
            mode: pipeline.mode,
        });
    });

    app.get('/status', (_req, res) => {
        const description = pipeline.detector.describe();
        res.json({
            system: SERVICE_NAME,
            version: SERVICE_VERSION,
            mode: description.mode,
            model: description.model ?? null,
            modelPath: config.model.path,
            confidenceThreshold: config.model.confidenceThreshold,
            iouThreshold: config.model.iouThreshold,
            inputSize: config.model.inputSize,
            annotationSpace: config.annotationSpace,
            timestamp: new Date().toISOString(),
        });
    });

    app.post(
        '/predict',
        express.raw({
            type: ['multipart/form-data', 'image/*'],
            limit: maxImageSize + MULTIPART_OVERHEAD,
        }),
        (req, res, next) => {
            predict(req, res).catch(next);
        },
    );

    app.all(['/predict', '/health', '/status'], (req, res) => {
        logger.warn(`405 Method Not Allowed: ${req.method} ${req.path}`);
        fail(res, 405, 'Method not allowed');
    });

    async function predict(req: Request, res: Response): Promise<void> {
        let image: RawImage;
        try {
            image = await readUploadedImage(req, maxImageSize);
        } catch (err) {
            if (err instanceof UploadError) {
                logger.warn(`Rejected upload: ${err.message}`);
                fail(res, err.status, err.message);
                return;
            }
            throw err;
        }
        logger.info(`Processing image: ${image.filename ?? '<raw body>'} (${image.data.length} bytes)`);

        let run: PipelineRun;
        try {
            run = await pipeline.run(image);
        } catch (err) {
            if (isClientFault(err)) {
                logger.warn(`Unusable image: ${err.message}`);
                fail(res, 400, err.message);
                return;
            }
            throw err;
        }

        const serialized = serializeResult(run.result);
        if (serialized.error !== undefined) {
            logger.error(`Inference error: ${serialized.error}`);
            fail(res, 500, `Model inference failed: ${serialized.error}`);
            return;
        }

        res.json({
            status: 'success',
            ...serialized,
            simulated: run.result.source === 'simulated',
            processingTimeMs: roundTo(run.elapsedMs, 2),
            annotatedImage: run.annotatedImage?.dataUri ?? null,
            timestamp: new Date().toISOString(),
        });
    }

    app.use((req, res) => {
        logger.warn(`404 Not Found: ${req.path}`);
        fail(res, 404, 'Endpoint not found');
    });

    // four parameters mark this as the error handler
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (hasStatus(err) && err.status === 413) {
            logger.warn('413 Payload Too Large');
            fail(res, 413, 'Request payload too large');
            return;
        }
        if (hasStatus(err) && err.status >= 400 && err.status < 500) {
            logger.warn(`${err.status} rejected request body: ${errorMessage(err)}`);
            fail(res, err.status, errorMessage(err));
            return;
        }
        logger.error(`Unexpected error in ${req.method} ${req.path}: ${errorMessage(err)}`, err);
        fail(res, 500, 'Internal server error. Please check logs.', {
            details: debug ? errorMessage(err) : 'Check server logs for details',
        });
    });

    return app;
}
