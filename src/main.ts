import "dotenv/config";
import { loadConfig } from "./config/app-config";
import { DetectionPipeline } from "./analysis/detection-pipeline";
import { createApp } from "./server/app";
import { createLogger } from "./utils/logger";

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger('scan-detector', { debug: config.server.debug });

    logger.info('Initializing detection pipeline...');
    const pipeline = await DetectionPipeline.create(config, logger);
    logger.info(`Pipeline ready (${pipeline.mode} mode)`);

    const app = createApp(pipeline, config, logger.child('http'));
    const { host, port } = config.server;
    app.listen(port, host, () => {
        logger.info(`Listening on http://${host}:${port}`);
        logger.info('Endpoints: GET /health, GET /status, POST /predict');
    });
}

main().catch((err: unknown) => {
    console.error('Failed to start service:', err);
    process.exit(1);
});
