import { createApp } from "./app";
import { config } from "./config";
import { BRAND_NAME } from "./config/brand";
import { logger } from "./utils/logger";

const app = createApp();

const server = app.listen(config.port, () => {
    logger.info(
        `${BRAND_NAME} listening on port ${config.port} (${config.nodeEnv})`
    );
});

function shutdown(signal: NodeJS.Signals) {
    logger.info(`Received ${signal}, closing HTTP server`);
    server.close((error) => {
        if (error) {
            logger.error("HTTP server close failed:", error);
            process.exit(1);
        }
        process.exit(0);
    });
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
