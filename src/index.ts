import "reflect-metadata";
import type { Server } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { logger } from "./config/logger";
import { createContainer } from "./container";
import { createDataSource } from "./db/data-source";
import { QueueConfig } from "./queue/queue-config";
import { OpenAIService } from "./services/openai.service";
import { describeErrorChain } from "./utils/errors";
import { EvaluationWorker } from "./workers/evaluation-worker";

// Initialize database, queue and agents, then start the server
async function startServer(): Promise<void> {
    const config = loadConfig();

    const dataSource = createDataSource(config.database);
    await dataSource.initialize();
    logger.info({}, "Database connection established");

    const queueConfig = new QueueConfig(config.redisUrl, config.evaluationQueue, logger.child({ component: "queue" }));

    const container = await createContainer({
        config,
        dataSource,
        generator: OpenAIService.create(config.openai),
        evaluationQueue: queueConfig,
        logger
    });

    const worker = new EvaluationWorker(
        container.repositories.interviews,
        container.repositories.evaluations,
        container.coordinator,
        logger.child({ component: "evaluation-worker" })
    );
    queueConfig.startWorker(job => worker.processEvaluation(job));
    logger.info({ concurrency: config.evaluationQueue.concurrency }, "Queue system initialized and worker started");

    const app = createApp(container);
    const server = app.listen(config.port, () => {
        logger.info({ port: config.port, env: config.nodeEnv }, `Server running at http://localhost:${config.port}`);
    });

    let shuttingDown = false;
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        logger.info({ signal }, "Shutting down");

        try {
            await closeServer(server);
            await queueConfig.close();
            await dataSource.destroy();
            logger.info({}, "Shutdown complete");
            process.exit(0);
        } catch (error) {
            logger.error({ errors: describeErrorChain(error) }, "Shutdown failed");
            process.exit(1);
        }
    };

    process.once("SIGTERM", signal => void shutdown(signal));
    process.once("SIGINT", signal => void shutdown(signal));
}

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
    });
}

startServer().catch(error => {
    logger.error({ errors: describeErrorChain(error) }, "Failed to start server");
    process.exit(1);
});
