/**
 * Prediction-Market Reversal Scanner
 * Entry point: JSON API plus the in-process snapshot collector
 */

import { config, validateConfig } from './config.js';
import { createContext } from './context.js';
import { describeError } from './detection/errors.js';
import { logger } from './logger.js';
import { ScanController } from './web/scan-controller.js';
import { createApp, startServer, stopServer } from './web/server.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', {
        reason: describeError(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', {
        error: error.message,
        stack: error.stack,
    });
    process.exit(1);
});

async function main(): Promise<void> {
    validateConfig();

    const context = await createContext();
    const controller = new ScanController({
        blackSwans: context.blackSwans,
        movers: context.movers,
        analytics: context.analytics,
        collector: context.collector,
        store: context.store,
        cache: context.cache,
        defaults: {
            source: 'api',
            daysBack: config.scanDaysBack,
            limit: config.scanResultLimit,
        },
    });

    const server = await startServer(createApp(controller), config.dashboardPort);

    const runCollection = async (): Promise<void> => {
        try {
            controller.recordCollection(await context.collector.runCollection());
        } catch (error) {
            logger.error('[Collector] Collection cycle failed', { error: describeError(error) });
        }
    };

    let collectionTimer: NodeJS.Timeout | null = null;
    if (config.collectionIntervalMinutes > 0) {
        void runCollection();
        collectionTimer = setInterval(() => {
            void runCollection();
        }, config.collectionIntervalMinutes * 60 * 1000);
        logger.info(`[Collector] Collecting every ${config.collectionIntervalMinutes} minutes`);
    }

    const shutdown = async (signal: string): Promise<void> => {
        logger.info(`Received ${signal}, shutting down...`);
        if (collectionTimer) clearInterval(collectionTimer);
        try {
            await stopServer(server);
            await context.store.flush();
            process.exit(0);
        } catch (error) {
            logger.error('Shutdown failed', { error: describeError(error) });
            process.exit(1);
        }
    };

    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });

    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });
}

main().catch(error => {
    logger.error('Fatal error', {
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
});
