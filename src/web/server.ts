import express, { type Express } from 'express';
import compression from 'compression';
import cors from 'cors';
import { createServer, type Server } from 'http';
import { logger } from '../logger.js';
import { ScanController, createApiRouter } from './scan-controller.js';

export function createApp(controller: ScanController): Express {
    const app = express();

    app.use(compression());
    app.use(cors());
    app.use(express.json());

    app.use('/api', createApiRouter(controller));

    app.use((req, res) => {
        res.status(404).json({ error: `No route for ${req.method} ${req.path}` });
    });

    return app;
}

export function startServer(app: Express, port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = createServer(app);
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            logger.info(`🌐 Scanner API running on port ${port}`);
            logger.info(`📊 Black swans at http://localhost:${port}/api/black-swans`);
            resolve(server);
        });
    });
}

export function stopServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(error => {
            if (error) {
                reject(error);
                return;
            }
            logger.info('Scanner API stopped');
            resolve();
        });
    });
}
