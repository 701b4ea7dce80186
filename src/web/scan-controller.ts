/**
 * Scan Controller
 * JSON endpoints over the black swan, movers and analytics services and the
 * snapshot collector
 */

import { Router, Request, Response } from 'express';
import {
    DEFAULT_MARKET_LIST_LIMIT,
    isMarketSort,
    type ActiveMarket,
    type AnalyticsService,
    type MarketSort,
    type OverviewStats,
} from '../detection/analytics-service.js';
import { isDataSourceKind } from '../detection/data-source.js';
import type { BlackSwanResponse, BlackSwanService } from '../detection/black-swan-service.js';
import { CancellationError, ConfigurationError, describeError } from '../detection/errors.js';
import type { MoveService, RecentMover } from '../detection/move-service.js';
import type { ResultCache, ResultCacheStats } from '../detection/result-cache.js';
import type { DataSourceKind, Market, ScanReport } from '../detection/types.js';
import type { CollectionStats, SnapshotCollector } from '../ingestion/snapshot-collector.js';
import type { SnapshotStore } from '../storage/snapshot-store.js';
import { logger } from '../logger.js';

export class BadRequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BadRequestError';
    }
}

export class NotFoundError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

type QueryValue = Request['query'][string];

export interface ScanControllerDeps {
    blackSwans: BlackSwanService;
    movers: MoveService;
    analytics: AnalyticsService;
    collector: SnapshotCollector;
    store: SnapshotStore;
    cache: ResultCache<ScanReport>;
    defaults: {
        source: DataSourceKind;
        daysBack: number;
        limit: number;
    };
    now?: () => Date;
}

export interface StatusReport {
    online: boolean;
    uptime: number;
    trackedMarkets: number;
    collectorRunning: boolean;
    lastCollection: CollectionStats | null;
    lastCollectionAt: string | null;
    cache: ResultCacheStats;
}

export interface MarketSnapshots {
    market: Market;
    snapshots: Array<{ timestamp: string; probability: number }>;
}

/**
 * A positive number from a query string value, or the default when absent
 */
export function parsePositiveNumber(value: QueryValue, name: string, defaultValue: number, integer: boolean = false): number {
    if (value === undefined || value === '') return defaultValue;
    if (typeof value !== 'string') {
        throw new BadRequestError(`${name} must be a single value`);
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0 || (integer && !Number.isInteger(parsed))) {
        throw new BadRequestError(`${name} must be a positive ${integer ? 'integer' : 'number'}`);
    }
    return parsed;
}

export function parseSource(value: QueryValue, defaultValue: DataSourceKind): DataSourceKind {
    if (value === undefined || value === '') return defaultValue;
    if (!isDataSourceKind(value)) {
        throw new BadRequestError(`source must be 'api' or 'local'`);
    }
    return value;
}

export function parseMarketSort(value: QueryValue, defaultValue: MarketSort): MarketSort {
    if (value === undefined || value === '') return defaultValue;
    if (!isMarketSort(value)) {
        throw new BadRequestError('sort must be one of volume, liquidity, probability, endDate');
    }
    return value;
}

export class ScanController {
    private readonly deps: ScanControllerDeps;
    private readonly now: () => Date;
    private lastCollection: CollectionStats | null = null;
    private lastCollectionAt: Date | null = null;

    constructor(deps: ScanControllerDeps) {
        this.deps = deps;
        this.now = deps.now ?? (() => new Date());
    }

    async getStatus(): Promise<StatusReport> {
        const markets = await this.deps.store.listMarkets();
        return {
            online: true,
            uptime: process.uptime(),
            trackedMarkets: markets.length,
            collectorRunning: this.deps.collector.isRunning(),
            lastCollection: this.lastCollection,
            lastCollectionAt: this.lastCollectionAt?.toISOString() ?? null,
            cache: this.deps.cache.getStats(),
        };
    }

    async getBlackSwans(query: Request['query'], signal?: AbortSignal): Promise<BlackSwanResponse> {
        const { defaults } = this.deps;
        return this.deps.blackSwans.findBlackSwans({
            source: parseSource(query.source, defaults.source),
            daysBack: parsePositiveNumber(query.daysBack, 'daysBack', defaults.daysBack),
            limit: parsePositiveNumber(query.limit, 'limit', defaults.limit, true),
            signal,
        });
    }

    async getMovers(query: Request['query']): Promise<RecentMover[]> {
        const limit = parsePositiveNumber(query.limit, 'limit', this.deps.defaults.limit, true);
        return this.deps.movers.recentMovers(this.now(), limit);
    }

    async getOverview(signal?: AbortSignal): Promise<OverviewStats> {
        return this.deps.analytics.getOverview(signal);
    }

    async getMarkets(query: Request['query']): Promise<ActiveMarket[]> {
        return this.deps.analytics.listActiveMarkets(
            parseMarketSort(query.sort, 'liquidity'),
            parsePositiveNumber(query.limit, 'limit', DEFAULT_MARKET_LIST_LIMIT, true)
        );
    }

    async getMarketSnapshots(marketId: string): Promise<MarketSnapshots> {
        const market = await this.deps.store.getMarket(marketId);
        if (!market) {
            throw new NotFoundError(`Market ${marketId} is not tracked`);
        }
        const snapshots = await this.deps.store.snapshotsFor(marketId);
        return {
            market,
            snapshots: snapshots.map(s => ({ timestamp: s.timestamp.toISOString(), probability: s.probability })),
        };
    }

    async collect(): Promise<CollectionStats> {
        const stats = await this.deps.collector.runCollection();
        this.recordCollection(stats);
        return stats;
    }

    recordCollection(stats: CollectionStats): void {
        this.lastCollection = stats;
        this.lastCollectionAt = this.now();
    }
}

/**
 * HTTP status for an error raised while handling a request
 */
export function statusForError(error: unknown): number {
    if (error instanceof BadRequestError || error instanceof ConfigurationError) return 400;
    if (error instanceof NotFoundError) return 404;
    if (error instanceof CancellationError) return 499;
    return 500;
}

function respond<T>(res: Response, work: () => Promise<T>): Promise<void> {
    return work().then(
        body => {
            res.json(body);
        },
        (error: unknown) => {
            const status = statusForError(error);
            if (status >= 500) {
                logger.error('[API] Request failed', { path: res.req.path, error: describeError(error) });
            }
            if (res.headersSent || res.writableEnded) return;
            res.status(status).json({ error: error instanceof Error ? error.message : String(error) });
        }
    );
}

/**
 * Aborts when the client goes away before a response was written
 */
function abortOnDisconnect(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableEnded) controller.abort();
    });
    return controller.signal;
}

export function createApiRouter(controller: ScanController): Router {
    const router = Router();

    // GET /api/status - Process and cache status
    router.get('/status', (req: Request, res: Response) => {
        void respond(res, () => controller.getStatus());
    });

    // GET /api/black-swans?source=api|local&daysBack=60&limit=50
    router.get('/black-swans', (req: Request, res: Response) => {
        const signal = abortOnDisconnect(res);
        void respond(res, () => controller.getBlackSwans(req.query, signal));
    });

    // GET /api/overview - Counters and calibration by probability bucket
    router.get('/overview', (req: Request, res: Response) => {
        const signal = abortOnDisconnect(res);
        void respond(res, () => controller.getOverview(signal));
    });

    // GET /api/markets?sort=volume|liquidity|probability|endDate&limit=100
    router.get('/markets', (req: Request, res: Response) => {
        void respond(res, () => controller.getMarkets(req.query));
    });

    // GET /api/movers?limit=20 - Largest recent moves over local snapshots
    router.get('/movers', (req: Request, res: Response) => {
        void respond(res, () => controller.getMovers(req.query));
    });

    // GET /api/markets/:id/snapshots
    router.get('/markets/:id/snapshots', (req: Request, res: Response) => {
        void respond(res, () => controller.getMarketSnapshots(req.params.id));
    });

    // POST /api/collect - Run one collection cycle now
    router.post('/collect', (req: Request, res: Response) => {
        void respond(res, () => controller.collect());
    });

    return router;
}
