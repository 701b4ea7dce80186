/**
 * Large-Move Detector
 * Probability swings of at least `thresholdPoints` between any two snapshots
 * of a market taken within `windowHours` of each other.
 */

import type { MoveEvent, SnapshotSeries } from './types.js';

const HOUR_MS = 60 * 60 * 1000;

export interface LargeMoveOptions {
    windowHours: number;
    thresholdPoints: number;  // percentage points, e.g. 15
}

export interface MarketMover {
    marketId: string;
    largest: MoveEvent;
    eventCount: number;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

export function detectLargeMoves(series: readonly SnapshotSeries[], options: LargeMoveOptions): MoveEvent[] {
    const windowMs = options.windowHours * HOUR_MS;
    const events: MoveEvent[] = [];

    for (const { marketId, snapshots } of series) {
        if (snapshots.length < 2) continue;

        const sorted = [...snapshots].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

        for (let i = 0; i < sorted.length - 1; i++) {
            const start = sorted[i];
            for (let j = i + 1; j < sorted.length; j++) {
                const end = sorted[j];
                // Sorted, so every later j is further away too
                if (end.timestamp.getTime() - start.timestamp.getTime() > windowMs) break;

                const deltaPoints = round2(Math.abs(end.probability - start.probability) * 100);
                if (deltaPoints < options.thresholdPoints) continue;

                events.push({
                    marketId,
                    startTimestamp: start.timestamp,
                    endTimestamp: end.timestamp,
                    probabilityStart: start.probability,
                    probabilityEnd: end.probability,
                    deltaPoints,
                    direction: end.probability >= start.probability ? 'up' : 'down',
                });
            }
        }
    }

    return events;
}

/**
 * Largest move per market, biggest first
 */
export function summarizeMovers(events: readonly MoveEvent[]): MarketMover[] {
    const byMarket = new Map<string, MarketMover>();

    for (const event of events) {
        const current = byMarket.get(event.marketId);
        if (!current) {
            byMarket.set(event.marketId, { marketId: event.marketId, largest: event, eventCount: 1 });
            continue;
        }
        current.eventCount++;
        if (event.deltaPoints > current.largest.deltaPoints) {
            current.largest = event;
        }
    }

    return Array.from(byMarket.values())
        .sort((a, b) => b.largest.deltaPoints - a.largest.deltaPoints);
}
