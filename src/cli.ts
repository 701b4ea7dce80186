#!/usr/bin/env node
/**
 * Command line entry: one-off collection, black swan and movers reports
 */

import { config, validateConfig } from './config.js';
import { createContext } from './context.js';
import { describeError } from './detection/errors.js';
import { logger } from './logger.js';
import { parseCliArgs, USAGE, type CliCommand } from './cli-args.js';

function pct(probability: number): string {
    return `${(probability * 100).toFixed(1)}%`;
}

async function run(command: CliCommand): Promise<void> {
    validateConfig();
    const context = await createContext();

    switch (command.command) {
        case 'collect': {
            const stats = await context.collector.runCollection();
            console.log(`Fetched ${stats.marketsFetched} markets (${stats.marketsNew} new), ` +
                `${stats.snapshotsCreated} snapshots, ${stats.resolutionsDetected} resolutions`);
            for (const error of stats.errors) console.log(`  ! ${error}`);
            break;
        }
        case 'black-swans': {
            const controller = new AbortController();
            process.once('SIGINT', () => controller.abort());

            const report = await context.blackSwans.findBlackSwans({
                source: command.source,
                daysBack: command.daysBack,
                limit: command.limit,
                signal: controller.signal,
            });
            console.log(`${report.blackSwans.length} black swans among ${report.stats.classified} classified ` +
                `markets (${report.source}, last ${report.daysBack} days, ${report.errorCount} failed)`);
            for (const swan of report.blackSwans) {
                console.log(`  ${swan.favorite} ${pct(swan.earlyProbability)} -> ${pct(swan.finalProbability)} ` +
                    `(${swan.winningSide} won, ${swan.earlyTimestamp.toISOString().slice(0, 10)}) ${swan.question}`);
            }
            break;
        }
        case 'moves': {
            const movers = await context.movers.recentMovers(new Date(), command.limit);
            console.log(`${movers.length} markets moved ${config.largeMoveThresholdPoints}+ points ` +
                `within ${config.largeMoveWindowHours}h`);
            for (const mover of movers) {
                const move = mover.largest;
                console.log(`  ${move.direction === 'up' ? '+' : '-'}${move.deltaPoints} pts ` +
                    `${pct(move.probabilityStart)} -> ${pct(move.probabilityEnd)} ${mover.question}`);
            }
            break;
        }
    }
}

let command: CliCommand;
try {
    command = parseCliArgs(process.argv.slice(2), {
        source: 'api',
        daysBack: config.scanDaysBack,
        limit: config.scanResultLimit,
    });
} catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    process.exit(2);
}

run(command).catch(error => {
    logger.error('Command failed', { error: describeError(error) });
    process.exit(1);
});
