import type { DataSourceKind } from './detection/types.js';
import { isDataSourceKind } from './detection/data-source.js';

export type CliCommand =
    | { command: 'collect' }
    | { command: 'black-swans'; source: DataSourceKind; daysBack: number; limit: number }
    | { command: 'moves'; limit: number };

export interface CliDefaults {
    source: DataSourceKind;
    daysBack: number;
    limit: number;
}

export const USAGE = [
    'Usage: reversal-scan <command> [options]',
    '',
    'Commands:',
    '  collect                                   record one snapshot cycle',
    '  black-swans [--source api|local] [--days N] [--limit N]',
    '  moves [--limit N]                         largest recent swings',
].join('\n');

function positive(name: string, raw: string | undefined, integer: boolean): number {
    const value = Number(raw);
    if (raw === undefined || !Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
        throw new Error(`${name} expects a positive ${integer ? 'integer' : 'number'}`);
    }
    return value;
}

export function parseCliArgs(argv: string[], defaults: CliDefaults): CliCommand {
    const [command, ...rest] = argv;
    let source = defaults.source;
    let daysBack = defaults.daysBack;
    let limit = defaults.limit;

    for (let i = 0; i < rest.length; i++) {
        const token = rest[i];
        const next = rest[i + 1];
        if (token === '--source' && command === 'black-swans') {
            if (!isDataSourceKind(next)) throw new Error(`--source expects 'api' or 'local'`);
            source = next;
            i++;
            continue;
        }
        if (token === '--days' && command === 'black-swans') {
            daysBack = positive('--days', next, false);
            i++;
            continue;
        }
        if (token === '--limit' && command !== 'collect') {
            limit = positive('--limit', next, true);
            i++;
            continue;
        }
        throw new Error(`Unknown option ${token}`);
    }

    switch (command) {
        case 'collect':
            return { command };
        case 'black-swans':
            return { command, source, daysBack, limit };
        case 'moves':
            return { command, limit };
        default:
            throw new Error(command ? `Unknown command ${command}` : 'No command given');
    }
}
