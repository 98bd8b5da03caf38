#!/usr/bin/env node
import { parseArgs } from 'node:util';

import { isOutputType, metaToCoords, OutputType, type MetaToCoordsOptions } from './meta-coords';

const USAGE = 'Usage: probe-coords <file.meta> [--type 0-4] [--out-dir DIR] [--bad 3,17] [--no-lf] [--verbose]';

export class CliUsageError extends Error {
    constructor(message: string) {
        super(`${message}\n${USAGE}`);
        this.name = 'CliUsageError';
    }
}

export interface CliArgs {
    metaPath: string;
    outType: OutputType;
    options: MetaToCoordsOptions;
}

function parseIndexList(raw: string): number[] {
    return raw.split(',').map((part) => {
        const n = Number(part.trim());
        if (!Number.isInteger(n) || n < 0 || !part.trim()) {
            throw new CliUsageError(`Bad channel index "${part}"`);
        }
        return n;
    });
}

function readArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                type: { type: 'string', short: 't', default: String(OutputType.KilosortChanMap) },
                'out-dir': { type: 'string', short: 'o' },
                bad: { type: 'string' },
                'no-lf': { type: 'boolean', default: false },
                verbose: { type: 'boolean', short: 'v', default: false },
            },
        });
    } catch (e) {
        throw new CliUsageError(e instanceof Error ? e.message : String(e));
    }
}

export function parseCliArgs(argv: string[]): CliArgs {
    const { values, positionals } = readArgs(argv);
    if (positionals.length !== 1) {
        throw new CliUsageError('Expected exactly one metadata file');
    }

    const outType = Number(values.type);
    if (!Number.isInteger(outType) || !isOutputType(outType)) {
        throw new CliUsageError(`Unknown output type "${values.type}"`);
    }

    return {
        metaPath: positionals[0],
        outType,
        options: {
            outDir: values['out-dir'],
            badChannels: values.bad === undefined ? [] : parseIndexList(values.bad),
            augmentLf: !values['no-lf'],
            verbose: values.verbose,
        },
    };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    try {
        const { metaPath, outType, options } = parseCliArgs(argv);
        const { geometry } = await metaToCoords(metaPath, outType, options);
        if (outType === OutputType.Geometry) {
            console.log(JSON.stringify(geometry, null, 2));
        }
        return 0;
    } catch (e) {
        console.error(`[Coords] ${e instanceof Error ? e.message : String(e)}`);
        return 1;
    }
}

if (require.main === module) {
    main().then((code) => {
        process.exitCode = code;
    });
}
