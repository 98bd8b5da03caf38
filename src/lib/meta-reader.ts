import fs from 'fs';
import readline from 'readline';
import type { Readable } from 'stream';
import { firstValueFrom, Observable } from 'rxjs';
import { catchError, filter, map, reduce } from 'rxjs';

import { MapFormatError, MetaFileError, MissingTagError } from './errors';
import type { ChannelCounts, MetaRecord } from './meta-interfaces';

export type MetaEntry = [string, string];

// Probes recorded before part numbers were written to the metadata
export const LEGACY_PART_NUMBER = '3A';

export function parseMetaLine(line: string): MetaEntry | null {
    const eq = line.indexOf('=');
    if (eq < 0) return null;

    let tag = line.slice(0, eq).trim();
    if (tag.startsWith('~')) {
        tag = tag.slice(1);
    }
    if (!tag) return null;

    return [tag, line.slice(eq + 1).trim()];
}

export function parseMetaText(text: string): MetaRecord {
    const meta = new Map<string, string>();
    for (const line of text.split(/\r?\n/)) {
        const entry = parseMetaLine(line);
        if (entry) meta.set(entry[0], entry[1]);
    }
    return meta;
}

export function observableLines(input: Readable): Observable<string> {
    return new Observable((observer) => {
        // readline re-emits read errors of its input on the interface
        const rl = readline.createInterface({ input, crlfDelay: Infinity });

        rl.on('error', (err: Error) => observer.error(err));
        rl.on('line', (line: string) => observer.next(line));
        rl.on('close', () => observer.complete());

        return () => rl.close();
    });
}

export async function readMeta(metaPath: string): Promise<MetaRecord> {
    if (!fs.existsSync(metaPath)) {
        throw new MetaFileError(metaPath, 'Metadata file not found');
    }

    const entries = observableLines(fs.createReadStream(metaPath, { encoding: 'utf-8' })).pipe(
        map(parseMetaLine),
        filter((entry): entry is MetaEntry => entry !== null),
    );

    return firstValueFrom(
        entries.pipe(
            reduce((meta, [tag, value]) => meta.set(tag, value), new Map<string, string>()),
            catchError((err: unknown) => {
                const reason = err instanceof Error ? err.message : String(err);
                throw new MetaFileError(metaPath, `Cannot read metadata (${reason})`);
            }),
        ),
    );
}

export function requireTag(meta: MetaRecord, tag: string): string {
    const value = meta.get(tag);
    if (value === undefined) {
        throw new MissingTagError(tag);
    }
    return value;
}

/**
 * Counts of AP, LF and SYNC channels in each timepoint of the binary file.
 */
export function channelCounts(meta: MetaRecord): ChannelCounts {
    const raw = requireTag(meta, 'snsApLfSy');
    const parts = raw.split(',').map((f) => f.trim());
    const fields = parts.map((f) => (f.length ? Number(f) : NaN));
    if (fields.length !== 3 || !fields.every((n) => Number.isInteger(n) && n >= 0)) {
        throw new MapFormatError('snsApLfSy', `expected three channel counts, got "${raw}"`);
    }

    const [ap, lf, sy] = fields;
    return { ap, lf, sy };
}

export function probePartNumber(meta: MetaRecord): string {
    return meta.get('imDatPrb_pn') ?? LEGACY_PART_NUMBER;
}
