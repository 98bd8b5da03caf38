import { MapFormatError, UnsupportedImroFormatError } from './errors';
import { parseImroTable } from './map-parser';
import { requireTag } from './meta-reader';
import type { MetaRecord, ProbeGainInfo } from './meta-interfaces';

type ImroTable = ReturnType<typeof parseImroTable>;

// 3A tables carry the probe serial number where later formats have a type code
const LEGACY_3A_MIN_CODE = 50000;

// NP2.0 probes have a fixed gain and no AP high-pass filter
const NP2_GAIN = 80;

function field(fields: readonly string[], n: number, what: string): number {
    const raw = fields[n - 1];
    const num = raw === undefined ? NaN : Number(raw);
    if (!Number.isFinite(num)) {
        throw new MapFormatError('imroTbl', `${what} (field ${n}) missing or not a number`);
    }
    return num;
}

function firstEntry(table: ImroTable, fields: number): string[] {
    const entry = table.entries[0];
    if (!entry || entry.length < fields) {
        throw new MapFormatError('imroTbl', `first channel entry needs ${fields} fields`);
    }
    return entry;
}

function legacy3A(table: ImroTable): ProbeGainInfo {
    const entry = firstEntry(table, 5);
    return {
        apGain0: field(entry, 4, 'AP gain'),
        lfGain0: field(entry, 5, 'LF gain'),
        anyChannelFullBand: false,
    };
}

function np1(table: ImroTable): ProbeGainInfo {
    const entry = firstEntry(table, 6);
    return {
        apGain0: field(entry, 4, 'AP gain'),
        lfGain0: field(entry, 5, 'LF gain'),
        anyChannelFullBand: table.entries.some((e) => field(e, 6, 'AP filter') === 0),
    };
}

function np2(): ProbeGainInfo {
    return { apGain0: NP2_GAIN, lfGain0: NP2_GAIN, anyChannelFullBand: true };
}

function np1110(table: ImroTable): ProbeGainInfo {
    return {
        apGain0: field(table.header, 4, 'AP gain'),
        lfGain0: field(table.header, 5, 'LF gain'),
        anyChannelFullBand: table.header[5] === '0',
    };
}

const IMRO_FORMATS: Readonly<Record<string, (table: ImroTable) => ProbeGainInfo>> = {
    '0': np1,
    '21': np2,
    '24': np2,
    '1110': np1110,
};

/**
 * Gains of the first readout channel and whether any channel records with
 * the AP filter off, from ~imroTbl.
 */
export function deriveGainInfo(meta: MetaRecord): ProbeGainInfo {
    const table = parseImroTable(requireTag(meta, 'imroTbl'));
    const typeCode = table.header[0];

    if (Number(typeCode) > LEGACY_3A_MIN_CODE) {
        return legacy3A(table);
    }

    if (!Object.prototype.hasOwnProperty.call(IMRO_FORMATS, typeCode)) {
        throw new UnsupportedImroFormatError(typeCode);
    }
    return IMRO_FORMATS[typeCode](table);
}
