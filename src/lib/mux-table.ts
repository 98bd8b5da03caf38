import MUX_TABLES from './data/mux-tables.json';

export type MuxFamily = keyof typeof MUX_TABLES;

const PART_NUMBER_MUX: Readonly<Record<string, MuxFamily>> = {
    '3A': 'np1',
    PRB_1_4_0480_1: 'np1',
    PRB_1_4_0480_1_C: 'np1',
    NP1010: 'np1',
    NP1011: 'np1',
    NP1012: 'np1',
    NP1013: 'np1',
    NP1015: 'np1',
    NP1016: 'np1',
    NP1017: 'np1',
    NP1020: 'np1',
    NP1021: 'np1',
    NP1022: 'np1',
    NP1030: 'np1',
    NP1031: 'np1',
    NP1032: 'np1',
    NP1100: 'np1',
    NP1120: 'np1',
    NP1121: 'np1',
    NP1122: 'np1',
    NP1123: 'np1',
    NP1200: 'np1',
    NP1300: 'np1',

    NP1110: 'uhd2',

    PRB2_1_2_0640_0: 'np2',
    PRB2_1_4_0480_1: 'np2',
    NP2000: 'np2',
    NP2003: 'np2',
    NP2004: 'np2',
    PRB2_4_2_0640_0: 'np2',
    NP2010: 'np2',
    NP2013: 'np2',
    NP2014: 'np2',

    NXT3000: 'nxt',
};

export function muxFamily(partNumber: string): MuxFamily | null {
    return Object.prototype.hasOwnProperty.call(PART_NUMBER_MUX, partNumber) ? PART_NUMBER_MUX[partNumber] : null;
}

/**
 * ~muxTbl value for a probe: (nADC,nGroup) then the channels read out by each
 * ADC group. Unknown probes get an empty table and a warning.
 */
export function lookupMuxTable(partNumber: string): string {
    const family = muxFamily(partNumber);
    if (family === null) {
        console.warn(`[Coords] No MUX table for probe part number ${partNumber}`);
        return '';
    }
    return MUX_TABLES[family];
}
