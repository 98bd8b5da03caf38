/**
 * Physical layout of supported probes, used to derive electrode positions
 * from metadata that carries only ~snsShankMap.
 *
 * Many part numbers share one layout, so part numbers map to a geometry
 * type and each type holds the constants (um).
 */

import { UnsupportedProbeError } from './errors';
import type { GeometryParams, SitePosition } from './meta-interfaces';

// [nShank, shankWidth, shankPitch, even_xOff, odd_xOff, horzPitch, vertPitch, rowsPerShank, elecPerShank]
type GeometryRow = readonly [number, number, number, number, number, number, number, number, number];

const GEOMETRY_ROWS = {
    np1_stag_70um: [1, 70, 0, 27, 11, 32, 20, 480, 960],
    nhp_lin_70um: [1, 70, 0, 27, 27, 32, 20, 480, 960],
    nhp_stag_125um_med: [1, 125, 0, 27, 11, 87, 20, 1368, 2496],
    nhp_stag_125um_long: [1, 125, 0, 27, 11, 87, 20, 2208, 4416],
    nhp_lin_125um_med: [1, 125, 0, 11, 11, 103, 20, 1368, 2496],
    nhp_lin_125um_long: [1, 125, 0, 11, 11, 103, 20, 2208, 4416],
    uhd_8col_1bank: [1, 70, 0, 14, 14, 6, 6, 48, 384],
    uhd_8col_16bank: [1, 70, 0, 14, 14, 6, 6, 768, 6144],
    np2_ss: [1, 70, 0, 27, 27, 32, 15, 640, 1280],
    np2_4s: [4, 70, 250, 27, 27, 32, 15, 640, 1280],
    NP1120: [1, 70, 0, 6.75, 6.75, 4.5, 4.5, 192, 384],
    NP1121: [1, 70, 0, 6.25, 6.25, 3, 3, 384, 384],
    NP1122: [1, 70, 0, 12.5, 12.5, 3, 3, 24, 384],
    NP1123: [1, 70, 0, 10.25, 10.25, 4.5, 4.5, 32, 384],
    NP1300: [1, 70, 0, 11, 11, 48, 20, 480, 960],
    NP1200: [1, 70, 0, 27, 11, 32, 20, 64, 128],
    NXT3000: [1, 70, 0, 53, 53, 0, 15, 128, 128],
} as const satisfies Record<string, GeometryRow>;

export type GeometryType = keyof typeof GEOMETRY_ROWS;

export const PART_NUMBER_GEOMETRY: Readonly<Record<string, GeometryType>> = {
    '3A': 'np1_stag_70um',
    PRB_1_4_0480_1: 'np1_stag_70um',
    PRB_1_4_0480_1_C: 'np1_stag_70um',
    NP1010: 'np1_stag_70um',
    NP1011: 'np1_stag_70um',
    NP1012: 'np1_stag_70um',
    NP1013: 'np1_stag_70um',

    NP1015: 'nhp_lin_70um',
    NP1016: 'nhp_lin_70um',
    NP1017: 'nhp_lin_70um',

    NP1020: 'nhp_stag_125um_med',
    NP1021: 'nhp_stag_125um_med',
    NP1030: 'nhp_stag_125um_long',
    NP1031: 'nhp_stag_125um_long',

    NP1022: 'nhp_lin_125um_med',
    NP1032: 'nhp_lin_125um_long',

    NP1100: 'uhd_8col_1bank',
    NP1110: 'uhd_8col_16bank',

    PRB2_1_2_0640_0: 'np2_ss',
    PRB2_1_4_0480_1: 'np2_ss',
    NP2000: 'np2_ss',
    NP2003: 'np2_ss',
    NP2004: 'np2_ss',

    PRB2_4_2_0640_0: 'np2_4s',
    NP2010: 'np2_4s',
    NP2013: 'np2_4s',
    NP2014: 'np2_4s',

    NP1120: 'NP1120',
    NP1121: 'NP1121',
    NP1122: 'NP1122',
    NP1123: 'NP1123',
    NP1300: 'NP1300',

    NP1200: 'NP1200',
    NXT3000: 'NXT3000',
};

function toParams(row: GeometryRow): GeometryParams {
    const [
        shankCount,
        shankWidth,
        shankPitch,
        evenRowXOffset,
        oddRowXOffset,
        horizontalPitch,
        verticalPitch,
        rowsPerShank,
        electrodesPerShank,
    ] = row;
    return Object.freeze({
        shankCount,
        shankWidth,
        shankPitch,
        evenRowXOffset,
        oddRowXOffset,
        horizontalPitch,
        verticalPitch,
        rowsPerShank,
        electrodesPerShank,
    });
}

export function geometryType(type: GeometryType): GeometryParams {
    return toParams(GEOMETRY_ROWS[type]);
}

export function isSupportedProbe(partNumber: string): boolean {
    return Object.prototype.hasOwnProperty.call(PART_NUMBER_GEOMETRY, partNumber);
}

export function lookupGeometry(partNumber: string): GeometryParams {
    if (!isSupportedProbe(partNumber)) {
        throw new UnsupportedProbeError(partNumber);
    }
    return geometryType(PART_NUMBER_GEOMETRY[partNumber]);
}

export function columnsPerShank(params: GeometryParams): number {
    return params.electrodesPerShank / params.rowsPerShank;
}

/**
 * x position of an electrode on its shank. Odd and even rows carry separate
 * offsets to model staggered layouts.
 */
export function siteX(params: GeometryParams, col: number, row: number): number {
    const offset = row % 2 === 0 ? params.evenRowXOffset : params.oddRowXOffset;
    return col * params.horizontalPitch + offset;
}

export function siteY(params: GeometryParams, row: number): number {
    return row * params.verticalPitch;
}

/**
 * Every electrode on the probe, shank by shank, in electrode order.
 */
export function allSitePositions(params: GeometryParams): SitePosition[] {
    const nCol = columnsPerShank(params);
    const sites: SitePosition[] = [];

    for (let shankIndex = 0; shankIndex < params.shankCount; shankIndex++) {
        for (let e = 0; e < params.electrodesPerShank; e++) {
            const row = Math.floor(e / nCol);
            const col = e % nCol;
            sites.push({
                shankIndex,
                x: shankIndex * params.shankPitch + siteX(params, col, row),
                y: siteY(params, row),
            });
        }
    }
    return sites;
}
