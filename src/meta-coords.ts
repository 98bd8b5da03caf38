/**
 * Write out channel coordinates for a probe metadata file.
 *
 * Positions come from ~snsGeomMap when the file has one. Otherwise, if the
 * probe is in the catalog, they are derived from ~snsShankMap.
 */

import fs from 'fs';
import path from 'path';

import {
    augmentMetaFile,
    buildAugmentLines,
    checkAugmentTarget,
    buildKilosortChanMap,
    formatJrcParams,
    formatSiteCoords,
    lfSiblingPath,
    metaBaseName,
} from './lib/exporters';
import { excludeChannels, resolveGeometry } from './lib/geometry';
import { deriveGainInfo } from './lib/imro';
import { readMeta } from './lib/meta-reader';
import { lookupMuxTable } from './lib/mux-table';
import type { MetaRecord, ProbeGeometry } from './lib/meta-interfaces';

export const OutputType = {
    SiteCoords: 0, // tab delimited: chan index, x, y, shank index
    KilosortChanMap: 1,
    JrcParams: 2, // strings to paste into a JRClust .prm file
    AugmentMeta: 3, // append snsGeomMap and gain/MUX tags to the metadata
    Geometry: 4, // no file, return the geometry
} as const;

export type OutputType = (typeof OutputType)[keyof typeof OutputType];

export interface MetaToCoordsOptions {
    outDir?: string;
    badChannels?: readonly number[];
    augmentLf?: boolean;
    verbose?: boolean;
}

export interface CoordsResult {
    geometry: ProbeGeometry;
    written: string[];
}

export function isOutputType(value: number): value is OutputType {
    return Object.values(OutputType).some((t) => t === value);
}

export function augmentMeta(metaPath: string, meta: MetaRecord, geometry: ProbeGeometry, augmentLf: boolean): string[] {
    const gain = deriveGainInfo(meta);
    const lines = buildAugmentLines(geometry, gain, lookupMuxTable(geometry.partNumber));

    const targets = [metaPath];
    const lfPath = lfSiblingPath(metaPath);
    if (augmentLf && lfPath && fs.existsSync(lfPath)) {
        targets.push(lfPath);
    }

    // nothing is renamed until every target has passed
    targets.forEach(checkAugmentTarget);
    targets.forEach((target) => augmentMetaFile(target, lines));
    return targets;
}

export async function metaToCoords(
    metaPath: string,
    outType: number,
    options: MetaToCoordsOptions = {},
): Promise<CoordsResult> {
    if (!isOutputType(outType)) {
        throw new RangeError(`Unknown output type ${outType}, expected 0-4`);
    }
    const { outDir = process.cwd(), badChannels = [], augmentLf = true, verbose = false } = options;

    const meta = await readMeta(metaPath);
    const geometry = excludeChannels(resolveGeometry(meta, verbose), badChannels);
    if (verbose) {
        console.log(
            `[Coords] ${geometry.partNumber}: ${geometry.channels.length} channels on ${geometry.shankCount} shank(s)`,
        );
    }

    const baseName = metaBaseName(metaPath);
    const written: string[] = [];
    const writeOut = (suffix: string, content: string) => {
        const target = path.join(outDir, baseName + suffix);
        fs.writeFileSync(target, content);
        written.push(target);
    };

    switch (outType) {
        case OutputType.SiteCoords:
            writeOut('-siteCoords.txt', formatSiteCoords(geometry));
            break;
        case OutputType.KilosortChanMap:
            writeOut('_kilosortChanMap.json', JSON.stringify(buildKilosortChanMap(geometry, baseName), null, 2));
            break;
        case OutputType.JrcParams:
            writeOut('_forJRCprm.txt', formatJrcParams(geometry));
            break;
        case OutputType.AugmentMeta:
            written.push(...augmentMeta(metaPath, meta, geometry, augmentLf));
            break;
        case OutputType.Geometry:
            break;
    }

    if (verbose) {
        for (const file of written) console.log(`[Coords] Wrote ${file}`);
    }
    return { geometry, written };
}
