import fs from 'fs';
import path from 'path';

import { absoluteX } from './geometry';
import { MetaFileError } from './errors';
import { serializeGeomMap } from './map-parser';
import type { KilosortChanMap, ProbeGainInfo, ProbeGeometry } from './meta-interfaces';

/**
 * Tab delimited: channel index in the saved file, x, y (um), shank index
 */
export function formatSiteCoords(geometry: ProbeGeometry): string {
    return geometry.channels
        .map((ch, i) => `${i}\t${absoluteX(ch, geometry.shankPitch)}\t${ch.y}\t${ch.shankIndex}\n`)
        .join('');
}

/**
 * Channel map for Kilosort. chanMap is the order of channels in the saved
 * file, not their original probe indices.
 */
export function buildKilosortChanMap(geometry: ProbeGeometry, name: string): KilosortChanMap {
    const { channels, shankPitch } = geometry;
    return {
        chanMap: channels.map((_, i) => i + 1),
        chanMap0ind: channels.map((_, i) => i),
        connected: channels.map((ch) => ch.connected),
        xcoords: channels.map((ch) => absoluteX(ch, shankPitch)),
        ycoords: channels.map((ch) => ch.y),
        kcoords: channels.map((ch) => ch.shankIndex + 1),
        name,
    };
}

/**
 * Assignments to paste into a JRClust .prm file. Shank and site indices are 1-based.
 */
export function formatJrcParams(geometry: ProbeGeometry): string {
    const { channels, shankPitch } = geometry;
    const shankMap = channels.map((ch) => ch.shankIndex + 1).join(',');
    const siteLoc = channels.map((ch) => `${absoluteX(ch, shankPitch)},${ch.y}`).join(';');
    const siteMap = channels.map((_, i) => i + 1).join(',');
    return `shankMap = [${shankMap}];\nsiteLoc = [${siteLoc}];\nsiteMap = [${siteMap}];\n`;
}

export function buildAugmentLines(geometry: ProbeGeometry, gain: ProbeGainInfo, muxTable: string): string[] {
    return [
        `imChan0apGain=${gain.apGain0}`,
        `imChan0lfGain=${gain.lfGain0}`,
        `imAnyChanFullBand=${gain.anyChannelFullBand}`,
        `~muxTbl=${muxTable}`,
        `~snsGeomMap=${serializeGeomMap(geometry, geometry.channels)}`,
    ];
}

export function metaBaseName(metaPath: string): string {
    return path.basename(metaPath, path.extname(metaPath));
}

export function backupPath(metaPath: string): string {
    return path.join(path.dirname(metaPath), `${metaBaseName(metaPath)}_orig.meta`);
}

/**
 * Path of the LF metadata recorded alongside an AP file, or null when the
 * base name does not end in .ap
 */
export function lfSiblingPath(metaPath: string): string | null {
    const base = metaBaseName(metaPath);
    if (!base.endsWith('.ap')) return null;
    return path.join(path.dirname(metaPath), `${base.slice(0, -3)}.lf${path.extname(metaPath)}`);
}

/** Throws MetaFileError unless metaPath exists and has no backup yet. */
export function checkAugmentTarget(metaPath: string): void {
    if (!fs.existsSync(metaPath)) {
        throw new MetaFileError(metaPath, 'Metadata file not found');
    }
    const backup = backupPath(metaPath);
    if (fs.existsSync(backup)) {
        throw new MetaFileError(backup, 'Backup already exists, metadata was augmented before');
    }
}

/**
 * Move the metadata file to <base>_orig.meta and write a copy with the given
 * lines appended at the original path. Returns the backup path.
 */
export function augmentMetaFile(metaPath: string, lines: readonly string[]): string {
    checkAugmentTarget(metaPath);
    const backup = backupPath(metaPath);

    const original = fs.readFileSync(metaPath);
    const separator = original.length === 0 || original[original.length - 1] === 0x0a ? '' : '\n';
    const appended = Buffer.from(separator + lines.map((line) => `${line}\n`).join(''), 'utf-8');

    fs.renameSync(metaPath, backup);
    fs.writeFileSync(metaPath, Buffer.concat([original, appended]));
    return backup;
}
