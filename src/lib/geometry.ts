import { lookupGeometry, siteX, siteY } from './geom-catalog';
import { MapFormatError, MissingGeometryError } from './errors';
import { parseGeomMap, parseShankMap } from './map-parser';
import { channelCounts, probePartNumber } from './meta-reader';
import type { ChannelGeometry, MetaRecord, ProbeGeometry } from './meta-interfaces';

/**
 * Geometry of the saved channels, from ~snsGeomMap when present, otherwise
 * derived from ~snsShankMap and the probe catalog.
 */
export function resolveGeometry(meta: MetaRecord, verbose: boolean = false): ProbeGeometry {
    const geomMap = meta.get('snsGeomMap');
    if (geomMap !== undefined) {
        if (verbose) console.log('[Coords] Reading positions from snsGeomMap');
        return geomMapToGeometry(geomMap);
    }

    const shankMap = meta.get('snsShankMap');
    if (shankMap !== undefined) {
        if (verbose) console.log('[Coords] Deriving positions from snsShankMap');
        return shankMapToGeometry(meta, shankMap);
    }

    throw new MissingGeometryError();
}

export function geomMapToGeometry(value: string): ProbeGeometry {
    const { header, channels } = parseGeomMap(value);
    return { source: 'geomMap', ...header, channels };
}

export function shankMapToGeometry(meta: MetaRecord, value: string): ProbeGeometry {
    // Some early metadata files have a SYNC entry in the shank map; keep only
    // the saved AP channels
    const { ap } = channelCounts(meta);
    const { entries } = parseShankMap(value);
    if (entries.length < ap) {
        throw new MapFormatError('snsShankMap', `has ${entries.length} entries for ${ap} AP channels`);
    }

    const partNumber = probePartNumber(meta);
    const params = lookupGeometry(partNumber);

    const channels = entries.slice(0, ap).map((entry) => ({
        shankIndex: entry.shankIndex,
        x: siteX(params, entry.col, entry.row),
        y: siteY(params, entry.row),
        connected: entry.connected,
    }));

    return {
        source: 'shankMap',
        partNumber,
        shankCount: params.shankCount,
        shankPitch: params.shankPitch,
        shankWidth: params.shankWidth,
        channels,
    };
}

export function absoluteX(channel: ChannelGeometry, shankPitch: number): number {
    return channel.shankIndex * shankPitch + channel.x;
}

/**
 * Mark channels (by index in the saved file) as not connected. Indices past
 * the AP channels, such as the sync channel, are ignored.
 */
export function excludeChannels(geometry: ProbeGeometry, badChannels: readonly number[]): ProbeGeometry {
    const bad = new Set(badChannels.filter((i) => Number.isInteger(i) && i >= 0 && i < geometry.channels.length));
    if (bad.size === 0) return geometry;

    return {
        ...geometry,
        channels: geometry.channels.map((ch, i) => (bad.has(i) ? { ...ch, connected: false } : ch)),
    };
}
