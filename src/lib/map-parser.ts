/**
 * Codec for the nested-parenthesis values stored in .meta files
 *
 * Every encoded value is a run of flat groups: a header group followed by
 * one group per entry.
 * - snsGeomMap:  (partNumber,nShank,shankPitch,shankWidth)(shank:x:y:connected)...
 * - snsShankMap: (nShank,nCol,nRow)(shank:col:row:connected)...
 * - imroTbl:     (typeCode,...)(f1 f2 f3 ...)...
 */

import { MapFormatError } from './errors';
import type { ChannelGeometry, GeomMapHeader, ShankMapEntry } from './meta-interfaces';

export interface GeomMap {
    header: GeomMapHeader;
    channels: ChannelGeometry[];
}

export interface ShankMap {
    header: number[];
    entries: ShankMapEntry[];
}

const GROUP_RUN = /^(\([^()]*\))+$/;

/**
 * Split an encoded value into the contents of its parenthesized groups
 */
export function parseParenGroups(value: string, tag: string): string[] {
    const trimmed = value.trim();
    if (!GROUP_RUN.test(trimmed)) {
        throw new MapFormatError(tag, 'expected a sequence of (...) groups');
    }
    return trimmed.slice(1, -1).split(')(');
}

function toNumber(raw: string, tag: string, what: string): number {
    const cleaned = raw.trim();
    const num = cleaned.length ? Number(cleaned) : NaN;
    if (!Number.isFinite(num)) {
        throw new MapFormatError(tag, `${what} is not a number: "${raw}"`);
    }
    return num;
}

function toInteger(raw: string, tag: string, what: string): number {
    const num = toNumber(raw, tag, what);
    if (!Number.isInteger(num)) {
        throw new MapFormatError(tag, `${what} is not an integer: "${raw}"`);
    }
    return num;
}

function splitEntry(group: string, separator: string, fields: number, tag: string, index: number): string[] {
    const parts = group.split(separator);
    if (parts.length !== fields) {
        throw new MapFormatError(tag, `entry ${index} has ${parts.length} fields, expected ${fields}`);
    }
    return parts;
}

export function parseGeomMap(value: string): GeomMap {
    const tag = 'snsGeomMap';
    const [head, ...groups] = parseParenGroups(value, tag);

    const headParts = head.split(',');
    if (headParts.length !== 4) {
        throw new MapFormatError(tag, `header has ${headParts.length} fields, expected 4`);
    }
    const header: GeomMapHeader = {
        partNumber: headParts[0].trim(),
        shankCount: toInteger(headParts[1], tag, 'shank count'),
        shankPitch: toNumber(headParts[2], tag, 'shank pitch'),
        shankWidth: toNumber(headParts[3], tag, 'shank width'),
    };

    const channels = groups.map((group, i) => {
        const [s, x, y, u] = splitEntry(group, ':', 4, tag, i);
        return {
            shankIndex: toInteger(s, tag, 'shank index'),
            x: toNumber(x, tag, 'x'),
            y: toNumber(y, tag, 'y'),
            connected: toInteger(u, tag, 'connected flag') !== 0,
        };
    });

    return { header, channels };
}

export function parseShankMap(value: string): ShankMap {
    const tag = 'snsShankMap';
    const [head, ...groups] = parseParenGroups(value, tag);

    const header = head.split(',').map((f) => toInteger(f, tag, 'header field'));
    const entries = groups.map((group, i) => {
        const [s, c, r, u] = splitEntry(group, ':', 4, tag, i);
        return {
            shankIndex: toInteger(s, tag, 'shank index'),
            col: toInteger(c, tag, 'column'),
            row: toInteger(r, tag, 'row'),
            connected: toInteger(u, tag, 'connected flag') !== 0,
        };
    });

    return { header, entries };
}

/**
 * Encode geometry as an snsGeomMap value. Numbers use the shortest decimal
 * that round-trips.
 */
export function serializeGeomMap(header: GeomMapHeader, channels: readonly ChannelGeometry[]): string {
    const head = `(${header.partNumber},${header.shankCount},${header.shankPitch},${header.shankWidth})`;
    const body = channels.map((ch) => `(${ch.shankIndex}:${ch.x}:${ch.y}:${ch.connected ? 1 : 0})`).join('');
    return head + body;
}

/**
 * Split each group of an imroTbl value into its fields. The header group is
 * comma separated, entries are whitespace separated.
 */
export function parseImroTable(value: string): { header: string[]; entries: string[][] } {
    const [head, ...groups] = parseParenGroups(value, 'imroTbl');
    return {
        header: head.split(',').map((f) => f.trim()),
        entries: groups.map((group) => group.trim().split(/\s+/)),
    };
}
