import { MapFormatError, MissingGeometryError, UnsupportedProbeError } from './errors';
import { absoluteX, excludeChannels, resolveGeometry } from './geometry';
import type { ProbeGeometry } from './meta-interfaces';

type Entry = [shank: number, col: number, row: number, connected: number];

function shankMap(entries: Entry[]): string {
    return '(1,2,480)' + entries.map((e) => `(${e.join(':')})`).join('');
}

describe('resolveGeometry from snsShankMap', () => {
    it('should place the first electrode of a 3A probe at the even-row offset', () => {
        const geometry = resolveGeometry(
            new Map([
                ['snsApLfSy', '1,1,0'],
                ['snsShankMap', shankMap([[0, 0, 0, 1]])],
            ]),
        );
        expect(geometry.partNumber).toBe('3A');
        expect(geometry.source).toBe('shankMap');
        expect(geometry.channels).toEqual([{ shankIndex: 0, x: 27, y: 0, connected: true }]);
    });

    it('should stagger odd rows', () => {
        const geometry = resolveGeometry(
            new Map([
                ['imDatPrb_pn', 'NP1010'],
                ['snsApLfSy', '2,2,0'],
                ['snsShankMap', shankMap([[0, 1, 1, 1], [0, 0, 3, 0]])],
            ]),
        );
        expect(geometry.channels).toEqual([
            { shankIndex: 0, x: 43, y: 20, connected: true },
            { shankIndex: 0, x: 11, y: 60, connected: false },
        ]);
    });

    it('should use only as many entries as there are AP channels', () => {
        const entries: Entry[] = [];
        for (let i = 0; i < 385; i++) entries.push([0, i % 2, Math.floor(i / 2), 1]);

        const geometry = resolveGeometry(
            new Map([
                ['snsApLfSy', '384,384,1'],
                ['snsShankMap', shankMap(entries)],
            ]),
        );
        expect(geometry.channels).toHaveLength(384);
        expect(geometry.channels[383]).toEqual({ shankIndex: 0, x: 43, y: 3820, connected: true });
    });

    it('should take shank layout from the catalog', () => {
        const geometry = resolveGeometry(
            new Map([
                ['imDatPrb_pn', 'NP2014'],
                ['snsApLfSy', '1,0,1'],
                ['snsShankMap', shankMap([[3, 1, 2, 1]])],
            ]),
        );
        expect(geometry).toMatchObject({ shankCount: 4, shankPitch: 250, shankWidth: 70 });
        expect(geometry.channels[0]).toEqual({ shankIndex: 3, x: 59, y: 30, connected: true });
    });

    it('should fail when the map is shorter than the AP channel count', () => {
        const meta = new Map([
            ['snsApLfSy', '2,2,1'],
            ['snsShankMap', shankMap([[0, 0, 0, 1]])],
        ]);
        expect(() => resolveGeometry(meta)).toThrow(MapFormatError);
    });

    it('should fail for probes missing from the catalog', () => {
        const meta = new Map([
            ['imDatPrb_pn', 'NP9999'],
            ['snsApLfSy', '1,1,0'],
            ['snsShankMap', shankMap([[0, 0, 0, 1]])],
        ]);
        expect(() => resolveGeometry(meta)).toThrow(UnsupportedProbeError);
    });
});

describe('resolveGeometry from snsGeomMap', () => {
    it('should prefer the geometry table over the shank map', () => {
        const geometry = resolveGeometry(
            new Map([
                ['imDatPrb_pn', 'NP9999'],
                ['snsShankMap', shankMap([[0, 0, 0, 1]])],
                ['snsGeomMap', '(NP9999,2,300,80)(1:12.5:7.5:0)'],
            ]),
        );
        expect(geometry).toEqual({
            source: 'geomMap',
            partNumber: 'NP9999',
            shankCount: 2,
            shankPitch: 300,
            shankWidth: 80,
            channels: [{ shankIndex: 1, x: 12.5, y: 7.5, connected: false }],
        });
    });

    it('should fail when neither geometry tag is present', () => {
        expect(() => resolveGeometry(new Map([['snsApLfSy', '384,384,1']]))).toThrow(MissingGeometryError);
    });
});

describe('absoluteX', () => {
    it('should add the shank offset to the local x', () => {
        expect(absoluteX({ shankIndex: 2, x: 30, y: 0, connected: true }, 250)).toBe(530);
    });
});

describe('excludeChannels', () => {
    const geometry: ProbeGeometry = {
        source: 'geomMap',
        partNumber: 'NP2014',
        shankCount: 4,
        shankPitch: 250,
        shankWidth: 70,
        channels: [
            { shankIndex: 0, x: 27, y: 0, connected: true },
            { shankIndex: 0, x: 59, y: 0, connected: true },
        ],
    };

    it('should disconnect listed channels without touching the input', () => {
        const result = excludeChannels(geometry, [1]);
        expect(result.channels.map((ch) => ch.connected)).toEqual([true, false]);
        expect(geometry.channels[1].connected).toBe(true);
    });

    it('should ignore indices past the saved channels', () => {
        expect(excludeChannels(geometry, [2, 384, -1])).toBe(geometry);
    });
});
