import { MapFormatError, MissingTagError, UnsupportedImroFormatError } from './errors';
import { deriveGainInfo } from './imro';

const withImro = (imroTbl: string) => new Map([['imroTbl', imroTbl]]);

describe('deriveGainInfo', () => {
    it('should read gains from the first entry of a 3A table', () => {
        expect(deriveGainInfo(withImro('(641251209,3,384)(0 1 0 1000 50)(1 1 0 500 250)'))).toEqual({
            apGain0: 1000,
            lfGain0: 50,
            anyChannelFullBand: false,
        });
    });

    it('should flag full band when any NP1.0 channel has its AP filter off', () => {
        expect(deriveGainInfo(withImro('(0,384)(0 0 0 500 250 1)(1 0 0 500 250 0)'))).toEqual({
            apGain0: 500,
            lfGain0: 250,
            anyChannelFullBand: true,
        });
        expect(deriveGainInfo(withImro('(0,384)(0 0 0 500 250 1)(1 0 0 500 250 1)')).anyChannelFullBand).toBe(false);
    });

    it.each(['21', '24'])('should use fixed NP2.0 gains for type %s regardless of the table', (code) => {
        expect(deriveGainInfo(withImro(`(${code},384)(0 0 0 0)(junk)`))).toEqual({
            apGain0: 80,
            lfGain0: 80,
            anyChannelFullBand: true,
        });
    });

    it('should read NP1110 gains and filter from the header', () => {
        expect(deriveGainInfo(withImro('(1110,0,0,1000,100,0)(0 1 0 0)'))).toEqual({
            apGain0: 1000,
            lfGain0: 100,
            anyChannelFullBand: true,
        });
        expect(deriveGainInfo(withImro('(1110,0,0,500,250,1)(0 1 0 0)')).anyChannelFullBand).toBe(false);
    });

    it('should reject unknown probe types', () => {
        expect(() => deriveGainInfo(withImro('(2013,384)(0 0 0 0 0)'))).toThrow(UnsupportedImroFormatError);
        expect(() => deriveGainInfo(withImro('(2013,384)(0 0 0 0 0)'))).toThrow(
            'Unsupported imroTbl probe type: 2013',
        );
    });

    it('should fail when the table is missing or too short', () => {
        expect(() => deriveGainInfo(new Map())).toThrow(MissingTagError);
        expect(() => deriveGainInfo(withImro('(0,384)'))).toThrow(MapFormatError);
        expect(() => deriveGainInfo(withImro('(0,384)(0 0 0 500 250)'))).toThrow(MapFormatError);
    });
});
