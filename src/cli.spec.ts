import fs from 'fs';
import os from 'os';
import path from 'path';

import { CliUsageError, main, parseCliArgs } from './cli';
import { OutputType } from './meta-coords';

describe('parseCliArgs', () => {
    it('should default to a Kilosort channel map', () => {
        expect(parseCliArgs(['run.ap.meta'])).toEqual({
            metaPath: 'run.ap.meta',
            outType: OutputType.KilosortChanMap,
            options: { outDir: undefined, badChannels: [], augmentLf: true, verbose: false },
        });
    });

    it('should read every option', () => {
        const args = parseCliArgs(['--type', '3', '--bad', '3,17', '--no-lf', '-o', 'out', '-v', 'run.ap.meta']);
        expect(args).toEqual({
            metaPath: 'run.ap.meta',
            outType: OutputType.AugmentMeta,
            options: { outDir: 'out', badChannels: [3, 17], augmentLf: false, verbose: true },
        });
    });

    it.each([
        [[]],
        [['a.meta', 'b.meta']],
        [['--type', '9', 'a.meta']],
        [['--type', '1.5', 'a.meta']],
        [['--bad', '3,,4', 'a.meta']],
        [['--bad', '-1', 'a.meta']],
        [['--unknown', 'a.meta']],
    ])('should reject %j', (argv) => {
        expect(() => parseCliArgs(argv)).toThrow(CliUsageError);
    });
});

describe('main', () => {
    let dir: string;
    let log: jest.SpyInstance;
    let error: jest.SpyInstance;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
        log = jest.spyOn(console, 'log').mockImplementation(() => {});
        error = jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        log.mockRestore();
        error.mockRestore();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should print the geometry for type 4', async () => {
        const metaPath = path.join(dir, 'probe.meta');
        fs.writeFileSync(metaPath, '~snsGeomMap=(NP1010,1,0,70)(0:27:0:1)\n');

        expect(await main([metaPath, '--type', '4'])).toBe(0);
        expect(log).toHaveBeenCalledTimes(1);
        expect(JSON.parse(log.mock.calls[0][0])).toEqual({
            source: 'geomMap',
            partNumber: 'NP1010',
            shankCount: 1,
            shankPitch: 0,
            shankWidth: 70,
            channels: [{ shankIndex: 0, x: 27, y: 0, connected: true }],
        });
    });

    it('should report failures and return 1', async () => {
        const metaPath = path.join(dir, 'absent.meta');

        expect(await main([metaPath])).toBe(1);
        expect(error).toHaveBeenCalledWith(`[Coords] Metadata file not found: ${metaPath}`);
    });
});
