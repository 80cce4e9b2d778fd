import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonFileBarSource } from './JsonFileBarSource';
import { InMemoryBarSource } from './InMemoryBarSource';
import { BarSourceError, InvalidBarError } from '../../shared/errors/IndicatorErrors';
import { barsFromCloses } from '../../shared/testing/bars';

describe('JsonFileBarSource', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'bars-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    async function sourceWith(content: string): Promise<JsonFileBarSource> {
        const file = join(dir, 'bars.json');
        await writeFile(file, content, 'utf8');
        return new JsonFileBarSource(file);
    }

    it('loads bars in file order', async () => {
        const source = await sourceWith(JSON.stringify([
            { open: 10, high: 11, low: 9, close: 10.5, timestamp: 1 },
            { open: 10.5, high: 12, low: 10, close: 11.5, timestamp: 2 }
        ]));

        const bars = await source.loadBars();
        expect(bars.map(bar => bar.close)).toEqual([10.5, 11.5]);
        expect(bars[1].timestamp).toBe(2);
    });

    it('fails on a missing file', async () => {
        await expect(new JsonFileBarSource(join(dir, 'missing.json')).loadBars()).rejects.toThrow(BarSourceError);
    });

    it('fails on malformed JSON', async () => {
        const source = await sourceWith('[{');
        await expect(source.loadBars()).rejects.toThrow(/is not valid JSON/);
    });

    it('fails when the document is not an array', async () => {
        const source = await sourceWith('{"open": 1}');
        await expect(source.loadBars()).rejects.toThrow(/must contain a JSON array/);
    });

    it('rejects invalid bars', async () => {
        const source = await sourceWith(JSON.stringify([{ open: 1, high: 0.5, low: 1, close: 1 }]));
        await expect(source.loadBars()).rejects.toThrow(InvalidBarError);
    });
});

describe('InMemoryBarSource', () => {
    it('returns a copy of its bars', async () => {
        const bars = barsFromCloses([100, 101]);
        const source = new InMemoryBarSource(bars);

        const loaded = await source.loadBars();
        loaded.pop();
        expect(await source.loadBars()).toHaveLength(2);
        expect(source.description).toBe('in-memory');
    });
});
