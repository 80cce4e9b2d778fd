import 'reflect-metadata';
import { RunTrancheReplay } from './RunTrancheReplay';
import { ExitReason } from '../../domain/enums/ExitReason';
import { Tranche } from '../../domain/enums/Tranche';
import { Logger, LogLevel } from '../../shared/logger/Logger';
import { createContainer, TYPES } from '../../config/inversify.config';
import { barsFromCloses } from '../../shared/testing/bars';

describe('RunTrancheReplay', () => {
    const replay = createContainer().get<RunTrancheReplay>(TYPES.RunTrancheReplay);

    beforeAll(() => {
        Logger.getInstance().setLogLevel(LogLevel.ERROR);
    });

    it('time-stops the runner on a flat series and leaves the rest open', () => {
        const result = replay.execute(barsFromCloses(Array(30).fill(100)), { entryIndex: 0 });

        expect(result.entryPrice).toBe(100);
        expect(result.allClosed).toBe(false);
        expect(result.exits.map(exit => exit.tranche)).toEqual([Tranche.DE_RISK, Tranche.STRUCTURAL, Tranche.RUNNER]);
        expect(result.exits[2]).toEqual({
            tranche: Tranche.RUNNER,
            fraction: 0.25,
            reason: ExitReason.TIME_STOP,
            index: 20,
            price: 100,
            daysHeld: 20,
            returnPct: 0
        });
        expect(result.exits[0].reason).toBeNull();
        expect(result.exits[0].index).toBe(29);
        expect(result.exits[1].daysHeld).toBe(29);
        expect(result.weightedReturnPct).toBe(0);
    });

    it('exits the runner on a higher-low break and marks open tranches at the last close', () => {
        const result = replay.execute(barsFromCloses([100, 101, 102, 103, 99]), { entryIndex: 0 });

        expect(result.exits[2].reason).toBe(ExitReason.HIGHER_LOW_BREAK);
        expect(result.exits[2].index).toBe(4);
        expect(result.exits[2].daysHeld).toBe(4);
        expect(result.exits[2].returnPct).toBeCloseTo(-1);
        expect(result.exits[0].reason).toBeNull();
        expect(result.exits[0].returnPct).toBeCloseTo(-1);
        expect(result.weightedReturnPct).toBeCloseTo(-1);
    });

    it('uses an explicit entry price', () => {
        const result = replay.execute(barsFromCloses([100, 101, 102, 103, 99]), { entryIndex: 0, entryPrice: 90 });
        expect(result.entryPrice).toBe(90);
        expect(result.exits[2].returnPct).toBeCloseTo(10);
    });

    it('rejects an entry outside the series', () => {
        const bars = barsFromCloses([100, 101]);
        expect(() => replay.execute(bars, { entryIndex: 2 })).toThrow(RangeError);
        expect(() => replay.execute(bars, { entryIndex: -1 })).toThrow(RangeError);
    });
});
