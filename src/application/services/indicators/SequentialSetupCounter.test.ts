import { SequentialSetupCounter, DEGENERATE_RANGE_PCT } from './SequentialSetupCounter';
import { Bar } from '../../../domain/entities/Bar';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { DiagnosticKind } from '../../../domain/enums/DiagnosticKind';
import { SetupPhaseKind } from '../../../domain/enums/SetupPhaseKind';
import { StepResult, SetupCounterState } from '../../../domain/types/CalculatorStates';
import { IndicatorConfig } from '../../../config/indicator.config';
import { barAt, barsFromCloses, linearCloses, ohlc, testConfig } from '../../../shared/testing/bars';

function runSetup(bars: Bar[], config: IndicatorConfig = testConfig()): StepResult<SetupCounterState>[] {
    const counter = new SequentialSetupCounter(config);
    let state = counter.initial();
    return bars.map((_, index) => {
        const result = counter.step(state, new BarWindow(bars, index));
        state = result.state;
        return result;
    });
}

describe('SequentialSetupCounter', () => {
    describe('steady rise', () => {
        const results = runSetup(barsFromCloses(linearCloses(14)));

        it('is not warmed up before the comparison bar exists', () => {
            expect(results[3].state.warmedUp).toBe(false);
            expect(results[3].state.count).toBe(0);
            expect(results[4].state.warmedUp).toBe(true);
        });

        it('counts from the first bar with a close above four bars earlier', () => {
            expect(results[4].state.count).toBe(1);
            expect(results[11].state.count).toBe(8);
            expect(results[11].state.complete).toBe(false);
        });

        it('completes at the ninth consecutive bar', () => {
            const nine = results[12].state;
            expect(nine.count).toBe(9);
            expect(nine.complete).toBe(true);
            expect(nine.justCompleted).toBe(true);
            expect(nine.bar9Close).toBe(112);
            expect(nine.bar9RangePct).toBeCloseTo(0.5);
            expect(nine.phase.kind).toBe(SetupPhaseKind.COMPLETED);
        });

        it('tracks the lowest low of the run up to bar nine', () => {
            expect(results[12].state.lowestLow).toBe(103.5);
            expect(results[13].state.lowestLow).toBe(103.5);
        });

        it('caps the count at nine while the run extends', () => {
            const ten = results[13].state;
            expect(ten.count).toBe(9);
            expect(ten.run).toBe(10);
            expect(ten.justCompleted).toBe(false);
            expect(ten.barsSinceSetup9).toBe(1);
            expect(ten.highestCloseSinceSetup9).toBe(113);
        });
    });

    it('resets the count on a single failing bar', () => {
        const closes = [...linearCloses(9), 104, 111];
        const results = runSetup(barsFromCloses(closes));

        expect(results[8].state.count).toBe(5);
        expect(results[8].state.lowestLow).toBe(103.5);
        expect(results[9].state.count).toBe(0);
        expect(results[9].state.lowestLow).toBe(0);
        expect(results[10].state.count).toBe(1);
        expect(results[10].state.lowestLow).toBe(110.5);
    });

    it('substitutes the midpoint for a zero-range bar nine and reports it', () => {
        const bars = barsFromCloses(linearCloses(14));
        bars[12] = ohlc(112, 112, 112, 112);
        const results = runSetup(bars);

        expect(results[12].state.bar9RangePct).toBe(DEGENERATE_RANGE_PCT);
        expect(results[12].diagnostics).toHaveLength(1);
        expect(results[12].diagnostics[0].kind).toBe(DiagnosticKind.DEGENERATE_RANGE);
        expect(results[12].diagnostics[0].barIndex).toBe(12);
        expect(results[13].diagnostics).toHaveLength(0);
    });

    it('records the close location of bar nine', () => {
        const bars = barsFromCloses(linearCloses(14));
        bars[12] = ohlc(111, 113, 111, 112.5);
        const results = runSetup(bars);

        expect(results[12].state.bar9RangePct).toBeCloseTo(0.75);
        expect(results[13].state.bar9RangePct).toBeCloseTo(0.75);
    });

    describe('completion policy', () => {
        const closes = [...linearCloses(13), 100, 101];

        it('keeps bars-since counting after a break when sticky', () => {
            const results = runSetup(barsFromCloses(closes));
            const broken = results[13].state;

            expect(broken.count).toBe(0);
            expect(broken.complete).toBe(false);
            expect(broken.barsSinceSetup9).toBe(1);
            expect(broken.highestCloseSinceSetup9).toBe(112);
            expect(results[14].state.barsSinceSetup9).toBe(2);
        });

        it('forgets the completed setup after a break with resetOnBreak', () => {
            const config = testConfig({ policies: { setupCompletion: 'resetOnBreak' } });
            const results = runSetup(barsFromCloses(closes), config);

            expect(results[13].state.phase.kind).toBe(SetupPhaseKind.IDLE);
            expect(results[13].state.barsSinceSetup9).toBe(0);
            expect(results[13].state.highestCloseSinceSetup9).toBe(0);
        });
    });

    it('uses the configured comparison offset', () => {
        const config = testConfig({ setup: { comparisonOffset: 2 } });
        const results = runSetup([barAt(100), barAt(101), barAt(102)], config);
        expect(results[2].state.count).toBe(1);
    });
});
