import { CountdownCounter, SetupTransition } from './CountdownCounter';
import { Bar } from '../../../domain/entities/Bar';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { CountdownState } from '../../../domain/types/CalculatorStates';
import { IndicatorConfig } from '../../../config/indicator.config';
import { barsFromCloses, linearCloses, testConfig } from '../../../shared/testing/bars';

const EDGE: SetupTransition = { previousCount: 8, count: 9 };
const HOLD: SetupTransition = { previousCount: 9, count: 9 };

function runCountdown(
    bars: Bar[],
    transitions: (index: number) => SetupTransition,
    config: IndicatorConfig = testConfig()
): CountdownState[] {
    const counter = new CountdownCounter(config);
    let state = counter.initial();
    return bars.map((_, index) => {
        state = counter.step(state, new BarWindow(bars, index), transitions(index)).state;
        return state;
    });
}

// Setup completes at bar 2 and holds afterwards
const completeAtTwo = (index: number): SetupTransition =>
    index < 2 ? { previousCount: 0, count: 0 } : index === 2 ? EDGE : HOLD;

describe('CountdownCounter', () => {
    const rising = barsFromCloses(linearCloses(20));

    it('is not warmed up before the comparison high exists', () => {
        const states = runCountdown(rising, completeAtTwo);
        expect(states[1].warmedUp).toBe(false);
        expect(states[2].warmedUp).toBe(true);
    });

    it('starts counting on the bar after Setup completion by default', () => {
        const states = runCountdown(rising, completeAtTwo);
        expect(states[2].value).toBe(0);
        expect(states[2].counting).toBe(true);
        expect(states[3].value).toBe(1);
    });

    it('counts the Setup bar itself under the setupBar policy', () => {
        const config = testConfig({ policies: { countdownStart: 'setupBar' } });
        const states = runCountdown(rising, completeAtTwo, config);
        expect(states[2].value).toBe(1);
        expect(states[14].value).toBe(13);
    });

    it('completes at thirteen and stays there', () => {
        const states = runCountdown(rising, completeAtTwo);
        expect(states[14].value).toBe(12);
        expect(states[14].complete).toBe(false);
        expect(states[15].value).toBe(13);
        expect(states[15].complete).toBe(true);
        expect(states[19].value).toBe(13);
    });

    it('ignores bars closing below the high two bars earlier', () => {
        const flat = barsFromCloses(Array(8).fill(100));
        const states = runCountdown(flat, completeAtTwo);
        expect(states[7].counting).toBe(true);
        expect(states[7].value).toBe(0);
    });

    it('resets when a new Setup run begins', () => {
        const transitions = (index: number): SetupTransition => {
            if (index === 8) return { previousCount: 9, count: 0 };
            if (index === 9) return { previousCount: 0, count: 1 };
            if (index === 10) return { previousCount: 1, count: 2 };
            return completeAtTwo(index);
        };
        const states = runCountdown(rising, transitions);

        expect(states[8].value).toBe(6);
        expect(states[9].value).toBe(0);
        expect(states[9].counting).toBe(false);
        expect(states[10].value).toBe(0);
    });

    it('never counts without a completed Setup', () => {
        const states = runCountdown(rising, () => ({ previousCount: 0, count: 0 }));
        expect(states.every(state => state.value === 0)).toBe(true);
    });
});
