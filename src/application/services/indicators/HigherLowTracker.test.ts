import { HigherLowTracker } from './HigherLowTracker';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { HigherLowState } from '../../../domain/types/CalculatorStates';
import { ohlc } from '../../../shared/testing/bars';

function runLows(lows: number[]): HigherLowState[] {
    const bars = lows.map(low => ohlc(low + 1, low + 2, low, low + 1));
    const tracker = new HigherLowTracker();
    let state = tracker.initial();
    return bars.map((_, index) => {
        state = tracker.step(state, new BarWindow(bars, index)).state;
        return state;
    });
}

describe('HigherLowTracker', () => {
    it('confirms a higher low one bar after it is seen', () => {
        const states = runLows([10, 11, 12, 11, 13, 14]);
        expect(states.map(state => state.recentHigherLow)).toEqual([0, 0, 10, 10, 10, 11]);
    });

    it('holds a candidate pending for exactly one bar', () => {
        const states = runLows([10, 11, 12]);
        expect(states[1].pending).toBe(10);
        expect(states[2].pending).toBeNull();
    });

    it('never lowers the recorded higher low', () => {
        const states = runLows([20, 21, 22, 15, 16, 17]);
        expect(states.map(state => state.recentHigherLow)).toEqual([0, 0, 20, 20, 20, 20]);
    });

    it('is not warmed up on the first bar', () => {
        const states = runLows([10, 11]);
        expect(states[0].warmedUp).toBe(false);
        expect(states[1].warmedUp).toBe(true);
    });
});
