import { IBarCalculator } from '../../../domain/interfaces/IBarCalculator';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { CalculatorName } from '../../../domain/enums/CalculatorName';
import { HigherLowState, StepResult } from '../../../domain/types/CalculatorStates';

/**
 * Swing higher lows, confirmed one bar after the candidate is seen.
 * Only one candidate is pending at a time.
 */
export class HigherLowTracker implements IBarCalculator<HigherLowState> {
    readonly name = CalculatorName.HIGHER_LOW;
    readonly minHistory = 2;

    initial(): HigherLowState {
        return { recentHigherLow: 0, pending: null, warmedUp: false };
    }

    step(previous: HigherLowState, window: BarWindow): StepResult<HigherLowState> {
        if (window.index === 0) {
            return { state: { ...previous, warmedUp: false }, diagnostics: [] };
        }

        let { recentHigherLow, pending } = previous;
        const priorLow = window.ago(1).low;

        if (pending === null && window.current.low > priorLow) {
            pending = priorLow;
        } else if (pending !== null) {
            if (pending > recentHigherLow) recentHigherLow = pending;
            pending = null;
        }

        return { state: { recentHigherLow, pending, warmedUp: true }, diagnostics: [] };
    }
}
