import { BarWindow } from '../value-objects/BarWindow';
import { CalculatorName } from '../enums/CalculatorName';
import { StepResult } from '../types/CalculatorStates';

/**
 * A pure per-bar fold step. `deps` carries outputs of calculators that run
 * earlier in the same bar.
 */
export interface IBarCalculator<S, D = void> {
    readonly name: CalculatorName;
    /** Bars needed before the output is meaningful */
    readonly minHistory: number;
    initial(): S;
    step(previous: S, window: BarWindow, deps: D): StepResult<S>;
}
