import { IBarCalculator } from '../../../domain/interfaces/IBarCalculator';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { CalculatorName } from '../../../domain/enums/CalculatorName';
import { CountdownState, StepResult } from '../../../domain/types/CalculatorStates';
import { IndicatorConfig, IndicatorPolicies } from '../../../config/indicator.config';

export interface SetupTransition {
    previousCount: number;
    count: number;
}

/**
 * Bullish TD Countdown (13-count). Armed by the Setup-9 rising edge,
 * disarmed by the start of a new Setup run; qualifying bars need not be
 * consecutive.
 */
export class CountdownCounter implements IBarCalculator<CountdownState, SetupTransition> {
    readonly name = CalculatorName.COUNTDOWN;
    readonly minHistory: number;

    private readonly target: number;
    private readonly highOffset: number;
    private readonly completionCount: number;
    private readonly start: IndicatorPolicies['countdownStart'];

    constructor(config: IndicatorConfig) {
        this.target = config.countdown.target;
        this.highOffset = config.countdown.highOffset;
        this.completionCount = config.setup.completionCount;
        this.start = config.policies.countdownStart;
        this.minHistory = this.highOffset + 1;
    }

    initial(): CountdownState {
        return { counting: false, value: 0, complete: false, warmedUp: false };
    }

    step(previous: CountdownState, window: BarWindow, setup: SetupTransition): StepResult<CountdownState> {
        if (window.index < this.highOffset) {
            return { state: { ...previous, warmedUp: false }, diagnostics: [] };
        }

        let counting = previous.counting;
        let value = previous.value;

        const setupEdge = setup.count === this.completionCount && setup.previousCount < this.completionCount;
        if (setupEdge) {
            counting = true;
            value = 0;
        }

        const evaluate = counting && value < this.target && !(setupEdge && this.start === 'nextBar');
        if (evaluate && window.current.close >= window.ago(this.highOffset).high) {
            value += 1;
        }

        // new Setup run
        if (setup.count === 1 && setup.previousCount !== 1) {
            counting = false;
            value = 0;
        }

        return {
            state: { counting, value, complete: value >= this.target, warmedUp: true },
            diagnostics: []
        };
    }
}
