import { Bar } from '../../../domain/entities/Bar';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { CalculatorName } from '../../../domain/enums/CalculatorName';
import { IndicatorDiagnostic } from '../../../domain/types/Diagnostics';
import { IndicatorState } from '../../../domain/types/IndicatorState';
import {
    CountdownState,
    HigherLowState,
    Ma2CrossoverState,
    MovingAverageTriggerState,
    SetupCounterState,
    TdstState
} from '../../../domain/types/CalculatorStates';
import { IndicatorConfig } from '../../../config/indicator.config';
import { MovingAverageTrigger } from './MovingAverageTrigger';
import { SequentialSetupCounter } from './SequentialSetupCounter';
import { CountdownCounter } from './CountdownCounter';
import { TdstLevelTracker } from './TdstLevelTracker';
import { HigherLowTracker } from './HigherLowTracker';
import { Ma2CrossoverFilter } from './Ma2CrossoverFilter';

/** Internal state of every calculator after a bar */
export interface PipelineCarry {
    ma1: MovingAverageTriggerState;
    ma2: MovingAverageTriggerState;
    setup: SetupCounterState;
    countdown: CountdownState;
    tdst: TdstState;
    higherLow: HigherLowState;
    crossover: Ma2CrossoverState;
}

export interface PipelineStep {
    carry: PipelineCarry;
    state: IndicatorState;
}

/**
 * Composes the calculators into one `step(carry, window)` transition.
 * Holds no series state of its own.
 */
export class IndicatorPipeline {
    private readonly ma1: MovingAverageTrigger;
    private readonly ma2: MovingAverageTrigger;
    private readonly setup: SequentialSetupCounter;
    private readonly countdown: CountdownCounter;
    private readonly tdst: TdstLevelTracker;
    private readonly higherLow = new HigherLowTracker();
    private readonly crossover: Ma2CrossoverFilter;

    constructor(config: IndicatorConfig) {
        this.ma1 = MovingAverageTrigger.tdMa1(config);
        this.ma2 = MovingAverageTrigger.tdMa2(config);
        this.setup = new SequentialSetupCounter(config);
        this.countdown = new CountdownCounter(config);
        this.tdst = new TdstLevelTracker(config);
        this.crossover = new Ma2CrossoverFilter(config.crossover);
    }

    minHistory(name: CalculatorName): number {
        switch (name) {
            case CalculatorName.TD_MA1: return this.ma1.minHistory;
            case CalculatorName.TD_MA2: return this.ma2.minHistory;
            case CalculatorName.SETUP: return this.setup.minHistory;
            case CalculatorName.COUNTDOWN: return this.countdown.minHistory;
            case CalculatorName.TDST: return this.tdst.minHistory;
            case CalculatorName.HIGHER_LOW: return this.higherLow.minHistory;
            case CalculatorName.MA2_CROSSOVER: return this.crossover.minHistory;
        }
    }

    initial(): PipelineCarry {
        return {
            ma1: this.ma1.initial(),
            ma2: this.ma2.initial(),
            setup: this.setup.initial(),
            countdown: this.countdown.initial(),
            tdst: this.tdst.initial(),
            higherLow: this.higherLow.initial(),
            crossover: this.crossover.initial()
        };
    }

    step(previous: PipelineCarry, window: BarWindow): PipelineStep {
        const ma1 = this.ma1.step(previous.ma1, window);
        const ma2 = this.ma2.step(previous.ma2, window);
        const setup = this.setup.step(previous.setup, window);

        const transition = { previousCount: previous.setup.count, count: setup.state.count };
        const countdown = this.countdown.step(previous.countdown, window, transition);
        const tdst = this.tdst.step(previous.tdst, window, transition);
        const higherLow = this.higherLow.step(previous.higherLow, window);
        const crossover = this.crossover.step(previous.crossover, window);

        const carry: PipelineCarry = {
            ma1: ma1.state,
            ma2: ma2.state,
            setup: setup.state,
            countdown: countdown.state,
            tdst: tdst.state,
            higherLow: higherLow.state,
            crossover: crossover.state
        };
        const diagnostics: IndicatorDiagnostic[] = [
            ...ma1.diagnostics,
            ...ma2.diagnostics,
            ...setup.diagnostics,
            ...countdown.diagnostics,
            ...tdst.diagnostics,
            ...higherLow.diagnostics,
            ...crossover.diagnostics
        ];

        return { carry, state: this.snapshot(carry, window, diagnostics) };
    }

    private snapshot(carry: PipelineCarry, window: BarWindow, diagnostics: IndicatorDiagnostic[]): IndicatorState {
        const { ma1, ma2, setup, countdown, tdst, higherLow, crossover } = carry;
        return Object.freeze({
            index: window.index,
            bar: window.current,

            ma1Active: ma1.active,
            ma1Value: ma1.value,
            ma2Active: ma2.active,
            ma2Value: ma2.value,
            tdEntryValid: ma1.active && ma2.active,

            setupCount: setup.count,
            setupComplete: setup.complete,
            setupPhase: setup.phase,
            setupBar9Close: setup.bar9Close,
            setupBar9RangePct: setup.bar9RangePct,
            setupLowestLow: setup.lowestLow,
            barsSinceSetup9: setup.barsSinceSetup9,
            highestCloseSinceSetup9: setup.highestCloseSinceSetup9,

            tdstSupport: tdst.support,
            tdstActive: tdst.supportActive,
            tdstSupportViolated: tdst.supportViolated,
            tdstResistance: tdst.resistance,
            tdstResActive: tdst.resistanceActive,
            tdstResBroken: tdst.resistanceBroken,

            countdown: countdown.value,
            countdownComplete: countdown.complete,

            recentHigherLow: higherLow.recentHigherLow,

            ma2Fast: crossover.fast,
            ma2Slow: crossover.slow,
            ma2FastRising: crossover.fastRising,
            ma2SlowRising: crossover.slowRising,
            ma2CrossoverEntryValid: crossover.entryValid,
            ma2FastBelowSlow: crossover.fastBelowSlow,

            warmup: Object.freeze({
                [CalculatorName.TD_MA1]: ma1.warmedUp,
                [CalculatorName.TD_MA2]: ma2.warmedUp,
                [CalculatorName.SETUP]: setup.warmedUp,
                [CalculatorName.COUNTDOWN]: countdown.warmedUp,
                [CalculatorName.TDST]: tdst.warmedUp,
                [CalculatorName.HIGHER_LOW]: higherLow.warmedUp,
                [CalculatorName.MA2_CROSSOVER]: crossover.warmedUp
            }),
            diagnostics: Object.freeze(diagnostics)
        });
    }
}

/**
 * Folds the whole series through a fresh pipeline.
 */
export function foldIndicators(bars: readonly Bar[], config: IndicatorConfig): IndicatorState[] {
    const pipeline = new IndicatorPipeline(config);
    const states: IndicatorState[] = [];
    let carry = pipeline.initial();
    for (let index = 0; index < bars.length; index++) {
        const next = pipeline.step(carry, new BarWindow(bars, index));
        carry = next.carry;
        states.push(next.state);
    }
    return states;
}
