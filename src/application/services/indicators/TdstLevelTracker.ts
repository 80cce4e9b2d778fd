import { IBarCalculator } from '../../../domain/interfaces/IBarCalculator';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { CalculatorName } from '../../../domain/enums/CalculatorName';
import { StepResult, TdstState } from '../../../domain/types/CalculatorStates';
import { IndicatorConfig } from '../../../config/indicator.config';
import { maxOf, minOf } from '../../../shared/math/rolling';
import { SetupTransition } from './CountdownCounter';

/**
 * TDST levels from the first bars of a completed Setup.
 *
 * Support: lowest low of bars 1-4 of a bullish Setup, dropped on the first
 * close beneath it. Resistance: highest high of bars 1-4 of a bearish Setup,
 * dropped on the first close above it (flagged as broken on that bar only).
 */
export class TdstLevelTracker implements IBarCalculator<TdstState, SetupTransition> {
    readonly name = CalculatorName.TDST;
    readonly minHistory: number;

    private readonly completionCount: number;
    private readonly offset: number;
    private readonly spanFrom: number;
    private readonly spanTo: number;

    constructor(config: IndicatorConfig) {
        this.completionCount = config.setup.completionCount;
        this.offset = config.setup.comparisonOffset;
        this.spanFrom = this.completionCount - 1;
        this.spanTo = this.completionCount - Math.min(config.setup.tdstBars, this.completionCount);
        this.minHistory = this.completionCount;
    }

    initial(): TdstState {
        return {
            support: 0,
            supportLevel: 0,
            supportActive: false,
            supportViolated: false,
            bearishRun: 0,
            bearishCount: 0,
            resistance: 0,
            resistanceLevel: 0,
            resistanceActive: false,
            resistanceBroken: false,
            warmedUp: false
        };
    }

    step(previous: TdstState, window: BarWindow, setup: SetupTransition): StepResult<TdstState> {
        const close = window.current.close;
        const hasSetupBars = window.index >= this.spanFrom;

        // Support
        let supportLevel = previous.supportLevel;
        let supportActive = previous.supportActive;
        let supportViolated = previous.supportViolated;

        if (hasSetupBars && this.isCompletionEdge(setup.previousCount, setup.count)) {
            supportLevel = minOf(window.span(this.spanFrom, this.spanTo).map(bar => bar.low));
            supportActive = true;
            supportViolated = false;
        }
        if (supportActive && close < supportLevel) {
            supportActive = false;
            supportViolated = true;
        }

        // Resistance, from the bearish mirror run
        let bearishRun = 0;
        if (window.index >= this.offset && close < window.ago(this.offset).close) {
            bearishRun = previous.bearishRun + 1;
        }
        const bearishCount = Math.min(bearishRun, this.completionCount);

        let resistanceLevel = previous.resistanceLevel;
        let resistanceActive = previous.resistanceActive;
        if (hasSetupBars && this.isCompletionEdge(previous.bearishCount, bearishCount)) {
            resistanceLevel = maxOf(window.span(this.spanFrom, this.spanTo).map(bar => bar.high));
            resistanceActive = true;
        }
        let resistanceBroken = false;
        if (resistanceActive && close > resistanceLevel) {
            resistanceBroken = true;
            resistanceActive = false;
        }

        const state: TdstState = {
            support: supportActive ? supportLevel : 0,
            supportLevel,
            supportActive,
            supportViolated,
            bearishRun,
            bearishCount,
            resistance: resistanceActive || resistanceBroken ? resistanceLevel : 0,
            resistanceLevel,
            resistanceActive,
            resistanceBroken,
            warmedUp: hasSetupBars
        };
        return { state, diagnostics: [] };
    }

    private isCompletionEdge(previousCount: number, count: number): boolean {
        return count === this.completionCount && previousCount < this.completionCount;
    }
}
