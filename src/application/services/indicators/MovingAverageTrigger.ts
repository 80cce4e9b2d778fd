import { IBarCalculator } from '../../../domain/interfaces/IBarCalculator';
import { Bar } from '../../../domain/entities/Bar';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { CalculatorName } from '../../../domain/enums/CalculatorName';
import { DiagnosticKind } from '../../../domain/enums/DiagnosticKind';
import { IndicatorDiagnostic } from '../../../domain/types/Diagnostics';
import { MovingAverageTriggerState, StepResult } from '../../../domain/types/CalculatorStates';
import { IndicatorConfig, IndicatorPolicies } from '../../../config/indicator.config';
import { maxOf, minOf, sma } from '../../../shared/math/rolling';

export type PriceField = 'low' | 'close';

/**
 * `aboveLowest`: value breaks above the lowest of the lookback (TD MA I).
 * `aboveHighest`: value breaks above the highest of the lookback (TD MA II).
 */
export type TriggerComparison = 'aboveLowest' | 'aboveHighest';

export interface MovingAverageTriggerOptions {
    name: CalculatorName;
    field: PriceField;
    comparison: TriggerComparison;
    lookbackPeriod: number;
    maPeriod: number;
    extensionBars: number;
    smaWarmup: IndicatorPolicies['smaWarmup'];
}

export class MovingAverageTrigger implements IBarCalculator<MovingAverageTriggerState> {
    readonly name: CalculatorName;
    readonly minHistory: number;

    constructor(private readonly options: MovingAverageTriggerOptions) {
        this.name = options.name;
        this.minHistory = Math.max(options.lookbackPeriod + 1, options.maPeriod);
    }

    /** TD MA I: low above the lowest low of the lookback, valued at SMA(low) */
    static tdMa1(config: IndicatorConfig): MovingAverageTrigger {
        return new MovingAverageTrigger({
            name: CalculatorName.TD_MA1,
            field: 'low',
            comparison: 'aboveLowest',
            ...config.movingAverage,
            smaWarmup: config.policies.smaWarmup
        });
    }

    /** TD MA II: close above the highest close of the lookback, valued at SMA(close) */
    static tdMa2(config: IndicatorConfig): MovingAverageTrigger {
        return new MovingAverageTrigger({
            name: CalculatorName.TD_MA2,
            field: 'close',
            comparison: 'aboveHighest',
            ...config.movingAverage,
            smaWarmup: config.policies.smaWarmup
        });
    }

    initial(): MovingAverageTriggerState {
        return { active: false, value: 0, barsRemaining: 0, triggered: false, warmedUp: false };
    }

    step(previous: MovingAverageTriggerState, window: BarWindow): StepResult<MovingAverageTriggerState> {
        const { lookbackPeriod, maPeriod, extensionBars, smaWarmup } = this.options;
        const diagnostics: IndicatorDiagnostic[] = [];

        let barsRemaining = previous.barsRemaining;
        let windowValue = previous.value;
        let triggered = false;

        if (window.index >= lookbackPeriod && this.fires(window)) {
            const average = this.average(window);
            if (average === null) {
                diagnostics.push({
                    kind: DiagnosticKind.INSUFFICIENT_HISTORY,
                    calculator: this.name,
                    barIndex: window.index,
                    message: `SMA(${this.options.field}, ${maPeriod}) undefined at trigger; policy '${smaWarmup}'`
                });
                if (smaWarmup === 'zero') {
                    barsRemaining = extensionBars;
                    windowValue = 0;
                    triggered = true;
                }
            } else {
                barsRemaining = extensionBars;
                windowValue = average;
                triggered = true;
            }
        }

        const active = barsRemaining > 0;
        const state: MovingAverageTriggerState = {
            active,
            value: active ? windowValue : 0,
            barsRemaining: active ? barsRemaining - 1 : 0,
            triggered,
            warmedUp: window.index >= lookbackPeriod && window.index >= maPeriod - 1
        };
        return { state, diagnostics };
    }

    private fires(window: BarWindow): boolean {
        const prior = window.span(this.options.lookbackPeriod, 1).map(bar => this.pick(bar));
        const current = this.pick(window.current);
        return this.options.comparison === 'aboveLowest'
            ? current > minOf(prior)
            : current > maxOf(prior);
    }

    private average(window: BarWindow): number | null {
        const { maPeriod } = this.options;
        if (!window.hasHistory(maPeriod - 1)) return null;
        return sma(window.span(maPeriod - 1, 0).map(bar => this.pick(bar)), maPeriod);
    }

    private pick(bar: Bar): number {
        return this.options.field === 'low' ? bar.low : bar.close;
    }
}
