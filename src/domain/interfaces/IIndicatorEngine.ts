import { Bar } from '../entities/Bar';
import { CalculatorName } from '../enums/CalculatorName';
import { IndicatorState } from '../types/IndicatorState';

export interface LatestStateOptions {
    /** Throw InsufficientHistoryError unless these calculators are warmed up */
    requireWarmup?: boolean | readonly CalculatorName[];
}

export interface IIndicatorEngine {
    push(bar: Bar): IndicatorState;
    run(bars: Iterable<Bar>): IndicatorState[];
    stream(bars: Iterable<Bar>): Generator<IndicatorState, void, undefined>;
    getLatestState(): IndicatorState | null;
    requireLatestState(options?: LatestStateOptions): IndicatorState;
    getHistory(): readonly IndicatorState[];
    getBars(): readonly Bar[];
    reset(): void;
}
