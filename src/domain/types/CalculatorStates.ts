import { IndicatorDiagnostic } from './Diagnostics';
import { SetupPhase } from './SetupPhase';

export interface MovingAverageTriggerState {
    active: boolean;
    value: number;
    barsRemaining: number;
    triggered: boolean;
    warmedUp: boolean;
}

export interface SetupCounterState {
    /** Unbounded run length */
    run: number;
    count: number;
    complete: boolean;
    /** true only on the bar where the run first reaches 9 */
    justCompleted: boolean;
    phase: SetupPhase;
    bar9Close: number;
    bar9RangePct: number;
    lowestLow: number;
    barsSinceSetup9: number;
    highestCloseSinceSetup9: number;
    warmedUp: boolean;
}

export interface CountdownState {
    counting: boolean;
    value: number;
    complete: boolean;
    warmedUp: boolean;
}

export interface TdstState {
    support: number;
    supportLevel: number;
    supportActive: boolean;
    supportViolated: boolean;
    bearishRun: number;
    bearishCount: number;
    resistance: number;
    resistanceLevel: number;
    resistanceActive: boolean;
    resistanceBroken: boolean;
    warmedUp: boolean;
}

export interface HigherLowState {
    recentHigherLow: number;
    pending: number | null;
    warmedUp: boolean;
}

export interface Ma2CrossoverState {
    fast: number;
    slow: number;
    fastRising: boolean;
    slowRising: boolean;
    entryValid: boolean;
    fastBelowSlow: boolean;
    warmedUp: boolean;
}

/**
 * Result of one calculator step: the next state plus any policy events
 * raised while computing it.
 */
export interface StepResult<S> {
    state: S;
    diagnostics: IndicatorDiagnostic[];
}
