import { Bar } from '../entities/Bar';
import { CalculatorName } from '../enums/CalculatorName';
import { IndicatorDiagnostic } from './Diagnostics';
import { SetupPhase } from './SetupPhase';

export type WarmupStatus = Record<CalculatorName, boolean>;

/**
 * Combined per-bar record produced by the indicator engine.
 */
export interface IndicatorState {
    readonly index: number;
    readonly bar: Bar;

    // TD MA I / II
    readonly ma1Active: boolean;
    readonly ma1Value: number;
    readonly ma2Active: boolean;
    readonly ma2Value: number;
    readonly tdEntryValid: boolean;

    // TD Setup
    readonly setupCount: number;
    readonly setupComplete: boolean;
    readonly setupPhase: SetupPhase;
    readonly setupBar9Close: number;
    readonly setupBar9RangePct: number;
    readonly setupLowestLow: number;
    readonly barsSinceSetup9: number;
    readonly highestCloseSinceSetup9: number;

    // TDST
    readonly tdstSupport: number;
    readonly tdstActive: boolean;
    readonly tdstSupportViolated: boolean;
    readonly tdstResistance: number;
    readonly tdstResActive: boolean;
    readonly tdstResBroken: boolean;

    // TD Countdown
    readonly countdown: number;
    readonly countdownComplete: boolean;

    // Swing structure
    readonly recentHigherLow: number;

    // MA II fast/slow crossover filter
    readonly ma2Fast: number;
    readonly ma2Slow: number;
    readonly ma2FastRising: boolean;
    readonly ma2SlowRising: boolean;
    readonly ma2CrossoverEntryValid: boolean;
    readonly ma2FastBelowSlow: boolean;

    readonly warmup: Readonly<WarmupStatus>;
    readonly diagnostics: readonly IndicatorDiagnostic[];
}
