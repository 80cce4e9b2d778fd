import { IBarCalculator } from '../../../domain/interfaces/IBarCalculator';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { CalculatorName } from '../../../domain/enums/CalculatorName';
import { DiagnosticKind } from '../../../domain/enums/DiagnosticKind';
import { SetupPhaseKind } from '../../../domain/enums/SetupPhaseKind';
import { IndicatorDiagnostic } from '../../../domain/types/Diagnostics';
import { SetupCounterState, StepResult } from '../../../domain/types/CalculatorStates';
import { IDLE_PHASE } from '../../../domain/types/SetupPhase';
import { IndicatorConfig } from '../../../config/indicator.config';
import { SetupPhaseMachine } from '../state/SetupPhaseMachine';

/** Close location substituted for a zero-range Setup bar 9 */
export const DEGENERATE_RANGE_PCT = 0.5;

/**
 * Bullish TD Sequential Setup (9-count): close above the close
 * `comparisonOffset` bars earlier on consecutive bars.
 */
export class SequentialSetupCounter implements IBarCalculator<SetupCounterState> {
    readonly name = CalculatorName.SETUP;
    readonly minHistory: number;

    private readonly offset: number;
    private readonly completionCount: number;
    private readonly machine: SetupPhaseMachine;

    constructor(config: IndicatorConfig) {
        this.offset = config.setup.comparisonOffset;
        this.completionCount = config.setup.completionCount;
        this.minHistory = this.offset + 1;
        this.machine = new SetupPhaseMachine(this.completionCount, config.policies.setupCompletion);
    }

    initial(): SetupCounterState {
        return {
            run: 0,
            count: 0,
            complete: false,
            justCompleted: false,
            phase: IDLE_PHASE,
            bar9Close: 0,
            bar9RangePct: 0,
            lowestLow: 0,
            barsSinceSetup9: 0,
            highestCloseSinceSetup9: 0,
            warmedUp: false
        };
    }

    step(previous: SetupCounterState, window: BarWindow): StepResult<SetupCounterState> {
        if (window.index < this.offset) {
            return { state: { ...previous, warmedUp: false }, diagnostics: [] };
        }

        const bar = window.current;
        const qualifies = bar.close > window.ago(this.offset).close;
        const phase = this.machine.next(previous.phase, qualifies, bar.close);
        const run = SetupPhaseMachine.runLength(phase);
        const diagnostics: IndicatorDiagnostic[] = [];

        let lowestLow = 0;
        if (qualifies) {
            if (run === 1) lowestLow = bar.low;
            else if (run <= this.completionCount) lowestLow = Math.min(previous.lowestLow, bar.low);
            else lowestLow = previous.lowestLow;
        }

        const justCompleted = run === this.completionCount;
        let bar9Close = previous.bar9Close;
        let bar9RangePct = previous.bar9RangePct;
        if (justCompleted) {
            bar9Close = bar.close;
            const location = bar.closeLocation;
            if (location === null) {
                diagnostics.push({
                    kind: DiagnosticKind.DEGENERATE_RANGE,
                    calculator: this.name,
                    barIndex: window.index,
                    message: `Setup bar ${this.completionCount} has zero range; close location set to ${DEGENERATE_RANGE_PCT}`
                });
            }
            bar9RangePct = location ?? DEGENERATE_RANGE_PCT;
        }

        const completed = phase.kind === SetupPhaseKind.COMPLETED ? phase : null;
        const state: SetupCounterState = {
            run,
            count: Math.min(run, this.completionCount),
            complete: run >= this.completionCount,
            justCompleted,
            phase,
            bar9Close,
            bar9RangePct,
            lowestLow,
            barsSinceSetup9: completed ? completed.barsSince : 0,
            highestCloseSinceSetup9: completed ? completed.bestClose : 0,
            warmedUp: true
        };
        return { state, diagnostics };
    }
}
