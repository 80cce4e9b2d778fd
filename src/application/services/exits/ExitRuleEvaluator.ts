import { injectable, inject } from 'inversify';
import { IExitRuleEvaluator } from '../../../domain/interfaces/IExitRuleEvaluator';
import { PositionContext } from '../../../domain/entities/Position';
import { ExitReason } from '../../../domain/enums/ExitReason';
import { Tranche } from '../../../domain/enums/Tranche';
import { IndicatorState } from '../../../domain/types/IndicatorState';
import { ExitSignal } from '../../../domain/value-objects/ExitSignal';
import { IndicatorConfig } from '../../../config/indicator.config';
import { TYPES } from '../../../config/types';

/**
 * Three independent exit gates for a long position split in tranches.
 * Stateless: every answer depends only on the arguments.
 */
@injectable()
export class ExitRuleEvaluator implements IExitRuleEvaluator {
    private readonly exits: IndicatorConfig['exits'];

    constructor(
        @inject(TYPES.IndicatorConfig) config: IndicatorConfig
    ) {
        this.exits = config.exits;
    }

    /**
     * Tranche 1 (de-risk): close under TD MA I, or no follow-through after
     * Setup 9 (no higher close since bar 9 plus a weak bar 9 or a close
     * back under it).
     */
    checkTranche1(close: number, state: IndicatorState): ExitSignal {
        const fraction = this.exits.tranche1Fraction;

        if (state.ma1Active && close < state.ma1Value) {
            return ExitSignal.exit(Tranche.DE_RISK, fraction, ExitReason.CLOSE_BELOW_TD_MA1);
        }

        if (state.setupComplete && state.barsSinceSetup9 >= this.exits.followThroughBars) {
            const noExpansion = state.highestCloseSinceSetup9 <= state.setupBar9Close;
            const weakBar9 = state.setupBar9RangePct < this.exits.weakCloseRangePct;
            const closesBelowBar9 = close < state.setupBar9Close;

            if (noExpansion && (weakBar9 || closesBelowBar9)) {
                return ExitSignal.exit(Tranche.DE_RISK, fraction, ExitReason.FAILED_FOLLOW_THROUGH);
            }
        }

        return ExitSignal.hold(Tranche.DE_RISK, fraction);
    }

    /**
     * Tranche 2 (structural): close under active TDST support, or under the
     * lowest low of the Setup run.
     */
    checkTranche2(close: number, state: IndicatorState, setupLowestLow: number): ExitSignal {
        const fraction = this.exits.tranche2Fraction;

        if (state.tdstActive && close < state.tdstSupport) {
            return ExitSignal.exit(Tranche.STRUCTURAL, fraction, ExitReason.TDST_SUPPORT_BREACH);
        }

        if (setupLowestLow > 0 && close < setupLowestLow) {
            return ExitSignal.exit(Tranche.STRUCTURAL, fraction, ExitReason.SETUP_VALIDITY_BREACH);
        }

        return ExitSignal.hold(Tranche.STRUCTURAL, fraction);
    }

    /**
     * Tranche 3 (runner): Countdown 13 with a close under TD MA II, a
     * higher-low break, or the time stop.
     */
    checkTranche3(close: number, state: IndicatorState, position: PositionContext): ExitSignal {
        const fraction = this.exits.tranche3Fraction;

        if (state.countdownComplete && state.ma2Active && close < state.ma2Value) {
            return ExitSignal.exit(Tranche.RUNNER, fraction, ExitReason.COUNTDOWN_EXHAUSTION);
        }

        if (state.recentHigherLow > 0 && close < state.recentHigherLow) {
            return ExitSignal.exit(Tranche.RUNNER, fraction, ExitReason.HIGHER_LOW_BREAK);
        }

        // TODO: the time stop can never fire once a Setup is complete; revisit once the intended "advanced 1R" rule is pinned down
        if (position.daysHeld >= this.timeLimit(state) && close <= position.entryPrice && !state.setupComplete) {
            return ExitSignal.exit(Tranche.RUNNER, fraction, ExitReason.TIME_STOP);
        }

        return ExitSignal.hold(Tranche.RUNNER, fraction);
    }

    evaluateAll(close: number, state: IndicatorState, position: PositionContext): [ExitSignal, ExitSignal, ExitSignal] {
        return [
            this.checkTranche1(close, state),
            this.checkTranche2(close, state, state.setupLowestLow),
            this.checkTranche3(close, state, position)
        ];
    }

    private timeLimit(state: IndicatorState): number {
        const { timeStopDays, timeStopBarsAfterSetup } = this.exits;
        return state.setupComplete
            ? Math.max(timeStopDays, state.barsSinceSetup9 + timeStopBarsAfterSetup)
            : timeStopDays;
    }
}
