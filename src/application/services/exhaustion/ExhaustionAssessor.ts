import { injectable, inject } from 'inversify';
import { ExhaustionAssessment, IExhaustionAssessor } from '../../../domain/interfaces/IExhaustionAssessor';
import { Bar } from '../../../domain/entities/Bar';
import { ExhaustionLevel } from '../../../domain/enums/ExhaustionLevel';
import { SetupPhaseKind } from '../../../domain/enums/SetupPhaseKind';
import { IndicatorState } from '../../../domain/types/IndicatorState';
import { IndicatorConfig } from '../../../config/indicator.config';
import { TYPES } from '../../../config/types';
import { maxOf, mean, minOf } from '../../../shared/math/rolling';

/**
 * Grades how far an up-move has run out of steam:
 * Setup 9 (maturing) → Countdown 11-12 (vulnerable) → Countdown 13
 * (exhausted) → TDST support broken (confirmed).
 */
@injectable()
export class ExhaustionAssessor implements IExhaustionAssessor {
    private readonly settings: IndicatorConfig['exhaustion'];
    private readonly countdownTarget: number;

    constructor(
        @inject(TYPES.IndicatorConfig) config: IndicatorConfig
    ) {
        this.settings = config.exhaustion;
        this.countdownTarget = config.countdown.target;
    }

    assess(state: IndicatorState, bars: readonly Bar[]): ExhaustionAssessment {
        const history = bars.slice(0, state.index + 1);
        if (history.length < this.settings.minBars) {
            return {
                level: ExhaustionLevel.NONE,
                signals: [],
                stallDetected: false,
                rangeCompression: false,
                warmedUp: false
            };
        }

        const { stallDetected, rangeCompression } = this.detectStall(history);
        const matured = state.setupPhase.kind === SetupPhaseKind.COMPLETED;
        const countdown = state.countdown;
        const tdstBroken = state.tdstSupportViolated;

        const signals: string[] = [];
        if (matured) signals.push('Setup 9 Complete');
        if (countdown >= this.settings.vulnerableCountdown && countdown < this.countdownTarget) {
            signals.push(`Countdown ${countdown}/${this.countdownTarget}`);
        }
        if (countdown >= this.countdownTarget) signals.push(`Countdown ${this.countdownTarget} Complete`);
        if (!state.ma1Active && matured) signals.push('TD MA I Failed');
        if (stallDetected) signals.push('Stall Detected');
        if (rangeCompression) signals.push('Range Compression');
        if (tdstBroken) signals.push('TDST Broken');

        let level = ExhaustionLevel.NONE;
        if (tdstBroken) level = ExhaustionLevel.CONFIRMED;
        else if (countdown >= this.countdownTarget) level = ExhaustionLevel.EXHAUSTED;
        else if (countdown >= this.settings.vulnerableCountdown) level = ExhaustionLevel.VULNERABLE;
        else if (matured) level = ExhaustionLevel.MATURING;

        return { level, signals, stallDetected, rangeCompression, warmedUp: true };
    }

    /**
     * Range compression: recent bar ranges shrink against the block before.
     * Stall: recent closes overlap inside a fraction of the average range.
     */
    private detectStall(history: readonly Bar[]): { stallDetected: boolean; rangeCompression: boolean } {
        const n = this.settings.recentBars;
        const recent = history.slice(-n);
        const prior = history.length >= n * 2 ? history.slice(-n * 2, -n) : recent;

        const avgRecentRange = mean(recent.map(bar => bar.range));
        const avgPriorRange = mean(prior.map(bar => bar.range));
        const rangeCompression = avgPriorRange > 0 && avgRecentRange < avgPriorRange * this.settings.compressionRatio;

        const closes = recent.map(bar => bar.close);
        const closeSpread = maxOf(closes) - minOf(closes);
        const stallDetected = avgRecentRange > 0 && closeSpread < avgRecentRange * this.settings.stallRatio;

        return { stallDetected, rangeCompression };
    }
}
