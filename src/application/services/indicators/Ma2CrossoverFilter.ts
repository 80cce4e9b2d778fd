import { IBarCalculator } from '../../../domain/interfaces/IBarCalculator';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { CalculatorName } from '../../../domain/enums/CalculatorName';
import { Ma2CrossoverState, StepResult } from '../../../domain/types/CalculatorStates';
import { IndicatorConfig } from '../../../config/indicator.config';
import { sma } from '../../../shared/math/rolling';

/**
 * TD MA II fast/slow filter: SMA(close, 3) against SMA(close, 34).
 * Each average is "rising" when it is not below its own value a few bars
 * back; an entry is valid when both rise and fast sits above slow.
 */
export class Ma2CrossoverFilter implements IBarCalculator<Ma2CrossoverState> {
    readonly name = CalculatorName.MA2_CROSSOVER;
    readonly minHistory: number;

    constructor(private readonly config: IndicatorConfig['crossover']) {
        this.minHistory = Math.max(
            config.slowPeriod + config.slowSlopeOffset,
            config.fastPeriod + config.fastSlopeOffset
        );
    }

    initial(): Ma2CrossoverState {
        return {
            fast: 0,
            slow: 0,
            fastRising: false,
            slowRising: false,
            entryValid: false,
            fastBelowSlow: false,
            warmedUp: false
        };
    }

    step(_previous: Ma2CrossoverState, window: BarWindow): StepResult<Ma2CrossoverState> {
        if (window.size < this.minHistory) {
            return { state: this.initial(), diagnostics: [] };
        }

        const { fastPeriod, slowPeriod, fastSlopeOffset, slowSlopeOffset } = this.config;
        const closes = window.span(this.minHistory - 1, 0).map(bar => bar.close);

        const fast = this.averageAt(closes, fastPeriod, 0);
        const fastBefore = this.averageAt(closes, fastPeriod, fastSlopeOffset);
        const slow = this.averageAt(closes, slowPeriod, 0);
        const slowBefore = this.averageAt(closes, slowPeriod, slowSlopeOffset);

        const fastRising = fast - fastBefore >= 0;
        const slowRising = slow - slowBefore >= 0;

        const state: Ma2CrossoverState = {
            fast,
            slow,
            fastRising,
            slowRising,
            entryValid: fastRising && slowRising && fast > slow,
            fastBelowSlow: fast < slow,
            warmedUp: true
        };
        return { state, diagnostics: [] };
    }

    /** SMA ending `barsBack` bars before the newest close */
    private averageAt(closes: number[], period: number, barsBack: number): number {
        return sma(closes.slice(0, closes.length - barsBack), period) ?? 0;
    }
}
