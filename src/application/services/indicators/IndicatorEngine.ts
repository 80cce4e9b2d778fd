import { injectable, inject } from 'inversify';
import { IIndicatorEngine, LatestStateOptions } from '../../../domain/interfaces/IIndicatorEngine';
import { Bar } from '../../../domain/entities/Bar';
import { BarWindow } from '../../../domain/value-objects/BarWindow';
import { ALL_CALCULATORS, CalculatorName } from '../../../domain/enums/CalculatorName';
import { SetupPhaseKind } from '../../../domain/enums/SetupPhaseKind';
import { IndicatorState } from '../../../domain/types/IndicatorState';
import { IndicatorConfig } from '../../../config/indicator.config';
import { TYPES } from '../../../config/types';
import { InsufficientHistoryError } from '../../../shared/errors/IndicatorErrors';
import { Logger } from '../../../shared/logger/Logger';
import { IndicatorPipeline, PipelineCarry } from './IndicatorPipeline';

/**
 * Throws unless every listed calculator reports warmed up on `state`.
 */
export function assertWarmedUp(
    state: IndicatorState,
    calculators: readonly CalculatorName[] = ALL_CALCULATORS
): void {
    const cold = calculators.filter(name => !state.warmup[name]);
    if (cold.length > 0) {
        throw new InsufficientHistoryError(cold, state.index + 1);
    }
}

/**
 * Per-instrument DeMark indicator engine. Owns the bar series and the full
 * state history; one instance per instrument.
 */
@injectable()
export class IndicatorEngine implements IIndicatorEngine {
    private logger = Logger.forScope('IndicatorEngine');
    private readonly pipeline: IndicatorPipeline;

    private bars: Bar[] = [];
    private history: IndicatorState[] = [];
    private carry: PipelineCarry;

    constructor(
        @inject(TYPES.IndicatorConfig) private readonly config: IndicatorConfig
    ) {
        this.pipeline = new IndicatorPipeline(config);
        this.carry = this.pipeline.initial();
    }

    push(bar: Bar): IndicatorState {
        this.bars.push(bar);
        const { carry, state } = this.pipeline.step(this.carry, new BarWindow(this.bars, this.bars.length - 1));
        this.carry = carry;
        this.history.push(state);
        this.logEvents(state);
        return state;
    }

    run(bars: Iterable<Bar>): IndicatorState[] {
        this.reset();
        for (const bar of bars) {
            this.push(bar);
        }
        this.logger.debug(`Processed ${this.bars.length} bars`);
        return [...this.history];
    }

    *stream(bars: Iterable<Bar>): Generator<IndicatorState, void, undefined> {
        for (const bar of bars) {
            yield this.push(bar);
        }
    }

    getLatestState(): IndicatorState | null {
        return this.history.length > 0 ? this.history[this.history.length - 1] : null;
    }

    requireLatestState(options: LatestStateOptions = {}): IndicatorState {
        const latest = this.getLatestState();
        if (!latest) {
            throw new InsufficientHistoryError([...ALL_CALCULATORS], 0, 'No bars processed yet');
        }
        const { requireWarmup } = options;
        if (requireWarmup === true) {
            assertWarmedUp(latest);
        } else if (Array.isArray(requireWarmup)) {
            assertWarmedUp(latest, requireWarmup);
        }
        return latest;
    }

    getHistory(): readonly IndicatorState[] {
        return this.history;
    }

    getBars(): readonly Bar[] {
        return this.bars;
    }

    /** Bars each calculator needs before it reports warmed up */
    getMinHistory(name: CalculatorName): number {
        return this.pipeline.minHistory(name);
    }

    reset(): void {
        this.bars = [];
        this.history = [];
        this.carry = this.pipeline.initial();
    }

    private logEvents(state: IndicatorState): void {
        if (state.setupPhase.kind === SetupPhaseKind.COMPLETED && state.setupPhase.barsSince === 0) {
            this.logger.debug(`Setup ${this.config.setup.completionCount} completed at bar ${state.index}`, {
                close: state.setupBar9Close,
                rangePct: state.setupBar9RangePct,
                tdstSupport: state.tdstSupport
            });
        }
        if (state.tdstResBroken) {
            this.logger.debug(`TDST resistance ${state.tdstResistance} broken at bar ${state.index}`);
        }
        for (const diagnostic of state.diagnostics) {
            this.logger.debug(`${diagnostic.kind} (${diagnostic.calculator}) at bar ${diagnostic.barIndex}: ${diagnostic.message}`);
        }
    }
}
