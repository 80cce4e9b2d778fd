import { injectable, inject } from 'inversify';
import { IIndicatorEngine } from '../../domain/interfaces/IIndicatorEngine';
import { IExitRuleEvaluator } from '../../domain/interfaces/IExitRuleEvaluator';
import { Bar } from '../../domain/entities/Bar';
import { PositionContext } from '../../domain/entities/Position';
import { ExitReason } from '../../domain/enums/ExitReason';
import { Tranche, TRANCHES } from '../../domain/enums/Tranche';
import { Logger } from '../../shared/logger/Logger';
import { TYPES } from '../../config/types';
import { IndicatorConfig } from '../../config/indicator.config';

export interface ReplayConfig {
    /** Bar whose close opens the position */
    entryIndex: number;
    /** Defaults to the close of the entry bar */
    entryPrice?: number;
}

export interface TrancheExit {
    tranche: Tranche;
    fraction: number;
    /** null when the tranche was still open at the last bar */
    reason: ExitReason | null;
    index: number;
    price: number;
    daysHeld: number;
    returnPct: number;
}

export interface TrancheReplayResult {
    entryIndex: number;
    entryPrice: number;
    exits: TrancheExit[];
    allClosed: boolean;
    weightedReturnPct: number;
}

/**
 * Walks a hypothetical long position forward bar by bar and records where
 * each tranche would have been exited. Places no orders.
 */
@injectable()
export class RunTrancheReplay {
    private logger = Logger.getInstance();
    private readonly fractions: Record<Tranche, number>;

    constructor(
        @inject(TYPES.IIndicatorEngine) private readonly engine: IIndicatorEngine,
        @inject(TYPES.IExitRuleEvaluator) private readonly evaluator: IExitRuleEvaluator,
        @inject(TYPES.IndicatorConfig) config: IndicatorConfig
    ) {
        this.fractions = {
            [Tranche.DE_RISK]: config.exits.tranche1Fraction,
            [Tranche.STRUCTURAL]: config.exits.tranche2Fraction,
            [Tranche.RUNNER]: config.exits.tranche3Fraction
        };
    }

    execute(bars: readonly Bar[], config: ReplayConfig): TrancheReplayResult {
        const { entryIndex } = config;
        if (!Number.isInteger(entryIndex) || entryIndex < 0 || entryIndex >= bars.length) {
            throw new RangeError(`Entry index ${entryIndex} outside series of ${bars.length} bars`);
        }

        const states = this.engine.run(bars);
        const entryPrice = config.entryPrice ?? bars[entryIndex].close;
        this.logger.info(`Replaying tranche exits from bar ${entryIndex} @ ${entryPrice}`);

        const exits = new Map<Tranche, TrancheExit>();

        for (let index = entryIndex + 1; index < states.length && exits.size < TRANCHES.length; index++) {
            const state = states[index];
            const close = state.bar.close;
            const position = PositionContext.openedAt(entryIndex, entryPrice, index);

            for (const signal of this.evaluator.evaluateAll(close, state, position)) {
                if (!signal.triggered || exits.has(signal.tranche)) continue;

                exits.set(signal.tranche, {
                    tranche: signal.tranche,
                    fraction: signal.fraction,
                    reason: signal.reason,
                    index,
                    price: close,
                    daysHeld: position.daysHeld,
                    returnPct: position.returnAt(close) * 100
                });
                this.logger.debug(`Tranche ${signal.tranche} exit at bar ${index}: ${signal.reason}`);
            }
        }

        const allClosed = exits.size === TRANCHES.length;
        const lastIndex = states.length - 1;
        const lastClose = bars[lastIndex].close;
        const finalPosition = PositionContext.openedAt(entryIndex, entryPrice, lastIndex);

        const ordered = TRANCHES.map((tranche): TrancheExit => exits.get(tranche) ?? {
            tranche,
            fraction: this.fractions[tranche],
            reason: null,
            index: lastIndex,
            price: lastClose,
            daysHeld: finalPosition.daysHeld,
            returnPct: finalPosition.returnAt(lastClose) * 100
        });

        const weightedReturnPct = ordered.reduce((sum, exit) => sum + exit.fraction * exit.returnPct, 0);

        this.logger.info(`Replay finished: ${exits.size}/${TRANCHES.length} tranches exited, weighted return ${weightedReturnPct.toFixed(2)}%`);

        return { entryIndex, entryPrice, exits: ordered, allClosed, weightedReturnPct };
    }
}
