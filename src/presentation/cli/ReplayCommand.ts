import { createContainer } from '../../config/inversify.config';
import { TYPES } from '../../config/types';
import { RunTrancheReplay, TrancheReplayResult } from '../../application/use-cases/RunTrancheReplay';
import { JsonFileBarSource } from '../../infrastructure/sources/JsonFileBarSource';
import { Logger } from '../../shared/logger/Logger';

export async function runReplayCommand(args: {
    file: string;
    entryIndex: number;
    entryPrice?: number;
    overrides?: unknown;
}): Promise<TrancheReplayResult> {
    const logger = Logger.getInstance();
    const container = createContainer({ overrides: args.overrides });

    try {
        const bars = await new JsonFileBarSource(args.file).loadBars();
        const replay = container.get<RunTrancheReplay>(TYPES.RunTrancheReplay);
        const result = replay.execute(bars, { entryIndex: args.entryIndex, entryPrice: args.entryPrice });

        logger.info('=== TRANCHE REPLAY ===');
        logger.info(`Entry: bar ${result.entryIndex} @ ${result.entryPrice.toFixed(2)}`);
        for (const exit of result.exits) {
            const label = exit.reason ?? 'OPEN';
            logger.info(
                `Tranche ${exit.tranche} (${(exit.fraction * 100).toFixed(0)}%): ${label} at bar ${exit.index} ` +
                `@ ${exit.price.toFixed(2)} after ${exit.daysHeld} bars (${exit.returnPct.toFixed(2)}%)`
            );
        }
        logger.info(`Weighted return: ${result.weightedReturnPct.toFixed(2)}%`);

        return result;
    } catch (error) {
        logger.error('Replay failed', error);
        throw error;
    }
}
