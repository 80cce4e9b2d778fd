import { createContainer } from '../../config/inversify.config';
import { TYPES } from '../../config/types';
import { AnalyzeSeries, SeriesAnalysis } from '../../application/use-cases/AnalyzeSeries';
import { JsonFileBarSource } from '../../infrastructure/sources/JsonFileBarSource';
import { Logger } from '../../shared/logger/Logger';

export async function runAnalyzeCommand(args: {
    file: string;
    overrides?: unknown;
}): Promise<SeriesAnalysis> {
    const logger = Logger.getInstance();
    const container = createContainer({
        overrides: args.overrides,
        barSource: new JsonFileBarSource(args.file)
    });

    try {
        const analysis = await container.get<AnalyzeSeries>(TYPES.AnalyzeSeries).execute();
        const { latest, exhaustion, activity } = analysis;

        logger.info('=== TD INDICATOR STATE ===');
        logger.info(`Bars: ${analysis.barCount}`);
        logger.info(`TD MA I active bars: ${activity.ma1ActiveBars}`);
        logger.info(`TD MA II active bars: ${activity.ma2ActiveBars}`);
        logger.info(`Setup complete bars: ${activity.setupCompleteBars}`);
        logger.info(`Countdown >= 13 bars: ${activity.countdownCompleteBars}`);
        logger.info(`TDST active bars: ${activity.tdstActiveBars}`);
        logger.info(`Entry valid bars: ${activity.entryValidBars}`);

        if (latest) {
            logger.info(`TD MA I: ${latest.ma1Active ? 'Active' : 'Inactive'} @ ${latest.ma1Value.toFixed(2)}`);
            logger.info(`TD MA II: ${latest.ma2Active ? 'Active' : 'Inactive'} @ ${latest.ma2Value.toFixed(2)}`);
            logger.info(`TD Setup: ${latest.setupCount}/9`);
            logger.info(`TD Countdown: ${latest.countdown}/13`);
            logger.info(`TDST Support: ${latest.tdstSupport.toFixed(2)} (${latest.tdstActive ? 'Active' : 'Inactive'})`);
            logger.info(`Setup Lowest Low: ${latest.setupLowestLow.toFixed(2)}`);
            logger.info(`Recent Higher Low: ${latest.recentHigherLow.toFixed(2)}`);
        }
        if (exhaustion) {
            logger.info(`Exhaustion: ${exhaustion.level}`, exhaustion.signals);
        }

        return analysis;
    } catch (error) {
        logger.error('Analysis failed', error);
        throw error;
    }
}
