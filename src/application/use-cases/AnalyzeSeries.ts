import { injectable, inject } from 'inversify';
import { IBarSource } from '../../domain/interfaces/IBarSource';
import { IIndicatorEngine } from '../../domain/interfaces/IIndicatorEngine';
import { ExhaustionAssessment, IExhaustionAssessor } from '../../domain/interfaces/IExhaustionAssessor';
import { Bar } from '../../domain/entities/Bar';
import { IndicatorState } from '../../domain/types/IndicatorState';
import { Logger } from '../../shared/logger/Logger';
import { TYPES } from '../../config/types';

export interface ActivityCounts {
    ma1ActiveBars: number;
    ma2ActiveBars: number;
    setupCompleteBars: number;
    countdownCompleteBars: number;
    tdstActiveBars: number;
    entryValidBars: number;
}

export interface SeriesAnalysis {
    source: string;
    barCount: number;
    history: IndicatorState[];
    latest: IndicatorState | null;
    exhaustion: ExhaustionAssessment | null;
    activity: ActivityCounts;
}

@injectable()
export class AnalyzeSeries {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.IBarSource) private readonly source: IBarSource,
        @inject(TYPES.IIndicatorEngine) private readonly engine: IIndicatorEngine,
        @inject(TYPES.IExhaustionAssessor) private readonly assessor: IExhaustionAssessor
    ) {}

    async execute(): Promise<SeriesAnalysis> {
        this.logger.info(`Loading bars from ${this.source.description}...`);
        const bars = await this.source.loadBars();
        if (bars.length === 0) {
            this.logger.warn(`No bars found in ${this.source.description}`);
        }
        return this.analyze(bars, this.source.description);
    }

    analyze(bars: readonly Bar[], source: string = 'bars'): SeriesAnalysis {
        const history = this.engine.run(bars);
        const latest = this.engine.getLatestState();
        const exhaustion = latest ? this.assessor.assess(latest, this.engine.getBars()) : null;
        const activity = AnalyzeSeries.countActivity(history);

        this.logger.info(`${source}: ${history.length} bars analysed`, activity);

        return { source, barCount: history.length, history, latest, exhaustion, activity };
    }

    static countActivity(history: readonly IndicatorState[]): ActivityCounts {
        const count = (predicate: (state: IndicatorState) => boolean): number =>
            history.reduce((total, state) => (predicate(state) ? total + 1 : total), 0);

        return {
            ma1ActiveBars: count(state => state.ma1Active),
            ma2ActiveBars: count(state => state.ma2Active),
            setupCompleteBars: count(state => state.setupComplete),
            countdownCompleteBars: count(state => state.countdownComplete),
            tdstActiveBars: count(state => state.tdstActive),
            entryValidBars: count(state => state.tdEntryValid)
        };
    }
}
