import { Bar } from '../entities/Bar';
import { ExhaustionLevel } from '../enums/ExhaustionLevel';
import { IndicatorState } from '../types/IndicatorState';

export interface ExhaustionAssessment {
    level: ExhaustionLevel;
    signals: string[];
    stallDetected: boolean;
    rangeCompression: boolean;
    warmedUp: boolean;
}

export interface IExhaustionAssessor {
    assess(state: IndicatorState, bars: readonly Bar[]): ExhaustionAssessment;
}
