// src/config/types.ts
export const TYPES = {
    IndicatorConfig: Symbol.for('IndicatorConfig'),
    IIndicatorEngine: Symbol.for('IIndicatorEngine'),
    IExitRuleEvaluator: Symbol.for('IExitRuleEvaluator'),
    IExhaustionAssessor: Symbol.for('IExhaustionAssessor'),
    IBarSource: Symbol.for('IBarSource'),
    AnalyzeSeries: Symbol.for('AnalyzeSeries'),
    RunTrancheReplay: Symbol.for('RunTrancheReplay')
};
