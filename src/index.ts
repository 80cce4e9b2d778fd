import 'reflect-metadata';

export * from './config/types';
export * from './config/indicator.config';
export { createContainer } from './config/inversify.config';
export type { ContainerOptions } from './config/inversify.config';

export * from './domain/entities/Bar';
export * from './domain/entities/Position';
export * from './domain/enums/CalculatorName';
export * from './domain/enums/DiagnosticKind';
export * from './domain/enums/ExhaustionLevel';
export * from './domain/enums/ExitReason';
export * from './domain/enums/SetupPhaseKind';
export * from './domain/enums/Tranche';
export * from './domain/interfaces/IBarCalculator';
export * from './domain/interfaces/IBarSource';
export * from './domain/interfaces/IExhaustionAssessor';
export * from './domain/interfaces/IExitRuleEvaluator';
export * from './domain/interfaces/IIndicatorEngine';
export * from './domain/schemas/BarSchema';
export * from './domain/types/CalculatorStates';
export * from './domain/types/Diagnostics';
export * from './domain/types/IndicatorState';
export * from './domain/types/SetupPhase';
export * from './domain/value-objects/BarWindow';
export * from './domain/value-objects/ExitSignal';

export * from './application/services/indicators/MovingAverageTrigger';
export * from './application/services/indicators/SequentialSetupCounter';
export * from './application/services/indicators/CountdownCounter';
export * from './application/services/indicators/TdstLevelTracker';
export * from './application/services/indicators/HigherLowTracker';
export * from './application/services/indicators/Ma2CrossoverFilter';
export * from './application/services/indicators/IndicatorPipeline';
export * from './application/services/indicators/IndicatorEngine';
export * from './application/services/state/SetupPhaseMachine';
export * from './application/services/exits/ExitRuleEvaluator';
export * from './application/services/exhaustion/ExhaustionAssessor';
export * from './application/use-cases/AnalyzeSeries';
export * from './application/use-cases/RunTrancheReplay';

export * from './infrastructure/sources/InMemoryBarSource';
export * from './infrastructure/sources/JsonFileBarSource';

export * from './shared/errors/IndicatorErrors';
export * from './shared/logger/Logger';
