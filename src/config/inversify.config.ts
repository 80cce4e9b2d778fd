import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';
import { IndicatorConfig, resolveIndicatorConfig } from './indicator.config';

// Interfaces
import { IBarSource } from '../domain/interfaces/IBarSource';
import { IIndicatorEngine } from '../domain/interfaces/IIndicatorEngine';
import { IExitRuleEvaluator } from '../domain/interfaces/IExitRuleEvaluator';
import { IExhaustionAssessor } from '../domain/interfaces/IExhaustionAssessor';

// Implementations
import { IndicatorEngine } from '../application/services/indicators/IndicatorEngine';
import { ExitRuleEvaluator } from '../application/services/exits/ExitRuleEvaluator';
import { ExhaustionAssessor } from '../application/services/exhaustion/ExhaustionAssessor';

// Use cases
import { AnalyzeSeries } from '../application/use-cases/AnalyzeSeries';
import { RunTrancheReplay } from '../application/use-cases/RunTrancheReplay';

export { TYPES };

export interface ContainerOptions {
    /** Partial config, validated against IndicatorConfigSchema */
    overrides?: unknown;
    barSource?: IBarSource;
}

export function createContainer(options: ContainerOptions = {}): Container {
    const container = new Container();

    // --- Configuration ---
    container.bind<IndicatorConfig>(TYPES.IndicatorConfig).toConstantValue(resolveIndicatorConfig(options.overrides));

    // --- Core Services ---
    // Engine holds per-instrument state: a new one per resolution
    container.bind<IIndicatorEngine>(TYPES.IIndicatorEngine).to(IndicatorEngine).inTransientScope();
    container.bind<IExitRuleEvaluator>(TYPES.IExitRuleEvaluator).to(ExitRuleEvaluator).inSingletonScope();
    container.bind<IExhaustionAssessor>(TYPES.IExhaustionAssessor).to(ExhaustionAssessor).inSingletonScope();

    // --- Bar Source ---
    if (options.barSource) {
        container.bind<IBarSource>(TYPES.IBarSource).toConstantValue(options.barSource);
    }

    // --- Use Cases ---
    container.bind<AnalyzeSeries>(TYPES.AnalyzeSeries).to(AnalyzeSeries);
    container.bind<RunTrancheReplay>(TYPES.RunTrancheReplay).to(RunTrancheReplay);

    return container;
}
