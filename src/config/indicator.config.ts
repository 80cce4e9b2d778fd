/**
 * Indicator Configuration
 *
 * Defaults follow the classic DeMark parameters on daily bars. Every
 * section can be overridden partially through `resolveIndicatorConfig`.
 */

import { z } from 'zod';
import { InvalidConfigError } from '../shared/errors/IndicatorErrors';

const positiveInt = z.number().int().positive();
const fraction = z.number().min(0).max(1);

export const IndicatorConfigSchema = z.object({
    // TD MA I / TD MA II
    movingAverage: z
        .object({
            lookbackPeriod: positiveInt.default(12),
            maPeriod: positiveInt.default(5),
            extensionBars: positiveInt.default(4),
        })
        .default({}),

    // TD Sequential Setup
    setup: z
        .object({
            comparisonOffset: positiveInt.default(4),
            completionCount: positiveInt.default(9),
            tdstBars: positiveInt.default(4),
        })
        .default({}),

    // TD Countdown
    countdown: z
        .object({
            target: positiveInt.default(13),
            highOffset: positiveInt.default(2),
        })
        .default({}),

    // MA II fast/slow filter
    crossover: z
        .object({
            fastPeriod: positiveInt.default(3),
            slowPeriod: positiveInt.default(34),
            fastSlopeOffset: positiveInt.default(2),
            slowSlopeOffset: positiveInt.default(1),
        })
        .default({}),

    // Tranche exits
    exits: z
        .object({
            tranche1Fraction: fraction.default(0.3),
            tranche2Fraction: fraction.default(0.45),
            tranche3Fraction: fraction.default(0.25),
            followThroughBars: positiveInt.default(3),
            weakCloseRangePct: fraction.default(0.5),
            timeStopDays: positiveInt.default(20),
            timeStopBarsAfterSetup: positiveInt.default(10),
        })
        .default({}),

    // Exhaustion assessment
    exhaustion: z
        .object({
            minBars: positiveInt.default(20),
            vulnerableCountdown: positiveInt.default(11),
            recentBars: positiveInt.default(5),
            compressionRatio: fraction.default(0.7),
            stallRatio: fraction.default(0.5),
        })
        .default({}),

    // Edge-case behaviour
    policies: z
        .object({
            smaWarmup: z.enum(['zero', 'skip']).default('zero'),
            setupCompletion: z.enum(['sticky', 'resetOnBreak']).default('sticky'),
            countdownStart: z.enum(['nextBar', 'setupBar']).default('nextBar'),
        })
        .default({}),
});

export type IndicatorConfig = z.infer<typeof IndicatorConfigSchema>;
export type IndicatorConfigOverrides = z.input<typeof IndicatorConfigSchema>;
export type IndicatorPolicies = IndicatorConfig['policies'];

export const DefaultIndicatorConfig: IndicatorConfig = IndicatorConfigSchema.parse({});

/**
 * Countdown counted from the Setup-9 bar itself, matching older scanner output.
 */
export const ParityPolicies: IndicatorPolicies = {
    smaWarmup: 'zero',
    setupCompletion: 'sticky',
    countdownStart: 'setupBar',
};

export function resolveIndicatorConfig(overrides: unknown = {}): IndicatorConfig {
    const parsed = IndicatorConfigSchema.safeParse(overrides ?? {});
    if (!parsed.success) {
        throw new InvalidConfigError(parsed.error.issues);
    }
    const config = parsed.data;

    const fractionSum = config.exits.tranche1Fraction + config.exits.tranche2Fraction + config.exits.tranche3Fraction;
    if (Math.abs(fractionSum - 1) > 1e-9) {
        throw new InvalidConfigError([
            {
                code: 'custom',
                path: ['exits'],
                message: `tranche fractions must sum to 1 (got ${fractionSum})`,
            },
        ]);
    }
    if (config.crossover.fastPeriod >= config.crossover.slowPeriod) {
        throw new InvalidConfigError([
            {
                code: 'custom',
                path: ['crossover', 'fastPeriod'],
                message: 'fastPeriod must be shorter than slowPeriod',
            },
        ]);
    }
    return config;
}
