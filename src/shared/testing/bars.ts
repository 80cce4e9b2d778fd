import { Bar } from '../../domain/entities/Bar';
import { DefaultIndicatorConfig, IndicatorConfig, IndicatorConfigOverrides, resolveIndicatorConfig } from '../../config/indicator.config';

/**
 * Helper: bar whose open equals its close, with a symmetric range.
 */
export function barAt(close: number, spread = 0.5): Bar {
    return new Bar(close, close + spread, close - spread, close);
}

export function barsFromCloses(closes: readonly number[], spread = 0.5): Bar[] {
    return closes.map(close => barAt(close, spread));
}

/** `count` closes starting at `start`, each `step` above the last */
export function linearCloses(count: number, start = 100, step = 1): number[] {
    return Array.from({ length: count }, (_, i) => start + i * step);
}

export function ohlc(open: number, high: number, low: number, close: number): Bar {
    return new Bar(open, high, low, close);
}

export function testConfig(overrides?: IndicatorConfigOverrides): IndicatorConfig {
    return overrides ? resolveIndicatorConfig(overrides) : DefaultIndicatorConfig;
}
