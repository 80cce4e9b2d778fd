/**
 * Simple moving average of the last `period` values, or null when fewer
 * than `period` values exist.
 */
export function sma(values: readonly number[], period: number): number | null {
    if (period <= 0 || values.length < period) return null;
    let sum = 0;
    for (let i = values.length - period; i < values.length; i++) {
        sum += values[i];
    }
    return sum / period;
}

export function minOf(values: readonly number[]): number {
    return values.reduce((min, value) => (value < min ? value : min), Infinity);
}

export function maxOf(values: readonly number[]): number {
    return values.reduce((max, value) => (value > max ? value : max), -Infinity);
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}
