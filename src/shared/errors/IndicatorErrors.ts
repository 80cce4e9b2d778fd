import type { ZodIssue } from 'zod';

export type IndicatorErrorCode =
    | 'INSUFFICIENT_HISTORY'
    | 'INVALID_BAR'
    | 'INVALID_CONFIG'
    | 'BAR_SOURCE';

export class IndicatorError extends Error {
    constructor(
        public readonly code: IndicatorErrorCode,
        message: string
    ) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Raised on demand when a caller asks for output a calculator cannot give yet.
 * The fold itself never throws this; it flags `warmup[name] = false` instead.
 */
export class InsufficientHistoryError extends IndicatorError {
    constructor(
        public readonly calculators: string[],
        public readonly available: number,
        message?: string
    ) {
        super(
            'INSUFFICIENT_HISTORY',
            message ?? `Insufficient history for ${calculators.join(', ')} (${available} bars available)`
        );
    }
}

export class InvalidBarError extends IndicatorError {
    constructor(
        public readonly issues: ZodIssue[],
        public readonly position?: number
    ) {
        const where = position !== undefined ? ` at position ${position}` : '';
        const details = issues.map(issue => `${issue.path.join('.') || 'bar'}: ${issue.message}`).join('; ');
        super('INVALID_BAR', `Invalid bar${where}: ${details}`);
    }
}

export class InvalidConfigError extends IndicatorError {
    constructor(public readonly issues: ZodIssue[]) {
        const details = issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        super('INVALID_CONFIG', `Invalid indicator configuration: ${details}`);
    }
}

export class BarSourceError extends IndicatorError {
    constructor(message: string, public readonly originalError?: unknown) {
        super('BAR_SOURCE', message);
    }
}
