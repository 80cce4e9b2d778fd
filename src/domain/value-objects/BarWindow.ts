import { Bar } from '../entities/Bar';
import { InsufficientHistoryError } from '../../shared/errors/IndicatorErrors';

/**
 * Read-only view of a bar series ending at `index`. Calculators only ever
 * look backwards through it.
 */
export class BarWindow {
    constructor(
        private readonly bars: readonly Bar[],
        public readonly index: number
    ) {
        if (index < 0 || index >= bars.length) {
            throw new RangeError(`Window index ${index} outside series of ${bars.length} bars`);
        }
    }

    get current(): Bar {
        return this.bars[this.index];
    }

    /** Number of bars visible, current one included */
    get size(): number {
        return this.index + 1;
    }

    /**
     * Bar `offset` positions before the current one (`ago(0)` is current).
     */
    ago(offset: number): Bar {
        const position = this.index - offset;
        if (offset < 0 || position < 0) {
            throw new InsufficientHistoryError(['window'], this.size, `Bar ${offset} back from index ${this.index} does not exist`);
        }
        return this.bars[position];
    }

    /**
     * Bars from `fromAgo` back up to `toAgo` back, oldest first.
     * `span(12, 1)` is the twelve bars before the current one.
     */
    span(fromAgo: number, toAgo: number): Bar[] {
        if (fromAgo < toAgo) {
            throw new RangeError(`Invalid span ${fromAgo}..${toAgo}`);
        }
        const start = this.index - fromAgo;
        if (toAgo < 0 || start < 0) {
            throw new InsufficientHistoryError(['window'], this.size, `Span ${fromAgo}..${toAgo} back from index ${this.index} does not exist`);
        }
        return this.bars.slice(start, this.index - toAgo + 1);
    }

    hasHistory(offset: number): boolean {
        return this.index - offset >= 0;
    }
}
