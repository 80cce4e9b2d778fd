import { BarSchema } from '../schemas/BarSchema';
import { InvalidBarError } from '../../shared/errors/IndicatorErrors';

export class Bar {
    constructor(
        public readonly open: number,
        public readonly high: number,
        public readonly low: number,
        public readonly close: number,
        public readonly timestamp?: number
    ) {
        Object.freeze(this);
    }

    /**
     * Validates raw input (e.g. parsed JSON) and builds a bar.
     * `position` only feeds the error message.
     */
    static create(input: unknown, position?: number): Bar {
        const parsed = BarSchema.safeParse(input);
        if (!parsed.success) {
            throw new InvalidBarError(parsed.error.issues, position);
        }
        const { open, high, low, close, timestamp } = parsed.data;
        return new Bar(open, high, low, close, timestamp);
    }

    static createMany(inputs: readonly unknown[]): Bar[] {
        return inputs.map((input, position) => Bar.create(input, position));
    }

    get range(): number {
        return this.high - this.low;
    }

    /**
     * Where the close sits inside the high-low range (0 = low, 1 = high);
     * null for a zero-range bar.
     */
    get closeLocation(): number | null {
        const range = this.range;
        return range > 0 ? (this.close - this.low) / range : null;
    }
}
