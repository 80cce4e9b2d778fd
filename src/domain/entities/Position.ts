/**
 * Caller-owned context of an open long position. The engine never
 * mutates it.
 */
export class PositionContext {
    constructor(
        public readonly entryPrice: number,
        public readonly daysHeld: number,
        public readonly entryIndex?: number
    ) {}

    static openedAt(entryIndex: number, entryPrice: number, currentIndex: number): PositionContext {
        return new PositionContext(entryPrice, Math.max(0, currentIndex - entryIndex), entryIndex);
    }

    returnAt(price: number): number {
        return this.entryPrice > 0 ? (price - this.entryPrice) / this.entryPrice : 0;
    }
}
