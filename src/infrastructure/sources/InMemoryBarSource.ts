import { IBarSource } from '../../domain/interfaces/IBarSource';
import { Bar } from '../../domain/entities/Bar';

export class InMemoryBarSource implements IBarSource {
    private readonly bars: readonly Bar[];

    constructor(bars: readonly Bar[], public readonly description: string = 'in-memory') {
        this.bars = [...bars];
    }

    async loadBars(): Promise<Bar[]> {
        return [...this.bars];
    }
}
