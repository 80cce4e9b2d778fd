import { Bar } from '../entities/Bar';

/**
 * Supplies the ordered bar series of one instrument. Where the bars come
 * from (broker, file, cache) is the implementation's business.
 */
export interface IBarSource {
    readonly description: string;
    loadBars(): Promise<Bar[]>;
}
