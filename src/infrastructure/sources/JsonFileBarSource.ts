import { readFile } from 'fs/promises';
import { IBarSource } from '../../domain/interfaces/IBarSource';
import { Bar } from '../../domain/entities/Bar';
import { BarSourceError } from '../../shared/errors/IndicatorErrors';
import { Logger } from '../../shared/logger/Logger';

/**
 * Reads a JSON array of `{ open, high, low, close, timestamp? }` objects,
 * oldest first.
 */
export class JsonFileBarSource implements IBarSource {
    private logger = Logger.getInstance();

    constructor(private readonly filePath: string) {}

    get description(): string {
        return this.filePath;
    }

    async loadBars(): Promise<Bar[]> {
        let raw: string;
        try {
            raw = await readFile(this.filePath, 'utf8');
        } catch (error) {
            throw new BarSourceError(`Cannot read bar file ${this.filePath}`, error);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw new BarSourceError(`Bar file ${this.filePath} is not valid JSON`, error);
        }

        if (!Array.isArray(parsed)) {
            throw new BarSourceError(`Bar file ${this.filePath} must contain a JSON array`);
        }

        const bars = Bar.createMany(parsed);
        this.logger.debug(`Loaded ${bars.length} bars from ${this.filePath}`);
        return bars;
    }
}
