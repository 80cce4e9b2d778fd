import { z } from 'zod';

const price = z.number().finite().positive();

/**
 * Zod schema for one OHLC bar
 */
export const BarSchema = z
    .object({
        open: price,
        high: price,
        low: price,
        close: price,
        timestamp: z.number().int().nonnegative().optional(),
    })
    .refine(bar => bar.high >= bar.low, {
        message: 'high must be greater than or equal to low',
        path: ['high'],
    })
    .refine(bar => bar.low <= Math.min(bar.open, bar.close) && Math.max(bar.open, bar.close) <= bar.high, {
        message: 'open and close must lie within low..high',
        path: ['close'],
    });

export type BarInput = z.infer<typeof BarSchema>;
