import { BarWindow } from './BarWindow';
import { InsufficientHistoryError } from '../../shared/errors/IndicatorErrors';
import { barsFromCloses } from '../../shared/testing/bars';

describe('BarWindow', () => {
    const bars = barsFromCloses([10, 11, 12, 13, 14]);

    it('looks back from the current bar', () => {
        const window = new BarWindow(bars, 3);

        expect(window.current.close).toBe(13);
        expect(window.ago(0).close).toBe(13);
        expect(window.ago(3).close).toBe(10);
        expect(window.size).toBe(4);
    });

    it('returns spans oldest first', () => {
        const window = new BarWindow(bars, 4);
        expect(window.span(3, 1).map(bar => bar.close)).toEqual([11, 12, 13]);
        expect(window.span(1, 0).map(bar => bar.close)).toEqual([13, 14]);
    });

    it('refuses to look before the first bar', () => {
        const window = new BarWindow(bars, 2);

        expect(window.hasHistory(2)).toBe(true);
        expect(window.hasHistory(3)).toBe(false);
        expect(() => window.ago(3)).toThrow(InsufficientHistoryError);
        expect(() => window.span(3, 0)).toThrow(InsufficientHistoryError);
    });

    it('never sees bars after the current one', () => {
        expect(() => new BarWindow(bars, 2).ago(-1)).toThrow(InsufficientHistoryError);
        expect(() => new BarWindow(bars, 5)).toThrow(RangeError);
    });
});
