import 'reflect-metadata';
import { ExhaustionAssessor } from './ExhaustionAssessor';
import { Bar } from '../../../domain/entities/Bar';
import { ExhaustionLevel } from '../../../domain/enums/ExhaustionLevel';
import { SetupPhaseKind } from '../../../domain/enums/SetupPhaseKind';
import { SetupPhase } from '../../../domain/types/SetupPhase';
import { barAt, barsFromCloses, linearCloses, testConfig } from '../../../shared/testing/bars';
import { indicatorState } from '../../../shared/testing/states';

const COMPLETED: SetupPhase = { kind: SetupPhaseKind.COMPLETED, barsSince: 2, bestClose: 119, runLength: 11 };

describe('ExhaustionAssessor', () => {
    const assessor = new ExhaustionAssessor(testConfig());
    const trend: Bar[] = barsFromCloses(linearCloses(20));
    const last = { index: 19 };

    it('reports nothing before enough bars exist', () => {
        const bars = trend.slice(0, 19);
        const result = assessor.assess(indicatorState({ index: 18, countdown: 13 }), bars);

        expect(result.level).toBe(ExhaustionLevel.NONE);
        expect(result.signals).toEqual([]);
        expect(result.warmedUp).toBe(false);
    });

    it('only looks at bars up to the state index', () => {
        const result = assessor.assess(indicatorState({ index: 18 }), trend);
        expect(result.warmedUp).toBe(false);
    });

    it('grades a completed Setup as maturing', () => {
        const result = assessor.assess(indicatorState({ ...last, setupPhase: COMPLETED, setupComplete: true }), trend);

        expect(result.level).toBe(ExhaustionLevel.MATURING);
        expect(result.signals).toEqual(['Setup 9 Complete', 'TD MA I Failed']);
        expect(result.warmedUp).toBe(true);
    });

    it('omits the TD MA I failure while it is still active', () => {
        const state = indicatorState({ ...last, setupPhase: COMPLETED, ma1Active: true, ma1Value: 110 });
        expect(assessor.assess(state, trend).signals).toEqual(['Setup 9 Complete']);
    });

    it('grades Countdown 11 as vulnerable', () => {
        const result = assessor.assess(indicatorState({ ...last, countdown: 11 }), trend);

        expect(result.level).toBe(ExhaustionLevel.VULNERABLE);
        expect(result.signals).toEqual(['Countdown 11/13']);
    });

    it('grades Countdown 13 as exhausted', () => {
        const result = assessor.assess(indicatorState({ ...last, countdown: 13, countdownComplete: true }), trend);

        expect(result.level).toBe(ExhaustionLevel.EXHAUSTED);
        expect(result.signals).toEqual(['Countdown 13 Complete']);
    });

    it('confirms exhaustion once TDST support is broken', () => {
        const state = indicatorState({ ...last, countdown: 13, tdstSupportViolated: true });
        const result = assessor.assess(state, trend);

        expect(result.level).toBe(ExhaustionLevel.CONFIRMED);
        expect(result.signals).toEqual(['Countdown 13 Complete', 'TDST Broken']);
    });

    it('detects a stall when closes overlap inside the bar range', () => {
        const flat = barsFromCloses(Array(20).fill(100));
        const result = assessor.assess(indicatorState(last), flat);

        expect(result.stallDetected).toBe(true);
        expect(result.rangeCompression).toBe(false);
        expect(result.level).toBe(ExhaustionLevel.NONE);
        expect(result.signals).toEqual(['Stall Detected']);
    });

    it('detects range compression against the previous block', () => {
        const bars = linearCloses(20).map((close, i) => barAt(close, i < 15 ? 2 : 0.5));
        const result = assessor.assess(indicatorState(last), bars);

        expect(result.rangeCompression).toBe(true);
        expect(result.stallDetected).toBe(false);
        expect(result.signals).toEqual(['Range Compression']);
    });
});
