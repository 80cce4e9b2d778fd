import { SetupPhaseKind } from '../../../domain/enums/SetupPhaseKind';
import { IndicatorPolicies } from '../../../config/indicator.config';
import { IDLE_PHASE, SetupPhase } from '../../../domain/types/SetupPhase';

export type SetupCompletionPolicy = IndicatorPolicies['setupCompletion'];

const VALID_TRANSITIONS: Record<SetupPhaseKind, SetupPhaseKind[]> = {
    [SetupPhaseKind.IDLE]: [SetupPhaseKind.IDLE, SetupPhaseKind.BUILDING, SetupPhaseKind.COMPLETED],
    [SetupPhaseKind.BUILDING]: [SetupPhaseKind.IDLE, SetupPhaseKind.BUILDING, SetupPhaseKind.COMPLETED],
    [SetupPhaseKind.COMPLETED]: [SetupPhaseKind.IDLE, SetupPhaseKind.COMPLETED]
};

/**
 * Transition table of the Setup lifecycle.
 *
 * | from      | qualifying bar                      | failing bar                          |
 * |-----------|-------------------------------------|--------------------------------------|
 * | IDLE      | BUILDING(1), or COMPLETED if N = 1  | IDLE                                 |
 * | BUILDING  | BUILDING(n+1), COMPLETED at n+1 = N | IDLE                                 |
 * | COMPLETED | COMPLETED, reseeded when run hits N | sticky: COMPLETED(run 0); reset: IDLE |
 */
export class SetupPhaseMachine {
    constructor(
        private readonly completionCount: number,
        private readonly policy: SetupCompletionPolicy
    ) {}

    static canTransition(from: SetupPhaseKind, to: SetupPhaseKind): boolean {
        return VALID_TRANSITIONS[from].includes(to);
    }

    static runLength(phase: SetupPhase): number {
        switch (phase.kind) {
            case SetupPhaseKind.IDLE:
                return 0;
            case SetupPhaseKind.BUILDING:
                return phase.count;
            case SetupPhaseKind.COMPLETED:
                return phase.runLength;
        }
    }

    next(phase: SetupPhase, qualifies: boolean, close: number): SetupPhase {
        const nextPhase = this.resolve(phase, qualifies, close);
        if (!SetupPhaseMachine.canTransition(phase.kind, nextPhase.kind)) {
            throw new Error(`Invalid setup transition from ${phase.kind} to ${nextPhase.kind}`);
        }
        return Object.freeze(nextPhase);
    }

    private resolve(phase: SetupPhase, qualifies: boolean, close: number): SetupPhase {
        const run = qualifies ? SetupPhaseMachine.runLength(phase) + 1 : 0;

        if (run === this.completionCount) {
            return { kind: SetupPhaseKind.COMPLETED, barsSince: 0, bestClose: close, runLength: run };
        }

        if (phase.kind === SetupPhaseKind.COMPLETED) {
            if (!qualifies && this.policy === 'resetOnBreak') {
                return IDLE_PHASE;
            }
            return {
                kind: SetupPhaseKind.COMPLETED,
                barsSince: phase.barsSince + 1,
                bestClose: Math.max(phase.bestClose, close),
                runLength: run
            };
        }

        return run === 0 ? IDLE_PHASE : { kind: SetupPhaseKind.BUILDING, count: run };
    }
}
