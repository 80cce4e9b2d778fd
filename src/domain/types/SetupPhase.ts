import { SetupPhaseKind } from '../enums/SetupPhaseKind';

export interface IdlePhase {
    readonly kind: SetupPhaseKind.IDLE;
}

export interface BuildingPhase {
    readonly kind: SetupPhaseKind.BUILDING;
    /** Consecutive qualifying bars, 1..8 */
    readonly count: number;
}

export interface CompletedPhase {
    readonly kind: SetupPhaseKind.COMPLETED;
    readonly barsSince: number;
    readonly bestClose: number;
    /**
     * Length of the run in progress. Stays >= 9 while the completing run
     * continues; under the sticky policy it drops to 0 on a break and then
     * counts the next run without leaving COMPLETED.
     */
    readonly runLength: number;
}

export type SetupPhase = IdlePhase | BuildingPhase | CompletedPhase;

export const IDLE_PHASE: IdlePhase = Object.freeze<IdlePhase>({ kind: SetupPhaseKind.IDLE });
