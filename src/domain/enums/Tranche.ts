export enum Tranche {
    DE_RISK = 1,
    STRUCTURAL = 2,
    RUNNER = 3
}

export const TRANCHES: readonly Tranche[] = [Tranche.DE_RISK, Tranche.STRUCTURAL, Tranche.RUNNER];
