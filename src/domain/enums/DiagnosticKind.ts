export enum DiagnosticKind {
    INSUFFICIENT_HISTORY = 'INSUFFICIENT_HISTORY',
    DEGENERATE_RANGE = 'DEGENERATE_RANGE'
}
