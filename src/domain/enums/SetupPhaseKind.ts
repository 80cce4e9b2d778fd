export enum SetupPhaseKind {
    IDLE = 'IDLE',
    BUILDING = 'BUILDING',
    COMPLETED = 'COMPLETED'
}
