export enum ExhaustionLevel {
    NONE = 'NONE',
    MATURING = 'MATURING',
    VULNERABLE = 'VULNERABLE',
    EXHAUSTED = 'EXHAUSTED',
    CONFIRMED = 'CONFIRMED'
}
