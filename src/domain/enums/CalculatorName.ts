export enum CalculatorName {
    TD_MA1 = 'TD_MA1',
    TD_MA2 = 'TD_MA2',
    SETUP = 'SETUP',
    COUNTDOWN = 'COUNTDOWN',
    TDST = 'TDST',
    HIGHER_LOW = 'HIGHER_LOW',
    MA2_CROSSOVER = 'MA2_CROSSOVER'
}

export const ALL_CALCULATORS: readonly CalculatorName[] = Object.values(CalculatorName);
