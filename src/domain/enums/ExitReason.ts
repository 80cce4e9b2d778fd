export enum ExitReason {
    CLOSE_BELOW_TD_MA1 = 'CLOSE_BELOW_TD_MA1',
    FAILED_FOLLOW_THROUGH = 'FAILED_FOLLOW_THROUGH',
    TDST_SUPPORT_BREACH = 'TDST_SUPPORT_BREACH',
    SETUP_VALIDITY_BREACH = 'SETUP_VALIDITY_BREACH',
    COUNTDOWN_EXHAUSTION = 'COUNTDOWN_EXHAUSTION',
    HIGHER_LOW_BREAK = 'HIGHER_LOW_BREAK',
    TIME_STOP = 'TIME_STOP'
}
