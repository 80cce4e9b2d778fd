import { PositionContext } from '../entities/Position';
import { IndicatorState } from '../types/IndicatorState';
import { ExitSignal } from '../value-objects/ExitSignal';

export interface IExitRuleEvaluator {
    checkTranche1(close: number, state: IndicatorState): ExitSignal;
    checkTranche2(close: number, state: IndicatorState, setupLowestLow: number): ExitSignal;
    checkTranche3(close: number, state: IndicatorState, position: PositionContext): ExitSignal;
    evaluateAll(close: number, state: IndicatorState, position: PositionContext): [ExitSignal, ExitSignal, ExitSignal];
}
