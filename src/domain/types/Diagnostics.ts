import { CalculatorName } from '../enums/CalculatorName';
import { DiagnosticKind } from '../enums/DiagnosticKind';

export interface IndicatorDiagnostic {
    kind: DiagnosticKind;
    calculator: CalculatorName;
    barIndex: number;
    message: string;
}
