import { ExitReason } from '../enums/ExitReason';
import { Tranche } from '../enums/Tranche';

export class ExitSignal {
    constructor(
        public readonly tranche: Tranche,
        public readonly fraction: number,
        public readonly triggered: boolean,
        public readonly reason: ExitReason | null
    ) {}

    static hold(tranche: Tranche, fraction: number): ExitSignal {
        return new ExitSignal(tranche, fraction, false, null);
    }

    static exit(tranche: Tranche, fraction: number, reason: ExitReason): ExitSignal {
        return new ExitSignal(tranche, fraction, true, reason);
    }

    /** `(triggered, reason)` pair, with an empty reason when holding */
    toTuple(): [boolean, string] {
        return [this.triggered, this.reason ?? ''];
    }
}
