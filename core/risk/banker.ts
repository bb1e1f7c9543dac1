/**
 * Banker - risk-budget position sizing with an account-size solvency clamp.
 * Pure function. NO SIDE EFFECTS.
 *
 * GUARANTEES (for every approved verdict):
 * - riskAmount <= accountEquity * riskPercent
 * - shares * entryPrice <= maxAccountSize
 * - shares > 0
 *
 * When both limits bind, the account-size cap wins; "insufficient capital"
 * is reported only when the final size rounds down to zero.
 */

import { InvalidInputError } from "../errors/signal_error.js";
import { SignalReasonCode } from "../signal/signal_reason_code.js";

export interface SizingInput {
    readonly entryPrice: number;
    readonly stopLoss: number;
    readonly accountEquity: number;
    readonly riskPercent: number;
    readonly maxAccountSize: number;
}

export type SizingLimit = "RISK" | "ACCOUNT_SIZE";

export interface SolvencyVerdict {
    readonly approved: boolean;
    readonly reason_code: SignalReasonCode;
    readonly reason: string;
}

export interface SizingResult {
    readonly shares: number;
    readonly riskPerShare: number;
    readonly riskBudget: number;

    /** Real risk taken: shares * riskPerShare. May be below the budget after capping. */
    readonly riskAmount: number;

    /** shares * entryPrice */
    readonly positionCost: number;

    /** Which limit decided the size */
    readonly cappedBy: SizingLimit;

    readonly verdict: SolvencyVerdict;
}

export const INSUFFICIENT_CAPITAL_REASON = "insufficient capital for minimum position";

function assertPositive(name: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0) {
        throw new InvalidInputError("BAD_INPUT", `bad input data: ${name} must be positive, got ${value}`, { [name]: value });
    }
}

/**
 * Largest whole count n with n * unit <= limit, checked after multiplying back:
 * floor(limit / unit) can overshoot by one rounding step.
 */
function floorWithin(limit: number, unit: number): number {
    let count = Math.floor(limit / unit);
    while (count > 0 && count * unit > limit) {
        count -= 1;
    }
    return Math.max(count, 0);
}

export function sizePosition(input: SizingInput): SizingResult {
    const { entryPrice, stopLoss, accountEquity, riskPercent, maxAccountSize } = input;

    assertPositive("entryPrice", entryPrice);
    assertPositive("accountEquity", accountEquity);
    assertPositive("maxAccountSize", maxAccountSize);
    if (!Number.isFinite(riskPercent) || riskPercent <= 0 || riskPercent > 1) {
        throw new InvalidInputError("BAD_INPUT", `bad input data: riskPercent must be a fraction in (0, 1], got ${riskPercent}`, { riskPercent });
    }
    if (!Number.isFinite(stopLoss)) {
        throw new InvalidInputError("BAD_INPUT", `bad input data: stop-loss ${stopLoss} is not a finite number`, { stopLoss });
    }

    const riskPerShare = Math.abs(entryPrice - stopLoss);
    if (riskPerShare === 0) {
        throw new InvalidInputError("BAD_INPUT", "bad input data: stop equals entry, no risk-defined trade", { entryPrice, stopLoss });
    }

    // Step 1: risk-budget size
    const riskBudget = accountEquity * riskPercent;
    const rawShares = floorWithin(riskBudget, riskPerShare);

    // Step 2: solvency clamp
    let shares = rawShares;
    let cappedBy: SizingLimit = "RISK";
    if (rawShares * entryPrice > maxAccountSize) {
        shares = floorWithin(maxAccountSize, entryPrice);
        cappedBy = "ACCOUNT_SIZE";
    }

    const riskAmount = shares * riskPerShare;
    const positionCost = shares * entryPrice;

    let verdict: SolvencyVerdict;
    if (shares <= 0) {
        verdict = {
            approved: false,
            reason_code: SignalReasonCode.INSUFFICIENT_CAPITAL,
            reason: INSUFFICIENT_CAPITAL_REASON,
        };
    } else if (cappedBy === "ACCOUNT_SIZE") {
        verdict = {
            approved: true,
            reason_code: SignalReasonCode.APPROVED_CAPPED,
            reason: `approved: ${shares} units, capped by account-size limit ${maxAccountSize} (risk budget allowed ${rawShares})`,
        };
    } else {
        verdict = {
            approved: true,
            reason_code: SignalReasonCode.APPROVED,
            reason: `approved: ${shares} units within risk budget ${riskBudget}`,
        };
    }

    return Object.freeze({
        shares,
        riskPerShare,
        riskBudget,
        riskAmount,
        positionCost,
        cappedBy,
        verdict: Object.freeze(verdict),
    });
}
