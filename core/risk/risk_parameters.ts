/**
 * RiskParameters - explicit per-evaluation configuration.
 * Passed into every evaluation; persistence lives outside the core.
 */

import { DEFAULT_ADX_THRESHOLD } from "../gates/trend_quality_filter.js";
import { DEFAULT_INDICATOR_PERIOD } from "../indicators/indicator_state.js";

export const DEFAULT_ATR_MULTIPLIER = 2;

export interface RiskParameters {
    /** Minimum ADX for a tradeable trend */
    readonly adxThreshold: number;

    /** Wilder period for ATR / ADX */
    readonly atrPeriod: number;

    /** Stop distance in ATRs */
    readonly atrMultiplier: number;

    /** Target distance as a multiple of the stop distance (no target when unset) */
    readonly rewardMultiple?: number;

    /** Account equity used for the risk budget */
    readonly accountEquity: number;

    /** Fraction of equity risked per trade, in (0, 1] */
    readonly riskPercent: number;

    /** Hard cap on position cost */
    readonly maxAccountSize: number;
}

export type RiskParametersInput =
    Pick<RiskParameters, "accountEquity" | "riskPercent" | "maxAccountSize">
    & Partial<Pick<RiskParameters, "adxThreshold" | "atrPeriod" | "atrMultiplier" | "rewardMultiple">>;

export function createRiskParameters(input: RiskParametersInput): RiskParameters {
    const params: RiskParameters = {
        adxThreshold: input.adxThreshold ?? DEFAULT_ADX_THRESHOLD,
        atrPeriod: input.atrPeriod ?? DEFAULT_INDICATOR_PERIOD,
        atrMultiplier: input.atrMultiplier ?? DEFAULT_ATR_MULTIPLIER,
        accountEquity: input.accountEquity,
        riskPercent: input.riskPercent,
        maxAccountSize: input.maxAccountSize,
    };
    if (input.rewardMultiple !== undefined) {
        return Object.freeze({ ...params, rewardMultiple: input.rewardMultiple });
    }
    return Object.freeze(params);
}

/**
 * Collect every problem with a parameter set. Empty list means valid.
 */
export function validateRiskParameters(params: RiskParameters): string[] {
    const errors: string[] = [];

    if (!Number.isFinite(params.adxThreshold) || params.adxThreshold < 0 || params.adxThreshold > 100) {
        errors.push("adxThreshold must be within [0, 100]");
    }
    if (!Number.isInteger(params.atrPeriod) || params.atrPeriod < 2) {
        errors.push("atrPeriod must be an integer >= 2");
    }
    if (!Number.isFinite(params.atrMultiplier) || params.atrMultiplier <= 0) {
        errors.push("atrMultiplier must be positive");
    }
    if (params.rewardMultiple !== undefined && (!Number.isFinite(params.rewardMultiple) || params.rewardMultiple <= 0)) {
        errors.push("rewardMultiple must be positive when set");
    }
    if (!Number.isFinite(params.accountEquity) || params.accountEquity <= 0) {
        errors.push("accountEquity must be positive");
    }
    if (!Number.isFinite(params.riskPercent) || params.riskPercent <= 0 || params.riskPercent > 1) {
        errors.push("riskPercent must be a fraction in (0, 1]");
    }
    if (!Number.isFinite(params.maxAccountSize) || params.maxAccountSize <= 0) {
        errors.push("maxAccountSize must be positive");
    }

    return errors;
}
