/**
 * SignalReasonCode - Strict enum for every evaluation outcome.
 * Every rejection MUST carry an explicit reason code and a readable reason.
 */

export enum SignalReasonCode {
    /** All checks passed, sized by the risk budget */
    APPROVED = "APPROVED",

    /** All checks passed, size clamped by the account-size limit */
    APPROVED_CAPPED = "APPROVED_CAPPED",

    /** ADX below the trend threshold */
    CHOP_ZONE = "CHOP_ZONE",

    /** ATR is zero / non-positive: no basis for a stop */
    NO_VOLATILITY_BASIS = "NO_VOLATILITY_BASIS",

    /** Risk budget or account size too small for one unit */
    INSUFFICIENT_CAPITAL = "INSUFFICIENT_CAPITAL",

    /** Not enough bars to complete the indicator warm-up */
    INSUFFICIENT_HISTORY = "INSUFFICIENT_HISTORY",

    /** Malformed bars or invalid parameters */
    BAD_INPUT_DATA = "BAD_INPUT_DATA",

    /** Price collaborator failed to deliver bars */
    SOURCE_UNAVAILABLE = "SOURCE_UNAVAILABLE",
}

/**
 * Display order for scan results: actionable first, broken last.
 */
export const REASON_PRIORITY: Readonly<Record<SignalReasonCode, number>> = Object.freeze({
    [SignalReasonCode.APPROVED]: 0,
    [SignalReasonCode.APPROVED_CAPPED]: 1,
    [SignalReasonCode.INSUFFICIENT_CAPITAL]: 2,
    [SignalReasonCode.CHOP_ZONE]: 3,
    [SignalReasonCode.NO_VOLATILITY_BASIS]: 4,
    [SignalReasonCode.INSUFFICIENT_HISTORY]: 5,
    [SignalReasonCode.BAD_INPUT_DATA]: 6,
    [SignalReasonCode.SOURCE_UNAVAILABLE]: 7,
});

export function isApproval(code: SignalReasonCode): boolean {
    return code === SignalReasonCode.APPROVED || code === SignalReasonCode.APPROVED_CAPPED;
}
