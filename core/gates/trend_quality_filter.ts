/**
 * TrendQualityFilter - rejects setups in low-trend ("chop zone") regimes.
 * Pure function. NO SIDE EFFECTS. NO STATE.
 */

import { SignalReasonCode } from "../signal/signal_reason_code.js";

export const DEFAULT_ADX_THRESHOLD = 20;

export interface TrendVerdict {
    readonly accept: boolean;
    readonly reason_code: SignalReasonCode | null;
    readonly reason: string;
}

export function formatAdx(adx: number): string {
    return adx.toFixed(2);
}

/**
 * Accept iff adx >= threshold.
 */
export function evaluateTrendQuality(adx: number, threshold: number = DEFAULT_ADX_THRESHOLD): TrendVerdict {
    if (!Number.isFinite(adx) || !Number.isFinite(threshold)) {
        return Object.freeze({
            accept: false,
            reason_code: SignalReasonCode.BAD_INPUT_DATA,
            reason: `bad input data: ADX ${adx} / threshold ${threshold} is not a finite number`,
        });
    }

    if (adx < threshold) {
        return Object.freeze({
            accept: false,
            reason_code: SignalReasonCode.CHOP_ZONE,
            reason: `chop zone: ADX ${formatAdx(adx)} < ${threshold}`,
        });
    }

    return Object.freeze({
        accept: true,
        reason_code: null,
        reason: `trending: ADX ${formatAdx(adx)} >= ${threshold}`,
    });
}
