/**
 * IndicatorState / IndicatorReading - contracts for the Wilder indicator engine.
 *
 * State is replaced, never mutated: every bar produces a new frozen snapshot.
 * A state is only valid when replayed bar-by-bar from createIndicatorState().
 */

import { InvalidInputError } from "../errors/signal_error.js";

export const DEFAULT_INDICATOR_PERIOD = 14;

export interface PreviousBar {
    readonly high: number;
    readonly low: number;
    readonly close: number;
}

export interface IndicatorState {
    /** Wilder period (warm-up length for ATR/DI, and again for ADX) */
    readonly period: number;

    /** Bars consumed so far */
    readonly barCount: number;

    /** Last accepted bar, null before the first one */
    readonly prevBar: PreviousBar | null;
    readonly lastTimestamp: number | null;

    /** Wilder running sums (seeded with plain sums over the warm-up window) */
    readonly smoothedTr: number;
    readonly smoothedPlusDm: number;
    readonly smoothedMinusDm: number;

    /** smoothedTr / period once warm-up is complete, else null */
    readonly atr: number | null;

    /** ADX warm-up accumulator */
    readonly dxSum: number;
    readonly dxCount: number;

    /** Wilder-smoothed ADX, null until `period` DX values have been seen */
    readonly adx: number | null;
}

export interface IndicatorReading {
    readonly atr: number;
    readonly adx: number;
    readonly plusDI: number;
    readonly minusDI: number;
    readonly dx: number;

    /** False while ADX is still the running mean of fewer than `period` DX values */
    readonly adxSeeded: boolean;

    /** Timestamp of the bar this reading was taken at */
    readonly asOf: number;
}

export function createIndicatorState(period: number = DEFAULT_INDICATOR_PERIOD): IndicatorState {
    if (!Number.isInteger(period) || period < 2) {
        throw new InvalidInputError("BAD_INPUT", `bad input data: indicator period must be an integer >= 2, got ${period}`);
    }

    return Object.freeze({
        period,
        barCount: 0,
        prevBar: null,
        lastTimestamp: null,
        smoothedTr: 0,
        smoothedPlusDm: 0,
        smoothedMinusDm: 0,
        atr: null,
        dxSum: 0,
        dxCount: 0,
        adx: null
    });
}

/**
 * Number of bars needed before the first reading is emitted.
 */
export function warmUpBars(period: number): number {
    return period;
}

/**
 * Number of bars needed before ADX is a true Wilder average of `period` DX values.
 */
export function adxSeedBars(period: number): number {
    return 2 * period - 1;
}
