/**
 * Wilder ATR / DMI / ADX - single-bar state transition.
 * Pure function. NO SIDE EFFECTS. Same state + same bar -> same output.
 *
 * Warm-up:
 *   bars 1..period    accumulate TR, +DM, -DM as plain sums
 *   bar  period       sums become the Wilder seeds, first reading is emitted
 *   bars > period     smoothed = smoothed - smoothed / period + raw
 *
 * ADX is the mean of the first `period` DX values, then Wilder-averaged:
 *   adx = (adx * (period - 1) + dx) / period
 */

import { PriceBar, assertBarAfter, assertBarShape } from "../market/price_bar.js";
import { IndicatorReading, IndicatorState, PreviousBar } from "./indicator_state.js";

export interface IndicatorUpdate {
    readonly state: IndicatorState;
    readonly reading: IndicatorReading | null;
}

export interface DirectionalMovement {
    readonly trueRange: number;
    readonly plusDm: number;
    readonly minusDm: number;
}

/**
 * TR, +DM and -DM of `bar` relative to the bar before it.
 * The first bar of a series has no previous close: TR = high - low, DM = 0.
 */
export function directionalMovement(prev: PreviousBar | null, bar: PriceBar): DirectionalMovement {
    if (prev === null) {
        return { trueRange: bar.high - bar.low, plusDm: 0, minusDm: 0 };
    }

    const trueRange = Math.max(
        bar.high - bar.low,
        Math.abs(bar.high - prev.close),
        Math.abs(bar.low - prev.close)
    );

    const upMove = bar.high - prev.high;
    const downMove = prev.low - bar.low;

    return {
        trueRange,
        plusDm: upMove > downMove && upMove > 0 ? upMove : 0,
        minusDm: downMove > upMove && downMove > 0 ? downMove : 0,
    };
}

function wilderStep(previous: number, raw: number, period: number): number {
    return previous - previous / period + raw;
}

/**
 * DX from the two directional indicators. Defined as 0 when both are 0.
 */
export function directionalIndex(plusDI: number, minusDI: number): number {
    const sum = plusDI + minusDI;
    if (sum === 0) return 0;
    return (100 * Math.abs(plusDI - minusDI)) / sum;
}

/**
 * Feed one bar into the state.
 *
 * @param prior - State after the previous bar (or createIndicatorState())
 * @param bar - Next bar; its timestamp must be strictly after prior.lastTimestamp
 * @returns The new state, and a reading once warm-up has completed
 */
export function updateIndicatorState(prior: IndicatorState, bar: PriceBar): IndicatorUpdate {
    assertBarShape(bar);
    assertBarAfter(prior.lastTimestamp, bar);

    const { period } = prior;
    const barCount = prior.barCount + 1;
    const move = directionalMovement(prior.prevBar, bar);
    const prevBar: PreviousBar = Object.freeze({ high: bar.high, low: bar.low, close: bar.close });

    // ========================================================================
    // WARM-UP: plain accumulation, no reading
    // ========================================================================
    if (barCount < period) {
        return {
            state: Object.freeze({
                ...prior,
                barCount,
                prevBar,
                lastTimestamp: bar.timestamp,
                smoothedTr: prior.smoothedTr + move.trueRange,
                smoothedPlusDm: prior.smoothedPlusDm + move.plusDm,
                smoothedMinusDm: prior.smoothedMinusDm + move.minusDm,
            }),
            reading: null,
        };
    }

    // ========================================================================
    // SMOOTHING: the seed bar closes the sums, later bars use Wilder's step
    // ========================================================================
    const seeding = barCount === period;
    const smoothedTr = seeding
        ? prior.smoothedTr + move.trueRange
        : wilderStep(prior.smoothedTr, move.trueRange, period);
    const smoothedPlusDm = seeding
        ? prior.smoothedPlusDm + move.plusDm
        : wilderStep(prior.smoothedPlusDm, move.plusDm, period);
    const smoothedMinusDm = seeding
        ? prior.smoothedMinusDm + move.minusDm
        : wilderStep(prior.smoothedMinusDm, move.minusDm, period);

    const atr = Math.max(0, smoothedTr / period);
    const plusDI = smoothedTr > 0 ? (100 * smoothedPlusDm) / smoothedTr : 0;
    const minusDI = smoothedTr > 0 ? (100 * smoothedMinusDm) / smoothedTr : 0;
    const dx = directionalIndex(plusDI, minusDI);

    // ========================================================================
    // ADX: mean of the first `period` DX values, then Wilder average
    // ========================================================================
    let dxSum = prior.dxSum;
    let dxCount = prior.dxCount;
    let adx = prior.adx;

    if (adx === null) {
        dxSum += dx;
        dxCount += 1;
        if (dxCount === period) {
            adx = dxSum / period;
        }
    } else {
        adx = (adx * (period - 1) + dx) / period;
    }

    const state: IndicatorState = Object.freeze({
        period,
        barCount,
        prevBar,
        lastTimestamp: bar.timestamp,
        smoothedTr,
        smoothedPlusDm,
        smoothedMinusDm,
        atr,
        dxSum,
        dxCount,
        adx,
    });

    const reading: IndicatorReading = Object.freeze({
        atr,
        adx: adx ?? dxSum / dxCount,
        plusDI,
        minusDI,
        dx,
        adxSeeded: adx !== null,
        asOf: bar.timestamp,
    });

    return { state, reading };
}

/**
 * Rebuild the reading a state stands for (null before warm-up completes).
 */
export function readingFromState(state: IndicatorState): IndicatorReading | null {
    if (state.atr === null || state.lastTimestamp === null || state.dxCount === 0) {
        return null;
    }
    const { smoothedTr } = state;
    const plusDI = smoothedTr > 0 ? (100 * state.smoothedPlusDm) / smoothedTr : 0;
    const minusDI = smoothedTr > 0 ? (100 * state.smoothedMinusDm) / smoothedTr : 0;

    return Object.freeze({
        atr: state.atr,
        adx: state.adx ?? state.dxSum / state.dxCount,
        plusDI,
        minusDI,
        dx: directionalIndex(plusDI, minusDI),
        adxSeeded: state.adx !== null,
        asOf: state.lastTimestamp,
    });
}
