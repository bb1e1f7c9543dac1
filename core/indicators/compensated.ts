/**
 * Compensated Wilder replay - the reference the engine reconciles against.
 *
 * Runs the same recurrences as updateIndicatorState, but every running sum
 * (smoothed TR / +DM / -DM, DX accumulator, ADX) is carried as a
 * double-double (hi + lo), so rounding error does not accumulate over long
 * histories. `base` is the plain IndicatorState view, rounded to doubles.
 */

import { PriceBar, assertBarAfter, assertBarShape } from "../market/price_bar.js";
import { IndicatorState, createIndicatorState } from "./indicator_state.js";
import { directionalIndex, directionalMovement } from "./wilder.js";

export interface DoubleDouble {
    readonly hi: number;
    readonly lo: number;
}

export interface CompensatedState {
    readonly base: IndicatorState;
    readonly tr: DoubleDouble;
    readonly plusDm: DoubleDouble;
    readonly minusDm: DoubleDouble;
    readonly dxSum: DoubleDouble;
    readonly adx: DoubleDouble | null;
}

// ============================================================================
// DOUBLE-DOUBLE ARITHMETIC (Knuth two-sum, Dekker two-product)
// ============================================================================

const ZERO: DoubleDouble = Object.freeze({ hi: 0, lo: 0 });
const SPLITTER = 134217729; // 2^27 + 1

function quickTwoSum(a: number, b: number): DoubleDouble {
    const s = a + b;
    return { hi: s, lo: b - (s - a) };
}

function twoSum(a: number, b: number): DoubleDouble {
    const s = a + b;
    const bb = s - a;
    return { hi: s, lo: (a - (s - bb)) + (b - bb) };
}

function split(a: number): DoubleDouble {
    const t = SPLITTER * a;
    const hi = t - (t - a);
    return { hi, lo: a - hi };
}

function twoProduct(a: number, b: number): DoubleDouble {
    const p = a * b;
    const sa = split(a);
    const sb = split(b);
    const err = ((sa.hi * sb.hi - p) + sa.hi * sb.lo + sa.lo * sb.hi) + sa.lo * sb.lo;
    return { hi: p, lo: err };
}

export function ddAddNumber(x: DoubleDouble, b: number): DoubleDouble {
    const s = twoSum(x.hi, b);
    return quickTwoSum(s.hi, s.lo + x.lo);
}

export function ddAdd(x: DoubleDouble, y: DoubleDouble): DoubleDouble {
    const s = twoSum(x.hi, y.hi);
    return quickTwoSum(s.hi, s.lo + x.lo + y.lo);
}

export function ddMulNumber(x: DoubleDouble, b: number): DoubleDouble {
    const p = twoProduct(x.hi, b);
    return quickTwoSum(p.hi, p.lo + x.lo * b);
}

export function ddDivNumber(x: DoubleDouble, d: number): DoubleDouble {
    const q = x.hi / d;
    const p = twoProduct(q, d);
    const r = ((x.hi - p.hi) - p.lo + x.lo) / d;
    return quickTwoSum(q, r);
}

export function ddValue(x: DoubleDouble): number {
    return x.hi + x.lo;
}

function ddWilderStep(previous: DoubleDouble, raw: number, period: number): DoubleDouble {
    const decay = ddDivNumber(previous, period);
    return ddAddNumber(ddAdd(previous, { hi: -decay.hi, lo: -decay.lo }), raw);
}

// ============================================================================
// STATE TRANSITION
// ============================================================================

export function createCompensatedState(period: number): CompensatedState {
    return Object.freeze({
        base: createIndicatorState(period),
        tr: ZERO,
        plusDm: ZERO,
        minusDm: ZERO,
        dxSum: ZERO,
        adx: null,
    });
}

export function updateCompensatedState(prior: CompensatedState, bar: PriceBar): CompensatedState {
    assertBarShape(bar);
    assertBarAfter(prior.base.lastTimestamp, bar);

    const { period } = prior.base;
    const barCount = prior.base.barCount + 1;
    const move = directionalMovement(prior.base.prevBar, bar);
    const prevBar = Object.freeze({ high: bar.high, low: bar.low, close: bar.close });

    const summing = barCount <= period;
    const tr = summing ? ddAddNumber(prior.tr, move.trueRange) : ddWilderStep(prior.tr, move.trueRange, period);
    const plusDm = summing ? ddAddNumber(prior.plusDm, move.plusDm) : ddWilderStep(prior.plusDm, move.plusDm, period);
    const minusDm = summing ? ddAddNumber(prior.minusDm, move.minusDm) : ddWilderStep(prior.minusDm, move.minusDm, period);

    const smoothedTr = ddValue(tr);
    const smoothedPlusDm = ddValue(plusDm);
    const smoothedMinusDm = ddValue(minusDm);

    if (barCount < period) {
        return Object.freeze({
            ...prior,
            base: Object.freeze({ ...prior.base, barCount, prevBar, lastTimestamp: bar.timestamp, smoothedTr, smoothedPlusDm, smoothedMinusDm }),
            tr,
            plusDm,
            minusDm,
        });
    }

    const plusDI = smoothedTr > 0 ? (100 * smoothedPlusDm) / smoothedTr : 0;
    const minusDI = smoothedTr > 0 ? (100 * smoothedMinusDm) / smoothedTr : 0;
    const dx = directionalIndex(plusDI, minusDI);

    let dxSum = prior.dxSum;
    let dxCount = prior.base.dxCount;
    let adx = prior.adx;
    if (adx === null) {
        dxSum = ddAddNumber(dxSum, dx);
        dxCount += 1;
        if (dxCount === period) {
            adx = ddDivNumber(dxSum, period);
        }
    } else {
        adx = ddDivNumber(ddAddNumber(ddMulNumber(adx, period - 1), dx), period);
    }

    const base: IndicatorState = Object.freeze({
        period,
        barCount,
        prevBar,
        lastTimestamp: bar.timestamp,
        smoothedTr,
        smoothedPlusDm,
        smoothedMinusDm,
        atr: Math.max(0, smoothedTr / period),
        dxSum: ddValue(dxSum),
        dxCount,
        adx: adx === null ? null : ddValue(adx),
    });

    return Object.freeze({ base, tr, plusDm, minusDm, dxSum, adx });
}
