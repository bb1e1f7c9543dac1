/**
 * SetupGrade - momentum grading of a long swing setup.
 * Pure function. NO SIDE EFFECTS.
 *
 * Grading is informational: it ranks scan results, it never approves or
 * rejects a trade (that is the pipeline's job).
 *
 *   close <= trend EMA            -> AVOID (downtrend)
 *   ADX < threshold               -> AVOID (chop zone)
 *   RSI < 30                      -> STRONG_BUY
 *   RSI < 50, MACD > signal       -> BUY_SIGNAL
 *   RSI < 50                      -> WATCHLIST
 *   otherwise                     -> WAIT
 */

import { formatAdx } from "../gates/trend_quality_filter.js";
import { MomentumReading } from "../indicators/momentum.js";
import { TradeSide } from "../risk/volatility_levels.js";

export enum SetupGrade {
    STRONG_BUY = "STRONG_BUY",
    BUY_SIGNAL = "BUY_SIGNAL",
    WATCHLIST = "WATCHLIST",
    WAIT = "WAIT",
    AVOID = "AVOID",

    /** Short side, missing momentum warm-up, or no indicator data at all */
    UNRATED = "UNRATED",
}

export const GRADE_PRIORITY: Readonly<Record<SetupGrade, number>> = Object.freeze({
    [SetupGrade.STRONG_BUY]: 0,
    [SetupGrade.BUY_SIGNAL]: 1,
    [SetupGrade.WATCHLIST]: 2,
    [SetupGrade.WAIT]: 3,
    [SetupGrade.AVOID]: 4,
    [SetupGrade.UNRATED]: 5,
});

export const OVERSOLD_RSI = 30;
export const PULLBACK_RSI = 50;

export type TrendDirection = "UPTREND" | "DOWNTREND";

export interface GradeInput {
    readonly side: TradeSide;
    readonly adx: number;
    readonly adxThreshold: number;
    readonly momentum: MomentumReading | null;
}

export interface GradeResult {
    readonly grade: SetupGrade;
    readonly trend: TrendDirection | null;
    readonly note: string;
}

export const UNGRADED: GradeResult = Object.freeze({
    grade: SetupGrade.UNRATED,
    trend: null,
    note: "not graded",
});

function result(grade: SetupGrade, trend: TrendDirection | null, note: string): GradeResult {
    return Object.freeze({ grade, trend, note });
}

export function gradeSetup(input: GradeInput): GradeResult {
    const { side, adx, adxThreshold, momentum } = input;

    if (side !== "LONG") {
        return result(SetupGrade.UNRATED, null, "grading covers long setups only");
    }
    if (momentum === null || momentum.trendEma === null || momentum.rsi === null) {
        return result(SetupGrade.UNRATED, null, "momentum warm-up incomplete");
    }

    const trend: TrendDirection = momentum.close > momentum.trendEma ? "UPTREND" : "DOWNTREND";
    if (trend === "DOWNTREND") {
        return result(SetupGrade.AVOID, trend, "downtrend: close below trend EMA");
    }

    const adxText = `ADX ${formatAdx(adx)}`;
    if (!(adx >= adxThreshold)) {
        return result(SetupGrade.AVOID, trend, `weak trend: ${adxText} < ${adxThreshold}`);
    }

    const { rsi, macd, macdSignal } = momentum;
    if (rsi < OVERSOLD_RSI) {
        return result(SetupGrade.STRONG_BUY, trend, `extreme oversold: RSI ${rsi.toFixed(2)}, ${adxText}`);
    }
    if (rsi < PULLBACK_RSI) {
        if (macd !== null && macdSignal !== null && macd > macdSignal) {
            return result(SetupGrade.BUY_SIGNAL, trend, `pullback with MACD cross: RSI ${rsi.toFixed(2)}, ${adxText}`);
        }
        return result(SetupGrade.WATCHLIST, trend, `pullback active, waiting for MACD turn: RSI ${rsi.toFixed(2)}, ${adxText}`);
    }

    return result(SetupGrade.WAIT, trend, `uptrend but extended: RSI ${rsi.toFixed(2)}, ${adxText}`);
}
