/**
 * computeLevels - ATR-based stop-loss and optional reward target.
 * Pure function. NO SIDE EFFECTS.
 *
 * LONG:  stop = entry - multiplier * atr
 * SHORT: stop = entry + multiplier * atr
 * target = entry + rewardMultiple * (entry - stop)   (direction of the trade)
 */

import { InvalidInputError } from "../errors/signal_error.js";
import { DEFAULT_ATR_MULTIPLIER } from "./risk_parameters.js";

export type TradeSide = "LONG" | "SHORT";

export interface LevelsInput {
    readonly entryPrice: number;
    readonly atr: number;
    readonly side: TradeSide;
    readonly multiplier?: number;
    readonly rewardMultiple?: number;
}

export interface TradeLevels {
    readonly stopLoss: number;

    /** null when no reward multiple is configured */
    readonly targetPrice: number | null;

    /** |entry - stop| */
    readonly stopDistance: number;
}

export function computeLevels(input: LevelsInput): TradeLevels {
    const { entryPrice, atr, side, rewardMultiple } = input;
    const multiplier = input.multiplier ?? DEFAULT_ATR_MULTIPLIER;

    if (!Number.isFinite(atr) || atr <= 0) {
        throw new InvalidInputError("NO_VOLATILITY_BASIS", `no volatility basis: ATR ${atr}`, { atr });
    }
    if (!Number.isFinite(entryPrice) || entryPrice <= 0) {
        throw new InvalidInputError("BAD_INPUT", `bad input data: entry price must be positive, got ${entryPrice}`, { entryPrice });
    }
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
        throw new InvalidInputError("BAD_INPUT", `bad input data: ATR multiplier must be positive, got ${multiplier}`, { multiplier });
    }
    if (rewardMultiple !== undefined && (!Number.isFinite(rewardMultiple) || rewardMultiple <= 0)) {
        throw new InvalidInputError("BAD_INPUT", `bad input data: reward multiple must be positive, got ${rewardMultiple}`, { rewardMultiple });
    }

    const offset = multiplier * atr;
    const stopLoss = side === "LONG" ? entryPrice - offset : entryPrice + offset;

    if (stopLoss <= 0) {
        throw new InvalidInputError(
            "BAD_INPUT",
            `bad input data: stop-loss ${stopLoss} is at or below zero (entry ${entryPrice}, ${multiplier} x ATR ${atr})`,
            { stopLoss }
        );
    }

    const targetPrice = rewardMultiple === undefined
        ? null
        : entryPrice + rewardMultiple * (entryPrice - stopLoss);

    if (targetPrice !== null && targetPrice <= 0) {
        throw new InvalidInputError("BAD_INPUT", `bad input data: target ${targetPrice} is at or below zero`, { targetPrice });
    }

    return Object.freeze({
        stopLoss,
        targetPrice,
        stopDistance: Math.abs(entryPrice - stopLoss),
    });
}
