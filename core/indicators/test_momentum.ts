/**
 * test_momentum.ts: trend EMA, RSI, MACD and average volume.
 *
 * PROOF REQUIREMENTS:
 * 1. EMAs seed from the simple mean, then smooth with 2 / (length + 1)
 * 2. RSI uses Wilder averages of gains and losses
 * 3. Every field stays null until its own warm-up completes
 * 4. A rejected bar leaves the state alone
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DataIntegrityError, InvalidInputError } from "../errors/signal_error.js";
import { PriceBar } from "../market/price_bar.js";
import { bar, closeTo } from "../testing/bar_fixtures.js";
import {
    MomentumConfig,
    MomentumReading,
    createEmaState,
    createMomentumState,
    momentumWarmUpBars,
    relativeStrength,
    replayMomentumHistory,
    stepEma,
    updateMomentumState,
} from "./momentum.js";

function closeBars(closes: readonly number[], volumes: readonly number[] = []): PriceBar[] {
    return closes.map((close, i) => bar(i, close, close + 1, close - 1, close, volumes[i] ?? 1000));
}

function readingsOf(bars: readonly PriceBar[], config: Partial<MomentumConfig>): MomentumReading[] {
    let state = createMomentumState(config);
    return bars.map((b) => {
        const update = updateMomentumState(state, b);
        state = update.state;
        return update.reading;
    });
}

describe("stepEma", () => {
    it("seeds with the mean of the first `length` inputs", () => {
        let ema = createEmaState(3);
        ema = stepEma(ema, 1);
        assert.equal(ema.value, null);
        ema = stepEma(ema, 2);
        assert.equal(ema.value, null);
        ema = stepEma(ema, 3);
        assert.equal(ema.value, 2);
    });

    it("smooths with 2 / (length + 1) after the seed", () => {
        let ema = createEmaState(3);
        for (const x of [1, 2, 3, 6]) {
            ema = stepEma(ema, x);
        }
        assert.equal(ema.value, 4);
        assert.equal(ema.count, 4);
    });
});

describe("relativeStrength", () => {
    it("reads 50 with neither gains nor losses and 100 without losses", () => {
        assert.equal(relativeStrength(0, 0), 50);
        assert.equal(relativeStrength(1.5, 0), 100);
    });

    it("is 100 - 100 / (1 + gain / loss)", () => {
        assert.equal(relativeStrength(1, 1), 50);
        assert.equal(relativeStrength(0, 2), 0);
        assert.ok(closeTo(relativeStrength(2, 1), 100 - 100 / 3));
    });
});

describe("updateMomentumState", () => {
    it("seeds RSI after `rsiLength` changes, then Wilder-averages", () => {
        // changes: +1, -0.5, +1
        const readings = readingsOf(closeBars([10, 11, 10.5, 11.5]), { rsiLength: 2, trendEmaLength: 3, macdFast: 1, macdSlow: 2, macdSignal: 1, volumeWindow: 1 });
        assert.equal(readings[0]?.rsi, null);
        assert.equal(readings[1]?.rsi, null);
        // avgGain 0.5, avgLoss 0.25
        assert.ok(closeTo(readings[2]?.rsi ?? NaN, 200 / 3));
        // avgGain (0.5 + 1) / 2, avgLoss 0.25 / 2
        assert.ok(closeTo(readings[3]?.rsi ?? NaN, 100 - 100 / 7));
    });

    it("builds MACD from the fast and slow EMAs and its signal line from MACD", () => {
        const readings = readingsOf(closeBars([1, 2, 3, 4, 5]), { trendEmaLength: 3, rsiLength: 2, macdFast: 2, macdSlow: 3, macdSignal: 2, volumeWindow: 2 });
        assert.deepEqual(
            readings.map((r) => [r.trendEma, r.macd, r.macdSignal]),
            [
                [null, null, null],
                [null, null, null],
                [2, 0.5, null],
                [3, 0.5, 0.5],
                [4, 0.5, 0.5],
            ]
        );
    });

    it("averages volume over a full window only", () => {
        const readings = readingsOf(closeBars([10, 11, 12, 13], [100, 300, 500, 0]), { volumeWindow: 3 });
        assert.deepEqual(readings.map((r) => r.avgVolume), [null, null, 300, 800 / 3]);
        assert.deepEqual(readings.map((r) => r.volume), [100, 300, 500, 0]);
    });

    it("reports the close and timestamp of the bar", () => {
        const [reading] = readingsOf(closeBars([42]), {});
        assert.equal(reading?.close, 42);
        assert.equal(reading?.asOf, bar(0, 0, 0, 0, 0).timestamp);
        assert.equal(reading?.trendEma, null);
        assert.equal(reading?.rsi, null);
    });

    it("rejects out-of-order and malformed bars without touching the state", () => {
        const state = updateMomentumState(createMomentumState(), bar(5, 10, 11, 9, 10)).state;
        assert.throws(() => updateMomentumState(state, bar(5, 10, 11, 9, 10)), DataIntegrityError);
        assert.throws(() => updateMomentumState(state, bar(6, 10, 11, 9, 10, -1)), DataIntegrityError);
        assert.throws(() => updateMomentumState(state, bar(6, 10, 9, 11, 10)), DataIntegrityError);
        assert.equal(state.barCount, 1);
        assert.deepEqual(state.volumes, [1000]);
    });
});

describe("createMomentumState", () => {
    it("uses the swing defaults", () => {
        const { config } = createMomentumState();
        assert.deepEqual(config, { trendEmaLength: 200, rsiLength: 14, macdFast: 12, macdSlow: 26, macdSignal: 9, volumeWindow: 20 });
        assert.equal(momentumWarmUpBars(config), 200);
    });

    it("rejects non-positive lengths and a fast MACD not shorter than the slow one", () => {
        assert.throws(() => createMomentumState({ rsiLength: 0 }), InvalidInputError);
        assert.throws(() => createMomentumState({ trendEmaLength: 2.5 }), InvalidInputError);
        assert.throws(
            () => createMomentumState({ macdFast: 26, macdSlow: 26 }),
            (error: unknown) =>
                error instanceof InvalidInputError &&
                error.message === "bad input data: macdFast (26) must be shorter than macdSlow (26)"
        );
    });
});

describe("replayMomentumHistory", () => {
    it("returns null for no bars and the last reading otherwise", () => {
        assert.equal(replayMomentumHistory([]), null);
        const bars = closeBars([1, 2, 3, 4, 5]);
        const config = { trendEmaLength: 3 };
        assert.deepEqual(replayMomentumHistory(bars, config), readingsOf(bars, config)[4]);
    });
});
