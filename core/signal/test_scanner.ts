/**
 * test_scanner.ts: watchlist scan with a mix of healthy and failing instruments.
 *
 * PROOF REQUIREMENTS:
 * 1. One failing instrument never rejects the whole scan
 * 2. Source errors become SOURCE_UNAVAILABLE decisions
 * 3. Results are ranked approvals first, then by reason priority and ADX
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DataIntegrityError, PriceSourceError, SignalErrorCode } from "../errors/signal_error.js";
import { IndicatorReading } from "../indicators/indicator_state.js";
import { PriceBar } from "../market/price_bar.js";
import { PriceSource } from "../market/price_source.js";
import { ManualPriceSource } from "../market/sources/manual_price_source.js";
import { createRiskParameters } from "../risk/risk_parameters.js";
import { barsFromCloses, flatBars, swingCloses, trendingBars } from "../testing/bar_fixtures.js";
import { parseWatchlist, rankDecisions, scanInstrument, scanInstruments } from "./scanner.js";
import { evaluateSetup, rejectSetup } from "./orchestrator.js";
import { SetupGrade } from "./setup_grade.js";
import { SignalReasonCode } from "./signal_reason_code.js";

const NOW = 1735656582000;

const PARAMS = createRiskParameters({ accountEquity: 10000, riskPercent: 0.01, maxAccountSize: 10000 });

function reading(adx: number): IndicatorReading {
    return Object.freeze({ atr: 2, adx, plusDI: 30, minusDI: 10, dx: 50, adxSeeded: true, asOf: NOW - 1000 });
}

/**
 * Manual bars for the healthy instruments, scripted failures for the rest.
 */
function createStubSource(): PriceSource {
    const manual = new ManualPriceSource("stub");
    manual.record("TRND", trendingBars(40));
    manual.record("FLAT", flatBars(40));
    manual.record("PULL", barsFromCloses(swingCloses(210, 30, 3, 3, 5)));
    manual.record("RISE", trendingBars(220));

    return {
        name: "stub",
        capabilities: manual.capabilities,
        async getBars(instrument: string, lookback: number): Promise<PriceBar[]> {
            if (instrument === "DOWN") {
                throw new PriceSourceError("stub", SignalErrorCode.SOURCE_SERVER_ERROR, "HTTP 503 for DOWN", 503);
            }
            if (instrument === "BROKEN") {
                throw new DataIntegrityError("bar high 1 is below low 2");
            }
            if (instrument === "FLAKY") {
                throw new Error("fetch failed");
            }
            return manual.getBars(instrument, lookback);
        },
    };
}

describe("parseWatchlist", () => {
    it("trims, uppercases and de-duplicates", () => {
        assert.deepEqual(parseWatchlist("aapl, tsla,,MSFT , aapl"), ["AAPL", "TSLA", "MSFT"]);
    });

    it("returns nothing for an empty list", () => {
        assert.deepEqual(parseWatchlist(" , "), []);
    });
});

describe("scanInstrument", () => {
    it("uses the latest close as the entry", async () => {
        const decision = await scanInstrument("TRND", createStubSource(), PARAMS, { lookback: 40, now: NOW });
        assert.equal(decision.entryPrice, 178);
        assert.equal(decision.accepted, true);
        assert.equal(decision.side, "LONG");
    });

    it("passes the requested side through", async () => {
        const decision = await scanInstrument("TRND", createStubSource(), PARAMS, { lookback: 40, side: "SHORT", now: NOW });
        assert.equal(decision.side, "SHORT");
        assert.equal(decision.stopLoss !== null && decision.stopLoss > 178, true);
    });

    it("maps a source failure to SOURCE_UNAVAILABLE", async () => {
        const decision = await scanInstrument("DOWN", createStubSource(), PARAMS, { lookback: 40, now: NOW });
        assert.equal(decision.reason_code, SignalReasonCode.SOURCE_UNAVAILABLE);
        assert.equal(decision.reason, "price source unavailable: HTTP 503 for DOWN");
        assert.equal(decision.entryPrice, 0);
    });

    it("wraps a raw network error", async () => {
        const decision = await scanInstrument("FLAKY", createStubSource(), PARAMS, { lookback: 40, now: NOW });
        assert.equal(decision.reason_code, SignalReasonCode.SOURCE_UNAVAILABLE);
        assert.equal(decision.reason, "price source unavailable: Connection to stub failed: fetch failed");
    });

    it("maps corrupt bars from the source to BAD_INPUT_DATA", async () => {
        const decision = await scanInstrument("BROKEN", createStubSource(), PARAMS, { lookback: 40, now: NOW });
        assert.equal(decision.reason_code, SignalReasonCode.BAD_INPUT_DATA);
        assert.equal(decision.reason, "bad input data: bar high 1 is below low 2");
    });

    it("reports an unknown instrument as missing history", async () => {
        const decision = await scanInstrument("NONE", createStubSource(), PARAMS, { lookback: 40, now: NOW });
        assert.equal(decision.reason_code, SignalReasonCode.INSUFFICIENT_HISTORY);
        assert.equal(decision.reason, "insufficient history: 0 bars available, 14 required");
    });
});

describe("scanInstruments", () => {
    it("evaluates every instrument and ranks the results", async () => {
        const results = await scanInstruments(
            ["DOWN", "FLAT", "NONE", "TRND", "BROKEN"],
            createStubSource(),
            PARAMS,
            { lookback: 40, now: NOW }
        );

        assert.deepEqual(
            results.map((d) => [d.instrument, d.reason_code]),
            [
                ["TRND", SignalReasonCode.APPROVED],
                ["FLAT", SignalReasonCode.CHOP_ZONE],
                ["NONE", SignalReasonCode.INSUFFICIENT_HISTORY],
                ["BROKEN", SignalReasonCode.BAD_INPUT_DATA],
                ["DOWN", SignalReasonCode.SOURCE_UNAVAILABLE],
            ]
        );
        assert.ok(results.every((d) => d.evaluatedAt === NOW));
    });

    it("ranks accepted setups by grade before ADX", async () => {
        const results = await scanInstruments(["RISE", "FLAT", "PULL"], createStubSource(), PARAMS, { lookback: 300, now: NOW });
        assert.deepEqual(
            results.map((d) => [d.instrument, d.grade]),
            [
                ["PULL", SetupGrade.BUY_SIGNAL],
                ["RISE", SetupGrade.WAIT],
                ["FLAT", SetupGrade.UNRATED],
            ]
        );
        assert.equal(results[0]?.entryPrice, 443);
    });
});

describe("rankDecisions", () => {
    it("breaks reason ties by ADX, then by instrument", () => {
        const base = rejectSetup({ instrument: "B", entryPrice: 10, side: "LONG" }, SignalReasonCode.CHOP_ZONE, "chop", NOW);
        const strong = { ...base, instrument: "C", adx: 15 };
        const weak = { ...base, instrument: "A", adx: 5 };
        const tiedA = { ...base, instrument: "A", adx: 15 };

        const ranked = rankDecisions([weak, strong, tiedA]);
        assert.deepEqual(ranked.map((d) => [d.instrument, d.adx]), [["A", 15], ["C", 15], ["A", 5]]);
    });

    it("puts every accepted decision first, the stronger ADX ahead whether capped or not", () => {
        const approved = evaluateSetup({ instrument: "WEAK", entryPrice: 100, side: "LONG" }, reading(21), PARAMS, NOW);
        const capped = evaluateSetup(
            { instrument: "STRONG", entryPrice: 100, side: "LONG" },
            reading(60),
            createRiskParameters({ accountEquity: 10000, riskPercent: 0.01, maxAccountSize: 2000 }),
            NOW
        );
        const chop = rejectSetup({ instrument: "CHOP", entryPrice: 10, side: "LONG" }, SignalReasonCode.CHOP_ZONE, "chop", NOW);
        assert.equal(approved.reason_code, SignalReasonCode.APPROVED);
        assert.equal(capped.reason_code, SignalReasonCode.APPROVED_CAPPED);

        const ranked = rankDecisions([chop, approved, capped]);
        assert.deepEqual(
            ranked.map((d) => `${d.instrument}:${d.reason_code}:${d.adx}`),
            ["STRONG:APPROVED_CAPPED:60", "WEAK:APPROVED:21", "CHOP:CHOP_ZONE:null"]
        );
    });

    it("orders accepted decisions by grade ahead of ADX", () => {
        const strongWait = { ...evaluateSetup({ instrument: "A", entryPrice: 100, side: "LONG" }, reading(80), PARAMS, NOW), grade: SetupGrade.WAIT };
        const weakBuy = { ...evaluateSetup({ instrument: "B", entryPrice: 100, side: "LONG" }, reading(25), PARAMS, NOW), grade: SetupGrade.BUY_SIGNAL };
        assert.deepEqual(rankDecisions([strongWait, weakBuy]).map((d) => d.instrument), ["B", "A"]);
    });
});
