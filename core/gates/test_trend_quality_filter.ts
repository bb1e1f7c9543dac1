/**
 * test_trend_quality_filter.ts: chop-zone gate.
 *
 * PROOF REQUIREMENTS:
 * 1. ADX below the threshold is always rejected as CHOP_ZONE
 * 2. ADX at or above the threshold is accepted
 * 3. Non-finite input is BAD_INPUT_DATA, never a pass
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { SignalReasonCode } from "../signal/signal_reason_code.js";
import { DEFAULT_ADX_THRESHOLD, evaluateTrendQuality, formatAdx } from "./trend_quality_filter.js";

describe("evaluateTrendQuality", () => {
    it("rejects ADX below the threshold with the formatted value", () => {
        const verdict = evaluateTrendQuality(12.3456, 20);
        assert.deepEqual(verdict, {
            accept: false,
            reason_code: SignalReasonCode.CHOP_ZONE,
            reason: "chop zone: ADX 12.35 < 20",
        });
    });

    it("accepts ADX equal to the threshold", () => {
        const verdict = evaluateTrendQuality(20, 20);
        assert.equal(verdict.accept, true);
        assert.equal(verdict.reason_code, null);
        assert.equal(verdict.reason, "trending: ADX 20.00 >= 20");
    });

    it("defaults the threshold to 20", () => {
        assert.equal(DEFAULT_ADX_THRESHOLD, 20);
        assert.equal(evaluateTrendQuality(19.99).accept, false);
        assert.equal(evaluateTrendQuality(20.01).accept, true);
    });

    it("never passes a value below the threshold", () => {
        for (const threshold of [0.5, 15, 20, 25, 40]) {
            for (const adx of [0, 0.25, 5, 14.99, 19.999, 20, 24.9, 25, 39.99, 40, 75, 100]) {
                const verdict = evaluateTrendQuality(adx, threshold);
                if (adx < threshold) {
                    assert.equal(verdict.accept, false);
                    assert.equal(verdict.reason_code, SignalReasonCode.CHOP_ZONE);
                    assert.ok(verdict.reason.startsWith("chop zone: ADX "));
                } else {
                    assert.equal(verdict.accept, true);
                }
            }
        }
    });

    it("rejects non-finite input as bad data", () => {
        for (const adx of [NaN, Infinity, -Infinity]) {
            const verdict = evaluateTrendQuality(adx, 20);
            assert.equal(verdict.accept, false);
            assert.equal(verdict.reason_code, SignalReasonCode.BAD_INPUT_DATA);
        }
        assert.equal(
            evaluateTrendQuality(30, NaN).reason,
            "bad input data: ADX 30 / threshold NaN is not a finite number"
        );
    });

    it("returns frozen verdicts", () => {
        assert.ok(Object.isFrozen(evaluateTrendQuality(30)));
    });
});

describe("formatAdx", () => {
    it("rounds to two decimals", () => {
        assert.equal(formatAdx(0), "0.00");
        assert.equal(formatAdx(31.4159), "31.42");
    });
});
