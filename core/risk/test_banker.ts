/**
 * test_banker.ts: risk-budget sizing and the account-size clamp.
 *
 * PROOF REQUIREMENTS:
 * 1. Risk amount never exceeds equity * riskPercent
 * 2. Position cost never exceeds maxAccountSize
 * 3. The account-size cap wins over the risk budget
 * 4. A size of zero is INSUFFICIENT_CAPITAL, never an approval
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { InvalidInputError } from "../errors/signal_error.js";
import { SignalReasonCode } from "../signal/signal_reason_code.js";
import { INSUFFICIENT_CAPITAL_REASON, SizingInput, sizePosition } from "./banker.js";

// ============================================================================
// TEST HELPER
// ============================================================================

function createSizingInput(overrides: Partial<SizingInput> = {}): SizingInput {
    return Object.freeze({
        entryPrice: 100,
        stopLoss: 96,
        accountEquity: 10000,
        riskPercent: 0.01,
        maxAccountSize: 10000,
        ...overrides,
    });
}

describe("sizePosition", () => {
    it("sizes by the risk budget", () => {
        const result = sizePosition(createSizingInput());
        assert.equal(result.riskPerShare, 4);
        assert.equal(result.riskBudget, 100);
        assert.equal(result.shares, 25);
        assert.equal(result.riskAmount, 100);
        assert.equal(result.positionCost, 2500);
        assert.equal(result.cappedBy, "RISK");
        assert.deepEqual(result.verdict, {
            approved: true,
            reason_code: SignalReasonCode.APPROVED,
            reason: "approved: 25 units within risk budget 100",
        });
    });

    it("clamps to the account-size limit", () => {
        const result = sizePosition(createSizingInput({ maxAccountSize: 2000 }));
        assert.equal(result.shares, 20);
        assert.equal(result.riskAmount, 80);
        assert.equal(result.positionCost, 2000);
        assert.equal(result.cappedBy, "ACCOUNT_SIZE");
        assert.deepEqual(result.verdict, {
            approved: true,
            reason_code: SignalReasonCode.APPROVED_CAPPED,
            reason: "approved: 20 units, capped by account-size limit 2000 (risk budget allowed 25)",
        });
    });

    it("keeps the capped cost within the limit when the division rounds up", () => {
        // 102 / 1.36 is exactly 75, but 75 * 1.36 is 102.00000000000001
        const result = sizePosition(createSizingInput({ entryPrice: 1.36, stopLoss: 1.26, maxAccountSize: 102 }));
        assert.equal(result.shares, 74);
        assert.equal(result.positionCost, 100.64);
        assert.equal(result.cappedBy, "ACCOUNT_SIZE");
        assert.ok(result.positionCost <= 102);
        assert.equal(result.verdict.reason_code, SignalReasonCode.APPROVED_CAPPED);
    });

    it("sizes a short from the stop above entry", () => {
        const result = sizePosition(createSizingInput({ entryPrice: 50, stopLoss: 53 }));
        assert.equal(result.riskPerShare, 3);
        assert.equal(result.shares, 33);
        assert.equal(result.riskAmount, 99);
        assert.equal(result.positionCost, 1650);
    });

    it("reports insufficient capital when the risk budget buys nothing", () => {
        const result = sizePosition(createSizingInput({ accountEquity: 100 }));
        assert.equal(result.shares, 0);
        assert.equal(result.cappedBy, "RISK");
        assert.deepEqual(result.verdict, {
            approved: false,
            reason_code: SignalReasonCode.INSUFFICIENT_CAPITAL,
            reason: INSUFFICIENT_CAPITAL_REASON,
        });
    });

    it("reports insufficient capital when the cap is below one unit", () => {
        const result = sizePosition(createSizingInput({
            entryPrice: 3000,
            stopLoss: 2990,
            accountEquity: 100000,
            riskPercent: 0.05,
            maxAccountSize: 2000,
        }));
        assert.equal(result.shares, 0);
        assert.equal(result.cappedBy, "ACCOUNT_SIZE");
        assert.equal(result.verdict.reason_code, SignalReasonCode.INSUFFICIENT_CAPITAL);
    });

    it("rejects a stop equal to entry", () => {
        assert.throws(
            () => sizePosition(createSizingInput({ stopLoss: 100 })),
            (error: unknown) =>
                error instanceof InvalidInputError &&
                error.kind === "BAD_INPUT" &&
                error.message === "bad input data: stop equals entry, no risk-defined trade"
        );
    });

    it("rejects non-positive capital and out-of-range risk", () => {
        assert.throws(() => sizePosition(createSizingInput({ accountEquity: 0 })), InvalidInputError);
        assert.throws(() => sizePosition(createSizingInput({ maxAccountSize: -5 })), InvalidInputError);
        assert.throws(() => sizePosition(createSizingInput({ riskPercent: 0 })), InvalidInputError);
        assert.throws(() => sizePosition(createSizingInput({ riskPercent: 1.5 })), InvalidInputError);
        assert.throws(() => sizePosition(createSizingInput({ entryPrice: NaN })), InvalidInputError);
    });

    it("holds both solvency bounds for every approved size", () => {
        // Deterministic grid over prices, stops and account sizes
        for (const entryPrice of [0.5, 3, 17.25, 100, 640, 4999]) {
            for (const stopFraction of [0.002, 0.03, 0.25]) {
                for (const accountEquity of [500, 10000, 250000]) {
                    for (const riskPercent of [0.005, 0.02, 0.1]) {
                        for (const capRatio of [0.1, 1, 3]) {
                            const input = {
                                entryPrice,
                                stopLoss: entryPrice * (1 - stopFraction),
                                accountEquity,
                                riskPercent,
                                maxAccountSize: accountEquity * capRatio,
                            };
                            const result = sizePosition(input);
                            if (!result.verdict.approved) {
                                assert.equal(result.shares, 0);
                                continue;
                            }
                            assert.ok(result.shares > 0);
                            assert.ok(Number.isInteger(result.shares));
                            assert.ok(result.riskAmount <= accountEquity * riskPercent);
                            assert.ok(result.positionCost <= input.maxAccountSize);
                        }
                    }
                }
            }
        }
    });
});
