/**
 * SignalOrchestrator - trend gate -> risk levels -> solvency -> Decision.
 *
 * Every step is a pure computation over validated inputs, so there are no
 * retries: any failure is a terminal rejection of this evaluation only.
 * Evaluation reads indicator output; it never feeds bars into a shared engine.
 */

import {
    DataIntegrityError,
    InsufficientHistoryError,
    InvalidInputError,
} from "../errors/signal_error.js";
import { evaluateTrendQuality } from "../gates/trend_quality_filter.js";
import { IndicatorReading } from "../indicators/indicator_state.js";
import { MomentumReading, replayMomentumHistory } from "../indicators/momentum.js";
import { replayIndicatorHistory } from "../indicators/replay.js";
import { PriceBar, validateBarSequence } from "../market/price_bar.js";
import { SizingLimit, SizingResult, sizePosition } from "../risk/banker.js";
import { RiskParameters, validateRiskParameters } from "../risk/risk_parameters.js";
import { TradeLevels, computeLevels } from "../risk/volatility_levels.js";
import { Decision, TradeSetup } from "./decision.js";
import { GradeResult, UNGRADED, gradeSetup } from "./setup_grade.js";
import { SignalReasonCode } from "./signal_reason_code.js";
import { StageTrail } from "./signal_stage.js";

interface DecisionDraft {
    reading: IndicatorReading | null;
    momentum: MomentumReading | null;
    grade: GradeResult;
    levels: TradeLevels | null;
    sizing: SizingResult | null;
}

function riskReward(setup: TradeSetup, levels: TradeLevels | null): number | null {
    if (!levels || levels.targetPrice === null || levels.stopDistance === 0) {
        return null;
    }
    return Math.abs(levels.targetPrice - setup.entryPrice) / levels.stopDistance;
}

function decide(
    setup: TradeSetup,
    trail: StageTrail,
    draft: DecisionDraft,
    accepted: boolean,
    reason_code: SignalReasonCode,
    reason: string,
    now: number
): Decision {
    const stage = trail.current;
    trail.advance("DECIDED");

    const { reading, momentum, grade, levels, sizing } = draft;
    const cappedBy: SizingLimit | null = sizing ? sizing.cappedBy : null;

    return Object.freeze({
        instrument: setup.instrument,
        side: setup.side,
        entryPrice: setup.entryPrice,
        accepted,
        reason_code,
        reason,
        adx: reading ? reading.adx : null,
        atr: reading ? reading.atr : null,
        adxSeeded: reading ? reading.adxSeeded : false,
        readingAsOf: reading ? reading.asOf : null,
        momentum,
        grade: grade.grade,
        gradeNote: grade.note,
        trend: grade.trend,
        stopLoss: levels ? levels.stopLoss : null,
        targetPrice: levels ? levels.targetPrice : null,
        riskReward: riskReward(setup, levels),
        positionSize: sizing ? sizing.shares : 0,
        riskAmount: sizing ? sizing.riskAmount : 0,
        positionCost: sizing ? sizing.positionCost : 0,
        cappedBy,
        stage,
        trail: trail.toArray(),
        evaluatedAt: now,
    });
}

function invalidInputCode(error: InvalidInputError): SignalReasonCode {
    return error.kind === "NO_VOLATILITY_BASIS"
        ? SignalReasonCode.NO_VOLATILITY_BASIS
        : SignalReasonCode.BAD_INPUT_DATA;
}

/**
 * Run one pipeline step, handing back an InvalidInputError instead of throwing it.
 */
function attempt<T>(step: () => T): T | InvalidInputError {
    try {
        return step();
    } catch (error) {
        if (error instanceof InvalidInputError) {
            return error;
        }
        throw error;
    }
}

/**
 * Reject a setup before any indicator step ran (bad data, missing history, source failure).
 */
export function rejectSetup(
    setup: TradeSetup,
    reason_code: SignalReasonCode,
    reason: string,
    now: number
): Decision {
    return decide(setup, new StageTrail(), { reading: null, momentum: null, grade: UNGRADED, levels: null, sizing: null }, false, reason_code, reason, now);
}

/**
 * Evaluate one setup against the latest indicator reading.
 *
 * @param setup - Instrument, entry and side
 * @param reading - Latest reading from the instrument's indicator engine
 * @param params - Risk parameters for this evaluation
 * @param now - Evaluation timestamp (injected for determinism)
 * @param momentum - Latest momentum reading, used only for grading
 */
export function evaluateSetup(
    setup: TradeSetup,
    reading: IndicatorReading,
    params: RiskParameters,
    now: number,
    momentum: MomentumReading | null = null
): Decision {
    const trail = new StageTrail();
    const grade = gradeSetup({ side: setup.side, adx: reading.adx, adxThreshold: params.adxThreshold, momentum });
    const draft: DecisionDraft = { reading, momentum, grade, levels: null, sizing: null };

    const paramErrors = validateRiskParameters(params);
    if (paramErrors.length > 0) {
        return decide(setup, trail, draft, false, SignalReasonCode.BAD_INPUT_DATA, `bad input data: ${paramErrors.join("; ")}`, now);
    }

    // ========================================================================
    // STEP 1: Trend quality gate
    // ========================================================================
    const trend = evaluateTrendQuality(reading.adx, params.adxThreshold);
    if (!trend.accept) {
        return decide(setup, trail, draft, false, trend.reason_code ?? SignalReasonCode.CHOP_ZONE, trend.reason, now);
    }
    trail.advance("TREND_CHECKED");

    // ========================================================================
    // STEP 2: Volatility levels
    // ========================================================================
    const levels = attempt(() => computeLevels({
        entryPrice: setup.entryPrice,
        atr: reading.atr,
        side: setup.side,
        multiplier: params.atrMultiplier,
        rewardMultiple: params.rewardMultiple,
    }));
    if (levels instanceof InvalidInputError) {
        return decide(setup, trail, draft, false, invalidInputCode(levels), levels.message, now);
    }
    draft.levels = levels;
    trail.advance("RISK_COMPUTED");

    // ========================================================================
    // STEP 3: Sizing and solvency
    // ========================================================================
    const sizing = attempt(() => sizePosition({
        entryPrice: setup.entryPrice,
        stopLoss: levels.stopLoss,
        accountEquity: params.accountEquity,
        riskPercent: params.riskPercent,
        maxAccountSize: params.maxAccountSize,
    }));
    if (sizing instanceof InvalidInputError) {
        return decide(setup, trail, draft, false, invalidInputCode(sizing), sizing.message, now);
    }
    draft.sizing = sizing;
    trail.advance("SOLVENCY_CHECKED");

    // ========================================================================
    // STEP 4: Decision
    // ========================================================================
    const { verdict } = sizing;
    return decide(setup, trail, draft, verdict.approved, verdict.reason_code, verdict.reason, now);
}

/**
 * Replay raw bars through a fresh indicator engine, then evaluate.
 * Data and history errors become rejected decisions rather than exceptions.
 */
export function evaluateFromHistory(
    setup: TradeSetup,
    bars: readonly unknown[],
    params: RiskParameters,
    now: number
): Decision {
    let reading: IndicatorReading;
    let momentum: MomentumReading | null;
    try {
        const validated: PriceBar[] = validateBarSequence(bars);
        reading = replayIndicatorHistory(validated, params.atrPeriod).latest;
        momentum = replayMomentumHistory(validated);
    } catch (error) {
        if (error instanceof DataIntegrityError) {
            return rejectSetup(setup, SignalReasonCode.BAD_INPUT_DATA, `bad input data: ${error.message}`, now);
        }
        if (error instanceof InsufficientHistoryError) {
            return rejectSetup(setup, SignalReasonCode.INSUFFICIENT_HISTORY, error.message, now);
        }
        if (error instanceof InvalidInputError) {
            return rejectSetup(setup, invalidInputCode(error), error.message, now);
        }
        throw error;
    }

    return evaluateSetup(setup, reading, params, now, momentum);
}
