/**
 * emitDecisionEvent - Deterministically emits a Decision as an OpsDecisionEvent.
 * Same decision -> same event_id. Appends to the audit log and logs the event.
 */

import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { OpsDecisionEvent } from "../events/ops_decision_event.js";
import { Decision } from "../signal/decision.js";

export type DecisionEventSink = (event: OpsDecisionEvent) => void;

/**
 * Sink appending one JSON line per event. Write failures are logged and do
 * not fail the evaluation that produced the event.
 */
export function createJsonlSink(filePath: string): DecisionEventSink {
    return (event) => {
        try {
            fs.mkdirSync(path.dirname(filePath), { recursive: true });
            fs.appendFileSync(filePath, JSON.stringify(event) + "\n");
        } catch (e) {
            console.error(`[OPS_EVENT] Failed to append ${event.event_id} to ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
        }
    };
}

export function decisionEventId(decision: Decision): string {
    return createHash("sha256")
        .update(
            `${decision.instrument}:${decision.side}:${decision.evaluatedAt}:${decision.reason_code}:${decision.entryPrice}:${decision.positionSize}:${decision.stopLoss}`
        )
        .digest("hex")
        .substring(0, 16);
}

/**
 * Emit an OpsDecisionEvent for a Decision.
 *
 * @param decision - The evaluated decision
 * @param sink - Where to persist the event (skipped when omitted)
 */
export function emitDecisionEvent(decision: Decision, sink?: DecisionEventSink): OpsDecisionEvent {
    const event: OpsDecisionEvent = Object.freeze({
        event_type: "SETUP_EVALUATED",
        event_id: decisionEventId(decision),
        instrument: decision.instrument,
        side: decision.side,
        outcome: decision.accepted ? "ACCEPTED" : "REJECTED",
        reason_code: decision.reason_code,
        reason: decision.reason,
        grade: decision.grade,
        evaluated_at: decision.evaluatedAt,
        metrics: Object.freeze({
            entry_price: decision.entryPrice,
            adx: decision.adx,
            atr: decision.atr,
            stop_loss: decision.stopLoss,
            target_price: decision.targetPrice,
            position_size: decision.positionSize,
            risk_amount: decision.riskAmount,
        }),
    });

    if (sink) {
        sink(event);
    }

    console.log(`[OPS_EVENT] ${JSON.stringify(event)}`);

    return event;
}
