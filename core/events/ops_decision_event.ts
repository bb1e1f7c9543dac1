/**
 * OpsDecisionEvent - audit record of one setup evaluation.
 * Deterministic, hash-stable.
 */

import { SetupGrade } from "../signal/setup_grade.js";
import { SignalReasonCode } from "../signal/signal_reason_code.js";

export interface OpsDecisionEvent {
    /** Event type identifier */
    readonly event_type: "SETUP_EVALUATED";

    /** Deterministic event ID (SHA-256, 16 chars) */
    readonly event_id: string;

    readonly instrument: string;
    readonly side: "LONG" | "SHORT";
    readonly outcome: "ACCEPTED" | "REJECTED";
    readonly reason_code: SignalReasonCode;
    readonly reason: string;
    readonly grade: SetupGrade;
    readonly evaluated_at: number;

    /** Sizing snapshot for historical display */
    readonly metrics: {
        readonly entry_price: number;
        readonly adx: number | null;
        readonly atr: number | null;
        readonly stop_loss: number | null;
        readonly target_price: number | null;
        readonly position_size: number;
        readonly risk_amount: number;
    };
}
