import { MomentumReading } from "../indicators/momentum.js";
import { SizingLimit } from "../risk/banker.js";
import { TradeSide } from "../risk/volatility_levels.js";
import { SetupGrade, TrendDirection } from "./setup_grade.js";
import { SignalReasonCode } from "./signal_reason_code.js";
import { SignalStage } from "./signal_stage.js";

export interface TradeSetup {
    readonly instrument: string;
    readonly entryPrice: number;
    readonly side: TradeSide;
}

/**
 * Decision - final, immutable output of one evaluation.
 * Rejected decisions still carry whatever was computed before the rejection.
 */
export interface Decision {
    readonly instrument: string;
    readonly side: TradeSide;
    readonly entryPrice: number;

    readonly accepted: boolean;
    readonly reason_code: SignalReasonCode;
    readonly reason: string;

    /** Indicator inputs (null when no reading was available) */
    readonly adx: number | null;
    readonly atr: number | null;
    readonly adxSeeded: boolean;
    readonly readingAsOf: number | null;

    /** Momentum snapshot and the grade derived from it (UNRATED without one) */
    readonly momentum: MomentumReading | null;
    readonly grade: SetupGrade;
    readonly gradeNote: string;
    readonly trend: TrendDirection | null;

    readonly stopLoss: number | null;
    readonly targetPrice: number | null;

    /** |target - entry| / |entry - stop|, null without a target */
    readonly riskReward: number | null;

    readonly positionSize: number;
    readonly riskAmount: number;
    readonly positionCost: number;
    readonly cappedBy: SizingLimit | null;

    /** Last stage reached before DECIDED, and the full path */
    readonly stage: SignalStage;
    readonly trail: readonly SignalStage[];

    readonly evaluatedAt: number;
}
