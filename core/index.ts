/**
 * Swing Setup Scanner - Public Exports
 */

// Errors
export {
    SignalError,
    SignalErrorCode,
    DataIntegrityError,
    InsufficientHistoryError,
    InvalidInputError,
    PriceSourceError,
    createPriceSourceError,
    isRetryableError
} from "./errors/signal_error.js";
export type { SignalErrorDetail, InvalidInputKind } from "./errors/signal_error.js";

// Market data
export { toPriceBar, validateBarSequence } from "./market/price_bar.js";
export type { PriceBar } from "./market/price_bar.js";
export type { PriceSource, PriceSourceCapabilities } from "./market/price_source.js";
export { AlpacaPriceSource } from "./market/sources/alpaca_price_source.js";
export type { AlpacaCredentials, AlpacaPriceSourceOptions, FetchLike } from "./market/sources/alpaca_price_source.js";
export { ManualPriceSource } from "./market/sources/manual_price_source.js";
export { createPriceSource } from "./market/sources/create_price_source.js";

// Indicators
export {
    DEFAULT_INDICATOR_PERIOD,
    createIndicatorState,
    warmUpBars,
    adxSeedBars
} from "./indicators/indicator_state.js";
export type { IndicatorState, IndicatorReading } from "./indicators/indicator_state.js";
export { updateIndicatorState, directionalMovement, directionalIndex, readingFromState } from "./indicators/wilder.js";
export type { IndicatorUpdate } from "./indicators/wilder.js";
export { replayIndicatorHistory } from "./indicators/replay.js";
export type { ReplayResult } from "./indicators/replay.js";
export { IndicatorEngine, IndicatorRegistry } from "./indicators/indicator_engine.js";
export type { IndicatorEngineOptions, ReconcileReport } from "./indicators/indicator_engine.js";
export { createCompensatedState, updateCompensatedState } from "./indicators/compensated.js";
export type { CompensatedState, DoubleDouble } from "./indicators/compensated.js";
export {
    DEFAULT_MOMENTUM_CONFIG,
    createMomentumState,
    updateMomentumState,
    replayMomentumHistory,
    momentumWarmUpBars
} from "./indicators/momentum.js";
export type { MomentumConfig, MomentumReading, MomentumState, MomentumUpdate } from "./indicators/momentum.js";

// Gates and risk
export { evaluateTrendQuality, DEFAULT_ADX_THRESHOLD } from "./gates/trend_quality_filter.js";
export type { TrendVerdict } from "./gates/trend_quality_filter.js";
export { computeLevels } from "./risk/volatility_levels.js";
export type { LevelsInput, TradeLevels, TradeSide } from "./risk/volatility_levels.js";
export { sizePosition, INSUFFICIENT_CAPITAL_REASON } from "./risk/banker.js";
export type { SizingInput, SizingResult, SizingLimit, SolvencyVerdict } from "./risk/banker.js";
export {
    DEFAULT_ATR_MULTIPLIER,
    createRiskParameters,
    validateRiskParameters
} from "./risk/risk_parameters.js";
export type { RiskParameters, RiskParametersInput } from "./risk/risk_parameters.js";

// Orchestration
export { evaluateSetup, evaluateFromHistory, rejectSetup } from "./signal/orchestrator.js";
export { scanInstruments, scanInstrument, parseWatchlist, rankDecisions } from "./signal/scanner.js";
export type { ScanOptions } from "./signal/scanner.js";
export { SignalReasonCode, REASON_PRIORITY, isApproval } from "./signal/signal_reason_code.js";
export { STAGE_TRANSITIONS, StageTrail, isValidStageTransition } from "./signal/signal_stage.js";
export type { SignalStage } from "./signal/signal_stage.js";
export type { Decision, TradeSetup } from "./signal/decision.js";
export { SetupGrade, GRADE_PRIORITY, gradeSetup } from "./signal/setup_grade.js";
export type { GradeInput, GradeResult, TrendDirection } from "./signal/setup_grade.js";

// Collaborator adapters
export { emitDecisionEvent, createJsonlSink, decisionEventId } from "./ops/emit_decision_event.js";
export type { DecisionEventSink } from "./ops/emit_decision_event.js";
export type { OpsDecisionEvent } from "./events/ops_decision_event.js";
export { FileSettingsStore, MemorySettingsStore, parseSettings } from "./settings/settings_store.js";
export type { ScannerSettings, SettingsStore } from "./settings/settings_store.js";
export { createScannerApp } from "./scanner-api/app.js";
export type { ScannerDeps } from "./scanner-api/deps.js";
