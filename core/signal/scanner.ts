/**
 * Watchlist scanner - fetch, evaluate and rank a list of instruments.
 *
 * Instruments are independent: each one gets its own indicator replay, and a
 * failure on one (bad data, source error) only rejects that instrument.
 */

import { DataIntegrityError, createPriceSourceError } from "../errors/signal_error.js";
import { PriceBar } from "../market/price_bar.js";
import { PriceSource } from "../market/price_source.js";
import { RiskParameters } from "../risk/risk_parameters.js";
import { TradeSide } from "../risk/volatility_levels.js";
import { Decision } from "./decision.js";
import { evaluateFromHistory, rejectSetup } from "./orchestrator.js";
import { GRADE_PRIORITY } from "./setup_grade.js";
import { REASON_PRIORITY, SignalReasonCode } from "./signal_reason_code.js";

export interface ScanOptions {
    /** Bars requested per instrument */
    readonly lookback: number;
    readonly side?: TradeSide;
    readonly now: number;
}

/**
 * "aapl, tsla,,MSFT , aapl" -> ["AAPL", "TSLA", "MSFT"]
 */
export function parseWatchlist(raw: string): string[] {
    const seen = new Set<string>();
    for (const part of raw.split(",")) {
        const ticker = part.trim().toUpperCase();
        if (ticker) seen.add(ticker);
    }
    return Array.from(seen);
}

/**
 * Accepted first, by setup grade then strongest ADX. Rejections follow,
 * by reason priority then ADX. Instrument name breaks the remaining ties.
 */
export function rankDecisions(decisions: readonly Decision[]): Decision[] {
    return [...decisions].sort((a, b) => {
        const byAcceptance = Number(b.accepted) - Number(a.accepted);
        if (byAcceptance !== 0) return byAcceptance;
        const byRank = a.accepted
            ? GRADE_PRIORITY[a.grade] - GRADE_PRIORITY[b.grade]
            : REASON_PRIORITY[a.reason_code] - REASON_PRIORITY[b.reason_code];
        if (byRank !== 0) return byRank;
        const byAdx = (b.adx ?? -1) - (a.adx ?? -1);
        if (byAdx !== 0) return byAdx;
        return a.instrument.localeCompare(b.instrument);
    });
}

/**
 * Evaluate one instrument: entry is the latest close.
 */
export async function scanInstrument(
    instrument: string,
    source: PriceSource,
    params: RiskParameters,
    options: ScanOptions
): Promise<Decision> {
    const side = options.side ?? "LONG";

    let bars: PriceBar[];
    try {
        bars = await source.getBars(instrument, options.lookback);
    } catch (error) {
        if (error instanceof DataIntegrityError) {
            return rejectSetup({ instrument, entryPrice: 0, side }, SignalReasonCode.BAD_INPUT_DATA, `bad input data: ${error.message}`, options.now);
        }
        const sourceError = createPriceSourceError(source.name, error);
        console.error(`[SCAN] ${instrument} | ${source.name} failed: ${sourceError.code} ${sourceError.message}`);
        return rejectSetup(
            { instrument, entryPrice: 0, side },
            SignalReasonCode.SOURCE_UNAVAILABLE,
            `price source unavailable: ${sourceError.message}`,
            options.now
        );
    }

    const last = bars[bars.length - 1];
    const setup = { instrument, entryPrice: last ? last.close : 0, side };
    return evaluateFromHistory(setup, bars, params, options.now);
}

/**
 * Scan a watchlist concurrently and rank the results.
 */
export async function scanInstruments(
    instruments: readonly string[],
    source: PriceSource,
    params: RiskParameters,
    options: ScanOptions
): Promise<Decision[]> {
    console.log(`[SCAN] Scanning ${instruments.length} instrument(s) via ${source.name}...`);

    const decisions = await Promise.all(
        instruments.map((instrument) => scanInstrument(instrument, source, params, options))
    );

    const accepted = decisions.filter((d) => d.accepted).length;
    console.log(`[SCAN] Complete: ${accepted}/${decisions.length} accepted`);

    return rankDecisions(decisions);
}
