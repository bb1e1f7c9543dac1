/**
 * Momentum indicators - trend EMA, RSI, MACD and average volume.
 * Pure single-bar transition, same contract as the Wilder engine:
 * state is replaced, never mutated, and a rejected bar changes nothing.
 *
 * EMA:  seeded with the simple mean of the first `length` inputs, then
 *       ema = ema + (x - ema) * 2 / (length + 1)
 * RSI:  Wilder averages of gains and losses over `rsiLength` close changes
 * MACD: EMA(fast) - EMA(slow); signal line is an EMA of the MACD line
 */

import { InvalidInputError } from "../errors/signal_error.js";
import { PriceBar, assertBarAfter, assertBarShape } from "../market/price_bar.js";

export interface MomentumConfig {
    readonly trendEmaLength: number;
    readonly rsiLength: number;
    readonly macdFast: number;
    readonly macdSlow: number;
    readonly macdSignal: number;
    readonly volumeWindow: number;
}

export const DEFAULT_MOMENTUM_CONFIG: MomentumConfig = Object.freeze({
    trendEmaLength: 200,
    rsiLength: 14,
    macdFast: 12,
    macdSlow: 26,
    macdSignal: 9,
    volumeWindow: 20,
});

export interface EmaState {
    readonly length: number;
    readonly count: number;
    readonly sum: number;

    /** null until `length` inputs have been seen */
    readonly value: number | null;
}

export interface RsiState {
    readonly length: number;
    readonly changes: number;
    readonly gainSum: number;
    readonly lossSum: number;
    readonly avgGain: number | null;
    readonly avgLoss: number | null;
}

export interface MomentumState {
    readonly config: MomentumConfig;
    readonly barCount: number;
    readonly lastTimestamp: number | null;
    readonly prevClose: number | null;
    readonly trendEma: EmaState;
    readonly rsi: RsiState;
    readonly macdFast: EmaState;
    readonly macdSlow: EmaState;
    readonly macdSignal: EmaState;

    /** Most recent volumes, at most `volumeWindow` of them */
    readonly volumes: readonly number[];
}

export interface MomentumReading {
    readonly close: number;

    /** Long trend EMA (200 by default) */
    readonly trendEma: number | null;
    readonly rsi: number | null;
    readonly macd: number | null;
    readonly macdSignal: number | null;
    readonly volume: number;

    /** Mean volume of the last `volumeWindow` bars, null until the window is full */
    readonly avgVolume: number | null;
    readonly asOf: number;
}

export interface MomentumUpdate {
    readonly state: MomentumState;
    readonly reading: MomentumReading;
}

// ============================================================================
// EMA
// ============================================================================

export function createEmaState(length: number): EmaState {
    return Object.freeze({ length, count: 0, sum: 0, value: null });
}

export function stepEma(prior: EmaState, input: number): EmaState {
    if (prior.value !== null) {
        const alpha = 2 / (prior.length + 1);
        return Object.freeze({ ...prior, count: prior.count + 1, value: prior.value + (input - prior.value) * alpha });
    }

    const count = prior.count + 1;
    const sum = prior.sum + input;
    return Object.freeze({
        length: prior.length,
        count,
        sum,
        value: count === prior.length ? sum / prior.length : null,
    });
}

// ============================================================================
// RSI
// ============================================================================

function stepRsi(prior: RsiState, change: number): RsiState {
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;
    const changes = prior.changes + 1;

    if (prior.avgGain !== null && prior.avgLoss !== null) {
        const n = prior.length;
        return Object.freeze({
            ...prior,
            changes,
            avgGain: (prior.avgGain * (n - 1) + gain) / n,
            avgLoss: (prior.avgLoss * (n - 1) + loss) / n,
        });
    }

    const gainSum = prior.gainSum + gain;
    const lossSum = prior.lossSum + loss;
    const seeded = changes === prior.length;
    return Object.freeze({
        length: prior.length,
        changes,
        gainSum,
        lossSum,
        avgGain: seeded ? gainSum / prior.length : null,
        avgLoss: seeded ? lossSum / prior.length : null,
    });
}

/**
 * 100 - 100 / (1 + avgGain / avgLoss). A window with no losses reads 100,
 * one with neither gains nor losses reads 50.
 */
export function relativeStrength(avgGain: number, avgLoss: number): number {
    if (avgLoss === 0) {
        return avgGain === 0 ? 50 : 100;
    }
    return 100 - 100 / (1 + avgGain / avgLoss);
}

// ============================================================================
// STATE
// ============================================================================

function assertLength(name: keyof MomentumConfig, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new InvalidInputError("BAD_INPUT", `bad input data: ${name} must be a positive integer, got ${value}`);
    }
}

export function createMomentumState(overrides: Partial<MomentumConfig> = {}): MomentumState {
    const config: MomentumConfig = Object.freeze({ ...DEFAULT_MOMENTUM_CONFIG, ...overrides });

    assertLength("trendEmaLength", config.trendEmaLength);
    assertLength("rsiLength", config.rsiLength);
    assertLength("macdFast", config.macdFast);
    assertLength("macdSlow", config.macdSlow);
    assertLength("macdSignal", config.macdSignal);
    assertLength("volumeWindow", config.volumeWindow);
    if (config.macdFast >= config.macdSlow) {
        throw new InvalidInputError(
            "BAD_INPUT",
            `bad input data: macdFast (${config.macdFast}) must be shorter than macdSlow (${config.macdSlow})`
        );
    }

    return Object.freeze({
        config,
        barCount: 0,
        lastTimestamp: null,
        prevClose: null,
        trendEma: createEmaState(config.trendEmaLength),
        rsi: Object.freeze({ length: config.rsiLength, changes: 0, gainSum: 0, lossSum: 0, avgGain: null, avgLoss: null }),
        macdFast: createEmaState(config.macdFast),
        macdSlow: createEmaState(config.macdSlow),
        macdSignal: createEmaState(config.macdSignal),
        volumes: Object.freeze([]),
    });
}

/**
 * Bars needed before every momentum field has a value.
 */
export function momentumWarmUpBars(config: MomentumConfig = DEFAULT_MOMENTUM_CONFIG): number {
    return Math.max(
        config.trendEmaLength,
        config.rsiLength + 1,
        config.macdSlow + config.macdSignal - 1,
        config.volumeWindow
    );
}

/**
 * Feed one bar. Unlike the Wilder engine a reading is always returned;
 * fields stay null until their own warm-up completes.
 */
export function updateMomentumState(prior: MomentumState, bar: PriceBar): MomentumUpdate {
    assertBarShape(bar);
    assertBarAfter(prior.lastTimestamp, bar);

    const { config } = prior;
    const close = bar.close;

    const trendEma = stepEma(prior.trendEma, close);
    const rsi = prior.prevClose === null ? prior.rsi : stepRsi(prior.rsi, close - prior.prevClose);
    const macdFast = stepEma(prior.macdFast, close);
    const macdSlow = stepEma(prior.macdSlow, close);

    const macd = macdFast.value !== null && macdSlow.value !== null ? macdFast.value - macdSlow.value : null;
    const macdSignal = macd === null ? prior.macdSignal : stepEma(prior.macdSignal, macd);

    const volumes = Object.freeze([...prior.volumes, bar.volume].slice(-config.volumeWindow));
    const avgVolume = volumes.length === config.volumeWindow
        ? volumes.reduce((sum, v) => sum + v, 0) / config.volumeWindow
        : null;

    const state: MomentumState = Object.freeze({
        config,
        barCount: prior.barCount + 1,
        lastTimestamp: bar.timestamp,
        prevClose: close,
        trendEma,
        rsi,
        macdFast,
        macdSlow,
        macdSignal,
        volumes,
    });

    const reading: MomentumReading = Object.freeze({
        close,
        trendEma: trendEma.value,
        rsi: rsi.avgGain !== null && rsi.avgLoss !== null ? relativeStrength(rsi.avgGain, rsi.avgLoss) : null,
        macd,
        macdSignal: macdSignal.value,
        volume: bar.volume,
        avgVolume,
        asOf: bar.timestamp,
    });

    return { state, reading };
}

/**
 * Replay an ordered bar sequence from an empty momentum state.
 * Returns null for an empty sequence.
 */
export function replayMomentumHistory(
    bars: readonly PriceBar[],
    overrides: Partial<MomentumConfig> = {}
): MomentumReading | null {
    let state = createMomentumState(overrides);
    let reading: MomentumReading | null = null;
    for (const bar of bars) {
        const update = updateMomentumState(state, bar);
        state = update.state;
        reading = update.reading;
    }
    return reading;
}
