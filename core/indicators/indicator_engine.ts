/**
 * IndicatorEngine - running Wilder and momentum state for one (instrument, period) pair.
 *
 * Single writer: bars are applied strictly in timestamp order. A rejected bar
 * leaves both states untouched. The raw bars are kept so the Wilder state can
 * be replayed with compensated arithmetic and checked for floating-point drift.
 */

import { InsufficientHistoryError } from "../errors/signal_error.js";
import { PriceBar } from "../market/price_bar.js";
import {
    DEFAULT_INDICATOR_PERIOD,
    IndicatorReading,
    IndicatorState,
    createIndicatorState,
    warmUpBars,
} from "./indicator_state.js";
import { CompensatedState, createCompensatedState, updateCompensatedState } from "./compensated.js";
import { MomentumConfig, MomentumReading, MomentumState, createMomentumState, updateMomentumState } from "./momentum.js";
import { readingFromState, updateIndicatorState } from "./wilder.js";

export interface IndicatorEngineOptions {
    readonly period?: number;

    /** Replay and compare every N ingested bars (0 disables) */
    readonly reconcileEvery?: number;

    /** Max relative deviation tolerated between running and replayed state */
    readonly reconcileTolerance?: number;

    /** Max raw bars retained for replay */
    readonly historyLimit?: number;

    /** Trend EMA / RSI / MACD / volume window lengths */
    readonly momentum?: Partial<MomentumConfig>;
}

export interface ReconcileReport {
    readonly replayedBars: number;
    readonly maxDeviation: number;
    readonly corrected: boolean;
}

export const DEFAULT_RECONCILE_EVERY = 250;
export const DEFAULT_RECONCILE_TOLERANCE = 1e-9;
export const DEFAULT_HISTORY_LIMIT = 5000;

function relativeDeviation(a: number | null, b: number | null): number {
    if (a === null || b === null) {
        return a === b ? 0 : Infinity;
    }
    const scale = Math.max(Math.abs(a), Math.abs(b), 1e-12);
    return Math.abs(a - b) / scale;
}

export class IndicatorEngine {
    readonly instrument: string;
    readonly period: number;

    readonly #reconcileEvery: number;
    readonly #reconcileTolerance: number;
    readonly #historyLimit: number;

    #state: IndicatorState;
    #latest: IndicatorReading | null = null;
    #momentum: MomentumState;
    #latestMomentum: MomentumReading | null = null;
    #history: PriceBar[] = [];

    /**
     * Compensated state to replay `#history` from. Starts empty; moves forward
     * when old bars are trimmed so a replay always covers the whole stream.
     */
    #origin: CompensatedState;
    #sinceReconcile = 0;

    constructor(instrument: string, options: IndicatorEngineOptions = {}) {
        this.instrument = instrument;
        this.period = options.period ?? DEFAULT_INDICATOR_PERIOD;
        this.#reconcileEvery = options.reconcileEvery ?? DEFAULT_RECONCILE_EVERY;
        this.#reconcileTolerance = options.reconcileTolerance ?? DEFAULT_RECONCILE_TOLERANCE;
        this.#historyLimit = Math.max(options.historyLimit ?? DEFAULT_HISTORY_LIMIT, warmUpBars(this.period));
        this.#state = createIndicatorState(this.period);
        this.#momentum = createMomentumState(options.momentum);
        this.#origin = createCompensatedState(this.period);
    }

    /**
     * Build an engine by replaying a full history from the start.
     */
    static fromHistory(
        instrument: string,
        bars: readonly PriceBar[],
        options: IndicatorEngineOptions = {}
    ): IndicatorEngine {
        const engine = new IndicatorEngine(instrument, options);
        engine.ingestAll(bars);
        return engine;
    }

    /**
     * Apply the next bar. Returns the new reading, or null during warm-up.
     */
    ingest(bar: PriceBar): IndicatorReading | null {
        const update = updateIndicatorState(this.#state, bar);
        const momentum = updateMomentumState(this.#momentum, bar);

        this.#state = update.state;
        if (update.reading) {
            this.#latest = update.reading;
        }
        this.#momentum = momentum.state;
        this.#latestMomentum = momentum.reading;
        this.#history.push(bar);
        this.trimHistory();

        this.#sinceReconcile++;
        if (this.#reconcileEvery > 0 && this.#sinceReconcile >= this.#reconcileEvery) {
            this.reconcile();
        }

        return update.reading;
    }

    ingestAll(bars: readonly PriceBar[]): IndicatorReading | null {
        let reading: IndicatorReading | null = null;
        for (const bar of bars) {
            reading = this.ingest(bar) ?? reading;
        }
        return reading;
    }

    latest(): IndicatorReading | null {
        return this.#latest;
    }

    /**
     * Latest momentum reading; fields are null until their own warm-up completes.
     */
    latestMomentum(): MomentumReading | null {
        return this.#latestMomentum;
    }

    /**
     * Latest reading, or InsufficientHistoryError while warming up.
     */
    requireLatest(): IndicatorReading {
        if (this.#latest === null) {
            throw new InsufficientHistoryError(warmUpBars(this.period), this.#state.barCount);
        }
        return this.#latest;
    }

    snapshot(): IndicatorState {
        return this.#state;
    }

    get barCount(): number {
        return this.#state.barCount;
    }

    /**
     * Replay the stream with compensated sums and compare with the running state.
     * The compensated state wins when the deviation exceeds the tolerance.
     */
    reconcile(): ReconcileReport {
        this.#sinceReconcile = 0;

        let reference = this.#origin;
        for (const bar of this.#history) {
            reference = updateCompensatedState(reference, bar);
        }
        const replayed = reference.base;

        const maxDeviation = Math.max(
            relativeDeviation(this.#state.smoothedTr, replayed.smoothedTr),
            relativeDeviation(this.#state.smoothedPlusDm, replayed.smoothedPlusDm),
            relativeDeviation(this.#state.smoothedMinusDm, replayed.smoothedMinusDm),
            relativeDeviation(this.#state.adx, replayed.adx)
        );

        const corrected = maxDeviation > this.#reconcileTolerance;
        if (corrected) {
            console.warn(
                `[INDICATOR] ${this.instrument} drift ${maxDeviation.toExponential(3)} > ${this.#reconcileTolerance}, state rebuilt from ${this.#history.length} bars`
            );
            this.#state = replayed;
            this.#latest = readingFromState(replayed) ?? this.#latest;
        }

        return { replayedBars: this.#history.length, maxDeviation, corrected };
    }

    private trimHistory(): void {
        const excess = this.#history.length - this.#historyLimit;
        if (excess <= 0) return;

        let origin = this.#origin;
        for (const bar of this.#history.slice(0, excess)) {
            origin = updateCompensatedState(origin, bar);
        }
        this.#origin = origin;
        this.#history = this.#history.slice(excess);
    }
}

/**
 * One engine per (instrument, period). Engines are created on first use and
 * written only through ingest(), so each instrument has a single writer.
 */
export class IndicatorRegistry {
    readonly #engines = new Map<string, IndicatorEngine>();
    readonly #options: IndicatorEngineOptions;

    constructor(options: IndicatorEngineOptions = {}) {
        this.#options = options;
    }

    engineFor(instrument: string, period: number = this.#options.period ?? DEFAULT_INDICATOR_PERIOD): IndicatorEngine {
        const key = `${instrument.toUpperCase()}:${period}`;
        let engine = this.#engines.get(key);
        if (!engine) {
            engine = new IndicatorEngine(instrument.toUpperCase(), { ...this.#options, period });
            this.#engines.set(key, engine);
        }
        return engine;
    }

    ingest(instrument: string, bar: PriceBar, period?: number): IndicatorReading | null {
        return this.engineFor(instrument, period).ingest(bar);
    }

    latest(instrument: string, period?: number): IndicatorReading | null {
        return this.engineFor(instrument, period).latest();
    }

    latestMomentum(instrument: string, period?: number): MomentumReading | null {
        return this.engineFor(instrument, period).latestMomentum();
    }

    instruments(): string[] {
        return Array.from(this.#engines.values(), (engine) => engine.instrument);
    }
}
