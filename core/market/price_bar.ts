/**
 * PriceBar - one OHLCV bar. Immutable once ingested.
 */

import { DataIntegrityError } from "../errors/signal_error.js";

export interface PriceBar {
    /** Bar timestamp, unix ms. Used only as an ordering key. */
    readonly timestamp: number;
    readonly open: number;
    readonly high: number;
    readonly low: number;
    readonly close: number;
    readonly volume: number;
}

const PRICE_FIELDS = ["open", "high", "low", "close"] as const;

function isFiniteNumber(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value);
}

/**
 * Validate an untrusted bar-shaped value and return a frozen PriceBar.
 * Throws DataIntegrityError on missing/non-finite fields or high < low.
 */
export function toPriceBar(raw: unknown): PriceBar {
    if (typeof raw !== "object" || raw === null) {
        throw new DataIntegrityError("bar is not an object");
    }
    const fields = new Map<string, unknown>(Object.entries(raw));

    const timestamp = fields.get("timestamp");
    if (!isFiniteNumber(timestamp)) {
        throw new DataIntegrityError("bar timestamp is missing or not a number", { timestamp });
    }

    const price = (field: (typeof PRICE_FIELDS)[number]): number => {
        const value = fields.get(field);
        if (!isFiniteNumber(value)) {
            throw new DataIntegrityError(`bar ${field} is missing or not a finite number`, { timestamp, field });
        }
        return value;
    };

    const volume = fields.get("volume") ?? 0;
    if (!isFiniteNumber(volume) || volume < 0) {
        throw new DataIntegrityError("bar volume must be a non-negative number", { timestamp });
    }

    const bar: PriceBar = {
        timestamp,
        open: price("open"),
        high: price("high"),
        low: price("low"),
        close: price("close"),
        volume
    };
    assertBarShape(bar);
    return Object.freeze(bar);
}

/**
 * Structural checks on an already-typed bar.
 */
export function assertBarShape(bar: PriceBar): void {
    if (!isFiniteNumber(bar.timestamp)) {
        throw new DataIntegrityError("bar timestamp is not a finite number");
    }
    for (const field of PRICE_FIELDS) {
        if (!isFiniteNumber(bar[field])) {
            throw new DataIntegrityError(`bar ${field} is missing or not a finite number`, { timestamp: bar.timestamp, field });
        }
    }
    if (!isFiniteNumber(bar.volume) || bar.volume < 0) {
        throw new DataIntegrityError("bar volume must be a non-negative number", { timestamp: bar.timestamp });
    }
    if (bar.high < bar.low) {
        throw new DataIntegrityError(`bar high ${bar.high} is below low ${bar.low}`, { timestamp: bar.timestamp });
    }
}

/**
 * Ordering check for incremental ingestion: `bar` must come strictly after
 * the last accepted timestamp (null before the first bar).
 */
export function assertBarAfter(lastTimestamp: number | null, bar: PriceBar): void {
    if (lastTimestamp !== null && bar.timestamp <= lastTimestamp) {
        throw new DataIntegrityError(
            `bar at ${bar.timestamp} is not after the last ingested bar at ${lastTimestamp}`,
            { timestamp: bar.timestamp, previous: lastTimestamp }
        );
    }
}

/**
 * Validate a whole sequence: every bar well-formed, timestamps strictly increasing.
 */
export function validateBarSequence(raw: readonly unknown[]): PriceBar[] {
    const bars: PriceBar[] = [];
    let lastTimestamp = -Infinity;

    for (const item of raw) {
        const bar = toPriceBar(item);
        if (bar.timestamp <= lastTimestamp) {
            throw new DataIntegrityError(
                `bar timestamps must be strictly increasing (${bar.timestamp} after ${lastTimestamp})`,
                { timestamp: bar.timestamp, previous: lastTimestamp }
            );
        }
        lastTimestamp = bar.timestamp;
        bars.push(bar);
    }

    return bars;
}
