/**
 * Manual Price Source
 *
 * Bars recorded by hand for brokers without an API workflow (Moomoo, Webull).
 * Bars live in memory and can be loaded from a JSONL export where every line is
 * `{ "instrument": "AAPL", "timestamp": ..., "open": ..., ... }`.
 */

import { DataIntegrityError } from "../../errors/signal_error.js";
import { PriceBar, validateBarSequence } from "../price_bar.js";
import { PriceSource, PriceSourceCapabilities } from "../price_source.js";
import { readJSONL } from "../readers/JSONLReader.js";

export class ManualPriceSource implements PriceSource {
    readonly name: string;
    readonly capabilities: PriceSourceCapabilities = Object.freeze({
        automatedBars: false,
        orderRouting: false,
    });

    readonly #bars = new Map<string, PriceBar[]>();

    constructor(name: string = "manual") {
        this.name = name;
    }

    /**
     * Load a JSONL export. Invalid JSON lines are reported, not skipped silently.
     */
    static async fromJsonl(filePath: string, name?: string): Promise<ManualPriceSource> {
        const source = new ManualPriceSource(name);
        const { records, invalidLines } = await readJSONL(filePath);

        if (invalidLines.length > 0) {
            throw new DataIntegrityError(
                `manual bar file ${filePath} has invalid JSON on line(s) ${invalidLines.join(", ")}`,
                { filePath, invalidLines }
            );
        }

        const grouped = new Map<string, unknown[]>();
        for (const record of records) {
            if (typeof record !== "object" || record === null || !("instrument" in record) || typeof record.instrument !== "string") {
                throw new DataIntegrityError(`manual bar record without an instrument in ${filePath}`);
            }
            const key = record.instrument.trim().toUpperCase();
            const list = grouped.get(key) ?? [];
            list.push(record);
            grouped.set(key, list);
        }

        for (const [instrument, rows] of grouped) {
            source.record(instrument, rows);
        }

        console.log(`[MANUAL_SOURCE] Loaded ${records.length} bars for ${grouped.size} instrument(s) from ${filePath}`);
        return source;
    }

    /**
     * Replace the recorded bars for an instrument. Validates order and shape.
     */
    record(instrument: string, bars: readonly unknown[]): void {
        this.#bars.set(instrument.trim().toUpperCase(), validateBarSequence(bars));
    }

    /**
     * Append newer bars to an instrument's record.
     */
    append(instrument: string, bars: readonly unknown[]): void {
        const key = instrument.trim().toUpperCase();
        const existing = this.#bars.get(key) ?? [];
        this.#bars.set(key, validateBarSequence([...existing, ...bars]));
    }

    instruments(): string[] {
        return Array.from(this.#bars.keys());
    }

    async getBars(instrument: string, lookback: number): Promise<PriceBar[]> {
        if (lookback <= 0) return [];
        const bars = this.#bars.get(instrument.trim().toUpperCase()) ?? [];
        return bars.slice(-lookback);
    }
}
