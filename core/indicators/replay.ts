import { InsufficientHistoryError } from "../errors/signal_error.js";
import { PriceBar } from "../market/price_bar.js";
import {
    DEFAULT_INDICATOR_PERIOD,
    IndicatorReading,
    IndicatorState,
    createIndicatorState,
    warmUpBars,
} from "./indicator_state.js";
import { updateIndicatorState } from "./wilder.js";

export interface ReplayResult {
    readonly state: IndicatorState;
    readonly readings: readonly IndicatorReading[];
    readonly latest: IndicatorReading;
}

/**
 * Replay an ordered bar sequence from an empty state.
 * Deterministic: the same bars always give bit-identical readings.
 *
 * Throws InsufficientHistoryError when the warm-up window is not covered,
 * and DataIntegrityError on the first malformed or out-of-order bar.
 */
export function replayIndicatorHistory(
    bars: readonly PriceBar[],
    period: number = DEFAULT_INDICATOR_PERIOD
): ReplayResult {
    let state = createIndicatorState(period);
    const required = warmUpBars(period);
    if (bars.length < required) {
        throw new InsufficientHistoryError(required, bars.length);
    }

    const readings: IndicatorReading[] = [];
    for (const bar of bars) {
        const update = updateIndicatorState(state, bar);
        state = update.state;
        if (update.reading) {
            readings.push(update.reading);
        }
    }

    const latest = readings[readings.length - 1];
    if (latest === undefined) {
        throw new InsufficientHistoryError(required, bars.length);
    }

    return Object.freeze({ state, readings: Object.freeze(readings), latest });
}
