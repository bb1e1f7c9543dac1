/**
 * PriceSource - the price/order collaborator as a capability set.
 *
 * Automated brokers (Alpaca) and manual workflows (Moomoo / Webull, bars typed
 * in or exported by hand) implement the same interface; callers read
 * `capabilities` instead of branching on the concrete source.
 */

import { PriceBar } from "./price_bar.js";

export interface PriceSourceCapabilities {
    /** Bars can be pulled on demand */
    readonly automatedBars: boolean;

    /** Orders could be routed through this source (never used by the core) */
    readonly orderRouting: boolean;
}

export interface PriceSource {
    readonly name: string;
    readonly capabilities: PriceSourceCapabilities;

    /**
     * Ordered bars for an instrument, oldest first, at most `lookback` of them.
     */
    getBars(instrument: string, lookback: number): Promise<PriceBar[]>;
}
