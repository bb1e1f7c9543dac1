import { SignalConfig } from "../../config.js";
import { InvalidInputError } from "../../errors/signal_error.js";
import { PriceSource } from "../price_source.js";
import { AlpacaPriceSource, FetchLike } from "./alpaca_price_source.js";
import { ManualPriceSource } from "./manual_price_source.js";

/**
 * Pick the price source variant named by the configuration.
 */
export async function createPriceSource(config: SignalConfig, fetchImpl?: FetchLike): Promise<PriceSource> {
    switch (config.priceSource) {
        case "alpaca": {
            if (config.alpaca === null) {
                throw new InvalidInputError("BAD_INPUT", "bad input data: Alpaca credentials are not configured");
            }
            return new AlpacaPriceSource(
                { apiKey: config.alpaca.apiKey, secretKey: config.alpaca.secretKey },
                { feed: config.alpaca.feed, baseUrl: config.alpaca.baseUrl, fetchImpl }
            );
        }
        case "manual":
            return ManualPriceSource.fromJsonl(config.manualBarsPath);
    }
}
