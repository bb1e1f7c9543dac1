/**
 * Alpaca Price Source
 *
 * REST client for Alpaca Market Data v2 historical bars.
 * Read-only: the core never routes orders, so only the bars endpoint is used.
 */

import {
    PriceSourceError,
    SignalErrorCode,
    createPriceSourceError,
} from "../../errors/signal_error.js";
import { PriceBar, validateBarSequence } from "../price_bar.js";
import { PriceSource, PriceSourceCapabilities } from "../price_source.js";
import {
    ALPACA_DATA_BASE,
    AlpacaBar,
    AlpacaBarsResponse,
    AlpacaErrorResponse,
    AlpacaTimeframe,
} from "./alpaca_types.js";

// ============================================================================
// Constants
// ============================================================================

const REQUEST_TIMEOUT = 10000;
const DAY_MS = 24 * 60 * 60 * 1000;

// Calendar days fetched per requested daily bar (weekends, holidays)
const CALENDAR_PADDING = 2;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface AlpacaCredentials {
    readonly apiKey: string;
    readonly secretKey: string;
}

export interface AlpacaPriceSourceOptions {
    readonly baseUrl?: string;
    readonly timeframe?: AlpacaTimeframe;
    readonly feed?: "iex" | "sip";
    readonly timeoutMs?: number;
    readonly fetchImpl?: FetchLike;
    readonly now?: () => number;
}

function isAlpacaBar(value: unknown): value is AlpacaBar {
    if (typeof value !== "object" || value === null) return false;
    return "t" in value && typeof value.t === "string";
}

function isBarsResponse(value: unknown): value is AlpacaBarsResponse {
    if (typeof value !== "object" || value === null || !("bars" in value)) return false;
    return value.bars === null || (Array.isArray(value.bars) && value.bars.every(isAlpacaBar));
}

function readErrorBody(value: unknown): AlpacaErrorResponse {
    if (typeof value !== "object" || value === null) return {};
    const body: AlpacaErrorResponse = {};
    if ("message" in value && typeof value.message === "string") body.message = value.message;
    if ("code" in value && typeof value.code === "number") body.code = value.code;
    return body;
}

/**
 * Proxies and gateways answer errors with HTML or plain text: such a body
 * parses to null so the status still decides the error code.
 */
function parseJsonBody(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        if (error instanceof SyntaxError) {
            return null;
        }
        throw error;
    }
}

// ============================================================================
// Alpaca Price Source
// ============================================================================

export class AlpacaPriceSource implements PriceSource {
    readonly name = "alpaca";
    readonly capabilities: PriceSourceCapabilities = Object.freeze({
        automatedBars: true,
        orderRouting: true,
    });

    readonly #credentials: AlpacaCredentials;
    readonly #baseUrl: string;
    readonly #timeframe: AlpacaTimeframe;
    readonly #feed: "iex" | "sip";
    readonly #timeoutMs: number;
    readonly #fetch: FetchLike;
    readonly #now: () => number;

    constructor(credentials: AlpacaCredentials, options: AlpacaPriceSourceOptions = {}) {
        this.#credentials = credentials;
        this.#baseUrl = options.baseUrl ?? ALPACA_DATA_BASE;
        this.#timeframe = options.timeframe ?? "1Day";
        this.#feed = options.feed ?? "iex";
        this.#timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT;
        this.#fetch = options.fetchImpl ?? ((url, init) => fetch(url, init));
        this.#now = options.now ?? Date.now;
    }

    async getBars(instrument: string, lookback: number): Promise<PriceBar[]> {
        const symbol = instrument.trim().toUpperCase();
        const url = this.buildBarsUrl(symbol, lookback);

        const response = await this.fetchWithTimeout(url, {
            method: "GET",
            headers: {
                "APCA-API-KEY-ID": this.#credentials.apiKey,
                "APCA-API-SECRET-KEY": this.#credentials.secretKey,
                "Accept": "application/json",
            },
        });

        const data = await this.handleResponse(response, symbol);
        const bars = (data.bars ?? [])
            .map((bar) => ({
                timestamp: Date.parse(bar.t),
                open: bar.o,
                high: bar.h,
                low: bar.l,
                close: bar.c,
                volume: bar.v,
            }))
            .reverse();

        // Newest-first request, oldest-first result
        return validateBarSequence(bars);
    }

    buildBarsUrl(symbol: string, lookback: number): string {
        const start = new Date(this.#now() - lookback * CALENDAR_PADDING * DAY_MS).toISOString();
        const params = new URLSearchParams({
            timeframe: this.#timeframe,
            limit: String(lookback),
            sort: "desc",
            adjustment: "split",
            feed: this.#feed,
            start,
        });
        return `${this.#baseUrl}/v2/stocks/${encodeURIComponent(symbol)}/bars?${params.toString()}`;
    }

    // -------------------------------------------------------------------------
    // HTTP helpers
    // -------------------------------------------------------------------------

    private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.#timeoutMs);

        try {
            return await this.#fetch(url, {
                ...options,
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === "AbortError") {
                throw new PriceSourceError(this.name, SignalErrorCode.SOURCE_TIMEOUT, "Request timeout");
            }
            throw createPriceSourceError(this.name, error);
        } finally {
            clearTimeout(timeout);
        }
    }

    private async handleResponse(response: Response, symbol: string): Promise<AlpacaBarsResponse> {
        const text = await response.text();
        const data = parseJsonBody(text);

        if (!response.ok) {
            const body = readErrorBody(data);
            throw new PriceSourceError(
                this.name,
                this.mapStatus(response.status),
                body.message ?? `HTTP ${response.status} for ${symbol}`,
                response.status
            );
        }

        if (!isBarsResponse(data)) {
            throw new PriceSourceError(this.name, SignalErrorCode.UNKNOWN, `Unexpected bars payload for ${symbol}`, response.status);
        }

        return data;
    }

    private mapStatus(status: number): SignalErrorCode {
        if (status === 401 || status === 403) return SignalErrorCode.SOURCE_AUTH_FAILED;
        if (status === 404 || status === 422) return SignalErrorCode.SOURCE_NOT_FOUND;
        if (status === 429) return SignalErrorCode.SOURCE_RATE_LIMITED;
        if (status >= 500) return SignalErrorCode.SOURCE_SERVER_ERROR;
        return SignalErrorCode.UNKNOWN;
    }
}
