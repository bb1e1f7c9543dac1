/**
 * test_alpaca_price_source.ts: Alpaca bars client against a scripted fetch.
 * No network: every response is built in-process.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DataIntegrityError, PriceSourceError, SignalErrorCode } from "../../errors/signal_error.js";
import { AlpacaPriceSource, FetchLike } from "./alpaca_price_source.js";

const NOW = Date.UTC(2024, 0, 10);
const CREDENTIALS = { apiKey: "test-key", secretKey: "test-secret" };

interface CapturedRequest {
    url: string;
    init: RequestInit;
}

function jsonResponse(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { "content-type": "application/json" },
    });
}

function scriptedFetch(status: number, body: unknown, captured: CapturedRequest[] = []): FetchLike {
    return async (url, init) => {
        captured.push({ url, init });
        return jsonResponse(status, body);
    };
}

function textFetch(status: number, body: string): FetchLike {
    return async () => new Response(body, { status, headers: { "content-type": "text/html" } });
}

function sourceError(code: SignalErrorCode, message?: string) {
    return (error: unknown): boolean =>
        error instanceof PriceSourceError &&
        error.code === code &&
        (message === undefined || error.message === message);
}

const NEWEST_FIRST = {
    symbol: "AAPL",
    next_page_token: null,
    bars: [
        { t: "2024-01-03T05:00:00Z", o: 185, h: 186.5, l: 183.9, c: 184.25, v: 58414460 },
        { t: "2024-01-02T05:00:00Z", o: 187.15, h: 188.44, l: 183.89, c: 185.64, v: 82488674 },
    ],
};

describe("AlpacaPriceSource", () => {
    it("requests daily bars newest-first with the credentials in headers", async () => {
        const captured: CapturedRequest[] = [];
        const source = new AlpacaPriceSource(CREDENTIALS, {
            fetchImpl: scriptedFetch(200, NEWEST_FIRST, captured),
            now: () => NOW,
        });

        await source.getBars(" aapl ", 2);

        assert.equal(captured.length, 1);
        const request = captured[0];
        assert.ok(request);
        assert.equal(
            request.url,
            "https://data.alpaca.markets/v2/stocks/AAPL/bars?timeframe=1Day&limit=2&sort=desc&adjustment=split&feed=iex&start=2024-01-06T00%3A00%3A00.000Z"
        );
        const headers = new Headers(request.init.headers);
        assert.equal(headers.get("APCA-API-KEY-ID"), "test-key");
        assert.equal(headers.get("APCA-API-SECRET-KEY"), "test-secret");
        assert.equal(request.init.method, "GET");
        assert.ok(request.init.signal);
    });

    it("returns bars oldest-first as PriceBars", async () => {
        const source = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: scriptedFetch(200, NEWEST_FIRST), now: () => NOW });
        const bars = await source.getBars("AAPL", 2);

        assert.deepEqual(bars, [
            { timestamp: Date.UTC(2024, 0, 2, 5), open: 187.15, high: 188.44, low: 183.89, close: 185.64, volume: 82488674 },
            { timestamp: Date.UTC(2024, 0, 3, 5), open: 185, high: 186.5, low: 183.9, close: 184.25, volume: 58414460 },
        ]);
    });

    it("treats a null bar list as no bars", async () => {
        const source = new AlpacaPriceSource(CREDENTIALS, {
            fetchImpl: scriptedFetch(200, { symbol: "AAPL", bars: null, next_page_token: null }),
        });
        assert.deepEqual(await source.getBars("AAPL", 10), []);
    });

    it("honours the configured feed and base URL", () => {
        const source = new AlpacaPriceSource(CREDENTIALS, { feed: "sip", baseUrl: "http://localhost:9999", now: () => NOW });
        assert.equal(
            source.buildBarsUrl("MSFT", 1),
            "http://localhost:9999/v2/stocks/MSFT/bars?timeframe=1Day&limit=1&sort=desc&adjustment=split&feed=sip&start=2024-01-08T00%3A00%3A00.000Z"
        );
    });

    it("maps 401 to an auth failure with the body message", async () => {
        const source = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: scriptedFetch(401, { message: "forbidden." }) });
        await assert.rejects(source.getBars("AAPL", 5), sourceError(SignalErrorCode.SOURCE_AUTH_FAILED, "forbidden."));
    });

    it("maps 429 to a retryable rate limit", async () => {
        const source = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: scriptedFetch(429, {}) });
        await assert.rejects(source.getBars("AAPL", 5), (error: unknown) =>
            error instanceof PriceSourceError &&
            error.code === SignalErrorCode.SOURCE_RATE_LIMITED &&
            error.retryable &&
            error.status === 429 &&
            error.message === "HTTP 429 for AAPL"
        );
    });

    it("maps 422 to not found and 503 to a server error", async () => {
        const invalid = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: scriptedFetch(422, { code: 42210000, message: "invalid symbol" }) });
        await assert.rejects(invalid.getBars("???", 5), sourceError(SignalErrorCode.SOURCE_NOT_FOUND, "invalid symbol"));

        const down = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: scriptedFetch(503, {}) });
        await assert.rejects(down.getBars("AAPL", 5), sourceError(SignalErrorCode.SOURCE_SERVER_ERROR));
    });

    it("keeps the status of an error answered with an HTML body", async () => {
        const source = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: textFetch(502, "<html><body>502 Bad Gateway</body></html>") });
        await assert.rejects(source.getBars("AAPL", 5), (error: unknown) =>
            error instanceof PriceSourceError &&
            error.code === SignalErrorCode.SOURCE_SERVER_ERROR &&
            error.retryable &&
            error.status === 502 &&
            error.message === "HTTP 502 for AAPL"
        );
    });

    it("treats a successful non-JSON body as an unexpected payload", async () => {
        const source = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: textFetch(200, "OK") });
        await assert.rejects(source.getBars("AAPL", 5), sourceError(SignalErrorCode.UNKNOWN, "Unexpected bars payload for AAPL"));
    });

    it("rejects an unexpected payload", async () => {
        const source = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: scriptedFetch(200, { data: [] }) });
        await assert.rejects(source.getBars("AAPL", 5), sourceError(SignalErrorCode.UNKNOWN, "Unexpected bars payload for AAPL"));
    });

    it("rejects corrupt bars as a data integrity failure", async () => {
        const corrupt = {
            symbol: "AAPL",
            next_page_token: null,
            bars: [{ t: "2024-01-02T05:00:00Z", o: 10, h: 9, l: 11, c: 10, v: 1 }],
        };
        const source = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: scriptedFetch(200, corrupt) });
        await assert.rejects(source.getBars("AAPL", 1), DataIntegrityError);
    });

    it("times out a request that never answers", async () => {
        const hanging: FetchLike = (url, init) =>
            new Promise<Response>((resolve, reject) => {
                init.signal?.addEventListener("abort", () => {
                    const error = new Error("This operation was aborted");
                    error.name = "AbortError";
                    reject(error);
                });
            });
        const source = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: hanging, timeoutMs: 10 });
        await assert.rejects(source.getBars("AAPL", 5), sourceError(SignalErrorCode.SOURCE_TIMEOUT, "Request timeout"));
    });

    it("wraps a network failure", async () => {
        const refused: FetchLike = async () => {
            throw new Error("fetch failed");
        };
        const source = new AlpacaPriceSource(CREDENTIALS, { fetchImpl: refused });
        await assert.rejects(source.getBars("AAPL", 5), sourceError(SignalErrorCode.SOURCE_NETWORK_ERROR));
    });
});
