/**
 * Alpaca Market Data v2 wire types (bars endpoint only).
 */

export const ALPACA_DATA_BASE = "https://data.alpaca.markets";

export type AlpacaTimeframe = "1Min" | "5Min" | "15Min" | "1Hour" | "1Day" | "1Week";

export interface AlpacaBar {
    /** RFC-3339 timestamp */
    t: string;
    o: number;
    h: number;
    l: number;
    c: number;
    v: number;
    n?: number;
    vw?: number;
}

export interface AlpacaBarsResponse {
    bars: AlpacaBar[] | null;
    symbol: string;
    next_page_token: string | null;
}

export interface AlpacaErrorResponse {
    code?: number;
    message?: string;
}
