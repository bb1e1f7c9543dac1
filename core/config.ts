/**
 * Scanner configuration
 *
 * Environment-driven defaults for risk parameters, the price source and the API.
 * Everything here is read once at start-up and handed to the core as values.
 */

import path from "node:path";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { DEFAULT_ADX_THRESHOLD } from "./gates/trend_quality_filter.js";
import { DEFAULT_INDICATOR_PERIOD } from "./indicators/indicator_state.js";
import { momentumWarmUpBars } from "./indicators/momentum.js";
import {
    DEFAULT_ATR_MULTIPLIER,
    RiskParameters,
    createRiskParameters,
    validateRiskParameters,
} from "./risk/risk_parameters.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// core/config.ts -> repo root is 1 level up
export const REPO_ROOT = path.resolve(__dirname, "..");

// ============================================================================
// Types
// ============================================================================

export type PriceSourceKind = "alpaca" | "manual";

export interface AlpacaConfig {
    readonly apiKey: string;
    readonly secretKey: string;
    readonly feed: "iex" | "sip";
    readonly baseUrl?: string;
}

export interface SignalConfig {
    /** Risk parameters used when a request does not carry its own */
    readonly riskDefaults: RiskParameters;

    /** Default comma-separated watchlist */
    readonly watchlist: string;

    /** Bars requested per instrument */
    readonly lookbackBars: number;

    readonly priceSource: PriceSourceKind;
    readonly alpaca: AlpacaConfig | null;
    readonly manualBarsPath: string;

    readonly server: {
        readonly host: string;
        readonly port: number;
    };

    readonly paths: {
        readonly settings: string;
        readonly auditLog: string;
    };
}

export interface ConfigValidationResult {
    readonly valid: boolean;
    readonly errors: readonly string[];
    readonly warnings: readonly string[];
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_WATCHLIST = "AAPL, TSLA, MSFT, NVDA";
export const DEFAULT_LOOKBACK_BARS = 250;

// ============================================================================
// Loaders
// ============================================================================

/**
 * Load `.env` from the repo root if present. Existing variables win.
 */
export function loadDotenv(envPath: string = path.join(REPO_ROOT, ".env")): boolean {
    if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
        console.log(`[CONFIG] Loaded .env from: ${envPath}`);
        return true;
    }
    console.log(`[CONFIG] No .env found at: ${envPath}`);
    return false;
}

/**
 * Build the config from environment variables.
 */
export function loadSignalConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SignalConfig {
    const accountEquity = parseFloat(env.SIGNAL_ACCOUNT_EQUITY || "10000");
    const rewardRaw = env.SIGNAL_REWARD_MULTIPLE;

    const riskDefaults = createRiskParameters({
        adxThreshold: parseFloat(env.SIGNAL_ADX_THRESHOLD || String(DEFAULT_ADX_THRESHOLD)),
        atrPeriod: parseInt(env.SIGNAL_ATR_PERIOD || String(DEFAULT_INDICATOR_PERIOD), 10),
        atrMultiplier: parseFloat(env.SIGNAL_ATR_MULTIPLIER || String(DEFAULT_ATR_MULTIPLIER)),
        rewardMultiple: rewardRaw ? parseFloat(rewardRaw) : undefined,
        accountEquity,
        riskPercent: parseFloat(env.SIGNAL_RISK_PERCENT || "0.01"),
        // The account can only buy what it holds unless a cap says otherwise
        maxAccountSize: parseFloat(env.SIGNAL_MAX_ACCOUNT_SIZE || String(accountEquity)),
    });

    const apiKey = env.ALPACA_API_KEY;
    const secretKey = env.ALPACA_SECRET_KEY;
    const alpaca: AlpacaConfig | null = apiKey && secretKey
        ? {
            apiKey,
            secretKey,
            feed: env.ALPACA_FEED === "sip" ? "sip" : "iex",
            baseUrl: env.ALPACA_DATA_URL || undefined,
        }
        : null;

    const priceSource: PriceSourceKind = env.PRICE_SOURCE === "alpaca" ? "alpaca" : "manual";

    return Object.freeze({
        riskDefaults,
        watchlist: env.SIGNAL_WATCHLIST || DEFAULT_WATCHLIST,
        lookbackBars: parseInt(env.SIGNAL_LOOKBACK_BARS || String(DEFAULT_LOOKBACK_BARS), 10),
        priceSource,
        alpaca,
        manualBarsPath: path.resolve(REPO_ROOT, env.MANUAL_BARS_PATH || "data/manual_bars.jsonl"),
        server: Object.freeze({
            host: env.SCANNER_HOST || "0.0.0.0",
            port: parseInt(env.SCANNER_PORT || "3000", 10),
        }),
        paths: Object.freeze({
            settings: path.resolve(REPO_ROOT, env.SETTINGS_PATH || "data/settings.json"),
            auditLog: path.resolve(REPO_ROOT, env.AUDIT_LOG_PATH || "logs/decisions.jsonl"),
        }),
    });
}

// ============================================================================
// Validation
// ============================================================================

export function validateSignalConfig(config: SignalConfig): ConfigValidationResult {
    const errors: string[] = validateRiskParameters(config.riskDefaults);
    const warnings: string[] = [];

    if (!Number.isInteger(config.lookbackBars) || config.lookbackBars < config.riskDefaults.atrPeriod) {
        errors.push(`lookbackBars must be an integer >= atrPeriod (${config.riskDefaults.atrPeriod})`);
    } else if (config.lookbackBars < 2 * config.riskDefaults.atrPeriod - 1) {
        warnings.push("lookbackBars is shorter than the ADX seed window; ADX will be provisional");
    } else if (config.lookbackBars < momentumWarmUpBars()) {
        warnings.push(`lookbackBars is shorter than the momentum warm-up (${momentumWarmUpBars()}); setups will be UNRATED`);
    }

    if (config.priceSource === "alpaca" && config.alpaca === null) {
        errors.push("PRICE_SOURCE=alpaca requires ALPACA_API_KEY and ALPACA_SECRET_KEY");
    }

    if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
        errors.push("SCANNER_PORT must be a valid port");
    }

    if (config.riskDefaults.maxAccountSize > config.riskDefaults.accountEquity) {
        warnings.push("maxAccountSize > accountEquity: positions may use margin");
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}
