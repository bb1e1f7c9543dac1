/**
 * Request body parsing for the scanner API. Anything malformed becomes a
 * RequestValidationError, answered with 400.
 */

import {
    RiskParameters,
    createRiskParameters,
    validateRiskParameters,
} from "../risk/risk_parameters.js";
import { TradeSide } from "../risk/volatility_levels.js";

export class RequestValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "RequestValidationError";
    }
}

const RISK_KEYS = [
    "adxThreshold",
    "atrPeriod",
    "atrMultiplier",
    "rewardMultiple",
    "accountEquity",
    "riskPercent",
    "maxAccountSize",
] as const;

type RiskKey = (typeof RISK_KEYS)[number];

export function asRecord(value: unknown, what: string): Map<string, unknown> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        throw new RequestValidationError(`${what} must be a JSON object`);
    }
    return new Map<string, unknown>(Object.entries(value));
}

/**
 * Merge optional overrides into the saved parameters.
 * `rewardMultiple: null` clears the target.
 */
export function parseRiskOverrides(value: unknown, base: RiskParameters): RiskParameters {
    if (value === undefined) {
        return base;
    }
    const record = asRecord(value, "params");

    const pick = (key: RiskKey): number | undefined => {
        const raw = record.get(key);
        if (raw === undefined) return undefined;
        if (typeof raw !== "number" || !Number.isFinite(raw)) {
            throw new RequestValidationError(`params.${key} must be a finite number`);
        }
        return raw;
    };

    const rewardCleared = record.get("rewardMultiple") === null;
    const params = createRiskParameters({
        adxThreshold: pick("adxThreshold") ?? base.adxThreshold,
        atrPeriod: pick("atrPeriod") ?? base.atrPeriod,
        atrMultiplier: pick("atrMultiplier") ?? base.atrMultiplier,
        rewardMultiple: rewardCleared ? undefined : pick("rewardMultiple") ?? base.rewardMultiple,
        accountEquity: pick("accountEquity") ?? base.accountEquity,
        riskPercent: pick("riskPercent") ?? base.riskPercent,
        maxAccountSize: pick("maxAccountSize") ?? base.maxAccountSize,
    });

    const errors = validateRiskParameters(params);
    if (errors.length > 0) {
        throw new RequestValidationError(`invalid params: ${errors.join("; ")}`);
    }
    return params;
}

export function parseSide(value: unknown): TradeSide {
    if (value === undefined) return "LONG";
    if (value === "LONG" || value === "SHORT") return value;
    throw new RequestValidationError(`side must be "LONG" or "SHORT"`);
}

export interface SetupRequest {
    readonly instrument: string;
    readonly entryPrice?: number;
    readonly side: TradeSide;
}

export function parseSetupRequest(value: unknown): SetupRequest {
    const record = asRecord(value, "setup");

    const instrument = record.get("instrument");
    if (typeof instrument !== "string" || !instrument.trim()) {
        throw new RequestValidationError("setup.instrument must be a non-empty string");
    }

    const entryPrice = record.get("entryPrice");
    if (entryPrice !== undefined && typeof entryPrice !== "number") {
        throw new RequestValidationError("setup.entryPrice must be a number");
    }

    return {
        instrument: instrument.trim().toUpperCase(),
        entryPrice,
        side: parseSide(record.get("side")),
    };
}
