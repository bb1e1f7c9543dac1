/**
 * Settings Store
 *
 * Persists the scanner's risk parameters and watchlist between sessions.
 * Load-on-start, save-on-change; the core only ever sees the values.
 * JSON file with atomic writes (write to temp, rename).
 */

import fs from "node:fs/promises";
import path from "node:path";
import {
    RiskParameters,
    createRiskParameters,
    validateRiskParameters,
} from "../risk/risk_parameters.js";

export interface ScannerSettings {
    readonly risk: RiskParameters;
    readonly watchlist: string;
    readonly updatedAt: number;
}

export interface SettingsStore {
    load(): Promise<ScannerSettings>;
    save(settings: ScannerSettings): Promise<void>;
}

function readNumber(record: Map<string, unknown>, key: string): number | undefined {
    const value = record.get(key);
    return typeof value === "number" ? value : undefined;
}

/**
 * Parse a stored settings document, falling back to `defaults` field by field.
 */
export function parseSettings(raw: unknown, defaults: ScannerSettings): ScannerSettings {
    if (typeof raw !== "object" || raw === null) {
        return defaults;
    }
    const doc = new Map<string, unknown>(Object.entries(raw));
    const riskRaw = doc.get("risk");
    const risk = new Map<string, unknown>(
        typeof riskRaw === "object" && riskRaw !== null ? Object.entries(riskRaw) : []
    );

    const candidate = createRiskParameters({
        adxThreshold: readNumber(risk, "adxThreshold") ?? defaults.risk.adxThreshold,
        atrPeriod: readNumber(risk, "atrPeriod") ?? defaults.risk.atrPeriod,
        atrMultiplier: readNumber(risk, "atrMultiplier") ?? defaults.risk.atrMultiplier,
        rewardMultiple: readNumber(risk, "rewardMultiple") ?? defaults.risk.rewardMultiple,
        accountEquity: readNumber(risk, "accountEquity") ?? defaults.risk.accountEquity,
        riskPercent: readNumber(risk, "riskPercent") ?? defaults.risk.riskPercent,
        maxAccountSize: readNumber(risk, "maxAccountSize") ?? defaults.risk.maxAccountSize,
    });

    const errors = validateRiskParameters(candidate);
    if (errors.length > 0) {
        console.warn(`[SETTINGS] Stored risk parameters rejected (${errors.join("; ")}), using defaults`);
    }

    const watchlist = doc.get("watchlist");
    const updatedAt = readNumber(doc, "updatedAt");

    return Object.freeze({
        risk: errors.length > 0 ? defaults.risk : candidate,
        watchlist: typeof watchlist === "string" ? watchlist : defaults.watchlist,
        updatedAt: updatedAt ?? defaults.updatedAt,
    });
}

export class FileSettingsStore implements SettingsStore {
    readonly #filePath: string;
    readonly #defaults: ScannerSettings;

    constructor(filePath: string, defaults: ScannerSettings) {
        this.#filePath = filePath;
        this.#defaults = defaults;
    }

    get filePath(): string {
        return this.#filePath;
    }

    /**
     * Read the stored settings. Missing file -> defaults.
     */
    async load(): Promise<ScannerSettings> {
        let content: string;
        try {
            content = await fs.readFile(this.#filePath, "utf-8");
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                return this.#defaults;
            }
            throw error;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch {
            console.warn(`[SETTINGS] ${this.#filePath} is not valid JSON, using defaults`);
            return this.#defaults;
        }
        return parseSettings(parsed, this.#defaults);
    }

    /**
     * Save settings atomically.
     */
    async save(settings: ScannerSettings): Promise<void> {
        const errors = validateRiskParameters(settings.risk);
        if (errors.length > 0) {
            throw new Error(`Refusing to save invalid risk parameters: ${errors.join("; ")}`);
        }

        await fs.mkdir(path.dirname(this.#filePath), { recursive: true });
        const tempPath = `${this.#filePath}.tmp`;
        await fs.writeFile(tempPath, JSON.stringify(settings, null, 2), "utf-8");
        await fs.rename(tempPath, this.#filePath);

        console.log(`[SETTINGS] Saved to ${this.#filePath}`);
    }
}

/**
 * In-process store for tests and single-session runs.
 */
export class MemorySettingsStore implements SettingsStore {
    #current: ScannerSettings;

    constructor(initial: ScannerSettings) {
        this.#current = initial;
    }

    async load(): Promise<ScannerSettings> {
        return this.#current;
    }

    async save(settings: ScannerSettings): Promise<void> {
        this.#current = settings;
    }
}
