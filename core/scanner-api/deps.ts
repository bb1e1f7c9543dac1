import { PriceSource } from '../market/price_source.js';
import { DecisionEventSink } from '../ops/emit_decision_event.js';
import { SettingsStore } from '../settings/settings_store.js';

export interface ScannerDeps {
    readonly settings: SettingsStore;
    readonly priceSource: PriceSource;

    /** Bars requested per instrument on /scan */
    readonly lookbackBars: number;

    /** Audit sink for every decision; omitted -> log only */
    readonly auditSink?: DecisionEventSink;

    /** JSONL audit log read by /decisions */
    readonly auditLogPath?: string;

    /** Injected clock */
    readonly now: () => number;
}
