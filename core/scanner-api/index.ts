import { createServer } from 'node:http';
import { loadDotenv, loadSignalConfigFromEnv, validateSignalConfig } from '../config.js';
import { createPriceSource } from '../market/sources/create_price_source.js';
import { createJsonlSink } from '../ops/emit_decision_event.js';
import { FileSettingsStore } from '../settings/settings_store.js';
import { createScannerApp } from './app.js';

// ENV must be loaded before the config is read
loadDotenv();

const config = loadSignalConfigFromEnv();
const validation = validateSignalConfig(config);
validation.warnings.forEach((w) => console.warn(`[CONFIG] WARNING: ${w}`));
if (!validation.valid) {
    validation.errors.forEach((e) => console.error(`[CONFIG] ERROR: ${e}`));
    console.error('CRITICAL: invalid configuration, refusing to start the Scanner API.');
    process.exit(1);
}

const settings = new FileSettingsStore(config.paths.settings, {
    risk: config.riskDefaults,
    watchlist: config.watchlist,
    updatedAt: 0,
});
const priceSource = await createPriceSource(config);

const app = createScannerApp({
    settings,
    priceSource,
    lookbackBars: config.lookbackBars,
    auditSink: createJsonlSink(config.paths.auditLog),
    auditLogPath: config.paths.auditLog,
    now: Date.now,
});

const server = createServer(app);

const shutdown = () => {
    console.log('Shutting down Scanner API...');
    server.close(() => {
        console.log('Server closed.');
        process.exit(0);
    });

    setTimeout(() => {
        process.exit(1);
    }, 5000).unref();
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

server.listen(config.server.port, config.server.host, () => {
    console.log(`============================================================`);
    console.log(`Swing Setup Scanner API`);
    console.log(`Price source: ${priceSource.name} (automated bars: ${priceSource.capabilities.automatedBars})`);
    console.log(`Settings: ${settings.filePath}`);
    console.log(`Listening on http://${config.server.host}:${config.server.port}`);
    console.log(`============================================================`);
});
