import { Router } from 'express';
import { emitDecisionEvent } from '../../ops/emit_decision_event.js';
import { parseWatchlist, scanInstruments } from '../../signal/scanner.js';
import { ScannerDeps } from '../deps.js';
import {
    RequestValidationError,
    asRecord,
    parseRiskOverrides,
    parseSide
} from '../request_parsing.js';

export function scanRoutes(deps: ScannerDeps): Router {
    const router = Router();

    // POST /scan  { tickers?: "AAPL, MSFT", params?: {...}, side?: "LONG" }
    // Settings are saved before scanning so the next session starts from them.
    router.post('/', async (req, res, next) => {
        try {
            const body = asRecord(req.body ?? {}, 'body');
            const current = await deps.settings.load();

            const tickers = body.get('tickers');
            if (tickers !== undefined && typeof tickers !== 'string') {
                throw new RequestValidationError('tickers must be a comma-separated string');
            }

            const risk = parseRiskOverrides(body.get('params'), current.risk);
            const watchlist = tickers ?? current.watchlist;
            const side = parseSide(body.get('side'));

            if (tickers !== undefined || body.has('params')) {
                await deps.settings.save(Object.freeze({ risk, watchlist, updatedAt: deps.now() }));
            }

            const instruments = parseWatchlist(watchlist);
            const now = deps.now();
            const results = await scanInstruments(instruments, deps.priceSource, risk, {
                lookback: deps.lookbackBars,
                side,
                now
            });

            for (const decision of results) {
                emitDecisionEvent(decision, deps.auditSink);
            }

            res.locals.resultCount = results.length;
            res.json({
                scanned_at: now,
                source: deps.priceSource.name,
                results
            });
        } catch (e) {
            next(e);
        }
    });

    return router;
}
