import { Router } from 'express';
import { emitDecisionEvent } from '../../ops/emit_decision_event.js';
import { evaluateFromHistory } from '../../signal/orchestrator.js';
import { ScannerDeps } from '../deps.js';
import {
    RequestValidationError,
    asRecord,
    parseRiskOverrides,
    parseSetupRequest
} from '../request_parsing.js';

function lastClose(bars: unknown[]): number {
    const last: unknown = bars[bars.length - 1];
    if (typeof last === 'object' && last !== null && 'close' in last && typeof last.close === 'number') {
        return last.close;
    }
    return 0;
}

export function evaluateRoutes(deps: ScannerDeps): Router {
    const router = Router();

    // POST /evaluate  { setup: {instrument, entryPrice?, side?}, bars: [...], params?: {...} }
    // Entry defaults to the latest close.
    router.post('/', async (req, res, next) => {
        try {
            const body = asRecord(req.body, 'body');
            const setupReq = parseSetupRequest(body.get('setup'));

            const bars = body.get('bars');
            if (!Array.isArray(bars)) {
                throw new RequestValidationError('bars must be an array of price bars');
            }

            const saved = await deps.settings.load();
            const params = parseRiskOverrides(body.get('params'), saved.risk);

            const setup = {
                instrument: setupReq.instrument,
                side: setupReq.side,
                entryPrice: setupReq.entryPrice ?? lastClose(bars)
            };

            const decision = evaluateFromHistory(setup, bars, params, deps.now());
            emitDecisionEvent(decision, deps.auditSink);

            res.locals.resultCount = 1;
            res.json(decision);
        } catch (e) {
            next(e);
        }
    });

    return router;
}
