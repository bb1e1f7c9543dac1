import { Router } from 'express';
import { ScannerDeps } from '../deps.js';
import { RequestValidationError, asRecord, parseRiskOverrides } from '../request_parsing.js';

export function settingsRoutes(deps: ScannerDeps): Router {
    const router = Router();

    // GET /settings
    router.get('/', async (req, res, next) => {
        try {
            res.json(await deps.settings.load());
        } catch (e) {
            next(e);
        }
    });

    // PUT /settings  { params?: {...}, watchlist?: "AAPL, MSFT" }
    router.put('/', async (req, res, next) => {
        try {
            const body = asRecord(req.body, 'body');
            const current = await deps.settings.load();

            const watchlist = body.get('watchlist');
            if (watchlist !== undefined && typeof watchlist !== 'string') {
                throw new RequestValidationError('watchlist must be a comma-separated string');
            }

            const updated = Object.freeze({
                risk: parseRiskOverrides(body.get('params'), current.risk),
                watchlist: watchlist ?? current.watchlist,
                updatedAt: deps.now()
            });
            await deps.settings.save(updated);
            res.json(updated);
        } catch (e) {
            next(e);
        }
    });

    return router;
}
