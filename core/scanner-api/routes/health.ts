import { Router } from 'express';
import { ScannerDeps } from '../deps.js';

export function healthRoutes(deps: ScannerDeps): Router {
    const router = Router();

    // GET /health
    router.get('/', (req, res) => {
        res.json({
            status: 'ok',
            source: deps.priceSource.name,
            capabilities: deps.priceSource.capabilities,
            lookback_bars: deps.lookbackBars,
            time: new Date(deps.now()).toISOString()
        });
    });

    return router;
}
