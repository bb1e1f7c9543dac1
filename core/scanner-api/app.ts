import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { requestLogger } from './middleware/logger.js';
import { ScannerDeps } from './deps.js';
import { RequestValidationError } from './request_parsing.js';
import { healthRoutes } from './routes/health.js';
import { settingsRoutes } from './routes/settings.js';
import { evaluateRoutes } from './routes/evaluate.js';
import { scanRoutes } from './routes/scan.js';
import { decisionRoutes } from './routes/decisions.js';

export function createScannerApp(deps: ScannerDeps): Express {
    const app = express();

    app.use(cors({
        origin: '*',
        methods: ['GET', 'POST', 'PUT'],
    }));

    app.use(requestLogger);
    app.use(express.json({ limit: '2mb' }));

    // Routes
    app.use('/health', healthRoutes(deps));
    app.use('/settings', settingsRoutes(deps));
    app.use('/evaluate', evaluateRoutes(deps));
    app.use('/scan', scanRoutes(deps));
    app.use('/decisions', decisionRoutes(deps));

    app.get('/ping', (req: Request, res: Response) => {
        res.json({ status: 'pong', time: new Date(deps.now()).toISOString() });
    });

    // Error handler: validation -> 400, malformed JSON -> 400, rest -> 500
    app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            return next(err);
        }
        if (err instanceof RequestValidationError) {
            return res.status(400).json({ error: err.message });
        }
        if (err instanceof SyntaxError) {
            return res.status(400).json({ error: `Malformed JSON body: ${err.message}` });
        }
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[API ERROR] ${req.method} ${req.path} | ${message}`);
        res.status(500).json({ error: message });
    });

    return app;
}
