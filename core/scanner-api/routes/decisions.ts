import { Router } from 'express';
import { readJSONL } from '../../market/readers/JSONLReader.js';
import { ScannerDeps } from '../deps.js';

function getDayRange(dateStr: string) {
    const y = parseInt(dateStr.slice(0, 4));
    const m = parseInt(dateStr.slice(4, 6)) - 1;
    const d = parseInt(dateStr.slice(6, 8));

    const start = new Date(Date.UTC(y, m, d, 0, 0, 0, 0)).getTime();
    const end = new Date(Date.UTC(y, m, d, 23, 59, 59, 999)).getTime();
    return { start, end };
}

function evaluatedAt(record: unknown): number | null {
    if (typeof record === 'object' && record !== null && 'evaluated_at' in record && typeof record.evaluated_at === 'number') {
        return record.evaluated_at;
    }
    return null;
}

export function decisionRoutes(deps: ScannerDeps): Router {
    const router = Router();

    // GET /decisions?date=YYYYMMDD
    router.get('/', async (req, res, next) => {
        const date = req.query.date;
        if (typeof date !== 'string' || !/^\d{8}$/.test(date)) {
            return res.status(400).json({ error: 'Valid date parameter YYYYMMDD is required' });
        }
        if (!deps.auditLogPath) {
            return res.status(404).json({ error: 'Audit log is not configured' });
        }

        try {
            const { start, end } = getDayRange(date);
            const { records } = await readJSONL(deps.auditLogPath, {
                filter: (e) => {
                    const ts = evaluatedAt(e);
                    return ts !== null && ts >= start && ts <= end;
                }
            });

            res.locals.resultCount = records.length;
            res.json(records);
        } catch (e) {
            next(e);
        }
    });

    return router;
}
