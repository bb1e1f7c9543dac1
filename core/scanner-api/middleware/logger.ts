import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
    const requestId = randomUUID();
    const start = Date.now();

    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
        const duration = Date.now() - start;
        const resultCount: unknown = res.locals.resultCount;
        console.log(`[REQ] ${requestId} | ${req.method} ${req.path} | status=${res.statusCode} | ${duration}ms | result_count=${typeof resultCount === 'number' ? resultCount : 'n/a'}`);
    });

    next();
};
