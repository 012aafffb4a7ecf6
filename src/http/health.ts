import { Request, Response } from 'express';

const startedAt = Date.now();

export const healthCheck = (_req: Request, res: Response) => {
    res.status(200).json({
        status: 'ok',
        ts: new Date().toISOString(),
        uptime: Math.floor((Date.now() - startedAt) / 1000),
    });
};

/** 200 once the bot receives updates, 503 before that or after a stop. */
export const readinessCheck = (isReady: () => boolean) => (_req: Request, res: Response) => {
    const ready = isReady();
    res.status(ready ? 200 : 503).json({ ok: ready, polling: ready ? 'running' : 'stopped' });
};
