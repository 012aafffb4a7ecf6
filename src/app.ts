import express from 'express';
import http from 'http';
import client from 'prom-client';
import { healthCheck, readinessCheck } from './http/health';
import { observeHttpRequest } from './utils/metrics';
import { logError, logInfo } from './utils/logger';
import { describeError } from './errors';

export type AppOptions = {
    isReady?: () => boolean;
};

let defaultMetricsStarted = false;

/**
 * Liveness responder: keeps hosting platforms that ping the service happy and
 * exposes Prometheus metrics. The bot itself does not depend on it.
 */
export function createApp(options: AppOptions = {}): express.Express {
    const app = express();
    app.disable('x-powered-by');
    app.set('trust proxy', 1);

    // Request logging + HTTP metrics
    app.use((req, res, next) => {
        const start = process.hrtime.bigint();
        res.on('finish', () => {
            const durSec = Number(process.hrtime.bigint() - start) / 1e9;
            const route = req.route?.path || req.path;
            observeHttpRequest(req.method, route, res.statusCode, durSec);
            logInfo(`[HTTP] ${req.method} ${req.originalUrl} ${res.statusCode} ${durSec.toFixed(3)}s`);
        });
        next();
    });

    app.get('/health', healthCheck);
    app.get('/ready', readinessCheck(options.isReady ?? (() => false)));

    // Prometheus metrics
    if (!defaultMetricsStarted) {
        client.collectDefaultMetrics();
        defaultMetricsStarted = true;
    }
    app.get('/metrics', async (_req, res, next) => {
        try {
            res.set('Content-Type', client.register.contentType);
            res.send(await client.register.metrics());
        } catch (e: unknown) {
            next(e);
        }
    });

    app.get('/', (_req, res) => {
        res
          .type('text/plain; charset=utf-8')
          .send(
`Spoiler bot is running.

Useful endpoints:
- Health:        /health
- Readiness:     /ready
- Metrics:       /metrics
`
          );
    });

    // Reduce favicon 404 noise
    app.get('/favicon.ico', (_req, res) => res.status(204).end());

    // Global error handler
    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        logError(`[HTTP-ERR] ${req.method} ${req.originalUrl} ${describeError(err)}`);
        if (res.headersSent) return;
        res.status(500).json({ error: 'internal-error' });
    });

    return app;
}

export function createServer(options: AppOptions = {}): http.Server {
    return http.createServer(createApp(options));
}
