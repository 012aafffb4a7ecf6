import { Histogram, Counter, Gauge } from 'prom-client';

const metrics = {
    messagesScanned: new Counter({
        name: 'messages_scanned_total',
        help: 'Total number of text messages that reached the moderation pipeline',
    }),
    pipelineOutcomes: new Counter({
        name: 'pipeline_outcomes_total',
        help: 'Final pipeline state per message',
        labelNames: ['state'] as const, // "SKIPPED" | "SUCCEEDED" | "DEGRADED"
    }),
    commandsTotal: new Counter({
        name: 'commands_total',
        help: 'Administrative commands handled',
        labelNames: ['command', 'status'] as const, // "ok" | "denied" | "usage" | "error"
    }),
    configSaves: new Counter({
        name: 'config_saves_total',
        help: 'Configuration file writes',
        labelNames: ['status'] as const, // "ok" | "error"
    }),
    adminsSynced: new Counter({
        name: 'admins_synced_total',
        help: 'Administrators added from chat administrator lists',
    }),
    eventFailures: new Counter({
        name: 'event_failures_total',
        help: 'Inbound events whose handling threw',
        labelNames: ['kind'] as const,
    }),
    pollingUp: new Gauge({
        name: 'polling_up',
        help: 'Update polling state (1=running, 0=stopped)',
    }),

    // HTTP metrics
    httpRequestsTotal: new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['method', 'route', 'status'] as const,
    }),
    httpRequestDuration: new Histogram({
        name: 'http_request_duration_seconds',
        help: 'Duration of HTTP requests in seconds',
        labelNames: ['method', 'route', 'status'] as const,
        buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    }),
};

export const recordMessageScanned = () => metrics.messagesScanned.inc();
export const recordPipelineOutcome = (state: string) => metrics.pipelineOutcomes.inc({ state });
export const recordCommand = (command: string, status: 'ok' | 'denied' | 'usage' | 'error') =>
    metrics.commandsTotal.inc({ command, status });
export const recordConfigSave = (ok: boolean) => metrics.configSaves.inc({ status: ok ? 'ok' : 'error' });
export const recordAdminsSynced = (count: number) => metrics.adminsSynced.inc(count);
export const recordEventFailure = (kind: string) => metrics.eventFailures.inc({ kind });
export const setPollingUp = (up: boolean) => metrics.pollingUp.set(up ? 1 : 0);

export const observeHttpRequest = (method: string, route: string, status: number, durationSec: number) => {
    const labels = { method, route, status: String(status) };
    metrics.httpRequestsTotal.inc(labels);
    metrics.httpRequestDuration.observe(labels, durationSec);
};

export default metrics;
