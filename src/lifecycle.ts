import { describeError } from './errors';
import { logError, logInfo } from './utils/logger';

export interface Stoppable {
    stop(): Promise<void>;
}

/** Structural subset of `http.Server` used on the way out. */
export interface Closable {
    close(callback: (err?: Error) => void): unknown;
}

export type Shutdown = (reason: string, exitCode: number) => Promise<void>;

/**
 * Stops polling, closes the liveness server, then exits with `exitCode`.
 * Only the first call does anything.
 */
export function createShutdown(
    platform: Stoppable,
    server: Closable,
    exit: (code: number) => void = code => process.exit(code),
): Shutdown {
    let stopping = false;
    return async (reason, exitCode) => {
        if (stopping) return;
        stopping = true;
        logInfo(`Shutting down (${reason})...`);
        try {
            await platform.stop();
            await closeServer(server);
        } catch (e: unknown) {
            logError(`Error during shutdown: ${describeError(e)}`);
        } finally {
            exit(exitCode);
        }
    };
}

/**
 * Runs `start`; when it rejects the process shuts down with code 1 so the
 * liveness server never reports a bot that is not polling.
 */
export async function startOrShutdown(start: () => Promise<void>, shutdown: Shutdown): Promise<boolean> {
    try {
        await start();
        return true;
    } catch (e: unknown) {
        logError(`Failed to start polling: ${describeError(e)}`);
        await shutdown('startup failed', 1);
        return false;
    }
}

function closeServer(server: Closable): Promise<void> {
    return new Promise((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}
