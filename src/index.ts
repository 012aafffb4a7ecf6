import { loadEnvConfig, EnvConfig } from './config';
import { createServer } from './app';
import { createShutdown, startOrShutdown } from './lifecycle';
import { ConfigStore } from './storage/config-store';
import { AuthorizationGate } from './auth/gate';
import { AdminSyncService } from './admins/sync';
import { MessagePipeline } from './moderation/pipeline';
import { CommandRouter } from './commands/router';
import { createCommandTable } from './commands/handlers';
import { EventDispatcher } from './bot/dispatcher';
import { TelegramPlatform } from './platform/telegram';
import { describeError } from './errors';
import { logger, logError, logInfo } from './utils/logger';

async function main(): Promise<void> {
    let config: EnvConfig;
    try {
        config = loadEnvConfig();
    } catch (e: unknown) {
        logError(`Startup aborted: ${describeError(e)}`);
        process.exitCode = 1;
        return;
    }
    logger.level = config.logLevel;

    const store = new ConfigStore(config.configFile);
    await store.load();
    if (config.initialAdminId !== undefined) {
        const outcome = await store.addAdmin(config.initialAdminId);
        if (outcome === 'added') logInfo(`Seeded administrator ${config.initialAdminId}`);
    }

    const platform = new TelegramPlatform({ token: config.botToken, pollingIntervalMs: config.pollingIntervalMs });
    const gate = new AuthorizationGate(store);
    const sync = new AdminSyncService(platform, store);
    const router = new CommandRouter(createCommandTable({ store, gate, sync, platform }), gate, platform);
    const dispatcher = new EventDispatcher(router, new MessagePipeline(store, platform), sync);

    const server = createServer({ isReady: () => platform.isPolling() });
    await new Promise<void>(resolve => server.listen(config.port, config.host, resolve));
    logInfo(`Liveness server listening on http://${config.host}:${config.port}`);

    const shutdown = createShutdown(platform, server);
    process.on('SIGINT', () => { void shutdown('SIGINT', 0); });
    process.on('SIGTERM', () => { void shutdown('SIGTERM', 0); });

    await startOrShutdown(
        () => platform.start(
            event => dispatcher.handle(event),
            error => {
                logError(`${error.message}. Refusing to run two instances side by side.`);
                void shutdown('duplicate instance', 1);
            },
        ),
        shutdown,
    );
}

// Process-level error logging
process.on('unhandledRejection', (reason: unknown) => {
    logError(`Unhandled Rejection: ${describeError(reason)}`);
});
process.on('uncaughtException', (err: Error) => {
    logError(`Uncaught Exception: ${err.message}`, { stack: err.stack });
});

main().catch((error: unknown) => {
    logError(`Failed to start bot: ${describeError(error)}`);
    process.exitCode = 1;
});
