import { startServer } from '../../api/server';
import { closeAllBrowsers } from '../../browser/launcher';
import { config } from '../../config';
import { errorMessage } from '../../core/errors';
import { createRuntime, shutdownRuntime } from '../../core/runtime';
import { logError, logInfo, logWarn } from '../../telemetry/logger';
import { getOptionValue, parseIntStrict } from '../cliParser';

export async function runServeCommand(args: string[]): Promise<void> {
    const portRaw = getOptionValue(args, '--port');
    const port = portRaw ? parseIntStrict(portRaw, '--port') : config.port;

    const runtime = createRuntime();
    const recovered = await runtime.runner.recoverInterrupted();
    if (recovered > 0) {
        await logWarn('serve.boot.recovered_tasks', { recovered });
    }

    const purgeTimer = setInterval(() => {
        runtime.sessions.purgeExpired().then(
            (purged) => (purged > 0 ? logInfo('serve.sessions.purged', { purged }) : undefined),
            (error: unknown) => logError('serve.sessions.purge_failed', { error: errorMessage(error) })
        );
    }, config.sessionPurgeIntervalMs);
    purgeTimer.unref();

    const server = startServer(port, {
        orchestrator: runtime.orchestrator,
        broker: runtime.broker,
        activeTasks: () => runtime.runner.scheduledCount,
    });

    await new Promise<void>((resolve) => {
        let shuttingDown = false;
        const handler = (signal: string): void => {
            if (shuttingDown) return;
            shuttingDown = true;
            clearInterval(purgeTimer);
            void logWarn('serve.shutdown', { signal, inFlight: runtime.runner.scheduledCount });
            server.close(() => {
                closeAllBrowsers()
                    .then(() => shutdownRuntime(runtime))
                    .catch((error: unknown) => logError('serve.shutdown_failed', { error: errorMessage(error) }))
                    .finally(resolve);
            });
        };
        process.once('SIGINT', () => handler('SIGINT'));
        process.once('SIGTERM', () => handler('SIGTERM'));
    });
}
