import type { Server } from 'node:http';
import { startStatusServer, stopStatusServer } from '../api/router.js';
import { formatConfigIssues, getConfigPath, loadConfig } from '../config/config-loader.js';
import type { WatcherConfig } from '../types/config.js';
import { ConfigValidationError, errorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { hasFlag, readOption } from './cli.js';
import { Supervisor } from './supervisor.js';

export interface DaemonOptions {
    dryRun: boolean;
    signal: AbortSignal;
}

/**
 * Run the supervisor (and the status API when enabled) until `signal` aborts.
 * Resolves after every worker stopped and the status server closed.
 */
export async function runDaemon(config: WatcherConfig, options: DaemonOptions): Promise<void> {
    const supervisor = new Supervisor(config, { dryRun: options.dryRun });

    let server: Server | null = null;
    if (config.status.enabled) {
        server = await startStatusServer({ source: supervisor }, config.status);
    }

    try {
        await supervisor.run(options.signal);
    } finally {
        if (server) {
            await stopStatusServer(server);
        }
    }
}

/** `run` is also the default when argv is empty or starts with a flag. */
function isRunCommand(argv: string[]): boolean {
    return argv.length === 0 || argv[0] === 'run' || argv[0].startsWith('-');
}

/**
 * Handle the `run` command.
 * SIGINT and SIGTERM abort the shared signal; the process exits once all workers stopped.
 */
export async function handleRunCli(argv: string[]): Promise<boolean> {
    if (!isRunCommand(argv)) return false;

    const configPath = getConfigPath(readOption(argv, '--config'));
    let config: WatcherConfig;
    try {
        config = await loadConfig(configPath);
    } catch (error) {
        console.error(`[Config] ${errorMessage(error)}`);
        if (error instanceof ConfigValidationError) {
            for (const line of formatConfigIssues(error.issues)) {
                console.error(`  - ${line}`);
            }
        }
        process.exitCode = 1;
        return true;
    }

    const controller = new AbortController();
    const stop = (signalName: NodeJS.Signals): void => {
        if (controller.signal.aborted) return;
        console.log(`\n[dirwatch] Received ${signalName}; stopping workers...`);
        void logThought(`[dirwatch] Received ${signalName}; stopping workers.`);
        controller.abort();
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);

    try {
        await runDaemon(config, { dryRun: hasFlag(argv, '--dry-run'), signal: controller.signal });
        process.exitCode = 0;
    } catch (error) {
        console.error(`[dirwatch] Fatal: ${errorMessage(error)}`);
        process.exitCode = 1;
    } finally {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
    }

    return true;
}
