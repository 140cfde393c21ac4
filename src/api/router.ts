import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth } from './handlers/health.js';
import { handleStatus, type StatusSource } from './handlers/status.js';
import { errorHandler, notFound, requestLogger } from './shared.js';
import type { StatusServerConfig } from '../types/config.js';
import { logThought } from '../utils/logger.js';

export interface StatusApiDeps {
    source: StatusSource;
}

/**
 * Build the read-only status API.
 *
 * Endpoints:
 *   GET /health  — liveness and watch count
 *   GET /status  — counters and per-worker loop state
 */
export function createStatusApp(deps: StatusApiDeps): Express {
    const app = express();
    app.disable('x-powered-by');

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth({ source: deps.source }));
    app.get('/status', handleStatus({ source: deps.source }));

    app.use(notFound);
    app.use(errorHandler);
    return app;
}

/** Listen on `config.host:config.port`. Resolves once the socket is bound. */
export function startStatusServer(deps: StatusApiDeps, config: StatusServerConfig): Promise<Server> {
    const server = createServer(createStatusApp(deps));
    return new Promise((resolve, reject) => {
        const onError = (err: Error): void => {
            reject(err);
        };
        server.once('error', onError);
        server.listen(config.port, config.host, () => {
            server.off('error', onError);
            console.log(`[StatusAPI] Listening on http://${config.host}:${config.port}`);
            void logThought(`[StatusAPI] Listening on ${config.host}:${config.port}`);
            resolve(server);
        });
    });
}

/** Close the server, resolving once in-flight connections are done. */
export function stopStatusServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => {
            if (err) {
                reject(err);
                return;
            }
            resolve();
        });
    });
}
