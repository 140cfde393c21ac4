import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    const message = err instanceof Error ? err.message : String(err);
    return { status: 500, message: scrubSensitiveText(message) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    void logThought(`[StatusAPI] [${correlationId}] ${req.method} ${req.path}`);
    next();
}

/** Fallback for unmatched routes. */
export function notFound(req: Request, res: Response): void {
    sendError(res, `Route not found: ${req.method} ${req.path}`, 404);
}

/** Final error handler; express recognises it by its four parameters. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
    const { status, message } = mapError(err);
    console.error(`[StatusAPI] Request failed: ${message}`);
    sendError(res, message, status);
}
