import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const SENSITIVE_ENV_NAME = /(KEY|SECRET|TOKEN|PASSWORD|PASSWD|CREDENTIAL)/i;
const MIN_SECRET_LENGTH = 6;
const INLINE_SECRET_PATTERNS: RegExp[] = [
    /\b((?:api[_-]?key|secret|token|password|passwd|auth)\s*[=:]\s*)([^\s&"']+)/gi,
    /\b(Bearer\s+)([A-Za-z0-9._~+/=-]+)/g,
    /(https?:\/\/[^:/\s]+:)([^@/\s]+)(@)/gi,
];

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sensitiveEnvValues(): string[] {
    const values: string[] = [];
    for (const [name, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_SECRET_LENGTH) continue;
        if (SENSITIVE_ENV_NAME.test(name)) {
            values.push(value);
        }
    }
    // Longest first so a secret containing another is replaced whole.
    return values.sort((a, b) => b.length - a.length);
}

/**
 * Redact secrets before text reaches a console line or the daily log.
 *
 * Covers raw values of secret-looking environment variables, inline
 * `key=value` pairs, bearer tokens and credentials embedded in URLs.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const value of sensitiveEnvValues()) {
        scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
    }
    for (const pattern of INLINE_SECRET_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, (_match, prefix: string, _secret: string, suffix?: string) =>
            `${prefix}${REDACTED}${typeof suffix === 'string' ? suffix : ''}`,
        );
    }
    return scrubbed;
}

function fileLoggingEnabled(): boolean {
    return (process.env.DIRWATCH_LOG_FILE ?? '').trim().toLowerCase() !== 'off';
}

/** Directory holding the daily `<YYYY-MM-DD>.md` log files. */
export function getLogDir(): string {
    return path.resolve(process.env.DIRWATCH_LOG_DIR ?? 'logs');
}

export function getDailyLogPath(date: Date = new Date()): string {
    return path.join(getLogDir(), `${date.toISOString().slice(0, 10)}.md`);
}

async function appendEntry(heading: string, body: string): Promise<void> {
    if (!fileLoggingEnabled()) return;

    const now = new Date();
    const entry = `## ${heading} @ ${now.toISOString()}\n${scrubSensitiveText(body)}\n\n`;
    try {
        await mkdir(getLogDir(), { recursive: true });
        await appendFile(getDailyLogPath(now), entry, 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write daily log: ${message}`);
    }
}

/** Append an operational note to today's log file. */
export async function logThought(message: string): Promise<void> {
    await appendEntry('Thought', message);
}

/** Record a spawned command together with its outcome. */
export async function logSystemCommand(command: string, output: string, exitCode: number): Promise<void> {
    const body = [`Command: ${command}`, `Exit code: ${exitCode}`, output ? `Output: ${output}` : '']
        .filter(Boolean)
        .join('\n');
    await appendEntry('System Command', body);
}
