import path from 'node:path';
import type { ChangeKind } from '../types/watch.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const TOKEN_PATTERN = /\{([a-z_]+)\}/g;

/** Values available to `{token}` substitution. */
export interface TemplateContext {
    path: string;
    relativePath: string;
    previousPath?: string;
    kind: ChangeKind;
    size: number;
    mtimeMs: number;
    ageMs: number;
}

/** RFC 3339 in UTC with second precision, e.g. `2024-05-01T10:00:00Z`. */
export function formatRfc3339(ms: number): string {
    return new Date(ms).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function splitName(name: string): { stem: string; ext: string } {
    const dot = name.lastIndexOf('.');
    if (dot <= 0) {
        return { stem: name, ext: '' };
    }
    return { stem: name.slice(0, dot), ext: name.slice(dot) };
}

function tokenValues(ctx: TemplateContext): Record<string, string> {
    const name = path.basename(ctx.path);
    const { stem, ext } = splitName(name);
    return {
        path: ctx.path,
        relpath: ctx.relativePath,
        prev_path: ctx.previousPath ?? '',
        dir: path.dirname(ctx.path),
        name,
        stem,
        ext,
        event: ctx.kind,
        size: String(ctx.size),
        mtime: formatRfc3339(ctx.mtimeMs),
        age_ms: String(Math.floor(ctx.ageMs)),
        age_days: String(Math.floor(ctx.ageMs / DAY_MS)),
    };
}

/**
 * Substitute known `{token}`s in a single pass. Substituted text is not
 * re-scanned and unknown tokens stay as written.
 */
export function expandTemplate(input: string, ctx: TemplateContext): string {
    const values = tokenValues(ctx);
    return input.replace(TOKEN_PATTERN, (match, token: string) =>
        Object.prototype.hasOwnProperty.call(values, token) ? values[token] : match,
    );
}
