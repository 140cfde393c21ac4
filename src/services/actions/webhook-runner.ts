import type { WebhookActionSpec } from '../../types/config.js';
import { ActionFailedError } from '../../utils/errors.js';
import { scrubSensitiveText } from '../../utils/logger.js';
import { expandTemplate } from '../../utils/template.js';
import type { ActionContext, ActionRunner } from './types.js';

/** JSON body posted for every webhook dispatch. */
export interface WebhookPayload {
    path: string;
    relpath: string;
    prev_path: string;
    event: string;
    size: number;
    mtime: string;
    age_ms: number;
    is_dir: boolean;
}

/**
 * Minimal HTTP transport: POST a JSON body and report the status code.
 * Redirects are not followed, so a 3xx reply reaches the caller as is.
 */
export type HttpPost = (
    url: string,
    body: string,
    options: { signal: AbortSignal; headers: Record<string, string> },
) => Promise<{ status: number }>;

export const fetchPost: HttpPost = async (url, body, { signal, headers }) => {
    const response = await fetch(url, { method: 'POST', headers, body, signal, redirect: 'manual' });
    await response.body?.cancel();
    return { status: response.status };
};

export function buildWebhookPayload(context: ActionContext): WebhookPayload {
    return {
        path: context.path,
        relpath: context.relativePath,
        prev_path: context.previousPath ?? '',
        event: context.kind,
        size: context.size,
        mtime: new Date(context.mtimeMs).toISOString(),
        age_ms: Math.floor(context.ageMs),
        is_dir: context.isDirectory,
    };
}

export class WebhookRunner implements ActionRunner<WebhookActionSpec> {
    readonly #post: HttpPost;

    constructor(post: HttpPost = fetchPost) {
        this.#post = post;
    }

    describe(context: ActionContext, action: WebhookActionSpec): string {
        return `POST ${scrubSensitiveText(expandTemplate(action.url, context))}`;
    }

    async run(context: ActionContext, action: WebhookActionSpec, signal: AbortSignal): Promise<void> {
        const url = expandTemplate(action.url, context);
        const body = JSON.stringify(buildWebhookPayload(context));
        const { status } = await this.#post(url, body, {
            signal,
            headers: { 'Content-Type': 'application/json' },
        });
        if (status >= 300) {
            throw new ActionFailedError('http_status', `Webhook ${scrubSensitiveText(url)} responded with status ${status}.`);
        }
    }
}
