/**
 * Validation issue type, the defaults the loader applies, and the sample
 * `dirwatch.json` written by `init`. Keys are snake_case on disk.
 */

export interface ConfigIssue {
    /** Location inside the document, e.g. `watches[0].actions[1].cmd`. */
    path: string;
    message: string;
}

export const CONFIG_DEFAULTS = {
    scanIntervalMs: 1000,
    debounceMs: 200,
    dryRun: false,
    overwrite: false,
    timeoutMs: 30_000,
    retries: 0,
    retryDelayMs: 0,
    events: ['create', 'modify'],
    ignoreHidden: true,
    statusHost: '127.0.0.1',
    statusPort: 18790,
} as const;

export const DEFAULT_CONFIG_FILENAME = 'dirwatch.json';

/** Written by `dirwatch init`. */
export const SAMPLE_CONFIG = {
    global: {
        scan_interval_ms: 1000,
        debounce_ms: 200,
        dry_run: false,
        defaults: {
            overwrite: false,
        },
    },
    status: {
        enabled: false,
        host: '127.0.0.1',
        port: 18790,
    },
    watches: [
        {
            path: './incoming',
            recursive: true,
            scan_interval_ms: 500,
            stop_on_first_match: false,
            actions: [
                {
                    name: 'images',
                    include: ['**/*.jpg', '**/*.png'],
                    events: ['create', 'modify'],
                    type: 'exec',
                    cmd: 'python process_image.py {path}',
                    retries: 3,
                    timeout_ms: 10_000,
                },
                {
                    name: 'pdf_backup',
                    include: ['**/*.pdf'],
                    exclude: ['**/tmp/**'],
                    events: ['create'],
                    type: 'copy',
                    dest: '/backup/docs/{relpath}',
                    overwrite: true,
                },
                {
                    name: 'archive_old',
                    include: ['**/*'],
                    events: ['modify'],
                    type: 'move',
                    dest: '{dir}/archive/{name}',
                    condition: {
                        min_age_ms: '24h',
                        only_files: true,
                    },
                },
                {
                    name: 'notify',
                    include: ['**/*.csv'],
                    events: ['create', 'delete', 'move'],
                    type: 'webhook',
                    url: 'http://127.0.0.1:8080/hooks/dirwatch',
                    timeout_ms: '5s',
                },
            ],
        },
    ],
};
