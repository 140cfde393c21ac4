import { constants } from 'node:fs';
import { copyFile, mkdir, rename, stat, unlink } from 'node:fs/promises';
import path from 'node:path';
import type { TransferActionSpec } from '../../types/config.js';
import { ActionFailedError, errorMessage } from '../../utils/errors.js';
import { expandTemplate } from '../../utils/template.js';
import type { ActionContext, ActionRunner } from './types.js';

/** Filesystem operations used by copy/move/rename; swapped in tests to force failures. */
export interface TransferFs {
    exists: (target: string) => Promise<boolean>;
    mkdir: (dir: string) => Promise<void>;
    copyFile: (source: string, dest: string, exclusive: boolean) => Promise<void>;
    rename: (source: string, dest: string) => Promise<void>;
    unlink: (target: string) => Promise<void>;
}

export const nodeTransferFs: TransferFs = {
    exists: async (target) => {
        try {
            await stat(target);
            return true;
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
            throw err;
        }
    },
    mkdir: async (dir) => {
        await mkdir(dir, { recursive: true });
    },
    copyFile: (source, dest, exclusive) => copyFile(source, dest, exclusive ? constants.COPYFILE_EXCL : 0),
    rename: (source, dest) => rename(source, dest),
    unlink: (target) => unlink(target),
};

function throwIfAborted(signal: AbortSignal): void {
    if (signal.aborted) {
        throw signal.reason instanceof Error
            ? signal.reason
            : new ActionFailedError('cancelled', 'Action was aborted.');
    }
}

/**
 * Copy, move and rename share one runner.
 *
 * A move first tries an atomic rename. If that fails (e.g. across devices) it
 * copies and then deletes the source; when only the delete fails the file
 * exists at both paths and the attempt is reported as failed.
 */
export class FileTransferRunner implements ActionRunner<TransferActionSpec> {
    readonly #fs: TransferFs;

    constructor(fs: TransferFs = nodeTransferFs) {
        this.#fs = fs;
    }

    /** Rename destinations are resolved against the source's directory. */
    resolveDestination(context: ActionContext, action: TransferActionSpec): string {
        const expanded = expandTemplate(action.dest, context);
        if (action.kind === 'rename' && context.relativePath !== '') {
            return path.join(path.dirname(context.path), expanded);
        }
        return expanded;
    }

    describe(context: ActionContext, action: TransferActionSpec): string {
        return `${action.kind} ${context.path} -> ${this.resolveDestination(context, action)}`;
    }

    async run(context: ActionContext, action: TransferActionSpec, signal: AbortSignal): Promise<void> {
        const dest = this.resolveDestination(context, action);
        if (!dest.trim()) {
            throw new ActionFailedError('empty_destination', `Destination '${action.dest}' expanded to nothing.`);
        }
        if (!action.overwrite && (await this.#fs.exists(dest))) {
            throw new ActionFailedError('destination_exists', `Destination exists: ${dest}`);
        }

        throwIfAborted(signal);
        await this.#fs.mkdir(path.dirname(dest));
        throwIfAborted(signal);

        if (action.kind === 'copy') {
            await this.#fs.copyFile(context.path, dest, !action.overwrite);
            return;
        }
        await this.#move(context.path, dest, action.overwrite, signal);
    }

    async #move(source: string, dest: string, overwrite: boolean, signal: AbortSignal): Promise<void> {
        try {
            await this.#fs.rename(source, dest);
            return;
        } catch (renameError) {
            throwIfAborted(signal);
            try {
                await this.#fs.copyFile(source, dest, !overwrite);
            } catch (copyError) {
                throw new ActionFailedError(
                    isDestinationConflict(copyError) ? 'destination_exists' : 'transfer_failed',
                    `Move ${source} -> ${dest} failed: rename (${errorMessage(renameError)}), copy (${errorMessage(copyError)}).`,
                    { cause: copyError },
                );
            }
        }

        try {
            await this.#fs.unlink(source);
        } catch (unlinkError) {
            throw new ActionFailedError(
                'move_fallback_partial',
                `Copied ${source} to ${dest} but could not remove the source; the file now exists at both paths: ${errorMessage(unlinkError)}`,
                { cause: unlinkError },
            );
        }
    }
}

function isDestinationConflict(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}
