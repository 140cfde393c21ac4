import type { BigIntStats } from 'node:fs';
import { lstat, readdir } from 'node:fs/promises';
import path from 'node:path';
import type { FileRecord, Snapshot } from '../types/watch.js';
import { SnapshotScanError } from '../utils/errors.js';

/** Filesystem calls the builder depends on; replaced in tests to simulate read failures. */
export interface SnapshotFs {
    readdir: (dir: string) => Promise<string[]>;
    lstat: (target: string) => Promise<BigIntStats>;
}

function lstatBigint(target: string): Promise<BigIntStats> {
    return lstat(target, { bigint: true });
}

const defaultFs: SnapshotFs = {
    readdir: (dir) => readdir(dir),
    lstat: lstatBigint,
};

/**
 * Walks one watch root and records every entry below it.
 *
 * Entries are visited depth-first in lexicographic order, so two walks of an
 * unchanged tree yield maps with identical iteration order. Hidden paths are
 * recorded like any other; filtering them is the matcher's job.
 */
export class SnapshotBuilder {
    readonly #fs: SnapshotFs;

    constructor(fs: SnapshotFs = defaultFs) {
        this.#fs = fs;
    }

    /**
     * Build a snapshot of `root`. With `recursive` false only direct children
     * are recorded. Any read error aborts the whole walk with a
     * {@link SnapshotScanError}; no partial snapshot is returned.
     */
    async build(root: string, recursive: boolean): Promise<Snapshot> {
        const records = new Map<string, FileRecord>();
        await this.#walk(root, root, recursive, records);
        return records;
    }

    async #walk(root: string, dir: string, recursive: boolean, out: Map<string, FileRecord>): Promise<void> {
        let names: string[];
        try {
            names = await this.#fs.readdir(dir);
        } catch (err) {
            throw new SnapshotScanError(root, dir, err);
        }
        names.sort();

        for (const name of names) {
            const entryPath = path.join(dir, name);
            let record: FileRecord;
            try {
                const info = await this.#fs.lstat(entryPath);
                record = {
                    path: entryPath,
                    size: Number(info.size),
                    mtimeMs: Number(info.mtimeMs),
                    mtimeNs: info.mtimeNs,
                    mode: Number(info.mode),
                    isDirectory: info.isDirectory(),
                };
            } catch (err) {
                throw new SnapshotScanError(root, entryPath, err);
            }
            out.set(entryPath, record);

            if (record.isDirectory && recursive) {
                await this.#walk(root, entryPath, recursive, out);
            }
        }
    }
}
