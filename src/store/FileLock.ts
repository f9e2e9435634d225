import { randomUUID } from 'node:crypto';
import { link, mkdir, open, readFile, rename, rm, stat } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { dirname } from 'node:path';

import { createLogger } from '../utils/Logger.ts';

import type { Logger } from 'pino';

export interface FileLockOptions {
    timeoutMs: number;
    staleMs: number;
    pollMs?: number;
}

export class LockTimeoutError extends Error {
    constructor(lockPath: string, timeoutMs: number) {
        super(`Could not acquire lock ${lockPath} within ${timeoutMs} ms`);
        this.name = 'LockTimeoutError';
    }
}

function hasCode(err: unknown, code: string): boolean {
    return err instanceof Error && 'code' in err && err.code === code;
}

async function readContent(filePath: string): Promise<string | null> {
    try {
        return await readFile(filePath, 'utf-8');
    } catch (err) {
        if (hasCode(err, 'ENOENT')) return null;
        throw err;
    }
}

/**
 * Advisory cross-process lock: an exclusively created lock file carrying a
 * per-holder token. Lock files older than `staleMs` are treated as left
 * behind by a crashed run and broken by renaming them aside.
 */
export class FileLock {
    readonly path: string;
    private options: Required<FileLockOptions>;
    private logger: Logger;
    private token: string | null = null;

    constructor(lockPath: string, options: FileLockOptions) {
        this.path = lockPath;
        this.options = { pollMs: 100, ...options };
        this.logger = createLogger('FileLock');
    }

    async acquire(): Promise<void> {
        await mkdir(dirname(this.path), { recursive: true });
        const started = Date.now();

        while (true) {
            if (await this.tryCreate()) return;
            if (await this.breakIfStale()) continue;

            if (Date.now() - started >= this.options.timeoutMs) {
                throw new LockTimeoutError(this.path, this.options.timeoutMs);
            }
            await delay(this.options.pollMs);
        }
    }

    /**
     * Removes the lock file only while it still carries this holder's token.
     */
    async release(): Promise<void> {
        const token = this.token;
        if (token === null) return;
        this.token = null;

        const content = await readContent(this.path);
        if (content === null || !content.includes(token)) {
            this.logger.warn({ lock: this.path }, 'Lock was taken over by another holder; leaving it in place');
            return;
        }
        await rm(this.path, { force: true });
    }

    async withLock<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            await this.release();
        }
    }

    private async tryCreate(): Promise<boolean> {
        const token = `${process.pid}-${randomUUID()}`;
        const handle = await open(this.path, 'wx').catch((err: unknown) => {
            if (hasCode(err, 'EEXIST')) return null;
            throw err;
        });
        if (!handle) return false;
        try {
            await handle.writeFile(JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString(), token }));
        } finally {
            await handle.close();
        }
        this.token = token;
        return true;
    }

    /**
     * Only the waiter whose rename succeeds breaks the lock. A rename that
     * moved a lock created after our check is undone.
     */
    private async breakIfStale(): Promise<boolean> {
        const observed = await readContent(this.path);
        if (observed === null) return true;

        try {
            const info = await stat(this.path);
            if (Date.now() - info.mtimeMs <= this.options.staleMs) return false;
        } catch (err) {
            if (hasCode(err, 'ENOENT')) return true;
            throw err;
        }

        const tombstone = `${this.path}.stale-${randomUUID()}`;
        try {
            await rename(this.path, tombstone);
        } catch (err) {
            // another waiter broke it first
            if (hasCode(err, 'ENOENT')) return true;
            throw err;
        }

        const moved = await readContent(tombstone);
        if (moved !== observed) {
            try {
                await link(tombstone, this.path);
            } catch (err) {
                if (!hasCode(err, 'EEXIST')) throw err;
            } finally {
                await rm(tombstone, { force: true });
            }
            return false;
        }

        this.logger.warn({ lock: this.path }, 'Removing stale lock file');
        await rm(tombstone, { force: true });
        return true;
    }
}
