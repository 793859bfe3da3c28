/**
 * File Storage Backend
 *
 * One file per key under a root directory. Files are written to a temporary
 * path and renamed into place, so readers never see a half-written record.
 */

import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import debug from 'debug';
import { StorageError } from '../errors';
import type { StorageBackend, StorageWrite } from './types';

const log = debug('knowledge:storage:file');

const TEMP_SUFFIX = '.tmp';
const TRANSIENT_CODES = new Set(['EAGAIN', 'EBUSY', 'EMFILE', 'ENFILE', 'ETIMEDOUT']);

function errorCode(error: unknown): string | null {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}

function storageError(operation: string, key: string, error: unknown): StorageError {
    const code = errorCode(error);
    return new StorageError(`${operation} failed for '${key}'`, code !== null && TRANSIENT_CODES.has(code), {
        cause: error,
        extra: { key, code },
    });
}

export class FileBackend implements StorageBackend {
    readonly name = 'file';

    constructor(private readonly rootDir: string) {}

    /**
     * Keys use "/" separators and never contain ".." segments
     */
    private resolvePath(key: string): string {
        const segments = key.split('/');
        if (segments.some((segment) => segment === '' || segment === '.' || segment === '..')) {
            throw new StorageError(`invalid key '${key}'`, false);
        }
        return path.join(this.rootDir, ...segments);
    }

    async get(key: string): Promise<string | null> {
        try {
            return await fs.readFile(this.resolvePath(key), 'utf-8');
        } catch (error) {
            if (errorCode(error) === 'ENOENT') return null;
            throw storageError('get', key, error);
        }
    }

    async put(key: string, value: string): Promise<void> {
        const filePath = this.resolvePath(key);
        const tempPath = `${filePath}.${crypto.randomBytes(6).toString('hex')}${TEMP_SUFFIX}`;
        try {
            await fs.mkdir(path.dirname(filePath), { recursive: true });
            await fs.writeFile(tempPath, value, 'utf-8');
            await fs.rename(tempPath, filePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true });
            throw storageError('put', key, error);
        }
    }

    async delete(key: string): Promise<void> {
        try {
            await fs.rm(this.resolvePath(key), { force: true });
        } catch (error) {
            throw storageError('delete', key, error);
        }
    }

    async list(prefix: string): Promise<string[]> {
        // List the deepest directory the prefix names, then filter.
        const lastSlash = prefix.lastIndexOf('/');
        const dirKey = lastSlash >= 0 ? prefix.slice(0, lastSlash) : '';
        const dirPath = dirKey ? this.resolvePath(dirKey) : this.rootDir;

        let entries: string[];
        try {
            entries = await fs.readdir(dirPath, { recursive: true });
        } catch (error) {
            if (errorCode(error) === 'ENOENT') return [];
            throw storageError('list', prefix, error);
        }

        const keys: string[] = [];
        for (const entry of entries) {
            if (entry.endsWith(TEMP_SUFFIX)) continue;
            const key = [dirKey, ...entry.split(path.sep)].filter(Boolean).join('/');
            if (!key.startsWith(prefix)) continue;
            const stat = await fs.stat(path.join(dirPath, entry));
            if (stat.isFile()) keys.push(key);
        }
        return keys.sort();
    }

    async commit(writes: readonly StorageWrite[]): Promise<void> {
        for (const write of writes) {
            if (write.op === 'put') {
                await this.put(write.key, write.value);
            } else {
                await this.delete(write.key);
            }
        }
        log('Committed', { root: this.rootDir, writes: writes.length });
    }
}
