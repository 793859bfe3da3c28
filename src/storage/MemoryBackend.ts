/**
 * In-memory storage, for tests and ephemeral deployments
 */

import debug from 'debug';
import type { StorageBackend, StorageWrite } from './types';

const log = debug('knowledge:store');

export class MemoryBackend implements StorageBackend {
    readonly name = 'memory';
    private readonly entries = new Map<string, string>();

    async get(key: string): Promise<string | null> {
        return this.entries.get(key) ?? null;
    }

    async put(key: string, value: string): Promise<void> {
        this.entries.set(key, value);
    }

    async delete(key: string): Promise<void> {
        this.entries.delete(key);
    }

    async list(prefix: string): Promise<string[]> {
        return Array.from(this.entries.keys())
            .filter((key) => key.startsWith(prefix))
            .sort();
    }

    async commit(writes: readonly StorageWrite[]): Promise<void> {
        for (const write of writes) {
            if (write.op === 'put') {
                this.entries.set(write.key, write.value);
            } else {
                this.entries.delete(write.key);
            }
        }
    }

    /**
     * Remove everything
     */
    clearAll(): number {
        const count = this.entries.size;
        this.entries.clear();
        if (count > 0) {
            log('Cleared all', { count });
        }
        return count;
    }

    get size(): number {
        return this.entries.size;
    }
}
