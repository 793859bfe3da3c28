/**
 * Typesense Storage Backend
 *
 * Stores each key as a document of the `knowledge_objects` collection,
 * created on first use.
 */

import debug from 'debug';
import type { Client } from 'typesense';
import { StorageError } from '../errors';
import { uniqueIdFromString } from '../unique-id';
import { KNOWLEDGE_OBJECTS_COLLECTION, KnowledgeObjectDocument, keyDirectories, knowledgeObjectsSchema } from '../typesense/schema';
import type { StorageBackend, StorageWrite } from './types';

const log = debug('knowledge:storage:typesense');

/** Typesense max per_page */
const PAGE_SIZE = 250;

function httpStatus(error: unknown): number | null {
    if (error instanceof Error && 'httpStatus' in error && typeof error.httpStatus === 'number') {
        return error.httpStatus;
    }
    return null;
}

/**
 * Rate limits, server errors and network failures (no status) are transient
 */
function storageError(operation: string, key: string, error: unknown): StorageError {
    const status = httpStatus(error);
    const transient = status === null || status === 429 || status >= 500;
    return new StorageError(`typesense ${operation} failed for '${key}'`, transient, {
        cause: error,
        extra: { key, httpStatus: status },
    });
}

function escapeFilterValue(value: string): string {
    return `\`${value.replace(/`/g, '')}\``;
}

export class TypesenseBackend implements StorageBackend {
    readonly name = 'typesense';
    private ready: Promise<void> | null = null;

    constructor(
        private readonly client: Client,
        private readonly collection: string = KNOWLEDGE_OBJECTS_COLLECTION,
    ) {}

    private documentId(key: string): string {
        return uniqueIdFromString(key, 40, 'knowledge-storage');
    }

    /**
     * Get or create the collection
     */
    private ensureCollection(): Promise<void> {
        if (!this.ready) {
            this.ready = (async () => {
                try {
                    await this.client.collections(this.collection).retrieve();
                    log('Collection already exists', { collection: this.collection });
                } catch (error) {
                    if (httpStatus(error) !== 404) {
                        throw storageError('retrieve collection', this.collection, error);
                    }
                    log('Creating collection', { collection: this.collection });
                    await this.client.collections().create({ ...knowledgeObjectsSchema, name: this.collection });
                }
            })();
            this.ready.catch(() => {
                this.ready = null;
            });
        }
        return this.ready;
    }

    async get(key: string): Promise<string | null> {
        await this.ensureCollection();
        try {
            const document = await this.client.collections<KnowledgeObjectDocument>(this.collection).documents(this.documentId(key)).retrieve();
            return document.value;
        } catch (error) {
            if (httpStatus(error) === 404) return null;
            throw storageError('get', key, error);
        }
    }

    async put(key: string, value: string): Promise<void> {
        await this.ensureCollection();
        const document: KnowledgeObjectDocument = {
            id: this.documentId(key),
            key,
            dirs: keyDirectories(key),
            value,
            updated_at: Date.now(),
        };
        try {
            await this.client.collections<KnowledgeObjectDocument>(this.collection).documents().upsert(document);
        } catch (error) {
            throw storageError('put', key, error);
        }
    }

    async delete(key: string): Promise<void> {
        await this.ensureCollection();
        try {
            await this.client.collections<KnowledgeObjectDocument>(this.collection).documents(this.documentId(key)).delete();
        } catch (error) {
            if (httpStatus(error) === 404) return;
            throw storageError('delete', key, error);
        }
    }

    async list(prefix: string): Promise<string[]> {
        await this.ensureCollection();
        const lastSlash = prefix.lastIndexOf('/');
        const dir = lastSlash >= 0 ? prefix.slice(0, lastSlash) : '';

        const keys: string[] = [];
        let page = 1;
        let hasMore = true;
        while (hasMore) {
            let hits: { document: KnowledgeObjectDocument }[];
            try {
                const result = await this.client
                    .collections<KnowledgeObjectDocument>(this.collection)
                    .documents()
                    .search({
                        q: '*',
                        query_by: 'key',
                        ...(dir ? { filter_by: `dirs:=${escapeFilterValue(dir)}` } : {}),
                        include_fields: 'key',
                        per_page: PAGE_SIZE,
                        page,
                    });
                hits = result.hits ?? [];
            } catch (error) {
                throw storageError('list', prefix, error);
            }

            for (const hit of hits) {
                if (hit.document.key.startsWith(prefix)) {
                    keys.push(hit.document.key);
                }
            }
            hasMore = hits.length === PAGE_SIZE;
            page++;
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
        log('Committed', { collection: this.collection, writes: writes.length });
    }
}
