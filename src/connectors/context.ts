/**
 * Request-scoped context handed to every connector call.
 *
 * Holds the caller's credentials, the cancellation signal and the per-realm
 * concurrency limiters. One context lives exactly as long as one query,
 * and so does everything a RequestCache keeps for it.
 */

import debug from 'debug';
import pLimit, { type LimitFunction } from 'p-limit';
import type { KnowledgeConfig } from '../config';
import { throwIfAborted, UnavailableError } from '../errors';

const log = debug('knowledge:context');

export interface Authorization {
    /** Value for the `Authorization` header */
    readonly authorization: string;
    /** True when the credentials come from the environment rather than the caller */
    readonly isPublic: boolean;
}

export interface KnowledgeContextOptions {
    /** Realm -> basic header ("Basic ...") or bearer token supplied by the caller */
    credentials?: Record<string, string>;
    signal?: AbortSignal;
}

export class KnowledgeContext {
    readonly credentials: Readonly<Record<string, string>>;
    readonly signal: AbortSignal | undefined;
    private readonly limiters = new Map<string, LimitFunction>();

    constructor(
        readonly config: KnowledgeConfig,
        options: KnowledgeContextOptions = {},
    ) {
        this.credentials = { ...(options.credentials ?? {}) };
        this.signal = options.signal;
    }

    // ============================================================
    // CREDENTIALS
    // ============================================================

    /**
     * Caller credentials for the realm, else the public username/password
     * variables from the environment. Throws UnavailableError without either.
     */
    basicAuthorization(realm: string, publicUserVar: string | null, publicPassVar: string | null): Authorization {
        const authorization = this.getBasicAuthorization(realm, publicUserVar, publicPassVar);
        if (!authorization) {
            throw new UnavailableError({ extra: { realm } });
        }
        return authorization;
    }

    bearerAuthorization(realm: string, publicTokenVar: string | null): Authorization {
        const authorization = this.getBearerAuthorization(realm, publicTokenVar);
        if (!authorization) {
            throw new UnavailableError({ extra: { realm } });
        }
        return authorization;
    }

    getBasicAuthorization(realm: string, publicUserVar: string | null, publicPassVar: string | null): Authorization | null {
        const basicHeader = this.credentials[realm];
        if (basicHeader) {
            return { authorization: basicHeader, isPublic: false };
        }
        const username = this.publicValue(publicUserVar);
        const password = this.publicValue(publicPassVar);
        if (username && password) {
            const encoded = Buffer.from(`${username}:${password}`).toString('base64');
            return { authorization: `Basic ${encoded}`, isPublic: true };
        }
        return null;
    }

    getBearerAuthorization(realm: string, publicTokenVar: string | null): Authorization | null {
        const privateToken = this.credentials[realm];
        if (privateToken) {
            return { authorization: `Bearer ${privateToken}`, isPublic: false };
        }
        const publicToken = this.publicValue(publicTokenVar);
        if (publicToken) {
            return { authorization: `Bearer ${publicToken}`, isPublic: true };
        }
        return null;
    }

    private publicValue(variable: string | null): string | null {
        return variable ? this.config.publicEnv[variable] || null : null;
    }

    // ============================================================
    // EXECUTION
    // ============================================================

    /**
     * Throws StoppedError once the request was cancelled
     */
    checkAborted(): void {
        throwIfAborted(this.signal);
    }

    /**
     * Run a connector call under the realm's concurrency limit
     */
    async run<T>(realm: string, label: string, call: () => Promise<T>): Promise<T> {
        let limiter = this.limiters.get(realm);
        if (!limiter) {
            limiter = pLimit(this.config.connectorConcurrency);
            this.limiters.set(realm, limiter);
        }

        return limiter(async () => {
            this.checkAborted();
            const startTime = Date.now();
            try {
                return await call();
            } finally {
                log('Connector call', { realm, label, durationMs: Date.now() - startTime });
            }
        });
    }
}

/**
 * Sub-fetch results shared for the rest of a request, e.g. a parent record
 * several resources point at. Errors are shared too. Entries are keyed by
 * context, so nothing outlives the request.
 *
 * ```typescript
 * const parents = new RequestCache<Issue>('tracker:parent');
 * const parent = await parents.get(context, key, () => fetchIssue(key));
 * ```
 */
export class RequestCache<T> {
    private readonly entries = new WeakMap<KnowledgeContext, Map<string, Promise<T>>>();

    constructor(readonly name: string) {}

    private entriesFor(context: KnowledgeContext): Map<string, Promise<T>> {
        let entries = this.entries.get(context);
        if (!entries) {
            entries = new Map();
            this.entries.set(context, entries);
        }
        return entries;
    }

    get(context: KnowledgeContext, key: string, fetch: () => Promise<T>): Promise<T> {
        const entries = this.entriesFor(context);
        const existing = entries.get(key);
        if (existing) {
            return existing;
        }
        const promise = fetch();
        entries.set(key, promise);
        return promise;
    }

    /**
     * Replace an entry, e.g. after writing the value it caches
     */
    set(context: KnowledgeContext, key: string, value: T): void {
        this.entriesFor(context).set(key, Promise.resolve(value));
    }

    forget(context: KnowledgeContext, key: string): void {
        this.entries.get(context)?.delete(key);
    }

    has(context: KnowledgeContext, key: string): boolean {
        return this.entries.get(context)?.has(key) ?? false;
    }
}
