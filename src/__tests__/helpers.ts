/**
 * Shared test utilities: an in-memory connector and engine wiring
 */

import { DEFAULT_CONFIG, KnowledgeConfig } from '../config';
import { KnowledgeContext, KnowledgeContextOptions } from '../connectors/context';
import { ConnectorRegistry } from '../connectors/registry';
import type { Connector, Fragment, ObserveResult, ResolveResult } from '../connectors/types';
import { QueryEngine } from '../domain/query';
import { BadRequestError, UnavailableError } from '../errors';
import { IngestionPipeline } from '../pipelines';
import type { Bundle } from '../resources/bundles';
import type { AffordanceInfo, Locator, ResourceLabel } from '../resources/types';
import { KnowledgeStore } from '../storage/KnowledgeStore';
import { MemoryBackend } from '../storage/MemoryBackend';
import { KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import type { Reference } from '../uri/references';

export interface FakeDocument {
    name?: string;
    revision?: string;
    /** Markdown served as `$body` */
    body?: string;
    /** Document ids served as `$collection` */
    members?: string[];
    labels?: ResourceLabel[];
    expired?: string[];
    shouldCache?: boolean;
}

/**
 * Connector over a map of documents. URIs are `ndk://{realm}/docs/{id}`,
 * URLs `https://{realm}.test/docs/{id}`. Every call is recorded in `calls`.
 */
export class FakeConnector implements Connector {
    readonly documents = new Map<string, FakeDocument>();
    readonly calls: string[] = [];
    /** Document ids reported by the next `refresh` */
    changed: string[] = [];

    constructor(readonly realm = 'fake') {}

    add(id: string, document: FakeDocument): this {
        this.documents.set(id, document);
        return this;
    }

    uri(id: string): string {
        return `ndk://${this.realm}/docs/${id}`;
    }

    url(id: string): string {
        return `https://${this.realm}.test/docs/${id}`;
    }

    private documentId(locator: Locator): string {
        if (typeof locator.id !== 'string') {
            throw new BadRequestError('locator without id');
        }
        return locator.id;
    }

    private document(id: string): FakeDocument {
        const document = this.documents.get(id);
        if (!document) {
            throw new UnavailableError({ extra: { id } });
        }
        return document;
    }

    async locator(_context: KnowledgeContext, reference: Reference): Promise<Locator | null> {
        if (reference.kind === 'knowledge') {
            if (reference.uri.realm !== this.realm) return null;
            this.calls.push(`locator ${reference.uri.toString()}`);
            if (reference.uri.subrealm !== 'docs') {
                throw new UnavailableError();
            }
            return { realm: this.realm, kind: 'doc', id: reference.uri.path.join('/') };
        }

        const prefix = `https://${this.realm}.test/docs/`;
        if (!reference.url.startsWith(prefix)) return null;
        this.calls.push(`locator ${reference.url}`);
        return { realm: this.realm, kind: 'doc', id: reference.url.slice(prefix.length) };
    }

    resourceUri(locator: Locator): KnowledgeUri {
        return KnowledgeUri.resource(this.realm, 'docs', this.documentId(locator).split('/'));
    }

    async resolve(_context: KnowledgeContext, locator: Locator): Promise<ResolveResult> {
        const id = this.documentId(locator);
        this.calls.push(`resolve ${id}`);
        const document = this.document(id);

        const affordances: AffordanceInfo[] = [];
        if (document.body !== undefined) affordances.push({ suffix: '$body', mimeType: 'text/markdown' });
        if (document.members) affordances.push({ suffix: '$collection' });

        return {
            metadata: {
                name: document.name ?? id,
                revisionData: document.revision,
                citationUrl: this.url(id),
                aliases: [this.url(id)],
                affordances,
            },
            expired: document.expired ?? [],
            labels: document.labels,
            shouldCache: document.shouldCache ?? true,
        };
    }

    async observe(_context: KnowledgeContext, locator: Locator, observable: Observable): Promise<ObserveResult> {
        const id = this.documentId(locator);
        this.calls.push(`observe ${id} ${observable.toString()}`);
        const document = this.document(id);
        const shouldCache = document.shouldCache ?? true;

        if (observable.equals(Observable.body()) && document.body !== undefined) {
            const fragment: Fragment = { type: 'fragment', mimeType: 'text/markdown', text: document.body, blobs: {} };
            return { bundle: fragment, shouldCache, options: { relationsLink: true } };
        }
        if (observable.equals(Observable.collection()) && document.members) {
            const bundle: Bundle = {
                type: 'collection',
                uri: `${this.uri(id)}/$collection`,
                results: document.members.map((member) => this.uri(member)),
            };
            return { bundle, shouldCache, options: { relationsParent: true } };
        }
        throw BadRequestError.capability(observable.toString());
    }

    async refresh(): Promise<Locator[]> {
        this.calls.push('refresh');
        return this.changed.map((id) => ({ realm: this.realm, kind: 'doc', id }));
    }
}

export function createTestContext(overrides: Partial<KnowledgeConfig> = {}, options: KnowledgeContextOptions = {}): KnowledgeContext {
    return new KnowledgeContext({ ...DEFAULT_CONFIG, ...overrides }, options);
}

export interface TestEngine {
    backend: MemoryBackend;
    registry: ConnectorRegistry;
    store: KnowledgeStore;
    engine: QueryEngine;
}

export function createTestEngine(connectors: Connector[], pipeline = new IngestionPipeline()): TestEngine {
    const backend = new MemoryBackend();
    const registry = new ConnectorRegistry();
    registry.registerAll(connectors);
    const store = new KnowledgeStore(backend, 'test');
    return { backend, registry, store, engine: new QueryEngine(registry, store, pipeline) };
}
