/**
 * Locator resolution
 *
 * Maps references to locators (cached history, then alias, then connector
 * dispatch) and runs `Connector.resolve`. Both are memoized for the lifetime
 * of the request, failures included.
 */

import debug from 'debug';
import { RequestCache, type KnowledgeContext } from '../connectors/context';
import type { ConnectorRegistry } from '../connectors/registry';
import type { ResolveResult } from '../connectors/types';
import { StoppedError, UnavailableError } from '../errors';
import type { LinkResolver } from '../pipelines';
import { Relation, relationId, relationNodes } from '../resources/relations';
import type { Locator } from '../resources/types';
import type { KnowledgeStore } from '../storage/KnowledgeStore';
import { KnowledgeUri } from '../uri/KnowledgeUri';
import { parseReference, Reference, referenceToString } from '../uri/references';

const log = debug('knowledge:resolve');

export interface RelationPeer {
    readonly locator: Locator;
    readonly resourceUri: KnowledgeUri;
    readonly relationIds: readonly string[];
}

export interface ResolvedRelations {
    /** Relations whose every node is visible to the caller */
    readonly relations: readonly Relation[];
    /** Nodes other than the origin, sorted by URI */
    readonly peers: readonly RelationPeer[];
}

export class Resolver {
    private readonly locators = new RequestCache<Locator | null>('resolve:locators');
    private readonly resolves = new RequestCache<ResolveResult>('resolve:resolves');

    constructor(
        private readonly registry: ConnectorRegistry,
        private readonly store: KnowledgeStore,
    ) {}

    resourceUri(locator: Locator): KnowledgeUri {
        return this.registry.require(locator.realm).resourceUri(locator);
    }

    // ============================================================
    // LOCATORS
    // ============================================================

    /**
     * Locator for a reference, or null when no connector claims it or the
     * caller may not see it. Any other failure is rethrown with its kind.
     */
    tryInferLocator(context: KnowledgeContext, reference: Reference): Promise<Locator | null> {
        const key = referenceToString(reference);
        return this.locators.get(context, key, async () => {
            try {
                return await this.inferLocator(context, reference);
            } catch (error) {
                if (error instanceof UnavailableError) {
                    log('No locator', { reference: key });
                    return null;
                }
                throw error;
            }
        });
    }

    private async inferLocator(context: KnowledgeContext, reference: Reference): Promise<Locator> {
        const key = referenceToString(reference);

        let locator: Locator | null = null;
        let hasHistory = false;
        if (reference.kind === 'knowledge') {
            const history = await this.store.readHistory(context, reference.uri.resourceUri());
            if (history) {
                locator = history.merged().locator;
                hasHistory = true;
            }
        }
        if (!locator) {
            locator = await this.store.readAlias(context, key);
        }
        if (!locator) {
            locator = (await this.registry.locate(context, reference)).locator;
            if (reference.kind === 'external') {
                await this.store.saveAlias(context, key, locator);
            }
        }

        const resourceUri = this.resourceUri(locator);
        this.locators.set(context, resourceUri.toString(), locator);

        // An external URL for a resource never loaded: remember how to reach it,
        // so a later load of the Resource URI skips dispatch.
        if (!hasHistory && reference.kind === 'external' && !(await this.store.readHistory(context, resourceUri))) {
            await this.store.saveAlias(context, resourceUri.toString(), locator);
        }

        return locator;
    }

    /**
     * Locator known without asking any connector
     */
    async cachedLocator(context: KnowledgeContext, reference: Reference): Promise<Locator | null> {
        if (reference.kind === 'knowledge') {
            const history = await this.store.readHistory(context, reference.uri.resourceUri());
            if (history) {
                return history.merged().locator;
            }
        }
        return this.store.readAlias(context, referenceToString(reference));
    }

    // ============================================================
    // RESOLVE
    // ============================================================

    resolveLocator(context: KnowledgeContext, locator: Locator): Promise<ResolveResult> {
        const resourceUri = this.resourceUri(locator);
        return this.resolves.get(context, resourceUri.toString(), async () => {
            const connector = this.registry.require(locator.realm);
            const history = await this.store.readHistory(context, resourceUri);
            const result = await context.run(connector.realm, 'resolve', () => connector.resolve(context, locator, history ? history.merged() : null));
            log('Resolved', { uri: resourceUri.toString(), expired: result.expired, shouldCache: result.shouldCache });
            return result;
        });
    }

    async tryResolveLocator(context: KnowledgeContext, locator: Locator): Promise<ResolveResult | null> {
        try {
            return await this.resolveLocator(context, locator);
        } catch (error) {
            if (error instanceof StoppedError) {
                throw error;
            }
            return null;
        }
    }

    /**
     * Locators of the references the caller may access, keyed by reference.
     * With `cacheOnly`, no connector is called and every known locator counts.
     */
    async tryInferAndResolveLocators(
        context: KnowledgeContext,
        references: readonly Reference[],
        cacheOnly = false,
    ): Promise<Map<string, Locator>> {
        const unique = new Map<string, Reference>();
        for (const reference of references) {
            unique.set(referenceToString(reference), reference);
        }
        const keys = [...unique.keys()].sort();
        const batchSize = context.config.batchSizeResolve;

        const result = new Map<string, Locator>();
        for (let start = 0; start < keys.length; start += batchSize) {
            const batch = keys.slice(start, start + batchSize);
            const locators = await Promise.all(
                batch.map(async (key) => {
                    const reference = unique.get(key);
                    if (!reference) return null;
                    if (cacheOnly) {
                        return this.cachedLocator(context, reference);
                    }
                    const locator = await this.tryInferLocator(context, reference).catch((error: unknown) => {
                        if (error instanceof StoppedError) throw error;
                        log('Failed to infer locator', { reference: key, error: error instanceof Error ? error.message : String(error) });
                        return null;
                    });
                    return locator && (await this.tryResolveLocator(context, locator)) ? locator : null;
                }),
            );
            batch.forEach((key, index) => {
                const locator = locators[index];
                if (locator) result.set(key, locator);
            });
        }
        return result;
    }

    /**
     * Keep the relations whose nodes are all accessible, and group the nodes
     * other than `origin` with the relations leading to them.
     */
    async tryResolveRelations(
        context: KnowledgeContext,
        origin: KnowledgeUri,
        relations: readonly Relation[],
        cacheOnly = false,
    ): Promise<ResolvedRelations> {
        const nodes = relations.flatMap((relation) => relationNodes(relation));
        const locators = await this.tryInferAndResolveLocators(
            context,
            nodes.map((uri): Reference => ({ kind: 'knowledge', uri })),
            cacheOnly,
        );

        const valid = relations.filter((relation) => relationNodes(relation).every((node) => locators.has(node.toString())));
        const originKey = origin.resourceUri().toString();

        const peers = new Map<string, { locator: Locator; resourceUri: KnowledgeUri; relationIds: string[] }>();
        for (const relation of valid) {
            for (const node of relationNodes(relation)) {
                const nodeKey = node.toString();
                const locator = locators.get(nodeKey);
                if (nodeKey === originKey || !locator) continue;
                const existing = peers.get(nodeKey);
                if (existing) {
                    existing.relationIds.push(relationId(relation));
                } else {
                    peers.set(nodeKey, { locator, resourceUri: node, relationIds: [relationId(relation)] });
                }
            }
        }

        return {
            relations: valid,
            peers: [...peers.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, peer]) => peer),
        };
    }

    // ============================================================
    // LINKS
    // ============================================================

    /**
     * Link resolver for the ingestion pipeline: external URLs that some
     * connector claims and the caller may access.
     */
    linkResolver(context: KnowledgeContext): LinkResolver {
        return async (urls) => {
            const references: Reference[] = [];
            for (const url of urls) {
                const reference = parseReference(url);
                if (reference?.kind === 'external') references.push(reference);
            }

            const locators = await this.tryInferAndResolveLocators(context, references);
            const resolved = new Map<string, KnowledgeUri>();
            for (const url of urls) {
                const reference = parseReference(url);
                const locator = reference ? locators.get(referenceToString(reference)) : undefined;
                if (locator) resolved.set(url, this.resourceUri(locator));
            }
            return resolved;
        };
    }
}
