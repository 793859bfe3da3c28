/**
 * Query engine
 *
 * Executes a batch of actions: attachments are written first, then resources
 * are read in batches (resolve, decide what the cache can answer, observe the
 * rest, ingest, commit) until no pending read is left. Relations and
 * dependencies found along the way add more pending reads.
 *
 * Errors are collected per resource and per observation; only cancellation
 * aborts the whole query.
 */

import debug from 'debug';
import type { KnowledgeContext } from '../connectors/context';
import type { ConnectorRegistry } from '../connectors/registry';
import { isFragment, ObserveResult } from '../connectors/types';
import { BadRequestError, KnowledgeError, StoppedError, UnavailableError } from '../errors';
import type { IngestedResult, IngestionPipeline } from '../pipelines';
import { Bundle, bundleAffordance, bundleInfo, bundleReferences, ObservationError, observationError } from '../resources/bundles';
import { makeResourceDelta, MetadataDelta, ResourceHistory, ResourceView, withUpdate } from '../resources/metadata';
import { relationId } from '../resources/relations';
import type { ResourceLabel } from '../resources/types';
import type { KnowledgeStore } from '../storage/KnowledgeStore';
import { KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import { parseReference, Reference, referenceToString } from '../uri/references';
import type { AttachmentAction, QueryAction, QueryResponse } from './actions';
import { decideCache, LoadMode } from './cache-decision';
import { PendingResult, PendingState } from './pending';
import { Resolver } from './resolve';

const log = debug('knowledge:query');

const AUTO_REFRESH: readonly Observable[] = [Observable.body(), Observable.collection()];

interface ReadResult {
    /** History before this read */
    readonly history: ResourceHistory | null;
    /** Nothing was refreshed, so nothing needs saving */
    readonly fromCache: boolean;
    readonly metadata: MetadataDelta;
    readonly expired: readonly string[];
    readonly labels: readonly ResourceLabel[];
    readonly observed: readonly IngestedResult[];
    readonly cachedBundles: readonly Bundle[];
    readonly errors: readonly ObservationError[];
    readonly shouldCache: boolean;
}

interface ObservationPlan {
    readonly cachedBundles: Bundle[];
    readonly observe: Observable[];
    readonly errors: ObservationError[];
}

function byString<T extends { toString(): string }>(a: T, b: T): number {
    const aKey = a.toString();
    const bKey = b.toString();
    return aKey < bKey ? -1 : aKey > bKey ? 1 : 0;
}

function uniqueAffordances(observables: readonly Observable[]): Observable[] {
    const affordances = new Map<string, Observable>();
    for (const observable of observables) {
        const affordance = observable.affordance();
        affordances.set(affordance.toString(), affordance);
    }
    return [...affordances.values()].sort(byString);
}

function errorInfo(error: unknown) {
    return KnowledgeError.from(error).toInfo();
}

export class QueryEngine {
    readonly resolver: Resolver;

    constructor(
        private readonly registry: ConnectorRegistry,
        private readonly store: KnowledgeStore,
        private readonly pipeline: IngestionPipeline,
        resolver?: Resolver,
    ) {
        this.resolver = resolver ?? new Resolver(registry, store);
    }

    async execute(context: KnowledgeContext, actions: readonly QueryAction[]): Promise<QueryResponse> {
        const startTime = Date.now();
        const state = new PendingState();

        const attachments = await this.convertActions(context, state, actions);
        for (const { action, pending } of attachments) {
            await this.executeAttachment(context, state, pending, action);
        }

        let batches = 0;
        for (;;) {
            context.checkAborted();
            const batch = state.nextBatch(context.config.batchSizeQuery);
            if (batch.length === 0) {
                break;
            }
            const batchStart = Date.now();
            await this.executeReads(context, state, batch);
            batches++;
            log('Read batch', { size: batch.length, uris: batch.map((pending) => pending.resourceUri.toString()), durationMs: Date.now() - batchStart });
        }

        const response = state.toResponse();
        log('Query complete', {
            actions: actions.length,
            batches,
            resources: response.resources.length,
            observations: response.observations.length,
            durationMs: Date.now() - startTime,
        });
        return response;
    }

    // ============================================================
    // ACTIONS
    // ============================================================

    private async convertActions(
        context: KnowledgeContext,
        state: PendingState,
        actions: readonly QueryAction[],
    ): Promise<{ action: AttachmentAction; pending: PendingResult }[]> {
        const attachments: { action: AttachmentAction; pending: PendingResult }[] = [];

        for (const action of actions) {
            try {
                const { reference, observe, loadMode } = this.parseAction(action);
                const locator =
                    loadMode === 'none' && action.method !== 'resources/attachment'
                        ? await this.resolver.cachedLocator(context, reference)
                        : await this.resolver.tryInferLocator(context, reference);
                if (!locator) {
                    state.addRequestError(action.uri, new UnavailableError({ extra: { uri: action.uri } }).toInfo());
                    continue;
                }

                const pending = state.result(locator, this.resolver.resourceUri(locator));
                const reason = { kind: 'action', reference: referenceToString(reference), external: reference.kind === 'external' } as const;
                switch (action.method) {
                    case 'resources/load':
                        pending.update({
                            reason,
                            expandDepth: action.expand_depth,
                            expandMode: action.expand_mode,
                            loadMode: action.load_mode,
                            observe,
                        });
                        break;
                    case 'resources/observe':
                        pending.update({ reason, loadMode: action.load_mode, observe });
                        break;
                    case 'resources/attachment':
                        pending.update({ reason });
                        attachments.push({ action, pending });
                        break;
                    default: {
                        const exhaustive: never = action;
                        throw new Error(`Unknown action: ${JSON.stringify(exhaustive)}`);
                    }
                }
            } catch (error) {
                if (error instanceof StoppedError) throw error;
                state.addRequestError(action.uri, errorInfo(error));
            }
        }

        return attachments;
    }

    /**
     * Reference of the resource an action targets, and the observables it asks for
     */
    private parseAction(action: QueryAction): { reference: Reference; observe: Observable[]; loadMode: LoadMode } {
        if (action.method === 'resources/observe') {
            const uri = KnowledgeUri.parse(action.uri);
            if (!uri.suffix) {
                throw new BadRequestError(`expected an affordance or observable URI: ${action.uri}`);
            }
            return { reference: { kind: 'knowledge', uri: uri.resourceUri() }, observe: [uri.suffix], loadMode: action.load_mode };
        }

        const reference = parseReference(action.uri);
        if (!reference) {
            throw new BadRequestError(`invalid URI: ${action.uri}`);
        }
        const resource: Reference = reference.kind === 'knowledge' ? { kind: 'knowledge', uri: reference.uri.resourceUri() } : reference;
        if (action.method === 'resources/attachment') {
            return { reference: resource, observe: [], loadMode: 'auto' };
        }
        return { reference: resource, observe: action.observe.map((suffix) => Observable.parse(suffix)), loadMode: action.load_mode };
    }

    // ============================================================
    // WRITE
    // ============================================================

    /**
     * Store an uploaded `$file` or `$plain` bundle; it answers requests for
     * that affordance whenever the connector cannot.
     */
    private async executeAttachment(context: KnowledgeContext, state: PendingState, pending: PendingResult, action: AttachmentAction): Promise<void> {
        const uri = pending.resourceUri;
        try {
            const bundle: Bundle =
                action.data.type === 'file'
                    ? {
                          type: 'file',
                          uri: uri.child(Observable.file()).toString(),
                          description: action.description,
                          mimeType: action.mime_type ?? 'application/octet-stream',
                          downloadUrl: action.data.download_url,
                          expiry: action.data.expiry,
                          size: null,
                      }
                    : {
                          type: 'plain',
                          uri: uri.child(Observable.plain()).toString(),
                          mimeType: action.mime_type ?? 'text/plain',
                          text: action.data.text,
                      };

            const existing = await this.store.readHistory(context, uri);
            const history = new ResourceHistory(existing?.history ?? []);
            const changed = history.update(
                makeResourceDelta({
                    refreshedAt: new Date().toISOString(),
                    locator: pending.locator,
                    metadata: existing ? {} : { name: action.name, mimeType: action.mime_type ?? undefined, description: action.description ?? undefined },
                    observed: [{ suffix: bundleAffordance(bundle).toString(), ...bundleInfo(bundle) }],
                }),
            );

            await this.store.commitResolution(context, {
                uri,
                history: changed ? history : undefined,
                bundles: [bundle],
                aliasesRemoved: existing ? [] : [uri.toString()],
            });
            log('Saved attachment', { uri: uri.toString(), type: bundle.type, name: action.name });
        } catch (error) {
            if (error instanceof StoppedError) throw error;
            state.addError(pending, errorInfo(error));
        }
    }

    // ============================================================
    // READ
    // ============================================================

    private async executeReads(context: KnowledgeContext, state: PendingState, batch: readonly PendingResult[]): Promise<void> {
        const refreshedAt = new Date().toISOString();
        const outcomes = await Promise.all(
            batch.map(async (pending) => {
                try {
                    return { pending, result: await this.executeRead(context, pending) };
                } catch (error) {
                    if (error instanceof StoppedError) throw error;
                    log('Failed to read resource', { uri: pending.resourceUri.toString(), error: error instanceof Error ? error.message : String(error) });
                    return { pending, error };
                }
            }),
        );

        for (const outcome of outcomes) {
            const { pending } = outcome;
            if ('error' in outcome) {
                state.addError(pending, errorInfo(outcome.error));
            } else if (outcome.result === null) {
                pending.skipped = true;
            } else {
                try {
                    await this.handleResult(context, state, pending, refreshedAt, outcome.result);
                } catch (error) {
                    if (error instanceof StoppedError) throw error;
                    state.addError(pending, errorInfo(error));
                }
            }
        }
    }

    /**
     * Read one resource. Null when a resource reached only through the graph
     * is not cached and may not be fetched.
     */
    private async executeRead(context: KnowledgeContext, pending: PendingResult): Promise<ReadResult | null> {
        const { locator, resourceUri, loadMode } = pending;
        const observe = pending.missingObserve() ?? [];
        const history = await this.store.readHistory(context, resourceUri);
        const cached = history ? history.merged() : null;

        if (loadMode === 'none') {
            if (!cached) {
                if (!pending.isRequested()) return null;
                throw new UnavailableError({ extra: { uri: resourceUri.toString() } });
            }
            const expired = new Set(cached.expired);
            const plan = await this.planObservations(context, resourceUri, 'none', observe, cached, cached.metadata, expired);
            return {
                history,
                fromCache: true,
                metadata: cached.metadata,
                expired: cached.expired,
                labels: [],
                observed: [],
                cachedBundles: plan.cachedBundles,
                errors: plan.errors,
                shouldCache: false,
            };
        }

        const resolved = await this.resolver.resolveLocator(context, locator);
        const decision = decideCache(loadMode, cached, resolved.metadata);
        const metadata = cached ? withUpdate(cached.metadata, resolved.metadata) : resolved.metadata;
        const expired = new Set([...(cached?.expired ?? []), ...resolved.expired, ...decision.expired]);
        log('Cache decision', { uri: resourceUri.toString(), loadMode, state: decision.state, expired: [...expired].sort() });

        const plan = await this.planObservations(context, resourceUri, loadMode, observe, cached, metadata, expired);
        const observed = await this.observeAll(context, pending, plan.observe, metadata);
        const errors = [...plan.errors, ...observed.errors];

        const linkResolver = this.resolver.linkResolver(context);
        let merged = metadata;
        const ingested: IngestedResult[] = [];
        for (const result of observed.results) {
            const affordance = isFragment(result.bundle) ? Observable.body() : bundleAffordance(result.bundle);
            const startTime = Date.now();
            try {
                const item = await this.pipeline.ingest(resourceUri, result, linkResolver);
                merged = withUpdate(merged, item.metadata);
                ingested.push(item);
                expired.delete(affordance.toString());
            } catch (error) {
                if (error instanceof StoppedError) throw error;
                errors.push(observationError(resourceUri.child(affordance).toString(), errorInfo(error)));
            } finally {
                log('Ingestion', { uri: resourceUri.toString(), suffix: affordance.toString(), durationMs: Date.now() - startTime });
            }
        }

        return {
            history,
            fromCache: false,
            metadata: merged,
            expired: [...expired].sort(),
            labels: resolved.labels ?? [],
            observed: ingested.sort((a, b) => byString(a.bundle.uri, b.bundle.uri)),
            cachedBundles: plan.cachedBundles,
            errors,
            shouldCache: resolved.shouldCache,
        };
    }

    /**
     * Split the requested affordances between the cache and the connector.
     * A cached bundle the connector cannot refresh (an attachment) is served
     * even when stale.
     */
    private async planObservations(
        context: KnowledgeContext,
        resourceUri: KnowledgeUri,
        loadMode: LoadMode,
        observe: readonly Observable[],
        cached: ResourceView | null,
        metadata: MetadataDelta,
        expired: ReadonlySet<string>,
    ): Promise<ObservationPlan> {
        const supported = new Set((metadata.affordances ?? []).map((info) => info.suffix));
        const observedBefore = new Set((cached?.observed ?? []).map((obs) => Observable.parse(obs.suffix).affordance().toString()));
        const plan: ObservationPlan = { cachedBundles: [], observe: [], errors: [] };
        const toObserve = new Map<string, Observable>();

        for (const affordance of uniqueAffordances(observe)) {
            const suffix = affordance.toString();
            const canRefresh = loadMode !== 'none' && supported.has(suffix);

            const trustCache = loadMode === 'none' || (loadMode === 'auto' && !expired.has(suffix)) || !canRefresh;
            const bundle = trustCache ? await this.store.readBundle(context, resourceUri, affordance) : null;
            if (bundle) {
                plan.cachedBundles.push(bundle);
            } else if (canRefresh) {
                toObserve.set(suffix, affordance);
            } else {
                const error = loadMode === 'none' ? new UnavailableError({ extra: { uri: resourceUri.child(affordance).toString() } }) : BadRequestError.capability(suffix);
                plan.errors.push(observationError(resourceUri.child(affordance).toString(), error.toInfo()));
            }
        }

        // Keep descriptions and link/parent relations current, even when not requested.
        if (loadMode !== 'none') {
            for (const affordance of AUTO_REFRESH) {
                const suffix = affordance.toString();
                if (supported.has(suffix) && (expired.has(suffix) || !observedBefore.has(suffix)) && !plan.cachedBundles.some((bundle) => bundleAffordance(bundle).equals(affordance))) {
                    toObserve.set(suffix, affordance);
                }
            }
        }

        plan.observe.push(...[...toObserve.values()].sort(byString));
        return plan;
    }

    private async observeAll(
        context: KnowledgeContext,
        pending: PendingResult,
        observe: readonly Observable[],
        metadata: MetadataDelta,
    ): Promise<{ results: ObserveResult[]; errors: ObservationError[] }> {
        const connector = this.registry.require(pending.locator.realm);
        const results: ObserveResult[] = [];
        const errors: ObservationError[] = [];

        for (const observable of observe) {
            try {
                results.push(await context.run(connector.realm, 'observe', () => connector.observe(context, pending.locator, observable, metadata)));
            } catch (error) {
                if (error instanceof StoppedError) throw error;
                errors.push(observationError(pending.resourceUri.child(observable).toString(), errorInfo(error)));
            }
        }
        return { results, errors };
    }

    // ============================================================
    // RESULT
    // ============================================================

    private async handleResult(context: KnowledgeContext, state: PendingState, pending: PendingResult, refreshedAt: string, result: ReadResult): Promise<void> {
        const uri = pending.resourceUri;
        const history = result.fromCache && result.history ? result.history : await this.saveResource(context, pending, refreshedAt, result);

        pending.resource = {
            type: 'resource',
            uri: uri.toString(),
            attributes: history.allAttributes(uri),
            aliases: history.allAliases(),
            affordances: history.allAffordances(),
            labels: history.allLabels(),
            relations: null,
        };

        const bundles = [...result.observed.map((item) => item.bundle), ...result.cachedBundles];
        for (const bundle of bundles) {
            pending.addBundle(bundle);
        }
        for (const error of result.errors) {
            pending.addError(error);
        }
        for (const observable of pending.unanswered()) {
            pending.addError(observationError(uri.child(observable).toString(), new UnavailableError().toInfo()));
        }

        await this.expandRelations(context, state, pending);
        for (const bundle of bundles) {
            await this.expandDependencies(context, state, pending, bundle);
        }
    }

    /**
     * Append what was learned to the resource history and commit it with the
     * bundles, relations and aliases it implies.
     */
    private async saveResource(context: KnowledgeContext, pending: PendingResult, refreshedAt: string, result: ReadResult): Promise<ResourceHistory> {
        const uri = pending.resourceUri;
        const delta = makeResourceDelta({
            refreshedAt,
            locator: pending.locator,
            expired: result.expired,
            labels: result.labels,
            metadata: result.metadata,
            observed: result.observed.map((item) => item.observed),
        });

        const oldHistory = result.history;
        const newHistory = new ResourceHistory(oldHistory?.history ?? []);
        const changed = newHistory.update(delta);
        if (!oldHistory && !(result.shouldCache || result.observed.some((item) => item.shouldCache))) {
            this.store.rememberHistory(context, uri, newHistory);
            return newHistory;
        }

        const oldAliases = new Set(oldHistory?.allAliases() ?? []);
        const newAliases = new Set(newHistory.allAliases());
        const oldRelations = new Map((oldHistory?.allRelations() ?? []).map((relation) => [relationId(relation), relation]));
        const newRelations = new Map(newHistory.allRelations().map((relation) => [relationId(relation), relation]));

        await this.store.commitResolution(context, {
            uri,
            history: changed ? newHistory : undefined,
            bundles: result.observed.filter((item) => item.shouldCache).map((item) => item.bundle),
            relationsRemoved: [...oldRelations.entries()].filter(([id]) => !newRelations.has(id)).map(([, relation]) => relation),
            relationsAdded: [...newRelations.entries()].filter(([id]) => !oldRelations.has(id)).map(([, relation]) => relation),
            aliasesAdded: [...newAliases].filter((url) => !oldAliases.has(url)).map((url) => ({ url, locator: pending.locator })),
            // The locator is now part of the history.
            aliasesRemoved: [...[...oldAliases].filter((url) => !newAliases.has(url)), ...(oldHistory ? [] : [uri.toString()])],
        });
        return newHistory;
    }

    // ============================================================
    // EXPANSION
    // ============================================================

    /**
     * Follow stored relations, from either end, one level per call
     */
    private async expandRelations(context: KnowledgeContext, state: PendingState, pending: PendingResult): Promise<void> {
        if (pending.relationsDepth >= pending.expandDepth) {
            return;
        }

        const uri = pending.resourceUri;
        const stored = await this.store.listRelations(context, uri);
        const { relations, peers } = await this.resolver.tryResolveRelations(context, uri, stored, pending.expandMode === 'none');
        state.addRelations(relations);

        for (const peer of peers) {
            const peerPending = state.result(peer.locator, peer.resourceUri);
            for (const id of peer.relationIds) {
                peerPending.update({ reason: { kind: 'relation', relationId: id } });
            }
            peerPending.update({
                expandDepth: pending.expandDepth - 1,
                expandMode: pending.expandMode,
                loadMode: pending.expandMode,
            });
        }

        pending.relationsDepth = pending.expandDepth;
        log('Expanded relations', { uri: uri.toString(), relations: relations.length, peers: peers.length });
    }

    /**
     * Collection members (while expanding), links and embeds of a bundle
     */
    private async expandDependencies(context: KnowledgeContext, state: PendingState, pending: PendingResult, bundle: Bundle): Promise<void> {
        const origin = pending.resourceUri.toString();
        const toReferences = (values: readonly string[]): Reference[] => {
            const references = new Map<string, Reference>();
            for (const value of values) {
                const uri = KnowledgeUri.tryParse(value)?.resourceUri();
                if (uri && uri.toString() !== origin) {
                    references.set(uri.toString(), { kind: 'knowledge', uri });
                }
            }
            return [...references.values()];
        };

        if (bundle.type === 'collection') {
            if (pending.expandDepth === 0) {
                return;
            }
            const members = await this.resolveDependencies(context, state, toReferences(bundle.results), pending.expandMode);
            for (const member of members) {
                member.update({
                    reason: { kind: 'dependency', dependency: 'collection', origin },
                    expandDepth: pending.expandDepth - 1,
                    expandMode: pending.expandMode,
                    loadMode: pending.expandMode,
                });
            }
            return;
        }

        const { links, embeds } = bundleReferences(bundle);

        // Links are listed, never refreshed or expanded.
        for (const link of await this.resolveDependencies(context, state, toReferences(links), 'none')) {
            link.update({ reason: { kind: 'dependency', dependency: 'link', origin } });
        }

        // Embeds are read as part of the document, with the same load mode.
        for (const embed of await this.resolveDependencies(context, state, toReferences(embeds), pending.loadMode)) {
            embed.update({
                reason: { kind: 'dependency', dependency: 'embed', origin },
                expandMode: pending.expandMode,
                loadMode: pending.loadMode,
                observe: [Observable.body()],
            });
        }
    }

    private async resolveDependencies(context: KnowledgeContext, state: PendingState, references: readonly Reference[], loadMode: LoadMode): Promise<PendingResult[]> {
        if (references.length === 0) {
            return [];
        }
        const locators = await this.resolver.tryInferAndResolveLocators(context, references, loadMode === 'none');
        const results: PendingResult[] = [];
        for (const reference of references) {
            const locator = locators.get(referenceToString(reference));
            if (locator) {
                results.push(state.result(locator, this.resolver.resourceUri(locator)));
            }
        }
        return results;
    }
}
