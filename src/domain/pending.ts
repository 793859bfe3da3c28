/**
 * Pending reads of a query
 *
 * One entry per resource touched by the query, whether requested directly or
 * reached through relations and dependencies. Entries accumulate what is
 * asked of them; a resource is read again only while something is missing.
 */

import { ErrorInfo, KnowledgeError } from '../errors';
import { Bundle, bundleAffordance, Observation, ObservationError, readObservations } from '../resources/bundles';
import { Relation, relationId, relationNodes } from '../resources/relations';
import type { Locator } from '../resources/types';
import type { KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import type { LoadMode } from './cache-decision';
import type { QueryResponse, ResourceError, ResourceInfo } from './actions';

export type PendingReason =
    | { readonly kind: 'action'; readonly reference: string; readonly external: boolean }
    | { readonly kind: 'relation'; readonly relationId: string }
    | { readonly kind: 'dependency'; readonly dependency: 'collection' | 'embed' | 'link'; readonly origin: string };

const LOAD_MODE_ORDER: Record<LoadMode, number> = { none: 0, auto: 1, force: 2 };

export function maxLoadMode(a: LoadMode, b: LoadMode): LoadMode {
    return LOAD_MODE_ORDER[a] >= LOAD_MODE_ORDER[b] ? a : b;
}

export interface PendingRequest {
    readonly reason?: PendingReason;
    readonly expandDepth?: number;
    readonly expandMode?: LoadMode;
    readonly loadMode?: LoadMode;
    readonly observe?: readonly Observable[];
}

export class PendingResult {
    readonly reasons: PendingReason[] = [];
    expandDepth = 0;
    expandMode: LoadMode = 'none';
    loadMode: LoadMode = 'none';
    readonly observe: Observable[] = [];

    resource: ResourceInfo | ResourceError | null = null;
    /** Depth up to which relations were already followed */
    relationsDepth = 0;
    /** Served bundles by affordance suffix */
    readonly bundles = new Map<string, Bundle>();
    readonly errors: ObservationError[] = [];
    /** Reached only as a dependency and not in the cache: left out of the response */
    skipped = false;

    constructor(
        readonly locator: Locator,
        readonly resourceUri: KnowledgeUri,
    ) {}

    update(request: PendingRequest): void {
        if (request.reason) {
            this.reasons.push(request.reason);
        }
        this.expandDepth = Math.max(this.expandDepth, request.expandDepth ?? 0);
        this.expandMode = maxLoadMode(this.expandMode, request.expandMode ?? 'none');
        this.loadMode = maxLoadMode(this.loadMode, request.loadMode ?? 'none');
        for (const observable of request.observe ?? []) {
            if (!this.observe.some((existing) => existing.equals(observable))) {
                this.observe.push(observable);
            }
        }
        this.observe.sort((a, b) => (a.toString() < b.toString() ? -1 : 1));
    }

    addBundle(bundle: Bundle): void {
        this.bundles.set(bundleAffordance(bundle).toString(), bundle);
    }

    addError(error: ObservationError): void {
        if (!this.errors.some((existing) => existing.uri === error.uri)) {
            this.errors.push(error);
        }
    }

    /**
     * Whether the request explicitly named this resource
     */
    isRequested(): boolean {
        return this.reasons.some((reason) => reason.kind === 'action');
    }

    private isAnswered(observable: Observable): boolean {
        const affordance = observable.affordance().toString();
        if (this.bundles.has(affordance)) {
            return true;
        }
        const candidates = [this.resourceUri.child(observable).toString(), this.resourceUri.child(observable.affordance()).toString()];
        return this.errors.some((error) => candidates.includes(error.uri));
    }

    /**
     * Observables still to read; an empty list when only the resource itself
     * or its relations are missing, null when nothing is left to do.
     */
    missingObserve(): Observable[] | null {
        if (this.skipped || this.resource?.type === 'error') {
            return null;
        }
        const missing = this.observe.filter((observable) => !this.isAnswered(observable));
        if (missing.length > 0) {
            return missing;
        }
        if (!this.resource || this.relationsDepth < this.expandDepth) {
            return [];
        }
        return null;
    }

    /**
     * Requests for observables that nothing answered
     */
    unanswered(): Observable[] {
        return this.observe.filter((observable) => !this.isAnswered(observable));
    }
}

/**
 * Deepest expansion first, then reads that may refresh, then by URI
 */
function comparePending(a: PendingResult, b: PendingResult): number {
    if (a.expandDepth !== b.expandDepth) {
        return b.expandDepth - a.expandDepth;
    }
    const aRefresh = a.loadMode !== 'none' ? 1 : 0;
    const bRefresh = b.loadMode !== 'none' ? 1 : 0;
    if (aRefresh !== bRefresh) {
        return bRefresh - aRefresh;
    }
    const aUri = a.resourceUri.toString();
    const bUri = b.resourceUri.toString();
    return aUri < bUri ? -1 : aUri > bUri ? 1 : 0;
}

export class PendingState {
    private readonly results = new Map<string, PendingResult>();
    private readonly relations = new Map<string, Relation>();
    private readonly requestErrors: ResourceError[] = [];

    result(locator: Locator, resourceUri: KnowledgeUri): PendingResult {
        const key = resourceUri.toString();
        let pending = this.results.get(key);
        if (!pending) {
            pending = new PendingResult(locator, resourceUri);
            this.results.set(key, pending);
        }
        return pending;
    }

    addError(pending: PendingResult, error: ErrorInfo): void {
        pending.resource = { type: 'error', uri: pending.resourceUri.toString(), error };
    }

    /**
     * An action that failed before reaching a resource: a malformed URI, or a
     * reference no connector claims or the caller may not see
     */
    addRequestError(reference: string, error: ErrorInfo): void {
        if (!this.requestErrors.some((existing) => existing.uri === reference)) {
            this.requestErrors.push({ type: 'error', uri: reference, error });
        }
    }

    addRelations(relations: readonly Relation[]): void {
        for (const relation of relations) {
            this.relations.set(relationId(relation), relation);
        }
    }

    nextBatch(batchSize: number): PendingResult[] {
        return [...this.results.values()]
            .filter((pending) => pending.missingObserve() !== null)
            .sort(comparePending)
            .slice(0, batchSize);
    }

    toResponse(): QueryResponse {
        const resources: (ResourceInfo | ResourceError)[] = [...this.requestErrors];
        const observations: QueryResponse['observations'][number][] = [];
        const relations = [...this.relations.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, relation]) => relation);

        for (const pending of this.results.values()) {
            if (!pending.resource || pending.skipped) {
                continue;
            }
            if (pending.resource.type === 'error') {
                resources.push(pending.resource);
                continue;
            }

            const uri = pending.resourceUri.toString();
            const aliases = new Set(pending.resource.aliases);
            for (const reason of pending.reasons) {
                if (reason.kind === 'action' && reason.external) {
                    aliases.add(reason.reference);
                }
            }

            resources.push({
                ...pending.resource,
                aliases: [...aliases].sort(),
                relations:
                    pending.expandDepth > 0
                        ? relations.filter((relation) => relationNodes(relation).some((node) => node.toString() === uri))
                        : null,
            });

            for (const observable of pending.observe) {
                observations.push(...observe(pending, observable));
            }
        }

        return { resources, observations };
    }
}

function observe(pending: PendingResult, observable: Observable): (Observation | ObservationError)[] {
    const bundle = pending.bundles.get(observable.affordance().toString());
    if (!bundle) {
        const candidates = [pending.resourceUri.child(observable).toString(), pending.resourceUri.child(observable.affordance()).toString()];
        return pending.errors.filter((error) => candidates.includes(error.uri));
    }
    try {
        return readObservations(bundle, observable);
    } catch (error) {
        return [{ type: 'error', uri: pending.resourceUri.child(observable).toString(), error: KnowledgeError.from(error).toInfo() }];
    }
}
