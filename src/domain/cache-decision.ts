/**
 * Cache decision
 *
 * Decides, per request, whether a cached resource can be trusted after a
 * fresh `resolve`. Pure: no I/O, no retries.
 *
 * Signal precedence: revisionData, then revisionMeta, then updatedAt. A
 * missing signal is never equal to another missing signal.
 */

import type { MetadataDelta, ResourceView } from '../resources/metadata';
import { Observable } from '../uri/KnowledgeUri';

export type LoadMode = 'auto' | 'force' | 'none';

export const LOAD_MODES: readonly LoadMode[] = ['auto', 'force', 'none'];

/**
 * - `absent`: nothing cached
 * - `valid`: cached content is current
 * - `stale`: cached content must be observed again
 */
export type CacheState = 'absent' | 'valid' | 'stale';

export interface CacheDecision {
    readonly state: CacheState;
    /** Affordances whose cached bundles must not be served */
    readonly expired: readonly string[];
}

/**
 * Compare the cached metadata with freshly resolved metadata
 */
export function compareRevisions(cached: MetadataDelta, fresh: MetadataDelta): Exclude<CacheState, 'absent'> {
    if (cached.revisionData && fresh.revisionData) {
        return cached.revisionData === fresh.revisionData ? 'valid' : 'stale';
    }
    if (!cached.revisionData && !fresh.revisionData && cached.revisionMeta && fresh.revisionMeta) {
        return cached.revisionMeta === fresh.revisionMeta ? 'valid' : 'stale';
    }
    if (cached.updatedAt && fresh.updatedAt) {
        return fresh.updatedAt === cached.updatedAt ? 'valid' : 'stale';
    }
    return 'stale';
}

/**
 * Affordances to expire when the content changed: `$body` (when the resource
 * supports it) and every affordance observed so far.
 */
export function staleAffordances(cached: ResourceView, fresh: MetadataDelta): string[] {
    const body = Observable.body().toString();
    const expired = new Set<string>();
    const affordances = fresh.affordances ?? cached.metadata.affordances ?? [];
    if (affordances.some((info) => info.suffix === body)) {
        expired.add(body);
    }
    for (const observed of cached.observed) {
        expired.add(Observable.parse(observed.suffix).affordance().toString());
    }
    return [...expired].sort();
}

/**
 * Decision for a resource that was resolved in `auto` or `force` mode.
 * `none` never resolves, so it never reaches this point.
 */
export function decideCache(loadMode: Exclude<LoadMode, 'none'>, cached: ResourceView | null, fresh: MetadataDelta): CacheDecision {
    if (!cached) {
        return { state: 'absent', expired: [] };
    }
    if (loadMode === 'force') {
        return { state: 'stale', expired: staleAffordances(cached, fresh) };
    }
    const state = compareRevisions(cached.metadata, fresh);
    return { state, expired: state === 'stale' ? staleAffordances(cached, fresh) : [] };
}
