/**
 * Connector protocol
 *
 * A connector maps references of one external system to locators, and
 * fetches metadata (`resolve`) and content (`observe`) for them. Every call
 * receives the request-scoped context; connectors keep no state between
 * requests.
 */

import type { Bundle } from '../resources/bundles';
import type { MetadataDelta, ResourceView } from '../resources/metadata';
import type { Relation } from '../resources/relations';
import type { Locator, ResourceLabel } from '../resources/types';
import type { KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import type { Reference } from '../uri/references';
import type { KnowledgeContext } from './context';

/**
 * Raw connector output for a body, before chunking.
 * `text` may embed blobs as `![caption](self://name)`.
 */
export interface Fragment {
    readonly type: 'fragment';
    readonly mimeType: string;
    readonly text: string;
    /** `self://name` -> data URI */
    readonly blobs: Readonly<Record<string, string>>;
}

export interface ResolveResult {
    readonly metadata: MetadataDelta;
    /** Affordances the connector knows to be stale */
    readonly expired: readonly string[];
    readonly labels?: readonly ResourceLabel[];
    readonly shouldCache: boolean;
}

export interface ObserveOptions {
    /** Keep only these metadata fields from the observation */
    readonly fields?: readonly (keyof MetadataDelta)[];
    /** Record links and embeds found in the body as relations */
    readonly relationsLink?: boolean;
    /** Record collection members as children of the resource */
    readonly relationsParent?: boolean;
}

export interface ObserveResult {
    readonly bundle: Fragment | Bundle;
    readonly metadata?: MetadataDelta;
    readonly relations?: readonly Relation[];
    readonly shouldCache: boolean;
    readonly options?: ObserveOptions;
}

export interface Connector {
    /** Realm of the URIs this connector owns */
    readonly realm: string;

    /**
     * Locator for a reference, or null when the reference is not ours.
     * Throws UnavailableError when the reference is ours but its target
     * does not exist.
     */
    locator(context: KnowledgeContext, reference: Reference): Promise<Locator | null>;

    /**
     * Canonical Resource URI of a locator; must be deterministic
     */
    resourceUri(locator: Locator): KnowledgeUri;

    /**
     * Access check and lightweight metadata fetch; never fetches content
     */
    resolve(context: KnowledgeContext, locator: Locator, cached: ResourceView | null): Promise<ResolveResult>;

    /**
     * Fetch the content of one affordance
     */
    observe(context: KnowledgeContext, locator: Locator, observable: Observable, resolved: MetadataDelta): Promise<ObserveResult>;

    /**
     * Locators of resources changed since the last refresh, for connectors
     * that can list them
     */
    refresh?(context: KnowledgeContext): Promise<Locator[]>;
}

export function isFragment(bundle: Fragment | Bundle): bundle is Fragment {
    return bundle.type === 'fragment';
}
