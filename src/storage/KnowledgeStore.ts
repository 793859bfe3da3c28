/**
 * Knowledge Store
 *
 * Owns the key layout on top of a StorageBackend:
 *
 * - v1/resource/{realm}/{subrealm}/{path}.yml        ResourceHistory
 * - v1/observed/{realm}+{subrealm}+{path}/{suffix}.yml  Bundle, one per affordance
 * - v1/alias/{hash}.yml                              external URL -> Locator
 * - v1/relation/defs/{relationId}.yml                Relation
 * - v1/relation/refs/{realm}+{subrealm}+{path}/{relationId}.txt  marker, one per node
 * - v1/refresh/{realm}/{refreshId}.txt                 Resource URIs a connector reported changed
 *
 * Reads are cached for the lifetime of the request context. A resolution is
 * committed with bundles first and the resource history last, so a history
 * never references bundles that are not written yet.
 */

import debug from 'debug';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { z } from 'zod';
import { RequestCache, type KnowledgeContext } from '../connectors/context';
import { KnowledgeError, StorageError } from '../errors';
import { Bundle, bundleAffordance, bundleSchema } from '../resources/bundles';
import { ResourceHistory } from '../resources/metadata';
import { Relation, relationId, relationNodes, relationSchema } from '../resources/relations';
import { Locator, locatorSchema } from '../resources/types';
import { uniqueIdFromString } from '../unique-id';
import { KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import type { StorageBackend, StorageWrite } from './types';

const log = debug('knowledge:store');

const PREFIX = 'v1';
/** Reads issued in parallel when loading many relations */
const READ_BATCH_SIZE = 20;

// ============================================================
// KEYS
// ============================================================

export function resourceKey(uri: KnowledgeUri): string {
    const resource = uri.resourceUri();
    return `${PREFIX}/resource/${[resource.realm, resource.subrealm, ...resource.path].join('/')}.yml`;
}

/**
 * "$body" -> "body", "$file" -> "file"
 */
export function observedKey(uri: KnowledgeUri, affordance: Observable): string {
    const suffix = affordance.affordance().toString().slice(1).split('/').join('+');
    return `${PREFIX}/observed/${uri.flatKey()}/${suffix}.yml`;
}

export function aliasKey(url: string, environment: string): string {
    return `${PREFIX}/alias/${uniqueIdFromString(url, 40, `knowledge-alias-${environment}`)}.yml`;
}

export function relationDefKey(id: string): string {
    return `${PREFIX}/relation/defs/${id}.yml`;
}

export function refreshKey(realm: string, refreshId: string): string {
    return `${PREFIX}/refresh/${realm}/${refreshId}.txt`;
}

function relationRefsPrefix(node: KnowledgeUri): string {
    return `${PREFIX}/relation/refs/${node.flatKey()}/`;
}

export function relationRefKey(node: KnowledgeUri, id: string): string {
    return `${relationRefsPrefix(node)}${id}.txt`;
}

// ============================================================
// COMMIT
// ============================================================

export interface AliasChange {
    readonly url: string;
    readonly locator: Locator;
}

/**
 * Everything one resolution writes
 */
export interface ResolutionCommit {
    readonly uri: KnowledgeUri;
    /** Omitted when the history did not change */
    readonly history?: ResourceHistory;
    readonly bundles?: readonly Bundle[];
    readonly relationsAdded?: readonly Relation[];
    readonly relationsRemoved?: readonly Relation[];
    readonly aliasesAdded?: readonly AliasChange[];
    readonly aliasesRemoved?: readonly string[];
}

export class KnowledgeStore {
    private readonly histories = new RequestCache<ResourceHistory | null>('store:history');
    private readonly bundles = new RequestCache<Bundle | null>('store:bundle');
    private readonly aliases = new RequestCache<Locator | null>('store:alias');
    private readonly relationIds = new RequestCache<string[]>('store:relation-refs');
    private readonly relationDefs = new RequestCache<Relation | null>('store:relation-defs');

    constructor(
        readonly backend: StorageBackend,
        private readonly environment: string,
    ) {}

    private async readRecord<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
        const text = await this.backend.get(key);
        if (text === null) {
            return null;
        }
        try {
            return schema.parse(parseYaml(text));
        } catch (error) {
            throw new StorageError(`invalid record '${key}'`, false, { cause: error, extra: { key } });
        }
    }

    // ============================================================
    // RESOURCES
    // ============================================================

    readHistory(context: KnowledgeContext, uri: KnowledgeUri): Promise<ResourceHistory | null> {
        const key = resourceKey(uri);
        return this.histories.get(context, key, async () => {
            const text = await this.backend.get(key);
            if (text === null) {
                return null;
            }
            try {
                return ResourceHistory.fromJSON(parseYaml(text));
            } catch (error) {
                throw new StorageError(`invalid record '${key}'`, false, { cause: error, extra: { key } });
            }
        });
    }

    /**
     * Keep a history for the rest of the request without persisting it
     */
    rememberHistory(context: KnowledgeContext, uri: KnowledgeUri, history: ResourceHistory): void {
        this.histories.set(context, resourceKey(uri), history);
    }

    readBundle(context: KnowledgeContext, uri: KnowledgeUri, affordance: Observable): Promise<Bundle | null> {
        const key = observedKey(uri, affordance);
        return this.bundles.get(context, key, () => this.readRecord(key, bundleSchema));
    }

    // ============================================================
    // ALIASES
    // ============================================================

    readAlias(context: KnowledgeContext, url: string): Promise<Locator | null> {
        const key = aliasKey(url, this.environment);
        return this.aliases.get(context, key, () => this.readRecord(key, locatorSchema));
    }

    async saveAlias(context: KnowledgeContext, url: string, locator: Locator): Promise<void> {
        const key = aliasKey(url, this.environment);
        await this.backend.put(key, stringifyYaml(locator));
        this.aliases.set(context, key, locator);
        log('Saved alias', { url, realm: locator.realm });
    }

    async removeAlias(context: KnowledgeContext, url: string): Promise<void> {
        const key = aliasKey(url, this.environment);
        await this.backend.delete(key);
        this.aliases.set(context, key, null);
    }

    // ============================================================
    // RELATIONS
    // ============================================================

    listRelationIds(context: KnowledgeContext, uri: KnowledgeUri): Promise<string[]> {
        const prefix = relationRefsPrefix(uri.resourceUri());
        return this.relationIds.get(context, prefix, async () => {
            const keys = await this.backend.list(prefix);
            return keys.map((key) => key.slice(prefix.length).replace(/\.txt$/, '')).filter((id) => id && !id.includes('/'));
        });
    }

    readRelation(context: KnowledgeContext, id: string): Promise<Relation | null> {
        const key = relationDefKey(id);
        return this.relationDefs.get(context, key, () => this.readRecord(key, relationSchema));
    }

    /**
     * Relations touching a resource, from either end
     */
    async listRelations(context: KnowledgeContext, uri: KnowledgeUri): Promise<Relation[]> {
        const ids = await this.listRelationIds(context, uri);
        const relations: Relation[] = [];
        for (let start = 0; start < ids.length; start += READ_BATCH_SIZE) {
            const batch = await Promise.all(ids.slice(start, start + READ_BATCH_SIZE).map((id) => this.readRelation(context, id)));
            for (const relation of batch) {
                if (relation) relations.push(relation);
            }
        }
        return relations;
    }

    // ============================================================
    // REFRESH
    // ============================================================

    async saveRefresh(realm: string, refreshId: string, uris: readonly KnowledgeUri[]): Promise<void> {
        if (uris.length === 0) {
            return;
        }
        await this.backend.put(refreshKey(realm, refreshId), uris.map((uri) => uri.toString()).join('\n'));
        log('Saved refresh', { realm, refreshId, count: uris.length });
    }

    /**
     * Resource URIs of the refreshes of a realm recorded after `previous`.
     * Refresh ids sort by creation time.
     */
    async readRefreshesSince(realm: string, previous: string): Promise<KnowledgeUri[]> {
        const prefix = `${PREFIX}/refresh/${realm}/`;
        const ids = (await this.backend.list(prefix))
            .map((key) => key.slice(prefix.length).replace(/\.txt$/, ''))
            .filter((id) => id > previous && !id.includes('/'));

        const uris = new Map<string, KnowledgeUri>();
        for (const id of ids) {
            const text = await this.backend.get(refreshKey(realm, id));
            for (const line of (text ?? '').split('\n')) {
                const uri = KnowledgeUri.tryParse(line);
                if (uri) uris.set(uri.toString(), uri);
            }
        }
        return [...uris.values()];
    }

    // ============================================================
    // COMMIT
    // ============================================================

    /**
     * Write a resolution: bundles, then relations and aliases, then the
     * resource history. Checks for cancellation before writing anything.
     */
    async commitResolution(context: KnowledgeContext, commit: ResolutionCommit): Promise<void> {
        context.checkAborted();

        const writes: StorageWrite[] = [];
        for (const bundle of commit.bundles ?? []) {
            writes.push({ op: 'put', key: observedKey(commit.uri, bundleAffordance(bundle)), value: stringifyYaml(bundle) });
        }

        for (const relation of commit.relationsRemoved ?? []) {
            const id = relationId(relation);
            for (const node of relationNodes(relation)) {
                writes.push({ op: 'delete', key: relationRefKey(node, id) });
            }
            writes.push({ op: 'delete', key: relationDefKey(id) });
        }
        for (const relation of commit.relationsAdded ?? []) {
            const id = relationId(relation);
            writes.push({ op: 'put', key: relationDefKey(id), value: stringifyYaml(relation) });
            for (const node of relationNodes(relation)) {
                writes.push({ op: 'put', key: relationRefKey(node, id), value: '' });
            }
        }

        for (const url of commit.aliasesRemoved ?? []) {
            writes.push({ op: 'delete', key: aliasKey(url, this.environment) });
        }
        for (const alias of commit.aliasesAdded ?? []) {
            writes.push({ op: 'put', key: aliasKey(alias.url, this.environment), value: stringifyYaml(alias.locator) });
        }

        if (commit.history) {
            writes.push({ op: 'put', key: resourceKey(commit.uri), value: stringifyYaml(commit.history.toJSON()) });
        }

        if (writes.length === 0) {
            return;
        }

        try {
            await this.backend.commit(writes);
        } catch (error) {
            throw error instanceof KnowledgeError ? error : new StorageError('commit failed', false, { cause: error });
        }

        this.refreshCaches(context, commit);
        log('Committed resolution', { uri: commit.uri.toString(), writes: writes.length, backend: this.backend.name });
    }

    private refreshCaches(context: KnowledgeContext, commit: ResolutionCommit): void {
        if (commit.history) {
            this.histories.set(context, resourceKey(commit.uri), commit.history);
        }
        for (const bundle of commit.bundles ?? []) {
            this.bundles.set(context, observedKey(commit.uri, bundleAffordance(bundle)), bundle);
        }
        for (const url of commit.aliasesRemoved ?? []) {
            this.aliases.set(context, aliasKey(url, this.environment), null);
        }
        for (const alias of commit.aliasesAdded ?? []) {
            this.aliases.set(context, aliasKey(alias.url, this.environment), alias.locator);
        }
        for (const relation of [...(commit.relationsRemoved ?? []), ...(commit.relationsAdded ?? [])]) {
            this.relationDefs.set(context, relationDefKey(relationId(relation)), null);
            for (const node of relationNodes(relation)) {
                this.relationIds.forget(context, relationRefsPrefix(node));
            }
        }
        for (const relation of commit.relationsAdded ?? []) {
            this.relationDefs.set(context, relationDefKey(relationId(relation)), relation);
        }
    }
}
