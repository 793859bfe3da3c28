/**
 * Relations between resources
 *
 * Relations are stored once under their unique id, and referenced from every
 * node they touch, so a lookup from either endpoint finds them.
 */

import { z } from 'zod';
import { KnowledgeUri } from '../uri/KnowledgeUri';
import { canonicalJson, uniqueIdFromString } from '../unique-id';

const knowledgeUriString = z.string().refine((value) => KnowledgeUri.tryParse(value) !== null, {
    message: 'invalid Knowledge URI',
});

const resourceUriString = z.string().refine((value) => KnowledgeUri.tryParse(value)?.isResource() ?? false, {
    message: 'invalid Resource URI',
});

export const relationSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('embed'),
        source: knowledgeUriString,
        target: knowledgeUriString,
    }),
    z.object({
        type: z.literal('link'),
        source: knowledgeUriString,
        target: knowledgeUriString,
    }),
    z.object({
        type: z.literal('misc'),
        kind: z.string().min(1),
        source: resourceUriString,
        target: resourceUriString,
    }),
    z.object({
        type: z.literal('parent'),
        parent: resourceUriString,
        child: resourceUriString,
    }),
]);

/** The content of `target` is inlined into `source` */
export interface RelationEmbed {
    readonly type: 'embed';
    readonly source: string;
    readonly target: string;
}

/** `source` mentions `target` */
export interface RelationLink {
    readonly type: 'link';
    readonly source: string;
    readonly target: string;
}

/** Connector-specific relation, e.g. "blocks" or "duplicate_of" */
export interface RelationMisc {
    readonly type: 'misc';
    readonly kind: string;
    readonly source: string;
    readonly target: string;
}

export interface RelationParent {
    readonly type: 'parent';
    readonly parent: string;
    readonly child: string;
}

export type Relation = RelationEmbed | RelationLink | RelationMisc | RelationParent;
export type RelationType = Relation['type'];

// ============================================================
// FACTORIES
// ============================================================

export function relationEmbed(source: KnowledgeUri, target: KnowledgeUri): RelationEmbed {
    return { type: 'embed', source: source.toString(), target: target.toString() };
}

export function relationLink(source: KnowledgeUri, target: KnowledgeUri): RelationLink {
    return { type: 'link', source: source.toString(), target: target.toString() };
}

export function relationMisc(kind: string, source: KnowledgeUri, target: KnowledgeUri): RelationMisc {
    return {
        type: 'misc',
        kind: normalizeRelationKind(kind),
        source: source.resourceUri().toString(),
        target: target.resourceUri().toString(),
    };
}

export function relationParent(parent: KnowledgeUri, child: KnowledgeUri): RelationParent {
    return {
        type: 'parent',
        parent: parent.resourceUri().toString(),
        child: child.resourceUri().toString(),
    };
}

/**
 * "Is Blocked By" -> "is_blocked_by"
 */
export function normalizeRelationKind(kind: string): string {
    return kind
        .trim()
        .toLowerCase()
        .replace(/[\s\-/]+/g, '_')
        .replace(/[^a-z0-9_]/g, '')
        .replace(/_+/g, '_')
        .replace(/^_|_$/g, '');
}

// ============================================================
// QUERIES
// ============================================================

/**
 * `{type}-{32 chars}`, derived from the relation's canonical JSON
 */
export function relationId(relation: Relation): string {
    return `${relation.type}-${uniqueIdFromString(canonicalJson(relation), 32, 'knowledge-relation')}`;
}

/**
 * Resource URIs touched by a relation, source (or parent) first
 */
export function relationNodes(relation: Relation): KnowledgeUri[] {
    switch (relation.type) {
        case 'embed':
        case 'link':
        case 'misc':
            return [KnowledgeUri.parse(relation.source).resourceUri(), KnowledgeUri.parse(relation.target).resourceUri()];
        case 'parent':
            return [KnowledgeUri.parse(relation.parent), KnowledgeUri.parse(relation.child)];
        default: {
            const exhaustive: never = relation;
            throw new Error(`Unknown relation: ${JSON.stringify(exhaustive)}`);
        }
    }
}

/**
 * Resource URIs on the other side of the relation, seen from `origin`
 */
export function relationPeers(relation: Relation, origin: KnowledgeUri): KnowledgeUri[] {
    const originKey = origin.resourceUri().toString();
    return relationNodes(relation).filter((node) => node.toString() !== originKey);
}

export function sortRelations(relations: readonly Relation[]): Relation[] {
    return [...relations]
        .map((relation) => ({ relation, id: relationId(relation) }))
        .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
        .map(({ relation }) => relation);
}

/**
 * Deduplicate by id and sort
 */
export function uniqueRelations(relations: readonly Relation[]): Relation[] {
    const byId = new Map<string, Relation>();
    for (const relation of relations) {
        byId.set(relationId(relation), relation);
    }
    return sortRelations([...byId.values()]);
}
