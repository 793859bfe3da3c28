/**
 * Resource history
 *
 * A resource is persisted as an append-only list of deltas. Readers work on
 * the merged view; only the query engine appends, after a successful
 * resolve/observe.
 */

import { z } from 'zod';
import { KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import { IngestionError } from '../errors';
import { Relation, relationId, relationSchema, sortRelations } from './relations';
import {
    AffordanceInfo,
    affordanceInfoSchema,
    labelSortKey,
    Locator,
    locatorSchema,
    ObservationInfo,
    observationInfoSchema,
    ObservationSection,
    observationSectionSchema,
    ResourceAttrs,
    ResourceLabel,
    resourceLabelSchema,
} from './types';

// ============================================================
// METADATA DELTA
// ============================================================

/**
 * Partial update of a resource's attributes. Absent fields are left as-is.
 */
export interface MetadataDelta {
    readonly name?: string;
    readonly mimeType?: string;
    readonly description?: string;
    readonly citationUrl?: string;
    readonly createdAt?: string;
    readonly updatedAt?: string;
    readonly revisionData?: string;
    readonly revisionMeta?: string;
    readonly aliases?: readonly string[];
    readonly affordances?: readonly AffordanceInfo[];
    readonly relations?: readonly Relation[];
}

export const metadataDeltaSchema = z.object({
    name: z.string().optional(),
    mimeType: z.string().optional(),
    description: z.string().optional(),
    citationUrl: z.string().optional(),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
    revisionData: z.string().optional(),
    revisionMeta: z.string().optional(),
    aliases: z.array(z.string()).optional(),
    affordances: z.array(affordanceInfoSchema).optional(),
    relations: z.array(relationSchema).optional(),
});

const METADATA_FIELDS = [
    'name',
    'mimeType',
    'description',
    'citationUrl',
    'createdAt',
    'updatedAt',
    'revisionData',
    'revisionMeta',
    'aliases',
    'affordances',
    'relations',
] as const;

function sameValue(a: unknown, b: unknown): boolean {
    return JSON.stringify(a) === JSON.stringify(b);
}

function latest<T>(value: T | undefined, fallback: T | undefined): T | undefined {
    return value !== undefined ? value : fallback;
}

function changed<T>(after: T | undefined, before: T | undefined): T | undefined {
    return after !== undefined && !sameValue(after, before) ? after : undefined;
}

/**
 * Overwrite the fields present in `delta`
 */
export function withUpdate(base: MetadataDelta, delta: MetadataDelta): MetadataDelta {
    return {
        name: latest(delta.name, base.name),
        mimeType: latest(delta.mimeType, base.mimeType),
        description: latest(delta.description, base.description),
        citationUrl: latest(delta.citationUrl, base.citationUrl),
        createdAt: latest(delta.createdAt, base.createdAt),
        updatedAt: latest(delta.updatedAt, base.updatedAt),
        revisionData: latest(delta.revisionData, base.revisionData),
        revisionMeta: latest(delta.revisionMeta, base.revisionMeta),
        aliases: latest(delta.aliases, base.aliases),
        affordances: latest(delta.affordances, base.affordances),
        relations: latest(delta.relations, base.relations),
    };
}

/**
 * Keep only the fields of `after` that are present and differ from `before`
 */
export function diffMetadata(after: MetadataDelta, before: MetadataDelta): MetadataDelta {
    return {
        name: changed(after.name, before.name),
        mimeType: changed(after.mimeType, before.mimeType),
        description: changed(after.description, before.description),
        citationUrl: changed(after.citationUrl, before.citationUrl),
        createdAt: changed(after.createdAt, before.createdAt),
        updatedAt: changed(after.updatedAt, before.updatedAt),
        revisionData: changed(after.revisionData, before.revisionData),
        revisionMeta: changed(after.revisionMeta, before.revisionMeta),
        aliases: changed(after.aliases, before.aliases),
        affordances: changed(after.affordances, before.affordances),
        relations: changed(after.relations, before.relations),
    };
}

export function isEmptyMetadata(delta: MetadataDelta): boolean {
    return METADATA_FIELDS.every((field) => delta[field] === undefined);
}

// ============================================================
// OBSERVED DELTA
// ============================================================

/**
 * What was learned while observing one affordance
 */
export interface ObservedDelta {
    readonly suffix: string;
    readonly mimeType?: string;
    readonly sections?: readonly ObservationSection[];
    readonly observations?: readonly ObservationInfo[];
    readonly relations?: readonly Relation[];
}

export const observedDeltaSchema = z.object({
    suffix: z.string(),
    mimeType: z.string().optional(),
    sections: z.array(observationSectionSchema).optional(),
    observations: z.array(observationInfoSchema).optional(),
    relations: z.array(relationSchema).optional(),
});

const OBSERVED_FIELDS = ['mimeType', 'sections', 'observations', 'relations'] as const;

function diffObserved(after: ObservedDelta, before: ObservedView): ObservedDelta {
    return {
        suffix: after.suffix,
        mimeType: changed(after.mimeType, before.mimeType),
        sections: changed(after.sections, before.sections),
        observations: changed(after.observations, before.observations),
        relations: changed(after.relations, before.relations),
    };
}

function isEmptyObserved(delta: ObservedDelta): boolean {
    return OBSERVED_FIELDS.every((field) => delta[field] === undefined);
}

// ============================================================
// RESOURCE DELTA
// ============================================================

export interface ResourceDelta {
    readonly refreshedAt: string;
    /** Set on the first delta, and again whenever the locator changes */
    readonly locator?: Locator;
    /** Affordances whose cached bundles are stale and not yet refreshed */
    readonly expired: readonly string[];
    readonly labels: readonly ResourceLabel[];
    readonly metadata: MetadataDelta;
    readonly observed: readonly ObservedDelta[];
    /** Label names whose earlier values no longer apply */
    readonly resetLabels: readonly string[];
}

export const resourceDeltaSchema = z.object({
    refreshedAt: z.string(),
    locator: locatorSchema.optional(),
    expired: z.array(z.string()).default([]),
    labels: z.array(resourceLabelSchema).default([]),
    metadata: metadataDeltaSchema.default({}),
    observed: z.array(observedDeltaSchema).default([]),
    resetLabels: z.array(z.string()).default([]),
});

export function makeResourceDelta(fields: Partial<ResourceDelta> & { refreshedAt: string }): ResourceDelta {
    return {
        locator: fields.locator,
        refreshedAt: fields.refreshedAt,
        expired: fields.expired ?? [],
        labels: fields.labels ?? [],
        metadata: fields.metadata ?? {},
        observed: fields.observed ?? [],
        resetLabels: fields.resetLabels ?? [],
    };
}

function isEmptyDelta(delta: ResourceDelta): boolean {
    return (
        delta.locator === undefined &&
        delta.expired.length === 0 &&
        delta.labels.length === 0 &&
        delta.resetLabels.length === 0 &&
        isEmptyMetadata(delta.metadata) &&
        delta.observed.length === 0
    );
}

// ============================================================
// MERGED VIEW
// ============================================================

export interface ObservedView {
    readonly suffix: string;
    readonly mimeType: string | undefined;
    readonly sections: readonly ObservationSection[];
    readonly observations: readonly ObservationInfo[];
    readonly relations: readonly Relation[];
}

/**
 * Read-only snapshot of a resource history
 */
export interface ResourceView {
    readonly locator: Locator;
    readonly expired: readonly string[];
    readonly labels: readonly ResourceLabel[];
    readonly metadata: MetadataDelta;
    readonly observed: readonly ObservedView[];
}

function bySuffix<T extends { suffix: string }>(a: T, b: T): number {
    return a.suffix < b.suffix ? -1 : a.suffix > b.suffix ? 1 : 0;
}

function applyDelta(view: ResourceView, delta: ResourceDelta): ResourceView {
    const expired = new Set([...view.expired, ...delta.expired]);

    const labels = new Map<string, ResourceLabel>();
    for (const label of view.labels) {
        if (!delta.resetLabels.includes(label.name)) {
            labels.set(labelSortKey(label), label);
        }
    }
    for (const label of delta.labels) {
        labels.set(labelSortKey(label), label);
    }

    const observed = new Map(view.observed.map((obs) => [obs.suffix, obs]));
    for (const obsDelta of delta.observed) {
        expired.delete(obsDelta.suffix);
        const existing = observed.get(obsDelta.suffix);
        observed.set(obsDelta.suffix, {
            suffix: obsDelta.suffix,
            mimeType: obsDelta.mimeType ?? existing?.mimeType,
            sections: obsDelta.sections ?? existing?.sections ?? [],
            observations: obsDelta.observations ?? existing?.observations ?? [],
            relations: obsDelta.relations ?? existing?.relations ?? [],
        });
    }

    return {
        locator: delta.locator ?? view.locator,
        expired: [...expired].sort(),
        labels: [...labels.values()].sort((a, b) => (labelSortKey(a) < labelSortKey(b) ? -1 : 1)),
        metadata: withUpdate(view.metadata, delta.metadata),
        observed: [...observed.values()].sort(bySuffix),
    };
}

export function getLabel(view: ResourceView, name: string, target: string): ResourceLabel | undefined {
    return view.labels.find((label) => label.name === name && label.target === target);
}

// ============================================================
// RESOURCE HISTORY
// ============================================================

export const resourceHistorySchema = z.object({
    history: z.array(resourceDeltaSchema).min(1),
});

export class ResourceHistory {
    private readonly deltas: ResourceDelta[];
    private cachedView: ResourceView | null = null;

    constructor(history: readonly ResourceDelta[] = []) {
        this.deltas = [...history];
    }

    get history(): readonly ResourceDelta[] {
        return this.deltas;
    }

    /**
     * Append the part of `delta` that changes the merged view.
     * Returns false when nothing changed.
     */
    update(delta: ResourceDelta): boolean {
        if (this.deltas.length === 0) {
            if (!delta.locator) {
                throw new IngestionError('missing locator in resource initialization');
            }
            this.deltas.push(delta);
            this.cachedView = null;
            return true;
        }

        const diff = this.diff(delta);
        if (isEmptyDelta(diff)) {
            return false;
        }
        this.deltas.push(diff);
        this.cachedView = null;
        return true;
    }

    diff(delta: ResourceDelta): ResourceDelta {
        const merged = this.merged();

        const locator = delta.locator && !sameValue(delta.locator, merged.locator) ? delta.locator : undefined;

        const labels = delta.labels.filter((label) => {
            const existing = getLabel(merged, label.name, label.target);
            return !existing || !sameValue(existing.value, label.value) || delta.resetLabels.includes(label.name);
        });

        const observedSuffixes = new Set(delta.observed.map((obs) => obs.suffix));
        const expired = delta.expired.filter((suffix) => !merged.expired.includes(suffix) && !observedSuffixes.has(suffix));

        const observed: ObservedDelta[] = [];
        for (const obsDelta of delta.observed) {
            const existing = merged.observed.find((obs) => obs.suffix === obsDelta.suffix);
            const wasExpired = merged.expired.includes(obsDelta.suffix);
            if (!existing) {
                observed.push(obsDelta);
                continue;
            }
            const changed = diffObserved(obsDelta, existing);
            // An expired affordance that was refreshed must be recorded, even unchanged.
            if (!isEmptyObserved(changed) || wasExpired) {
                observed.push(changed);
            }
        }

        const resetLabels = delta.resetLabels.filter((name) => merged.labels.some((label) => label.name === name));

        return {
            refreshedAt: delta.refreshedAt,
            locator,
            expired: [...new Set(expired)].sort(),
            labels,
            metadata: diffMetadata(delta.metadata, merged.metadata),
            observed: observed.sort(bySuffix),
            resetLabels,
        };
    }

    merged(): ResourceView {
        if (!this.cachedView) {
            const [first, ...rest] = this.deltas;
            if (!first) {
                throw new IngestionError('no history in cached resource');
            }
            if (!first.locator) {
                throw new IngestionError('no locator in cached resource');
            }
            let view: ResourceView = { locator: first.locator, expired: [], labels: [], metadata: {}, observed: [] };
            for (const delta of [first, ...rest]) {
                view = applyDelta(view, delta);
            }
            this.cachedView = view;
        }
        return this.cachedView;
    }

    // ============================================================
    // ACCESSORS
    // ============================================================

    /**
     * Attributes, with the name falling back to the last path segment
     */
    allAttributes(resourceUri: KnowledgeUri, citationFallback: string | null = null): ResourceAttrs {
        const { metadata } = this.merged();
        return {
            name: metadata.name ?? resourceUri.path[resourceUri.path.length - 1],
            mimeType: metadata.mimeType ?? null,
            description: metadata.description ?? null,
            citationUrl: metadata.citationUrl ?? citationFallback,
            createdAt: metadata.createdAt ?? null,
            updatedAt: metadata.updatedAt ?? null,
            revisionData: metadata.revisionData ?? null,
            revisionMeta: metadata.revisionMeta ?? null,
        };
    }

    allAliases(): string[] {
        return [...(this.merged().metadata.aliases ?? [])];
    }

    /**
     * Affordances declared by the connector, enriched with what observing
     * them taught us (MIME type, sections, chunk infos).
     */
    allAffordances(): AffordanceInfo[] {
        const merged = this.merged();
        const affordances = new Map<string, AffordanceInfo>();
        for (const info of merged.metadata.affordances ?? []) {
            affordances.set(info.suffix, info);
        }
        for (const observed of merged.observed) {
            const suffix = Observable.parse(observed.suffix).affordance().toString();
            const existing = affordances.get(suffix);
            affordances.set(suffix, {
                suffix,
                mimeType: observed.mimeType ?? existing?.mimeType ?? null,
                description: existing?.description ?? null,
                sections: observed.sections.length > 0 ? observed.sections : existing?.sections ?? [],
                observations: observed.observations.length > 0 ? observed.observations : existing?.observations ?? [],
            });
        }
        return [...affordances.values()].sort(bySuffix);
    }

    allLabels(): ResourceLabel[] {
        return [...this.merged().labels];
    }

    /**
     * Relations from metadata and from every observed affordance
     */
    allRelations(): Relation[] {
        const merged = this.merged();
        const byId = new Map<string, Relation>();
        for (const relation of merged.metadata.relations ?? []) {
            byId.set(relationId(relation), relation);
        }
        for (const observed of merged.observed) {
            for (const relation of observed.relations) {
                byId.set(relationId(relation), relation);
            }
        }
        return sortRelations([...byId.values()]);
    }

    toJSON(): { history: readonly ResourceDelta[] } {
        return { history: this.deltas };
    }

    static fromJSON(value: unknown): ResourceHistory {
        return new ResourceHistory(resourceHistorySchema.parse(value).history);
    }
}
