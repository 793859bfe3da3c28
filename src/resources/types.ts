/**
 * Resource value types shared by connectors, the store and the query API.
 * Records are plain JSON-compatible data so they serialize to YAML as-is.
 */

import { z } from 'zod';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(z.string(), jsonValueSchema)]),
);

/**
 * Connector-private fetch key. `realm` selects the connector, `kind` the
 * variant within it; every other field is the connector's business.
 */
export interface Locator {
    readonly realm: string;
    readonly kind: string;
    readonly [field: string]: JsonValue;
}

export const locatorSchema = z
    .object({
        realm: z.string().min(1),
        kind: z.string().min(1),
    })
    .catchall(jsonValueSchema);

/**
 * Attributes of a resource, as returned to callers
 */
export interface ResourceAttrs {
    readonly name: string;
    readonly mimeType: string | null;
    readonly description: string | null;
    /** Link for humans to open the resource in its original system */
    readonly citationUrl: string | null;
    readonly createdAt: string | null;
    readonly updatedAt: string | null;
    /** Changes whenever the content changes */
    readonly revisionData: string | null;
    /** Changes whenever the metadata changes */
    readonly revisionMeta: string | null;
}

// ============================================================
// AFFORDANCES
// ============================================================

export interface ObservationSection {
    readonly type: 'chunk';
    /** Chunk indexes of the section, formatted as in URIs ("01") */
    readonly path: readonly string[];
    readonly heading: string | null;
}

export interface ObservationInfo {
    readonly suffix: string;
    readonly numTokens: number | null;
    readonly mimeType: string | null;
    readonly description: string | null;
}

/**
 * A perspective the resource supports, with what is known of its content
 */
export interface AffordanceInfo {
    readonly suffix: string;
    readonly mimeType?: string | null;
    readonly description?: string | null;
    readonly sections?: readonly ObservationSection[];
    readonly observations?: readonly ObservationInfo[];
}

export const observationSectionSchema = z.object({
    type: z.literal('chunk'),
    path: z.array(z.string()),
    heading: z.string().nullable(),
});

export const observationInfoSchema = z.object({
    suffix: z.string(),
    numTokens: z.number().nullable(),
    mimeType: z.string().nullable(),
    description: z.string().nullable(),
});

export const affordanceInfoSchema = z.object({
    suffix: z.string(),
    mimeType: z.string().nullable().optional(),
    description: z.string().nullable().optional(),
    sections: z.array(observationSectionSchema).optional(),
    observations: z.array(observationInfoSchema).optional(),
});

// ============================================================
// LABELS
// ============================================================

export interface ResourceLabel {
    /** Normalized to `[a-z0-9]+(_[a-z0-9]+)*` */
    readonly name: string;
    /** Relative observable, e.g. "$body" or "$chunk/01" */
    readonly target: string;
    readonly value: JsonValue;
}

export const resourceLabelSchema = z.object({
    name: z.string().regex(/^[a-z0-9]+(?:_[a-z0-9]+)*$/),
    target: z.string(),
    value: jsonValueSchema,
});

/**
 * "Some Property" -> "some_property"; null when nothing usable remains
 */
export function normalizeLabelName(value: string): string | null {
    const normalized = value
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[\s\-/]+/g, '_')
        .replace(/[^a-z0-9_]/g, '')
        .replace(/_+/g, '_')
        .replace(/^_|_$/g, '');
    return normalized || null;
}

export function labelSortKey(label: ResourceLabel): string {
    return `${label.name}/${label.target}`;
}
