/**
 * Query actions and results
 *
 * Requests use snake_case fields, as they arrive over the wire.
 */

import { z } from 'zod';
import type { ErrorInfo } from '../errors';
import type { Observation, ObservationError } from '../resources/bundles';
import type { Relation } from '../resources/relations';
import type { AffordanceInfo, ResourceAttrs, ResourceLabel } from '../resources/types';

// ============================================================
// ACTIONS
// ============================================================

export const loadModeSchema = z.enum(['auto', 'force', 'none']);

export const loadActionSchema = z.object({
    method: z.literal('resources/load'),
    uri: z.string().min(1),
    expand_depth: z.number().int().min(0).default(0),
    expand_mode: loadModeSchema.default('none'),
    load_mode: loadModeSchema.default('auto'),
    /** Suffixes to return, e.g. "$body" or "$chunk/01" */
    observe: z.array(z.string()).default([]),
});

export const observeActionSchema = z.object({
    method: z.literal('resources/observe'),
    /** Affordance or observable URI */
    uri: z.string().min(1),
    load_mode: loadModeSchema.default('auto'),
});

export const attachmentDataSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('file'),
        download_url: z.string().min(1),
        expiry: z.string().nullable().default(null),
    }),
    z.object({
        type: z.literal('plain'),
        text: z.string(),
    }),
]);

export const attachmentActionSchema = z.object({
    method: z.literal('resources/attachment'),
    uri: z.string().min(1),
    name: z.string().min(1),
    mime_type: z.string().nullable().default(null),
    description: z.string().nullable().default(null),
    data: attachmentDataSchema,
});

export const queryActionSchema = z.discriminatedUnion('method', [loadActionSchema, observeActionSchema, attachmentActionSchema]);

export const queryRequestSchema = z.object({
    actions: z.array(queryActionSchema).min(1),
});

export type LoadAction = z.infer<typeof loadActionSchema>;
export type ObserveAction = z.infer<typeof observeActionSchema>;
export type AttachmentAction = z.infer<typeof attachmentActionSchema>;
export type QueryAction = z.infer<typeof queryActionSchema>;
/** Request as written by callers, defaults omitted */
export type QueryRequest = z.input<typeof queryRequestSchema>;

// ============================================================
// RESULTS
// ============================================================

export interface ResourceInfo {
    readonly type: 'resource';
    readonly uri: string;
    readonly attributes: ResourceAttrs;
    readonly aliases: readonly string[];
    readonly affordances: readonly AffordanceInfo[];
    readonly labels: readonly ResourceLabel[];
    /** Only set when relations were expanded */
    readonly relations: readonly Relation[] | null;
}

export interface ResourceError {
    readonly type: 'error';
    /** Resource URI, or the reference as requested when none was found */
    readonly uri: string;
    readonly error: ErrorInfo;
}

export interface QueryResponse {
    readonly resources: readonly (ResourceInfo | ResourceError)[];
    readonly observations: readonly (Observation | ObservationError)[];
}
