/**
 * Bundles and observations
 *
 * A bundle is everything stored for one affordance of a resource. The query
 * API never returns bundles; it returns observations cut out of them.
 */

import { z } from 'zod';
import { ErrorInfo, UnavailableError } from '../errors';
import { formatChunkIndex, KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import { ContentReferences, extractReferences, parseContent } from './content';
import { ObservationInfo, ObservationSection } from './types';

// ============================================================
// BUNDLES
// ============================================================

export interface BodyChunk {
    /** Empty for the single chunk of a short document */
    readonly indexes: readonly number[];
    readonly description: string | null;
    readonly text: string;
    readonly numTokens: number;
}

export interface BodySection {
    readonly indexes: readonly number[];
    readonly heading: string | null;
}

export interface BodyMedia {
    readonly name: string;
    readonly description: string | null;
    /** Text standing in for the media, e.g. its caption */
    readonly placeholder: string | null;
    readonly mimeType: string;
    /** Data URI */
    readonly blob: string;
}

export interface BundleBody {
    readonly type: 'body';
    readonly uri: string;
    readonly mimeType: string;
    readonly description: string | null;
    readonly sections: readonly BodySection[];
    readonly chunks: readonly BodyChunk[];
    readonly media: readonly BodyMedia[];
}

export interface BundleCollection {
    readonly type: 'collection';
    readonly uri: string;
    /** Resource URIs of the members */
    readonly results: readonly string[];
}

export interface BundleFile {
    readonly type: 'file';
    readonly uri: string;
    readonly description: string | null;
    readonly mimeType: string;
    readonly downloadUrl: string;
    /** ISO timestamp after which `downloadUrl` stops working */
    readonly expiry: string | null;
    readonly size: number | null;
}

/** Raw text, e.g. source code or a CSV export */
export interface BundlePlain {
    readonly type: 'plain';
    readonly uri: string;
    readonly mimeType: string;
    readonly text: string;
}

export type Bundle = BundleBody | BundleCollection | BundleFile | BundlePlain;

const indexesSchema = z.array(z.number().int().nonnegative());

export const bundleSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('body'),
        uri: z.string(),
        mimeType: z.string(),
        description: z.string().nullable(),
        sections: z.array(z.object({ indexes: indexesSchema, heading: z.string().nullable() })),
        chunks: z.array(
            z.object({
                indexes: indexesSchema,
                description: z.string().nullable(),
                text: z.string(),
                numTokens: z.number().int().nonnegative(),
            }),
        ),
        media: z.array(
            z.object({
                name: z.string(),
                description: z.string().nullable(),
                placeholder: z.string().nullable(),
                mimeType: z.string(),
                blob: z.string(),
            }),
        ),
    }),
    z.object({
        type: z.literal('collection'),
        uri: z.string(),
        results: z.array(z.string()),
    }),
    z.object({
        type: z.literal('file'),
        uri: z.string(),
        description: z.string().nullable(),
        mimeType: z.string(),
        downloadUrl: z.string(),
        expiry: z.string().nullable(),
        size: z.number().int().nonnegative().nullable(),
    }),
    z.object({
        type: z.literal('plain'),
        uri: z.string(),
        mimeType: z.string(),
        text: z.string(),
    }),
]);

function compareIndexes(a: readonly number[], b: readonly number[]): number {
    for (let i = 0; i < Math.min(a.length, b.length); i++) {
        if (a[i] !== b[i]) return a[i] - b[i];
    }
    return a.length - b.length;
}

function mediaNames(chunks: readonly BodyChunk[]): Set<string> {
    const names = new Set<string>();
    for (const chunk of chunks) {
        const { links, embeds } = extractReferences(parseContent(chunk.text));
        for (const href of [...links, ...embeds]) {
            const name = mediaNameFromHref(href);
            if (name) names.add(name);
        }
    }
    return names;
}

/**
 * "ndk://.../$media/figure.png" or "$media/figure.png" -> "figure.png"
 */
function mediaNameFromHref(href: string): string | null {
    const match = href.match(/(?:^|\/)\$media\/([^/]+)$/);
    return match ? match[1] : null;
}

/**
 * Build a body bundle. Sections and chunks are sorted by indexes, and media
 * no chunk refers to are dropped.
 */
export function makeBody(fields: {
    uri: KnowledgeUri;
    mimeType?: string;
    description?: string | null;
    sections?: readonly BodySection[];
    chunks: readonly BodyChunk[];
    media?: readonly BodyMedia[];
}): BundleBody {
    const used = mediaNames(fields.chunks);
    return {
        type: 'body',
        uri: fields.uri.resourceUri().child(Observable.body()).toString(),
        mimeType: fields.mimeType ?? 'text/markdown',
        description: fields.description ?? null,
        sections: [...(fields.sections ?? [])].sort((a, b) => compareIndexes(a.indexes, b.indexes)),
        chunks: [...fields.chunks].sort((a, b) => compareIndexes(a.indexes, b.indexes)),
        media: (fields.media ?? []).filter((media) => used.has(media.name)).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
    };
}

export function makeSingleBody(fields: {
    uri: KnowledgeUri;
    text: string;
    numTokens: number;
    mimeType?: string;
    description?: string | null;
    media?: readonly BodyMedia[];
}): BundleBody {
    return makeBody({
        uri: fields.uri,
        mimeType: fields.mimeType,
        description: fields.description,
        chunks: [{ indexes: [], description: null, text: fields.text, numTokens: fields.numTokens }],
        media: fields.media,
    });
}

export function isSingleChunk(body: BundleBody): boolean {
    return body.chunks.length === 1 && body.chunks[0].indexes.length === 0;
}

// ============================================================
// OBSERVATIONS
// ============================================================

export interface ObsBody {
    readonly type: 'body';
    readonly uri: string;
    readonly description: string | null;
    /** Whole document when it fits in a single chunk */
    readonly content: string | null;
    readonly sections: readonly ObservationSection[];
    /** Table of contents of a chunked document */
    readonly chunks: readonly ObservationInfo[];
}

export interface ObsChunk {
    readonly type: 'chunk';
    readonly uri: string;
    readonly description: string | null;
    readonly text: string;
}

export interface ObsMedia {
    readonly type: 'media';
    readonly uri: string;
    readonly description: string | null;
    readonly placeholder: string | null;
    readonly mimeType: string;
    readonly blob: string;
}

export interface ObsCollection {
    readonly type: 'collection';
    readonly uri: string;
    readonly results: readonly string[];
}

export interface ObsFile {
    readonly type: 'file';
    readonly uri: string;
    readonly description: string | null;
    readonly mimeType: string;
    readonly downloadUrl: string;
    readonly expiry: string | null;
    readonly size: number | null;
}

export interface ObsPlain {
    readonly type: 'plain';
    readonly uri: string;
    readonly mimeType: string;
    readonly text: string;
}

export interface ObservationError {
    readonly type: 'error';
    readonly uri: string;
    readonly error: ErrorInfo;
}

export type Observation = ObsBody | ObsChunk | ObsMedia | ObsCollection | ObsFile | ObsPlain;

function chunkSuffix(indexes: readonly number[]): Observable {
    return Observable.chunk(indexes);
}

function sectionInfo(section: BodySection): ObservationSection {
    return { type: 'chunk', path: section.indexes.map(formatChunkIndex), heading: section.heading };
}

function chunkInfo(chunk: BodyChunk): ObservationInfo {
    return {
        suffix: chunkSuffix(chunk.indexes).toString(),
        numTokens: chunk.numTokens,
        mimeType: 'text/markdown',
        description: chunk.description,
    };
}

function obsMedia(resource: KnowledgeUri, media: BodyMedia): ObsMedia {
    return {
        type: 'media',
        uri: resource.child(Observable.media([media.name])).toString(),
        description: media.description,
        placeholder: media.placeholder,
        mimeType: media.mimeType,
        blob: media.blob,
    };
}

function obsChunk(resource: KnowledgeUri, chunk: BodyChunk): ObsChunk {
    return {
        type: 'chunk',
        uri: resource.child(chunkSuffix(chunk.indexes)).toString(),
        description: chunk.description,
        text: chunk.text,
    };
}

function bodyObservation(resource: KnowledgeUri, body: BundleBody): ObsBody {
    const single = isSingleChunk(body);
    return {
        type: 'body',
        uri: resource.child(Observable.body()).toString(),
        description: body.description,
        content: single ? body.chunks[0].text : null,
        sections: single ? [] : body.sections.map(sectionInfo),
        chunks: single ? [] : body.chunks.map(chunkInfo),
    };
}

function mediaOfChunks(resource: KnowledgeUri, body: BundleBody, chunks: readonly BodyChunk[]): ObsMedia[] {
    const used = mediaNames(chunks);
    return body.media.filter((media) => used.has(media.name)).map((media) => obsMedia(resource, media));
}

function startsWith(indexes: readonly number[], prefix: readonly number[]): boolean {
    return prefix.length <= indexes.length && prefix.every((index, i) => indexes[i] === index);
}

/**
 * Observations answering a request for `observable` within `bundle`.
 * Requesting a section's prefix ("$chunk/01") returns every chunk under it.
 */
export function readObservations(bundle: Bundle, observable: Observable): Observation[] {
    const resource = KnowledgeUri.parse(bundle.uri).resourceUri();
    const notFound = () => new UnavailableError({ extra: { uri: resource.child(observable).toString() } });

    switch (bundle.type) {
        case 'body': {
            if (observable.kind === 'body') {
                const observations: Observation[] = [bodyObservation(resource, bundle)];
                if (isSingleChunk(bundle)) {
                    observations.push(...mediaOfChunks(resource, bundle, bundle.chunks));
                }
                return observations;
            }
            if (observable.kind === 'chunk') {
                const prefix = observable.chunkIndexes();
                const chunks = bundle.chunks.filter((chunk) => startsWith(chunk.indexes, prefix));
                if (chunks.length === 0) throw notFound();
                return [...chunks.map((chunk) => obsChunk(resource, chunk)), ...mediaOfChunks(resource, bundle, chunks)];
            }
            if (observable.kind === 'media') {
                const media = bundle.media.find((item) => item.name === observable.path.join('/'));
                if (!media) throw notFound();
                return [obsMedia(resource, media)];
            }
            throw notFound();
        }
        case 'collection':
            if (observable.kind !== 'collection') throw notFound();
            return [{ type: 'collection', uri: resource.child(Observable.collection()).toString(), results: [...bundle.results] }];
        case 'file':
            if (observable.kind !== 'file') throw notFound();
            return [
                {
                    type: 'file',
                    uri: resource.child(observable).toString(),
                    description: bundle.description,
                    mimeType: bundle.mimeType,
                    downloadUrl: bundle.downloadUrl,
                    expiry: bundle.expiry,
                    size: bundle.size,
                },
            ];
        case 'plain':
            if (observable.kind !== 'plain') throw notFound();
            return [{ type: 'plain', uri: resource.child(Observable.plain()).toString(), mimeType: bundle.mimeType, text: bundle.text }];
        default: {
            const exhaustive: never = bundle;
            throw new Error(`Unknown bundle: ${JSON.stringify(exhaustive)}`);
        }
    }
}

/**
 * The affordance a bundle belongs to
 */
export function bundleAffordance(bundle: Bundle): Observable {
    switch (bundle.type) {
        case 'body':
            return Observable.body();
        case 'collection':
            return Observable.collection();
        case 'file':
            return Observable.file();
        case 'plain':
            return Observable.plain();
        default: {
            const exhaustive: never = bundle;
            throw new Error(`Unknown bundle: ${JSON.stringify(exhaustive)}`);
        }
    }
}

/**
 * What the resource history records about an observed bundle
 */
export function bundleInfo(bundle: Bundle): {
    mimeType?: string;
    sections?: ObservationSection[];
    observations?: ObservationInfo[];
} {
    switch (bundle.type) {
        case 'body':
            return {
                mimeType: bundle.mimeType,
                sections: bundle.sections.map(sectionInfo),
                observations: [
                    ...bundle.chunks.map(chunkInfo),
                    ...bundle.media.map((media) => ({
                        suffix: Observable.media([media.name]).toString(),
                        numTokens: null,
                        mimeType: media.mimeType,
                        description: media.description,
                    })),
                ],
            };
        case 'collection':
            return {};
        case 'file':
        case 'plain':
            return { mimeType: bundle.mimeType };
        default: {
            const exhaustive: never = bundle;
            throw new Error(`Unknown bundle: ${JSON.stringify(exhaustive)}`);
        }
    }
}

/**
 * Links and embeds of a body bundle, across all chunks
 */
export function bundleReferences(bundle: Bundle): ContentReferences {
    if (bundle.type !== 'body') {
        return { links: [], embeds: [] };
    }
    const links: string[] = [];
    const embeds: string[] = [];
    for (const chunk of bundle.chunks) {
        const refs = extractReferences(parseContent(chunk.text));
        links.push(...refs.links.filter((href) => !links.includes(href)));
        embeds.push(...refs.embeds.filter((href) => !embeds.includes(href)));
    }
    return { links, embeds };
}

export function observationError(uri: string, error: ErrorInfo): ObservationError {
    return { type: 'error', uri, error };
}
