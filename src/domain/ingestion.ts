/**
 * Ingestion steps shared by the pipeline: trimming oversized text, turning
 * fragment blobs into media, splitting spreadsheets and deriving relations.
 */

import type { Bundle, BodyMedia } from '../resources/bundles';
import { Relation, relationEmbed, relationLink, relationNodes, relationParent, uniqueRelations } from '../resources/relations';
import { extractReferences, parseContent } from '../resources/content';
import { isValidSegment, KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import type { Tokenizer } from './chunking';

// ============================================================
// TRIMMING
// ============================================================

/**
 * Longest prefix of `line` within `maxTokens`
 */
function cutLine(line: string, maxTokens: number, tokenizer: Tokenizer): string {
    let low = 0;
    let high = line.length;
    while (low < high) {
        const middle = Math.ceil((low + high) / 2);
        if (tokenizer(line.slice(0, middle)) <= maxTokens) {
            low = middle;
        } else {
            high = middle - 1;
        }
    }
    return line.slice(0, low);
}

/**
 * Text over `thresholdTokens` is cut, line by line, to `trimmedTokens`:
 *
 * > ... (N lines omitted)
 *
 * A first line too long on its own is cut mid-line.
 */
export function shortenText(text: string, tokenizer: Tokenizer, thresholdTokens: number, trimmedTokens: number = thresholdTokens): string {
    if (tokenizer(text) <= thresholdTokens) {
        return text;
    }

    const lines = text.split(/(?<=\n)/);
    const selected: string[] = [];
    let selectedTokens = 0;
    for (const line of lines) {
        const lineTokens = tokenizer(line);
        if (selectedTokens + lineTokens > trimmedTokens) break;
        selected.push(line);
        selectedTokens += lineTokens;
    }

    if (selected.length === 0) {
        selected.push(cutLine(lines[0], trimmedTokens, tokenizer));
    }

    const omitted = lines.length - selected.length;
    return `${selected.join('').trimEnd()}\n\n... (${omitted} lines omitted)`;
}

// ============================================================
// BLOBS
// ============================================================

const SELF_SCHEME = 'self://';

function parseDataUri(value: string): string {
    const match = value.match(/^data:([^;,]+)[;,]/);
    return match ? match[1] : 'application/octet-stream';
}

function countOccurrences(text: string, needle: string): number {
    return needle ? text.split(needle).length - 1 : 0;
}

/**
 * "self://figures/chart 1.png" -> "chart_1.png"
 */
function mediaBaseName(blobUri: string): string {
    const path = blobUri.startsWith(SELF_SCHEME) ? blobUri.slice(SELF_SCHEME.length) : blobUri;
    const segments = path.split('/').filter(Boolean);
    const last = segments.length > 0 ? segments[segments.length - 1] : '';
    const sanitized = last.replace(/[^a-zA-Z0-9\-._]/g, '_');
    return isValidSegment(sanitized) ? sanitized : 'media';
}

function disambiguate(name: string, taken: ReadonlySet<string>): string {
    if (!taken.has(name)) return name;
    const dot = name.lastIndexOf('.');
    const stem = dot > 0 ? name.slice(0, dot) : name;
    const extension = dot > 0 ? name.slice(dot) : '';
    for (let counter = 2; ; counter++) {
        const candidate = `${stem}-${counter}${extension}`;
        if (!taken.has(candidate)) return candidate;
    }
}

export interface IngestedBlobs {
    readonly text: string;
    readonly media: BodyMedia[];
}

/**
 * Turn the blobs referenced as `](self://...)` into `$media/<name>`
 * observables, named in order of first occurrence.
 *
 * Unused blobs are dropped. Blobs referenced several times, or sharing their
 * data with another blob, are logos and thumbnails: they are dropped and
 * their references become `](#<name>)` anchors.
 */
export function ingestBlobs(resourceUri: KnowledgeUri, text: string, blobs: Readonly<Record<string, string>>): IngestedBlobs {
    const ordered = Object.keys(blobs)
        .map((blobUri) => ({ blobUri, position: text.indexOf(`](${blobUri})`) }))
        .filter(({ position }) => position >= 0)
        .sort((a, b) => a.position - b.position)
        .map(({ blobUri }) => blobUri);

    const dataCounts = new Map<string, number>();
    for (const blobUri of ordered) {
        const data = blobs[blobUri];
        dataCounts.set(data, (dataCounts.get(data) ?? 0) + 1);
    }

    const media: BodyMedia[] = [];
    const taken = new Set<string>();
    let result = text;
    for (const blobUri of ordered) {
        const data = blobs[blobUri];
        const baseName = mediaBaseName(blobUri);
        const repeated = countOccurrences(text, `](${blobUri})`) > 1 || (dataCounts.get(data) ?? 0) > 1;
        if (repeated) {
            result = result.split(`](${blobUri})`).join(`](#${baseName})`);
            continue;
        }

        const name = disambiguate(baseName, taken);
        taken.add(name);
        const mediaUri = resourceUri.child(Observable.media([name])).toString();
        result = result.split(`](${blobUri})`).join(`](${mediaUri})`);
        media.push({ name, description: null, placeholder: null, mimeType: parseDataUri(data), blob: data });
    }

    return { text: result, media };
}

// ============================================================
// SPREADSHEETS
// ============================================================

export interface SpreadsheetSheet {
    readonly heading: string;
    readonly text: string;
}

/**
 * One entry per `## Sheet` section; empty when the text has a single sheet
 */
export function splitSheets(text: string): SpreadsheetSheet[] {
    if (!text.startsWith('## ') || !text.includes('\n\n## ')) {
        return [];
    }
    return `\n\n${text}`
        .split('\n\n## ')
        .slice(1)
        .map((section) => {
            const newline = section.indexOf('\n');
            const heading = newline >= 0 ? section.slice(0, newline) : section;
            const body = newline >= 0 ? section.slice(newline + 1) : '';
            return { heading: heading.trim(), text: body.trim() };
        });
}

// ============================================================
// RELATIONS
// ============================================================

export interface RelationOptions {
    readonly relationsLink?: boolean;
    readonly relationsParent?: boolean;
}

/**
 * Relations of an observed bundle: those the connector reported, plus
 * collection members as children and links found in a body, unless another
 * relation already connects the same resource.
 */
export function observedRelations(resourceUri: KnowledgeUri, bundle: Bundle, reported: readonly Relation[], options: RelationOptions): Relation[] {
    const relations: Relation[] = [...reported];
    const self = resourceUri.resourceUri().toString();
    const connected = (uri: KnowledgeUri) => {
        const key = uri.resourceUri().toString();
        return key === self || relations.some((relation) => relationNodes(relation).some((node) => node.toString() === key));
    };

    if (options.relationsParent && bundle.type === 'collection') {
        for (const result of bundle.results) {
            const child = KnowledgeUri.tryParse(result);
            if (child && !connected(child)) {
                relations.push(relationParent(resourceUri, child));
            }
        }
    }

    if (options.relationsLink && bundle.type === 'body') {
        for (const chunk of bundle.chunks) {
            const { links, embeds } = extractReferences(parseContent(chunk.text));
            for (const href of embeds) {
                const target = KnowledgeUri.tryParse(href);
                if (target && !connected(target)) {
                    relations.push(relationEmbed(resourceUri.resourceUri(), target));
                }
            }
            for (const href of links) {
                const target = KnowledgeUri.tryParse(href);
                if (target && !connected(target)) {
                    relations.push(relationLink(resourceUri.resourceUri(), target.resourceUri()));
                }
            }
        }
    }

    return uniqueRelations(relations);
}
