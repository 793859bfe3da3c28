/**
 * Chunking
 *
 * Short documents stay a single chunk. Longer ones are split on headings
 * into a hierarchy of sections, which is then flattened back into chunks of
 * at most `maxChunkTokens` each (except atoms larger than that). Output only
 * depends on the text and the budgets.
 */

import debug from 'debug';
import { BodyChunk, BodyMedia, BodySection, BundleBody, makeBody, makeSingleBody } from '../resources/bundles';
import { ContentPart, parseContent, PartHeading, renderContent, renderPart, summarizeParts } from '../resources/content';
import { KnowledgeUri } from '../uri/KnowledgeUri';

const log = debug('knowledge:chunking');

export type Tokenizer = (text: string) => number;

/**
 * About four characters per token
 */
export const estimateTokens: Tokenizer = (text) => Math.ceil(text.length / 4);

export interface ChunkingOptions {
    /** Documents up to this size remain a single chunk */
    readonly thresholdTokens: number;
    readonly maxChunkTokens: number;
    readonly tokenizer: Tokenizer;
}

/** '#' prefix and newlines after a heading */
const BUFFER_HEADING = 3;
/** Newlines after a paragraph */
const BUFFER_PARAGRAPH = 1;

// ============================================================
// CHUNK ATOMS
// ============================================================

interface ChunkPart {
    readonly parts: readonly ContentPart[];
    readonly numTokens: number;
}

function asHeading(chunk: ChunkPart): PartHeading | null {
    const [first] = chunk.parts;
    return chunk.parts.length === 1 && first.type === 'heading' ? first : null;
}

// ============================================================
// CHUNK HIERARCHY
// ============================================================

/**
 * A group holds either sub-groups or chunk parts, never both
 */
interface ChunkGroup {
    readonly heading: PartHeading | null;
    readonly groups: readonly ChunkGroup[];
    readonly chunks: readonly ChunkPart[];
}

function fromGroups(heading: PartHeading | null, groups: readonly ChunkGroup[]): ChunkGroup {
    return { heading, groups, chunks: [] };
}

function fromChunks(heading: PartHeading | null, chunks: readonly ChunkPart[]): ChunkGroup {
    return { heading, groups: [], chunks };
}

function containsSection(group: ChunkGroup): boolean {
    return group.heading !== null || group.groups.some(containsSection);
}

export class Chunker {
    constructor(private readonly options: ChunkingOptions) {}

    /**
     * Turn document markup into a body bundle
     */
    chunkBody(uri: KnowledgeUri, text: string, media: readonly BodyMedia[] = [], description: string | null = null): BundleBody {
        const parts = parseContent(text);
        const rendered = renderContent(parts);
        const numTokens = this.options.tokenizer(rendered);

        if (numTokens <= this.options.thresholdTokens) {
            return makeSingleBody({ uri, text: rendered, numTokens, description, media });
        }

        const root = this.optimize(this.makeHierarchy(null, this.splitParts(parts)));

        const sections: BodySection[] = [];
        const chunks: BodyChunk[] = [];
        this.emit(sections, chunks, root, [], 0);

        log('Chunked body', { uri: uri.toString(), numTokens, chunks: chunks.length, sections: sections.length });
        return makeBody({ uri, description, sections, chunks, media });
    }

    private splitParts(parts: readonly ContentPart[]): ChunkPart[] {
        return parts.map((part) => ({
            parts: [part],
            // Embeds do not count while packing chunks.
            numTokens: part.type === 'embed' ? 0 : this.options.tokenizer(renderPart(part)) + BUFFER_PARAGRAPH,
        }));
    }

    private headingTokens(heading: PartHeading | null): number {
        return heading ? this.options.tokenizer(heading.text) + BUFFER_HEADING : 0;
    }

    private numTokens(group: ChunkGroup): number {
        return (
            this.headingTokens(group.heading) +
            group.groups.reduce((sum, child) => sum + this.numTokens(child), 0) +
            group.chunks.reduce((sum, chunk) => sum + chunk.numTokens, 0)
        );
    }

    private flatten(group: ChunkGroup, omitHeading: boolean): ChunkPart[] {
        const flattened: ChunkPart[] = [];
        if (group.heading && !omitHeading) {
            flattened.push({ parts: [group.heading], numTokens: this.headingTokens(group.heading) });
        }
        for (const child of group.groups) {
            flattened.push(...this.flatten(child, false));
        }
        flattened.push(...group.chunks);
        return flattened;
    }

    /**
     * Pack parts without headings into chunks of up to `maxChunkTokens`
     */
    private fromPartsBounded(heading: PartHeading | null, chunks: readonly ChunkPart[]): ChunkGroup {
        const max = this.options.maxChunkTokens;
        if (chunks.reduce((sum, chunk) => sum + chunk.numTokens, 0) < max) {
            return fromChunks(heading, chunks);
        }

        const subgroups: ChunkGroup[] = [];
        let partial: ChunkPart[] = [];
        let partialTokens = 0;
        for (const chunk of chunks) {
            if (partialTokens > 0 && partialTokens + chunk.numTokens > max) {
                subgroups.push(fromChunks(null, partial));
                partial = [];
                partialTokens = 0;
            }
            partial.push(chunk);
            partialTokens += chunk.numTokens;
        }
        if (partial.length > 0) {
            subgroups.push(fromChunks(null, partial));
        }
        return fromGroups(heading, subgroups);
    }

    /**
     * One section per heading of the shallowest level, recursively
     */
    private makeHierarchy(heading: PartHeading | null, chunks: readonly ChunkPart[]): ChunkGroup {
        const levels = chunks.map(asHeading).flatMap((h) => (h ? [h.level] : []));
        if (levels.length === 0) {
            return this.fromPartsBounded(heading, chunks);
        }
        const level = Math.min(...levels);

        const children: ChunkGroup[] = [];
        let sectionHeading: PartHeading | null = null;
        let sectionParts: ChunkPart[] = [];

        const flushSection = () => {
            if (sectionParts.length > 0) {
                children.push(this.makeHierarchy(sectionHeading, sectionParts));
            } else if (sectionHeading) {
                children.push(fromChunks(sectionHeading, []));
            }
            sectionHeading = null;
            sectionParts = [];
        };

        for (const chunk of chunks) {
            const chunkHeading = asHeading(chunk);
            if (chunkHeading && chunkHeading.level === level) {
                flushSection();
                sectionHeading = chunkHeading;
            } else {
                sectionParts.push(chunk);
            }
        }
        flushSection();

        return fromGroups(heading, children);
    }

    // ============================================================
    // OPTIMIZATION
    // ============================================================

    /**
     * Afterwards a group is either flat (fits in a chunk, content in
     * `chunks`) or a section (too large, content in `groups`).
     */
    private optimize(group: ChunkGroup): ChunkGroup {
        if (this.numTokens(group) <= this.options.maxChunkTokens) {
            return fromChunks(group.heading, this.flatten(group, true));
        }
        if (group.chunks.length > 0 || !containsSection(group)) {
            return group;
        }
        return fromGroups(group.heading, this.packNeighbors(group.groups.map((child) => this.optimize(child))));
    }

    /**
     * Merge neighboring small groups; large groups act as barriers
     */
    private packNeighbors(groups: readonly ChunkGroup[]): ChunkGroup[] {
        const max = this.options.maxChunkTokens;
        const result: ChunkGroup[] = [];
        let pending: ChunkGroup[] = [];
        let pendingTokens = 0;

        const flush = () => {
            if (pending.length === 1) {
                result.push(pending[0]);
            } else if (pending.length > 1) {
                result.push(fromChunks(null, pending.flatMap((group) => this.flatten(group, false))));
            }
            pending = [];
            pendingTokens = 0;
        };

        for (const group of groups) {
            const tokens = this.numTokens(group);
            if (tokens > max) {
                flush();
                result.push(group);
            } else if (pendingTokens + tokens > max) {
                flush();
                pending = [group];
                pendingTokens = tokens;
            } else {
                pending.push(group);
                pendingTokens += tokens;
            }
        }
        flush();
        return result;
    }

    // ============================================================
    // OUTPUT
    // ============================================================

    /**
     * Number the hierarchy depth-first. Returns how many indexes the group
     * used at its own level.
     */
    private emit(sections: BodySection[], chunks: BodyChunk[], group: ChunkGroup, parentIndexes: readonly number[], selfIndex: number): number {
        if (group.groups.length > 0 && !group.heading) {
            let childIndex = selfIndex;
            for (const child of group.groups) {
                childIndex += this.emit(sections, chunks, child, parentIndexes, childIndex);
            }
            return childIndex - selfIndex;
        }

        if (group.groups.length > 0 && group.heading) {
            const sectionIndexes = [...parentIndexes, selfIndex];
            let childIndex = 0;
            for (const child of group.groups) {
                childIndex += this.emit(sections, chunks, child, sectionIndexes, childIndex);
            }
            sections.push({ indexes: sectionIndexes, heading: group.heading.text });
            return 1;
        }

        if (group.chunks.length > 0 || group.heading) {
            const parts = this.flatten(group, false).flatMap((chunk) => chunk.parts);
            const text = renderContent(parts);
            chunks.push({
                indexes: [...parentIndexes, selfIndex],
                description: summarizeParts(parts),
                text,
                numTokens: this.options.tokenizer(text),
            });
            return 1;
        }

        return 0;
    }
}
