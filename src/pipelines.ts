/**
 * Ingestion Pipeline - Composition of Formats + Chunking
 *
 * Turns what a connector observed into a cacheable bundle. Fragments are read
 * by the first format that handles their MIME type (order matters), then
 * trimmed, chunked, stripped of their blobs and linked to known resources.
 */

import debug from 'debug';
import type { Fragment, ObserveOptions, ObserveResult } from './connectors/types';
import { isFragment } from './connectors/types';
import { Chunker, estimateTokens, Tokenizer } from './domain/chunking';
import { ingestBlobs, observedRelations, shortenText, splitSheets } from './domain/ingestion';
import { IngestionError } from './errors';
import { DataFormat } from './formats/DataFormat';
import { MarkdownFormat } from './formats/MarkdownFormat';
import { PlainFormat } from './formats/PlainFormat';
import type { FormattedFragment, FragmentFormat } from './formats/types';
import { Bundle, bundleAffordance, bundleInfo, BundleBody, makeBody, makeSingleBody } from './resources/bundles';
import { extractReferences, parseContent, renderContent, rewriteReferences } from './resources/content';
import { MetadataDelta, ObservedDelta, withUpdate } from './resources/metadata';
import { KnowledgeUri } from './uri/KnowledgeUri';
import { normalizeExternalUri } from './uri/references';

const log = debug('knowledge:ingestion');

export interface IngestionPipelineConfig {
    /** Checked in order; defaults to markdown, data, then plain text */
    formats?: FragmentFormat[];
    tokenizer?: Tokenizer;
    maxChunkTokens?: number;
    chunkingThresholdTokens?: number;
    /** Plain and data fragments over this size are trimmed */
    fragmentThresholdTokens?: number;
    fragmentTrimmedTokens?: number;
    /** Spreadsheets over this size get one chunk per sheet */
    spreadsheetThresholdTokens?: number;
    spreadsheetChunkTokens?: number;
}

/**
 * Canonical Resource URIs of the external URLs some connector claims
 */
export type LinkResolver = (urls: readonly string[]) => Promise<ReadonlyMap<string, KnowledgeUri>>;

export interface IngestedResult {
    readonly metadata: MetadataDelta;
    readonly bundle: Bundle;
    readonly observed: ObservedDelta;
    readonly shouldCache: boolean;
}

export const DEFAULT_FRAGMENT_THRESHOLD_TOKENS = 800_000;
export const DEFAULT_FRAGMENT_TRIMMED_TOKENS = 600_000;
export const DEFAULT_SPREADSHEET_THRESHOLD_TOKENS = 40_000;
export const DEFAULT_SPREADSHEET_CHUNK_TOKENS = 20_000;

function pickMetadata(metadata: MetadataDelta, fields: readonly (keyof MetadataDelta)[] | undefined): MetadataDelta {
    if (!fields) return metadata;
    const keep = new Set(fields);
    return {
        name: keep.has('name') ? metadata.name : undefined,
        mimeType: keep.has('mimeType') ? metadata.mimeType : undefined,
        description: keep.has('description') ? metadata.description : undefined,
        citationUrl: keep.has('citationUrl') ? metadata.citationUrl : undefined,
        createdAt: keep.has('createdAt') ? metadata.createdAt : undefined,
        updatedAt: keep.has('updatedAt') ? metadata.updatedAt : undefined,
        revisionData: keep.has('revisionData') ? metadata.revisionData : undefined,
        revisionMeta: keep.has('revisionMeta') ? metadata.revisionMeta : undefined,
        aliases: keep.has('aliases') ? metadata.aliases : undefined,
        affordances: keep.has('affordances') ? metadata.affordances : undefined,
        relations: keep.has('relations') ? metadata.relations : undefined,
    };
}

export class IngestionPipeline {
    readonly tokenizer: Tokenizer;
    private readonly formats: FragmentFormat[];
    private readonly chunker: Chunker;
    private readonly fragmentThreshold: number;
    private readonly fragmentTrimmed: number;
    private readonly spreadsheetThreshold: number;
    private readonly spreadsheetChunk: number;

    constructor(config: IngestionPipelineConfig = {}) {
        this.formats = config.formats ?? [new MarkdownFormat(), new DataFormat(), new PlainFormat()];
        this.tokenizer = config.tokenizer ?? estimateTokens;
        this.chunker = new Chunker({
            tokenizer: this.tokenizer,
            maxChunkTokens: config.maxChunkTokens ?? 4000,
            thresholdTokens: config.chunkingThresholdTokens ?? 4000,
        });
        this.fragmentThreshold = config.fragmentThresholdTokens ?? DEFAULT_FRAGMENT_THRESHOLD_TOKENS;
        this.fragmentTrimmed = config.fragmentTrimmedTokens ?? DEFAULT_FRAGMENT_TRIMMED_TOKENS;
        this.spreadsheetThreshold = config.spreadsheetThresholdTokens ?? DEFAULT_SPREADSHEET_THRESHOLD_TOKENS;
        this.spreadsheetChunk = config.spreadsheetChunkTokens ?? DEFAULT_SPREADSHEET_CHUNK_TOKENS;

        if (this.formats.length === 0) {
            throw new IngestionError('IngestionPipeline requires at least one format adapter');
        }
    }

    /**
     * Ingest the result of `Connector.observe`
     */
    async ingest(resourceUri: KnowledgeUri, observed: ObserveResult, resolveLinks: LinkResolver): Promise<IngestedResult> {
        const options: ObserveOptions = observed.options ?? {};
        let metadata = pickMetadata(observed.metadata ?? {}, options.fields);
        let bundle: Bundle;

        if (isFragment(observed.bundle)) {
            const formatted = this.parseFragment(observed.bundle);
            metadata = withUpdate(formatted.metadata, metadata);
            bundle = await this.ingestFragment(resourceUri, formatted, observed.bundle, observed.shouldCache, resolveLinks);
        } else {
            bundle = observed.bundle;
            const bundleResource = KnowledgeUri.parse(bundle.uri).resourceUri();
            if (!bundleResource.equals(resourceUri.resourceUri())) {
                throw new IngestionError(`bundle ${bundle.uri} does not belong to ${resourceUri.toString()}`);
            }
        }

        const info = bundleInfo(bundle);
        const observedDelta: ObservedDelta = {
            suffix: bundleAffordance(bundle).toString(),
            ...info,
            relations: observedRelations(resourceUri, bundle, observed.relations ?? [], options),
        };

        log('Ingested observation', {
            uri: resourceUri.toString(),
            suffix: observedDelta.suffix,
            type: bundle.type,
            shouldCache: observed.shouldCache,
        });
        return { metadata, bundle, observed: observedDelta, shouldCache: observed.shouldCache };
    }

    /**
     * Find format adapter that can handle the MIME type
     * Returns first matching format (order matters)
     */
    private parseFragment(fragment: Fragment): FormattedFragment {
        const format = this.formats.find((candidate) => candidate.canHandle(fragment.mimeType));
        if (!format) {
            throw new IngestionError(`no format handles '${fragment.mimeType}'`, {
                extra: { availableFormats: this.formats.map((f) => f.name) },
            });
        }
        return format.parse(fragment);
    }

    private async ingestFragment(
        resourceUri: KnowledgeUri,
        formatted: FormattedFragment,
        fragment: Fragment,
        shouldCache: boolean,
        resolveLinks: LinkResolver,
    ): Promise<BundleBody> {
        const single = (text: string) =>
            makeSingleBody({
                uri: resourceUri,
                text,
                numTokens: this.tokenizer(text),
                mimeType: formatted.mimeType,
                description: formatted.description,
            });

        switch (formatted.mode) {
            case 'plain':
            case 'data':
                return single(shortenText(formatted.text, this.tokenizer, this.fragmentThreshold, this.fragmentTrimmed));
            case 'spreadsheet':
                return this.ingestSpreadsheet(resourceUri, formatted, single);
            case 'markup':
                break;
        }

        // Only documents that are cached get chunked.
        const trimmed = shouldCache ? formatted.text : shortenText(formatted.text, this.tokenizer, this.fragmentThreshold, this.fragmentTrimmed);
        const { text: withMedia, media } = ingestBlobs(resourceUri, trimmed, fragment.blobs);
        const text = await this.ingestLinks(withMedia, resolveLinks);

        if (!shouldCache) {
            const rendered = renderContent(parseContent(text));
            return makeSingleBody({ uri: resourceUri, text: rendered, numTokens: this.tokenizer(rendered), description: formatted.description, media });
        }
        return this.chunker.chunkBody(resourceUri, text, media, formatted.description);
    }

    private ingestSpreadsheet(resourceUri: KnowledgeUri, formatted: FormattedFragment, single: (text: string) => BundleBody): BundleBody {
        const sheets = splitSheets(formatted.text);
        if (sheets.length === 0 || this.tokenizer(formatted.text) <= this.spreadsheetThreshold) {
            return single(shortenText(formatted.text, this.tokenizer, this.spreadsheetThreshold, this.spreadsheetChunk));
        }

        return makeBody({
            uri: resourceUri,
            mimeType: formatted.mimeType,
            description: formatted.description,
            chunks: sheets.map((sheet, index) => {
                const text = `## ${sheet.heading}\n\n${shortenText(sheet.text, this.tokenizer, this.spreadsheetChunk)}`;
                return { indexes: [index], description: sheet.heading, text, numTokens: this.tokenizer(text) };
            }),
        });
    }

    /**
     * Point links to external URLs at their canonical Resource URI
     */
    private async ingestLinks(text: string, resolveLinks: LinkResolver): Promise<string> {
        const parts = parseContent(text);
        const { links, embeds } = extractReferences(parts);
        const urls = [...new Set([...links, ...embeds])].filter((href) => normalizeExternalUri(href) !== null).sort();
        if (urls.length === 0) {
            return text;
        }

        const replacements = await resolveLinks(urls);
        if (replacements.size === 0) {
            return text;
        }
        return renderContent(rewriteReferences(parts, (href) => replacements.get(href)?.toString() ?? null));
    }
}
