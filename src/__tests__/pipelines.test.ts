import { vi } from 'vitest';
import type { Fragment, ObserveResult } from '../connectors/types';
import { IngestionError } from '../errors';
import { MarkdownFormat } from '../formats/MarkdownFormat';
import { IngestionPipeline, type LinkResolver } from '../pipelines';
import { KnowledgeUri } from '../uri/KnowledgeUri';

const uri = KnowledgeUri.parse('ndk://wiki/space/home');
const tokenizer = (text: string) => text.length;
const noLinks: LinkResolver = async () => new Map();

function observed(mimeType: string, text: string, fields: Partial<ObserveResult> = {}): ObserveResult {
    const fragment: Fragment = { type: 'fragment', mimeType, text, blobs: {} };
    return { bundle: fragment, shouldCache: true, ...fields };
}

describe('IngestionPipeline', () => {
    it('requires at least one format', () => {
        expect(() => new IngestionPipeline({ formats: [] })).toThrow('at least one format adapter');
    });

    it('ingests markdown with front-matter and canonical links', async () => {
        const pipeline = new IngestionPipeline({ tokenizer, chunkingThresholdTokens: 1000, maxChunkTokens: 1000 });
        const resolveLinks = vi.fn<LinkResolver>(async (urls) => new Map(urls.map((url) => [url, KnowledgeUri.parse('ndk://jira/issue/PROJ-1')])));
        const text = '---\nname: Onboarding\ndescription: How to start\n---\n# Welcome\n\nRead [the ticket](https://tracker.test/PROJ-1) first.';

        const result = await pipeline.ingest(uri, observed('text/markdown', text, { options: { relationsLink: true } }), resolveLinks);

        const expectedText = '# Welcome\n\nRead [the ticket](ndk://jira/issue/PROJ-1) first.';
        expect(resolveLinks).toHaveBeenCalledWith(['https://tracker.test/PROJ-1']);
        expect(result.metadata).toEqual({ name: 'Onboarding', description: 'How to start' });
        expect(result.bundle).toEqual({
            type: 'body',
            uri: 'ndk://wiki/space/home/$body',
            mimeType: 'text/markdown',
            description: 'How to start',
            sections: [],
            chunks: [{ indexes: [], description: null, text: expectedText, numTokens: expectedText.length }],
            media: [],
        });
        expect(result.observed.suffix).toBe('$body');
        expect(result.observed.relations).toEqual([{ type: 'link', source: 'ndk://wiki/space/home', target: 'ndk://jira/issue/PROJ-1' }]);
        expect(result.shouldCache).toBe(true);
    });

    it('lets observed metadata override front-matter', async () => {
        const pipeline = new IngestionPipeline();
        const result = await pipeline.ingest(
            uri,
            observed('text/markdown', '---\nname: From text\n---\nBody.', { metadata: { name: 'From connector', revisionData: '7' } }),
            noLinks,
        );
        expect(result.metadata).toEqual({ name: 'From connector', revisionData: '7' });
    });

    it('keeps only the selected metadata fields', async () => {
        const pipeline = new IngestionPipeline();
        const result = await pipeline.ingest(
            uri,
            observed('text/plain', 'hello', { metadata: { name: 'x', revisionData: '7' }, options: { fields: ['revisionData'] } }),
            noLinks,
        );
        expect(result.metadata).toEqual({ revisionData: '7' });
    });

    it('does not chunk documents that are not cached', async () => {
        const pipeline = new IngestionPipeline({ tokenizer, chunkingThresholdTokens: 10, maxChunkTokens: 20 });
        const result = await pipeline.ingest(uri, observed('text/markdown', '# A\n\naaaa aaaa aaaa\n\n# B\n\nbbbb bbbb bbbb', { shouldCache: false }), noLinks);
        expect(result.bundle.type === 'body' && result.bundle.chunks.map((chunk) => chunk.indexes)).toEqual([[]]);
        expect(result.shouldCache).toBe(false);
    });

    it('keeps data in a single chunk and trims it', async () => {
        const pipeline = new IngestionPipeline({ tokenizer, fragmentThresholdTokens: 10, fragmentTrimmedTokens: 8 });
        const result = await pipeline.ingest(uri, observed('text/csv', 'a,b\r\n1,2\r\n3,4\r\n5,6'), noLinks);
        expect(result.bundle).toMatchObject({
            type: 'body',
            mimeType: 'text/csv',
            chunks: [{ indexes: [], text: 'a,b\n1,2\n\n... (2 lines omitted)' }],
        });
    });

    it('splits large spreadsheets into one chunk per sheet', async () => {
        const pipeline = new IngestionPipeline({ tokenizer, spreadsheetThresholdTokens: 10, spreadsheetChunkTokens: 100 });
        const mimeType = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
        const result = await pipeline.ingest(uri, observed(mimeType, '## Sheet1\na,b\n1,2\n\n## Sheet2\nc\n3'), noLinks);
        expect(result.bundle.type === 'body' && result.bundle.chunks).toEqual([
            { indexes: [0], description: 'Sheet1', text: '## Sheet1\n\na,b\n1,2', numTokens: 18 },
            { indexes: [1], description: 'Sheet2', text: '## Sheet2\n\nc\n3', numTokens: 14 },
        ]);
    });

    it('passes bundles through and derives their relations', async () => {
        const pipeline = new IngestionPipeline();
        const result = await pipeline.ingest(
            uri,
            {
                bundle: { type: 'collection', uri: 'ndk://wiki/space/home/$collection', results: ['ndk://wiki/space/child'] },
                shouldCache: true,
                options: { relationsParent: true },
            },
            noLinks,
        );
        expect(result.observed).toEqual({
            suffix: '$collection',
            relations: [{ type: 'parent', parent: 'ndk://wiki/space/home', child: 'ndk://wiki/space/child' }],
        });
    });

    it('rejects bundles of another resource', async () => {
        const pipeline = new IngestionPipeline();
        const bundle = { type: 'plain' as const, uri: 'ndk://wiki/space/other/$plain', mimeType: 'text/plain', text: 'x' };
        await expect(pipeline.ingest(uri, { bundle, shouldCache: true }, noLinks)).rejects.toThrow(IngestionError);
    });

    it('rejects fragments no format handles', async () => {
        const pipeline = new IngestionPipeline({ formats: [new MarkdownFormat()] });
        await expect(pipeline.ingest(uri, observed('application/pdf', '%PDF'), noLinks)).rejects.toThrow("no format handles 'application/pdf'");
    });
});
