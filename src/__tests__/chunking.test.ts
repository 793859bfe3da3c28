import { stringify as stringifyYaml } from 'yaml';
import { Chunker, estimateTokens } from '../domain/chunking';
import { Bundle, readObservations } from '../resources/bundles';
import { KnowledgeStore, observedKey } from '../storage/KnowledgeStore';
import { MemoryBackend } from '../storage/MemoryBackend';
import { KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import { createTestContext } from './helpers';

const uri = KnowledgeUri.parse('ndk://wiki/space/guide');
/** One token per character keeps budgets easy to follow */
const tokenizer = (text: string) => text.length;

describe('estimateTokens', () => {
    it('counts about four characters per token', () => {
        expect(estimateTokens('')).toBe(0);
        expect(estimateTokens('abcd')).toBe(1);
        expect(estimateTokens('abcde')).toBe(2);
    });
});

describe('Chunker', () => {
    it('keeps short documents in a single chunk', () => {
        const chunker = new Chunker({ tokenizer, thresholdTokens: 100, maxChunkTokens: 40 });
        const body = chunker.chunkBody(uri, '# Hi\n\nshort text');
        expect(body.uri).toBe('ndk://wiki/space/guide/$body');
        expect(body.sections).toEqual([]);
        expect(body.chunks).toEqual([{ indexes: [], description: null, text: '# Hi\n\nshort text', numTokens: 16 }]);

        expect(readObservations(body, Observable.body())).toEqual([
            {
                type: 'body',
                uri: 'ndk://wiki/space/guide/$body',
                description: null,
                content: '# Hi\n\nshort text',
                sections: [],
                chunks: [],
            },
        ]);
    });

    it('splits on headings when over the threshold', () => {
        const chunker = new Chunker({ tokenizer, thresholdTokens: 10, maxChunkTokens: 40 });
        const body = chunker.chunkBody(uri, '# A\n\naaaa aaaa aaaa aaaa\n\n# B\n\nbbbb bbbb bbbb bbbb');
        expect(body.sections).toEqual([]);
        expect(body.chunks).toEqual([
            { indexes: [0], description: 'A', text: '# A\n\naaaa aaaa aaaa aaaa', numTokens: 24 },
            { indexes: [1], description: 'B', text: '# B\n\nbbbb bbbb bbbb bbbb', numTokens: 24 },
        ]);

        const [observation] = readObservations(body, Observable.body());
        expect(observation).toEqual({
            type: 'body',
            uri: 'ndk://wiki/space/guide/$body',
            description: null,
            content: null,
            sections: [],
            chunks: [
                { suffix: '$chunk/00', numTokens: 24, mimeType: 'text/markdown', description: 'A' },
                { suffix: '$chunk/01', numTokens: 24, mimeType: 'text/markdown', description: 'B' },
            ],
        });
    });

    it('nests sections that exceed the chunk budget', () => {
        const chunker = new Chunker({ tokenizer, thresholdTokens: 10, maxChunkTokens: 30 });
        const body = chunker.chunkBody(uri, '# Guide\n\n## One\n\naaaa aaaa aaaa aaaa\n\n## Two\n\nbbbb bbbb bbbb bbbb');
        expect(body.sections).toEqual([{ indexes: [0], heading: 'Guide' }]);
        expect(body.chunks).toEqual([
            { indexes: [0, 0], description: 'One', text: '## One\n\naaaa aaaa aaaa aaaa', numTokens: 27 },
            { indexes: [0, 1], description: 'Two', text: '## Two\n\nbbbb bbbb bbbb bbbb', numTokens: 27 },
        ]);

        expect(readObservations(body, Observable.chunk([0])).map((observation) => observation.uri)).toEqual([
            'ndk://wiki/space/guide/$chunk/00/00',
            'ndk://wiki/space/guide/$chunk/00/01',
        ]);
    });

    it('packs paragraphs without headings up to the budget', () => {
        const chunker = new Chunker({ tokenizer, thresholdTokens: 10, maxChunkTokens: 25 });
        const body = chunker.chunkBody(uri, 'aaaa aaaa\n\nbbbb bbbb\n\ncccc cccc');
        expect(body.chunks.map((chunk) => [chunk.indexes, chunk.text])).toEqual([
            [[0], 'aaaa aaaa\n\nbbbb bbbb'],
            [[1], 'cccc cccc'],
        ]);
    });

    it('keeps paragraphs exactly at the budget in one chunk', () => {
        // Each paragraph counts its 9 characters plus one newline.
        const text = 'aaaa aaaa\n\nbbbb bbbb';

        const atBudget = new Chunker({ tokenizer, thresholdTokens: 10, maxChunkTokens: 20 }).chunkBody(uri, text);
        expect(atBudget.chunks).toEqual([{ indexes: [0], description: 'aaaa aaaa', text: 'aaaa aaaa\n\nbbbb bbbb', numTokens: 20 }]);

        const overBudget = new Chunker({ tokenizer, thresholdTokens: 10, maxChunkTokens: 19 }).chunkBody(uri, text);
        expect(overBudget.chunks.map((chunk) => [chunk.indexes, chunk.text])).toEqual([
            [[0], 'aaaa aaaa'],
            [[1], 'bbbb bbbb'],
        ]);
    });

    it('produces the same chunks for the same body and budget', async () => {
        const text = '# Guide\n\n## One\n\naaaa aaaa aaaa aaaa\n\n## Two\n\nbbbb bbbb bbbb bbbb\n\ncccc';
        const options = { tokenizer, thresholdTokens: 10, maxChunkTokens: 30 };
        const first = new Chunker(options).chunkBody(uri, text);
        const second = new Chunker(options).chunkBody(uri, text);
        expect(second).toEqual(first);

        const backend = new MemoryBackend();
        await backend.put(observedKey(uri, Observable.body()), stringifyYaml(first));
        const stored = await new KnowledgeStore(backend, 'test').readBundle(createTestContext(), uri, Observable.body());
        expect(stored).toEqual(first);

        const chunkUris = (body: Bundle) => readObservations(body, Observable.chunk([0])).map((observation) => observation.uri);
        expect(stored ? chunkUris(stored) : null).toEqual(['ndk://wiki/space/guide/$chunk/00/00', 'ndk://wiki/space/guide/$chunk/00/01']);
    });

    it('keeps only media the chunks refer to', () => {
        const chunker = new Chunker({ tokenizer, thresholdTokens: 1000, maxChunkTokens: 1000 });
        const media = (name: string) => ({ name, description: null, placeholder: 'Figure', mimeType: 'image/png', blob: 'data:image/png;base64,AAAA' });
        const body = chunker.chunkBody(uri, 'Intro\n\n![Figure](ndk://wiki/space/guide/$media/figure.png)', [media('figure.png'), media('unused.png')]);
        expect(body.media.map((item) => item.name)).toEqual(['figure.png']);

        expect(readObservations(body, Observable.body()).map((observation) => observation.type)).toEqual(['body', 'media']);
        expect(readObservations(body, Observable.media(['figure.png']))).toEqual([
            {
                type: 'media',
                uri: 'ndk://wiki/space/guide/$media/figure.png',
                description: null,
                placeholder: 'Figure',
                mimeType: 'image/png',
                blob: 'data:image/png;base64,AAAA',
            },
        ]);
        expect(() => readObservations(body, Observable.media(['unused.png']))).toThrow('Not Found: unavailable');
    });
});
