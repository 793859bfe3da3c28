import { ingestBlobs, observedRelations, shortenText, splitSheets } from '../domain/ingestion';
import { makeBody, type Bundle } from '../resources/bundles';
import { relationLink } from '../resources/relations';
import { KnowledgeUri } from '../uri/KnowledgeUri';

const uri = KnowledgeUri.parse('ndk://wiki/space/home');
const tokenizer = (text: string) => text.length;

describe('shortenText', () => {
    it('keeps text within the threshold', () => {
        expect(shortenText('short', tokenizer, 10)).toBe('short');
    });

    it('cuts whole lines and counts what was omitted', () => {
        expect(shortenText('aaaa\nbbbb\ncccc\n', tokenizer, 10)).toBe('aaaa\nbbbb\n\n... (1 lines omitted)');
    });

    it('cuts an oversized first line', () => {
        expect(shortenText('abcdefghij\nk', tokenizer, 5)).toBe('abcde\n\n... (1 lines omitted)');
    });
});

describe('ingestBlobs', () => {
    it('names media in order and anchors repeated blobs', () => {
        const text = [
            '![Chart](self://figures/chart 1.png)',
            '![Logo](self://logo.png) ![Logo](self://logo.png)',
            '![Other](self://other/chart_1.png)',
        ].join('\n\n');
        const { text: ingested, media } = ingestBlobs(uri, text, {
            'self://figures/chart 1.png': 'data:image/png;base64,AAAA',
            'self://logo.png': 'data:image/png;base64,LOGO',
            'self://other/chart_1.png': 'data:image/jpeg;base64,BBBB',
            'self://unused.png': 'data:image/png;base64,CCCC',
        });

        expect(ingested).toBe(
            [
                '![Chart](ndk://wiki/space/home/$media/chart_1.png)',
                '![Logo](#logo.png) ![Logo](#logo.png)',
                '![Other](ndk://wiki/space/home/$media/chart_1-2.png)',
            ].join('\n\n'),
        );
        expect(media).toEqual([
            { name: 'chart_1.png', description: null, placeholder: null, mimeType: 'image/png', blob: 'data:image/png;base64,AAAA' },
            { name: 'chart_1-2.png', description: null, placeholder: null, mimeType: 'image/jpeg', blob: 'data:image/jpeg;base64,BBBB' },
        ]);
    });

    it('drops blobs sharing their data', () => {
        const { text, media } = ingestBlobs(uri, '![a](self://a.png) ![b](self://b.png)', {
            'self://a.png': 'data:image/png;base64,SAME',
            'self://b.png': 'data:image/png;base64,SAME',
        });
        expect(text).toBe('![a](#a.png) ![b](#b.png)');
        expect(media).toEqual([]);
    });
});

describe('splitSheets', () => {
    it('splits on sheet headings', () => {
        expect(splitSheets('## Sheet1\na,b\n1,2\n\n## Sheet2\nc\n3')).toEqual([
            { heading: 'Sheet1', text: 'a,b\n1,2' },
            { heading: 'Sheet2', text: 'c\n3' },
        ]);
    });

    it('returns nothing for a single sheet', () => {
        expect(splitSheets('## Only\na,b')).toEqual([]);
        expect(splitSheets('a,b\n1,2')).toEqual([]);
    });
});

describe('observedRelations', () => {
    it('records collection members as children unless already related', () => {
        const collection: Bundle = {
            type: 'collection',
            uri: 'ndk://wiki/space/home/$collection',
            results: ['ndk://wiki/space/a', 'ndk://wiki/space/b', 'ndk://wiki/space/home'],
        };
        const reported = [relationLink(uri, KnowledgeUri.parse('ndk://wiki/space/a'))];
        const relations = observedRelations(uri, collection, reported, { relationsParent: true });
        expect(relations).toHaveLength(2);
        expect(relations).toContainEqual({ type: 'link', source: 'ndk://wiki/space/home', target: 'ndk://wiki/space/a' });
        expect(relations).toContainEqual({ type: 'parent', parent: 'ndk://wiki/space/home', child: 'ndk://wiki/space/b' });
    });

    it('ignores members without the option', () => {
        const collection: Bundle = { type: 'collection', uri: 'ndk://wiki/space/home/$collection', results: ['ndk://wiki/space/a'] };
        expect(observedRelations(uri, collection, [], {})).toEqual([]);
    });

    it('records links and embeds of a body', () => {
        const body = makeBody({
            uri,
            chunks: [
                {
                    indexes: [],
                    description: null,
                    text: '[x](ndk://jira/issue/PROJ-1/$body) ![e](ndk://wiki/space/img/$body) [self](ndk://wiki/space/home) [web](https://example.com)',
                    numTokens: 10,
                },
            ],
        });
        const relations = observedRelations(uri, body, [], { relationsLink: true });
        expect(relations).toHaveLength(2);
        expect(relations).toContainEqual({ type: 'link', source: 'ndk://wiki/space/home', target: 'ndk://jira/issue/PROJ-1' });
        expect(relations).toContainEqual({ type: 'embed', source: 'ndk://wiki/space/home', target: 'ndk://wiki/space/img/$body' });
    });
});
