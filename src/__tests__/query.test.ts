import { queryRequestSchema, QueryRequest, QueryResponse, ResourceInfo } from '../domain/actions';
import { StorageError, StoppedError } from '../errors';
import { IngestionPipeline } from '../pipelines';
import { relationParent, sortRelations } from '../resources/relations';
import type { Locator } from '../resources/types';
import { KnowledgeUri } from '../uri/KnowledgeUri';
import { createTestContext, createTestEngine, FakeConnector } from './helpers';

function actions(...raw: QueryRequest['actions']) {
    return queryRequestSchema.parse({ actions: raw }).actions;
}

function resourceAt(response: QueryResponse, index: number): ResourceInfo {
    const resource = response.resources[index];
    if (resource?.type !== 'resource') {
        throw new Error(`expected a resource at ${index}, got ${JSON.stringify(resource)}`);
    }
    return resource;
}

const HOME = 'ndk://wiki/docs/home';

describe('QueryEngine', () => {
    let wiki: FakeConnector;

    beforeEach(() => {
        wiki = new FakeConnector('wiki').add('home', { name: 'Home', revision: '1', body: 'Hello world.' });
    });

    describe('loading', () => {
        it('fetches and caches a resource on first load', async () => {
            const { engine, backend } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$body'] }));

            expect(wiki.calls).toEqual([`locator ${HOME}`, 'resolve home', 'observe home $body']);
            expect(response.resources).toHaveLength(1);
            const home = resourceAt(response, 0);
            expect(home.uri).toBe(HOME);
            expect(home.attributes).toEqual({
                name: 'Home',
                mimeType: null,
                description: null,
                citationUrl: 'https://wiki.test/docs/home',
                createdAt: null,
                updatedAt: null,
                revisionData: '1',
                revisionMeta: null,
            });
            expect(home.aliases).toEqual(['https://wiki.test/docs/home']);
            expect(home.affordances.map((info) => info.suffix)).toEqual(['$body']);
            expect(home.relations).toBeNull();
            expect(response.observations).toEqual([
                { type: 'body', uri: `${HOME}/$body`, description: 'Hello world.', content: 'Hello world.', sections: [], chunks: [] },
            ]);
            expect(await backend.list('v1/resource/')).toEqual(['v1/resource/wiki/docs/home.yml']);
        });

        it('serves an unchanged revision from the cache', async () => {
            const { engine } = createTestEngine([wiki]);
            await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$body'] }));
            wiki.calls.length = 0;

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$body'] }));

            expect(wiki.calls).toEqual(['resolve home']);
            expect(response.observations).toMatchObject([{ type: 'body', content: 'Hello world.' }]);
        });

        it('observes again when the revision changed', async () => {
            const { engine } = createTestEngine([wiki]);
            await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$body'] }));
            wiki.add('home', { name: 'Home', revision: '2', body: 'Changed.' });
            wiki.calls.length = 0;

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$body'] }));

            expect(wiki.calls).toEqual(['resolve home', 'observe home $body']);
            expect(response.observations).toMatchObject([{ type: 'body', content: 'Changed.' }]);
            expect(resourceAt(response, 0).attributes.revisionData).toBe('2');
        });

        it('observes again in force mode even when unchanged', async () => {
            const { engine } = createTestEngine([wiki]);
            await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$body'] }));
            wiki.calls.length = 0;

            await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, load_mode: 'force', observe: ['$body'] }));

            expect(wiki.calls).toEqual(['resolve home', 'observe home $body']);
        });

        it('never calls the connector in none mode', async () => {
            const { engine } = createTestEngine([wiki]);
            await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$body'] }));
            wiki.calls.length = 0;

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, load_mode: 'none', observe: ['$body'] }));

            expect(wiki.calls).toEqual([]);
            expect(resourceAt(response, 0).attributes.name).toBe('Home');
            expect(response.observations).toMatchObject([{ type: 'body', content: 'Hello world.' }]);
        });

        it('reports an uncached resource as unavailable in none mode', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, load_mode: 'none' }));

            expect(wiki.calls).toEqual([]);
            expect(response.resources).toMatchObject([{ type: 'error', uri: HOME, error: { code: 404, message: 'Not Found: unavailable' } }]);
        });

        it('keeps resources the connector marks uncacheable out of storage', async () => {
            wiki.add('live', { name: 'Live', body: 'Now.', shouldCache: false });
            const { engine, backend } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: 'ndk://wiki/docs/live', observe: ['$body'] }));

            expect(response.observations).toMatchObject([{ type: 'body', content: 'Now.' }]);
            expect(backend.size).toBe(0);
        });
    });

    describe('external URLs', () => {
        it('maps a URL to its resource and remembers the alias', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: 'https://wiki.test/docs/home' }));

            expect(resourceAt(response, 0).uri).toBe(HOME);
            expect(resourceAt(response, 0).aliases).toEqual(['https://wiki.test/docs/home']);
            expect(wiki.calls).toEqual(['locator https://wiki.test/docs/home', 'resolve home', 'observe home $body']);

            wiki.calls.length = 0;
            await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: 'https://wiki.test/docs/home' }));
            expect(wiki.calls).toEqual(['resolve home']);
        });

        it('reports a URL nobody claims with the URL as requested', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: 'https://elsewhere.test/page' }));

            expect(response.resources).toMatchObject([{ type: 'error', uri: 'https://elsewhere.test/page', error: { code: 404 } }]);
        });
    });

    describe('observing', () => {
        it('returns a single chunk of a chunked document', async () => {
            wiki.add('guide', { revision: '1', body: '# A\n\naaaa aaaa aaaa aaaa\n\n# B\n\nbbbb bbbb bbbb bbbb' });
            const pipeline = new IngestionPipeline({ tokenizer: (text) => text.length, chunkingThresholdTokens: 10, maxChunkTokens: 40 });
            const { engine } = createTestEngine([wiki], pipeline);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/observe', uri: 'ndk://wiki/docs/guide/$chunk/01' }));

            expect(response.observations).toEqual([
                { type: 'chunk', uri: 'ndk://wiki/docs/guide/$chunk/01', description: 'B', text: '# B\n\nbbbb bbbb bbbb bbbb' },
            ]);
        });

        it('requires a suffix', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/observe', uri: HOME }));

            expect(response.resources).toMatchObject([
                { type: 'error', uri: HOME, error: { code: 400, message: `Bad Request: expected an affordance or observable URI: ${HOME}` } },
            ]);
        });

        it('reports an unsupported affordance per observation', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$file'] }));

            expect(resourceAt(response, 0).uri).toBe(HOME);
            expect(response.observations).toMatchObject([
                { type: 'error', uri: `${HOME}/$file`, error: { code: 400, message: 'Bad Request: unsupported capability: $file' } },
            ]);
        });

        it('reports an unknown chunk as unavailable', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/observe', uri: `${HOME}/$chunk/07` }));

            expect(response.observations).toMatchObject([{ type: 'error', uri: `${HOME}/$chunk/07`, error: { code: 404 } }]);
        });
    });

    describe('request errors', () => {
        it('rejects malformed references', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: 'not a uri' }));

            expect(response).toMatchObject({
                resources: [{ type: 'error', uri: 'not a uri', error: { code: 400, message: 'Bad Request: invalid URI: not a uri' } }],
                observations: [],
            });
        });

        it('reports a resource that no longer exists', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: 'ndk://wiki/docs/missing' }));

            expect(response.resources).toMatchObject([{ type: 'error', uri: 'ndk://wiki/docs/missing', error: { code: 404 } }]);
        });

        it('forwards the kind of a connector failure while locating', async () => {
            class ThrottledConnector extends FakeConnector {
                async locator(): Promise<Locator | null> {
                    throw new StorageError('rate limited', true);
                }
            }
            const { engine } = createTestEngine([new ThrottledConnector('wiki')]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME }));

            expect(response.resources).toMatchObject([
                { type: 'error', uri: HOME, error: { code: 503, message: 'Storage Error: rate limited', data: { kind: 'retryable' } } },
            ]);
        });

        it('keeps other actions going when one fails', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(
                createTestContext(),
                actions({ method: 'resources/load', uri: 'ndk://wiki/docs/missing' }, { method: 'resources/load', uri: HOME }),
            );

            expect(response.resources.map((resource) => `${resource.type} ${resource.uri}`)).toEqual(['error ndk://wiki/docs/missing', `resource ${HOME}`]);
        });

        it('aborts the whole query when cancelled', async () => {
            const { engine } = createTestEngine([wiki]);
            const controller = new AbortController();
            controller.abort();

            await expect(engine.execute(createTestContext({}, { signal: controller.signal }), actions({ method: 'resources/load', uri: HOME }))).rejects.toBeInstanceOf(
                StoppedError,
            );
        });
    });

    describe('expansion', () => {
        beforeEach(() => {
            wiki.add('root', { name: 'Root', members: ['a', 'b'] }).add('a', { revision: '1', body: 'Alpha.' }).add('b', { revision: '1', body: 'Beta.' });
        });

        it('follows collection members one level deep', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(
                createTestContext(),
                actions({ method: 'resources/load', uri: 'ndk://wiki/docs/root', expand_depth: 1, expand_mode: 'auto' }),
            );

            expect(response.resources.map((resource) => resource.uri)).toEqual(['ndk://wiki/docs/root', 'ndk://wiki/docs/a', 'ndk://wiki/docs/b']);
            const root = KnowledgeUri.parse('ndk://wiki/docs/root');
            expect(resourceAt(response, 0).relations).toEqual(
                sortRelations([relationParent(root, KnowledgeUri.parse('ndk://wiki/docs/a')), relationParent(root, KnowledgeUri.parse('ndk://wiki/docs/b'))]),
            );
            expect(resourceAt(response, 1).relations).toBeNull();
            expect(wiki.calls.filter((call) => call.startsWith('observe')).sort()).toEqual([
                'observe a $body',
                'observe b $body',
                'observe root $collection',
            ]);
        });

        it('only follows cached resources with expand_mode none', async () => {
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: 'ndk://wiki/docs/root', expand_depth: 1 }));

            expect(response.resources.map((resource) => resource.uri)).toEqual(['ndk://wiki/docs/root']);
            expect(wiki.calls).not.toContain('resolve a');
        });

        it('rewrites links to known resources without loading them', async () => {
            wiki.add('guide', { revision: '1', body: 'Guide.' }).add('home', { revision: '1', body: 'See [the guide](https://wiki.test/docs/guide) first' });
            const { engine } = createTestEngine([wiki]);

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$body'] }));

            expect(response.resources.map((resource) => resource.uri)).toEqual([HOME]);
            expect(response.observations).toMatchObject([{ type: 'body', content: 'See [the guide](ndk://wiki/docs/guide) first' }]);
            expect(wiki.calls).not.toContain('observe guide $body');
        });
    });

    describe('attachments', () => {
        it('stores an uploaded text and serves it when the connector cannot', async () => {
            const { engine } = createTestEngine([wiki]);

            const upload = await engine.execute(
                createTestContext(),
                actions({ method: 'resources/attachment', uri: HOME, name: 'notes.txt', data: { type: 'plain', text: 'remember this' } }),
            );
            expect(resourceAt(upload, 0).attributes.name).toBe('notes.txt');

            const response = await engine.execute(createTestContext(), actions({ method: 'resources/load', uri: HOME, observe: ['$plain'] }));

            expect(response.observations).toEqual([{ type: 'plain', uri: `${HOME}/$plain`, mimeType: 'text/plain', text: 'remember this' }]);
            expect(resourceAt(response, 0).affordances.map((info) => info.suffix)).toEqual(['$body', '$plain']);
        });
    });
});
