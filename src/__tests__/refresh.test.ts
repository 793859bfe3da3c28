import { generateRefreshId, REFRESH_ID_PATTERN, RefreshJob } from '../domain/refresh';
import { StorageError, StoppedError } from '../errors';
import type { Locator } from '../resources/types';
import { refreshKey } from '../storage/KnowledgeStore';
import { createTestContext, createTestEngine, FakeConnector } from './helpers';

const refreshId = (last: string) => `refresh-${'0'.repeat(31)}${last}`;

class BrokenConnector extends FakeConnector {
    async refresh(): Promise<Locator[]> {
        this.calls.push('refresh');
        throw new StorageError('down', true);
    }
}

function createJob(connectors: FakeConnector[]) {
    const setup = createTestEngine(connectors);
    return { ...setup, job: new RefreshJob(setup.registry, setup.store, setup.engine.resolver) };
}

describe('generateRefreshId', () => {
    it('starts with the seconds since 2024 in base36', () => {
        const id = generateRefreshId(new Date('2024-01-01T00:00:36Z'));
        expect(id).toMatch(REFRESH_ID_PATTERN);
        expect(id.startsWith('refresh-000010')).toBe(true);
    });

    it('sorts later ids after earlier ones', () => {
        expect(generateRefreshId(new Date('2025-06-01T00:00:00Z')) > generateRefreshId(new Date('2025-05-31T23:59:59Z'))).toBe(true);
    });
});

describe('RefreshJob', () => {
    let wiki: FakeConnector;

    beforeEach(() => {
        wiki = new FakeConnector('wiki').add('home', { body: 'Home.' }).add('a', { body: 'A.' }).add('b', { body: 'B.' });
    });

    it('records changed resources and returns the accessible ones', async () => {
        const { job, backend, store } = createJob([wiki]);
        wiki.changed = ['home', 'gone'];

        const response = await job.execute(createTestContext(), [], {}, refreshId('1'));

        expect(response).toEqual({ refreshId: refreshId('1'), uris: ['ndk://wiki/docs/home'] });
        expect(await backend.get(refreshKey('wiki', refreshId('1')))).toBe('ndk://wiki/docs/gone\nndk://wiki/docs/home');
        expect(await store.readAlias(createTestContext(), 'ndk://wiki/docs/home')).toEqual({ realm: 'wiki', kind: 'doc', id: 'home' });
    });

    it('adds resources changed since the previous refresh', async () => {
        const { job } = createJob([wiki]);
        wiki.changed = ['a'];
        await job.execute(createTestContext(), [], {}, refreshId('1'));
        wiki.changed = ['b'];
        wiki.calls.length = 0;

        const response = await job.execute(createTestContext(), [], { wiki: refreshId('0') }, refreshId('2'));

        expect(response.uris).toEqual(['ndk://wiki/docs/a', 'ndk://wiki/docs/b']);
        expect(wiki.calls).toEqual(['refresh', 'resolve b', 'resolve a']);
    });

    it('skips refreshes at or before the previous id', async () => {
        const { job } = createJob([wiki]);
        wiki.changed = ['a'];
        await job.execute(createTestContext(), [], {}, refreshId('1'));
        wiki.changed = [];

        const response = await job.execute(createTestContext(), [], { wiki: refreshId('1') }, refreshId('2'));

        expect(response.uris).toEqual([]);
    });

    it('only asks the requested realms', async () => {
        const tracker = new FakeConnector('tracker');
        const { job } = createJob([wiki, tracker]);
        wiki.changed = ['home'];

        await job.execute(createTestContext(), ['wiki'], {});

        expect(wiki.calls[0]).toBe('refresh');
        expect(tracker.calls).toEqual([]);
    });

    it('keeps other realms going when a connector fails', async () => {
        const tracker = new BrokenConnector('tracker');
        const { job } = createJob([wiki, tracker]);
        wiki.changed = ['home'];

        const response = await job.execute(createTestContext(), [], {});

        expect(tracker.calls).toEqual(['refresh']);
        expect(response.uris).toEqual(['ndk://wiki/docs/home']);
    });

    it('stops when the request is cancelled', async () => {
        const { job } = createJob([wiki]);
        const controller = new AbortController();
        controller.abort();

        await expect(job.execute(createTestContext({}, { signal: controller.signal }), [], {})).rejects.toBeInstanceOf(StoppedError);
        expect(wiki.calls).toEqual([]);
    });
});
