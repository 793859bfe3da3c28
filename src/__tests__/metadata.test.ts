import { IngestionError } from '../errors';
import { diffMetadata, isEmptyMetadata, makeResourceDelta, ResourceHistory, withUpdate } from '../resources/metadata';
import { relationLink, relationParent } from '../resources/relations';
import type { Locator } from '../resources/types';
import { KnowledgeUri } from '../uri/KnowledgeUri';

const locator: Locator = { realm: 'wiki', kind: 'page', id: '42' };
const uri = KnowledgeUri.parse('ndk://wiki/space/home');

describe('metadata deltas', () => {
    it('withUpdate overwrites present fields only', () => {
        expect(withUpdate({ name: 'a', mimeType: 'text/plain' }, { name: 'b' })).toEqual({ name: 'b', mimeType: 'text/plain' });
    });

    it('diffMetadata keeps changed fields', () => {
        expect(diffMetadata({ name: 'a', revisionData: '2' }, { name: 'a', revisionData: '1' })).toEqual({ revisionData: '2' });
        expect(isEmptyMetadata(diffMetadata({ name: 'a', aliases: ['x'] }, { name: 'a', aliases: ['x'] }))).toBe(true);
    });
});

describe('ResourceHistory', () => {
    it('requires a locator in the first delta', () => {
        const history = new ResourceHistory();
        expect(() => history.update(makeResourceDelta({ refreshedAt: '2024-01-01T00:00:00.000Z' }))).toThrow(IngestionError);
    });

    it('appends only what changed', () => {
        const history = new ResourceHistory();
        expect(history.update(makeResourceDelta({ refreshedAt: 't1', locator, metadata: { name: 'Home', revisionData: '1' } }))).toBe(true);
        expect(history.update(makeResourceDelta({ refreshedAt: 't2', locator, metadata: { name: 'Home', revisionData: '1' } }))).toBe(false);
        expect(history.history).toHaveLength(1);

        expect(history.update(makeResourceDelta({ refreshedAt: 't3', locator, metadata: { name: 'Home', revisionData: '2' } }))).toBe(true);
        expect(history.history).toHaveLength(2);
        expect(history.history[1].locator).toBeUndefined();
        expect(history.history[1].metadata).toEqual({ revisionData: '2' });
        expect(history.merged().metadata).toEqual({ name: 'Home', revisionData: '2' });
    });

    it('clears expired affordances once observed again', () => {
        const history = new ResourceHistory();
        history.update(makeResourceDelta({ refreshedAt: 't1', locator, observed: [{ suffix: '$body', mimeType: 'text/markdown' }] }));
        expect(history.update(makeResourceDelta({ refreshedAt: 't2', expired: ['$body'] }))).toBe(true);
        expect(history.merged().expired).toEqual(['$body']);

        expect(history.update(makeResourceDelta({ refreshedAt: 't3', observed: [{ suffix: '$body', mimeType: 'text/markdown' }] }))).toBe(true);
        expect(history.merged().expired).toEqual([]);
    });

    it('resets labels by name', () => {
        const history = new ResourceHistory();
        history.update(makeResourceDelta({ refreshedAt: 't1', locator, labels: [{ name: 'status', target: '$body', value: 'open' }] }));
        expect(history.allLabels()).toEqual([{ name: 'status', target: '$body', value: 'open' }]);

        expect(history.update(makeResourceDelta({ refreshedAt: 't2', resetLabels: ['status'] }))).toBe(true);
        expect(history.allLabels()).toEqual([]);
        expect(history.update(makeResourceDelta({ refreshedAt: 't3', resetLabels: ['status'] }))).toBe(false);
    });

    it('falls back to the last path segment and the citation fallback', () => {
        const history = new ResourceHistory();
        history.update(makeResourceDelta({ refreshedAt: 't1', locator }));
        expect(history.allAttributes(uri, 'https://wiki.example.com/42')).toEqual({
            name: 'home',
            mimeType: null,
            description: null,
            citationUrl: 'https://wiki.example.com/42',
            createdAt: null,
            updatedAt: null,
            revisionData: null,
            revisionMeta: null,
        });
    });

    it('enriches declared affordances with observed sections', () => {
        const history = new ResourceHistory();
        const sections = [{ type: 'chunk' as const, path: ['00'], heading: 'Intro' }];
        history.update(
            makeResourceDelta({
                refreshedAt: 't1',
                locator,
                metadata: {
                    affordances: [
                        { suffix: '$file', mimeType: 'application/pdf' },
                        { suffix: '$body', mimeType: 'text/markdown' },
                    ],
                },
                observed: [{ suffix: '$body', mimeType: 'text/markdown', sections }],
            }),
        );
        expect(history.allAffordances()).toEqual([
            { suffix: '$body', mimeType: 'text/markdown', description: null, sections, observations: [] },
            { suffix: '$file', mimeType: 'application/pdf' },
        ]);
    });

    it('collects relations from metadata and observations', () => {
        const other = KnowledgeUri.parse('ndk://wiki/space/other');
        const parent = KnowledgeUri.parse('ndk://wiki/space/root');
        const link = relationLink(KnowledgeUri.parse('ndk://wiki/space/home/$body'), other);
        const history = new ResourceHistory();
        history.update(
            makeResourceDelta({
                refreshedAt: 't1',
                locator,
                metadata: { relations: [relationParent(parent, uri)] },
                observed: [{ suffix: '$body', relations: [link, link] }],
            }),
        );
        const relations = history.allRelations();
        expect(relations).toHaveLength(2);
        expect(relations).toContainEqual({ type: 'parent', parent: 'ndk://wiki/space/root', child: 'ndk://wiki/space/home' });
        expect(relations).toContainEqual({ type: 'link', source: 'ndk://wiki/space/home/$body', target: 'ndk://wiki/space/other' });
    });

    it('survives a serialization round trip', () => {
        const history = new ResourceHistory();
        history.update(makeResourceDelta({ refreshedAt: 't1', locator, metadata: { name: 'Home' } }));
        history.update(makeResourceDelta({ refreshedAt: 't2', expired: ['$body'] }));
        const restored = ResourceHistory.fromJSON(JSON.parse(JSON.stringify(history.toJSON())));
        expect(restored.history).toHaveLength(2);
        expect(restored.merged()).toEqual(history.merged());
    });
});
