import { compareRevisions, decideCache, staleAffordances } from '../domain/cache-decision';
import type { ResourceView } from '../resources/metadata';

function view(fields: Partial<ResourceView> = {}): ResourceView {
    return {
        locator: { realm: 'wiki', kind: 'page', id: '1' },
        expired: [],
        labels: [],
        metadata: {},
        observed: [],
        ...fields,
    };
}

function observed(suffix: string) {
    return { suffix, mimeType: undefined, sections: [], observations: [], relations: [] };
}

describe('compareRevisions', () => {
    it('prefers revisionData', () => {
        expect(compareRevisions({ revisionData: 'a', updatedAt: 'x' }, { revisionData: 'a', updatedAt: 'y' })).toBe('valid');
        expect(compareRevisions({ revisionData: 'a', updatedAt: 'x' }, { revisionData: 'b', updatedAt: 'x' })).toBe('stale');
    });

    it('uses revisionMeta only when neither side has revisionData', () => {
        expect(compareRevisions({ revisionMeta: 'm' }, { revisionMeta: 'm' })).toBe('valid');
        expect(compareRevisions({ revisionMeta: 'm' }, { revisionMeta: 'n' })).toBe('stale');
        expect(compareRevisions({ revisionData: 'a', revisionMeta: 'm' }, { revisionMeta: 'm' })).toBe('stale');
    });

    it('falls back to updatedAt equality', () => {
        expect(compareRevisions({ updatedAt: '2024-01-01' }, { updatedAt: '2024-01-01' })).toBe('valid');
        expect(compareRevisions({ updatedAt: '2024-01-02' }, { updatedAt: '2024-01-01' })).toBe('stale');
    });

    it('treats missing signals as stale', () => {
        expect(compareRevisions({}, {})).toBe('stale');
        expect(compareRevisions({ name: 'a' }, { name: 'a' })).toBe('stale');
    });
});

describe('staleAffordances', () => {
    it('expires $body when supported, plus every observed affordance', () => {
        const cached = view({ observed: [observed('$chunk'), observed('$file')] });
        expect(staleAffordances(cached, { affordances: [{ suffix: '$body' }, { suffix: '$file' }] })).toEqual(['$body', '$chunk', '$file']);
    });

    it('falls back to cached affordances', () => {
        const cached = view({ metadata: { affordances: [{ suffix: '$body' }] } });
        expect(staleAffordances(cached, {})).toEqual(['$body']);
        expect(staleAffordances(view(), {})).toEqual([]);
    });
});

describe('decideCache', () => {
    it('reports absent without a cached view', () => {
        expect(decideCache('auto', null, { revisionData: '1' })).toEqual({ state: 'absent', expired: [] });
        expect(decideCache('force', null, { revisionData: '1' })).toEqual({ state: 'absent', expired: [] });
    });

    it('trusts an unchanged revision in auto mode', () => {
        const cached = view({ metadata: { revisionData: '1', affordances: [{ suffix: '$body' }] }, observed: [observed('$body')] });
        expect(decideCache('auto', cached, { revisionData: '1' })).toEqual({ state: 'valid', expired: [] });
        expect(decideCache('auto', cached, { revisionData: '2' })).toEqual({ state: 'stale', expired: ['$body'] });
    });

    it('always refreshes in force mode', () => {
        const cached = view({ metadata: { revisionData: '1' }, observed: [observed('$collection')] });
        expect(decideCache('force', cached, { revisionData: '1' })).toEqual({ state: 'stale', expired: ['$collection'] });
    });
});
