/**
 * Knowledge URI
 *
 * Three-tier address of knowledge:
 * - Resource:   ndk://{realm}/{subrealm}/{path...}
 * - Affordance: ndk://{realm}/{subrealm}/{path...}/$body
 * - Observable: ndk://{realm}/{subrealm}/{path...}/$chunk/01/02
 *
 * Parsing is purely syntactic: it never checks that the target exists.
 * The scheme and realm are lowercased, every other segment keeps its case,
 * so `parseUri(s).toString() === s` for every canonical URI.
 */

import { UriFormatError } from '../errors';

export const URI_SCHEME = 'ndk://';

export const REGEX_REALM = /^[a-z][a-z0-9]+(?:-[a-z0-9]+)*$/;
export const REGEX_SEGMENT = /^[a-zA-Z0-9\-._]+$/;
const REGEX_CHUNK_INDEX = /^\d{2,}$/;

export type AffordanceKind = 'body' | 'collection' | 'file' | 'plain';
export type SuffixKind = AffordanceKind | 'chunk' | 'media';

const SUFFIX_KINDS: readonly SuffixKind[] = ['body', 'chunk', 'collection', 'file', 'media', 'plain'];

function isSuffixKind(value: string): value is SuffixKind {
    return SUFFIX_KINDS.some((kind) => kind === value);
}

/**
 * A segment may use `[a-zA-Z0-9\-._]`, but "." and ".." (or any segment made
 * only of punctuation, except "-") are rejected.
 */
export function isValidSegment(segment: string): boolean {
    if (!REGEX_SEGMENT.test(segment)) return false;
    return segment === '-' || !/^[\-._]+$/.test(segment);
}

/**
 * Format a chunk index the way it appears in URIs ("00", "01", ..., "100")
 */
export function formatChunkIndex(index: number): string {
    return index.toString().padStart(2, '0');
}

// ============================================================
// OBSERVABLE (relative suffix)
// ============================================================

/**
 * Relative suffix: an affordance ("$body") or an observable within it
 * ("$chunk/01", "$media/figure.png", "$file/report.pdf").
 */
export class Observable {
    private constructor(
        readonly kind: SuffixKind,
        readonly path: readonly string[],
    ) {}

    static body(): Observable {
        return new Observable('body', []);
    }

    static collection(): Observable {
        return new Observable('collection', []);
    }

    static plain(): Observable {
        return new Observable('plain', []);
    }

    static file(path: readonly string[] = []): Observable {
        return Observable.make('file', path);
    }

    static chunk(indexes: readonly number[] = []): Observable {
        return new Observable('chunk', indexes.map(formatChunkIndex));
    }

    static media(path: readonly string[] = []): Observable {
        return Observable.make('media', path);
    }

    /**
     * Parse "$kind/seg/seg" into an Observable
     */
    static parse(value: string): Observable {
        if (!value.startsWith('$')) {
            throw new UriFormatError(value, 'suffix must start with "$"');
        }
        const [kind, ...path] = value.slice(1).split('/');
        if (!isSuffixKind(kind)) {
            throw new UriFormatError(value, `unknown affordance '${kind}'`);
        }
        return Observable.make(kind, path, value);
    }

    static tryParse(value: string): Observable | null {
        try {
            return Observable.parse(value);
        } catch {
            return null;
        }
    }

    private static make(kind: SuffixKind, path: readonly string[], source?: string): Observable {
        const display = source ?? `$${[kind, ...path].join('/')}`;
        for (const segment of path) {
            if (!isValidSegment(segment)) {
                throw new UriFormatError(display, `invalid segment '${segment}'`);
            }
        }
        if ((kind === 'body' || kind === 'collection' || kind === 'plain') && path.length > 0) {
            throw new UriFormatError(display, `'$${kind}' has no observables`);
        }
        if (kind === 'chunk' && !path.every((segment) => REGEX_CHUNK_INDEX.test(segment))) {
            throw new UriFormatError(display, 'chunk indexes must have at least two digits');
        }
        return new Observable(kind, [...path]);
    }

    /**
     * Affordances name a perspective on the resource; the other suffixes name
     * content within one.
     */
    isAffordance(): boolean {
        return this.kind === 'body' || this.kind === 'collection' || this.kind === 'plain' || (this.kind === 'file' && this.path.length === 0);
    }

    /**
     * The affordance that contains this observable (itself for affordances)
     */
    affordance(): Observable {
        switch (this.kind) {
            case 'chunk':
            case 'media':
                return Observable.body();
            case 'file':
                return Observable.file();
            case 'body':
            case 'collection':
            case 'plain':
                return this;
            default: {
                const exhaustive: never = this.kind;
                throw new UriFormatError(String(exhaustive), 'unknown suffix kind');
            }
        }
    }

    /**
     * Chunk indexes as numbers ("$chunk/01/02" -> [1, 2])
     */
    chunkIndexes(): number[] {
        return this.kind === 'chunk' ? this.path.map((segment) => parseInt(segment, 10)) : [];
    }

    equals(other: Observable): boolean {
        return this.toString() === other.toString();
    }

    toString(): string {
        return `$${[this.kind, ...this.path].join('/')}`;
    }

    toJSON(): string {
        return this.toString();
    }
}

// ============================================================
// KNOWLEDGE URI (absolute)
// ============================================================

export class KnowledgeUri {
    private constructor(
        readonly realm: string,
        readonly subrealm: string,
        readonly path: readonly string[],
        readonly suffix: Observable | null,
    ) {}

    /**
     * Build a Resource URI from its parts
     */
    static resource(realm: string, subrealm: string, path: readonly string[]): KnowledgeUri {
        const display = `${URI_SCHEME}${[realm, subrealm, ...path].join('/')}`;
        const normalizedRealm = realm.toLowerCase();
        if (!REGEX_REALM.test(normalizedRealm)) {
            throw new UriFormatError(display, `invalid realm '${realm}'`);
        }
        if (path.length === 0) {
            throw new UriFormatError(display, 'missing path');
        }
        for (const segment of [subrealm, ...path]) {
            if (!isValidSegment(segment)) {
                throw new UriFormatError(display, `invalid segment '${segment}'`);
            }
        }
        return new KnowledgeUri(normalizedRealm, subrealm, [...path], null);
    }

    static parse(value: string): KnowledgeUri {
        const trimmed = value.trim();
        if (trimmed.slice(0, URI_SCHEME.length).toLowerCase() !== URI_SCHEME) {
            throw new UriFormatError(value, `expected scheme '${URI_SCHEME}'`);
        }

        const segments = trimmed.slice(URI_SCHEME.length).split('/');
        const suffixIndex = segments.findIndex((segment) => segment.startsWith('$'));
        const resourceSegments = suffixIndex === -1 ? segments : segments.slice(0, suffixIndex);
        const [realm, subrealm, ...path] = resourceSegments;

        if (!realm) {
            throw new UriFormatError(value, 'missing realm');
        }
        if (subrealm === undefined || path.length === 0) {
            throw new UriFormatError(value, 'expected ndk://realm/subrealm/path');
        }

        const resource = KnowledgeUri.resource(realm, subrealm, path);
        if (suffixIndex === -1) {
            return resource;
        }
        return resource.child(Observable.parse(segments.slice(suffixIndex).join('/')));
    }

    static tryParse(value: string): KnowledgeUri | null {
        try {
            return KnowledgeUri.parse(value);
        } catch {
            return null;
        }
    }

    isResource(): boolean {
        return this.suffix === null;
    }

    isAffordance(): boolean {
        return this.suffix !== null && this.suffix.isAffordance();
    }

    isObservable(): boolean {
        return this.suffix !== null && !this.suffix.isAffordance();
    }

    resourceUri(): KnowledgeUri {
        return this.suffix === null ? this : new KnowledgeUri(this.realm, this.subrealm, this.path, null);
    }

    /**
     * Attach a suffix to the resource this URI belongs to
     */
    child(suffix: Observable): KnowledgeUri {
        return new KnowledgeUri(this.realm, this.subrealm, this.path, suffix);
    }

    /**
     * The affordance containing an observable ("$chunk/01" -> "$body")
     */
    parentAffordance(): KnowledgeUri {
        if (this.suffix === null) {
            throw new UriFormatError(this.toString(), 'a resource has no parent affordance');
        }
        return this.child(this.suffix.affordance());
    }

    equals(other: KnowledgeUri): boolean {
        return this.toString() === other.toString();
    }

    /**
     * "realm+subrealm+path" form used for storage keys
     */
    flatKey(): string {
        return [this.realm, this.subrealm, ...this.path].join('+');
    }

    toString(): string {
        const resource = `${URI_SCHEME}${[this.realm, this.subrealm, ...this.path].join('/')}`;
        return this.suffix ? `${resource}/${this.suffix.toString()}` : resource;
    }

    toJSON(): string {
        return this.toString();
    }
}

// ============================================================
// FUNCTIONAL API
// ============================================================

export function parseUri(value: string): KnowledgeUri {
    return KnowledgeUri.parse(value);
}

export function serializeUri(uri: KnowledgeUri): string {
    return uri.toString();
}

export function isResource(uri: KnowledgeUri): boolean {
    return uri.isResource();
}

export function isAffordance(uri: KnowledgeUri): boolean {
    return uri.isAffordance();
}

export function isObservable(uri: KnowledgeUri): boolean {
    return uri.isObservable();
}

export function parentAffordance(uri: KnowledgeUri): KnowledgeUri {
    return uri.parentAffordance();
}

/**
 * Canonical resource URI string, or null when the value is not a Knowledge URI
 */
export function toResourceUriString(value: string): string | null {
    return KnowledgeUri.tryParse(value)?.resourceUri().toString() ?? null;
}
