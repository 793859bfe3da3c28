/**
 * Local Filesystem Connector
 *
 * Serves files below named root directories as `ndk://local/{root}/{path}`.
 *
 * - Directories: `$collection` (their visible entries)
 * - Files: `$file` always, `$body` for markdown, text and data, `$plain` for text
 * - `file://` URLs below a root are aliases of the resource
 *
 * The revision of a file is its size and modification time.
 *
 * Example:
 * ```typescript
 * const connector = new LocalConnector({ docs: '/srv/docs' });
 * // file:///srv/docs/guide/intro.md -> ndk://local/docs/guide/intro.md
 * ```
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import debug from 'debug';
import { z } from 'zod';
import { BadRequestError, IntegrationError, UnavailableError } from '../errors';
import type { Bundle } from '../resources/bundles';
import type { MetadataDelta, ResourceView } from '../resources/metadata';
import type { AffordanceInfo, Locator } from '../resources/types';
import { isValidSegment, KnowledgeUri, Observable } from '../uri/KnowledgeUri';
import type { Reference } from '../uri/references';
import type { KnowledgeContext } from './context';
import type { Connector, Fragment, ObserveResult, ResolveResult } from './types';

const log = debug('knowledge:local-connector');

export const LOCAL_REALM = 'local';

const CONTENT_TYPES: Record<string, string> = {
    '.md': 'text/markdown',
    '.markdown': 'text/markdown',
    '.txt': 'text/plain',
    '.html': 'text/html',
    '.htm': 'text/html',
    '.json': 'application/json',
    '.ndjson': 'application/x-ndjson',
    '.csv': 'text/csv',
    '.tsv': 'text/tab-separated-values',
    '.yml': 'application/yaml',
    '.yaml': 'application/yaml',
    '.ts': 'text/x-typescript',
    '.js': 'text/javascript',
    '.py': 'text/x-python',
    '.pdf': 'application/pdf',
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.gif': 'image/gif',
    '.svg': 'image/svg+xml',
};

const BODY_TYPES = new Set([
    'text/markdown',
    'text/plain',
    'text/html',
    'application/json',
    'application/x-ndjson',
    'text/csv',
    'text/tab-separated-values',
    'application/yaml',
]);

const TEXT_TYPES = new Set(['application/json', 'application/x-ndjson', 'application/yaml', 'text/javascript']);

const DIRECTORY_MIME_TYPE = 'inode/directory';

const localLocatorSchema = z.object({
    realm: z.literal(LOCAL_REALM),
    kind: z.literal('file'),
    root: z.string(),
    path: z.string(),
});

type LocalLocator = z.infer<typeof localLocatorSchema>;

function contentType(filePath: string): string {
    return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

function isText(mimeType: string): boolean {
    return mimeType.startsWith('text/') || TEXT_TYPES.has(mimeType);
}

function isVisible(name: string): boolean {
    return !name.startsWith('.') && isValidSegment(name);
}

function errorCode(error: unknown): string | null {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}

export class LocalConnector implements Connector {
    readonly realm = LOCAL_REALM;
    private readonly roots: Map<string, string>;

    /**
     * @param roots - root name (the URI subrealm) -> directory
     */
    constructor(roots: Record<string, string>) {
        this.roots = new Map();
        for (const [name, dir] of Object.entries(roots)) {
            if (!isValidSegment(name)) {
                throw IntegrationError.badConnector(LOCAL_REALM, `invalid root name '${name}'`);
            }
            if (!existsSync(dir)) {
                throw IntegrationError.badConnector(LOCAL_REALM, `path does not exist: ${dir}`);
            }
            this.roots.set(name, path.resolve(dir));
        }
    }

    // ============================================================
    // LOCATOR
    // ============================================================

    async locator(_context: KnowledgeContext, reference: Reference): Promise<Locator | null> {
        if (reference.kind === 'knowledge') {
            if (reference.uri.realm !== LOCAL_REALM) {
                return null;
            }
            if (!this.roots.has(reference.uri.subrealm) || !reference.uri.path.every(isVisible)) {
                throw new UnavailableError({ extra: { uri: reference.uri.toString() } });
            }
            return this.makeLocator(reference.uri.subrealm, reference.uri.path.join('/'));
        }

        if (!reference.url.startsWith('file:')) {
            return null;
        }
        const filePath = fileURLToPath(reference.url);
        for (const [name, dir] of this.roots) {
            const relativePath = path.relative(dir, filePath);
            if (!relativePath || relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
                continue;
            }
            const segments = relativePath.split(path.sep);
            if (!segments.every(isVisible)) {
                throw new UnavailableError({ extra: { url: reference.url } });
            }
            return this.makeLocator(name, segments.join('/'));
        }
        return null;
    }

    private makeLocator(root: string, relativePath: string): LocalLocator {
        return { realm: LOCAL_REALM, kind: 'file', root, path: relativePath };
    }

    private parseLocator(locator: Locator): LocalLocator {
        const parsed = localLocatorSchema.safeParse(locator);
        if (!parsed.success) {
            throw IntegrationError.badConnector(LOCAL_REALM, 'unexpected locator');
        }
        return parsed.data;
    }

    resourceUri(locator: Locator): KnowledgeUri {
        const { root, path: relativePath } = this.parseLocator(locator);
        return KnowledgeUri.resource(LOCAL_REALM, root, relativePath.split('/'));
    }

    private fullPath(locator: LocalLocator): string {
        const dir = this.roots.get(locator.root);
        if (!dir) {
            throw new UnavailableError({ extra: { root: locator.root } });
        }
        return path.join(dir, ...locator.path.split('/'));
    }

    // ============================================================
    // RESOLVE
    // ============================================================

    async resolve(_context: KnowledgeContext, locator: Locator, _cached: ResourceView | null): Promise<ResolveResult> {
        const local = this.parseLocator(locator);
        const fullPath = this.fullPath(local);

        const stat = await fs.stat(fullPath).catch((error: unknown) => {
            if (errorCode(error) === 'ENOENT') {
                throw new UnavailableError({ extra: { path: local.path } });
            }
            throw error;
        });

        const fileUrl = pathToFileURL(fullPath).href;
        const common: MetadataDelta = {
            name: path.basename(fullPath),
            citationUrl: fileUrl,
            createdAt: stat.birthtime.toISOString(),
            updatedAt: stat.mtime.toISOString(),
            aliases: [fileUrl],
        };

        if (stat.isDirectory()) {
            return {
                metadata: { ...common, mimeType: DIRECTORY_MIME_TYPE, affordances: [{ suffix: Observable.collection().toString() }] },
                expired: [],
                shouldCache: true,
            };
        }

        const mimeType = contentType(fullPath);
        const affordances: AffordanceInfo[] = [];
        if (BODY_TYPES.has(mimeType)) {
            affordances.push({ suffix: Observable.body().toString(), mimeType: 'text/markdown' });
        }
        affordances.push({ suffix: Observable.file().toString(), mimeType });
        if (isText(mimeType)) {
            affordances.push({ suffix: Observable.plain().toString(), mimeType });
        }

        log('Resolved file', { path: local.path, mimeType, size: stat.size });
        return {
            metadata: { ...common, mimeType, revisionData: `${stat.size}-${Math.floor(stat.mtimeMs)}`, affordances },
            expired: [],
            shouldCache: true,
        };
    }

    // ============================================================
    // OBSERVE
    // ============================================================

    async observe(_context: KnowledgeContext, locator: Locator, observable: Observable, resolved: MetadataDelta): Promise<ObserveResult> {
        const local = this.parseLocator(locator);
        const fullPath = this.fullPath(local);
        const resourceUri = this.resourceUri(local);
        const mimeType = resolved.mimeType ?? contentType(fullPath);

        switch (observable.toString()) {
            case '$collection': {
                const entries = await fs.readdir(fullPath);
                const results = entries
                    .filter(isVisible)
                    .sort()
                    .map((entry) => KnowledgeUri.resource(LOCAL_REALM, local.root, [...local.path.split('/'), entry]).toString());
                const bundle: Bundle = { type: 'collection', uri: resourceUri.child(Observable.collection()).toString(), results };
                return { bundle, shouldCache: true, options: { relationsParent: true } };
            }
            case '$body': {
                const fragment: Fragment = { type: 'fragment', mimeType, text: await fs.readFile(fullPath, 'utf-8'), blobs: {} };
                return { bundle: fragment, shouldCache: true, options: { relationsLink: true } };
            }
            case '$plain': {
                const bundle: Bundle = {
                    type: 'plain',
                    uri: resourceUri.child(Observable.plain()).toString(),
                    mimeType,
                    text: await fs.readFile(fullPath, 'utf-8'),
                };
                return { bundle, shouldCache: true };
            }
            case '$file': {
                const stat = await fs.stat(fullPath);
                const bundle: Bundle = {
                    type: 'file',
                    uri: resourceUri.child(Observable.file()).toString(),
                    description: null,
                    mimeType,
                    downloadUrl: pathToFileURL(fullPath).href,
                    expiry: null,
                    size: stat.size,
                };
                return { bundle, shouldCache: true };
            }
            default:
                throw BadRequestError.capability(observable.toString());
        }
    }
}
