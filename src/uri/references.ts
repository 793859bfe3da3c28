/**
 * References: what a caller (or a link inside content) may point at.
 * Either a Knowledge URI or an external URL that some connector may claim.
 */

import { KnowledgeUri } from './KnowledgeUri';

export type Reference =
    | { readonly kind: 'knowledge'; readonly uri: KnowledgeUri }
    | { readonly kind: 'external'; readonly url: string };

const EXTERNAL_PROTOCOLS = new Set(['http:', 'https:', 'file:']);

/**
 * Normalize an external URL so that equivalent spellings hash to the same
 * alias key: lowercase host, no default port, no empty fragment.
 */
export function normalizeExternalUri(value: string): string | null {
    let url: URL;
    try {
        url = new URL(value.trim());
    } catch {
        return null;
    }
    if (!EXTERNAL_PROTOCOLS.has(url.protocol)) {
        return null;
    }
    url.hash = url.hash === '#' ? '' : url.hash;
    return url.href;
}

export function parseReference(value: string): Reference | null {
    const uri = KnowledgeUri.tryParse(value);
    if (uri) {
        return { kind: 'knowledge', uri };
    }
    const url = normalizeExternalUri(value);
    return url ? { kind: 'external', url } : null;
}

export function referenceToString(reference: Reference): string {
    return reference.kind === 'knowledge' ? reference.uri.toString() : reference.url;
}
