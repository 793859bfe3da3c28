/**
 * Markdown Format Adapter
 *
 * Reads markdown fragments as document markup. YAML front-matter provides
 * the resource name and description; otherwise the description falls back
 * to the first sentence of the first paragraph.
 *
 * Example:
 * ```typescript
 * new MarkdownFormat()                          // front-matter becomes metadata
 * new MarkdownFormat({ frontMatter: false })    // front-matter kept as text
 * ```
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import debug from 'debug';
import type { Fragment } from '../connectors/types';
import type { MetadataDelta } from '../resources/metadata';
import type { FormattedFragment, FragmentFormat } from './types';

const log = debug('knowledge:ingestion');

interface MarkdownFormatOptions {
    /** Read YAML front-matter into metadata (default: true) */
    frontMatter?: boolean;
}

const frontMatterSchema = z
    .object({
        name: z.string().optional(),
        title: z.string().optional(),
        description: z.string().optional(),
    })
    .passthrough();

type FrontMatter = z.infer<typeof frontMatterSchema>;

/**
 * Extract YAML front-matter from markdown
 *
 * Handles edge case where front-matter starts with double delimiters:
 * ---
 * ---
 * description: ...
 * ---
 */
export function parseFrontMatter(markdown: string): {
    frontMatter: FrontMatter | null;
    body: string;
} {
    let normalized = markdown.replace(/\r\n?/g, '\n');
    if (normalized.startsWith('---\n---\n')) {
        normalized = normalized.slice(4);
    }

    const match = normalized.match(/^---\s*\n([\s\S]*?)\n---\s*(?:\n|$)/);
    if (!match) return { frontMatter: null, body: normalized };

    const body = normalized.slice(match[0].length);
    let raw: unknown;
    try {
        raw = parseYaml(match[1]);
    } catch (error) {
        log('Ignoring invalid front-matter', { error });
        return { frontMatter: null, body };
    }

    const parsed = frontMatterSchema.safeParse(raw);
    return { frontMatter: parsed.success ? parsed.data : null, body };
}

/**
 * Extract first paragraph as description fallback
 */
export function extractFirstParagraph(markdown: string): string | null {
    const match = markdown.match(/^(?:#[^\n]*\n+)?([^#\n!`|<-][^\n]+)/m);
    if (!match) return null;

    const paragraph = match[1].trim();
    const sentence = paragraph.match(/^[^.!?]+[.!?]/);
    if (sentence) return sentence[0].trim();
    if (paragraph.length > 150) return paragraph.slice(0, 150) + '...';
    return paragraph;
}

export class MarkdownFormat implements FragmentFormat {
    readonly name = 'markdown';
    private readonly frontMatter: boolean;

    constructor(options: MarkdownFormatOptions = {}) {
        this.frontMatter = options.frontMatter ?? true;
    }

    canHandle(mimeType: string): boolean {
        return mimeType === 'text/markdown' || mimeType.includes('markdown') || mimeType === 'text/html';
    }

    parse(fragment: Fragment): FormattedFragment {
        const { frontMatter, body } = this.frontMatter ? parseFrontMatter(fragment.text) : { frontMatter: null, body: fragment.text };

        const name = frontMatter?.name ?? frontMatter?.title;
        const metadata: MetadataDelta = {
            ...(name ? { name } : {}),
            ...(frontMatter?.description ? { description: frontMatter.description.trim() } : {}),
        };

        return {
            mode: 'markup',
            mimeType: 'text/markdown',
            text: body.trim(),
            metadata,
            description: metadata.description ?? extractFirstParagraph(body),
        };
    }
}
