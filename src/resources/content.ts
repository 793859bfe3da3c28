/**
 * Normalized document markup
 *
 * Extractors hand over Markdown-flavoured text. It is split into block parts:
 * headings, fenced code, standalone embeds (`![caption](uri)`) and paragraphs.
 * Rendering joins the parts with a blank line, so parse -> render is stable.
 */

export interface PartHeading {
    readonly type: 'heading';
    readonly level: number;
    readonly text: string;
}

export interface PartCode {
    readonly type: 'code';
    /** Includes the opening and closing fences */
    readonly text: string;
}

export interface PartEmbed {
    readonly type: 'embed';
    readonly label: string;
    readonly href: string;
}

export interface PartText {
    readonly type: 'text';
    readonly text: string;
}

export type ContentPart = PartHeading | PartCode | PartEmbed | PartText;

const REGEX_HEADING = /^(#{1,6})\s+(.+)$/;
const REGEX_FENCE = /^(```|~~~)/;
const REGEX_EMBED_LINE = /^!\[([^\]]*)\]\(([^)\s]+)\)$/;
const REGEX_INLINE_LINK = /(!?)\[([^\]]*)\]\(([^)\s]+)\)/g;
const REGEX_AUTOLINK = /<((?:https?|ndk|file):\/\/[^>\s]+)>/g;

/**
 * Split markup into block parts
 */
export function parseContent(markup: string): ContentPart[] {
    const parts: ContentPart[] = [];
    const lines = markup.replace(/\r\n?/g, '\n').split('\n');
    let paragraph: string[] = [];

    const flushParagraph = () => {
        const text = paragraph.join('\n').trim();
        if (text) {
            parts.push({ type: 'text', text });
        }
        paragraph = [];
    };

    for (let index = 0; index < lines.length; index++) {
        const line = lines[index];
        const trimmed = line.trim();

        const fence = trimmed.match(REGEX_FENCE);
        if (fence) {
            flushParagraph();
            const block = [line];
            index++;
            while (index < lines.length) {
                block.push(lines[index]);
                if (lines[index].trim().startsWith(fence[1])) break;
                index++;
            }
            parts.push({ type: 'code', text: block.join('\n') });
            continue;
        }

        const heading = trimmed.match(REGEX_HEADING);
        if (heading) {
            flushParagraph();
            parts.push({ type: 'heading', level: heading[1].length, text: heading[2].trim() });
            continue;
        }

        const embed = trimmed.match(REGEX_EMBED_LINE);
        if (embed) {
            flushParagraph();
            parts.push({ type: 'embed', label: embed[1], href: embed[2] });
            continue;
        }

        if (!trimmed) {
            flushParagraph();
            continue;
        }

        paragraph.push(line);
    }
    flushParagraph();

    return parts;
}

export function renderPart(part: ContentPart): string {
    switch (part.type) {
        case 'heading':
            return `${'#'.repeat(part.level)} ${part.text}`;
        case 'code':
        case 'text':
            return part.text;
        case 'embed':
            return `![${part.label}](${part.href})`;
        default: {
            const exhaustive: never = part;
            throw new Error(`Unknown content part: ${JSON.stringify(exhaustive)}`);
        }
    }
}

export function renderContent(parts: readonly ContentPart[]): string {
    return parts.map(renderPart).join('\n\n');
}

// ============================================================
// REFERENCES
// ============================================================

export interface ContentReferences {
    /** Targets of `[label](href)` and `<href>` */
    readonly links: string[];
    /** Targets of `![label](href)` */
    readonly embeds: string[];
}

/**
 * References in document order, without duplicates.
 * Code blocks are skipped.
 */
export function extractReferences(parts: readonly ContentPart[]): ContentReferences {
    const links: string[] = [];
    const embeds: string[] = [];
    const add = (list: string[], href: string) => {
        if (!list.includes(href)) list.push(href);
    };

    for (const part of parts) {
        if (part.type === 'embed') {
            add(embeds, part.href);
        } else if (part.type === 'text') {
            for (const match of part.text.matchAll(REGEX_INLINE_LINK)) {
                add(match[1] === '!' ? embeds : links, match[3]);
            }
            for (const match of part.text.matchAll(REGEX_AUTOLINK)) {
                add(links, match[1]);
            }
        }
    }

    return { links, embeds };
}

/**
 * Replace reference targets. `replace` returns null to keep a target.
 */
export function rewriteReferences(parts: readonly ContentPart[], replace: (href: string) => string | null): ContentPart[] {
    return parts.map((part): ContentPart => {
        if (part.type === 'embed') {
            const href = replace(part.href);
            return href ? { ...part, href } : part;
        }
        if (part.type === 'text') {
            const text = part.text
                .replace(REGEX_INLINE_LINK, (whole: string, bang: string, label: string, href: string) => {
                    const replaced = replace(href);
                    return replaced ? `${bang}[${label}](${replaced})` : whole;
                })
                .replace(REGEX_AUTOLINK, (whole: string, href: string) => {
                    const replaced = replace(href);
                    return replaced ? `<${replaced}>` : whole;
                });
            return text === part.text ? part : { ...part, text };
        }
        return part;
    });
}

/**
 * First heading of the parts, or their first line, for tables of contents
 */
export function summarizeParts(parts: readonly ContentPart[], maxLength = 80): string | null {
    const heading = parts.find((part): part is PartHeading => part.type === 'heading');
    if (heading) return heading.text;

    const text = parts.find((part): part is PartText => part.type === 'text');
    if (!text) return null;

    const firstLine = text.text.split('\n')[0].trim();
    return firstLine.length > maxLength ? `${firstLine.slice(0, maxLength - 3).trimEnd()}...` : firstLine;
}
