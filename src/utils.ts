/**
 * Output Formatters
 *
 * Tool results are rendered as TOON (Token-Oriented Object Notation) by
 * default, which takes noticeably fewer tokens than JSON for arrays of
 * uniform objects such as resource lists. JSON stays available for clients
 * that parse the output.
 */

import { encode as encodeToon } from '@toon-format/toon';
import debug from 'debug';

const log = debug('knowledge:utils');

export type OutputFormat = 'toon' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['toon', 'json'];

/**
 * Format output as TOON, falling back to JSON for values TOON cannot encode
 */
export function formatAsToon(output: unknown): string {
    if (typeof output !== 'object' || output === null) {
        return formatAsJson(output);
    }
    try {
        return encodeToon(output);
    } catch (error) {
        log('TOON encoding failed', { error });
        return formatAsJson(output);
    }
}

export function formatAsJson(output: unknown): string {
    return JSON.stringify(output, null, 2);
}

export function applyOutputFormatter(output: unknown, format: OutputFormat): string {
    switch (format) {
        case 'toon':
            return formatAsToon(output);
        case 'json':
            return formatAsJson(output);
    }
}
