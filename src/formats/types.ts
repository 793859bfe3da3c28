/**
 * Fragment formats: how the text of a fragment is read before ingestion
 */

import type { Fragment } from '../connectors/types';
import type { MetadataDelta } from '../resources/metadata';

/**
 * - `markup`: document text, chunked on headings and paragraphs
 * - `data`: CSV, JSON and friends; never chunked, trimmed when oversized
 * - `spreadsheet`: data with one `## Sheet` section per sheet
 * - `plain`: raw text kept as-is, trimmed when oversized
 */
export type FragmentMode = 'markup' | 'data' | 'spreadsheet' | 'plain';

export interface FormattedFragment {
    readonly mode: FragmentMode;
    readonly mimeType: string;
    readonly text: string;
    /** Resource metadata carried by the text itself, e.g. front-matter */
    readonly metadata: MetadataDelta;
    readonly description: string | null;
}

export interface FragmentFormat {
    readonly name: string;
    canHandle(mimeType: string): boolean;
    parse(fragment: Fragment): FormattedFragment;
}
