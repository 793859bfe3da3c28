/**
 * Data Format Adapter
 *
 * CSV, TSV, JSON, YAML and spreadsheet exports. Spreadsheets arrive as CSV
 * with one `## Sheet` heading per sheet.
 */

import type { Fragment } from '../connectors/types';
import type { FormattedFragment, FragmentFormat } from './types';

const DATA_TYPES = new Set([
    'text/csv',
    'text/tab-separated-values',
    'application/json',
    'application/x-ndjson',
    'application/yaml',
    'text/yaml',
]);

const SPREADSHEET_TYPES = new Set([
    'application/vnd.ms-excel',
    'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    'application/vnd.oasis.opendocument.spreadsheet',
]);

export class DataFormat implements FragmentFormat {
    readonly name = 'data';

    canHandle(mimeType: string): boolean {
        return DATA_TYPES.has(mimeType) || SPREADSHEET_TYPES.has(mimeType) || mimeType.endsWith('+json');
    }

    parse(fragment: Fragment): FormattedFragment {
        return {
            mode: SPREADSHEET_TYPES.has(fragment.mimeType) ? 'spreadsheet' : 'data',
            mimeType: fragment.mimeType,
            text: fragment.text.replace(/\r\n?/g, '\n'),
            metadata: {},
            description: null,
        };
    }
}
