/**
 * Plain text, kept as-is. Handles any MIME type, so register it last.
 */

import type { Fragment } from '../connectors/types';
import type { FormattedFragment, FragmentFormat } from './types';

export class PlainFormat implements FragmentFormat {
    readonly name = 'plain';

    canHandle(): boolean {
        return true;
    }

    parse(fragment: Fragment): FormattedFragment {
        return {
            mode: 'plain',
            mimeType: fragment.mimeType,
            text: fragment.text,
            metadata: {},
            description: null,
        };
    }
}
