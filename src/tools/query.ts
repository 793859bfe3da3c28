/**
 * System Tool: knowledge_query
 *
 * Load resources and observe their content in one batch.
 */

import { z } from 'zod';
import debug from 'debug';
import type { KnowledgeContextOptions } from '../connectors/context';
import { queryActionSchema } from '../domain/actions';
import { KnowledgeError } from '../errors';
import type { Knowledge } from '../Knowledge';
import { applyOutputFormatter } from '../utils';

const log = debug('knowledge:tools:query');

export const QUERY_TOOL_NAME = 'knowledge_query';

export const DEFAULT_QUERY_TOOL_DESCRIPTION = `Read resources from connected systems through their knowledge URIs (ndk://realm/subrealm/path) or their original URLs.

- resources/load: resource attributes, plus the observables listed in "observe" ("$body", "$chunk/01", "$collection", "$file", "$plain")
- resources/observe: a single observable URI, e.g. ndk://local/docs/guide.md/$chunk/02
- resources/attachment: attach a file or plain text to a resource

load_mode "auto" serves the cache while it is fresh, "force" always refreshes, "none" only reads the cache.
expand_depth follows related resources (links, embeds, parents) that many levels deep.`;

export const queryToolInputShape = {
    actions: z.array(queryActionSchema).min(1).describe('Actions to execute, answered together in one response'),
    format: z.enum(['toon', 'json']).default('toon').describe('Output format: toon (compact, default) or json'),
};

export type QueryToolInput = z.infer<z.ZodObject<typeof queryToolInputShape>>;

export interface QueryToolResult {
    [key: string]: unknown;
    content: { type: 'text'; text: string }[];
    isError?: boolean;
}

export interface QueryTool {
    name: typeof QUERY_TOOL_NAME;
    description: string;
    inputShape: typeof queryToolInputShape;
    handler: (params: QueryToolInput) => Promise<QueryToolResult>;
}

export function createQueryTool(
    knowledge: Knowledge,
    options: KnowledgeContextOptions = {},
    description: string = DEFAULT_QUERY_TOOL_DESCRIPTION,
): QueryTool {
    return {
        name: QUERY_TOOL_NAME,
        description,
        inputShape: queryToolInputShape,
        handler: async ({ actions, format }) => {
            log('knowledge_query called', {
                actionCount: actions.length,
                uris: actions.map((action) => action.uri),
            });

            try {
                const response = await knowledge.query({ actions }, options);
                const failed = response.resources.filter((resource) => resource.type === 'error').length;
                log('knowledge_query complete', {
                    resources: response.resources.length,
                    failed,
                    observations: response.observations.length,
                });

                return {
                    content: [{ type: 'text' as const, text: applyOutputFormatter(response, format) }],
                };
            } catch (error) {
                const info = KnowledgeError.from(error).toInfo();
                log('knowledge_query failed', { error: info });
                return {
                    content: [{ type: 'text' as const, text: applyOutputFormatter({ error: info }, format) }],
                    isError: true,
                };
            }
        },
    };
}
