/**
 * Runtime configuration, read from environment variables
 */

import { z } from 'zod';
import debug from 'debug';
import { ConfigError } from './errors';

const log = debug('knowledge:config');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    KNOWLEDGE_ENVIRONMENT: z.string().min(1).default('dev'),
    KNOWLEDGE_STORAGE: z.enum(['memory', 'file', 'typesense']).default('memory'),
    KNOWLEDGE_STORAGE_DIR: z.string().min(1).default('.knowledge'),
    KNOWLEDGE_MAX_CHUNK_TOKENS: positiveInt(4000),
    KNOWLEDGE_CHUNKING_THRESHOLD_TOKENS: positiveInt(4000),
    KNOWLEDGE_BATCH_SIZE_QUERY: positiveInt(20),
    KNOWLEDGE_BATCH_SIZE_RESOLVE: positiveInt(10),
    KNOWLEDGE_CONNECTOR_CONCURRENCY: positiveInt(4),
    TYPESENSE_HOST: z.string().default('localhost'),
    TYPESENSE_PORT: z.coerce.number().int().positive().default(8108),
    TYPESENSE_PROTOCOL: z.enum(['http', 'https']).default('http'),
    TYPESENSE_API_KEY: z.string().optional(),
});

export type StorageKind = 'memory' | 'file' | 'typesense';

export interface KnowledgeConfig {
    /** Salts alias hashes so that environments never share alias keys */
    readonly environment: string;
    readonly storage: StorageKind;
    readonly storageDir: string;
    /** Upper bound for the text of a single chunk */
    readonly maxChunkTokens: number;
    /** Bodies at or under this size stay a single chunk */
    readonly chunkingThresholdTokens: number;
    /** Parallel actions per query batch */
    readonly batchSizeQuery: number;
    /** Parallel locator resolutions when expanding relations */
    readonly batchSizeResolve: number;
    /** Concurrent connector calls per realm within one query */
    readonly connectorConcurrency: number;
    readonly typesense: {
        readonly host: string;
        readonly port: number;
        readonly protocol: 'http' | 'https';
        readonly apiKey: string | undefined;
    };
    /** Source of public credentials for connectors */
    readonly publicEnv: Readonly<Record<string, string | undefined>>;
}

/** Built-in defaults, ignoring the environment */
export const DEFAULT_CONFIG: KnowledgeConfig = loadConfig({});

/**
 * Validate the environment and build a frozen config
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): KnowledgeConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues: Record<string, string> = {};
        for (const issue of parsed.error.issues) {
            issues[issue.path.join('.') || 'root'] = issue.message;
        }
        log('Invalid configuration', { issues });
        throw new ConfigError(Object.keys(issues).join(', '), issues);
    }

    const values = parsed.data;
    return Object.freeze({
        environment: values.KNOWLEDGE_ENVIRONMENT,
        storage: values.KNOWLEDGE_STORAGE,
        storageDir: values.KNOWLEDGE_STORAGE_DIR,
        maxChunkTokens: values.KNOWLEDGE_MAX_CHUNK_TOKENS,
        chunkingThresholdTokens: values.KNOWLEDGE_CHUNKING_THRESHOLD_TOKENS,
        batchSizeQuery: values.KNOWLEDGE_BATCH_SIZE_QUERY,
        batchSizeResolve: values.KNOWLEDGE_BATCH_SIZE_RESOLVE,
        connectorConcurrency: values.KNOWLEDGE_CONNECTOR_CONCURRENCY,
        typesense: Object.freeze({
            host: values.TYPESENSE_HOST,
            port: values.TYPESENSE_PORT,
            protocol: values.TYPESENSE_PROTOCOL,
            apiKey: values.TYPESENSE_API_KEY,
        }),
        publicEnv: Object.freeze({ ...env }),
    });
}
