import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import debug from 'debug';
import { Client as TypesenseClient } from 'typesense';
import type { ZodError } from 'zod';
import { KnowledgeConfig, loadConfig } from './config';
import { KnowledgeContext, KnowledgeContextOptions } from './connectors/context';
import { ConnectorRegistry } from './connectors/registry';
import type { Connector } from './connectors/types';
import { QueryResponse, queryRequestSchema } from './domain/actions';
import { QueryEngine } from './domain/query';
import { RefreshJob, RefreshResponse, refreshRequestSchema } from './domain/refresh';
import { BadRequestError, ConfigError } from './errors';
import { IngestionPipeline } from './pipelines';
import { FileBackend } from './storage/FileBackend';
import { KnowledgeStore } from './storage/KnowledgeStore';
import { MemoryBackend } from './storage/MemoryBackend';
import { TypesenseBackend } from './storage/TypesenseBackend';
import type { StorageBackend } from './storage/types';
import { createQueryTool } from './tools/query';

const log = debug('knowledge');

export interface KnowledgeOptions {
    connectors: Connector[];
    /** Defaults to the configuration loaded from `process.env` at construction */
    config?: KnowledgeConfig;
    /** Overrides the backend selected by `config.storage` */
    storage?: StorageBackend;
    /** Client for the `typesense` storage kind; built from `config.typesense` when omitted */
    typesense?: TypesenseClient;
    pipeline?: IngestionPipeline;
}

function invalidRequest(error: ZodError): BadRequestError {
    return new BadRequestError(error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; '));
}

/**
 * Backend for the configured storage kind
 */
export function createStorageBackend(config: KnowledgeConfig, typesense?: TypesenseClient): StorageBackend {
    switch (config.storage) {
        case 'memory':
            return new MemoryBackend();
        case 'file':
            return new FileBackend(config.storageDir);
        case 'typesense': {
            if (typesense) {
                return new TypesenseBackend(typesense);
            }
            const { host, port, protocol, apiKey } = config.typesense;
            if (!apiKey) {
                throw new ConfigError('TYPESENSE_API_KEY', { TYPESENSE_API_KEY: 'required for typesense storage' });
            }
            return new TypesenseBackend(new TypesenseClient({ nodes: [{ host, port, protocol }], apiKey }));
        }
    }
}

/**
 * Knowledge - cached access to resources of external systems
 *
 * ARCHITECTURE:
 * - Connectors: map URLs and URIs of one system to locators, fetch metadata and content
 * - Pipeline: turns raw fragments into chunked bundles
 * - Store: resource histories, bundles, aliases and relations on a storage backend
 * - Query engine: decides per resource whether the cache is still valid,
 *   refreshes what is stale and expands relations
 *
 * Every query runs in its own KnowledgeContext, so credentials, cancellation
 * and per-request caches never leak between callers.
 */
export class Knowledge {
    readonly config: KnowledgeConfig;
    readonly registry = new ConnectorRegistry();
    readonly store: KnowledgeStore;
    readonly pipeline: IngestionPipeline;
    readonly engine: QueryEngine;
    readonly refreshJob: RefreshJob;

    constructor({ connectors, config = loadConfig(), storage, typesense, pipeline }: KnowledgeOptions) {
        this.config = config;
        this.registry.registerAll(connectors);
        const backend = storage ?? createStorageBackend(config, typesense);
        this.store = new KnowledgeStore(backend, config.environment);
        this.pipeline =
            pipeline ??
            new IngestionPipeline({
                maxChunkTokens: config.maxChunkTokens,
                chunkingThresholdTokens: config.chunkingThresholdTokens,
            });
        this.engine = new QueryEngine(this.registry, this.store, this.pipeline);
        this.refreshJob = new RefreshJob(this.registry, this.store, this.engine.resolver);

        log('Knowledge initialized', {
            realms: this.registry.getAll().map((connector) => connector.realm),
            storage: backend.name,
            environment: config.environment,
        });
    }

    // ============================================================
    // PUBLIC API
    // ============================================================

    /**
     * Execute a batch of actions. Failures of single resources are reported in
     * the response; only an invalid request or cancellation throws.
     */
    async query(request: unknown, options: KnowledgeContextOptions = {}): Promise<QueryResponse> {
        const parsed = queryRequestSchema.safeParse(request);
        if (!parsed.success) {
            throw invalidRequest(parsed.error);
        }

        const context = new KnowledgeContext(this.config, options);
        return this.engine.execute(context, parsed.data.actions);
    }

    /**
     * Collect the resources changed since the caller's previous refreshes.
     * Meant for a scheduled job; connectors without `refresh` are skipped.
     */
    async refresh(request: unknown = {}, options: KnowledgeContextOptions = {}): Promise<RefreshResponse> {
        const parsed = refreshRequestSchema.safeParse(request);
        if (!parsed.success) {
            throw invalidRequest(parsed.error);
        }

        const context = new KnowledgeContext(this.config, options);
        return this.refreshJob.execute(context, parsed.data.realms, parsed.data.previous);
    }

    /**
     * Register the knowledge_query tool on an MCP server. `options` supply the
     * caller's credentials and cancellation for every call of the tool.
     */
    attachToMcpServer(server: McpServer, options: KnowledgeContextOptions = {}, description?: string): void {
        const queryTool = createQueryTool(this, options, description);

        server.registerTool(
            queryTool.name,
            {
                description: queryTool.description,
                inputSchema: queryTool.inputShape,
            },
            queryTool.handler,
        );

        log('Attached to MCP server', { tool: queryTool.name });
    }
}
