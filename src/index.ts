// Library entry point

// ─── Core ────────────────────────────────────────────────────────────────
export { Knowledge, createStorageBackend } from './Knowledge';
export type { KnowledgeOptions } from './Knowledge';
export { loadConfig, DEFAULT_CONFIG } from './config';
export type { KnowledgeConfig, StorageKind } from './config';

// ─── Errors ──────────────────────────────────────────────────────────────
export {
    KnowledgeError, UnavailableError, BadRequestError, UriFormatError, IntegrationError,
    StorageError, StoppedError, IngestionError, ConfigError,
} from './errors';
export type { ErrorInfo, ErrorKind } from './errors';

// ─── URIs ────────────────────────────────────────────────────────────────
export { KnowledgeUri, Observable, URI_SCHEME } from './uri/KnowledgeUri';
export { parseReference, normalizeExternalUri, referenceToString } from './uri/references';
export type { Reference } from './uri/references';

// ─── Connectors ──────────────────────────────────────────────────────────
export { KnowledgeContext, RequestCache } from './connectors/context';
export type { Authorization, KnowledgeContextOptions } from './connectors/context';
export { ConnectorRegistry } from './connectors/registry';
export type { Connector, Fragment, ResolveResult, ObserveResult, ObserveOptions } from './connectors/types';
export { LocalConnector, LOCAL_REALM } from './connectors/LocalConnector';

// ─── Resources ───────────────────────────────────────────────────────────
export type { Locator, ResourceAttrs, AffordanceInfo, ResourceLabel, JsonValue } from './resources/types';
export { relationEmbed, relationLink, relationMisc, relationParent, relationId } from './resources/relations';
export type { Relation } from './resources/relations';
export { ResourceHistory } from './resources/metadata';
export type { MetadataDelta, ResourceDelta, ResourceView } from './resources/metadata';
export type { Bundle, BundleBody, BundleCollection, BundleFile, BundlePlain, Observation, ObservationError } from './resources/bundles';

// ─── Query ───────────────────────────────────────────────────────────────
export { QueryEngine } from './domain/query';
export { queryRequestSchema, queryActionSchema } from './domain/actions';
export type { QueryRequest, QueryAction, QueryResponse, ResourceInfo, ResourceError } from './domain/actions';
export type { LoadMode } from './domain/cache-decision';
export { RefreshJob, refreshRequestSchema, generateRefreshId } from './domain/refresh';
export type { RefreshRequest, RefreshResponse } from './domain/refresh';

// ─── Pipelines ───────────────────────────────────────────────────────────
export { IngestionPipeline } from './pipelines';
export type { IngestionPipelineConfig } from './pipelines';
export { estimateTokens } from './domain/chunking';
export type { Tokenizer } from './domain/chunking';
export type { FragmentFormat } from './formats/types';

// ─── Storage ─────────────────────────────────────────────────────────────
export { KnowledgeStore } from './storage/KnowledgeStore';
export { MemoryBackend } from './storage/MemoryBackend';
export { FileBackend } from './storage/FileBackend';
export { TypesenseBackend } from './storage/TypesenseBackend';
export type { StorageBackend, StorageWrite } from './storage/types';

// ─── Tools ───────────────────────────────────────────────────────────────
export { createQueryTool, QUERY_TOOL_NAME } from './tools/query';
export type { QueryTool } from './tools/query';
