/**
 * Refresh job
 *
 * Asks connectors which resources changed, remembers how to reach them and
 * records the change list under a refresh id. Callers pass the id of their
 * last refresh per realm and get back every accessible resource changed
 * since then.
 */

import debug from 'debug';
import { z } from 'zod';
import type { KnowledgeContext } from '../connectors/context';
import type { ConnectorRegistry } from '../connectors/registry';
import type { Connector } from '../connectors/types';
import { IntegrationError, StoppedError } from '../errors';
import type { Locator } from '../resources/types';
import type { KnowledgeStore } from '../storage/KnowledgeStore';
import { uniqueIdFromDate } from '../unique-id';
import type { KnowledgeUri } from '../uri/KnowledgeUri';
import type { Reference } from '../uri/references';
import type { Resolver } from './resolve';

const log = debug('knowledge:refresh');

export const REFRESH_ID_PATTERN = /^refresh-[a-z0-9]{32}$/;

export const refreshRequestSchema = z.object({
    /** Realms to refresh; all when empty */
    realms: z.array(z.string().min(1)).default([]),
    /** Last refresh id seen by the caller, per realm */
    previous: z.record(z.string(), z.string().regex(REFRESH_ID_PATTERN)).default({}),
});

export type RefreshRequest = z.input<typeof refreshRequestSchema>;

export interface RefreshResponse {
    refreshId: string;
    /** Resource URIs, sorted */
    uris: string[];
}

export function generateRefreshId(date?: Date): string {
    return `refresh-${uniqueIdFromDate(date, 32)}`;
}

function sortedUnique(values: Iterable<string>): string[] {
    return [...new Set(values)].sort();
}

export class RefreshJob {
    constructor(
        private readonly registry: ConnectorRegistry,
        private readonly store: KnowledgeStore,
        private readonly resolver: Resolver,
    ) {}

    async execute(
        context: KnowledgeContext,
        realms: readonly string[],
        previous: Readonly<Record<string, string>>,
        refreshId: string = generateRefreshId(),
    ): Promise<RefreshResponse> {
        const startTime = Date.now();
        const connectors = this.registry.getAll().filter((connector) => realms.length === 0 || realms.includes(connector.realm));

        const results = await Promise.all(connectors.map((connector) => this.refreshConnector(context, connector, refreshId, previous[connector.realm])));
        const uris = sortedUnique(results.flat());

        log('Refresh complete', { refreshId, realms: connectors.map((connector) => connector.realm), uris: uris.length, durationMs: Date.now() - startTime });
        return { refreshId, uris };
    }

    /**
     * URIs the caller may access among the ones changed since `previous`.
     * A failing connector contributes nothing.
     */
    private async refreshConnector(context: KnowledgeContext, connector: Connector, refreshId: string, previous: string | undefined): Promise<string[]> {
        const refresh = connector.refresh?.bind(connector);
        if (!refresh) {
            return [];
        }

        try {
            const locators = await context.run(connector.realm, 'refresh', () => refresh(context));
            const changed = await this.saveLocators(context, connector, locators);
            await this.store.saveRefresh(
                connector.realm,
                refreshId,
                [...changed.values()].sort((a, b) => (a.toString() < b.toString() ? -1 : 1)),
            );

            const resolvedNew = await Promise.all(
                locators.map(async (locator) => ((await this.resolver.tryResolveLocator(context, locator)) ? connector.resourceUri(locator).toString() : null)),
            );

            const earlier = previous ? await this.store.readRefreshesSince(connector.realm, previous) : [];
            const resolvedOld = await this.resolver.tryInferAndResolveLocators(
                context,
                earlier.filter((uri) => !changed.has(uri.toString())).map((uri): Reference => ({ kind: 'knowledge', uri })),
            );

            return sortedUnique([...resolvedNew.filter((uri): uri is string => uri !== null), ...resolvedOld.keys()]);
        } catch (error) {
            if (error instanceof StoppedError) throw error;
            log('Failed to refresh connector', { realm: connector.realm, error: error instanceof Error ? error.message : String(error) });
            return [];
        }
    }

    /**
     * Remember the locator of every changed resource not loaded yet, so a
     * later load skips dispatch
     */
    private async saveLocators(context: KnowledgeContext, connector: Connector, locators: readonly Locator[]): Promise<Map<string, KnowledgeUri>> {
        const changed = new Map<string, KnowledgeUri>();
        for (const locator of locators) {
            if (locator.realm !== connector.realm) {
                throw IntegrationError.badConnector(connector.realm, `refresh locator realm '${locator.realm}' does not match`);
            }
            const uri = connector.resourceUri(locator);
            changed.set(uri.toString(), uri);
            if (!(await this.store.readHistory(context, uri))) {
                await this.store.saveAlias(context, uri.toString(), locator);
            }
        }
        return changed;
    }
}
