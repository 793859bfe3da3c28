/**
 * Connector Registry
 *
 * Connectors in registration order. Dispatch asks each in turn and stops at
 * the first one that claims the reference, or at the first UnavailableError.
 */

import debug from 'debug';
import { IntegrationError, UnavailableError } from '../errors';
import type { Locator } from '../resources/types';
import { KnowledgeUri } from '../uri/KnowledgeUri';
import { Reference, referenceToString } from '../uri/references';
import type { KnowledgeContext } from './context';
import type { Connector } from './types';

const log = debug('knowledge:connectors');

export interface LocatedReference {
    readonly connector: Connector;
    readonly locator: Locator;
    readonly resourceUri: KnowledgeUri;
}

export class ConnectorRegistry {
    private connectors = new Map<string, Connector>();

    /**
     * Register a connector; realms are unique
     */
    register(connector: Connector): void {
        if (this.connectors.has(connector.realm)) {
            throw IntegrationError.duplicate(connector.realm);
        }

        this.connectors.set(connector.realm, connector);
        log('Registered connector', { realm: connector.realm });
    }

    registerAll(connectors: Connector[]): void {
        for (const connector of connectors) {
            this.register(connector);
        }
    }

    get(realm: string): Connector | undefined {
        return this.connectors.get(realm);
    }

    /**
     * Connector owning a locator; a locator always comes from a registered one
     */
    require(realm: string): Connector {
        const connector = this.connectors.get(realm);
        if (!connector) {
            throw IntegrationError.badConnector(realm, 'no connector registered for realm');
        }
        return connector;
    }

    /**
     * All connectors, in dispatch order
     */
    getAll(): Connector[] {
        return Array.from(this.connectors.values());
    }

    has(realm: string): boolean {
        return this.connectors.has(realm);
    }

    /**
     * Find the connector owning a reference.
     * Throws UnavailableError when no connector claims it.
     */
    async locate(context: KnowledgeContext, reference: Reference): Promise<LocatedReference> {
        for (const connector of this.connectors.values()) {
            const locator = await context.run(connector.realm, 'locator', () => connector.locator(context, reference));
            if (!locator) {
                continue;
            }

            if (locator.realm !== connector.realm) {
                throw IntegrationError.badConnector(connector.realm, `locator realm '${locator.realm}' does not match`);
            }

            const resourceUri = connector.resourceUri(locator);
            log('Located reference', { reference: referenceToString(reference), realm: connector.realm, uri: resourceUri.toString() });
            return { connector, locator, resourceUri };
        }

        log('No connector for reference', { reference: referenceToString(reference) });
        throw new UnavailableError({ extra: { reference: referenceToString(reference) } });
    }
}
