/**
 * Neo4jClientBuilder - Builds aliased clients on top of neo4j-driver
 *
 * A connection registered with `autoRouting: true` is served by an
 * AutoRoutedSession: its URL becomes the discovery seed, and every pool it
 * rebuilds is made by a fresh builder with the same driver settings. All
 * other connections talk to exactly one server.
 */

import neo4j from 'neo4j-driver';
import type { AuthToken, Config, Driver } from 'neo4j-driver';
import { DEFAULT_CONNECTION_CONFIG, formatUrl, parseUrl } from '@cypher-router/core';
import type { ConnectionConfig } from '@cypher-router/core';
import type { ClientBuilder, Session } from '../types';
import { AutoRoutedSession } from '../AutoRoutedSession';
import { DirectSession } from './DirectSession';
import { DriverClient } from './DriverClient';
import { logger } from '../utils/logger';

/**
 * Routing URL schemes and the direct scheme a leaf connection uses instead,
 * so the driver does not route on its own.
 */
export const DIRECT_SCHEMES: Readonly<Record<string, string>> = {
  'neo4j': 'bolt',
  'neo4j+s': 'bolt+s',
  'neo4j+ssc': 'bolt+ssc',
};

export type DriverFactory = (url: string, auth: AuthToken | undefined, config: Config) => Driver;

export interface Neo4jClientBuilderOptions {
  /** Passed to every driver; integers are returned as numbers unless overridden */
  driverConfig?: Config;
  /** Creates drivers (default: neo4j.driver) */
  createDriver?: DriverFactory;
}

export interface DirectTarget {
  url: string;
  auth: AuthToken | undefined;
}

/**
 * Turn a configured URL into what the driver needs for a single server:
 * credentials move from the URL into a basic auth token and a routing scheme
 * is swapped for its direct counterpart.
 */
export function toDirectTarget(url: string): DirectTarget {
  const { user, pass, ...rest } = parseUrl(url);
  const scheme = rest.scheme === undefined ? 'bolt' : DIRECT_SCHEMES[rest.scheme] ?? rest.scheme;

  return {
    url: formatUrl({ ...rest, scheme }),
    auth: user === undefined
      ? undefined
      : neo4j.auth.basic(decodeURIComponent(user), decodeURIComponent(pass ?? '')),
  };
}

interface RegisteredConnection {
  url: string;
  config: ConnectionConfig;
}

export class Neo4jClientBuilder implements ClientBuilder {
  private readonly connections: Map<string, RegisteredConnection> = new Map();
  private readonly options: Neo4jClientBuilderOptions;

  constructor(options: Neo4jClientBuilderOptions = {}) {
    this.options = options;
  }

  static create(options?: Neo4jClientBuilderOptions): Neo4jClientBuilder {
    return new Neo4jClientBuilder(options);
  }

  /**
   * Register a connection. Registering an alias again replaces it.
   */
  public addConnection(alias: string, url: string, config: Partial<ConnectionConfig> = {}): this {
    this.connections.set(alias, {
      url,
      config: { ...DEFAULT_CONNECTION_CONFIG, ...config },
    });
    return this;
  }

  public build(): DriverClient {
    const sessions = new Map<string, Session>();

    try {
      for (const [alias, connection] of this.connections) {
        sessions.set(alias, this.createSession(connection));
      }
    } catch (err) {
      for (const [alias, session] of sessions) {
        session.close().catch(closeErr => {
          logger.warn({ alias, err: closeErr }, 'Failed to close connection after build error');
        });
      }
      throw err;
    }

    logger.debug({ aliases: [...sessions.keys()] }, 'Client built');
    return new DriverClient(sessions);
  }

  private createSession({ url, config }: RegisteredConnection): Session {
    if (!config.autoRouting) {
      return this.createDirectSession(url, config);
    }

    return new AutoRoutedSession({
      referenceSession: this.createDirectSession(url, config),
      baseUrl: parseUrl(url),
      createClientBuilder: () => new Neo4jClientBuilder(this.options),
      routing: { database: config.database },
      connection: config,
      ownsReferenceSession: true,
    });
  }

  private createDirectSession(url: string, config: ConnectionConfig): DirectSession {
    const target = toDirectTarget(url);
    const driverConfig: Config = {
      disableLosslessIntegers: true,
      ...this.options.driverConfig,
    };
    const createDriver = this.options.createDriver ?? neo4j.driver;

    return new DirectSession(createDriver(target.url, target.auth, driverConfig), config);
  }
}
