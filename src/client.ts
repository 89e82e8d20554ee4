import { resolveConfig, type ConfigOverrides, type DocDbConfig, type Environment } from './config.js';
import { InvalidArgumentError } from './errors.js';
import { HttpEndpoint } from './http/endpoint.js';
import { createLogger, type Logger } from './logger.js';
import { QueryBuilder } from './query/builder.js';
import { CollectionModel, type CollectionDefinition } from './records/collection.js';
import type { FieldMap } from './schema/schema.js';
import type { CollectionRef, Endpoint, RawRecord } from './types.js';

export interface ClientOptions extends ConfigOverrides {
  /** Use this endpoint instead of an HTTP one built from the configuration. */
  endpoint?: Endpoint;
  logger?: Logger;
  /** Environment to read `DOCDB_*` variables from. Defaults to `process.env`. */
  env?: Environment;
}

export class DocDbClient {
  readonly config: DocDbConfig;
  readonly endpoint: Endpoint;
  readonly logger: Logger;

  constructor(options: ClientOptions = {}) {
    const { endpoint, logger, env, ...overrides } = options;
    this.config = resolveConfig(overrides, env);
    this.logger = logger ?? createLogger({ level: this.config.logLevel });
    this.endpoint = endpoint ?? this.httpEndpoint();
  }

  /** Binds a declared model to this client's endpoint. */
  collection<F extends FieldMap>(definition: CollectionDefinition<F>): CollectionModel<F> {
    return new CollectionModel(definition, {
      endpoint: this.endpoint,
      logger: this.logger,
      defaultPageSize: this.config.pageSize,
    });
  }

  /** Untyped query: filters are not checked and results stay raw. */
  query(collection: CollectionRef): QueryBuilder<RawRecord> {
    if (collection.length === 0) {
      throw new InvalidArgumentError('collection must be a non-empty string');
    }
    return new QueryBuilder<RawRecord>({
      collection,
      endpoint: this.endpoint,
      map: (raw) => raw,
      defaultPageSize: this.config.pageSize,
      logger: this.logger,
    });
  }

  private httpEndpoint(): HttpEndpoint {
    const { apiUrl, token, apiVersion, timeoutMs } = this.config;
    if (apiUrl === undefined || token === undefined) {
      throw new InvalidArgumentError('apiUrl and token are required unless an endpoint is given');
    }
    return new HttpEndpoint({ baseUrl: apiUrl, token, apiVersion, timeoutMs, logger: this.logger });
  }
}

export function createClient(options: ClientOptions = {}): DocDbClient {
  return new DocDbClient(options);
}
