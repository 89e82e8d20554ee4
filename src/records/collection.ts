import { DocDbError, InvalidArgumentError, RemoteFetchError, UnknownPropertyError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { QueryBuilder } from '../query/builder.js';
import type { ValueOf } from '../schema/property-types.js';
import { buildSchema, type FieldInputs, type FieldMap, type Schema, type WritableKey } from '../schema/schema.js';
import type { CollectionRef, Endpoint, RawRecord } from '../types.js';
import { RECORD_INSTANCE_MEMBERS, TypedRecord, type RecordContext } from './record.js';

export interface CollectionDefinition<F extends FieldMap> {
  /** Remote collection (database) id. */
  collection: CollectionRef;
  /** Accessor key → `field(propertyName, type)`, in registration order. */
  fields: F;
}

export interface CollectionOptions {
  endpoint: Endpoint;
  logger?: Logger;
  defaultPageSize?: number;
}

/** A record of a declared model: the record API plus one accessor per field. */
export type RecordOf<F extends FieldMap> = TypedRecord & {
  -readonly [K in WritableKey<F>]: ValueOf<F[K]['type']>;
} & {
  readonly [K in Exclude<keyof F, WritableKey<F>>]: ValueOf<F[K]['type']>;
};

function isReserved(key: string): boolean {
  return key in TypedRecord.prototype || RECORD_INSTANCE_MEMBERS.includes(key);
}

/** Subclass of TypedRecord whose prototype carries one accessor per field. */
function accessorClass(fields: FieldMap): typeof TypedRecord {
  class ModelRecord extends TypedRecord {}
  for (const [key, entry] of Object.entries(fields)) {
    if (isReserved(key)) {
      throw new InvalidArgumentError(`Field key "${key}" clashes with a record member`);
    }
    Object.defineProperty(ModelRecord.prototype, key, {
      get(this: TypedRecord): unknown {
        return this.get(entry.name);
      },
      set(this: TypedRecord, value: unknown): void {
        this.set(entry.name, value);
      },
      enumerable: true,
    });
  }
  return ModelRecord;
}

function hasAccessors<F extends FieldMap>(record: TypedRecord, fields: F): record is RecordOf<F> {
  return Object.keys(fields).every((key) => key in record);
}

/** A declared model bound to an endpoint: record factory plus typed queries. */
export class CollectionModel<F extends FieldMap> {
  readonly schema: Schema;
  private readonly recordClass: typeof TypedRecord;
  private readonly context: RecordContext;

  constructor(
    readonly definition: CollectionDefinition<F>,
    private readonly options: CollectionOptions,
  ) {
    if (definition.collection.length === 0) {
      throw new InvalidArgumentError('collection must be a non-empty string');
    }
    this.schema = buildSchema(definition.fields);
    this.recordClass = accessorClass(definition.fields);
    this.context = {
      collection: definition.collection,
      schema: this.schema,
      endpoint: options.endpoint,
      logger: options.logger ?? silentLogger,
    };
  }

  get collection(): CollectionRef {
    return this.definition.collection;
  }

  query(): QueryBuilder<RecordOf<F>> {
    return new QueryBuilder<RecordOf<F>>({
      collection: this.collection,
      endpoint: this.options.endpoint,
      map: (raw) => this.fromRaw(raw),
      schema: this.schema,
      logger: this.context.logger,
      ...(this.options.defaultPageSize !== undefined ? { defaultPageSize: this.options.defaultPageSize } : {}),
    });
  }

  /** New local record; the given values count as changes for the first commit. */
  create(initial?: FieldInputs<F>): RecordOf<F> {
    const record = this.typed(new this.recordClass(this.context));
    const fields: FieldMap = this.definition.fields;
    const entries: [string, unknown][] = Object.entries(initial ?? {});
    for (const [key, value] of entries) {
      const entry = fields[key];
      if (entry === undefined) {
        throw new UnknownPropertyError(key, `Unknown field: "${key}"`);
      }
      if (value !== undefined) {
        record.set(entry.name, value);
      }
    }
    return record;
  }

  /** Binds a server record to this model. */
  fromRaw(raw: RawRecord): RecordOf<F> {
    return this.typed(new this.recordClass(this.context, raw));
  }

  async retrieve(recordId: string): Promise<RecordOf<F>> {
    let raw: RawRecord;
    try {
      raw = await this.options.endpoint.retrieve(recordId);
    } catch (err) {
      throw new RemoteFetchError(0, err);
    }
    return this.fromRaw(raw);
  }

  private typed(record: TypedRecord): RecordOf<F> {
    if (!hasAccessors(record, this.definition.fields)) {
      throw new DocDbError(`Record accessors for "${this.collection}" are missing`);
    }
    return record;
  }
}

/**
 * Declares a typed model over a remote collection.
 *
 * @example
 * const Tasks = defineCollection(
 *   {
 *     collection: 'tasks-db',
 *     fields: {
 *       name: field('Name', prop.title()),
 *       priority: field('Priority', prop.select(['High', 'Low'])),
 *       due: field('Due Date', prop.date()),
 *     },
 *   },
 *   { endpoint },
 * );
 * const task = Tasks.create({ name: 'Write docs', priority: 'High' });
 * await task.commit();
 */
export function defineCollection<F extends FieldMap>(
  definition: CollectionDefinition<F>,
  options: CollectionOptions,
): CollectionModel<F> {
  return new CollectionModel(definition, options);
}
