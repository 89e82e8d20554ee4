import { InvalidArgumentError, RemoteFetchError, RemoteWriteError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Schema } from '../schema/schema.js';
import type { CollectionRef, RawRecord, RecordEndpoint, WireProperty } from '../types.js';
import { PropertyBinding } from './binding.js';
import { mapIdentity, type RecordIdentity } from './record-mapper.js';

/**
 * - `new`: created locally, never written.
 * - `bound`: mirrors a server record, possibly with unsaved changes.
 * - `committed`: the last commit succeeded and nothing changed since.
 */
export type RecordState = 'new' | 'bound' | 'committed';

/** Shared by every record of one model. */
export interface RecordContext {
  collection: CollectionRef;
  schema: Schema;
  endpoint: RecordEndpoint;
  logger: Logger;
}

/** Member names every record carries; field accessors may not reuse them. */
export const RECORD_INSTANCE_MEMBERS: readonly string[] = ['context', 'binding', 'identity', 'currentState'];

export class TypedRecord {
  private readonly binding: PropertyBinding;
  private identity: RecordIdentity | null;
  private currentState: RecordState;

  constructor(
    private readonly context: RecordContext,
    raw?: RawRecord,
  ) {
    this.binding = new PropertyBinding(context.schema, raw?.properties);
    this.identity = raw === undefined ? null : mapIdentity(raw);
    this.currentState = raw === undefined ? 'new' : 'bound';
  }

  get id(): string | undefined {
    return this.identity?.id;
  }

  get createdTime(): Date | null {
    return this.identity?.createdTime ?? null;
  }

  get lastEditedTime(): Date | null {
    return this.identity?.lastEditedTime ?? null;
  }

  get url(): string | null {
    return this.identity?.url ?? null;
  }

  get archived(): boolean {
    return this.identity?.archived ?? false;
  }

  get state(): RecordState {
    return this.currentState;
  }

  get collection(): CollectionRef {
    return this.context.collection;
  }

  /** Property names changed since the last successful write. */
  get dirty(): ReadonlySet<string> {
    return this.binding.dirty;
  }

  get(name: string): unknown {
    return this.binding.get(name);
  }

  set(name: string, value: unknown): this {
    this.binding.set(name, value);
    this.touch();
    return this;
  }

  raw(name: string): WireProperty | undefined {
    return this.binding.raw(name);
  }

  setRaw(name: string, wire: WireProperty): this {
    this.binding.setRaw(name, wire);
    this.touch();
    return this;
  }

  /**
   * Writes local changes. A new record is created with every property set
   * so far; a bound one sends only its dirty properties. Nothing is sent
   * when there are no changes. On failure the record is left as it was, so
   * calling commit() again retries the same write.
   */
  async commit(): Promise<this> {
    const { collection, endpoint, logger } = this.context;

    if (this.currentState === 'new') {
      const properties = this.binding.snapshotDirty();
      let created: RawRecord;
      try {
        created = await endpoint.create(collection, properties);
      } catch (err) {
        throw new RemoteWriteError(undefined, err);
      }
      this.bind(created);
      this.currentState = 'committed';
      logger.info({ collection, recordId: created.id }, 'record created');
      return this;
    }

    if (!this.binding.isDirty) {
      logger.debug({ collection, recordId: this.id }, 'no changes to commit');
      return this;
    }

    const recordId = this.requireId('commit');
    const properties = this.binding.snapshotDirty();
    let updated: RawRecord;
    try {
      updated = await endpoint.update(recordId, properties);
    } catch (err) {
      throw new RemoteWriteError(recordId, err);
    }
    this.bind(updated);
    this.currentState = 'committed';
    logger.info({ collection, recordId, properties: Object.keys(properties) }, 'record updated');
    return this;
  }

  /** Reloads from the server, discarding local changes. */
  async refresh(): Promise<this> {
    if (this.currentState === 'new') {
      throw new InvalidArgumentError('Cannot refresh a record that has not been committed');
    }
    const recordId = this.requireId('refresh');
    let fresh: RawRecord;
    try {
      fresh = await this.context.endpoint.retrieve(recordId);
    } catch (err) {
      throw new RemoteFetchError(0, err);
    }
    this.bind(fresh);
    this.currentState = 'bound';
    this.context.logger.debug({ collection: this.context.collection, recordId }, 'record refreshed');
    return this;
  }

  /** Moves the record to the trash. Unsaved property changes stay pending. */
  archive(): Promise<this> {
    return this.changeArchived(true);
  }

  /** Takes the record back out of the trash. */
  restore(): Promise<this> {
    return this.changeArchived(false);
  }

  private async changeArchived(archived: boolean): Promise<this> {
    const operation = archived ? 'archive' : 'restore';
    if (this.currentState === 'new') {
      throw new InvalidArgumentError(`Cannot ${operation} a record that has not been committed`);
    }
    const recordId = this.requireId(operation);
    let result: RawRecord;
    try {
      result = await this.context.endpoint.setArchived(recordId, archived);
    } catch (err) {
      throw new RemoteWriteError(recordId, err);
    }
    this.identity = mapIdentity(result);
    this.context.logger.info(
      { collection: this.context.collection, recordId },
      archived ? 'record archived' : 'record restored',
    );
    return this;
  }

  private bind(raw: RawRecord): void {
    this.identity = mapIdentity(raw);
    this.binding.adopt(raw.properties);
  }

  private touch(): void {
    if (this.currentState === 'committed') {
      this.currentState = 'bound';
    }
  }

  private requireId(operation: string): string {
    if (this.identity === null) {
      throw new InvalidArgumentError(`Cannot ${operation} a record without an id`);
    }
    return this.identity.id;
  }
}
