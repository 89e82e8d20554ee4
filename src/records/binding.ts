import { PropertyTypeError, UnknownPropertyError } from '../errors.js';
import type { AnyPropertyType } from '../schema/property-types.js';
import type { Schema } from '../schema/schema.js';
import type { PropertyBag, WireProperty } from '../types.js';

/**
 * Raw property values of one record plus the names changed since the last
 * successful write. Reads decode through the schema and never touch the
 * dirty set; only a write that passes validation adds to it.
 */
export class PropertyBinding {
  private values = new Map<string, WireProperty>();
  private readonly dirtyNames = new Set<string>();

  constructor(
    private readonly schema: Schema,
    properties: PropertyBag = {},
  ) {
    this.load(properties);
  }

  /** Names with unsaved changes, in the order they were first changed. */
  get dirty(): ReadonlySet<string> {
    return this.dirtyNames;
  }

  get isDirty(): boolean {
    return this.dirtyNames.size > 0;
  }

  get(name: string): unknown {
    const type = this.typeOf(name);
    const decoded = type.decode(this.values.get(name)?.[type.tag]);
    if (!decoded.ok) {
      throw new PropertyTypeError(name, `unreadable ${type.tag} value from the server: ${decoded.reason}`);
    }
    return decoded.value;
  }

  set(name: string, value: unknown): void {
    const type = this.typeOf(name);
    const encoded = type.encode(value);
    if (!encoded.ok) {
      throw new PropertyTypeError(name, encoded.reason);
    }
    this.values.set(name, this.wrap(name, type, encoded.value));
    this.dirtyNames.add(name);
  }

  /** Property in wire shape, or undefined when the record does not carry it. */
  raw(name: string): WireProperty | undefined {
    this.typeOf(name);
    const value = this.values.get(name);
    return value === undefined ? undefined : structuredClone(value);
  }

  /** Writes a property given in wire shape (`{ "<tag>": payload }`). */
  setRaw(name: string, wire: WireProperty): void {
    const type = this.typeOf(name);
    if (wire['type'] !== undefined && wire['type'] !== type.tag) {
      throw new PropertyTypeError(name, `expected a ${type.tag} property, got ${String(wire['type'])}`);
    }
    if (!(type.tag in wire)) {
      throw new PropertyTypeError(name, `missing "${type.tag}" payload`);
    }
    const checked = type.check(wire[type.tag]);
    if (!checked.ok) {
      throw new PropertyTypeError(name, checked.reason);
    }
    this.values.set(name, this.wrap(name, type, checked.value));
    this.dirtyNames.add(name);
  }

  /** Dirty properties as a partial bag, ready for a create or update call. */
  snapshotDirty(): PropertyBag {
    const bag: PropertyBag = {};
    for (const name of this.dirtyNames) {
      const type = this.typeOf(name);
      const value = this.values.get(name);
      bag[name] = { [type.tag]: value?.[type.tag] ?? null };
    }
    return bag;
  }

  clearDirty(): void {
    this.dirtyNames.clear();
  }

  /** Replaces every stored value with the server's and forgets local changes. */
  adopt(properties: PropertyBag): void {
    this.load(properties);
    this.dirtyNames.clear();
  }

  private load(properties: PropertyBag): void {
    this.values = new Map(Object.entries(properties).map(([name, wire]) => [name, structuredClone(wire)]));
  }

  private typeOf(name: string): AnyPropertyType {
    const type = this.schema.get(name);
    if (type === undefined) {
      throw new UnknownPropertyError(name);
    }
    return type;
  }

  private wrap(name: string, type: AnyPropertyType, payload: unknown): WireProperty {
    const previous = this.values.get(name);
    return {
      ...(previous?.['id'] !== undefined ? { id: previous['id'] } : {}),
      type: type.tag,
      [type.tag]: payload,
    };
  }
}
