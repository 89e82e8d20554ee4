import { InvalidArgumentError } from '../errors.js';
import { withDefault, type AnyPropertyType, type InputOf, type ValueOf } from './property-types.js';

/** One registered property: the remote property name and its type. */
export interface Field<P extends AnyPropertyType = AnyPropertyType> {
  readonly name: string;
  readonly type: P;
  /** Read in place of the type's empty value when the record lacks the property. */
  readonly default?: ValueOf<P>;
}

export interface FieldOptions<P extends AnyPropertyType> {
  default?: ValueOf<P>;
}

/** Accessor key → field. Key order is registration order. */
export type FieldMap = Record<string, Field>;

/** Property name → type. Built once per model and shared by its records. */
export type Schema = ReadonlyMap<string, AnyPropertyType>;

export function field<P extends AnyPropertyType>(name: string, type: P, options: FieldOptions<P> = {}): Field<P> {
  if (name.length === 0) {
    throw new InvalidArgumentError('field name must be a non-empty string');
  }
  const fallback = options.default;
  if (fallback !== undefined && !type.readOnly) {
    const encoded = type.encode(fallback);
    if (!encoded.ok) {
      throw new InvalidArgumentError(`Invalid default for property "${name}": ${encoded.reason}`);
    }
  }
  return Object.freeze({ name, type, ...(fallback !== undefined ? { default: fallback } : {}) });
}

export function buildSchema(fields: FieldMap): Schema {
  const schema = new Map<string, AnyPropertyType>();
  for (const [key, entry] of Object.entries(fields)) {
    if (schema.has(entry.name)) {
      throw new InvalidArgumentError(`Property "${entry.name}" is registered twice (second time as "${key}")`);
    }
    schema.set(entry.name, entry.default === undefined ? entry.type : withDefault(entry.type, entry.default));
  }
  return Object.freeze(schema);
}

type IsReadOnly<P> = [InputOf<P>] extends [never] ? true : false;

/** Accessor keys whose property type accepts writes. */
export type WritableKey<F extends FieldMap> = {
  [K in keyof F]: IsReadOnly<F[K]['type']> extends true ? never : K;
}[keyof F];

/** Initial values for a new record, keyed by accessor. */
export type FieldInputs<F extends FieldMap> = {
  [K in WritableKey<F>]?: InputOf<F[K]['type']> | undefined;
};
