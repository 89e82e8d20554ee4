import { InvalidArgumentError, SchemaTypeError, UnknownPropertyError } from '../errors.js';
import type {
  CompoundFilter,
  ConditionFamily,
  Constraint,
  FilterNode,
  PropertyFilter,
  PropertyTag,
  SchemaLookup,
  TimestampFilter,
  TimestampKind,
} from './types.js';

/** Condition family accepted by each property type; null = not filterable. */
export const PROPERTY_FAMILIES: Readonly<Record<PropertyTag, ConditionFamily | null>> = {
  title: 'text',
  rich_text: 'text',
  url: 'text',
  email: 'text',
  phone_number: 'text',
  number: 'number',
  checkbox: 'checkbox',
  select: 'select',
  status: 'select',
  multi_select: 'multi_select',
  date: 'date',
  created_time: 'date',
  last_edited_time: 'date',
  people: 'people',
  created_by: 'people',
  last_edited_by: 'people',
  files: 'files',
  relation: 'relation',
  formula: 'formula',
  rollup: null,
};

/** Wire tag used when the property's declared type is unknown. */
const DEFAULT_TAGS: Readonly<Record<ConditionFamily, PropertyTag>> = {
  text: 'rich_text',
  number: 'number',
  checkbox: 'checkbox',
  select: 'select',
  multi_select: 'multi_select',
  date: 'date',
  people: 'people',
  files: 'files',
  relation: 'relation',
  formula: 'formula',
};

const TIMESTAMPS: ReadonlySet<string> = new Set<TimestampKind>(['created_time', 'last_edited_time']);

export function isTimestampKind(value: unknown): value is TimestampKind {
  return typeof value === 'string' && TIMESTAMPS.has(value);
}

function assertFamily(property: string, type: PropertyTag, constraint: Constraint): void {
  const family = PROPERTY_FAMILIES[type];
  if (family === null) {
    throw new SchemaTypeError(`Property "${property}" of type ${type} cannot be filtered`);
  }
  if (family !== constraint.family) {
    throw new SchemaTypeError(
      `Property "${property}" of type ${type} takes ${family} conditions, not ${constraint.family} ("${constraint.operator}")`,
    );
  }
}

/**
 * Binds a constraint to a property. With a declared `type` the constraint's
 * family must match it; without one the constraint passes through and the
 * wire tag falls back to the family's default.
 */
export function propertyFilter(property: string, constraint: Constraint, type?: PropertyTag): PropertyFilter {
  if (property.length === 0) {
    throw new InvalidArgumentError('Property name must be a non-empty string');
  }
  if (type === undefined) {
    return Object.freeze({ kind: 'property', property, tag: DEFAULT_TAGS[constraint.family], constraint });
  }
  assertFamily(property, type, constraint);
  return Object.freeze({ kind: 'property', property, tag: type, type, constraint });
}

export function timestampFilter(timestamp: TimestampKind, constraint: Constraint): TimestampFilter {
  if (!isTimestampKind(timestamp)) {
    throw new InvalidArgumentError(`Unknown timestamp: "${String(timestamp)}"`);
  }
  if (constraint.family !== 'date') {
    throw new SchemaTypeError(`Timestamp ${timestamp} takes date conditions, not ${constraint.family}`);
  }
  return Object.freeze({ kind: 'timestamp', timestamp, constraint });
}

function childrenOf(node: FilterNode, op: 'and' | 'or'): readonly FilterNode[] {
  if ((node.kind === 'and' || node.kind === 'or') && node.kind === op) {
    return node.filters;
  }
  return [node];
}

/**
 * Combines `node` into `existing` with the given operator. When `existing`
 * already uses that operator the node is appended to its children instead of
 * adding a nesting level.
 */
export function combine(op: 'and' | 'or', existing: FilterNode | null, node: FilterNode): FilterNode {
  if (existing === null) {
    return node;
  }
  const head = childrenOf(existing, op);
  const tail = childrenOf(node, op);
  return Object.freeze({ kind: op, filters: Object.freeze([...head, ...tail]) });
}

function compound(op: 'and' | 'or', filters: readonly FilterNode[]): CompoundFilter {
  if (filters.length === 0) {
    throw new InvalidArgumentError(`"${op}" needs at least one filter`);
  }
  const children = filters.flatMap((f) => childrenOf(f, op));
  return Object.freeze({ kind: op, filters: Object.freeze(children) });
}

/** All of the given filters must match. */
export function and(...filters: FilterNode[]): CompoundFilter {
  return compound('and', filters);
}

/** Any of the given filters may match. */
export function or(...filters: FilterNode[]): CompoundFilter {
  return compound('or', filters);
}

/**
 * Checks every property filter in the tree against a collection schema and
 * re-tags it with the declared type.
 */
export function resolveFilter(node: FilterNode, schema: SchemaLookup | undefined): FilterNode {
  if (schema === undefined) {
    return node;
  }
  switch (node.kind) {
    case 'timestamp':
      return node;
    case 'property': {
      const declared = schema.get(node.property);
      if (declared === undefined) {
        throw new UnknownPropertyError(node.property);
      }
      if (node.type === declared.tag) {
        return node;
      }
      return propertyFilter(node.property, node.constraint, declared.tag);
    }
    default:
      return Object.freeze({
        kind: node.kind,
        filters: Object.freeze(node.filters.map((child) => resolveFilter(child, schema))),
      });
  }
}
