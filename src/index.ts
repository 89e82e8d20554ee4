export { createClient, DocDbClient } from './client.js';
export type { ClientOptions } from './client.js';
export { resolveConfig, DEFAULT_API_VERSION, DEFAULT_TIMEOUT_MS } from './config.js';
export type { ConfigOverrides, DocDbConfig, Environment } from './config.js';
export { createLogger, silentLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';
export {
  DocDbError,
  SchemaTypeError,
  InvalidArgumentError,
  UnknownPropertyError,
  PropertyTypeError,
  RemoteFetchError,
  RemoteWriteError,
  EndpointError,
} from './errors.js';
export type {
  CollectionRef,
  WireProperty,
  PropertyBag,
  RawRecord,
  QueryResult,
  CollectionEndpoint,
  RecordEndpoint,
  Endpoint,
} from './types.js';

export {
  constraint,
  text,
  number,
  checkbox,
  select,
  multiSelect,
  date,
  people,
  relation,
  files,
  formula,
  OPERATORS,
} from './query/constraints.js';
export type { DateInput } from './query/constraints.js';
export { propertyFilter, timestampFilter, and, or } from './query/filters.js';
export { compileQuery, compileFilter, compileCanonicalKey, MAX_PAGE_SIZE } from './query/compiler.js';
export { QueryBuilder } from './query/builder.js';
export type { QueryBuilderConfig } from './query/builder.js';
export type {
  ConditionFamily,
  PropertyTag,
  TimestampKind,
  SortDirection,
  Constraint,
  PropertyFilter,
  TimestampFilter,
  CompoundFilter,
  FilterNode,
  SortSpec,
  FilterTarget,
  QueryPayload,
} from './query/types.js';
export { ResultSequence } from './pagination/result-sequence.js';
export type { SequenceState, PageLoader } from './pagination/result-sequence.js';

export { prop } from './schema/property-types.js';
export type {
  PropertyType,
  DateValue,
  DateInputValue,
  FileValue,
  FormulaValue,
  RollupValue,
  ValueOf,
  InputOf,
} from './schema/property-types.js';
export { field, buildSchema } from './schema/schema.js';
export type { Field, FieldMap, FieldInputs, FieldOptions, Schema } from './schema/schema.js';
export { PropertyBinding } from './records/binding.js';
export { TypedRecord } from './records/record.js';
export type { RecordState } from './records/record.js';
export { CollectionModel, defineCollection } from './records/collection.js';
export type { CollectionDefinition, CollectionOptions, RecordOf } from './records/collection.js';
