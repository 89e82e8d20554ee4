import { z } from 'zod';
import type { PropertyTag } from '../query/types.js';

export type Outcome<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Type descriptor for one property: how its wire payload decodes into a
 * native value, and how a native input encodes back. `V` is what reads
 * return, `I` what writes accept (`never` for read-only types).
 */
export interface PropertyType<V = unknown, I = V> {
  readonly tag: PropertyTag;
  readonly readOnly: boolean;
  /** Allowed option names (select, status, multi-select), when declared. */
  readonly options: readonly string[] | undefined;
  /** Value of a property that is absent from the record. */
  readonly empty: V;
  decode(payload: unknown): Outcome<V>;
  encode(input: I): Outcome<unknown>;
  /** Validates a payload in wire shape, for raw writes. */
  check(payload: unknown): Outcome<unknown>;
}

export type AnyPropertyType = PropertyType<unknown, unknown>;

export type ValueOf<P> = P extends PropertyType<infer V, infer _I> ? V : never;
export type InputOf<P> = P extends PropertyType<infer _V, infer I> ? I : never;

export interface DateValue {
  start: string;
  end: string | null;
}

export type DateLike = Date | string;

export type DateInputValue = DateLike | { start: DateLike; end?: DateLike | null } | null;

export interface FileValue {
  name: string;
  url: string;
}

export type FormulaValue = string | number | boolean | DateValue | null;

export type RollupValue = number | DateValue | unknown[] | null;

/** The same type, except that a property the record does not carry reads as `fallback`. */
export function withDefault(type: AnyPropertyType, fallback: unknown): AnyPropertyType {
  return {
    ...type,
    empty: fallback,
    decode: (payload) => (payload === undefined ? ok(structuredClone(fallback)) : type.decode(payload)),
  };
}

function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

function fail<T>(reason: string): Outcome<T> {
  return { ok: false, reason };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ---------------------------------------------------------------------------
// Wire payload schemas
// ---------------------------------------------------------------------------

const richTextItem = z
  .object({
    type: z.string().optional(),
    plain_text: z.string().optional(),
    text: z.object({ content: z.string() }).passthrough().optional(),
  })
  .passthrough();

const richTextPayload = z.array(richTextItem);

const optionPayload = z
  .object({
    name: z.string(),
    id: z.string().optional(),
    color: z.string().optional(),
  })
  .passthrough();

const dateRangePayload = z
  .object({
    start: z.string(),
    end: z.string().nullable().optional(),
    time_zone: z.string().nullable().optional(),
  })
  .passthrough();

const referencePayload = z.object({ id: z.string() }).passthrough();

const filePayload = z
  .object({
    name: z.string(),
    type: z.string().optional(),
    external: z.object({ url: z.string() }).passthrough().optional(),
    file: z.object({ url: z.string() }).passthrough().optional(),
  })
  .passthrough();

const formulaPayload = z.discriminatedUnion('type', [
  z.object({ type: z.literal('string'), string: z.string().nullable() }),
  z.object({ type: z.literal('number'), number: z.number().nullable() }),
  z.object({ type: z.literal('boolean'), boolean: z.boolean().nullable() }),
  z.object({ type: z.literal('date'), date: dateRangePayload.nullable() }),
]);

const rollupPayload = z.discriminatedUnion('type', [
  z.object({ type: z.literal('number'), number: z.number().nullable() }).passthrough(),
  z.object({ type: z.literal('date'), date: dateRangePayload.nullable() }).passthrough(),
  z.object({ type: z.literal('array'), array: z.array(z.unknown()) }).passthrough(),
]);

// ---------------------------------------------------------------------------
// Native input schemas
// ---------------------------------------------------------------------------

const dateLike = z.union([
  z.date().transform((d) => d.toISOString()),
  z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'expected an ISO 8601 date'),
]);

const dateInput = z.union([
  z.null(),
  dateLike.transform((start): DateValue => ({ start, end: null })),
  z
    .object({ start: dateLike, end: dateLike.nullable().optional() })
    .transform((range): DateValue => ({ start: range.start, end: range.end ?? null })),
]);

const fileInput = z.object({ name: z.string().min(1), url: z.string().url() });

// ---------------------------------------------------------------------------
// Decoders shared by several types
// ---------------------------------------------------------------------------

function plainText(items: z.infer<typeof richTextPayload>): string {
  return items.map((item) => item.plain_text ?? item.text?.content ?? '').join('');
}

function toDateValue(range: z.infer<typeof dateRangePayload> | null): DateValue | null {
  return range === null ? null : { start: range.start, end: range.end ?? null };
}

interface TypeDef<V, P, N, I> {
  tag: PropertyTag;
  payload: z.ZodType<P, z.ZodTypeDef, unknown>;
  empty: V;
  decode: (payload: P) => V;
  /** Parses a native input into its normalised form; absent for read-only types. */
  input?: z.ZodType<N, z.ZodTypeDef, I>;
  encode?: (value: N) => P;
  options?: readonly string[];
  /** Option names a normalised input uses, for membership checks. */
  optionsOf?: (value: N) => readonly string[];
}

function defineType<V, P, N = never, I = N>(def: TypeDef<V, P, N, I>): PropertyType<V, I> {
  const { input, encode } = def;
  const readOnly = input === undefined || encode === undefined;

  function checkOptions(value: N): string | undefined {
    if (def.options === undefined || def.optionsOf === undefined) {
      return undefined;
    }
    const unknown = def.optionsOf(value).filter((name) => !def.options?.includes(name));
    return unknown.length > 0 ? `unknown option(s): ${unknown.join(', ')}` : undefined;
  }

  return {
    tag: def.tag,
    readOnly,
    options: def.options,
    empty: def.empty,

    decode(payload: unknown): Outcome<V> {
      if (payload === undefined) {
        return ok(def.empty);
      }
      const parsed = def.payload.safeParse(payload);
      return parsed.success ? ok(def.decode(parsed.data)) : fail(describeIssues(parsed.error));
    },

    encode(value: I): Outcome<unknown> {
      if (input === undefined || encode === undefined) {
        return fail(`${def.tag} properties are read-only`);
      }
      const parsed = input.safeParse(value);
      if (!parsed.success) {
        return fail(describeIssues(parsed.error));
      }
      const optionError = checkOptions(parsed.data);
      return optionError === undefined ? ok(encode(parsed.data)) : fail(optionError);
    },

    check(payload: unknown): Outcome<unknown> {
      if (readOnly) {
        return fail(`${def.tag} properties are read-only`);
      }
      const parsed = def.payload.safeParse(payload);
      if (!parsed.success) {
        return fail(describeIssues(parsed.error));
      }
      const decoded = def.decode(parsed.data);
      const reencoded = input?.safeParse(decoded);
      if (reencoded !== undefined && reencoded.success) {
        const optionError = checkOptions(reencoded.data);
        if (optionError !== undefined) {
          return fail(optionError);
        }
      }
      return ok(parsed.data);
    },
  };
}

function textType(tag: 'title' | 'rich_text'): PropertyType<string, string> {
  return defineType({
    tag,
    payload: richTextPayload,
    empty: '',
    decode: plainText,
    input: z.string(),
    encode: (value) => (value.length === 0 ? [] : [{ type: 'text', text: { content: value } }]),
  });
}

function stringType(
  tag: 'url' | 'email' | 'phone_number',
  input: z.ZodType<string, z.ZodTypeDef, unknown>,
): PropertyType<string | null, string | null> {
  return defineType({
    tag,
    payload: z.string().nullable(),
    empty: null,
    decode: (value) => value,
    input: input.nullable(),
    encode: (value) => value,
  });
}

function singleOption(tag: 'select' | 'status', options?: readonly string[]): PropertyType<string | null, string | null> {
  return defineType({
    tag,
    payload: optionPayload.nullable(),
    empty: null,
    decode: (option) => option?.name ?? null,
    input: z.string().min(1).nullable(),
    encode: (name) => (name === null ? null : { name }),
    ...(options !== undefined ? { options: Object.freeze([...options]) } : {}),
    optionsOf: (name) => (name === null ? [] : [name]),
  });
}

/** Property type descriptors, one factory per property type. */
export const prop = {
  title: (): PropertyType<string, string> => textType('title'),

  richText: (): PropertyType<string, string> => textType('rich_text'),

  number: (): PropertyType<number | null, number | null> =>
    defineType({
      tag: 'number',
      payload: z.number().nullable(),
      empty: null,
      decode: (value) => value,
      input: z.number().finite().nullable(),
      encode: (value) => value,
    }),

  checkbox: (): PropertyType<boolean, boolean> =>
    defineType({
      tag: 'checkbox',
      payload: z.boolean(),
      empty: false,
      decode: (value) => value,
      input: z.boolean(),
      encode: (value) => value,
    }),

  select: (options?: readonly string[]) => singleOption('select', options),

  status: (options?: readonly string[]) => singleOption('status', options),

  multiSelect: (options?: readonly string[]): PropertyType<string[], string[]> =>
    defineType({
      tag: 'multi_select',
      payload: z.array(optionPayload),
      empty: [],
      decode: (values) => values.map((option) => option.name),
      input: z.array(z.string().min(1)),
      encode: (names) => names.map((name) => ({ name })),
      ...(options !== undefined ? { options: Object.freeze([...options]) } : {}),
      optionsOf: (names) => names,
    }),

  date: (): PropertyType<DateValue | null, DateInputValue> =>
    defineType({
      tag: 'date',
      payload: dateRangePayload.nullable(),
      empty: null,
      decode: toDateValue,
      input: dateInput,
      encode: (value) => (value === null ? null : { start: value.start, end: value.end }),
    }),

  url: () => stringType('url', z.string().url()),

  email: () => stringType('email', z.string().email()),

  phoneNumber: () => stringType('phone_number', z.string().min(1)),

  people: (): PropertyType<string[], string[]> =>
    defineType({
      tag: 'people',
      payload: z.array(referencePayload),
      empty: [],
      decode: (users) => users.map((user) => user.id),
      input: z.array(z.string().min(1)),
      encode: (ids) => ids.map((id) => ({ object: 'user', id })),
    }),

  relation: (): PropertyType<string[], string[]> =>
    defineType({
      tag: 'relation',
      payload: z.array(referencePayload),
      empty: [],
      decode: (pages) => pages.map((page) => page.id),
      input: z.array(z.string().min(1)),
      encode: (ids) => ids.map((id) => ({ id })),
    }),

  files: (): PropertyType<FileValue[], FileValue[]> =>
    defineType({
      tag: 'files',
      payload: z.array(filePayload),
      empty: [],
      decode: (items) => items.map((item) => ({ name: item.name, url: item.external?.url ?? item.file?.url ?? '' })),
      input: z.array(fileInput),
      encode: (items) => items.map((item) => ({ name: item.name, type: 'external', external: { url: item.url } })),
    }),

  formula: (): PropertyType<FormulaValue, never> =>
    defineType<FormulaValue, z.infer<typeof formulaPayload>>({
      tag: 'formula',
      payload: formulaPayload,
      empty: null,
      decode: (result) => {
        switch (result.type) {
          case 'string':
            return result.string;
          case 'number':
            return result.number;
          case 'boolean':
            return result.boolean;
          case 'date':
            return toDateValue(result.date);
        }
      },
    }),

  rollup: (): PropertyType<RollupValue, never> =>
    defineType<RollupValue, z.infer<typeof rollupPayload>>({
      tag: 'rollup',
      payload: rollupPayload,
      empty: null,
      decode: (result) => {
        switch (result.type) {
          case 'number':
            return result.number;
          case 'date':
            return toDateValue(result.date);
          case 'array':
            return result.array;
        }
      },
    }),

  createdTime: (): PropertyType<Date | null, never> => timestampType('created_time'),

  lastEditedTime: (): PropertyType<Date | null, never> => timestampType('last_edited_time'),

  createdBy: (): PropertyType<string | null, never> => userType('created_by'),

  lastEditedBy: (): PropertyType<string | null, never> => userType('last_edited_by'),
};

function timestampType(tag: 'created_time' | 'last_edited_time'): PropertyType<Date | null, never> {
  return defineType<Date | null, string>({
    tag,
    payload: z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'expected an ISO 8601 timestamp'),
    empty: null,
    decode: (value) => new Date(value),
  });
}

function userType(tag: 'created_by' | 'last_edited_by'): PropertyType<string | null, never> {
  return defineType<string | null, z.infer<typeof referencePayload>>({
    tag,
    payload: referencePayload,
    empty: null,
    decode: (user) => user.id,
  });
}
