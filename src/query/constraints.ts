import { z } from 'zod';
import { InvalidArgumentError, SchemaTypeError } from '../errors.js';
import type { ConditionFamily, Constraint } from './types.js';

const FLAG_OPERATORS = ['is_empty', 'is_not_empty'] as const;

const RELATIVE_DATE_OPERATORS = [
  'past_week',
  'past_month',
  'past_year',
  'next_week',
  'next_month',
  'next_year',
  'this_week',
] as const;

const FLAGS: ReadonlySet<string> = new Set(FLAG_OPERATORS);
const RELATIVE_DATES: ReadonlySet<string> = new Set(RELATIVE_DATE_OPERATORS);

/** Valid operators per condition family. */
export const OPERATORS = {
  text: [
    'equals',
    'does_not_equal',
    'contains',
    'does_not_contain',
    'starts_with',
    'ends_with',
    ...FLAG_OPERATORS,
  ],
  number: [
    'equals',
    'does_not_equal',
    'greater_than',
    'less_than',
    'greater_than_or_equal_to',
    'less_than_or_equal_to',
    ...FLAG_OPERATORS,
  ],
  checkbox: ['equals', 'does_not_equal'],
  select: ['equals', 'does_not_equal', ...FLAG_OPERATORS],
  multi_select: ['contains', 'does_not_contain', ...FLAG_OPERATORS],
  date: [
    'equals',
    'before',
    'after',
    'on_or_before',
    'on_or_after',
    ...FLAG_OPERATORS,
    ...RELATIVE_DATE_OPERATORS,
  ],
  people: ['contains', 'does_not_contain', ...FLAG_OPERATORS],
  files: [...FLAG_OPERATORS],
  relation: ['contains', 'does_not_contain', ...FLAG_OPERATORS],
  formula: ['string', 'checkbox', 'number', 'date'],
} as const satisfies Record<ConditionFamily, readonly string[]>;

/** Formula sub-conditions and the family each one nests. */
const FORMULA_FAMILIES: Readonly<Record<string, ConditionFamily>> = {
  string: 'text',
  checkbox: 'checkbox',
  number: 'number',
  date: 'date',
};

export type DateInput = Date | string;

const dateOperand = z.union([
  z.date().transform((d) => d.toISOString()),
  z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'expected an ISO 8601 date'),
]);

const OPERAND_SCHEMAS: Partial<Record<ConditionFamily, z.ZodType<unknown>>> = {
  text: z.string(),
  number: z.number().finite(),
  checkbox: z.boolean(),
  select: z.string().min(1),
  multi_select: z.string().min(1),
  date: dateOperand,
  people: z.string().min(1),
  relation: z.string().min(1),
};

export function isConstraint(value: unknown): value is Constraint {
  return (
    typeof value === 'object' &&
    value !== null &&
    'family' in value &&
    'operator' in value &&
    'operand' in value &&
    typeof value.family === 'string' &&
    typeof value.operator === 'string'
  );
}

export function isOperatorOf(family: ConditionFamily, operator: string): boolean {
  const allowed: readonly string[] = OPERATORS[family];
  return allowed.includes(operator);
}

function normaliseOperand(family: ConditionFamily, operator: string, operand: unknown): unknown {
  if (FLAGS.has(operator)) {
    if (operand !== undefined && operand !== true) {
      throw new InvalidArgumentError(`"${operator}" takes no operand`);
    }
    return true;
  }

  if (RELATIVE_DATES.has(operator)) {
    return {};
  }

  if (family === 'formula') {
    const expected = FORMULA_FAMILIES[operator];
    if (!isConstraint(operand)) {
      throw new InvalidArgumentError(`formula "${operator}" expects a nested condition`);
    }
    if (operand.family !== expected) {
      throw new SchemaTypeError(
        `formula "${operator}" expects a ${String(expected)} condition, got ${operand.family}`,
      );
    }
    return operand;
  }

  const schema = OPERAND_SCHEMAS[family];
  const parsed = schema?.safeParse(operand);
  if (parsed === undefined || !parsed.success) {
    throw new InvalidArgumentError(
      `Invalid operand for ${family} "${operator}": ${describeOperand(operand)}`,
    );
  }
  return parsed.data;
}

function describeOperand(operand: unknown): string {
  return typeof operand === 'string' ? JSON.stringify(operand) : String(operand);
}

/**
 * Builds a Constraint, validating the operator against the family's operator set.
 * Throws SchemaTypeError for an operator the family does not support.
 */
export function constraint(family: ConditionFamily, operator: string, operand?: unknown): Constraint {
  if (!(family in OPERATORS)) {
    throw new SchemaTypeError(`Unknown condition family: "${family}"`);
  }
  if (!isOperatorOf(family, operator)) {
    throw new SchemaTypeError(`Operator "${operator}" is not valid for ${family} conditions`);
  }
  return Object.freeze({ family, operator, operand: normaliseOperand(family, operator, operand) });
}

export const text = {
  equals: (value: string) => constraint('text', 'equals', value),
  doesNotEqual: (value: string) => constraint('text', 'does_not_equal', value),
  contains: (value: string) => constraint('text', 'contains', value),
  doesNotContain: (value: string) => constraint('text', 'does_not_contain', value),
  startsWith: (value: string) => constraint('text', 'starts_with', value),
  endsWith: (value: string) => constraint('text', 'ends_with', value),
  isEmpty: () => constraint('text', 'is_empty'),
  isNotEmpty: () => constraint('text', 'is_not_empty'),
};

export const number = {
  equals: (value: number) => constraint('number', 'equals', value),
  doesNotEqual: (value: number) => constraint('number', 'does_not_equal', value),
  greaterThan: (value: number) => constraint('number', 'greater_than', value),
  lessThan: (value: number) => constraint('number', 'less_than', value),
  greaterThanOrEqualTo: (value: number) => constraint('number', 'greater_than_or_equal_to', value),
  lessThanOrEqualTo: (value: number) => constraint('number', 'less_than_or_equal_to', value),
  isEmpty: () => constraint('number', 'is_empty'),
  isNotEmpty: () => constraint('number', 'is_not_empty'),
};

export const checkbox = {
  equals: (value: boolean) => constraint('checkbox', 'equals', value),
  doesNotEqual: (value: boolean) => constraint('checkbox', 'does_not_equal', value),
};

export const select = {
  equals: (option: string) => constraint('select', 'equals', option),
  doesNotEqual: (option: string) => constraint('select', 'does_not_equal', option),
  isEmpty: () => constraint('select', 'is_empty'),
  isNotEmpty: () => constraint('select', 'is_not_empty'),
};

export const multiSelect = {
  contains: (option: string) => constraint('multi_select', 'contains', option),
  doesNotContain: (option: string) => constraint('multi_select', 'does_not_contain', option),
  isEmpty: () => constraint('multi_select', 'is_empty'),
  isNotEmpty: () => constraint('multi_select', 'is_not_empty'),
};

export const date = {
  equals: (value: DateInput) => constraint('date', 'equals', value),
  before: (value: DateInput) => constraint('date', 'before', value),
  after: (value: DateInput) => constraint('date', 'after', value),
  onOrBefore: (value: DateInput) => constraint('date', 'on_or_before', value),
  onOrAfter: (value: DateInput) => constraint('date', 'on_or_after', value),
  isEmpty: () => constraint('date', 'is_empty'),
  isNotEmpty: () => constraint('date', 'is_not_empty'),
  pastWeek: () => constraint('date', 'past_week'),
  pastMonth: () => constraint('date', 'past_month'),
  pastYear: () => constraint('date', 'past_year'),
  nextWeek: () => constraint('date', 'next_week'),
  nextMonth: () => constraint('date', 'next_month'),
  nextYear: () => constraint('date', 'next_year'),
  thisWeek: () => constraint('date', 'this_week'),
};

export const people = {
  contains: (userId: string) => constraint('people', 'contains', userId),
  doesNotContain: (userId: string) => constraint('people', 'does_not_contain', userId),
  isEmpty: () => constraint('people', 'is_empty'),
  isNotEmpty: () => constraint('people', 'is_not_empty'),
};

export const relation = {
  contains: (recordId: string) => constraint('relation', 'contains', recordId),
  doesNotContain: (recordId: string) => constraint('relation', 'does_not_contain', recordId),
  isEmpty: () => constraint('relation', 'is_empty'),
  isNotEmpty: () => constraint('relation', 'is_not_empty'),
};

export const files = {
  isEmpty: () => constraint('files', 'is_empty'),
  isNotEmpty: () => constraint('files', 'is_not_empty'),
};

/** Conditions on a formula's computed result. */
export const formula = {
  string: (condition: Constraint) => constraint('formula', 'string', condition),
  checkbox: (condition: Constraint) => constraint('formula', 'checkbox', condition),
  number: (condition: Constraint) => constraint('formula', 'number', condition),
  date: (condition: Constraint) => constraint('formula', 'date', condition),
};
