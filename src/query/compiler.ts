import { isConstraint } from './constraints.js';
import type { Constraint, FilterNode, QueryPayload, QueryState, SortSpec, WireFilter, WireSort } from './types.js';

/** Largest page the remote API hands out per request. */
export const MAX_PAGE_SIZE = 100;

/**
 * Compiles a Constraint into its wire form, e.g. `{ "contains": "project" }`.
 * Formula constraints nest: `{ "string": { "contains": "x" } }`.
 */
export function compileConstraint(constraint: Constraint): WireFilter {
  const operand = isConstraint(constraint.operand)
    ? compileConstraint(constraint.operand)
    : constraint.operand;
  return { [constraint.operator]: operand };
}

/**
 * Compiles a filter tree into the single wire representation:
 * property and timestamp clauses, `{ "and": [...] }` and `{ "or": [...] }`.
 */
export function compileFilter(node: FilterNode): WireFilter {
  switch (node.kind) {
    case 'property':
      return { property: node.property, [node.tag]: compileConstraint(node.constraint) };
    case 'timestamp':
      return { timestamp: node.timestamp, [node.timestamp]: compileConstraint(node.constraint) };
    default:
      return { [node.kind]: node.filters.map(compileFilter) };
  }
}

export function compileSorts(sorts: readonly SortSpec[]): WireSort[] {
  return sorts.map((sort) =>
    sort.kind === 'property'
      ? { property: sort.property, direction: sort.direction }
      : { timestamp: sort.timestamp, direction: sort.direction },
  );
}

/**
 * Page-size hint sent to the server. An explicit hint wins; otherwise the
 * result cap keeps the first request from fetching more than is needed.
 */
export function resolvePageSize(state: QueryState, defaultPageSize: number = MAX_PAGE_SIZE): number {
  if (state.pageSize !== undefined) {
    return state.pageSize;
  }
  const base = Math.min(defaultPageSize, MAX_PAGE_SIZE);
  return state.resultCap !== undefined ? Math.min(state.resultCap, base) : base;
}

/**
 * Compiles builder state into a query request body. Keys are always emitted
 * in the same order (filter, sorts, page_size, start_cursor) so equal state
 * serializes to identical JSON.
 */
export function compileQuery(state: QueryState, defaultPageSize: number = MAX_PAGE_SIZE): QueryPayload {
  const payload: QueryPayload = {
    ...(state.filter !== null ? { filter: compileFilter(state.filter) } : {}),
    ...(state.sorts.length > 0 ? { sorts: compileSorts(state.sorts) } : {}),
    page_size: resolvePageSize(state, defaultPageSize),
  };
  if (state.startCursor !== undefined) {
    payload.start_cursor = state.startCursor;
  }
  return payload;
}

/** Stable string form of a compiled payload, for logging and comparison. */
export function compileCanonicalKey(payload: QueryPayload): string {
  return JSON.stringify(payload);
}
