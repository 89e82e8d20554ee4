import { z } from 'zod';
import type { RawRecord } from '../types.js';

export const wirePropertySchema = z.record(z.string(), z.unknown());

export const rawRecordSchema = z
  .object({
    id: z.string().min(1),
    created_time: z.string().optional(),
    last_edited_time: z.string().optional(),
    url: z.string().optional(),
    archived: z.boolean().optional(),
    properties: z.record(z.string(), wirePropertySchema),
  })
  .passthrough();

/** Read-only identity fields of a record, as the server last reported them. */
export interface RecordIdentity {
  id: string;
  createdTime: Date | null;
  lastEditedTime: Date | null;
  url: string | null;
  archived: boolean;
}

function toDate(value: string | undefined): Date | null {
  if (value === undefined) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function mapIdentity(raw: RawRecord): RecordIdentity {
  return {
    id: raw.id,
    createdTime: toDate(raw.created_time),
    lastEditedTime: toDate(raw.last_edited_time),
    url: raw.url ?? null,
    archived: raw.archived ?? false,
  };
}
