/**
 * Zod schemas for records and their value histories
 */

import { z } from 'zod';

export const recordValueSchema = z
  .object({
    id: z.string().optional(),
    field_id: z.string().optional(),
    content: z.unknown(),
    /** ISO timestamp; null sorts as the oldest possible value */
    created_at: z.string().nullish(),
    /** null marks a key value shared by the record and its sub-records */
    record_id: z.string().nullish(),
    /** null when the value is not attributable to an activity */
    operation_id: z.string().nullish(),
  })
  .passthrough();

export const recordSchema = z
  .object({
    id: z.string(),
    created_at: z.string(),
    entity_slice_id: z.string(),
    identifier_ids: z.array(z.string()),
    record_identifier: z.string(),
    record_values: z.record(z.string(), z.array(recordValueSchema)),
    initial_operation_id: z.string().nullish(),
    sub_record_ids: z.array(z.string()),
  })
  .passthrough();

/** Response of the value endpoints: the stored value is under `resource` */
export const valueResourceSchema = z
  .object({
    resource: recordValueSchema,
  })
  .passthrough();

/** One entry of `GET /records/identifiers` */
export const identifierMatchSchema = z
  .object({
    record: recordSchema.nullish(),
  })
  .passthrough();

export const recordIdListSchema = z.array(z.string());
