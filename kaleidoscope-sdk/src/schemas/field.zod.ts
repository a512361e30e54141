/**
 * Zod schemas for entity fields, entity types, record views and the
 * workspace lookups (programs, labels, members, groups)
 */

import { z } from 'zod';

export const DATA_FIELD_TYPES = [
  'text',
  'number',
  'qualified-number',
  'smiles-string',
  'select',
  'multiselect',
  'molfile',
  'record-reference',
  'file',
  'image',
  'date',
  'URL',
  'boolean',
  'email',
  'phone',
  'formula',
  'people',
  'votes',
  'xy-array',
  'dna-oligo',
  'rna-oligo',
  'peptide',
  'plasmid',
  'google-drive-file',
  's3-file',
  'snowflake-query',
] as const;

export const dataFieldTypeSchema = z.enum(DATA_FIELD_TYPES);

export const entityFieldSchema = z
  .object({
    id: z.string(),
    created_at: z.string(),
    is_key: z.boolean(),
    field_name: z.string(),
    field_type: dataFieldTypeSchema,
    ref_slice_id: z.string().nullish(),
  })
  .passthrough();

export const entityTypeSchema = z
  .object({
    id: z.string(),
    slice_name: z.string(),
    key_field_ids: z.array(z.string()),
    created_at: z.string().optional(),
  })
  .passthrough();

export const viewFieldSchema = z
  .object({
    data_field_id: z.string().nullish(),
    lookup_field_id: z.string().nullish(),
  })
  .passthrough();

export const recordViewSchema = z
  .object({
    id: z.string(),
    entity_slice_id: z.string(),
    program_ids: z.array(z.string()),
    view_fields: z.array(viewFieldSchema),
  })
  .passthrough();

export const programSchema = z
  .object({
    id: z.string(),
    title: z.string(),
  })
  .passthrough();

export const labelSchema = z
  .object({
    id: z.string(),
    label_name: z.string(),
  })
  .passthrough();

export const workspaceUserSchema = z
  .object({
    id: z.string(),
    full_name: z.string().nullish(),
    email: z.string().nullish(),
  })
  .passthrough();

export const workspaceGroupSchema = z
  .object({
    id: z.string(),
    group_name: z.string(),
    user_ids: z.array(z.string()).optional(),
  })
  .passthrough();
