/**
 * Zod schemas for activities, activity definitions and properties
 */

import { z } from 'zod';
import { dataFieldTypeSchema } from './field.zod';

export const ACTIVITY_STATUSES = [
  'requested',
  'to do',
  'in progress',
  'needs review',
  'blocked',
  'paused',
  'cancelled',
  'in review',
  'locked',
  'to review',
  'upload complete',
  'new',
  'in design',
  'ready for make',
  'in synthesis',
  'in test',
  'in analysis',
  'parked',
  'complete',
  'ideation',
  '2D selection',
  'computation',
  'compound selection',
  'selected',
  'queue for synthesis',
  'data review',
  'done',
] as const;

export const ACTIVITY_TYPES = ['task', 'experiment', 'project', 'stage', 'milestone', 'cycle'] as const;

export const ACTIVITY_TYPE_LABELS = {
  task: 'Task',
  experiment: 'Experiment',
  project: 'Project',
  stage: 'Stage',
  milestone: 'Milestone',
  cycle: 'Design cycle',
} as const satisfies Record<(typeof ACTIVITY_TYPES)[number], string>;

export const activityStatusSchema = z.enum(ACTIVITY_STATUSES);
export const activityTypeSchema = z.enum(ACTIVITY_TYPES);

export const propertySchema = z
  .object({
    id: z.string(),
    property_field_id: z.string(),
    content: z.unknown(),
    created_at: z.string(),
    last_updated_by: z.string(),
    created_by: z.string(),
    property_name: z.string(),
    field_type: dataFieldTypeSchema,
  })
  .passthrough();

export const activityDefinitionSchema = z
  .object({
    id: z.string(),
    program_ids: z.array(z.string()),
    title: z.string(),
    activity_type: activityTypeSchema,
    status: activityStatusSchema.nullish(),
    assigned_user_ids: z.array(z.string()),
    assigned_group_ids: z.array(z.string()),
    label_ids: z.array(z.string()),
    properties: z.array(propertySchema),
    external_id: z.string().nullish(),
  })
  .passthrough();

export const activitySchema = z
  .object({
    id: z.string(),
    created_at: z.string(),
    parent_id: z.string().nullish(),
    child_ids: z.array(z.string()),
    definition_id: z.string().nullish(),
    program_ids: z.array(z.string()),
    activity_type: activityTypeSchema,
    title: z.string(),
    description: z.unknown(),
    status: activityStatusSchema,
    assigned_user_ids: z.array(z.string()),
    assigned_group_ids: z.array(z.string()),
    due_date: z.string().nullish(),
    start_date: z.string().nullish(),
    duration: z.number().int().nullish(),
    completed_at_date: z.string().nullish(),
    dependencies: z.array(z.string()),
    label_ids: z.array(z.string()),
    is_draft: z.boolean(),
    properties: z.array(propertySchema),
    external_id: z.string().nullish(),
    all_record_ids: z.array(z.string()),
  })
  .passthrough();
