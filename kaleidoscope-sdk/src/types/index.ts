/**
 * Type Exports
 *
 * Model types are inferred from the zod schemas in ../schemas, so the runtime
 * validation and the static types cannot drift apart. Request shapes that are
 * never validated live in ./common.
 */

import type { z } from 'zod';
import type {
  activityDefinitionSchema,
  activitySchema,
  activityStatusSchema,
  activityTypeSchema,
  propertySchema,
} from '../schemas/activity.zod';
import type {
  dataFieldTypeSchema,
  entityFieldSchema,
  entityTypeSchema,
  labelSchema,
  programSchema,
  recordViewSchema,
  viewFieldSchema,
  workspaceGroupSchema,
  workspaceUserSchema,
} from '../schemas/field.zod';
import type { recordSchema, recordValueSchema } from '../schemas/record.zod';

// =============================================================================
// Records
// =============================================================================

export type RecordValue = z.infer<typeof recordValueSchema>;
export type EntityRecord = z.infer<typeof recordSchema>;

// =============================================================================
// Activities
// =============================================================================

export type ActivityStatus = z.infer<typeof activityStatusSchema>;
export type ActivityType = z.infer<typeof activityTypeSchema>;
export type Property = z.infer<typeof propertySchema>;
export type ActivityDefinition = z.infer<typeof activityDefinitionSchema>;
export type Activity = z.infer<typeof activitySchema>;

/** Fields of an activity that can be changed through `activities.update` */
export type UpdateActivityParams = Partial<
  Pick<
    Activity,
    | 'title'
    | 'description'
    | 'status'
    | 'parent_id'
    | 'program_ids'
    | 'assigned_user_ids'
    | 'assigned_group_ids'
    | 'label_ids'
    | 'dependencies'
    | 'due_date'
    | 'start_date'
    | 'duration'
    | 'is_draft'
  >
>;

// =============================================================================
// Fields, entity types and workspace lookups
// =============================================================================

export type DataFieldType = z.infer<typeof dataFieldTypeSchema>;
export type EntityField = z.infer<typeof entityFieldSchema>;
export type EntityType = z.infer<typeof entityTypeSchema>;
export type ViewField = z.infer<typeof viewFieldSchema>;
export type RecordView = z.infer<typeof recordViewSchema>;
export type Program = z.infer<typeof programSchema>;
export type Label = z.infer<typeof labelSchema>;
export type WorkspaceUser = z.infer<typeof workspaceUserSchema>;
export type WorkspaceGroup = z.infer<typeof workspaceGroupSchema>;

export * from './common';
