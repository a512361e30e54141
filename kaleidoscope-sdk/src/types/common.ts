/**
 * Common Types
 *
 * Request shapes shared across managers: record filters and sorts, search and
 * export queries, import payloads.
 */

import type { ACTIVITY_TYPES } from '../schemas/activity.zod';

// =============================================================================
// Filter rules
// =============================================================================

export const FILTER_RULE_TYPES = [
  // existence
  'is_set',
  'is_empty',
  // equality
  'is_equal',
  'is_any_of_text',
  'is_not_equal',
  // strings
  'includes',
  'does_not_include',
  'starts_with',
  'ends_with',
  // membership
  'is_in',
  'is_not_in',
  // sets
  'value_is_subset_of_props',
  'value_is_superset_of_props',
  'value_has_overlap_with_props',
  'value_has_no_overlap_with_props',
  'value_has_same_elements_as_props',
  // numbers
  'is_less_than',
  'is_less_than_equal',
  'is_greater_than',
  'is_greater_than_equal',
  // absolute dates
  'is_before',
  'is_after',
  'is_between',
  // relative dates
  'is_before_relative_day',
  'is_after_relative_day',
  'is_between_relative_day',
  'is_before_relative_week',
  'is_after_relative_week',
  'is_between_relative_week',
  'is_before_relative_month',
  'is_after_relative_month',
  'is_between_relative_month',
  'is_last_week',
  'is_this_week',
  'is_next_week',
  'is_this_month',
  'is_next_month',
  // update tracking
  'is_last_updated_after',
] as const;

export type FilterRuleType = (typeof FILTER_RULE_TYPES)[number];

/**
 * Filter on a record view's field
 */
export interface ViewFieldFilter {
  key_field_id?: string | null;
  view_field_id?: string | null;
  filter_type: FilterRuleType;
  filter_prop: unknown;
}

export interface ViewFieldSort {
  key_field_id?: string | null;
  view_field_id?: string | null;
  descending: boolean;
}

/**
 * Filter on an entity field
 */
export interface FieldFilter {
  field_id?: string | null;
  filter_type: FilterRuleType;
  filter_prop: unknown;
}

export interface FieldSort {
  field_id?: string | null;
  descending: boolean;
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Parameters for `GET /records/search`. Anything that is not a string is
 * sent JSON-encoded.
 */
export interface SearchRecordsQuery {
  record_set_id?: string;
  program_id?: string;
  entity_slice_id?: string;
  operation_id?: string;
  identifier_ids?: string[];
  record_set_filters?: string[];
  view_field_filters?: ViewFieldFilter[];
  view_field_sorts?: ViewFieldSort[];
  entity_field_filters?: FieldFilter[];
  entity_field_sorts?: FieldSort[];
  search_text?: string;
  limit?: number;
}

/** A list parameter, given as an array or as an already comma-joined string */
export type ListParam = string | string[];

export interface PullDataParams {
  /** Name of the downloaded file, also sent to the server */
  filename: string;
  entitySliceId: string;
  /** Directory the file is written to (default: the OS temp directory) */
  downloadPath?: string;
  recordViewId?: string;
  viewFieldIds?: ListParam;
  identifierIds?: ListParam;
  recordSetId?: string;
  programId?: string;
  operationId?: string;
  recordSetFilters?: ListParam;
  viewFieldFilters?: ListParam;
  viewFieldSorts?: ListParam;
  entityFieldFilters?: ListParam;
  entityFieldSorts?: ListParam;
  searchText?: string;
}

export interface PushDataParams {
  keyFieldNames: string[];
  data: Array<Record<string, unknown>>;
  /** Import source; appended to the endpoint path when given */
  sourceId?: string;
  operationId?: string;
  programId?: string;
  recordViewIds?: string[];
  setName?: string;
}

// =============================================================================
// Activities and record views
// =============================================================================

export interface CreateActivityParams {
  title: string;
  activityType: (typeof ACTIVITY_TYPES)[number];
  programIds?: string[];
  definitionId?: string;
  assignedUserIds?: string[];
  startDate?: Date;
  /** Duration in days */
  duration?: number;
}

export interface RecordTransfer {
  record_id: string;
  key_field_name_to_value: Record<string, unknown>;
}

export interface ExtendViewBody {
  new_key_field_name: string;
  records_to_transfer: RecordTransfer[];
}
