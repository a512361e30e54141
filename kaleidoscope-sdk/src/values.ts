/**
 * Record value resolution
 *
 * A record keeps every value ever written to a field, from the record itself,
 * from its sub-records, and from the activities that touched it. These
 * functions pick the one current value of a field under optional scoping.
 * They never mutate the record and never throw on a well-formed history.
 */

import type { EntityRecord, RecordValue } from './types';

export interface ValueScope {
  /** Keep values written by this activity, plus shared key values */
  activityId?: string;
  /** Also consider values stored on sub-records (default: false) */
  includeSubRecordValues?: boolean;
  /** Only values stored on this sub-record; needs includeSubRecordValues */
  subRecordId?: string;
}

/**
 * Key values carry no record id and are shared by the record and its
 * sub-records
 */
function isKeyValue(value: RecordValue): boolean {
  return value.record_id === null || value.record_id === undefined;
}

/**
 * Epoch milliseconds of a value's creation; missing or unparsable
 * timestamps are older than everything else
 */
export function valueTimestamp(value: RecordValue): number {
  if (!value.created_at) return Number.NEGATIVE_INFINITY;
  const parsed = Date.parse(value.created_at);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/**
 * The current value of `fieldId`, or undefined when no value survives the
 * scope. Among equal timestamps the earliest entry in list order wins.
 */
export function resolveValue(
  record: EntityRecord,
  fieldId: string,
  scope: ValueScope = {}
): RecordValue | undefined {
  const history = record.record_values[fieldId];
  if (!history || history.length === 0) return undefined;

  let candidates = history;

  // key values (record_id null) belong to every activity
  if (scope.activityId !== undefined) {
    const activityId = scope.activityId;
    candidates = candidates.filter(
      (value) => value.operation_id === activityId || isKeyValue(value)
    );
  }

  if (!scope.includeSubRecordValues) {
    candidates = candidates.filter(
      (value) => value.record_id === record.id || isKeyValue(value)
    );
  }

  if (scope.subRecordId) {
    const subRecordId = scope.subRecordId;
    candidates = candidates.filter((value) => value.record_id === subRecordId);
  }

  let latest: RecordValue | undefined;
  let latestAt = Number.NEGATIVE_INFINITY;
  for (const value of candidates) {
    const at = valueTimestamp(value);
    if (latest === undefined || at > latestAt) {
      latest = value;
      latestAt = at;
    }
  }
  return latest;
}

/**
 * Content of the current value. `undefined` means no value; a stored JSON
 * null comes back as null.
 */
export function getValueContent(
  record: EntityRecord,
  fieldId: string,
  scope: ValueScope = {}
): unknown {
  const value = resolveValue(record, fieldId, scope);
  if (value === undefined) return undefined;
  return value.content === undefined ? null : value.content;
}

/**
 * Every field's current content as seen by one activity. Fields with no
 * value in that scope are left out.
 */
export function getActivityData(record: EntityRecord, activityId: string): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  for (const fieldId of Object.keys(record.record_values)) {
    const content = getValueContent(record, fieldId, { activityId });
    if (content !== undefined) {
      data[fieldId] = content;
    }
  }
  return data;
}
