/**
 * Record Manager
 *
 * Lookup, creation and search of records, and writes to their value
 * histories. Reading the current value of a field happens locally, through
 * the resolver in ../values.
 */

import { BaseManager, chunk, type ManagerContext } from './base';
import type { QueryParams, UploadFile } from '../http';
import {
  identifierMatchSchema,
  recordIdListSchema,
  recordSchema,
  recordValueSchema,
  valueResourceSchema,
} from '../schemas/record.zod';
import { activitySchema } from '../schemas/activity.zod';
import type { Activity, EntityRecord, RecordValue, SearchRecordsQuery } from '../types';

export const DEFAULT_BATCH_SIZE = 250;

/**
 * Query params for record search: strings go as they are, anything else
 * JSON-encoded
 */
export function encodeSearchQuery(query: SearchRecordsQuery): QueryParams {
  const params: QueryParams = {};
  const entries: Array<[string, unknown]> = Object.entries(query);
  for (const [key, value] of entries) {
    if (value === undefined) continue;
    params[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return params;
}

export class RecordManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '/records');
  }

  async get(recordId: string): Promise<EntityRecord | null> {
    return this.parseOne(recordSchema, await this.http.get(this.pathWithId(recordId)), 'record');
  }

  /**
   * Fetch records by id, `batchSize` ids per request. A failed batch
   * yields an empty result.
   */
  async getByIds(recordIds: readonly string[], batchSize = DEFAULT_BATCH_SIZE): Promise<EntityRecord[]> {
    const records: EntityRecord[] = [];
    for (const batch of chunk(recordIds, batchSize)) {
      const payload = await this.http.get(this.basePath, { record_ids: batch.join(',') });
      const parsed = this.tryParseList(recordSchema, payload, 'record list');
      if (parsed === null) return [];
      records.push(...parsed);
    }
    return records;
  }

  /**
   * The record identified by these key field values, if it exists
   */
  async getByKeyValues(keyValues: Record<string, unknown>): Promise<EntityRecord | null> {
    const payload = await this.http.get(`${this.basePath}/identifiers`, {
      records_key_field_to_value: JSON.stringify([keyValues]),
    });
    const [first] = this.parseList(identifierMatchSchema, payload, 'record identifier list');
    return first?.record ?? null;
  }

  /**
   * The record identified by these key field values, created when missing
   */
  async getOrCreate(keyValues: Record<string, string>): Promise<EntityRecord | null> {
    const payload = await this.http.post(this.basePath, { key_field_to_value: keyValues });
    return this.parseOne(recordSchema, payload, 'record');
  }

  /**
   * Ids of the records matching `query`
   */
  async search(query: SearchRecordsQuery = {}): Promise<string[]> {
    const payload = await this.http.get(`${this.basePath}/search`, encodeSearchQuery(query));
    return this.parseList(recordIdListSchema.element, payload, 'record id list');
  }

  /**
   * Append a value to a field's history
   */
  async addValue(recordId: string, fieldId: string, content: unknown, activityId?: string): Promise<void> {
    await this.http.post(this.pathWithId(recordId, 'values'), {
      content,
      field_id: fieldId,
      operation_id: activityId ?? null,
    });
  }

  /**
   * Append a value to a field's history and return the stored value
   */
  async updateField(
    recordId: string,
    fieldId: string,
    content: unknown,
    activityId?: string
  ): Promise<RecordValue | null> {
    const payload = await this.http.post(this.pathWithId(recordId, 'values'), {
      field_id: fieldId,
      content,
      operation_id: activityId ?? null,
    });
    return this.parseOne(valueResourceSchema, payload, 'record value')?.resource ?? null;
  }

  /**
   * Store a file as a field's new value and return the stored value
   */
  async uploadValueFile(
    recordId: string,
    fieldId: string,
    file: UploadFile,
    activityId?: string
  ): Promise<RecordValue | null> {
    const body: Record<string, string> = { field_id: fieldId };
    if (activityId) body.operation_id = activityId;

    const payload = await this.http.postFile(this.pathWithId(recordId, 'values', 'file'), file, body);
    return this.parseOne(valueResourceSchema, payload, 'record value')?.resource ?? null;
  }

  /**
   * The record's full value history, as a flat list
   */
  async listValues(recordId: string): Promise<RecordValue[]> {
    const payload = await this.http.get(this.pathWithId(recordId, 'values'));
    return this.parseList(recordValueSchema, payload, 'record value list');
  }

  /**
   * Activities the record takes part in
   */
  async listActivities(recordId: string): Promise<Activity[]> {
    const payload = await this.http.get(this.pathWithId(recordId, 'operations'));
    return this.parseList(activitySchema, payload, 'activity list');
  }
}
