/**
 * Export Manager
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BaseManager, type ManagerContext } from './base';
import type { QueryParams } from '../http';
import type { ListParam, PullDataParams } from '../types';

function joinList(value: ListParam | undefined): string | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(',') : value;
}

export class ExportManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '/records/export');
  }

  /**
   * Download an entity type's records as CSV.
   * Resolves to the written file's path, or null when nothing was written.
   */
  async pullData(params: PullDataParams): Promise<string | null> {
    const target = join(params.downloadPath ?? tmpdir(), params.filename);

    const query: QueryParams = this.buildParams({
      filename: params.filename,
      entity_slice_id: params.entitySliceId,
      record_view_id: params.recordViewId,
      view_field_ids: joinList(params.viewFieldIds),
      identifier_ids: joinList(params.identifierIds),
      record_set_id: params.recordSetId,
      program_id: params.programId,
      operation_id: params.operationId,
      record_set_filters: joinList(params.recordSetFilters),
      view_field_filters: joinList(params.viewFieldFilters),
      view_field_sorts: joinList(params.viewFieldSorts),
      entity_field_filters: joinList(params.entityFieldFilters),
      entity_field_sorts: joinList(params.entityFieldSorts),
      search_text: params.searchText,
    });

    return this.http.getFile(`${this.basePath}/csv`, target, query);
  }
}
