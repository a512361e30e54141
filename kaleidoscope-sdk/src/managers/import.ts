/**
 * Import Manager
 */

import { BaseManager, type ManagerContext } from './base';
import type { PushDataParams } from '../types';

export class ImportManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '/push/imports');
  }

  /**
   * Push rows of data into the workspace, matching records on
   * `keyFieldNames`. Returns the server's import summary as sent.
   */
  async pushData(params: PushDataParams): Promise<unknown> {
    const path = params.sourceId ? this.pathWithId(params.sourceId) : this.basePath;

    const payload: Record<string, unknown> = {
      key_field_names: params.keyFieldNames,
      data: params.data,
      record_view_ids: params.recordViewIds ?? null,
    };
    if (params.operationId) payload.operation_id = params.operationId;
    if (params.programId) payload.program_id = params.programId;
    if (params.setName) payload.set_name = params.setName;

    return this.http.post(path, payload);
  }
}
