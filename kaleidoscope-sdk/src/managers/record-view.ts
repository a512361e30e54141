/**
 * Record View Manager
 */

import { BaseManager, type ManagerContext } from './base';
import { recordViewSchema } from '../schemas/field.zod';
import type { ExtendViewBody, RecordView } from '../types';

export class RecordViewManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '/record_views');
  }

  async list(): Promise<RecordView[]> {
    return this.parseList(recordViewSchema, await this.cached(this.basePath), 'record view list');
  }

  /**
   * Add a key field to a view, moving the given records onto the new key.
   * Returns the view as the server now has it; the cached list is dropped.
   */
  async extend(viewId: string, body: ExtendViewBody): Promise<RecordView | null> {
    const payload = await this.http.put(this.pathWithId(viewId, 'add_key_field'), body);
    this.cache.invalidate(this.basePath);
    return this.parseOne(recordViewSchema, payload, 'record view');
  }
}
