/**
 * Label Manager
 */

import { BaseManager, type ManagerContext } from './base';
import { labelSchema } from '../schemas/field.zod';
import type { Label } from '../types';

export class LabelManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '/labels');
  }

  async list(): Promise<Label[]> {
    return this.parseList(labelSchema, await this.cached(this.basePath), 'label list');
  }

  /**
   * Labels with any of the given ids, in list order
   */
  async getByIds(ids: readonly string[]): Promise<Label[]> {
    if (ids.length === 0) return [];
    const wanted = new Set(ids);
    return (await this.list()).filter((label) => wanted.has(label.id));
  }
}
