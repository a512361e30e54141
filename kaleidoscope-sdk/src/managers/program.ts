/**
 * Program Manager
 *
 * Programs group activities and records. The list is small and rarely
 * changes, so it is served from the cache.
 */

import { BaseManager, type ManagerContext } from './base';
import { programSchema } from '../schemas/field.zod';
import type { Program } from '../types';

export class ProgramManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '/programs');
  }

  /**
   * List all programs in the workspace
   */
  async list(): Promise<Program[]> {
    return this.parseList(programSchema, await this.cached(this.basePath), 'program list');
  }

  /**
   * Programs with any of the given ids, in list order
   */
  async getByIds(ids: readonly string[]): Promise<Program[]> {
    if (ids.length === 0) return [];
    const wanted = new Set(ids);
    return (await this.list()).filter((program) => wanted.has(program.id));
  }
}
