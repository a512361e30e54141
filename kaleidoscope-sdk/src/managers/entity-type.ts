/**
 * Entity Type Manager
 *
 * Entity types (entity slices on the wire) group records by their key
 * structure.
 */

import { BaseManager, type ManagerContext } from './base';
import { entityTypeSchema } from '../schemas/field.zod';
import { recordIdListSchema } from '../schemas/record.zod';
import type { EntityType } from '../types';

export class EntityTypeManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '/entity_slices');
  }

  async list(): Promise<EntityType[]> {
    return this.parseList(entityTypeSchema, await this.cached(this.basePath), 'entity type list');
  }

  async getByName(sliceName: string): Promise<EntityType | null> {
    return (await this.list()).find((type) => type.slice_name === sliceName) ?? null;
  }

  /**
   * Entity types whose keys include every one of `keyFieldIds`
   */
  async getWithKeyFields(keyFieldIds: readonly string[]): Promise<EntityType[]> {
    return (await this.list()).filter((type) =>
      keyFieldIds.every((id) => type.key_field_ids.includes(id))
    );
  }

  /**
   * The entity type keyed by exactly this set of fields, in any order
   */
  async getByExactKeys(keyFieldIds: readonly string[]): Promise<EntityType | null> {
    const wanted = new Set(keyFieldIds);
    return (
      (await this.list()).find((type) => {
        const keys = new Set(type.key_field_ids);
        return keys.size === wanted.size && [...wanted].every((id) => keys.has(id));
      }) ?? null
    );
  }

  /**
   * Ids of every record of this entity type
   */
  async getRecordIds(entityTypeId: string): Promise<string[]> {
    const payload = await this.http.get('/records/search', { entity_slice_id: entityTypeId });
    return this.parseList(recordIdListSchema.element, payload, 'record id list');
  }
}
