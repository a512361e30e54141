/**
 * Entity Field Manager
 *
 * Key fields identify records; data fields hold everything else. Both lists
 * are cached until a field is created.
 */

import { BaseManager, type ManagerContext } from './base';
import { DATA_FIELD_TYPES, entityFieldSchema } from '../schemas/field.zod';
import type { DataFieldType, EntityField } from '../types';

export { DATA_FIELD_TYPES };

const KEY_FIELDS_PATH = '/key_fields';
const DATA_FIELDS_PATH = '/data_fields';

export class EntityFieldManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '');
  }

  async listKeyFields(): Promise<EntityField[]> {
    return this.parseList(entityFieldSchema, await this.cached(KEY_FIELDS_PATH), 'key field list');
  }

  async getKeyFieldByName(name: string): Promise<EntityField | null> {
    return (await this.listKeyFields()).find((field) => field.field_name === name) ?? null;
  }

  /**
   * The key field with this name, created when it does not exist yet
   */
  async getOrCreateKeyField(name: string): Promise<EntityField | null> {
    const payload = await this.http.post(`${KEY_FIELDS_PATH}/`, { field_name: name });
    this.cache.invalidate(KEY_FIELDS_PATH);
    return this.parseOne(entityFieldSchema, payload, 'key field');
  }

  async listDataFields(): Promise<EntityField[]> {
    return this.parseList(entityFieldSchema, await this.cached(DATA_FIELDS_PATH), 'data field list');
  }

  async getDataFieldByName(name: string): Promise<EntityField | null> {
    return (await this.listDataFields()).find((field) => field.field_name === name) ?? null;
  }

  /**
   * The data field with this name, created with `type` when it does not
   * exist yet
   */
  async getOrCreateDataField(name: string, type: DataFieldType): Promise<EntityField | null> {
    const payload = await this.http.post(`${DATA_FIELDS_PATH}/`, {
      field_name: name,
      field_type: type,
      attrs: {},
    });
    this.cache.invalidate(DATA_FIELDS_PATH);
    return this.parseOne(entityFieldSchema, payload, 'data field');
  }
}
