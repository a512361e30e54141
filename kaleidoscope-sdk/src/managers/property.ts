/**
 * Property Manager
 *
 * Properties are the typed values attached to activities and their
 * definitions.
 */

import { BaseManager, type ManagerContext } from './base';
import type { UploadFile } from '../http';
import { propertySchema } from '../schemas/activity.zod';
import type { Property } from '../types';

// activities and definitions embed their properties
const EMBEDDING_PATHS = ['/activities', '/activity_definitions'];

export class PropertyManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '/properties');
  }

  /**
   * Set a property's content. Returns the property as stored by the server.
   */
  async update(propertyId: string, content: unknown): Promise<Property | null> {
    const payload = await this.http.put(this.pathWithId(propertyId), { content });
    this.dropEmbeddingLists();
    return this.parseOne(propertySchema, payload, 'property');
  }

  /**
   * Upload a file as the property's content. Returns the server's reference
   * to the stored file, or null.
   */
  async uploadFile(propertyId: string, file: UploadFile): Promise<Record<string, unknown> | null> {
    const payload = await this.http.postFile(this.pathWithId(propertyId, 'file'), file);
    this.dropEmbeddingLists();
    if (!isNonEmptyObject(payload)) return null;
    return payload;
  }

  private dropEmbeddingLists(): void {
    for (const path of EMBEDDING_PATHS) {
      this.cache.invalidate(path);
    }
  }
}

function isNonEmptyObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}
