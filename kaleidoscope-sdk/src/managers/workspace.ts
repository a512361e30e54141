/**
 * Workspace Manager
 *
 * Members and groups of the workspace the client credentials belong to.
 */

import { BaseManager, type ManagerContext } from './base';
import { workspaceGroupSchema, workspaceUserSchema } from '../schemas/field.zod';
import type { WorkspaceGroup, WorkspaceUser } from '../types';

export class WorkspaceManager extends BaseManager {
  constructor(context: ManagerContext) {
    super(context, '/workspace');
  }

  async listMembers(): Promise<WorkspaceUser[]> {
    const payload = await this.cached(`${this.basePath}/members`);
    return this.parseList(workspaceUserSchema, payload, 'workspace member list');
  }

  async listGroups(): Promise<WorkspaceGroup[]> {
    const payload = await this.cached(`${this.basePath}/groups`);
    return this.parseList(workspaceGroupSchema, payload, 'workspace group list');
  }

  async getMembersByIds(ids: readonly string[]): Promise<WorkspaceUser[]> {
    if (ids.length === 0) return [];
    const wanted = new Set(ids);
    return (await this.listMembers()).filter((member) => wanted.has(member.id));
  }

  async getGroupsByIds(ids: readonly string[]): Promise<WorkspaceGroup[]> {
    if (ids.length === 0) return [];
    const wanted = new Set(ids);
    return (await this.listGroups()).filter((group) => wanted.has(group.id));
  }
}
