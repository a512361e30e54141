/**
 * Activity Manager
 *
 * Manages activities (tasks, experiments, projects, stages, milestones and
 * design cycles) and the definitions they are created from.
 */

import { BaseManager, chunk, type ManagerContext } from './base';
import type { LabelManager } from './label';
import type { ProgramManager } from './program';
import { DEFAULT_BATCH_SIZE } from './record';
import type { WorkspaceManager } from './workspace';
import {
  ACTIVITY_STATUSES,
  ACTIVITY_TYPES,
  ACTIVITY_TYPE_LABELS,
  activityDefinitionSchema,
  activitySchema,
} from '../schemas/activity.zod';
import { recordSchema } from '../schemas/record.zod';
import type {
  Activity,
  ActivityDefinition,
  CreateActivityParams,
  EntityRecord,
  Label,
  Program,
  UpdateActivityParams,
  WorkspaceGroup,
  WorkspaceUser,
} from '../types';
import { getActivityData } from '../values';

export { ACTIVITY_STATUSES, ACTIVITY_TYPES, ACTIVITY_TYPE_LABELS };

const DEFINITIONS_PATH = '/activity_definitions';

/**
 * Managers used to resolve an activity's related objects
 */
export interface ActivityRelations {
  programs: ProgramManager;
  labels: LabelManager;
  workspace: WorkspaceManager;
}

/**
 * Manager for activity operations
 */
export class ActivityManager extends BaseManager {
  private readonly relations: ActivityRelations;

  constructor(context: ManagerContext, relations: ActivityRelations) {
    super(context, '/activities');
    this.relations = relations;
  }

  /**
   * Create a new activity with no records
   */
  async create(params: CreateActivityParams): Promise<Activity | null> {
    const payload = await this.http.post(this.basePath, {
      program_ids: params.programIds ?? [],
      title: params.title,
      activity_type: params.activityType,
      definition_id: params.definitionId ?? null,
      record_ids: [],
      assigned_user_ids: params.assignedUserIds ?? [],
      start_date: params.startDate ? params.startDate.toISOString() : null,
      duration: params.duration ?? null,
    });
    this.cache.invalidate(this.basePath);

    // the endpoint answers with a list holding the new activity
    const [created] = this.parseList(activitySchema, payload, 'created activity list');
    return created ?? null;
  }

  /**
   * List all activities in the workspace, experiments included
   */
  async list(): Promise<Activity[]> {
    return this.parseList(activitySchema, await this.cached(this.basePath), 'activity list');
  }

  async get(activityId: string): Promise<Activity | null> {
    return this.parseOne(activitySchema, await this.http.get(this.pathWithId(activityId)), 'activity');
  }

  /**
   * Fetch activities by id, `batchSize` ids per request
   */
  async getByIds(ids: readonly string[], batchSize = DEFAULT_BATCH_SIZE): Promise<Activity[]> {
    const activities: Activity[] = [];
    for (const batch of chunk(ids, batchSize)) {
      const payload = await this.http.get(this.basePath, { activity_ids: batch.join(',') });
      const parsed = this.tryParseList(activitySchema, payload, 'activity list');
      if (parsed === null) return [];
      activities.push(...parsed);
    }
    return activities;
  }

  async getByExternalId(externalId: string): Promise<Activity | null> {
    return (await this.list()).find((activity) => activity.external_id === externalId) ?? null;
  }

  // ===========================================================================
  // Definitions
  // ===========================================================================

  async listDefinitions(): Promise<ActivityDefinition[]> {
    const payload = await this.cached(DEFINITIONS_PATH);
    return this.parseList(activityDefinitionSchema, payload, 'activity definition list');
  }

  async getDefinitionByName(name: string): Promise<ActivityDefinition | null> {
    return (await this.listDefinitions()).find((definition) => definition.title === name) ?? null;
  }

  async getDefinitionById(definitionId: string): Promise<ActivityDefinition | null> {
    return (await this.listDefinitions()).find((definition) => definition.id === definitionId) ?? null;
  }

  async getDefinitionByExternalId(externalId: string): Promise<ActivityDefinition | null> {
    return (
      (await this.listDefinitions()).find((definition) => definition.external_id === externalId) ?? null
    );
  }

  /**
   * Activities created from the given definition
   */
  async getActivitiesForDefinition(definitionId: string): Promise<Activity[]> {
    return (await this.list()).filter((activity) => activity.definition_id === definitionId);
  }

  // ===========================================================================
  // Relationships
  // ===========================================================================

  /**
   * Activities that contain the given record
   */
  async getWithRecord(recordId: string): Promise<Activity[]> {
    const payload = await this.http.get(`/records/${recordId}/operations`);
    return this.parseList(activitySchema, payload, 'activity list');
  }

  async listChildren(activityId: string): Promise<Activity[]> {
    const payload = await this.http.get(this.pathWithId(activityId, 'activities'));
    return this.parseList(activitySchema, payload, 'child activity list');
  }

  async listRecords(activityId: string): Promise<EntityRecord[]> {
    const payload = await this.http.get(`/operations/${activityId}/records`);
    return this.parseList(recordSchema, payload, 'record list');
  }

  /**
   * The activity's record with this identifier, if it has one
   */
  async findRecord(activityId: string, identifier: string): Promise<EntityRecord | null> {
    return (await this.listRecords(activityId)).find((record) => record.record_identifier === identifier) ?? null;
  }

  async hasRecord(activityId: string, identifier: string): Promise<boolean> {
    return (await this.findRecord(activityId, identifier)) !== null;
  }

  /**
   * Each of the activity's records, reduced to the field contents that
   * activity sees
   */
  async getRecordData(activityId: string): Promise<Array<Record<string, unknown>>> {
    return (await this.listRecords(activityId)).map((record) => getActivityData(record, activityId));
  }

  async getDefinition(activity: Activity): Promise<ActivityDefinition | null> {
    if (!activity.definition_id) return null;
    return this.getDefinitionById(activity.definition_id);
  }

  async getPrograms(activity: Activity): Promise<Program[]> {
    return this.relations.programs.getByIds(activity.program_ids);
  }

  async getLabels(activity: Activity): Promise<Label[]> {
    return this.relations.labels.getByIds(activity.label_ids);
  }

  async getAssignedUsers(activity: Activity): Promise<WorkspaceUser[]> {
    return this.relations.workspace.getMembersByIds(activity.assigned_user_ids);
  }

  async getAssignedGroups(activity: Activity): Promise<WorkspaceGroup[]> {
    return this.relations.workspace.getGroupsByIds(activity.assigned_group_ids);
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Update an activity. Returns the activity as the server now has it; the
   * caller's copy is left as it was.
   */
  async update(activityId: string, changes: UpdateActivityParams): Promise<Activity | null> {
    const payload = await this.http.put(this.pathWithId(activityId), changes);
    this.cache.invalidate(this.basePath);
    return this.parseOne(activitySchema, payload, 'activity');
  }

  /**
   * Attach records to an activity
   */
  async addRecords(activityId: string, recordIds: readonly string[]): Promise<void> {
    await this.http.put(`/operations/${activityId}/records`, { record_ids: recordIds });
    this.cache.invalidate(this.basePath);
  }
}
