/**
 * Kaleidoscope Client
 *
 * Main entry point for the Kaleidoscope SDK.
 * Provides a unified interface to all Kaleidoscope resources.
 */

import { ResponseCache } from './cache';
import { loadConfigFromEnv, type KaleidoscopeClientConfig } from './config';
import { HttpClient } from './http';
import type { Logger } from './logger';
import {
  ActivityManager,
  EntityFieldManager,
  EntityTypeManager,
  ExportManager,
  ImportManager,
  LabelManager,
  ProgramManager,
  PropertyManager,
  RecordManager,
  RecordViewManager,
  WorkspaceManager,
  type ManagerContext,
} from './managers';

/**
 * Kaleidoscope Client
 *
 * Authentication starts as soon as the client is built; calls made before it
 * finishes wait for it. A client whose credentials are rejected still works
 * in the sense that every call resolves, to null or an empty list.
 *
 * @example
 * ```typescript
 * import { KaleidoscopeClient } from 'kaleidoscope-sdk';
 *
 * const client = new KaleidoscopeClient({
 *   clientId: 'your-client-id',
 *   clientSecret: 'your-client-secret',
 * });
 *
 * const experiment = await client.activities.create({
 *   title: 'Solubility screen',
 *   activityType: 'experiment',
 * });
 *
 * const record = await client.records.getOrCreate({ 'Compound ID': 'CMP-1' });
 * if (record && experiment) {
 *   await client.records.addValue(record.id, solubilityFieldId, 42, experiment.id);
 * }
 * ```
 */
export class KaleidoscopeClient {
  /** Transport, exposed for endpoints the managers do not cover */
  public readonly http: HttpClient;

  /** Cache shared by every manager */
  public readonly cache: ResponseCache;

  /** Activity and activity definition operations */
  public readonly activities: ActivityManager;

  /** Property updates and file uploads */
  public readonly properties: PropertyManager;

  /** Record lookup, search and value writes */
  public readonly records: RecordManager;

  /** Entity type (entity slice) lookups */
  public readonly entityTypes: EntityTypeManager;

  /** Key field and data field operations */
  public readonly entityFields: EntityFieldManager;

  public readonly programs: ProgramManager;

  public readonly labels: LabelManager;

  /** Workspace members and groups */
  public readonly workspace: WorkspaceManager;

  public readonly recordViews: RecordViewManager;

  /** Bulk data pushes */
  public readonly imports: ImportManager;

  /** CSV downloads */
  public readonly exports: ExportManager;

  constructor(config: KaleidoscopeClientConfig) {
    this.http = new HttpClient({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      baseUrl: config.baseUrl,
      timeout: config.timeout,
      logger: config.logger,
    });
    this.cache = config.cache ?? new ResponseCache();

    const context: ManagerContext = { http: this.http, cache: this.cache };

    this.programs = new ProgramManager(context);
    this.labels = new LabelManager(context);
    this.workspace = new WorkspaceManager(context);
    this.activities = new ActivityManager(context, {
      programs: this.programs,
      labels: this.labels,
      workspace: this.workspace,
    });
    this.properties = new PropertyManager(context);
    this.records = new RecordManager(context);
    this.entityTypes = new EntityTypeManager(context);
    this.entityFields = new EntityFieldManager(context);
    this.recordViews = new RecordViewManager(context);
    this.imports = new ImportManager(context);
    this.exports = new ExportManager(context);
  }

  /**
   * Build a client from KALEIDOSCOPE_API_* environment variables.
   * Throws a ConfigurationError when a required variable is missing.
   */
  static fromEnv(
    options: { logger?: Logger; cache?: ResponseCache; env?: NodeJS.ProcessEnv } = {}
  ): KaleidoscopeClient {
    return new KaleidoscopeClient({
      ...loadConfigFromEnv(options.env),
      logger: options.logger,
      cache: options.cache,
    });
  }

  /**
   * Resolves to whether the initial credentials exchange succeeded
   */
  async ready(): Promise<boolean> {
    return this.http.ready;
  }
}
