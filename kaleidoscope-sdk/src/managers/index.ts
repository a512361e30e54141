/**
 * Manager Exports
 */

export { BaseManager, chunk } from './base';
export type { ManagerContext } from './base';

export { ActivityManager, ACTIVITY_STATUSES, ACTIVITY_TYPES, ACTIVITY_TYPE_LABELS } from './activity';
export type { ActivityRelations } from './activity';
export { PropertyManager } from './property';
export { RecordManager, DEFAULT_BATCH_SIZE, encodeSearchQuery } from './record';
export { EntityTypeManager } from './entity-type';
export { EntityFieldManager, DATA_FIELD_TYPES } from './entity-field';
export { ProgramManager } from './program';
export { LabelManager } from './label';
export { WorkspaceManager } from './workspace';
export { RecordViewManager } from './record-view';
export { ImportManager } from './import';
export { ExportManager } from './export';
