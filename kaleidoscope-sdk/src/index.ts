/**
 * Kaleidoscope SDK
 *
 * TypeScript client for the Kaleidoscope life-sciences data platform.
 *
 * @packageDocumentation
 */

// Main client
export { KaleidoscopeClient } from './client';

// Configuration
export {
  PROD_API_URL,
  DEFAULT_TIMEOUT_MS,
  TOKEN_REFRESH_MARGIN_MS,
  VALID_CONTENT_TYPES,
  loadConfigFromEnv,
} from './config';
export type { KaleidoscopeClientConfig, FileContentType } from './config';

// HTTP layer
export { HttpClient } from './http';
export type { HttpClientConfig, QueryParams, QueryValue, UploadFile } from './http';
export { TokenManager } from './auth';
export type { TokenResponse } from './auth';

// Cache
export { ResponseCache, cacheKey } from './cache';
export type { CacheStats, ResponseCacheOptions } from './cache';

// Logging
export { consoleLogger, silentLogger } from './logger';
export type { Logger, LogContext } from './logger';

// Errors
export {
  KaleidoscopeError,
  NotFoundError,
  AuthenticationError,
  AuthorizationError,
  ValidationError,
  ConflictError,
  RateLimitError,
  NetworkError,
  TimeoutError,
  ContentTypeError,
  ConfigurationError,
  parseApiError,
} from './errors';
export type { ApiErrorDetails } from './errors';

// Value resolution
export { resolveValue, getValueContent, getActivityData } from './values';
export type { ValueScope } from './values';

// Helpers
export { exportData } from './helpers';

// Managers
export {
  ActivityManager,
  PropertyManager,
  RecordManager,
  EntityTypeManager,
  EntityFieldManager,
  ProgramManager,
  LabelManager,
  WorkspaceManager,
  RecordViewManager,
  ImportManager,
  ExportManager,
} from './managers';

// Schemas and model constants
export * from './schemas/activity.zod';
export * from './schemas/field.zod';
export * from './schemas/record.zod';

// Types
export * from './types';
