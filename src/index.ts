/**
 * Issue Mirror Sync - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { SyncEngine, countOutcomes } from './lib/sync-engine';
export type { SyncEngineOptions, SyncEngineDeps, ReconcileOptions, RunOptions, SnapshotOptions } from './lib/sync-engine';
export { FieldMapper, parseMarker, extractExternalKey, markerLine, MARKER_VERSION } from './lib/field-mapper';
export { FieldResolver } from './lib/field-resolver';
export { StatusMapper } from './lib/status-mapper';
export { buildCreatePayload, buildUpdateOperations } from './lib/payload-builder';
export { renderRichText, wikiToMarkdown, adfToMarkdown } from './lib/rich-text';
export { JiraClient } from './lib/jira-client';
export { AirfocusClient } from './lib/airfocus-client';
export { SnapshotStore } from './lib/snapshot-store';
export { loadConfig, loadConfigFromEnvironment, readConfigFile } from './lib/config';
export type { SyncConfig } from './lib/config';
export { FatalPreconditionError, ConfigError, RemoteOperationError } from './lib/errors';
export { logger } from './lib/logger';

export * from './lib/types';
