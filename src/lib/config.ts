/**
 * Sync configuration: environment variables plus an optional JSON file,
 * validated once into an immutable value object
 */

import fs from 'fs';
import path from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import { StatusMappingEntry } from './types';

export const DEFAULT_CONFIG_FILE = 'mirror-sync.config.json';
export const DEFAULT_AIRFOCUS_URL = 'https://app.airfocus.com/api';
export const DEFAULT_EXTERNAL_KEY_FIELD = 'JIRA-KEY';
export const DEFAULT_JQL = 'project = {projectKey} AND issuetype = Epic';

type Env = Record<string, string | undefined>;

const PLACEHOLDER_PATTERN = /^your-.*-here$/;

const statusMappingSchema = z
  .union([
    z.record(z.string().min(1), z.array(z.string().min(1))),
    z.array(
      z
        .object({
          mirrorStatus: z.string().min(1),
          sourceStatuses: z.array(z.string().min(1)),
        })
        .strict()
    ),
  ])
  .transform((value): StatusMappingEntry[] =>
    Array.isArray(value)
      ? value.map((entry) => ({ mirrorStatus: entry.mirrorStatus, sourceStatuses: [...entry.sourceStatuses] }))
      : Object.entries(value).map(([mirrorStatus, sourceStatuses]) => ({ mirrorStatus, sourceStatuses }))
  );

const keyPatternSchema = z.string().min(1).refine(
  (pattern) => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'keyPattern is not a valid regular expression' }
);

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Shape of mirror-sync.config.json. Secrets are only read from the environment.
 */
export const fileConfigSchema = z
  .object({
    jira: z
      .object({
        restUrl: z.string().url(),
        projectKey: z.string().min(1),
        jql: z.string().min(1),
        teamField: z.string().min(1),
      })
      .partial()
      .strict()
      .optional(),
    airfocus: z
      .object({
        restUrl: z.string().url(),
        workspaceId: z.string().min(1),
      })
      .partial()
      .strict()
      .optional(),
    statusMapping: statusMappingSchema.optional(),
    fallbackStatus: z.string().min(1).optional(),
    team: z.object({ field: z.string().min(1), value: z.string().min(1) }).strict().optional(),
    externalKeyField: z.string().min(1).nullable().optional(),
    keyPattern: keyPatternSchema.optional(),
    itemColor: z.string().min(1).optional(),
    concurrency: z.number().int().optional(),
    maxRetries: z.number().int().optional(),
    httpRetries: z.number().int().optional(),
    httpTimeoutMs: z.number().int().optional(),
    dataDir: z.string().min(1).optional(),
    snapshotRetention: z.number().int().optional(),
    logLevel: logLevelSchema.optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

const syncConfigSchema = z.object({
  jira: z.object({
    restUrl: z.string().url(),
    token: z.string().min(1),
    projectKey: z.string().min(1),
    jql: z.string().min(1),
    teamField: z.string().min(1).optional(),
  }),
  airfocus: z.object({
    restUrl: z.string().url(),
    apiKey: z.string().min(1),
    workspaceId: z.string().min(1),
  }),
  statusMapping: z.array(
    z.object({ mirrorStatus: z.string().min(1), sourceStatuses: z.array(z.string().min(1)) })
  ),
  fallbackStatus: z.string().min(1).optional(),
  team: z.object({ field: z.string().min(1), value: z.string().min(1) }).optional(),
  externalKeyField: z.string().min(1).nullable(),
  keyPattern: keyPatternSchema.optional(),
  itemColor: z.string().min(1),
  concurrency: z.coerce.number().int().min(1).max(16),
  maxRetries: z.coerce.number().int().min(0).max(5),
  httpRetries: z.coerce.number().int().min(0).max(5),
  httpTimeoutMs: z.coerce.number().int().min(1000).max(300000),
  dataDir: z.string().min(1),
  snapshotRetention: z.coerce.number().int().min(1),
  logLevel: logLevelSchema,
});

export type SyncConfig = z.infer<typeof syncConfigSchema>;

function envValue(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  if (!value || PLACEHOLDER_PATTERN.test(value)) {
    return undefined;
  }
  return value;
}

function stripTrailingSlash(url: string | undefined): string | undefined {
  return url?.replace(/\/+$/, '');
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Parse the optional JSON config file. A missing file yields an empty config.
 */
export function readConfigFile(filepath: string): FileConfig {
  if (!fs.existsSync(filepath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filepath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read config file ${filepath}: ${message}`);
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filepath}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Build the validated configuration. Environment values win over file values.
 */
export function loadConfig(env: Env, file: FileConfig = {}): SyncConfig {
  const projectKey = envValue(env, 'JIRA_PROJECT_KEY') ?? file.jira?.projectKey;
  const jqlTemplate = envValue(env, 'JIRA_JQL') ?? file.jira?.jql ?? DEFAULT_JQL;

  const teamFieldName = envValue(env, 'TEAM_FIELD_NAME');
  const teamFieldValue = envValue(env, 'TEAM_FIELD_VALUE');
  if ((teamFieldName === undefined) !== (teamFieldValue === undefined)) {
    throw new ConfigError('Invalid configuration', [
      'TEAM_FIELD_NAME and TEAM_FIELD_VALUE must be set together',
    ]);
  }
  const team = teamFieldName && teamFieldValue ? { field: teamFieldName, value: teamFieldValue } : file.team;

  const externalKeyField =
    envValue(env, 'EXTERNAL_KEY_FIELD') ??
    (file.externalKeyField === undefined ? DEFAULT_EXTERNAL_KEY_FIELD : file.externalKeyField);

  const candidate = {
    jira: {
      restUrl: stripTrailingSlash(envValue(env, 'JIRA_REST_URL') ?? file.jira?.restUrl),
      token: envValue(env, 'JIRA_PAT'),
      projectKey,
      jql: projectKey ? jqlTemplate.replace(/\{projectKey\}/g, projectKey) : undefined,
      teamField: file.jira?.teamField,
    },
    airfocus: {
      restUrl: stripTrailingSlash(envValue(env, 'AIRFOCUS_REST_URL') ?? file.airfocus?.restUrl ?? DEFAULT_AIRFOCUS_URL),
      apiKey: envValue(env, 'AIRFOCUS_API_KEY'),
      workspaceId: envValue(env, 'AIRFOCUS_WORKSPACE_ID') ?? file.airfocus?.workspaceId,
    },
    statusMapping: file.statusMapping ?? [],
    fallbackStatus: file.fallbackStatus,
    team,
    externalKeyField,
    keyPattern: file.keyPattern,
    itemColor: file.itemColor ?? 'blue',
    concurrency: envValue(env, 'SYNC_CONCURRENCY') ?? file.concurrency ?? 2,
    maxRetries: envValue(env, 'SYNC_MAX_RETRIES') ?? file.maxRetries ?? 0,
    httpRetries: envValue(env, 'HTTP_RETRIES') ?? file.httpRetries ?? 2,
    httpTimeoutMs: envValue(env, 'HTTP_TIMEOUT_MS') ?? file.httpTimeoutMs ?? 30000,
    dataDir: envValue(env, 'DATA_DIR') ?? file.dataDir ?? './data',
    snapshotRetention: envValue(env, 'SNAPSHOT_RETENTION') ?? file.snapshotRetention ?? 10,
    logLevel: envValue(env, 'LOG_LEVEL')?.toLowerCase() ?? file.logLevel ?? 'info',
  };

  const parsed = syncConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
  }

  return deepFreeze(parsed.data);
}

/**
 * Load .env files from the working directory, then the config file, then validate
 */
export function loadConfigFromEnvironment(cwd: string = process.cwd(), configPath?: string): SyncConfig {
  loadDotenv({ path: path.join(cwd, '.env.local') });
  loadDotenv({ path: path.join(cwd, '.env') });

  const filepath = path.resolve(cwd, configPath ?? process.env.MIRROR_SYNC_CONFIG ?? DEFAULT_CONFIG_FILE);
  return loadConfig(process.env, readConfigFile(filepath));
}

/**
 * Apply command-line overrides to a loaded config, revalidating the result
 */
export function withOverrides(base: SyncConfig, overrides: Partial<Pick<SyncConfig, 'concurrency' | 'maxRetries'>>): SyncConfig {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const parsed = syncConfigSchema.safeParse({ ...base, ...defined });
  if (!parsed.success) {
    throw new ConfigError('Invalid command-line options', formatIssues(parsed.error));
  }
  return deepFreeze(parsed.data);
}
