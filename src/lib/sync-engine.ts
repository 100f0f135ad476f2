/**
 * Reconciliation engine: matches Jira records to Airfocus items by key and
 * creates or fully overwrites the mirror items
 */

import { FatalPreconditionError, RemoteOperationError, errorMessage } from './errors';
import { FieldMapper, extractExternalKey } from './field-mapper';
import { FieldResolver } from './field-resolver';
import { logger } from './logger';
import { pMap } from './concurrency';
import { buildCreatePayload, buildUpdateOperations } from './payload-builder';
import { RecordStateMachine } from './record-state';
import { withRetry } from './retry';
import { SnapshotStore } from './snapshot-store';
import { StatusMapper } from './status-mapper';
import {
  CandidateItem,
  MirrorItem,
  MirrorReader,
  MirrorWriter,
  PlannedRecord,
  ReconciliationInput,
  ReconciliationIntent,
  RecordAction,
  RecordFailure,
  RecordOutcome,
  ResolvedFields,
  ResolvedTeamField,
  RunCounts,
  RunReport,
  SourceReader,
  StatusMapping,
} from './types';

export const CANCELLED_REASON = 'cancelled';
export const DUPLICATE_REASON = 'duplicate source key in this pass';

export interface SyncEngineOptions {
  statusMapping: StatusMapping;
  /** Mirror status used when a pass-through status does not exist in the workspace */
  fallbackStatus?: string;
  /** Name of the dedicated key field; null keeps the key in the description marker only */
  externalKeyField: string | null;
  /** Team field name, and the value used for records without their own team label */
  team?: { field: string; value?: string };
  keyPattern?: string;
  itemColor?: string;
  concurrency?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

export interface SyncEngineDeps {
  writer: MirrorWriter;
  source?: SourceReader;
  reader?: MirrorReader;
}

export interface ReconcileOptions {
  signal?: AbortSignal;
  onOutcome?: (outcome: RecordOutcome) => void;
}

export interface SnapshotOptions {
  store: SnapshotStore;
  projectKey: string;
  workspaceId: string;
}

export interface RunOptions extends ReconcileOptions {
  snapshots?: SnapshotOptions;
}

/**
 * Everything computed once per pass and shared read-only by all records
 */
interface PassContext {
  resolver: FieldResolver;
  index: Map<string, MirrorItem>;
  externalKeyFieldId: string | null;
}

interface PreparedRecord {
  externalKey: string;
  action: RecordAction;
  machine: RecordStateMachine;
  planned: PlannedRecord;
}

export class SyncEngine {
  private readonly mapper: FieldMapper;
  private readonly statusMapper: StatusMapper;
  private readonly concurrency: number;
  private readonly maxRetries: number;

  constructor(
    private readonly deps: SyncEngineDeps,
    private readonly options: SyncEngineOptions
  ) {
    this.mapper = new FieldMapper({ defaultTeam: options.team?.value, keyPattern: options.keyPattern });
    this.statusMapper = new StatusMapper(options.statusMapping);
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.maxRetries = Math.max(0, options.maxRetries ?? 0);
  }

  /**
   * Fetch records, schema and items through the readers. Any failure is fatal
   * for the pass.
   */
  async fetchInputs(snapshots?: SnapshotOptions): Promise<ReconciliationInput> {
    const { source, reader } = this.deps;
    if (!source || !reader) {
      throw new FatalPreconditionError('SyncEngine needs a source reader and a mirror reader to fetch inputs');
    }

    const records = await this.fetchOrFail('source records', () => source.fetchSourceRecords());
    const schema = await this.fetchOrFail('workspace schema', () => reader.fetchSchema());
    const items = await this.fetchOrFail('mirror items', () => reader.fetchItems());

    logger.info(`Fetched ${records.length} source records, ${items.length} mirror items`);

    if (snapshots) {
      try {
        snapshots.store.saveSourceRecords(snapshots.projectKey, records);
        snapshots.store.saveMirrorItems(snapshots.workspaceId, items);
        snapshots.store.saveSchema(schema);
        snapshots.store.cleanup();
      } catch (error) {
        logger.warn(`Could not write snapshots: ${errorMessage(error)}`);
      }
    }

    return { records, schema, items };
  }

  async run(options: RunOptions = {}): Promise<RunReport> {
    const input = await this.fetchInputs(options.snapshots);
    return this.reconcile(input, options);
  }

  /**
   * Build every intent without writing anything
   */
  plan(input: ReconciliationInput): PlannedRecord[] {
    return this.prepare(input).map((prepared) => prepared.planned);
  }

  async reconcile(input: ReconciliationInput, options: ReconcileOptions = {}): Promise<RunReport> {
    const startedAt = new Date().toISOString();
    const prepared = this.prepare(input);

    const outcomes = await pMap(
      prepared,
      async (record) => {
        const outcome = await this.execute(record);
        options.onOutcome?.(outcome);
        return outcome;
      },
      this.concurrency,
      {
        signal: options.signal,
        onSkipped: (record): RecordOutcome => ({
          externalKey: record.externalKey,
          action: 'skip',
          status: 'skipped',
          state: record.machine.state,
          skipReason: CANCELLED_REASON,
          attempts: 0,
        }),
      }
    );

    return {
      outcomes,
      counts: countOutcomes(outcomes),
      cancelled: options.signal?.aborted ?? false,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
  }

  private async fetchOrFail<T>(what: string, fetch: () => Promise<T>): Promise<T> {
    try {
      return await fetch();
    } catch (error) {
      throw new FatalPreconditionError(`Could not fetch ${what}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private buildContext(input: ReconciliationInput): PassContext {
    const resolver = new FieldResolver(input.schema);

    let externalKeyFieldId: string | null = null;
    if (this.options.externalKeyField) {
      const resolution = resolver.resolveField(this.options.externalKeyField);
      if (resolution.found) {
        externalKeyFieldId = resolution.id;
      } else {
        logger.warn(`${resolution.reason}; keys will only be stored in the description marker`);
      }
    }

    const index = new Map<string, MirrorItem>();
    for (const item of input.items) {
      const key = extractExternalKey(item, externalKeyFieldId);
      if (!key) {
        continue;
      }
      const first = index.get(key);
      if (first) {
        logger.warn(`Items ${first.id} and ${item.id} both carry key ${key}; updating ${first.id}`);
        continue;
      }
      index.set(key, item);
    }

    return { resolver, index, externalKeyFieldId };
  }

  private prepare(input: ReconciliationInput): PreparedRecord[] {
    const context = this.buildContext(input);
    const seen = new Set<string>();

    return input.records.map((record): PreparedRecord => {
      const candidate = this.mapper.buildFromSource(record);
      const key = candidate.externalKey;
      const machine = new RecordStateMachine(key);

      if (key && seen.has(key)) {
        logger.warn(`${key}: appears more than once in the source; skipping the repeat`);
        return { externalKey: key, action: 'skip', machine, planned: { externalKey: key, skipReason: DUPLICATE_REASON } };
      }
      if (key) {
        seen.add(key);
      }

      const action: RecordAction = key && context.index.has(key) ? 'update' : 'create';
      return { externalKey: key, action, machine, planned: this.planRecord(candidate, machine, context) };
    });
  }

  private planRecord(candidate: CandidateItem, machine: RecordStateMachine, context: PassContext): PlannedRecord {
    const key = candidate.externalKey;
    const existing = key ? context.index.get(key) : undefined;
    machine.transition(existing ? 'matched-for-update' : 'matched-for-create');

    const violations = this.mapper.validate(candidate);
    if (violations.length > 0) {
      machine.transition('failed');
      return {
        externalKey: key,
        failure: { kind: 'record-validation', reason: violations.map((v) => v.message).join('; ') },
      };
    }

    const resolved = this.resolveFields(candidate, context);
    if ('failure' in resolved) {
      machine.transition('failed');
      return { externalKey: key, failure: resolved.failure };
    }

    const intent: ReconciliationIntent = existing
      ? {
          kind: 'update',
          externalKey: key,
          targetId: existing.id,
          operations: buildUpdateOperations(candidate, existing, resolved.fields),
          outcome: { state: 'pending' },
        }
      : {
          kind: 'create',
          externalKey: key,
          payload: buildCreatePayload(candidate, resolved.fields, { color: this.options.itemColor }),
          outcome: { state: 'pending' },
        };

    machine.transition('built');
    return existing ? { externalKey: key, intent, existing } : { externalKey: key, intent };
  }

  private resolveFields(
    candidate: CandidateItem,
    context: PassContext
  ): { fields: ResolvedFields } | { failure: RecordFailure } {
    const { resolver } = context;

    let statusId: string | null = null;
    const mirrorStatus = this.statusMapper.mapStatus(candidate.sourceStatus);
    if (mirrorStatus !== null) {
      let resolution = resolver.resolveStatus(mirrorStatus);
      if (!resolution.found && this.options.fallbackStatus && !this.statusMapper.isMapped(candidate.sourceStatus)) {
        logger.debug(`${candidate.externalKey}: status "${mirrorStatus}" not in workspace, using "${this.options.fallbackStatus}"`);
        resolution = resolver.resolveStatus(this.options.fallbackStatus);
      }
      if (!resolution.found) {
        return { failure: { kind: 'field-resolution', reason: resolution.reason } };
      }
      statusId = resolution.id;
    }

    let team: ResolvedTeamField | null = null;
    if (this.options.team && candidate.team) {
      const fieldResolution = resolver.resolveField(this.options.team.field);
      if (!fieldResolution.found) {
        return { failure: { kind: 'field-resolution', reason: fieldResolution.reason } };
      }

      const field = resolver.getField(fieldResolution.id);
      const kind = field?.kind ?? 'other';

      if (kind === 'single-select' || kind === 'multi-select') {
        const option = resolver.resolveOption(fieldResolution.id, candidate.team);
        if (!option.found) {
          return { failure: { kind: 'field-resolution', reason: option.reason } };
        }
        team = { fieldId: fieldResolution.id, kind, optionId: option.id, value: candidate.team };
      } else if (kind === 'text') {
        team = { fieldId: fieldResolution.id, kind, value: candidate.team };
      } else {
        return {
          failure: {
            kind: 'field-resolution',
            reason: `Field "${this.options.team.field}" is neither a text nor a select field`,
          },
        };
      }
    }

    return { fields: { statusId, externalKeyFieldId: context.externalKeyFieldId, team } };
  }

  private async execute(record: PreparedRecord): Promise<RecordOutcome> {
    const { planned, machine } = record;

    if ('skipReason' in planned) {
      return {
        externalKey: record.externalKey,
        action: 'skip',
        status: 'skipped',
        state: machine.state,
        skipReason: planned.skipReason,
        attempts: 0,
      };
    }

    if ('failure' in planned) {
      logger.error(`${record.externalKey || '(no key)'}: ${planned.failure.reason}`);
      return {
        externalKey: record.externalKey,
        action: record.action,
        status: 'failed',
        state: machine.state,
        failure: planned.failure,
        attempts: 0,
      };
    }

    const { intent } = planned;
    machine.transition('submitted');
    let attempts = 0;

    try {
      const itemId = await withRetry(
        async (attempt) => {
          attempts = attempt;
          return this.submit(intent);
        },
        {
          label: `${intent.kind} ${intent.externalKey}`,
          retries: this.maxRetries,
          baseDelayMs: this.options.retryDelayMs,
          shouldRetry: (error) => !(error instanceof RemoteOperationError) || error.isTransient,
        }
      );

      intent.outcome = { state: 'succeeded', itemId };
      machine.transition('succeeded');
      logger.success(`${intent.kind === 'create' ? 'Created' : 'Updated'} ${intent.externalKey} (${itemId})`);

      return {
        externalKey: intent.externalKey,
        action: intent.kind,
        status: 'succeeded',
        state: machine.state,
        itemId,
        attempts,
      };
    } catch (error) {
      const reason = errorMessage(error);
      intent.outcome = { state: 'failed', reason };
      machine.transition('failed');
      logger.error(`${intent.externalKey}: ${intent.kind} failed: ${reason}`);

      return {
        externalKey: intent.externalKey,
        action: intent.kind,
        status: 'failed',
        state: machine.state,
        ...(intent.kind === 'update' ? { itemId: intent.targetId } : {}),
        failure: { kind: 'remote-operation', reason },
        attempts,
      };
    }
  }

  private async submit(intent: ReconciliationIntent): Promise<string> {
    if (intent.kind === 'create') {
      logger.debug(`Create payload for ${intent.externalKey}: ${JSON.stringify(intent.payload)}`);
      const created = await this.deps.writer.createItem(intent.payload);
      return created.id;
    }

    logger.debug(`Patch operations for ${intent.externalKey}: ${JSON.stringify(intent.operations)}`);
    await this.deps.writer.patchItem(intent.targetId, intent.operations);
    return intent.targetId;
  }
}

export function countOutcomes(outcomes: RecordOutcome[]): RunCounts {
  const counts: RunCounts = { created: 0, updated: 0, failed: 0, skipped: 0 };
  for (const outcome of outcomes) {
    if (outcome.status === 'failed') {
      counts.failed++;
    } else if (outcome.status === 'skipped') {
      counts.skipped++;
    } else if (outcome.action === 'create') {
      counts.created++;
    } else if (outcome.action === 'update') {
      counts.updated++;
    }
  }
  return counts;
}
