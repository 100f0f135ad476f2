/**
 * Shared types for the issue mirror sync system
 */

export interface SourceAttachment {
  filename: string;
  url: string;
}

export interface SourceAssignee {
  displayName: string;
  emailAddress?: string;
}

/**
 * Atlassian Document Format node (Jira Cloud rich text)
 */
export interface AdfNode {
  type: string;
  text?: string;
  attrs?: Record<string, unknown>;
  marks?: Array<{ type: string; attrs?: Record<string, unknown> }>;
  content?: AdfNode[];
}

/** Jira wiki markup string, or an ADF document */
export type RichText = string | AdfNode;

export interface SourceRecord {
  key: string;
  title: string;
  description: RichText | null;
  status: string;
  attachments: SourceAttachment[];
  team?: string;
  url?: string;
  assignee?: SourceAssignee;
  updated?: string; // ISO timestamp without milliseconds
}

/**
 * Raw value of a field on a mirror item, keyed by field id
 */
export interface MirrorFieldValue {
  text?: string;
  selection?: string[];
  value?: unknown;
  displayValue?: string;
}

export interface MirrorItem {
  id: string;
  externalKey: string | null;
  title: string;
  description: string;
  statusId: string | null;
  fieldValues: Record<string, MirrorFieldValue>;
  archived?: boolean;
  lastUpdatedAt?: string;
}

export type FieldKind = 'text' | 'single-select' | 'multi-select' | 'other';

export interface FieldOption {
  id: string;
  name: string;
}

export interface FieldDefinition {
  id: string;
  name: string;
  kind: FieldKind;
  options: FieldOption[]; // ordered, empty for non-select kinds
}

export interface MirrorStatus {
  id: string;
  name: string;
  isDefault: boolean;
}

export interface MirrorSchema {
  fields: FieldDefinition[];
  statuses: MirrorStatus[];
}

export interface StatusMappingEntry {
  mirrorStatus: string;
  sourceStatuses: string[];
}

export type StatusMapping = ReadonlyArray<StatusMappingEntry>;

/**
 * Mirror-side rendering of one source record, before any id resolution
 */
export interface CandidateItem {
  externalKey: string;
  title: string;
  description: string;
  sourceStatus: string;
  team?: string;
  renderError?: string;
}

export type Resolution =
  | { found: true; id: string }
  | { found: false; reason: string };

export interface ResolvedTeamField {
  fieldId: string;
  kind: FieldKind;
  optionId?: string; // set for select kinds
  value: string;
}

/**
 * Field and status ids resolved for one record
 */
export interface ResolvedFields {
  statusId: string | null;
  externalKeyFieldId: string | null; // null: key lives in the description marker
  team: ResolvedTeamField | null;
}

export interface CreateRequestBody {
  name: string;
  description: {
    markdown: string;
    richText: boolean;
  };
  statusId?: string;
  color: string;
  assigneeUserIds: string[];
  assigneeUserGroupIds: string[];
  order: number;
  fields: Record<string, MirrorFieldValue>;
}

export interface ReplaceOperation {
  op: 'replace';
  path: string;
  value: string | MirrorFieldValue;
}

export type FailureKind = 'record-validation' | 'field-resolution' | 'remote-operation';

export interface RecordFailure {
  kind: FailureKind;
  reason: string;
}

export type IntentOutcome =
  | { state: 'pending' }
  | { state: 'succeeded'; itemId: string }
  | { state: 'failed'; reason: string };

export type ReconciliationIntent =
  | {
      kind: 'create';
      externalKey: string;
      payload: CreateRequestBody;
      outcome: IntentOutcome;
    }
  | {
      kind: 'update';
      externalKey: string;
      targetId: string;
      operations: ReplaceOperation[];
      outcome: IntentOutcome;
    };

export type RecordState =
  | 'unmatched'
  | 'matched-for-create'
  | 'matched-for-update'
  | 'built'
  | 'submitted'
  | 'succeeded'
  | 'failed';

export type RecordAction = 'create' | 'update' | 'skip';

export interface RecordOutcome {
  externalKey: string;
  action: RecordAction;
  status: 'succeeded' | 'failed' | 'skipped';
  state: RecordState;
  itemId?: string;
  failure?: RecordFailure;
  skipReason?: string;
  attempts: number;
}

export interface RunCounts {
  created: number;
  updated: number;
  failed: number;
  skipped: number;
}

export interface RunReport {
  outcomes: RecordOutcome[];
  counts: RunCounts;
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
}

/**
 * Result of planning a single record without writing anything
 */
export type PlannedRecord =
  | { externalKey: string; intent: ReconciliationIntent; existing?: MirrorItem }
  | { externalKey: string; failure: RecordFailure }
  | { externalKey: string; skipReason: string };

export interface ReconciliationInput {
  records: SourceRecord[];
  items: MirrorItem[];
  schema: MirrorSchema;
}

/**
 * Read side of the source system
 */
export interface SourceReader {
  fetchSourceRecords(): Promise<SourceRecord[]>;
}

/**
 * Read side of the mirror system
 */
export interface MirrorReader {
  fetchSchema(): Promise<MirrorSchema>;
  fetchItems(): Promise<MirrorItem[]>;
}

/**
 * Write side of the mirror system
 */
export interface MirrorWriter {
  createItem(body: CreateRequestBody): Promise<{ id: string }>;
  patchItem(itemId: string, operations: ReplaceOperation[]): Promise<void>;
}
