/**
 * In-memory Airfocus workspace and Jira source for engine tests
 */

import { RemoteOperationError } from '../../src/lib/errors';
import { parseMarker } from '../../src/lib/field-mapper';
import {
  CreateRequestBody,
  MirrorItem,
  MirrorReader,
  MirrorSchema,
  MirrorWriter,
  ReplaceOperation,
  SourceReader,
  SourceRecord,
} from '../../src/lib/types';

interface InjectedFailure {
  key: string;
  error: Error;
  remaining: number;
}

export class FakeMirror implements MirrorReader, MirrorWriter {
  readonly items = new Map<string, MirrorItem>();
  readonly writes: Array<{ kind: 'create' | 'patch'; key: string | null }> = [];
  private nextId = 1;
  private failures: InjectedFailure[] = [];

  /** Delay per key, to shuffle completion order */
  delays = new Map<string, number>();

  constructor(public schema: MirrorSchema) {}

  seed(item: MirrorItem): void {
    this.items.set(item.id, item);
  }

  failWith(key: string, error: Error, times: number = Number.POSITIVE_INFINITY): void {
    this.failures.push({ key, error, remaining: times });
  }

  async fetchSchema(): Promise<MirrorSchema> {
    return this.schema;
  }

  async fetchItems(): Promise<MirrorItem[]> {
    return Array.from(this.items.values(), (item) => ({ ...item, fieldValues: { ...item.fieldValues } }));
  }

  async createItem(body: CreateRequestBody): Promise<{ id: string }> {
    const key = parseMarker(body.description.markdown);
    this.writes.push({ kind: 'create', key });
    await this.delayFor(key);
    this.throwIfFailing(key);

    const id = `item-${this.nextId++}`;
    this.items.set(id, {
      id,
      externalKey: key,
      title: body.name,
      description: body.description.markdown,
      statusId: body.statusId ?? null,
      fieldValues: { ...body.fields },
    });
    return { id };
  }

  async patchItem(itemId: string, operations: ReplaceOperation[]): Promise<void> {
    const item = this.items.get(itemId);
    const key = item ? parseMarker(item.description) : null;
    this.writes.push({ kind: 'patch', key });
    await this.delayFor(key);
    this.throwIfFailing(key);

    if (!item) {
      throw new RemoteOperationError({ operation: 'patch', message: `Item ${itemId} not found`, status: 404 });
    }

    for (const operation of operations) {
      const { path, value } = operation;
      if (typeof value === 'string') {
        if (path === '/name') item.title = value;
        else if (path === '/description') item.description = value;
        else if (path === '/statusId') item.statusId = value;
      } else if (path.startsWith('/fields/')) {
        item.fieldValues[path.slice('/fields/'.length)] = value;
      }
    }
    item.externalKey = parseMarker(item.description);
  }

  private async delayFor(key: string | null): Promise<void> {
    const ms = key ? this.delays.get(key) : undefined;
    if (ms) {
      await new Promise((resolve) => setTimeout(resolve, ms));
    }
  }

  private throwIfFailing(key: string | null): void {
    const failure = this.failures.find((f) => f.key === key && f.remaining > 0);
    if (failure) {
      failure.remaining--;
      throw failure.error;
    }
  }
}

export class FakeSource implements SourceReader {
  constructor(public records: SourceRecord[]) {}

  async fetchSourceRecords(): Promise<SourceRecord[]> {
    return this.records.map((record) => ({ ...record }));
  }
}
