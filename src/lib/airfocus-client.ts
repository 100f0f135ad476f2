/**
 * Airfocus REST API client: workspace schema, item search, create and patch
 */

import { z } from 'zod';
import { parseMarker } from './field-mapper';
import { RestClient } from './http';
import { logger } from './logger';
import {
  CreateRequestBody,
  FieldDefinition,
  FieldKind,
  MirrorFieldValue,
  MirrorItem,
  MirrorReader,
  MirrorSchema,
  MirrorStatus,
  MirrorWriter,
  ReplaceOperation,
} from './types';

export const AIRFOCUS_PAGE_SIZE = 1000;
export const MARKDOWN_MEDIA_TYPE = 'application/vnd.airfocus.markdown+json';

export interface AirfocusClientOptions {
  restUrl: string;
  apiKey: string;
  workspaceId: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
}

const rawFieldSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    typeId: z.string().optional(),
    settings: z
      .object({
        options: z.array(z.object({ id: z.string(), name: z.string() }).passthrough()).optional(),
        multiple: z.boolean().optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const rawStatusSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    default: z.boolean().optional(),
  })
  .passthrough();

const workspaceSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    _embedded: z
      .object({
        fields: z.record(rawFieldSchema).optional(),
        statuses: z.record(rawStatusSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const fieldValueSchema = z
  .object({
    text: z.string().optional(),
    selection: z.array(z.string()).optional(),
    value: z.unknown().optional(),
    displayValue: z.string().optional(),
  })
  .passthrough();

const rawItemSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
    description: z.union([z.string(), z.object({ markdown: z.string().optional() }).passthrough()]).nullish(),
    statusId: z.string().nullish(),
    archived: z.boolean().optional(),
    lastUpdatedAt: z.string().optional(),
    fields: z.record(fieldValueSchema.nullable()).nullish(),
  })
  .passthrough();

const itemSearchSchema = z
  .object({
    items: z.array(rawItemSchema),
    totalItems: z.number().optional(),
  })
  .passthrough();

const createdItemSchema = z.object({ id: z.string() }).passthrough();

export type RawAirfocusField = z.infer<typeof rawFieldSchema>;
export type RawAirfocusItem = z.infer<typeof rawItemSchema>;

export function toFieldKind(field: RawAirfocusField): FieldKind {
  switch (field.typeId) {
    case 'text':
      return 'text';
    case 'select':
      return field.settings?.multiple ? 'multi-select' : 'single-select';
    default:
      return 'other';
  }
}

export function toFieldDefinition(field: RawAirfocusField): FieldDefinition {
  const kind = toFieldKind(field);
  return {
    id: field.id,
    name: field.name,
    kind,
    options:
      kind === 'single-select' || kind === 'multi-select'
        ? (field.settings?.options ?? []).map((option) => ({ id: option.id, name: option.name }))
        : [],
  };
}

export function toMirrorItem(item: RawAirfocusItem): MirrorItem {
  const description = typeof item.description === 'string' ? item.description : item.description?.markdown ?? '';

  const fieldValues: Record<string, MirrorFieldValue> = {};
  for (const [fieldId, value] of Object.entries(item.fields ?? {})) {
    if (value) {
      fieldValues[fieldId] = {
        ...(value.text !== undefined ? { text: value.text } : {}),
        ...(value.selection !== undefined ? { selection: value.selection } : {}),
        ...(value.value !== undefined ? { value: value.value } : {}),
        ...(value.displayValue !== undefined ? { displayValue: value.displayValue } : {}),
      };
    }
  }

  return {
    id: item.id,
    externalKey: parseMarker(description),
    title: item.name ?? '',
    description,
    statusId: item.statusId ?? null,
    fieldValues,
    ...(item.archived !== undefined ? { archived: item.archived } : {}),
    ...(item.lastUpdatedAt ? { lastUpdatedAt: item.lastUpdatedAt } : {}),
  };
}

export class AirfocusClient implements MirrorReader, MirrorWriter {
  private readonly http: RestClient;
  private readonly workspacePath: string;

  constructor(options: AirfocusClientOptions) {
    this.http = new RestClient({
      system: 'Airfocus',
      baseUrl: options.restUrl,
      headers: { Authorization: `Bearer ${options.apiKey}` },
      timeoutMs: options.timeoutMs,
      retries: options.retries,
      retryDelayMs: options.retryDelayMs,
    });
    this.workspacePath = `/workspaces/${encodeURIComponent(options.workspaceId)}`;
  }

  async fetchSchema(): Promise<MirrorSchema> {
    const workspace = await this.http.request(this.workspacePath, workspaceSchema, { retry: true });
    const embedded = workspace._embedded;

    const fields = Object.values(embedded?.fields ?? {}).map(toFieldDefinition);
    const statuses: MirrorStatus[] = Object.values(embedded?.statuses ?? {}).map((status) => ({
      id: status.id,
      name: status.name,
      isDefault: status.default ?? false,
    }));

    logger.debug(`Workspace ${workspace.name ?? workspace.id ?? ''}: ${fields.length} fields, ${statuses.length} statuses`);
    return { fields, statuses };
  }

  async searchItems(): Promise<RawAirfocusItem[]> {
    const items: RawAirfocusItem[] = [];
    let offset = 0;

    for (;;) {
      const page = await this.http.request(`${this.workspacePath}/items/search`, itemSearchSchema, {
        method: 'POST',
        body: { filters: {}, pagination: { limit: AIRFOCUS_PAGE_SIZE, offset } },
        retry: true,
      });

      items.push(...page.items);
      logger.debug(`Fetched ${page.items.length} Airfocus items (offset ${offset})`);

      if (page.items.length < AIRFOCUS_PAGE_SIZE) {
        break;
      }
      if (page.totalItems !== undefined && items.length >= page.totalItems) {
        break;
      }
      offset += page.items.length;
    }

    return items;
  }

  async fetchItems(): Promise<MirrorItem[]> {
    const items = await this.searchItems();
    return items.map(toMirrorItem);
  }

  async createItem(body: CreateRequestBody): Promise<{ id: string }> {
    const created = await this.http.request(`${this.workspacePath}/items`, createdItemSchema, {
      method: 'POST',
      body,
      contentType: MARKDOWN_MEDIA_TYPE,
    });
    return { id: created.id };
  }

  async patchItem(itemId: string, operations: ReplaceOperation[]): Promise<void> {
    await this.http.request(`${this.workspacePath}/items/${encodeURIComponent(itemId)}`, z.unknown(), {
      method: 'PATCH',
      body: operations,
      contentType: MARKDOWN_MEDIA_TYPE,
    });
  }
}
