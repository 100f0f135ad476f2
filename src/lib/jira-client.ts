/**
 * Jira REST API client (read only)
 */

import { z } from 'zod';
import { RestClient } from './http';
import { logger } from './logger';
import { isAdfNode } from './rich-text';
import { RichText, SourceAttachment, SourceReader, SourceRecord } from './types';

export const JIRA_PAGE_SIZE = 100;
export const JIRA_FIELDS = ['key', 'summary', 'description', 'status', 'assignee', 'attachment', 'updated'];

export interface JiraClientOptions {
  restUrl: string;
  token: string;
  projectKey: string;
  jql: string;
  teamField?: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
}

const attachmentSchema = z
  .object({
    filename: z.string().optional(),
    url: z.string().optional(),
    content: z.string().optional(),
  })
  .passthrough();

const issueSchema = z
  .object({
    key: z.string(),
    fields: z
      .object({
        summary: z.string().nullish(),
        description: z.unknown().optional(),
        status: z.object({ name: z.string() }).passthrough().nullish(),
        assignee: z
          .object({
            displayName: z.string().nullish(),
            name: z.string().nullish(),
            emailAddress: z.string().nullish(),
          })
          .passthrough()
          .nullish(),
        attachment: z.array(attachmentSchema).nullish(),
        updated: z.string().nullish(),
      })
      .passthrough(),
  })
  .passthrough();

const searchResponseSchema = z
  .object({
    issues: z.array(issueSchema),
    total: z.number().optional(),
  })
  .passthrough();

export type JiraIssue = z.infer<typeof issueSchema>;

/**
 * Drop milliseconds and the numeric offset: 2024-01-15T10:30:00.000+0200 -> 2024-01-15T10:30:00
 */
export function cleanTimestamp(raw: string | null | undefined): string | undefined {
  if (!raw) {
    return undefined;
  }
  return raw.replace(/\.\d+(?:[+-]\d{2}:?\d{2}|Z)?$/, '').replace(/(?:[+-]\d{2}:?\d{2}|Z)$/, '');
}

function toRichText(value: unknown, key: string): RichText | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  if (typeof value === 'string' || isAdfNode(value)) {
    return value;
  }
  logger.warn(`${key}: description has an unsupported format and was left out`);
  return null;
}

function teamLabel(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim() || undefined;
  }
  if (Array.isArray(value)) {
    return teamLabel(value[0]);
  }
  if (typeof value === 'object' && value !== null) {
    return teamLabel(Reflect.get(value, 'value') ?? Reflect.get(value, 'name'));
  }
  return undefined;
}

export class JiraClient implements SourceReader {
  private readonly http: RestClient;
  private readonly browseBase: string;

  constructor(private readonly options: JiraClientOptions) {
    this.http = new RestClient({
      system: 'Jira',
      baseUrl: options.restUrl,
      headers: { Authorization: `Bearer ${options.token}` },
      timeoutMs: options.timeoutMs,
      retries: options.retries,
      retryDelayMs: options.retryDelayMs,
    });
    this.browseBase = options.restUrl.replace(/\/rest\/api\/[^/]+$/, '');
  }

  /**
   * Run the configured JQL and return every matching issue, page by page
   */
  async searchIssues(): Promise<JiraIssue[]> {
    const fields = this.options.teamField ? [...JIRA_FIELDS, this.options.teamField] : JIRA_FIELDS;
    const issues: JiraIssue[] = [];
    let startAt = 0;

    for (;;) {
      const page = await this.http.request('/search', searchResponseSchema, {
        method: 'POST',
        body: { jql: this.options.jql, fields, startAt, maxResults: JIRA_PAGE_SIZE },
        retry: true,
      });

      issues.push(...page.issues);
      logger.debug(`Fetched ${page.issues.length} Jira issues (startAt ${startAt})`);

      if (page.issues.length < JIRA_PAGE_SIZE) {
        break;
      }
      if (page.total !== undefined && issues.length >= page.total) {
        break;
      }
      startAt += page.issues.length;
    }

    return issues;
  }

  async fetchSourceRecords(): Promise<SourceRecord[]> {
    const issues = await this.searchIssues();
    return issues.map((issue) => this.toSourceRecord(issue));
  }

  issueUrl(key: string): string {
    return `${this.browseBase}/projects/${this.options.projectKey}/issues/${key}`;
  }

  toSourceRecord(issue: JiraIssue): SourceRecord {
    const { fields } = issue;

    const attachments: SourceAttachment[] = (fields.attachment ?? []).map((a) => ({
      filename: a.filename ?? '',
      url: a.url || a.content || '',
    }));

    const assigneeName = fields.assignee?.displayName ?? fields.assignee?.name;
    const team = this.options.teamField ? teamLabel(Reflect.get(fields, this.options.teamField)) : undefined;
    const updated = cleanTimestamp(fields.updated);

    return {
      key: issue.key,
      title: fields.summary ?? '',
      description: toRichText(fields.description, issue.key),
      status: fields.status?.name ?? '',
      attachments,
      url: this.issueUrl(issue.key),
      ...(team ? { team } : {}),
      ...(assigneeName
        ? {
            assignee: {
              displayName: assigneeName,
              ...(fields.assignee?.emailAddress ? { emailAddress: fields.assignee.emailAddress } : {}),
            },
          }
        : {}),
      ...(updated ? { updated } : {}),
    };
  }
}
