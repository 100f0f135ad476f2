/**
 * Record model: maps Jira source records onto Airfocus candidate items
 *
 * The rendered description starts with a versioned marker line carrying the
 * Jira key, so an item can be matched back to its issue even when the
 * workspace has no dedicated key field.
 */

import { logger } from './logger';
import { renderRichText } from './rich-text';
import { CandidateItem, MirrorItem, SourceRecord } from './types';

export const MARKER_VERSION = 1;
export const MARKER_TAG = 'mirror-sync';

const CURRENT_MARKER = new RegExp(`^\\[${MARKER_TAG}:v(\\d+)\\] (.+?) \\| `);
const LEGACY_MARKER = /\*\*JIRA Issue:\*\*\s*(?:\[\*\*([^*\]]+)\*\*\]\([^)]*\)|\*\*([^*]+)\*\*)/;
const SOURCE_ISSUE_LINE = /^\*\*Source Issue:\*\*\s*(?:\[\*\*([^*\]]+)\*\*\]\([^)]*\)|\*\*([^*]+)\*\*)/m;

export type ViolationCode = 'missing-title' | 'missing-key' | 'invalid-key-format' | 'description-render';

export interface Violation {
  code: ViolationCode;
  message: string;
}

export interface FieldMapperOptions {
  /** Team label used when the record carries none */
  defaultTeam?: string;
  /** Keys must match this pattern when set */
  keyPattern?: string;
}

export function markerLine(key: string): string {
  return `[${MARKER_TAG}:v${MARKER_VERSION}] ${key} | Managed by ${MARKER_TAG}: manual edits will be overwritten.`;
}

/**
 * Recover the Jira key from a rendered description. Understands the current
 * marker and the older `**JIRA Issue:**` header.
 */
export function parseMarker(description: string | null | undefined): string | null {
  if (!description) {
    return null;
  }

  const firstLine = description.trimStart().split('\n', 1)[0];
  const current = firstLine.match(CURRENT_MARKER);
  if (current) {
    return current[2];
  }

  const sourceLine = description.match(SOURCE_ISSUE_LINE);
  if (sourceLine) {
    return (sourceLine[1] ?? sourceLine[2]).trim();
  }

  const legacy = description.match(LEGACY_MARKER);
  if (legacy) {
    return (legacy[1] ?? legacy[2]).trim();
  }

  return null;
}

/**
 * Key of an existing item: dedicated field first, then the description marker
 */
export function extractExternalKey(item: MirrorItem, keyFieldId?: string | null): string | null {
  if (keyFieldId) {
    const text = item.fieldValues[keyFieldId]?.text?.trim();
    if (text) {
      return text;
    }
  }
  if (item.externalKey) {
    return item.externalKey;
  }
  return parseMarker(item.description);
}

export class FieldMapper {
  private readonly defaultTeam?: string;
  private readonly keyPattern?: RegExp;

  constructor(options: FieldMapperOptions = {}) {
    this.defaultTeam = options.defaultTeam;
    this.keyPattern = options.keyPattern ? new RegExp(options.keyPattern) : undefined;
  }

  /**
   * Build the mirror-side candidate. Never throws: a description that cannot
   * be rendered is carried as `renderError` and reported by validate().
   */
  buildFromSource(record: SourceRecord): CandidateItem {
    const key = record.key.trim();
    let renderError: string | undefined;
    let converted = '';

    try {
      converted = renderRichText(record.description);
    } catch (error) {
      renderError = error instanceof Error ? error.message : String(error);
    }

    const team = record.team ?? this.defaultTeam;

    return {
      externalKey: key,
      title: record.title.trim(),
      description: this.buildDescription(record, converted),
      sourceStatus: record.status.trim(),
      ...(team ? { team } : {}),
      ...(renderError ? { renderError } : {}),
    };
  }

  buildDescription(record: SourceRecord, convertedDescription: string): string {
    const key = record.key.trim();
    const parts = [markerLine(key)];

    parts.push(record.url ? `**Source Issue:** [**${key}**](${record.url})` : `**Source Issue:** **${key}**`);

    if (record.assignee) {
      const email = record.assignee.emailAddress ? ` (${record.assignee.emailAddress})` : '';
      parts.push(`**Assignee:** ${record.assignee.displayName}${email}`);
    }

    parts.push('**Description:**');
    parts.push(convertedDescription.trim() || 'No description provided.');

    const attachments = record.attachments.filter((attachment) => {
      if (attachment.filename && attachment.url) {
        return true;
      }
      logger.warn(`${key}: skipping attachment without a name or URL`);
      return false;
    });

    if (attachments.length > 0) {
      parts.push('**Attachments:**');
      parts.push(attachments.map((a) => `- [${a.filename}](${a.url})`).join('\n'));
    }

    return parts.join('\n\n');
  }

  validate(candidate: CandidateItem): Violation[] {
    const violations: Violation[] = [];

    if (!candidate.title) {
      violations.push({ code: 'missing-title', message: 'Title is empty' });
    }

    if (!candidate.externalKey) {
      violations.push({ code: 'missing-key', message: 'External key is empty' });
    } else if (parseMarker(markerLine(candidate.externalKey)) !== candidate.externalKey) {
      violations.push({
        code: 'invalid-key-format',
        message: `Key "${candidate.externalKey}" cannot be stored in the description marker`,
      });
    } else if (this.keyPattern && !this.keyPattern.test(candidate.externalKey)) {
      violations.push({
        code: 'invalid-key-format',
        message: `Key "${candidate.externalKey}" does not match ${this.keyPattern.source}`,
      });
    }

    if (candidate.renderError) {
      violations.push({
        code: 'description-render',
        message: `Description could not be rendered: ${candidate.renderError}`,
      });
    }

    return violations;
  }
}
