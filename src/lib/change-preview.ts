/**
 * Dry-run output for planned intents, with line diffs of what an update
 * would overwrite
 */

import chalk from 'chalk';
import { diffLines } from 'diff';
import { MirrorItem, PlannedRecord, ReplaceOperation } from './types';

export interface DiffLine {
  kind: 'added' | 'removed' | 'context';
  text: string;
}

export interface UpdatePreview {
  title: { from: string; to: string } | null;
  status: { from: string | null; to: string } | null;
  description: DiffLine[];
}

const CONTEXT_LINES = 2;

function toLines(value: string): string[] {
  return value.replace(/\n$/, '').split('\n');
}

/**
 * Changed lines of `next` against `current`, with a little unchanged context
 * around each change
 */
export function diffText(current: string, next: string, contextLines: number = CONTEXT_LINES): DiffLine[] {
  const parts = diffLines(current, next);
  const out: DiffLine[] = [];

  parts.forEach((part, i) => {
    if (!part.added && !part.removed) {
      return;
    }

    const before = parts[i - 1];
    if (before && !before.added && !before.removed && contextLines > 0) {
      toLines(before.value)
        .slice(-contextLines)
        .forEach((text) => out.push({ kind: 'context', text }));
    }

    toLines(part.value).forEach((text) => out.push({ kind: part.added ? 'added' : 'removed', text }));

    const after = parts[i + 1];
    if (after && !after.added && !after.removed && contextLines > 0) {
      toLines(after.value)
        .slice(0, contextLines)
        .forEach((text) => out.push({ kind: 'context', text }));
    }
  });

  return out;
}

function replacedString(operations: ReplaceOperation[], path: string): string | undefined {
  const operation = operations.find((op) => op.path === path);
  return typeof operation?.value === 'string' ? operation.value : undefined;
}

export function previewUpdate(existing: MirrorItem, operations: ReplaceOperation[]): UpdatePreview {
  const title = replacedString(operations, '/name');
  const description = replacedString(operations, '/description');
  const statusId = replacedString(operations, '/statusId');

  return {
    title: title !== undefined && title !== existing.title ? { from: existing.title, to: title } : null,
    status: statusId !== undefined && statusId !== existing.statusId ? { from: existing.statusId, to: statusId } : null,
    description: description !== undefined ? diffText(existing.description, description) : [],
  };
}

/**
 * Print one line per planned record, and the diff of each update when asked
 */
export function printPlan(planned: PlannedRecord[], options: { showDiff?: boolean } = {}): void {
  for (const record of planned) {
    const key = record.externalKey || '(no key)';

    if ('skipReason' in record) {
      console.log(chalk.gray(`  skip    ${key}: ${record.skipReason}`));
      continue;
    }
    if ('failure' in record) {
      console.log(chalk.red(`  fail    ${key}: ${record.failure.reason}`));
      continue;
    }

    const { intent } = record;
    if (intent.kind === 'create') {
      console.log(chalk.green(`  create  ${key}: ${intent.payload.name}`));
      continue;
    }

    console.log(chalk.cyan(`  update  ${key} -> ${intent.targetId} (${intent.operations.length} operations)`));
    if (!options.showDiff || !record.existing) {
      continue;
    }

    const preview = previewUpdate(record.existing, intent.operations);
    if (preview.title) {
      console.log(chalk.red(`      - title: ${preview.title.from}`));
      console.log(chalk.green(`      + title: ${preview.title.to}`));
    }
    if (preview.status) {
      console.log(chalk.yellow(`      status: ${preview.status.from ?? '(none)'} -> ${preview.status.to}`));
    }
    for (const line of preview.description) {
      if (line.kind === 'added') {
        console.log(chalk.green(`      + ${line.text}`));
      } else if (line.kind === 'removed') {
        console.log(chalk.red(`      - ${line.text}`));
      } else {
        console.log(chalk.gray(`        ${line.text}`));
      }
    }
    if (!preview.title && !preview.status && preview.description.length === 0) {
      console.log(chalk.gray('      (no changes detected)'));
    }
  }
}
