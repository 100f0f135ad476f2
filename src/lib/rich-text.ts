/**
 * Jira rich text to markdown
 *
 * Handles Jira wiki markup (Server/Data Center descriptions) and Atlassian
 * Document Format documents (Cloud descriptions).
 */

import { AdfNode, RichText } from './types';

const MAX_ADF_DEPTH = 64;

export class RichTextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RichTextError';
  }
}

/**
 * Convert a description to markdown. Null and empty values render as ''.
 * Throws RichTextError when the content cannot be rendered.
 */
export function renderRichText(value: RichText | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return wikiToMarkdown(value);
  }
  return adfToMarkdown(value);
}

// ---------------------------------------------------------------------------
// Wiki markup

class Stash {
  private readonly values: string[] = [];

  put(value: string): string {
    this.values.push(value);
    return `\u0000${this.values.length - 1}\u0000`;
  }

  restore(text: string): string {
    return text.replace(/\u0000(\d+)\u0000/g, (_match, index: string) => this.values[Number(index)] ?? '');
  }
}

export function wikiToMarkdown(input: string): string {
  const stash = new Stash();
  let text = input.replace(/\r\n?/g, '\n');

  // Block-level code first so nothing inside is touched
  text = text.replace(/\{code(?::([^}]*))?\}([\s\S]*?)\{code\}/g, (_m, params: string | undefined, body: string) => {
    const language = (params ?? '').split('|').find((p) => p && !p.includes('=')) ?? '';
    return stash.put('```' + language + '\n' + body.replace(/^\n+|\n+$/g, '') + '\n```');
  });
  text = text.replace(/\{noformat\}([\s\S]*?)\{noformat\}/g, (_m, body: string) =>
    stash.put('```\n' + body.replace(/^\n+|\n+$/g, '') + '\n```')
  );
  text = text.replace(/\{quote\}([\s\S]*?)\{quote\}/g, (_m, body: string) =>
    body
      .replace(/^\n+|\n+$/g, '')
      .split('\n')
      .map((line) => (line ? `bq. ${line}` : 'bq.'))
      .join('\n')
  );

  const lines = text.split('\n').map((line) => convertWikiLine(line, stash));
  return stash.restore(lines.join('\n')).trim();
}

function convertWikiLine(line: string, stash: Stash): string {
  const heading = line.match(/^h([1-6])\.\s+(.*)$/);
  if (heading) {
    return `${'#'.repeat(Number(heading[1]))} ${convertWikiInline(heading[2], stash)}`;
  }

  const quote = line.match(/^bq\.\s?(.*)$/);
  if (quote) {
    return quote[1] ? `> ${convertWikiInline(quote[1], stash)}` : '>';
  }

  const list = line.match(/^([*#]+|-)\s+(.*)$/);
  if (list) {
    const markers = list[1];
    const depth = markers === '-' ? 1 : markers.length;
    const bullet = markers.endsWith('#') ? '1.' : '-';
    return `${'  '.repeat(depth - 1)}${bullet} ${convertWikiInline(list[2], stash)}`;
  }

  const headerRow = line.match(/^\|\|(.*)\|\|\s*$/);
  if (headerRow) {
    const cells = headerRow[1].split('||').map((cell) => convertWikiInline(cell.trim(), stash));
    return `| ${cells.join(' | ')} |\n|${cells.map(() => ' --- ').join('|')}|`;
  }

  const row = line.match(/^\|(.*)\|\s*$/);
  if (row) {
    const cells = row[1].split('|').map((cell) => convertWikiInline(cell.trim(), stash));
    return `| ${cells.join(' | ')} |`;
  }

  if (/^-{4,}\s*$/.test(line)) {
    return '---';
  }

  return convertWikiInline(line, stash);
}

function convertWikiInline(text: string, stash: Stash): string {
  let out = text;

  out = out.replace(/\{\{(.+?)\}\}/g, (_m, code: string) => stash.put('`' + code + '`'));
  out = out.replace(/\[([^|\]]+)\|([^\]]+)\]/g, (_m, label: string, href: string) => stash.put(`[${label}](${href.trim()})`));
  out = out.replace(/\[((?:https?|mailto):[^\]]+)\]/g, (_m, href: string) => stash.put(`<${href}>`));
  out = out.replace(/\[~([^\]]+)\]/g, '@$1');
  out = out.replace(/\{color(?::[^}]*)?\}/g, '');

  const closing = '(?=$|[\\s).,:;!?])';
  out = out.replace(new RegExp(`(^|[\\s(])\\*(\\S(?:[^*\\n]*?\\S)?)\\*${closing}`, 'g'), '$1**$2**');
  out = out.replace(new RegExp(`(^|[\\s(])_(\\S(?:[^_\\n]*?\\S)?)_${closing}`, 'g'), '$1*$2*');
  out = out.replace(new RegExp(`(^|[\\s(])-(\\S(?:[^-\\n]*?\\S)?)-${closing}`, 'g'), '$1~~$2~~');

  return out;
}

// ---------------------------------------------------------------------------
// Atlassian Document Format

export function isAdfNode(value: unknown): value is AdfNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && typeof Reflect.get(value, 'type') === 'string';
}

export function adfToMarkdown(doc: AdfNode): string {
  if (doc.type !== 'doc') {
    throw new RichTextError(`Unsupported rich text document type "${doc.type}"`);
  }
  return renderBlocks(doc.content ?? [], 0).trim();
}

function attrString(node: AdfNode, key: string): string | undefined {
  const value = node.attrs?.[key];
  return typeof value === 'string' ? value : undefined;
}

function attrNumber(node: AdfNode, key: string): number | undefined {
  const value = node.attrs?.[key];
  return typeof value === 'number' ? value : undefined;
}

function renderBlocks(nodes: AdfNode[], depth: number): string {
  return nodes
    .map((node) => renderBlock(node, depth))
    .filter((block) => block.length > 0)
    .join('\n\n');
}

function renderBlock(node: AdfNode, depth: number): string {
  if (depth > MAX_ADF_DEPTH) {
    throw new RichTextError('Rich text is nested too deeply to render');
  }
  if (!isAdfNode(node)) {
    throw new RichTextError('Rich text contains a malformed node');
  }

  const children = node.content ?? [];

  switch (node.type) {
    case 'paragraph':
      return renderInline(children);
    case 'heading': {
      const level = Math.min(Math.max(attrNumber(node, 'level') ?? 1, 1), 6);
      return `${'#'.repeat(level)} ${renderInline(children)}`;
    }
    case 'bulletList':
      return children.map((item) => renderListItem(item, '-', depth)).join('\n');
    case 'orderedList': {
      const start = attrNumber(node, 'order') ?? 1;
      return children.map((item, i) => renderListItem(item, `${start + i}.`, depth)).join('\n');
    }
    case 'codeBlock': {
      const language = attrString(node, 'language') ?? '';
      const code = children.map((child) => {
        if (child.type !== 'text') {
          throw new RichTextError(`Unexpected "${child.type}" node inside a code block`);
        }
        return child.text ?? '';
      });
      return '```' + language + '\n' + code.join('') + '\n```';
    }
    case 'blockquote':
    case 'panel':
      return renderBlocks(children, depth + 1)
        .split('\n')
        .map((line) => (line ? `> ${line}` : '>'))
        .join('\n');
    case 'rule':
      return '---';
    case 'table':
      return renderTable(node, depth);
    case 'mediaSingle':
    case 'mediaGroup':
    case 'media':
      // Attachments are listed separately
      return '';
    case 'text':
    case 'hardBreak':
    case 'mention':
    case 'emoji':
    case 'inlineCard':
      return renderInline([node]);
    default:
      return renderBlocks(children, depth + 1);
  }
}

function renderListItem(item: AdfNode, marker: string, depth: number): string {
  const indent = '  '.repeat(depth);
  const lines: string[] = [];

  (item.content ?? []).forEach((child, index) => {
    if (child.type === 'bulletList' || child.type === 'orderedList') {
      lines.push(renderBlock(child, depth + 1));
    } else if (index === 0) {
      lines.push(`${indent}${marker} ${renderBlock(child, depth + 1)}`);
    } else {
      lines.push(`${indent}  ${renderBlock(child, depth + 1)}`);
    }
  });

  if (lines.length === 0) {
    lines.push(`${indent}${marker}`);
  }
  return lines.join('\n');
}

function renderTable(table: AdfNode, depth: number): string {
  const rows = (table.content ?? []).map((row) =>
    (row.content ?? []).map((cell) => renderBlocks(cell.content ?? [], depth + 1).replace(/\n+/g, ' ').replace(/\|/g, '\\|'))
  );
  if (rows.length === 0) {
    return '';
  }

  const width = Math.max(...rows.map((r) => r.length));
  const pad = (row: string[]) => [...row, ...Array<string>(width - row.length).fill('')];
  const lines = [`| ${pad(rows[0]).join(' | ')} |`, `|${Array<string>(width).fill(' --- ').join('|')}|`];
  for (const row of rows.slice(1)) {
    lines.push(`| ${pad(row).join(' | ')} |`);
  }
  return lines.join('\n');
}

function renderInline(nodes: AdfNode[]): string {
  return nodes.map(renderInlineNode).join('');
}

function renderInlineNode(node: AdfNode): string {
  switch (node.type) {
    case 'text':
      return applyMarks(node.text ?? '', node);
    case 'hardBreak':
      return '  \n';
    case 'mention':
      return attrString(node, 'text') ?? '@unknown';
    case 'emoji':
      return attrString(node, 'text') ?? attrString(node, 'shortName') ?? '';
    case 'inlineCard': {
      const url = attrString(node, 'url');
      return url ? `<${url}>` : '';
    }
    default:
      return renderInline(node.content ?? []);
  }
}

function applyMarks(text: string, node: AdfNode): string {
  let out = text;
  for (const mark of node.marks ?? []) {
    switch (mark.type) {
      case 'code':
        out = '`' + out + '`';
        break;
      case 'strong':
        out = `**${out}**`;
        break;
      case 'em':
        out = `*${out}*`;
        break;
      case 'strike':
        out = `~~${out}~~`;
        break;
      case 'link': {
        const href = mark.attrs?.href;
        if (typeof href === 'string') {
          out = `[${out}](${href})`;
        }
        break;
      }
      default:
        break;
    }
  }
  return out;
}
