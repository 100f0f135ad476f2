import { RichTextError, adfToMarkdown, renderRichText, wikiToMarkdown } from '../../src/lib/rich-text';
import { AdfNode } from '../../src/lib/types';

function text(value: string, marks?: AdfNode['marks']): AdfNode {
  return marks ? { type: 'text', text: value, marks } : { type: 'text', text: value };
}

function paragraph(...content: AdfNode[]): AdfNode {
  return { type: 'paragraph', content };
}

function listItem(...content: AdfNode[]): AdfNode {
  return { type: 'listItem', content };
}

describe('wikiToMarkdown', () => {
  it('should convert headings', () => {
    expect(wikiToMarkdown('h1. Title\nh3. Sub')).toBe('# Title\n### Sub');
  });

  it('should convert bullet and numbered lists with nesting', () => {
    expect(wikiToMarkdown('* one\n** nested\n# first')).toBe('- one\n  - nested\n1. first');
  });

  it('should convert inline formatting and links', () => {
    const input = 'Use {{npm ci}} and _fast_ -old- [docs|https://example.com/docs] [https://example.com]';

    expect(wikiToMarkdown(input)).toBe(
      'Use `npm ci` and *fast* ~~old~~ [docs](https://example.com/docs) <https://example.com>'
    );
  });

  it('should convert bold text and mentions', () => {
    expect(wikiToMarkdown('Ask [~jdoe] about *this*.')).toBe('Ask @jdoe about **this**.');
  });

  it('should convert code blocks and leave their content alone', () => {
    expect(wikiToMarkdown('{code:java}\nint x = 1;\n{code}')).toBe('```java\nint x = 1;\n```');
    expect(wikiToMarkdown('{noformat}\na *b* c\n{noformat}')).toBe('```\na *b* c\n```');
  });

  it('should convert quotes', () => {
    expect(wikiToMarkdown('{quote}\nfirst\nsecond\n{quote}')).toBe('> first\n> second');
    expect(wikiToMarkdown('bq. quoted')).toBe('> quoted');
  });

  it('should convert tables', () => {
    expect(wikiToMarkdown('||Name||Team||\n|Ada|Platform|')).toBe('| Name | Team |\n| --- | --- |\n| Ada | Platform |');
  });

  it('should normalize Windows line endings', () => {
    expect(wikiToMarkdown('line one\r\nline two')).toBe('line one\nline two');
  });

  it('should not treat hyphenated words as strikethrough', () => {
    expect(wikiToMarkdown('a well-known re-run')).toBe('a well-known re-run');
  });
});

describe('adfToMarkdown', () => {
  it('should convert a document with headings, marks, lists and code', () => {
    const doc: AdfNode = {
      type: 'doc',
      content: [
        { type: 'heading', attrs: { level: 2 }, content: [text('Goals')] },
        paragraph(
          text('Ship '),
          text('fast', [{ type: 'strong' }]),
          text(' and '),
          text('docs', [{ type: 'link', attrs: { href: 'https://example.com' } }])
        ),
        {
          type: 'bulletList',
          content: [
            listItem(paragraph(text('one')), { type: 'bulletList', content: [listItem(paragraph(text('nested')))] }),
            listItem(paragraph(text('two'))),
          ],
        },
        { type: 'codeBlock', attrs: { language: 'ts' }, content: [text('const a = 1;')] },
      ],
    };

    expect(adfToMarkdown(doc)).toBe(
      [
        '## Goals',
        'Ship **fast** and [docs](https://example.com)',
        '- one\n  - nested\n- two',
        '```ts\nconst a = 1;\n```',
      ].join('\n\n')
    );
  });

  it('should number ordered lists from their start attribute', () => {
    const doc: AdfNode = {
      type: 'doc',
      content: [
        { type: 'orderedList', attrs: { order: 3 }, content: [listItem(paragraph(text('a'))), listItem(paragraph(text('b')))] },
      ],
    };

    expect(adfToMarkdown(doc)).toBe('3. a\n4. b');
  });

  it('should convert quotes, hard breaks and mentions', () => {
    const doc: AdfNode = {
      type: 'doc',
      content: [
        { type: 'blockquote', content: [paragraph(text('quoted'))] },
        paragraph(text('a'), { type: 'hardBreak' }, text('b'), text(' by '), { type: 'mention', attrs: { text: '@Ada' } }),
      ],
    };

    expect(adfToMarkdown(doc)).toBe('> quoted\n\na  \nb by @Ada');
  });

  it('should convert tables', () => {
    const doc: AdfNode = {
      type: 'doc',
      content: [
        {
          type: 'table',
          content: [
            { type: 'tableRow', content: [{ type: 'tableHeader', content: [paragraph(text('A'))] }, { type: 'tableHeader', content: [paragraph(text('B'))] }] },
            { type: 'tableRow', content: [{ type: 'tableCell', content: [paragraph(text('1'))] }, { type: 'tableCell', content: [paragraph(text('2'))] }] },
          ],
        },
      ],
    };

    expect(adfToMarkdown(doc)).toBe('| A | B |\n| --- | --- |\n| 1 | 2 |');
  });

  it('should leave out embedded media', () => {
    const doc: AdfNode = {
      type: 'doc',
      content: [paragraph(text('before')), { type: 'mediaSingle', content: [{ type: 'media', attrs: { id: 'x' } }] }, paragraph(text('after'))],
    };

    expect(adfToMarkdown(doc)).toBe('before\n\nafter');
  });

  it('should reject a root node that is not a document', () => {
    expect(() => adfToMarkdown(paragraph(text('x')))).toThrow(RichTextError);
  });

  it('should reject non-text content inside a code block', () => {
    const doc: AdfNode = { type: 'doc', content: [{ type: 'codeBlock', content: [paragraph(text('x'))] }] };

    expect(() => adfToMarkdown(doc)).toThrow('Unexpected "paragraph" node inside a code block');
  });
});

describe('renderRichText', () => {
  it('should render empty values as an empty string', () => {
    expect(renderRichText(null)).toBe('');
    expect(renderRichText(undefined)).toBe('');
    expect(renderRichText('')).toBe('');
  });

  it('should dispatch on the value type', () => {
    expect(renderRichText('h2. Hi')).toBe('## Hi');
    expect(renderRichText({ type: 'doc', content: [paragraph(text('Hi'))] })).toBe('Hi');
  });
});
