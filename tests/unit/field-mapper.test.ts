import { FieldMapper, extractExternalKey, markerLine, parseMarker } from '../../src/lib/field-mapper';
import { logger } from '../../src/lib/logger';
import { MirrorItem, SourceRecord } from '../../src/lib/types';

jest.mock('../../src/lib/logger');

function record(overrides: Partial<SourceRecord> = {}): SourceRecord {
  return {
    key: 'PROJ-1',
    title: 'Checkout revamp',
    description: 'Rework the *checkout* flow',
    status: 'Open',
    attachments: [{ filename: 'design.pdf', url: 'https://jira.example.com/att/1' }],
    url: 'https://jira.example.com/projects/PROJ/issues/PROJ-1',
    assignee: { displayName: 'Ada Lovelace', emailAddress: 'ada@example.com' },
    ...overrides,
  };
}

function item(overrides: Partial<MirrorItem> = {}): MirrorItem {
  return {
    id: 'item-1',
    externalKey: null,
    title: 'Checkout revamp',
    description: `${markerLine('PROJ-1')}\n\nbody`,
    statusId: null,
    fieldValues: {},
    ...overrides,
  };
}

describe('FieldMapper', () => {
  let mapper: FieldMapper;

  beforeEach(() => {
    jest.clearAllMocks();
    mapper = new FieldMapper();
  });

  describe('buildFromSource', () => {
    it('should render the full description layout', () => {
      const candidate = mapper.buildFromSource(record());

      expect(candidate.externalKey).toBe('PROJ-1');
      expect(candidate.title).toBe('Checkout revamp');
      expect(candidate.sourceStatus).toBe('Open');
      expect(candidate.renderError).toBeUndefined();
      expect(candidate.description).toBe(
        [
          '[mirror-sync:v1] PROJ-1 | Managed by mirror-sync: manual edits will be overwritten.',
          '**Source Issue:** [**PROJ-1**](https://jira.example.com/projects/PROJ/issues/PROJ-1)',
          '**Assignee:** Ada Lovelace (ada@example.com)',
          '**Description:**',
          'Rework the **checkout** flow',
          '**Attachments:**',
          '- [design.pdf](https://jira.example.com/att/1)',
        ].join('\n\n')
      );
    });

    it('should fall back to placeholders for missing optional parts', () => {
      const candidate = mapper.buildFromSource(
        record({ key: 'PROJ-3', url: undefined, assignee: undefined, description: null, attachments: [] })
      );

      expect(candidate.description).toBe(
        [
          '[mirror-sync:v1] PROJ-3 | Managed by mirror-sync: manual edits will be overwritten.',
          '**Source Issue:** **PROJ-3**',
          '**Description:**',
          'No description provided.',
        ].join('\n\n')
      );
    });

    it('should leave out attachments without a URL and warn', () => {
      const candidate = mapper.buildFromSource(record({ attachments: [{ filename: 'broken.png', url: '' }] }));

      expect(candidate.description).not.toContain('**Attachments:**');
      expect(logger.warn).toHaveBeenCalledWith('PROJ-1: skipping attachment without a name or URL');
    });

    it('should show an assignee without email by name only', () => {
      const candidate = mapper.buildFromSource(record({ assignee: { displayName: 'Grace Hopper' } }));

      expect(candidate.description).toContain('\n\n**Assignee:** Grace Hopper\n\n');
    });

    it('should use the default team when the record has none', () => {
      const withDefault = new FieldMapper({ defaultTeam: 'Platform' });

      expect(withDefault.buildFromSource(record()).team).toBe('Platform');
      expect(withDefault.buildFromSource(record({ team: 'Mobile' })).team).toBe('Mobile');
      expect(mapper.buildFromSource(record()).team).toBeUndefined();
    });

    it('should carry a render error instead of throwing', () => {
      const candidate = mapper.buildFromSource(record({ description: { type: 'paragraph', content: [] } }));

      expect(candidate.renderError).toBe('Unsupported rich text document type "paragraph"');
      expect(candidate.description).toContain('No description provided.');
    });
  });

  describe('validate', () => {
    it('should accept a complete candidate', () => {
      expect(mapper.validate(mapper.buildFromSource(record()))).toEqual([]);
    });

    it('should report a blank title and a blank key', () => {
      const violations = mapper.validate(mapper.buildFromSource(record({ key: '  ', title: '  ' })));

      expect(violations.map((v) => v.code)).toEqual(['missing-title', 'missing-key']);
    });

    it('should report a key that does not match the configured pattern', () => {
      const strict = new FieldMapper({ keyPattern: '^[A-Z]+-\\d+$' });

      expect(strict.validate(strict.buildFromSource(record({ key: 'proj-1' })))).toEqual([
        { code: 'invalid-key-format', message: 'Key "proj-1" does not match ^[A-Z]+-\\d+$' },
      ]);
    });

    it('should report a key the description marker cannot carry', () => {
      expect(mapper.validate(mapper.buildFromSource(record({ key: 'OPS | 12' })))).toEqual([
        { code: 'invalid-key-format', message: 'Key "OPS | 12" cannot be stored in the description marker' },
      ]);
    });

    it('should accept a key containing spaces', () => {
      expect(mapper.validate(mapper.buildFromSource(record({ key: 'OPS 12' })))).toEqual([]);
    });

    it('should report a description that could not be rendered', () => {
      const candidate = mapper.buildFromSource(record({ description: { type: 'paragraph' } }));

      expect(mapper.validate(candidate)).toEqual([
        {
          code: 'description-render',
          message: 'Description could not be rendered: Unsupported rich text document type "paragraph"',
        },
      ]);
    });
  });
});

describe('parseMarker', () => {
  it('should read the key from the current marker', () => {
    expect(parseMarker(`${markerLine('PROJ-1')}\n\nrest`)).toBe('PROJ-1');
  });

  it('should recover keys containing spaces from the current marker', () => {
    expect(parseMarker(markerLine('OPS 12'))).toBe('OPS 12');
    expect(parseMarker(`${markerLine('Team A  backlog-7')}\n\nrest`)).toBe('Team A  backlog-7');
  });

  it('should read markers written by a newer version', () => {
    expect(parseMarker('[mirror-sync:v2] ABC-9 | something else')).toBe('ABC-9');
  });

  it('should read the older JIRA Issue header', () => {
    const legacy = '**JIRA Issue:** [**OLD-7**](https://jira.example.com/projects/OLD/issues/OLD-7)\n\n**JIRA Description:**\n\ntext';

    expect(parseMarker(legacy)).toBe('OLD-7');
  });

  it('should read a source line when the marker line was removed', () => {
    expect(parseMarker('Some text\n**Source Issue:** **PROJ-5**')).toBe('PROJ-5');
  });

  it('should only trust a marker on the first line', () => {
    expect(parseMarker('Intro\n[mirror-sync:v1] PROJ-1 | Managed')).toBeNull();
  });

  it('should return null without a marker', () => {
    expect(parseMarker('Plain description')).toBeNull();
    expect(parseMarker('')).toBeNull();
    expect(parseMarker(null)).toBeNull();
  });
});

describe('extractExternalKey', () => {
  it('should prefer the dedicated key field', () => {
    const mirrorItem = item({ fieldValues: { 'f-key': { text: ' PROJ-2 ' } } });

    expect(extractExternalKey(mirrorItem, 'f-key')).toBe('PROJ-2');
  });

  it('should fall back to the marker when the field is empty or unknown', () => {
    expect(extractExternalKey(item({ fieldValues: { 'f-key': { text: '' } } }), 'f-key')).toBe('PROJ-1');
    expect(extractExternalKey(item(), null)).toBe('PROJ-1');
  });

  it('should return null for an item without any key', () => {
    expect(extractExternalKey(item({ description: 'Manually created' }), 'f-key')).toBeNull();
  });
});
