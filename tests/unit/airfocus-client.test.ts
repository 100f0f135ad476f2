import { AirfocusClient, MARKDOWN_MEDIA_TYPE, toFieldDefinition, toMirrorItem } from '../../src/lib/airfocus-client';
import { RemoteOperationError } from '../../src/lib/errors';
import { markerLine } from '../../src/lib/field-mapper';
import { CreateRequestBody } from '../../src/lib/types';
import { jsonResponse, requestBody, requestHeader, requestUrl, textResponse } from '../helpers/fetch';

jest.mock('../../src/lib/logger');

function rawItem(id: string, description = '') {
  return { id, name: `Item ${id}`, description, statusId: 's-1', archived: false, lastUpdatedAt: '2024-02-01T08:00:00Z' };
}

describe('AirfocusClient', () => {
  let fetchMock: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  const client = () =>
    new AirfocusClient({
      restUrl: 'https://app.airfocus.com/api',
      apiKey: 'test-secret',
      workspaceId: 'ws-1',
      timeoutMs: 5000,
      retries: 0,
      retryDelayMs: 0,
    });

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('fetchSchema', () => {
    it('should read fields and statuses from the embedded workspace data', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({
          id: 'ws-1',
          name: 'Roadmap',
          _embedded: {
            fields: {
              'f-key': { id: 'f-key', name: 'JIRA-KEY', typeId: 'text' },
              'f-team': {
                id: 'f-team',
                name: 'Team',
                typeId: 'select',
                settings: { options: [{ id: 'o-1', name: 'Platform' }, { id: 'o-2', name: 'Mobile' }] },
              },
              'f-score': { id: 'f-score', name: 'Score', typeId: 'number' },
            },
            statuses: {
              's-1': { id: 's-1', name: 'Draft', default: true },
              's-2': { id: 's-2', name: 'Done' },
            },
          },
        })
      );

      const schema = await client().fetchSchema();

      expect(requestUrl(fetchMock.mock.calls[0])).toBe('https://app.airfocus.com/api/workspaces/ws-1');
      expect(requestHeader(fetchMock.mock.calls[0], 'Authorization')).toBe('Bearer test-secret');
      expect(schema).toEqual({
        fields: [
          { id: 'f-key', name: 'JIRA-KEY', kind: 'text', options: [] },
          {
            id: 'f-team',
            name: 'Team',
            kind: 'single-select',
            options: [
              { id: 'o-1', name: 'Platform' },
              { id: 'o-2', name: 'Mobile' },
            ],
          },
          { id: 'f-score', name: 'Score', kind: 'other', options: [] },
        ],
        statuses: [
          { id: 's-1', name: 'Draft', isDefault: true },
          { id: 's-2', name: 'Done', isDefault: false },
        ],
      });
    });

    it('should return an empty schema when nothing is embedded', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ id: 'ws-1' }));

      expect(await client().fetchSchema()).toEqual({ fields: [], statuses: [] });
    });
  });

  describe('fetchItems', () => {
    it('should search items and recover keys from the marker', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({
          items: [
            {
              ...rawItem('item-1', `${markerLine('PROJ-1')}\n\nbody`),
              fields: { 'f-key': { text: 'PROJ-1' }, 'f-team': { selection: ['o-1'] }, 'f-empty': null },
            },
            { id: 'item-2', description: { markdown: 'Manual item' } },
          ],
        })
      );

      const items = await client().fetchItems();

      expect(requestUrl(fetchMock.mock.calls[0])).toBe('https://app.airfocus.com/api/workspaces/ws-1/items/search');
      expect(requestBody(fetchMock.mock.calls[0])).toEqual({ filters: {}, pagination: { limit: 1000, offset: 0 } });
      expect(items).toEqual([
        {
          id: 'item-1',
          externalKey: 'PROJ-1',
          title: 'Item item-1',
          description: `${markerLine('PROJ-1')}\n\nbody`,
          statusId: 's-1',
          fieldValues: { 'f-key': { text: 'PROJ-1' }, 'f-team': { selection: ['o-1'] } },
          archived: false,
          lastUpdatedAt: '2024-02-01T08:00:00Z',
        },
        {
          id: 'item-2',
          externalKey: null,
          title: '',
          description: 'Manual item',
          statusId: null,
          fieldValues: {},
        },
      ]);
    });

    it('should page with offsets until a short page', async () => {
      const page = (count: number, start: number) => Array.from({ length: count }, (_, i) => rawItem(`item-${start + i}`));
      fetchMock
        .mockImplementationOnce(async () => jsonResponse({ items: page(1000, 0) }))
        .mockImplementationOnce(async () => jsonResponse({ items: page(2, 1000) }));

      const items = await client().fetchItems();

      expect(items).toHaveLength(1002);
      expect(requestBody(fetchMock.mock.calls[1])).toEqual({ filters: {}, pagination: { limit: 1000, offset: 1000 } });
    });
  });

  describe('writes', () => {
    const body: CreateRequestBody = {
      name: 'Checkout revamp',
      description: { markdown: 'text', richText: true },
      color: 'blue',
      assigneeUserIds: [],
      assigneeUserGroupIds: [],
      order: 0,
      fields: { 'f-key': { text: 'PROJ-1' } },
    };

    it('should create an item with the markdown media type', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ id: 'item-new', name: 'Checkout revamp' }));

      await expect(client().createItem(body)).resolves.toEqual({ id: 'item-new' });

      const call = fetchMock.mock.calls[0];
      expect(requestUrl(call)).toBe('https://app.airfocus.com/api/workspaces/ws-1/items');
      expect(call[1]?.method).toBe('POST');
      expect(requestHeader(call, 'Content-Type')).toBe(MARKDOWN_MEDIA_TYPE);
      expect(requestBody(call)).toEqual(body);
    });

    it('should patch an item with replace operations', async () => {
      fetchMock.mockImplementation(async () => new Response(null, { status: 204 }));
      const operations = [{ op: 'replace' as const, path: '/name', value: 'New name' }];

      await client().patchItem('item-1', operations);

      const call = fetchMock.mock.calls[0];
      expect(requestUrl(call)).toBe('https://app.airfocus.com/api/workspaces/ws-1/items/item-1');
      expect(call[1]?.method).toBe('PATCH');
      expect(requestBody(call)).toEqual(operations);
    });

    it('should not retry a failed write', async () => {
      fetchMock.mockImplementation(async () => textResponse('down', 503, 'Service Unavailable'));

      await expect(client().createItem(body)).rejects.toBeInstanceOf(RemoteOperationError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should reject a create response without an id', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ name: 'no id' }));

      await expect(client().createItem(body)).rejects.toThrow(/unexpected response/);
    });
  });
});

describe('normalizers', () => {
  it('should mark select fields with multiple values as multi-select', () => {
    expect(
      toFieldDefinition({ id: 'f', name: 'Tags', typeId: 'select', settings: { multiple: true, options: [{ id: 'o', name: 'A' }] } })
    ).toEqual({ id: 'f', name: 'Tags', kind: 'multi-select', options: [{ id: 'o', name: 'A' }] });
  });

  it('should default item fields that are missing', () => {
    expect(toMirrorItem({ id: 'x' })).toEqual({
      id: 'x',
      externalKey: null,
      title: '',
      description: '',
      statusId: null,
      fieldValues: {},
    });
  });
});
