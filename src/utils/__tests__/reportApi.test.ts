import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { ApiError } from '../../errors/error-types';
import { filenameFromDisposition } from '../http';
import {
  addItem,
  finalizeReport,
  getActiveSession,
  listRecentReports,
  listTemplates,
  startReport,
  uploadPhoto,
} from '../reportApi';

const ctx = { baseUrl: 'http://api.test/', token: 'test-token' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

async function caught(promise: Promise<unknown>): Promise<ApiError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof ApiError)) throw new Error('expected an ApiError');
  return error;
}

describe('reportApi', () => {
  let fetchMock: Mock<(input: string, init?: RequestInit) => Promise<Response>>;

  beforeEach(() => {
    fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.resetAllMocks();
  });

  it('startReport posts a snake_case body with the bearer token', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'ok' }));
    await startReport(ctx, { location: 'Site A', templateKey: 'INSPECTION_REPORT' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://api.test/reports/start');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { Authorization: 'Bearer test-token', 'Content-Type': 'application/json' },
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      location: 'Site A',
      template_key: 'INSPECTION_REPORT',
      project_name: '',
    });
  });

  it('getActiveSession parses the snapshot', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        session: {
          location: 'Site A',
          template_key: 'QUOTE',
          title: 'Quote',
          title_he: null,
          project_name: null,
          created_at: '2024-03-05T09:07:00Z',
          items: [{ id: 'i1', number: '1', description: 'Crack on wall', notes: null }],
          photos: [{ id: 'p1', item_id: null, filename: 'a.jpg', content_type: 'image/jpeg', size: 3 }],
          attendees: ['c1'],
          distribution_list: null,
        },
      })
    );
    const session = await getActiveSession(ctx);
    expect(session).toEqual({
      location: 'Site A',
      templateKey: 'QUOTE',
      title: 'Quote',
      titleHe: 'Quote',
      projectName: '',
      createdAt: '2024-03-05T09:07:00Z',
      items: [{ id: 'i1', number: 1, description: 'Crack on wall', notes: '' }],
      photos: [{ id: 'p1', itemId: null, filename: 'a.jpg', contentType: 'image/jpeg', size: 3 }],
      attendees: ['c1'],
      distributionList: [],
    });
  });

  it('getActiveSession returns null for no_active_session', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { kind: 'no_active_session', message: 'No active report' } }, 404));
    expect(await getActiveSession(ctx)).toBeNull();
  });

  it('getActiveSession rethrows other failures', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { kind: 'unauthorized', message: 'Invalid token' } }, 401));
    const error = await caught(getActiveSession(ctx));
    expect(error.kind).toBe('unauthorized');
    expect(error.status).toBe(401);
    expect(error.message).toBe('Invalid token');
  });

  it('maps unstructured failures by status', async () => {
    fetchMock.mockResolvedValueOnce(new Response('busy', { status: 409 }));
    const conflict = await caught(startReport(ctx, { location: 'Site A', templateKey: 'QUOTE' }));
    expect(conflict.kind).toBe('active_session_exists');
    expect(conflict.message).toBe('busy');

    fetchMock.mockResolvedValueOnce(jsonResponse({ detail: 'Item not found' }, 404));
    const missing = await caught(addItem(ctx, 'x', ''));
    expect(missing.kind).toBe('not_found');
    expect(missing.message).toBe('Item not found');
  });

  it('turns a rejected fetch into a network error', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    const error = await caught(listTemplates(ctx));
    expect(error.kind).toBe('network');
    expect(error.status).toBe(0);
  });

  it('flags malformed payloads as invalid_response', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{not json', { status: 200 }));
    expect((await caught(listTemplates(ctx))).kind).toBe('invalid_response');

    fetchMock.mockResolvedValueOnce(jsonResponse({ templates: [{ title: 'no key' }] }));
    expect((await caught(listTemplates(ctx))).kind).toBe('invalid_response');
  });

  it('addItem sends allow_empty and returns id and number', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'ok', item_id: 'i7', number: 7 }));
    expect(await addItem(ctx, '', '', { allowEmpty: true })).toEqual({ itemId: 'i7', number: 7 });
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      description: '',
      notes: '',
      allow_empty: true,
    });
  });

  it('uploadPhoto sends multipart with the item id', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'ok', photo_id: 'p1' }));
    const photoId = await uploadPhoto(ctx, { bytes: new Uint8Array([1, 2]), filename: 'a.jpg' }, 'i1');
    expect(photoId).toBe('p1');

    const body = fetchMock.mock.calls[0][1]?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get('item_id')).toBe('i1');
      const file = body.get('file');
      expect(file).toBeInstanceOf(Blob);
      if (file instanceof Blob) expect(file.type).toBe('image/jpeg');
    }
  });

  it('finalizeReport returns bytes, file name and report id', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(new Uint8Array([80, 75, 3, 4]), {
        status: 200,
        headers: {
          'Content-Type': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
          'Content-Disposition': 'attachment; filename="Report_2024-03-05_090700.docx"',
          'X-Report-Id': 'report_1',
        },
      })
    );
    const document = await finalizeReport(ctx);
    expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/reports/finalize');
    expect(document).toEqual({
      reportId: 'report_1',
      format: 'docx',
      filename: 'Report_2024-03-05_090700.docx',
      contentType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
      bytes: new Uint8Array([80, 75, 3, 4]),
    });
  });

  it('finalizeReport rejects an empty document', async () => {
    fetchMock.mockResolvedValueOnce(new Response(new Uint8Array([]), { status: 200 }));
    expect((await caught(finalizeReport(ctx, { format: 'pdf' }))).kind).toBe('invalid_response');
    expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/reports/finalize_pdf');
  });

  it('listRecentReports accepts legacy report_id keys', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        reports: [
          { report_id: 'r1', created_at: '2024-03-05T09:07:00Z', location: 'Site A', template_key: 'QUOTE', title: 'Quote' },
        ],
      })
    );
    const [summary] = await listRecentReports(ctx);
    expect(summary).toEqual({
      id: 'r1',
      createdAt: '2024-03-05T09:07:00Z',
      location: 'Site A',
      templateKey: 'QUOTE',
      title: 'Quote',
      titleHe: 'Quote',
      folder: '',
      tags: [],
      projectName: '',
    });
  });
});

describe('filenameFromDisposition', () => {
  it('prefers the RFC 5987 form', () => {
    expect(filenameFromDisposition("attachment; filename=\"a.docx\"; filename*=UTF-8''%D7%93.docx")).toBe('ד.docx');
    expect(filenameFromDisposition('attachment; filename=plain.pdf')).toBe('plain.pdf');
    expect(filenameFromDisposition(null)).toBeNull();
  });
});
