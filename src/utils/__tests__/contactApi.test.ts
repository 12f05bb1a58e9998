import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ApiError } from '../../errors/error-types';
import { addContact, listContacts } from '../contactApi';

const ctx = { baseUrl: 'http://api.test', token: 'test-token' };

describe('contactApi', () => {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fetchMock.mockReset();
  });

  it.each(['a@b', 'דנה@example.com', 'dana@example.com ז', ''])('rejects %j before any request', async (email) => {
    const error = await addContact(ctx, { name: 'Dana', email }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiError);
    expect(error instanceof ApiError && error.kind).toBe('validation');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects a blank name', async () => {
    const error = await addContact(ctx, { name: '  ', email: 'dana@example.com' }).catch((e: unknown) => e);
    expect(error instanceof ApiError && error.kind).toBe('validation');
  });

  it('posts a trimmed snake_case contact and parses the result', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({ status: 'ok', contact: { id: 'c1', name: 'Dana', email: 'dana@example.com', role_title: 'PM' } })
      )
    );
    const contact = await addContact(ctx, { name: ' Dana ', email: ' dana@example.com ', roleTitle: 'PM' });

    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      name: 'Dana',
      email: 'dana@example.com',
      company: null,
      role_title: 'PM',
      phone: null,
    });
    expect(contact).toEqual({ id: 'c1', name: 'Dana', email: 'dana@example.com', roleTitle: 'PM' });
  });

  it('lists contacts', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ contacts: [{ id: 'c1', name: 'A', email: 'a@b.co' }] })));
    expect(await listContacts(ctx)).toEqual([{ id: 'c1', name: 'A', email: 'a@b.co' }]);
  });
});
