import { describe, it, expect } from 'vitest';
import { parseAuthToken, parseUserProfile } from '../auth';
import { parseContactsArray } from '../contact';
import { parseReportSummary, parseSessionSnapshot, parseTemplatesArray } from '../report';

describe('schemas', () => {
  it('defaults the token type', () => {
    expect(parseAuthToken({ access_token: 'test-token' })).toEqual({ accessToken: 'test-token', tokenType: 'bearer' });
    expect(parseAuthToken({ access_token: '' })).toBeNull();
  });

  it('coerces numeric user ids to strings', () => {
    expect(parseUserProfile({ user_id: 42, phone: '050', email: null, verified: true, display_name: 'Noa' })).toEqual({
      userId: '42',
      phone: '050',
      email: '',
      verified: true,
      displayName: 'Noa',
      company: '',
    });
  });

  it('falls back to the English title when title_he is missing', () => {
    expect(parseTemplatesArray([{ key: 'QUOTE', title: 'Quote' }])).toEqual([
      { key: 'QUOTE', title: 'Quote', titleHe: 'Quote' },
    ]);
  });

  it('rejects items with non-positive numbers', () => {
    const base = { location: 'A', items: [{ id: 'i1', number: 0, description: '', notes: '' }] };
    expect(parseSessionSnapshot(base)).toBeNull();
  });

  it('prefers id over report_id', () => {
    const summary = parseReportSummary({ id: 'r2', report_id: 'r1', created_at: '2024-01-01T00:00:00Z' });
    expect(summary?.id).toBe('r2');
  });

  it('parses contacts with optional fields', () => {
    expect(parseContactsArray([{ id: 'c1', name: 'Dana', email: 'd@x.co', phone: null }])).toEqual([
      { id: 'c1', name: 'Dana', email: 'd@x.co' },
    ]);
    expect(parseContactsArray({ id: 'c1' })).toBeNull();
  });
});
