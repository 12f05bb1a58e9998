// @vitest-environment jsdom
import React, { useState } from 'react';
import { render, screen, fireEvent, waitFor, cleanup } from '@testing-library/react';
import { vi, describe, it, expect, afterEach, beforeEach } from 'vitest';
import { createMemoryStorage } from '../../local/storage';
import { AppStateProvider } from '../AppStateContext';
import { ReportSessionProvider, useReportSessionContext } from '../ReportSessionContext';

const CLOCK = () => new Date(2024, 2, 5, 9, 7);

const SESSION = {
  location: 'Site A',
  template_key: 'INSPECTION_REPORT',
  title: 'Inspection Report',
  title_he: 'דוח פיקוח',
  project_name: '',
  created_at: '2024-03-05T09:07:00Z',
  items: [{ id: 'i1', number: 1, description: 'Crack on wall', notes: '' }],
  photos: [],
  attendees: [],
  distribution_list: [],
};

function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function Consumer() {
  const { session, refreshKey, busy, controller, finalize, deleteReport } = useReportSessionContext();
  const [filename, setFilename] = useState('');
  return (
    <div>
      <div data-testid="location">{session?.location ?? ''}</div>
      <div data-testid="rk">{refreshKey}</div>
      <div data-testid="busy">{String(busy)}</div>
      <div data-testid="file">{filename}</div>
      <button onClick={async () => { await controller.refresh(); }}>Load</button>
      <button onClick={async () => { const doc = await finalize(); setFilename(doc?.filename ?? 'none'); }}>Finalize</button>
      <button onClick={async () => { await deleteReport('r1'); }}>Delete</button>
    </div>
  );
}

function renderWithProviders() {
  const storage = createMemoryStorage({ auth_token: 'test-token', current_user_key: 'user_1' });
  return render(
    <AppStateProvider storage={storage} baseUrl="http://api.test">
      <ReportSessionProvider clock={CLOCK}>
        <Consumer />
      </ReportSessionProvider>
    </AppStateProvider>
  );
}

describe('ReportSessionContext', () => {
  let open: boolean;
  const fetchMock = vi.fn(async (input: string, init?: RequestInit) => {
    const method = init?.method ?? 'GET';
    const path = new URL(input).pathname;
    if (method === 'GET' && path === '/reports/session') {
      return open ? json({ session: SESSION }) : json({ error: { kind: 'no_active_session', message: 'No active report' } }, 404);
    }
    if (method === 'POST' && path === '/reports/finalize') {
      open = false;
      return new Response(new Uint8Array([1, 2, 3]), {
        headers: { 'Content-Disposition': 'attachment; filename="Report.docx"', 'X-Report-Id': 'r1' },
      });
    }
    if (method === 'DELETE' && path === '/reports/r1') return json({ status: 'ok' });
    return json({ error: { kind: 'not_found', message: 'No route' } }, 404);
  });

  beforeEach(() => {
    open = true;
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    cleanup();
    vi.unstubAllGlobals();
    fetchMock.mockClear();
  });

  it('loads the open session with the stored token', async () => {
    renderWithProviders();
    fireEvent.click(screen.getByText('Load'));
    await waitFor(() => expect(screen.getByTestId('location').textContent).toBe('Site A'));
    expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/reports/session');
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ Authorization: 'Bearer test-token' });
    expect(screen.getByTestId('busy').textContent).toBe('false');
  });

  it('finalize clears the session, names the file and bumps refreshKey', async () => {
    renderWithProviders();
    fireEvent.click(screen.getByText('Load'));
    await waitFor(() => expect(screen.getByTestId('location').textContent).toBe('Site A'));

    fireEvent.click(screen.getByText('Finalize'));
    await waitFor(() => expect(screen.getByTestId('file').textContent).toBe('Inspection_Report_Site_A_20240305-0907.docx'));
    expect(screen.getByTestId('location').textContent).toBe('');
    expect(screen.getByTestId('rk').textContent).toBe('1');
  });

  it('deleteReport bumps refreshKey', async () => {
    renderWithProviders();
    fireEvent.click(screen.getByText('Delete'));
    await waitFor(() => expect(screen.getByTestId('rk').textContent).toBe('1'));
  });
});
