/**
 * ReportSessionContext
 * --------------------
 * Wraps `useReportSession()` with the app state (api, history, user key, locale)
 * and adds a refresh signal for readers of the finalized-reports list.
 *
 * - Writers: `finalize` and `deleteReport` call `triggerRefresh()` themselves after
 *   the server accepted the change. Other writers call it directly.
 * - Readers: put `refreshKey` in `useEffect` deps to re-fetch `listRecentReports()`.
 */

import React, { createContext, useCallback, useContext, useState } from 'react';
import { useReportSession } from '../hooks/useReportSession';
import type { FinalizeOptions } from '../services/reportSession';
import type { FinalizedDocument } from '../types/report';
import { useAppState } from './AppStateContext';

type ReportSessionContextValue = ReturnType<typeof useReportSession> & {
  refreshKey: number;
  triggerRefresh: () => void;
  finalize: (opts?: FinalizeOptions) => Promise<FinalizedDocument | null>;
  deleteReport: (reportId: string) => Promise<void>;
};

const ReportSessionContext = createContext<ReportSessionContextValue | null>(null);

export function ReportSessionProvider({ children, clock }: { children: React.ReactNode; clock?: () => Date }) {
  const { api, history, userKey, locale } = useAppState();
  const sessionHook = useReportSession({ api, history, userKey, locale, clock });
  const { controller } = sessionHook;
  const [refreshKey, setRefreshKey] = useState(0);

  const triggerRefresh = useCallback(() => setRefreshKey((k) => k + 1), []);

  const finalize = useCallback(
    async (opts?: FinalizeOptions) => {
      const document = await controller.finalize(opts);
      if (document) triggerRefresh();
      return document;
    },
    [controller, triggerRefresh]
  );

  const deleteReport = useCallback(
    async (reportId: string) => {
      await api.deleteReport(reportId);
      triggerRefresh();
    },
    [api, triggerRefresh]
  );

  const value: ReportSessionContextValue = {
    ...sessionHook,
    refreshKey,
    triggerRefresh,
    finalize,
    deleteReport,
  };

  return <ReportSessionContext.Provider value={value}>{children}</ReportSessionContext.Provider>;
}

export function useReportSessionContext() {
  const ctx = useContext(ReportSessionContext);
  if (!ctx) throw new Error('useReportSessionContext must be used within a ReportSessionProvider');
  return ctx;
}
