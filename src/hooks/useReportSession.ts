import { useCallback, useMemo, useSyncExternalStore } from 'react';
import type { HistoryStore } from '../local/historyStore';
import { ReportSessionController, type Locale } from '../services/reportSession';
import type { ReportApi } from '../utils/reportApi';

export interface UseReportSessionOptions {
  api: ReportApi;
  history?: HistoryStore;
  userKey?: string | null;
  locale?: Locale;
  clock?: () => Date;
}

/**
 * useReportSession - binds a `ReportSessionController` to React state.
 *
 * - A new controller is built whenever the api, user or locale changes (e.g. after
 *   sign-in), so cached snapshots never leak between accounts.
 * - `state` re-renders on every controller update (snapshot, active item, busy).
 */
export function useReportSession({ api, history, userKey, locale, clock }: UseReportSessionOptions) {
  const controller = useMemo(
    () => new ReportSessionController({ api, history, userKey, locale, clock }),
    [api, history, userKey, locale, clock]
  );

  const subscribe = useCallback((listener: () => void) => controller.subscribe(listener), [controller]);
  const getSnapshot = useCallback(() => controller.getState(), [controller]);
  const state = useSyncExternalStore(subscribe, getSnapshot, getSnapshot);

  return { controller, ...state };
}
