import { useCallback, useState } from 'react';
import type { HistoryField, HistoryStore } from '../local/historyStore';

/**
 * Autocomplete entries for one history field, newest first.
 */
export function useHistory(history: HistoryStore, field: HistoryField, userKey?: string | null) {
  const [entries, setEntries] = useState<string[]>(() => history.get(field, userKey));

  const refresh = useCallback(() => setEntries(history.get(field, userKey)), [history, field, userKey]);

  const add = useCallback(
    (value: string) => {
      history.add(field, value, userKey);
      setEntries(history.get(field, userKey));
    },
    [history, field, userKey]
  );

  return { entries, add, refresh };
}
