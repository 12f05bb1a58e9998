import { SESSION_CONFIG } from '../config/env';
import { logger } from '../lib/logger';
import { normalizeText, pushRecent } from '../utils/text';
import type { KeyValueStorage } from './storage';

const log = logger.scope('history');

export const HISTORY_KEYS = {
  locations: 'history_locations',
  contactNames: 'history_contact_names',
  contactEmails: 'history_contact_emails',
} as const;

/** Autocomplete fields backed by the store */
export type HistoryField = keyof typeof HISTORY_KEYS;

/**
 * HistoryStore - per-field, per-user recency cache for autocomplete.
 *
 * - Values are normalized before storing; blanks are ignored.
 * - Repeats are matched case-insensitively and move to the front.
 * - At most `limit` entries per key (default 5).
 * - Reads re-normalize stored data and write back corrections.
 *
 * Storage keys are `<userKey>::<key>` so accounts sharing a device do not see
 * each other's history. Purely local; never talks to the backend.
 */
export class HistoryStore {
  constructor(
    private storage: KeyValueStorage,
    private limit: number = SESSION_CONFIG.historyLimit
  ) {}

  static normalize(value: string): string {
    return normalizeText(value);
  }

  static scopedKey(field: HistoryField, userKey?: string | null): string {
    const key = HISTORY_KEYS[field];
    if (!userKey) return key;
    return `${userKey}::${key}`;
  }

  get(field: HistoryField, userKey?: string | null): string[] {
    const scoped = HistoryStore.scopedKey(field, userKey);
    const raw = this.storage.getItem(scoped);
    if (!raw) return [];

    let stored: unknown;
    try {
      stored = JSON.parse(raw);
    } catch (e) {
      log.warn('dropping unreadable history', scoped, e);
      this.storage.removeItem(scoped);
      return [];
    }
    if (!Array.isArray(stored)) {
      log.warn('dropping non-list history', scoped);
      this.storage.removeItem(scoped);
      return [];
    }

    const list = stored.map((e) => String(e));
    const sanitized = list.map(HistoryStore.normalize).filter((e) => e.length > 0);
    const differs = sanitized.length !== list.length || sanitized.some((e, i) => e !== list[i]);
    if (differs) {
      this.storage.setItem(scoped, JSON.stringify(sanitized));
    }
    return sanitized;
  }

  add(field: HistoryField, value: string, userKey?: string | null): void {
    const normalized = HistoryStore.normalize(value);
    if (!normalized) return;
    const updated = pushRecent(this.get(field, userKey), normalized, this.limit);
    this.storage.setItem(HistoryStore.scopedKey(field, userKey), JSON.stringify(updated));
  }

  /**
   * Remove unscoped keys written by older builds. Returns the keys that existed.
   */
  clearLegacy(keys: readonly string[] = Object.values(HISTORY_KEYS)): string[] {
    const removed: string[] = [];
    for (const key of keys) {
      if (this.storage.getItem(key) !== null) {
        this.storage.removeItem(key);
        removed.push(key);
      }
    }
    return removed;
  }
}
