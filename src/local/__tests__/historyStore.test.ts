import { describe, it, expect, beforeEach } from 'vitest';
import { HistoryStore } from '../historyStore';
import { createMemoryStorage } from '../storage';

const REPLACEMENT = String.fromCharCode(0xfffd);
const RLM = String.fromCharCode(0x200f);
const LRI = String.fromCharCode(0x2066);
const BELL = String.fromCharCode(0x07);

describe('HistoryStore', () => {
  let storage: ReturnType<typeof createMemoryStorage>;
  let store: HistoryStore;

  beforeEach(() => {
    storage = createMemoryStorage();
    store = new HistoryStore(storage);
  });

  describe('normalize', () => {
    it('strips replacement chars, control chars and bidi marks, then trims', () => {
      expect(HistoryStore.normalize(`  ${RLM}Site${BELL} A${REPLACEMENT}\n `)).toBe('Site A');
      expect(HistoryStore.normalize(`${LRI}Tower B`)).toBe('Tower B');
    });

    it('is idempotent', () => {
      const inputs = [` ${RLM} Acme ${REPLACEMENT}`, '\t\tx\t', 'plain', `${BELL}${BELL}`];
      for (const input of inputs) {
        const once = HistoryStore.normalize(input);
        expect(HistoryStore.normalize(once)).toBe(once);
      }
    });
  });

  it('ignores values that are empty after normalization', () => {
    store.add('locations', `  ${RLM}${REPLACEMENT} `);
    expect(store.get('locations')).toEqual([]);
    expect(storage.keys()).toEqual([]);
  });

  it('de-duplicates case-insensitively and keeps the most recent spelling first', () => {
    store.add('contactNames', 'Acme');
    store.add('contactNames', 'Beta');
    store.add('contactNames', 'acme');
    expect(store.get('contactNames')).toEqual(['acme', 'Beta']);
  });

  it('never keeps more than five entries and evicts the oldest', () => {
    for (const v of ['one', 'two', 'three', 'four', 'five']) store.add('locations', v);
    expect(store.get('locations')).toHaveLength(5);
    store.add('locations', 'six');
    expect(store.get('locations')).toEqual(['six', 'five', 'four', 'three', 'two']);
  });

  it('scopes entries by user key', () => {
    store.add('contactEmails', 'a@b.co', 'user-1');
    store.add('contactEmails', 'c@d.co', 'user-2');
    expect(store.get('contactEmails', 'user-1')).toEqual(['a@b.co']);
    expect(store.get('contactEmails', 'user-2')).toEqual(['c@d.co']);
    expect(store.get('contactEmails')).toEqual([]);
    expect(storage.getItem('user-1::history_contact_emails')).toBe('["a@b.co"]');
  });

  it('re-normalizes stale stored data on read and persists the correction', () => {
    storage.setItem('u::history_locations', JSON.stringify([`${RLM}Depot `, REPLACEMENT, 'Yard']));
    expect(store.get('locations', 'u')).toEqual(['Depot', 'Yard']);
    expect(storage.getItem('u::history_locations')).toBe('["Depot","Yard"]');
  });

  it('drops unreadable stored data', () => {
    storage.setItem('history_locations', '{not json');
    expect(store.get('locations')).toEqual([]);
    expect(storage.getItem('history_locations')).toBeNull();
  });

  it('clearLegacy removes only the unscoped keys that exist', () => {
    storage.setItem('history_locations', '["x"]');
    storage.setItem('u::history_locations', '["y"]');
    expect(store.clearLegacy()).toEqual(['history_locations']);
    expect(storage.keys()).toEqual(['u::history_locations']);
  });
});
