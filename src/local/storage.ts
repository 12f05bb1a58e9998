/**
 * Web-Storage-shaped key/value persistence. `window.localStorage` satisfies it
 * directly; tests and Node callers use `createMemoryStorage()`.
 */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export function createMemoryStorage(seed: Record<string, string> = {}): KeyValueStorage & { keys(): string[] } {
  const data = new Map<string, string>(Object.entries(seed));
  return {
    getItem: (key) => data.get(key) ?? null,
    setItem: (key, value) => {
      data.set(key, String(value));
    },
    removeItem: (key) => {
      data.delete(key);
    },
    keys: () => Array.from(data.keys()),
  };
}

/**
 * Browser storage when available, else an in-memory fallback.
 */
export function defaultStorage(): KeyValueStorage {
  if (typeof window !== 'undefined' && window.localStorage) {
    return window.localStorage;
  }
  return createMemoryStorage();
}
