/**
 * AppStateContext
 * ---------------
 * Holds the connection state every backend call needs: bearer token, the opaque
 * user key that scopes local history, and the UI locale. All three persist in
 * `KeyValueStorage` under `auth_token`, `current_user_key` and `locale`.
 *
 * Nothing here is module-global: the bound `ReportApi`, `AddressBook` and
 * `HistoryStore` are rebuilt from this state, so tests can mount several
 * providers side by side with separate storages.
 */

import React, { createContext, useCallback, useContext, useMemo, useState } from 'react';
import { API_CONFIG } from '../config/env';
import { logger } from '../lib/logger';
import { HistoryStore } from '../local/historyStore';
import { defaultStorage, type KeyValueStorage } from '../local/storage';
import { AddressBook } from '../services/addressBook';
import type { Locale } from '../services/reportSession';
import type { UserProfile } from '../types/auth';
import { getCurrentUser, login, type Credentials } from '../utils/authApi';
import type { ApiContext } from '../utils/http';
import { createReportApi, type ReportApi } from '../utils/reportApi';

const log = logger.scope('app');

export const STORAGE_KEYS = {
  token: 'auth_token',
  userKey: 'current_user_key',
  locale: 'locale',
} as const;

function readLocale(storage: KeyValueStorage): Locale {
  return storage.getItem(STORAGE_KEYS.locale) === 'he' ? 'he' : 'en';
}

interface AppStateValue {
  token: string | null;
  userKey: string | null;
  locale: Locale;
  isAuthenticated: boolean;
  apiContext: ApiContext;
  api: ReportApi;
  addressBook: AddressBook;
  history: HistoryStore;
  /** Store a session obtained elsewhere (register / verify flows) */
  signIn: (token: string, userKey: string) => void;
  /** Log in with credentials and adopt the resulting session */
  loginWithPassword: (creds: Credentials) => Promise<UserProfile>;
  signOut: () => void;
  setLocale: (locale: Locale) => void;
}

const AppStateContext = createContext<AppStateValue | null>(null);

export function AppStateProvider({
  children,
  storage: storageProp,
  baseUrl = API_CONFIG.baseUrl,
}: {
  children: React.ReactNode;
  storage?: KeyValueStorage;
  baseUrl?: string;
}) {
  const [storage] = useState<KeyValueStorage>(() => storageProp || defaultStorage());
  const [token, setToken] = useState<string | null>(() => storage.getItem(STORAGE_KEYS.token));
  const [userKey, setUserKey] = useState<string | null>(() => storage.getItem(STORAGE_KEYS.userKey));
  const [locale, setLocaleState] = useState<Locale>(() => readLocale(storage));

  const history = useMemo(() => new HistoryStore(storage), [storage]);
  const apiContext = useMemo<ApiContext>(() => ({ baseUrl, token }), [baseUrl, token]);
  const api = useMemo(() => createReportApi(apiContext), [apiContext]);
  const addressBook = useMemo(() => new AddressBook(apiContext, history, userKey), [apiContext, history, userKey]);

  const signIn = useCallback(
    (nextToken: string, nextUserKey: string) => {
      storage.setItem(STORAGE_KEYS.token, nextToken);
      storage.setItem(STORAGE_KEYS.userKey, nextUserKey);
      const removed = history.clearLegacy();
      if (removed.length > 0) log.info('removed unscoped history keys', removed);
      setToken(nextToken);
      setUserKey(nextUserKey);
    },
    [storage, history]
  );

  const loginWithPassword = useCallback(
    async (creds: Credentials) => {
      const issued = await login({ baseUrl }, creds);
      const profile = await getCurrentUser({ baseUrl, token: issued.accessToken });
      signIn(issued.accessToken, profile.userId);
      return profile;
    },
    [baseUrl, signIn]
  );

  const signOut = useCallback(() => {
    storage.removeItem(STORAGE_KEYS.token);
    storage.removeItem(STORAGE_KEYS.userKey);
    setToken(null);
    setUserKey(null);
  }, [storage]);

  const setLocale = useCallback(
    (next: Locale) => {
      storage.setItem(STORAGE_KEYS.locale, next);
      setLocaleState(next);
    },
    [storage]
  );

  const value: AppStateValue = {
    token,
    userKey,
    locale,
    isAuthenticated: !!token,
    apiContext,
    api,
    addressBook,
    history,
    signIn,
    loginWithPassword,
    signOut,
    setLocale,
  };

  return <AppStateContext.Provider value={value}>{children}</AppStateContext.Provider>;
}

export function useAppState() {
  const ctx = useContext(AppStateContext);
  if (!ctx) throw new Error('useAppState must be used within an AppStateProvider');
  return ctx;
}
