// @vitest-environment jsdom
import React from 'react';
import { render, screen, fireEvent, cleanup } from '@testing-library/react';
import { describe, it, expect, afterEach } from 'vitest';
import { createMemoryStorage } from '../../local/storage';
import { AppStateProvider, STORAGE_KEYS, useAppState } from '../AppStateContext';

function Consumer() {
  const { token, userKey, locale, isAuthenticated, signIn, signOut, setLocale } = useAppState();
  return (
    <div>
      <div data-testid="token">{token ?? ''}</div>
      <div data-testid="user">{userKey ?? ''}</div>
      <div data-testid="locale">{locale}</div>
      <div data-testid="auth">{String(isAuthenticated)}</div>
      <button onClick={() => signIn('test-token', 'user_1')}>SignIn</button>
      <button onClick={() => signOut()}>SignOut</button>
      <button onClick={() => setLocale('he')}>Hebrew</button>
    </div>
  );
}

describe('AppStateContext', () => {
  afterEach(() => {
    cleanup();
  });

  it('restores persisted state', () => {
    const storage = createMemoryStorage({ auth_token: 'test-token', current_user_key: 'user_9', locale: 'he' });
    render(
      <AppStateProvider storage={storage}>
        <Consumer />
      </AppStateProvider>
    );
    expect(screen.getByTestId('token')).toHaveTextContent('test-token');
    expect(screen.getByTestId('user')).toHaveTextContent('user_9');
    expect(screen.getByTestId('locale')).toHaveTextContent('he');
    expect(screen.getByTestId('auth')).toHaveTextContent('true');
  });

  it('signIn persists the session and drops unscoped history', () => {
    const storage = createMemoryStorage({ history_locations: '["Old site"]', 'user_0::history_locations': '["Kept"]' });
    render(
      <AppStateProvider storage={storage}>
        <Consumer />
      </AppStateProvider>
    );
    expect(screen.getByTestId('auth')).toHaveTextContent('false');

    fireEvent.click(screen.getByText('SignIn'));
    expect(screen.getByTestId('user')).toHaveTextContent('user_1');
    expect(storage.getItem(STORAGE_KEYS.token)).toBe('test-token');
    expect(storage.getItem('history_locations')).toBeNull();
    expect(storage.getItem('user_0::history_locations')).toBe('["Kept"]');

    fireEvent.click(screen.getByText('SignOut'));
    expect(screen.getByTestId('token').textContent).toBe('');
    expect(storage.getItem(STORAGE_KEYS.userKey)).toBeNull();
  });

  it('setLocale persists the choice', () => {
    const storage = createMemoryStorage();
    render(
      <AppStateProvider storage={storage}>
        <Consumer />
      </AppStateProvider>
    );
    expect(screen.getByTestId('locale')).toHaveTextContent('en');
    fireEvent.click(screen.getByText('Hebrew'));
    expect(screen.getByTestId('locale')).toHaveTextContent('he');
    expect(storage.getItem('locale')).toBe('he');
  });

  it('throws outside the provider', () => {
    expect(() => render(<Consumer />)).toThrow('useAppState must be used within an AppStateProvider');
  });
});
