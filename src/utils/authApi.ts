import { API } from '../config/api';
import { parseAuthToken, parseUserProfile } from '../schemas/auth';
import type { AuthToken, ProfileUpdate, UserProfile } from '../types/auth';
import { expectPayload, requestJson, type ApiContext } from './http';

export interface Credentials {
  phone: string;
  password: string;
}

export async function login(ctx: ApiContext, creds: Credentials): Promise<AuthToken> {
  const body = await requestJson(ctx, API.login, {
    method: 'POST',
    json: { phone: creds.phone.trim(), password: creds.password },
  });
  return expectPayload(parseAuthToken(body), 'login');
}

/**
 * Create an account. It stays unverified until `verifyEmail` succeeds, so the
 * returned token is only good for the verification flow.
 */
export async function register(ctx: ApiContext, creds: Credentials & { email: string }): Promise<AuthToken> {
  const body = await requestJson(ctx, API.register, {
    method: 'POST',
    json: { phone: creds.phone.trim(), password: creds.password, email: creds.email.trim() },
  });
  return expectPayload(parseAuthToken(body), 'register');
}

export async function requestEmailCode(ctx: ApiContext, creds: Credentials & { email: string }): Promise<void> {
  await requestJson(ctx, API.requestEmailCode, {
    method: 'POST',
    json: { phone: creds.phone.trim(), email: creds.email.trim(), password: creds.password },
  });
}

export async function verifyEmail(ctx: ApiContext, phone: string, code: string): Promise<AuthToken> {
  const body = await requestJson(ctx, API.verifyEmail, {
    method: 'POST',
    json: { phone: phone.trim(), code: code.trim() },
  });
  return expectPayload(parseAuthToken(body), 'verify email');
}

export async function getCurrentUser(ctx: ApiContext): Promise<UserProfile> {
  const body = await requestJson(ctx, API.me);
  return expectPayload(parseUserProfile(body), 'profile');
}

export async function updateProfile(ctx: ApiContext, updates: ProfileUpdate): Promise<UserProfile> {
  const json: Record<string, string> = {};
  if (updates.displayName !== undefined) json.display_name = updates.displayName;
  if (updates.email !== undefined) json.email = updates.email;
  if (updates.company !== undefined) json.company = updates.company;
  const body = await requestJson(ctx, API.profile, { method: 'PUT', json });
  return expectPayload(parseUserProfile(body), 'profile');
}
