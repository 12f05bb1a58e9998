import { vi } from 'vitest';
import { register, verifyEmail } from '../../utils/authApi';
import { createReportBackend, type ReportBackend } from '../handler';

export const BASE_URL = 'http://api.test';
export const PASSWORD = 'test-secret';

// 1x1 PNG
export const PNG_BYTES = new Uint8Array([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d, 0x49, 0x48, 0x44, 0x52, 0x00, 0x00, 0x00,
  0x01, 0x00, 0x00, 0x00, 0x01, 0x08, 0x06, 0x00, 0x00, 0x00, 0x1f, 0x15, 0xc4, 0x89, 0x00, 0x00, 0x00, 0x0b, 0x49,
  0x44, 0x41, 0x54, 0x78, 0x9c, 0x63, 0x60, 0x00, 0x02, 0x00, 0x00, 0x05, 0x00, 0x01, 0x7a, 0x5e, 0xab, 0x3f, 0x00,
  0x00, 0x00, 0x00, 0x49, 0x45, 0x4e, 0x44, 0xae, 0x42, 0x60, 0x82,
]);

export interface TestBackend {
  backend: ReportBackend;
  /** Last verification code sent to each email */
  codes: Map<string, string>;
}

/**
 * Fresh in-memory backend installed as the global fetch. Pair with
 * `vi.unstubAllGlobals()` in afterEach.
 */
export function installBackend(clock?: () => Date): TestBackend {
  const codes = new Map<string, string>();
  const backend = createReportBackend({ clock, onEmailCode: (email, code) => codes.set(email, code) });
  vi.stubGlobal('fetch', backend.fetch);
  return { backend, codes };
}

/** Register and verify an account; resolves to its bearer token */
export async function signUp(env: TestBackend, phone = '0500000001', email = 'inspector@example.com'): Promise<string> {
  await register({ baseUrl: BASE_URL }, { phone, password: PASSWORD, email });
  const code = env.codes.get(email);
  if (!code) throw new Error(`no verification code sent to ${email}`);
  const token = await verifyEmail({ baseUrl: BASE_URL }, phone, code);
  return token.accessToken;
}

export function userIdFor(env: TestBackend, token: string): string {
  return env.backend.users.authenticate(token).userId;
}
