/**
 * Environment configuration
 *
 * Read once at import time. Override with environment variables per deployment.
 */

const env: Record<string, string | undefined> = typeof process !== 'undefined' ? process.env : {};

export const APP_CONFIG = {
  logLevel: env.LOG_LEVEL || (env.NODE_ENV === 'test' ? 'error' : 'info'),
} as const;

// Backend API
export const API_CONFIG = {
  baseUrl: env.REPORT_API_BASE || 'http://localhost:8000',
} as const;

export const SESSION_CONFIG = {
  /** Max entries kept per autocomplete history field (client and server) */
  historyLimit: 5,
  tokenTtlMinutes: 60 * 24 * 30,
  maxLoginFailures: 5,
  /** How long a lockout lasts once `maxLoginFailures` is reached */
  lockoutMinutes: 15,
  emailCodeTtlMinutes: 15,
} as const;
