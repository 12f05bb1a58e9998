import { randomBytes, randomInt, scryptSync, timingSafeEqual } from 'node:crypto';
import { SESSION_CONFIG } from '../config/env';
import { ApiError } from '../errors/error-types';
import { logger } from '../lib/logger';
import type { AuthToken, ProfileUpdate, UserProfile } from '../types/auth';
import { generateUserId } from '../utils/id';
import { isValidEmail } from '../utils/validation';
import type { UserRecord } from './types';

const log = logger.scope('backend');

const KEY_LENGTH = 32;

export type EmailCodeSender = (email: string, code: string) => void;

export interface UserDirectoryOptions {
  clock: () => Date;
  onEmailCode?: EmailCodeSender;
}

interface PendingCode {
  hash: string;
  salt: string;
  expiresAt: number;
}

interface TokenGrant {
  userId: string;
  expiresAt: number;
}

interface FailureState {
  count: number;
  lockedUntil: number | null;
}

/**
 * Consecutive-failure lockout per phone. The lock lifts `lockoutMinutes` after
 * it was set, and any success clears the count.
 */
class FailureLimiter {
  private readonly entries = new Map<string, FailureState>();

  constructor(private readonly now: () => number) {}

  assertOpen(key: string): void {
    const entry = this.entries.get(key);
    if (!entry || entry.lockedUntil === null) return;
    if (this.now() >= entry.lockedUntil) {
      this.entries.delete(key);
      return;
    }
    throw new ApiError('rate_limited', 'Too many failed attempts');
  }

  fail(key: string): void {
    const count = (this.entries.get(key)?.count || 0) + 1;
    const lockedUntil =
      count >= SESSION_CONFIG.maxLoginFailures ? this.now() + SESSION_CONFIG.lockoutMinutes * 60_000 : null;
    if (lockedUntil !== null) log.warn('locking after repeated failures', key);
    this.entries.set(key, { count, lockedUntil });
  }

  reset(key: string): void {
    this.entries.delete(key);
  }
}

function hashSecret(secret: string, salt: string): string {
  return scryptSync(secret, salt, KEY_LENGTH).toString('hex');
}

function secretMatches(secret: string, salt: string, expectedHash: string): boolean {
  const actual = Buffer.from(hashSecret(secret, salt), 'hex');
  const expected = Buffer.from(expectedHash, 'hex');
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

export function toUserProfile(user: UserRecord): UserProfile {
  return {
    userId: user.userId,
    phone: user.phone,
    email: user.email,
    verified: user.verified,
    displayName: user.displayName,
    company: user.company,
  };
}

/**
 * Phone-keyed accounts with email-code verification and opaque bearer tokens.
 */
export class UserDirectory {
  private readonly usersByPhone = new Map<string, UserRecord>();
  private readonly tokens = new Map<string, TokenGrant>();
  private readonly codes = new Map<string, PendingCode>();
  // Password and email-code guesses are limited separately
  private readonly loginFailures: FailureLimiter;
  private readonly codeFailures: FailureLimiter;

  constructor(private readonly options: UserDirectoryOptions) {
    this.loginFailures = new FailureLimiter(() => this.now());
    this.codeFailures = new FailureLimiter(() => this.now());
  }

  private now(): number {
    return this.options.clock().getTime();
  }

  private issueToken(user: UserRecord): AuthToken {
    const accessToken = randomBytes(24).toString('hex');
    this.tokens.set(accessToken, {
      userId: user.userId,
      expiresAt: this.now() + SESSION_CONFIG.tokenTtlMinutes * 60_000,
    });
    return { accessToken, tokenType: 'bearer' };
  }

  private sendCode(user: UserRecord): void {
    const code = String(randomInt(0, 1_000_000)).padStart(6, '0');
    const salt = randomBytes(8).toString('hex');
    this.codes.set(user.phone, {
      hash: hashSecret(code, salt),
      salt,
      expiresAt: this.now() + SESSION_CONFIG.emailCodeTtlMinutes * 60_000,
    });
    if (this.options.onEmailCode) {
      this.options.onEmailCode(user.email, code);
    } else {
      log.warn('No email sender configured; verification code issued', user.phone, code);
    }
  }

  register(phone: string, password: string, email: string): AuthToken {
    const trimmedPhone = phone.trim();
    if (!trimmedPhone || !password) throw new ApiError('validation', 'Phone and password are required');
    if (!isValidEmail(email)) throw new ApiError('validation', 'Invalid email');
    if (this.usersByPhone.has(trimmedPhone)) throw new ApiError('validation', 'User already exists');

    const salt = randomBytes(16).toString('hex');
    const user: UserRecord = {
      userId: generateUserId(),
      phone: trimmedPhone,
      email: email.trim(),
      passwordHash: hashSecret(password, salt),
      salt,
      verified: false,
      displayName: '',
      company: '',
    };
    this.usersByPhone.set(user.phone, user);
    this.sendCode(user);
    return this.issueToken(user);
  }

  login(phone: string, password: string): AuthToken {
    const key = phone.trim();
    this.loginFailures.assertOpen(key);
    const user = this.usersByPhone.get(key);
    if (!user || !secretMatches(password, user.salt, user.passwordHash)) {
      this.loginFailures.fail(key);
      throw new ApiError('unauthorized', 'Invalid phone or password');
    }
    this.loginFailures.reset(key);
    if (!user.verified) throw new ApiError('unauthorized', 'Email not verified');
    return this.issueToken(user);
  }

  /**
   * Re-issue a verification code. Creates the account when the phone is unknown.
   */
  requestEmailCode(phone: string, email: string, password: string): void {
    if (!isValidEmail(email)) throw new ApiError('validation', 'Invalid email');
    const key = phone.trim();
    const existing = this.usersByPhone.get(key);
    if (!existing) {
      this.register(key, password, email);
      return;
    }
    if (existing.verified) throw new ApiError('validation', 'User already verified');
    if (!secretMatches(password, existing.salt, existing.passwordHash)) {
      throw new ApiError('validation', 'Invalid password');
    }
    existing.email = email.trim();
    this.sendCode(existing);
  }

  verifyEmail(phone: string, code: string): AuthToken {
    const key = phone.trim();
    this.codeFailures.assertOpen(key);
    const user = this.usersByPhone.get(key);
    const pending = this.codes.get(key);
    if (!user || !pending) throw new ApiError('validation', 'No verification requested');
    if (this.now() > pending.expiresAt) {
      this.codes.delete(key);
      throw new ApiError('validation', 'Code expired');
    }
    if (!secretMatches(code.trim(), pending.salt, pending.hash)) {
      this.codeFailures.fail(key);
      throw new ApiError('validation', 'Invalid code');
    }
    this.codes.delete(key);
    this.codeFailures.reset(key);
    user.verified = true;
    return this.issueToken(user);
  }

  /** Resolve a bearer token; expired tokens are dropped */
  authenticate(token: string): UserRecord {
    const grant = this.tokens.get(token);
    if (!grant) throw new ApiError('unauthorized', 'Invalid token');
    if (this.now() > grant.expiresAt) {
      this.tokens.delete(token);
      throw new ApiError('unauthorized', 'Token expired');
    }
    const user = this.getById(grant.userId);
    if (!user) throw new ApiError('unauthorized', 'User not found');
    return user;
  }

  getById(userId: string): UserRecord | undefined {
    for (const user of this.usersByPhone.values()) {
      if (user.userId === userId) return user;
    }
    return undefined;
  }

  updateProfile(user: UserRecord, update: ProfileUpdate): UserProfile {
    if (update.email !== undefined) {
      if (!isValidEmail(update.email)) throw new ApiError('validation', 'Invalid email');
      user.email = update.email.trim();
    }
    if (update.displayName !== undefined) user.displayName = update.displayName.trim();
    if (update.company !== undefined) user.company = update.company.trim();
    return toUserProfile(user);
  }
}
