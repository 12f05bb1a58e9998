import { z } from 'zod';
import type { AuthToken, UserProfile } from '../types/auth';
import { parsePayload, text } from './parse';

export const AuthTokenSchema: z.ZodType<AuthToken, z.ZodTypeDef, unknown> = z.object({
  accessToken: z.string().min(1),
  tokenType: z
    .string()
    .nullish()
    .transform((v) => v || 'bearer'),
});

export const UserProfileSchema: z.ZodType<UserProfile, z.ZodTypeDef, unknown> = z.object({
  userId: z.coerce.string(),
  phone: text,
  email: text,
  verified: z.boolean().default(false),
  displayName: text,
  company: text,
});

export function parseAuthToken(raw: unknown): AuthToken | null {
  return parsePayload(AuthTokenSchema, raw, 'parseAuthToken');
}

export function parseUserProfile(raw: unknown): UserProfile | null {
  return parsePayload(UserProfileSchema, raw, 'parseUserProfile');
}
