import { z } from 'zod';
import { ApiError } from '../errors/error-types';
import { toCamelCaseKeys } from '../utils/case';

const required = (label: string) => z.string({ required_error: `${label} is required` });
const optional = z
  .string()
  .nullish()
  .transform((v) => v ?? '');
const ids = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? []);

export const RegisterRequest = z.object({
  phone: required('phone'),
  password: required('password'),
  email: required('email'),
});

export const LoginRequest = z.object({
  phone: required('phone'),
  password: required('password'),
});

export const EmailCodeRequest = RegisterRequest;

export const VerifyEmailRequest = z.object({
  phone: required('phone'),
  code: required('code'),
});

export const ProfileRequest = z.object({
  displayName: z.string().optional(),
  email: z.string().optional(),
  company: z.string().optional(),
});

export const StartRequest = z.object({
  location: required('location'),
  templateKey: optional,
  projectName: optional,
});

export const AddItemRequest = z.object({
  description: optional,
  notes: optional,
  allowEmpty: z.boolean().optional().default(false),
});

export const UpdateItemRequest = z.object({
  description: optional,
  notes: optional,
});

export const SetContactsRequest = z.object({
  attendees: ids,
  distributionList: ids,
});

export const OrganizeRequest = z.object({
  folder: optional,
  tags: ids,
});

export const NewContactRequest = z.object({
  name: optional,
  email: optional,
  company: z.string().nullish().transform((v) => v ?? undefined),
  roleTitle: z.string().nullish().transform((v) => v ?? undefined),
  phone: z.string().nullish().transform((v) => v ?? undefined),
});

/**
 * Decode a JSON request body and validate it. Failures are `validation` errors.
 */
export async function readBody<T>(request: Request, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const raw = await request.text();
  let parsed: unknown = {};
  if (raw) {
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new ApiError('validation', 'Request body is not valid JSON', 400, e instanceof Error ? e : undefined);
    }
  }
  const result = schema.safeParse(toCamelCaseKeys(parsed));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ApiError('validation', issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid request');
  }
  return result.data;
}
