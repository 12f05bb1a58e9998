import { z } from 'zod';
import { toCamelCaseKeys } from '../utils/case';
import { logger } from '../lib/logger';

const log = logger.scope('schemas');

/** Nullable wire string -> '' */
export const text = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

/** Nullable wire string -> undefined */
export const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const stringList = z
  .array(z.coerce.string())
  .nullish()
  .transform((v) => v ?? []);

/**
 * Camelize keys, then validate. Returns null (and logs) when the payload does not match.
 */
export function parsePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  label: string,
  normalize: (camel: unknown) => unknown = (v) => v
): T | null {
  try {
    return schema.parse(normalize(toCamelCaseKeys(raw)));
  } catch (e) {
    log.warn(`${label} failed`, e, raw);
    return null;
  }
}
