import { z } from 'zod';
import type { Contact } from '../types/contact';
import { optionalText, parsePayload } from './parse';

export const ContactSchema: z.ZodType<Contact, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  company: optionalText,
  roleTitle: optionalText,
  phone: optionalText,
});

export function parseContact(raw: unknown): Contact | null {
  return parsePayload(ContactSchema, raw, 'parseContact');
}

export function parseContactsArray(raw: unknown): Contact[] | null {
  return parsePayload(z.array(ContactSchema), raw, 'parseContactsArray');
}
