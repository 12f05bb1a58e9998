import { API } from '../config/api';
import { ApiError } from '../errors/error-types';
import { parseContact, parseContactsArray } from '../schemas/contact';
import type { Contact, NewContact } from '../types/contact';
import { expectPayload, requestJson, type ApiContext } from './http';
import { isRecord, isValidEmail } from './validation';

export async function listContacts(ctx: ApiContext): Promise<Contact[]> {
  const body = await requestJson(ctx, API.addressBook);
  return expectPayload(parseContactsArray(isRecord(body) ? body.contacts : undefined), 'contacts');
}

/**
 * Add an address-book entry. The email gate runs before any network call.
 */
export async function addContact(ctx: ApiContext, contact: NewContact): Promise<Contact> {
  const name = contact.name.trim();
  const email = contact.email.trim();
  if (!name || !email) {
    throw new ApiError('validation', 'Name and email are required');
  }
  if (!isValidEmail(email)) {
    throw new ApiError('validation', `Invalid email address: ${email}`);
  }
  const body = await requestJson(ctx, API.addressBook, {
    method: 'POST',
    json: {
      name,
      email,
      company: contact.company || null,
      role_title: contact.roleTitle || null,
      phone: contact.phone || null,
    },
  });
  return expectPayload(parseContact(isRecord(body) ? body.contact : undefined), 'contact');
}
