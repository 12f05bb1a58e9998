import { ApiError } from '../errors/error-types';
import type { Contact, NewContact } from '../types/contact';
import { generateContactId } from '../utils/id';

/**
 * Per-user address book. Server-side email checks are presence-only; the
 * client validates format before it calls.
 */
export class ContactsStore {
  private readonly contacts = new Map<string, Contact[]>();

  list(userId: string): Contact[] {
    return (this.contacts.get(userId) || []).map((c) => ({ ...c }));
  }

  add(userId: string, input: NewContact): Contact {
    const name = input.name.trim();
    const email = input.email.trim();
    if (!name || !email) throw new ApiError('validation', 'Name and email are required');

    const contact: Contact = { id: generateContactId(), name, email };
    if (input.company?.trim()) contact.company = input.company.trim();
    if (input.roleTitle?.trim()) contact.roleTitle = input.roleTitle.trim();
    if (input.phone?.trim()) contact.phone = input.phone.trim();

    const list = this.contacts.get(userId) || [];
    list.push(contact);
    this.contacts.set(userId, list);
    return { ...contact };
  }

  /** Unknown ids are skipped; result follows the order of `ids` */
  byIds(userId: string, ids: readonly string[]): Contact[] {
    const list = this.contacts.get(userId) || [];
    const result: Contact[] = [];
    for (const id of ids) {
      const found = list.find((c) => c.id === id);
      if (found) result.push({ ...found });
    }
    return result;
  }
}
