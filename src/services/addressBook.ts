import { logger } from '../lib/logger';
import type { HistoryStore } from '../local/historyStore';
import type { Contact, NewContact } from '../types/contact';
import { addContact, listContacts } from '../utils/contactApi';
import type { ApiContext } from '../utils/http';

const log = logger.scope('contacts');

/**
 * Address-book access that feeds the contact-name and contact-email history.
 */
export class AddressBook {
  constructor(
    private readonly ctx: ApiContext,
    private readonly history?: HistoryStore,
    private readonly userKey: string | null = null
  ) {}

  list(): Promise<Contact[]> {
    return listContacts(this.ctx);
  }

  /** Validation failures surface before any network call */
  async add(contact: NewContact): Promise<Contact> {
    const saved = await addContact(this.ctx, contact);
    this.history?.add('contactNames', saved.name, this.userKey);
    this.history?.add('contactEmails', saved.email, this.userKey);
    log.debug('contact saved', saved.id);
    return saved;
  }
}
