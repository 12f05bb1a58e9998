export interface Contact {
  id: string;
  name: string;
  email: string;
  company?: string;
  roleTitle?: string;
  phone?: string;
}

export type NewContact = Omit<Contact, 'id'>;
