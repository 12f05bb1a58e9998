import type { ReportSummary } from '../types/report';

export interface StoredItem {
  id: string;
  number: number;
  description: string;
  notes: string;
}

export interface StoredPhoto {
  id: string;
  itemId: string | null;
  filename: string;
  contentType: string;
  bytes: Uint8Array;
}

export interface StoredSession {
  userId: string;
  createdAt: string;
  location: string;
  templateKey: string;
  title: string;
  titleHe: string;
  projectName: string;
  attendees: string[];
  distributionList: string[];
  items: StoredItem[];
  photos: StoredPhoto[];
  /** Next display number; only ever increases within a session */
  nextNumber: number;
}

export interface StoredDocument {
  filename: string;
  contentType: string;
  bytes: Uint8Array;
}

export interface StoredReport {
  summary: ReportSummary;
  session: StoredSession;
  document: StoredDocument;
}

export interface UserRecord {
  userId: string;
  phone: string;
  email: string;
  passwordHash: string;
  salt: string;
  verified: boolean;
  displayName: string;
  company: string;
}
