import type { Contact } from '../../types/contact';
import type { StoredPhoto, StoredSession } from '../types';

export interface ImageAsset {
  bytes: Uint8Array;
  contentType: string;
}

export interface DocumentLabels {
  date: string;
  location: string;
  project: string;
  attendees: string;
  distribution: string;
  findings: string;
  description: string;
  notes: string;
  photo: string;
}

export interface DocumentRow {
  number: number;
  description: string;
  notes: string;
  photos: StoredPhoto[];
}

/** Everything a renderer needs, already localized */
export interface ReportDocumentModel {
  rtl: boolean;
  title: string;
  labels: DocumentLabels;
  dateText: string;
  location: string;
  projectName: string;
  attendees: Contact[];
  distribution: Contact[];
  rows: DocumentRow[];
  logo?: ImageAsset;
}

const ENGLISH_LABELS: DocumentLabels = {
  date: 'Date',
  location: 'Location',
  project: 'Project',
  attendees: 'Attendees',
  distribution: 'Distribution',
  findings: 'Findings',
  description: 'Description',
  notes: 'Notes',
  photo: 'Photo',
};

const HEBREW_LABELS: DocumentLabels = {
  date: 'תאריך',
  location: 'מיקום',
  project: 'פרויקט',
  attendees: 'נוכחים',
  distribution: 'תפוצה',
  findings: 'ממצאים',
  description: 'תיאור',
  notes: 'הערות',
  photo: 'תמונה',
};

export function containsHebrew(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code >= 0x0590 && code <= 0x05ff) return true;
  }
  return false;
}

/** dd/mm/yyyy in UTC */
export function formatDocumentDate(date: Date): string {
  const dd = String(date.getUTCDate()).padStart(2, '0');
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${dd}/${mm}/${date.getUTCFullYear()}`;
}

export function contactLine(contact: Contact): string {
  return contact.email ? `- ${contact.name} (${contact.email})` : `- ${contact.name}`;
}

export interface DocumentModelOptions {
  now: Date;
  attendees: Contact[];
  distribution: Contact[];
  logo?: ImageAsset;
  /** Renderers without a Hebrew-capable font pass false */
  allowRtl?: boolean;
}

export function buildDocumentModel(session: StoredSession, options: DocumentModelOptions): ReportDocumentModel {
  const allowRtl = options.allowRtl ?? true;
  const hebrew =
    allowRtl &&
    [session.title, session.location, ...session.items.flatMap((i) => [i.description, i.notes])].some(containsHebrew);

  return {
    rtl: hebrew,
    title: hebrew ? session.titleHe || session.title : session.title,
    labels: hebrew ? HEBREW_LABELS : ENGLISH_LABELS,
    dateText: formatDocumentDate(options.now),
    location: session.location,
    projectName: session.projectName,
    attendees: options.attendees,
    distribution: options.distribution,
    rows: session.items.map((item) => ({
      number: item.number,
      description: item.description,
      notes: item.notes,
      photos: session.photos.filter((p) => p.itemId === item.id),
    })),
    logo: options.logo,
  };
}

export interface ImageSize {
  width: number;
  height: number;
}

function readUint16(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] << 8) | bytes[offset + 1];
}

function readUint32(bytes: Uint8Array, offset: number): number {
  return ((bytes[offset] << 24) >>> 0) + ((bytes[offset + 1] << 16) | (bytes[offset + 2] << 8) | bytes[offset + 3]);
}

/**
 * Pixel size from a PNG or JPEG header, or null for anything else.
 */
export function readImageSize(bytes: Uint8Array): ImageSize | null {
  // PNG: signature, then IHDR width/height at 16..24
  if (bytes.length >= 24 && bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) {
    return { width: readUint32(bytes, 16), height: readUint32(bytes, 20) };
  }
  // JPEG: walk segments to the first SOFn marker
  if (bytes.length >= 4 && bytes[0] === 0xff && bytes[1] === 0xd8) {
    let offset = 2;
    while (offset + 9 < bytes.length) {
      if (bytes[offset] !== 0xff) return null;
      const marker = bytes[offset + 1];
      const length = readUint16(bytes, offset + 2);
      const isSof = marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
      if (isSof) {
        return { width: readUint16(bytes, offset + 7), height: readUint16(bytes, offset + 5) };
      }
      offset += 2 + length;
    }
  }
  return null;
}

export type ImageKind = 'png' | 'jpeg' | 'gif';

export function imageKind(contentType: string): ImageKind | null {
  switch (contentType.toLowerCase()) {
    case 'image/png':
      return 'png';
    case 'image/jpeg':
    case 'image/jpg':
      return 'jpeg';
    case 'image/gif':
      return 'gif';
    default:
      return null;
  }
}

/** Scale to a fixed width, keeping aspect ratio (4:3 when unknown) */
export function scaledHeight(bytes: Uint8Array, width: number): number {
  const size = readImageSize(bytes);
  if (!size || size.width === 0) return Math.round((width * 3) / 4);
  return Math.round((width * size.height) / size.width);
}
