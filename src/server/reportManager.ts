import { ApiError } from '../errors/error-types';
import { logger } from '../lib/logger';
import type { SessionSnapshot, StartReportParams } from '../types/report';
import { generateItemId, generatePhotoId } from '../utils/id';
import { normalizeText } from '../utils/text';
import { isBlankItem } from '../utils/validation';
import { getTemplate } from './templates';
import type { StoredItem, StoredPhoto, StoredSession } from './types';

const log = logger.scope('backend');

export interface PhotoUpload {
  bytes: Uint8Array;
  filename: string;
  contentType: string;
}

export function toSessionSnapshot(session: StoredSession): SessionSnapshot {
  return {
    location: session.location,
    templateKey: session.templateKey,
    title: session.title,
    titleHe: session.titleHe,
    projectName: session.projectName,
    createdAt: session.createdAt,
    items: session.items.map((i) => ({ ...i })),
    photos: session.photos.map((p) => ({
      id: p.id,
      itemId: p.itemId,
      filename: p.filename,
      contentType: p.contentType,
      size: p.bytes.length,
    })),
    attendees: [...session.attendees],
    distributionList: [...session.distributionList],
  };
}

export function cloneSession(session: StoredSession): StoredSession {
  return {
    ...session,
    attendees: [...session.attendees],
    distributionList: [...session.distributionList],
    items: session.items.map((i) => ({ ...i })),
    photos: session.photos.map((p) => ({ ...p, bytes: new Uint8Array(p.bytes) })),
  };
}

/**
 * Open report sessions, at most one per user.
 */
export class ReportManager {
  private readonly sessions = new Map<string, StoredSession>();

  constructor(private readonly clock: () => Date) {}

  get(userId: string): StoredSession | undefined {
    return this.sessions.get(userId);
  }

  require(userId: string): StoredSession {
    const session = this.sessions.get(userId);
    if (!session) throw new ApiError('no_active_session', 'No active report');
    return session;
  }

  start(userId: string, params: StartReportParams): StoredSession {
    if (this.sessions.has(userId)) {
      throw new ApiError('active_session_exists', 'A report is already in progress');
    }
    const location = normalizeText(params.location);
    if (!location) throw new ApiError('validation', 'Location is required');

    const template = getTemplate(params.templateKey);
    const session: StoredSession = {
      userId,
      createdAt: this.clock().toISOString(),
      location,
      templateKey: template.key,
      title: template.title,
      titleHe: template.titleHe,
      projectName: normalizeText(params.projectName || ''),
      attendees: [],
      distributionList: [],
      items: [],
      photos: [],
      nextNumber: 1,
    };
    this.sessions.set(userId, session);
    return session;
  }

  /** Make a previously finalized session the active one again */
  load(userId: string, stored: StoredSession): StoredSession {
    if (this.sessions.has(userId)) {
      throw new ApiError('active_session_exists', 'A report is already in progress');
    }
    const session = cloneSession(stored);
    session.userId = userId;
    session.nextNumber = session.items.reduce((max, i) => Math.max(max, i.number), 0) + 1;
    this.sessions.set(userId, session);
    return session;
  }

  addItem(userId: string, description: string, notes: string, allowEmpty = false): StoredItem {
    const session = this.require(userId);
    const item: StoredItem = {
      id: generateItemId(),
      number: session.nextNumber,
      description: description.trim(),
      notes: notes.trim(),
    };
    if (!allowEmpty && isBlankItem(item.description, item.notes)) {
      throw new ApiError('validation', 'Item needs a description or notes');
    }
    session.nextNumber += 1;
    session.items.push(item);
    return item;
  }

  private findItem(session: StoredSession, itemId: string): StoredItem {
    const item = session.items.find((i) => i.id === itemId);
    if (!item) throw new ApiError('not_found', 'Item not found');
    return item;
  }

  updateItem(userId: string, itemId: string, description: string, notes: string): StoredItem {
    const item = this.findItem(this.require(userId), itemId);
    item.description = description.trim();
    item.notes = notes.trim();
    return item;
  }

  /** Photos attached to the item stay in the session, unattached */
  deleteItem(userId: string, itemId: string): void {
    const session = this.require(userId);
    this.findItem(session, itemId);
    session.items = session.items.filter((i) => i.id !== itemId);
    for (const photo of session.photos) {
      if (photo.itemId === itemId) photo.itemId = null;
    }
  }

  addPhoto(userId: string, upload: PhotoUpload, itemId?: string | null): StoredPhoto {
    const session = this.require(userId);
    if (upload.bytes.length === 0) throw new ApiError('validation', 'Empty photo');

    let target: string | null = itemId || null;
    if (target && !session.items.some((i) => i.id === target)) {
      log.warn('photo names an unknown item; storing unattached', target);
      target = null;
    }
    const photo: StoredPhoto = {
      id: generatePhotoId(),
      itemId: target,
      filename: upload.filename || 'photo.jpg',
      contentType: upload.contentType || 'image/jpeg',
      bytes: upload.bytes,
    };
    session.photos.push(photo);
    return photo;
  }

  getPhoto(userId: string, photoId: string): StoredPhoto {
    const photo = this.require(userId).photos.find((p) => p.id === photoId);
    if (!photo) throw new ApiError('not_found', 'Photo not found');
    return photo;
  }

  /** Both lists are sets: repeated ids keep their first position */
  setContacts(userId: string, attendees: string[], distributionList: string[]): void {
    const session = this.require(userId);
    session.attendees = [...new Set(attendees)];
    session.distributionList = [...new Set(distributionList)];
  }

  /** Finalize and cancel both end here */
  close(userId: string): StoredSession {
    const session = this.require(userId);
    this.sessions.delete(userId);
    return session;
  }
}
