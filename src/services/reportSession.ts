import { ApiError, isApiError } from '../errors/error-types';
import { logger } from '../lib/logger';
import { HistoryStore } from '../local/historyStore';
import type {
  DocumentFormat,
  FinalizedDocument,
  ReportItem,
  SessionSnapshot,
  StartReportParams,
  UploadFile,
} from '../types/report';
import type { ReportApi } from '../utils/reportApi';
import { safeFilePart } from '../utils/text';
import { isBlankItem } from '../utils/validation';

const log = logger.scope('session');

export type Locale = 'en' | 'he';

/** Answer to "a report is already open" */
export type ActiveSessionResolution = 'continue' | 'cancel' | 'abort';

export type ActiveSessionResolver = (
  existing: SessionSnapshot
) => ActiveSessionResolution | Promise<ActiveSessionResolution>;

export type StartOutcome = 'started' | 'continued' | 'aborted';

export interface ReportSessionState {
  /** Last server snapshot; null when no session is open */
  session: SessionSnapshot | null;
  activeItemId: string | null;
  busy: boolean;
}

export interface FinalizeOptions {
  format?: DocumentFormat;
  logo?: UploadFile;
  /** Asked when the session has no items; anything but true abandons finalize */
  confirmEmpty?: () => boolean | Promise<boolean>;
}

export interface ReportSessionControllerOptions {
  api: ReportApi;
  history?: HistoryStore;
  userKey?: string | null;
  locale?: Locale;
  clock?: () => Date;
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}`
  );
}

/**
 * `<template title>_<location>_<YYYYMMDD-HHmm>.<ext>`, local time. Empty parts are skipped.
 */
export function reportFilename(session: SessionSnapshot, format: DocumentFormat, date: Date, locale: Locale = 'en'): string {
  const title = locale === 'he' ? session.titleHe || session.title : session.title;
  const parts = [safeFilePart(title), safeFilePart(session.location), timestamp(date)].filter(Boolean);
  return `${parts.join('_')}.${format}`;
}

/**
 * ReportSessionController - client-side owner of the open report session.
 *
 * Every successful write is followed by a full read of the session, so `state.session`
 * is always a server snapshot. A failed call leaves the snapshot untouched.
 *
 * When the server has lost the session it started (`no_active_session`), item,
 * photo and contact writes restart it with the same parameters and retry once.
 */
export class ReportSessionController {
  private state: ReportSessionState = { session: null, activeItemId: null, busy: false };
  private readonly listeners = new Set<() => void>();
  private pending = 0;
  /** Parameters of the session this client started or adopted */
  private startParams: StartReportParams | null = null;

  private readonly api: ReportApi;
  private readonly history?: HistoryStore;
  private readonly userKey: string | null;
  private readonly locale: Locale;
  private readonly clock: () => Date;

  constructor(options: ReportSessionControllerOptions) {
    this.api = options.api;
    this.history = options.history;
    this.userKey = options.userKey ?? null;
    this.locale = options.locale || 'en';
    this.clock = options.clock || (() => new Date());
  }

  getState(): ReportSessionState {
    return this.state;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setState(patch: Partial<ReportSessionState>): void {
    this.state = { ...this.state, ...patch };
    this.listeners.forEach((l) => l());
  }

  private applySnapshot(session: SessionSnapshot | null, activeItemId: string | null = this.state.activeItemId): void {
    const stillThere = session && activeItemId ? session.items.some((i) => i.id === activeItemId) : false;
    this.setState({ session, activeItemId: stillThere ? activeItemId : null });
  }

  private async track<T>(work: () => Promise<T>): Promise<T> {
    this.pending += 1;
    if (this.pending === 1) this.setState({ busy: true });
    try {
      return await work();
    } finally {
      this.pending -= 1;
      if (this.pending === 0) this.setState({ busy: false });
    }
  }

  /**
   * Run a write; when the server has lost the session this controller started,
   * restart it and run the write once more with `restarted` set. Item ids from the
   * lost session are gone by then, so only writes that can re-resolve their
   * target should go through here.
   */
  private async withRecovery<T>(operation: (restarted: boolean) => Promise<T>): Promise<T> {
    try {
      return await operation(false);
    } catch (e) {
      const params = this.startParams;
      if (!isApiError(e, 'no_active_session') || !params) throw e;
      log.warn('session missing on the server; restarting', params.location, params.templateKey);
      await this.api.startReport(params);
      this.applySnapshot(await this.api.getActiveSession(), null);
      return operation(true);
    }
  }

  private requireItem(itemId: string): ReportItem {
    const item = this.state.session?.items.find((i) => i.id === itemId);
    if (!item) throw new ApiError('not_found', 'Item not found');
    return item;
  }

  /** Re-read the open session from the server */
  async refresh(): Promise<SessionSnapshot | null> {
    const session = await this.api.getActiveSession();
    this.applySnapshot(session);
    if (session && !this.startParams) {
      this.startParams = {
        location: session.location,
        templateKey: session.templateKey,
        projectName: session.projectName,
      };
    }
    return session;
  }

  setActiveItem(itemId: string | null): void {
    if (itemId !== null) this.requireItem(itemId);
    this.setState({ activeItemId: itemId });
  }

  /**
   * Open a new session. When one is already open, `resolveActive` decides whether to
   * adopt it, cancel it and start fresh, or leave everything as it is.
   */
  async start(params: StartReportParams, resolveActive: ActiveSessionResolver = () => 'abort'): Promise<StartOutcome> {
    const location = HistoryStore.normalize(params.location);
    if (!location) throw new ApiError('validation', 'Location is required');
    const request: StartReportParams = { ...params, location };

    return this.track(async () => {
      try {
        await this.api.startReport(request);
      } catch (e) {
        if (!isApiError(e, 'active_session_exists')) throw e;
        const existing = await this.api.getActiveSession();
        if (existing) {
          const choice = await resolveActive(existing);
          if (choice === 'abort') return 'aborted';
          if (choice === 'continue') {
            this.startParams = {
              location: existing.location,
              templateKey: existing.templateKey,
              projectName: existing.projectName,
            };
            this.applySnapshot(existing, null);
            return 'continued';
          }
          await this.api.cancelReport();
        }
        await this.api.startReport(request);
      }

      this.startParams = request;
      this.history?.add('locations', location, this.userKey);
      this.applySnapshot(await this.api.getActiveSession(), null);
      return 'started';
    });
  }

  /**
   * Add an item. Blank description and notes are refused unless `allowEmpty`
   * (photo placeholders). The active item does not change.
   */
  async addItem(description: string, notes: string, opts: { allowEmpty?: boolean } = {}): Promise<ReportItem> {
    const d = description.trim();
    const n = notes.trim();
    if (!opts.allowEmpty && isBlankItem(d, n)) {
      throw new ApiError('validation', 'Enter a description or notes');
    }
    return this.track(async () => {
      const { itemId, number } = await this.withRecovery(() => this.api.addItem(d, n, opts));
      const session = await this.api.getActiveSession();
      this.applySnapshot(session);
      return session?.items.find((i) => i.id === itemId) || { id: itemId, number, description: d, notes: n };
    });
  }

  async updateItem(itemId: string, description: string, notes: string): Promise<void> {
    await this.track(async () => {
      // No recovery: the item belonged to the session the server lost
      await this.api.updateItem(itemId, description.trim(), notes.trim());
      await this.refresh();
    });
  }

  async deleteItem(itemId: string): Promise<void> {
    await this.track(async () => {
      await this.api.deleteItem(itemId);
      if (this.state.activeItemId === itemId) this.setState({ activeItemId: null });
      await this.refresh();
    });
  }

  /**
   * The active item if it still exists, else a new placeholder item made active.
   */
  async ensureActiveItem(): Promise<string> {
    const { session, activeItemId } = this.state;
    if (activeItemId && session?.items.some((i) => i.id === activeItemId)) {
      return activeItemId;
    }
    const placeholder = await this.addItem('', '', { allowEmpty: true });
    this.setState({ activeItemId: placeholder.id });
    return placeholder.id;
  }

  /**
   * Upload a photo against `itemId`, or the active item (created on demand).
   * Never sends an unattached upload.
   */
  async uploadPhoto(photo: UploadFile, itemId?: string): Promise<{ photoId: string; itemId: string }> {
    return this.track(async () => {
      let target = itemId || (await this.ensureActiveItem());
      const photoId = await this.withRecovery(async (restarted) => {
        if (restarted) target = await this.ensureActiveItem();
        return this.api.uploadPhoto(photo, target);
      });
      await this.refresh();
      return { photoId, itemId: target };
    });
  }

  /** Append a line to an item's notes */
  async appendTranscript(itemId: string, text: string): Promise<void> {
    const line = text.trim();
    if (!line) return;
    const item = this.requireItem(itemId);
    const notes = item.notes ? `${item.notes}\n${line}` : line;
    await this.updateItem(itemId, item.description, notes);
  }

  /** Replace both contact sets */
  async setContacts(attendeeIds: string[], distributionIds: string[]): Promise<void> {
    await this.track(async () => {
      await this.withRecovery(() => this.api.setContacts(attendeeIds, distributionIds));
      await this.refresh();
    });
  }

  /**
   * Close the session and return the document, or null when the user declined
   * to finalize an empty report.
   */
  async finalize(opts: FinalizeOptions = {}): Promise<FinalizedDocument | null> {
    const format = opts.format || 'docx';
    return this.track(async () => {
      const session = await this.refresh();
      if (!session) throw new ApiError('no_active_session', 'No active report');
      if (session.items.length === 0) {
        const proceed = opts.confirmEmpty ? await opts.confirmEmpty() : false;
        if (!proceed) {
          log.info('finalize abandoned: report has no items');
          return null;
        }
      }

      const document = await this.api.finalizeReport({ format, logo: opts.logo });
      this.startParams = null;
      this.applySnapshot(null, null);
      return { ...document, filename: reportFilename(session, format, this.clock(), this.locale) };
    });
  }

  /** Discard the open session. Not recoverable. */
  async cancel(): Promise<void> {
    await this.track(async () => {
      await this.api.cancelReport();
      this.startParams = null;
      this.applySnapshot(null, null);
    });
  }

  /** Reload a finalized report as the open session */
  async openReport(reportId: string): Promise<SessionSnapshot | null> {
    return this.track(async () => {
      await this.api.openReport(reportId);
      this.startParams = null;
      return this.refresh();
    });
  }
}
