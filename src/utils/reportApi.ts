import { API } from '../config/api';
import { ApiError, isApiError } from '../errors/error-types';
import { logger } from '../lib/logger';
import {
  parseReportSummariesArray,
  parseSessionSnapshot,
  parseTemplatesArray,
} from '../schemas/report';
import type {
  DocumentFormat,
  FinalizedDocument,
  ReportSummary,
  ReportTemplate,
  SessionSnapshot,
  StartReportParams,
  UploadFile,
} from '../types/report';
import { expectPayload, fileBlob, requestBinary, requestJson, type ApiContext } from './http';
import { isRecord } from './validation';

const log = logger.scope('reportApi');

function field(body: unknown, key: string): unknown {
  return isRecord(body) ? body[key] : undefined;
}

export async function listTemplates(ctx: ApiContext): Promise<ReportTemplate[]> {
  const body = await requestJson(ctx, API.templates);
  return expectPayload(parseTemplatesArray(field(body, 'templates')), 'templates');
}

/** Server-aggregated recent locations (independent of the local History Store) */
export async function listLocations(ctx: ApiContext): Promise<string[]> {
  const body = await requestJson(ctx, API.locations);
  const locations = field(body, 'locations');
  if (!Array.isArray(locations)) throw new ApiError('invalid_response', 'Unexpected locations payload from server');
  return locations.map(String);
}

/**
 * Open a new session. Rejects with kind `active_session_exists` while one is open.
 */
export async function startReport(ctx: ApiContext, params: StartReportParams): Promise<void> {
  await requestJson(ctx, API.start, {
    method: 'POST',
    json: {
      location: params.location,
      template_key: params.templateKey,
      project_name: params.projectName || '',
    },
  });
}

/**
 * Full read of the open session, or null when there is none.
 */
export async function getActiveSession(ctx: ApiContext): Promise<SessionSnapshot | null> {
  try {
    const body = await requestJson(ctx, API.session);
    return expectPayload(parseSessionSnapshot(field(body, 'session')), 'session');
  } catch (e) {
    if (isApiError(e, 'no_active_session')) return null;
    throw e;
  }
}

export async function addItem(
  ctx: ApiContext,
  description: string,
  notes: string,
  opts: { allowEmpty?: boolean } = {}
): Promise<{ itemId: string; number: number }> {
  const body = await requestJson(ctx, API.item, {
    method: 'POST',
    json: { description, notes, allow_empty: !!opts.allowEmpty },
  });
  const itemId = field(body, 'item_id');
  const number = Number(field(body, 'number'));
  if (typeof itemId !== 'string' || !Number.isInteger(number)) {
    throw new ApiError('invalid_response', 'Unexpected add-item payload from server');
  }
  return { itemId, number };
}

/** Full replace of both fields */
export async function updateItem(ctx: ApiContext, itemId: string, description: string, notes: string): Promise<void> {
  await requestJson(ctx, API.itemById(itemId), { method: 'PUT', json: { description, notes } });
}

export async function deleteItem(ctx: ApiContext, itemId: string): Promise<void> {
  await requestJson(ctx, API.itemById(itemId), { method: 'DELETE' });
}

export async function uploadPhoto(ctx: ApiContext, photo: UploadFile, itemId?: string): Promise<string> {
  const form = new FormData();
  if (itemId) form.append('item_id', itemId);
  form.append('file', fileBlob(photo.bytes, photo.contentType || 'image/jpeg'), photo.filename);
  const body = await requestJson(ctx, API.photo, { method: 'POST', form });
  const photoId = field(body, 'photo_id');
  if (typeof photoId !== 'string') throw new ApiError('invalid_response', 'Unexpected upload payload from server');
  log.debug('photo uploaded', photoId, itemId || '-', photo.bytes.length);
  return photoId;
}

export async function getPhoto(ctx: ApiContext, photoId: string): Promise<Uint8Array> {
  const res = await requestBinary(ctx, API.photoById(photoId));
  return res.bytes;
}

/** Replaces both the attendee and distribution sets */
export async function setContacts(ctx: ApiContext, attendees: string[], distributionList: string[]): Promise<void> {
  await requestJson(ctx, API.contacts, {
    method: 'POST',
    json: { attendees, distribution_list: distributionList },
  });
}

const CONTENT_TYPES: Record<DocumentFormat, string> = {
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  pdf: 'application/pdf',
};

/**
 * Close the session and receive the generated document.
 */
export async function finalizeReport(
  ctx: ApiContext,
  opts: { format?: DocumentFormat; logo?: UploadFile } = {}
): Promise<FinalizedDocument> {
  const format = opts.format || 'docx';
  let form: FormData | undefined;
  if (opts.logo) {
    form = new FormData();
    form.append('logo', fileBlob(opts.logo.bytes, opts.logo.contentType || 'image/png'), opts.logo.filename);
  }
  const res = await requestBinary(ctx, format === 'pdf' ? API.finalizePdf : API.finalize, { method: 'POST', form });
  if (res.bytes.length === 0) throw new ApiError('invalid_response', 'Server returned an empty document');
  return {
    reportId: res.headers.get('X-Report-Id') || '',
    format,
    filename: res.filename || `report.${format}`,
    contentType: res.contentType || CONTENT_TYPES[format],
    bytes: res.bytes,
  };
}

export async function cancelReport(ctx: ApiContext): Promise<void> {
  await requestJson(ctx, API.cancel, { method: 'POST' });
}

export async function listRecentReports(ctx: ApiContext): Promise<ReportSummary[]> {
  const body = await requestJson(ctx, API.recent);
  return expectPayload(parseReportSummariesArray(field(body, 'reports')), 'recent reports');
}

/** Reload a finalized report as the active session */
export async function openReport(ctx: ApiContext, reportId: string): Promise<void> {
  await requestJson(ctx, API.openReport(reportId), { method: 'POST' });
}

export async function organizeReport(ctx: ApiContext, reportId: string, folder: string, tags: string[]): Promise<void> {
  await requestJson(ctx, API.organizeReport(reportId), { method: 'POST', json: { folder, tags } });
}

export async function deleteReport(ctx: ApiContext, reportId: string): Promise<void> {
  await requestJson(ctx, API.reportById(reportId), { method: 'DELETE' });
}

/**
 * The consumed Report Session Service contract, bound to one connection context.
 */
export interface ReportApi {
  listTemplates(): Promise<ReportTemplate[]>;
  listLocations(): Promise<string[]>;
  startReport(params: StartReportParams): Promise<void>;
  getActiveSession(): Promise<SessionSnapshot | null>;
  addItem(description: string, notes: string, opts?: { allowEmpty?: boolean }): Promise<{ itemId: string; number: number }>;
  updateItem(itemId: string, description: string, notes: string): Promise<void>;
  deleteItem(itemId: string): Promise<void>;
  uploadPhoto(photo: UploadFile, itemId?: string): Promise<string>;
  getPhoto(photoId: string): Promise<Uint8Array>;
  setContacts(attendees: string[], distributionList: string[]): Promise<void>;
  finalizeReport(opts?: { format?: DocumentFormat; logo?: UploadFile }): Promise<FinalizedDocument>;
  cancelReport(): Promise<void>;
  listRecentReports(): Promise<ReportSummary[]>;
  openReport(reportId: string): Promise<void>;
  organizeReport(reportId: string, folder: string, tags: string[]): Promise<void>;
  deleteReport(reportId: string): Promise<void>;
}

export function createReportApi(ctx: ApiContext): ReportApi {
  return {
    listTemplates: () => listTemplates(ctx),
    listLocations: () => listLocations(ctx),
    startReport: (params) => startReport(ctx, params),
    getActiveSession: () => getActiveSession(ctx),
    addItem: (description, notes, opts) => addItem(ctx, description, notes, opts),
    updateItem: (itemId, description, notes) => updateItem(ctx, itemId, description, notes),
    deleteItem: (itemId) => deleteItem(ctx, itemId),
    uploadPhoto: (photo, itemId) => uploadPhoto(ctx, photo, itemId),
    getPhoto: (photoId) => getPhoto(ctx, photoId),
    setContacts: (attendees, distributionList) => setContacts(ctx, attendees, distributionList),
    finalizeReport: (opts) => finalizeReport(ctx, opts),
    cancelReport: () => cancelReport(ctx),
    listRecentReports: () => listRecentReports(ctx),
    openReport: (reportId) => openReport(ctx, reportId),
    organizeReport: (reportId, folder, tags) => organizeReport(ctx, reportId, folder, tags),
    deleteReport: (reportId) => deleteReport(ctx, reportId),
  };
}
