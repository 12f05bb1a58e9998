/*
  API configuration + documentation

  This file lists every backend path the client calls and notes the behavior
  you should know about when calling them. The reference implementation of
  each route lives in `src/server/handler.ts`.

  Notes:
  - Use `REPORT_API_BASE` to override the base URL in different environments.
  - JSON bodies are snake_case; parse responses through `src/schemas/*`.
  - Failures carry `{ error: { kind, message } }`; see `src/errors/error-types.ts`.
*/

/**
 * Auth
 * - register: POST { phone, password, email } -> { access_token }. New accounts start
 *   unverified and receive an email code.
 * - login: POST { phone, password } -> { access_token }. 401 when the account is not
 *   verified yet; 429 after repeated failures.
 * - requestEmailCode / verifyEmail: fallback verification path when the first code expired.
 * - me / profile: profile read (GET) and partial update (PUT { display_name?, email?, company? }).
 */

/**
 * Report session
 * - start: POST { location, template_key, project_name? }. 409 `active_session_exists`
 *   while another session is open; the caller resolves continue-or-cancel.
 * - session: GET -> { session }. 404 `no_active_session` when nothing is open.
 * - item: POST { description, notes, allow_empty } -> { item_id, number }. Blank
 *   description+notes is rejected unless allow_empty (photo placeholder).
 * - itemById: PUT { description, notes } is a full replace; DELETE detaches the item's photos.
 * - photo: multipart POST { file, item_id? }. An unknown item_id is stored unattached.
 * - contacts: POST { attendees, distribution_list } replaces both sets.
 * - finalize / finalizePdf: optional multipart `logo`; responds with the document bytes,
 *   `Content-Disposition` filename and `X-Report-Id`. Closes the session.
 * - cancel: discards the open session. No recovery.
 */

/**
 * Finalized reports
 * - recent: GET -> { reports } newest first.
 * - open: POST reloads a finalized report as the active session.
 * - organize: POST { folder, tags } (post-hoc only).
 * - reportById: DELETE removes the summary, stored photos and document.
 */

export const API = {
  // Auth
  register: '/auth/register',
  login: '/auth/login',
  requestEmailCode: '/auth/request_email_code',
  verifyEmail: '/auth/verify_email',
  me: '/auth/me',
  profile: '/auth/profile',

  // Report session
  templates: '/reports/templates',
  locations: '/reports/locations',
  start: '/reports/start',
  cancel: '/reports/cancel',
  session: '/reports/session',
  item: '/reports/item',
  itemById: (itemId: string) => `/reports/item/${encodeURIComponent(itemId)}`,
  photo: '/reports/photo',
  photoById: (photoId: string) => `/reports/photo/${encodeURIComponent(photoId)}`,
  contacts: '/reports/contacts',
  finalize: '/reports/finalize',
  finalizePdf: '/reports/finalize_pdf',

  // Finalized reports
  recent: '/reports/recent',
  openReport: (reportId: string) => `/reports/${encodeURIComponent(reportId)}/open`,
  organizeReport: (reportId: string) => `/reports/${encodeURIComponent(reportId)}/organize`,
  reportById: (reportId: string) => `/reports/${encodeURIComponent(reportId)}`,

  // Address book
  addressBook: '/contacts',

  health: '/health',
};

export function apiUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}
