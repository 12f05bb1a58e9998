import { API } from '../config/api';
import { ApiError, isApiError } from '../errors/error-types';
import { logger } from '../lib/logger';
import type { DocumentFormat } from '../types/report';
import { toSnakeCaseKeys } from '../utils/case';
import { ContactsStore } from './contactsStore';
import { assembleDocument } from './documents';
import type { ImageAsset } from './documents/layout';
import { LocationsStore } from './locationsStore';
import { ReportManager, toSessionSnapshot } from './reportManager';
import { ReportStore } from './reportStore';
import {
  AddItemRequest,
  EmailCodeRequest,
  LoginRequest,
  NewContactRequest,
  OrganizeRequest,
  ProfileRequest,
  readBody,
  RegisterRequest,
  SetContactsRequest,
  StartRequest,
  UpdateItemRequest,
  VerifyEmailRequest,
} from './requests';
import { TEMPLATES } from './templates';
import type { UserRecord } from './types';
import { toUserProfile, UserDirectory, type EmailCodeSender } from './userAuth';

const log = logger.scope('backend');
const audit = logger.scope('audit');

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';
type Params = Record<string, string>;

interface PublicContext {
  request: Request;
  params: Params;
}

interface AuthedContext extends PublicContext {
  user: UserRecord;
}

interface Route {
  method: Method;
  pattern: RegExp;
  keys: string[];
  requiresAuth: boolean;
  handle(request: Request, params: Params, user: UserRecord | null): Promise<Response>;
}

export type FetchHandler = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface ReportBackendOptions {
  clock?: () => Date;
  /** Delivery of verification codes; defaults to a log line */
  onEmailCode?: EmailCodeSender;
}

export interface ReportBackend {
  fetch: FetchHandler;
  users: UserDirectory;
  sessions: ReportManager;
  reports: ReportStore;
  contacts: ContactsStore;
  locations: LocationsStore;
}

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(toSnakeCaseKeys(data)), {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8' },
  });
}

function ok(extra: Record<string, unknown> = {}): Response {
  return json({ status: 'ok', ...extra });
}

function binary(bytes: Uint8Array, contentType: string, headers: Record<string, string> = {}): Response {
  return new Response(new Blob([new Uint8Array(bytes)], { type: contentType }), {
    status: 200,
    headers: { 'Content-Type': contentType, ...headers },
  });
}

export function errorResponse(error: ApiError): Response {
  return new Response(JSON.stringify({ error: { kind: error.kind, message: error.message } }), {
    status: error.status,
    headers: { 'Content-Type': 'application/json; charset=utf-8' },
  });
}

function compile(path: string): { pattern: RegExp; keys: string[] } {
  const keys: string[] = [];
  const source = path.replace(/:([a-zA-Z]+)/g, (_, key: string) => {
    keys.push(key);
    return '([^/]+)';
  });
  return { pattern: new RegExp(`^${source}$`), keys };
}

function bearerToken(request: Request): string | null {
  const header = request.headers.get('Authorization') || '';
  const match = /^Bearer\s+(.+)$/i.exec(header);
  return match ? match[1].trim() : null;
}

async function formFile(form: FormData, field: string): Promise<(ImageAsset & { filename: string }) | null> {
  const value = form.get(field);
  if (value === null || typeof value === 'string') return null;
  return {
    bytes: new Uint8Array(await value.arrayBuffer()),
    contentType: value.type || 'application/octet-stream',
    filename: value.name,
  };
}

async function optionalForm(request: Request): Promise<FormData | null> {
  const type = request.headers.get('Content-Type') || '';
  if (!type.startsWith('multipart/form-data')) return null;
  try {
    return await request.formData();
  } catch (e) {
    throw new ApiError('validation', 'Malformed multipart body', 400, e instanceof Error ? e : undefined);
  }
}

/**
 * In-memory Report Session Service behind a fetch-compatible handler.
 * Install it with `vi.stubGlobal('fetch', backend.fetch)` or call it directly.
 */
export function createReportBackend(options: ReportBackendOptions = {}): ReportBackend {
  const clock = options.clock || (() => new Date());
  const users = new UserDirectory({ clock, onEmailCode: options.onEmailCode });
  const sessions = new ReportManager(clock);
  const reports = new ReportStore(clock);
  const contacts = new ContactsStore();
  const locations = new LocationsStore();

  const routes: Route[] = [];

  const publicRoute = (method: Method, path: string, handler: (ctx: PublicContext) => Promise<Response> | Response) => {
    routes.push({
      method,
      ...compile(path),
      requiresAuth: false,
      handle: async (request, params) => handler({ request, params }),
    });
  };

  const route = (method: Method, path: string, handler: (ctx: AuthedContext) => Promise<Response> | Response) => {
    routes.push({
      method,
      ...compile(path),
      requiresAuth: true,
      handle: async (request, params, user) => {
        if (!user) throw new ApiError('unauthorized', 'Not authenticated');
        return handler({ request, params, user });
      },
    });
  };

  const record = (user: UserRecord, event: string, details: Record<string, unknown> = {}) => {
    audit.info(event, user.userId, details);
  };

  const finalize = async (ctx: AuthedContext, format: DocumentFormat): Promise<Response> => {
    const session = sessions.require(ctx.user.userId);
    const form = await optionalForm(ctx.request);
    const logo = form ? await formFile(form, 'logo') : null;
    const now = clock();
    const document = await assembleDocument(format, session, {
      now,
      attendees: contacts.byIds(ctx.user.userId, session.attendees),
      distribution: contacts.byIds(ctx.user.userId, session.distributionList),
      logo: logo || undefined,
    });
    // Close only once the document exists so a failed render leaves the session open
    sessions.close(ctx.user.userId);
    const summary = reports.save(ctx.user.userId, session, document);
    record(ctx.user, 'FINALIZE_REPORT', { reportId: summary.id, format, items: session.items.length });
    return binary(document.bytes, document.contentType, {
      'Content-Disposition': `attachment; filename="${document.filename}"`,
      'X-Report-Id': summary.id,
    });
  };

  // Health
  publicRoute('GET', API.health, () => ok());

  // Auth
  publicRoute('POST', API.register, async ({ request }) => {
    const body = await readBody(request, RegisterRequest);
    return json(users.register(body.phone, body.password, body.email));
  });
  publicRoute('POST', API.login, async ({ request }) => {
    const body = await readBody(request, LoginRequest);
    return json(users.login(body.phone, body.password));
  });
  publicRoute('POST', API.requestEmailCode, async ({ request }) => {
    const body = await readBody(request, EmailCodeRequest);
    users.requestEmailCode(body.phone, body.email, body.password);
    return ok();
  });
  publicRoute('POST', API.verifyEmail, async ({ request }) => {
    const body = await readBody(request, VerifyEmailRequest);
    return json(users.verifyEmail(body.phone, body.code));
  });
  route('GET', API.me, ({ user }) => json(toUserProfile(user)));
  route('PUT', API.profile, async ({ request, user }) => {
    const body = await readBody(request, ProfileRequest);
    return json(users.updateProfile(user, body));
  });

  // Report session
  route('GET', API.templates, () => json({ templates: TEMPLATES }));
  route('GET', API.locations, ({ user }) => json({ locations: locations.list(user.userId) }));
  route('POST', API.start, async ({ request, user }) => {
    const body = await readBody(request, StartRequest);
    const session = sessions.start(user.userId, body);
    locations.add(user.userId, session.location);
    record(user, 'START_REPORT', { location: session.location, templateKey: session.templateKey });
    return ok();
  });
  route('GET', API.session, ({ user }) => json({ session: toSessionSnapshot(sessions.require(user.userId)) }));
  route('POST', API.item, async ({ request, user }) => {
    const body = await readBody(request, AddItemRequest);
    const item = sessions.addItem(user.userId, body.description, body.notes, body.allowEmpty);
    record(user, 'ADD_ITEM', { itemId: item.id, number: item.number });
    return ok({ itemId: item.id, number: item.number });
  });
  route('PUT', '/reports/item/:id', async ({ request, params, user }) => {
    const body = await readBody(request, UpdateItemRequest);
    sessions.updateItem(user.userId, params.id, body.description, body.notes);
    record(user, 'UPDATE_ITEM', { itemId: params.id });
    return ok();
  });
  route('DELETE', '/reports/item/:id', ({ params, user }) => {
    sessions.deleteItem(user.userId, params.id);
    record(user, 'DELETE_ITEM', { itemId: params.id });
    return ok();
  });
  route('POST', API.photo, async ({ request, user }) => {
    sessions.require(user.userId);
    const form = await optionalForm(request);
    const file = form ? await formFile(form, 'file') : null;
    if (!form || !file) throw new ApiError('validation', 'A photo file is required');
    const itemId = form.get('item_id');
    const photo = sessions.addPhoto(user.userId, file, typeof itemId === 'string' ? itemId : null);
    record(user, 'ADD_PHOTO', { photoId: photo.id, itemId: photo.itemId });
    return ok({ photoId: photo.id });
  });
  route('GET', '/reports/photo/:id', ({ params, user }) => {
    const photo = sessions.getPhoto(user.userId, params.id);
    return binary(photo.bytes, photo.contentType);
  });
  route('POST', API.contacts, async ({ request, user }) => {
    const body = await readBody(request, SetContactsRequest);
    sessions.setContacts(user.userId, body.attendees, body.distributionList);
    record(user, 'SET_CONTACTS', { attendees: body.attendees.length, distribution: body.distributionList.length });
    return ok();
  });
  route('POST', API.finalize, (ctx) => finalize(ctx, 'docx'));
  route('POST', API.finalizePdf, (ctx) => finalize(ctx, 'pdf'));
  route('POST', API.cancel, ({ user }) => {
    sessions.close(user.userId);
    record(user, 'CANCEL_REPORT');
    return ok();
  });

  // Finalized reports
  route('GET', API.recent, ({ user }) => json({ reports: reports.list(user.userId) }));
  route('POST', '/reports/:id/open', ({ params, user }) => {
    const stored = reports.get(user.userId, params.id);
    sessions.load(user.userId, stored.session);
    record(user, 'OPEN_REPORT', { reportId: params.id });
    return ok();
  });
  route('POST', '/reports/:id/organize', async ({ request, params, user }) => {
    const body = await readBody(request, OrganizeRequest);
    reports.organize(user.userId, params.id, body.folder, body.tags);
    record(user, 'ORGANIZE_REPORT', { reportId: params.id, folder: body.folder });
    return ok();
  });
  route('DELETE', '/reports/:id', ({ params, user }) => {
    reports.delete(user.userId, params.id);
    record(user, 'DELETE_REPORT', { reportId: params.id });
    return ok();
  });

  // Address book
  route('GET', API.addressBook, ({ user }) => json({ contacts: contacts.list(user.userId) }));
  route('POST', API.addressBook, async ({ request, user }) => {
    const body = await readBody(request, NewContactRequest);
    const contact = contacts.add(user.userId, body);
    record(user, 'ADD_CONTACT', { contactId: contact.id });
    return ok({ contact });
  });

  const dispatch = async (request: Request): Promise<Response> => {
    const { pathname } = new URL(request.url);
    for (const candidate of routes) {
      if (candidate.method !== request.method) continue;
      const match = candidate.pattern.exec(pathname);
      if (!match) continue;

      const params: Params = {};
      candidate.keys.forEach((key, i) => {
        params[key] = decodeURIComponent(match[i + 1]);
      });
      let user: UserRecord | null = null;
      if (candidate.requiresAuth) {
        const token = bearerToken(request);
        if (!token) throw new ApiError('unauthorized', 'Not authenticated');
        user = users.authenticate(token);
      }
      return candidate.handle(request, params, user);
    }
    throw new ApiError('not_found', `No route for ${request.method} ${pathname}`);
  };

  const handleFetch: FetchHandler = async (input, init) => {
    const request = new Request(input, init);
    const started = Date.now();
    let response: Response;
    try {
      response = await dispatch(request);
    } catch (e) {
      if (isApiError(e)) {
        response = errorResponse(e);
      } else {
        log.error('unhandled error', request.method, request.url, e);
        response = errorResponse(new ApiError('server', 'Internal server error'));
      }
    }
    log.debug(`${request.method} ${new URL(request.url).pathname}`, response.status, `${Date.now() - started}ms`);
    return response;
  };

  return { fetch: handleFetch, users, sessions, reports, contacts, locations };
}
