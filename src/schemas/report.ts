import { z } from 'zod';
import type {
  ReportItem,
  ReportPhoto,
  ReportSummary,
  ReportTemplate,
  SessionSnapshot,
} from '../types/report';
import { isRecord } from '../utils/validation';
import { optionalText, parsePayload, stringList, text } from './parse';

export const ReportTemplateSchema: z.ZodType<ReportTemplate, z.ZodTypeDef, unknown> = z
  .object({
    key: z.string(),
    title: z.string(),
    titleHe: z.string().nullish(),
  })
  .transform((t) => ({ key: t.key, title: t.title, titleHe: t.titleHe || t.title }));

export const ReportItemSchema: z.ZodType<ReportItem, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  number: z.coerce.number().int().positive(),
  description: text,
  notes: text,
});

export const ReportPhotoSchema: z.ZodType<ReportPhoto, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  itemId: z
    .string()
    .nullish()
    .transform((v) => v || null),
  filename: optionalText,
  contentType: optionalText,
  size: z.number().optional(),
});

export const SessionSnapshotSchema: z.ZodType<SessionSnapshot, z.ZodTypeDef, unknown> = z
  .object({
    location: text,
    templateKey: text,
    title: text,
    titleHe: text,
    projectName: text,
    createdAt: text,
    items: z.array(ReportItemSchema),
    photos: z
      .array(ReportPhotoSchema)
      .nullish()
      .transform((v) => v ?? []),
    attendees: stringList,
    distributionList: stringList,
  })
  .transform((s) => ({ ...s, titleHe: s.titleHe || s.title }));

export const ReportSummarySchema: z.ZodType<ReportSummary, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string(),
    createdAt: z.string(),
    location: text,
    templateKey: text,
    title: text,
    titleHe: text,
    folder: text,
    tags: stringList,
    projectName: text,
  })
  .transform((r) => ({ ...r, titleHe: r.titleHe || r.title }));

// Map legacy `report_id` to canonical `id`
function withReportId(camel: unknown): unknown {
  if (isRecord(camel) && camel.id === undefined && camel.reportId !== undefined) {
    const { reportId, ...rest } = camel;
    return { ...rest, id: reportId };
  }
  return camel;
}

export function parseSessionSnapshot(raw: unknown): SessionSnapshot | null {
  return parsePayload(SessionSnapshotSchema, raw, 'parseSessionSnapshot');
}

export function parseReportSummary(raw: unknown): ReportSummary | null {
  return parsePayload(ReportSummarySchema, raw, 'parseReportSummary', withReportId);
}

export function parseReportSummariesArray(raw: unknown): ReportSummary[] | null {
  const normalize = (camel: unknown) => (Array.isArray(camel) ? camel.map(withReportId) : camel);
  return parsePayload(z.array(ReportSummarySchema), raw, 'parseReportSummariesArray', normalize);
}

export function parseTemplatesArray(raw: unknown): ReportTemplate[] | null {
  return parsePayload(z.array(ReportTemplateSchema), raw, 'parseTemplatesArray');
}
