import type { Contact } from '../../types/contact';
import type { DocumentFormat } from '../../types/report';
import type { StoredDocument, StoredSession } from '../types';
import { renderDocx, DOCX_CONTENT_TYPE } from './docx';
import { buildDocumentModel, type ImageAsset } from './layout';
import { renderPdf, PDF_CONTENT_TYPE } from './pdf';

export interface AssembleOptions {
  now: Date;
  attendees: Contact[];
  distribution: Contact[];
  logo?: ImageAsset;
}

/** Report_YYYY-MM-DD_HHMMSS.<ext>, UTC */
export function documentFilename(now: Date, format: DocumentFormat): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${now.getUTCFullYear()}-${pad(now.getUTCMonth() + 1)}-${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `Report_${date}_${time}.${format}`;
}

export async function assembleDocument(
  format: DocumentFormat,
  session: StoredSession,
  options: AssembleOptions
): Promise<StoredDocument> {
  const filename = documentFilename(options.now, format);
  if (format === 'pdf') {
    const model = buildDocumentModel(session, { ...options, allowRtl: false });
    return { filename, contentType: PDF_CONTENT_TYPE, bytes: renderPdf(model) };
  }
  const model = buildDocumentModel(session, options);
  return { filename, contentType: DOCX_CONTENT_TYPE, bytes: await renderDocx(model) };
}
