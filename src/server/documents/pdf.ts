import jsPDF from 'jspdf';
import autoTable from 'jspdf-autotable';
import { logger } from '../../lib/logger';
import { contactLine, imageKind, scaledHeight, type ReportDocumentModel } from './layout';

const log = logger.scope('backend');

export const PDF_CONTENT_TYPE = 'application/pdf';

const MARGIN = 14;
const LINE_HEIGHT = 6;
const LOGO_WIDTH = 40;

/**
 * Render the report as a PDF. Standard PDF fonts carry no Hebrew glyphs, so
 * callers build the model with `allowRtl: false`.
 */
export function renderPdf(model: ReportDocumentModel): Uint8Array {
  const pdf = new jsPDF({ unit: 'mm', format: 'a4' });
  const pageWidth = pdf.internal.pageSize.getWidth();
  const pageHeight = pdf.internal.pageSize.getHeight();
  const align = model.rtl ? 'right' : 'left';
  const x = model.rtl ? pageWidth - MARGIN : MARGIN;
  let y = MARGIN;

  if (model.logo) {
    const kind = imageKind(model.logo.contentType);
    if (kind === 'png' || kind === 'jpeg') {
      const height = scaledHeight(model.logo.bytes, LOGO_WIDTH);
      try {
        pdf.addImage(model.logo.bytes, kind.toUpperCase(), (pageWidth - LOGO_WIDTH) / 2, y, LOGO_WIDTH, height);
        y += height + 4;
      } catch (e) {
        log.warn('logo could not be embedded', e);
      }
    } else {
      log.warn('skipping logo with unsupported type', model.logo.contentType);
    }
  }

  pdf.setFont('helvetica', 'bold');
  pdf.setFontSize(16);
  y += 4;
  pdf.text(model.title, pageWidth / 2, y, { align: 'center' });
  y += LINE_HEIGHT + 4;

  pdf.setFont('helvetica', 'normal');
  pdf.setFontSize(11);
  const lines: string[] = [`${model.labels.date}: ${model.dateText}`];
  if (model.location) lines.push(`${model.labels.location}: ${model.location}`);
  if (model.projectName) lines.push(`${model.labels.project}: ${model.projectName}`);
  if (model.attendees.length > 0) {
    lines.push(`${model.labels.attendees}:`, ...model.attendees.map(contactLine));
  }
  if (model.distribution.length > 0) {
    lines.push(`${model.labels.distribution}:`, ...model.distribution.map(contactLine));
  }
  for (const line of lines) {
    pdf.text(line, x, y, { align });
    y += LINE_HEIGHT;
  }

  y += 4;
  pdf.setFont('helvetica', 'bold');
  pdf.setFontSize(14);
  pdf.text(model.labels.findings, x, y, { align });
  y += 4;

  autoTable(pdf, {
    startY: y,
    margin: { left: MARGIN, right: MARGIN },
    head: [['#', model.labels.description, model.labels.notes, model.labels.photo]],
    body: model.rows.map((row) => [
      String(row.number),
      row.description,
      row.notes,
      row.photos.length > 0 ? String(row.photos.length) : '',
    ]),
    styles: { font: 'helvetica', fontSize: 10, halign: align, cellPadding: 2 },
    headStyles: { fillColor: [40, 40, 40], textColor: 255 },
    columnStyles: { 0: { cellWidth: 12 }, 3: { cellWidth: 18 } },
  });

  const pages = pdf.getNumberOfPages();
  pdf.setFont('helvetica', 'italic');
  pdf.setFontSize(8);
  for (let page = 1; page <= pages; page++) {
    pdf.setPage(page);
    pdf.text(`Page ${page}`, pageWidth / 2, pageHeight - 8, { align: 'center' });
  }

  return new Uint8Array(pdf.output('arraybuffer'));
}
