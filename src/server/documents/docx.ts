import JSZip from 'jszip';
import { logger } from '../../lib/logger';
import { contactLine, imageKind, scaledHeight, type ImageAsset, type ReportDocumentModel } from './layout';

const log = logger.scope('backend');

export const DOCX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

const EMU_PER_INCH = 914400;
const TWIPS_PER_INCH = 1440;
const FONT = 'Arial';

// Column widths in inches: #, description, notes, photo
const COLUMNS = [0.5, 3.0, 3.0, 1.5];
const PHOTO_WIDTH_IN = 1.5;
const LOGO_WIDTH_IN = 1.5;

const NS = {
  w: 'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
  r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  wp: 'http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing',
  a: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  pic: 'http://schemas.openxmlformats.org/drawingml/2006/picture',
  rels: 'http://schemas.openxmlformats.org/package/2006/relationships',
  types: 'http://schemas.openxmlformats.org/package/2006/content-types',
};

const REL_TYPES = {
  document: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument',
  image: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/image',
};

const INVALID_XML_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F]/g;

export function escapeXml(value: string): string {
  return value
    .replace(INVALID_XML_CHARS, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

interface RunStyle {
  bold?: boolean;
  /** Half-points */
  size?: number;
}

function runProps(style: RunStyle): string {
  const font = `<w:rFonts w:ascii="${FONT}" w:hAnsi="${FONT}" w:cs="${FONT}"/>`;
  const bold = style.bold ? '<w:b/><w:bCs/>' : '';
  const size = style.size ? `<w:sz w:val="${style.size}"/><w:szCs w:val="${style.size}"/>` : '';
  return `<w:rPr>${font}${bold}${size}</w:rPr>`;
}

function textRun(text: string, style: RunStyle = {}): string {
  const lines = text.split('\n');
  const body = lines.map((line) => `<w:t xml:space="preserve">${escapeXml(line)}</w:t>`).join('<w:br/>');
  return `<w:r>${runProps(style)}${body}</w:r>`;
}

function paragraph(content: string, rtl: boolean, align?: 'center'): string {
  const bidi = rtl ? '<w:bidi/>' : '';
  const jc = align ? `<w:jc w:val="${align}"/>` : rtl ? '<w:jc w:val="right"/>' : '';
  const props = bidi || jc ? `<w:pPr>${bidi}${jc}</w:pPr>` : '';
  return `<w:p>${props}${content}</w:p>`;
}

interface MediaEntry {
  relId: string;
  path: string;
  bytes: Uint8Array;
}

/**
 * Collects embedded images and hands out relationship ids.
 */
class MediaRegistry {
  readonly entries: MediaEntry[] = [];

  drawing(asset: ImageAsset, widthInches: number): string | null {
    const kind = imageKind(asset.contentType);
    if (!kind) {
      log.warn('skipping image with unsupported type', asset.contentType);
      return null;
    }
    const index = this.entries.length + 1;
    const relId = `rIdImg${index}`;
    this.entries.push({ relId, path: `media/image${index}.${kind}`, bytes: asset.bytes });

    const cx = Math.round(widthInches * EMU_PER_INCH);
    const cy = scaledHeight(asset.bytes, cx);
    return (
      `<w:r><w:drawing><wp:inline distT="0" distB="0" distL="0" distR="0">` +
      `<wp:extent cx="${cx}" cy="${cy}"/><wp:docPr id="${index}" name="Picture ${index}"/>` +
      `<a:graphic><a:graphicData uri="${NS.pic}"><pic:pic>` +
      `<pic:nvPicPr><pic:cNvPr id="${index}" name="image${index}.${kind}"/><pic:cNvPicPr/></pic:nvPicPr>` +
      `<pic:blipFill><a:blip r:embed="${relId}"/><a:stretch><a:fillRect/></a:stretch></pic:blipFill>` +
      `<pic:spPr><a:xfrm><a:off x="0" y="0"/><a:ext cx="${cx}" cy="${cy}"/></a:xfrm>` +
      `<a:prstGeom prst="rect"><a:avLst/></a:prstGeom></pic:spPr>` +
      `</pic:pic></a:graphicData></a:graphic></wp:inline></w:drawing></w:r>`
    );
  }
}

function cell(widthInches: number, content: string, rtl: boolean): string {
  const width = Math.round(widthInches * TWIPS_PER_INCH);
  return `<w:tc><w:tcPr><w:tcW w:w="${width}" w:type="dxa"/></w:tcPr>${paragraph(content, rtl)}</w:tc>`;
}

function findingsTable(model: ReportDocumentModel, media: MediaRegistry): string {
  const { labels, rtl } = model;
  const border = (side: string) => `<w:${side} w:val="single" w:sz="4" w:space="0" w:color="auto"/>`;
  const borders = ['top', 'left', 'bottom', 'right', 'insideH', 'insideV'].map(border).join('');
  const tblPr =
    `<w:tblPr>${rtl ? '<w:bidiVisual/>' : ''}<w:tblW w:w="0" w:type="auto"/>` +
    `<w:tblBorders>${borders}</w:tblBorders><w:tblLayout w:type="fixed"/></w:tblPr>`;
  const grid = `<w:tblGrid>${COLUMNS.map((c) => `<w:gridCol w:w="${Math.round(c * TWIPS_PER_INCH)}"/>`).join('')}</w:tblGrid>`;

  const header = ['#', labels.description, labels.notes, labels.photo]
    .map((text, i) => cell(COLUMNS[i], textRun(text, { bold: true }), rtl))
    .join('');

  const rows = model.rows.map((row) => {
    const first = row.photos[0];
    let photo = '';
    if (first) {
      photo = media.drawing({ bytes: first.bytes, contentType: first.contentType }, PHOTO_WIDTH_IN) ?? textRun(labels.photo);
    }
    return (
      '<w:tr>' +
      cell(COLUMNS[0], textRun(String(row.number)), rtl) +
      cell(COLUMNS[1], textRun(row.description), rtl) +
      cell(COLUMNS[2], textRun(row.notes), rtl) +
      cell(COLUMNS[3], photo, rtl) +
      '</w:tr>'
    );
  });

  return `<w:tbl>${tblPr}${grid}<w:tr>${header}</w:tr>${rows.join('')}</w:tbl>`;
}

function documentBody(model: ReportDocumentModel, media: MediaRegistry): string {
  const { labels, rtl } = model;
  const parts: string[] = [];

  if (model.logo) {
    const logo = media.drawing(model.logo, LOGO_WIDTH_IN);
    if (logo) parts.push(paragraph(logo, rtl, 'center'));
  }
  parts.push(paragraph(textRun(model.title, { bold: true, size: 32 }), rtl));
  parts.push(paragraph(textRun(`${labels.date}: ${model.dateText}`), rtl));
  if (model.location) parts.push(paragraph(textRun(`${labels.location}: ${model.location}`), rtl));
  if (model.projectName) parts.push(paragraph(textRun(`${labels.project}: ${model.projectName}`), rtl));

  const contactSection = (label: string, contacts: ReportDocumentModel['attendees']) => {
    if (contacts.length === 0) return;
    parts.push(paragraph(textRun(`${label}:`), rtl));
    for (const contact of contacts) parts.push(paragraph(textRun(contactLine(contact)), rtl));
  };
  contactSection(labels.attendees, model.attendees);
  contactSection(labels.distribution, model.distribution);

  parts.push(paragraph(textRun(labels.findings, { bold: true, size: 28 }), rtl));
  parts.push(findingsTable(model, media));
  // A document must not end in a table
  parts.push(paragraph('', rtl));

  const margin = TWIPS_PER_INCH;
  parts.push(
    `<w:sectPr><w:pgSz w:w="11906" w:h="16838"/>` +
      `<w:pgMar w:top="${margin}" w:right="${margin}" w:bottom="${margin}" w:left="${margin}" w:header="708" w:footer="708" w:gutter="0"/></w:sectPr>`
  );
  return parts.join('');
}

/**
 * Render the report as a WordprocessingML package.
 */
export async function renderDocx(model: ReportDocumentModel): Promise<Uint8Array> {
  const media = new MediaRegistry();
  const body = documentBody(model, media);

  const xmlHeader = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';
  const documentXml =
    `${xmlHeader}<w:document xmlns:w="${NS.w}" xmlns:r="${NS.r}" xmlns:wp="${NS.wp}" xmlns:a="${NS.a}" xmlns:pic="${NS.pic}">` +
    `<w:body>${body}</w:body></w:document>`;

  const contentTypes =
    `${xmlHeader}<Types xmlns="${NS.types}">` +
    '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
    '<Default Extension="xml" ContentType="application/xml"/>' +
    '<Default Extension="png" ContentType="image/png"/>' +
    '<Default Extension="jpeg" ContentType="image/jpeg"/>' +
    '<Default Extension="gif" ContentType="image/gif"/>' +
    '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
    '</Types>';

  const rootRels =
    `${xmlHeader}<Relationships xmlns="${NS.rels}">` +
    `<Relationship Id="rId1" Type="${REL_TYPES.document}" Target="word/document.xml"/></Relationships>`;

  const documentRels =
    `${xmlHeader}<Relationships xmlns="${NS.rels}">` +
    media.entries.map((m) => `<Relationship Id="${m.relId}" Type="${REL_TYPES.image}" Target="${m.path}"/>`).join('') +
    '</Relationships>';

  const zip = new JSZip();
  zip.file('[Content_Types].xml', contentTypes);
  zip.file('_rels/.rels', rootRels);
  zip.file('word/document.xml', documentXml);
  zip.file('word/_rels/document.xml.rels', documentRels);
  for (const entry of media.entries) {
    zip.file(`word/${entry.path}`, entry.bytes);
  }
  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
}
