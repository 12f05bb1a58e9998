// Canonical report types - use these everywhere in the client
// camelCase in code; the wire is snake_case (see src/schemas/report.ts)

export interface ReportTemplate {
  key: string;
  title: string;
  titleHe: string;
}

export interface ReportItem {
  id: string;
  /** Server-assigned, sequential in creation order; never reused after a delete */
  number: number;
  description: string;
  notes: string;
}

export interface ReportPhoto {
  id: string;
  itemId: string | null;
  filename?: string;
  contentType?: string;
  size?: number;
}

export interface SessionSnapshot {
  location: string;
  templateKey: string;
  title: string;
  titleHe: string;
  projectName: string;
  createdAt: string;
  items: ReportItem[];
  photos: ReportPhoto[];
  attendees: string[];
  distributionList: string[];
}

export interface ReportSummary {
  id: string;
  createdAt: string;
  location: string;
  templateKey: string;
  title: string;
  titleHe: string;
  folder: string;
  tags: string[];
  projectName: string;
}

export type DocumentFormat = 'docx' | 'pdf';

export interface FinalizedDocument {
  reportId: string;
  format: DocumentFormat;
  filename: string;
  contentType: string;
  bytes: Uint8Array;
}

export interface StartReportParams {
  location: string;
  templateKey: string;
  projectName?: string;
}

/** Binary payload for photo/logo uploads */
export interface UploadFile {
  bytes: Uint8Array;
  filename: string;
  contentType?: string;
}
