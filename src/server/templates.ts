import type { ReportTemplate } from '../types/report';

export const TEMPLATES: readonly ReportTemplate[] = [
  { key: 'INSPECTION_REPORT', title: 'Inspection Report', titleHe: 'דוח פיקוח' },
  { key: 'VISIT_SUMMARY', title: 'Visit Summary', titleHe: 'סיכום ביקור' },
  { key: 'HOME_ORGANIZER_REPORT', title: 'Home Organizer Report', titleHe: 'דוח סידור בית' },
  { key: 'QUOTE', title: 'Quote', titleHe: 'הצעת מחיר' },
];

/** Unknown or empty keys fall back to the inspection report */
export function getTemplate(key: string): ReportTemplate {
  return TEMPLATES.find((t) => t.key === key) || TEMPLATES[0];
}
