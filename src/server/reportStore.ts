import { ApiError } from '../errors/error-types';
import type { ReportSummary } from '../types/report';
import { generateReportId } from '../utils/id';
import { cloneSession } from './reportManager';
import type { StoredDocument, StoredReport, StoredSession } from './types';

function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed && !seen.has(trimmed.toLowerCase())) {
      seen.add(trimmed.toLowerCase());
      result.push(trimmed);
    }
  }
  return result;
}

/**
 * Finalized reports per user, newest first. Each keeps the session it was
 * built from (photos included) so it can be reopened.
 */
export class ReportStore {
  private readonly reports = new Map<string, StoredReport[]>();

  constructor(private readonly clock: () => Date) {}

  private listFor(userId: string): StoredReport[] {
    let list = this.reports.get(userId);
    if (!list) {
      list = [];
      this.reports.set(userId, list);
    }
    return list;
  }

  list(userId: string): ReportSummary[] {
    return this.listFor(userId).map((r) => ({ ...r.summary, tags: [...r.summary.tags] }));
  }

  save(userId: string, session: StoredSession, document: StoredDocument): ReportSummary {
    const summary: ReportSummary = {
      id: generateReportId(),
      createdAt: this.clock().toISOString(),
      location: session.location,
      templateKey: session.templateKey,
      title: session.title,
      titleHe: session.titleHe,
      folder: '',
      tags: [],
      projectName: session.projectName,
    };
    this.listFor(userId).unshift({ summary, session: cloneSession(session), document });
    return { ...summary };
  }

  get(userId: string, reportId: string): StoredReport {
    const report = this.listFor(userId).find((r) => r.summary.id === reportId);
    if (!report) throw new ApiError('not_found', 'Report not found');
    return report;
  }

  organize(userId: string, reportId: string, folder: string, tags: readonly string[]): ReportSummary {
    const report = this.get(userId, reportId);
    report.summary.folder = folder.trim();
    report.summary.tags = normalizeTags(tags);
    return { ...report.summary, tags: [...report.summary.tags] };
  }

  delete(userId: string, reportId: string): void {
    const list = this.listFor(userId);
    const index = list.findIndex((r) => r.summary.id === reportId);
    if (index === -1) throw new ApiError('not_found', 'Report not found');
    list.splice(index, 1);
  }
}
