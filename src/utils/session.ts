import type { FilterSelection, LoadResult, ReportSession, ReportView } from '../types';
import { classifyRecords, isFutureDated } from './ageing';
import { applyFilters, DEFAULT_FILTERS, subDivisionOptions } from './filters';
import { bucketCounts, buildSummary, summaryTable } from './aggregation';
import { buildDetailRows, detailTable } from './detail';

export const createSession = (loaded: LoadResult, today: Date, fileName?: string): ReportSession => ({
  records: classifyRecords(loaded.records, today),
  today,
  filters: DEFAULT_FILTERS,
  fileName,
  skippedRows: loaded.skipped.length
});

export const withFilters = (session: ReportSession, patch: Partial<FilterSelection>): ReportSession => ({
  ...session,
  filters: { ...session.filters, ...patch }
});

/**
 * Everything the dashboard renders for the current selection. Sub-division
 * options always come from the full upload so a filter can be changed back.
 */
export const deriveView = (session: ReportSession): ReportView => {
  const filtered = applyFilters(session.records, session.filters);
  const summary = buildSummary(filtered);

  return {
    filtered,
    kpis: bucketCounts(filtered),
    summary,
    summaryTable: summaryTable(summary),
    detailTable: detailTable(buildDetailRows(filtered)),
    subDivisionOptions: subDivisionOptions(session.records),
    futureDated: filtered.filter(isFutureDated).length
  };
};
