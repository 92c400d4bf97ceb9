export const AGE_BUCKETS = [
  '0 to 7 Days',
  '8 to 15 Days',
  '16 to 30 Days',
  '31 to 45 Days',
  'More than 45 Days'
] as const;

export type AgeBucket = typeof AGE_BUCKETS[number];

export const ALL = 'ALL';
export type All = typeof ALL;

export interface InstallationRecord {
  rowIndex: number; // 0-based row in the source sheet
  installationDate: Date;
  applicationNo: string;
  consumerNo: string;
  subDivision: string;
}

export interface ClassifiedRecord extends InstallationRecord {
  daysPending: number;
  ageBucket: AgeBucket;
}

export type SkipReason = 'missing-date' | 'invalid-date';

export interface SkippedRow {
  rowIndex: number;
  reason: SkipReason;
}

export interface LoadResult {
  records: InstallationRecord[];
  skipped: SkippedRow[];
  totalRows: number;
}

export type BucketCounts = Record<AgeBucket, number>;

export interface SummaryRow {
  srNo: number;
  subDivision: string;
  counts: BucketCounts;
  total: number;
}

export interface SummaryResult {
  rows: SummaryRow[];
  grandTotal: SummaryRow;
}

export interface DetailRow {
  srNo: number;
  installationDate: string; // dd-mm-yyyy
  applicationNo: string;
  consumerNo: string;
  subDivision: string;
  daysPending: number;
  ageBucket: AgeBucket;
}

export interface KpiCounts {
  total: number;
  buckets: BucketCounts;
}

export type CellValue = string | number;

export interface ReportTable {
  name: string;
  columns: string[];
  rows: Record<string, CellValue>[];
}

export interface FilterSelection {
  subDivision: string;
  ageBucket: AgeBucket | All;
}

export interface ReportSession {
  records: ClassifiedRecord[];
  today: Date;
  filters: FilterSelection;
  fileName?: string;
  skippedRows: number;
}

export interface ReportView {
  filtered: ClassifiedRecord[];
  kpis: KpiCounts;
  summary: SummaryResult;
  summaryTable: ReportTable;
  detailTable: ReportTable;
  subDivisionOptions: string[];
  futureDated: number;
}

export type ExportKind = 'summary' | 'detail';

export type UploadStatus = 'idle' | 'parsing' | 'success' | 'error';
