import type { ClassifiedRecord, DetailRow, ReportTable } from '../types';

export const DETAIL_COLUMNS = [
  'Sr No.',
  'Installation Date',
  'Application Number',
  'Consumer Number',
  'Sub Division',
  'Pending (Days)',
  'Age Bucket'
];

const pad2 = (n: number) => n.toString().padStart(2, '0');

export const formatDisplayDate = (date: Date): string =>
  `${pad2(date.getDate())}-${pad2(date.getMonth() + 1)}-${date.getFullYear()}`;

// Oldest first; Array.prototype.sort is stable so ties keep upload order
export const buildDetailRows = (records: ClassifiedRecord[]): DetailRow[] =>
  [...records]
    .sort((a, b) => b.daysPending - a.daysPending)
    .map((r, i) => ({
      srNo: i + 1,
      installationDate: formatDisplayDate(r.installationDate),
      applicationNo: r.applicationNo,
      consumerNo: r.consumerNo,
      subDivision: r.subDivision,
      daysPending: r.daysPending,
      ageBucket: r.ageBucket
    }));

export const detailTable = (rows: DetailRow[]): ReportTable => ({
  name: 'Detail',
  columns: [...DETAIL_COLUMNS],
  rows: rows.map(row => ({
    'Sr No.': row.srNo,
    'Installation Date': row.installationDate,
    'Application Number': row.applicationNo,
    'Consumer Number': row.consumerNo,
    'Sub Division': row.subDivision,
    'Pending (Days)': row.daysPending,
    'Age Bucket': row.ageBucket
  }))
});
