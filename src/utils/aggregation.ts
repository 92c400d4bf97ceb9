import { AGE_BUCKETS } from '../types';
import type { BucketCounts, ClassifiedRecord, KpiCounts, ReportTable, SummaryResult, SummaryRow } from '../types';

export const GRAND_TOTAL_LABEL = 'Grand Total';

export const SUMMARY_COLUMNS = ['Sr No.', 'Sub Division', ...AGE_BUCKETS, 'TOTAL'];

export const emptyBucketCounts = (): BucketCounts => ({
  '0 to 7 Days': 0,
  '8 to 15 Days': 0,
  '16 to 30 Days': 0,
  '31 to 45 Days': 0,
  'More than 45 Days': 0
});

const sumCounts = (counts: BucketCounts): number =>
  AGE_BUCKETS.reduce((acc, bucket) => acc + counts[bucket], 0);

export const bucketCounts = (records: ClassifiedRecord[]): KpiCounts => {
  const buckets = emptyBucketCounts();
  records.forEach(r => {
    buckets[r.ageBucket] += 1;
  });
  return { total: records.length, buckets };
};

/**
 * Cross-tabulates sub-division against ageing bucket. Rows are ordered by
 * sub-division name and numbered from 1; the Grand Total row carries Sr No. 0.
 */
export const buildSummary = (records: ClassifiedRecord[]): SummaryResult => {
  const bySubDivision = new Map<string, BucketCounts>();

  records.forEach(r => {
    let counts = bySubDivision.get(r.subDivision);
    if (!counts) {
      counts = emptyBucketCounts();
      bySubDivision.set(r.subDivision, counts);
    }
    counts[r.ageBucket] += 1;
  });

  const rows: SummaryRow[] = Array.from(bySubDivision.keys())
    .sort()
    .map((subDivision, i) => {
      const counts = bySubDivision.get(subDivision) ?? emptyBucketCounts();
      return { srNo: i + 1, subDivision, counts, total: sumCounts(counts) };
    });

  const grandCounts = emptyBucketCounts();
  rows.forEach(row => {
    AGE_BUCKETS.forEach(bucket => {
      grandCounts[bucket] += row.counts[bucket];
    });
  });

  return {
    rows,
    grandTotal: { srNo: 0, subDivision: GRAND_TOTAL_LABEL, counts: grandCounts, total: sumCounts(grandCounts) }
  };
};

const summaryRowCells = (row: SummaryRow): ReportTable['rows'][number] => {
  const cells: ReportTable['rows'][number] = { 'Sr No.': row.srNo, 'Sub Division': row.subDivision };
  AGE_BUCKETS.forEach(bucket => {
    cells[bucket] = row.counts[bucket];
  });
  cells['TOTAL'] = row.total;
  return cells;
};

export const summaryTable = (summary: SummaryResult): ReportTable => ({
  name: 'Summary',
  columns: [...SUMMARY_COLUMNS],
  rows: [...summary.rows, summary.grandTotal].map(summaryRowCells)
});
