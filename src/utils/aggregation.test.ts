import { describe, it, expect } from 'vitest';
import { AGE_BUCKETS } from '../types';
import type { AgeBucket, ClassifiedRecord } from '../types';
import { bucketCounts, buildSummary, GRAND_TOTAL_LABEL, SUMMARY_COLUMNS, summaryTable } from './aggregation';

const record = (subDivision: string, ageBucket: AgeBucket, applicationNo = 'APP'): ClassifiedRecord => ({
  rowIndex: 0,
  installationDate: new Date(2024, 0, 1),
  applicationNo,
  consumerNo: 'CON',
  subDivision,
  daysPending: 1,
  ageBucket
});

describe('buildSummary', () => {
  it('cross-tabulates sub-division against bucket with explicit zeros', () => {
    const summary = buildSummary([
      record('A', '0 to 7 Days'),
      record('A', '16 to 30 Days'),
      record('B', '0 to 7 Days')
    ]);

    expect(summary.rows).toEqual([
      {
        srNo: 1,
        subDivision: 'A',
        counts: { '0 to 7 Days': 1, '8 to 15 Days': 0, '16 to 30 Days': 1, '31 to 45 Days': 0, 'More than 45 Days': 0 },
        total: 2
      },
      {
        srNo: 2,
        subDivision: 'B',
        counts: { '0 to 7 Days': 1, '8 to 15 Days': 0, '16 to 30 Days': 0, '31 to 45 Days': 0, 'More than 45 Days': 0 },
        total: 1
      }
    ]);
    expect(summary.grandTotal).toEqual({
      srNo: 0,
      subDivision: GRAND_TOTAL_LABEL,
      counts: { '0 to 7 Days': 2, '8 to 15 Days': 0, '16 to 30 Days': 1, '31 to 45 Days': 0, 'More than 45 Days': 0 },
      total: 3
    });
  });

  it('orders sub-divisions by name regardless of upload order', () => {
    const summary = buildSummary([
      record('South', '0 to 7 Days'),
      record('East', '0 to 7 Days'),
      record('North', '0 to 7 Days'),
      record('East', 'More than 45 Days')
    ]);
    expect(summary.rows.map(r => [r.srNo, r.subDivision])).toEqual([
      [1, 'East'],
      [2, 'North'],
      [3, 'South']
    ]);
  });

  it('keeps row totals and the grand total consistent', () => {
    const buckets = [...AGE_BUCKETS];
    const records = Array.from({ length: 40 }, (_, i) =>
      record(`SD-${i % 3}`, buckets[(i * 7) % buckets.length], `APP-${i}`)
    );
    const { rows, grandTotal } = buildSummary(records);

    [...rows, grandTotal].forEach(row => {
      expect(row.total).toBe(AGE_BUCKETS.reduce((acc, b) => acc + row.counts[b], 0));
    });
    AGE_BUCKETS.forEach(b => {
      expect(grandTotal.counts[b]).toBe(rows.reduce((acc, row) => acc + row.counts[b], 0));
    });
    expect(grandTotal.total).toBe(40);
  });

  it('produces only a zero grand total for no records', () => {
    const summary = buildSummary([]);
    expect(summary.rows).toEqual([]);
    expect(summary.grandTotal.total).toBe(0);
    expect(Object.values(summary.grandTotal.counts)).toEqual([0, 0, 0, 0, 0]);
  });
});

describe('bucketCounts', () => {
  it('counts records per bucket', () => {
    const kpis = bucketCounts([
      record('A', '8 to 15 Days'),
      record('B', '8 to 15 Days'),
      record('B', 'More than 45 Days')
    ]);
    expect(kpis.total).toBe(3);
    expect(kpis.buckets['8 to 15 Days']).toBe(2);
    expect(kpis.buckets['More than 45 Days']).toBe(1);
    expect(kpis.buckets['0 to 7 Days']).toBe(0);
  });
});

describe('summaryTable', () => {
  it('lays rows out in the fixed column order with the grand total last', () => {
    const table = summaryTable(buildSummary([record('A', '31 to 45 Days')]));

    expect(table.name).toBe('Summary');
    expect(table.columns).toEqual([
      'Sr No.', 'Sub Division', '0 to 7 Days', '8 to 15 Days', '16 to 30 Days', '31 to 45 Days', 'More than 45 Days', 'TOTAL'
    ]);
    expect(table.rows).toEqual([
      { 'Sr No.': 1, 'Sub Division': 'A', '0 to 7 Days': 0, '8 to 15 Days': 0, '16 to 30 Days': 0, '31 to 45 Days': 1, 'More than 45 Days': 0, 'TOTAL': 1 },
      { 'Sr No.': 0, 'Sub Division': 'Grand Total', '0 to 7 Days': 0, '8 to 15 Days': 0, '16 to 30 Days': 0, '31 to 45 Days': 1, 'More than 45 Days': 0, 'TOTAL': 1 }
    ]);
  });

  it('does not share its column list with the module constant', () => {
    const table = summaryTable(buildSummary([]));
    table.columns.push('extra');
    expect(SUMMARY_COLUMNS).toHaveLength(8);
  });
});
