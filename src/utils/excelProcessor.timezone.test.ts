import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { loadRecords, readWorkbookRows } from './excelProcessor';
import { classifyRecords } from './ageing';

// East of UTC, where a local-time 1899 epoch shifts serial dates back a day
process.env.TZ = 'Asia/Kolkata';

const workbookWithDateSerials = (serials: number[]): ArrayBuffer => {
  const sheet = XLSX.utils.aoa_to_sheet(serials.map((_, i) => ['', `APP-${i + 1}`, `CON-${i + 1}`, '', '', 'North']));
  serials.forEach((serial, i) => {
    sheet[XLSX.utils.encode_cell({ r: i, c: 0 })] = { t: 'n', v: serial, z: 'dd-mm-yyyy' };
  });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'Sheet1');
  const bytes: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });
  return bytes;
};

describe('date cells in India Standard Time', () => {
  it('runs with the IST offset', () => {
    expect(new Date(2024, 0, 1).getTimezoneOffset()).toBe(-330);
  });

  it('reads date-formatted serials as their calendar day', () => {
    // 01-01-2024, 10-03-2024, 15-07-2024
    const { records, skipped } = loadRecords(readWorkbookRows(workbookWithDateSerials([45292, 45361, 45488])));

    expect(skipped).toEqual([]);
    expect(records.map(r => r.installationDate)).toEqual([
      new Date(2024, 0, 1),
      new Date(2024, 2, 10),
      new Date(2024, 6, 15)
    ]);
  });

  it('keeps a record on the bucket edge in its bucket', () => {
    const { records } = loadRecords(readWorkbookRows(workbookWithDateSerials([45292])));
    const [classified] = classifyRecords(records, new Date(2024, 0, 7));

    expect(classified.daysPending).toBe(7);
    expect(classified.ageBucket).toBe('0 to 7 Days');
  });
});
