import * as XLSX from 'xlsx';
import type { InstallationRecord, LoadResult, SkippedRow } from '../types';

// Positional layout of the upload (no header row). Columns 3-4 are unused.
export const COLUMNS = {
  installationDate: 0,
  applicationNo: 1,
  consumerNo: 2,
  subDivision: 5
} as const;

export class WorkbookReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkbookReadError';
  }
}

// .xlsx files are zip archives: "PK\x03\x04"
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

const isZipArchive = (bytes: Uint8Array): boolean =>
  ZIP_SIGNATURE.every((b, i) => bytes[i] === b);

interface DateSerialCell {
  t: 'n';
  v: number;
  z: string | number;
}

const isDateSerialCell = (cell: unknown): cell is DateSerialCell =>
  typeof cell === 'object' && cell !== null &&
  't' in cell && cell.t === 'n' &&
  'v' in cell && typeof cell.v === 'number' &&
  'z' in cell && (typeof cell.z === 'string' || typeof cell.z === 'number') &&
  XLSX.SSF.is_date(cell.z);

/**
 * Replaces date-formatted serials with local-midnight Dates built from the
 * serial's calendar fields. SheetJS's own cellDates conversion goes through a
 * local-time 1899 epoch and lands on the previous day east of UTC.
 */
const convertDateSerials = (sheet: XLSX.WorkSheet, date1904: boolean): void => {
  Object.keys(sheet).forEach(addr => {
    if (addr.startsWith('!')) return;
    const cell: unknown = sheet[addr];
    if (!isDateSerialCell(cell)) return;
    const { y, m, d } = XLSX.SSF.parse_date_code(cell.v, { date1904 });
    sheet[addr] = { t: 'd', v: new Date(y, m - 1, d) };
  });
};

/**
 * Reads the first sheet of an .xlsx workbook as positional rows. Date-formatted
 * cells come back as Date objects, everything else as raw values.
 */
export const readWorkbookRows = (data: ArrayBuffer | Uint8Array): unknown[][] => {
  const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
  if (!isZipArchive(bytes)) throw new WorkbookReadError('File is not an .xlsx workbook');

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: 'array', cellDates: false, cellNF: true });
  } catch (error) {
    throw new WorkbookReadError('File could not be read as a spreadsheet', { cause: error });
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) throw new WorkbookReadError('Workbook contains no sheets');

  convertDateSerials(sheet, workbook.Workbook?.WBProps?.date1904 === true);
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', raw: true, blankrows: false });
};

const DMY_PATTERN = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;

/**
 * Parses an installation date cell: a Date cell, or dd-mm-yyyy text naming a
 * real calendar day. Returns a local-midnight Date, or null.
 */
export const parseInstallationDate = (val: unknown): Date | null => {
  if (val instanceof Date) {
    if (isNaN(val.getTime())) return null;
    return new Date(val.getFullYear(), val.getMonth(), val.getDate());
  }
  if (typeof val !== 'string') return null;

  const match = val.trim().match(DMY_PATTERN);
  if (!match) return null;

  const [, d, m, y] = match;
  const day = parseInt(d, 10);
  const month = parseInt(m, 10) - 1;
  const year = parseInt(y, 10);
  const date = new Date(year, month, day);
  // Date rolls 31-02 over into March; reject anything that moved
  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) return null;
  return date;
};

const cellText = (val: unknown): string => {
  if (val === null || val === undefined) return '';
  if (val instanceof Date) return isNaN(val.getTime()) ? '' : val.toISOString();
  return String(val).trim();
};

export const loadRecords = (rows: unknown[][]): LoadResult => {
  const records: InstallationRecord[] = [];
  const skipped: SkippedRow[] = [];

  rows.forEach((row, rowIndex) => {
    const dateRaw = row[COLUMNS.installationDate];
    if (cellText(dateRaw) === '') {
      skipped.push({ rowIndex, reason: 'missing-date' });
      return;
    }

    const installationDate = parseInstallationDate(dateRaw);
    if (!installationDate) {
      skipped.push({ rowIndex, reason: 'invalid-date' });
      return;
    }

    records.push({
      rowIndex,
      installationDate,
      applicationNo: cellText(row[COLUMNS.applicationNo]),
      consumerNo: cellText(row[COLUMNS.consumerNo]),
      subDivision: cellText(row[COLUMNS.subDivision])
    });
  });

  if (skipped.length > 0) {
    console.warn(`[loader] Skipped ${skipped.length} of ${rows.length} rows without a dd-mm-yyyy installation date`);
  }

  return { records, skipped, totalRows: rows.length };
};

export const parseExcelFile = async (file: File): Promise<LoadResult> => {
  const buffer = await file.arrayBuffer();
  const result = loadRecords(readWorkbookRows(buffer));
  console.log(`[loader] ${file.name}: ${result.records.length} records loaded`);
  return result;
};
