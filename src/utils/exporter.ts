import * as XLSX from 'xlsx';
import type { CellValue, ExportKind, FilterSelection, ReportTable } from '../types';
import { config } from '../config';

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/**
 * Serializes one table into a standalone single-sheet workbook, header row
 * first, columns in table order.
 */
export const exportTable = (table: ReportTable, sheetName: string = table.name): ArrayBuffer => {
  const sheet = XLSX.utils.json_to_sheet(table.rows, { header: table.columns });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, sheetName);
  const out: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });
  return out;
};

const isCellValue = (val: unknown): val is CellValue => typeof val === 'string' || typeof val === 'number';

export const readTable = (bytes: ArrayBuffer): ReportTable => {
  const workbook = XLSX.read(bytes, { type: 'array' });
  const name = workbook.SheetNames[0] ?? '';
  const sheet = workbook.Sheets[name];
  if (!sheet) return { name, columns: [], rows: [] };

  const [header = [], ...body] = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', raw: true });
  const columns = header.map(h => String(h));
  const rows = body.map(cells => {
    const row: Record<string, CellValue> = {};
    columns.forEach((col, i) => {
      const val = cells[i];
      row[col] = isCellValue(val) ? val : '';
    });
    return row;
  });
  return { name, columns, rows };
};

export const exportFileName = (kind: ExportKind, filters: FilterSelection): string => {
  if (kind === 'summary') return `${config.exportPrefix}_Summary.xlsx`;
  return `${config.exportPrefix}_${filters.subDivision}_${filters.ageBucket}.xlsx`;
};

export const downloadWorkbook = (bytes: ArrayBuffer, fileName: string): void => {
  const blob = new Blob([bytes], { type: XLSX_MIME });
  const url = URL.createObjectURL(blob);
  const link = document.createElement('a');
  link.href = url;
  link.download = fileName;
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);
};
