import React from 'react';
import type { ReportTable } from '../types';

interface ReportTableViewProps {
  table: ReportTable;
  highlightLastRow?: boolean;
  emptyMessage?: string;
}

const isNumericColumn = (table: ReportTable, col: string) =>
  table.rows.length > 0 && table.rows.every(r => typeof r[col] === 'number');

export const ReportTableView: React.FC<ReportTableViewProps> = ({ table, highlightLastRow = false, emptyMessage = 'No records' }) => {
  const numeric = new Set(table.columns.filter(col => isNumericColumn(table, col)));

  return (
    <div className="overflow-auto max-h-[600px] rounded-lg border border-slate-200">
      <table className="min-w-full divide-y divide-slate-200" aria-label={table.name}>
        <thead>
          <tr>
            {table.columns.map(col => (
              <th key={col} className={`sticky top-0 bg-green-700 text-white px-4 py-3 text-xs font-semibold uppercase whitespace-nowrap ${numeric.has(col) ? 'text-right' : 'text-left'}`}>
                {col}
              </th>
            ))}
          </tr>
        </thead>
        <tbody className="bg-white divide-y divide-slate-200">
          {table.rows.length === 0 && (
            <tr>
              <td colSpan={table.columns.length} className="px-4 py-6 text-center text-sm text-slate-400 italic">{emptyMessage}</td>
            </tr>
          )}
          {table.rows.map((row, i) => {
            const isTotal = highlightLastRow && i === table.rows.length - 1;
            return (
              <tr key={i} className={isTotal ? 'bg-green-50 font-bold' : 'hover:bg-slate-50'}>
                {table.columns.map(col => (
                  <td key={col} className={`px-4 py-2 text-sm text-slate-700 whitespace-nowrap ${numeric.has(col) ? 'text-right' : ''}`}>
                    {row[col]}
                  </td>
                ))}
              </tr>
            );
          })}
        </tbody>
      </table>
    </div>
  );
};
