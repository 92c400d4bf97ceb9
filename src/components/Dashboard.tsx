import React, { useState } from 'react';
import {
  ArrowLeft, Table, BarChart3, Filter, Download, AlertTriangle, Clock, RotateCcw
} from 'lucide-react';
import { ALL } from '../types';
import type { ExportKind, ReportSession } from '../types';
import { usePendingReport } from '../hooks/usePendingReport';
import { ageBucketOptions, isAgeBucketOption } from '../utils/filters';
import { exportTable, exportFileName, downloadWorkbook } from '../utils/exporter';
import { formatDisplayDate } from '../utils/detail';
import { ReportTableView } from './ReportTableView';
import { AgeingChart } from './AgeingChart';
import { config } from '../config';

interface DashboardProps {
  session: ReportSession;
  onReset: () => void;
}

type TabType = 'summary' | 'detail';

export const Dashboard: React.FC<DashboardProps> = ({ session: initialSession, onReset }) => {
  const { session, view, setFilters, resetFilters } = usePendingReport(initialSession);
  const [activeTab, setActiveTab] = useState<TabType>('summary');
  const { filters } = session;

  const handleBucketChange = (e: React.ChangeEvent<HTMLSelectElement>) => {
    const val = e.target.value;
    if (isAgeBucketOption(val)) setFilters({ ageBucket: val });
  };

  const handleDownload = (kind: ExportKind) => {
    const table = kind === 'summary' ? view.summaryTable : view.detailTable;
    const fileName = exportFileName(kind, filters);
    console.log(`[export] ${fileName}: ${table.rows.length} rows`);
    downloadWorkbook(exportTable(table), fileName);
  };

  const kpiCards = [
    { label: 'Total', value: view.kpis.total },
    { label: '0–7 Days', value: view.kpis.buckets['0 to 7 Days'] },
    { label: '8–15 Days', value: view.kpis.buckets['8 to 15 Days'] },
    { label: '16–30 Days', value: view.kpis.buckets['16 to 30 Days'] },
    { label: '31–45 Days', value: view.kpis.buckets['31 to 45 Days'] },
    { label: '>45 Days', value: view.kpis.buckets['More than 45 Days'] }
  ];

  const isFiltered = filters.subDivision !== ALL || filters.ageBucket !== ALL;

  return (
    <div className="min-h-screen bg-[#f4fbf6] pb-20">
      <header className="bg-white border-b border-slate-200 sticky top-0 z-30 shadow-sm">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 h-16 flex items-center justify-between">
          <div className="flex items-center gap-4">
            <button onClick={onReset} aria-label="Upload another file" className="p-2 hover:bg-slate-100 rounded-full text-slate-500 transition-colors">
              <ArrowLeft className="w-5 h-5" />
            </button>
            <h1 className="text-lg font-bold text-slate-800 flex items-center gap-2">
              <Clock className="w-5 h-5 text-green-700" /> {config.reportTitle}
            </h1>
          </div>
          <span className="text-xs font-semibold text-green-700 bg-green-50 px-3 py-1 rounded-full border border-green-100">
            {session.records.length.toLocaleString()} Records{session.fileName ? ` (${session.fileName})` : ''}
          </span>
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8 grid grid-cols-1 lg:grid-cols-4 gap-6">
        <aside className="bg-white p-4 rounded-xl border border-slate-200 shadow-sm space-y-4 h-fit">
          <h2 className="text-sm font-semibold text-slate-700 flex items-center gap-2"><Filter className="w-4 h-4" /> Filters</h2>
          <div className="flex flex-col gap-1">
            <label htmlFor="filter-sub-division" className="text-xs font-semibold text-slate-500 uppercase tracking-wider">Sub Division</label>
            <select
              id="filter-sub-division"
              value={filters.subDivision}
              onChange={(e) => setFilters({ subDivision: e.target.value })}
              className="bg-slate-50 border border-slate-200 text-slate-700 py-2 pl-3 pr-8 rounded-lg focus:outline-none focus:ring-2 focus:ring-green-600 text-sm font-medium"
            >
              {view.subDivisionOptions.map(sd => <option key={sd} value={sd}>{sd}</option>)}
            </select>
          </div>
          <div className="flex flex-col gap-1">
            <label htmlFor="filter-age-bucket" className="text-xs font-semibold text-slate-500 uppercase tracking-wider">Age Bucket</label>
            <select
              id="filter-age-bucket"
              value={filters.ageBucket}
              onChange={handleBucketChange}
              className="bg-slate-50 border border-slate-200 text-slate-700 py-2 pl-3 pr-8 rounded-lg focus:outline-none focus:ring-2 focus:ring-green-600 text-sm font-medium"
            >
              {ageBucketOptions.map(b => <option key={b} value={b}>{b}</option>)}
            </select>
          </div>
          {isFiltered && (
            <button onClick={resetFilters} className="text-xs text-slate-500 hover:text-green-700 flex items-center gap-1">
              <RotateCcw className="w-3 h-3" /> Clear filters
            </button>
          )}
          {session.skippedRows > 0 && (
            <p className="text-xs text-slate-400">{session.skippedRows} rows without a valid date were excluded.</p>
          )}
        </aside>

        <section className="lg:col-span-3 space-y-6">
          <div className="grid grid-cols-2 md:grid-cols-6 gap-3">
            {kpiCards.map(card => (
              <div key={card.label} className="bg-white rounded-xl border border-slate-200 p-4 shadow-sm">
                <p className="text-xs text-slate-500">{card.label}</p>
                <p className="text-2xl font-bold text-slate-900">{card.value.toLocaleString()}</p>
              </div>
            ))}
          </div>

          {view.futureDated > 0 && (
            <div role="status" className="flex items-center gap-2 px-4 py-3 bg-amber-50 text-amber-800 rounded-xl border border-amber-200 text-sm">
              <AlertTriangle className="w-4 h-4" />
              {view.futureDated} record(s) have an installation date after {formatDisplayDate(session.today)} and are counted under 0 to 7 Days.
            </div>
          )}

          <div className="bg-white rounded-2xl shadow-sm border border-slate-200 p-6 space-y-4">
            <div className="flex bg-slate-100 rounded-lg p-1 w-fit">
              <button onClick={() => setActiveTab('summary')} className={`flex items-center gap-2 px-4 py-1.5 rounded-md text-sm font-medium transition-all ${activeTab === 'summary' ? 'bg-white text-green-700 shadow-sm' : 'text-slate-600'}`}>
                <BarChart3 className="w-4 h-4" /> Summary
              </button>
              <button onClick={() => setActiveTab('detail')} className={`flex items-center gap-2 px-4 py-1.5 rounded-md text-sm font-medium transition-all ${activeTab === 'detail' ? 'bg-white text-green-700 shadow-sm' : 'text-slate-600'}`}>
                <Table className="w-4 h-4" /> Detail
              </button>
            </div>

            {activeTab === 'summary' ? (
              <div className="space-y-6">
                <ReportTableView table={view.summaryTable} highlightLastRow />
                <AgeingChart summary={view.summary} />
              </div>
            ) : (
              <ReportTableView table={view.detailTable} emptyMessage="No records match the selected filters" />
            )}
          </div>

          <div className="bg-white rounded-2xl shadow-sm border border-slate-200 p-6">
            <h3 className="text-sm font-semibold text-slate-500 uppercase tracking-wider mb-4 flex items-center gap-2">
              <Download className="w-4 h-4" /> Downloads
            </h3>
            <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
              <button onClick={() => handleDownload('summary')} className="py-2 bg-green-700 hover:bg-green-800 text-white rounded-lg font-semibold flex items-center justify-center gap-2">
                <Download className="w-4 h-4" /> Download Summary
              </button>
              <button onClick={() => handleDownload('detail')} className="py-2 bg-green-700 hover:bg-green-800 text-white rounded-lg font-semibold flex items-center justify-center gap-2">
                <Download className="w-4 h-4" /> Download Detail
              </button>
            </div>
          </div>
        </section>
      </main>

      <footer className="border-t border-slate-200 pt-4 text-center text-sm text-slate-400">
        Internal Use Only | {config.reportTitle} | Generated on {formatDisplayDate(session.today)}
      </footer>
    </div>
  );
};
