import React, { useState } from 'react';
import { FileUpload } from './components/FileUpload';
import { Dashboard } from './components/Dashboard';
import type { ReportSession, UploadStatus } from './types';
import { parseExcelFile, WorkbookReadError } from './utils/excelProcessor';
import { createSession } from './utils/session';
import { config, reportToday } from './config';

const App: React.FC = () => {
  const [session, setSession] = useState<ReportSession | null>(null);
  const [status, setStatus] = useState<UploadStatus>('idle');
  const [error, setError] = useState<string | undefined>(undefined);

  const handleFileUpload = async (file: File) => {
    setStatus('parsing');
    setError(undefined);

    try {
      const loaded = await parseExcelFile(file);
      setSession(createSession(loaded, reportToday(), file.name));
      setStatus('success');
    } catch (e) {
      console.error('[upload] Failed to process', file.name, e);
      setError(e instanceof WorkbookReadError
        ? e.message
        : 'Failed to read the Excel file. Please ensure it matches the expected format.');
      setStatus('error');
    }
  };

  const handleReset = () => {
    setSession(null);
    setStatus('idle');
    setError(undefined);
  };

  return (
    <div className="antialiased text-slate-900 min-h-screen bg-[#f4fbf6]">
      {session ? (
        <Dashboard key={`${session.fileName ?? ''}-${session.records.length}`} session={session} onReset={handleReset} />
      ) : (
        <>
          <h1 className="text-center text-2xl font-bold text-slate-800 pt-12">{config.reportTitle}</h1>
          <FileUpload
            onFileUpload={(file) => { void handleFileUpload(file); }}
            status={status}
            error={error}
          />
        </>
      )}
    </div>
  );
};

export default App;
