import React, { useCallback } from 'react';
import { Upload, FileSpreadsheet, Loader2, AlertCircle } from 'lucide-react';
import type { UploadStatus } from '../types';

interface FileUploadProps {
  onFileUpload: (file: File) => void;
  status: UploadStatus;
  error?: string;
}

const isSpreadsheet = (file: File) => file.name.toLowerCase().endsWith('.xlsx');

export const FileUpload: React.FC<FileUploadProps> = ({ onFileUpload, status, error }) => {
  const handleDrop = useCallback((e: React.DragEvent<HTMLDivElement>) => {
    e.preventDefault();
    if (status === 'parsing') return;

    const file = e.dataTransfer.files[0];
    if (file && isSpreadsheet(file)) {
      onFileUpload(file);
    }
  }, [onFileUpload, status]);

  const handleChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (file) onFileUpload(file);
  };

  return (
    <div className="flex flex-col items-center justify-center min-h-[60vh] p-6">
      <div
        className={`w-full max-w-xl p-12 bg-white rounded-3xl shadow-xl border-2 border-dashed transition-all duration-300 text-center
          ${status === 'parsing' ? 'border-green-400 bg-green-50 opacity-80 cursor-wait' : 'border-slate-300 hover:border-green-600 hover:shadow-2xl'}
        `}
        onDragOver={(e) => e.preventDefault()}
        onDrop={handleDrop}
      >
        <div className="flex flex-col items-center gap-6 pointer-events-none">
          {status === 'parsing' ? (
            <Loader2 className="w-20 h-20 text-green-700 animate-spin" />
          ) : (
            <div className="p-6 bg-green-50 rounded-full">
              <FileSpreadsheet className="w-16 h-16 text-green-700" />
            </div>
          )}

          <div className="space-y-2">
            <h2 className="text-2xl font-bold text-slate-800">
              {status === 'parsing' ? 'Processing Excel file...' : 'Upload Excel File (No Header)'}
            </h2>
            <p className="text-slate-500">
              {status === 'parsing'
                ? 'Classifying installations by ageing bucket.'
                : 'Please upload Excel file to continue. Drag & drop or browse.'}
            </p>
          </div>

          {status !== 'parsing' && (
            <label className="pointer-events-auto flex items-center gap-2 px-8 py-3 bg-green-700 hover:bg-green-800 text-white font-semibold rounded-xl transition-colors shadow-lg cursor-pointer">
              <Upload className="w-4 h-4" /> Browse Files
              <input
                type="file"
                accept=".xlsx"
                className="hidden"
                data-testid="file-input"
                onChange={handleChange}
              />
            </label>
          )}
        </div>
      </div>

      {error && (
        <div role="alert" className="mt-6 flex items-center gap-3 px-6 py-4 bg-red-50 text-red-700 rounded-xl border border-red-200">
          <AlertCircle className="w-5 h-5" />
          <p>{error}</p>
        </div>
      )}
    </div>
  );
};
