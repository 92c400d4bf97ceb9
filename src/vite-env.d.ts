/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_REPORT_TITLE?: string;
  readonly VITE_EXPORT_PREFIX?: string;
  readonly VITE_REPORT_DATE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
