import { parseInstallationDate } from './utils/excelProcessor';

export interface AppConfig {
  reportTitle: string;
  exportPrefix: string;
  reportDate: Date | null; // overrides "today" when set
}

export interface ConfigEnv {
  VITE_REPORT_TITLE?: string;
  VITE_EXPORT_PREFIX?: string;
  VITE_REPORT_DATE?: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  reportTitle: 'Pending for Release under PMSGMBY',
  exportPrefix: 'PMSGMBY_Pending',
  reportDate: null
};

export const resolveConfig = (env: ConfigEnv): AppConfig => {
  const title = env.VITE_REPORT_TITLE?.trim();
  const prefix = env.VITE_EXPORT_PREFIX?.trim();

  let reportDate: Date | null = null;
  if (env.VITE_REPORT_DATE) {
    reportDate = parseInstallationDate(env.VITE_REPORT_DATE);
    if (!reportDate) {
      console.warn(`[config] Ignoring VITE_REPORT_DATE "${env.VITE_REPORT_DATE}", expected dd-mm-yyyy`);
    }
  }

  return {
    reportTitle: title || DEFAULT_CONFIG.reportTitle,
    exportPrefix: prefix || DEFAULT_CONFIG.exportPrefix,
    reportDate
  };
};

export const config: AppConfig = resolveConfig(import.meta.env);

export const reportToday = (): Date => config.reportDate ?? new Date();
