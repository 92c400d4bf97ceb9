import { useCallback, useMemo, useState } from 'react';
import type { FilterSelection, ReportSession, ReportView } from '../types';
import { DEFAULT_FILTERS } from '../utils/filters';
import { deriveView, withFilters } from '../utils/session';

export interface PendingReport {
  session: ReportSession;
  view: ReportView;
  setFilters: (patch: Partial<FilterSelection>) => void;
  resetFilters: () => void;
}

// Each filter change swaps in a new session; the uploaded records are shared, never edited.
export const usePendingReport = (initial: ReportSession): PendingReport => {
  const [session, setSession] = useState<ReportSession>(initial);

  const view = useMemo(() => deriveView(session), [session]);

  const setFilters = useCallback((patch: Partial<FilterSelection>) => {
    setSession(prev => withFilters(prev, patch));
  }, []);

  const resetFilters = useCallback(() => {
    setSession(prev => withFilters(prev, DEFAULT_FILTERS));
  }, []);

  return { session, view, setFilters, resetFilters };
};
