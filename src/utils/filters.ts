import { AGE_BUCKETS, ALL } from '../types';
import type { AgeBucket, All, ClassifiedRecord, FilterSelection } from '../types';

export const DEFAULT_FILTERS: FilterSelection = { subDivision: ALL, ageBucket: ALL };

export const ageBucketOptions: ReadonlyArray<AgeBucket | All> = [ALL, ...AGE_BUCKETS];

export const subDivisionOptions = (records: ClassifiedRecord[]): string[] => [
  ALL,
  ...Array.from(new Set(records.map(r => r.subDivision))).sort()
];

export const isAgeBucketOption = (val: string): val is AgeBucket | All =>
  ageBucketOptions.some(option => option === val);

/**
 * Keeps records matching every active filter. Values that do not occur in the
 * data simply produce an empty result.
 */
export const applyFilters = (records: ClassifiedRecord[], selection: FilterSelection): ClassifiedRecord[] => {
  const { subDivision, ageBucket } = selection;
  return records.filter(r => {
    if (subDivision !== ALL && r.subDivision !== subDivision) return false;
    if (ageBucket !== ALL && r.ageBucket !== ageBucket) return false;
    return true;
  });
};
