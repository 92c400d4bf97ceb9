import { AGE_BUCKETS } from '../types';
import type { AgeBucket, ClassifiedRecord, InstallationRecord } from '../types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Upper bound (inclusive) for each bucket; the last bucket is open ended.
const BUCKET_LIMITS: ReadonlyArray<[number, AgeBucket]> = [
  [7, '0 to 7 Days'],
  [15, '8 to 15 Days'],
  [30, '16 to 30 Days'],
  [45, '31 to 45 Days']
];

// Calendar day number, ignoring time of day and DST offsets
const dayNumber = (date: Date): number =>
  Math.round(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()) / MS_PER_DAY);

/**
 * Days a record has been pending, counting the installation day itself.
 * Same-day installation gives 1.
 */
export const daysPending = (installationDate: Date, today: Date): number =>
  dayNumber(today) - dayNumber(installationDate) + 1;

/**
 * Maps a pending-days figure onto its ageing bucket. Values of zero or below
 * (installation dated after today) fall into the first bucket.
 */
export const ageingBucket = (days: number): AgeBucket => {
  for (const [limit, bucket] of BUCKET_LIMITS) {
    if (days <= limit) return bucket;
  }
  return AGE_BUCKETS[AGE_BUCKETS.length - 1];
};

export const classifyRecord = (record: InstallationRecord, today: Date): ClassifiedRecord => {
  const days = daysPending(record.installationDate, today);
  return { ...record, daysPending: days, ageBucket: ageingBucket(days) };
};

export const classifyRecords = (records: InstallationRecord[], today: Date): ClassifiedRecord[] =>
  records.map(r => classifyRecord(r, today));

export const isFutureDated = (record: ClassifiedRecord): boolean => record.daysPending <= 0;
