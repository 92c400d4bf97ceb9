import { describe, it, expect } from 'vitest';
import { AGE_BUCKETS } from '../types';
import { ageingBucket, classifyRecord, classifyRecords, daysPending, isFutureDated } from './ageing';

const record = (installationDate: Date) => ({
  rowIndex: 0,
  installationDate,
  applicationNo: 'APP-1',
  consumerNo: 'CON-1',
  subDivision: 'North'
});

describe('daysPending', () => {
  it('counts the installation day itself', () => {
    expect(daysPending(new Date(2024, 0, 1), new Date(2024, 0, 1))).toBe(1);
    expect(daysPending(new Date(2024, 0, 1), new Date(2024, 0, 8))).toBe(8);
  });

  it('ignores the time of day on the reference date', () => {
    expect(daysPending(new Date(2024, 0, 1), new Date(2024, 0, 8, 23, 30))).toBe(8);
  });

  it('counts calendar days across a daylight saving change', () => {
    expect(daysPending(new Date(2024, 2, 1), new Date(2024, 3, 1))).toBe(32);
    expect(daysPending(new Date(2024, 9, 1), new Date(2024, 10, 1))).toBe(32);
  });

  it('goes to zero or below for future installation dates', () => {
    expect(daysPending(new Date(2024, 0, 2), new Date(2024, 0, 1))).toBe(0);
    expect(daysPending(new Date(2024, 0, 5), new Date(2024, 0, 1))).toBe(-3);
  });
});

describe('ageingBucket', () => {
  it('uses inclusive upper bounds', () => {
    expect(ageingBucket(1)).toBe('0 to 7 Days');
    expect(ageingBucket(7)).toBe('0 to 7 Days');
    expect(ageingBucket(8)).toBe('8 to 15 Days');
    expect(ageingBucket(15)).toBe('8 to 15 Days');
    expect(ageingBucket(16)).toBe('16 to 30 Days');
    expect(ageingBucket(30)).toBe('16 to 30 Days');
    expect(ageingBucket(31)).toBe('31 to 45 Days');
    expect(ageingBucket(45)).toBe('31 to 45 Days');
    expect(ageingBucket(46)).toBe('More than 45 Days');
    expect(ageingBucket(900)).toBe('More than 45 Days');
  });

  it('puts zero and negative values in the first bucket', () => {
    expect(ageingBucket(0)).toBe('0 to 7 Days');
    expect(ageingBucket(-3)).toBe('0 to 7 Days');
  });

  it('never moves to an earlier bucket as days grow', () => {
    let previous = 0;
    for (let d = -5; d <= 100; d++) {
      const index = AGE_BUCKETS.indexOf(ageingBucket(d));
      expect(index).toBeGreaterThanOrEqual(previous);
      previous = index;
    }
    expect(previous).toBe(AGE_BUCKETS.length - 1);
  });
});

describe('classifyRecord', () => {
  it('adds days pending and bucket without touching the source record', () => {
    const source = record(new Date(2024, 0, 1));
    const classified = classifyRecord(source, new Date(2024, 0, 8));

    expect(classified.daysPending).toBe(8);
    expect(classified.ageBucket).toBe('8 to 15 Days');
    expect(classified.applicationNo).toBe('APP-1');
    expect(source).not.toHaveProperty('daysPending');
  });

  it('classifies a list against the same reference date', () => {
    const today = new Date(2024, 1, 20);
    const result = classifyRecords([record(new Date(2024, 1, 20)), record(new Date(2024, 0, 1))], today);
    expect(result.map(r => [r.daysPending, r.ageBucket])).toEqual([
      [1, '0 to 7 Days'],
      [51, 'More than 45 Days']
    ]);
  });

  it('flags future dated records', () => {
    const today = new Date(2024, 0, 1);
    expect(isFutureDated(classifyRecord(record(new Date(2024, 0, 3)), today))).toBe(true);
    expect(isFutureDated(classifyRecord(record(new Date(2024, 0, 1)), today))).toBe(false);
  });
});
