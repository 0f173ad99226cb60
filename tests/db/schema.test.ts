import { describe, it, expect } from 'vitest';
import { getTableColumns, getTableName } from 'drizzle-orm';
import { journalEntries, runs, snapshots } from '@db/schema';

describe('snapshots schema', () => {
  it('exports a snapshots table', () => {
    expect(getTableName(snapshots)).toBe('snapshots');
  });

  it('stores the headline fields beside the full snapshot', () => {
    const cols = getTableColumns(snapshots);
    expect(Object.keys(cols)).toEqual(['id', 'release', 'leverageScore', 'decision', 'snapshot', 'createdAt']);
    expect(cols.leverageScore.name).toBe('leverage_score');
    expect(cols.snapshot.notNull).toBe(true);
  });
});

describe('journal_entries schema', () => {
  it('exports a journal_entries table', () => {
    expect(getTableName(journalEntries)).toBe('journal_entries');
  });

  it('has a nullable fact status and a required text column', () => {
    const cols = getTableColumns(journalEntries);
    expect(cols.factStatus.notNull).toBe(false);
    expect(cols.text.notNull).toBe(true);
    expect(cols.timestampUtc.name).toBe('timestamp_utc');
  });
});

describe('runs schema', () => {
  it('exports a runs table', () => {
    expect(getTableName(runs)).toBe('runs');
  });

  it('keeps the seed and distributions needed to replay a run', () => {
    const cols = getTableColumns(runs);
    expect(cols.seed.notNull).toBe(true);
    expect(cols.distributions.notNull).toBe(true);
    expect(cols.summary.notNull).toBe(false);
  });
});
