import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { JournalEntryRecord } from '@shared/types';
import {
  FileJournalStore,
  formatJournal,
  formatJournalEntry,
  journalEntryInputSchema,
} from '@desk/journal';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function fixedClock(start: string) {
  let tick = 0;
  return () => new Date(Date.parse(start) + 1000 * tick++);
}

function makeEntry(overrides: Partial<JournalEntryRecord> = {}): JournalEntryRecord {
  return {
    id: 'entry-1',
    timestampUtc: '2026-01-15T09:00:00.000Z',
    entryType: 'text',
    source: 'user',
    text: 'Hearing listed for March',
    factStatus: null,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// FileJournalStore
// ---------------------------------------------------------------------------

describe('FileJournalStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'journal-test-'));
    file = path.join(dir, 'journal.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists nothing before the first append', async () => {
    expect(await new FileJournalStore(file).list()).toEqual([]);
  });

  it('appends trimmed entries with defaults and a UTC timestamp', async () => {
    const store = new FileJournalStore(file, fixedClock('2026-01-15T09:00:00.000Z'));
    const entry = await store.append({ text: '  Insurer letter received  ' });
    expect(entry).toMatchObject({
      timestampUtc: '2026-01-15T09:00:00.000Z',
      entryType: 'text',
      source: 'user',
      text: 'Insurer letter received',
      factStatus: null,
    });
    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('keeps entries in append order on disk', async () => {
    const store = new FileJournalStore(file, fixedClock('2026-01-15T09:00:00.000Z'));
    await store.append({ text: 'first' });
    await store.append({ text: 'second', entryType: 'email', factStatus: 'EVIDENCED' });

    const onDisk: unknown = JSON.parse(await readFile(file, 'utf8'));
    expect(Array.isArray(onDisk) && onDisk.length).toBe(2);
    expect((await store.list()).map((e) => e.text)).toEqual(['first', 'second']);
  });

  it('loses nothing under concurrent appends and leaves no temp files', async () => {
    const store = new FileJournalStore(file);
    await Promise.all(['a', 'b', 'c', 'd', 'e'].map((text) => store.append({ text })));
    expect(await store.list()).toHaveLength(5);
    expect(await readdir(dir)).toEqual(['journal.json']);
  });

  it('returns only the most recent entries for a limit', async () => {
    const store = new FileJournalStore(file);
    for (const text of ['one', 'two', 'three']) await store.append({ text });
    expect((await store.list(2)).map((e) => e.text)).toEqual(['two', 'three']);
  });

  it('rejects empty text and unknown fact statuses', async () => {
    const store = new FileJournalStore(file);
    await expect(store.append({ text: '   ' })).rejects.toThrow('Context text cannot be empty');
    expect(journalEntryInputSchema.safeParse({ text: 'x', factStatus: 'MAYBE' }).success).toBe(false);
    expect(await store.list()).toEqual([]);
  });

  it('reports invalid input through the returned promise, never synchronously', async () => {
    const store = new FileJournalStore(file);
    let pending: Promise<unknown> | undefined;
    expect(() => {
      pending = store.append({ text: '' });
    }).not.toThrow();
    expect(pending).toBeInstanceOf(Promise);
    await expect(pending).rejects.toThrow('Context text cannot be empty');
  });
});

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

describe('formatJournal', () => {
  it('tags the fact status only when present', () => {
    expect(formatJournalEntry(makeEntry())).toBe('[2026-01-15T09:00:00.000Z] [text] Hearing listed for March');
    expect(formatJournalEntry(makeEntry({ entryType: 'court_note', factStatus: 'ALLEGED' }))).toBe(
      '[2026-01-15T09:00:00.000Z] [court_note] [ALLEGED] Hearing listed for March',
    );
  });

  it('joins entries with a rule and honours a limit', () => {
    const entries = [makeEntry({ text: 'one' }), makeEntry({ text: 'two' }), makeEntry({ text: 'three' })];
    expect(formatJournal(entries, 2)).toBe(
      '[2026-01-15T09:00:00.000Z] [text] two\n\n---\n\n[2026-01-15T09:00:00.000Z] [text] three',
    );
    expect(formatJournal([])).toBe('');
  });
});
