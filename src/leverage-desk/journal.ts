// src/leverage-desk/journal.ts
// Append-only context journal. Entries are never edited or removed; stores
// expose append and list only.

import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { asc } from 'drizzle-orm';
import { z } from 'zod';
import { FACT_STATUSES, JOURNAL_ENTRY_TYPES } from '@shared/constants';
import type { JournalEntryRecord } from '@shared/types';
import type { Database } from '@db/connection';
import { journalEntries } from '@db/schema/journal-entries';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const journalEntryInputSchema = z.object({
  text: z.string().trim().min(1, 'Context text cannot be empty or whitespace-only.'),
  entryType: z.enum(JOURNAL_ENTRY_TYPES).default('text'),
  source: z.string().trim().min(1).default('user'),
  factStatus: z.enum(FACT_STATUSES).nullable().default(null),
});

export type JournalEntryInput = z.input<typeof journalEntryInputSchema>;

export const journalEntryRecordSchema = z.object({
  id: z.string(),
  timestampUtc: z.string(),
  entryType: z.enum(JOURNAL_ENTRY_TYPES),
  source: z.string(),
  text: z.string(),
  factStatus: z.enum(FACT_STATUSES).nullable(),
});

const journalFileSchema = z.array(journalEntryRecordSchema);

// ---------------------------------------------------------------------------
// Store interface
// ---------------------------------------------------------------------------

export interface JournalStore {
  append(input: JournalEntryInput): Promise<JournalEntryRecord>;
  /** Oldest first. With a limit, only the most recent `limit` entries. */
  list(limit?: number): Promise<JournalEntryRecord[]>;
}

function lastEntries<T>(entries: T[], limit?: number): T[] {
  return limit !== undefined && limit > 0 ? entries.slice(-limit) : entries;
}

// ---------------------------------------------------------------------------
// File store
// ---------------------------------------------------------------------------

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileJournalStore implements JournalStore {
  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async list(limit?: number): Promise<JournalEntryRecord[]> {
    return lastEntries(await this.read(), limit);
  }

  async append(input: JournalEntryInput): Promise<JournalEntryRecord> {
    const parsed = journalEntryInputSchema.parse(input);
    // Appends are chained so concurrent writers never lose an entry.
    const next = this.pending.then(async () => {
      const entries = await this.read();
      const entry: JournalEntryRecord = {
        id: randomUUID(),
        timestampUtc: this.now().toISOString(),
        ...parsed,
      };
      await this.write([...entries, entry]);
      return entry;
    });
    // The caller sees the failure through `next`; the chain itself moves on.
    this.pending = next.catch(() => undefined);
    return next;
  }

  private async read(): Promise<JournalEntryRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return journalFileSchema.parse(JSON.parse(raw));
  }

  private async write(entries: JournalEntryRecord[]): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tempPath = path.join(dir, `.journal-${randomUUID()}.tmp`);
    await mkdir(dir, { recursive: true });
    try {
      await writeFile(tempPath, JSON.stringify(entries, null, 2), 'utf8');
      await rename(tempPath, this.filePath);
    } catch (err) {
      await unlink(tempPath).catch((cleanupErr: unknown) => {
        if (!isMissingFile(cleanupErr)) throw cleanupErr;
      });
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// Postgres store
// ---------------------------------------------------------------------------

export class DrizzleJournalStore implements JournalStore {
  constructor(private readonly db: Database) {}

  async append(input: JournalEntryInput): Promise<JournalEntryRecord> {
    const parsed = journalEntryInputSchema.parse(input);
    const [row] = await this.db.insert(journalEntries).values(parsed).returning();
    return toRecord(row);
  }

  async list(limit?: number): Promise<JournalEntryRecord[]> {
    const rows = await this.db.select().from(journalEntries).orderBy(asc(journalEntries.timestampUtc));
    return lastEntries(rows.map(toRecord), limit);
  }
}

function toRecord(row: typeof journalEntries.$inferSelect): JournalEntryRecord {
  return journalEntryRecordSchema.parse({ ...row, timestampUtc: row.timestampUtc.toISOString() });
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export const JOURNAL_SEPARATOR = '\n\n---\n\n';

export function formatJournalEntry(entry: JournalEntryRecord): string {
  const status = entry.factStatus ? ` [${entry.factStatus}]` : '';
  return `[${entry.timestampUtc}] [${entry.entryType}]${status} ${entry.text}`;
}

export function formatJournal(entries: JournalEntryRecord[], limit?: number): string {
  return lastEntries(entries, limit).map(formatJournalEntry).join(JOURNAL_SEPARATOR);
}
