import { db } from '@db/connection';
import { DrizzleJournalStore, FileJournalStore, type JournalStore } from '@desk/journal';
import { config } from './config';

export const journalStore: JournalStore =
  config.journal.store === 'postgres'
    ? new DrizzleJournalStore(db)
    : new FileJournalStore(config.journal.path);
