export { snapshots } from './snapshots';
export { journalEntries } from './journal-entries';
export { runs } from './runs';
