import type {
  Judgment,
  Progress,
  ProgressRecord,
  WordEntry,
  WordStats,
} from '../types';

export interface WordStore {
  entries: WordEntry[];
  progress: ProgressRecord;
}

interface RecordJudgmentOptions {
  countSeen: boolean;
}

export function emptyProgress(): Progress {
  return { seen: 0, known: 0, unknown: 0, starred: false };
}

function dedupeEntries(entries: WordEntry[]): WordEntry[] {
  const seenTerms = new Set<string>();
  const result: WordEntry[] = [];
  for (const entry of entries) {
    if (!entry.term || seenTerms.has(entry.term)) continue;
    seenTerms.add(entry.term);
    result.push(entry);
  }
  return result;
}

/**
 * Replace the word table. Progress survives for terms still present, new terms
 * start at zero and records for removed terms are dropped.
 */
export function loadWords(store: WordStore, entries: WordEntry[]): WordStore {
  const nextEntries = dedupeEntries(entries);
  const progress: ProgressRecord = {};
  for (const entry of nextEntries) {
    const existing = store.progress[entry.term];
    progress[entry.term] = existing ? { ...existing } : emptyProgress();
  }
  return { entries: nextEntries, progress };
}

export function createWordStore(entries: WordEntry[], progress: ProgressRecord = {}): WordStore {
  return loadWords({ entries: [], progress }, entries);
}

export function getEntry(store: WordStore, term: string): WordEntry | undefined {
  return store.entries.find((entry) => entry.term === term);
}

export function getProgress(store: WordStore, term: string): Progress {
  return store.progress[term] ?? emptyProgress();
}

function updateProgress(
  store: WordStore,
  term: string,
  update: (current: Progress) => Progress
): WordStore {
  const current = store.progress[term];
  if (!current) return store;
  return {
    entries: store.entries,
    progress: { ...store.progress, [term]: update(current) },
  };
}

export function recordJudgment(
  store: WordStore,
  term: string,
  outcome: Judgment,
  { countSeen }: RecordJudgmentOptions
): WordStore {
  return updateProgress(store, term, (current) => ({
    ...current,
    seen: current.seen + (countSeen ? 1 : 0),
    known: current.known + (outcome === 'known' ? 1 : 0),
    unknown: current.unknown + (outcome === 'unknown' ? 1 : 0),
  }));
}

export function toggleStar(store: WordStore, term: string): WordStore {
  return updateProgress(store, term, (current) => ({ ...current, starred: !current.starred }));
}

function isMistake(progress: Progress): boolean {
  return progress.starred || progress.unknown > 0;
}

/**
 * Terms needing extra review, in word-table order. Always derived from the
 * current progress.
 */
export function mistakeSet(store: WordStore): string[] {
  return store.entries
    .filter((entry) => isMistake(getProgress(store, entry.term)))
    .map((entry) => entry.term);
}

export function stats(store: WordStore): WordStats {
  const result: WordStats = { total: store.entries.length, seen: 0, known: 0, unknown: 0, starred: 0 };
  for (const entry of store.entries) {
    const progress = getProgress(store, entry.term);
    if (progress.seen > 0) result.seen += 1;
    if (progress.known > 0) result.known += 1;
    if (progress.unknown > 0) result.unknown += 1;
    if (progress.starred) result.starred += 1;
  }
  return result;
}

export function allTerms(store: WordStore): string[] {
  return store.entries.map((entry) => entry.term);
}

export function progressRecord(store: WordStore): ProgressRecord {
  const record: ProgressRecord = {};
  for (const entry of store.entries) {
    record[entry.term] = { ...getProgress(store, entry.term) };
  }
  return record;
}
