import * as fs from 'fs';
import * as path from 'path';
import type { Progress, ProgressRecord, WordEntry } from '../types';
import { csvRecords, formatCsv } from './csv';
import { PersistenceError } from './errors';

export interface NoteStore {
  noteExists(term: string): Promise<boolean>;
  saveNote(term: string, text: string): Promise<void>;
  readNote(term: string): Promise<string | null>;
}

export interface ProgressStore {
  loadProgress(): ProgressRecord;
  saveProgress(progress: ProgressRecord): boolean;
}

export interface FileStorage extends NoteStore, ProgressStore {
  loadWords(): WordEntry[];
  notePath(term: string): string;
}

export interface FileStorageOptions {
  wordsFile: string;
  progressFile: string;
  notesDir: string;
}

const WORDS_HEADER = ['word', 'meaning', 'phonetic', 'example'];

const SAMPLE_WORDS: WordEntry[] = [
  { term: 'apple', meaning: '苹果', phonetic: '/ˈæpəl/', example: 'I eat an apple every day.' },
  { term: 'beautiful', meaning: '美丽的', phonetic: '/ˈbjuːtɪfəl/', example: 'What a beautiful morning.' },
  { term: 'computer', meaning: '计算机', phonetic: '/kəmˈpjuːtər/', example: 'She restarted the computer.' },
  { term: 'difficult', meaning: '困难的', phonetic: '/ˈdɪfɪkəlt/', example: 'The exam was difficult.' },
  { term: 'environment', meaning: '环境', phonetic: '/ɪnˈvaɪrənmənt/', example: 'We must protect the environment.' },
  { term: 'fantastic', meaning: '极好的', phonetic: '/fænˈtæstɪk/', example: 'The concert was fantastic.' },
  { term: 'government', meaning: '政府', phonetic: '/ˈɡʌvərnmənt/', example: 'The government passed a new law.' },
  { term: 'happiness', meaning: '幸福', phonetic: '/ˈhæpinəs/', example: 'Money cannot buy happiness.' },
];

export function noteFileName(term: string): string {
  const safe = term.trim().replace(/[\\/:*?"<>|]/g, '_');
  return `${safe || '_'}.md`;
}

function isFiniteCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function normalizeProgress(value: unknown): Progress | null {
  if (typeof value !== 'object' || value === null) return null;
  const record: Record<string, unknown> = { ...value };
  return {
    seen: isFiniteCount(record.seen) ? Math.floor(record.seen) : 0,
    known: isFiniteCount(record.known) ? Math.floor(record.known) : 0,
    unknown: isFiniteCount(record.unknown) ? Math.floor(record.unknown) : 0,
    starred: record.starred === true,
  };
}

export function parseProgressPayload(payload: unknown): ProgressRecord {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) return {};
  const progress: ProgressRecord = {};
  for (const [term, value] of Object.entries(payload)) {
    const normalized = normalizeProgress(value);
    if (normalized) progress[term] = normalized;
  }
  return progress;
}

/**
 * Read the word list CSV. Rows without a word are skipped; a missing file
 * yields an empty list.
 */
export function loadWordsFile(filePath: string): WordEntry[] {
  try {
    if (!fs.existsSync(filePath)) return [];
    const records = csvRecords(fs.readFileSync(filePath, 'utf-8'));
    const entries: WordEntry[] = [];
    for (const record of records) {
      const term = (record.word ?? record.term ?? '').trim();
      if (!term) continue;
      const phonetic = record.phonetic?.trim();
      const example = record.example?.trim();
      entries.push({
        term,
        meaning: (record.meaning ?? '').trim(),
        ...(phonetic ? { phonetic } : {}),
        ...(example ? { example } : {}),
      });
    }
    return entries;
  } catch (err) {
    console.error('Failed to load word list:', new PersistenceError('read', filePath, err).message);
    return [];
  }
}

export function writeWordsFile(filePath: string, entries: WordEntry[]): void {
  const rows = entries.map((entry) => [entry.term, entry.meaning, entry.phonetic ?? '', entry.example ?? '']);
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, formatCsv([WORDS_HEADER, ...rows]), 'utf-8');
  } catch (err) {
    throw new PersistenceError('write', filePath, err);
  }
}

/**
 * Create a starter word list when none exists. Returns true if a file was written.
 */
export function writeSampleWordsFile(filePath: string): boolean {
  if (fs.existsSync(filePath)) return false;
  writeWordsFile(filePath, SAMPLE_WORDS);
  return true;
}

export function loadProgressFile(filePath: string): ProgressRecord {
  try {
    if (fs.existsSync(filePath)) {
      return parseProgressPayload(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    }
  } catch (err) {
    console.warn('Failed to load progress, starting fresh:', new PersistenceError('read', filePath, err).message);
  }
  return {};
}

export function saveProgressFile(filePath: string, progress: ProgressRecord): boolean {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(progress, null, 2)}\n`, 'utf-8');
    return true;
  } catch (err) {
    console.warn('Failed to save progress:', new PersistenceError('write', filePath, err).message);
    return false;
  }
}

export function createFileStorage({ wordsFile, progressFile, notesDir }: FileStorageOptions): FileStorage {
  const notePath = (term: string) => path.join(notesDir, noteFileName(term));

  return {
    notePath,
    loadWords: () => loadWordsFile(wordsFile),
    loadProgress: () => loadProgressFile(progressFile),
    saveProgress: (progress) => saveProgressFile(progressFile, progress),

    async noteExists(term) {
      try {
        await fs.promises.access(notePath(term));
        return true;
      } catch {
        return false;
      }
    },

    async saveNote(term, text) {
      const target = notePath(term);
      try {
        await fs.promises.mkdir(notesDir, { recursive: true });
        await fs.promises.writeFile(target, text, 'utf-8');
      } catch (err) {
        throw new PersistenceError('write', target, err);
      }
    },

    async readNote(term) {
      const target = notePath(term);
      try {
        return await fs.promises.readFile(target, 'utf-8');
      } catch (err) {
        if (isMissingFileError(err)) return null;
        throw new PersistenceError('read', target, err);
      }
    },
  };
}

function isMissingFileError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
