// Vocabulary entry as loaded from the word list
export interface WordEntry {
  term: string;
  meaning: string;
  phonetic?: string;
  example?: string;
}

// Per-term recall tallies
export interface Progress {
  seen: number;
  known: number;
  unknown: number;
  starred: boolean;
}

export type ProgressRecord = Record<string, Progress>;

export type Judgment = 'known' | 'unknown';

export interface WordStats {
  total: number;
  seen: number;
  known: number;
  unknown: number;
  starred: number;
}

export type LearningScope = 'all' | 'mistakes';
export type BossStyle = 'tail' | 'ls';
export type SearchMode = 'auto' | 'tavily' | 'off';
export type SearchDepth = 'basic' | 'advanced';

export const THEME_SLOTS = ['title', 'word', 'meaning', 'warn', 'phonetic', 'body'] as const;
export type ThemeSlot = typeof THEME_SLOTS[number];

export type Theme = Record<ThemeSlot, string>;

export type GenerationErrorKind = 'timeout' | 'auth' | 'network' | 'provider';

export interface NoteOptions {
  search: SearchMode;
  plain: boolean;
}

export interface Viewport {
  rows: number;
  columns: number;
}
