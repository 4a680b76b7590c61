import * as fs from 'fs';
import type { BossStyle, SearchDepth, SearchMode } from '../types';
import { DEFAULT_THEME_NAME, isThemeName } from './themes';
import type { ThemeName } from './themes';

export const CONFIG_FILE = 'wordtrainer.config.json';

export interface AppConfig {
  wordsFile: string;
  progressFile: string;
  notesDir: string;
  theme: ThemeName;
  bossStyle: BossStyle;
  bossQuitEnabled: boolean;
  stayOnWrong: boolean;
  search: SearchMode;
  plainNotes: boolean;
  model: string;
  maxWebResults: number;
  searchDepth: SearchDepth;
  sentenceCount: number;
  timeoutMs: number;
  tickMs: number;
}

export interface ApiCredentials {
  openAiApiKey?: string;
  openAiBaseUrl?: string;
  tavilyApiKey?: string;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: AppConfig = {
  wordsFile: 'words.csv',
  progressFile: 'progress.json',
  notesDir: 'ai_notes',
  theme: DEFAULT_THEME_NAME,
  bossStyle: 'tail',
  bossQuitEnabled: false,
  stayOnWrong: false,
  search: 'auto',
  plainNotes: false,
  model: 'gpt-4o-mini',
  maxWebResults: 6,
  searchDepth: 'advanced',
  sentenceCount: 6,
  timeoutMs: 60_000,
  tickMs: 500,
};

function clampInt(value: unknown, min: number, max: number, fallback: number): number {
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, Math.round(n)));
}

function nonEmptyString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Merge a parsed config object over the defaults. Values of the wrong type or
 * outside their allowed set fall back to the default.
 */
export function normalizeConfig(raw: unknown, env: Env = {}): AppConfig {
  const parsed: Record<string, unknown> = typeof raw === 'object' && raw !== null && !Array.isArray(raw)
    ? { ...raw }
    : {};
  const defaultModel = nonEmptyString(env.OPENAI_MODEL, DEFAULT_CONFIG.model);

  return {
    wordsFile: nonEmptyString(parsed.wordsFile, DEFAULT_CONFIG.wordsFile),
    progressFile: nonEmptyString(parsed.progressFile, DEFAULT_CONFIG.progressFile),
    notesDir: nonEmptyString(parsed.notesDir, DEFAULT_CONFIG.notesDir),
    theme: isThemeName(parsed.theme) ? parsed.theme : DEFAULT_CONFIG.theme,
    bossStyle: parsed.bossStyle === 'ls' ? 'ls' : 'tail',
    bossQuitEnabled: booleanOr(parsed.bossQuitEnabled, DEFAULT_CONFIG.bossQuitEnabled),
    stayOnWrong: booleanOr(parsed.stayOnWrong, DEFAULT_CONFIG.stayOnWrong),
    search: parsed.search === 'tavily' || parsed.search === 'off' ? parsed.search : 'auto',
    plainNotes: booleanOr(parsed.plainNotes, DEFAULT_CONFIG.plainNotes),
    model: nonEmptyString(parsed.model, defaultModel),
    maxWebResults: clampInt(parsed.maxWebResults, 1, 15, DEFAULT_CONFIG.maxWebResults),
    searchDepth: parsed.searchDepth === 'basic' ? 'basic' : 'advanced',
    sentenceCount: clampInt(parsed.sentenceCount, 1, 20, DEFAULT_CONFIG.sentenceCount),
    timeoutMs: clampInt(parsed.timeoutMs, 1_000, 300_000, DEFAULT_CONFIG.timeoutMs),
    tickMs: clampInt(parsed.tickMs, 100, 5_000, DEFAULT_CONFIG.tickMs),
  };
}

export function loadConfig(configPath: string = CONFIG_FILE, env: Env = process.env): AppConfig {
  try {
    if (fs.existsSync(configPath)) {
      return normalizeConfig(JSON.parse(fs.readFileSync(configPath, 'utf-8')), env);
    }
  } catch (err) {
    console.warn(`Failed to read ${configPath}, using defaults:`, err);
  }
  return normalizeConfig({}, env);
}

export function readCredentials(env: Env = process.env): ApiCredentials {
  return {
    openAiApiKey: env.OPENAI_API_KEY?.trim() || undefined,
    openAiBaseUrl: env.OPENAI_BASE_URL?.trim() || undefined,
    tavilyApiKey: env.TAVILY_API_KEY?.trim() || undefined,
  };
}
