import type { Theme } from '../types';

export const THEME_NAMES = ['classic', 'ocean', 'forest', 'amber', 'mono'] as const;
export type ThemeName = typeof THEME_NAMES[number];

export const DEFAULT_THEME_NAME: ThemeName = 'classic';

const THEMES: Record<ThemeName, Theme> = {
  classic: {
    title: 'cyan',
    word: 'yellow',
    meaning: 'green',
    warn: 'red',
    phonetic: 'magenta',
    body: 'white',
  },
  ocean: {
    title: '#5fafff',
    word: '#87d7ff',
    meaning: '#5fd7af',
    warn: '#ff8787',
    phonetic: '#af87ff',
    body: '#d0d0d0',
  },
  forest: {
    title: '#87af5f',
    word: '#d7d787',
    meaning: '#5faf5f',
    warn: '#d75f5f',
    phonetic: '#afaf87',
    body: '#c6c6c6',
  },
  amber: {
    title: '#ffaf00',
    word: '#ffd75f',
    meaning: '#ffaf5f',
    warn: '#ff5f00',
    phonetic: '#d7af87',
    body: '#ffd7af',
  },
  mono: {
    title: 'whiteBright',
    word: 'whiteBright',
    meaning: 'white',
    warn: 'whiteBright',
    phonetic: 'gray',
    body: 'white',
  },
};

// Colors of a plain shell, used by the boss overlay regardless of theme.
export const TERMINAL_THEME: Theme = {
  title: 'green',
  word: 'white',
  meaning: 'green',
  warn: 'yellow',
  phonetic: 'cyan',
  body: 'white',
};

export function isThemeName(value: unknown): value is ThemeName {
  return THEME_NAMES.some((name) => name === value);
}

export function getTheme(name: ThemeName): Theme {
  return THEMES[name];
}

export function cycleTheme(name: ThemeName): ThemeName {
  const index = THEME_NAMES.indexOf(name);
  return THEME_NAMES[(index + 1) % THEME_NAMES.length];
}
