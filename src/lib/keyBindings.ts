// Subset of Ink's `Key` flags the session reads. Ink's own `Key` is assignable.
export interface InputKey {
  upArrow?: boolean;
  downArrow?: boolean;
  leftArrow?: boolean;
  rightArrow?: boolean;
  pageUp?: boolean;
  pageDown?: boolean;
  return?: boolean;
  escape?: boolean;
  ctrl?: boolean;
  meta?: boolean;
  tab?: boolean;
  backspace?: boolean;
  delete?: boolean;
}

export type SessionAction =
  | 'learn-all'
  | 'learn-mistakes'
  | 'show-stats'
  | 'start-spelling'
  | 'start-batch'
  | 'help'
  | 'quit'
  | 'quit-view'
  | 'next'
  | 'prev'
  | 'reveal'
  | 'star'
  | 'known'
  | 'unknown'
  | 'shuffle'
  | 'spell'
  | 'ask-ai'
  | 'show-note'
  | 'hint'
  | 'submit'
  | 'erase'
  | 'line-up'
  | 'line-down'
  | 'page-up'
  | 'page-down'
  | 'home'
  | 'end'
  | 'boss-toggle'
  | 'theme-cycle';

export type BindingScope = 'global' | 'menu' | 'learning' | 'spelling' | 'viewer' | 'batch' | 'boss';

export type KeyBindings = Record<BindingScope, Readonly<Record<string, SessionAction>>>;

export const DEFAULT_KEY_BINDINGS: KeyBindings = {
  global: {
    tab: 'boss-toggle',
    'ctrl+t': 'theme-cycle',
    'ctrl+c': 'quit',
  },
  menu: {
    '1': 'learn-all',
    '2': 'learn-mistakes',
    '3': 'show-stats',
    '4': 'start-spelling',
    b: 'start-batch',
    h: 'help',
    '5': 'quit',
    q: 'quit',
  },
  learning: {
    s: 'next',
    right: 'next',
    w: 'prev',
    left: 'prev',
    p: 'reveal',
    ',': 'star',
    enter: 'known',
    space: 'known',
    x: 'unknown',
    r: 'shuffle',
    t: 'spell',
    a: 'ask-ai',
    n: 'show-note',
    h: 'help',
    '.': 'quit-view',
    escape: 'quit-view',
    q: 'quit',
  },
  // Letters are text input here; only control keys are bound.
  spelling: {
    enter: 'submit',
    backspace: 'erase',
    escape: 'quit-view',
    up: 'prev',
    down: 'next',
    'ctrl+p': 'hint',
  },
  viewer: {
    up: 'line-up',
    k: 'line-up',
    down: 'line-down',
    j: 'line-down',
    pageup: 'page-up',
    pagedown: 'page-down',
    space: 'page-down',
    g: 'home',
    G: 'end',
    escape: 'quit-view',
    q: 'quit-view',
    enter: 'quit-view',
  },
  batch: {
    escape: 'quit-view',
    q: 'quit-view',
    '.': 'quit-view',
  },
  boss: {
    tab: 'boss-toggle',
    q: 'quit',
    Q: 'quit',
    'ctrl+c': 'quit',
  },
};

/**
 * Map one Ink input event to a key name: a single character, a named key, or
 * `ctrl+<letter>`. Returns null for events that carry nothing usable.
 */
export function normalizeKey(input: string, key: InputKey): string | null {
  if (key.tab) return 'tab';
  if (key.return) return 'enter';
  if (key.escape) return 'escape';
  if (key.backspace || key.delete) return 'backspace';
  if (key.upArrow) return 'up';
  if (key.downArrow) return 'down';
  if (key.leftArrow) return 'left';
  if (key.rightArrow) return 'right';
  if (key.pageUp) return 'pageup';
  if (key.pageDown) return 'pagedown';

  if (key.ctrl) {
    return /^[a-z]$/i.test(input) ? `ctrl+${input.toLowerCase()}` : null;
  }
  if (key.meta) return null;
  if (input === ' ') return 'space';
  if (input === '\t') return 'tab';
  if (input === '\r' || input === '\n') return 'enter';

  const chars = Array.from(input);
  if (chars.length !== 1) return null;
  return /\p{C}/u.test(input) ? null : input;
}

/**
 * Like `normalizeKey`, but splits pasted text into one key per character.
 */
export function normalizeKeys(input: string, key: InputKey): string[] {
  const single = normalizeKey(input, key);
  if (single !== null) return [single];
  if (key.ctrl || key.meta || Array.from(input).length < 2) return [];
  return Array.from(input)
    .map((char) => normalizeKey(char, {}))
    .filter((name): name is string => name !== null);
}

export function resolveAction(table: KeyBindings, scope: BindingScope, key: string): SessionAction | null {
  return Object.prototype.hasOwnProperty.call(table[scope], key) ? table[scope][key] ?? null : null;
}

/**
 * Text a key contributes to a typed answer, if any.
 */
export function keyText(key: string): string | null {
  if (key === 'space') return ' ';
  return Array.from(key).length === 1 ? key : null;
}
