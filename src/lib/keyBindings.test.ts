import { describe, expect, it } from 'vitest';
import { DEFAULT_KEY_BINDINGS, keyText, normalizeKey, normalizeKeys, resolveAction } from './keyBindings';

describe('keyBindings', () => {
  describe('normalizeKey', () => {
    it('names special keys', () => {
      expect(normalizeKey('', { tab: true })).toBe('tab');
      expect(normalizeKey('\r', { return: true })).toBe('enter');
      expect(normalizeKey('', { escape: true, meta: true })).toBe('escape');
      expect(normalizeKey('', { delete: true })).toBe('backspace');
      expect(normalizeKey('', { backspace: true })).toBe('backspace');
      expect(normalizeKey('', { upArrow: true })).toBe('up');
      expect(normalizeKey('', { pageDown: true })).toBe('pagedown');
    });

    it('names control chords by their letter', () => {
      expect(normalizeKey('t', { ctrl: true })).toBe('ctrl+t');
      expect(normalizeKey('P', { ctrl: true })).toBe('ctrl+p');
      expect(normalizeKey('1', { ctrl: true })).toBeNull();
    });

    it('keeps printable characters and drops the rest', () => {
      expect(normalizeKey('a', {})).toBe('a');
      expect(normalizeKey('é', {})).toBe('é');
      expect(normalizeKey(' ', {})).toBe('space');
      expect(normalizeKey('\u0007', {})).toBeNull();
      expect(normalizeKey('x', { meta: true })).toBeNull();
      expect(normalizeKey('', {})).toBeNull();
    });
  });

  it('splits pasted text into single keys', () => {
    expect(normalizeKeys('ba na', {})).toEqual(['b', 'a', 'space', 'n', 'a']);
    expect(normalizeKeys('q', {})).toEqual(['q']);
    expect(normalizeKeys('ab', { meta: true })).toEqual([]);
  });

  it('resolves actions per scope', () => {
    expect(resolveAction(DEFAULT_KEY_BINDINGS, 'menu', '1')).toBe('learn-all');
    expect(resolveAction(DEFAULT_KEY_BINDINGS, 'learning', 'x')).toBe('unknown');
    expect(resolveAction(DEFAULT_KEY_BINDINGS, 'spelling', 'x')).toBeNull();
    expect(resolveAction(DEFAULT_KEY_BINDINGS, 'global', 'ctrl+t')).toBe('theme-cycle');
    expect(resolveAction(DEFAULT_KEY_BINDINGS, 'menu', 'toString')).toBeNull();
  });

  it('returns the text a key types', () => {
    expect(keyText('a')).toBe('a');
    expect(keyText('space')).toBe(' ');
    expect(keyText('enter')).toBeNull();
  });

  it('only binds key names that Ink input can produce', () => {
    const producible = /^(?:.|enter|space|escape|backspace|tab|up|down|left|right|pageup|pagedown|ctrl\+[a-z])$/u;
    const unreachable = Object.values(DEFAULT_KEY_BINDINGS)
      .flatMap((table) => Object.keys(table))
      .filter((name) => !producible.test(name));
    expect(unreachable).toEqual([]);
  });
});
