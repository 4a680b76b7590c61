import { describe, expect, it } from 'vitest';
import type { WordEntry } from '../types';
import { createBatchJob } from './batchNoteJob';
import { GenerationError } from './errors';
import {
  NOTICE_ALL_REVIEWED,
  NOTICE_NO_MISTAKES,
  NOTICE_NO_WORDS,
  createSession,
  noSavedNoteNotice,
  normalizeAnswer,
  reduceSession,
  shuffleOrder,
} from './sessionState';
import type {
  Session,
  SessionEffect,
  SessionEvent,
  SessionMode,
  SessionSettings,
  TransitionEnv,
} from './sessionState';
import { createWordStore, getProgress, mistakeSet, stats } from './wordStore';

const WORDS: WordEntry[] = [
  { term: 'apple', meaning: '苹果' },
  { term: 'banana', meaning: '香蕉' },
];

const NOW = new Date(2024, 0, 5, 9, 3, 7);
const ENV: TransitionEnv = { random: () => 0, now: () => NOW };

type Screen = SessionMode['screen'];

function isScreen<S extends Screen>(mode: SessionMode, screen: S): mode is Extract<SessionMode, { screen: S }> {
  return mode.screen === screen;
}

function modeOf<S extends Screen>(session: Session, screen: S): Extract<SessionMode, { screen: S }> {
  const mode = session.mode;
  if (!isScreen(mode, screen)) {
    throw new Error(`expected ${screen}, got ${mode.screen}`);
  }
  return mode;
}

function run(session: Session, inputs: Array<string | SessionEvent>, env: TransitionEnv = ENV) {
  let current = session;
  const effects: SessionEffect[] = [];
  for (const input of inputs) {
    const event: SessionEvent = typeof input === 'string' ? { type: 'key', key: input } : input;
    const transition = reduceSession(current, event, env);
    current = transition.session;
    effects.push(...transition.effects);
  }
  return { session: current, effects };
}

function fresh(entries: WordEntry[] = WORDS, settings: Partial<SessionSettings> = {}): Session {
  return createSession(createWordStore(entries), { settings });
}

function withMistakes(): Session {
  return createSession(createWordStore(WORDS, {
    apple: { seen: 1, known: 0, unknown: 1, starred: false },
    banana: { seen: 0, known: 0, unknown: 0, starred: true },
  }));
}

describe('sessionState', () => {
  describe('menu', () => {
    it('starts in the menu with the default theme', () => {
      const session = fresh();
      expect(session.mode).toEqual({ screen: 'menu' });
      expect(session.themeName).toBe('classic');
    });

    it('stays in the menu with a notice when there is nothing to learn', () => {
      expect(run(fresh([]), ['1']).session.notice).toBe(NOTICE_NO_WORDS);
      expect(run(fresh([]), ['4']).session.notice).toBe(NOTICE_NO_WORDS);

      const mistakes = run(fresh(), ['2']).session;
      expect(mistakes.mode.screen).toBe('menu');
      expect(mistakes.notice).toBe(NOTICE_NO_MISTAKES);
    });

    it('learns only the mistake list', () => {
      const learning = modeOf(run(withMistakes(), ['2']).session, 'learning');
      expect(learning.order).toEqual(['apple', 'banana']);
      expect(learning.scope).toBe('mistakes');
    });

    it('shows statistics in a viewer that returns to the menu', () => {
      const { session } = run(fresh(), ['3']);
      const viewer = modeOf(session, 'viewer');
      expect(viewer.title).toBe('Statistics');
      expect(viewer.lines[0]).toBe('Total words: 2');
      expect(run(session, ['escape']).session.mode).toEqual({ screen: 'menu' });
    });

    it('saves and quits', () => {
      expect(run(fresh(), ['q']).effects).toEqual([{ type: 'save-progress' }, { type: 'quit' }]);
      expect(run(fresh(), ['5']).effects).toEqual([{ type: 'save-progress' }, { type: 'quit' }]);
    });

    it('ignores keys with no binding', () => {
      const session = fresh();
      expect(reduceSession(session, { type: 'key', key: 'z' }, ENV)).toEqual({ session, effects: [] });
    });
  });

  describe('learning', () => {
    it('matches the known/unknown/wrap scenario', () => {
      const { session } = run(fresh(), ['1', 'enter', 's', 'x', 's']);

      expect(stats(session.store)).toEqual({ total: 2, seen: 2, known: 1, unknown: 1, starred: 0 });
      expect(modeOf(session, 'learning').cursor).toBe(0);
      expect(session.notice).toBe(NOTICE_ALL_REVIEWED);
    });

    it('counts seen once per visit while judgments keep adding up', () => {
      let { session } = run(fresh(), ['1', 'enter', 'enter', 'x']);
      expect(getProgress(session.store, 'apple')).toEqual({ seen: 1, known: 2, unknown: 1, starred: false });

      session = run(session, ['s', 'w', 'enter']).session;
      expect(getProgress(session.store, 'apple')).toEqual({ seen: 2, known: 3, unknown: 1, starred: false });
    });

    it('keeps the cursor on judgments and asks for a save', () => {
      const start = run(fresh(), ['1']).session;
      const { session, effects } = run(start, ['x']);
      expect(modeOf(session, 'learning').cursor).toBe(0);
      expect(effects).toEqual([{ type: 'save-progress' }]);
    });

    it('wraps backwards without a notice and hides the meaning on move', () => {
      const { session } = run(fresh(), ['1', 'p', 'w']);
      const learning = modeOf(session, 'learning');
      expect(learning.cursor).toBe(1);
      expect(learning.reveal).toBe(false);
      expect(session.notice).toBeNull();
    });

    it('clears a notice on the next key', () => {
      const { session } = run(fresh(), ['1', 's', 's', 'p']);
      expect(session.notice).toBeNull();
    });

    it('shuffles the order while keeping the current term under the cursor', () => {
      const entries = ['a', 'b', 'c', 'd', 'e'].map((term) => ({ term, meaning: term.toUpperCase() }));
      const { session } = run(fresh(entries), ['1', 's', 's', 'r']);
      const learning = modeOf(session, 'learning');

      expect(learning.order).toEqual(['b', 'c', 'd', 'e', 'a']);
      expect(learning.order[learning.cursor]).toBe('c');
    });

    it('keeps the mistake set in step with stars and judgments', () => {
      const entries = [...WORDS, { term: 'cherry', meaning: '樱桃' }];
      const { session } = run(fresh(entries), ['1', ',', 's', 'x', 's', ',', ',', 'w', 'enter', 's', 'w', 'w', 'x', ',']);

      const expected = entries
        .map((entry) => entry.term)
        .filter((term) => {
          const progress = getProgress(session.store, term);
          return progress.starred || progress.unknown > 0;
        });
      expect(mistakeSet(session.store)).toEqual(expected);
      expect(expected).toEqual(['apple', 'banana']);
    });

    it('returns to the menu and quits with a save', () => {
      expect(run(fresh(), ['1', '.']).session.mode).toEqual({ screen: 'menu' });
      expect(run(fresh(), ['1', 'ctrl+c']).effects).toEqual([{ type: 'save-progress' }, { type: 'quit' }]);
    });
  });

  describe('spelling', () => {
    it('judges "banama" as wrong, records it and clears the input', () => {
      const { session, effects } = run(fresh(), ['4', 'down', 'b', 'a', 'n', 'a', 'm', 'a', 'enter']);
      const spelling = modeOf(session, 'spelling');

      expect(getProgress(session.store, 'banana')).toEqual({ seen: 1, known: 0, unknown: 1, starred: false });
      expect(spelling.input).toBe('');
      expect(spelling.feedback).toEqual({ correct: false, answer: 'banana' });
      expect(spelling.cursor).toBe(0);
      expect(effects).toEqual([{ type: 'save-progress' }]);
    });

    it('stays on a wrong answer when configured to', () => {
      const { session } = run(fresh(WORDS, { stayOnWrong: true }), ['4', 'down', 'x', 'enter', 'y', 'enter']);

      expect(modeOf(session, 'spelling').cursor).toBe(1);
      expect(getProgress(session.store, 'banana')).toEqual({ seen: 1, known: 0, unknown: 2, starred: false });
    });

    it('accepts answers that differ only in case and surrounding spaces', () => {
      const { session } = run(fresh(), ['4', 'space', 'A', 'P', 'P', 'L', 'E', 'space', 'enter']);

      expect(getProgress(session.store, 'apple').known).toBe(1);
      expect(modeOf(session, 'spelling').cursor).toBe(1);
    });

    it('treats letters as text and erases with backspace', () => {
      const { session, effects } = run(fresh(), ['4', 'q', 's', 'backspace']);
      expect(modeOf(session, 'spelling').input).toBe('q');
      expect(effects).toEqual([]);
    });

    it('toggles the hint without scoring', () => {
      const { session } = run(fresh(), ['4', 'ctrl+p']);
      expect(modeOf(session, 'spelling').hintOn).toBe(true);
      expect(stats(session.store).seen).toBe(0);
    });

    it('returns to the learning view it came from at the spelling cursor', () => {
      const { session } = run(fresh(), ['1', 't', 'down', 'escape']);
      const learning = modeOf(session, 'learning');
      expect(learning.cursor).toBe(1);
      expect(learning.scope).toBe('all');
    });

    it('returns to the menu when started from the menu', () => {
      expect(run(fresh(), ['4', 'escape']).session.mode).toEqual({ screen: 'menu' });
    });

    it('still cycles the theme with a control chord', () => {
      const { session } = run(fresh(), ['4', 'a', 'ctrl+t']);
      expect(session.themeName).toBe('ocean');
      expect(modeOf(session, 'spelling').input).toBe('a');
    });
  });

  it('normalizes answers with NFKC, trimming and lower case', () => {
    expect(normalizeAnswer('  ＢＡＮＡＮＡ ')).toBe('banana');
    expect(normalizeAnswer('ice cream')).not.toBe(normalizeAnswer('icecream'));
  });

  it('shuffles with Fisher-Yates using the injected random source', () => {
    expect(shuffleOrder(['a', 'b', 'c'], () => 0)).toEqual(['b', 'c', 'a']);
    expect(shuffleOrder(['a', 'b', 'c'], () => 0.999)).toEqual(['a', 'b', 'c']);
  });

  it('comes back to the original theme after cycling through all five', () => {
    expect(run(fresh(), ['ctrl+t']).session.themeName).toBe('ocean');
    expect(run(fresh(), ['ctrl+t', 'ctrl+t', 'ctrl+t', 'ctrl+t', 'ctrl+t']).session.themeName).toBe('classic');
  });

  describe('boss overlay', () => {
    it('restores the exact prior mode', () => {
      const before = run(fresh(), ['1', 's', 'p']).session;
      const boss = run(before, ['tab']).session;
      const overlay = modeOf(boss, 'boss');

      expect(overlay.underneath).toBe(before.mode);
      expect(overlay.lines).toHaveLength(22);
      expect(run(boss, ['x', 's', 'ctrl+t']).session).toBe(boss);
      expect(run(boss, ['tab']).session.mode).toBe(before.mode);
    });

    it('appends a fresh line per tick and keeps only the buffer', () => {
      const boss = run(fresh(WORDS, { bossBufferSize: 3 }), ['tab']).session;
      expect(modeOf(boss, 'boss').lines).toHaveLength(3);

      const ticked = modeOf(run(boss, [{ type: 'tick' }]).session, 'boss');
      expect(ticked.tickCount).toBe(1);
      expect(ticked.lines).toHaveLength(3);
      expect(ticked.lines[2]).toBe('[2024-01-05 09:03:07] INFO: Application started successfully');
    });

    it('quits from the overlay only when enabled', () => {
      expect(run(fresh(), ['tab', 'q']).effects).toEqual([]);
      expect(run(fresh(WORDS, { bossQuitEnabled: true }), ['tab', 'q']).effects).toEqual([
        { type: 'save-progress' },
        { type: 'quit' },
      ]);
    });

    it('ignores ticks outside the overlay', () => {
      const session = fresh();
      expect(reduceSession(session, { type: 'tick' }, ENV).session).toBe(session);
    });
  });

  describe('viewer', () => {
    it('clamps scrolling to the last page', () => {
      const start = createSession(createWordStore(WORDS), { viewport: { rows: 6, columns: 80 } });
      const offset = (keys: string[]) => modeOf(run(start, ['3', ...keys]).session, 'viewer').scrollOffset;

      expect(offset(['G'])).toBe(3);
      expect(offset(['G', 'down'])).toBe(3);
      expect(offset(['G', 'g', 'up'])).toBe(0);
      expect(offset(['pagedown'])).toBe(3);
      expect(offset(['pagedown', 'pageup'])).toBe(0);
      expect(offset(['down', 'down'])).toBe(2);
    });

    it('re-clamps when the terminal grows', () => {
      const start = createSession(createWordStore(WORDS), { viewport: { rows: 6, columns: 80 } });
      const { session } = run(start, ['3', 'G', { type: 'resize', viewport: { rows: 24, columns: 80 } }]);
      expect(modeOf(session, 'viewer').scrollOffset).toBe(0);
      expect(session.viewport).toEqual({ rows: 24, columns: 80 });
    });

    it('re-wraps a viewer hidden under the boss screen', () => {
      const start = createSession(createWordStore(WORDS), { viewport: { rows: 6, columns: 80 } });
      const hidden = run(start, ['3', 'G', 'tab', { type: 'resize', viewport: { rows: 24, columns: 10 } }]).session;
      const underneath = modeOf(hidden, 'boss').underneath;
      expect(underneath.screen === 'viewer' ? underneath.lines.slice(0, 2) : null).toEqual(['Total', 'words: 2']);

      const restored = run(hidden, ['tab']).session;
      expect(modeOf(restored, 'viewer').scrollOffset).toBe(0);
    });
  });

  describe('AI note requests', () => {
    it('blocks keys while a request is pending and shows the note', () => {
      const asked = run(fresh(), ['1', 'a']);
      expect(asked.effects).toEqual([{ type: 'explain', term: 'apple' }]);
      expect(asked.session.pending).toEqual({ term: 'apple' });
      expect(run(asked.session, ['s', 'tab']).session).toBe(asked.session);

      const learningMode = asked.session.mode;
      const { session } = run(asked.session, [
        { type: 'note-ready', term: 'apple', result: { ok: true, text: '# apple\nA fruit.' } },
      ]);
      const viewer = modeOf(session, 'viewer');
      expect(session.pending).toBeNull();
      expect(viewer.title).toBe('AI note: apple');
      expect(viewer.lines).toEqual(['# apple', 'A fruit.']);
      expect(run(session, ['escape']).session.mode).toBe(learningMode);
    });

    it('renders a failure in the viewer and returns to learning', () => {
      const asked = run(fresh(), ['1', 'a']).session;
      const error = new GenerationError('timeout', 'Note generation timed out');
      const { session } = run(asked, [{ type: 'note-ready', term: 'apple', result: { ok: false, error } }]);

      expect(modeOf(session, 'viewer').lines).toEqual(['Error (timeout): Note generation timed out']);
      expect(run(session, ['escape']).session.mode.screen).toBe('learning');
    });

    it('ignores a note for a term that was not requested', () => {
      const asked = run(fresh(), ['1', 'a']).session;
      const next = reduceSession(asked, { type: 'note-ready', term: 'banana', result: { ok: true, text: 'x' } }, ENV);
      expect(next.session).toBe(asked);
    });

    it('opens the saved note of the current word', () => {
      const asked = run(fresh(), ['1', 'n']);
      expect(asked.effects).toEqual([{ type: 'read-note', term: 'apple' }]);
      expect(asked.session.pending).toEqual({ term: 'apple' });

      const { session } = run(asked.session, [{ type: 'saved-note', term: 'apple', text: '# apple\nSaved.' }]);
      const viewer = modeOf(session, 'viewer');
      expect(session.pending).toBeNull();
      expect(viewer.title).toBe('Saved note: apple');
      expect(viewer.lines).toEqual(['# apple', 'Saved.']);
      expect(run(session, ['escape']).session.mode.screen).toBe('learning');
    });

    it('stays on the card with a notice when no note is saved', () => {
      const asked = run(fresh(), ['1', 'n']).session;
      const { session } = run(asked, [{ type: 'saved-note', term: 'apple', text: null }]);
      expect(session.pending).toBeNull();
      expect(session.notice).toBe('No saved note for "apple" yet. Press a to ask AI.');
      expect(session.notice).toBe(noSavedNoteNotice('apple'));
      expect(modeOf(session, 'learning').cursor).toBe(0);
    });
  });

  describe('batch job', () => {
    it('refuses to start without mistakes', () => {
      const { session, effects } = run(fresh(), ['b']);
      expect(session.notice).toBe(NOTICE_NO_MISTAKES);
      expect(effects).toEqual([]);
    });

    it('plans, steps through each item and stays on the summary', () => {
      const started = run(withMistakes(), ['b']);
      expect(started.effects).toEqual([{ type: 'plan-batch', terms: ['apple', 'banana'] }]);
      expect(modeOf(started.session, 'batch').job).toBeNull();

      const planned = run(started.session, [{ type: 'batch-planned', job: createBatchJob(['apple', 'banana']) }]);
      expect(planned.effects).toEqual([{ type: 'batch-step', term: 'apple' }]);
      expect(modeOf(planned.session, 'batch').job?.inFlight).toBe('apple');

      const done = run(planned.session, [
        { type: 'batch-item-done', term: 'apple', outcome: { ok: true } },
        { type: 'batch-item-done', term: 'banana', outcome: { ok: false, kind: 'provider', message: 'no entry' } },
      ]);
      expect(done.effects).toEqual([{ type: 'batch-step', term: 'banana' }]);
      const job = modeOf(done.session, 'batch').job;
      expect(job?.completed).toBe(1);
      expect(job?.failed).toBe(1);
      expect(job?.logLines).toEqual(['✓ apple saved', '✗ banana: provider no entry']);

      expect(run(done.session, ['escape']).session.mode).toEqual({ screen: 'menu' });
    });

    it('cancels after the item in flight and then returns to the menu', () => {
      const planned = run(withMistakes(), ['b', { type: 'batch-planned', job: createBatchJob(['apple', 'banana']) }]);
      const cancelling = run(planned.session, ['escape']).session;
      const job = modeOf(cancelling, 'batch').job;
      expect(job?.cancelled).toBe(true);
      expect(job?.logLines).toEqual(['Cancelling after apple…']);

      const finished = run(cancelling, [{ type: 'batch-item-done', term: 'apple', outcome: { ok: true } }]);
      expect(finished.session.mode).toEqual({ screen: 'menu' });
      expect(finished.effects).toEqual([]);
    });

    it('leaves immediately while still planning', () => {
      const { session } = run(withMistakes(), ['b', 'escape', { type: 'batch-planned', job: createBatchJob(['apple']) }]);
      expect(session.mode).toEqual({ screen: 'menu' });
    });

    it('keeps working underneath the boss overlay', () => {
      const planned = run(withMistakes(), ['b', { type: 'batch-planned', job: createBatchJob(['apple', 'banana']) }, 'tab']);
      const { session, effects } = run(planned.session, [
        { type: 'batch-item-done', term: 'apple', outcome: { ok: true } },
      ]);

      expect(effects).toEqual([{ type: 'batch-step', term: 'banana' }]);
      const underneath = modeOf(session, 'boss').underneath;
      expect(underneath.screen === 'batch' ? underneath.job?.inFlight : null).toBe('banana');
      expect(run(session, ['tab']).session.mode.screen).toBe('batch');
    });
  });
});
