import type { BossStyle, LearningScope, Viewport } from '../types';
import {
  cancelBatchJob,
  completeBatchItem,
  isBatchFinished,
  nextBatchTerm,
  startBatchItem,
} from './batchNoteJob';
import type { BatchJobState, BatchOutcome } from './batchNoteJob';
import { initialBossLines, nextBossLine } from './bossOverlay';
import type { RandomSource } from './bossOverlay';
import { DEFAULT_KEY_BINDINGS, keyText, resolveAction } from './keyBindings';
import type { BindingScope, KeyBindings, SessionAction } from './keyBindings';
import type { NoteResult } from './noteAdapter';
import { wrapText } from './textLayout';
import { DEFAULT_THEME_NAME, cycleTheme } from './themes';
import type { ThemeName } from './themes';
import {
  allTerms,
  mistakeSet,
  recordJudgment,
  stats,
  toggleStar,
} from './wordStore';
import type { WordStore } from './wordStore';

export interface LearningMode {
  screen: 'learning';
  order: string[];
  cursor: number;
  reveal: boolean;
  scope: LearningScope;
  visitCounted: boolean;
}

export interface SpellingFeedback {
  correct: boolean;
  answer: string;
}

export interface SpellingMode {
  screen: 'spelling';
  order: string[];
  cursor: number;
  input: string;
  hintOn: boolean;
  feedback: SpellingFeedback | null;
  visitCounted: boolean;
  origin: LearningMode | null;
}

export interface ViewerMode {
  screen: 'viewer';
  title: string;
  text: string;
  lines: string[];
  scrollOffset: number;
  returnMode: SessionMode;
}

export interface BatchMode {
  screen: 'batch';
  // null until the plan (existence checks) has come back
  job: BatchJobState | null;
}

export interface BossMode {
  screen: 'boss';
  style: BossStyle;
  tickCount: number;
  lines: string[];
  underneath: SessionMode;
}

export type SessionMode =
  | { screen: 'menu' }
  | LearningMode
  | SpellingMode
  | ViewerMode
  | BatchMode
  | BossMode;

export interface SessionSettings {
  bossStyle: BossStyle;
  bossQuitEnabled: boolean;
  stayOnWrong: boolean;
  bossBufferSize: number;
}

export interface Session {
  store: WordStore;
  themeName: ThemeName;
  mode: SessionMode;
  settings: SessionSettings;
  viewport: Viewport;
  pending: { term: string } | null;
  notice: string | null;
}

export type SessionEvent =
  | { type: 'key'; key: string }
  | { type: 'tick' }
  | { type: 'resize'; viewport: Viewport }
  | { type: 'note-ready'; term: string; result: NoteResult }
  | { type: 'saved-note'; term: string; text: string | null }
  | { type: 'batch-planned'; job: BatchJobState }
  | { type: 'batch-item-done'; term: string; outcome: BatchOutcome };

export type SessionEffect =
  | { type: 'save-progress' }
  | { type: 'explain'; term: string }
  | { type: 'read-note'; term: string }
  | { type: 'plan-batch'; terms: string[] }
  | { type: 'batch-step'; term: string }
  | { type: 'quit' };

export interface TransitionEnv {
  random: RandomSource;
  now: () => Date;
  bindings?: KeyBindings;
}

export interface Transition {
  session: Session;
  effects: SessionEffect[];
}

interface CreateSessionOptions {
  themeName?: ThemeName;
  settings?: Partial<SessionSettings>;
  viewport?: Viewport;
}

export const DEFAULT_SESSION_SETTINGS: SessionSettings = {
  bossStyle: 'tail',
  bossQuitEnabled: false,
  stayOnWrong: false,
  bossBufferSize: 200,
};

const DEFAULT_VIEWPORT: Viewport = { rows: 24, columns: 80 };
// Title, separator and footer around the viewer body.
const VIEWER_CHROME_ROWS = 3;

export const NOTICE_ALL_REVIEWED = 'All words reviewed';
export const NOTICE_NO_WORDS = 'No words loaded. Add some to the word list first.';
export const NOTICE_NO_MISTAKES = 'The mistake list is empty.';

export function noSavedNoteNotice(term: string): string {
  return `No saved note for "${term}" yet. Press a to ask AI.`;
}

export const HELP_TEXT = [
  'Menu',
  '  1 learn all words     2 learn the mistake list',
  '  3 statistics          4 spelling drill',
  '  b batch AI notes      h help          5/q quit',
  '',
  'Learning',
  '  s/→ next   w/← previous   p reveal meaning   , star',
  '  Enter/Space known   x unknown   r shuffle   t spelling',
  '  a AI note   n saved note   h help   . back to menu   q quit',
  '',
  'Spelling',
  '  type the word, Enter to check, Backspace to erase',
  '  ↑/↓ previous/next word   Ctrl+P hint   Esc back',
  '',
  'Anywhere',
  '  Tab boss key   Ctrl+T next theme   Ctrl+C save and quit',
].join('\n');

const MENU: SessionMode = { screen: 'menu' };

export function createSession(store: WordStore, options: CreateSessionOptions = {}): Session {
  return {
    store,
    themeName: options.themeName ?? DEFAULT_THEME_NAME,
    mode: MENU,
    settings: { ...DEFAULT_SESSION_SETTINGS, ...options.settings },
    viewport: options.viewport ?? DEFAULT_VIEWPORT,
    pending: null,
    notice: null,
  };
}

export function viewerPageHeight(viewport: Viewport): number {
  return Math.max(1, viewport.rows - VIEWER_CHROME_ROWS);
}

/**
 * Spelling answers compare after NFKC folding, trimming and lower-casing.
 * Inner spaces are significant.
 */
export function normalizeAnswer(text: string): string {
  return text.normalize('NFKC').trim().toLowerCase();
}

export function shuffleOrder(order: string[], random: RandomSource): string[] {
  const next = [...order];
  for (let i = next.length - 1; i > 0; i -= 1) {
    const j = Math.min(i, Math.floor(random() * (i + 1)));
    [next[i], next[j]] = [next[j], next[i]];
  }
  return next;
}

function unchanged(session: Session): Transition {
  return { session, effects: [] };
}

function withMode(session: Session, mode: SessionMode, effects: SessionEffect[] = []): Transition {
  return { session: { ...session, mode }, effects };
}

function quitWithSave(session: Session): Transition {
  return { session, effects: [{ type: 'save-progress' }, { type: 'quit' }] };
}

function clampScroll(offset: number, lineCount: number, viewport: Viewport): number {
  const max = Math.max(0, lineCount - viewerPageHeight(viewport));
  return Math.max(0, Math.min(max, offset));
}

export function openViewer(title: string, text: string, returnMode: SessionMode, viewport: Viewport): ViewerMode {
  return {
    screen: 'viewer',
    title,
    text,
    lines: wrapText(text, Math.max(1, viewport.columns)),
    scrollOffset: 0,
    returnMode,
  };
}

function statsText(store: WordStore): string {
  const summary = stats(store);
  return [
    `Total words: ${summary.total}`,
    `Seen: ${summary.seen}`,
    `Known: ${summary.known}`,
    `Unknown: ${summary.unknown}`,
    `Starred: ${summary.starred}`,
    `Mistake list: ${mistakeSet(store).length}`,
  ].join('\n');
}

function startLearning(session: Session, scope: LearningScope): Transition {
  const order = scope === 'all' ? allTerms(session.store) : mistakeSet(session.store);
  if (order.length === 0) {
    return unchanged({ ...session, notice: scope === 'all' ? NOTICE_NO_WORDS : NOTICE_NO_MISTAKES });
  }
  return withMode(session, { screen: 'learning', order, cursor: 0, reveal: false, scope, visitCounted: false });
}

function startSpelling(session: Session, order: string[], cursor: number, origin: LearningMode | null): Transition {
  if (order.length === 0) {
    return unchanged({ ...session, notice: NOTICE_NO_WORDS });
  }
  return withMode(session, {
    screen: 'spelling',
    order,
    cursor,
    input: '',
    hintOn: false,
    feedback: null,
    visitCounted: origin?.visitCounted ?? false,
    origin,
  });
}

// Moves wrap in both directions; passing the last term raises a notice.
function step(cursor: number, length: number, delta: 1 | -1): { cursor: number; wrapped: boolean } {
  const next = cursor + delta;
  if (next >= length) return { cursor: 0, wrapped: true };
  if (next < 0) return { cursor: length - 1, wrapped: false };
  return { cursor: next, wrapped: false };
}

function reduceMenu(session: Session, action: SessionAction): Transition {
  switch (action) {
    case 'learn-all':
      return startLearning(session, 'all');
    case 'learn-mistakes':
      return startLearning(session, 'mistakes');
    case 'start-spelling':
      return startSpelling(session, allTerms(session.store), 0, null);
    case 'show-stats':
      return withMode(session, openViewer('Statistics', statsText(session.store), MENU, session.viewport));
    case 'help':
      return withMode(session, openViewer('Help', HELP_TEXT, MENU, session.viewport));
    case 'start-batch': {
      const terms = mistakeSet(session.store);
      if (terms.length === 0) {
        return unchanged({ ...session, notice: NOTICE_NO_MISTAKES });
      }
      return withMode(session, { screen: 'batch', job: null }, [{ type: 'plan-batch', terms }]);
    }
    case 'quit':
      return quitWithSave(session);
    default:
      return unchanged(session);
  }
}

function judge(session: Session, term: string, correct: boolean, visitCounted: boolean): WordStore {
  return recordJudgment(session.store, term, correct ? 'known' : 'unknown', { countSeen: !visitCounted });
}

function reduceLearning(session: Session, mode: LearningMode, action: SessionAction, env: TransitionEnv): Transition {
  const term = mode.order[mode.cursor];
  if (term === undefined) return withMode(session, MENU);

  switch (action) {
    case 'next':
    case 'prev': {
      const moved = step(mode.cursor, mode.order.length, action === 'next' ? 1 : -1);
      return withMode(
        { ...session, notice: moved.wrapped ? NOTICE_ALL_REVIEWED : session.notice },
        { ...mode, cursor: moved.cursor, reveal: false, visitCounted: false }
      );
    }
    case 'reveal':
      return withMode(session, { ...mode, reveal: !mode.reveal });
    case 'star':
      return {
        session: { ...session, store: toggleStar(session.store, term) },
        effects: [{ type: 'save-progress' }],
      };
    case 'known':
    case 'unknown':
      return {
        session: {
          ...session,
          store: judge(session, term, action === 'known', mode.visitCounted),
          mode: { ...mode, visitCounted: true },
        },
        effects: [{ type: 'save-progress' }],
      };
    case 'shuffle': {
      if (mode.order.length <= 1) return unchanged(session);
      const order = shuffleOrder(mode.order, env.random);
      return withMode(session, { ...mode, order, cursor: order.indexOf(term) });
    }
    case 'spell':
      return startSpelling(session, mode.order, mode.cursor, mode);
    case 'ask-ai':
      return { session: { ...session, pending: { term } }, effects: [{ type: 'explain', term }] };
    case 'show-note':
      return { session: { ...session, pending: { term } }, effects: [{ type: 'read-note', term }] };
    case 'help':
      return withMode(session, openViewer('Help', HELP_TEXT, mode, session.viewport));
    case 'quit-view':
      return withMode(session, MENU);
    case 'quit':
      return quitWithSave(session);
    default:
      return unchanged(session);
  }
}

function reduceSpelling(
  session: Session,
  mode: SpellingMode,
  action: SessionAction | null,
  key: string
): Transition {
  const term = mode.order[mode.cursor];
  if (term === undefined) return withMode(session, MENU);

  if (action === null) {
    const text = keyText(key);
    return text === null ? unchanged(session) : withMode(session, { ...mode, input: mode.input + text });
  }

  switch (action) {
    case 'erase':
      return withMode(session, { ...mode, input: Array.from(mode.input).slice(0, -1).join('') });
    case 'hint':
      return withMode(session, { ...mode, hintOn: !mode.hintOn });
    case 'next':
    case 'prev': {
      const moved = step(mode.cursor, mode.order.length, action === 'next' ? 1 : -1);
      return withMode(
        { ...session, notice: moved.wrapped ? NOTICE_ALL_REVIEWED : session.notice },
        { ...mode, cursor: moved.cursor, input: '', feedback: null, visitCounted: false }
      );
    }
    case 'submit': {
      const correct = normalizeAnswer(mode.input) === normalizeAnswer(term);
      const store = judge(session, term, correct, mode.visitCounted);
      const judged: SpellingMode = { ...mode, input: '', feedback: { correct, answer: term }, visitCounted: true };
      const effects: SessionEffect[] = [{ type: 'save-progress' }];
      if (!correct && session.settings.stayOnWrong) {
        return { session: { ...session, store, mode: judged }, effects };
      }
      const moved = step(mode.cursor, mode.order.length, 1);
      return {
        session: {
          ...session,
          store,
          notice: moved.wrapped ? NOTICE_ALL_REVIEWED : session.notice,
          mode: { ...judged, cursor: moved.cursor, visitCounted: false },
        },
        effects,
      };
    }
    case 'quit-view':
      if (!mode.origin) return withMode(session, MENU);
      return withMode(session, {
        ...mode.origin,
        order: mode.order,
        cursor: mode.cursor,
        reveal: false,
        visitCounted: mode.visitCounted,
      });
    default:
      return unchanged(session);
  }
}

function reduceViewer(session: Session, mode: ViewerMode, action: SessionAction): Transition {
  const page = viewerPageHeight(session.viewport);
  const scrollTo = (offset: number) =>
    withMode(session, { ...mode, scrollOffset: clampScroll(offset, mode.lines.length, session.viewport) });

  switch (action) {
    case 'line-up':
      return scrollTo(mode.scrollOffset - 1);
    case 'line-down':
      return scrollTo(mode.scrollOffset + 1);
    case 'page-up':
      return scrollTo(mode.scrollOffset - page);
    case 'page-down':
      return scrollTo(mode.scrollOffset + page);
    case 'home':
      return scrollTo(0);
    case 'end':
      return scrollTo(mode.lines.length);
    case 'quit-view':
      return withMode(session, mode.returnMode);
    default:
      return unchanged(session);
  }
}

function reduceBatch(session: Session, mode: BatchMode, action: SessionAction): Transition {
  if (action !== 'quit-view') return unchanged(session);
  if (!mode.job) return withMode(session, MENU);
  const job = cancelBatchJob(mode.job);
  return isBatchFinished(job) ? withMode(session, MENU) : withMode(session, { ...mode, job });
}

function reduceBoss(session: Session, mode: BossMode, action: SessionAction | null): Transition {
  if (action === 'boss-toggle') return withMode(session, mode.underneath);
  if (action === 'quit' && session.settings.bossQuitEnabled) return quitWithSave(session);
  return unchanged(session);
}

function enterBoss(session: Session, env: TransitionEnv): Transition {
  const { bossStyle, bossBufferSize } = session.settings;
  const count = Math.max(5, Math.min(session.viewport.rows - 2, 60));
  const lines = initialBossLines(bossStyle, env.now(), env.random, count).slice(-bossBufferSize);
  return withMode(session, { screen: 'boss', style: bossStyle, tickCount: 0, lines, underneath: session.mode });
}

function bindingScope(mode: SessionMode): BindingScope {
  return mode.screen;
}

function reduceKey(session: Session, key: string, env: TransitionEnv): Transition {
  if (session.pending) return unchanged(session);
  const bindings = env.bindings ?? DEFAULT_KEY_BINDINGS;
  const mode = session.mode;
  const action = resolveAction(bindings, bindingScope(mode), key);

  if (mode.screen === 'boss') {
    return reduceBoss(session, mode, action);
  }

  const cleared: Session = session.notice === null ? session : { ...session, notice: null };
  const globalAction = resolveAction(bindings, 'global', key);
  switch (globalAction) {
    case 'boss-toggle':
      return enterBoss(cleared, env);
    case 'theme-cycle':
      return unchanged({ ...cleared, themeName: cycleTheme(cleared.themeName) });
    case 'quit':
      return quitWithSave(cleared);
    default:
      break;
  }

  if (mode.screen === 'spelling') {
    return reduceSpelling(cleared, mode, action, key);
  }
  if (action === null) return unchanged(cleared);

  switch (mode.screen) {
    case 'menu':
      return reduceMenu(cleared, action);
    case 'learning':
      return reduceLearning(cleared, mode, action, env);
    case 'viewer':
      return reduceViewer(cleared, mode, action);
    case 'batch':
      return reduceBatch(cleared, mode, action);
    default:
      return unchanged(cleared);
  }
}

function reduceTick(session: Session, env: TransitionEnv): Transition {
  const mode = session.mode;
  if (mode.screen !== 'boss') return unchanged(session);
  const tickCount = mode.tickCount + 1;
  const line = nextBossLine(mode.style, tickCount, env.now(), env.random);
  const lines = [...mode.lines, line].slice(-session.settings.bossBufferSize);
  return withMode(session, { ...mode, tickCount, lines });
}

// Viewers re-wrap to the new width, including one covered by the boss overlay.
function fitMode(mode: SessionMode, viewport: Viewport): SessionMode {
  if (mode.screen === 'boss') return { ...mode, underneath: fitMode(mode.underneath, viewport) };
  if (mode.screen !== 'viewer') return mode;
  const lines = wrapText(mode.text, Math.max(1, viewport.columns));
  return { ...mode, lines, scrollOffset: clampScroll(mode.scrollOffset, lines.length, viewport) };
}

function reduceResize(session: Session, viewport: Viewport): Transition {
  return withMode({ ...session, viewport }, fitMode(session.mode, viewport));
}

function reduceNoteReady(session: Session, term: string, result: NoteResult): Transition {
  if (session.pending?.term !== term) return unchanged(session);
  const viewer = result.ok
    ? openViewer(`AI note: ${term}`, result.text, session.mode, session.viewport)
    : openViewer(
      `AI note failed: ${term}`,
      `Error (${result.error.kind}): ${result.error.message}`,
      session.mode,
      session.viewport
    );
  return withMode({ ...session, pending: null }, viewer);
}

function reduceSavedNote(session: Session, term: string, text: string | null): Transition {
  if (session.pending?.term !== term) return unchanged(session);
  const settled: Session = { ...session, pending: null };
  if (text === null) {
    return unchanged({ ...settled, notice: noSavedNoteNotice(term) });
  }
  return withMode(settled, openViewer(`Saved note: ${term}`, text, session.mode, session.viewport));
}

// The batch screen may be covered by the boss overlay; updates apply underneath.
function updateBatch(
  session: Session,
  update: (mode: BatchMode) => { mode: SessionMode; effects: SessionEffect[] }
): Transition {
  const mode = session.mode;
  if (mode.screen === 'batch') {
    const result = update(mode);
    return withMode(session, result.mode, result.effects);
  }
  if (mode.screen === 'boss' && mode.underneath.screen === 'batch') {
    const result = update(mode.underneath);
    return withMode(session, { ...mode, underneath: result.mode }, result.effects);
  }
  return unchanged(session);
}

function advanceBatch(job: BatchJobState): { mode: SessionMode; effects: SessionEffect[] } {
  const term = nextBatchTerm(job);
  if (term !== null) {
    return { mode: { screen: 'batch', job: startBatchItem(job, term) }, effects: [{ type: 'batch-step', term }] };
  }
  if (job.cancelled && isBatchFinished(job)) {
    return { mode: MENU, effects: [] };
  }
  return { mode: { screen: 'batch', job }, effects: [] };
}

/**
 * Pure session transition. Side effects are returned for the host to run;
 * their results come back as later events.
 */
export function reduceSession(session: Session, event: SessionEvent, env: TransitionEnv): Transition {
  switch (event.type) {
    case 'key':
      return reduceKey(session, event.key, env);
    case 'tick':
      return reduceTick(session, env);
    case 'resize':
      return reduceResize(session, event.viewport);
    case 'note-ready':
      return reduceNoteReady(session, event.term, event.result);
    case 'saved-note':
      return reduceSavedNote(session, event.term, event.text);
    case 'batch-planned':
      return updateBatch(session, (mode) => (mode.job ? { mode, effects: [] } : advanceBatch(event.job)));
    case 'batch-item-done':
      return updateBatch(session, (mode) =>
        mode.job ? advanceBatch(completeBatchItem(mode.job, event.term, event.outcome)) : { mode, effects: [] }
      );
    default:
      return unchanged(session);
  }
}
