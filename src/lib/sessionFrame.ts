import type { Theme, ThemeSlot, Viewport } from '../types';
import { batchProgress, isBatchFinished } from './batchNoteJob';
import type { BatchJobState } from './batchNoteJob';
import { BOSS_PROMPT, bossHeader, bossLineSlot } from './bossOverlay';
import { viewerPageHeight } from './sessionState';
import type {
  BatchMode,
  BossMode,
  LearningMode,
  Session,
  SpellingMode,
  ViewerMode,
} from './sessionState';
import { truncateLine, wrapText } from './textLayout';
import { TERMINAL_THEME, getTheme } from './themes';
import { getEntry, getProgress, stats } from './wordStore';
import type { WordStore } from './wordStore';

export type FrameAlign = 'left' | 'center';

export interface FrameLine {
  text: string;
  slot: ThemeSlot;
  align: FrameAlign;
  bold: boolean;
}

export interface Frame {
  palette: Theme;
  lines: FrameLine[];
}

type LineStyle = Partial<Pick<FrameLine, 'align' | 'bold'>>;

function line(text: string, slot: ThemeSlot = 'body', style: LineStyle = {}): FrameLine {
  return { text, slot, align: style.align ?? 'left', bold: style.bold ?? false };
}

const BLANK = line('');

const MENU_OPTIONS = [
  '1. Learn all words',
  '2. Learn the mistake list',
  '3. Statistics',
  '4. Spelling drill',
  'b. Batch AI notes for the mistake list',
  'h. Help',
  '5. Quit',
];

function progressBar(fraction: number, width: number): string {
  const filled = Math.round(Math.max(0, Math.min(1, fraction)) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`;
}

function menuLines(session: Session): FrameLine[] {
  const summary = stats(session.store);
  return [
    line('Word Trainer', 'title', { align: 'center', bold: true }),
    BLANK,
    ...MENU_OPTIONS.map((option) => line(`  ${option}`)),
    BLANK,
    line(`${summary.total} words · ${summary.seen} seen · ${summary.known} known · ${summary.unknown} unknown · ${summary.starred} starred`, 'phonetic'),
    line(`Theme: ${session.themeName}`, 'phonetic'),
  ];
}

function progressSummary(store: WordStore, term: string): string {
  const progress = getProgress(store, term);
  const star = progress.starred ? ' · ★ starred' : '';
  return `seen ${progress.seen} · known ${progress.known} · unknown ${progress.unknown}${star}`;
}

function learningLines(session: Session, mode: LearningMode, width: number): FrameLine[] {
  const term = mode.order[mode.cursor] ?? '';
  const entry = getEntry(session.store, term);
  const scope = mode.scope === 'all' ? 'All words' : 'Mistake list';
  const lines = [
    line(`${scope} ${mode.cursor + 1}/${mode.order.length}`, 'title', { bold: true }),
    BLANK,
    line(term, 'word', { align: 'center', bold: true }),
  ];
  if (entry?.phonetic) {
    lines.push(line(entry.phonetic, 'phonetic', { align: 'center' }));
  }
  lines.push(BLANK);

  if (mode.reveal && entry) {
    lines.push(...wrapText(entry.meaning, width).map((text) => line(text, 'meaning', { align: 'center' })));
    if (entry.example) {
      lines.push(BLANK, ...wrapText(entry.example, width).map((text) => line(text, 'body', { align: 'center' })));
    }
  } else {
    lines.push(line('(press p to show the meaning)', 'phonetic', { align: 'center' }));
  }

  lines.push(
    BLANK,
    line(progressSummary(session.store, term), 'phonetic'),
    line('s next · w prev · Enter known · x unknown · , star · r shuffle · t spell · a AI note · . menu', 'phonetic'),
  );
  return lines;
}

export function spellingHint(term: string): string {
  const letters = Array.from(term);
  const first = letters[0] ?? '';
  const last = letters[letters.length - 1] ?? '';
  return `Starts with "${first}", ends with "${last}", ${letters.length} letters`;
}

function spellingLines(session: Session, mode: SpellingMode, width: number): FrameLine[] {
  const term = mode.order[mode.cursor] ?? '';
  const entry = getEntry(session.store, term);
  const lines = [
    line(`Spelling ${mode.cursor + 1}/${mode.order.length}`, 'title', { bold: true }),
    BLANK,
    ...wrapText(entry?.meaning ?? '', width).map((text) => line(text, 'meaning', { align: 'center' })),
  ];

  if (mode.hintOn) {
    if (entry?.phonetic) lines.push(line(entry.phonetic, 'phonetic', { align: 'center' }));
    lines.push(line(spellingHint(term), 'phonetic', { align: 'center' }));
  }

  lines.push(BLANK, line(`> ${mode.input}_`, 'word', { bold: true }), BLANK);

  if (mode.feedback) {
    lines.push(mode.feedback.correct
      ? line('✓ Correct', 'meaning')
      : line(`✗ Wrong, answer: ${mode.feedback.answer}`, 'warn'));
  }

  lines.push(BLANK, line('Enter check · ↑/↓ move · Ctrl+P hint · Esc back', 'phonetic'));
  return lines;
}

function viewerLines(mode: ViewerMode, viewport: Viewport): FrameLine[] {
  const page = viewerPageHeight(viewport);
  const visible = mode.lines.slice(mode.scrollOffset, mode.scrollOffset + page);
  const last = Math.min(mode.lines.length, mode.scrollOffset + page);
  const range = mode.lines.length === 0 ? '0 of 0' : `${mode.scrollOffset + 1}-${last} of ${mode.lines.length}`;
  return [
    line(mode.title, 'title', { bold: true }),
    line('─'.repeat(Math.max(0, viewport.columns)), 'phonetic'),
    ...visible.map((text) => line(text, text.startsWith('#') ? 'word' : 'body')),
    line(`lines ${range} · ↑/↓ PgUp/PgDn g/G · Esc close`, 'phonetic'),
  ];
}

function batchStatus(job: BatchJobState): FrameLine {
  if (!isBatchFinished(job)) {
    return job.cancelled
      ? line(`Cancelling after ${job.inFlight ?? 'the current word'}…`, 'warn')
      : line(`Generating: ${job.inFlight ?? '…'}`, 'word');
  }
  if (job.initialCount === 0) return line('Every word in the mistake list already has a note.', 'meaning');
  const summary = `${job.completed} saved, ${job.failed} failed`;
  return job.cancelled ? line(`Cancelled: ${summary}`, 'warn') : line(`Finished: ${summary}`, 'meaning');
}

function batchLines(mode: BatchMode, viewport: Viewport): FrameLine[] {
  const header = line('Batch AI notes', 'title', { bold: true });
  const job = mode.job;
  if (!job) {
    return [header, BLANK, line('Checking which words still need a note…', 'phonetic'), BLANK, line('Esc back', 'phonetic')];
  }

  const done = job.completed + job.failed;
  const barWidth = Math.max(10, Math.min(40, viewport.columns - 20));
  const footer = isBatchFinished(job) ? 'Esc back' : 'Esc cancel after the current word';
  const logRoom = Math.max(0, viewport.rows - 8);
  const log = logRoom > 0 ? job.logLines.slice(-logRoom) : [];

  return [
    header,
    BLANK,
    line(`${progressBar(batchProgress(job), barWidth)} ${done}/${job.initialCount}`, 'meaning'),
    batchStatus(job),
    BLANK,
    ...log.map((text) => line(text, text.startsWith('✗') ? 'warn' : 'body')),
    BLANK,
    line(footer, 'phonetic'),
  ];
}

function bossLines(mode: BossMode, viewport: Viewport): FrameLine[] {
  const room = Math.max(0, viewport.rows - 1);
  const tail = room > 0 ? mode.lines.slice(-room) : [];
  return [
    line(`${BOSS_PROMPT}${bossHeader(mode.style)}`, 'title'),
    ...tail.map((text) => line(text, bossLineSlot(mode.style, text))),
  ];
}

function modeLines(session: Session, viewport: Viewport): FrameLine[] {
  const width = Math.max(1, viewport.columns);
  const mode = session.mode;
  switch (mode.screen) {
    case 'menu':
      return menuLines(session);
    case 'learning':
      return learningLines(session, mode, width);
    case 'spelling':
      return spellingLines(session, mode, width);
    case 'viewer':
      return viewerLines(mode, viewport);
    case 'batch':
      return batchLines(mode, viewport);
    case 'boss':
      return bossLines(mode, viewport);
    default:
      return [];
  }
}

/**
 * Describe what the terminal should show for the session. Lines are already
 * cut to the viewport width; the host only applies colors and alignment.
 */
export function buildFrame(session: Session, viewport: Viewport): Frame {
  const isBoss = session.mode.screen === 'boss';
  const lines = modeLines(session, viewport);

  if (!isBoss) {
    if (session.pending) lines.push(line(`Asking AI about "${session.pending.term}"…`, 'warn'));
    if (session.notice) lines.push(line(session.notice, 'warn'));
  }

  return {
    palette: isBoss ? TERMINAL_THEME : getTheme(session.themeName),
    lines: lines.map((frameLine) => ({ ...frameLine, text: truncateLine(frameLine.text, viewport.columns) })),
  };
}
