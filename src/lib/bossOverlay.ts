import type { BossStyle, ThemeSlot } from '../types';

export type RandomSource = () => number;

const LOG_LEVELS = ['INFO', 'DEBUG', 'WARNING'] as const;

const LOG_MESSAGES = [
  'Application started successfully',
  'Loading configuration from config.json',
  'Database connection established',
  'Processing user request',
  'Cache refresh completed',
  'Background task completed',
  'Request processed in 125ms',
  'Cleaning up temporary files',
  'System status: healthy',
  'Service heartbeat OK',
];

const LS_ENTRIES: Array<{ name: string; isDir: boolean }> = [
  { name: 'config', isDir: true },
  { name: '.bash_logout', isDir: false },
  { name: '.bashrc', isDir: false },
  { name: '.cache', isDir: true },
  { name: '.profile', isDir: false },
  { name: 'application.log', isDir: false },
  { name: 'backup_script.sh', isDir: false },
  { name: 'temp', isDir: true },
  { name: 'data.json', isDir: false },
  { name: 'error.log', isDir: false },
  { name: 'main_app', isDir: false },
  { name: 'report.txt', isDir: false },
];

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export const BOSS_PROMPT = 'user@server:~/project$ ';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function pick<T>(items: readonly T[], random: RandomSource): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

function randomInt(min: number, max: number, random: RandomSource): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function formatLogTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} `
    + `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

// `ls -l` style: "Sep  7 14:30"
export function formatListingTime(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${String(date.getDate()).padStart(2, ' ')} `
    + `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

function logLine(at: Date, random: RandomSource): string {
  const level = pick(LOG_LEVELS, random);
  const message = pick(LOG_MESSAGES, random);
  return `[${formatLogTimestamp(at)}] ${level}: ${message}`;
}

function listingLine(name: string, isDir: boolean, at: Date, random: RandomSource): string {
  const size = isDir ? 4096 : randomInt(512, 16384, random);
  const executable = !isDir && (name.endsWith('.sh') || name.endsWith('_app'));
  const perm = isDir ? 'drwxr-xr-x' : executable ? '-rwxr-xr-x' : '-rw-r--r--';
  return `${perm}  1 user user ${String(size).padStart(7, ' ')} ${formatListingTime(at)} ${name}`;
}

export function bossHeader(style: BossStyle): string {
  return style === 'ls' ? 'ls -la /home/user/project' : 'tail -f /var/log/application.log';
}

/**
 * Screenful of disguise output shown the moment the overlay opens. Log lines
 * are back-dated one second apart so the newest one reads as "now".
 */
export function initialBossLines(
  style: BossStyle,
  now: Date,
  random: RandomSource,
  count: number
): string[] {
  if (style === 'ls') {
    const lines = [
      `total ${(LS_ENTRIES.length + 2) * 4}`,
      `drwxr-xr-x  3 user user    4096 ${formatListingTime(now)} .`,
      `drwxr-xr-x 15 user user    4096 ${formatListingTime(new Date(now.getTime() - 60_000))} ..`,
    ];
    for (const entry of LS_ENTRIES) {
      const ageMs = randomInt(0, 9 * 60 + 59, random) * 1000;
      lines.push(listingLine(entry.name, entry.isDir, new Date(now.getTime() - ageMs), random));
    }
    return lines;
  }

  const lines: string[] = [];
  for (let i = count; i > 0; i -= 1) {
    lines.push(logLine(new Date(now.getTime() - i * 1000), random));
  }
  return lines;
}

/**
 * One more line of disguise output for the given tick, stamped with `now`.
 */
export function nextBossLine(style: BossStyle, tick: number, now: Date, random: RandomSource): string {
  if (style === 'ls') {
    return listingLine(`app-${String(tick).padStart(4, '0')}.log`, false, now, random);
  }
  return logLine(now, random);
}

export function bossLineSlot(style: BossStyle, line: string): ThemeSlot {
  if (style === 'ls') {
    if (line.startsWith('d')) return 'meaning';
    if (line.slice(0, 4).includes('x')) return 'phonetic';
    return 'body';
  }
  if (line.includes('ERROR') || line.includes('WARNING')) return 'warn';
  if (line.includes('INFO')) return 'meaning';
  if (line.includes('DEBUG')) return 'phonetic';
  return 'body';
}
