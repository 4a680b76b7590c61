import { parseArgs } from 'node:util';
import type { SearchDepth, SearchMode } from '../types';

export type CliCommand =
  | { kind: 'interactive'; configPath?: string }
  | {
    kind: 'explain';
    term: string;
    save: boolean;
    plain?: boolean;
    search?: SearchMode;
    model?: string;
    maxWebResults?: number;
    searchDepth?: SearchDepth;
    sentenceCount?: number;
    configPath?: string;
  }
  | { kind: 'batch'; configPath?: string }
  | { kind: 'help' };

export const USAGE = [
  'Usage:',
  '  wordtrainer [--config <file>]',
  '  wordtrainer explain <word> [--save] [--plain] [--search auto|tavily|off]',
  '                      [--model <name>] [--max-web <1-15>] [--depth basic|advanced] [--sentences <n>]',
  '  wordtrainer batch [--config <file>]',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isSearchMode(value: string): value is SearchMode {
  return value === 'auto' || value === 'tavily' || value === 'off';
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        config: { type: 'string', short: 'c' },
        save: { type: 'boolean' },
        plain: { type: 'boolean' },
        search: { type: 'string' },
        model: { type: 'string' },
        'max-web': { type: 'string' },
        depth: { type: 'string' },
        sentences: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function readSearchMode(value: string | undefined): SearchMode | undefined {
  if (value === undefined) return undefined;
  if (!isSearchMode(value)) throw new UsageError(`Unknown search mode: ${value}`);
  return value;
}

function readSearchDepth(value: string | undefined): SearchDepth | undefined {
  if (value === undefined) return undefined;
  if (value !== 'basic' && value !== 'advanced') throw new UsageError(`Unknown search depth: ${value}`);
  return value;
}

function readCount(flag: string, value: string | undefined, min: number, max: number): number | undefined {
  if (value === undefined) return undefined;
  const count = Number(value);
  if (!Number.isInteger(count) || count < min || count > max) {
    throw new UsageError(`--${flag} must be a whole number from ${min} to ${max}`);
  }
  return count;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: 'help' };

  const [command, ...rest] = positionals;
  const configPath = values.config;

  if (command === undefined) {
    return { kind: 'interactive', configPath };
  }
  if (command === 'batch') {
    if (rest.length > 0) throw new UsageError(`Unexpected argument: ${rest[0]}`);
    return { kind: 'batch', configPath };
  }
  if (command === 'explain') {
    const term = rest.join(' ').trim();
    if (!term) throw new UsageError('explain needs a word');
    return {
      kind: 'explain',
      term,
      save: values.save ?? false,
      plain: values.plain,
      search: readSearchMode(values.search),
      model: values.model?.trim() || undefined,
      maxWebResults: readCount('max-web', values['max-web'], 1, 15),
      searchDepth: readSearchDepth(values.depth),
      sentenceCount: readCount('sentences', values.sentences, 1, 20),
      configPath,
    };
  }
  throw new UsageError(`Unknown command: ${command}`);
}
