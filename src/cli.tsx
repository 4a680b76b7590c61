import { render } from 'ink';
import { App } from './components/App';
import type { AppServices } from './components/App';
import { readViewport } from './hooks/useTerminalSize';
import { runBatchNoteJob } from './lib/batchNoteJob';
import { USAGE, UsageError, parseCliArgs } from './lib/cliArgs';
import type { CliCommand } from './lib/cliArgs';
import { CONFIG_FILE, loadConfig, readCredentials } from './lib/config';
import type { AppConfig } from './lib/config';
import { describeError } from './lib/errors';
import { createNoteGenerator } from './lib/noteAdapter';
import type { WordNoteAdapterOptions } from './lib/noteAdapter';
import { createSession } from './lib/sessionState';
import { createFileStorage, writeSampleWordsFile } from './lib/storage';
import type { FileStorage } from './lib/storage';
import { createWordStore, mistakeSet } from './lib/wordStore';
import type { NoteOptions } from './types';

function openStorage(config: AppConfig): FileStorage {
  return createFileStorage({
    wordsFile: config.wordsFile,
    progressFile: config.progressFile,
    notesDir: config.notesDir,
  });
}

function buildServices(
  config: AppConfig,
  storage: FileStorage,
  noteOptions: NoteOptions,
  overrides: WordNoteAdapterOptions = {}
): AppServices {
  return {
    generator: createNoteGenerator({
      ...readCredentials(),
      model: config.model,
      maxWebResults: config.maxWebResults,
      searchDepth: config.searchDepth,
      sentenceCount: config.sentenceCount,
      timeoutMs: config.timeoutMs,
      ...overrides,
    }),
    notes: storage,
    progress: storage,
    noteOptions,
  };
}

async function runInteractive(config: AppConfig): Promise<void> {
  if (writeSampleWordsFile(config.wordsFile)) {
    console.log(`Created a sample word list at ${config.wordsFile}`);
  }
  const storage = openStorage(config);
  const store = createWordStore(storage.loadWords(), storage.loadProgress());
  const services = buildServices(config, storage, { search: config.search, plain: config.plainNotes });

  const session = createSession(store, {
    themeName: config.theme,
    settings: {
      bossStyle: config.bossStyle,
      bossQuitEnabled: config.bossQuitEnabled,
      stayOnWrong: config.stayOnWrong,
    },
    viewport: readViewport(process.stdout, { rows: 24, columns: 80 }),
  });

  const instance = render(
    <App
      initialSession={session}
      services={services}
      env={{ random: Math.random, now: () => new Date() }}
      tickMs={config.tickMs}
    />,
    { exitOnCtrlC: false }
  );
  await instance.waitUntilExit();
}

async function runExplain(config: AppConfig, command: Extract<CliCommand, { kind: 'explain' }>): Promise<void> {
  const storage = openStorage(config);
  const options: NoteOptions = {
    search: command.search ?? config.search,
    plain: command.plain ?? config.plainNotes,
  };
  const { generator } = buildServices(config, storage, options, {
    model: command.model ?? config.model,
    maxWebResults: command.maxWebResults ?? config.maxWebResults,
    searchDepth: command.searchDepth ?? config.searchDepth,
    sentenceCount: command.sentenceCount ?? config.sentenceCount,
  });

  const result = await generator.explain(command.term, options);
  if (!result.ok) {
    console.error(`Error (${result.error.kind}): ${result.error.message}`);
    process.exitCode = 1;
    return;
  }

  console.log(result.text);
  if (command.save) {
    await storage.saveNote(command.term, result.text);
    console.log(`Saved to ${storage.notePath(command.term)}`);
  }
}

async function runBatch(config: AppConfig): Promise<void> {
  const storage = openStorage(config);
  const store = createWordStore(storage.loadWords(), storage.loadProgress());
  const options: NoteOptions = { search: config.search, plain: config.plainNotes };
  const { generator } = buildServices(config, storage, options);

  const controller = new AbortController();
  const onSigint = () => {
    console.log('Cancelling after the current word...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let printed = 0;
  try {
    const job = await runBatchNoteJob(mistakeSet(store), { generator, notes: storage, options }, {
      signal: controller.signal,
      onUpdate: (state) => {
        for (const entry of state.logLines.slice(printed)) {
          console.log(entry);
        }
        printed = state.logLines.length;
      },
    });

    const verb = job.cancelled ? 'Cancelled' : 'Finished';
    console.log(`${verb}: ${job.completed}/${job.initialCount} done, ${job.failed} failed`);
    if (job.failed > 0) process.exitCode = 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

async function main(argv: string[]): Promise<void> {
  const command = parseCliArgs(argv);
  if (command.kind === 'help') {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(command.configPath ?? CONFIG_FILE);
  switch (command.kind) {
    case 'interactive':
      await runInteractive(config);
      return;
    case 'explain':
      await runExplain(config, command);
      return;
    case 'batch':
      await runBatch(config);
      return;
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`${err.message}\n\n${USAGE}`);
    process.exitCode = 2;
    return;
  }
  console.error('wordtrainer failed:', describeError(err));
  process.exitCode = 1;
});
