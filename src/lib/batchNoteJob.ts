import type { GenerationErrorKind, NoteOptions } from '../types';
import { describeError } from './errors';
import type { NoteGenerator } from './noteAdapter';
import type { NoteStore } from './storage';

export interface BatchJobState {
  pending: string[];
  initialCount: number;
  completed: number;
  failed: number;
  logLines: string[];
  cancelled: boolean;
  inFlight: string | null;
}

export type BatchOutcome =
  | { ok: true }
  | { ok: false; kind: GenerationErrorKind | 'persistence'; message: string };

export interface BatchDeps {
  generator: NoteGenerator;
  notes: NoteStore;
  options: NoteOptions;
}

interface RunBatchOptions {
  signal?: AbortSignal;
  onUpdate?: (job: BatchJobState) => void;
}

export function createBatchJob(terms: string[]): BatchJobState {
  return {
    pending: [...terms],
    initialCount: terms.length,
    completed: 0,
    failed: 0,
    logLines: [],
    cancelled: false,
    inFlight: null,
  };
}

/**
 * Queue every term that has no saved note yet, keeping the given order.
 */
export async function planBatchNoteJob(
  terms: string[],
  notes: Pick<NoteStore, 'noteExists'>
): Promise<BatchJobState> {
  const missing: string[] = [];
  for (const term of terms) {
    if (!(await notes.noteExists(term))) {
      missing.push(term);
    }
  }
  return createBatchJob(missing);
}

export function nextBatchTerm(job: BatchJobState): string | null {
  if (job.cancelled || job.inFlight !== null) return null;
  return job.pending[0] ?? null;
}

export function startBatchItem(job: BatchJobState, term: string): BatchJobState {
  if (job.pending[0] !== term || job.inFlight !== null) return job;
  return { ...job, pending: job.pending.slice(1), inFlight: term };
}

export function completeBatchItem(job: BatchJobState, term: string, outcome: BatchOutcome): BatchJobState {
  if (job.inFlight !== term) return job;
  const logLine = outcome.ok ? `✓ ${term} saved` : `✗ ${term}: ${outcome.kind} ${outcome.message}`;
  return {
    ...job,
    inFlight: null,
    completed: job.completed + (outcome.ok ? 1 : 0),
    failed: job.failed + (outcome.ok ? 0 : 1),
    logLines: [...job.logLines, logLine],
  };
}

export function cancelBatchJob(job: BatchJobState): BatchJobState {
  if (job.cancelled || isBatchFinished(job)) return job;
  const note = job.inFlight ? `Cancelling after ${job.inFlight}…` : 'Cancelled';
  return { ...job, cancelled: true, logLines: [...job.logLines, note] };
}

export function isBatchFinished(job: BatchJobState): boolean {
  return job.inFlight === null && (job.cancelled || job.pending.length === 0);
}

export function batchProgress(job: BatchJobState): number {
  if (job.initialCount === 0) return 1;
  return job.completed / job.initialCount;
}

export async function executeBatchItem(term: string, deps: BatchDeps): Promise<BatchOutcome> {
  const result = await deps.generator.explain(term, deps.options);
  if (!result.ok) {
    return { ok: false, kind: result.error.kind, message: result.error.message };
  }
  try {
    await deps.notes.saveNote(term, result.text);
  } catch (error) {
    return { ok: false, kind: 'persistence', message: describeError(error) };
  }
  return { ok: true };
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Headless driver: one generation at a time, checking the signal between items.
 */
export async function runBatchNoteJob(
  terms: string[],
  deps: BatchDeps,
  { signal, onUpdate }: RunBatchOptions = {}
): Promise<BatchJobState> {
  let job = await planBatchNoteJob(terms, deps.notes);
  onUpdate?.(job);

  for (let term = nextBatchTerm(job); term !== null; term = nextBatchTerm(job)) {
    job = startBatchItem(job, term);
    onUpdate?.(job);
    const outcome = await executeBatchItem(term, deps);
    job = completeBatchItem(job, term, outcome);
    onUpdate?.(job);

    await yieldToEventLoop();
    if (signal?.aborted) {
      job = cancelBatchJob(job);
      onUpdate?.(job);
    }
  }

  return job;
}
