import type { NoteOptions } from '../types';
import { executeBatchItem, planBatchNoteJob } from './batchNoteJob';
import { describeError } from './errors';
import type { NoteGenerator } from './noteAdapter';
import type { Session, SessionEffect, SessionEvent } from './sessionState';
import type { NoteStore, ProgressStore } from './storage';
import { progressRecord } from './wordStore';

export interface EffectDeps {
  generator: NoteGenerator;
  notes: NoteStore;
  progress: ProgressStore;
  noteOptions: NoteOptions;
  exit: () => void;
}

type Dispatch = (event: SessionEvent) => void;

/**
 * Run one reducer effect. Async results are fed back through `dispatch`;
 * the returned promise settles once that has happened.
 */
export async function runSessionEffect(
  effect: SessionEffect,
  session: Session,
  deps: EffectDeps,
  dispatch: Dispatch
): Promise<void> {
  switch (effect.type) {
    case 'save-progress':
      deps.progress.saveProgress(progressRecord(session.store));
      return;
    case 'quit':
      deps.exit();
      return;
    case 'explain': {
      const result = await deps.generator.explain(effect.term, deps.noteOptions);
      if (result.ok) {
        try {
          await deps.notes.saveNote(effect.term, result.text);
        } catch (err) {
          console.warn(`Failed to save note for ${effect.term}:`, describeError(err));
        }
      }
      dispatch({ type: 'note-ready', term: effect.term, result });
      return;
    }
    case 'read-note': {
      let text: string | null = null;
      try {
        text = await deps.notes.readNote(effect.term);
      } catch (err) {
        console.warn(`Failed to read the note for ${effect.term}:`, describeError(err));
      }
      dispatch({ type: 'saved-note', term: effect.term, text });
      return;
    }
    case 'plan-batch': {
      const job = await planBatchNoteJob(effect.terms, deps.notes);
      dispatch({ type: 'batch-planned', job });
      return;
    }
    case 'batch-step': {
      const outcome = await executeBatchItem(effect.term, {
        generator: deps.generator,
        notes: deps.notes,
        options: deps.noteOptions,
      });
      dispatch({ type: 'batch-item-done', term: effect.term, outcome });
      return;
    }
    default:
      return;
  }
}
