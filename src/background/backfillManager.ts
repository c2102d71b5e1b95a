import type {
  BackfillKind, BackfillProgress, BackfillRequest, BackfillResult, BackfillRunOptions,
} from '../types/backfillTypes';
import type { Note } from '../types/noteTypes';
import { withRetry } from '../utils/retry';
import type { EnrichmentClient } from './enrichmentClient';
import { EnrichmentError, errorMessage, InvalidRequestError } from './errors';
import type { NoteStore } from './noteStorage';

export type NoteStoreFactory = () => NoteStore;

export interface BackfillCoordinatorOptions {
  /** Commit after this many successful notes. */
  checkpointInterval?: number;
  /** Extra attempts per note for retryable enrichment failures. */
  retries?: number;
  retryDelay?: number;
  now?: () => number;
}

interface BackfillStep<T> {
  kind: BackfillKind;
  label: string;
  candidates(store: NoteStore, ownerSubject: string, onlyMissing: boolean): Promise<Note[]>;
  generate(note: Note, signal?: AbortSignal): Promise<T>;
  apply(note: Note, result: T): void;
}

const validateRequest = (request: BackfillRequest): void => {
  if (typeof request.ownerSubject !== 'string' || !request.ownerSubject.trim()) {
    throw new InvalidRequestError('ownerSubject is required');
  }

  if (request.onlyMissing !== undefined && typeof request.onlyMissing !== 'boolean') {
    throw new InvalidRequestError('onlyMissing must be a boolean');
  }
};

const isRetryable = (error: unknown): boolean => error instanceof EnrichmentError && error.retryable;

/**
 * Walks an owner's notes, enriches each one through the injected client and
 * writes the results back in checkpointed commits. A failing note is
 * recorded in `errors` and skipped; a failing commit ends the run.
 */
export class BackfillCoordinator {
  private readonly checkpointInterval: number;
  private readonly retries: number;
  private readonly retryDelay: number;
  private readonly now: () => number;

  constructor(
    private readonly createStore: NoteStoreFactory,
    private readonly client: EnrichmentClient,
    options: BackfillCoordinatorOptions = {},
  ) {
    const { checkpointInterval = 5, retries = 0, retryDelay = 1000, now = Date.now } = options;

    if (!Number.isInteger(checkpointInterval) || checkpointInterval < 1) {
      throw new InvalidRequestError('checkpointInterval must be a positive integer');
    }

    if (!Number.isInteger(retries) || retries < 0) {
      throw new InvalidRequestError('retries must be a non-negative integer');
    }

    this.checkpointInterval = checkpointInterval;
    this.retries = retries;
    this.retryDelay = retryDelay;
    this.now = now;
  }

  backfillTags(request: BackfillRequest, options: BackfillRunOptions = {}): Promise<BackfillResult> {
    return this.run(request, options, {
      kind: 'tags',
      label: 'tags',
      candidates: (store, ownerSubject, onlyMissing) => store.query(ownerSubject, onlyMissing),
      generate: (note, signal) => this.client.generateTags(note.title, note.content, signal),
      apply: (note, tags) => {
        note.tags = tags;
      },
    });
  }

  backfillEmbeddings(request: BackfillRequest, options: BackfillRunOptions = {}): Promise<BackfillResult> {
    return this.run(request, options, {
      kind: 'embeddings',
      label: 'embedding',
      candidates: async (store, ownerSubject, onlyMissing) => {
        const notes = await store.query(ownerSubject, false);

        return onlyMissing ? notes.filter(note => note.embedding === null) : notes;
      },
      generate: (note, signal) => this.client.generateEmbedding(note.title, note.content, signal),
      apply: (note, embedding) => {
        note.embedding = embedding;
      },
    });
  }

  private async run<T>(request: BackfillRequest, options: BackfillRunOptions, step: BackfillStep<T>): Promise<BackfillResult> {
    validateRequest(request);

    const { signal, onProgress } = options;
    const store = this.createStore();
    const candidates = await step.candidates(store, request.ownerSubject, request.onlyMissing ?? true);
    const total = candidates.length;
    const errors: string[] = [];
    let processed = 0;
    let cancelled = false;

    const generate = withRetry((note: Note) => step.generate(note, signal), {
      retries: this.retries,
      delay: this.retryDelay,
      shouldRetry: error => !signal?.aborted && isRetryable(error),
      label: '[Backfill]',
      signal,
    });
    const report = (progress: BackfillProgress): void => {
      try {
        onProgress?.(progress);
      } catch (error) {
        console.warn(`[Backfill] Progress listener failed: ${errorMessage(error)}`);
      }
    };

    console.log(`[Backfill] Starting ${step.kind} backfill for ${total} note(s).`);

    for (const note of candidates) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      let result: T;

      try {
        result = await generate(note);
      } catch (error) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }

        const message = `Failed to generate ${step.label} for note '${note.title}': ${errorMessage(error)}`;

        errors.push(message);
        console.warn(`[Backfill] ${message}`);
        report({ kind: step.kind, processed, failed: errors.length, total, noteId: note.id });
        continue;
      }

      step.apply(note, result);
      note.updatedAt = Math.max(this.now(), note.createdAt);
      processed++;

      if (processed % this.checkpointInterval === 0) {
        await store.commit();
        console.log(`[Backfill] Checkpoint: ${processed} of ${total} note(s) committed.`);
      }

      report({ kind: step.kind, processed, failed: errors.length, total, noteId: note.id });
    }

    await store.commit();

    if (cancelled) {
      console.warn(`[Backfill] ${step.kind} backfill cancelled after ${processed} of ${total} note(s).`);
    } else {
      console.log(`[Backfill] ${step.kind} backfill finished: ${processed} of ${total} note(s), ${errors.length} error(s).`);
    }

    return { processedCount: processed, totalNotes: total, errors, cancelled };
  }
}
