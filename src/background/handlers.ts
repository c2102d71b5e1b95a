import type {
  BackfillKind, BackfillProgress, BackfillRequest, RelatedNotesRequest,
} from '../types/backfillTypes';
import ChannelNames from '../types/ChannelNames';
import type { NoteInput, NoteSearchQuery } from '../types/noteTypes';
import {
  isRecord, optionalBoolean, optionalNumber, optionalString,
} from '../utils/guards';
import type { BackfillCoordinator, NoteStoreFactory } from './backfillManager';
import type { EnrichmentClient } from './enrichmentClient';
import { InvalidRequestError, NotFoundError } from './errors';
import { enrichNewNote } from './noteEnrichment';
import {
  deleteNoteFromSystem,
  getAllNotesFromSystem,
  getNoteByIdFromSystem,
  saveNoteInSystem,
  searchNotesInSystem,
  validateNoteInput,
} from './noteStorage';
import type { Runtime, SendResponse } from './runtime';
import { failureResponse } from './runtime';
import { findRelatedNotes } from './semanticSearchUtils';
import type { AppSettings } from './storageUtil';
import { getEffectiveRelatedNotesParams } from './storageUtil';

export interface HandlerContext {
  runtime: Runtime;
  coordinator: BackfillCoordinator;
  client: EnrichmentClient;
  createStore: NoteStoreFactory;
  settings: AppSettings | null;
  /** One controller per owner with a run in flight. */
  activeRuns: Map<string, AbortController>;
}

const payloadRecord = (payload: unknown): Record<string, unknown> => {
  if (!isRecord(payload)) {
    throw new InvalidRequestError('Message payload must be an object.');
  }

  return payload;
};

const requiredString = (payload: Record<string, unknown>, field: string): string => {
  const value = payload[field];

  if (typeof value !== 'string' || !value.trim()) {
    throw new InvalidRequestError(`${field} is required`);
  }

  return value;
};

const ownerOf = (payload: unknown): string => requiredString(payloadRecord(payload), 'ownerSubject');

export const parseBackfillRequest = (payload: unknown): BackfillRequest => {
  const record = payloadRecord(payload);
  const onlyMissing = record.onlyMissing;

  if (onlyMissing !== undefined && typeof onlyMissing !== 'boolean') {
    throw new InvalidRequestError('onlyMissing must be a boolean');
  }

  return { ownerSubject: requiredString(record, 'ownerSubject'), onlyMissing: optionalBoolean(onlyMissing) };
};

/**
 * Runs `work` and reports its outcome through `sendResponse`. Never rejects.
 */
export const respond = async <T>(sendResponse: SendResponse, label: string, work: () => Promise<T>): Promise<void> => {
  try {
    sendResponse({ success: true, data: await work() });
  } catch (error) {
    console.error(`[Background] ${label} failed:`, error);
    sendResponse(failureResponse(error));
  }
};

export const handleBackfillRequest = async (
  kind: BackfillKind,
  payload: unknown,
  context: HandlerContext,
  sendResponse: SendResponse,
): Promise<void> => {
  let request: BackfillRequest;

  try {
    request = parseBackfillRequest(payload);

    if (context.activeRuns.has(request.ownerSubject)) {
      throw new InvalidRequestError(`A backfill is already running for owner '${request.ownerSubject}'.`);
    }
  } catch (error) {
    console.warn('[Background] Rejected backfill request:', error);
    sendResponse(failureResponse(error));

    return;
  }

  const { ownerSubject } = request;
  const controller = new AbortController();

  context.activeRuns.set(ownerSubject, controller);

  try {
    console.log(`[Background] Starting ${kind} backfill for ${ownerSubject}...`);
    context.runtime.broadcast({ type: ChannelNames.BACKFILL_START, data: { kind, ownerSubject } });

    const options = {
      signal: controller.signal,
      onProgress: (progress: BackfillProgress) => context.runtime.broadcast({ type: ChannelNames.BACKFILL_PROGRESS, data: progress }),
    };
    const result = kind === 'tags'
      ? await context.coordinator.backfillTags(request, options)
      : await context.coordinator.backfillEmbeddings(request, options);

    context.runtime.broadcast({ type: ChannelNames.BACKFILL_END, data: { kind, ownerSubject, result } });
    sendResponse({ success: true, data: result });
  } catch (error) {
    console.error(`[Background] Error during ${kind} backfill:`, error);
    const failure = failureResponse(error);

    context.runtime.broadcast({ type: ChannelNames.BACKFILL_ERROR, error: failure.error });
    sendResponse(failure);
  } finally {
    context.activeRuns.delete(ownerSubject);
  }
};

export const handleCancelBackfill = (payload: unknown, context: HandlerContext): { cancelled: boolean } => {
  const ownerSubject = ownerOf(payload);
  const controller = context.activeRuns.get(ownerSubject);

  if (!controller) {
    return { cancelled: false };
  }

  console.log(`[Background] Cancelling backfill for ${ownerSubject}.`);
  controller.abort();

  return { cancelled: true };
};

export const handleGetRelatedNotes = (payload: unknown, context: HandlerContext) => {
  const record = payloadRecord(payload);
  const defaults = getEffectiveRelatedNotesParams(context.settings);
  const request: RelatedNotesRequest = {
    noteId: requiredString(record, 'noteId'),
    ownerSubject: requiredString(record, 'ownerSubject'),
    topN: optionalNumber(record.topN) ?? defaults.topN,
    similarityThreshold: optionalNumber(record.similarityThreshold) ?? defaults.similarityThreshold,
  };

  return findRelatedNotes(context.createStore(), request);
};

/**
 * Creates a note (with generated summary, tags and embedding) or, when an id
 * is given, updates title and content only.
 */
export const handleSaveNote = async (payload: unknown, context: HandlerContext) => {
  const record = payloadRecord(payload);
  const input: NoteInput = {
    id: optionalString(record.id),
    title: typeof record.title === 'string' ? record.title : '',
    content: typeof record.content === 'string' ? record.content : '',
    ownerSubject: requiredString(record, 'ownerSubject'),
  };

  validateNoteInput(input);

  if (input.id) {
    const updated = await saveNoteInSystem(input);

    if (!updated) {
      throw new NotFoundError('Note not found.');
    }

    return updated;
  }

  const enrichment = await enrichNewNote(context.client, input.title, input.content);
  const created = await saveNoteInSystem({ ...input, ...enrichment });

  if (!created) {
    throw new NotFoundError('Note not found.');
  }

  console.log(`[Background] Note created: ${created.id}`);

  return created;
};

export const handleGetNote = async (payload: unknown) => {
  const record = payloadRecord(payload);
  const note = await getNoteByIdFromSystem(requiredString(record, 'noteId'), requiredString(record, 'ownerSubject'));

  if (!note) {
    throw new NotFoundError('Note not found.');
  }

  return note;
};

export const handleGetAllNotes = (payload: unknown) => getAllNotesFromSystem(ownerOf(payload));

export const handleSearchNotes = (payload: unknown) => {
  const record = payloadRecord(payload);
  const query: NoteSearchQuery = {
    ownerSubject: requiredString(record, 'ownerSubject'),
    searchTerm: optionalString(record.searchTerm),
    pageNumber: optionalNumber(record.pageNumber),
    pageSize: optionalNumber(record.pageSize),
  };

  return searchNotesInSystem(query);
};

export const handleDeleteNote = async (payload: unknown) => {
  const record = payloadRecord(payload);
  const deleted = await deleteNoteFromSystem(requiredString(record, 'noteId'), requiredString(record, 'ownerSubject'));

  if (!deleted) {
    throw new NotFoundError('Note not found.');
  }

  return { deleted };
};
