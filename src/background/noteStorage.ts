import localforage from 'localforage';

import type {
  Note, NoteInput, NoteRecord, NoteSearchQuery, NoteSearchResult,
} from '../types/noteTypes';
import {
  CONTENT_MAX_LENGTH,
  EMBEDDING_PREFIX,
  hasTags,
  NOTE_STORAGE_PREFIX,
  SUMMARY_MAX_LENGTH,
  TAGS_MAX_LENGTH,
  TITLE_MAX_LENGTH,
} from '../types/noteTypes';
import { isNumberArray, isRecord } from '../utils/guards';
import { errorMessage, InvalidRequestError, PersistenceError } from './errors';

const MAX_PAGE_SIZE = 100;

export const generateNoteId = (): string => `${NOTE_STORAGE_PREFIX}${Date.now()}_${Math.random().toString(16).slice(2)}`;

const embeddingKey = (noteId: string): string => `${EMBEDDING_PREFIX}${noteId}`;

/**
 * The checks a relational schema would enforce on a note row.
 * Returns a description of the first broken rule, or null.
 */
export const findConstraintViolation = (note: Note): string | null => {
  if (!note.ownerSubject.trim()) return 'owner subject is required';
  if (!note.title.trim()) return 'title is required';
  if (note.title.length > TITLE_MAX_LENGTH) return `title exceeds ${TITLE_MAX_LENGTH} characters`;
  if (!note.content.trim()) return 'content is required';
  if (note.content.length > CONTENT_MAX_LENGTH) return `content exceeds ${CONTENT_MAX_LENGTH} characters`;
  if (note.summary && note.summary.length > SUMMARY_MAX_LENGTH) return `summary exceeds ${SUMMARY_MAX_LENGTH} characters`;
  if (note.tags && note.tags.length > TAGS_MAX_LENGTH) return `tags exceed ${TAGS_MAX_LENGTH} characters`;
  if (note.embedding && !isNumberArray(note.embedding)) return 'embedding must contain only finite numbers';
  if (note.updatedAt < note.createdAt) return 'updatedAt precedes createdAt';

  return null;
};

/**
 * Checks the caller-supplied fields of a note before anything is generated
 * or written for it. Throws InvalidRequestError.
 */
export const validateNoteInput = (input: NoteInput): void => {
  const violation = findConstraintViolation({
    id: input.id ?? '',
    title: input.title,
    content: input.content,
    summary: input.summary ?? null,
    tags: input.tags ?? null,
    embedding: input.embedding ?? null,
    createdAt: 0,
    updatedAt: 0,
    ownerSubject: input.ownerSubject,
  });

  if (violation) {
    throw new InvalidRequestError(violation);
  }
};

const toNote = (raw: unknown, embedding: unknown): Note | null => {
  if (!isRecord(raw) || typeof raw.id !== 'string' || typeof raw.ownerSubject !== 'string') {
    return null;
  }

  const createdAt = typeof raw.createdAt === 'number' ? raw.createdAt : 0;

  return {
    id: raw.id,
    title: typeof raw.title === 'string' ? raw.title : '',
    content: typeof raw.content === 'string' ? raw.content : '',
    summary: typeof raw.summary === 'string' ? raw.summary : null,
    tags: typeof raw.tags === 'string' ? raw.tags : null,
    embedding: isNumberArray(embedding) && embedding.length > 0 ? embedding : null,
    createdAt,
    updatedAt: typeof raw.updatedAt === 'number' ? raw.updatedAt : createdAt,
    ownerSubject: raw.ownerSubject,
  };
};

const toRecord = (note: Note): NoteRecord => ({
  id: note.id,
  title: note.title,
  content: note.content,
  summary: note.summary,
  tags: note.tags,
  createdAt: note.createdAt,
  updatedAt: note.updatedAt,
  ownerSubject: note.ownerSubject,
});

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const compareByCreation = (a: Note, b: Note): number =>
  a.createdAt - b.createdAt || compareIds(a.id, b.id);

const readNoteFromSystem = async (noteId: string, ownerSubject: string): Promise<Note | null> => {
  const raw = await localforage.getItem<unknown>(noteId);

  if (!isRecord(raw) || raw.ownerSubject !== ownerSubject) {
    return null;
  }

  const embedding = await localforage.getItem<unknown>(embeddingKey(noteId));

  return toNote(raw, embedding);
};

/**
 * Writes the note record and, under its own key, the embedding. A null
 * embedding removes any stored one so no orphan is left behind.
 */
export const writeNoteToSystem = async (note: Note): Promise<void> => {
  await localforage.setItem(note.id, toRecord(note));

  if (note.embedding && note.embedding.length > 0) {
    await localforage.setItem(embeddingKey(note.id), note.embedding);
  } else {
    await localforage.removeItem(embeddingKey(note.id));
  }
};

/**
 * Fetches every note of one owner, embeddings included, oldest first (ties by id).
 */
export const getAllNotesFromSystem = async (ownerSubject: string): Promise<Note[]> => {
  const keys = await localforage.keys();
  const noteKeys = keys.filter(key => key.startsWith(NOTE_STORAGE_PREFIX));
  const notes: Note[] = [];

  for (const key of noteKeys) {
    const note = await readNoteFromSystem(key, ownerSubject);

    if (note) {
      notes.push(note);
    }
  }

  return notes.sort(compareByCreation);
};

export const getNoteByIdFromSystem = async (noteId: string, ownerSubject: string): Promise<Note | null> =>
  readNoteFromSystem(noteId, ownerSubject);

/**
 * Creates a note, or updates the owner's note when `input.id` is given.
 * Fields left undefined on update keep their stored value.
 *
 * @returns The saved note, or null if `input.id` names no note of this owner.
 */
export const saveNoteInSystem = async (input: NoteInput, now: number = Date.now()): Promise<Note | null> => {
  validateNoteInput(input);

  let note: Note;

  if (input.id) {
    const existing = await getNoteByIdFromSystem(input.id, input.ownerSubject);

    if (!existing) {
      return null;
    }

    note = {
      ...existing,
      title: input.title,
      content: input.content,
      summary: input.summary !== undefined ? input.summary : existing.summary,
      tags: input.tags !== undefined ? input.tags : existing.tags,
      embedding: input.embedding !== undefined ? input.embedding : existing.embedding,
      updatedAt: Math.max(now, existing.createdAt),
    };
  } else {
    note = {
      id: generateNoteId(),
      title: input.title,
      content: input.content,
      summary: input.summary ?? null,
      tags: input.tags ?? null,
      embedding: input.embedding ?? null,
      createdAt: now,
      updatedAt: now,
      ownerSubject: input.ownerSubject,
    };
  }

  const violation = findConstraintViolation(note);

  if (violation) {
    throw new InvalidRequestError(violation);
  }

  try {
    await writeNoteToSystem(note);
  } catch (error) {
    throw new PersistenceError(`Failed to save note ${note.id}: ${errorMessage(error)}`, { cause: error });
  }

  return note;
};

/**
 * Deletes a note and its embedding.
 *
 * @returns false when the note does not exist or belongs to another owner.
 */
export const deleteNoteFromSystem = async (noteId: string, ownerSubject: string): Promise<boolean> => {
  const existing = await getNoteByIdFromSystem(noteId, ownerSubject);

  if (!existing) {
    return false;
  }

  await localforage.removeItem(noteId);
  await localforage.removeItem(embeddingKey(noteId));
  console.log('[NoteStore] Note and its embedding deleted:', noteId);

  return true;
};

/**
 * Case-insensitive substring search over title and content, most recently
 * updated first.
 */
export const searchNotesInSystem = async (query: NoteSearchQuery): Promise<NoteSearchResult> => {
  const pageNumber = query.pageNumber ?? 1;
  const pageSize = query.pageSize ?? 10;
  const searchTerm = query.searchTerm?.trim() ?? '';

  if (!Number.isInteger(pageNumber) || pageNumber < 1) {
    throw new InvalidRequestError('pageNumber must be a positive integer');
  }

  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new InvalidRequestError(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }

  const needle = searchTerm.toLowerCase();
  const matches = (await getAllNotesFromSystem(query.ownerSubject))
    .filter(note => !needle || note.title.toLowerCase().includes(needle) || note.content.toLowerCase().includes(needle))
    .sort((a, b) => b.updatedAt - a.updatedAt || compareIds(a.id, b.id));

  const start = (pageNumber - 1) * pageSize;

  return {
    notes: matches.slice(start, start + pageSize),
    totalCount: matches.length,
    pageNumber,
    pageSize,
    totalPages: Math.ceil(matches.length / pageSize),
    searchTerm,
  };
};

export interface NoteStore {
  /**
   * All notes of one owner, restricted to untagged ones when `onlyMissingTags`.
   * The order is stable for a given stored state.
   */
  query(ownerSubject: string, onlyMissingTags: boolean): Promise<Note[]>;

  /**
   * Persists every mutation made to notes obtained from this handle since
   * the last commit. Throws PersistenceError.
   */
  commit(): Promise<void>;
}

/** Shallow copy as last loaded or committed; the embedding array is shared, not copied. */
type NoteSnapshot = Readonly<Note>;

interface TrackedNote {
  note: Note;
  snapshot: NoteSnapshot;
}

const snapshotOf = (note: Note): NoteSnapshot => ({ ...note });

const isDirty = ({ note, snapshot }: TrackedNote): boolean =>
  note.title !== snapshot.title
  || note.content !== snapshot.content
  || note.summary !== snapshot.summary
  || note.tags !== snapshot.tags
  || note.embedding !== snapshot.embedding
  || note.createdAt !== snapshot.createdAt
  || note.updatedAt !== snapshot.updatedAt
  || note.ownerSubject !== snapshot.ownerSubject;

/**
 * Unit-of-work handle over the localforage note storage. Notes returned by
 * `query` are tracked; `commit` writes the ones whose state changed.
 * An embedding counts as changed only when the array is replaced.
 */
export class LocalforageNoteStore implements NoteStore {
  private readonly tracked = new Map<string, TrackedNote>();

  async query(ownerSubject: string, onlyMissingTags: boolean): Promise<Note[]> {
    let stored: Note[];

    try {
      stored = await getAllNotesFromSystem(ownerSubject);
    } catch (error) {
      throw new PersistenceError(`Failed to load notes: ${errorMessage(error)}`, { cause: error });
    }

    const notes = stored
      .map(note => this.tracked.get(note.id)?.note ?? note)
      .filter(note => !onlyMissingTags || !hasTags(note));

    return notes.map(note => this.track(note));
  }

  async commit(): Promise<void> {
    const dirty = [...this.tracked.values()].filter(isDirty);

    if (dirty.length === 0) {
      return;
    }

    for (const entry of dirty) {
      const violation = findConstraintViolation(entry.note);

      if (violation) {
        throw new PersistenceError(`Constraint violation on note ${entry.note.id}: ${violation}`);
      }
    }

    for (const entry of dirty) {
      try {
        await writeNoteToSystem(entry.note);
      } catch (error) {
        throw new PersistenceError(`Failed to commit note ${entry.note.id}: ${errorMessage(error)}`, { cause: error });
      }

      entry.snapshot = snapshotOf(entry.note);
    }

    console.log(`[NoteStore] Committed ${dirty.length} note(s).`);
  }

  private track(note: Note): Note {
    const existing = this.tracked.get(note.id);

    if (existing) {
      return existing.note;
    }

    this.tracked.set(note.id, { note, snapshot: snapshotOf(note) });

    return note;
  }
}
