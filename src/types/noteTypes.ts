export interface Note {
  id: string;
  title: string;
  content: string;
  summary: string | null;
  tags: string | null; // comma-delimited, display order preserved
  embedding: number[] | null;
  createdAt: number;
  updatedAt: number;
  ownerSubject: string;
}

// Stored shape; the embedding lives under its own key.
export type NoteRecord = Omit<Note, 'embedding'>;

export interface NoteInput {
  id?: string;
  title: string;
  content: string;
  ownerSubject: string;
  summary?: string | null;
  tags?: string | null;
  embedding?: number[] | null;
}

export interface NoteSearchQuery {
  ownerSubject: string;
  searchTerm?: string;
  pageNumber?: number;
  pageSize?: number;
}

export interface NoteSearchResult {
  notes: Note[];
  totalCount: number;
  pageNumber: number;
  pageSize: number;
  totalPages: number;
  searchTerm: string;
}

export const NOTE_STORAGE_PREFIX = 'note_';
export const EMBEDDING_PREFIX = 'embedding_'; // + note id

export const TITLE_MAX_LENGTH = 200;
export const CONTENT_MAX_LENGTH = 50_000;
export const SUMMARY_MAX_LENGTH = 500;
export const TAGS_MAX_LENGTH = 500;

export const hasTags = (note: Pick<Note, 'tags'>): boolean => !!note.tags && note.tags.length > 0;
