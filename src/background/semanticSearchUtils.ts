import type { RelatedNote, RelatedNotesRequest } from '../types/backfillTypes';
import type { Note } from '../types/noteTypes';
import { InvalidRequestError } from './errors';
import type { NoteStore } from './noteStorage';

/**
 * Calculates the cosine similarity between two vectors.
 * @returns The cosine similarity, or 0 for vectors of different lengths or zero magnitude.
 */
export function cosineSimilarity(vecA: number[], vecB: number[]): number {
  if (vecA.length !== vecB.length) {
    console.error('Vectors have different lengths, cannot compute cosine similarity.');
    return 0;
  }
  if (vecA.length === 0) {
    console.error('Vectors are empty, cannot compute cosine similarity.');
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < vecA.length; i++) {
    dotProduct += vecA[i] * vecB[i];
    normA += vecA[i] * vecA[i];
    normB += vecB[i] * vecB[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}

/**
 * Nearest notes of the same owner by cosine similarity of their stored
 * embeddings. Notes scoring under the threshold are left out.
 */
export async function findRelatedNotes(
  store: Pick<NoteStore, 'query'>,
  request: RelatedNotesRequest,
): Promise<RelatedNote[]> {
  const { noteId, ownerSubject, topN = 5, similarityThreshold = 0.7 } = request;

  if (!ownerSubject || !ownerSubject.trim()) {
    throw new InvalidRequestError('ownerSubject is required');
  }
  if (!Number.isInteger(topN) || topN < 1) {
    throw new InvalidRequestError('topN must be a positive integer');
  }
  if (!Number.isFinite(similarityThreshold)) {
    throw new InvalidRequestError('similarityThreshold must be a number');
  }

  const notes: Note[] = await store.query(ownerSubject, false);

  const queryNote = notes.find(note => note.id === noteId);
  const queryEmbedding = queryNote?.embedding;

  if (!queryEmbedding || queryEmbedding.length === 0) {
    return [];
  }

  const related: RelatedNote[] = [];

  for (const note of notes) {
    if (note.id === noteId || note.ownerSubject !== ownerSubject) continue;
    if (!note.embedding || note.embedding.length !== queryEmbedding.length) continue;

    const score = cosineSimilarity(queryEmbedding, note.embedding);

    if (score >= similarityThreshold) {
      related.push({
        id: note.id,
        title: note.title,
        summary: note.summary,
        tags: note.tags,
        updatedAt: note.updatedAt,
        score,
      });
    }
  }

  related.sort((a, b) => b.score - a.score || b.updatedAt - a.updatedAt || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  return related.slice(0, topN);
}
