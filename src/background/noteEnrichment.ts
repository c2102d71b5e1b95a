import type { EnrichmentClient } from './enrichmentClient';
import { errorMessage } from './errors';

export interface NoteEnrichment {
  summary: string | null;
  tags: string | null;
  embedding: number[] | null;
}

const settledValue = <T>(result: PromiseSettledResult<T>, field: string, title: string): T | null => {
  if (result.status === 'fulfilled') {
    return result.value;
  }

  console.warn(`[Enrichment] Could not generate ${field} for note '${title}': ${errorMessage(result.reason)}`);

  return null;
};

/**
 * Generates summary, tags and embedding for a new note in parallel. A field
 * whose generation fails comes back as null; the note is saved without it.
 */
export const enrichNewNote = async (
  client: EnrichmentClient,
  title: string,
  content: string,
  signal?: AbortSignal,
): Promise<NoteEnrichment> => {
  const [summary, tags, embedding] = await Promise.allSettled([
    client.generateSummary(content, signal),
    client.generateTags(title, content, signal),
    client.generateEmbedding(title, content, signal),
  ]);

  return {
    summary: settledValue(summary, 'summary', title),
    tags: settledValue(tags, 'tags', title),
    embedding: settledValue(embedding, 'embedding', title),
  };
};
