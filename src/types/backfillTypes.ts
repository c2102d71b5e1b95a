export type BackfillKind = 'tags' | 'embeddings';

export interface BackfillRequest {
  ownerSubject: string;
  onlyMissing?: boolean;
}

export interface BackfillResult {
  processedCount: number;
  totalNotes: number;
  errors: string[];
  cancelled: boolean;
}

export interface BackfillProgress {
  kind: BackfillKind;
  processed: number;
  failed: number;
  total: number;
  noteId: string;
}

export interface BackfillRunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: BackfillProgress) => void;
}

export interface RelatedNotesRequest {
  noteId: string;
  ownerSubject: string;
  topN?: number;
  similarityThreshold?: number;
}

export interface RelatedNote {
  id: string;
  title: string;
  summary: string | null;
  tags: string | null;
  updatedAt: number;
  score: number;
}
