export { BackfillCoordinator } from './background/backfillManager';
export type { BackfillCoordinatorOptions, NoteStoreFactory } from './background/backfillManager';
export {
  cleanTags, OpenAIEnrichmentClient, resolveProviderEndpoint, toEnrichmentError,
} from './background/enrichmentClient';
export type { EnrichmentClient, OpenAIEnrichmentClientOptions, ProviderEndpoint } from './background/enrichmentClient';
export {
  EnrichmentError, InvalidRequestError, NotesError, NotFoundError, PersistenceError,
} from './background/errors';
export { bootstrap, startBackground } from './background/index';
export type { Background, BackgroundDeps } from './background/index';
export { enrichNewNote } from './background/noteEnrichment';
export type { NoteEnrichment } from './background/noteEnrichment';
export {
  deleteNoteFromSystem,
  getAllNotesFromSystem,
  getNoteByIdFromSystem,
  LocalforageNoteStore,
  saveNoteInSystem,
  searchNotesInSystem,
} from './background/noteStorage';
export type { NoteStore } from './background/noteStorage';
export { createRuntime } from './background/runtime';
export type {
  BroadcastMessage, MessageResponse, Runtime, RuntimeMessage,
} from './background/runtime';
export { cosineSimilarity, findRelatedNotes } from './background/semanticSearchUtils';
export { configureStorage } from './background/storageDriver';
export {
  getEffectiveBackfillParams, getEffectiveRelatedNotesParams, getStoredAppSettings, loadAppSettings,
} from './background/storageUtil';
export type { AppSettings } from './background/storageUtil';
export { default as ChannelNames } from './types/ChannelNames';
export type * from './types/backfillTypes';
export type { Note, NoteInput, NoteSearchQuery, NoteSearchResult } from './types/noteTypes';
export type * from './types/config';
