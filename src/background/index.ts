import ChannelNames from '../types/ChannelNames';
import type { NoteStoreFactory } from './backfillManager';
import { BackfillCoordinator } from './backfillManager';
import type { EnrichmentClient } from './enrichmentClient';
import { OpenAIEnrichmentClient } from './enrichmentClient';
import {
  handleBackfillRequest,
  handleCancelBackfill,
  handleDeleteNote,
  handleGetAllNotes,
  handleGetNote,
  handleGetRelatedNotes,
  handleSaveNote,
  handleSearchNotes,
  respond,
} from './handlers';
import type { HandlerContext } from './handlers';
import { LocalforageNoteStore } from './noteStorage';
import type { MessageListener, Runtime } from './runtime';
import { createRuntime } from './runtime';
import { configureStorage } from './storageDriver';
import type { AppSettings } from './storageUtil';
import { getEffectiveBackfillParams, loadAppSettings } from './storageUtil';

export interface BackgroundDeps {
  runtime: Runtime;
  coordinator: BackfillCoordinator;
  client: EnrichmentClient;
  createStore: NoteStoreFactory;
  settings: AppSettings | null;
}

/**
 * Registers the note and backfill handlers on the runtime.
 *
 * @returns A function that removes the handlers and cancels any run in flight.
 */
export const startBackground = (deps: BackgroundDeps): (() => void) => {
  const context: HandlerContext = { ...deps, activeRuns: new Map() };

  const listener: MessageListener = (message, sendResponse) => {
    if (!message || !message.type) {
      return false;
    }

    const { payload } = message;

    switch (message.type) {
      case ChannelNames.BACKFILL_TAGS_REQUEST:
        void handleBackfillRequest('tags', payload, context, sendResponse);

        return true;

      case ChannelNames.BACKFILL_EMBEDDINGS_REQUEST:
        void handleBackfillRequest('embeddings', payload, context, sendResponse);

        return true;

      case ChannelNames.BACKFILL_CANCEL_REQUEST:
        void respond(sendResponse, 'Backfill cancel', async () => handleCancelBackfill(payload, context));

        return true;

      case ChannelNames.GET_RELATED_NOTES_REQUEST:
        void respond(sendResponse, 'Related notes lookup', () => handleGetRelatedNotes(payload, context));

        return true;

      case ChannelNames.SAVE_NOTE_REQUEST:
        void respond(sendResponse, 'Note save', () => handleSaveNote(payload, context));

        return true;

      case ChannelNames.GET_NOTE_REQUEST:
        void respond(sendResponse, 'Note fetch', () => handleGetNote(payload));

        return true;

      case ChannelNames.GET_ALL_NOTES_REQUEST:
        void respond(sendResponse, 'Note listing', () => handleGetAllNotes(payload));

        return true;

      case ChannelNames.SEARCH_NOTES_REQUEST:
        void respond(sendResponse, 'Note search', () => handleSearchNotes(payload));

        return true;

      case ChannelNames.DELETE_NOTE_REQUEST:
        void respond(sendResponse, 'Note delete', () => handleDeleteNote(payload));

        return true;

      default:
        return false;
    }
  };

  deps.runtime.onMessage.addListener(listener);
  console.log('[Background] Message handlers registered.');

  return () => {
    deps.runtime.onMessage.removeListener(listener);

    for (const controller of context.activeRuns.values()) {
      controller.abort();
    }

    console.log('[Background] Message handlers removed.');
  };
};

export interface Background {
  runtime: Runtime;
  coordinator: BackfillCoordinator;
  settings: AppSettings;
  stop: () => void;
}

/**
 * Loads settings, prepares storage and wires the enrichment client, the
 * backfill coordinator and the message router together.
 */
export const bootstrap = async (env: NodeJS.ProcessEnv = process.env): Promise<Background> => {
  const settings = await loadAppSettings(env);

  await configureStorage({ name: settings.storageName });

  const client = new OpenAIEnrichmentClient(settings);
  const createStore: NoteStoreFactory = () => new LocalforageNoteStore();
  const coordinator = new BackfillCoordinator(createStore, client, getEffectiveBackfillParams(settings));
  const runtime = createRuntime();
  const stop = startBackground({ runtime, coordinator, client, createStore, settings });

  return { runtime, coordinator, settings, stop };
};
