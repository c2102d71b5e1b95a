enum ChannelNames {
  // Backfill runs
  BACKFILL_TAGS_REQUEST = 'backfill-tags-request',
  BACKFILL_EMBEDDINGS_REQUEST = 'backfill-embeddings-request',
  BACKFILL_CANCEL_REQUEST = 'backfill-cancel-request',

  // Broadcast while a run is in flight
  BACKFILL_START = 'backfill-start',
  BACKFILL_PROGRESS = 'backfill-progress',
  BACKFILL_END = 'backfill-end',
  BACKFILL_ERROR = 'backfill-error',

  GET_RELATED_NOTES_REQUEST = 'get-related-notes-request',

  // Note CRUD
  SAVE_NOTE_REQUEST = 'save-note-request',
  GET_NOTE_REQUEST = 'get-note-request',
  GET_ALL_NOTES_REQUEST = 'get-all-notes-request',
  SEARCH_NOTES_REQUEST = 'search-notes-request',
  DELETE_NOTE_REQUEST = 'delete-note-request',
}

export default ChannelNames;
