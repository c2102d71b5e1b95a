import { beforeEach, describe, expect, it, vi } from "vitest";
import { readFile } from "node:fs/promises";

import ChannelNames from "../../types/ChannelNames";
import { BackfillCoordinator } from "../backfillManager";
import { bootstrap, startBackground } from "../index";
import { createRuntime } from "../runtime";
import type { BroadcastMessage } from "../runtime";
import { configureStorage } from "../storageDriver";
import {
  createFakeClient, deferred, FakeNoteStore, InMemoryNoteDatabase, makeNote,
} from "./fakes";

const storage = vi.hoisted(() => ({ items: new Map<string, unknown>() }));

vi.mock("localforage", () => ({
  default: {
    getItem: vi.fn(async (key: string) => (storage.items.has(key) ? structuredClone(storage.items.get(key)) : null)),
    setItem: vi.fn(async (key: string, value: unknown) => {
      storage.items.set(key, structuredClone(value));
      return value;
    }),
    removeItem: vi.fn(async (key: string) => {
      storage.items.delete(key);
    }),
    keys: vi.fn(async () => [...storage.items.keys()]),
  },
}));

vi.mock("../storageDriver", () => ({ configureStorage: vi.fn(async () => undefined) }));
vi.mock("node:fs/promises", () => ({ readFile: vi.fn() }));

const setup = (db = new InMemoryNoteDatabase()) => {
  const runtime = createRuntime();
  const client = createFakeClient();
  const createStore = () => new FakeNoteStore(db);
  const coordinator = new BackfillCoordinator(createStore, client, { now: () => 9_000 });
  const broadcasts: BroadcastMessage[] = [];

  runtime.onBroadcast.addListener(message => broadcasts.push(message));

  const stop = startBackground({ runtime, coordinator, client, createStore, settings: null });

  return { runtime, client, db, broadcasts, stop };
};

const storedNoteId = (): string => {
  const id = [...storage.items.keys()].find(key => key.startsWith("note_"));

  if (!id) throw new Error("no note stored");

  return id;
};

describe("Background (index.ts)", () => {
  beforeEach(() => {
    storage.items.clear();
    vi.clearAllMocks();
  });

  describe("note requests", () => {
    it("should create, read, search and delete a note", async () => {
      const { runtime } = setup();

      const saved = await runtime.sendMessage({
        type: ChannelNames.SAVE_NOTE_REQUEST,
        payload: { title: "Groceries", content: "Milk and eggs", ownerSubject: "user-1" },
      });
      const id = storedNoteId();

      expect(saved).toMatchObject({
        success: true,
        data: { id, title: "Groceries", summary: "A short summary.", tags: "tag-groceries", embedding: [0.1, 0.2, 0.3] },
      });

      await expect(
        runtime.sendMessage({ type: ChannelNames.GET_NOTE_REQUEST, payload: { noteId: id, ownerSubject: "user-1" } }),
      ).resolves.toMatchObject({ success: true, data: { id, content: "Milk and eggs" } });

      await expect(
        runtime.sendMessage({ type: ChannelNames.GET_ALL_NOTES_REQUEST, payload: { ownerSubject: "user-2" } }),
      ).resolves.toEqual({ success: true, data: [] });

      await expect(
        runtime.sendMessage({ type: ChannelNames.SEARCH_NOTES_REQUEST, payload: { ownerSubject: "user-1", searchTerm: "EGGS" } }),
      ).resolves.toMatchObject({
        success: true,
        data: { totalCount: 1, pageNumber: 1, pageSize: 10, totalPages: 1, searchTerm: "EGGS" },
      });

      await expect(
        runtime.sendMessage({ type: ChannelNames.DELETE_NOTE_REQUEST, payload: { noteId: id, ownerSubject: "user-1" } }),
      ).resolves.toEqual({ success: true, data: { deleted: true } });

      await expect(
        runtime.sendMessage({ type: ChannelNames.GET_NOTE_REQUEST, payload: { noteId: id, ownerSubject: "user-1" } }),
      ).resolves.toEqual({ success: false, error: "Note not found.", errorType: "NotFoundError" });
      expect(storage.items.size).toBe(0);
    });

    it("should answer an invalid payload with an InvalidRequestError", async () => {
      const { runtime } = setup();

      await expect(
        runtime.sendMessage({ type: ChannelNames.SEARCH_NOTES_REQUEST, payload: { ownerSubject: "user-1", pageSize: 500 } }),
      ).resolves.toEqual({
        success: false,
        error: "pageSize must be an integer between 1 and 100",
        errorType: "InvalidRequestError",
      });
      await expect(runtime.sendMessage({ type: ChannelNames.GET_ALL_NOTES_REQUEST })).resolves.toEqual({
        success: false,
        error: "Message payload must be an object.",
        errorType: "InvalidRequestError",
      });
    });
  });

  describe("backfill requests", () => {
    it("should run an embeddings backfill and report the result", async () => {
      const db = new InMemoryNoteDatabase([
        makeNote({ id: "note_1", title: "A" }),
        makeNote({ id: "note_2", title: "B", createdAt: 2_000, embedding: [1, 1, 1] }),
      ]);
      const { runtime, broadcasts } = setup(db);

      const response = await runtime.sendMessage({
        type: ChannelNames.BACKFILL_EMBEDDINGS_REQUEST,
        payload: { ownerSubject: "user-1" },
      });

      expect(response).toEqual({
        success: true,
        data: { processedCount: 1, totalNotes: 1, errors: [], cancelled: false },
      });
      expect(db.row("note_1")?.embedding).toEqual([0.1, 0.2, 0.3]);
      expect(db.row("note_2")?.embedding).toEqual([1, 1, 1]);
      expect(broadcasts.map(message => message.type)).toEqual([
        ChannelNames.BACKFILL_START,
        ChannelNames.BACKFILL_PROGRESS,
        ChannelNames.BACKFILL_END,
      ]);
    });

    it("should refuse a concurrent run and stop at the next note when cancelled", async () => {
      const db = new InMemoryNoteDatabase([
        makeNote({ id: "note_1", title: "A" }),
        makeNote({ id: "note_2", title: "B", createdAt: 2_000 }),
      ]);
      const { runtime, client } = setup(db);
      const gate = deferred<string>();
      client.generateTags.mockImplementationOnce(() => gate.promise);

      const running = runtime.sendMessage({ type: ChannelNames.BACKFILL_TAGS_REQUEST, payload: { ownerSubject: "user-1" } });
      await vi.waitFor(() => expect(client.generateTags).toHaveBeenCalledTimes(1));

      await expect(
        runtime.sendMessage({ type: ChannelNames.BACKFILL_EMBEDDINGS_REQUEST, payload: { ownerSubject: "user-1" } }),
      ).resolves.toEqual({
        success: false,
        error: "A backfill is already running for owner 'user-1'.",
        errorType: "InvalidRequestError",
      });
      await expect(
        runtime.sendMessage({ type: ChannelNames.BACKFILL_CANCEL_REQUEST, payload: { ownerSubject: "user-1" } }),
      ).resolves.toEqual({ success: true, data: { cancelled: true } });

      gate.resolve("first");

      await expect(running).resolves.toEqual({
        success: true,
        data: { processedCount: 1, totalNotes: 2, errors: [], cancelled: true },
      });
      expect(db.row("note_1")?.tags).toBe("first");
      expect(db.row("note_2")?.tags).toBeNull();
    });
  });

  it("should find related notes with the default parameters", async () => {
    const db = new InMemoryNoteDatabase([
      makeNote({ id: "note_1", title: "A", embedding: [1, 0] }),
      makeNote({ id: "note_2", title: "B", embedding: [0.8, 0.6] }),
      makeNote({ id: "note_3", title: "C", embedding: [0, 1] }),
    ]);
    const { runtime } = setup(db);

    const response = await runtime.sendMessage({
      type: ChannelNames.GET_RELATED_NOTES_REQUEST,
      payload: { noteId: "note_1", ownerSubject: "user-1" },
    });

    expect(response).toMatchObject({ success: true, data: [{ id: "note_2", title: "B" }] });
  });

  it("should leave unknown messages unanswered and remove its handlers on stop", async () => {
    const { runtime, stop } = setup();

    await expect(runtime.sendMessage({ type: "open-side-panel" })).resolves.toEqual({
      success: false,
      error: "No handler for message type 'open-side-panel'.",
      errorType: "InvalidRequestError",
    });

    stop();

    await expect(
      runtime.sendMessage({ type: ChannelNames.GET_ALL_NOTES_REQUEST, payload: { ownerSubject: "user-1" } }),
    ).resolves.toMatchObject({ success: false, errorType: "InvalidRequestError" });
  });

  describe("bootstrap", () => {
    it("should load settings, prepare storage and serve requests", async () => {
      vi.mocked(readFile).mockRejectedValue(Object.assign(new Error("ENOENT"), { code: "ENOENT" }));

      const background = await bootstrap({ OPENAI_API_KEY: "test-secret" });

      expect(background.settings.openAiApiKey).toBe("test-secret");
      expect(configureStorage).toHaveBeenCalledWith({ name: "notes" });
      await expect(
        background.runtime.sendMessage({ type: ChannelNames.GET_ALL_NOTES_REQUEST, payload: { ownerSubject: "user-1" } }),
      ).resolves.toEqual({ success: true, data: [] });

      background.stop();
    });
  });
});
