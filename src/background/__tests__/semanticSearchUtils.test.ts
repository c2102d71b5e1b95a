import { describe, expect, it, vi } from "vitest";

import { InvalidRequestError } from "../errors";
import { cosineSimilarity, findRelatedNotes } from "../semanticSearchUtils";
import type { Note } from "../../types/noteTypes";
import { makeNote } from "./fakes";

const storeWith = (notes: Note[]) => ({ query: vi.fn(async () => notes) });

describe("cosineSimilarity", () => {
  it("should score identical directions as 1 and orthogonal ones as 0", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("should return 0 for mismatched or zero vectors", () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });
});

describe("findRelatedNotes", () => {
  const notes = [
    makeNote({ id: "note_q", title: "Query", embedding: [1, 0] }),
    makeNote({ id: "note_a", title: "Same", embedding: [1, 0], updatedAt: 2_000, tags: "x" }),
    makeNote({ id: "note_f", title: "Same, newer", embedding: [1, 0], updatedAt: 3_000 }),
    makeNote({ id: "note_b", title: "Close", embedding: [0.8, 0.6], summary: "close one" }),
    makeNote({ id: "note_c", title: "Far", embedding: [0, 1] }),
    makeNote({ id: "note_d", title: "Other model", embedding: [1, 0, 0] }),
    makeNote({ id: "note_e", title: "Not embedded" }),
  ];

  it("should rank by score, then recency, dropping weak and incompatible matches", async () => {
    const related = await findRelatedNotes(storeWith(notes), { noteId: "note_q", ownerSubject: "user-1" });

    expect(related.map(note => note.id)).toEqual(["note_f", "note_a", "note_b"]);
    expect(related[1]).toEqual({ id: "note_a", title: "Same", summary: null, tags: "x", updatedAt: 2_000, score: 1 });
    expect(related[2].score).toBeCloseTo(0.8);
    expect(related[2].summary).toBe("close one");
  });

  it("should honour topN and the threshold", async () => {
    const store = storeWith(notes);

    expect(await findRelatedNotes(store, { noteId: "note_q", ownerSubject: "user-1", topN: 2 })).toHaveLength(2);
    expect(
      (await findRelatedNotes(store, { noteId: "note_q", ownerSubject: "user-1", similarityThreshold: 0.9 })).map(note => note.id),
    ).toEqual(["note_f", "note_a"]);
  });

  it("should break full ties by id", async () => {
    const tied = [
      makeNote({ id: "note_q", title: "Query", embedding: [1, 0] }),
      makeNote({ id: "note_z", title: "Z", embedding: [1, 0] }),
      makeNote({ id: "note_m", title: "M", embedding: [1, 0] }),
    ];

    const related = await findRelatedNotes(storeWith(tied), { noteId: "note_q", ownerSubject: "user-1" });

    expect(related.map(note => note.id)).toEqual(["note_m", "note_z"]);
  });

  it("should return nothing for a missing or unembedded query note", async () => {
    const store = storeWith(notes);

    expect(await findRelatedNotes(store, { noteId: "note_missing", ownerSubject: "user-1" })).toEqual([]);
    expect(await findRelatedNotes(store, { noteId: "note_e", ownerSubject: "user-1" })).toEqual([]);
  });

  it("should only consider the owner's notes", async () => {
    const store = storeWith([]);

    expect(await findRelatedNotes(store, { noteId: "note_q", ownerSubject: "user-2" })).toEqual([]);
    expect(store.query).toHaveBeenCalledWith("user-2", false);
  });

  it("should reject a topN below one", async () => {
    await expect(
      findRelatedNotes(storeWith(notes), { noteId: "note_q", ownerSubject: "user-1", topN: 0 }),
    ).rejects.toBeInstanceOf(InvalidRequestError);
  });
});
