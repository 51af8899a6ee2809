import { describe, expect, test } from "vitest";
import { seedDemo } from "../src/db/seed";
import { MemoryRecordStore } from "./fakes/memoryStore";

describe("seedDemo", () => {
  test("creates a candidate, a question in a pack, and an assignment", async () => {
    const store = new MemoryRecordStore();

    const ids = await seedDemo(store);

    expect(await store.getCandidate(ids.candidateId)).toMatchObject({ email: "demo@example.com" });
    expect(await store.listPackItems(ids.packId)).toEqual([
      expect.objectContaining({ questionId: ids.questionId, position: 1, timerSeconds: 180 })
    ]);
    expect(await store.getAssignment(ids.assignmentId)).toMatchObject({
      candidateId: ids.candidateId,
      packId: ids.packId,
      startedAt: null
    });
  });
});
