import type { RecordStore } from "./store";
import { logger } from "../logger";

export type SeedResult = { candidateId: string; questionId: string; packId: string; assignmentId: string };

/** Demo candidate, one theory question in a starter pack, and an assignment linking them. */
export async function seedDemo(store: RecordStore): Promise<SeedResult> {
  const candidate = await store.createCandidate({ email: "demo@example.com", name: "Demo User" });
  const question = await store.createQuestion({
    title: "Lookup functions",
    qtype: "theory",
    spec: { prompt: "Explain VLOOKUP vs INDEX/MATCH." },
    rubric: { key_points: ["lookup mechanics", "limitations", "alternatives"] },
    idealAnswer: "VLOOKUP searches the first column only; INDEX/MATCH can look left and survives column inserts."
  });
  const { pack } = await store.createPack({
    name: "Starter Pack",
    items: [{ questionId: question.id }]
  });
  const assignment = await store.createAssignment({ candidateId: candidate.id, packId: pack.id });

  const result = { candidateId: candidate.id, questionId: question.id, packId: pack.id, assignmentId: assignment.id };
  logger.info(result, "Seeded demo data");
  return result;
}
