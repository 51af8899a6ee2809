import type { AppDeps } from "../src/deps";
import { EvaluationPipeline, HealthProbe, JudgeClient } from "../src/services/evaluation";
import type { JudgeConfig } from "../src/services/evaluation";
import { QuestionGenerator } from "../src/services/questions/generator";
import type { ObjectStorage } from "../src/services/storage/objectStorage";
import { chatCompletion, createFakeFetch, jsonResponse, TEST_JUDGE_CONFIG, type FakeFetch } from "./fakes/fakeFetch";
import { MemoryRecordStore } from "./fakes/memoryStore";

export type TestDeps = AppDeps & { store: MemoryRecordStore; judgeFetch: FakeFetch };

type TestDepsOptions = {
  judgeReply?: string;
  credential?: string;
  storage?: ObjectStorage | null;
  debug?: boolean;
};

/** App dependencies with an in-memory store and a scripted judge endpoint. */
export function createTestDeps(options: TestDepsOptions = {}): TestDeps {
  const store = new MemoryRecordStore();
  const reply = options.judgeReply ?? '{"score": 85, "verdict": "Good", "mistakes": [], "improvements": ["cite sources"], "citations": []}';
  const judgeFetch = createFakeFetch(() => jsonResponse(chatCompletion(reply)));
  const config: JudgeConfig = {
    ...TEST_JUDGE_CONFIG,
    credential: "credential" in options ? options.credential : TEST_JUDGE_CONFIG.credential
  };
  const transport = { fetch: judgeFetch.fetch };
  const storage = options.storage ?? null;
  return {
    store,
    judgeFetch,
    pipeline: new EvaluationPipeline({ judge: new JudgeClient(config, transport), grades: store, storage }),
    probe: new HealthProbe(config, transport),
    generator: new QuestionGenerator(config, transport),
    storage,
    debug: options.debug ?? false,
    healthTimeoutMs: 1_000
  };
}
