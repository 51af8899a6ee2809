import { env } from "./config/env";
import { pool } from "./db/pool";
import { PgRecordStore } from "./db/pgStore";
import type { RecordStore } from "./db/store";
import { EvaluationPipeline, HealthProbe, JudgeClient, judgeConfigFromEnv } from "./services/evaluation";
import { QuestionGenerator } from "./services/questions/generator";
import { createObjectStorage, type ObjectStorage } from "./services/storage/objectStorage";

export type AppDeps = {
  store: RecordStore;
  pipeline: EvaluationPipeline;
  probe: HealthProbe;
  generator: QuestionGenerator;
  storage: ObjectStorage | null;
  /** Include judge/probe debug bags in responses. */
  debug: boolean;
  healthTimeoutMs: number;
};

/** Production wiring: Postgres store, env-configured judge, optional object storage. */
export function createDefaultDeps(): AppDeps {
  const store = new PgRecordStore(pool);
  const judgeConfig = judgeConfigFromEnv(env);
  const storage = createObjectStorage(env);
  return {
    store,
    pipeline: new EvaluationPipeline({
      judge: new JudgeClient(judgeConfig),
      grades: store,
      storage,
      signedUrlTtlSeconds: env.SIGNED_URL_TTL_SECONDS
    }),
    probe: new HealthProbe(judgeConfig),
    generator: new QuestionGenerator(judgeConfigFromEnv(env, env.GENERATOR_MODEL)),
    storage,
    debug: env.DEBUG,
    healthTimeoutMs: env.HEALTH_TIMEOUT_MS
  };
}
