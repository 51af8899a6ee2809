import { describe, expect, test } from "vitest";
import type { Question, RunnerResult, Submission } from "../../packages/shared/src/types";
import {
  coerceList,
  coerceScore,
  JudgeClient,
  normalizeJudgeFields
} from "../src/services/evaluation/judgeClient";
import { env } from "../src/config/env";
import { excerpt } from "../src/services/evaluation/llm";
import { buildJudgeMessages } from "../src/services/evaluation/prompts";
import { judgeConfigFromEnv } from "../src/services/evaluation/types";
import {
  chatCompletion,
  createFakeFetch,
  hangingFetch,
  jsonResponse,
  textResponse,
  TEST_JUDGE_CONFIG
} from "./fakes/fakeFetch";

const question: Question = {
  id: "q-1",
  title: "Lookup functions",
  qtype: "theory",
  spec: { prompt: "Explain VLOOKUP vs INDEX/MATCH." },
  rubric: { key_points: ["lookup direction"] },
  idealAnswer: "INDEX/MATCH can look left.",
  version: 1
};

const submission: Submission = {
  id: "s-1",
  assignmentId: "a-1",
  questionId: "q-1",
  answer: "VLOOKUP only searches the first column.",
  fileRef: null,
  createdAt: "2025-01-01T00:00:00.000Z"
};

const runner: RunnerResult = {
  passed: true,
  checks: [{ name: "non_empty_submission", passed: true }],
  scoreRunner: 100
};

describe("JudgeClient", () => {
  test("without a credential returns degraded and makes no call", async () => {
    const fake = createFakeFetch(() => jsonResponse(chatCompletion("{}")));
    const judge = new JudgeClient({ ...TEST_JUDGE_CONFIG, credential: undefined }, { fetch: fake.fetch });

    const result = await judge.judge(question, submission, runner);

    expect(fake.calls).toHaveLength(0);
    expect(judge.hasCredential).toBe(false);
    expect(result).toEqual({
      status: "degraded",
      reason: "no_api_key",
      score: 0,
      verdict: "unavailable (no credential)",
      mistakes: [],
      improvements: ["Judge API key not configured on server."],
      citations: [],
      debug: { reason: "no_api_key" }
    });
  });

  test("normalizes aliased fields from a reply with a preamble", async () => {
    const content =
      'Reasoning first.\n{"grade": "150", "summary": "Solid answer", "errors": "one slip", "advice": ["a", null, 2], "sources": null}';
    const fake = createFakeFetch(() => jsonResponse(chatCompletion(content)));
    const judge = new JudgeClient(TEST_JUDGE_CONFIG, { fetch: fake.fetch });

    const result = await judge.judge(question, submission, runner);

    expect(result).toEqual({
      status: "ok",
      score: 100,
      verdict: "Solid answer",
      mistakes: ["one slip"],
      improvements: ["a", "2"],
      citations: [],
      debug: { http_status: 200, raw_excerpt: content }
    });
  });

  test("sends one deterministic request to the configured endpoint", async () => {
    const fake = createFakeFetch(() => jsonResponse(chatCompletion('{"score": 50}')));
    const judge = new JudgeClient(TEST_JUDGE_CONFIG, { fetch: fake.fetch });

    await judge.judge(question, submission, runner);

    expect(fake.calls).toHaveLength(1);
    expect(fake.calls[0].url).toBe("https://judge.test/v1/chat/completions");
    expect(fake.calls[0].method).toBe("POST");
    expect(fake.calls[0].body).toMatchObject({ model: "test-model", temperature: 0 });
  });

  test("the prompt carries question, submission and runner as JSON", () => {
    const [system, user] = buildJudgeMessages(question, { ...submission, fileRef: "https://files.test/a.csv" }, runner);
    expect(system.role).toBe("system");
    expect(user.content).toContain('"ideal_answer":"INDEX/MATCH can look left."');
    expect(user.content).toContain('"file_url":"https://files.test/a.csv"');
    expect(user.content).toContain('"score_runner":100');
  });

  test("a 200 text/plain body is degraded as unparsable, not an error", async () => {
    const fake = createFakeFetch(() => textResponse("upstream says hello"));
    const judge = new JudgeClient(TEST_JUDGE_CONFIG, { fetch: fake.fetch });

    const result = await judge.judge(question, submission, runner);

    expect(result.status).toBe("degraded");
    expect(result).toMatchObject({
      reason: "unparsable_response",
      score: 0,
      verdict: "unavailable (unparsable response)",
      improvements: ["Judge returned an unparsable response."],
      debug: { http_status: 200, raw_excerpt: "upstream says hello" }
    });
  });

  test("a 200 body labelled JSON that is not JSON is unparsable, not a network error", async () => {
    const body = "Sure! Here is my answer, no JSON.";
    const fake = createFakeFetch(
      () => new Response(body, { status: 200, headers: { "content-type": "application/json" } })
    );
    const judge = new JudgeClient(TEST_JUDGE_CONFIG, { fetch: fake.fetch });

    const result = await judge.judge(question, submission, runner);

    expect(result).toMatchObject({
      status: "degraded",
      reason: "unparsable_response",
      verdict: "unavailable (unparsable response)",
      debug: { http_status: 200, raw_excerpt: body }
    });
  });

  test("a reply without JSON is unparsable and its excerpt is capped", async () => {
    const content = "x".repeat(1000);
    const fake = createFakeFetch(() => jsonResponse(chatCompletion(content)));
    const judge = new JudgeClient(TEST_JUDGE_CONFIG, { fetch: fake.fetch });

    const result = await judge.judge(question, submission, runner);

    expect(result).toMatchObject({ status: "degraded", reason: "unparsable_response" });
    expect(result.debug?.raw_excerpt).toBe("x".repeat(397) + "...");
  });

  test("a timeout comes back as a network error", async () => {
    const fake = hangingFetch();
    const judge = new JudgeClient({ ...TEST_JUDGE_CONFIG, timeoutMs: 20 }, { fetch: fake.fetch });

    const result = await judge.judge(question, submission, runner);

    expect(fake.calls).toHaveLength(1);
    expect(result).toMatchObject({
      status: "degraded",
      reason: "network_error",
      score: 0,
      verdict: "unavailable (network error)"
    });
    expect(result.improvements[0].startsWith("network_error: ")).toBe(true);
    expect(typeof result.debug?.exception).toBe("string");
  });

  test("an HTTP error status is a network error", async () => {
    const fake = createFakeFetch(() => jsonResponse({ error: { message: "upstream down" } }, 500));
    const judge = new JudgeClient(TEST_JUDGE_CONFIG, { fetch: fake.fetch });

    const result = await judge.judge(question, submission, runner);

    expect(fake.calls).toHaveLength(1);
    expect(result).toMatchObject({ status: "degraded", reason: "network_error" });
  });

  test("rejects an invalid configuration at construction", () => {
    expect(() => new JudgeClient({ ...TEST_JUDGE_CONFIG, endpoint: "not a url" })).toThrow();
    expect(() => new JudgeClient({ ...TEST_JUDGE_CONFIG, timeoutMs: 0 })).toThrow();
  });
});

describe("normalizeJudgeFields", () => {
  test("primary key wins over its alias", () => {
    expect(normalizeJudgeFields({ score: 40, grade: 90, verdict: "v", summary: "s" })).toEqual({
      score: 40,
      verdict: "v",
      mistakes: [],
      improvements: [],
      citations: []
    });
  });

  test("a null primary falls through to the alias", () => {
    expect(normalizeJudgeFields({ score: null, grade: 65 }).score).toBe(65);
  });

  test("a non-string verdict is serialized", () => {
    expect(normalizeJudgeFields({ verdict: { short: "ok" } }).verdict).toBe('{"short":"ok"}');
  });
});

describe("coerceScore", () => {
  test("clamps into [0, 100]", () => {
    expect(coerceScore(-5)).toBe(0);
    expect(coerceScore(250)).toBe(100);
    expect(coerceScore(" 87.5 ")).toBe(87.5);
  });

  test("non-numeric values score 0", () => {
    expect(coerceScore("abc")).toBe(0);
    expect(coerceScore(undefined)).toBe(0);
    expect(coerceScore(null)).toBe(0);
  });

  test("booleans count as 1 and 0", () => {
    expect(coerceScore(true)).toBe(1);
    expect(coerceScore(false)).toBe(0);
  });
});

describe("coerceList", () => {
  test("wraps scalars and drops nulls", () => {
    expect(coerceList("one")).toEqual(["one"]);
    expect(coerceList(["a", null, 3])).toEqual(["a", "3"]);
    expect(coerceList(null)).toEqual([]);
    expect(coerceList("")).toEqual([]);
  });
});

describe("excerpt", () => {
  test("leaves short text alone", () => {
    expect(excerpt("short")).toBe("short");
  });

  test("caps at the limit including the ellipsis", () => {
    expect(excerpt("abcdefghij", 8)).toBe("abcde...");
  });
});

describe("judgeConfigFromEnv", () => {
  test("a missing key leaves the credential unset", () => {
    expect(judgeConfigFromEnv({ ...env, JUDGE_API_KEY: undefined }).credential).toBeUndefined();
  });

  test("the model can be overridden", () => {
    expect(judgeConfigFromEnv({ ...env, JUDGE_API_KEY: "test-secret" }, "sonar-pro")).toEqual({
      endpoint: env.JUDGE_ENDPOINT,
      model: "sonar-pro",
      credential: "test-secret",
      timeoutMs: env.JUDGE_TIMEOUT_MS
    });
  });
});
