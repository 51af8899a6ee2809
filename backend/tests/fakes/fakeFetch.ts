/** Scripted fetch for the openai SDK and the storage client. Records every call; never touches the network. */

export type FakeCall = { url: string; method: string; body: unknown };

export type FakeFetch = { fetch: typeof fetch; calls: FakeCall[] };

type Handler = (url: string, init?: RequestInit) => Response | Promise<Response>;

function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

function bodyOf(init?: RequestInit): unknown {
  const body = init?.body;
  if (typeof body !== "string") return body ?? null;
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    return body;
  }
}

export function createFakeFetch(handler: Handler): FakeFetch {
  const calls: FakeCall[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    const url = urlOf(input);
    calls.push({ url, method: init?.method ?? "GET", body: bodyOf(init) });
    return handler(url, init);
  };
  return { fetch: fakeFetch, calls };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status, headers: { "content-type": "text/plain" } });
}

/** OpenAI-style chat completion envelope around one assistant message. */
export function chatCompletion(content: string): Record<string, unknown> {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1_700_000_000,
    model: "test-model",
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }]
  };
}

/** Never answers; rejects once the caller aborts (SDK timeout). */
export function hangingFetch(): FakeFetch {
  return createFakeFetch(
    (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        if (signal.aborted) reject(new Error("aborted"));
        signal.addEventListener("abort", () => reject(new Error("aborted")));
      })
  );
}

export const TEST_JUDGE_CONFIG = {
  endpoint: "https://judge.test/v1",
  model: "test-model",
  credential: "test-secret",
  timeoutMs: 1_000
};
