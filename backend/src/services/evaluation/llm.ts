/**
 * Chat-completion plumbing shared by the judge, the health probe and the question generator.
 * Talks to any OpenAI-compatible endpoint through the openai SDK (baseURL = configured endpoint).
 */

import OpenAI from "openai";
import { RAW_EXCERPT_MAX_CHARS, type ChatTransport, type JudgeConfig } from "./types";

export function createChatClient(config: JudgeConfig, credential: string, transport: ChatTransport = {}): OpenAI {
  return new OpenAI({
    apiKey: credential,
    baseURL: config.endpoint,
    timeout: config.timeoutMs,
    // Bounded wait: a timeout is reported, not retried.
    maxRetries: 0,
    ...(transport.fetch && { fetch: transport.fetch })
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Body of a reply the transport accepted: parsed JSON when it parses, the raw text otherwise.
 * The content-type header is not trusted; providers label plain text as JSON.
 */
export function parseBody(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/**
 * Model text from a chat-completion envelope: choices[0].message.content, then .text.
 * Falls back to the whole body (string bodies as-is, anything else serialized).
 */
export function extractMessageText(body: unknown): string {
  if (typeof body === "string") return body;
  if (isRecord(body) && Array.isArray(body.choices)) {
    const first: unknown = body.choices[0];
    if (isRecord(first) && isRecord(first.message)) {
      const { content, text } = first.message;
      if (typeof content === "string" && content) return content;
      if (typeof text === "string" && text) return text;
    }
  }
  return JSON.stringify(body) ?? "";
}

export function excerpt(text: string, max: number = RAW_EXCERPT_MAX_CHARS): string {
  if (text.length <= max) return text;
  return text.slice(0, max - 3) + "...";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name && error.name !== "Error" ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
}
