import { expect, test } from "vitest";
import {
  DisabledCompletionClient,
  LlmCompletionClient,
  createCompletionClient,
  toProviderMessages,
  type ChatRequester,
} from "../llm/client.js";

const conversation = [
  { role: "user" as const, content: "hi" },
  { role: "assistant" as const, content: "hello" },
  { role: "user" as const, content: "how are you" },
];

test("provider messages start with the system prompt", () => {
  expect(toProviderMessages("be brief", conversation)).toEqual([
    { role: "system", content: "be brief" },
    { role: "user", content: "hi" },
    { role: "assistant", content: "hello" },
    { role: "user", content: "how are you" },
  ]);
});

test("a model answer comes back trimmed", async () => {
  let seen = 0;
  const requester: ChatRequester = async ({ messages }) => {
    seen = messages.length;
    return "  fine, thanks  ";
  };
  const client = new LlmCompletionClient(requester, { timeoutMs: 1000 });

  expect(await client.complete("be brief", conversation)).toEqual({ ok: true, text: "fine, thanks" });
  expect(seen).toBe(4);
});

test("an empty answer is a failure", async () => {
  const client = new LlmCompletionClient(async () => "   ", { timeoutMs: 1000 });

  expect(await client.complete("p", conversation)).toEqual({
    ok: false,
    kind: "failure",
    error: "Empty response from provider",
  });
});

test("a missing answer is a failure", async () => {
  const client = new LlmCompletionClient(async () => null, { timeoutMs: 1000 });

  expect(await client.complete("p", conversation)).toEqual({
    ok: false,
    kind: "failure",
    error: "Empty response from provider",
  });
});

test("provider errors become failures", async () => {
  const client = new LlmCompletionClient(
    async () => {
      throw new Error("503 upstream");
    },
    { timeoutMs: 1000 }
  );

  expect(await client.complete("p", conversation)).toEqual({ ok: false, kind: "failure", error: "503 upstream" });
});

test("a slow provider times out and its request is aborted", async () => {
  const seen: { signal?: AbortSignal } = {};
  const requester: ChatRequester = (req) => {
    seen.signal = req.signal;
    return new Promise<string | null>(() => undefined);
  };
  const client = new LlmCompletionClient(requester, { timeoutMs: 20 });

  expect(await client.complete("p", conversation)).toEqual({
    ok: false,
    kind: "timeout",
    error: "Completion timed out after 20ms",
  });
  expect(seen.signal?.aborted).toBe(true);
});

test("the disabled client always fails", async () => {
  expect(await new DisabledCompletionClient().complete()).toEqual({
    ok: false,
    kind: "failure",
    error: "LLM disabled",
  });
});

test("createCompletionClient honours the enabled flag", () => {
  const llm = { enabled: true, model: "gpt-4o-mini", temperature: 0.7, maxTokens: 400, timeoutMs: 16000 };
  const openai = { apiKey: "test-openai-key" };

  expect(createCompletionClient({ openai, llm })).toBeInstanceOf(LlmCompletionClient);
  expect(createCompletionClient({ openai, llm: { ...llm, enabled: false } })).toBeInstanceOf(DisabledCompletionClient);
});

test("an enabled client without an API key is refused", () => {
  const llm = { enabled: true, model: "gpt-4o-mini", temperature: 0.7, maxTokens: 400, timeoutMs: 16000 };

  expect(() => createCompletionClient({ openai: {}, llm })).toThrow("OPENAI_API_KEY not configured in .env");
  expect(createCompletionClient({ openai: {}, llm: { ...llm, enabled: false } })).toBeInstanceOf(
    DisabledCompletionClient
  );
});
