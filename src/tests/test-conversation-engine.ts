import { expect, test } from "vitest";
import { FALLBACK_REPLY } from "../llm/fallback.js";
import type { CompletionResult } from "../llm/client.js";
import { ConversationEngine } from "../engine/engine.js";
import { MemoryManager } from "../engine/memory.js";
import { createPersonaRegistry } from "../personas/index.js";
import { ChannelStateManager } from "../state/channelState.js";
import type { Turn } from "../state/types.js";
import {
  BOT_ID,
  InMemoryStateStore,
  ScriptedCompletionClient,
  SCOPE,
  createHarness,
  deferred,
  flush,
  inbound,
  replyWith,
} from "./helpers/fakes.js";

/** Fails the first memory read, as a locked database file would. */
class FlakyMemoryStore extends InMemoryStateStore {
  private failed = false;

  override loadMemory(scope: string): Turn[] | null {
    if (!this.failed) {
      this.failed = true;
      throw new Error("database is locked");
    }
    return super.loadMemory(scope);
  }
}

test("bot authors are ignored before anything else", async () => {
  const completion = replyWith("nope");
  const { engine } = createHarness({ completion });

  const outcome = await engine.handleMessage(inbound({ authorIsBot: true }));

  expect(outcome).toEqual({ status: "ignored", reason: "bot-author" });
  expect(completion.calls).toHaveLength(0);
});

test("untriggered messages are ignored and leave memory alone", async () => {
  const { engine, state } = createHarness();

  const outcome = await engine.handleMessage(inbound({ text: "hello there", mentionsBotIdentity: false }));

  expect(outcome).toEqual({ status: "ignored", reason: "not-triggered" });
  expect(state.getMemory(SCOPE)).toEqual([]);
});

test("a disabled scope ignores mentions", async () => {
  const { engine, state } = createHarness();
  state.setEnabled(SCOPE, false);

  const outcome = await engine.handleMessage(inbound());

  expect(outcome).toEqual({ status: "ignored", reason: "not-triggered" });
});

test("a mention gets a persona reply and both turns are remembered", async () => {
  const completion = replyWith("model says hi");
  const { engine, state, personas } = createHarness({ completion });

  const outcome = await engine.handleMessage(inbound({ text: "hello" }));

  expect(outcome).toEqual({
    status: "replied",
    source: "model",
    reply: {
      personaKey: "default",
      title: "🤖 Neutral Core",
      description: "model says hi",
      color: 0x007bc2,
      footerText: "— baseline adaptive mode",
    },
  });
  expect(completion.calls).toEqual([
    { systemPrompt: personas.getDefault().systemPrompt, conversation: [{ role: "user", content: "hello" }] },
  ]);
  expect(state.getMemory(SCOPE)).toEqual([
    { role: "user", content: "hello" },
    { role: "assistant", content: "model says hi" },
  ]);
});

test("the scored persona answers", async () => {
  const completion = replyWith("cultivate harder");
  const { engine } = createHarness({ completion });

  const outcome = await engine.handleMessage(inbound({ text: "What is the meaning of fate in this realm?" }));

  expect(outcome.status === "replied" && outcome.reply.personaKey).toBe("manhua");
});

test("a locked persona answers regardless of content", async () => {
  const { engine, state } = createHarness();
  state.lockPersona(SCOPE, "rogue");

  const outcome = await engine.handleMessage(inbound({ text: "What is the meaning of fate in this realm?" }));

  expect(outcome.status === "replied" && outcome.reply.title).toBe("💥 Rogue Tempest");
});

test("a failed completion is replaced by the fallback and still recorded", async () => {
  const completion = new ScriptedCompletionClient(async () => ({ ok: false, kind: "timeout", error: "slow" }));
  const { engine, state } = createHarness({ completion });

  const outcome = await engine.handleMessage(inbound({ text: "hello" }));

  expect(outcome.status === "replied" && outcome.source).toBe("fallback");
  expect(outcome.status === "replied" && outcome.reply.description).toBe(FALLBACK_REPLY);
  expect(state.getMemory(SCOPE)).toEqual([
    { role: "user", content: "hello" },
    { role: "assistant", content: FALLBACK_REPLY },
  ]);
});

test("a completion client that throws still gets the fallback recorded", async () => {
  const completion = new ScriptedCompletionClient(async () => {
    throw new Error("Request timed out.");
  });
  const { engine, state } = createHarness({ completion });

  const outcome = await engine.handleMessage(inbound({ text: "hello" }));

  expect(outcome).toEqual({
    status: "replied",
    source: "fallback",
    reply: {
      personaKey: "default",
      title: "🤖 Neutral Core",
      description: FALLBACK_REPLY,
      color: 0x007bc2,
      footerText: "— baseline adaptive mode",
    },
  });
  expect(state.getMemory(SCOPE)).toEqual([
    { role: "user", content: "hello" },
    { role: "assistant", content: FALLBACK_REPLY },
  ]);
});

test("an error outside the completion still records the fallback exchange", async () => {
  const store = new FlakyMemoryStore();
  const personas = createPersonaRegistry();
  const state = new ChannelStateManager(store, personas, { maxTurns: 10 });
  const memory = new MemoryManager(state);
  const completion = replyWith("never used");
  const engine = new ConversationEngine({ state, memory, personas, completion, botUserId: BOT_ID });

  const outcome = await engine.handleMessage(inbound({ text: "hello" }));

  expect(outcome.status === "replied" && outcome.reply.description).toBe(FALLBACK_REPLY);
  expect(completion.calls).toHaveLength(0);
  expect(state.getMemory(SCOPE)).toEqual([
    { role: "user", content: "hello" },
    { role: "assistant", content: FALLBACK_REPLY },
  ]);
});

test("storage failures do not stop the reply", async () => {
  const { engine, state, store } = createHarness();
  store.failWrites = true;

  const outcome = await engine.handleMessage(inbound({ text: "hello" }));

  expect(outcome.status).toBe("replied");
  expect(state.getMemory(SCOPE)).toHaveLength(2);
  expect(store.memories.get(SCOPE)).toBeUndefined();
});

test("memory stays within the cap across exchanges", async () => {
  const { engine, state } = createHarness({ maxTurns: 2 });

  await engine.handleMessage(inbound({ messageId: "a", text: "first" }));
  await engine.handleMessage(inbound({ messageId: "b", text: "second" }));

  expect(state.getMemory(SCOPE)).toEqual([
    { role: "user", content: "second" },
    { role: "assistant", content: "model says hi" },
  ]);
});

test("a redelivered message id is skipped while the first is in flight", async () => {
  const gate = deferred<CompletionResult>();
  const completion = new ScriptedCompletionClient(() => gate.promise);
  const { engine, state } = createHarness({ completion });

  const first = engine.handleMessage(inbound({ messageId: "dup" }));
  await flush();
  const second = await engine.handleMessage(inbound({ messageId: "dup" }));

  expect(second).toEqual({ status: "ignored", reason: "duplicate" });

  gate.resolve({ ok: true, text: "once" });
  expect((await first).status).toBe("replied");
  expect(completion.calls).toHaveLength(1);
  expect(state.getMemory(SCOPE)).toHaveLength(2);
});

test("concurrent messages in one channel are answered one after another", async () => {
  const gate = deferred<CompletionResult>();
  const completion = new ScriptedCompletionClient(async (_call, index) =>
    index === 0 ? gate.promise : { ok: true, text: "reply two" }
  );
  const { engine, state } = createHarness({ completion });

  const one = engine.handleMessage(inbound({ messageId: "m1", text: "message one" }));
  const two = engine.handleMessage(inbound({ messageId: "m2", text: "message two" }));
  await flush();

  expect(completion.calls).toHaveLength(1);

  gate.resolve({ ok: true, text: "reply one" });
  await Promise.all([one, two]);

  expect(completion.calls[1]?.conversation).toEqual([
    { role: "user", content: "message one" },
    { role: "assistant", content: "reply one" },
    { role: "user", content: "message two" },
  ]);
  expect(state.getMemory(SCOPE)).toEqual([
    { role: "user", content: "message one" },
    { role: "assistant", content: "reply one" },
    { role: "user", content: "message two" },
    { role: "assistant", content: "reply two" },
  ]);
});

test("onGenerating fires only for accepted messages", async () => {
  const { engine } = createHarness();
  let typing = 0;
  const hooks = { onGenerating: () => void typing++ };

  await engine.handleMessage(inbound({ messageId: "x", text: "hello there", mentionsBotIdentity: false }), hooks);
  expect(typing).toBe(0);

  await engine.handleMessage(inbound({ messageId: "y" }), hooks);
  expect(typing).toBe(1);
});

test("the message id stays in flight until delivery finishes", async () => {
  const delivered = deferred<void>();
  const { engine } = createHarness();
  const seen: string[] = [];

  const first = engine.handleMessage(inbound({ messageId: "slow-send" }), {
    onReply: async (reply) => {
      seen.push(reply.description);
      await delivered.promise;
    },
  });
  await flush();

  expect(seen).toEqual(["model says hi"]);
  expect(await engine.handleMessage(inbound({ messageId: "slow-send" }))).toEqual({
    status: "ignored",
    reason: "duplicate",
  });

  delivered.resolve();
  expect((await first).status).toBe("replied");
});

test("a failing delivery hook does not change the outcome", async () => {
  const { engine } = createHarness();

  const outcome = await engine.handleMessage(inbound(), {
    onReply: async () => {
      throw new Error("Missing Permissions");
    },
  });

  expect(outcome.status).toBe("replied");
});
