import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { Config } from "../config/types.js";
import type { Turn } from "../state/types.js";
import { log } from "../utils/logger.js";

const llmLog = log.withScope("llm");

export type ChatMessage = Turn;

export type CompletionResult =
  | { ok: true; text: string }
  | { ok: false; kind: "timeout" | "failure"; error: string };

export interface CompletionClient {
  /** Never throws; every failure comes back as `{ ok: false }`. */
  complete(systemPrompt: string, conversation: readonly ChatMessage[]): Promise<CompletionResult>;
}

/**
 * One chat round trip. Returns the reply text, or null when the provider sent
 * nothing back. Must honour `signal`.
 */
export type ChatRequester = (req: {
  messages: ChatCompletionMessageParam[];
  signal: AbortSignal;
}) => Promise<string | null>;

export function toProviderMessages(
  systemPrompt: string,
  conversation: readonly ChatMessage[]
): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [{ role: "system", content: systemPrompt }];
  for (const turn of conversation) {
    if (turn.role === "assistant") {
      messages.push({ role: "assistant", content: turn.content });
    } else {
      messages.push({ role: "user", content: turn.content });
    }
  }
  return messages;
}

class CompletionTimeout extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Completion timed out after ${timeoutMs}ms`);
    this.name = "CompletionTimeout";
  }
}

export class LlmCompletionClient implements CompletionClient {
  private readonly timeoutMs: number;

  constructor(
    private readonly requester: ChatRequester,
    opts: { timeoutMs: number }
  ) {
    this.timeoutMs = opts.timeoutMs;
  }

  async complete(systemPrompt: string, conversation: readonly ChatMessage[]): Promise<CompletionResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CompletionTimeout(this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      const text = await Promise.race([
        this.requester({ messages: toProviderMessages(systemPrompt, conversation), signal: controller.signal }),
        timeout,
      ]);
      const trimmed = text?.trim();
      if (!trimmed) {
        llmLog.warn("Empty completion from provider");
        return { ok: false, kind: "failure", error: "Empty response from provider" };
      }
      return { ok: true, text: trimmed };
    } catch (err) {
      if (err instanceof CompletionTimeout) {
        llmLog.warn(err.message);
        return { ok: false, kind: "timeout", error: err.message };
      }
      const error = err instanceof Error ? err.message : String(err);
      llmLog.error(`LLM request failed: ${error}`);
      return { ok: false, kind: "failure", error };
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Used when LLM_ENABLED=false; every message gets the fallback reply. */
export class DisabledCompletionClient implements CompletionClient {
  async complete(): Promise<CompletionResult> {
    return { ok: false, kind: "failure", error: "LLM disabled" };
  }
}

export function createOpenAIRequester(
  client: OpenAI,
  opts: { model: string; temperature: number; maxTokens: number }
): ChatRequester {
  return async ({ messages, signal }) => {
    const response = await client.chat.completions.create(
      {
        model: opts.model,
        temperature: opts.temperature,
        max_tokens: opts.maxTokens,
        messages,
      },
      { signal }
    );
    return response.choices[0]?.message?.content ?? null;
  };
}

export function createCompletionClient(config: Pick<Config, "openai" | "llm">): CompletionClient {
  if (!config.llm.enabled) {
    llmLog.info("LLM disabled; replies will use the fallback text");
    return new DisabledCompletionClient();
  }
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY not configured in .env");
  }
  const openai = new OpenAI({
    apiKey,
    ...(config.openai.baseUrl ? { baseURL: config.openai.baseUrl } : {}),
    maxRetries: 0,
  });
  const requester = createOpenAIRequester(openai, {
    model: config.llm.model,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
  });
  return new LlmCompletionClient(requester, { timeoutMs: config.llm.timeoutMs });
}
