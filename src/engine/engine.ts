/**
 * Conversation engine: one inbound message in, at most one persona reply out.
 *
 * Pipeline per message:
 *   bot-author check -> reentrancy guard -> trigger check -> (per-scope lock:
 *   persona selection -> conversation build -> completion -> memory writes)
 *   -> delivery -> guard release
 *
 * Work for one scope is serialized by the KeyedLock, so two concurrent messages in
 * the same channel never interleave their memory writes.
 */

import type { PersonaRegistry } from "../personas/index.js";
import type { ChannelStateManager } from "../state/channelState.js";
import type { Turn } from "../state/types.js";
import type { CompletionClient, CompletionResult } from "../llm/client.js";
import { FALLBACK_REPLY } from "../llm/fallback.js";
import { log } from "../utils/logger.js";
import { KeyedLock } from "./keyedLock.js";
import type { MemoryManager } from "./memory.js";
import { ReentrancyGuard } from "./reentrancyGuard.js";
import { selectPersona } from "./scoring.js";
import { evaluateTrigger } from "./triggers.js";
import type { EngineOutcome, InboundMessage, OutboundReply } from "./types.js";

const engineLog = log.withScope("engine");

export type ConversationEngineDeps = {
  state: ChannelStateManager;
  memory: MemoryManager;
  personas: PersonaRegistry;
  completion: CompletionClient;
  botUserId: string;
  guard?: ReentrancyGuard;
  lock?: KeyedLock;
};

export type HandleMessageHooks = {
  /** Called once the message is accepted, before the completion request. */
  onGenerating?: () => void;
  /** Delivers the reply; runs after the scope lock is released but before the message id is. */
  onReply?: (reply: OutboundReply) => Promise<unknown>;
};

export class ConversationEngine {
  private readonly state: ChannelStateManager;
  private readonly memory: MemoryManager;
  private readonly personas: PersonaRegistry;
  private readonly completion: CompletionClient;
  private readonly botUserId: string;
  private readonly guard: ReentrancyGuard;
  private readonly lock: KeyedLock;

  constructor(deps: ConversationEngineDeps) {
    this.state = deps.state;
    this.memory = deps.memory;
    this.personas = deps.personas;
    this.completion = deps.completion;
    this.botUserId = deps.botUserId;
    this.guard = deps.guard ?? new ReentrancyGuard();
    this.lock = deps.lock ?? new KeyedLock();
  }

  async handleMessage(message: InboundMessage, hooks: HandleMessageHooks = {}): Promise<EngineOutcome> {
    if (message.authorIsBot) {
      return { status: "ignored", reason: "bot-author" };
    }

    const guarded = await this.guard.run(message.messageId, async () => {
      const outcome = await this.process(message, hooks);
      if (outcome.status === "replied" && hooks.onReply) {
        try {
          await hooks.onReply(outcome.reply);
        } catch (err) {
          engineLog.error("Reply delivery failed", { scope: message.channelScope, error: err });
        }
      }
      return outcome;
    });
    if (!guarded.admitted) {
      engineLog.debug("Duplicate message skipped", { messageId: message.messageId });
      return { status: "ignored", reason: "duplicate" };
    }
    return guarded.value;
  }

  private async process(message: InboundMessage, hooks: HandleMessageHooks): Promise<EngineOutcome> {
    const scope = message.channelScope;
    const trigger = evaluateTrigger(message, this.state.getConfig(scope), this.personas, this.botUserId);
    if (trigger === "disabled" || trigger === "none") {
      engineLog.trace("Message not triggered", { scope, trigger });
      return { status: "ignored", reason: "not-triggered" };
    }

    if (hooks.onGenerating) {
      try {
        hooks.onGenerating();
      } catch (err) {
        engineLog.warn("onGenerating hook failed", { scope, error: err });
      }
    }

    return this.lock.runExclusive(scope, () => this.respond(message, trigger));
  }

  private async respond(message: InboundMessage, trigger: string): Promise<EngineOutcome> {
    const scope = message.channelScope;
    let personaKey = this.personas.getDefault().key;
    let recorded = false;

    try {
      const config = this.state.getConfig(scope);
      const memory = this.state.getMemory(scope);
      personaKey = selectPersona(message.text, memory, config, this.personas);
      const persona = this.personas.resolve(personaKey);
      engineLog.debug(`Persona selected: ${persona.key}`, {
        scope,
        trigger,
        locked: config.lockedPersona !== null,
      });

      const conversation = this.memory.buildConversation(scope, message.text);
      const result = await this.completeSafely(persona.systemPrompt, conversation);

      const text = result.ok ? result.text : FALLBACK_REPLY;
      if (!result.ok) {
        engineLog.warn(`Completion ${result.kind}, using fallback`, { scope, error: result.error });
      }

      this.recordExchange(scope, message.text, text);
      recorded = true;

      return {
        status: "replied",
        reply: this.buildReply(persona.key, text),
        source: result.ok ? "model" : "fallback",
      };
    } catch (err) {
      engineLog.error("Reply pipeline failed, sending fallback", { scope, error: err });
      if (!recorded) {
        try {
          this.recordExchange(scope, message.text, FALLBACK_REPLY);
        } catch (recordErr) {
          engineLog.error("Could not record fallback exchange", { scope, error: recordErr });
        }
      }
      return {
        status: "replied",
        reply: this.buildReply(personaKey, FALLBACK_REPLY),
        source: "fallback",
      };
    }
  }

  /** A client that throws is treated like one that reported a failure. */
  private async completeSafely(systemPrompt: string, conversation: readonly Turn[]): Promise<CompletionResult> {
    try {
      return await this.completion.complete(systemPrompt, conversation);
    } catch (err) {
      return { ok: false, kind: "failure", error: err instanceof Error ? err.message : String(err) };
    }
  }

  private recordExchange(scope: string, userText: string, replyText: string): void {
    this.memory.recordTurn(scope, "user", userText);
    this.memory.recordTurn(scope, "assistant", replyText);
  }

  private buildReply(personaKey: string, description: string): OutboundReply {
    const persona = this.personas.resolve(personaKey);
    return {
      personaKey: persona.key,
      title: `${persona.presentation.emoji} ${persona.displayName}`,
      description,
      color: persona.presentation.color,
      footerText: persona.presentation.footerText,
    };
  }
}
