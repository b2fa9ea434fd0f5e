import type { PersonaDefinition, PersonaRegistry } from "../personas/index.js";
import type { GuildConversationState } from "../state/types.js";
import type { InboundMessage } from "./types.js";

const wordPatternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wordPattern(keyword: string): RegExp {
  let pattern = wordPatternCache.get(keyword);
  if (!pattern) {
    pattern = new RegExp(`\\b${escapeRegExp(keyword)}\\b`);
    wordPatternCache.set(keyword, pattern);
  }
  return pattern;
}

/** `lowerText` must already be lowercased; keywords are stored lowercase. */
export function containsWholeWord(lowerText: string, keyword: string): boolean {
  return wordPattern(keyword).test(lowerText);
}

export function matchedKeywords(lowerText: string, persona: PersonaDefinition): string[] {
  return persona.triggerKeywords.filter((keyword) => containsWholeWord(lowerText, keyword));
}

export function hasAnyPersonaKeyword(text: string, personas: PersonaRegistry): boolean {
  const lowerText = text.toLowerCase();
  return personas.list().some((persona) => matchedKeywords(lowerText, persona).length > 0);
}

export type TriggerReason = "disabled" | "mention" | "reply-to-bot" | "keyword" | "none";

/**
 * Why a message does or does not trigger a reply. The enabled flag is checked
 * first and overrides every other trigger.
 */
export function evaluateTrigger(
  message: InboundMessage,
  state: Pick<GuildConversationState, "enabled">,
  personas: PersonaRegistry,
  botUserId: string
): TriggerReason {
  if (!state.enabled) return "disabled";
  if (message.mentionsBotIdentity) return "mention";
  if (message.repliedToMessage?.authorId === botUserId) return "reply-to-bot";
  if (hasAnyPersonaKeyword(message.text, personas)) return "keyword";
  return "none";
}

export function shouldRespond(
  message: InboundMessage,
  state: Pick<GuildConversationState, "enabled">,
  personas: PersonaRegistry,
  botUserId: string
): boolean {
  const reason = evaluateTrigger(message, state, personas, botUserId);
  return reason !== "disabled" && reason !== "none";
}
