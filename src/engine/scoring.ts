/**
 * Persona scoring.
 *
 * Points per persona:
 *   +2 for each of its trigger keywords found as a whole word in the lowercased text
 *   +1 "default" when the last character of the text is "?"
 *   +1 "manhua" and +1 "oracle" when the text contains "!"
 *   +1 "default" when the last stored turn is an assistant turn
 *
 * The last rule only ever favours "default": turns do not record which persona
 * wrote them.
 *
 * Highest score wins; ties go to the persona that comes first in registry order.
 */

import { DEFAULT_PERSONA_KEY, type PersonaRegistry } from "../personas/index.js";
import type { GuildConversationState, Turn } from "../state/types.js";
import { matchedKeywords } from "./triggers.js";

export type PersonaScore = {
  key: string;
  score: number;
};

const KEYWORD_POINTS = 2;
const EXCLAMATION_PERSONAS = ["manhua", "oracle"] as const;

export function scorePersonas(text: string, memory: readonly Turn[], personas: PersonaRegistry): PersonaScore[] {
  const lowerText = text.toLowerCase();
  const scores = new Map<string, number>();

  for (const persona of personas.list()) {
    scores.set(persona.key, matchedKeywords(lowerText, persona).length * KEYWORD_POINTS);
  }

  const bump = (key: string) => {
    const current = scores.get(key);
    if (current !== undefined) scores.set(key, current + 1);
  };

  if (lowerText.endsWith("?")) {
    bump(DEFAULT_PERSONA_KEY);
  }
  if (lowerText.includes("!")) {
    for (const key of EXCLAMATION_PERSONAS) bump(key);
  }
  const lastTurn = memory.at(-1);
  if (lastTurn?.role === "assistant") {
    bump(DEFAULT_PERSONA_KEY);
  }

  return Array.from(scores, ([key, score]) => ({ key, score }));
}

/** Max score, first in registry order on ties. */
export function pickWinner(scores: readonly PersonaScore[]): string {
  let best: PersonaScore | null = null;
  for (const entry of scores) {
    if (best === null || entry.score > best.score) {
      best = entry;
    }
  }
  return best?.key ?? DEFAULT_PERSONA_KEY;
}

/**
 * A locked persona skips scoring entirely. Unknown lock keys resolve to "default".
 */
export function selectPersona(
  text: string,
  memory: readonly Turn[],
  state: Pick<GuildConversationState, "lockedPersona">,
  personas: PersonaRegistry
): string {
  if (state.lockedPersona) {
    return personas.resolve(state.lockedPersona).key;
  }
  return pickWinner(scorePersonas(text, memory, personas));
}
