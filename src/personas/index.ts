import { DEFAULT_PERSONA } from "./catalog/default.js";
import { MANHUA_PERSONA } from "./catalog/manhua.js";
import { DREAMCORE_PERSONA } from "./catalog/dreamcore.js";
import { LOREKEEPER_PERSONA } from "./catalog/lorekeeper.js";
import { VOID_PERSONA } from "./catalog/void.js";
import { ORACLE_PERSONA } from "./catalog/oracle.js";
import { ROGUE_PERSONA } from "./catalog/rogue.js";
import { ACADEMIC_PERSONA } from "./catalog/academic.js";
import { ETHEREAL_PERSONA } from "./catalog/ethereal.js";
import { SERAPH_PERSONA } from "./catalog/seraph.js";

export const DEFAULT_PERSONA_KEY = "default";

/** Passed through to the reply embed; the engine never reads it. */
export type PersonaPresentation = {
  emoji: string;
  color: number;
  footerText: string;
};

export type PersonaDefinition = {
  key: string;
  displayName: string;
  systemPrompt: string;
  /** Lowercase words, matched on word boundaries against lowercased message text. */
  triggerKeywords: readonly string[];
  /** Short label shown by `/aura persona list`. */
  style: string;
  presentation: PersonaPresentation;
};

/**
 * Iteration order matters: scoring ties go to the earliest persona, so "default"
 * comes first and wins when nothing scores.
 */
export const PERSONA_CATALOG: readonly PersonaDefinition[] = [
  DEFAULT_PERSONA,
  MANHUA_PERSONA,
  DREAMCORE_PERSONA,
  LOREKEEPER_PERSONA,
  VOID_PERSONA,
  ORACLE_PERSONA,
  ROGUE_PERSONA,
  ACADEMIC_PERSONA,
  ETHEREAL_PERSONA,
  SERAPH_PERSONA,
];

export class PersonaRegistry {
  private readonly byKey: ReadonlyMap<string, PersonaDefinition>;

  constructor(personas: readonly PersonaDefinition[]) {
    const byKey = new Map<string, PersonaDefinition>();
    for (const persona of personas) {
      if (byKey.has(persona.key)) {
        throw new Error(`Duplicate persona key: ${persona.key}`);
      }
      byKey.set(persona.key, Object.freeze({
        ...persona,
        triggerKeywords: Object.freeze(persona.triggerKeywords.map((k) => k.toLowerCase())),
      }));
    }
    if (!byKey.has(DEFAULT_PERSONA_KEY)) {
      throw new Error(`Persona registry must contain "${DEFAULT_PERSONA_KEY}"`);
    }
    this.byKey = byKey;
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }

  get(key: string): PersonaDefinition | null {
    return this.byKey.get(key) ?? null;
  }

  /** Unknown keys (e.g. a lock saved before a persona was removed) fall back to "default". */
  resolve(key: string | null | undefined): PersonaDefinition {
    const persona = key ? this.byKey.get(key) : undefined;
    return persona ?? this.getDefault();
  }

  getDefault(): PersonaDefinition {
    const persona = this.byKey.get(DEFAULT_PERSONA_KEY);
    if (!persona) {
      throw new Error(`Persona registry lost "${DEFAULT_PERSONA_KEY}"`);
    }
    return persona;
  }

  keys(): string[] {
    return Array.from(this.byKey.keys());
  }

  list(): PersonaDefinition[] {
    return Array.from(this.byKey.values());
  }
}

export function createPersonaRegistry(): PersonaRegistry {
  return new PersonaRegistry(PERSONA_CATALOG);
}
