/**
 * Owns per-scope guild config and conversation memory.
 *
 * Reads come from in-process maps, loaded lazily from the StateStore. Every write
 * replaces the map entry with a new frozen value and then writes through to the
 * store. A failed store write is logged as a durability warning and never thrown:
 * the in-process value stays current and the next successful write persists it.
 */

import type { PersonaRegistry } from "../personas/index.js";
import { log } from "../utils/logger.js";
import { CorruptStateError, type StateStore } from "./stateStore.js";
import {
  DEFAULT_GUILD_STATE,
  type ChannelStatus,
  type GuildConversationState,
  type Turn,
} from "./types.js";

const stateLog = log.withScope("state");

export class UnknownPersonaError extends Error {
  constructor(readonly personaKey: string, validKeys: readonly string[]) {
    super(`Unknown persona: ${personaKey}. Valid: ${validKeys.join(", ")}`);
    this.name = "UnknownPersonaError";
  }
}

export type ChannelStateOptions = {
  /** Memory cap K; stored memory is truncated to the last K turns on load. */
  maxTurns: number;
};

export class ChannelStateManager {
  private readonly configs = new Map<string, Readonly<GuildConversationState>>();
  private readonly memories = new Map<string, readonly Turn[]>();
  readonly maxTurns: number;

  constructor(
    private readonly store: StateStore,
    private readonly personas: PersonaRegistry,
    opts: ChannelStateOptions
  ) {
    if (!Number.isInteger(opts.maxTurns) || opts.maxTurns < 1) {
      throw new Error(`maxTurns must be a positive integer, got ${opts.maxTurns}`);
    }
    this.maxTurns = opts.maxTurns;
  }

  // ==========================================================================
  // Guild config
  // ==========================================================================

  /** Created with defaults (and persisted) on first access. */
  getConfig(scope: string): Readonly<GuildConversationState> {
    const cached = this.configs.get(scope);
    if (cached) return cached;

    let loaded: GuildConversationState | null = null;
    try {
      loaded = this.store.loadConfig(scope);
    } catch (err) {
      if (!(err instanceof CorruptStateError)) throw err;
      stateLog.warn(`Resetting scope config to defaults: ${err.message}`, { scope });
    }

    if (loaded) {
      const state = Object.freeze({ ...loaded });
      this.configs.set(scope, state);
      return state;
    }
    return this.replaceConfig(scope, DEFAULT_GUILD_STATE);
  }

  /** Sets the lock and forces the listener on. */
  lockPersona(scope: string, personaKey: string): Readonly<GuildConversationState> {
    if (!this.personas.has(personaKey)) {
      throw new UnknownPersonaError(personaKey, this.personas.keys());
    }
    const next = this.replaceConfig(scope, { ...this.getConfig(scope), lockedPersona: personaKey, enabled: true });
    stateLog.info(`Locked persona=${personaKey}`, { scope });
    return next;
  }

  unlockPersona(scope: string): Readonly<GuildConversationState> {
    const next = this.replaceConfig(scope, { ...this.getConfig(scope), lockedPersona: null });
    stateLog.info("Persona unlocked (auto mode)", { scope });
    return next;
  }

  setEnabled(scope: string, enabled: boolean): Readonly<GuildConversationState> {
    const next = this.replaceConfig(scope, { ...this.getConfig(scope), enabled });
    stateLog.info(`Listener ${enabled ? "enabled" : "disabled"}`, { scope });
    return next;
  }

  setWebhookEnabled(scope: string, webhookEnabled: boolean): Readonly<GuildConversationState> {
    const next = this.replaceConfig(scope, { ...this.getConfig(scope), webhookEnabled });
    stateLog.info(`Audit webhook ${webhookEnabled ? "enabled" : "disabled"}`, { scope });
    return next;
  }

  /** Config back to defaults. Memory is left alone; see MemoryManager.clear. */
  resetScope(scope: string): Readonly<GuildConversationState> {
    const next = this.replaceConfig(scope, DEFAULT_GUILD_STATE);
    stateLog.info("Config reset to defaults", { scope });
    return next;
  }

  getStatus(scope: string): ChannelStatus {
    return {
      ...this.getConfig(scope),
      memoryTurns: this.getMemory(scope).length,
    };
  }

  private replaceConfig(scope: string, state: GuildConversationState): Readonly<GuildConversationState> {
    const next = Object.freeze({ ...state });
    this.configs.set(scope, next);
    this.persist(scope, "guild_config", () => this.store.saveConfig(scope, next));
    return next;
  }

  // ==========================================================================
  // Conversation memory
  // ==========================================================================

  getMemory(scope: string): readonly Turn[] {
    const cached = this.memories.get(scope);
    if (cached) return cached;

    let loaded: Turn[] | null = null;
    try {
      loaded = this.store.loadMemory(scope);
    } catch (err) {
      if (!(err instanceof CorruptStateError)) throw err;
      stateLog.warn(`Resetting scope memory to empty: ${err.message}`, { scope });
      return this.replaceMemory(scope, []);
    }

    const turns = loaded ?? [];
    if (turns.length > this.maxTurns) {
      stateLog.warn(`Stored memory has ${turns.length} turns, keeping the last ${this.maxTurns}`, { scope });
      return this.replaceMemory(scope, turns.slice(-this.maxTurns));
    }

    const frozen = Object.freeze(turns.map((t) => Object.freeze({ ...t })));
    this.memories.set(scope, frozen);
    return frozen;
  }

  /**
   * Swap in a new memory array for the scope. Callers own the cap; this only
   * refuses arrays that break it.
   */
  replaceMemory(scope: string, turns: readonly Turn[]): readonly Turn[] {
    if (turns.length > this.maxTurns) {
      throw new Error(`Memory for ${scope} would hold ${turns.length} turns (cap ${this.maxTurns})`);
    }
    const next = Object.freeze(turns.map((t) => Object.freeze({ role: t.role, content: t.content })));
    this.memories.set(scope, next);
    this.persist(scope, "channel_memory", () => this.store.saveMemory(scope, next));
    return next;
  }

  private persist(scope: string, table: string, write: () => void): boolean {
    try {
      write();
      return true;
    } catch (err) {
      stateLog.warn(`Durability warning: ${table} write failed, state may be stale after restart`, {
        scope,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
