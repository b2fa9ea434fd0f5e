/**
 * Durable key-value storage for the two per-scope documents: guild config and
 * conversation memory. Every write replaces the whole row in one statement, so a
 * reader never sees a half-updated document.
 */

import type Database from "better-sqlite3";
import type { GuildConversationState, Turn } from "./types.js";

export interface StateStore {
  /** `null` when nothing is stored for the scope. Throws CorruptStateError on unreadable rows. */
  loadConfig(scope: string): GuildConversationState | null;
  saveConfig(scope: string, state: GuildConversationState): void;
  /** `null` when nothing is stored for the scope. Throws CorruptStateError on unreadable rows. */
  loadMemory(scope: string): Turn[] | null;
  saveMemory(scope: string, turns: readonly Turn[]): void;
}

export class CorruptStateError extends Error {
  constructor(
    readonly scope: string,
    readonly table: "guild_config" | "channel_memory",
    detail: string
  ) {
    super(`Corrupt ${table} row for scope ${scope}: ${detail}`);
    this.name = "CorruptStateError";
  }
}

type GuildConfigRow = {
  enabled: number;
  locked_persona: string | null;
  webhook_enabled: number;
};

type ChannelMemoryRow = {
  turns_json: string;
};

function isGuildConfigRow(row: unknown): row is GuildConfigRow {
  return (
    typeof row === "object" &&
    row !== null &&
    "enabled" in row &&
    typeof row.enabled === "number" &&
    "locked_persona" in row &&
    (row.locked_persona === null || typeof row.locked_persona === "string") &&
    "webhook_enabled" in row &&
    typeof row.webhook_enabled === "number"
  );
}

function isChannelMemoryRow(row: unknown): row is ChannelMemoryRow {
  return typeof row === "object" && row !== null && "turns_json" in row && typeof row.turns_json === "string";
}

function isTurn(value: unknown): value is Turn {
  return (
    typeof value === "object" &&
    value !== null &&
    "role" in value &&
    (value.role === "user" || value.role === "assistant") &&
    "content" in value &&
    typeof value.content === "string"
  );
}

/** Stored shape of `turns_json`. */
export type MemoryDocument = {
  turns: Turn[];
};

function documentTurns(parsed: unknown): unknown[] | null {
  if (Array.isArray(parsed)) return parsed; // rows written as a bare array
  if (typeof parsed === "object" && parsed !== null && "turns" in parsed && Array.isArray(parsed.turns)) {
    return parsed.turns;
  }
  return null;
}

/**
 * Parse a stored `turns_json` document: `{ turns: [{ role, content }, ...] }`.
 */
export function parseTurns(scope: string, json: string): Turn[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new CorruptStateError(scope, "channel_memory", `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  const items = documentTurns(parsed);
  if (!items) {
    throw new CorruptStateError(scope, "channel_memory", "turns_json has no turns array");
  }
  const turns: Turn[] = [];
  for (const [index, item] of items.entries()) {
    if (!isTurn(item)) {
      throw new CorruptStateError(scope, "channel_memory", `turn ${index} is not {role, content}`);
    }
    turns.push({ role: item.role, content: item.content });
  }
  return turns;
}

export class SqliteStateStore implements StateStore {
  constructor(private readonly db: Database.Database) {}

  loadConfig(scope: string): GuildConversationState | null {
    const row: unknown = this.db
      .prepare("SELECT enabled, locked_persona, webhook_enabled FROM guild_config WHERE scope = ? LIMIT 1")
      .get(scope);
    if (row === undefined) return null;
    if (!isGuildConfigRow(row)) {
      throw new CorruptStateError(scope, "guild_config", "unexpected column types");
    }
    return {
      enabled: row.enabled !== 0,
      lockedPersona: row.locked_persona,
      webhookEnabled: row.webhook_enabled !== 0,
    };
  }

  saveConfig(scope: string, state: GuildConversationState): void {
    this.db
      .prepare(
        `INSERT INTO guild_config (scope, enabled, locked_persona, webhook_enabled, updated_at_ms)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(scope) DO UPDATE SET
           enabled = excluded.enabled,
           locked_persona = excluded.locked_persona,
           webhook_enabled = excluded.webhook_enabled,
           updated_at_ms = excluded.updated_at_ms`
      )
      .run(scope, state.enabled ? 1 : 0, state.lockedPersona, state.webhookEnabled ? 1 : 0, Date.now());
  }

  loadMemory(scope: string): Turn[] | null {
    const row: unknown = this.db
      .prepare("SELECT turns_json FROM channel_memory WHERE scope = ? LIMIT 1")
      .get(scope);
    if (row === undefined) return null;
    if (!isChannelMemoryRow(row)) {
      throw new CorruptStateError(scope, "channel_memory", "unexpected column types");
    }
    return parseTurns(scope, row.turns_json);
  }

  saveMemory(scope: string, turns: readonly Turn[]): void {
    const doc: MemoryDocument = { turns: turns.map((t) => ({ role: t.role, content: t.content })) };
    const json = JSON.stringify(doc);
    this.db
      .prepare(
        `INSERT INTO channel_memory (scope, turns_json, updated_at_ms)
         VALUES (?, ?, ?)
         ON CONFLICT(scope) DO UPDATE SET
           turns_json = excluded.turns_json,
           updated_at_ms = excluded.updated_at_ms`
      )
      .run(scope, json, Date.now());
  }
}
