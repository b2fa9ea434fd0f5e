import "dotenv/config";
import type { Config, LogFormat, LogLevel } from "./types.js";
import { redactConfigSnapshot } from "./redact.js";

function req(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid integer for ${name}: ${v}`);
  return n;
}

function optFloat(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number for ${name}: ${v}`);
  return n;
}

function optBool(name: string, def: boolean): boolean {
  const v = opt(name);
  if (!v) return def;
  if (["1", "true", "yes", "on"].includes(v.toLowerCase())) return true;
  if (["0", "false", "no", "off"].includes(v.toLowerCase())) return false;
  throw new Error(`Invalid boolean for ${name}: ${v}`);
}

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
  return allowed.some((a) => a === value);
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  if (isOneOf(v, allowed)) return v;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

export function loadConfig(): Config {
  const maxTurns = optInt("MEMORY_MAX_TURNS", 10);
  if (maxTurns < 1) {
    throw new Error(`MEMORY_MAX_TURNS must be at least 1, got ${maxTurns}`);
  }

  const timeoutMs = optInt("LLM_TIMEOUT_MS", 16000);
  if (timeoutMs <= 0) {
    throw new Error(`LLM_TIMEOUT_MS must be positive, got ${timeoutMs}`);
  }

  const llmEnabled = optBool("LLM_ENABLED", true);

  const cfg: Config = {
    discord: {
      token: req("DISCORD_TOKEN"),
      clientId: opt("DISCORD_CLIENT_ID"),
      guildId: opt("GUILD_ID"),
    },

    openai: {
      apiKey: llmEnabled ? req("OPENAI_API_KEY") : opt("OPENAI_API_KEY"),
      baseUrl: opt("OPENAI_BASE_URL"),
    },

    llm: {
      enabled: llmEnabled,
      model: opt("LLM_MODEL") ?? "gpt-4o-mini",
      temperature: optFloat("LLM_TEMPERATURE", 0.7),
      maxTokens: optInt("LLM_MAX_TOKENS", 400),
      timeoutMs,
    },

    memory: {
      maxTurns,
    },

    data: {
      root: opt("DATA_ROOT") ?? "./data",
      dbFilename: opt("DATA_DB_FILENAME") ?? "aura.sqlite",
    },

    audit: {
      webhookUrl: opt("AUDIT_WEBHOOK_URL"),
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };

  return cfg;
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    DISCORD_TOKEN: cfg.discord.token,
    DISCORD_CLIENT_ID: cfg.discord.clientId,
    GUILD_ID: cfg.discord.guildId,
    OPENAI_API_KEY: cfg.openai.apiKey,
    OPENAI_BASE_URL: cfg.openai.baseUrl,
    LLM_ENABLED: cfg.llm.enabled,
    LLM_MODEL: cfg.llm.model,
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    LLM_TIMEOUT_MS: cfg.llm.timeoutMs,
    MEMORY_MAX_TURNS: cfg.memory.maxTurns,
    DATA_ROOT: cfg.data.root,
    DATA_DB_FILENAME: cfg.data.dbFilename,
    AUDIT_WEBHOOK_URL: cfg.audit.webhookUrl,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });

  console.log("=== AURA CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("============================");
}

export const cfg = loadConfig();
