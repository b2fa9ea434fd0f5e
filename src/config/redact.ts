const SECRET_KEYS: ReadonlySet<string> = new Set(["DISCORD_TOKEN", "OPENAI_API_KEY", "AUDIT_WEBHOOK_URL"]);

/** Replaces known secret values anywhere in the tree. */
export function redactConfigSnapshot(obj: unknown): unknown {
  const seen = new WeakSet<object>();

  function walk(v: unknown): unknown {
    if (v && typeof v === "object") {
      if (seen.has(v)) return v;
      seen.add(v);

      if (Array.isArray(v)) return v.map(walk);

      const out: Record<string, unknown> = {};
      for (const [k, val] of Object.entries(v)) {
        if (SECRET_KEYS.has(k)) out[k] = val === undefined ? undefined : "<redacted>";
        else out[k] = walk(val);
      }
      return out;
    }
    return v;
  }

  return walk(obj);
}
