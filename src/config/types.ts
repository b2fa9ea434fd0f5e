export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export interface Config {
  discord: {
    token: string;
    clientId?: string;
    guildId?: string;
  };

  openai: {
    /** Required only while the LLM is enabled. */
    apiKey?: string;
    baseUrl?: string;
  };

  llm: {
    enabled: boolean;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };

  memory: {
    maxTurns: number;
  };

  data: {
    root: string;
    dbFilename: string;
  };

  audit: {
    webhookUrl?: string;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
