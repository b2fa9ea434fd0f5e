export type TurnRole = "user" | "assistant";

/** One role-tagged entry of a channel's conversation, replayed verbatim to the model. */
export type Turn = {
  role: TurnRole;
  content: string;
};

export type GuildConversationState = {
  enabled: boolean;
  /** When set, scoring is skipped and this persona always answers. */
  lockedPersona: string | null;
  /** Mirror audit events for this scope to the audit webhook. */
  webhookEnabled: boolean;
};

export const DEFAULT_GUILD_STATE: Readonly<GuildConversationState> = Object.freeze({
  enabled: true,
  lockedPersona: null,
  webhookEnabled: true,
});

export type ChannelStatus = GuildConversationState & {
  memoryTurns: number;
};

/**
 * Channel scope key: `<guildId>:<channelId>`. Config and memory are both keyed by it.
 */
export function channelScope(guildId: string, channelId: string): string {
  return `${guildId}:${channelId}`;
}
