/** A chat message as the engine sees it, independent of the platform. */
export type InboundMessage = {
  messageId: string;
  channelScope: string;
  authorIsBot: boolean;
  text: string;
  mentionsBotIdentity: boolean;
  /** Author of the message this one replies to, when it could be resolved. */
  repliedToMessage: { authorId: string } | null;
};

export type OutboundReply = {
  personaKey: string;
  title: string;
  description: string;
  color: number;
  footerText: string;
};

export type IgnoreReason = "bot-author" | "duplicate" | "not-triggered";

export type EngineOutcome =
  | { status: "ignored"; reason: IgnoreReason }
  | { status: "replied"; reply: OutboundReply; source: "model" | "fallback" };
