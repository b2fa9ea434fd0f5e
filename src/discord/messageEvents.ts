import { EmbedBuilder } from "discord.js";
import { autoReplyEvent, type AuditLog } from "../audit/auditLog.js";
import type { ConversationEngine } from "../engine/engine.js";
import type { EngineOutcome, InboundMessage, OutboundReply } from "../engine/types.js";
import { channelScope } from "../state/types.js";
import { log } from "../utils/logger.js";

const discordLog = log.withScope("discord");

/**
 * The parts of a discord.js `Message` the bot reads. A real `Message` satisfies
 * this shape.
 */
export type DiscordMessageLike = {
  id: string;
  guildId: string | null;
  channelId: string;
  content: string;
  author: { id: string; bot: boolean };
  mentions: { users: { has(userId: string): boolean } };
  reference: { messageId?: string } | null;
  fetchReference(): Promise<{ author: { id: string } }>;
  reply(options: { embeds: EmbedBuilder[] }): Promise<unknown>;
};

async function resolveRepliedTo(message: DiscordMessageLike): Promise<{ authorId: string } | null> {
  if (!message.reference?.messageId) return null;
  try {
    const referenced = await message.fetchReference();
    return { authorId: referenced.author.id };
  } catch (err) {
    discordLog.debug("Could not fetch referenced message", {
      messageId: message.id,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

/** Null for messages outside a guild (DMs); those are never answered. */
export async function toInboundEvent(message: DiscordMessageLike, botUserId: string): Promise<InboundMessage | null> {
  if (!message.guildId) return null;
  return {
    messageId: message.id,
    channelScope: channelScope(message.guildId, message.channelId),
    authorIsBot: message.author.bot,
    text: message.content,
    mentionsBotIdentity: message.mentions.users.has(botUserId),
    repliedToMessage: message.author.bot ? null : await resolveRepliedTo(message),
  };
}

export function buildReplyEmbed(reply: OutboundReply): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(reply.title)
    .setDescription(reply.description)
    .setColor(reply.color)
    .setFooter({ text: reply.footerText });
}

/** Send failures are logged, never thrown. */
export async function deliverReply(message: DiscordMessageLike, reply: OutboundReply): Promise<boolean> {
  try {
    await message.reply({ embeds: [buildReplyEmbed(reply)] });
    return true;
  } catch (err) {
    discordLog.error("Failed to send reply", {
      messageId: message.id,
      persona: reply.personaKey,
      error: err instanceof Error ? err.message : String(err),
    });
    return false;
  }
}

export type MessageHandlerDeps = {
  engine: ConversationEngine;
  botUserId: string;
  /** Typing indicator; started once the engine accepts the message. */
  onGenerating?: () => void;
  /** Records every delivered reply; `mirrorFor` says whether the scope's events go to the webhook. */
  audit?: {
    log: AuditLog;
    mirrorFor(scope: string): boolean;
  };
};

/** messageCreate entry point. Never rejects. */
export async function handleDiscordMessage(
  message: DiscordMessageLike,
  deps: MessageHandlerDeps
): Promise<EngineOutcome | null> {
  try {
    const event = await toInboundEvent(message, deps.botUserId);
    if (!event) return null;

    const outcome = await deps.engine.handleMessage(event, {
      onGenerating: deps.onGenerating,
      onReply: (reply) => deliverReply(message, reply),
    });

    if (outcome.status === "replied" && deps.audit) {
      await deps.audit.log.record(
        autoReplyEvent({
          scope: event.channelScope,
          authorId: message.author.id,
          personaKey: outcome.reply.personaKey,
          source: outcome.source,
          userText: event.text,
          replyText: outcome.reply.description,
        }),
        { mirror: deps.audit.mirrorFor(event.channelScope) }
      );
    }
    return outcome;
  } catch (err) {
    discordLog.error("messageCreate handler failed", {
      messageId: message.id,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}
