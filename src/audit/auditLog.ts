/**
 * Audit trail for administrative actions and automatic replies. Every event goes
 * to the logger; events for scopes with `webhookEnabled` are also mirrored to the
 * audit webhook when one is configured.
 */

import { EmbedBuilder, WebhookClient } from "discord.js";
import { log } from "../utils/logger.js";

const auditLog = log.withScope("audit");

const AUDIT_COLOR = 0xf1c40f;

export interface AuditSink {
  send(options: { embeds: EmbedBuilder[] }): Promise<unknown>;
}

export type AuditEvent = {
  title: string;
  scope: string;
  actorId: string;
  details: string;
};

const USER_EXCERPT_CHARS = 200;
const REPLY_EXCERPT_CHARS = 800;

export type AutoReplyAudit = {
  scope: string;
  authorId: string;
  personaKey: string;
  source: "model" | "fallback";
  userText: string;
  replyText: string;
};

export function autoReplyEvent(reply: AutoReplyAudit): AuditEvent {
  return {
    title: `Auto-reply persona=${reply.personaKey} (${reply.source})`,
    scope: reply.scope,
    actorId: reply.authorId,
    details: `User: ${reply.userText.slice(0, USER_EXCERPT_CHARS)}\nReply excerpt: ${reply.replyText.slice(0, REPLY_EXCERPT_CHARS)}`,
  };
}

export function buildAuditEmbed(event: AuditEvent): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(event.title)
    .setDescription(event.details)
    .setColor(AUDIT_COLOR)
    .addFields({ name: "Scope", value: event.scope, inline: true }, { name: "Actor", value: `<@${event.actorId}>`, inline: true });
}

export class AuditLog {
  constructor(private readonly sink: AuditSink | null) {}

  get hasSink(): boolean {
    return this.sink !== null;
  }

  /** Returns true when the event was mirrored to the webhook. */
  async record(event: AuditEvent, opts: { mirror: boolean }): Promise<boolean> {
    auditLog.info(`${event.title}: ${event.details}`, { scope: event.scope, actor: event.actorId });
    if (!opts.mirror || !this.sink) return false;

    try {
      await this.sink.send({ embeds: [buildAuditEmbed(event)] });
      return true;
    } catch (err) {
      auditLog.warn("Audit webhook delivery failed", {
        scope: event.scope,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}

export function createAuditLog(webhookUrl: string | undefined): AuditLog {
  if (!webhookUrl) return new AuditLog(null);
  return new AuditLog(new WebhookClient({ url: webhookUrl }));
}
