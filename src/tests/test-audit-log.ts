import type { EmbedBuilder } from "discord.js";
import { expect, test } from "vitest";
import { AuditLog, autoReplyEvent, buildAuditEmbed, createAuditLog, type AuditSink } from "../audit/auditLog.js";

const event = { title: "Aura admin", scope: "guild-1:channel-1", actorId: "user-1", details: "Listener disabled." };

class RecordingSink implements AuditSink {
  readonly sent: EmbedBuilder[][] = [];
  fail = false;

  async send(options: { embeds: EmbedBuilder[] }): Promise<unknown> {
    if (this.fail) throw new Error("webhook gone");
    this.sent.push(options.embeds);
    return undefined;
  }
}

test("events are mirrored only when asked and a sink exists", async () => {
  const sink = new RecordingSink();
  const audit = new AuditLog(sink);

  expect(await audit.record(event, { mirror: false })).toBe(false);
  expect(sink.sent).toHaveLength(0);

  expect(await audit.record(event, { mirror: true })).toBe(true);
  expect(sink.sent[0]?.[0]?.toJSON().title).toBe("Aura admin");

  expect(await new AuditLog(null).record(event, { mirror: true })).toBe(false);
});

test("webhook failures are swallowed after logging", async () => {
  const sink = new RecordingSink();
  sink.fail = true;

  expect(await new AuditLog(sink).record(event, { mirror: true })).toBe(false);
});

test("audit embed names the scope and actor", () => {
  const embed = buildAuditEmbed(event).toJSON();

  expect(embed.description).toBe("Listener disabled.");
  expect(embed.fields).toEqual([
    { name: "Scope", value: "guild-1:channel-1", inline: true },
    { name: "Actor", value: "<@user-1>", inline: true },
  ]);
});

test("no webhook url means no sink", () => {
  expect(createAuditLog(undefined).hasSink).toBe(false);
});

test("auto-reply events carry persona, source and trimmed excerpts", () => {
  const result = autoReplyEvent({
    scope: "guild-1:channel-1",
    authorId: "user-1",
    personaKey: "oracle",
    source: "fallback",
    userText: "u".repeat(250),
    replyText: "r".repeat(900),
  });

  expect(result.title).toBe("Auto-reply persona=oracle (fallback)");
  expect(result.actorId).toBe("user-1");
  expect(result.details).toBe(`User: ${"u".repeat(200)}\nReply excerpt: ${"r".repeat(800)}`);
});
