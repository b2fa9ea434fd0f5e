/**
 * /aura command group
 *
 * Subcommands:
 * - admin: toggle the listener, lock/unlock a persona, toggle audit mirroring, reset
 *   the channel. No options shows status.
 * - persona: list personas, or lock one (`action:set persona:<key>`)
 * - status: current channel config and memory size
 *
 * Discord hides the command from members without Administrator; the bot does no
 * authorization of its own.
 */

import { PermissionFlagsBits, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import type { MemoryManager } from "../engine/memory.js";
import type { PersonaRegistry } from "../personas/index.js";
import { UnknownPersonaError, type ChannelStateManager } from "../state/channelState.js";
import { channelScope, type ChannelStatus } from "../state/types.js";
import type { Command, CommandCtx } from "./index.js";

export const AUTO_MODE = "auto";

export type AdminAction =
  | { kind: "reset" }
  | { kind: "toggle"; enabled: boolean }
  | { kind: "lock"; persona: string }
  | { kind: "webhook"; enabled: boolean };

export type AdminOptions = {
  toggle: string | null;
  lock: string | null;
  webhook: string | null;
  reset: boolean | null;
};

/** Actions in application order: reset first, so later options apply on top of defaults. */
export function parseAdminOptions(opts: AdminOptions): AdminAction[] {
  const actions: AdminAction[] = [];
  if (opts.reset) actions.push({ kind: "reset" });
  if (opts.toggle) actions.push({ kind: "toggle", enabled: opts.toggle === "on" });
  if (opts.lock) actions.push({ kind: "lock", persona: opts.lock });
  if (opts.webhook) actions.push({ kind: "webhook", enabled: opts.webhook === "on" });
  return actions;
}

type ScopeServices = {
  state: ChannelStateManager;
  memory: MemoryManager;
  personas: PersonaRegistry;
};

/** Applies one action and returns the line reported back to the admin. */
export function applyAdminAction(services: ScopeServices, scope: string, action: AdminAction): string {
  switch (action.kind) {
    case "reset":
      services.state.resetScope(scope);
      services.memory.clear(scope);
      return "Channel reset: config back to defaults, memory cleared.";
    case "toggle":
      services.state.setEnabled(scope, action.enabled);
      return `Listener ${action.enabled ? "enabled" : "disabled"}.`;
    case "lock": {
      if (action.persona === AUTO_MODE) {
        services.state.unlockPersona(scope);
        return "Persona lock cleared (auto mode).";
      }
      services.state.lockPersona(scope, action.persona);
      const persona = services.personas.resolve(action.persona);
      return `Persona locked to ${persona.presentation.emoji} ${persona.displayName} (${persona.key}).`;
    }
    case "webhook":
      services.state.setWebhookEnabled(scope, action.enabled);
      return `Audit webhook ${action.enabled ? "enabled" : "disabled"}.`;
  }
}

export function formatStatus(status: ChannelStatus, personas: PersonaRegistry, maxTurns: number): string {
  const lock = status.lockedPersona ? personas.resolve(status.lockedPersona).key : AUTO_MODE;
  return [
    `Enabled: ${status.enabled ? "yes" : "no"}`,
    `Persona: ${lock}`,
    `Webhook: ${status.webhookEnabled ? "on" : "off"}`,
    `Memory: ${status.memoryTurns}/${maxTurns} turns`,
  ].join("\n");
}

export function listPersonaLines(personas: PersonaRegistry): string[] {
  return personas.list().map((p) => `${p.presentation.emoji} **${p.displayName}** (\`${p.key}\`): ${p.style}`);
}

function personaChoices(personas: PersonaRegistry): { name: string; value: string }[] {
  return personas.list().map((p) => ({ name: `${p.displayName} (${p.key})`, value: p.key }));
}

const ON_OFF = [
  { name: "on", value: "on" },
  { name: "off", value: "off" },
];

async function recordAudit(
  ctx: CommandCtx,
  interaction: ChatInputCommandInteraction,
  scope: string,
  title: string,
  details: string
): Promise<void> {
  const mirror = ctx.state.getConfig(scope).webhookEnabled;
  await ctx.audit.record({ title, scope, actorId: interaction.user.id, details }, { mirror });
}

async function handleAdmin(interaction: ChatInputCommandInteraction, ctx: CommandCtx, scope: string): Promise<void> {
  const actions = parseAdminOptions({
    toggle: interaction.options.getString("toggle"),
    lock: interaction.options.getString("lock"),
    webhook: interaction.options.getString("webhook"),
    reset: interaction.options.getBoolean("reset"),
  });

  if (actions.length === 0) {
    await interaction.reply({
      content: formatStatus(ctx.state.getStatus(scope), ctx.personas, ctx.memory.maxTurns),
      ephemeral: true,
    });
    return;
  }

  const lines: string[] = [];
  for (const action of actions) {
    try {
      lines.push(applyAdminAction(ctx, scope, action));
    } catch (err) {
      if (!(err instanceof UnknownPersonaError)) throw err;
      lines.push(err.message);
    }
  }

  const summary = lines.join("\n");
  await recordAudit(ctx, interaction, scope, "Aura admin", summary);
  await interaction.reply({ content: summary, ephemeral: true });
}

async function handlePersona(interaction: ChatInputCommandInteraction, ctx: CommandCtx, scope: string): Promise<void> {
  const action = interaction.options.getString("action", true);

  if (action === "list") {
    await interaction.reply({ content: listPersonaLines(ctx.personas).join("\n"), ephemeral: true });
    return;
  }

  const key = interaction.options.getString("persona");
  if (!key) {
    await interaction.reply({ content: "Pick a persona to set.", ephemeral: true });
    return;
  }

  let line: string;
  try {
    line = applyAdminAction(ctx, scope, { kind: "lock", persona: key });
  } catch (err) {
    if (!(err instanceof UnknownPersonaError)) throw err;
    await interaction.reply({ content: err.message, ephemeral: true });
    return;
  }
  await recordAudit(ctx, interaction, scope, "Aura persona", line);
  await interaction.reply({ content: line, ephemeral: true });
}

export function buildAuraCommand(personas: PersonaRegistry): Command {
  const choices = personaChoices(personas);

  return {
    data: new SlashCommandBuilder()
      .setName("aura")
      .setDescription("Persona engine controls for this channel.")
      .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
      .addSubcommand((sub) =>
        sub
          .setName("admin")
          .setDescription("Change this channel's persona settings. No options shows status.")
          .addStringOption((opt) =>
            opt.setName("toggle").setDescription("Turn the listener on or off").addChoices(...ON_OFF)
          )
          .addStringOption((opt) =>
            opt
              .setName("lock")
              .setDescription("Lock a persona, or auto to clear the lock")
              .addChoices(...choices, { name: "auto", value: AUTO_MODE })
          )
          .addStringOption((opt) =>
            opt.setName("webhook").setDescription("Mirror audit events to the webhook").addChoices(...ON_OFF)
          )
          .addBooleanOption((opt) =>
            opt.setName("reset").setDescription("Reset config to defaults and clear memory")
          )
      )
      .addSubcommand((sub) =>
        sub
          .setName("persona")
          .setDescription("List personas or lock one.")
          .addStringOption((opt) =>
            opt
              .setName("action")
              .setDescription("What to do")
              .setRequired(true)
              .addChoices({ name: "list", value: "list" }, { name: "set", value: "set" })
          )
          .addStringOption((opt) =>
            opt.setName("persona").setDescription("Persona to lock (for set)").addChoices(...choices)
          )
      )
      .addSubcommand((sub) => sub.setName("status").setDescription("Show this channel's persona settings.")),

    async execute(interaction, ctx) {
      if (!interaction.guildId) {
        await interaction.reply({ content: "Use /aura inside a server channel.", ephemeral: true });
        return;
      }
      const scope = channelScope(interaction.guildId, interaction.channelId);
      const sub = interaction.options.getSubcommand();

      if (sub === "admin") {
        await handleAdmin(interaction, ctx, scope);
      } else if (sub === "persona") {
        await handlePersona(interaction, ctx, scope);
      } else if (sub === "status") {
        await interaction.reply({
          content: formatStatus(ctx.state.getStatus(scope), ctx.personas, ctx.memory.maxTurns),
          ephemeral: true,
        });
      }
    },
  };
}
