import {
  Collection,
  type ChatInputCommandInteraction,
  type Client,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import type { AuditLog } from "../audit/auditLog.js";
import type { MemoryManager } from "../engine/memory.js";
import type { PersonaRegistry } from "../personas/index.js";
import type { ChannelStateManager } from "../state/channelState.js";
import { log } from "../utils/logger.js";
import { buildAuraCommand } from "./aura.js";

const commandsLog = log.withScope("commands");

export type CommandCtx = {
  state: ChannelStateManager;
  memory: MemoryManager;
  personas: PersonaRegistry;
  audit: AuditLog;
};

export type Command = {
  data: {
    readonly name: string;
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  execute(interaction: ChatInputCommandInteraction, ctx: CommandCtx): Promise<void>;
};

export function buildCommandList(personas: PersonaRegistry): Command[] {
  return [buildAuraCommand(personas)];
}

export function registerHandlers(client: Client, ctx: CommandCtx): Collection<string, Command> {
  const commandMap = new Collection(
    buildCommandList(ctx.personas).map((c): [string, Command] => [c.data.name, c])
  );

  client.on("interactionCreate", async (interaction) => {
    if (!interaction.isChatInputCommand()) return;

    const cmd = commandMap.get(interaction.commandName);
    if (!cmd) return;

    try {
      commandsLog.debug(`command:${interaction.commandName}`, {
        guildId: interaction.guildId,
        channelId: interaction.channelId,
        user: interaction.user.id,
      });
      await cmd.execute(interaction, ctx);
    } catch (err) {
      commandsLog.error(`Command error: ${interaction.commandName}`, err);
      const msg = "Something went wrong.";
      try {
        if (interaction.deferred || interaction.replied) {
          await interaction.followUp({ content: msg, ephemeral: true });
        } else {
          await interaction.reply({ content: msg, ephemeral: true });
        }
      } catch (replyErr) {
        commandsLog.warn("Could not report command error to user", replyErr);
      }
    }
  });

  return commandMap;
}
