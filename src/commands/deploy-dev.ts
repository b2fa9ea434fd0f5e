import "dotenv/config";
import { REST, Routes } from "discord.js";
import { buildCommandList } from "./index.js";
import { getEnv } from "../config/rawEnv.js";
import { createPersonaRegistry } from "../personas/index.js";
import { log } from "../utils/logger.js";

const bootLog = log.withScope("boot");

async function main(): Promise<void> {
  const token = getEnv("DISCORD_TOKEN");
  const clientId = getEnv("DISCORD_CLIENT_ID");
  const guildId = getEnv("GUILD_ID");

  if (!token || !clientId || !guildId) {
    throw new Error("Missing env vars. Need DISCORD_TOKEN, DISCORD_CLIENT_ID, GUILD_ID");
  }

  const rest = new REST({ version: "10" }).setToken(token);
  const body = buildCommandList(createPersonaRegistry()).map((c) => c.data.toJSON());
  bootLog.info(`Registering ${body.length} commands to guild ${guildId}...`);
  await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body });
  bootLog.info("Guild commands registered.");
}

main().catch((e) => {
  bootLog.error("Command registration failed", e);
  process.exit(1);
});
