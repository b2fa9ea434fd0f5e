import { Client, Events, GatewayIntentBits } from "discord.js";
import { cfg, printConfigSnapshot } from "./config/env.js";
import { log } from "./utils/logger.js";
import { registerHandlers } from "./commands/index.js";
import { createAuditLog } from "./audit/auditLog.js";
import { openStateDb, resolveStateDbPath } from "./db.js";
import { ConversationEngine } from "./engine/engine.js";
import { MemoryManager } from "./engine/memory.js";
import { createCompletionClient } from "./llm/client.js";
import { createPersonaRegistry } from "./personas/index.js";
import { ChannelStateManager } from "./state/channelState.js";
import { SqliteStateStore } from "./state/stateStore.js";
import { handleDiscordMessage } from "./discord/messageEvents.js";

const bootLog = log.withScope("boot");
const discordLog = log.withScope("discord");

printConfigSnapshot(cfg);

const dbPath = resolveStateDbPath(cfg.data.root, cfg.data.dbFilename);
const personas = createPersonaRegistry();
const state = new ChannelStateManager(new SqliteStateStore(openStateDb(dbPath)), personas, {
  maxTurns: cfg.memory.maxTurns,
});
const memory = new MemoryManager(state);
const completion = createCompletionClient(cfg);
const audit = createAuditLog(cfg.audit.webhookUrl);

bootLog.info(`State db: ${dbPath}`, { personas: personas.keys().length, maxTurns: cfg.memory.maxTurns });

const client = new Client({
  intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
});

registerHandlers(client, { state, memory, personas, audit });

// Built once the bot knows its own user id; messages before that are ignored.
let engine: ConversationEngine | null = null;

client.once(Events.ClientReady, (ready) => {
  engine = new ConversationEngine({
    state,
    memory,
    personas,
    completion,
    botUserId: ready.user.id,
  });
  bootLog.info(`Aura online as ${ready.user.tag}`);
});

client.on(Events.MessageCreate, async (message) => {
  const botUserId = client.user?.id;
  if (!engine || !botUserId) return;

  await handleDiscordMessage(message, {
    engine,
    botUserId,
    audit: { log: audit, mirrorFor: (scope) => state.getConfig(scope).webhookEnabled },
    onGenerating: () => {
      if (!("sendTyping" in message.channel)) return;
      message.channel.sendTyping().catch((err: unknown) => {
        discordLog.debug("sendTyping failed", err);
      });
    },
  });
});

client.login(cfg.discord.token).catch((err: unknown) => {
  bootLog.error("Discord login failed", err);
  process.exit(1);
});
