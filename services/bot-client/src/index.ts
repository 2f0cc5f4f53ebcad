import { Client, GatewayIntentBits, Events } from 'discord.js';
import { createLogger, getConfig } from '@pagewise/common-types';
import { commands } from './commands/index.js';
import { CommandHandler } from './handlers/CommandHandler.js';
import {
  disposeAllActiveSessions,
  getActiveSessionCount,
} from './pagination/activeSessionRegistry.js';
import { shouldAutoDeployCommands, validateDiscordToken } from './startup.js';
import { deployCommands } from './utils/deployCommands.js';

// Initialize logger
const logger = createLogger('bot-client');
const envConfig = getConfig();

// Initialize Discord client
const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.GuildMessageReactions,
  ],
});

const commandHandler = new CommandHandler(commands);

// Interaction handler for slash commands and pagination buttons
client.on(Events.InteractionCreate, interaction => {
  void (async () => {
    try {
      if (interaction.isChatInputCommand()) {
        await commandHandler.handleInteraction(interaction);
      } else if (interaction.isButton()) {
        await commandHandler.handleButton(interaction);
      }
    } catch (error) {
      logger.error({ err: error }, 'Error in interaction handler');
    }
  })();
});

// Ready event
client.once(Events.ClientReady, readyClient => {
  logger.info(`Logged in as ${readyClient.user.tag}`);
});

// Error handling
client.on(Events.Error, error => {
  logger.error({ err: error }, 'Discord client error');
});

process.on('unhandledRejection', error => {
  logger.error({ err: error }, 'Unhandled rejection');
});

// Graceful shutdown: live sessions clean up their messages before we disconnect
let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal, activeSessions: getActiveSessionCount() }, 'Shutting down...');
  try {
    await disposeAllActiveSessions();
  } catch (error) {
    logger.error({ err: error }, 'Error disposing pagination sessions');
  }
  await client.destroy();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}

// Start the bot with explicit return type
async function start(): Promise<void> {
  try {
    logger.info('[Bot] Starting Pagewise Bot Client...');
    logger.info(
      {
        behavior: envConfig.PAGINATION_BEHAVIOR,
        deletion: envConfig.PAGINATION_DELETION,
        timeoutMs: envConfig.PAGINATION_TIMEOUT_MS,
      },
      '[Bot] Pagination defaults:'
    );

    const token = validateDiscordToken(envConfig);

    // Auto-deploy commands if enabled
    if (shouldAutoDeployCommands(envConfig)) {
      logger.info('[Bot] Auto-deploying slash commands...');
      try {
        await deployCommands(true);
        logger.info('[Bot] Slash commands deployed successfully');
      } catch (error) {
        logger.warn({ err: error }, '[Bot] Failed to deploy commands, but continuing startup...');
      }
    }

    await client.login(token);
    logger.info('[Bot] Successfully logged in to Discord');
  } catch (error) {
    logger.error({ err: error }, 'Failed to start bot');
    process.exit(1);
  }
}

// Start the application
void start().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start application');
  process.exit(1);
});
