/**
 * Signal desk process: Telegram bot, store, optional click tracker, sheet export and member snapshots.
 * Configure through .env (see .env.example).
 */

import dotenv from 'dotenv';
dotenv.config();

import type { Server } from 'http';
import { attachDesk, createBot } from './bot/telegramBot';
import { TelegramMessenger } from './bot/telegramMessenger';
import { loadConfig } from './config';
import { loadDefaultLinks } from './db/defaultLinks';
import { JsonFilePersistence } from './db/jsonFilePersistence';
import { SignalStore } from './db/signalStore';
import { validateEnvironment } from './lib/envValidator';
import { errorMessage } from './lib/errors';
import { DeskEventBus } from './lib/eventBus';
import { logger } from './lib/logger';
import { createTrackerApp, startTrackerServer } from './server';
import { startMemberSnapshotCron, stopMemberSnapshotCron } from './services/memberSnapshotCron';
import { SheetExporter } from './services/sheetExporter';
import { SignalDesk } from './services/signalDesk';

async function main(): Promise<void> {
  const { errors } = validateEnvironment();
  if (errors.length > 0) {
    logger.error('Server', 'Environment is incomplete, see errors above');
    process.exit(1);
  }
  const config = loadConfig();

  const store = new SignalStore(new JsonFilePersistence(config.storage.dataPath), {
    timeZone: config.timeZone,
    defaultLinks: loadDefaultLinks(config.links.defaultLinksPath)
  });
  store.load();
  logger.info('Server', `Store loaded: ${store.allSignals().length} signals, counter at ${store.signalCounter}`, {
    path: config.storage.dataPath
  });

  const bus = new DeskEventBus();
  bus.onPublished((record) => {
    logger.info('Audit', `Published #${record.sequenceId} ${record.ticker} ${record.direction}`, { sender: record.sender });
  });
  bus.onDeleted((record) => {
    logger.info('Audit', `Deleted #${record.sequenceId} ${record.ticker}`);
  });
  if (config.sheets.enabled) {
    new SheetExporter({ webhookUrl: config.sheets.webhookUrl, timeZone: config.timeZone }).attach(bus);
    logger.info('Server', 'Sheet export: enabled');
  }

  const bot = createBot(config.telegram.botToken);
  const messenger = new TelegramMessenger(bot.telegram);
  const desk = new SignalDesk({ store, messenger, bus, config });
  attachDesk(bot, desk);

  let server: Server | null = null;
  if (config.tracker.enabled) {
    server = await startTrackerServer(createTrackerApp(store), config.tracker.port);
  }

  startMemberSnapshotCron({
    store,
    messenger,
    channelId: config.telegram.channelId,
    timeZone: config.timeZone
  });

  const shutdown = (signal: string) => {
    logger.info('Server', `${signal} received, stopping`);
    bot.stop(signal);
    stopMemberSnapshotCron();
    server?.close();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await bot.launch(() => {
    logger.info('Server', `Signal desk bot started (channel ${config.telegram.channelId})`);
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error('Server', `Unhandled rejection: ${errorMessage(reason)}`);
});

main().catch((e) => {
  logger.error('Server', 'Startup failed', { error: errorMessage(e) });
  process.exit(1);
});
