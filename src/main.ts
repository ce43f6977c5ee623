#!/usr/bin/env node
/**
 * chatrelay - streaming multi-stage chat server
 *
 * Loads configuration, opens the document store, resolves a text
 * generation provider and serves the HTTP API.
 *
 * Run: npm run build && npm start
 */

// Load environment
import { config as loadEnv } from 'dotenv';
loadEnv();

import { serve } from '@hono/node-server';
import { loadConfig, type AppConfig } from './config/index.js';
import type { Summarizer, TextGenerator } from './core/collaborators.js';
import { installProcessHandlers, registerCleanupResource } from './core/process-handlers.js';
import { formatErrorForLog } from './errors/index.js';
import { GenerativeSummarizer, HeuristicSummarizer } from './integrations/context/summarizer.js';
import { createSqliteDocumentStore } from './integrations/persistence/sqlite-store.js';
import { ConsoleSink, FileSink, configureLogger, createComponentLogger, type LogSink } from './integrations/utilities/logger.js';
import { getDefaultDatabasePath } from './paths.js';
import { createTextGenerator } from './providers/index.js';
import { createApp } from './server/app.js';
import { ChatService } from './service/chat-service.js';

const log = createComponentLogger('main');

function createSummarizer(config: AppConfig, generator: TextGenerator): Summarizer {
  return config.context.summarizer === 'generative'
    ? new GenerativeSummarizer(generator)
    : new HeuristicSummarizer();
}

async function main(): Promise<void> {
  const { config, warnings, sources } = loadConfig();

  const sinks: LogSink[] = [new ConsoleSink()];
  if (config.logging.file) sinks.push(new FileSink(config.logging.file));
  configureLogger({ level: config.logging.level, sinks });

  for (const warning of warnings) {
    log.warn(warning);
  }
  log.debug('Config sources', { sources });

  installProcessHandlers();

  const store = createSqliteDocumentStore({
    dbPath: config.store.dbPath ?? getDefaultDatabasePath(),
    walMode: true,
  });
  registerCleanupResource('store', store);
  log.info('Document store ready', { schemaVersion: store.schemaVersion });

  const generator = await createTextGenerator(config.provider);
  log.info('Text generator ready', { provider: generator.name });

  const chat = new ChatService(
    { store, generator, summarizer: createSummarizer(config, generator) },
    { context: config.context, relay: config.relay, findLimit: config.store.findLimit },
  );

  const app = createApp({ chat, store }, config.server);

  const server = serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.host }, (info) => {
    log.info('Server listening', { host: config.server.host, port: info.port });
  });
  registerCleanupResource('server', server);
}

main().catch((err: unknown) => {
  log.error('Startup failed', { error: formatErrorForLog(err) });
  process.exit(1);
});
