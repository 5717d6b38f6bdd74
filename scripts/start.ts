/**
 * Feedgate — Service Entry Point
 *
 * Runs the scheduler loop and the moderation webhook in one process.
 *
 * Usage:
 *   npm start
 *
 * Stops cleanly on SIGINT/SIGTERM: the webhook stops accepting requests
 * and the in-flight scheduler tick is allowed to finish.
 */

import 'dotenv/config';
import { logger, errorMessage } from '../src/lib/logger';
import { loadConfig, loadSources } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import { createSupabaseAdminClient, checkDatabaseHealth } from '../src/db/client';
import { SupabaseItemStore } from '../src/db/queries';
import { createSources } from '../src/feeds';
import { AnthropicAnalyzer } from '../src/enrichment/analyzer';
import { SlackBroadcaster, SlackOperatorChannel } from '../src/delivery';
import {
  CommandQueue,
  Scheduler,
  publishNext,
  runHousekeeping,
  runIngestionCycle,
} from '../src/pipeline';
import { createWebhookApp, startServer } from '../src/server/webhook';

async function main(): Promise<void> {
  const config = loadConfig();
  const descriptors = loadSources(config.sourcesPath);
  const sources = createSources(descriptors);

  if (!config.anthropic.apiKey) {
    throw new ConfigError(['ANTHROPIC_API_KEY: Required']);
  }

  const client = createSupabaseAdminClient(config.supabase);
  const health = await checkDatabaseHealth(client);
  if (!health.healthy) {
    throw new Error(`Database unreachable: ${health.error ?? 'unknown error'}`);
  }
  logger.info('Database connected', { latencyMs: health.latencyMs });

  const store = new SupabaseItemStore(client);
  const analyzer = AnthropicAnalyzer.fromApiKey(config.anthropic.apiKey, {
    model: config.anthropic.model,
    language: config.rewriteLanguage,
    signature: config.channelSignature,
  });

  const slack = { botToken: config.slack.botToken, webhookUrl: config.slack.webhookUrl };
  const operator = new SlackOperatorChannel({ ...slack, channel: config.slack.moderationChannel });
  const broadcaster = new SlackBroadcaster({ ...slack, channel: config.slack.broadcastChannel }, operator);

  const commands = new CommandQueue();

  const scheduler = new Scheduler(
    {
      store,
      operator,
      commands,
      runIngestion: () =>
        runIngestionCycle(
          { store, sources, analyzer, operator, dedup: config.dedup, dataDir: config.dataDir },
          { maxNewItems: config.maxNewItemsPerCycle, pacingMs: config.itemPacingMs }
        ),
      publish: () =>
        publishNext({ store, broadcaster, minGapMs: config.publishGapMinutes * 60 * 1000 }),
      housekeeping: () =>
        runHousekeeping({
          store,
          dataDir: config.dataDir,
          seenRetentionDays: config.seenRetentionDays,
          mediaRetentionDays: config.mediaRetentionDays,
        }),
    },
    { fetchIntervalMs: config.fetchIntervalHours * 60 * 60 * 1000 }
  );

  const app = createWebhookApp({
    store,
    commands,
    signingSecret: config.slack.signingSecret,
    moderators: config.slack.moderators,
  });
  const server = startServer(app, config.webhookPort);

  logger.info('Feedgate started', {
    sources: sources.map(s => s.name),
    publishGapMinutes: config.publishGapMinutes,
    fetchIntervalHours: config.fetchIntervalHours,
  });
  scheduler.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });

    server.close();
    await scheduler.stop();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(error => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

main().catch(error => {
  if (error instanceof ConfigError) {
    logger.error('Invalid configuration', { issues: error.issues });
  } else {
    logger.error('Fatal error', { error: errorMessage(error) });
  }
  process.exit(1);
});
