/**
 * Feedgate — Run Ingestion Script
 *
 * Runs a single ingestion cycle and prints the report.
 *
 * Usage:
 *   npm run ingest                       # Supabase store, Slack delivery
 *   npm run ingest -- --dry-run          # In-memory store, console output
 *   npm run ingest -- --max-items 3      # Override the per-cycle cap
 */

import 'dotenv/config';
import { logger, errorMessage } from '../src/lib/logger';
import { loadConfig, loadSources } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import { createSupabaseAdminClient } from '../src/db/client';
import { SupabaseItemStore } from '../src/db/queries';
import { MemoryItemStore } from '../src/db/memory';
import type { ItemStore } from '../src/db/store';
import { createSources } from '../src/feeds';
import { AnthropicAnalyzer } from '../src/enrichment/analyzer';
import { SlackOperatorChannel } from '../src/delivery';
import { runIngestionCycle } from '../src/pipeline';

// ============================================================
// CONFIGURATION
// ============================================================

interface IngestOptions {
  dryRun: boolean;
  maxItems?: number;
}

function parseArgs(): IngestOptions {
  const args = process.argv.slice(2);
  const options: IngestOptions = { dryRun: false };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--dry-run') {
      options.dryRun = true;
    } else if (args[i] === '--max-items' && args[i + 1]) {
      const value = Number(args[i + 1]);
      if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError([`--max-items: expected a positive integer, got ${args[i + 1]}`]);
      }
      options.maxItems = value;
      i++;
    }
  }

  return options;
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig();
  const sources = createSources(loadSources(config.sourcesPath));

  if (!config.anthropic.apiKey) {
    throw new ConfigError(['ANTHROPIC_API_KEY: Required']);
  }

  logger.info('='.repeat(60));
  logger.info('Feedgate ingestion');
  logger.info('='.repeat(60));
  logger.info('Options', { ...options, sources: sources.map(s => s.name) });

  const store: ItemStore = options.dryRun
    ? new MemoryItemStore()
    : new SupabaseItemStore(createSupabaseAdminClient(config.supabase));

  // An empty Slack config makes every message fall back to the console.
  const operator = new SlackOperatorChannel(
    options.dryRun
      ? {}
      : {
          botToken: config.slack.botToken,
          webhookUrl: config.slack.webhookUrl,
          channel: config.slack.moderationChannel,
        }
  );

  const analyzer = AnthropicAnalyzer.fromApiKey(config.anthropic.apiKey, {
    model: config.anthropic.model,
    language: config.rewriteLanguage,
    signature: config.channelSignature,
  });

  const report = await runIngestionCycle(
    { store, sources, analyzer, operator, dedup: config.dedup, dataDir: config.dataDir },
    {
      maxNewItems: options.maxItems ?? config.maxNewItemsPerCycle,
      pacingMs: options.dryRun ? 0 : config.itemPacingMs,
    }
  );

  logger.info('='.repeat(60));
  logger.info('Ingestion report', {
    newItems: report.newItems,
    duplicates: report.duplicates,
    irrelevant: report.irrelevant,
    failed: report.failed,
    remaining: report.remaining,
    sourceErrors: report.sourceErrors.length,
    durationMs: report.durationMs,
  });
  logger.info('='.repeat(60));
}

main().catch(error => {
  if (error instanceof ConfigError) {
    logger.error('Invalid configuration', { issues: error.issues });
  } else {
    logger.error('Ingestion failed', { error: errorMessage(error) });
  }
  process.exit(1);
});
