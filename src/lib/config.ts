/**
 * Feedgate — Configuration
 *
 * Environment variables (via dotenv) and the JSON source list,
 * both validated with zod.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';
import { ItemStatusSchema, type ItemStatus } from '../types';

// ============================================================
// ENVIRONMENT
// ============================================================

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

const csv = z
  .string()
  .optional()
  .transform(value =>
    (value ?? '')
      .split(',')
      .map(part => part.trim())
      .filter(part => part.length > 0)
  );

const EnvSchema = z.object({
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-20241022'),

  SLACK_BOT_TOKEN: optionalString,
  SLACK_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  SLACK_BROADCAST_CHANNEL: optionalString,
  SLACK_MODERATION_CHANNEL: optionalString,
  SLACK_SIGNING_SECRET: optionalString,
  SLACK_MODERATORS: csv,

  WEBHOOK_PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATA_DIR: z.string().default('data'),
  SOURCES_PATH: z.string().default('config/sources.json'),

  PUBLISH_GAP_MINUTES: z.coerce.number().min(0).default(60),
  FETCH_INTERVAL_HOURS: z.coerce.number().positive().default(3),
  MAX_NEW_ITEMS_PER_CYCLE: z.coerce.number().int().positive().default(10),
  ITEM_PACING_MS: z.coerce.number().int().min(0).default(500),

  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  SIMILARITY_WINDOW_DAYS: z.coerce.number().positive().default(30),
  SIMILARITY_WINDOW_SIZE: z.coerce.number().int().positive().default(500),
  SIMILARITY_STATUSES: csv.pipe(z.array(ItemStatusSchema)),

  SEEN_RETENTION_DAYS: z.coerce.number().positive().default(90),
  MEDIA_RETENTION_DAYS: z.coerce.number().positive().default(30),

  REWRITE_LANGUAGE: z.string().default('English'),
  CHANNEL_SIGNATURE: z.string().default(''),
});

export interface DedupConfig {
  similarityThreshold: number;
  windowDays: number;
  windowSize: number;
  statuses: ItemStatus[];
}

export interface AppConfig {
  supabase: { url?: string; serviceRoleKey?: string };
  anthropic: { apiKey?: string; model: string };
  slack: {
    botToken?: string;
    webhookUrl?: string;
    broadcastChannel?: string;
    moderationChannel?: string;
    signingSecret?: string;
    moderators: string[];
  };
  webhookPort: number;
  dataDir: string;
  sourcesPath: string;
  publishGapMinutes: number;
  fetchIntervalHours: number;
  maxNewItemsPerCycle: number;
  itemPacingMs: number;
  dedup: DedupConfig;
  seenRetentionDays: number;
  mediaRetentionDays: number;
  rewriteLanguage: string;
  channelSignature: string;
}

export const DEFAULT_SIMILARITY_STATUSES: ItemStatus[] = ['pending', 'approved', 'published'];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.') || '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Build the application config from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const e = parsed.data;

  return {
    supabase: { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY },
    anthropic: { apiKey: e.ANTHROPIC_API_KEY, model: e.ANTHROPIC_MODEL },
    slack: {
      botToken: e.SLACK_BOT_TOKEN,
      webhookUrl: e.SLACK_WEBHOOK_URL,
      broadcastChannel: e.SLACK_BROADCAST_CHANNEL,
      moderationChannel: e.SLACK_MODERATION_CHANNEL,
      signingSecret: e.SLACK_SIGNING_SECRET,
      moderators: e.SLACK_MODERATORS,
    },
    webhookPort: e.WEBHOOK_PORT,
    dataDir: e.DATA_DIR,
    sourcesPath: e.SOURCES_PATH,
    publishGapMinutes: e.PUBLISH_GAP_MINUTES,
    fetchIntervalHours: e.FETCH_INTERVAL_HOURS,
    maxNewItemsPerCycle: e.MAX_NEW_ITEMS_PER_CYCLE,
    itemPacingMs: e.ITEM_PACING_MS,
    dedup: {
      similarityThreshold: e.SIMILARITY_THRESHOLD,
      windowDays: e.SIMILARITY_WINDOW_DAYS,
      windowSize: e.SIMILARITY_WINDOW_SIZE,
      statuses: e.SIMILARITY_STATUSES.length > 0 ? e.SIMILARITY_STATUSES : DEFAULT_SIMILARITY_STATUSES,
    },
    seenRetentionDays: e.SEEN_RETENTION_DAYS,
    mediaRetentionDays: e.MEDIA_RETENTION_DAYS,
    rewriteLanguage: e.REWRITE_LANGUAGE,
    channelSignature: e.CHANNEL_SIGNATURE,
  };
}

// ============================================================
// SOURCES
// ============================================================

const SourceCommonSchema = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  maxItems: z.number().int().positive().optional(),
  minScore: z.number().min(0).optional(),
  requireMedia: z.boolean().default(true),
});

export const SourceDescriptorSchema = z.discriminatedUnion('type', [
  SourceCommonSchema.extend({
    type: z.literal('rss'),
    url: z.string().url(),
  }),
  SourceCommonSchema.extend({
    type: z.literal('reddit'),
    subreddit: z.string().regex(/^[A-Za-z0-9_]+$/, 'Subreddit name must be alphanumeric'),
  }),
]);
export type SourceDescriptor = z.infer<typeof SourceDescriptorSchema>;

const SourcesFileSchema = z.object({
  sources: z.array(SourceDescriptorSchema),
});

/**
 * Validate a parsed sources document.
 */
export function parseSources(document: unknown): SourceDescriptor[] {
  const parsed = SourcesFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data.sources;
}

/**
 * Read and validate the sources file.
 */
export function loadSources(path: string): SourceDescriptor[] {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${path}: ${reason}`]);
  }
  return parseSources(document);
}
