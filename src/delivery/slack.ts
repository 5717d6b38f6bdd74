/**
 * Feedgate — Slack Delivery
 *
 * Publishes posts to the broadcast channel and talks to operators in the
 * moderation channel, through the Bot API or an incoming webhook.
 * Supports Block Kit for rich formatting.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { logger, errorMessage } from '../lib/logger';
import { truncate } from '../feeds/normalizer';
import type { TrackedItem, IngestionReport } from '../types';
import type { Broadcaster, DeliveryResult, OperatorChannel } from './index';

const SLACK_API = 'https://slack.com/api';
const MAX_SECTION_TEXT = 2900;

// ============================================================
// TYPES
// ============================================================

export interface SlackConfig {
  webhookUrl?: string;
  botToken?: string;
  defaultChannel?: string;
}

export interface SlackMessage {
  channel?: string;
  text: string;
  blocks?: SlackBlock[];
  unfurl_links?: boolean;
  unfurl_media?: boolean;
}

export interface SlackBlock {
  type: string;
  text?: SlackText;
  elements?: Array<SlackElement | SlackText>;
  block_id?: string;
  fields?: SlackText[];
  image_url?: string;
  alt_text?: string;
}

export interface SlackText {
  type: 'plain_text' | 'mrkdwn';
  text: string;
  emoji?: boolean;
}

export interface SlackElement {
  type: string;
  text?: SlackText;
  action_id?: string;
  value?: string;
  style?: 'primary' | 'danger';
}

export interface SlackResult {
  success: boolean;
  channel?: string;
  ts?: string;
  error?: string;
  sentAt: string;
}

export interface SlackFileUpload {
  channel: string;
  path: string;
  title: string;
  initialComment: string;
}

/** action_id values carried by interactive buttons */
export const SLACK_ACTIONS = {
  approve: 'approve_item',
  reject: 'reject_item',
  fetchNow: 'fetch_now',
  resendPending: 'resend_pending',
} as const;

// ============================================================
// BLOCK BUILDERS
// ============================================================

/**
 * Escape user-supplied text for mrkdwn.
 */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function header(text: string): SlackBlock {
  return {
    type: 'header',
    text: { type: 'plain_text', text: truncate(text, 150), emoji: true },
  };
}

function section(text: string): SlackBlock {
  return {
    type: 'section',
    text: { type: 'mrkdwn', text: truncate(text, MAX_SECTION_TEXT) },
  };
}

function divider(): SlackBlock {
  return { type: 'divider' };
}

function context(texts: string[]): SlackBlock {
  return {
    type: 'context',
    elements: texts.map(t => ({ type: 'mrkdwn', text: t })),
  };
}

function image(url: string, altText: string): SlackBlock {
  return { type: 'image', image_url: url, alt_text: truncate(altText, 200) };
}

function actions(
  buttons: Array<{ text: string; actionId: string; value: string; style?: 'primary' | 'danger' }>
): SlackBlock {
  return {
    type: 'actions',
    elements: buttons.map(b => ({
      type: 'button',
      text: { type: 'plain_text', text: b.text, emoji: true },
      action_id: b.actionId,
      value: b.value,
      style: b.style,
    })),
  };
}

// ============================================================
// SEND FUNCTIONS
// ============================================================

interface SlackApiResponse {
  ok: boolean;
  channel?: string;
  ts?: string;
  error?: string;
  upload_url?: string;
  file_id?: string;
}

function isSlackApiResponse(value: unknown): value is SlackApiResponse {
  return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean';
}

async function callSlackApi(
  botToken: string,
  method: string,
  init: { json?: unknown; form?: Record<string, string> }
): Promise<SlackApiResponse> {
  const res = await fetch(`${SLACK_API}/${method}`, {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${botToken}`,
      'Content-Type': init.form
        ? 'application/x-www-form-urlencoded'
        : 'application/json; charset=utf-8',
    },
    body: init.form ? new URLSearchParams(init.form).toString() : JSON.stringify(init.json),
  });

  const data: unknown = await res.json();
  if (!isSlackApiResponse(data)) {
    throw new Error(`Slack API error: unexpected response from ${method}`);
  }
  if (!data.ok) {
    throw new Error(`Slack API error: ${data.error ?? 'unknown_error'}`);
  }
  return data;
}

/**
 * Send message via webhook.
 */
async function sendViaWebhook(
  config: SlackConfig,
  message: SlackMessage
): Promise<SlackResult> {
  if (!config.webhookUrl) {
    throw new Error('SLACK_WEBHOOK_URL not configured');
  }

  const res = await fetch(config.webhookUrl, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(message),
  });

  if (!res.ok) {
    const error = await res.text();
    throw new Error(`Slack webhook error: ${res.status} - ${error}`);
  }

  return {
    success: true,
    sentAt: new Date().toISOString(),
  };
}

/**
 * Send message via Bot API.
 */
async function sendViaBotApi(
  config: SlackConfig & { botToken: string },
  message: SlackMessage
): Promise<SlackResult> {
  const channel = message.channel || config.defaultChannel;
  if (!channel) {
    throw new Error('No channel specified');
  }

  const data = await callSlackApi(config.botToken, 'chat.postMessage', {
    json: {
      channel,
      text: message.text,
      blocks: message.blocks,
      unfurl_links: message.unfurl_links ?? false,
      unfurl_media: message.unfurl_media ?? false,
    },
  });

  return {
    success: true,
    channel: data.channel,
    ts: data.ts,
    sentAt: new Date().toISOString(),
  };
}

/**
 * Send a Slack message. Never throws.
 */
export async function sendSlackMessage(
  message: SlackMessage,
  config: SlackConfig
): Promise<SlackResult> {
  logger.info('Sending Slack message', {
    channel: message.channel || config.defaultChannel,
    hasBlocks: !!message.blocks?.length,
  });

  try {
    let result: SlackResult;

    if (config.botToken) {
      result = await sendViaBotApi({ ...config, botToken: config.botToken }, message);
    } else if (config.webhookUrl) {
      result = await sendViaWebhook(config, message);
    } else {
      // Console fallback
      console.log('='.repeat(60));
      console.log('SLACK MESSAGE (Console Fallback)');
      console.log('='.repeat(60));
      console.log(JSON.stringify(message, null, 2));
      console.log('='.repeat(60));

      result = {
        success: true,
        sentAt: new Date().toISOString(),
      };
    }

    logger.info('Slack message sent', {
      channel: result.channel,
      ts: result.ts,
    });

    return result;
  } catch (error) {
    const errorMsg = errorMessage(error);
    logger.error('Slack send failed', { error: errorMsg });

    return {
      success: false,
      error: errorMsg,
      sentAt: new Date().toISOString(),
    };
  }
}

/**
 * Upload a local file with a comment, through the external-upload flow:
 * reserve an upload URL, send the bytes, then share the file.
 */
export async function uploadSlackFile(botToken: string, upload: SlackFileUpload): Promise<SlackResult> {
  const bytes = await readFile(upload.path);
  const filename = basename(upload.path);

  const reserved = await callSlackApi(botToken, 'files.getUploadURLExternal', {
    form: { filename, length: String(bytes.length) },
  });
  if (!reserved.upload_url || !reserved.file_id) {
    throw new Error('Slack API error: no upload URL returned');
  }

  const res = await fetch(reserved.upload_url, { method: 'POST', body: bytes });
  if (!res.ok) {
    throw new Error(`Slack upload error: ${res.status}`);
  }

  await callSlackApi(botToken, 'files.completeUploadExternal', {
    json: {
      files: [{ id: reserved.file_id, title: upload.title }],
      channel_id: upload.channel,
      initial_comment: upload.initialComment,
    },
  });

  return { success: true, channel: upload.channel, sentAt: new Date().toISOString() };
}

// ============================================================
// MESSAGE BUILDERS
// ============================================================

/**
 * Approval request for the moderation channel.
 */
export function buildApprovalRequestMessage(item: TrackedItem): SlackMessage {
  const title = escapeMrkdwn(item.title);
  const blocks: SlackBlock[] = [
    header('New item for review'),
    section(`*<${item.originalUrl}|${title}>*\n${escapeMrkdwn(truncate(item.summary, 500))}`),
  ];

  if (item.mediaUrl && item.mediaKind === 'image') {
    blocks.push(image(item.mediaUrl, item.title));
  } else if (item.mediaUrl) {
    blocks.push(context([`:film_frames: <${item.mediaUrl}|Video>`]));
  }

  blocks.push(divider());
  blocks.push(section(item.rewrittenContent));
  blocks.push(context([`Source: ${escapeMrkdwn(item.sourceName)} | ID: \`${item.id}\``]));
  blocks.push(
    actions([
      { text: 'Approve', actionId: SLACK_ACTIONS.approve, value: item.id, style: 'primary' },
      { text: 'Reject', actionId: SLACK_ACTIONS.reject, value: item.id, style: 'danger' },
    ])
  );

  return {
    text: `New item for review: ${item.title}`,
    blocks,
    unfurl_links: false,
    unfurl_media: false,
  };
}

/**
 * Broadcast post, optionally with the remote image inline.
 */
export function buildPostMessage(item: TrackedItem, withImage: boolean): SlackMessage {
  const blocks: SlackBlock[] = [section(item.rewrittenContent)];
  if (withImage && item.mediaUrl) {
    blocks.push(image(item.mediaUrl, item.title));
  }
  return {
    text: truncate(item.rewrittenContent, 3000),
    blocks,
    unfurl_links: false,
    unfurl_media: withImage,
  };
}

/**
 * Summary of one ingestion cycle, or null when nothing is worth reporting.
 */
export function buildCycleSummaryMessage(report: IngestionReport): SlackMessage | null {
  if (report.newItems === 0 && report.failed === 0) return null;

  const lines = ['*Fetch cycle finished*'];
  if (report.newItems > 0) lines.push(`:white_check_mark: New items: ${report.newItems}`);
  if (report.duplicates > 0) lines.push(`:repeat: Duplicates: ${report.duplicates}`);
  if (report.irrelevant > 0) lines.push(`:fast_forward: Skipped: ${report.irrelevant}`);
  if (report.failed > 0) lines.push(`:x: Failed: ${report.failed}`);
  if (report.remaining > 0) lines.push(`:hourglass_flowing_sand: Left for next run: ${report.remaining}`);

  const { usage } = report;
  return {
    text: lines.join('\n'),
    blocks: [
      section(lines.join('\n')),
      context([
        `Classify calls: ${usage.classifyCalls} | Rewrite calls: ${usage.rewriteCalls} | ` +
          `Tokens: ${usage.inputTokens} in / ${usage.outputTokens} out`,
      ]),
      actions([
        { text: 'Resend pending', actionId: SLACK_ACTIONS.resendPending, value: 'summary' },
        { text: 'Fetch now', actionId: SLACK_ACTIONS.fetchNow, value: 'summary' },
      ]),
    ],
  };
}

export function buildNoticeMessage(text: string): SlackMessage {
  return {
    text: truncate(text, 3000),
    blocks: [section(`:warning: ${escapeMrkdwn(text)}`)],
  };
}

// ============================================================
// DELIVERY CLASSES
// ============================================================

export interface SlackChannelConfig extends SlackConfig {
  channel?: string;
}

/**
 * Moderation-channel surface. Best effort: failures are logged only.
 */
export class SlackOperatorChannel implements OperatorChannel {
  private readonly config: SlackConfig;

  constructor(config: SlackChannelConfig) {
    this.config = { ...config, defaultChannel: config.channel ?? config.defaultChannel };
  }

  async requestApproval(item: TrackedItem): Promise<void> {
    const result = await sendSlackMessage(buildApprovalRequestMessage(item), this.config);
    if (!result.success) {
      logger.warn('Approval request not delivered', { itemId: item.id, error: result.error });
    }
  }

  async notify(text: string): Promise<void> {
    await sendSlackMessage(buildNoticeMessage(text), this.config);
  }

  async sendCycleSummary(report: IngestionReport): Promise<void> {
    const message = buildCycleSummaryMessage(report);
    if (!message) return;
    await sendSlackMessage(message, this.config);
  }
}

/**
 * Broadcast-channel surface. Tries the cached file, then the remote
 * image, then text only; a lost image is reported to the operator.
 */
export class SlackBroadcaster implements Broadcaster {
  private readonly config: SlackConfig;
  private readonly channel?: string;

  constructor(
    config: SlackChannelConfig,
    private readonly operator?: OperatorChannel
  ) {
    this.channel = config.channel ?? config.defaultChannel;
    this.config = { ...config, defaultChannel: this.channel };
  }

  async deliver(item: TrackedItem): Promise<DeliveryResult> {
    let mediaError: string | undefined;

    if (item.mediaUrl || item.localMediaPath) {
      const withMedia = await this.deliverWithMedia(item);
      if (withMedia.success) return { success: true };
      mediaError = withMedia.error;
      logger.warn('Media send failed, falling back to text', { itemId: item.id, error: mediaError });
    }

    const result = await sendSlackMessage(buildPostMessage(item, false), this.config);
    if (!result.success) {
      return { success: false, error: result.error ?? 'Unknown Slack error' };
    }

    if (mediaError && this.operator) {
      await this.operator.notify(
        `Media not sent for "${truncate(item.title, 100)}": ${truncate(mediaError, 200)}. Published as text only.`
      );
    }

    return mediaError ? { success: true, mediaError } : { success: true };
  }

  private async deliverWithMedia(item: TrackedItem): Promise<{ success: true } | { success: false; error: string }> {
    if (item.localMediaPath && this.config.botToken && this.channel) {
      try {
        await uploadSlackFile(this.config.botToken, {
          channel: this.channel,
          path: item.localMediaPath,
          title: item.title,
          initialComment: item.rewrittenContent,
        });
        return { success: true };
      } catch (error) {
        logger.warn('File upload failed', { itemId: item.id, error: errorMessage(error) });
        if (!item.mediaUrl || item.mediaKind !== 'image') {
          return { success: false, error: errorMessage(error) };
        }
      }
    }

    if (item.mediaUrl && item.mediaKind === 'image') {
      const result = await sendSlackMessage(buildPostMessage(item, true), this.config);
      return result.success
        ? { success: true }
        : { success: false, error: result.error ?? 'Unknown Slack error' };
    }

    return { success: false, error: 'No deliverable media' };
  }
}
