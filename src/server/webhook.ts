/**
 * Feedgate — Moderation Webhook Server
 *
 * Minimal Express server through which operators act on the pipeline
 * from Slack: approve/reject buttons, and the fetch/resend/status commands.
 *
 * Endpoints:
 * - GET  /health        : Health check for monitoring
 * - GET  /status        : Queue counts
 * - POST /slack/actions : Slack interactive payloads (buttons)
 * - POST /slack/commands: Slack slash command
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import crypto from 'crypto';
import type { Server } from 'http';
import { z } from 'zod';
import type { ItemStore } from '../db/store';
import type { CommandQueue } from '../pipeline/scheduler';
import { applyModeration } from '../pipeline/moderation';
import { SLACK_ACTIONS } from '../delivery/slack';
import type { ModerationResult } from '../types';
import { logger, errorMessage } from '../lib/logger';

// ============================================================
// CONFIGURATION
// ============================================================

/** Requests older than this are rejected as replays. */
export const MAX_REQUEST_AGE_SECONDS = 5 * 60;

export interface WebhookDeps {
  store: ItemStore;
  commands: CommandQueue;
  signingSecret?: string;
  /** Slack user ids allowed to act; empty means anyone in the workspace. */
  moderators: string[];
  now?: () => number;
}

// ============================================================
// SIGNATURE VERIFICATION
// ============================================================

/**
 * Verify a Slack request signature (`v0=` HMAC SHA-256 over
 * `v0:<timestamp>:<body>`) and the freshness of its timestamp.
 */
export function verifySlackSignature(
  rawBody: string,
  timestamp: string | undefined,
  signature: string | undefined,
  secret: string,
  nowMs: number = Date.now()
): boolean {
  if (!timestamp || !signature) {
    return false;
  }

  const ts = Number(timestamp);
  if (!Number.isInteger(ts) || Math.abs(nowMs / 1000 - ts) > MAX_REQUEST_AGE_SECONDS) {
    return false;
  }

  const parts = signature.split('=');
  if (parts.length !== 2 || parts[0] !== 'v0' || !parts[1]) {
    return false;
  }

  const digest = crypto
    .createHmac('sha256', secret)
    .update(`v0:${timestamp}:${rawBody}`)
    .digest('hex');

  const expected = Buffer.from(digest, 'hex');
  const received = Buffer.from(parts[1], 'hex');
  if (expected.length !== received.length) {
    return false;
  }
  return crypto.timingSafeEqual(expected, received);
}

// ============================================================
// SLACK PAYLOADS
// ============================================================

const ActionPayloadSchema = z.object({
  type: z.string(),
  user: z.object({ id: z.string(), username: z.string().optional() }),
  actions: z
    .array(
      z.object({
        action_id: z.string(),
        value: z.string().optional(),
      })
    )
    .min(1),
  response_url: z.string().url().optional(),
});
type ActionPayload = z.infer<typeof ActionPayloadSchema>;

const CommandPayloadSchema = z.object({
  command: z.string(),
  text: z.string().default(''),
  user_id: z.string(),
});

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function moderationText(result: ModerationResult, decision: 'approve' | 'reject'): string {
  switch (result.status) {
    case 'ok':
      return decision === 'approve'
        ? `:white_check_mark: Approved: ${result.item.title}. Added to the publish queue.`
        : `:x: Rejected: ${result.item.title}`;
    case 'not_found':
      return `Item ${result.itemId} not found.`;
    case 'invalid_transition':
      return `Item is already ${result.item.status}: ${result.item.title}`;
  }
}

async function postToResponseUrl(responseUrl: string, text: string): Promise<void> {
  try {
    const res = await fetch(responseUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ replace_original: true, text }),
    });
    if (!res.ok) {
      logger.warn('Slack response_url rejected update', { status: res.status });
    }
  } catch (error) {
    logger.warn('Slack response_url update failed', { error: errorMessage(error) });
  }
}

// ============================================================
// EXPRESS APP
// ============================================================

export function createWebhookApp(deps: WebhookDeps): Express {
  const app = express();
  const now = deps.now ?? Date.now;

  const isModerator = (userId: string): boolean =>
    deps.moderators.length === 0 || deps.moderators.includes(userId);

  /**
   * Verify the Slack signature over the raw body and return the
   * decoded form fields, or answer the request and return null.
   */
  const readSignedForm = (req: Request, res: Response): URLSearchParams | null => {
    if (!deps.signingSecret) {
      logger.error('SLACK_SIGNING_SECRET not configured');
      res.status(500).json({ error: 'Signing secret not configured' });
      return null;
    }

    const rawBody = Buffer.isBuffer(req.body) ? req.body.toString('utf8') : '';
    if (!rawBody) {
      res.status(400).json({ error: 'Invalid request body' });
      return null;
    }

    const valid = verifySlackSignature(
      rawBody,
      headerValue(req, 'x-slack-request-timestamp'),
      headerValue(req, 'x-slack-signature'),
      deps.signingSecret,
      now()
    );
    if (!valid) {
      logger.warn('Invalid Slack signature');
      res.status(401).json({ error: 'Invalid signature' });
      return null;
    }

    return new URLSearchParams(rawBody);
  };

  const rawForm = express.raw({ type: 'application/x-www-form-urlencoded', limit: '1mb' });

  // ============================================================
  // HEALTH / STATUS
  // ============================================================

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'feedgate-webhook',
      version: '1.0.0',
    });
  });

  app.get('/status', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const [pending, approved] = await Promise.all([
        deps.store.countByStatus('pending'),
        deps.store.countByStatus('approved'),
      ]);
      res.json({ pending, approved, queuedCommands: deps.commands.size });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // INTERACTIVE ACTIONS
  // ============================================================

  app.post('/slack/actions', rawForm, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const form = readSignedForm(req, res);
      if (!form) return;

      let payload: ActionPayload;
      try {
        payload = ActionPayloadSchema.parse(JSON.parse(form.get('payload') ?? ''));
      } catch (error) {
        logger.warn('Malformed Slack payload', { error: errorMessage(error) });
        res.status(400).json({ error: 'Invalid payload' });
        return;
      }

      const userId = payload.user.id;
      if (!isModerator(userId)) {
        logger.warn('Action from non-moderator', { userId });
        res.status(403).json({ error: 'Not authorized' });
        return;
      }

      const [action] = payload.actions;

      switch (action.action_id) {
        case SLACK_ACTIONS.approve:
        case SLACK_ACTIONS.reject: {
          if (!action.value) {
            res.status(400).json({ error: 'Missing item id' });
            return;
          }
          const decision = action.action_id === SLACK_ACTIONS.approve ? 'approve' : 'reject';
          const result = await applyModeration(deps.store, action.value, decision, userId);
          const text = moderationText(result, decision);

          if (payload.response_url) {
            await postToResponseUrl(payload.response_url, text);
          }

          // Slack treats any non-2xx reply as a failed interaction.
          res.status(200).json({ result: result.status, text });
          return;
        }

        case SLACK_ACTIONS.fetchNow:
        case SLACK_ACTIONS.resendPending: {
          const type = action.action_id === SLACK_ACTIONS.fetchNow ? 'fetch_now' : 'resend_pending';
          deps.commands.enqueue({ type, requestedBy: userId });
          res.status(202).json({ queued: type });
          return;
        }

        default:
          res.status(400).json({ error: `Unknown action: ${action.action_id}` });
      }
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // SLASH COMMAND
  // ============================================================

  app.post('/slack/commands', rawForm, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const form = readSignedForm(req, res);
      if (!form) return;

      const parsed = CommandPayloadSchema.safeParse(Object.fromEntries(form));
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid command' });
        return;
      }

      const { text, user_id: userId } = parsed.data;
      if (!isModerator(userId)) {
        res.json({ response_type: 'ephemeral', text: 'Not authorized.' });
        return;
      }

      const subcommand = text.trim().toLowerCase();
      if (subcommand === 'fetch') {
        deps.commands.enqueue({ type: 'fetch_now', requestedBy: userId });
        res.json({ response_type: 'ephemeral', text: 'Fetch queued for the next scheduler tick.' });
      } else if (subcommand === 'resend') {
        deps.commands.enqueue({ type: 'resend_pending', requestedBy: userId });
        res.json({ response_type: 'ephemeral', text: 'Pending items will be resent shortly.' });
      } else if (subcommand === 'status' || subcommand === '') {
        const [pending, approved] = await Promise.all([
          deps.store.countByStatus('pending'),
          deps.store.countByStatus('approved'),
        ]);
        res.json({
          response_type: 'ephemeral',
          text: `Awaiting review: ${pending}\nApproved, waiting to publish: ${approved}`,
        });
      } else {
        res.json({ response_type: 'ephemeral', text: 'Usage: status | fetch | resend' });
      }
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // ERROR HANDLER
  // ============================================================

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error in webhook server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

// ============================================================
// SERVER START
// ============================================================

export function startServer(app: Express, port: number): Server {
  return app.listen(port, () => {
    logger.info(`Webhook server listening on port ${port}`);
  });
}
