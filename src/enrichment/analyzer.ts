/**
 * Feedgate — Content Analyzer
 *
 * Uses the Claude API to decide whether a candidate fits the channel
 * and to rewrite it into a short post. Retries are the caller's concern:
 * the client is built with `maxRetries: 0` and calls go through `withRetry`.
 *
 * IMPORTANT: only the candidate's own title, text and media URL are sent.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { MediaKind, SourceType } from '../types';
import { AnalyzerResponseError } from '../lib/errors';
import { logger } from '../lib/logger';

// ============================================================
// CONFIGURATION
// ============================================================

const MAX_TOKENS = 1024;
const BODY_EXCERPT = 3000;

export interface AnalyzerConfig {
  model: string;
  maxTokens?: number;
  temperature?: number;
  /** Language the rewritten post is written in */
  language?: string;
  /** Appended to every rewritten post when non-empty */
  signature?: string;
}

// ============================================================
// TYPES
// ============================================================

export interface ClassifyInput {
  title: string;
  body: string;
  mediaUrl?: string;
  sourceType: SourceType;
}

export interface RewriteInput {
  title: string;
  body: string;
  sourceUrl: string;
  sourceName: string;
  mediaKind: MediaKind;
}

export interface Classification {
  relevant: boolean;
  reason: string;
}

export interface CallUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface AnalyzerResult<T> {
  value: T;
  usage: CallUsage;
}

export interface ContentAnalyzer {
  classify(input: ClassifyInput): Promise<AnalyzerResult<Classification>>;
  rewrite(input: RewriteInput): Promise<AnalyzerResult<string>>;
}

/**
 * The part of the SDK client the analyzer talks to.
 */
export interface MessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<Anthropic.Message>;
  };
}

// ============================================================
// PROMPTS
// ============================================================

const CLASSIFY_SYSTEM = `You screen submissions for a visual channel that shares remarkable things: striking nature and wildlife, space and science, engineering and unusual machines, architecture, art and design, curious places and little-known history.

Accept a submission only when it is visually strong and would make a reader stop scrolling.

Reject anything that is:
- political, religious or otherwise divisive
- about violence, disasters, tragedy or other distressing events
- advertising or product promotion
- sexual, hateful or about drugs
- a plain news headline with little to look at

Reply with JSON only, in the form {"relevant": true, "reason": "one short sentence"}.`;

function buildClassifyPrompt(input: ClassifyInput): string {
  return [
    `Title: ${input.title}`,
    `Source type: ${input.sourceType}`,
    `Media: ${input.mediaUrl ?? 'none'}`,
    '',
    'Text:',
    input.body.slice(0, BODY_EXCERPT) || '(no text)',
  ].join('\n');
}

function buildRewriteSystem(language: string): string {
  return `You write short posts for a visual channel in ${language}.

Write like a curious friend pointing at something amazing, not like a reporter:
- first line: a short, intriguing headline wrapped in single asterisks, e.g. *Headline*
- then two to four short sentences, each on its own paragraph
- the first sentence refers to the attached media
- explain why it is interesting in plain words; no jargon
- stay under 70 words

Reply with the post text only.`;
}

function buildRewritePrompt(input: RewriteInput): string {
  return [
    `Attached media: ${input.mediaKind === 'video' ? 'a video' : 'an image'}`,
    `Original title: ${input.title}`,
    '',
    'Original text:',
    input.body.slice(0, BODY_EXCERPT) || '(no text)',
  ].join('\n');
}

// ============================================================
// RESPONSE PARSING
// ============================================================

const ClassificationSchema = z.object({
  relevant: z.boolean(),
  reason: z.string().default(''),
});

/**
 * Parse the classifier's JSON, tolerating a fenced code block
 * or prose around the object.
 */
export function parseClassification(text: string): Classification {
  const candidates = [text.trim()];
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced?.[1]) candidates.push(fenced[1]);
  const braces = text.match(/\{[\s\S]*\}/);
  if (braces) candidates.push(braces[0]);

  for (const candidate of candidates) {
    let json: unknown;
    try {
      json = JSON.parse(candidate);
    } catch {
      continue;
    }
    const parsed = ClassificationSchema.safeParse(json);
    if (parsed.success) {
      return { relevant: parsed.data.relevant, reason: parsed.data.reason.trim() || 'no reason given' };
    }
  }

  throw new AnalyzerResponseError(`Could not parse classification: ${text.slice(0, 200)}`);
}

/**
 * Post text as published: model output, the source link, the signature.
 */
export function formatPost(text: string, input: RewriteInput, signature: string): string {
  const parts = [text.trim(), `<${input.sourceUrl}|Source: ${input.sourceName}>`];
  if (signature && !text.includes(signature)) parts.push(signature);
  return parts.join('\n\n');
}

// ============================================================
// ANTHROPIC ANALYZER
// ============================================================

export class AnthropicAnalyzer implements ContentAnalyzer {
  private readonly config: Required<AnalyzerConfig>;
  private readonly log = logger.child({ component: 'analyzer' });

  constructor(
    private readonly client: MessagesClient,
    config: AnalyzerConfig
  ) {
    this.config = {
      maxTokens: MAX_TOKENS,
      temperature: 0.3,
      language: 'English',
      signature: '',
      ...config,
    };
  }

  static fromApiKey(apiKey: string, config: AnalyzerConfig): AnthropicAnalyzer {
    return new AnthropicAnalyzer(new Anthropic({ apiKey, maxRetries: 0 }), config);
  }

  async classify(input: ClassifyInput): Promise<AnalyzerResult<Classification>> {
    const { text, usage } = await this.complete(CLASSIFY_SYSTEM, buildClassifyPrompt(input), 0);
    const value = parseClassification(text);

    this.log.debug('Classified', {
      title: input.title.slice(0, 50),
      relevant: value.relevant,
      reason: value.reason,
    });

    return { value, usage };
  }

  async rewrite(input: RewriteInput): Promise<AnalyzerResult<string>> {
    const { text, usage } = await this.complete(
      buildRewriteSystem(this.config.language),
      buildRewritePrompt(input),
      this.config.temperature
    );

    if (!text.trim()) {
      throw new AnalyzerResponseError('Empty rewrite');
    }

    return { value: formatPost(text, input, this.config.signature), usage };
  }

  private async complete(
    system: string,
    prompt: string,
    temperature: number
  ): Promise<{ text: string; usage: CallUsage }> {
    const response = await this.client.messages.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      temperature,
      system,
      messages: [{ role: 'user', content: prompt }],
    });

    const textContent = response.content.find(c => c.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new AnalyzerResponseError('No text content in response');
    }

    return {
      text: textContent.text,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}
