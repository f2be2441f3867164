/**
 * Vision analysis of a captured frame through an OpenAI-compatible chat API.
 *
 * The model is asked for a JSON object describing what the person is doing.
 * Replies that are not valid JSON still produce a result (line-based
 * "Activity:/Details:" parsing, then the raw text), since the tokens were
 * already paid for. A category outside the closed set falls back to the
 * keyword categorizer.
 *
 * Pricing (per 1M tokens):
 *   gpt-4o-mini  input $0.150  output $0.600
 *   gpt-4o       input $2.50   output $10.00
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { ACTIVITY_CATEGORIES, type ActivityCategory } from '../db/schema.js';
import { categorizeActivity } from './categorizer.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnalysisContext {
  cameraId: string;
  room: string;
}

export interface AnalysisResult {
  activity: string;
  details: string | null;
  category: ActivityCategory;
  categoryConfidence: number | null;
  inputTokens: number;
  outputTokens: number;
  tokensUsed: number;
  cost: number;
}

export interface Analyzer {
  analyze(image: Buffer, context: AnalysisContext): Promise<AnalysisResult>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/** Raw model reply plus usage, as returned by one chat completion. */
export interface VisionCompletion extends TokenUsage {
  content: string | null;
}

export type VisionCompletionFn = (request: {
  model: string;
  prompt: string;
  imageDataUrl: string;
  maxTokens: number;
}) => Promise<VisionCompletion>;

// ---------------------------------------------------------------------------
// Cost
// ---------------------------------------------------------------------------

interface ModelPricing {
  inputPerMillion: number;
  outputPerMillion: number;
}

const MODEL_PRICING: Record<string, ModelPricing> = {
  'gpt-4o-mini': {
    inputPerMillion: 0.15,
    outputPerMillion: 0.6,
  },
  'gpt-4o': {
    inputPerMillion: 2.5,
    outputPerMillion: 10.0,
  },
};

const DEFAULT_PRICING = MODEL_PRICING['gpt-4o-mini'];

/**
 * Calculate the dollar cost of a single vision request.
 * Unknown models are priced as gpt-4o-mini.
 */
export function calculateCost(model: string, usage: TokenUsage): number {
  const pricing = MODEL_PRICING[model] ?? DEFAULT_PRICING;
  const inputCost = (usage.inputTokens / 1_000_000) * pricing.inputPerMillion;
  const outputCost = (usage.outputTokens / 1_000_000) * pricing.outputPerMillion;
  return inputCost + outputCost;
}

// ---------------------------------------------------------------------------
// Reply parsing
// ---------------------------------------------------------------------------

const replySchema = z.object({
  activity: z.string().min(1),
  details: z.string().nullish(),
  category: z.string().nullish(),
  confidence: z.number().min(0).max(1).nullish(),
});

export interface ParsedReply {
  activity: string;
  details: string | null;
  category: ActivityCategory;
  categoryConfidence: number | null;
}

function isCategory(value: string): value is ActivityCategory {
  return ACTIVITY_CATEGORIES.some((c) => c === value);
}

function tryJson(text: string): unknown {
  // Models sometimes wrap JSON in a ```json fence
  const unfenced = text.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  try {
    return JSON.parse(unfenced);
  } catch {
    return null;
  }
}

function lineValue(text: string, key: string): string | null {
  const line = text.split('\n').find((l) => l.trim().toLowerCase().startsWith(`${key.toLowerCase()}:`));
  if (!line) return null;
  const value = line.slice(line.indexOf(':') + 1).trim();
  return value || null;
}

export function parseAnalysisReply(content: string | null): ParsedReply {
  const text = (content ?? '').trim();

  let activity: string;
  let details: string | null;
  let modelCategory: string | null = null;
  let modelConfidence: number | null = null;

  const parsed = replySchema.safeParse(tryJson(text));
  if (parsed.success) {
    activity = parsed.data.activity.trim();
    details = parsed.data.details?.trim() || null;
    modelCategory = parsed.data.category ?? null;
    modelConfidence = parsed.data.confidence ?? null;
  } else {
    activity = lineValue(text, 'Activity') ?? (text || 'Unknown activity');
    details = lineValue(text, 'Details');
  }

  if (modelCategory && isCategory(modelCategory)) {
    return { activity, details, category: modelCategory, categoryConfidence: modelConfidence };
  }

  const fallback = categorizeActivity(activity, details);
  return { activity, details, category: fallback.category, categoryConfidence: fallback.confidence };
}

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

export function buildPrompt(context: AnalysisContext): string {
  return `You are a life-tracking assistant looking at a snapshot from the "${context.cameraId}" camera in the ${context.room}.
Describe what the person is doing. If nobody is visible, say "Person not visible" and describe the room state.

Reply with a JSON object only:
{"activity": "<short, specific, action-oriented>", "details": "<posture, position in the room, objects in use>", "category": "<one of ${ACTIVITY_CATEGORIES.join(', ')}>", "confidence": <0-1>}`;
}

// ---------------------------------------------------------------------------
// OpenAI analyzer
// ---------------------------------------------------------------------------

export interface OpenAIVisionAnalyzerOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  /** Replaces the OpenAI call (tests, alternative transports). */
  complete?: VisionCompletionFn;
}

function openaiCompletion(apiKey: string, baseURL: string, timeoutMs: number): VisionCompletionFn {
  const client = new OpenAI({ apiKey: apiKey || 'not-needed', baseURL, timeout: timeoutMs, maxRetries: 0 });

  return async ({ model, prompt, imageDataUrl, maxTokens }) => {
    const response = await client.chat.completions.create({
      model,
      max_tokens: maxTokens,
      response_format: { type: 'json_object' },
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            { type: 'image_url', image_url: { url: imageDataUrl } },
          ],
        },
      ],
    });

    return {
      content: response.choices[0]?.message.content ?? null,
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
    };
  };
}

export class OpenAIVisionAnalyzer implements Analyzer {
  private readonly complete: VisionCompletionFn;

  constructor(private readonly options: OpenAIVisionAnalyzerOptions) {
    this.complete = options.complete ?? openaiCompletion(options.apiKey, options.baseURL, options.timeoutMs);
  }

  async analyze(image: Buffer, context: AnalysisContext): Promise<AnalysisResult> {
    const completion = await this.complete({
      model: this.options.model,
      prompt: buildPrompt(context),
      imageDataUrl: `data:image/jpeg;base64,${image.toString('base64')}`,
      maxTokens: this.options.maxTokens,
    });

    const reply = parseAnalysisReply(completion.content);
    const usage = { inputTokens: completion.inputTokens, outputTokens: completion.outputTokens };

    return {
      ...reply,
      ...usage,
      tokensUsed: usage.inputTokens + usage.outputTokens,
      cost: calculateCost(this.options.model, usage),
    };
  }
}
