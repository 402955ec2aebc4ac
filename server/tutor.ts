import OpenAI from 'openai';
import { GoogleGenerativeAI } from '@google/generative-ai';
import pRetry, { AbortError } from 'p-retry';
import type { TutorReply } from '../src/types';
import { enhanceExplanation, normalizeContent } from '../src/utils/formatters';
import type { ServerConfig } from './config';

export const TUTOR_PROMPT = `You are a math tutor specializing in geometry. For shape-related questions:

**Key Requirements:**
1. Provide BOTH explanation AND visualization
2. Use EXACT JSON format:
{
  "shape": "shape_type",
  "parameters": {"param1": value, ...},
  "explanation": "Steps..."
}

**Critical Rules:**
- Parameters must be NUMERICAL VALUES (plain numbers; π is allowed, e.g. "2*π")
- Supported shapes: circle, circle_angle, rectangle, right_triangle, equilateral_triangle, isosceles_triangle, general_triangle, similar_triangles, trigonometric
- For rectangles/squares:
  - Use width/height pair OR area with one dimension
  - For squares, use "side" parameter
- For circles use radius, diameter, circumference or area
- For right triangles use side1, side2, hypotenuse, and optionally "angles": [30, 60, 90]
- For general triangles use side_a, side_b, side_c
- For isosceles triangles use base and equal_sides (or height/area)
- For similar triangles use ratio, corresponding_side1, corresponding_side2
- For trigonometric graphs use {"function": "sin" | "cos" | "tan"}
- Example square: {"shape":"rectangle", "parameters":{"side":5}}
- Example rectangle: {"shape":"rectangle", "parameters":{"area":20, "height":4}}
- Always include units in explanation but NOT in parameters

For questions that are not about a shape, answer in plain text.`;

export const TUTOR_FALLBACK_REPLY = "Let's try to work through this problem together. First...";

/** Sends the user's message to a model and resolves with its raw text reply. */
export type CompletionProvider = (userMessage: string) => Promise<string>;

export interface TutorProviders {
  primary?: CompletionProvider;
  fallback?: CompletionProvider;
}

export function isRateLimitError(error: unknown): boolean {
  const errorMsg = error instanceof Error ? error.message : String(error);
  return (
    errorMsg.includes('429') ||
    errorMsg.includes('RATELIMIT_EXCEEDED') ||
    errorMsg.toLowerCase().includes('quota') ||
    errorMsg.toLowerCase().includes('rate limit')
  );
}

/** Retries rate-limited calls with exponential backoff; any other failure aborts at once. */
export function withRateLimitRetry<T>(operation: () => Promise<T>): Promise<T> {
  return pRetry(
    async () => {
      try {
        return await operation();
      } catch (error) {
        if (isRateLimitError(error)) {
          throw error;
        }
        throw new AbortError(error instanceof Error ? error : String(error));
      }
    },
    {
      retries: 7,
      minTimeout: 2000,
      maxTimeout: 128000,
      factor: 2,
    },
  );
}

export function createTutorProviders(config: ServerConfig): TutorProviders {
  const providers: TutorProviders = {};

  if (config.openaiApiKey) {
    const openai = new OpenAI({
      apiKey: config.openaiApiKey,
      baseURL: config.openaiBaseURL,
    });

    providers.primary = async (userMessage) => {
      const response = await openai.chat.completions.create(
        {
          model: config.openaiModel,
          messages: [
            { role: 'system', content: TUTOR_PROMPT },
            { role: 'user', content: userMessage },
          ],
          max_tokens: 650,
          temperature: 0.4,
        },
        { timeout: config.openaiTimeoutMs },
      );
      return response.choices[0]?.message?.content?.trim() ?? '';
    };
  }

  if (config.geminiApiKey) {
    const geminiAI = new GoogleGenerativeAI(config.geminiApiKey);

    providers.fallback = async (userMessage) => {
      const model = geminiAI.getGenerativeModel({
        model: config.geminiModel,
        systemInstruction: TUTOR_PROMPT,
      });
      const result = await model.generateContent(userMessage);
      return result.response.text().trim();
    };
  }

  return providers;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

const JSON_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/**
 * Reads a model reply. A JSON object with a string `shape` (bare or inside a
 * ```json fence) becomes a shape reply; anything else is plain text.
 */
export function parseTutorReply(raw: string): TutorReply {
  const trimmed = raw.trim();
  const fenced = JSON_FENCE.exec(trimmed);
  const candidate = parseJsonObject(fenced ? fenced[1] : trimmed);

  if (candidate && typeof candidate.shape === 'string') {
    const explanation = typeof candidate.explanation === 'string' ? candidate.explanation : '';
    return {
      shape: candidate.shape,
      parameters: isRecord(candidate.parameters) ? candidate.parameters : {},
      explanation: enhanceExplanation(normalizeContent(explanation)),
    };
  }

  return { response: enhanceExplanation(normalizeContent(trimmed)) };
}

export async function getTutorResponse(userMessage: string, providers: TutorProviders): Promise<TutorReply> {
  if (providers.primary) {
    const primary = providers.primary;
    try {
      return parseTutorReply(await withRateLimitRetry(() => primary(userMessage)));
    } catch (error) {
      console.error('❌ OpenAI tutor request failed:', error instanceof Error ? error.message : error);
    }
  }

  if (providers.fallback) {
    const fallback = providers.fallback;
    try {
      const reply = parseTutorReply(await withRateLimitRetry(() => fallback(userMessage)));
      console.log('✅ Gemini fallback answered the tutor request');
      return reply;
    } catch (error) {
      console.error('❌ Gemini tutor fallback failed:', error instanceof Error ? error.message : error);
    }
  }

  return { response: TUTOR_FALLBACK_REPLY };
}
