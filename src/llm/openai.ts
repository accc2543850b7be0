/**
 * GraphQA - OpenAI Chat Model
 *
 * Calls the chat completions API with a single user message.
 */

import { z } from 'zod';
import logger from '../utils/logger.js';
import { errorMessage, fetchWithTimeout, safeJsonParse } from '../utils/helpers.js';
import { LanguageModelError, type LLMConfig } from '../utils/types.js';
import type { LanguageModel } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_LLM_CONFIG: LLMConfig = {
  apiKey: process.env.OPENAI_API_KEY || '',
  model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  baseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
  maxTokens: 1000,
  temperature: 0,
  timeoutMs: 30000,
};

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .optional(),
});

const OpenAIErrorResponseSchema = z.object({
  error: z.object({ message: z.string().optional() }).optional(),
});

// =============================================================================
// OpenAI Chat Model
// =============================================================================

export class OpenAIChatModel implements LanguageModel {
  private readonly config: LLMConfig;

  constructor(config: Partial<LLMConfig> = {}) {
    this.config = { ...DEFAULT_LLM_CONFIG, ...config };
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  async complete(prompt: string): Promise<string> {
    if (!this.isConfigured()) {
      throw new LanguageModelError('OpenAI API key is not configured');
    }

    let reply: { response: Response; body: string };
    try {
      reply = await fetchWithTimeout(
        `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.config.apiKey}`,
          },
          body: JSON.stringify({
            model: this.config.model,
            messages: [{ role: 'user', content: prompt }],
            max_tokens: this.config.maxTokens,
            temperature: this.config.temperature,
          }),
        },
        this.config.timeoutMs,
        async (response) => ({ response, body: await response.text() })
      );
    } catch (error) {
      logger.error('OpenAI request failed', { model: this.config.model, error: errorMessage(error) });
      throw new LanguageModelError(`OpenAI request failed: ${errorMessage(error)}`);
    }

    const { response, body } = reply;
    if (!response.ok) {
      const errorData = OpenAIErrorResponseSchema.safeParse(safeJsonParse(body));
      throw new LanguageModelError(
        (errorData.success && errorData.data.error?.message) || `OpenAI API error: ${response.status}`,
        response.status
      );
    }

    const data = ChatCompletionResponseSchema.safeParse(safeJsonParse(body));
    const content = data.success ? data.data.choices?.[0]?.message?.content : undefined;
    if (!content) {
      throw new LanguageModelError('OpenAI returned an empty completion');
    }
    return content;
  }
}
