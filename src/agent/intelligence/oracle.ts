/**
 * Oracle - the external text-generation service that supplies strategy and
 * candidate-command text.
 *
 * Contract: `query(prompt, systemPrompt)` always resolves with some text.
 * On failure the text describes the error instead of the promise rejecting,
 * so a phase can carry on with a degraded plan.
 */

import Anthropic from '@anthropic-ai/sdk';
import { RateLimiter } from '../../utils/rateLimiter.js';
import { getErrorMessage } from '../core/errors.js';
import { DEFAULT_MODEL } from '../../config/index.js';

export interface Oracle {
  query(prompt: string, systemPrompt: string): Promise<string>;
}

export const ORACLE_UNAVAILABLE = 'AI not available - configure ANTHROPIC_API_KEY';

/** Prefix of every error-describing oracle response */
export const ORACLE_ERROR_PREFIX = 'AI Error:';

export function isOracleError(text: string): boolean {
  return text.startsWith(ORACLE_ERROR_PREFIX) || text === ORACLE_UNAVAILABLE;
}

export interface AnthropicOracleOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  maxQueriesPerMinute?: number;
  /** Injected client (tests, recorded sessions) */
  client?: Anthropic;
}

/**
 * Oracle backed by the Anthropic Messages API.
 */
export class AnthropicOracle implements Oracle {
  private client: Anthropic | null;
  private model: string;
  private maxTokens: number;
  private limiter: RateLimiter;

  constructor(options: AnthropicOracleOptions = {}) {
    this.client =
      options.client ?? (options.apiKey ? new Anthropic({ apiKey: options.apiKey }) : null);
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? 2000;
    this.limiter = new RateLimiter(options.maxQueriesPerMinute ?? 20, 60000);
  }

  get available(): boolean {
    return this.client !== null;
  }

  async query(prompt: string, systemPrompt: string): Promise<string> {
    if (!this.client) {
      return ORACLE_UNAVAILABLE;
    }

    try {
      await this.limiter.acquire(this.model);
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        system: systemPrompt,
        messages: [{ role: 'user', content: prompt }],
      });

      return response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
    } catch (error) {
      return `${ORACLE_ERROR_PREFIX} ${getErrorMessage(error)}`;
    }
  }
}
