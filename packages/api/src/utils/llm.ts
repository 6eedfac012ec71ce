import Groq from 'groq-sdk';
import OpenAI from 'openai';
import type { AppConfig } from '../config';
import { ConfigurationError } from '../errors';
import { logger } from './logger';

/**
 * LLMClient Interface
 *
 * Vendor-agnostic abstraction for LLM operations.
 * Allows swapping implementations without touching pipeline logic.
 *
 * No retries here: transport-level retry belongs to the SDK clients
 * (both retry 429/5xx with backoff via `maxRetries`).
 */

export interface LLMOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMClient {
  readonly model: string;
  generate(prompt: string, options?: LLMOptions): Promise<string>;
}

type ChatMessage = { role: 'system' | 'user'; content: string };

function buildMessages(prompt: string, options: LLMOptions): ChatMessage[] {
  return options.system
    ? [
        { role: 'system', content: options.system },
        { role: 'user', content: prompt },
      ]
    : [{ role: 'user', content: prompt }];
}

/**
 * GroqClient Implementation
 *
 * Uses Groq inference API (fast, free-tier available).
 */
export class GroqClient implements LLMClient {
  private client: Groq;
  readonly model: string;

  constructor(settings: AppConfig['llm']['groq']) {
    if (!settings.apiKey || settings.apiKey.trim() === '') {
      throw new ConfigurationError(
        'GROQ_API_KEY is not configured. ' +
          'Set GROQ_API_KEY in .env file or as environment variable.'
      );
    }

    this.client = new Groq({ apiKey: settings.apiKey, maxRetries: 2 });
    this.model = settings.model;

    logger.info({ model: this.model }, 'GroqClient initialized');
  }

  async generate(prompt: string, options: LLMOptions = {}): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: buildMessages(prompt, options),
        temperature: options.temperature ?? 0.3,
        max_tokens: options.maxTokens ?? 800,
      });

      const result = response.choices[0]?.message?.content?.trim() || '';
      logger.info({ latency: Date.now() - startTime, model: this.model }, 'LLM generation completed');

      return result;
    } catch (error) {
      logger.error({ error, model: this.model }, 'LLM generation failed');
      throw error;
    }
  }
}

/**
 * OpenAIClient Implementation
 *
 * Same contract as GroqClient, selected with LLM_PROVIDER=openai.
 */
export class OpenAIClient implements LLMClient {
  private client: OpenAI;
  readonly model: string;

  constructor(settings: AppConfig['llm']['openai']) {
    if (!settings.apiKey || settings.apiKey.trim() === '') {
      throw new ConfigurationError(
        'OPENAI_API_KEY is not configured. ' +
          'Set OPENAI_API_KEY in .env file or as environment variable.'
      );
    }

    this.client = new OpenAI({ apiKey: settings.apiKey, maxRetries: 2 });
    this.model = settings.model;

    logger.info({ model: this.model }, 'OpenAIClient initialized');
  }

  async generate(prompt: string, options: LLMOptions = {}): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: buildMessages(prompt, options),
        temperature: options.temperature ?? 0.3,
        max_tokens: options.maxTokens ?? 800,
      });

      const result = response.choices[0]?.message?.content?.trim() || '';
      logger.info({ latency: Date.now() - startTime, model: this.model }, 'LLM generation completed');

      return result;
    } catch (error) {
      logger.error({ error, model: this.model }, 'LLM generation failed');
      throw error;
    }
  }
}

export function createLLMClient(llm: AppConfig['llm']): LLMClient {
  return llm.provider === 'openai' ? new OpenAIClient(llm.openai) : new GroqClient(llm.groq);
}
