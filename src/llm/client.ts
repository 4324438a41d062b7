/**
 * Chat-completion client for Groq's OpenAI-compatible API
 */

import OpenAI from 'openai';
import { LlmError, errorMessage } from '../core/index.js';
import { GROQ_BASE_URL } from '../core/config.js';

export interface CompletionRequest {
  model: string;
  systemPrompt?: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResult {
  content: string;
  model: string;
  usage: CompletionUsage;
}

export interface LlmClient {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface GroqClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class GroqClient implements LlmClient {
  private readonly client: OpenAI;

  constructor(options: GroqClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: normalizeBaseUrl(options.baseUrl ?? GROQ_BASE_URL),
      timeout: options.timeoutMs,
      // Failures are reported, never retried
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt?.trim()) {
      messages.push({ role: 'system', content: request.systemPrompt.trim() });
    }
    messages.push({ role: 'user', content: request.userPrompt });

    try {
      const completion = await this.client.chat.completions.create({
        model: request.model,
        messages,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      });

      const usage = completion.usage;
      return {
        content: completion.choices[0]?.message?.content ?? '',
        model: completion.model || request.model,
        usage: {
          promptTokens: usage?.prompt_tokens ?? 0,
          completionTokens: usage?.completion_tokens ?? 0,
          totalTokens: usage?.total_tokens ?? 0,
        },
      };
    } catch (error) {
      throw mapError(error);
    }
  }
}

export function mapError(error: unknown): LlmError {
  if (error instanceof LlmError) return error;
  const message = errorMessage(error);

  if (error instanceof OpenAI.APIConnectionTimeoutError || /timed? ?out/i.test(message)) {
    return new LlmError(message, 'timeout');
  }

  const status = error instanceof OpenAI.APIError ? error.status : undefined;
  if (status === 401 || status === 403) return new LlmError(message, 'auth', status);
  if (status === 429) return new LlmError(message, 'rate_limit', status);
  if (status === 400 || status === 404 || status === 422) {
    return new LlmError(message, 'bad_request', status);
  }
  return new LlmError(message, 'unknown', status);
}

function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}
