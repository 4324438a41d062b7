import type { CompletionRequest, CompletionResult, LlmClient } from '../../src/llm/client.js';

/**
 * Replays scripted replies in order. An Error entry is thrown instead.
 */
export class FakeLlmClient implements LlmClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('No scripted reply left');
    if (next instanceof Error) throw next;
    return {
      content: next,
      model: request.model,
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    };
  }
}
