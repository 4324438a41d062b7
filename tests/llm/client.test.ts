import { describe, it, expect } from '@jest/globals';
import OpenAI from 'openai';
import { GroqClient, mapError } from '../../src/llm/client.js';
import { LlmError } from '../../src/core/errors.js';

describe('Groq client', () => {
  it('should construct without touching the network', () => {
    const client = new GroqClient({ apiKey: 'test-key', baseUrl: 'http://localhost:1/v1/' });
    expect(typeof client.complete).toBe('function');
  });

  it('should map authentication failures', () => {
    const mapped = mapError(OpenAI.APIError.generate(401, undefined, 'invalid key', {}));
    expect(mapped).toBeInstanceOf(LlmError);
    expect(mapped.kind).toBe('auth');
    expect(mapped.status).toBe(401);
  });

  it('should map rate limits and bad requests', () => {
    expect(mapError(OpenAI.APIError.generate(429, undefined, 'slow down', {})).kind).toBe('rate_limit');
    expect(mapError(OpenAI.APIError.generate(400, undefined, 'bad model', {})).kind).toBe('bad_request');
  });

  it('should map timeouts', () => {
    expect(mapError(new OpenAI.APIConnectionTimeoutError()).kind).toBe('timeout');
    expect(mapError(new Error('Request timed out')).kind).toBe('timeout');
  });

  it('should map anything else to unknown and keep the message', () => {
    const mapped = mapError(new Error('socket hang up'));
    expect(mapped.kind).toBe('unknown');
    expect(mapped.message).toBe('socket hang up');
    expect(mapped.status).toBeUndefined();
  });

  it('should pass LlmError through unchanged', () => {
    const original = new LlmError('already mapped', 'auth', 403);
    expect(mapError(original)).toBe(original);
  });
});
