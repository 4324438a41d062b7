/**
 * Error types and CLI failure handling
 */

import { logger } from './logger.js';

export class ReadmeForgeError extends Error {
  constructor(
    message: string,
    public code?: string,
  ) {
    super(message);
    this.name = 'ReadmeForgeError';
  }
}

export class ConfigError extends ReadmeForgeError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class AnalysisError extends ReadmeForgeError {
  constructor(message: string) {
    super(message, 'ANALYSIS_ERROR');
    this.name = 'AnalysisError';
  }
}

export type LlmErrorKind = 'auth' | 'rate_limit' | 'timeout' | 'bad_request' | 'unknown';

export class LlmError extends ReadmeForgeError {
  constructor(
    message: string,
    public readonly kind: LlmErrorKind = 'unknown',
    public readonly status?: number,
  ) {
    super(message, 'LLM_ERROR');
    this.name = 'LlmError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function failCommand(message: string, error?: unknown, exitCode: number = 1): void {
  logger.error(message, error instanceof Error ? error : undefined);
  if (error) {
    logger.error(errorMessage(error));
  }
  process.exitCode = exitCode;
}

function extractJsonMode(args: unknown[]): boolean {
  for (let i = args.length - 1; i >= 0; i -= 1) {
    const candidate = args[i];
    if (!candidate || typeof candidate !== 'object') continue;
    const maybe = candidate as { json?: unknown };
    if (typeof maybe.json === 'boolean') {
      return maybe.json === true;
    }
  }
  return false;
}

function emitCliJsonError(command: string, error: unknown): void {
  const code = error instanceof ReadmeForgeError ? error.code : undefined;
  console.log(
    JSON.stringify(
      {
        success: false,
        error: errorMessage(error),
        code: code ?? null,
        command,
        timestamp: new Date().toISOString(),
      },
      null,
      2,
    ),
  );
}

export function withCliErrorHandling<TArgs extends unknown[]>(
  command: string,
  handler: (...args: TArgs) => Promise<void> | void,
): (...args: TArgs) => Promise<void> {
  return async (...args: TArgs): Promise<void> => {
    try {
      await handler(...args);
    } catch (error) {
      if (extractJsonMode(args)) {
        emitCliJsonError(command, error);
        process.exitCode = 1;
        return;
      }
      failCommand(`Command "${command}" failed`, error);
    }
  };
}
