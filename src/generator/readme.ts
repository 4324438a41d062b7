/**
 * README generation
 */

import * as path from 'path';
import { LlmError, errorMessage, logger, writeFileSafe } from '../core/index.js';
import { RepositoryAnalysis } from '../analysis/types.js';
import type { LlmClient } from '../llm/client.js';
import { README_SYSTEM_PROMPT, buildReadmeContext, buildReadmePrompt } from '../prompt/readme.js';

export interface GenerateReadmeOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  maxPromptChars: number;
}

export async function generateReadme(
  analysis: RepositoryAnalysis,
  client: LlmClient,
  options: GenerateReadmeOptions,
): Promise<string> {
  const context = buildReadmeContext(analysis, options.maxPromptChars);
  if (context.droppedSnippets.length > 0) {
    logger.debug(
      `Prompt budget reached; omitted snippets: ${context.droppedSnippets.join(', ')}`,
    );
  }

  let content: string;
  try {
    const result = await client.complete({
      model: options.model,
      systemPrompt: README_SYSTEM_PROMPT,
      userPrompt: buildReadmePrompt(context.text),
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    });
    logger.debug(
      `Model ${result.model} used ${result.usage.totalTokens} tokens (${result.usage.promptTokens} prompt)`,
    );
    content = result.content;
  } catch (error) {
    const kind = error instanceof LlmError ? error.kind : 'unknown';
    const status = error instanceof LlmError ? error.status : undefined;
    throw new LlmError(
      `Error generating README with Groq API: ${errorMessage(error)}`,
      kind,
      status,
    );
  }

  if (!content.trim()) {
    throw new LlmError('Groq API returned an empty README');
  }
  return content;
}

export async function writeReadme(
  repoPath: string,
  outputName: string,
  content: string,
): Promise<string> {
  const outputPath = path.resolve(repoPath, outputName);
  await writeFileSafe(outputPath, content);
  return outputPath;
}
