/**
 * Framework, technology and project-type detection
 */

import { z } from 'zod';
import { errorMessage, logger } from '../core/index.js';
import { DetectedStack, RepositoryAnalysis, UNKNOWN_STACK } from '../analysis/types.js';
import type { LlmClient } from './client.js';

export const MAX_DETECTION_FILES = 10;

export const DETECTION_SYSTEM_PROMPT =
  'You are an expert software engineer who can identify frameworks, technologies, and project types from code. Always respond with valid JSON only.';

const detectionSchema = z.object({
  frameworks: z.array(z.string()).default([]),
  technologies: z.array(z.string()).default([]),
  project_type: z.string().default('Unknown'),
});

export interface DetectOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

export function buildDetectionPrompt(analysis: RepositoryAnalysis): string {
  let context = `
Analyze this codebase to detect frameworks, technologies, and project type.

Repository: ${analysis.repoName}
File extensions found: ${analysis.languages.join(', ')}
Total files: ${analysis.totalFiles}

Key file contents:
`;

  for (const file of analysis.keyFiles.slice(0, MAX_DETECTION_FILES)) {
    context += `\n--- ${file.path} ---\n${file.content}\n`;
  }

  return `
Based on the codebase analysis below, identify:

1. **Frameworks**: All frameworks being used (e.g., React, Django, Express.js, Spring Boot, etc.)
2. **Technologies**: Technologies, libraries, and tools (e.g., Docker, Redis, PostgreSQL, etc.)
3. **Project Type**: What type of project this is (e.g., Web Application, API, CLI Tool, Library, etc.)

Be comprehensive and look for evidence in:
- Package/dependency files (package.json, requirements.txt, etc.)
- Import statements and includes
- Configuration files
- Code patterns and structure

Return your analysis as a JSON object with this exact structure:
{
    "frameworks": ["Framework1", "Framework2", ...],
    "technologies": ["Technology1", "Technology2", ...],
    "project_type": "Project Type Description"
}

Codebase Analysis:
${context}

Respond with ONLY the JSON object, no additional text:
`;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse a detection reply. Accepts bare JSON or JSON wrapped in prose/fences.
 * Returns null when no usable object is found.
 */
export function parseDetectionResponse(text: string): DetectedStack | null {
  const trimmed = text.trim();
  let raw = tryParse(trimmed);
  if (raw === undefined) {
    const match = trimmed.match(/\{[\s\S]*\}/);
    if (!match) return null;
    raw = tryParse(match[0]);
  }

  const parsed = detectionSchema.safeParse(raw);
  if (!parsed.success) return null;
  return {
    frameworks: parsed.data.frameworks,
    technologies: parsed.data.technologies,
    projectType: parsed.data.project_type,
  };
}

/**
 * Ask the model what the repository is built with. Never throws: any failure
 * is logged and reported as an unknown stack.
 */
export async function detectFrameworks(
  analysis: RepositoryAnalysis,
  client: LlmClient,
  options: DetectOptions,
): Promise<DetectedStack> {
  let reply: string;
  try {
    const result = await client.complete({
      model: options.model,
      systemPrompt: DETECTION_SYSTEM_PROMPT,
      userPrompt: buildDetectionPrompt(analysis),
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    });
    reply = result.content;
  } catch (error) {
    logger.warn(`AI framework detection failed: ${errorMessage(error)}`);
    return { ...UNKNOWN_STACK };
  }

  const detected = parseDetectionResponse(reply);
  if (!detected) {
    logger.warn('Could not parse AI response for framework detection');
    return { ...UNKNOWN_STACK };
  }
  return detected;
}

export function applyDetectedStack(
  analysis: RepositoryAnalysis,
  detected: DetectedStack,
): RepositoryAnalysis {
  return {
    ...analysis,
    frameworks: [...new Set([...analysis.frameworks, ...detected.frameworks])],
    technologies: detected.technologies,
    projectType: detected.projectType,
  };
}
