/**
 * Configuration loading and management
 *
 * Precedence, lowest first: defaults, config file, environment, CLI flags.
 */

import * as path from 'path';
import { z } from 'zod';
import { fileExists, readJSON } from './fileio.js';
import { ConfigError } from './errors.js';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export const CONFIG_FILE_NAMES = ['.readmeforgerc.json', 'readme-forge.config.json'];

export interface ReadmeForgeConfig {
  model: string;
  analysisModel: string;
  maxTokens: number;
  analysisMaxTokens: number;
  temperature: number;
  analysisTemperature: number;
  baseUrl: string;
  output: string;
  analysisFile: string;
  maxPromptChars: number;
  ignore: string[];
  timeoutMs: number;
}

export const DEFAULT_CONFIG: ReadmeForgeConfig = {
  model: 'llama-3.1-8b-instant',
  analysisModel: 'meta-llama/llama-guard-4-12b',
  maxTokens: 4000,
  analysisMaxTokens: 1000,
  temperature: 0.7,
  analysisTemperature: 0.3,
  baseUrl: GROQ_BASE_URL,
  output: 'README.md',
  analysisFile: 'repository_analysis.json',
  maxPromptChars: 24000,
  ignore: [],
  timeoutMs: 60000,
};

const temperature = z.number().min(0).max(2);
const positiveInt = z.number().int().positive();

export const configFileSchema = z
  .object({
    model: z.string().min(1),
    analysisModel: z.string().min(1),
    maxTokens: positiveInt,
    analysisMaxTokens: positiveInt,
    temperature,
    analysisTemperature: temperature,
    baseUrl: z.string().url(),
    output: z.string().min(1),
    analysisFile: z.string().min(1),
    maxPromptChars: positiveInt,
    ignore: z.array(z.string()),
    timeoutMs: positiveInt,
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export type ConfigOverrides = Partial<ReadmeForgeConfig>;

export async function loadConfig(
  configPath?: string,
  cwd: string = process.cwd(),
): Promise<ReadmeForgeConfig> {
  if (configPath) {
    const explicit = path.resolve(cwd, configPath);
    if (!(await fileExists(explicit))) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return { ...DEFAULT_CONFIG, ...(await readConfigFile(explicit, configPath)) };
  }

  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(cwd, name);
    if (await fileExists(candidate)) {
      return { ...DEFAULT_CONFIG, ...(await readConfigFile(candidate, name)) };
    }
  }

  return { ...DEFAULT_CONFIG };
}

async function readConfigFile(fullPath: string, label: string): Promise<ConfigFile> {
  let raw: unknown;
  try {
    raw = await readJSON<unknown>(fullPath);
  } catch {
    throw new ConfigError(`Invalid config file: ${label}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    throw new ConfigError(`Invalid config file: ${label}${where}`);
  }
  return parsed.data;
}

export function applyEnvironment(
  config: ReadmeForgeConfig,
  env: NodeJS.ProcessEnv = process.env,
): ReadmeForgeConfig {
  const baseUrl = env.GROQ_BASE_URL?.trim();
  return baseUrl ? { ...config, baseUrl } : config;
}

/**
 * Merge CLI overrides on top of a loaded config. Undefined values are ignored
 * so unset flags never clobber file settings.
 */
export function mergeConfig(
  config: ReadmeForgeConfig,
  overrides: ConfigOverrides,
): ReadmeForgeConfig {
  return {
    model: overrides.model ?? config.model,
    analysisModel: overrides.analysisModel ?? config.analysisModel,
    maxTokens: overrides.maxTokens ?? config.maxTokens,
    analysisMaxTokens: overrides.analysisMaxTokens ?? config.analysisMaxTokens,
    temperature: overrides.temperature ?? config.temperature,
    analysisTemperature: overrides.analysisTemperature ?? config.analysisTemperature,
    baseUrl: overrides.baseUrl ?? config.baseUrl,
    output: overrides.output ?? config.output,
    analysisFile: overrides.analysisFile ?? config.analysisFile,
    maxPromptChars: overrides.maxPromptChars ?? config.maxPromptChars,
    ignore: overrides.ignore ?? config.ignore,
    timeoutMs: overrides.timeoutMs ?? config.timeoutMs,
  };
}

export function resolveApiKey(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const key = flag?.trim() || env.GROQ_API_KEY?.trim();
  if (!key) {
    throw new ConfigError(
      'Groq API key required. Use --api-key or set GROQ_API_KEY environment variable',
    );
  }
  return key;
}
