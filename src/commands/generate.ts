/**
 * generate: scan a repository, ask the model for a README and write it out
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { ReadmeForgeError, errorMessage, logger, resolveApiKey } from '../core/index.js';
import { RepositoryAnalysis, analyzeRepository } from '../analysis/index.js';
import {
  GroqClient,
  GroqClientOptions,
  LlmClient,
  applyDetectedStack,
  detectFrameworks,
} from '../llm/index.js';
import { generateReadme, saveAnalysisReport, writeReadme } from '../generator/index.js';
import { CommandContext, CommonCommandOptions, resolveConfig } from './options.js';

const execFileAsync = promisify(execFile);

export interface GenerateCommandOptions extends CommonCommandOptions {
  apiKey?: string;
  output?: string;
  clone?: string;
  model?: string;
  analysisModel?: string;
  maxTokens?: number;
  temperature?: number;
  maxPromptChars?: number;
  detect?: boolean;
  saveAnalysis?: boolean;
}

export interface GenerateContext extends CommandContext {
  createClient?: (options: GroqClientOptions) => LlmClient;
  cloneRepository?: (url: string, destination: string) => Promise<void>;
}

export interface GenerateSummary {
  readmePath: string;
  analysisPath: string | null;
  analysis: RepositoryAnalysis;
}

export async function cloneRepository(url: string, destination: string): Promise<void> {
  try {
    await execFileAsync('git', ['clone', url, destination]);
  } catch (error) {
    throw new ReadmeForgeError(`Failed to clone repository: ${errorMessage(error)}`, 'CLONE_ERROR');
  }
}

function listOrNone(values: string[]): string {
  return values.length > 0 ? values.join(', ') : 'none';
}

export async function runGenerateCommand(
  repoPath: string,
  options: GenerateCommandOptions,
  context: GenerateContext = {},
): Promise<GenerateSummary> {
  const config = await resolveConfig(
    options,
    {
      output: options.output,
      model: options.model,
      analysisModel: options.analysisModel,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
      maxPromptChars: options.maxPromptChars,
    },
    context,
  );
  const apiKey = resolveApiKey(options.apiKey, context.env ?? process.env);

  if (options.clone) {
    logger.info(`Cloning repository from ${options.clone}...`);
    await (context.cloneRepository ?? cloneRepository)(options.clone, repoPath);
  }

  logger.info(`Analyzing repository: ${repoPath}`);
  let analysis = await analyzeRepository(repoPath, { ignore: config.ignore });
  if (analysis.totalFiles === 0) {
    logger.warn('No readable text files found; the README will be based on the name alone');
  }

  const createClient = context.createClient ?? ((opts: GroqClientOptions) => new GroqClient(opts));
  const client = createClient({ apiKey, baseUrl: config.baseUrl, timeoutMs: config.timeoutMs });

  if (options.detect !== false) {
    logger.info('Using AI to detect frameworks and technologies...');
    const detected = await detectFrameworks(analysis, client, {
      model: config.analysisModel,
      maxTokens: config.analysisMaxTokens,
      temperature: config.analysisTemperature,
    });
    analysis = applyDetectedStack(analysis, detected);
  }

  logger.info(`Found ${analysis.totalFiles} files with ${analysis.totalLines} total lines`);
  logger.info(`Languages detected: ${listOrNone(analysis.languages)}`);
  logger.info(`Frameworks detected: ${listOrNone(analysis.frameworks)}`);

  logger.info('Generating README with Groq AI...');
  const readme = await generateReadme(analysis, client, {
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    maxPromptChars: config.maxPromptChars,
  });

  const readmePath = await writeReadme(analysis.repoPath, config.output, readme);
  logger.success(`README generated successfully: ${readmePath}`);

  let analysisPath: string | null = null;
  if (options.saveAnalysis !== false) {
    analysisPath = await saveAnalysisReport(analysis.repoPath, config.analysisFile, analysis);
    logger.success(`Repository analysis saved: ${analysisPath}`);
  }

  return { readmePath, analysisPath, analysis };
}
