/**
 * analyze: scan only, no API key needed
 */

import { logger } from '../core/index.js';
import { RepositoryAnalysis, analyzeRepository } from '../analysis/index.js';
import { saveAnalysisReport, toAnalysisReport } from '../generator/index.js';
import { CommandContext, CommonCommandOptions, resolveConfig } from './options.js';

export interface AnalyzeCommandOptions extends CommonCommandOptions {
  json?: boolean;
  saveAnalysis?: boolean;
}

export interface AnalyzeSummary {
  analysisPath: string | null;
  analysis: RepositoryAnalysis;
}

async function scanAndSave(
  repoPath: string,
  options: AnalyzeCommandOptions,
  context: CommandContext,
): Promise<AnalyzeSummary> {
  const config = await resolveConfig(options, {}, context);
  const analysis = await analyzeRepository(repoPath, { ignore: config.ignore });

  let analysisPath: string | null = null;
  if (options.saveAnalysis !== false) {
    analysisPath = await saveAnalysisReport(analysis.repoPath, config.analysisFile, analysis);
  }
  return { analysisPath, analysis };
}

export async function runAnalyzeCommand(
  repoPath: string,
  options: AnalyzeCommandOptions,
  context: CommandContext = {},
): Promise<AnalyzeSummary> {
  if (options.json) {
    logger.setDiagnosticsToStderr(true);
    try {
      const summary = await scanAndSave(repoPath, options, context);
      logger.log(JSON.stringify(toAnalysisReport(summary.analysis), null, 2));
      return summary;
    } finally {
      logger.setDiagnosticsToStderr(false);
    }
  }

  const { analysisPath, analysis } = await scanAndSave(repoPath, options, context);

  logger.info(`Found ${analysis.totalFiles} files with ${analysis.totalLines} total lines`);
  logger.info(`Languages detected: ${analysis.languages.join(', ') || 'none'}`);
  logger.info(`Configuration files: ${analysis.configFiles.join(', ') || 'none'}`);
  const dependencyCount = Object.keys(analysis.dependencies).length;
  if (dependencyCount > 0) {
    logger.info(`Dependencies: ${dependencyCount}`);
  }
  if (analysisPath) {
    logger.success(`Repository analysis saved: ${analysisPath}`);
  }

  return { analysisPath, analysis };
}
