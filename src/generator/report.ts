import * as path from 'path';
import { writeJSON } from '../core/index.js';
import { RepositoryAnalysis } from '../analysis/types.js';

export interface FileSummary {
  size: number;
  lines: number;
  extension: string;
}

export interface AnalysisReport {
  repoName: string;
  repoPath: string;
  totalFiles: number;
  totalLines: number;
  languages: string[];
  frameworks: string[];
  technologies: string[];
  projectType: string;
  configFiles: string[];
  dependencies: Record<string, string>;
  files: Record<string, FileSummary>;
}

/**
 * Strip file contents and detection excerpts from an analysis.
 */
export function toAnalysisReport(analysis: RepositoryAnalysis): AnalysisReport {
  const files: Record<string, FileSummary> = {};
  for (const [filePath, record] of Object.entries(analysis.files)) {
    files[filePath] = { size: record.size, lines: record.lines, extension: record.extension };
  }

  return {
    repoName: analysis.repoName,
    repoPath: analysis.repoPath,
    totalFiles: analysis.totalFiles,
    totalLines: analysis.totalLines,
    languages: analysis.languages,
    frameworks: analysis.frameworks,
    technologies: analysis.technologies,
    projectType: analysis.projectType,
    configFiles: analysis.configFiles,
    dependencies: analysis.dependencies,
    files,
  };
}

export async function saveAnalysisReport(
  repoPath: string,
  fileName: string,
  analysis: RepositoryAnalysis,
): Promise<string> {
  const reportPath = path.resolve(repoPath, fileName);
  await writeJSON(reportPath, toAnalysisReport(analysis));
  return reportPath;
}
