/**
 * Shared types for repository analysis
 */

export interface FileRecord {
  /** Length of the decoded text, in characters */
  size: number;
  lines: number;
  extension: string;
  /** Leading excerpt of the file */
  content: string;
}

export interface KeyFileExcerpt {
  path: string;
  content: string;
  extension: string;
}

export interface DetectedStack {
  frameworks: string[];
  technologies: string[];
  projectType: string;
}

export interface RepositoryAnalysis extends DetectedStack {
  repoName: string;
  repoPath: string;
  /** Keyed by POSIX path relative to repoPath, in walk order */
  files: Record<string, FileRecord>;
  languages: string[];
  dependencies: Record<string, string>;
  configFiles: string[];
  totalFiles: number;
  totalLines: number;
  /** Excerpts sent to framework detection; not persisted */
  keyFiles: KeyFileExcerpt[];
}

export const UNKNOWN_STACK: DetectedStack = {
  frameworks: [],
  technologies: [],
  projectType: 'Unknown',
};
