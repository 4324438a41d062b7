/**
 * Repository scanner
 */

import * as fs from 'fs';
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { AnalysisError, errorMessage, logger, readTextFile } from '../core/index.js';
import { isTextFile, shouldSkipDirectory } from './file-types.js';
import { getIgnoredDirectoryNames } from './ignore.js';
import {
  extractDependencies,
  isConfigFile,
  isKeyFileForAnalysis,
  isPackageManifest,
} from './key-files.js';
import { RepositoryAnalysis, UNKNOWN_STACK } from './types.js';

export const MAX_STORED_CONTENT = 2000;
export const MAX_KEY_FILE_CONTENT = 1500;

export interface ScanOptions {
  /** Extra directory names to skip */
  ignore?: string[];
}

export function countLines(content: string): number {
  if (!content) return 0;
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.length;
}

async function resolveRoot(repoPath: string): Promise<string> {
  const root = path.resolve(repoPath);
  let stats: fs.Stats;
  try {
    stats = await fsPromises.stat(root);
  } catch {
    throw new AnalysisError(`Repository path does not exist: ${root}`);
  }
  if (!stats.isDirectory()) {
    throw new AnalysisError(`Repository path is not a directory: ${root}`);
  }
  return root;
}

export async function analyzeRepository(
  repoPath: string,
  options: ScanOptions = {},
): Promise<RepositoryAnalysis> {
  const root = await resolveRoot(repoPath);
  const ignored = await getIgnoredDirectoryNames(root, options.ignore);

  const analysis: RepositoryAnalysis = {
    repoName: path.basename(root),
    repoPath: root,
    files: {},
    languages: [],
    dependencies: {},
    configFiles: [],
    totalFiles: 0,
    totalLines: 0,
    keyFiles: [],
    ...UNKNOWN_STACK,
  };
  const languages = new Set<string>();

  async function visitFile(fullPath: string): Promise<void> {
    const relPath = path.relative(root, fullPath).split(path.sep).join('/');
    const extension = path.extname(fullPath);

    let content: string | null;
    try {
      content = await readTextFile(fullPath);
    } catch (error) {
      logger.warn(`Could not read file ${relPath}: ${errorMessage(error)}`);
      return;
    }
    if (content === null) {
      logger.debug(`Skipping binary file ${relPath}`);
      return;
    }

    const lines = countLines(content);
    analysis.totalFiles += 1;
    analysis.totalLines += lines;
    analysis.files[relPath] = {
      size: content.length,
      lines,
      extension,
      content: content.slice(0, MAX_STORED_CONTENT),
    };

    if (extension) languages.add(extension.toLowerCase());

    if (isKeyFileForAnalysis(relPath, content)) {
      analysis.keyFiles.push({
        path: relPath,
        content: content.slice(0, MAX_KEY_FILE_CONTENT),
        extension,
      });
    }

    if (isConfigFile(relPath)) analysis.configFiles.push(relPath);
    if (isPackageManifest(relPath)) {
      Object.assign(analysis.dependencies, extractDependencies(content));
    }
  }

  // Symlinked files are read through their target; symlinked directories are not followed
  async function isFileEntry(dir: string, entry: fs.Dirent): Promise<boolean> {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
      return (await fsPromises.stat(path.join(dir, entry.name))).isFile();
    } catch (error) {
      logger.debug(`Skipping broken link ${path.join(dir, entry.name)}: ${errorMessage(error)}`);
      return false;
    }
  }

  async function walk(dir: string): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fsPromises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.warn(`Could not read directory ${dir}: ${errorMessage(error)}`);
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    // Files first, then subdirectories, mirroring a top-down walk
    for (const entry of entries) {
      if (isTextFile(entry.name) && (await isFileEntry(dir, entry))) {
        await visitFile(path.join(dir, entry.name));
      }
    }
    for (const entry of entries) {
      if (entry.isDirectory() && !shouldSkipDirectory(entry.name, ignored)) {
        await walk(path.join(dir, entry.name));
      }
    }
  }

  await walk(root);
  analysis.languages = [...languages];
  logger.debug(`Scanned ${analysis.totalFiles} files under ${root}`);
  return analysis;
}
