/**
 * Heuristics for manifests, config files and entry points
 */

import * as path from 'path';

const MANIFEST_FILES = [
  'package.json',
  'requirements.txt',
  'pom.xml',
  'build.gradle',
  'cargo.toml',
  'go.mod',
  'composer.json',
  'pyproject.toml',
  'setup.py',
  'dockerfile',
  'docker-compose.yml',
  'makefile',
];

const CONFIG_FILES = [
  'package.json',
  'yarn.lock',
  'package-lock.json',
  'requirements.txt',
  'pyproject.toml',
  'setup.py',
  'pipfile',
  'pom.xml',
  'build.gradle',
  'build.gradle.kts',
  'cargo.toml',
  'cargo.lock',
  'go.mod',
  'go.sum',
  'composer.json',
  'composer.lock',
  'dockerfile',
  'docker-compose.yml',
  'makefile',
  '.gitignore',
  'readme.md',
];

const ENTRY_POINT_HINTS = ['main', 'index', 'app', 'server', '__init__'];
const IMPORT_KEYWORDS = ['import', 'require', 'include', 'using', 'from'];

/**
 * Whether a file is worth showing to the model when detecting frameworks.
 */
export function isKeyFileForAnalysis(filePath: string, content: string): boolean {
  const fileName = path.basename(filePath).toLowerCase();

  if (MANIFEST_FILES.includes(fileName)) return true;
  if (ENTRY_POINT_HINTS.some((hint) => fileName.includes(hint))) return true;

  if (content.length > 100) {
    const head = content.toLowerCase().slice(0, 500);
    return IMPORT_KEYWORDS.some((keyword) => head.includes(keyword));
  }

  return false;
}

export function isConfigFile(filePath: string): boolean {
  return CONFIG_FILES.includes(path.basename(filePath).toLowerCase());
}

export function isPackageManifest(filePath: string): boolean {
  return path.basename(filePath).toLowerCase() === 'package.json';
}

function stringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!value || typeof value !== 'object' || Array.isArray(value)) return out;
  for (const [name, version] of Object.entries(value)) {
    if (typeof version === 'string') out[name] = version;
  }
  return out;
}

/**
 * Merge dependencies and devDependencies from package.json text.
 * Malformed manifests contribute nothing.
 */
export function extractDependencies(content: string): Record<string, string> {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return {};
  }
  if (!data || typeof data !== 'object') return {};

  return {
    ...stringRecord('dependencies' in data ? data.dependencies : undefined),
    ...stringRecord('devDependencies' in data ? data.devDependencies : undefined),
  };
}
