/**
 * File-type filtering: which files are read and which directories are walked
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const fileTypesSchema = z.object({
  supportedExtensions: z.array(z.string()),
  textExtensions: z.array(z.string()),
  namedTextFiles: z.array(z.string()),
  skipDirectories: z.array(z.string()),
});

export type FileTypeTables = z.infer<typeof fileTypesSchema>;

const FILE_TYPES_PATH = path.join(__dirname, '..', '..', 'data', 'file-types.json');

let cached: {
  supported: Set<string>;
  text: Set<string>;
  named: Set<string>;
  skip: Set<string>;
} | null = null;

function tables() {
  if (!cached) {
    const raw: unknown = JSON.parse(fs.readFileSync(FILE_TYPES_PATH, 'utf-8'));
    const data = fileTypesSchema.parse(raw);
    const lower = (values: string[]) => new Set(values.map((v) => v.toLowerCase()));
    cached = {
      supported: lower(data.supportedExtensions),
      text: lower(data.textExtensions),
      named: lower(data.namedTextFiles),
      skip: lower(data.skipDirectories),
    };
  }
  return cached;
}

export function isSupportedExtension(extension: string): boolean {
  return tables().supported.has(extension.toLowerCase());
}

export function isTextFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  const { supported, text, named } = tables();

  if (ext && supported.has(ext)) return true;
  if (ext && text.has(ext)) return true;

  // Common files without extensions
  return named.has(path.basename(filePath).toLowerCase());
}

export function shouldSkipDirectory(dirName: string, extra: Iterable<string> = []): boolean {
  if (dirName.startsWith('.')) return true;
  const lower = dirName.toLowerCase();
  if (tables().skip.has(lower)) return true;
  for (const name of extra) {
    if (name.toLowerCase() === lower) return true;
  }
  return false;
}
