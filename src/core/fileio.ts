/**
 * File I/O utilities with error handling
 */

import * as fs from 'fs';
import * as path from 'path';
import { TextDecoder, promisify } from 'util';

const mkdir = promisify(fs.mkdir);
const writeFile = promisify(fs.writeFile);
const readFile = promisify(fs.readFile);
const access = promisify(fs.access);

const BINARY_SNIFF_BYTES = 8000;
// U+FFFD as it appears when the file itself contains one
const REPLACEMENT_CHAR_BYTES = Buffer.from([0xef, 0xbf, 0xbd]);

export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await mkdir(dirPath, { recursive: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
      throw error;
    }
  }
}

export async function writeFileSafe(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await writeFile(filePath, content, 'utf-8');
}

export async function readFileSafe(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export function isBinaryBuffer(buffer: Buffer): boolean {
  const limit = Math.min(buffer.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i += 1) {
    if (buffer[i] === 0) return true;
  }
  return false;
}

/**
 * Decode UTF-8, dropping undecodable byte sequences. Replacement characters
 * encoded in the input are kept; only those the decoder inserts are removed.
 */
export function decodeUtf8Lenient(buffer: Buffer): string {
  const decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });
  const decodeSegment = (segment: Buffer): string =>
    decoder.decode(segment).replace(/\uFFFD/g, '');

  const parts: string[] = [];
  let start = 0;
  let index = buffer.indexOf(REPLACEMENT_CHAR_BYTES, start);
  while (index !== -1) {
    parts.push(decodeSegment(buffer.subarray(start, index)));
    start = index + REPLACEMENT_CHAR_BYTES.length;
    index = buffer.indexOf(REPLACEMENT_CHAR_BYTES, start);
  }
  parts.push(decodeSegment(buffer.subarray(start)));
  return parts.join('\uFFFD');
}

/**
 * Read a file as UTF-8 text. Returns null for binary content.
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  const buffer = await readFile(filePath);
  if (isBinaryBuffer(buffer)) return null;
  return decodeUtf8Lenient(buffer);
}

export function normalizePath(filePath: string): string {
  return path.normalize(filePath).replace(/\\/g, '/');
}

export async function writeJSON<T>(filePath: string, data: T): Promise<void> {
  const content = JSON.stringify(data, null, 2);
  await writeFileSafe(filePath, content);
}

export async function readJSON<T>(filePath: string): Promise<T> {
  const content = await readFileSafe(filePath);
  return JSON.parse(content) as T;
}
