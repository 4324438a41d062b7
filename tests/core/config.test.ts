import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  DEFAULT_CONFIG,
  GROQ_BASE_URL,
  applyEnvironment,
  loadConfig,
  mergeConfig,
  resolveApiKey,
} from '../../src/core/config.js';

describe('Config', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'readme-forge-config-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should return default config if no file found', async () => {
    const config = await loadConfig(undefined, tempDir);
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.model).toBe('llama-3.1-8b-instant');
    expect(config.baseUrl).toBe(GROQ_BASE_URL);
  });

  it('should load the rc file from the working directory', async () => {
    await fs.promises.writeFile(
      path.join(tempDir, '.readmeforgerc.json'),
      JSON.stringify({ model: 'custom-model', ignore: ['fixtures'] }),
    );

    const config = await loadConfig(undefined, tempDir);

    expect(config.model).toBe('custom-model');
    expect(config.ignore).toEqual(['fixtures']);
    expect(config.maxTokens).toBe(4000);
  });

  it('should fall back to readme-forge.config.json', async () => {
    await fs.promises.writeFile(
      path.join(tempDir, 'readme-forge.config.json'),
      JSON.stringify({ output: 'DOCS.md' }),
    );
    const config = await loadConfig(undefined, tempDir);
    expect(config.output).toBe('DOCS.md');
  });

  it('should load config from an explicit path', async () => {
    await fs.promises.writeFile(path.join(tempDir, 'custom.json'), JSON.stringify({ maxPromptChars: 500 }));
    const config = await loadConfig('custom.json', tempDir);
    expect(config.maxPromptChars).toBe(500);
  });

  it('should reject an explicit path that does not exist', async () => {
    await expect(loadConfig('nope.json', tempDir)).rejects.toThrow('Config file not found: nope.json');
  });

  it('should throw ConfigError if file exists but is not JSON', async () => {
    await fs.promises.writeFile(path.join(tempDir, 'bad.json'), '{ not json');
    await expect(loadConfig('bad.json', tempDir)).rejects.toThrow('Invalid config file: bad.json');
  });

  it('should name the offending field when validation fails', async () => {
    await fs.promises.writeFile(path.join(tempDir, 'bad.json'), JSON.stringify({ temperature: 5 }));
    await expect(loadConfig('bad.json', tempDir)).rejects.toThrow(
      'Invalid config file: bad.json (temperature)',
    );
  });

  it('should reject unknown keys', async () => {
    await fs.promises.writeFile(path.join(tempDir, 'bad.json'), JSON.stringify({ apiKey: 'test-secret' }));
    await expect(loadConfig('bad.json', tempDir)).rejects.toThrow('Invalid config file: bad.json');
  });

  it('should take the base URL from the environment', () => {
    const config = applyEnvironment(DEFAULT_CONFIG, { GROQ_BASE_URL: 'http://localhost:9999/v1' });
    expect(config.baseUrl).toBe('http://localhost:9999/v1');
    expect(applyEnvironment(DEFAULT_CONFIG, {}).baseUrl).toBe(GROQ_BASE_URL);
  });

  it('should ignore undefined overrides when merging', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { model: undefined, maxTokens: 100 });
    expect(merged.model).toBe(DEFAULT_CONFIG.model);
    expect(merged.maxTokens).toBe(100);
  });

  it('should prefer the flag over the environment for the API key', () => {
    expect(resolveApiKey('flag-key', { GROQ_API_KEY: 'env-key' })).toBe('flag-key');
    expect(resolveApiKey(undefined, { GROQ_API_KEY: ' env-key ' })).toBe('env-key');
  });

  it('should fail when no API key is available', () => {
    expect(() => resolveApiKey(undefined, {})).toThrow(
      'Groq API key required. Use --api-key or set GROQ_API_KEY environment variable',
    );
    expect(() => resolveApiKey('   ', { GROQ_API_KEY: '' })).toThrow('Groq API key required');
  });
});
