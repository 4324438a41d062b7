import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { createProgram } from '../../src/cli/program.js';

describe('CLI program', () => {
  let repoDir: string;
  let consoleLogSpy: jest.SpiedFunction<typeof console.log>;
  let consoleErrorSpy: jest.SpiedFunction<typeof console.error>;
  let savedKey: string | undefined;

  beforeEach(async () => {
    process.exitCode = undefined;
    savedKey = process.env.GROQ_API_KEY;
    delete process.env.GROQ_API_KEY;
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    repoDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'readme-forge-cli-'));
    await fs.promises.writeFile(path.join(repoDir, 'index.js'), 'console.log("hi");\n');
  });

  afterEach(async () => {
    process.exitCode = undefined;
    if (savedKey !== undefined) process.env.GROQ_API_KEY = savedKey;
    jest.restoreAllMocks();
    await fs.promises.rm(repoDir, { recursive: true, force: true });
  });

  it('should register generate and analyze', () => {
    const program = createProgram();
    expect(program.name()).toBe('readme-forge');
    expect(program.commands.map((c) => c.name())).toEqual(['generate', 'analyze']);
  });

  it('should map flags onto generate options', () => {
    const generate = createProgram().commands[0];
    const flags = generate.options.map((o) => o.long);
    expect(flags).toEqual(
      expect.arrayContaining([
        '--api-key',
        '--output',
        '--clone',
        '--model',
        '--max-prompt-chars',
        '--no-detect',
        '--no-save-analysis',
      ]),
    );
  });

  it('should print the analysis as JSON', async () => {
    await createProgram().parseAsync(
      ['analyze', repoDir, '--json', '--no-save-analysis'],
      { from: 'user' },
    );

    expect(process.exitCode).toBeUndefined();
    const report = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(Object.keys(report.files)).toEqual(['index.js']);
  });

  it('should run generate by default and exit non-zero without a key', async () => {
    await createProgram().parseAsync([repoDir], { from: 'user' });

    expect(process.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining('Command "generate" failed'),
    );
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining('Groq API key required'),
    );
    expect(fs.existsSync(path.join(repoDir, 'README.md'))).toBe(false);
  });

  it('should report JSON errors for analyze on a missing path', async () => {
    const missing = path.join(repoDir, 'nope');
    await createProgram().parseAsync(['analyze', missing, '--json'], { from: 'user' });

    expect(process.exitCode).toBe(1);
    const payload = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(payload).toMatchObject({
      success: false,
      command: 'analyze',
      code: 'ANALYSIS_ERROR',
      error: `Repository path does not exist: ${missing}`,
    });
  });
});
