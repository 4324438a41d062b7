import type { Command } from 'commander';
import { withCliErrorHandling } from '../core/index.js';
import { runGenerateCommand, GenerateCommandOptions } from '../commands/generate.js';
import { runAnalyzeCommand, AnalyzeCommandOptions } from '../commands/analyze.js';
import { collectValues, parsePositiveInt, parseTemperature } from './parsers.js';

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Config file (defaults to .readmeforgerc.json)')
    .option('--ignore <dir>', 'Extra directory name to skip (repeatable)', collectValues)
    .option('--analysis-file <name>', 'Analysis file name, relative to the repository')
    .option('--no-save-analysis', 'Do not write the analysis file')
    .option('-v, --verbose', 'Print debug output');
}

export function registerGenerateCommand(program: Command): void {
  const command = program
    .command('generate', { isDefault: true })
    .description('Generate a README for a repository')
    .argument('<repo_path>', 'Path to the repository (clone target with --clone)')
    .option('--api-key <key>', 'Groq API key (or set GROQ_API_KEY env var)')
    .option('-o, --output <file>', 'Output file name, relative to the repository')
    .option('--clone <url>', 'Git URL to clone into repo_path first')
    .option('-m, --model <model>', 'Model used to write the README')
    .option('--analysis-model <model>', 'Model used for framework detection')
    .option('--max-tokens <n>', 'Maximum tokens in the README response', parsePositiveInt)
    .option('--temperature <t>', 'Sampling temperature for the README', parseTemperature)
    .option('--max-prompt-chars <n>', 'Character budget for the prompt context', parsePositiveInt)
    .option('--no-detect', 'Skip AI framework detection');

  withCommonOptions(command).action(
    withCliErrorHandling('generate', async (repoPath: string, options: GenerateCommandOptions) => {
      await runGenerateCommand(repoPath, options);
    }),
  );
}

export function registerAnalyzeCommand(program: Command): void {
  const command = program
    .command('analyze')
    .description('Scan a repository and write the analysis without calling the API')
    .argument('<repo_path>', 'Path to the repository')
    .option('--json', 'Print the analysis as JSON');

  withCommonOptions(command).action(
    withCliErrorHandling('analyze', async (repoPath: string, options: AnalyzeCommandOptions) => {
      await runAnalyzeCommand(repoPath, options);
    }),
  );
}

export function registerAllCommands(program: Command): void {
  registerGenerateCommand(program);
  registerAnalyzeCommand(program);
}
