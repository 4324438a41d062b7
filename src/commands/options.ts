import {
  ConfigOverrides,
  ReadmeForgeConfig,
  applyEnvironment,
  loadConfig,
  logger,
  mergeConfig,
} from '../core/index.js';

/** Options shared by every command that reads a repository */
export interface CommonCommandOptions {
  config?: string;
  ignore?: string[];
  analysisFile?: string;
  verbose?: boolean;
}

export interface CommandContext {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export async function resolveConfig(
  options: CommonCommandOptions,
  overrides: ConfigOverrides,
  context: CommandContext,
): Promise<ReadmeForgeConfig> {
  if (options.verbose) logger.setVerbose(true);

  const env = context.env ?? process.env;
  const fromFile = await loadConfig(options.config, context.cwd ?? process.cwd());
  const config = mergeConfig(applyEnvironment(fromFile, env), {
    ...overrides,
    analysisFile: options.analysisFile,
    ignore: options.ignore ? [...fromFile.ignore, ...options.ignore] : undefined,
  });
  logger.debug(`Using model ${config.model} at ${config.baseUrl}`);
  return config;
}
