/**
 * readme-forge package entrypoint (library-safe exports only)
 */

export * from './core/index.js';
export * from './analysis/index.js';
export * from './llm/index.js';
export * from './prompt/index.js';
export * from './generator/index.js';
export { runGenerateCommand } from './commands/generate.js';
export type { GenerateCommandOptions, GenerateContext, GenerateSummary } from './commands/generate.js';
export { runAnalyzeCommand } from './commands/analyze.js';
export type { AnalyzeCommandOptions, AnalyzeSummary } from './commands/analyze.js';
