/**
 * Logger utilities using chalk for colored output
 */

import chalk from 'chalk';

export class Logger {
  private diagnosticsToStderr = false;

  constructor(private verbose: boolean = false) {}

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  /** Keep stdout for `log` output only, e.g. while printing a JSON report */
  setDiagnosticsToStderr(enabled: boolean): void {
    this.diagnosticsToStderr = enabled;
  }

  private emit(line: string): void {
    if (this.diagnosticsToStderr) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  error(message: string, error?: Error): void {
    console.error(chalk.red(`✗ ${message}`));
    if (this.verbose && error) {
      console.error(chalk.gray(error.stack || error.message));
    }
  }

  success(message: string): void {
    this.emit(chalk.green(`✓ ${message}`));
  }

  info(message: string): void {
    this.emit(chalk.blue(`ℹ ${message}`));
  }

  warn(message: string): void {
    this.emit(chalk.yellow(`⚠ ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      this.emit(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  log(message: string): void {
    console.log(message);
  }
}

// Shared instance; the CLI flips it to verbose with --verbose
export const logger = new Logger();

export function createLogger(verbose: boolean = false): Logger {
  return new Logger(verbose);
}
