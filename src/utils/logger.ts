import chalk from 'chalk';
import { appendFileSync } from 'fs';
import { errorMessage } from './errors.js';

export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

export interface LoggerOptions {
  debug?: boolean;
  /** Write to stdout/stderr. Off while the interactive shell owns the screen. */
  console?: boolean;
  /** Append plain-text lines to this file. */
  file?: string | null;
}

export class Logger {
  private debugMode: boolean;
  private consoleEnabled: boolean;
  private file: string | null;

  constructor(options: LoggerOptions = {}) {
    this.debugMode = options.debug ?? false;
    this.consoleEnabled = options.console ?? true;
    this.file = options.file ?? null;
  }

  info(message: string): void {
    if (this.consoleEnabled) console.log(chalk.blue('ℹ'), message);
    this.append('info', message);
  }

  success(message: string): void {
    if (this.consoleEnabled) console.log(chalk.green('✓'), message);
    this.append('success', message);
  }

  warn(message: string): void {
    if (this.consoleEnabled) console.log(chalk.yellow('⚠'), message);
    this.append('warn', message);
  }

  error(message: string): void {
    if (this.consoleEnabled) console.error(chalk.red('✗'), message);
    this.append('error', message);
  }

  debug(message: string): void {
    if (!this.debugMode) return;
    if (this.consoleEnabled) console.log(chalk.gray('[DEBUG]'), message);
    this.append('debug', message);
  }

  private append(level: LogLevel, message: string): void {
    if (!this.file) return;
    try {
      appendFileSync(this.file, `${new Date().toISOString()} ${level.toUpperCase()} ${message}\n`);
    } catch (error) {
      // Stop trying after the first failure; stderr only when it is not the shell's screen
      const path = this.file;
      this.file = null;
      if (this.consoleEnabled) {
        console.error(`Warning: unable to write ${path}: ${errorMessage(error)}`);
      }
    }
  }
}
