/**
 * Console logger for repo-profiler
 *
 * Semantic log levels with emoji prefixes. Quiet mode keeps only errors,
 * debug output needs verbose mode, and timestamps switch to plain
 * line-per-event output suitable for CI logs.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import logUpdate from 'log-update';

export interface LoggerOptions {
  quiet: boolean;
  verbose: boolean;
  noColor: boolean;
  timestamps: boolean;
}

export interface SpinnerController {
  update(message: string): void;
  succeed(message?: string): void;
  fail(message?: string): void;
  stop(): void;
}

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const SPINNER_INTERVAL_MS = 80;

const noopSpinner: SpinnerController = {
  update: () => {},
  succeed: () => {},
  fail: () => {},
  stop: () => {},
};

export class Logger {
  private options: LoggerOptions;
  private color: ChalkInstance;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = {
      quiet: options.quiet ?? false,
      verbose: options.verbose ?? false,
      noColor: options.noColor ?? false,
      timestamps: options.timestamps ?? false,
    };
    this.color = this.createColor();
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
    this.color = this.createColor();
  }

  getOptions(): LoggerOptions {
    return { ...this.options };
  }

  isVerbose(): boolean {
    return this.options.verbose;
  }

  private createColor(): ChalkInstance {
    return this.options.noColor ? new Chalk({ level: 0 }) : chalk;
  }

  private format(prefix: string, message: string): string {
    const line = `${prefix} ${message}`;
    return this.options.timestamps ? `[${new Date().toISOString()}] ${line}` : line;
  }

  private out(line: string): void {
    if (this.options.quiet) return;
    console.log(line);
  }

  discovery(message: string): void {
    this.out(this.format(this.color.cyan('🔍'), message));
  }

  analysis(message: string): void {
    this.out(this.format(this.color.blue('🔬'), message));
  }

  inference(message: string): void {
    this.out(this.format(this.color.magenta('🧠'), message));
  }

  success(message: string): void {
    this.out(this.format(this.color.green('✓'), message));
  }

  warning(message: string): void {
    this.out(this.format(this.color.yellow('⚠'), message));
  }

  error(message: string): void {
    console.error(this.format(this.color.red('✗'), message));
  }

  debug(message: string): void {
    if (!this.options.verbose) return;
    this.out(this.format(this.color.gray('→'), message));
  }

  section(title: string): void {
    this.out(this.color.bold(`=== ${title} ===`));
  }

  info(key: string, value: string | number | boolean): void {
    this.out(`  ${this.color.dim(`${key}:`)} ${value}`);
  }

  listItem(text: string, indent = 0): void {
    this.out(`${'  '.repeat(indent)}• ${text}`);
  }

  blank(): void {
    this.out('');
  }

  /**
   * Animated spinner for long-running steps. Falls back to a no-op
   * when output is quiet, timestamped, or not a terminal.
   */
  spinner(message: string): SpinnerController {
    if (this.options.quiet || this.options.timestamps || !process.stdout.isTTY) {
      return noopSpinner;
    }

    let text = message;
    let frame = 0;
    const render = (): void => {
      logUpdate(`${this.color.cyan(SPINNER_FRAMES[frame % SPINNER_FRAMES.length])} ${text}`);
      frame++;
    };
    render();
    const timer = setInterval(render, SPINNER_INTERVAL_MS);

    const finish = (line?: string): void => {
      clearInterval(timer);
      logUpdate.clear();
      logUpdate.done();
      if (line) console.log(line);
    };

    return {
      update: (next: string) => {
        text = next;
      },
      succeed: (done?: string) => finish(this.format(this.color.green('✓'), done ?? text)),
      fail: (failed?: string) => finish(this.format(this.color.red('✗'), failed ?? text)),
      stop: () => finish(),
    };
  }
}

export const logger = new Logger();

export function configureLogger(options: Partial<LoggerOptions>): void {
  logger.configure(options);
}

export default logger;
