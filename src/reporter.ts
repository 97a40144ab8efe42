/**
 * User-facing output of the calculator.
 */

import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';

export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  /** A formatted matrix */
  result(text: string): void;
  error(message: string): void;
}

interface Output {
  write(chunk: string): unknown;
}

export interface ConsoleReporterOptions {
  color?: boolean;
  stdout?: Output;
  stderr?: Output;
}

/**
 * Reporter writing to stdout / stderr. Colour follows chalk's terminal
 * detection unless `color` is false.
 */
export class ConsoleReporter implements Reporter {
  private readonly chalk: ChalkInstance;
  private readonly stdout: Output;
  private readonly stderr: Output;

  constructor(options: ConsoleReporterOptions = {}) {
    this.chalk = options.color === false ? new Chalk({ level: 0 }) : new Chalk();
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  info(message: string): void {
    this.stdout.write(`${message}\n`);
  }

  success(message: string): void {
    this.stdout.write(`${this.chalk.green(message)}\n`);
  }

  result(text: string): void {
    this.stdout.write(`${this.chalk.cyan(text)}\n`);
  }

  error(message: string): void {
    this.stderr.write(`${this.chalk.red(`Error: ${message}`)}\n`);
  }
}

/**
 * Reporter that records every line, for tests.
 */
export class MemoryReporter implements Reporter {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  info(message: string): void {
    this.lines.push(message);
  }

  success(message: string): void {
    this.lines.push(message);
  }

  result(text: string): void {
    this.lines.push(text);
  }

  error(message: string): void {
    this.errors.push(`Error: ${message}`);
  }
}
