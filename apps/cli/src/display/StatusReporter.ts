/**
 * Leveled status messages on stderr; command results on stdout
 */

import { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface OutputSink {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processSink: OutputSink = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export interface ReporterOptions {
  verbose?: boolean;
  color?: boolean;
  sink?: OutputSink;
}

export class StatusReporter {
  private verbose: boolean;
  private readonly sink: OutputSink;
  chalk: ChalkInstance;

  constructor(options: ReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? processSink;
    this.chalk = createChalk(options.color ?? true);
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  setColor(color: boolean): void {
    this.chalk = createChalk(color);
  }

  log(level: LogLevel, message: string): void {
    switch (level) {
      case 'debug':
        if (this.verbose) this.sink.stderr(`${this.chalk.gray(message)}\n`);
        break;
      case 'info':
        this.sink.stderr(`${message}\n`);
        break;
      case 'warn':
        this.sink.stderr(`${this.chalk.yellow(`warning: ${message}`)}\n`);
        break;
      case 'error':
        this.sink.stderr(`${this.chalk.red(`error: ${message}`)}\n`);
        break;
    }
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  /** A result line on stdout */
  result(line: string): void {
    this.sink.stdout(`${line}\n`);
  }

  /** Text on stdout as it is, such as a rewritten diff */
  print(text: string): void {
    this.sink.stdout(text);
  }
}

function createChalk(color: boolean): ChalkInstance {
  return color ? new Chalk() : new Chalk({ level: 0 });
}
