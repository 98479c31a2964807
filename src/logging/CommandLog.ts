import chalk from 'chalk';

/**
 * Levelled log handed to commands and services.
 */
export interface CommandLog {
  Info: (...args: unknown[]) => void;
  Warn: (...args: unknown[]) => void;
  Error: (...args: unknown[]) => void;
  Success: (...args: unknown[]) => void;
  Debug: (...args: unknown[]) => void;
}

export interface ConsoleLogOptions {
  /** Emit Debug lines */
  verbose?: boolean;

  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

/**
 * Coloured console log: Info, Success and Debug go to stdout, Warn and
 * Error to stderr.
 */
export class ConsoleLog implements CommandLog {
  protected verbose: boolean;
  protected stdout: NodeJS.WritableStream;
  protected stderr: NodeJS.WritableStream;

  public constructor(options: ConsoleLogOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  public Info = (...args: unknown[]): void => {
    this.write(this.stdout, format(args));
  };

  public Success = (...args: unknown[]): void => {
    this.write(this.stdout, chalk.green(format(args)));
  };

  public Warn = (...args: unknown[]): void => {
    this.write(this.stderr, chalk.yellow(format(args)));
  };

  public Error = (...args: unknown[]): void => {
    this.write(this.stderr, chalk.red(format(args)));
  };

  public Debug = (...args: unknown[]): void => {
    if (!this.verbose) return;
    this.write(this.stdout, chalk.gray(format(args)));
  };

  protected write(stream: NodeJS.WritableStream, line: string): void {
    stream.write(`${line}\n`);
  }
}

function format(args: unknown[]): string {
  return args
    .map((arg) => (arg instanceof Error ? arg.message : typeof arg === 'string' ? arg : String(arg)))
    .join(' ');
}
