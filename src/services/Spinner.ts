export interface SpinnerLogger {
  Info: (...args: unknown[]) => void;
  Warn?: (...args: unknown[]) => void;
  Error: (...args: unknown[]) => void;
}

export type SpinnerStatus = 'running' | 'succeeded' | 'warned' | 'failed' | 'skipped';

const SYMBOLS = {
  start: '⏳',
  success: '✅',
  warn: '⚠️',
  fail: '❌',
  skip: '⚪',
} as const;

/**
 * Progress handle that prints start/finish markers for one step.
 *
 * Lines are logged rather than animated so piped output and CI logs keep
 * every step. A handle finishes once; later finish calls are ignored, so a
 * task can settle its own spinner before the pipeline would.
 */
export class SpinnerHandle {
  protected currentTitle: string;
  protected status: SpinnerStatus = 'running';

  public constructor(protected logger: SpinnerLogger, title: string) {
    this.currentTitle = title;
    this.logger.Info(`${SYMBOLS.start} ${title}`);
  }

  /**
   * Update the title of a running step.
   */
  public Update(title: string): void {
    if (this.status !== 'running') return;

    this.currentTitle = title;
    this.logger.Info(`${SYMBOLS.start} ${title}`);
  }

  public Succeed(message?: string): void {
    this.finish('succeeded', () => this.logger.Info(`${SYMBOLS.success} ${message ?? this.currentTitle}`));
  }

  /**
   * Finished, with something the user should look at (e.g. lookups that failed).
   */
  public Warn(message?: string): void {
    const line = `${SYMBOLS.warn} ${message ?? this.currentTitle}`;
    this.finish('warned', () => (this.logger.Warn ?? this.logger.Info)(line));
  }

  public Fail(message?: string): void {
    this.finish('failed', () => this.logger.Error(`${SYMBOLS.fail} ${message ?? this.currentTitle}`));
  }

  public Skip(message?: string): void {
    this.finish('skipped', () => this.logger.Info(`${SYMBOLS.skip} ${message ?? this.currentTitle}`));
  }

  public get Title(): string {
    return this.currentTitle;
  }

  public get Status(): SpinnerStatus {
    return this.status;
  }

  protected finish(status: SpinnerStatus, print: () => void): void {
    if (this.status !== 'running') return;

    this.status = status;
    print();
  }
}

export class Spinner {
  /**
   * Start a new spinner with the provided title.
   */
  public static Start(title: string, logger: SpinnerLogger): SpinnerHandle {
    return new SpinnerHandle(logger, title);
  }
}
