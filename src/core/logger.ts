export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }
}

/**
 * Prefixes every line with the stage it came from, e.g. "[fetch] 3 pages".
 */
export class ScopedLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly inner: Logger
  ) {}

  log(message: string): void {
    this.inner.log(`[${this.scope}] ${message}`);
  }

  warn(message: string): void {
    this.inner.warn(`[${this.scope}] ${message}`);
  }

  error(message: string): void {
    this.inner.error(`[${this.scope}] ${message}`);
  }
}

export function scoped(scope: string, logger: Logger): Logger {
  return new ScopedLogger(scope, logger);
}

export const defaultLogger = new ConsoleLogger();
