export type ErrorComponent = 'runner' | 'resolver' | 'dns' | 'gateway' | 'ping' | 'config' | 'cli';

export class AppError extends Error {
  readonly component: ErrorComponent;
  readonly operation: string;
  readonly context: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(
    message: string,
    opts: {
      component: ErrorComponent;
      operation: string;
      context?: Record<string, unknown>;
      cause?: Error;
    },
  ) {
    super(message, { cause: opts.cause });
    this.name = 'AppError';
    this.component = opts.component;
    this.operation = opts.operation;
    this.context = opts.context ?? {};
    this.cause = opts.cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      component: this.component,
      operation: this.operation,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
      stack: this.stack,
    };
  }
}

export class ConfigError extends AppError {
  constructor(
    message: string,
    opts: { operation?: string; context?: Record<string, unknown>; cause?: Error },
  ) {
    super(message, { component: 'config', ...opts, operation: opts.operation ?? 'load' });
    this.name = 'ConfigError';
  }
}

export class TimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(
    message: string,
    opts: {
      component: ErrorComponent;
      operation: string;
      timeoutMs: number;
      context?: Record<string, unknown>;
      cause?: Error;
    },
  ) {
    super(message, opts);
    this.name = 'TimeoutError';
    this.timeoutMs = opts.timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      timeoutMs: this.timeoutMs,
    };
  }
}

/** Raised when the caller's AbortSignal fires before an operation settles. */
export class AbortedError extends AppError {
  constructor(
    message: string,
    opts: { component: ErrorComponent; operation: string; context?: Record<string, unknown> },
  ) {
    super(message, opts);
    this.name = 'AbortedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
