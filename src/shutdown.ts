import { logger } from './logger.js';

const SHUTDOWN_TIMEOUT_MS = 10_000;
const INTERRUPTED_EXIT_CODE = 130;

/**
 * Turns SIGINT/SIGTERM into an abort of `signal`, which probes pass down to
 * every child process and DNS lookup, then waits for in-flight work.
 */
export class ShutdownManager {
  private inFlight = new Map<string, number>();
  private counter = 0;
  private shuttingDown = false;
  private installed = false;
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  trackOperation(label: string): () => void {
    if (this.shuttingDown) {
      throw new Error(`Cannot start operation "${label}" — shutting down`);
    }
    const id = `${label}-${++this.counter}`;
    this.inFlight.set(id, Date.now());
    return () => {
      this.inFlight.delete(id);
    };
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  install(): void {
    if (this.installed) return;
    this.installed = true;

    const handler = () => void this.shutdown();
    process.once('SIGINT', handler);
    process.once('SIGTERM', handler);
  }

  async shutdown(): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;

    logger.warn(`Interrupted — aborting ${this.inFlight.size} operation(s) in flight`);
    this.controller.abort();

    const deadline = Date.now() + SHUTDOWN_TIMEOUT_MS;
    while (this.inFlight.size > 0 && Date.now() < deadline) {
      await new Promise(resolve => setTimeout(resolve, 50));
    }

    if (this.inFlight.size > 0) {
      logger.warn(`Shutdown timeout — ${this.inFlight.size} operation(s) still in flight`);
    }

    process.exitCode = INTERRUPTED_EXIT_CODE;
    if (this.inFlight.size > 0) {
      process.exit(INTERRUPTED_EXIT_CODE);
    }
  }
}

export const shutdownManager = new ShutdownManager();
