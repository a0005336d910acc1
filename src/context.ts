import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

interface RunContext {
  runId: string;
  command?: string;
}

const storage = new AsyncLocalStorage<RunContext>();

export function runWithContext<T>(
  fn: () => T | Promise<T>,
  command?: string,
): T | Promise<T> {
  const ctx: RunContext = {
    runId: randomUUID(),
    command,
  };
  return storage.run(ctx, fn);
}

export function getRunId(): string | undefined {
  return storage.getStore()?.runId;
}

export function getCommand(): string | undefined {
  return storage.getStore()?.command;
}
