import { CollaboratorTransient } from '../errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CollaboratorTransient(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  attempts: number;
  baseMs: number;
  onRetry?: (error: CollaboratorTransient, attempt: number) => void;
}

/** Retries only CollaboratorTransient; everything else propagates on first throw. */
export async function retryTransient<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;
  // exponential backoff with jitter
  while (true) {
    attempt += 1;
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof CollaboratorTransient) || attempt >= options.attempts) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      if (options.baseMs > 0) {
        await sleep(options.baseMs * 2 ** (attempt - 1) + Math.floor(Math.random() * 100));
      }
    }
  }
}

/** Serializes async sections per key; sections on different keys run freely. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

/**
 * Runs `worker` over `items` with at most `limit` in flight. `shouldStop` is
 * checked before each new unit starts; units already running are awaited.
 */
export async function runBounded<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  shouldStop: () => boolean = () => false,
): Promise<void> {
  let next = 0;
  const lanes = Math.max(1, Math.min(limit, items.length));

  const lane = async (): Promise<void> => {
    while (next < items.length && !shouldStop()) {
      const index = next;
      next += 1;
      await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: lanes }, () => lane()));
}
