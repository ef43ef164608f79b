import { v4 as uuidv4 } from 'uuid';
import { logger } from './logger';
import { SourceUnavailable } from './errors';

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

export const sleep = (ms: number): Promise<void> => {
  return new Promise(resolve => setTimeout(resolve, ms));
};

export const generateUUID = (): string => {
  return uuidv4();
};

export const retryWithBackoff = async <T>(
  fn: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 1000,
  backoffFactor: number = 2,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> => {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delay = baseDelay * Math.pow(backoffFactor, attempt);
      logger.warn(`Attempt ${attempt + 1} failed, retrying in ${delay}ms:`, {
        message: error instanceof Error ? error.message : String(error),
      });
      await sleep(delay);
    }
  }

  throw lastError;
};

/**
 * Rejects with SourceUnavailable if the call has not settled within `timeoutMs`.
 * The underlying call is not cancelled; its late result is discarded.
 */
export const withTimeout = async <T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new SourceUnavailable(`${label} timed out after ${timeoutMs}ms`, { timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Identifies a funding round: the funding time rounded to the collection cadence,
 * so small clock differences between symbols land in the same round.
 */
export const toEventKey = (fundingTime: Date, cadenceMs: number): string => {
  return bucketTime(fundingTime, cadenceMs).toISOString();
};

export const bucketTime = (time: Date, cadenceMs: number): Date => {
  return new Date(Math.round(time.getTime() / cadenceMs) * cadenceMs);
};

// 2025-08-02T16:00:00.000Z -> 2025-08-02_16-00
export const formatFileTimestamp = (time: Date): string => {
  return time.toISOString().slice(0, 16).replace('T', '_').replace(':', '-');
};

export const toSafeKey = (eventKey: string): string => {
  return eventKey.replace(/:/g, '-');
};

// Inverse of toSafeKey for ISO timestamps: 2025-08-02T16-00-00.000Z
export const fromSafeKey = (safeKey: string): Date | null => {
  const match = /^(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2}(?:\.\d+)?)Z$/.exec(safeKey);
  if (!match) return null;

  const parsed = new Date(`${match[1]}T${match[2]}:${match[3]}:${match[4]}Z`);
  return isNaN(parsed.getTime()) ? null : parsed;
};

export const validateNumber = (value: unknown, name: string): number => {
  const num = Number(value);
  if (isNaN(num) || !isFinite(num)) {
    throw new Error(`Invalid number for ${name}: ${String(value)}`);
  }
  return num;
};

export const validatePositiveNumber = (value: unknown, name: string): number => {
  const num = validateNumber(value, name);
  if (num <= 0) {
    throw new Error(`${name} must be positive: ${String(value)}`);
  }
  return num;
};

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};

export class RateLimiter {
  private timestamps: number[] = [];
  private readonly limit: number;
  private readonly windowMs: number;

  constructor(limit: number, windowMs: number) {
    this.limit = limit;
    this.windowMs = windowMs;
  }

  public async tryAcquire(): Promise<boolean> {
    const now = Date.now();
    const windowStart = now - this.windowMs;

    // Remove old timestamps
    this.timestamps = this.timestamps.filter(ts => ts > windowStart);

    if (this.timestamps.length >= this.limit) {
      return false;
    }

    this.timestamps.push(now);
    return true;
  }

  /** Milliseconds until the oldest request in the window leaves it. */
  public waitTime(): number {
    if (this.timestamps.length < this.limit) return 0;
    const oldest = Math.min(...this.timestamps);
    return Math.max(0, oldest + this.windowMs - Date.now());
  }

  public clear(): void {
    this.timestamps = [];
  }
}
