export type ErrorKind = 'configuration' | 'liquidity' | 'quote-revert' | 'transport' | 'validation';

export class PipelineError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    readonly retryable: boolean,
    readonly detail?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or placeholder credential / contract address. Fatal for live execution only. */
export class ConfigurationError extends PipelineError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super('configuration', message, false, detail);
  }
}

/** No verified lender balance. Means "cannot safely trade", never escalated. */
export class LiquidityError extends PipelineError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super('liquidity', message, false, detail);
  }
}

export class QuoteRevertError extends PipelineError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super('quote-revert', message, false, detail);
  }
}

/** RPC, HTTP or stream failure, including timeouts. */
export class TransportError extends PipelineError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super('transport', message, true, detail);
  }
}

/** Pre-flight or input validation failure. Never retried. */
export class ValidationError extends PipelineError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super('validation', message, false, detail);
  }
}

export type Result<T, E extends Error = PipelineError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isRetryable(err: unknown): boolean {
  if (err instanceof PipelineError) return err.retryable;
  return true;
}

/**
 * Rejects with a TransportError once `ms` elapses. The timer never keeps the
 * process alive on its own.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TransportError(`${label} timed out after ${ms}ms`, { timeoutMs: ms })), ms);
    timer.unref();
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
