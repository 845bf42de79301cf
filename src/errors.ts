export class SpaceGuardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpaceGuardError';
  }
}

/**
 * Downloader unreachable, free-space query failed, or an external call timed out.
 * Skips the current cycle of that downloader.
 */
export class TransientIOError extends SpaceGuardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientIOError';
  }
}

/**
 * Invalid configuration. At load time `field` names the offending setting;
 * during a cycle it skips only the directory concerned.
 */
export class ConfigurationError extends SpaceGuardError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The downloader refused a pause or resume (e.g. the item was removed).
 */
export class CommandRejectedError extends SpaceGuardError {
  constructor(
    message: string,
    public readonly hash: string,
  ) {
    super(message);
    this.name = 'CommandRejectedError';
  }
}

/**
 * Ledger state contradicts the downloader snapshot.
 */
export class InvariantViolationError extends SpaceGuardError {
  constructor(
    message: string,
    public readonly hash: string,
  ) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Bound an external call. Expiry raises TransientIOError; the pending call is
 * left to settle on its own.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TransientIOError(`${label} timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
