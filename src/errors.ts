/**
 * Error taxonomy for request construction, framing and transport failures.
 */

/** Malformed request inputs. Raised before anything reaches the wire. */
export class InvalidRequestParameters extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestParameters";
  }
}

/** The byte stream never yielded a valid frame within the recovery bounds */
export class FrameRecoveryExhausted extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameRecoveryExhausted";
  }
}

/** Well framed, but rejected: mismatched addressing or a device exception */
export class ProtocolError extends Error {
  public readonly exceptionCode: number | undefined;

  constructor(message: string, exceptionCode?: number) {
    super(message);
    this.name = "ProtocolError";
    this.exceptionCode = exceptionCode;
  }
}

export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export class ExchangeTimeout extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No response within ${timeoutMs}ms`);
    this.name = "ExchangeTimeout";
    this.timeoutMs = timeoutMs;
  }
}

export class ExchangeCancelled extends Error {
  constructor(message = "Exchange cancelled: session closed") {
    super(message);
    this.name = "ExchangeCancelled";
  }
}

/** A second exchange was started while one is still in progress */
export class SessionBusy extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionBusy";
  }
}

/** Connection or timeout failures after the retry budget was spent */
export class DeviceUnreachable extends Error {
  public readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeviceUnreachable";
    this.attempts = attempts;
  }
}

/** Failures the retry policy treats as transient */
export function isRetryable(err: unknown): boolean {
  return (
    err instanceof ConnectionError ||
    err instanceof ExchangeTimeout ||
    err instanceof FrameRecoveryExhausted
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
