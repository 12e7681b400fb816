/**
 * Transport sessions: the capability shared by the TCP and RTU variants,
 * the byte-stream exchange logic both variants are built on, and the retry
 * policy layered over either of them.
 */

import { PACKET_RECOVERY_TIMEOUT } from "./constants.js";
import {
  ConnectionError,
  DeviceUnreachable,
  ExchangeCancelled,
  ExchangeTimeout,
  FrameRecoveryExhausted,
  SessionBusy,
  errorMessage,
  isRetryable,
} from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";
import { describeRequest, type DeviceIdentity, type Request } from "./packet.js";
import { FrameAssembler } from "./recovery.js";

// ---------- Capability ----------

export interface Transport {
  /** Human readable endpoint, used in log and error messages */
  readonly description: string;
  readonly isConnected: boolean;
  connect(): Promise<void>;
  close(): Promise<void>;
  /**
   * Write one request packet and resolve with the validated response frame.
   * A session serves one exchange at a time.
   */
  exchange(packet: Buffer, request: Request, timeoutMs: number): Promise<Buffer>;
}

/** Connect, run `fn`, and close the transport on every exit path */
export async function withTransport<T>(
  transport: Transport,
  fn: (transport: Transport) => Promise<T>
): Promise<T> {
  try {
    if (!transport.isConnected) await transport.connect();
    return await fn(transport);
  } finally {
    await transport.close();
  }
}

// ---------- Byte stream sessions ----------

export interface StreamSessionOptions {
  /** Silence tolerated while a partial frame is buffered, in ms. Default: 2000 */
  recoveryTimeoutMs?: number;
  logger?: Logger;
}

interface PendingExchange {
  request: Request;
  assembler: FrameAssembler;
  resolve: (frame: Buffer) => void;
  reject: (err: Error) => void;
  /** Deadline of the whole exchange attempt */
  timer: NodeJS.Timeout;
  /** Silence allowed while a partial frame is buffered */
  recoveryTimer: NodeJS.Timeout | null;
}

interface PendingConnect {
  promise: Promise<void>;
  abort: AbortController;
}

/**
 * Request/response alternation over a byte stream. Subclasses own the
 * physical connection and feed received bytes to `handleData`.
 */
export abstract class StreamSession implements Transport {
  abstract readonly description: string;

  protected readonly log: Logger;
  protected readonly recoveryTimeoutMs: number;
  private pending: PendingExchange | null = null;
  private connecting: PendingConnect | null = null;

  constructor(
    protected readonly identity: DeviceIdentity,
    options: StreamSessionOptions = {}
  ) {
    this.log = options.logger ?? nullLogger;
    this.recoveryTimeoutMs = options.recoveryTimeoutMs ?? PACKET_RECOVERY_TIMEOUT * 1000;
  }

  abstract get isConnected(): boolean;
  /**
   * Open the physical connection. When `signal` aborts before it is
   * established, release what was opened and reject with ExchangeCancelled.
   */
  protected abstract openStream(signal: AbortSignal): Promise<void>;
  protected abstract writeBytes(packet: Buffer): Promise<void>;
  protected abstract destroyStream(): Promise<void>;

  /** Open the connection; concurrent callers share the connect in flight */
  connect(): Promise<void> {
    if (this.isConnected) return Promise.resolve();
    if (!this.connecting) {
      const abort = new AbortController();
      const promise = this.openStream(abort.signal).finally(() => {
        if (this.connecting?.abort === abort) this.connecting = null;
      });
      this.connecting = { promise, abort };
    }
    return this.connecting.promise;
  }

  async exchange(packet: Buffer, request: Request, timeoutMs: number): Promise<Buffer> {
    if (!this.isConnected) {
      throw new ConnectionError(`${this.description}: not connected`);
    }
    if (this.pending) {
      throw new SessionBusy(`${this.description}: an exchange is already in progress`);
    }

    this.log.debug(`[${this.description}] SENT ${describeRequest(request)}: ${packet.toString("hex")}`);
    return new Promise<Buffer>((resolve, reject) => {
      this.pending = {
        request,
        assembler: new FrameAssembler(request, this.identity, { logger: this.log }),
        resolve,
        reject,
        timer: setTimeout(() => this.fail(new ExchangeTimeout(timeoutMs)), timeoutMs),
        recoveryTimer: null,
      };
      this.writeBytes(packet).catch((err: unknown) => {
        this.fail(
          new ConnectionError(`${this.description}: write failed: ${errorMessage(err)}`, {
            cause: err,
          })
        );
      });
    });
  }

  /** Cancel the exchange or connect in progress and close the stream */
  async close(): Promise<void> {
    const connecting = this.connecting;
    this.connecting = null;
    if (connecting) {
      connecting.abort.abort();
      await connecting.promise.catch((err: unknown) => {
        this.log.debug(`[${this.description}] Connect ended by close: ${errorMessage(err)}`);
      });
    }
    this.fail(new ExchangeCancelled());
    await this.destroyStream();
  }

  /** Feed bytes received from the stream */
  protected handleData(chunk: Buffer): void {
    this.log.debug(`[${this.description}] RECD: ${chunk.toString("hex")}`);
    const pending = this.pending;
    if (!pending) {
      this.log.debug(`[${this.description}] [DISCARDED] no exchange in progress`);
      return;
    }

    const result = pending.assembler.push(chunk);
    switch (result.status) {
      case "complete":
        this.settle();
        pending.resolve(result.frame);
        break;
      case "exhausted":
        this.fail(result.error);
        break;
      case "pending":
        // Bound the wait for the rest of a partial frame; the exchange deadline keeps running
        if (pending.recoveryTimer) clearTimeout(pending.recoveryTimer);
        pending.recoveryTimer = null;
        if (pending.assembler.buffered > 0) {
          const buffered = pending.assembler.buffered;
          pending.recoveryTimer = setTimeout(
            () =>
              this.fail(
                new FrameRecoveryExhausted(
                  `Partial frame of ${buffered} bytes not completed within ${this.recoveryTimeoutMs}ms`
                )
              ),
            this.recoveryTimeoutMs
          );
        }
        break;
    }
  }

  /** The stream closed or errored underneath us */
  protected handleStreamLoss(err: Error): void {
    this.fail(err instanceof ConnectionError ? err : new ConnectionError(err.message, { cause: err }));
  }

  private settle(): PendingExchange | null {
    const pending = this.pending;
    if (pending) {
      clearTimeout(pending.timer);
      if (pending.recoveryTimer) clearTimeout(pending.recoveryTimer);
      this.pending = null;
    }
    return pending;
  }

  private fail(err: Error): void {
    const pending = this.settle();
    if (pending) {
      this.log.debug(`[${this.description}] ${describeRequest(pending.request)} failed: ${err.message}`);
      pending.reject(err);
    }
  }
}

// ---------- Retry policy ----------

export interface RetryOptions {
  /** Total attempts per operation (1-10) */
  retries: number;
  /** Pause between attempts, in ms. Default: 0 */
  retryDelayMs?: number;
  logger?: Logger;
}

/**
 * Retries transient failures of the wrapped transport, re-establishing the
 * session between attempts. Once the budget is spent the operation fails
 * with DeviceUnreachable.
 */
export class RetryingTransport implements Transport {
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly log: Logger;
  /** Bumped by close() so that an operation between attempts stops retrying */
  private generation = 0;

  constructor(
    private readonly inner: Transport,
    options: RetryOptions
  ) {
    this.retries = Math.max(1, options.retries);
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.log = options.logger ?? nullLogger;
  }

  get description(): string {
    return this.inner.description;
  }

  get isConnected(): boolean {
    return this.inner.isConnected;
  }

  async connect(): Promise<void> {
    await this.withRetry("connect", () => this.inner.connect());
  }

  async close(): Promise<void> {
    this.generation++;
    await this.inner.close();
  }

  async exchange(packet: Buffer, request: Request, timeoutMs: number): Promise<Buffer> {
    return this.withRetry(describeRequest(request), async () => {
      if (!this.inner.isConnected) await this.inner.connect();
      return this.inner.exchange(packet, request, timeoutMs);
    });
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const generation = this.generation;
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.retries; attempt++) {
      if (generation !== this.generation) {
        throw new ExchangeCancelled(`${this.description}: ${operation} cancelled`);
      }
      try {
        const result = await fn();
        if (generation !== this.generation) {
          throw new ExchangeCancelled(`${this.description}: ${operation} cancelled`);
        }
        return result;
      } catch (err) {
        if (!isRetryable(err)) throw err;
        lastError = err;
        this.log.warn(
          `[${this.description}] ${operation} failed (attempt ${attempt}/${this.retries}): ${errorMessage(err)}`
        );
        await this.inner.close();
        if (attempt < this.retries && this.retryDelayMs > 0) {
          await new Promise((r) => setTimeout(r, this.retryDelayMs));
        }
      }
    }
    throw new DeviceUnreachable(
      `${this.description}: ${operation} failed after ${this.retries} attempts: ${errorMessage(lastError)}`,
      this.retries,
      { cause: lastError }
    );
  }
}
