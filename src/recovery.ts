/**
 * Frame recovery for byte streams.
 *
 * Serial reads (and TCP segments) are not packet-atomic: a response may
 * arrive split across reads, preceded by line noise, or followed by bytes
 * that belong to nothing. A FrameAssembler accumulates the bytes received
 * for one exchange, drops noise ahead of the first plausible frame start,
 * and resynchronises on the next start whenever a candidate frame turns
 * out to be invalid. Each resynchronisation counts as a recovery attempt.
 */

import { MAX_PACKET_RECOVERY_ATTEMPTS, MAX_PACKET_SIZE } from "./constants.js";
import { FrameRecoveryExhausted } from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";
import { describeRequest, type DeviceIdentity, type Request } from "./packet.js";
import {
  findFrameStart,
  measureFrame,
  parseResponse,
  type Response,
} from "./response.js";

export interface RecoveryOptions {
  /** Bytes tolerated per exchange without a valid frame. Default: 1024 */
  maxPacketSize?: number;
  /** Resynchronisations allowed per exchange. Default: 3 */
  maxAttempts?: number;
  logger?: Logger;
}

export type AssemblyResult =
  | { status: "pending" }
  | { status: "complete"; frame: Buffer; response: Response }
  | { status: "exhausted"; error: FrameRecoveryExhausted };

export class FrameAssembler {
  private buffer: Buffer = Buffer.alloc(0);
  private attempts = 0;
  /** Bytes received for this exchange, including discarded ones */
  private received = 0;
  private readonly maxPacketSize: number;
  private readonly maxAttempts: number;
  private readonly log: Logger;

  constructor(
    private readonly request: Request,
    private readonly identity: DeviceIdentity,
    options: RecoveryOptions = {}
  ) {
    this.maxPacketSize = options.maxPacketSize ?? MAX_PACKET_SIZE;
    this.maxAttempts = options.maxAttempts ?? MAX_PACKET_RECOVERY_ATTEMPTS;
    this.log = options.logger ?? nullLogger;
  }

  /** Bytes currently held while waiting for the rest of a frame */
  get buffered(): number {
    return this.buffer.length;
  }

  /** Resynchronisations performed so far */
  get recoveryAttempts(): number {
    return this.attempts;
  }

  /** Append received bytes and try to complete a frame */
  push(chunk: Buffer): AssemblyResult {
    this.received += chunk.length;
    this.buffer = Buffer.concat([this.buffer, chunk]);

    for (;;) {
      // Bytes that cannot begin a frame are noise, dropped without a recovery attempt
      const start = findFrameStart(this.buffer, 0, this.request, this.identity);
      if (start > 0) {
        this.log.debug(`[DISCARDED] ${this.buffer.subarray(0, start).toString("hex")}`);
        this.buffer = this.buffer.subarray(start);
      }

      const measure = measureFrame(this.buffer, this.request, this.identity);
      if (measure.status === "incomplete") {
        return this.awaitMore();
      }

      let reason: string;
      if (measure.status === "complete") {
        if (this.buffer.length < measure.length) {
          return this.awaitMore();
        }
        const frame = this.buffer.subarray(0, measure.length);
        const response = parseResponse(frame, this.request, this.identity);
        if (!response.isError() || response.errorKind === "exception") {
          if (this.buffer.length > measure.length) {
            this.log.debug(
              `[DISCARDED] ${this.buffer.length - measure.length} trailing bytes after frame`
            );
          }
          this.buffer = Buffer.alloc(0);
          return { status: "complete", frame: Buffer.from(frame), response };
        }
        reason = response.reason ?? "invalid frame";
      } else {
        reason = measure.reason;
      }

      this.attempts++;
      if (this.attempts > this.maxAttempts) {
        return this.exhaust(
          `No valid frame for ${describeRequest(this.request)} after ${this.maxAttempts} recovery attempts (${reason})`
        );
      }
      const next = findFrameStart(this.buffer, 1, this.request, this.identity);
      this.log.debug(
        `Resynchronising (${reason}): dropping ${next} bytes ${this.buffer.subarray(0, next).toString("hex")}`
      );
      this.buffer = this.buffer.subarray(next);
    }
  }

  /** The byte bound applies once the received bytes hold no complete frame */
  private awaitMore(): AssemblyResult {
    if (this.received > this.maxPacketSize) {
      return this.exhaust(
        `${this.received} bytes received without a valid frame (limit ${this.maxPacketSize})`
      );
    }
    return { status: "pending" };
  }

  private exhaust(message: string): AssemblyResult {
    this.buffer = Buffer.alloc(0);
    return { status: "exhausted", error: new FrameRecoveryExhausted(message) };
  }
}
