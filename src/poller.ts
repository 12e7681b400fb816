/**
 * Periodic polling of one inverter.
 *
 * Every `pollInterval` seconds the poller reads the whole input bank, then
 * the whole holding bank, and publishes the decoded snapshot. A cycle in
 * which any chunk fails publishes nothing. Cycles never overlap.
 */

import { EventEmitter } from "node:events";
import type { InverterClient } from "./client.js";
import { decode, type DecodedValueSet, type RegisterSnapshot } from "./decoder.js";
import { ExchangeCancelled, errorMessage } from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";

export type PollerState = "idle" | "connecting" | "polling" | "backoff";

export interface PollResult {
  readonly snapshot: RegisterSnapshot;
  readonly values: DecodedValueSet;
  readonly model: string | undefined;
}

export interface PollerOptions {
  logger?: Logger;
  /** Clock used to stamp snapshots */
  now?: () => Date;
}

export declare interface Poller {
  on(event: "snapshot", listener: (result: PollResult) => void): this;
  on(event: "cycleError", listener: (err: Error) => void): this;
  on(event: "state", listener: (state: PollerState) => void): this;
  once(event: "snapshot", listener: (result: PollResult) => void): this;
  once(event: "cycleError", listener: (err: Error) => void): this;
  once(event: "state", listener: (state: PollerState) => void): this;
  emit(event: "snapshot", result: PollResult): boolean;
  emit(event: "cycleError", err: Error): boolean;
  emit(event: "state", state: PollerState): boolean;
}

export class Poller extends EventEmitter {
  private readonly log: Logger;
  private readonly now: () => Date;
  private currentState: PollerState = "idle";
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private cycle: Promise<PollResult | undefined> | null = null;
  private last: PollResult | undefined;
  /** Aborted by stop() to end the cycle in flight between chunks */
  private abort = new AbortController();

  constructor(
    public readonly client: InverterClient,
    options: PollerOptions = {}
  ) {
    super();
    this.log = options.logger ?? nullLogger;
    this.now = options.now ?? (() => new Date());
  }

  get state(): PollerState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Most recent successfully published result */
  get latest(): PollResult | undefined {
    return this.last;
  }

  /** Poll immediately, then every `pollInterval` seconds until stopped */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(0);
  }

  /** Cancel the schedule and close the transport */
  async stop(): Promise<void> {
    this.running = false;
    this.abort.abort();
    this.abort = new AbortController();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.client.close();
    if (this.cycle) await this.cycle;
    this.setState("idle");
  }

  /**
   * Run one cycle. Resolves with the published result, or undefined when
   * the cycle failed. While a cycle is in flight the same cycle is returned.
   */
  poll(): Promise<PollResult | undefined> {
    if (!this.cycle) {
      this.cycle = this.runCycle().finally(() => {
        this.cycle = null;
      });
    }
    return this.cycle;
  }

  /** Write one holding register, serialised with polling */
  writeRegister(address: number, value: number): Promise<number> {
    return this.client.writeRegister(address, value);
  }

  /** Write consecutive holding registers, serialised with polling */
  writeRegisters(address: number, values: readonly number[]): Promise<number> {
    return this.client.writeRegisters(address, values);
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    await this.poll();
    if (this.running) {
      this.schedule(this.client.config.pollInterval * 1000);
    }
  }

  private async runCycle(): Promise<PollResult | undefined> {
    const { signal } = this.abort;
    let result: PollResult;
    try {
      if (!this.client.isConnected) {
        this.setState("connecting");
        await this.client.connect();
      }
      this.setState("polling");
      const input = await this.client.readBank("input", { signal });
      const hold = await this.client.readBank("hold", { signal });
      if (signal.aborted) throw new ExchangeCancelled("Poll cycle cancelled");
      const snapshot: RegisterSnapshot = { input, hold, capturedAt: this.now() };
      const values = decode(snapshot, { ratedPower: this.client.config.ratedPower });
      result = { snapshot, values, model: values.model };
    } catch (err) {
      if (signal.aborted) {
        this.log.debug(`[${this.client.transport.description}] Poll cycle stopped: ${errorMessage(err)}`);
        return undefined;
      }
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.warn(`[${this.client.transport.description}] Poll cycle failed: ${errorMessage(err)}`);
      this.setState("backoff");
      this.emit("cycleError", error);
      return undefined;
    }

    this.last = result;
    this.setState("idle");
    this.emit("snapshot", result);
    return result;
  }

  private setState(state: PollerState): void {
    if (state === this.currentState) return;
    this.currentState = state;
    this.emit("state", state);
  }
}
