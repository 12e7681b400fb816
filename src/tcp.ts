/**
 * TCP session to a LuxPower WiFi dongle.
 */

import net from "node:net";
import { DEFAULT_PORT } from "./constants.js";
import { ConnectionError, ExchangeCancelled } from "./errors.js";
import type { TcpIdentity } from "./packet.js";
import { StreamSession, type StreamSessionOptions } from "./session.js";

export interface TcpSessionOptions extends StreamSessionOptions {
  host: string;
  /** Dongle TCP port. Default: 8000 */
  port?: number;
  /** Connection establishment timeout in ms. Default: 5000 */
  connectTimeoutMs?: number;
}

export class TcpSession extends StreamSession {
  public readonly description: string;
  public readonly host: string;
  public readonly port: number;
  private readonly connectTimeoutMs: number;
  private socket: net.Socket | null = null;

  constructor(identity: TcpIdentity, options: TcpSessionOptions) {
    super(identity, options);
    this.host = options.host;
    this.port = options.port ?? DEFAULT_PORT;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000;
    this.description = `${this.host}:${this.port}`;
  }

  get isConnected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  protected openStream(signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = new net.Socket();

      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new ConnectionError(`Timed out connecting to ${this.description}`));
      }, this.connectTimeoutMs);

      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(
          new ConnectionError(`Cannot open connection to ${this.description}: ${err.message}`, {
            cause: err,
          })
        );
      };

      const onAbort = () => {
        cleanup();
        socket.destroy();
        reject(new ExchangeCancelled(`${this.description}: connect cancelled`));
      };

      const onConnect = () => {
        cleanup();
        this.socket = socket;
        this.setupSocketListeners(socket);
        this.log.debug(`Connected to ${this.description}`);
        resolve();
      };

      const cleanup = () => {
        clearTimeout(timer);
        socket.removeListener("error", onError);
        socket.removeListener("connect", onConnect);
        signal.removeEventListener("abort", onAbort);
      };

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });
      socket.once("error", onError);
      socket.once("connect", onConnect);
      socket.connect(this.port, this.host);
    });
  }

  private setupSocketListeners(socket: net.Socket): void {
    socket.on("data", (data: Buffer) => this.handleData(data));

    socket.on("end", () => {
      this.handleStreamLoss(new ConnectionError(`${this.description}: connection closed by peer`));
    });

    socket.on("close", () => {
      this.log.debug(`[${this.description}] Socket closed`);
      if (this.socket === socket) this.socket = null;
      this.handleStreamLoss(new ConnectionError(`${this.description}: connection closed`));
    });

    socket.on("error", (err: Error) => {
      this.log.debug(`[${this.description}] Socket error: ${err.message}`);
      this.handleStreamLoss(err);
    });
  }

  protected writeBytes(packet: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(new ConnectionError(`${this.description}: connection already closed`));
    }
    return new Promise<void>((resolve, reject) => {
      socket.write(packet, (err) => (err ? reject(err) : resolve()));
    });
  }

  protected async destroyStream(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    socket.removeAllListeners();
    socket.on("error", (err: Error) => {
      this.log.debug(`[${this.description}] Error after close: ${err.message}`);
    });
    socket.destroy();
  }
}
