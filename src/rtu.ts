/**
 * Modbus RTU session over an RS-485 / USB serial device.
 */

import { SerialPort } from "serialport";
import {
  DEFAULT_BAUDRATE,
  DEFAULT_BYTESIZE,
  DEFAULT_PARITY,
  DEFAULT_STOPBITS,
} from "./constants.js";
import { ConnectionError, ExchangeCancelled, errorMessage } from "./errors.js";
import type { RtuIdentity } from "./packet.js";
import { StreamSession, type StreamSessionOptions } from "./session.js";

export type Parity = "N" | "E" | "O";

export interface SerialSettings {
  path: string;
  baudRate: number;
  parity: Parity;
  stopBits: 1 | 2;
  byteSize: 7 | 8;
}

/** Byte-level access to an open serial device */
export interface SerialLink {
  open(): Promise<void>;
  write(data: Buffer): Promise<void>;
  close(): Promise<void>;
  onData(listener: (chunk: Buffer) => void): void;
  onClose(listener: (err?: Error) => void): void;
}

export type SerialLinkFactory = (settings: SerialSettings) => SerialLink;

const PARITY_NAMES = { N: "none", E: "even", O: "odd" } as const;

/** SerialLink backed by the `serialport` package */
export function openSerialPort(settings: SerialSettings): SerialLink {
  const port = new SerialPort({
    path: settings.path,
    baudRate: settings.baudRate,
    parity: PARITY_NAMES[settings.parity],
    stopBits: settings.stopBits,
    dataBits: settings.byteSize,
    autoOpen: false,
  });

  return {
    open: () =>
      new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
      }),
    write: (data) =>
      new Promise<void>((resolve, reject) => {
        port.write(data, (err) => {
          if (err) {
            reject(err);
            return;
          }
          port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!port.isOpen) {
          resolve();
          return;
        }
        port.close((err) => (err ? reject(err) : resolve()));
      }),
    onData: (listener) => {
      port.on("data", listener);
    },
    onClose: (listener) => {
      port.on("close", (err?: Error) => listener(err));
      port.on("error", (err: Error) => listener(err));
    },
  };
}

export interface RtuSessionOptions extends StreamSessionOptions, Partial<SerialSettings> {
  path: string;
  linkFactory?: SerialLinkFactory;
}

export class RtuSession extends StreamSession {
  public readonly description: string;
  public readonly settings: SerialSettings;
  private readonly linkFactory: SerialLinkFactory;
  private link: SerialLink | null = null;

  constructor(identity: RtuIdentity, options: RtuSessionOptions) {
    super(identity, options);
    this.settings = {
      path: options.path,
      baudRate: options.baudRate ?? DEFAULT_BAUDRATE,
      parity: options.parity ?? DEFAULT_PARITY,
      stopBits: options.stopBits ?? DEFAULT_STOPBITS,
      byteSize: options.byteSize ?? DEFAULT_BYTESIZE,
    };
    this.linkFactory = options.linkFactory ?? openSerialPort;
    const { path, baudRate, parity, byteSize, stopBits } = this.settings;
    this.description = `${path}@${baudRate}/${byteSize}${parity}${stopBits}#${identity.slaveId}`;
  }

  get isConnected(): boolean {
    return this.link !== null;
  }

  protected async openStream(signal: AbortSignal): Promise<void> {
    const link = this.linkFactory(this.settings);
    try {
      await link.open();
    } catch (err) {
      throw new ConnectionError(
        `Cannot open serial device ${this.settings.path}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
    if (signal.aborted) {
      await this.closeLink(link);
      throw new ExchangeCancelled(`${this.description}: connect cancelled`);
    }

    link.onData((chunk) => this.handleData(chunk));
    link.onClose((err) => {
      if (this.link !== link) return;
      this.link = null;
      this.handleStreamLoss(
        new ConnectionError(`${this.description}: serial device closed`, { cause: err })
      );
    });
    this.link = link;
    this.log.debug(`Opened ${this.description}`);
  }

  protected writeBytes(packet: Buffer): Promise<void> {
    if (!this.link) {
      return Promise.reject(new ConnectionError(`${this.description}: serial device not open`));
    }
    return this.link.write(packet);
  }

  protected async destroyStream(): Promise<void> {
    const link = this.link;
    this.link = null;
    if (link) await this.closeLink(link);
  }

  private async closeLink(link: SerialLink): Promise<void> {
    try {
      await link.close();
    } catch (err) {
      this.log.warn(`[${this.description}] Error closing serial device: ${errorMessage(err)}`);
    }
  }
}
