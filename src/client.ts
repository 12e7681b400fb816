/**
 * Register-level client for one inverter. Builds requests, exchanges them
 * through a transport and turns validated responses into register maps.
 */

import { FunctionCode, TOTAL_REGISTERS } from "./constants.js";
import { deviceIdentity, type InverterConfig } from "./config.js";
import { decodeModel, modelFamily } from "./decoder.js";
import {
  ConnectionError,
  DeviceUnreachable,
  ExchangeCancelled,
  ExchangeTimeout,
  FrameRecoveryExhausted,
  InvalidRequestParameters,
  ProtocolError,
  SessionBusy,
  errorMessage,
} from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";
import { exceptionName } from "./modbus.js";
import {
  describeRequest,
  encodeRequest,
  readRequest,
  writeRequest,
  type DeviceIdentity,
  type Request,
} from "./packet.js";
import { parseResponse, type RegisterMap, type Response } from "./response.js";
import { RtuSession, type SerialLinkFactory } from "./rtu.js";
import { RetryingTransport, withTransport, type Transport } from "./session.js";
import { TcpSession } from "./tcp.js";

export type RegisterBank = "hold" | "input";

const BANK_FUNCTION = {
  hold: FunctionCode.READ_HOLDING,
  input: FunctionCode.READ_INPUT,
} as const;

/** Holding registers carrying the four character device type code */
const MODEL_REGISTER = 7;
const MODEL_REGISTER_COUNT = 2;

// ---------- Transport construction ----------

export interface TransportOptions {
  logger?: Logger;
  /** Serial device factory used for RTU connections */
  linkFactory?: SerialLinkFactory;
  /** Pause between retry attempts, in ms */
  retryDelayMs?: number;
}

/** Session for the configured wire variant, wrapped in the retry policy */
export function createTransport(
  config: InverterConfig,
  options: TransportOptions = {}
): Transport {
  const logger = options.logger ?? nullLogger;
  const { connection } = config;
  const inner =
    connection.protocol === "tcp"
      ? new TcpSession(
          {
            protocol: "tcp",
            dongleSerial: connection.dongleSerial,
            inverterSerial: connection.inverterSerial,
          },
          { host: connection.host, port: connection.port, logger }
        )
      : new RtuSession(
          { protocol: "rtu", slaveId: connection.slaveId },
          {
            path: connection.serialPort,
            baudRate: connection.baudRate,
            parity: connection.parity,
            stopBits: connection.stopBits,
            byteSize: connection.byteSize,
            linkFactory: options.linkFactory,
            logger,
          }
        );
  return new RetryingTransport(inner, {
    retries: config.connectionRetries,
    retryDelayMs: options.retryDelayMs,
    logger,
  });
}

// ---------- Client ----------

export interface ReadBankOptions {
  /** Registers in the bank. Default: 300 */
  total?: number;
  /** Registers per request. Default: the configured block size */
  blockSize?: number;
  signal?: AbortSignal;
}

export class InverterClient {
  public readonly identity: DeviceIdentity;
  private readonly log: Logger;
  /** Tail of the exchange queue; exchanges run strictly one after another */
  private queue: Promise<void> = Promise.resolve();

  constructor(
    public readonly config: InverterConfig,
    public readonly transport: Transport,
    logger: Logger = nullLogger
  ) {
    this.identity = deviceIdentity(config);
    this.log = logger;
  }

  get isConnected(): boolean {
    return this.transport.isConnected;
  }

  async connect(): Promise<void> {
    await this.transport.connect();
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  /**
   * Read a contiguous range of registers (function 3 or 4)
   *
   * @param bank     "hold" for holding registers, "input" for input registers
   * @param address  First register address
   * @param count    Number of registers, at most 125
   */
  async readRegisters(bank: RegisterBank, address: number, count: number): Promise<RegisterMap> {
    const response = await this.execute(readRequest(address, count, BANK_FUNCTION[bank]));
    return response.registers();
  }

  /**
   * Read a whole register bank in chunks of at most `blockSize` registers.
   * Fails on the first chunk that fails, and with ExchangeCancelled once
   * `signal` aborts.
   */
  async readBank(bank: RegisterBank, options: ReadBankOptions = {}): Promise<Map<number, number>> {
    const { total = TOTAL_REGISTERS, blockSize = this.config.registerBlockSize, signal } = options;
    const registers = new Map<number, number>();
    for (let start = 0; start < total; start += blockSize) {
      if (signal?.aborted) {
        throw new ExchangeCancelled(`Reading the ${bank} bank cancelled at register ${start}`);
      }
      const chunk = await this.readRegisters(bank, start, Math.min(blockSize, total - start));
      for (const [address, value] of chunk) registers.set(address, value);
    }
    return registers;
  }

  /**
   * Write a single holding register (function 6)
   *
   * @returns Number of registers the device acknowledged
   */
  async writeRegister(address: number, value: number): Promise<number> {
    return this.writeRegisters(address, [value]);
  }

  /**
   * Write consecutive holding registers. One value goes out as function 6,
   * several as function 16.
   *
   * @returns Number of registers the device acknowledged
   */
  async writeRegisters(address: number, values: readonly number[]): Promise<number> {
    if (this.config.readOnly) {
      throw new InvalidRequestParameters(
        `Refusing to write register ${address}: connection is read-only`
      );
    }
    if (values.length === 0) {
      throw new InvalidRequestParameters("At least one value is required");
    }
    const response = await this.execute(writeRequest(address, values));
    return response.writtenCount;
  }

  /** Device type code from holding registers 7-8, if it is well formed */
  async readModel(): Promise<string | undefined> {
    const hold = await this.readRegisters("hold", MODEL_REGISTER, MODEL_REGISTER_COUNT);
    return decodeModel(hold);
  }

  /** Queue one exchange behind any in flight */
  private execute(request: Request): Promise<Response> {
    const result = this.queue.then(() => this.exchange(request));
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async exchange(request: Request): Promise<Response> {
    const packet = encodeRequest(this.identity, request);
    const frame = await this.transport.exchange(
      packet,
      request,
      this.config.requestTimeout * 1000
    );
    const response = parseResponse(frame, request, this.identity);
    if (response.isError()) {
      const detail =
        response.exceptionCode !== undefined
          ? `${exceptionName(response.exceptionCode)} (code ${response.exceptionCode})`
          : response.reason;
      this.log.warn(`[${this.transport.description}] ${describeRequest(request)} rejected: ${detail}`);
      throw new ProtocolError(
        `${describeRequest(request)} rejected: ${detail}`,
        response.exceptionCode
      );
    }
    return response;
  }
}

export interface ClientOptions extends TransportOptions {
  /** Use this transport instead of one built from the configuration */
  transport?: Transport;
}

export function createClient(config: InverterConfig, options: ClientOptions = {}): InverterClient {
  const logger = options.logger ?? nullLogger;
  return new InverterClient(config, options.transport ?? createTransport(config, options), logger);
}

// ---------- Model probe ----------

export type ProbeFailure = "unreachable" | "protocol" | "unrecognised";

export type ProbeResult =
  | { ok: true; model: string; family: string | undefined }
  | { ok: false; failure: ProbeFailure; message: string; error?: Error };

function probeFailure(err: unknown): ProbeFailure | undefined {
  if (
    err instanceof DeviceUnreachable ||
    err instanceof ConnectionError ||
    err instanceof ExchangeTimeout ||
    err instanceof FrameRecoveryExhausted ||
    err instanceof ExchangeCancelled ||
    err instanceof SessionBusy
  ) {
    return "unreachable";
  }
  if (err instanceof ProtocolError || err instanceof InvalidRequestParameters) {
    return "protocol";
  }
  return undefined;
}

/**
 * Connect with `config`, read the device type code and close again.
 * Expected failures are reported in the result; anything else propagates.
 */
export async function probeModel(
  config: InverterConfig,
  options: ClientOptions = {}
): Promise<ProbeResult> {
  const client = createClient(config, options);
  try {
    const model = await withTransport(client.transport, () => client.readModel());
    if (model === undefined) {
      return {
        ok: false,
        failure: "unrecognised",
        message: "Holding registers 7-8 do not contain a device type code",
      };
    }
    return { ok: true, model, family: modelFamily(model) };
  } catch (err) {
    const failure = probeFailure(err);
    if (failure === undefined || !(err instanceof Error)) throw err;
    return { ok: false, failure, message: errorMessage(err), error: err };
  }
}
