/**
 * Frame inspection utility.
 *
 * Parses and displays the contents of a captured dongle (TCP) or Modbus
 * RTU frame in human-readable format.
 */

import {
  ACTION_REQUEST,
  EXCEPTION_FLAG,
  FunctionCode,
  SERIAL_LENGTH,
  TCP_HEADER_LENGTH,
  TCP_PREFIX,
} from "./constants.js";
import { crc16, exceptionName, verifyCrc } from "./modbus.js";

// ---------- Enums ----------

export enum TcpFunction {
  Heartbeat = 0xc1,
  TranslatedData = 0xc2,
  ReadParam = 0xc3,
  WriteParam = 0xc4,
}

const TCP_FUNCTION_NAMES: Record<number, string> = {
  [TcpFunction.Heartbeat]: "Heartbeat",
  [TcpFunction.TranslatedData]: "TranslatedData",
  [TcpFunction.ReadParam]: "ReadParam",
  [TcpFunction.WriteParam]: "WriteParam",
};

const FUNCTION_NAMES: Record<number, string> = {
  [FunctionCode.READ_HOLDING]: "ReadHolding",
  [FunctionCode.READ_INPUT]: "ReadInput",
  [FunctionCode.WRITE_SINGLE]: "WriteSingle",
  [FunctionCode.WRITE_MULTIPLE]: "WriteMultiple",
};

function hex(value: number, width = 2): string {
  return value.toString(16).padStart(width, "0");
}

function functionName(code: number): string {
  if (code & EXCEPTION_FLAG) {
    return `${FUNCTION_NAMES[code & ~EXCEPTION_FLAG] ?? "Unknown"}Exception`;
  }
  return FUNCTION_NAMES[code] ?? "Unknown";
}

// ---------- LxpFrame class ----------

/** Field accessors over a dongle frame. Offsets follow the dongle packet layout. */
export class LxpFrame {
  private readonly frame: Buffer;

  constructor(hexString: string) {
    this.frame = Buffer.from(hexString.replace(/\s+/g, ""), "hex");
  }

  get length(): number {
    return this.frame.length;
  }

  get prefixValid(): boolean {
    return this.frame.length >= 2 && this.frame.subarray(0, 2).equals(TCP_PREFIX);
  }

  get protocol(): number {
    return this.frame.readUInt16LE(2);
  }

  get frameLength(): number {
    return this.frame.readUInt16LE(4);
  }

  get frameLengthValid(): boolean {
    return this.frameLength + 6 === this.frame.length;
  }

  get tcpFunction(): number {
    return this.frame[7];
  }

  get tcpFunctionName(): string {
    return TCP_FUNCTION_NAMES[this.tcpFunction] ?? "Unknown";
  }

  get dongleSerial(): string {
    return this.frame.toString("latin1", 8, 8 + SERIAL_LENGTH);
  }

  get dataLength(): number {
    return this.frame.readUInt16LE(18);
  }

  /** True when the frame carries an inverter data frame */
  get hasDataFrame(): boolean {
    return (
      this.tcpFunction === TcpFunction.TranslatedData &&
      this.frame.length >= TCP_HEADER_LENGTH + 16
    );
  }

  get isRequest(): boolean {
    return this.frame[20] === ACTION_REQUEST;
  }

  get functionCode(): number {
    return this.frame[21];
  }

  get inverterSerial(): string {
    return this.frame.toString("latin1", 22, 22 + SERIAL_LENGTH);
  }

  get register(): number {
    return this.frame.readUInt16LE(32);
  }

  get frameCrc(): number {
    return this.frame.readUInt16LE(this.frame.length - 2);
  }

  get calculatedCrc(): number {
    return crc16(this.frame.subarray(TCP_HEADER_LENGTH, this.frame.length - 2));
  }

  get crcValid(): boolean {
    return this.frameCrc === this.calculatedCrc;
  }

  /** Register values carried by a read response or a multiple write request */
  get values(): number[] {
    const values: number[] = [];
    if (!this.isRequest && this.functionCode <= FunctionCode.READ_INPUT) {
      const byteCount = this.frame[34];
      for (let i = 0; i + 1 < byteCount && 35 + i + 1 < this.frame.length - 2; i += 2) {
        values.push(this.frame.readUInt16LE(35 + i));
      }
    } else if (this.isRequest && this.functionCode === FunctionCode.WRITE_MULTIPLE) {
      const byteCount = this.frame[36];
      for (let i = 0; i + 1 < byteCount && 37 + i + 1 < this.frame.length - 2; i += 2) {
        values.push(this.frame.readUInt16LE(37 + i));
      }
    }
    return values;
  }

  payloadString(): string {
    const kind = this.isRequest ? "Request" : "Response";
    const fc = this.functionCode;
    const word = this.frame.readUInt16LE(34);

    const lines: string[] = [];
    lines.push(`${"=".repeat(10)} Data frame - [${kind}] ${"=".repeat(10)}`);
    lines.push(`  Function code: ${fc} (${functionName(fc)})`);
    lines.push(`  Inverter serial: ${this.inverterSerial}`);
    lines.push(`  Register: ${this.register} (${hex(this.register, 4)})`);

    if (fc & EXCEPTION_FLAG) {
      lines.push(`  Exception: ${exceptionName(this.frame[34])} (${this.frame[34]})`);
    } else if (this.isRequest && fc === FunctionCode.WRITE_SINGLE) {
      lines.push(`  Value: ${word} (${hex(word, 4)})`);
    } else if (this.isRequest) {
      lines.push(`  Quantity: ${word} (${hex(word, 2)})`);
    } else if (fc === FunctionCode.WRITE_SINGLE) {
      lines.push(`  Value written: ${word}`);
    } else if (fc === FunctionCode.WRITE_MULTIPLE) {
      lines.push(`  Registers written: ${word}`);
    }
    if (this.values.length > 0) {
      lines.push(`  Values: ${this.values.join(" ")}`);
    }
    lines.push(`  CRC: ${hex(this.calculatedCrc, 4)} (valid: ${this.crcValid})`);
    return lines.join("\n");
  }
}

// ---------- RTU ----------

function describeRtu(frame: Buffer): string {
  const lines: string[] = [];
  const fc = frame[1];
  lines.push(`Modbus RTU frame (${frame.length} bytes)`);
  lines.push(`  Slave address: ${frame[0]}`);
  lines.push(`  Function code: ${fc} (${functionName(fc)})`);
  if (fc & EXCEPTION_FLAG) {
    lines.push(`  Exception: ${exceptionName(frame[2])} (${frame[2]})`);
  }
  lines.push(`  CRC valid: ${verifyCrc(frame)}`);
  return lines.join("\n");
}

/**
 * Describe a captured frame.
 *
 * @param hexBytes  Array of hex byte strings (e.g. ["a1", "1a", "01", ...])
 *                  or a single hex string
 * @returns Human readable frame description
 */
export function describeFrame(hexBytes: string | string[]): string {
  const hexString = Array.isArray(hexBytes) ? hexBytes.join("") : hexBytes;
  const frame = new LxpFrame(hexString);

  if (!frame.prefixValid) {
    if (frame.length < 4) throw new Error(`Frame of ${frame.length} bytes is too short`);
    return describeRtu(Buffer.from(hexString.replace(/\s+/g, ""), "hex"));
  }
  if (frame.length < TCP_HEADER_LENGTH) {
    throw new Error(`Dongle frame of ${frame.length} bytes is shorter than its header`);
  }

  const lines: string[] = [];
  lines.push(`Prefix: a11a (valid: ${frame.prefixValid})`);
  lines.push(`Protocol: ${frame.protocol}`);
  lines.push(`Frame length: ${frame.frameLength} (valid: ${frame.frameLengthValid})`);
  lines.push(`TCP function: ${frame.tcpFunctionName} (hex: ${hex(frame.tcpFunction)})`);
  lines.push(`Dongle serial: ${frame.dongleSerial}`);
  lines.push(`Data length: ${frame.dataLength}`);
  if (frame.hasDataFrame) {
    lines.push(frame.payloadString());
  }
  return lines.join("\n");
}
