/**
 * Response parsing and validation for both wire variants.
 *
 * Parsing never throws: every malformed, truncated or rejected buffer is
 * represented as an errored Response carrying a diagnostic reason.
 */

import {
  ACTION_RESPONSE,
  MAX_PACKET_SIZE,
  RESPONSE_OVERHEAD,
  RTU_RESPONSE_OVERHEAD,
  RTU_WRITE_RESPONSE_LENGTH,
  SERIAL_LENGTH,
  TCP_FUNCTION_TRANSLATED_DATA,
  TCP_HEADER_LENGTH,
  TCP_PREFIX,
  WRITE_MULTIPLE_RESPONSE_LENGTH,
  WRITE_RESPONSE_LENGTH,
} from "./constants.js";
import { crc16, exceptionName, verifyCrc } from "./modbus.js";
import {
  exceptionFunctionCode,
  type DeviceIdentity,
  type Request,
  type RtuIdentity,
  type TcpIdentity,
} from "./packet.js";

export type RegisterMap = ReadonlyMap<number, number>;

export type ResponseErrorKind =
  /** Shorter than the fixed overhead for the request kind */
  | "truncated"
  /** Declared lengths disagree with the buffer or the request */
  | "length"
  /** Prefix, header fields or action byte are wrong */
  | "framing"
  | "function"
  /** Serial, slave id or echoed register do not match the request */
  | "address"
  | "checksum"
  /** Device reported an exception */
  | "exception";

interface ResponseFields {
  functionCode?: number;
  address?: number;
  registers?: Map<number, number>;
  writtenCount?: number;
  errorKind?: ResponseErrorKind;
  reason?: string;
  exceptionCode?: number;
}

const EMPTY_REGISTERS: RegisterMap = new Map();

export class Response {
  public readonly raw: Buffer;
  public readonly frameLength: number;
  public readonly functionCode: number | undefined;
  public readonly address: number | undefined;
  public readonly errorKind: ResponseErrorKind | undefined;
  public readonly reason: string | undefined;
  public readonly exceptionCode: number | undefined;
  /** Number of registers a write acknowledged */
  public readonly writtenCount: number;
  private readonly values: RegisterMap;

  private constructor(raw: Buffer, fields: ResponseFields) {
    this.raw = raw;
    this.frameLength = raw.length;
    this.functionCode = fields.functionCode;
    this.address = fields.address;
    this.errorKind = fields.errorKind;
    this.reason = fields.reason;
    this.exceptionCode = fields.exceptionCode;
    this.writtenCount = fields.writtenCount ?? 0;
    this.values = fields.errorKind ? EMPTY_REGISTERS : fields.registers ?? EMPTY_REGISTERS;
  }

  static ok(raw: Buffer, fields: Omit<ResponseFields, "errorKind" | "reason">): Response {
    return new Response(raw, fields);
  }

  static failure(
    raw: Buffer,
    errorKind: ResponseErrorKind,
    reason: string,
    fields: Pick<ResponseFields, "functionCode" | "exceptionCode"> = {}
  ): Response {
    return new Response(raw, { ...fields, errorKind, reason });
  }

  isError(): boolean {
    return this.errorKind !== undefined;
  }

  /** Register address → raw 16-bit value. Empty when the response is errored. */
  registers(): RegisterMap {
    return this.values;
  }
}

// ---------- TCP ----------

function hasTcpPrefix(buffer: Buffer, offset = 0): boolean {
  return buffer[offset] === TCP_PREFIX[0] && buffer[offset + 1] === TCP_PREFIX[1];
}

function readSerial(frame: Buffer, offset: number): string {
  return frame.toString("ascii", offset, offset + SERIAL_LENGTH);
}

/** Validate one dongle frame that should answer `request` */
function parseTcpFrame(
  raw: Buffer,
  frame: Buffer,
  request: Request,
  identity: TcpIdentity
): Response {
  // Framing
  if (!hasTcpPrefix(frame)) {
    return Response.failure(raw, "framing", "Missing A1 1A packet prefix");
  }
  if (frame[7] !== TCP_FUNCTION_TRANSLATED_DATA) {
    return Response.failure(raw, "framing", `Unexpected TCP function 0x${frame[7].toString(16)}`);
  }
  if (frame[20] !== ACTION_RESPONSE) {
    return Response.failure(raw, "framing", `Unexpected action byte ${frame[20]}`);
  }

  // Declared lengths
  const declared = frame.readUInt16LE(4) + 6;
  if (declared !== frame.length) {
    return Response.failure(
      raw,
      "length",
      `Declared frame length ${declared} does not match ${frame.length} bytes received`
    );
  }
  const dataLength = frame.readUInt16LE(18) + TCP_HEADER_LENGTH;
  if (dataLength !== frame.length) {
    return Response.failure(
      raw,
      "length",
      `Declared data length ${dataLength - TCP_HEADER_LENGTH} does not match frame`
    );
  }

  // Function code
  const functionCode = frame[21];
  const isException = functionCode === exceptionFunctionCode(request);
  if (!isException && functionCode !== request.functionCode) {
    return Response.failure(
      raw,
      "function",
      `Function code ${functionCode} does not match request function ${request.functionCode}`,
      { functionCode }
    );
  }
  if (isException) {
    if (frame.length !== RESPONSE_OVERHEAD) {
      return Response.failure(raw, "length", "Exception frame has unexpected length", { functionCode });
    }
  } else if (request.kind === "read") {
    const valueLength = frame[34];
    if (valueLength !== request.count * 2 || frame.length !== RESPONSE_OVERHEAD + valueLength) {
      return Response.failure(
        raw,
        "length",
        `Payload of ${valueLength} bytes does not cover ${request.count} registers`,
        { functionCode }
      );
    }
  } else if (frame.length !== WRITE_MULTIPLE_RESPONSE_LENGTH) {
    return Response.failure(raw, "length", "Write acknowledgement has unexpected length", {
      functionCode,
    });
  }

  // Addressing
  const dongleSerial = readSerial(frame, 8);
  if (dongleSerial !== identity.dongleSerial) {
    return Response.failure(raw, "address", `Response from dongle ${dongleSerial}`, { functionCode });
  }
  const inverterSerial = readSerial(frame, 22);
  if (inverterSerial !== identity.inverterSerial) {
    return Response.failure(raw, "address", `Response from inverter ${inverterSerial}`, {
      functionCode,
    });
  }
  const address = frame.readUInt16LE(32);
  if (address !== request.address) {
    return Response.failure(
      raw,
      "address",
      `Response starts at register ${address}, requested ${request.address}`,
      { functionCode }
    );
  }

  // Checksum
  const crc = crc16(frame.subarray(TCP_HEADER_LENGTH, frame.length - 2));
  if (crc !== frame.readUInt16LE(frame.length - 2)) {
    return Response.failure(raw, "checksum", "Data frame CRC mismatch", { functionCode });
  }

  if (isException) {
    const exceptionCode = frame[34];
    return Response.failure(raw, "exception", `Device exception: ${exceptionName(exceptionCode)}`, {
      functionCode,
      exceptionCode,
    });
  }

  const registers = new Map<number, number>();
  let writtenCount = 0;
  switch (request.kind) {
    case "read":
      for (let i = 0; i < request.count; i++) {
        registers.set(address + i, frame.readUInt16LE(35 + i * 2));
      }
      break;
    case "writeSingle":
      registers.set(address, frame.readUInt16LE(34));
      writtenCount = 1;
      break;
    case "writeMultiple":
      writtenCount = frame.readUInt16LE(34);
      if (writtenCount !== request.values.length) {
        return Response.failure(
          raw,
          "length",
          `Acknowledged ${writtenCount} registers, wrote ${request.values.length}`,
          { functionCode }
        );
      }
      break;
  }
  return Response.ok(raw, { functionCode, address, registers, writtenCount });
}

const ECHO_LENGTH = WRITE_RESPONSE_LENGTH / 2;

/**
 * Length of the reply to a TCP single write: the dongle's echo of the request
 * followed by either the acknowledgement or a 37 byte exception frame.
 * Undefined until the function code of the second frame has arrived.
 */
function singleWriteReplyLength(buffer: Buffer, request: Request): number | undefined {
  const functionOffset = ECHO_LENGTH + 21;
  if (buffer.length <= functionOffset) return undefined;
  return buffer[functionOffset] === exceptionFunctionCode(request)
    ? ECHO_LENGTH + RESPONSE_OVERHEAD
    : WRITE_RESPONSE_LENGTH;
}

function parseTcp(buffer: Buffer, request: Request, identity: TcpIdentity): Response {
  if (request.kind === "writeSingle") {
    // The dongle echoes the request before the inverter's reply
    const expected = singleWriteReplyLength(buffer, request) ?? WRITE_RESPONSE_LENGTH;
    if (buffer.length !== expected) {
      return Response.failure(
        buffer,
        buffer.length < expected ? "truncated" : "length",
        `Single write acknowledgement must be ${expected} bytes, got ${buffer.length}`
      );
    }
    if (!hasTcpPrefix(buffer) || buffer.readUInt16LE(4) + 6 !== ECHO_LENGTH) {
      return Response.failure(buffer, "framing", "Single write acknowledgement lacks request echo");
    }
    return parseTcpFrame(buffer, buffer.subarray(ECHO_LENGTH), request, identity);
  }

  if (buffer.length < RESPONSE_OVERHEAD) {
    return Response.failure(
      buffer,
      "truncated",
      `Response of ${buffer.length} bytes is shorter than the ${RESPONSE_OVERHEAD} byte minimum`
    );
  }
  return parseTcpFrame(buffer, buffer, request, identity);
}

// ---------- RTU ----------

function parseRtu(buffer: Buffer, request: Request, identity: RtuIdentity): Response {
  if (buffer.length < RTU_RESPONSE_OVERHEAD) {
    return Response.failure(
      buffer,
      "truncated",
      `Response of ${buffer.length} bytes is shorter than the ${RTU_RESPONSE_OVERHEAD} byte minimum`
    );
  }

  const functionCode = buffer[1];
  const isException = functionCode === exceptionFunctionCode(request);
  const expectedLength = isException
    ? RTU_RESPONSE_OVERHEAD
    : request.kind === "read"
      ? RTU_RESPONSE_OVERHEAD + request.count * 2
      : RTU_WRITE_RESPONSE_LENGTH;
  if (buffer.length !== expectedLength) {
    return Response.failure(
      buffer,
      "length",
      `Expected ${expectedLength} bytes, got ${buffer.length}`,
      { functionCode }
    );
  }
  if (!isException && request.kind === "read" && buffer[2] !== request.count * 2) {
    return Response.failure(
      buffer,
      "length",
      `Byte count ${buffer[2]} does not cover ${request.count} registers`,
      { functionCode }
    );
  }

  if (!isException && functionCode !== request.functionCode) {
    return Response.failure(
      buffer,
      "function",
      `Function code ${functionCode} does not match request function ${request.functionCode}`,
      { functionCode }
    );
  }

  if (buffer[0] !== identity.slaveId) {
    return Response.failure(buffer, "address", `Response from slave ${buffer[0]}`, { functionCode });
  }
  if (!isException && request.kind !== "read" && buffer.readUInt16BE(2) !== request.address) {
    return Response.failure(
      buffer,
      "address",
      `Acknowledged register ${buffer.readUInt16BE(2)}, requested ${request.address}`,
      { functionCode }
    );
  }

  if (!verifyCrc(buffer)) {
    return Response.failure(buffer, "checksum", "Modbus RTU CRC mismatch", { functionCode });
  }

  if (isException) {
    const exceptionCode = buffer[2];
    return Response.failure(buffer, "exception", `Device exception: ${exceptionName(exceptionCode)}`, {
      functionCode,
      exceptionCode,
    });
  }

  const registers = new Map<number, number>();
  switch (request.kind) {
    case "read":
      for (let i = 0; i < request.count; i++) {
        registers.set(request.address + i, buffer.readUInt16BE(3 + i * 2));
      }
      return Response.ok(buffer, { functionCode, address: request.address, registers });
    case "writeSingle":
      registers.set(request.address, buffer.readUInt16BE(4));
      return Response.ok(buffer, {
        functionCode,
        address: request.address,
        registers,
        writtenCount: 1,
      });
    case "writeMultiple": {
      const writtenCount = buffer.readUInt16BE(4);
      if (writtenCount !== request.values.length) {
        return Response.failure(
          buffer,
          "length",
          `Acknowledged ${writtenCount} registers, wrote ${request.values.length}`,
          { functionCode }
        );
      }
      return Response.ok(buffer, { functionCode, address: request.address, writtenCount });
    }
  }
}

// ---------- Public API ----------

/**
 * Parse a complete response buffer for `request`.
 *
 * Checks run in order: minimum length, declared lengths, function code,
 * addressing (serials / slave id and echoed register), checksum.
 */
export function parseResponse(
  buffer: Buffer,
  request: Request,
  identity: DeviceIdentity
): Response {
  return identity.protocol === "tcp"
    ? parseTcp(buffer, request, identity)
    : parseRtu(buffer, request, identity);
}

export type FrameMeasure =
  | { status: "incomplete" }
  | { status: "invalid"; reason: string }
  | { status: "complete"; length: number };

/**
 * Determine the length of the frame starting at offset 0 of `buffer`,
 * without validating its contents.
 */
export function measureFrame(
  buffer: Buffer,
  request: Request,
  identity: DeviceIdentity
): FrameMeasure {
  if (buffer.length === 0) return { status: "incomplete" };

  if (identity.protocol === "tcp") {
    if (buffer[0] !== TCP_PREFIX[0] || (buffer.length > 1 && buffer[1] !== TCP_PREFIX[1])) {
      return { status: "invalid", reason: "no packet prefix" };
    }
    if (buffer.length < 6) return { status: "incomplete" };
    if (request.kind === "writeSingle") {
      const length = singleWriteReplyLength(buffer, request);
      return length === undefined ? { status: "incomplete" } : { status: "complete", length };
    }
    const declared = buffer.readUInt16LE(4) + 6;
    if (declared < RESPONSE_OVERHEAD || declared > MAX_PACKET_SIZE) {
      return { status: "invalid", reason: `implausible frame length ${declared}` };
    }
    return { status: "complete", length: declared };
  }

  if (buffer[0] !== identity.slaveId) {
    return { status: "invalid", reason: `unexpected slave id ${buffer[0]}` };
  }
  if (buffer.length < 2) return { status: "incomplete" };
  if (buffer[1] === exceptionFunctionCode(request)) {
    return { status: "complete", length: RTU_RESPONSE_OVERHEAD };
  }
  if (buffer[1] !== request.functionCode) {
    return { status: "invalid", reason: `unexpected function code ${buffer[1]}` };
  }
  if (request.kind !== "read") {
    return { status: "complete", length: RTU_WRITE_RESPONSE_LENGTH };
  }
  if (buffer.length < 3) return { status: "incomplete" };
  if (buffer[2] !== request.count * 2) {
    return { status: "invalid", reason: `unexpected byte count ${buffer[2]}` };
  }
  return { status: "complete", length: RTU_RESPONSE_OVERHEAD + request.count * 2 };
}

/**
 * Index of the next position at or after `from` where a response frame
 * could begin. Returns `buffer.length` when there is none.
 */
export function findFrameStart(
  buffer: Buffer,
  from: number,
  request: Request,
  identity: DeviceIdentity
): number {
  for (let i = from; i < buffer.length; i++) {
    const last = i + 1 === buffer.length;
    if (identity.protocol === "tcp") {
      if (buffer[i] === TCP_PREFIX[0] && (last || buffer[i + 1] === TCP_PREFIX[1])) {
        return i;
      }
    } else if (
      buffer[i] === identity.slaveId &&
      (last ||
        buffer[i + 1] === request.functionCode ||
        buffer[i + 1] === exceptionFunctionCode(request))
    ) {
      return i;
    }
  }
  return buffer.length;
}
