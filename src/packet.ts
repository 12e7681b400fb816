/**
 * Request construction for both wire variants.
 *
 * A TCP request is a LuxPower dongle packet: a 20 byte header addressed to
 * the dongle, wrapping a data frame addressed to the inverter serial and
 * protected by CRC-16/Modbus. An RTU request is a plain Modbus RTU frame.
 */

import {
  ACTION_REQUEST,
  EXCEPTION_FLAG,
  FunctionCode,
  MAX_PACKET_SIZE,
  MAX_READ_COUNT,
  MAX_SLAVE_ID,
  MAX_WRITE_COUNT,
  MIN_SLAVE_ID,
  RESPONSE_OVERHEAD,
  RTU_RESPONSE_OVERHEAD,
  RTU_WRITE_RESPONSE_LENGTH,
  SERIAL_LENGTH,
  TCP_ADDRESS,
  TCP_FUNCTION_TRANSLATED_DATA,
  TCP_HEADER_LENGTH,
  TCP_PREFIX,
  WRITE_MULTIPLE_RESPONSE_LENGTH,
  WRITE_RESPONSE_LENGTH,
  type ReadFunctionCode,
} from "./constants.js";
import { InvalidRequestParameters } from "./errors.js";
import {
  getCrc,
  rtuReadRegisters,
  rtuWriteMultipleRegisters,
  rtuWriteSingleRegister,
} from "./modbus.js";

// ---------- Addressing ----------

export interface TcpIdentity {
  protocol: "tcp";
  dongleSerial: string;
  inverterSerial: string;
}

export interface RtuIdentity {
  protocol: "rtu";
  slaveId: number;
}

export type DeviceIdentity = TcpIdentity | RtuIdentity;

// ---------- Requests ----------

export interface ReadRequest {
  kind: "read";
  functionCode: ReadFunctionCode;
  address: number;
  count: number;
}

export interface WriteSingleRequest {
  kind: "writeSingle";
  functionCode: typeof FunctionCode.WRITE_SINGLE;
  address: number;
  value: number;
}

export interface WriteMultipleRequest {
  kind: "writeMultiple";
  functionCode: typeof FunctionCode.WRITE_MULTIPLE;
  address: number;
  values: readonly number[];
}

export type Request = ReadRequest | WriteSingleRequest | WriteMultipleRequest;

export function readRequest(
  address: number,
  count: number,
  functionCode: ReadFunctionCode = FunctionCode.READ_HOLDING
): ReadRequest {
  return { kind: "read", functionCode, address, count };
}

/** One value is written with function 6, several with function 16 */
export function writeRequest(
  address: number,
  values: readonly number[]
): WriteSingleRequest | WriteMultipleRequest {
  if (values.length === 1) {
    return {
      kind: "writeSingle",
      functionCode: FunctionCode.WRITE_SINGLE,
      address,
      value: values[0],
    };
  }
  return {
    kind: "writeMultiple",
    functionCode: FunctionCode.WRITE_MULTIPLE,
    address,
    values: [...values],
  };
}

export function describeRequest(request: Request): string {
  switch (request.kind) {
    case "read":
      return `read fc=${request.functionCode} @${request.address} x${request.count}`;
    case "writeSingle":
      return `write @${request.address} = ${request.value}`;
    case "writeMultiple":
      return `write @${request.address} x${request.values.length}`;
  }
}

// ---------- Validation ----------

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

export function isValidSerial(serial: string): boolean {
  return serial.length === SERIAL_LENGTH && PRINTABLE_ASCII.test(serial);
}

export function isValidSlaveId(slaveId: number): boolean {
  return Number.isInteger(slaveId) && slaveId >= MIN_SLAVE_ID && slaveId <= MAX_SLAVE_ID;
}

function isWord(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

function validateIdentity(identity: DeviceIdentity): void {
  if (identity.protocol === "tcp") {
    if (!isValidSerial(identity.dongleSerial)) {
      throw new InvalidRequestParameters(
        `Dongle serial must be exactly ${SERIAL_LENGTH} ASCII characters, got "${identity.dongleSerial}"`
      );
    }
    if (!isValidSerial(identity.inverterSerial)) {
      throw new InvalidRequestParameters(
        `Inverter serial must be exactly ${SERIAL_LENGTH} ASCII characters, got "${identity.inverterSerial}"`
      );
    }
  } else if (!isValidSlaveId(identity.slaveId)) {
    throw new InvalidRequestParameters(
      `Slave id must be an integer in ${MIN_SLAVE_ID}-${MAX_SLAVE_ID}, got ${identity.slaveId}`
    );
  }
}

/** Size of the frame the device answers a request with */
export function expectedResponseLength(
  identity: DeviceIdentity,
  request: Request
): number {
  const tcp = identity.protocol === "tcp";
  switch (request.kind) {
    case "read":
      return (tcp ? RESPONSE_OVERHEAD : RTU_RESPONSE_OVERHEAD) + request.count * 2;
    case "writeSingle":
      return tcp ? WRITE_RESPONSE_LENGTH : RTU_WRITE_RESPONSE_LENGTH;
    case "writeMultiple":
      return tcp ? WRITE_MULTIPLE_RESPONSE_LENGTH : RTU_WRITE_RESPONSE_LENGTH;
  }
}

function requestCount(request: Request): number {
  switch (request.kind) {
    case "read":
      return request.count;
    case "writeSingle":
      return 1;
    case "writeMultiple":
      return request.values.length;
  }
}

function validateRequest(identity: DeviceIdentity, request: Request): void {
  if (!isWord(request.address)) {
    throw new InvalidRequestParameters(
      `Register address must be an integer in 0-65535, got ${request.address}`
    );
  }
  const count = requestCount(request);
  if (request.kind === "read") {
    if (!Number.isInteger(count) || count < 1 || count > MAX_READ_COUNT) {
      throw new InvalidRequestParameters(
        `Register count must be an integer in 1-${MAX_READ_COUNT}, got ${count}`
      );
    }
  } else if (request.kind === "writeMultiple" && (count < 1 || count > MAX_WRITE_COUNT)) {
    throw new InvalidRequestParameters(
      `Write count must be in 1-${MAX_WRITE_COUNT}, got ${count}`
    );
  }
  const values =
    request.kind === "writeSingle"
      ? [request.value]
      : request.kind === "writeMultiple"
        ? request.values
        : [];
  for (const value of values) {
    if (!isWord(value)) {
      throw new InvalidRequestParameters(
        `Register value must be an integer in 0-65535, got ${value}`
      );
    }
  }
  if (request.address + count - 1 > 0xffff) {
    throw new InvalidRequestParameters(
      `Register range ${request.address}+${count} runs past 65535`
    );
  }
  if (expectedResponseLength(identity, request) > MAX_PACKET_SIZE) {
    throw new InvalidRequestParameters(
      `Response to ${describeRequest(request)} would exceed ${MAX_PACKET_SIZE} bytes`
    );
  }
}

// ---------- TCP encoding ----------

function tcpDataBody(request: Request): Buffer {
  if (request.kind === "writeMultiple") {
    const quantity = request.values.length;
    const body = Buffer.alloc(5 + quantity * 2);
    body.writeUInt16LE(request.address, 0);
    body.writeUInt16LE(quantity, 2);
    body[4] = quantity * 2;
    request.values.forEach((value, i) => body.writeUInt16LE(value, 5 + i * 2));
    return body;
  }
  const body = Buffer.alloc(4);
  body.writeUInt16LE(request.address, 0);
  body.writeUInt16LE(request.kind === "read" ? request.count : request.value, 2);
  return body;
}

/** Construct the inverter data frame carried inside a dongle packet */
function tcpDataFrame(inverterSerial: string, request: Request): Buffer {
  const body = tcpDataBody(request);
  const frame = Buffer.concat([
    Buffer.from([ACTION_REQUEST, request.functionCode]),
    Buffer.from(inverterSerial, "ascii"),
    body,
  ]);
  return Buffer.concat([frame, getCrc(frame)]);
}

/** Construct the 20 byte dongle header */
function tcpHeader(
  protocol: number,
  totalLength: number,
  dongleSerial: string
): Buffer {
  const header = Buffer.alloc(TCP_HEADER_LENGTH);
  TCP_PREFIX.copy(header, 0);
  header.writeUInt16LE(protocol, 2);
  header.writeUInt16LE(totalLength - 6, 4);
  header[6] = TCP_ADDRESS;
  header[7] = TCP_FUNCTION_TRANSLATED_DATA;
  header.write(dongleSerial, 8, SERIAL_LENGTH, "ascii");
  header.writeUInt16LE(totalLength - TCP_HEADER_LENGTH, 18);
  return header;
}

function encodeTcp(identity: TcpIdentity, request: Request): Buffer {
  const dataFrame = tcpDataFrame(identity.inverterSerial, request);
  // Protocol 2 announces a data frame that carries its own byte count
  const protocol = request.kind === "writeMultiple" ? 2 : 1;
  const header = tcpHeader(
    protocol,
    TCP_HEADER_LENGTH + dataFrame.length,
    identity.dongleSerial
  );
  return Buffer.concat([header, dataFrame]);
}

// ---------- RTU encoding ----------

function encodeRtu(identity: RtuIdentity, request: Request): Buffer {
  switch (request.kind) {
    case "read":
      return rtuReadRegisters(
        identity.slaveId,
        request.functionCode,
        request.address,
        request.count
      );
    case "writeSingle":
      return rtuWriteSingleRegister(identity.slaveId, request.address, request.value);
    case "writeMultiple":
      return rtuWriteMultipleRegisters(identity.slaveId, request.address, request.values);
  }
}

// ---------- Public API ----------

/**
 * Encode a request for the wire variant of the given identity.
 * Throws InvalidRequestParameters before producing any bytes.
 */
export function encodeRequest(identity: DeviceIdentity, request: Request): Buffer {
  validateIdentity(identity);
  validateRequest(identity, request);
  return identity.protocol === "tcp"
    ? encodeTcp(identity, request)
    : encodeRtu(identity, request);
}

export function buildReadRequest(
  identity: DeviceIdentity,
  startAddress: number,
  count: number,
  functionCode: ReadFunctionCode = FunctionCode.READ_HOLDING
): Buffer {
  return encodeRequest(identity, readRequest(startAddress, count, functionCode));
}

export function buildWriteRequest(
  identity: DeviceIdentity,
  address: number,
  values: readonly number[]
): Buffer {
  return encodeRequest(identity, writeRequest(address, values));
}

/** Function code a device uses to report an exception for this request */
export function exceptionFunctionCode(request: Request): number {
  return request.functionCode | EXCEPTION_FLAG;
}
