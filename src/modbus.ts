/**
 * Modbus primitives shared by both wire variants.
 *
 *   - CRC-16/Modbus, used as the RTU frame trailer and as the checksum of
 *     the data frame inside a dongle (TCP) packet
 *   - Plain Modbus RTU request frames for function codes 3, 4, 6 and 16
 */

// ---------- CRC-16/Modbus lookup table ----------

const CRC_TABLE = new Uint16Array(256);
for (let i = 0; i < 256; i++) {
  let crc = i;
  for (let j = 0; j < 8; j++) {
    crc = crc & 1 ? (crc >>> 1) ^ 0xa001 : crc >>> 1;
  }
  CRC_TABLE[i] = crc;
}

/** Calculate CRC-16/Modbus over the given bytes. */
export function crc16(data: Buffer): number {
  let crc = 0xffff;
  for (let i = 0; i < data.length; i++) {
    crc = (crc >>> 8) ^ CRC_TABLE[(crc ^ data[i]) & 0xff];
  }
  return crc;
}

/** Return a 2-byte little-endian Buffer containing the CRC. */
export function getCrc(data: Buffer): Buffer {
  const buf = Buffer.alloc(2);
  buf.writeUInt16LE(crc16(data), 0);
  return buf;
}

/** Append CRC-16 to the given data and return the new buffer. */
export function addCrc(data: Buffer): Buffer {
  return Buffer.concat([data, getCrc(data)]);
}

/** Verify the trailing little-endian CRC of a frame. */
export function verifyCrc(frame: Buffer): boolean {
  if (frame.length < 4) return false;
  const payload = frame.subarray(0, frame.length - 2);
  return frame.readUInt16LE(frame.length - 2) === crc16(payload);
}

// ---------- Modbus exception mapping ----------

export const MODBUS_EXCEPTION_NAMES: Record<number, string> = {
  1: "IllegalFunction",
  2: "IllegalDataAddress",
  3: "IllegalDataValue",
  4: "ServerDeviceFailure",
  5: "Acknowledge",
  6: "ServerDeviceBusy",
};

export function exceptionName(code: number): string {
  return MODBUS_EXCEPTION_NAMES[code] ?? `UnknownException(${code})`;
}

// ---------- RTU request frames ----------

function buildRtuFrame(slaveId: number, functionCode: number, data: Buffer): Buffer {
  const pdu = Buffer.alloc(2 + data.length);
  pdu[0] = slaveId;
  pdu[1] = functionCode;
  data.copy(pdu, 2);
  return addCrc(pdu);
}

/** FC 3 / FC 4 – Read Holding / Input Registers */
export function rtuReadRegisters(
  slaveId: number,
  functionCode: number,
  startAddr: number,
  quantity: number
): Buffer {
  const data = Buffer.alloc(4);
  data.writeUInt16BE(startAddr, 0);
  data.writeUInt16BE(quantity, 2);
  return buildRtuFrame(slaveId, functionCode, data);
}

/** FC 6 – Write Single Register */
export function rtuWriteSingleRegister(
  slaveId: number,
  addr: number,
  value: number
): Buffer {
  const data = Buffer.alloc(4);
  data.writeUInt16BE(addr, 0);
  data.writeUInt16BE(value, 2);
  return buildRtuFrame(slaveId, 0x06, data);
}

/** FC 16 – Write Multiple Registers */
export function rtuWriteMultipleRegisters(
  slaveId: number,
  startAddr: number,
  values: readonly number[]
): Buffer {
  const quantity = values.length;
  const data = Buffer.alloc(5 + quantity * 2);
  data.writeUInt16BE(startAddr, 0);
  data.writeUInt16BE(quantity, 2);
  data[4] = quantity * 2;
  for (let i = 0; i < quantity; i++) {
    data.writeUInt16BE(values[i], 5 + i * 2);
  }
  return buildRtuFrame(slaveId, 0x10, data);
}
