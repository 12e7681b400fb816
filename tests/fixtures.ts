/**
 * Device-side frame builders and an in-memory transport for tests.
 */

import { addCrc, getCrc } from "../src/modbus.js";
import {
  encodeRequest,
  type DeviceIdentity,
  type Request,
  type RtuIdentity,
  type TcpIdentity,
} from "../src/packet.js";
import type { Transport } from "../src/session.js";

export const TCP_IDENTITY: TcpIdentity = {
  protocol: "tcp",
  dongleSerial: "BA12345678",
  inverterSerial: "CD12345678",
};

export const RTU_IDENTITY: RtuIdentity = { protocol: "rtu", slaveId: 1 };

// ---------- TCP (dongle) responses ----------

function tcpPacket(dongleSerial: string, data: Buffer): Buffer {
  const dataFrame = Buffer.concat([data, getCrc(data)]);
  const total = 20 + dataFrame.length;
  const header = Buffer.alloc(20);
  header[0] = 0xa1;
  header[1] = 0x1a;
  header.writeUInt16LE(1, 2);
  header.writeUInt16LE(total - 6, 4);
  header[6] = 0x01;
  header[7] = 0xc2;
  header.write(dongleSerial, 8, 10, "ascii");
  header.writeUInt16LE(total - 20, 18);
  return Buffer.concat([header, dataFrame]);
}

function tcpDataHead(identity: TcpIdentity, functionCode: number, address: number): Buffer {
  const head = Buffer.alloc(14);
  head[0] = 0x01;
  head[1] = functionCode;
  head.write(identity.inverterSerial, 2, 10, "ascii");
  head.writeUInt16LE(address, 12);
  return head;
}

export function tcpReadResponse(
  identity: TcpIdentity,
  functionCode: number,
  address: number,
  values: readonly number[]
): Buffer {
  const payload = Buffer.alloc(1 + values.length * 2);
  payload[0] = values.length * 2;
  values.forEach((value, i) => payload.writeUInt16LE(value, 1 + i * 2));
  return tcpPacket(
    identity.dongleSerial,
    Buffer.concat([tcpDataHead(identity, functionCode, address), payload])
  );
}

export function tcpExceptionResponse(
  identity: TcpIdentity,
  functionCode: number,
  address: number,
  exceptionCode: number
): Buffer {
  return tcpPacket(
    identity.dongleSerial,
    Buffer.concat([
      tcpDataHead(identity, functionCode | 0x80, address),
      Buffer.from([exceptionCode]),
    ])
  );
}

/** Dongle echo of the request followed by the inverter acknowledgement */
export function tcpWriteSingleAck(identity: TcpIdentity, address: number, value: number): Buffer {
  const echo = encodeRequest(identity, {
    kind: "writeSingle",
    functionCode: 6,
    address,
    value,
  });
  const word = Buffer.alloc(2);
  word.writeUInt16LE(value, 0);
  const ack = tcpPacket(
    identity.dongleSerial,
    Buffer.concat([tcpDataHead(identity, 6, address), word])
  );
  return Buffer.concat([echo, ack]);
}

export function tcpWriteMultipleAck(identity: TcpIdentity, address: number, count: number): Buffer {
  const word = Buffer.alloc(2);
  word.writeUInt16LE(count, 0);
  return tcpPacket(
    identity.dongleSerial,
    Buffer.concat([tcpDataHead(identity, 0x10, address), word])
  );
}

// ---------- RTU responses ----------

export function rtuReadResponse(
  slaveId: number,
  functionCode: number,
  values: readonly number[]
): Buffer {
  const pdu = Buffer.alloc(3 + values.length * 2);
  pdu[0] = slaveId;
  pdu[1] = functionCode;
  pdu[2] = values.length * 2;
  values.forEach((value, i) => pdu.writeUInt16BE(value, 3 + i * 2));
  return addCrc(pdu);
}

export function rtuExceptionResponse(
  slaveId: number,
  functionCode: number,
  exceptionCode: number
): Buffer {
  return addCrc(Buffer.from([slaveId, functionCode | 0x80, exceptionCode]));
}

export function rtuWriteAck(
  slaveId: number,
  functionCode: number,
  address: number,
  word: number
): Buffer {
  const pdu = Buffer.alloc(6);
  pdu[0] = slaveId;
  pdu[1] = functionCode;
  pdu.writeUInt16BE(address, 2);
  pdu.writeUInt16BE(word, 4);
  return addCrc(pdu);
}

// ---------- Simulated inverter ----------

export interface RegisterBanks {
  hold: Map<number, number>;
  input: Map<number, number>;
}

/** Register value for reads of addresses nothing was stored at */
export function defaultRegisterValue(address: number): number {
  return address;
}

/** Answer `request` the way an inverter holding `banks` would */
export function answer(identity: DeviceIdentity, request: Request, banks: RegisterBanks): Buffer {
  switch (request.kind) {
    case "read": {
      const bank = request.functionCode === 3 ? banks.hold : banks.input;
      const values: number[] = [];
      for (let i = 0; i < request.count; i++) {
        const address = request.address + i;
        values.push(bank.get(address) ?? defaultRegisterValue(address));
      }
      return identity.protocol === "tcp"
        ? tcpReadResponse(identity, request.functionCode, request.address, values)
        : rtuReadResponse(identity.slaveId, request.functionCode, values);
    }
    case "writeSingle":
      banks.hold.set(request.address, request.value);
      return identity.protocol === "tcp"
        ? tcpWriteSingleAck(identity, request.address, request.value)
        : rtuWriteAck(identity.slaveId, 6, request.address, request.value);
    case "writeMultiple":
      request.values.forEach((value, i) => banks.hold.set(request.address + i, value));
      return identity.protocol === "tcp"
        ? tcpWriteMultipleAck(identity, request.address, request.values.length)
        : rtuWriteAck(identity.slaveId, 0x10, request.address, request.values.length);
  }
}

export interface ExchangeRecord {
  packet: Buffer;
  request: Request;
  timeoutMs: number;
}

export type Responder = (request: Request, packet: Buffer) => Buffer | Error;

/** In-memory transport: each exchange is answered by `responder` */
export class FakeTransport implements Transport {
  readonly description = "fake";
  readonly exchanges: ExchangeRecord[] = [];
  connects = 0;
  closes = 0;
  private connected = false;

  constructor(private readonly responder: Responder) {}

  get isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    this.connects++;
    this.connected = true;
  }

  async close(): Promise<void> {
    this.closes++;
    this.connected = false;
  }

  async exchange(packet: Buffer, request: Request, timeoutMs: number): Promise<Buffer> {
    this.exchanges.push({ packet, request, timeoutMs });
    const result = this.responder(request, packet);
    if (result instanceof Error) throw result;
    return result;
  }
}
