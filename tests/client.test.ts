import { describe, it, expect, beforeEach } from "vitest";
import { InverterClient, createClient, createTransport, probeModel } from "../src/client.js";
import { createConfig, type ConfigInput, type InverterConfig } from "../src/config.js";
import { FunctionCode } from "../src/constants.js";
import { DeviceUnreachable, InvalidRequestParameters, ProtocolError } from "../src/errors.js";
import { readRequest, type Request } from "../src/packet.js";
import type { SerialLink } from "../src/rtu.js";
import {
  FakeTransport,
  RTU_IDENTITY,
  TCP_IDENTITY,
  answer,
  tcpExceptionResponse,
  tcpReadResponse,
  type RegisterBanks,
} from "./fixtures.js";

function configFor(input: ConfigInput = {}): InverterConfig {
  const result = createConfig({
    host: "10.0.0.5",
    dongleSerial: "BA12345678",
    inverterSerial: "CD12345678",
    ...input,
  });
  if (!result.ok) throw new Error(result.issues.map((issue) => issue.message).join("; "));
  return result.config;
}

/** Registers 7-8 holding the device type code "FAAB" */
function storeModel(banks: RegisterBanks): void {
  banks.hold.set(7, 0x4146);
  banks.hold.set(8, 0x4241);
}

function reads(transport: FakeTransport): Array<[number, number, number]> {
  return transport.exchanges.flatMap(({ request }): Array<[number, number, number]> =>
    request.kind === "read" ? [[request.functionCode, request.address, request.count]] : []
  );
}

describe("InverterClient", () => {
  let banks: RegisterBanks;
  let transport: FakeTransport;
  let client: InverterClient;

  beforeEach(() => {
    banks = { hold: new Map(), input: new Map() };
    transport = new FakeTransport((request) => answer(TCP_IDENTITY, request, banks));
    client = createClient(configFor(), { transport });
  });

  it("reads a register range from the selected bank", async () => {
    banks.input.set(1, 42);
    const registers = await client.readRegisters("input", 0, 3);

    expect([...registers]).toEqual([
      [0, 0],
      [1, 42],
      [2, 2],
    ]);
    expect(transport.exchanges).toHaveLength(1);
    expect(transport.exchanges[0].packet[21]).toBe(FunctionCode.READ_INPUT);
    expect(transport.exchanges[0].timeoutMs).toBe(5000);
  });

  it("reads a whole bank in blocks of at most 125 registers", async () => {
    const registers = await client.readBank("hold");

    expect(registers.size).toBe(300);
    expect(registers.get(299)).toBe(299);
    expect(reads(transport)).toEqual([
      [3, 0, 125],
      [3, 125, 125],
      [3, 250, 50],
    ]);
  });

  it("uses the configured legacy block size", async () => {
    const legacy = createClient(configFor({ registerBlockSize: 40 }), { transport });
    await legacy.readBank("input");

    const counts = reads(transport).map(([, , count]) => count);
    expect(counts).toEqual([40, 40, 40, 40, 40, 40, 40, 20]);
  });

  it("writes a single register", async () => {
    await expect(client.writeRegister(21, 0x1234)).resolves.toBe(1);
    expect(banks.hold.get(21)).toBe(0x1234);
    expect(transport.exchanges[0].request.kind).toBe("writeSingle");
  });

  it("writes several registers with one request", async () => {
    await expect(client.writeRegisters(100, [1, 2, 3])).resolves.toBe(3);
    expect(transport.exchanges).toHaveLength(1);
    expect(transport.exchanges[0].request.kind).toBe("writeMultiple");
    expect(banks.hold.get(102)).toBe(3);
  });

  it("refuses writes on a read-only connection", async () => {
    const readOnly = createClient(configFor({ readOnly: true }), { transport });

    await expect(readOnly.writeRegister(21, 1)).rejects.toThrow(
      new InvalidRequestParameters("Refusing to write register 21: connection is read-only")
    );
    expect(transport.exchanges).toHaveLength(0);
  });

  it("refuses an empty write", async () => {
    await expect(client.writeRegisters(21, [])).rejects.toThrow("At least one value is required");
  });

  it("raises ProtocolError for device exceptions", async () => {
    const rejecting = new FakeTransport(() => tcpExceptionResponse(TCP_IDENTITY, 3, 0, 2));
    const rejected = createClient(configFor(), { transport: rejecting });

    const err = await rejected.readRegisters("hold", 0, 2).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProtocolError);
    if (!(err instanceof ProtocolError)) return;
    expect(err.message).toBe("read fc=3 @0 x2 rejected: IllegalDataAddress (code 2)");
    expect(err.exceptionCode).toBe(2);
  });

  it("raises ProtocolError for responses addressed elsewhere", async () => {
    const other = { ...TCP_IDENTITY, inverterSerial: "XX00000000" };
    const stray = new FakeTransport(() => tcpReadResponse(other, 3, 0, [1]));
    const confused = createClient(configFor(), { transport: stray });

    await expect(confused.readRegisters("hold", 0, 1)).rejects.toThrow(
      new ProtocolError("read fc=3 @0 x1 rejected: Response from inverter XX00000000")
    );
  });

  it("runs exchanges one at a time", async () => {
    let active = 0;
    let maxActive = 0;
    const order: number[] = [];
    const slow = new FakeTransport((request) => answer(TCP_IDENTITY, request, banks));
    const exchange = slow.exchange.bind(slow);
    slow.exchange = async (packet: Buffer, request: Request, timeoutMs: number) => {
      active++;
      maxActive = Math.max(maxActive, active);
      order.push(request.address);
      await new Promise((resolve) => setTimeout(resolve, 5));
      try {
        return await exchange(packet, request, timeoutMs);
      } finally {
        active--;
      }
    };
    const queued = createClient(configFor(), { transport: slow });

    await Promise.all([
      queued.readRegisters("hold", 0, 1),
      queued.readRegisters("hold", 10, 1),
      queued.writeRegister(20, 1),
    ]);
    expect(maxActive).toBe(1);
    expect(order).toEqual([0, 10, 20]);
  });

  it("keeps serving after a failed exchange", async () => {
    const flaky = new FakeTransport((request) =>
      request.address === 0
        ? tcpExceptionResponse(TCP_IDENTITY, 3, 0, 4)
        : answer(TCP_IDENTITY, request, banks)
    );
    const resilient = createClient(configFor(), { transport: flaky });

    const [first, second] = await Promise.allSettled([
      resilient.readRegisters("hold", 0, 1),
      resilient.readRegisters("hold", 5, 1),
    ]);
    expect(first.status).toBe("rejected");
    expect(second).toEqual({ status: "fulfilled", value: new Map([[5, 5]]) });
  });

  it("reads the device type code", async () => {
    storeModel(banks);
    await expect(client.readModel()).resolves.toBe("FAAB");
    expect(reads(transport)).toEqual([[3, 7, 2]]);
  });
});

describe("createTransport", () => {
  it("builds a retrying TCP session from the configuration", () => {
    const transport = createTransport(configFor({ port: 8001 }));
    expect(transport.description).toBe("10.0.0.5:8001");
    expect(transport.isConnected).toBe(false);
  });

  it("reads over an RTU link", async () => {
    const banks: RegisterBanks = { hold: new Map([[0, 0xabcd]]), input: new Map() };
    const link: SerialLink & { listener?: (chunk: Buffer) => void } = {
      open: async () => {},
      close: async () => {},
      write: async (data) => {
        const request = readRequest(data.readUInt16BE(2), data.readUInt16BE(4));
        const reply = answer(RTU_IDENTITY, request, banks);
        queueMicrotask(() => link.listener?.(reply));
      },
      onData: (listener) => {
        link.listener = listener;
      },
      onClose: () => {},
    };
    const config = createConfig({ protocol: "rtu", serialPort: "/dev/ttyUSB0" });
    if (!config.ok) throw new Error("invalid configuration");

    const client = createClient(config.config, { linkFactory: () => link });
    expect(client.transport.description).toBe("/dev/ttyUSB0@19200/8N1#1");

    await expect(client.readRegisters("hold", 0, 2)).resolves.toEqual(
      new Map([
        [0, 0xabcd],
        [1, 1],
      ])
    );
    expect(client.isConnected).toBe(true);
    await client.close();
  });
});

describe("probeModel", () => {
  it("reports the model and family, then closes", async () => {
    const banks: RegisterBanks = { hold: new Map(), input: new Map() };
    storeModel(banks);
    const transport = new FakeTransport((request) => answer(TCP_IDENTITY, request, banks));

    await expect(probeModel(configFor(), { transport })).resolves.toEqual({
      ok: true,
      model: "FAAB",
      family: "LXP-LB-EU 12K",
    });
    expect(transport.connects).toBe(1);
    expect(transport.closes).toBe(1);
  });

  it("reports registers without a device type code as unrecognised", async () => {
    const banks: RegisterBanks = { hold: new Map(), input: new Map() };
    const transport = new FakeTransport((request) => answer(TCP_IDENTITY, request, banks));

    await expect(probeModel(configFor(), { transport })).resolves.toEqual({
      ok: false,
      failure: "unrecognised",
      message: "Holding registers 7-8 do not contain a device type code",
    });
  });

  it("reports an unreachable device", async () => {
    const unreachable = new DeviceUnreachable("fake: read fc=3 @7 x2 failed after 3 attempts", 3);
    const transport = new FakeTransport(() => unreachable);

    await expect(probeModel(configFor(), { transport })).resolves.toEqual({
      ok: false,
      failure: "unreachable",
      message: "fake: read fc=3 @7 x2 failed after 3 attempts",
      error: unreachable,
    });
    expect(transport.closes).toBe(1);
  });

  it("reports a device that rejects the read", async () => {
    const transport = new FakeTransport(() => tcpExceptionResponse(TCP_IDENTITY, 3, 7, 2));
    const result = await probeModel(configFor(), { transport });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure).toBe("protocol");
    expect(result.message).toBe("read fc=3 @7 x2 rejected: IllegalDataAddress (code 2)");
  });

  it("propagates unexpected errors", async () => {
    const transport = new FakeTransport(() => new TypeError("bug"));
    await expect(probeModel(configFor(), { transport })).rejects.toThrow(TypeError);
  });
});
