import { describe, it, expect } from "vitest";
import { FrameRecoveryExhausted } from "../src/errors.js";
import { readRequest } from "../src/packet.js";
import { FrameAssembler, type AssemblyResult } from "../src/recovery.js";
import {
  RTU_IDENTITY,
  TCP_IDENTITY,
  rtuReadResponse,
  tcpExceptionResponse,
  tcpReadResponse,
} from "./fixtures.js";

const request = readRequest(0, 2);

function corrupt(frame: Buffer): Buffer {
  const copy = Buffer.from(frame);
  copy[copy.length - 1] ^= 0xff;
  return copy;
}

function expectComplete(result: AssemblyResult): Extract<AssemblyResult, { status: "complete" }> {
  if (result.status !== "complete") {
    throw new Error(`Expected a complete frame, got ${result.status}`);
  }
  return result;
}

describe("FrameAssembler (TCP)", () => {
  const frame = tcpReadResponse(TCP_IDENTITY, 3, 0, [0x0a0b, 0x0c0d]);

  it("completes a frame delivered at once", () => {
    const assembler = new FrameAssembler(request, TCP_IDENTITY);
    const result = expectComplete(assembler.push(frame));
    expect(result.frame.equals(frame)).toBe(true);
    expect([...result.response.registers()]).toEqual([
      [0, 0x0a0b],
      [1, 0x0c0d],
    ]);
    expect(assembler.buffered).toBe(0);
  });

  it("yields the same response when fed one byte at a time", () => {
    const whole = expectComplete(new FrameAssembler(request, TCP_IDENTITY).push(frame));
    const assembler = new FrameAssembler(request, TCP_IDENTITY);

    for (let i = 0; i < frame.length - 1; i++) {
      expect(assembler.push(frame.subarray(i, i + 1))).toEqual({ status: "pending" });
    }
    const result = expectComplete(assembler.push(frame.subarray(frame.length - 1)));

    expect(result.frame.equals(whole.frame)).toBe(true);
    expect([...result.response.registers()]).toEqual([...whole.response.registers()]);
  });

  it("discards a garbage prefix and returns the frame", () => {
    const assembler = new FrameAssembler(request, TCP_IDENTITY);
    const garbage = Buffer.from([0x00, 0xff, 0x13, 0x42]);
    const result = expectComplete(assembler.push(Buffer.concat([garbage, frame])));
    expect(result.frame.equals(frame)).toBe(true);
    expect(assembler.recoveryAttempts).toBe(0);
  });

  it("discards garbage delivered byte by byte without spending attempts", () => {
    const assembler = new FrameAssembler(request, TCP_IDENTITY);
    for (const byte of [0x00, 0xff, 0x13, 0x42, 0x07]) {
      expect(assembler.push(Buffer.from([byte]))).toEqual({ status: "pending" });
    }
    expect(assembler.buffered).toBe(0);
    expect(expectComplete(assembler.push(frame)).frame.equals(frame)).toBe(true);
  });

  it("resynchronises past a corrupt frame", () => {
    const assembler = new FrameAssembler(request, TCP_IDENTITY);
    const result = expectComplete(assembler.push(Buffer.concat([corrupt(frame), frame])));
    expect(result.frame.equals(frame)).toBe(true);
    expect(assembler.recoveryAttempts).toBe(1);
  });

  it("recovers within three attempts", () => {
    const bad = corrupt(frame);
    const assembler = new FrameAssembler(request, TCP_IDENTITY);
    const result = assembler.push(Buffer.concat([bad, bad, bad, frame]));
    expect(result.status).toBe("complete");
    expect(assembler.recoveryAttempts).toBe(3);
  });

  it("fails after more than three recovery attempts", () => {
    const bad = corrupt(frame);
    const assembler = new FrameAssembler(request, TCP_IDENTITY);
    const result = assembler.push(Buffer.concat([bad, bad, bad, bad, frame]));
    if (result.status !== "exhausted") throw new Error(`unexpected ${result.status}`);
    expect(result.error).toBeInstanceOf(FrameRecoveryExhausted);
    expect(assembler.buffered).toBe(0);
  });

  it("fails once more than 1024 bytes arrive without a frame", () => {
    const assembler = new FrameAssembler(request, TCP_IDENTITY);
    for (let i = 0; i < 10; i++) {
      expect(assembler.push(Buffer.alloc(100)).status).toBe("pending");
    }
    const result = assembler.push(Buffer.alloc(100));
    if (result.status !== "exhausted") throw new Error(`unexpected ${result.status}`);
    expect(result.error).toBeInstanceOf(FrameRecoveryExhausted);
    expect(result.error.message).toBe("1100 bytes received without a valid frame (limit 1024)");
  });

  it("accepts a frame that completes within the chunk crossing the byte limit", () => {
    const values = Array.from({ length: 125 }, (_, i) => i);
    const full = tcpReadResponse(TCP_IDENTITY, 3, 0, values);
    const assembler = new FrameAssembler(readRequest(0, 125), TCP_IDENTITY);

    const result = expectComplete(assembler.push(Buffer.concat([Buffer.alloc(740), full])));
    expect(full.length).toBe(287);
    expect(result.frame.equals(full)).toBe(true);
  });

  it("fails a single oversized chunk immediately", () => {
    const result = new FrameAssembler(request, TCP_IDENTITY).push(Buffer.alloc(1025, 0xa1));
    expect(result.status).toBe("exhausted");
  });

  it("completes device exception frames", () => {
    const exception = tcpExceptionResponse(TCP_IDENTITY, 3, 0, 2);
    const result = expectComplete(new FrameAssembler(request, TCP_IDENTITY).push(exception));
    expect(result.response.errorKind).toBe("exception");
    expect(result.response.exceptionCode).toBe(2);
  });

  it("drops trailing bytes after a frame", () => {
    const result = expectComplete(
      new FrameAssembler(request, TCP_IDENTITY).push(Buffer.concat([frame, Buffer.from([1, 2])]))
    );
    expect(result.frame.length).toBe(frame.length);
  });
});

describe("FrameAssembler (RTU)", () => {
  const frame = rtuReadResponse(1, 3, [0x0a0b, 0x0c0d]);

  it("assembles a frame fed one byte at a time", () => {
    const assembler = new FrameAssembler(request, RTU_IDENTITY);
    for (let i = 0; i < frame.length - 1; i++) {
      expect(assembler.push(frame.subarray(i, i + 1)).status).toBe("pending");
    }
    const result = expectComplete(assembler.push(frame.subarray(frame.length - 1)));
    expect(result.frame.toString("hex")).toBe(frame.toString("hex"));
    expect(result.response.registers().get(1)).toBe(0x0c0d);
  });

  it("skips line noise ahead of the frame", () => {
    const assembler = new FrameAssembler(request, RTU_IDENTITY);
    const result = expectComplete(assembler.push(Buffer.concat([Buffer.from([0x55, 0x00]), frame])));
    expect(result.frame.equals(frame)).toBe(true);
    expect(assembler.recoveryAttempts).toBe(0);
  });
});
