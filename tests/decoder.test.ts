import { describe, it, expect } from "vitest";
import {
  combineWords,
  decode,
  decodeModel,
  decodeSerialNumber,
  modelFamily,
  statusText,
  twosComplement,
} from "../src/decoder.js";

/** Registers holding `text`, two characters per register, low byte first */
function asciiRegisters(text: string, start: number): Array<[number, number]> {
  const entries: Array<[number, number]> = [];
  for (let i = 0; i < text.length; i += 2) {
    entries.push([start + i / 2, text.charCodeAt(i) | (text.charCodeAt(i + 1) << 8)]);
  }
  return entries;
}

const input = new Map<number, number>([
  [0, 0x0c],
  [1, 3456],
  [4, 532],
  [5, (98 << 8) | 87],
  [7, 1000],
  [8, 500],
  [9, 0],
  [15, 5001],
  [16, 2500],
  [19, 998],
  [40, 0x0002],
  [41, 0x0001],
  [60, 0x0010],
  [61, 0],
  [64, 0xfffb],
  [67, 25],
  [69, 100],
  [70, 1],
]);

const hold = new Map<number, number>([
  ...asciiRegisters("AB12345678", 2),
  ...asciiRegisters("FAAB", 7),
]);

describe("helpers", () => {
  it("twosComplement", () => {
    expect(twosComplement(0xffff, 16)).toBe(-1);
    expect(twosComplement(0x7fff, 16)).toBe(32767);
    expect(twosComplement(0xfffffffe, 32)).toBe(-2);
  });

  it("combineWords takes the low word first", () => {
    expect(combineWords(2, 1)).toBe(65538);
    expect(combineWords(0xffff, 0xffff)).toBe(0xffffffff);
  });

  it("statusText", () => {
    expect(statusText(0x0c)).toBe("PV charge on-grid");
    expect(statusText(0x03)).toBe("Unknown (0x3)");
  });
});

describe("decode", () => {
  const values = decode({ input, hold });

  it("scales register values", () => {
    expect(values.pvVoltage1).toBe(345.6);
    expect(values.batteryVoltage).toBe(53.2);
    expect(values.gridFrequency).toBe(50.01);
    expect(values.powerFactor).toBe(0.998);
    expect(values.inverterPower).toBe(2500);
  });

  it("splits state of charge and health from one register", () => {
    expect(values.stateOfCharge).toBe(87);
    expect(values.stateOfHealth).toBe(98);
  });

  it("combines 32-bit quantities low word first", () => {
    expect(values.pvEnergyTotal1).toBe(6553.8);
    expect(values.faultCode).toBe(16);
    expect(values.runtime).toBe(65636);
  });

  it("reads temperatures as signed values", () => {
    expect(values.internalTemperature).toBe(-5);
    expect(values.batteryTemperature).toBe(25);
  });

  it("derives totals, load and status text", () => {
    expect(values.statusText).toBe("PV charge on-grid");
    expect(values.pvPowerTotal).toBe(1500);
    expect(values.loadPercent).toBe(50);
    expect(decode({ input, hold }, { ratedPower: 3000 }).loadPercent).toBe(83.3);
  });

  it("reads identification from the holding registers", () => {
    expect(values.model).toBe("FAAB");
    expect(values.serialNumber).toBe("AB12345678");
  });

  it("returns a frozen value set", () => {
    expect(Object.isFrozen(values)).toBe(true);
    expect(Object.isFrozen(values.defaulted)).toBe(true);
  });

  it("defaults missing registers instead of failing", () => {
    const partial = decode({ input: new Map([[0, 0x04]]), hold: new Map() });

    expect(partial.statusText).toBe("PV on-grid");
    expect(partial.pvVoltage1).toBe(0);
    expect(partial.model).toBeUndefined();
    expect(partial.serialNumber).toBeUndefined();
    expect(partial.defaulted).toHaveLength(54);
    expect(partial.defaulted[0]).toBe("pvVoltage1");
    expect(partial.defaulted.slice(-2)).toEqual(["model", "serialNumber"]);
  });

  it("defaults a 32-bit quantity when either word is missing", () => {
    const partial = decode({ input: new Map([[40, 5]]), hold });
    expect(partial.pvEnergyTotal1).toBe(0);
    expect(partial.defaulted).toContain("pvEnergyTotal1");
    expect(partial.defaulted).not.toContain("model");
  });

  it("decodes empty maps to zeros", () => {
    const empty = decode({ input: new Map(), hold: new Map() });
    expect(empty.statusText).toBe("Standby");
    expect(empty.loadPercent).toBe(0);
    expect(empty.pvPowerTotal).toBe(0);
  });
});

describe("identification", () => {
  it("decodeModel accepts any well formed code", () => {
    expect(decodeModel(new Map(asciiRegisters("ZZZZ", 7)))).toBe("ZZZZ");
    expect(modelFamily("ZZZZ")).toBeUndefined();
    expect(modelFamily("FAAB")).toBe("LXP-LB-EU 12K");
  });

  it("decodeModel rejects registers without a code", () => {
    expect(
      decodeModel(
        new Map([
          [7, 0],
          [8, 0],
        ])
      )
    ).toBeUndefined();
    expect(decodeModel(new Map([[7, 0x4146]]))).toBeUndefined();
  });

  it("decodeSerialNumber needs all five registers", () => {
    expect(decodeSerialNumber(hold)).toBe("AB12345678");
    expect(decodeSerialNumber(new Map(asciiRegisters("AB1234", 2)))).toBeUndefined();
  });
});
