/**
 * Register decoding.
 *
 * Maps raw 16-bit register values to typed, scaled quantities. Input
 * registers carry runtime readings, holding registers carry identification
 * and settings. Decoding is a pure function of the register maps: a missing
 * register never fails the snapshot, it decodes to the documented default
 * (0, or undefined for identification strings) and is listed in `defaulted`.
 *
 * 32-bit quantities span two consecutive registers, low word first.
 */

import type { RegisterMap } from "./response.js";

// ---------- Snapshot ----------

export interface RegisterSnapshot {
  /** Input registers (function 4) */
  readonly input: RegisterMap;
  /** Holding registers (function 3) */
  readonly hold: RegisterMap;
  readonly capturedAt: Date;
}

// ---------- Field table ----------

interface FieldSpec {
  register: number;
  /** 1 for a 16-bit field, 2 for a low/high 32-bit pair */
  words?: 1 | 2;
  /** Multiplier applied to the raw value */
  scale?: number;
  signed?: boolean;
  /** Use only the low or high byte of the register */
  byte?: "low" | "high";
}

const INPUT_FIELDS = {
  statusCode: { register: 0 },
  pvVoltage1: { register: 1, scale: 0.1 },
  pvVoltage2: { register: 2, scale: 0.1 },
  pvVoltage3: { register: 3, scale: 0.1 },
  batteryVoltage: { register: 4, scale: 0.1 },
  stateOfCharge: { register: 5, byte: "low" },
  stateOfHealth: { register: 5, byte: "high" },
  pvPower1: { register: 7 },
  pvPower2: { register: 8 },
  pvPower3: { register: 9 },
  chargePower: { register: 10 },
  dischargePower: { register: 11 },
  gridVoltageR: { register: 12, scale: 0.1 },
  gridVoltageS: { register: 13, scale: 0.1 },
  gridVoltageT: { register: 14, scale: 0.1 },
  gridFrequency: { register: 15, scale: 0.01 },
  inverterPower: { register: 16 },
  rectifierPower: { register: 17 },
  powerFactor: { register: 19, scale: 0.001 },
  epsVoltageR: { register: 20, scale: 0.1 },
  epsFrequency: { register: 23, scale: 0.01 },
  epsPower: { register: 24 },
  powerToGrid: { register: 26 },
  powerToUser: { register: 27 },
  pvEnergyToday1: { register: 28, scale: 0.1 },
  pvEnergyToday2: { register: 29, scale: 0.1 },
  pvEnergyToday3: { register: 30, scale: 0.1 },
  inverterEnergyToday: { register: 31, scale: 0.1 },
  rectifierEnergyToday: { register: 32, scale: 0.1 },
  chargeEnergyToday: { register: 33, scale: 0.1 },
  dischargeEnergyToday: { register: 34, scale: 0.1 },
  epsEnergyToday: { register: 35, scale: 0.1 },
  exportEnergyToday: { register: 36, scale: 0.1 },
  importEnergyToday: { register: 37, scale: 0.1 },
  busVoltage1: { register: 38, scale: 0.1 },
  busVoltage2: { register: 39, scale: 0.1 },
  pvEnergyTotal1: { register: 40, words: 2, scale: 0.1 },
  pvEnergyTotal2: { register: 42, words: 2, scale: 0.1 },
  pvEnergyTotal3: { register: 44, words: 2, scale: 0.1 },
  inverterEnergyTotal: { register: 46, words: 2, scale: 0.1 },
  rectifierEnergyTotal: { register: 48, words: 2, scale: 0.1 },
  chargeEnergyTotal: { register: 50, words: 2, scale: 0.1 },
  dischargeEnergyTotal: { register: 52, words: 2, scale: 0.1 },
  epsEnergyTotal: { register: 54, words: 2, scale: 0.1 },
  exportEnergyTotal: { register: 56, words: 2, scale: 0.1 },
  importEnergyTotal: { register: 58, words: 2, scale: 0.1 },
  faultCode: { register: 60, words: 2 },
  warningCode: { register: 62, words: 2 },
  internalTemperature: { register: 64, signed: true },
  radiatorTemperature1: { register: 65, signed: true },
  radiatorTemperature2: { register: 66, signed: true },
  batteryTemperature: { register: 67, signed: true },
  runtime: { register: 69, words: 2 },
} satisfies Record<string, FieldSpec>;

export type NumericField = keyof typeof INPUT_FIELDS;

export type DecodedReadings = { readonly [K in NumericField]: number };

export interface DecodedValueSet extends DecodedReadings {
  readonly statusText: string;
  /** Sum of the PV string powers, W */
  readonly pvPowerTotal: number;
  /** Inverter output as a percentage of rated power */
  readonly loadPercent: number;
  /** Device type code from holding registers 7-8 */
  readonly model: string | undefined;
  readonly serialNumber: string | undefined;
  /** Fields decoded to their default because a register was missing */
  readonly defaulted: readonly string[];
}

export interface DecodeOptions {
  /** Rated inverter power in W. Default: 5000 */
  ratedPower?: number;
}

// ---------- Helpers ----------

/** Calculate 2s complement */
export function twosComplement(val: number, numBits: number): number {
  if (val & (1 << (numBits - 1))) {
    return val - 2 ** numBits;
  }
  return val;
}

/** Combine a low/high register pair into an unsigned 32-bit value */
export function combineWords(low: number, high: number): number {
  return high * 0x10000 + low;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function decimals(scale: number): number {
  return scale >= 1 ? 0 : Math.round(-Math.log10(scale));
}

function decodeField(registers: RegisterMap, spec: FieldSpec): number | undefined {
  const low = registers.get(spec.register);
  if (low === undefined) return undefined;

  let raw: number;
  if (spec.words === 2) {
    const high = registers.get(spec.register + 1);
    if (high === undefined) return undefined;
    raw = combineWords(low, high);
  } else if (spec.byte === "low") {
    raw = low & 0xff;
  } else if (spec.byte === "high") {
    raw = (low >> 8) & 0xff;
  } else {
    raw = low;
  }

  if (spec.signed) raw = twosComplement(raw, spec.words === 2 ? 32 : 16);
  if (spec.scale !== undefined) return round(raw * spec.scale, decimals(spec.scale));
  return raw;
}

/**
 * Read `count` registers starting at `start` as ASCII, two characters per
 * register, low byte first.
 */
function decodeAscii(registers: RegisterMap, start: number, count: number): string | undefined {
  const bytes = Buffer.alloc(count * 2);
  for (let i = 0; i < count; i++) {
    const value = registers.get(start + i);
    if (value === undefined) return undefined;
    bytes.writeUInt16LE(value, i * 2);
  }
  return bytes.toString("latin1");
}

// ---------- Status ----------

const STATUS_TEXT: Record<number, string> = {
  0x00: "Standby",
  0x01: "Fault",
  0x02: "Programming",
  0x04: "PV on-grid",
  0x08: "PV charge",
  0x0c: "PV charge on-grid",
  0x10: "Battery on-grid",
  0x14: "PV and battery on-grid",
  0x20: "AC charge",
  0x28: "PV and AC charge",
  0x40: "Battery off-grid",
  0x80: "PV off-grid",
  0x88: "PV charge off-grid",
  0xc0: "PV and battery off-grid",
};

export function statusText(code: number): string {
  return STATUS_TEXT[code] ?? `Unknown (0x${code.toString(16)})`;
}

// ---------- Identification ----------

const MODEL_CODE = /^[A-Z0-9]{4}$/;

const MODEL_FAMILIES: Record<string, string> = {
  AAAA: "LXP 3-6K Hybrid",
  AAAB: "LXP 3-6K Hybrid (parallel)",
  BAAA: "LXP AC-coupled",
  CAAA: "LXP-LB 8-12K",
  EAAB: "GEN 12K",
  FAAA: "SNA 3-6K off-grid",
  FAAB: "LXP-LB-EU 12K",
};

/**
 * Device type code from holding registers 7-8, e.g. "FAAB".
 * Undefined when the registers are missing or do not hold a code.
 */
export function decodeModel(hold: RegisterMap): string | undefined {
  const text = decodeAscii(hold, 7, 2);
  if (text === undefined || !MODEL_CODE.test(text)) return undefined;
  return text;
}

/** Short description of the inverter family for a device type code */
export function modelFamily(code: string): string | undefined {
  return MODEL_FAMILIES[code];
}

/** Inverter serial number from holding registers 2-6 */
export function decodeSerialNumber(hold: RegisterMap): string | undefined {
  const text = decodeAscii(hold, 2, 5);
  if (text === undefined || !/^[\x21-\x7e]{10}$/.test(text)) return undefined;
  return text;
}

// ---------- Decode ----------

export function decode(
  snapshot: Pick<RegisterSnapshot, "input" | "hold">,
  options: DecodeOptions = {}
): DecodedValueSet {
  const ratedPower = options.ratedPower ?? 5000;
  const defaulted: string[] = [];
  const read = (key: NumericField): number => {
    const value = decodeField(snapshot.input, INPUT_FIELDS[key]);
    if (value === undefined) {
      defaulted.push(key);
      return 0;
    }
    return value;
  };

  const readings: DecodedReadings = {
    statusCode: read("statusCode"),
    pvVoltage1: read("pvVoltage1"),
    pvVoltage2: read("pvVoltage2"),
    pvVoltage3: read("pvVoltage3"),
    batteryVoltage: read("batteryVoltage"),
    stateOfCharge: read("stateOfCharge"),
    stateOfHealth: read("stateOfHealth"),
    pvPower1: read("pvPower1"),
    pvPower2: read("pvPower2"),
    pvPower3: read("pvPower3"),
    chargePower: read("chargePower"),
    dischargePower: read("dischargePower"),
    gridVoltageR: read("gridVoltageR"),
    gridVoltageS: read("gridVoltageS"),
    gridVoltageT: read("gridVoltageT"),
    gridFrequency: read("gridFrequency"),
    inverterPower: read("inverterPower"),
    rectifierPower: read("rectifierPower"),
    powerFactor: read("powerFactor"),
    epsVoltageR: read("epsVoltageR"),
    epsFrequency: read("epsFrequency"),
    epsPower: read("epsPower"),
    powerToGrid: read("powerToGrid"),
    powerToUser: read("powerToUser"),
    pvEnergyToday1: read("pvEnergyToday1"),
    pvEnergyToday2: read("pvEnergyToday2"),
    pvEnergyToday3: read("pvEnergyToday3"),
    inverterEnergyToday: read("inverterEnergyToday"),
    rectifierEnergyToday: read("rectifierEnergyToday"),
    chargeEnergyToday: read("chargeEnergyToday"),
    dischargeEnergyToday: read("dischargeEnergyToday"),
    epsEnergyToday: read("epsEnergyToday"),
    exportEnergyToday: read("exportEnergyToday"),
    importEnergyToday: read("importEnergyToday"),
    busVoltage1: read("busVoltage1"),
    busVoltage2: read("busVoltage2"),
    pvEnergyTotal1: read("pvEnergyTotal1"),
    pvEnergyTotal2: read("pvEnergyTotal2"),
    pvEnergyTotal3: read("pvEnergyTotal3"),
    inverterEnergyTotal: read("inverterEnergyTotal"),
    rectifierEnergyTotal: read("rectifierEnergyTotal"),
    chargeEnergyTotal: read("chargeEnergyTotal"),
    dischargeEnergyTotal: read("dischargeEnergyTotal"),
    epsEnergyTotal: read("epsEnergyTotal"),
    exportEnergyTotal: read("exportEnergyTotal"),
    importEnergyTotal: read("importEnergyTotal"),
    faultCode: read("faultCode"),
    warningCode: read("warningCode"),
    internalTemperature: read("internalTemperature"),
    radiatorTemperature1: read("radiatorTemperature1"),
    radiatorTemperature2: read("radiatorTemperature2"),
    batteryTemperature: read("batteryTemperature"),
    runtime: read("runtime"),
  };

  const model = decodeModel(snapshot.hold);
  if (model === undefined) defaulted.push("model");
  const serialNumber = decodeSerialNumber(snapshot.hold);
  if (serialNumber === undefined) defaulted.push("serialNumber");

  return Object.freeze({
    ...readings,
    statusText: statusText(readings.statusCode),
    pvPowerTotal: readings.pvPower1 + readings.pvPower2 + readings.pvPower3,
    loadPercent:
      ratedPower > 0 ? round((readings.inverterPower / ratedPower) * 100, 1) : 0,
    model,
    serialNumber,
    defaulted: Object.freeze(defaulted),
  });
}
