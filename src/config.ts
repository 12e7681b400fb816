/**
 * Typed inverter configuration.
 *
 * Configuration values are immutable. `createConfig` validates every field
 * and reports all problems at once; `applyConfigUpdate` overlays a partial
 * update on an existing configuration and validates the result as a whole.
 */

import {
  BAUDRATE_OPTIONS,
  BYTESIZE_OPTIONS,
  DEFAULT_BAUDRATE,
  DEFAULT_BYTESIZE,
  DEFAULT_CONNECTION_RETRIES,
  DEFAULT_ENTITY_PREFIX,
  DEFAULT_PARITY,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_PORT,
  DEFAULT_RATED_POWER,
  DEFAULT_READ_ONLY,
  DEFAULT_REGISTER_BLOCK_SIZE,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_SLAVE_ID,
  DEFAULT_STOPBITS,
  MAX_CONNECTION_RETRIES,
  MAX_POLL_INTERVAL,
  MAX_RATED_POWER,
  MAX_REQUEST_TIMEOUT,
  MAX_SLAVE_ID,
  MIN_CONNECTION_RETRIES,
  MIN_RATED_POWER,
  MIN_REQUEST_TIMEOUT,
  MIN_SLAVE_ID,
  PARITY_OPTIONS,
  REGISTER_BLOCK_SIZE_OPTIONS,
  RTU_MIN_POLL_INTERVAL,
  SERIAL_LENGTH,
  STOPBITS_OPTIONS,
  TCP_MIN_POLL_INTERVAL,
} from "./constants.js";
import { isValidSerial, type DeviceIdentity } from "./packet.js";
import type { Parity } from "./rtu.js";

// ---------- Types ----------

export type Protocol = "tcp" | "rtu";
export type BaudRate = (typeof BAUDRATE_OPTIONS)[number];
export type RegisterBlockSize = (typeof REGISTER_BLOCK_SIZE_OPTIONS)[number];

export interface TcpConnection {
  readonly protocol: "tcp";
  readonly host: string;
  readonly port: number;
  readonly dongleSerial: string;
  readonly inverterSerial: string;
}

export interface RtuConnection {
  readonly protocol: "rtu";
  readonly serialPort: string;
  readonly baudRate: BaudRate;
  readonly parity: Parity;
  readonly stopBits: 1 | 2;
  readonly byteSize: 7 | 8;
  readonly slaveId: number;
}

export type ConnectionDescriptor = TcpConnection | RtuConnection;

export interface InverterConfig {
  readonly connection: ConnectionDescriptor;
  /** Seconds between poll cycles */
  readonly pollInterval: number;
  readonly registerBlockSize: RegisterBlockSize;
  readonly connectionRetries: number;
  readonly readOnly: boolean;
  /** Rated power in W */
  readonly ratedPower: number;
  readonly entityPrefix: string;
  /** Seconds to wait for each response */
  readonly requestTimeout: number;
}

/**
 * Flat, loosely typed configuration as supplied by a caller. Values are
 * checked by `createConfig`.
 */
export interface ConfigInput {
  protocol?: string;
  host?: string;
  port?: number;
  dongleSerial?: string;
  inverterSerial?: string;
  serialPort?: string;
  baudRate?: number;
  parity?: string;
  stopBits?: number;
  byteSize?: number;
  slaveId?: number;
  pollInterval?: number;
  registerBlockSize?: number;
  connectionRetries?: number;
  readOnly?: boolean;
  ratedPower?: number;
  entityPrefix?: string;
  requestTimeout?: number;
}

export type ConfigField = keyof ConfigInput;

export interface ConfigIssue {
  field: ConfigField;
  code: string;
  message: string;
}

export type ConfigResult =
  | { ok: true; config: InverterConfig }
  | { ok: false; issues: ConfigIssue[] };

// ---------- Field validators ----------

class IssueCollector {
  readonly issues: ConfigIssue[] = [];

  add(field: ConfigField, code: string, message: string): void {
    this.issues.push({ field, code, message });
  }

  integer(field: ConfigField, value: number, min: number, max: number): number {
    if (!Number.isInteger(value) || value < min || value > max) {
      this.add(field, `invalid_${snakeCase(field)}`, `${field} must be an integer in ${min}-${max}`);
    }
    return value;
  }

  oneOf<T extends string | number>(
    field: ConfigField,
    value: string | number,
    options: readonly T[]
  ): T {
    const match = options.find((option) => option === value);
    if (match === undefined) {
      this.add(
        field,
        `invalid_${snakeCase(field)}`,
        `${field} must be one of ${options.join(", ")}`
      );
      return options[0];
    }
    return match;
  }

  serial(field: ConfigField, value: string | undefined): string {
    if (value === undefined || !isValidSerial(value)) {
      this.add(
        field,
        "invalid_serial",
        `${field} must be exactly ${SERIAL_LENGTH} characters`
      );
      return value ?? "";
    }
    return value;
  }

  required(field: ConfigField, value: string | undefined): string {
    if (value === undefined || value.trim() === "") {
      this.add(field, "required", `${field} is required`);
      return "";
    }
    return value;
  }
}

function snakeCase(field: string): string {
  return field.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

// ---------- Construction ----------

export function createConfig(input: ConfigInput): ConfigResult {
  const check = new IssueCollector();
  const protocol = check.oneOf<Protocol>("protocol", input.protocol ?? "tcp", ["tcp", "rtu"]);

  let connection: ConnectionDescriptor;
  if (protocol === "tcp") {
    connection = {
      protocol,
      host: check.required("host", input.host),
      port: check.integer("port", input.port ?? DEFAULT_PORT, 1, 65535),
      dongleSerial: check.serial("dongleSerial", input.dongleSerial),
      inverterSerial: check.serial("inverterSerial", input.inverterSerial),
    };
  } else {
    connection = {
      protocol,
      serialPort: check.required("serialPort", input.serialPort),
      baudRate: check.oneOf("baudRate", input.baudRate ?? DEFAULT_BAUDRATE, BAUDRATE_OPTIONS),
      parity: check.oneOf("parity", input.parity ?? DEFAULT_PARITY, PARITY_OPTIONS),
      stopBits: check.oneOf("stopBits", input.stopBits ?? DEFAULT_STOPBITS, STOPBITS_OPTIONS),
      byteSize: check.oneOf("byteSize", input.byteSize ?? DEFAULT_BYTESIZE, BYTESIZE_OPTIONS),
      slaveId: check.integer("slaveId", input.slaveId ?? DEFAULT_SLAVE_ID, MIN_SLAVE_ID, MAX_SLAVE_ID),
    };
  }

  const minPoll = protocol === "tcp" ? TCP_MIN_POLL_INTERVAL : RTU_MIN_POLL_INTERVAL;
  const config: InverterConfig = {
    connection: Object.freeze(connection),
    pollInterval: check.integer(
      "pollInterval",
      input.pollInterval ?? DEFAULT_POLL_INTERVAL,
      minPoll,
      MAX_POLL_INTERVAL
    ),
    registerBlockSize: check.oneOf(
      "registerBlockSize",
      input.registerBlockSize ?? DEFAULT_REGISTER_BLOCK_SIZE,
      REGISTER_BLOCK_SIZE_OPTIONS
    ),
    connectionRetries: check.integer(
      "connectionRetries",
      input.connectionRetries ?? DEFAULT_CONNECTION_RETRIES,
      MIN_CONNECTION_RETRIES,
      MAX_CONNECTION_RETRIES
    ),
    readOnly: input.readOnly ?? DEFAULT_READ_ONLY,
    ratedPower: check.integer(
      "ratedPower",
      input.ratedPower ?? DEFAULT_RATED_POWER,
      MIN_RATED_POWER,
      MAX_RATED_POWER
    ),
    entityPrefix: input.entityPrefix ?? DEFAULT_ENTITY_PREFIX,
    requestTimeout: check.integer(
      "requestTimeout",
      input.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT,
      MIN_REQUEST_TIMEOUT,
      MAX_REQUEST_TIMEOUT
    ),
  };

  if (check.issues.length > 0) {
    return { ok: false, issues: check.issues };
  }
  return { ok: true, config: Object.freeze(config) };
}

/** Flatten a configuration back into caller input form */
export function configToInput(config: InverterConfig): ConfigInput {
  const { connection, ...common } = config;
  return { ...common, ...connection };
}

/**
 * Overlay `update` on `config` and validate the merged result. The existing
 * configuration is never modified.
 */
export function applyConfigUpdate(config: InverterConfig, update: ConfigInput): ConfigResult {
  const merged: ConfigInput = { ...configToInput(config) };
  for (const [key, value] of Object.entries(update)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return createConfig(merged);
}

export function deviceIdentity(config: InverterConfig): DeviceIdentity {
  const { connection } = config;
  return connection.protocol === "tcp"
    ? {
        protocol: "tcp",
        dongleSerial: connection.dongleSerial,
        inverterSerial: connection.inverterSerial,
      }
    : { protocol: "rtu", slaveId: connection.slaveId };
}

export function describeConnection(connection: ConnectionDescriptor): string {
  return connection.protocol === "tcp"
    ? `${connection.host}:${connection.port}`
    : `${connection.serialPort}#${connection.slaveId}`;
}
