/**
 * Protocol constants and configuration defaults for LuxPower inverters.
 */

// ---------- Function codes ----------

export const FunctionCode = {
  READ_HOLDING: 0x03,
  READ_INPUT: 0x04,
  WRITE_SINGLE: 0x06,
  WRITE_MULTIPLE: 0x10,
} as const;

export type ReadFunctionCode =
  | typeof FunctionCode.READ_HOLDING
  | typeof FunctionCode.READ_INPUT;

/** Set on the function code of a device exception response */
export const EXCEPTION_FLAG = 0x80;

// ---------- TCP (dongle) framing ----------

export const TCP_PREFIX = Buffer.from([0xa1, 0x1a]);
export const TCP_ADDRESS = 0x01;
/** TCP function carrying a translated inverter data frame */
export const TCP_FUNCTION_TRANSLATED_DATA = 0xc2;
export const TCP_HEADER_LENGTH = 20;
export const ACTION_REQUEST = 0x00;
export const ACTION_RESPONSE = 0x01;
export const SERIAL_LENGTH = 10;

/** Minimum length of a read response received from the dongle */
export const RESPONSE_OVERHEAD = 37;
/** A single write is acknowledged with exactly this many bytes */
export const WRITE_RESPONSE_LENGTH = 76;
export const WRITE_MULTIPLE_RESPONSE_LENGTH = 38;

// ---------- RTU framing ----------

export const RTU_RESPONSE_OVERHEAD = 5;
export const RTU_WRITE_RESPONSE_LENGTH = 8;
export const MIN_SLAVE_ID = 1;
export const MAX_SLAVE_ID = 247;

// ---------- Limits ----------

export const MAX_PACKET_SIZE = 1024;
export const MAX_PACKET_RECOVERY_ATTEMPTS = 3;
/** Seconds of silence tolerated while the rest of a frame is pending */
export const PACKET_RECOVERY_TIMEOUT = 2;
export const MAX_READ_COUNT = 125;
export const MAX_WRITE_COUNT = 123;
export const TOTAL_REGISTERS = 300;

// ---------- Configuration defaults ----------

export const DEFAULT_PORT = 8000;
export const DEFAULT_POLL_INTERVAL = 60;
export const DEFAULT_RATED_POWER = 5000;
export const DEFAULT_READ_ONLY = false;
export const DEFAULT_ENTITY_PREFIX = "";
export const DEFAULT_REGISTER_BLOCK_SIZE = 125;
export const LEGACY_REGISTER_BLOCK_SIZE = 40;
export const DEFAULT_CONNECTION_RETRIES = 3;
export const DEFAULT_REQUEST_TIMEOUT = 5;

export const DEFAULT_BAUDRATE = 19200;
export const DEFAULT_PARITY = "N";
export const DEFAULT_STOPBITS = 1;
export const DEFAULT_BYTESIZE = 8;
export const DEFAULT_SLAVE_ID = 1;

export const BAUDRATE_OPTIONS = [9600, 19200, 38400, 57600, 115200] as const;
export const PARITY_OPTIONS = ["N", "E", "O"] as const;
export const STOPBITS_OPTIONS = [1, 2] as const;
export const BYTESIZE_OPTIONS = [7, 8] as const;
export const REGISTER_BLOCK_SIZE_OPTIONS = [
  DEFAULT_REGISTER_BLOCK_SIZE,
  LEGACY_REGISTER_BLOCK_SIZE,
] as const;

export const TCP_MIN_POLL_INTERVAL = 2;
export const RTU_MIN_POLL_INTERVAL = 1;
export const MAX_POLL_INTERVAL = 600;
export const MIN_CONNECTION_RETRIES = 1;
export const MAX_CONNECTION_RETRIES = 10;
export const MIN_RATED_POWER = 1000;
export const MAX_RATED_POWER = 100000;
export const MIN_REQUEST_TIMEOUT = 1;
export const MAX_REQUEST_TIMEOUT = 60;
