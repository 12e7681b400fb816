/**
 * lxp-modbus – A TypeScript library for LuxPower inverters, over the WiFi
 * dongle (TCP) protocol or Modbus RTU.
 */

// Client and polling
export { InverterClient, createClient, createTransport, probeModel } from "./client.js";
export type {
  ClientOptions,
  ProbeFailure,
  ProbeResult,
  ReadBankOptions,
  RegisterBank,
  TransportOptions,
} from "./client.js";
export { Poller } from "./poller.js";
export type { PollResult, PollerOptions, PollerState } from "./poller.js";

// Configuration
export {
  applyConfigUpdate,
  configToInput,
  createConfig,
  describeConnection,
  deviceIdentity,
} from "./config.js";
export type {
  ConfigField,
  ConfigInput,
  ConfigIssue,
  ConfigResult,
  ConnectionDescriptor,
  InverterConfig,
  RtuConnection,
  TcpConnection,
} from "./config.js";

// Packets and responses
export {
  buildReadRequest,
  buildWriteRequest,
  describeRequest,
  encodeRequest,
  expectedResponseLength,
  isValidSerial,
  isValidSlaveId,
  readRequest,
  writeRequest,
} from "./packet.js";
export type {
  DeviceIdentity,
  ReadRequest,
  Request,
  RtuIdentity,
  TcpIdentity,
  WriteMultipleRequest,
  WriteSingleRequest,
} from "./packet.js";
export { Response, findFrameStart, measureFrame, parseResponse } from "./response.js";
export type { FrameMeasure, RegisterMap, ResponseErrorKind } from "./response.js";
export { FrameAssembler } from "./recovery.js";
export type { AssemblyResult, RecoveryOptions } from "./recovery.js";

// Transports
export { RetryingTransport, StreamSession, withTransport } from "./session.js";
export type { RetryOptions, StreamSessionOptions, Transport } from "./session.js";
export { TcpSession } from "./tcp.js";
export type { TcpSessionOptions } from "./tcp.js";
export { RtuSession, openSerialPort } from "./rtu.js";
export type { Parity, RtuSessionOptions, SerialLink, SerialLinkFactory, SerialSettings } from "./rtu.js";

// Decoding
export {
  combineWords,
  decode,
  decodeModel,
  decodeSerialNumber,
  modelFamily,
  statusText,
  twosComplement,
} from "./decoder.js";
export type {
  DecodeOptions,
  DecodedReadings,
  DecodedValueSet,
  NumericField,
  RegisterSnapshot,
} from "./decoder.js";

// Modbus RTU utilities
export { addCrc, crc16, exceptionName, getCrc, verifyCrc } from "./modbus.js";

// Frame inspection
export { LxpFrame, TcpFunction, describeFrame } from "./inspect.js";

// Errors and logging
export {
  ConnectionError,
  DeviceUnreachable,
  ExchangeCancelled,
  ExchangeTimeout,
  FrameRecoveryExhausted,
  InvalidRequestParameters,
  ProtocolError,
  SessionBusy,
  isRetryable,
} from "./errors.js";
export { createConsoleLogger, nullLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export * from "./constants.js";
