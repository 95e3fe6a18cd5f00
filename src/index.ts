/**
 * aurora-pvlink – client, poller and PVOutput uploader for Aurora protocol
 * solar inverters reached through a TCP-to-serial bridge.
 */

// Client / transport binding
export { AuroraClient } from "./client.js";
export type { AuroraClientOptions, InverterService, RequestOptions } from "./client.js";

// Codec
export { encodeRequest, decodeResponse, FrameSession } from "./codec.js";
export type { FrameSessionOptions } from "./codec.js";
export {
  crc16,
  crc16X25,
  crc16CcittFalse,
  getCrc,
  addCrc,
  verifyCrc,
  isCrcVariant,
  CRC_VARIANTS,
} from "./crc.js";
export type { CrcVariant } from "./crc.js";

// Protocol model
export {
  CommandCode,
  COMMAND_CODES,
  MeasurementType,
  CumulativeDuration,
  MEASUREMENT_TYPES,
  CUMULATIVE_DURATIONS,
  Request,
  REQUEST_FRAME_LENGTH,
  RESPONSE_FRAME_LENGTH,
  describeRequest,
  isResponseFor,
  parseMeasurementType,
  parseCumulativeDuration,
} from "./protocol.js";
export type {
  RequestKind,
  StateRequest,
  PartNumberRequest,
  VersionRequest,
  MeasureRequest,
  SerialNumberRequest,
  ManufactureDateRequest,
  CumulativeEnergyRequest,
  Response,
  ResponseFor,
  StatusHeader,
  StateResponse,
  PartNumberResponse,
  VersionResponse,
  MeasureResponse,
  SerialNumberResponse,
  ManufactureDateResponse,
  CumulativeEnergyResponse,
} from "./protocol.js";

// Device states
export {
  TransmissionState,
  GlobalState,
  InverterState,
  DcDcState,
  decodeTransmissionState,
  decodeGlobalState,
  decodeInverterState,
  decodeDcDcState,
  describeTransmissionState,
  describeGlobalState,
  describeInverterState,
  describeDcDcState,
} from "./states.js";

// Errors
export {
  AuroraError,
  IoError,
  ConnectionError,
  ConnectionClosedError,
  CrcMismatchError,
  UnexpectedResponseError,
  PendingRequestError,
  UnknownStateCodeError,
  TimeoutError,
  UploadError,
  ConfigError,
} from "./errors.js";
export type { StateDomain } from "./errors.js";

// Polling
export { TickThrottle } from "./throttle.js";
export { EnergyVoltagePoller } from "./poller.js";
export type { PollerOptions, PollerState, EnergyVoltageReading } from "./poller.js";

// Configuration, upload and monitor
export { loadConfig, parseConfig, normalizeConfig, parseTcpAddress } from "./config.js";
export type { Config, PvOutputConfig } from "./config.js";
export { PvOutputUploader, formatStatusBody, PVOUTPUT_ADD_STATUS_URL } from "./upload.js";
export type { UploaderOptions } from "./upload.js";
export { runMonitor } from "./monitor.js";
export type { MonitorOptions } from "./monitor.js";
export { parseRequest, summarizeResponse } from "./format.js";

// Logging
export { createConsoleLogger, nullLogger } from "./logger.js";
export type { Logger } from "./logger.js";
