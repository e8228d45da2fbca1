/**
 * inverter-registers: typed, batched and serialised access to the Modbus
 * registers of a solar inverter.
 */

// Session
export { Session, HEARTBEAT_REGISTER, FILE_UPLOAD_POLICY } from "./session";
export type { ConnectOptions, CallOptions, SetOptions, FileOptions, WriteAck } from "./session";

// Register table
export {
  RegisterTable,
  registerDefinitionSchema,
  typeWidth,
  loadTableFromFile,
  loadDefaultTable,
  DEFAULT_CATALOG_PATH,
  UNIT_SCALE,
} from "./registers";
export type {
  DataType,
  RegisterDefinition,
  RegisterDescriptor,
  RegisterSpace,
  Scale,
  WordOrder,
} from "./registers";

// Codec
export { decode, encode, wordsToBigInt, bigIntToWords } from "./codec";
export type { BitfieldValue, DecodedValue, RawWords, TypedValue } from "./codec";

// Planning and transactions
export { planReads, plannedRegisterCount, RegisterSnapshot } from "./planner";
export type { PlannerOptions, ReadPlan, ReadRange } from "./planner";
export { TransactionEngine } from "./engine";
export type {
  CustomSend,
  EngineOptions,
  ExchangeOptions,
  TransactionOptions,
  TransactionState,
  WriteResult,
} from "./engine";
export { RetryPolicy, RetriesExhaustedError } from "./retry";
export type { RetryOptions, Sleep } from "./retry";

// Transport
export { describeEndpoint } from "./transport";
export type { Connection, Connector, Endpoint, SerialEndpoint, TcpEndpoint } from "./transport";
export {
  ModbusSerialConnection,
  createModbusConnector,
  toTransportError,
} from "./modbus-connection";
export type { ModbusClientLike, ModbusConnectorOptions } from "./modbus-connection";
export { crc16, hasValidCrc } from "./crc";

// Private function code
export {
  PRIVATE_FUNCTION_CODE,
  CHALLENGE_LENGTH,
  loginDigest,
  challengeRequest,
  parseChallenge,
  loginRequest,
  parseLoginAnswer,
  startUploadRequest,
  parseUploadStart,
  uploadFrameRequest,
  parseUploadFrame,
  completeUploadRequest,
  parseUploadComplete,
} from "./vendor-protocol";
export type { LoginAnswer, UploadStart, UploadFrame } from "./vendor-protocol";

// Configuration and logging
export { resolveOptions, resolveEndpoint, sessionOptionsSchema, endpointSchema } from "./config";
export type { SessionOptions, SessionOptionsInput, EndpointInput } from "./config";
export { nullLogger, createConsoleLogger } from "./logger";
export type { Logger } from "./logger";

// Errors
export {
  RegisterAccessError,
  UnknownRegisterError,
  DecodeError,
  EncodeError,
  NotWritableError,
  TransportError,
  ConnectionError,
  ConnectionUnavailableError,
  PartialWriteFailure,
  VerificationError,
  RegisterTableError,
  ConfigError,
  PermissionDeniedError,
  PERMISSION_DENIED,
} from "./errors";
export type { TransportErrorKind, TransportErrorContext } from "./errors";
