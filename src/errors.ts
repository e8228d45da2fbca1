/**
 * Error taxonomy for register access.
 *
 * Codec and validation errors are deterministic and never retried. Transport
 * errors are retried by the transaction engine when `retryable` is set.
 */

export class RegisterAccessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RegisterAccessError";
  }
}

export class UnknownRegisterError extends RegisterAccessError {
  public readonly register: string;

  constructor(register: string) {
    super(`Unknown register: ${register}`);
    this.name = "UnknownRegisterError";
    this.register = register;
  }
}

export class DecodeError extends RegisterAccessError {
  public readonly register: string;

  constructor(register: string, message: string) {
    super(`Cannot decode ${register}: ${message}`);
    this.name = "DecodeError";
    this.register = register;
  }
}

export class EncodeError extends RegisterAccessError {
  public readonly register: string;

  constructor(register: string, message: string) {
    super(`Cannot encode ${register}: ${message}`);
    this.name = "EncodeError";
    this.register = register;
  }
}

export class NotWritableError extends RegisterAccessError {
  public readonly register: string;

  constructor(register: string) {
    super(`Register is not writable: ${register}`);
    this.name = "NotWritableError";
    this.register = register;
  }
}

export type TransportErrorKind = "Timeout" | "Refused" | "ProtocolError";

export interface TransportErrorContext {
  unitId?: number;
  address?: number;
  count?: number;
  /** Wire attempts made before giving up. */
  attempts?: number;
  /** Modbus exception code returned by the device, if any. */
  exceptionCode?: number;
  cause?: unknown;
}

/** Modbus exception codes after which a retry can succeed. */
const TRANSIENT_EXCEPTION_CODES = new Set([
  0x05, // Acknowledge
  0x06, // ServerDeviceBusy
]);

/** Exception code the inverter answers with when the action needs a login. */
export const PERMISSION_DENIED = 0x80;

export class TransportError extends RegisterAccessError {
  public readonly kind: TransportErrorKind;
  public readonly unitId?: number;
  public readonly address?: number;
  public readonly count?: number;
  public readonly attempts?: number;
  public readonly exceptionCode?: number;

  constructor(
    kind: TransportErrorKind,
    message: string,
    context: TransportErrorContext = {}
  ) {
    super(message, { cause: context.cause });
    this.name = "TransportError";
    this.kind = kind;
    this.unitId = context.unitId;
    this.address = context.address;
    this.count = context.count;
    this.attempts = context.attempts;
    this.exceptionCode = context.exceptionCode;
  }

  /**
   * Device exceptions such as an illegal address are final; busy devices,
   * timeouts and broken connections are worth another attempt.
   */
  get retryable(): boolean {
    if (this.exceptionCode === undefined) return true;
    return TRANSIENT_EXCEPTION_CODES.has(this.exceptionCode);
  }

  /** Copy of this error carrying request context added by the engine. */
  withContext(context: TransportErrorContext): TransportError {
    return new TransportError(this.kind, this.message, {
      unitId: context.unitId ?? this.unitId,
      address: context.address ?? this.address,
      count: context.count ?? this.count,
      attempts: context.attempts ?? this.attempts,
      exceptionCode: this.exceptionCode,
      cause: this.cause,
    });
  }
}

export class PermissionDeniedError extends TransportError {
  constructor(message = "Permission denied", context: TransportErrorContext = {}) {
    super("ProtocolError", message, { ...context, exceptionCode: PERMISSION_DENIED });
    this.name = "PermissionDeniedError";
  }

  withContext(context: TransportErrorContext): PermissionDeniedError {
    return new PermissionDeniedError(this.message, {
      unitId: context.unitId ?? this.unitId,
      address: context.address ?? this.address,
      count: context.count ?? this.count,
      attempts: context.attempts ?? this.attempts,
      cause: this.cause,
    });
  }
}

export class ConnectionError extends RegisterAccessError {
  public readonly endpoint: string;

  constructor(endpoint: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot open connection to ${endpoint}: ${message}`, options);
    this.name = "ConnectionError";
    this.endpoint = endpoint;
  }
}

export class ConnectionUnavailableError extends RegisterAccessError {
  constructor(message = "Connection is unavailable", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionUnavailableError";
  }
}

export class PartialWriteFailure extends RegisterAccessError {
  public readonly register: string;
  public readonly confirmed: readonly number[];
  public readonly unconfirmed: readonly number[];

  constructor(
    register: string,
    confirmed: readonly number[],
    unconfirmed: readonly number[],
    options?: { cause?: unknown }
  ) {
    super(
      `Partial write of ${register}: confirmed [${confirmed.join(", ")}], ` +
        `unconfirmed [${unconfirmed.join(", ")}]`,
      options
    );
    this.name = "PartialWriteFailure";
    this.register = register;
    this.confirmed = confirmed;
    this.unconfirmed = unconfirmed;
  }
}

export class VerificationError extends RegisterAccessError {
  public readonly register: string;
  public readonly expected: readonly number[];
  public readonly actual: readonly number[];

  constructor(
    register: string,
    expected: readonly number[],
    actual: readonly number[]
  ) {
    super(
      `Read-back of ${register} returned [${actual.join(", ")}], ` +
        `expected [${expected.join(", ")}]`
    );
    this.name = "VerificationError";
    this.register = register;
    this.expected = expected;
    this.actual = actual;
  }
}

export class RegisterTableError extends RegisterAccessError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid register table:\n  ${issues.join("\n  ")}`);
    this.name = "RegisterTableError";
    this.issues = issues;
  }
}

export class ConfigError extends RegisterAccessError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
