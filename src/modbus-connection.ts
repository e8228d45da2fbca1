/**
 * {@link Connection} implementation over the `modbus-serial` package, for
 * Modbus TCP gateways and RTU serial lines.
 */

import ModbusRTU from "modbus-serial";
import type { RawWords } from "./codec";
import { hasValidCrc } from "./crc";
import { ConnectionError, PERMISSION_DENIED, PermissionDeniedError, TransportError } from "./errors";
import type { TransportErrorContext, TransportErrorKind } from "./errors";
import type { Logger } from "./logger";
import { nullLogger } from "./logger";
import type { RegisterSpace } from "./registers";
import { describeEndpoint } from "./transport";
import type { Connection, Connector, Endpoint } from "./transport";

/** The part of `ModbusRTU` this module drives. */
export interface ModbusClientLike {
  readonly isOpen: boolean;
  connectTCP(host: string, options: { port: number }): Promise<void>;
  connectRTUBuffered(
    path: string,
    options: {
      baudRate: number;
      dataBits?: number;
      stopBits?: number;
      parity?: "none" | "even" | "odd";
    }
  ): Promise<void>;
  setID(id: number): void;
  setTimeout(duration: number): void;
  readHoldingRegisters(address: number, length: number): Promise<{ data: number[] }>;
  readInputRegisters(address: number, length: number): Promise<{ data: number[] }>;
  writeRegister(address: number, value: number): Promise<unknown>;
  writeRegisters(address: number, values: number[]): Promise<unknown>;
  /** Callback API for function codes the library has no method for. */
  writeCustomFC?(
    address: number,
    functionCode: number,
    data: number[],
    next: (err: Error | null, result?: unknown) => void
  ): void;
  close(callback: () => void): void;
}

// ---------- Error mapping ----------

const REFUSED_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "EPIPE", "EHOSTUNREACH", "ENOTCONN"]);

function property(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null || !(key in err)) return undefined;
  return Reflect.get(err, key);
}

/** Classify an error thrown by modbus-serial. */
export function toTransportError(
  err: unknown,
  context: TransportErrorContext = {}
): TransportError {
  if (err instanceof TransportError) return err.withContext(context);

  const message = err instanceof Error ? err.message : String(err);
  const modbusCode = property(err, "modbusCode");
  if (modbusCode === PERMISSION_DENIED) {
    return new PermissionDeniedError(message, { ...context, cause: err });
  }
  if (typeof modbusCode === "number") {
    return new TransportError("ProtocolError", message, {
      ...context,
      exceptionCode: modbusCode,
      cause: err,
    });
  }

  const errno = property(err, "errno") ?? property(err, "code");
  let kind: TransportErrorKind = "ProtocolError";
  if (errno === "ETIMEDOUT" || /timed out/i.test(message)) {
    kind = "Timeout";
  } else if ((typeof errno === "string" && REFUSED_CODES.has(errno)) || /port not open/i.test(message)) {
    kind = "Refused";
  }
  return new TransportError(kind, message, { ...context, cause: err });
}

/**
 * Bytes after the function code. The library hands back the answer either
 * as the bare payload or as the whole frame with its checksum.
 */
function customAnswer(result: unknown, unitId: number, functionCode: number): Buffer {
  const raw = property(result, "buffer") ?? property(result, "data");
  let answer: Buffer;
  if (Buffer.isBuffer(raw)) {
    answer = raw;
  } else if (Array.isArray(raw) && raw.every((byte) => typeof byte === "number")) {
    answer = Buffer.from(raw);
  } else {
    throw new TransportError("ProtocolError", "Custom function code answer carries no data", {
      unitId,
    });
  }
  if (answer.length >= 4 && answer[0] === unitId && answer[1] === functionCode && hasValidCrc(answer)) {
    return answer.subarray(2, answer.length - 2);
  }
  return answer;
}

// ---------- Connection ----------

export class ModbusSerialConnection implements Connection {
  public readonly supportsMultiWrite = true;

  constructor(
    private readonly client: ModbusClientLike,
    private readonly log: Logger = nullLogger
  ) {}

  async read(
    unitId: number,
    address: number,
    count: number,
    space: RegisterSpace
  ): Promise<RawWords> {
    const context = { unitId, address, count };
    this.log.debug(`READ ${space} unit=${unitId} address=${address} count=${count}`);
    let data: number[];
    try {
      this.client.setID(unitId);
      const result =
        space === "input"
          ? await this.client.readInputRegisters(address, count)
          : await this.client.readHoldingRegisters(address, count);
      data = result.data;
    } catch (err) {
      throw toTransportError(err, context);
    }
    if (data.length !== count) {
      throw new TransportError(
        "ProtocolError",
        `Response carries ${data.length} registers, expected ${count}`,
        context
      );
    }
    return data;
  }

  async write(unitId: number, address: number, values: RawWords): Promise<boolean> {
    this.log.debug(`WRITE unit=${unitId} address=${address} values=[${values.join(", ")}]`);
    try {
      this.client.setID(unitId);
      if (values.length === 1) {
        await this.client.writeRegister(address, values[0]);
      } else {
        await this.client.writeRegisters(address, [...values]);
      }
    } catch (err) {
      throw toTransportError(err, { unitId, address, count: values.length });
    }
    return true;
  }

  async customRequest(unitId: number, functionCode: number, payload: Buffer): Promise<Buffer> {
    const context = { unitId };
    if (!this.client.writeCustomFC) {
      throw new TransportError("ProtocolError", "Client has no custom function code support", {
        ...context,
        exceptionCode: 0x01,
      });
    }
    const send = this.client.writeCustomFC.bind(this.client);
    this.log.debug(`CUSTOM unit=${unitId} fc=${functionCode} payload=${payload.toString("hex")}`);
    let result: unknown;
    try {
      result = await new Promise<unknown>((resolve, reject) => {
        send(unitId, functionCode, [...payload], (err, value) =>
          err ? reject(err) : resolve(value)
        );
      });
    } catch (err) {
      throw toTransportError(err, context);
    }
    return customAnswer(result, unitId, functionCode);
  }

  close(): Promise<void> {
    if (!this.client.isOpen) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.client.close(() => {
        this.log.debug("Connection closed");
        resolve();
      });
    });
  }
}

// ---------- Connector ----------

export interface ModbusConnectorOptions {
  logger?: Logger;
  /** Client factory; defaults to a fresh `ModbusRTU`. */
  createClient?: () => ModbusClientLike;
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

export function createModbusConnector(options: ModbusConnectorOptions = {}): Connector {
  const log = options.logger ?? nullLogger;
  const createClient: () => ModbusClientLike =
    options.createClient ?? (() => new ModbusRTU());

  return async (endpoint: Endpoint, timeoutMs: number): Promise<Connection> => {
    const target = describeEndpoint(endpoint);
    const client = createClient();
    const opening =
      endpoint.type === "tcp"
        ? client.connectTCP(endpoint.host, { port: endpoint.port })
        : client.connectRTUBuffered(endpoint.path, {
            baudRate: endpoint.baudRate,
            dataBits: endpoint.dataBits,
            stopBits: endpoint.stopBits,
            parity: endpoint.parity,
          });

    try {
      await withTimeout(
        opening,
        timeoutMs,
        () => new Error(`timed out after ${timeoutMs}ms`)
      );
    } catch (err) {
      if (client.isOpen) {
        client.close(() => undefined);
      } else {
        // A connect that completes after the timeout must not stay open.
        opening.then(
          () => {
            log.debug(`Closing late connection to ${target}`);
            client.close(() => undefined);
          },
          () => undefined
        );
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(target, message, { cause: err });
    }

    client.setTimeout(timeoutMs);
    log.debug(`Connected to ${target}`);
    return new ModbusSerialConnection(client, log);
  };
}
