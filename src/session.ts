/**
 * Session: the caller-facing handle on one inverter connection.
 *
 * Reads look names up in the register table, plan the fewest wire requests,
 * run the whole plan as one transaction and decode each register. Writes
 * validate and encode before anything reaches the wire.
 */

import { randomBytes } from "node:crypto";
import { decode, encode } from "./codec";
import { crc16 } from "./crc";
import type { DecodedValue, RawWords, TypedValue } from "./codec";
import { resolveEndpoint, resolveOptions } from "./config";
import type { EndpointInput, SessionOptions, SessionOptionsInput } from "./config";
import { TransactionEngine } from "./engine";
import { ConfigError, TransportError, VerificationError } from "./errors";
import { resolveLogger } from "./logger";
import type { Logger } from "./logger";
import { createModbusConnector } from "./modbus-connection";
import { planReads } from "./planner";
import type { RegisterDescriptor, RegisterTable } from "./registers";
import { loadDefaultTable } from "./registers";
import { RetryPolicy } from "./retry";
import type { Sleep } from "./retry";
import { describeEndpoint } from "./transport";
import type { Connector, Endpoint } from "./transport";
import {
  CHALLENGE_LENGTH,
  PRIVATE_FUNCTION_CODE,
  challengeRequest,
  completeUploadRequest,
  loginDigest,
  loginRequest,
  parseChallenge,
  parseLoginAnswer,
  parseUploadComplete,
  parseUploadFrame,
  parseUploadStart,
  startUploadRequest,
  uploadFrameRequest,
} from "./vendor-protocol";

/** Register the inverter watches to keep a session alive. */
export const HEARTBEAT_REGISTER = 49999;

export type ConnectOptions = SessionOptionsInput & {
  /** Register table to use. Default: the bundled inverter catalog. */
  table?: RegisterTable;
  /** Opens connections. Default: modbus-serial. */
  connector?: Connector;
  /** Enable verbose/debug logging. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
  sleep?: Sleep;
};

export interface CallOptions {
  /** Overrides the session's operation timeout. */
  timeoutMs?: number;
  /** Overrides the session's unit id. */
  unitId?: number;
}

export interface SetOptions extends CallOptions {
  /** Read the register back after writing and compare. */
  verify?: boolean;
}

export interface FileOptions extends CallOptions {
  /** Extra bytes some file types take in the upload request. */
  customizedData?: Uint8Array;
}

/** Each request of a file upload gets six tries, ten seconds apart. */
export const FILE_UPLOAD_POLICY = new RetryPolicy(6, 10_000, 10_000);

const SINGLE_ATTEMPT = new RetryPolicy(1, 0, 0);

const hex = (value: number) => `0x${value.toString(16)}`;

export interface WriteAck {
  readonly name: string;
  readonly address: number;
  readonly count: number;
  /** Whether every register was written by one request. */
  readonly atomic: boolean;
}

function sameWords(a: RawWords, b: RawWords): boolean {
  return a.length === b.length && a.every((word, i) => word === b[i]);
}

export class Session {
  private constructor(
    public readonly endpoint: Endpoint,
    public readonly table: RegisterTable,
    public readonly options: SessionOptions,
    private readonly engine: TransactionEngine,
    private readonly log: Logger
  ) {}

  /**
   * Validate the options, open the connection and return a ready session.
   *
   * @throws ConfigError when an option or the endpoint is invalid
   * @throws ConnectionError when the connection cannot be opened
   */
  static async connect(endpoint: EndpointInput, options: ConnectOptions = {}): Promise<Session> {
    const { table, connector, verbose, logger, sleep, ...rest } = options;
    const resolved = resolveOptions(rest);
    const target = resolveEndpoint(endpoint);
    const log = resolveLogger({ logger, verbose });
    const connect = connector ?? createModbusConnector({ logger: log });

    log.debug(`Connecting to ${describeEndpoint(target)}`);
    const connection = await connect(target, resolved.requestTimeoutMs);
    const engine = new TransactionEngine(connection, {
      endpoint: target,
      connector: connect,
      policy: new RetryPolicy(
        resolved.retryAttempts,
        resolved.retryBaseDelayMs,
        resolved.retryMaxDelayMs
      ),
      requestTimeoutMs: resolved.requestTimeoutMs,
      operationTimeoutMs: resolved.operationTimeoutMs,
      cooldownMs: resolved.cooldownMs,
      autoReconnect: resolved.autoReconnect,
      logger: log,
      sleep,
    });
    return new Session(target, table ?? loadDefaultTable(), resolved, engine, log);
  }

  get healthy(): boolean {
    return this.engine.healthy;
  }

  // ---------- Reads ----------

  get(name: string, options?: CallOptions): Promise<TypedValue>;
  get(names: readonly string[], options?: CallOptions): Promise<Record<string, TypedValue>>;
  async get(
    names: string | readonly string[],
    options: CallOptions = {}
  ): Promise<TypedValue | Record<string, TypedValue>> {
    if (typeof names === "string") {
      const [value] = await this.read([names], options);
      return value;
    }
    const values = await this.read(names, options);
    return Object.fromEntries(values.map((value) => [value.name, value]));
  }

  private async read(names: readonly string[], options: CallOptions): Promise<TypedValue[]> {
    const descriptors = [...new Set(names)].map((name) => this.table.lookup(name));
    if (descriptors.length === 0) return [];
    const snapshot = await this.engine.readPlan(this.plan(descriptors), {
      unitId: this.unitIdFor(options),
      timeoutMs: options.timeoutMs,
    });
    return descriptors.map((d) => decode(d, snapshot.wordsFor(d)));
  }

  private plan(descriptors: readonly RegisterDescriptor[]) {
    return planReads(descriptors, {
      maxRegistersPerRequest: this.options.maxRegistersPerRequest,
      coalesceGapThreshold: this.options.coalesceGapThreshold,
    });
  }

  // ---------- Writes ----------

  /**
   * Encode and write a register.
   *
   * @throws UnknownRegisterError, NotWritableError or EncodeError before any
   *   wire traffic
   * @throws PartialWriteFailure when only some registers were confirmed
   * @throws VerificationError when `verify` is set and the read-back differs
   */
  async set(name: string, value: DecodedValue, options: SetOptions = {}): Promise<WriteAck> {
    const descriptor = this.table.lookup(name);
    const words = encode(descriptor, value);
    const call = { unitId: this.unitIdFor(options), timeoutMs: options.timeoutMs };

    const { atomic } = await this.engine.write(name, descriptor.address, words, call);
    this.log.debug(`Wrote ${name} at ${descriptor.address}: [${words.join(", ")}]`);

    if (options.verify) {
      const snapshot = await this.engine.readPlan(this.plan([descriptor]), call);
      const actual = snapshot.wordsFor(descriptor);
      if (!sameWords(actual, words)) {
        throw new VerificationError(name, words, actual);
      }
    }
    return Object.freeze({ name, address: descriptor.address, count: words.length, atomic });
  }

  /**
   * Write the keep-alive value. Resolves `false` instead of throwing when the
   * device cannot be reached.
   */
  async heartbeat(unitId?: number): Promise<boolean> {
    try {
      await this.engine.write("heartbeat", HEARTBEAT_REGISTER, [1], {
        unitId: this.unitIdFor({ unitId }),
      });
    } catch (err) {
      this.log.warn(`Heartbeat failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
    this.log.debug("Heartbeat succeeded");
    return true;
  }

  // ---------- Private function code ----------

  /**
   * Log in with the inverter's challenge/response handshake. Resolves
   * `false` when the credentials are rejected.
   *
   * @throws TransportError when the handshake cannot be completed
   */
  async login(username: string, password: string, options: CallOptions = {}): Promise<boolean> {
    const call = {
      unitId: this.unitIdFor(options),
      timeoutMs: options.timeoutMs,
      policy: SINGLE_ATTEMPT,
    };
    const inverterChallenge = await this.engine.exchange(
      "login challenge",
      PRIVATE_FUNCTION_CODE,
      call,
      async (send) => parseChallenge(await send(challengeRequest()))
    );

    const clientChallenge = randomBytes(CHALLENGE_LENGTH);
    const answer = await this.engine.exchange("login", PRIVATE_FUNCTION_CODE, call, async (send) =>
      parseLoginAnswer(
        await send(loginRequest(username, password, inverterChallenge, clientChallenge))
      )
    );
    if (!answer.accepted) {
      this.log.warn(`Login as ${username} was rejected`);
      return false;
    }
    if (!answer.mac.equals(loginDigest(password, clientChallenge))) {
      this.log.error("Inverter answered the login with a wrong digest of our challenge");
    }
    this.log.info(`Logged in as ${username}`);
    return true;
  }

  /**
   * Fetch a file through the upload procedure: start, read every frame,
   * complete, then check the CRC the inverter announced.
   *
   * @throws PermissionDeniedError when the file needs a login
   * @throws TransportError when a step fails or the CRC does not match
   */
  async getFile(fileType: number, options: FileOptions = {}): Promise<Buffer> {
    const unitId = this.unitIdFor(options);
    const call = { unitId, timeoutMs: options.timeoutMs, policy: FILE_UPLOAD_POLICY };

    return this.engine.exchange(`file ${hex(fileType)}`, PRIVATE_FUNCTION_CODE, call, async (send) => {
      const start = parseUploadStart(
        await send(startUploadRequest(fileType, options.customizedData))
      );
      this.log.debug(
        `File ${hex(fileType)}: ${start.fileLength} bytes in frames of ${start.frameLength}`
      );

      const frames: Buffer[] = [];
      for (let frameNo = 0; frameNo * start.frameLength < start.fileLength; frameNo++) {
        frames.push(parseUploadFrame(await send(uploadFrameRequest(fileType, frameNo))).data);
      }

      const expected = parseUploadComplete(await send(completeUploadRequest(fileType)));
      const data = Buffer.concat(frames);
      const actual = crc16(data);
      if (actual !== expected) {
        throw new TransportError(
          "ProtocolError",
          `Computed CRC ${hex(actual)} for file ${hex(fileType)} does not match expected value ${hex(expected)}`,
          { unitId }
        );
      }
      return data;
    });
  }

  // ---------- Connection ----------

  /** Replace the connection explicitly. @throws ConnectionError */
  reconnect(): Promise<void> {
    return this.engine.reconnect();
  }

  close(): Promise<void> {
    return this.engine.close();
  }

  private unitIdFor(options: CallOptions): number {
    const unitId = options.unitId ?? this.options.unitId;
    if (!Number.isInteger(unitId) || unitId < 0 || unitId > 255) {
      throw new ConfigError([`unitId: ${unitId} is not between 0 and 255`]);
    }
    return unitId;
  }
}
