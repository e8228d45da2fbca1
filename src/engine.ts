/**
 * Transaction engine: owns the single connection to the device and makes
 * sure only one request is ever on the wire.
 *
 * Every read plan and every write runs as one transaction inside a FIFO
 * lock. Transient transport failures are retried with backoff; running out
 * of attempts marks the connection unhealthy, after which calls fail fast
 * until a reconnect succeeds.
 */

import { Mutex } from "async-mutex";
import type { RawWords } from "./codec";
import {
  ConnectionUnavailableError,
  PartialWriteFailure,
  TransportError,
} from "./errors";
import type { TransportErrorContext } from "./errors";
import type { Logger } from "./logger";
import { nullLogger } from "./logger";
import { RegisterSnapshot } from "./planner";
import type { ReadPlan } from "./planner";
import { RetriesExhaustedError, RetryPolicy, sleep as defaultSleep } from "./retry";
import type { Sleep } from "./retry";
import { describeEndpoint } from "./transport";
import type { Connection, Connector, Endpoint } from "./transport";

export type TransactionState =
  | "Idle"
  | "Acquiring"
  | "Executing"
  | "Retrying"
  | "Success"
  | "Failed";

export interface EngineOptions {
  endpoint: Endpoint;
  connector: Connector;
  policy: RetryPolicy;
  requestTimeoutMs: number;
  operationTimeoutMs: number;
  cooldownMs: number;
  autoReconnect: boolean;
  logger?: Logger;
  sleep?: Sleep;
}

export interface TransactionOptions {
  unitId: number;
  /** Bound on waiting for the lock plus execution. */
  timeoutMs?: number;
}

export interface ExchangeOptions extends TransactionOptions {
  /** Retry policy for each request of the exchange. Default: the engine's. */
  policy?: RetryPolicy;
}

/** Sends one payload under the exchange's function code. */
export type CustomSend = (payload: Buffer) => Promise<Buffer>;

export interface WriteResult {
  /** Whether all registers were written by a single request. */
  atomic: boolean;
}

type Phase = "queued" | "executing" | "done";

export class TransactionEngine {
  private readonly mutex = new Mutex();
  private readonly log: Logger;
  private readonly sleep: Sleep;

  private connection: Connection | null;
  private isHealthy = true;
  private closed = false;

  /** Tickets are handed out in arrival order. */
  private nextTicket = 0;
  /** Callers holding a ticket below this fail fast instead of reconnecting. */
  private failFastBelow = 0;

  constructor(
    connection: Connection,
    private readonly options: EngineOptions
  ) {
    this.connection = connection;
    this.log = options.logger ?? nullLogger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get healthy(): boolean {
    return this.isHealthy && !this.closed && this.connection !== null;
  }

  // ---------- Public operations ----------

  /** Execute every range of a plan inside one lock acquisition. */
  readPlan(plan: ReadPlan, options: TransactionOptions): Promise<RegisterSnapshot> {
    const { unitId } = options;
    return this.transact("read", options, async (connection, signal) => {
      const results: RawWords[] = [];
      for (const range of plan.ranges) {
        const context = { unitId, address: range.address, count: range.count };
        const words = await this.withRetry("read", context, signal, async () => {
          const words = await connection.read(unitId, range.address, range.count, range.space);
          if (words.length !== range.count) {
            throw new TransportError(
              "ProtocolError",
              `Response carries ${words.length} registers, expected ${range.count}`,
              context
            );
          }
          return words;
        });
        results.push(words);
      }
      return new RegisterSnapshot(plan.ranges, results);
    });
  }

  /**
   * Write consecutive registers. Writes are issued once and never retried.
   * Without multi-register support the registers are written one by one in
   * ascending order; a failure after the first confirmed register raises
   * {@link PartialWriteFailure}.
   */
  write(
    register: string,
    address: number,
    values: RawWords,
    options: TransactionOptions
  ): Promise<WriteResult> {
    const { unitId } = options;
    return this.transact("write", options, async (connection) => {
      if (values.length === 1 || connection.supportsMultiWrite) {
        await this.writeOnce(connection, unitId, address, values);
        return { atomic: true };
      }

      const confirmed: number[] = [];
      for (let i = 0; i < values.length; i++) {
        try {
          await this.writeOnce(connection, unitId, address + i, [values[i]]);
        } catch (err) {
          if (confirmed.length === 0) throw err;
          const unconfirmed = values.map((_, j) => address + j).slice(i);
          this.log.warn(
            `Partial write of ${register}: ${confirmed.length} of ${values.length} registers confirmed`
          );
          throw new PartialWriteFailure(register, confirmed, unconfirmed, { cause: err });
        }
        confirmed.push(address + i);
      }
      return { atomic: false };
    });
  }

  /**
   * Run a sequence of vendor function code requests inside one lock
   * acquisition. Each request is retried like a read.
   */
  exchange<T>(
    label: string,
    functionCode: number,
    options: ExchangeOptions,
    work: (send: CustomSend) => Promise<T>
  ): Promise<T> {
    const { unitId } = options;
    return this.transact(label, options, (connection, signal) =>
      work((payload) =>
        this.withRetry(
          label,
          { unitId },
          signal,
          () => {
            if (!connection.customRequest) {
              throw new TransportError(
                "ProtocolError",
                `Connection cannot send function code ${functionCode}`,
                { unitId, exceptionCode: 0x01 }
              );
            }
            return connection.customRequest(unitId, functionCode, payload);
          },
          options.policy
        )
      )
    );
  }

  /** Replace the connection with a fresh one. @throws ConnectionError */
  async reconnect(): Promise<void> {
    if (this.closed) throw new ConnectionUnavailableError("Session is closed");
    const release = await this.mutex.acquire();
    try {
      await this.openConnection();
    } finally {
      release();
    }
  }

  /** Close the connection. Queued and later calls fail fast. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const connection = this.connection;
    this.connection = null;
    if (connection) await connection.close();
  }

  // ---------- Transactions ----------

  private async transact<T>(
    label: string,
    options: TransactionOptions,
    work: (connection: Connection, signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const ticket = this.nextTicket++;
    const name = `${label} #${ticket}`;
    const limit = options.timeoutMs ?? this.options.operationTimeoutMs;
    const controller = new AbortController();
    let phase: Phase = "queued";

    this.state(name, "Acquiring");
    return new Promise<T>((resolve, reject) => {
      let settled = false;
      const settle = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        outcome();
      };

      const timer = setTimeout(() => {
        if (phase === "done") return;
        const waiting = phase === "queued";
        const err = new TransportError(
          "Timeout",
          `${label} timed out after ${limit}ms ${waiting ? "waiting for the connection" : "on the wire"}`,
          { unitId: options.unitId }
        );
        controller.abort(err);
        if (phase === "executing") this.abandonInFlight();
        settle(() => reject(err));
      }, limit);

      // The caller hears the outcome as soon as the work settles; the
      // cooldown still runs before the lock is released.
      const run = async (): Promise<void> => {
        const release = await this.mutex.acquire();
        let touched = false;
        try {
          controller.signal.throwIfAborted();
          const connection = await this.ensureConnection(ticket);
          phase = "executing";
          touched = true;
          this.state(name, "Executing");
          const result = await work(connection, controller.signal);
          phase = "done";
          this.state(name, "Success");
          settle(() => resolve(result));
        } catch (err) {
          phase = "done";
          this.state(name, "Failed");
          settle(() => reject(err));
        } finally {
          if (touched && this.options.cooldownMs > 0) {
            await this.sleep(this.options.cooldownMs);
          }
          release();
        }
      };

      run().catch((err: unknown) => {
        this.log.error(`${name}: cooldown failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    });
  }

  private state(name: string, state: TransactionState): void {
    this.log.debug(`${name}: ${state}`);
  }

  private async withRetry<T>(
    label: string,
    context: TransportErrorContext,
    signal: AbortSignal,
    call: () => Promise<T>,
    policy: RetryPolicy = this.options.policy
  ): Promise<T> {
    const target = context.address === undefined ? label : `${label} ${context.address}`;
    try {
      return await policy.execute(call, {
        shouldRetry: (err) => err instanceof TransportError && err.retryable,
        onRetry: (_err, retry, delayMs) =>
          this.log.debug(`${target}: Retrying (#${retry}) in ${delayMs}ms`),
        signal,
        sleep: this.sleep,
        logger: this.log,
        label: target,
      });
    } catch (err) {
      if (err instanceof RetriesExhaustedError) {
        this.markUnhealthy("retries exhausted");
        const last =
          err.cause instanceof TransportError
            ? err.cause
            : new TransportError("ProtocolError", err.message, { cause: err.cause });
        throw last.withContext({ ...context, attempts: err.attempts });
      }
      if (err instanceof TransportError) throw err.withContext(context);
      throw err;
    }
  }

  private async writeOnce(
    connection: Connection,
    unitId: number,
    address: number,
    values: RawWords
  ): Promise<void> {
    const context = { unitId, address, count: values.length, attempts: 1 };
    let confirmed: boolean;
    try {
      confirmed = await connection.write(unitId, address, values);
    } catch (err) {
      if (err instanceof TransportError) throw err.withContext(context);
      throw err;
    }
    if (!confirmed) {
      throw new TransportError("ProtocolError", `Write to ${address} was not confirmed`, context);
    }
  }

  // ---------- Connection health ----------

  private async ensureConnection(ticket: number): Promise<Connection> {
    if (this.closed) {
      throw new ConnectionUnavailableError("Session is closed");
    }
    if (this.isHealthy && this.connection) {
      return this.connection;
    }
    if (!this.options.autoReconnect || ticket < this.failFastBelow) {
      throw new ConnectionUnavailableError();
    }
    try {
      return await this.openConnection();
    } catch (err) {
      // Everyone already waiting gave up along with this attempt.
      this.failFastBelow = this.nextTicket;
      throw new ConnectionUnavailableError("Reconnect failed", { cause: err });
    }
  }

  /** Must be called while holding the lock. */
  private async openConnection(): Promise<Connection> {
    const target = describeEndpoint(this.options.endpoint);
    const previous = this.connection;
    this.connection = null;
    if (previous) {
      try {
        await previous.close();
      } catch (err) {
        this.log.debug(`Closing stale connection failed: ${String(err)}`);
      }
    }
    this.log.info(`Reconnecting to ${target}`);
    try {
      this.connection = await this.options.connector(
        this.options.endpoint,
        this.options.requestTimeoutMs
      );
    } catch (err) {
      this.isHealthy = false;
      this.log.warn(`Reconnect to ${target} failed: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }
    this.isHealthy = true;
    this.log.info(`Reconnected to ${target}`);
    return this.connection;
  }

  private markUnhealthy(reason: string): void {
    if (this.isHealthy) {
      this.log.warn(`Connection marked unhealthy: ${reason}`);
    }
    this.isHealthy = false;
  }

  private abandonInFlight(): void {
    const connection = this.connection;
    if (!connection) return;
    if (connection.cancel) {
      this.log.debug("Cancelling in-flight request");
      connection.cancel();
      return;
    }
    this.markUnhealthy("in-flight request abandoned");
    this.connection = null;
    connection.close().catch((err: unknown) => {
      this.log.warn(`Closing abandoned connection failed: ${String(err)}`);
    });
  }
}
