import { describe, it, expect } from "vitest";
import { crc16 } from "../src/crc";
import {
  ConfigError,
  EncodeError,
  NotWritableError,
  PartialWriteFailure,
  PermissionDeniedError,
  TransportError,
  UnknownRegisterError,
  VerificationError,
} from "../src/errors";
import type { Logger } from "../src/logger";
import { RegisterTable } from "../src/registers";
import { HEARTBEAT_REGISTER, Session } from "../src/session";
import type { ConnectOptions } from "../src/session";
import { loginDigest } from "../src/vendor-protocol";
import {
  FakeConnection,
  FakeConnector,
  busyError,
  timeoutError,
} from "./helpers/fake-connection";
import type { CustomHandler } from "./helpers/fake-connection";

const table = RegisterTable.fromDefinitions([
  { name: "A", address: 100, type: { kind: "uint", width: 1 }, scale: [1, 10], unit: "V" },
  { name: "B", address: 101, type: { kind: "uint", width: 1 } },
  { name: "C", address: 102, type: { kind: "int", width: 1 } },
  { name: "limit", address: 200, type: { kind: "uint", width: 2 }, unit: "W", writable: true },
  {
    name: "mode",
    address: 210,
    type: { kind: "enum", width: 1, mapping: { "0": "auto", "1": "manual" } },
    writable: true,
  },
]);

async function open(connection: FakeConnection, options: ConnectOptions = {}) {
  const connector = new FakeConnector(connection);
  const session = await Session.connect(
    { type: "tcp", host: "inverter.test" },
    { table, connector: connector.connect, cooldownMs: 0, sleep: async () => {}, ...options }
  );
  return { session, connector };
}

describe("Session.connect", () => {
  it("should apply defaults to the endpoint and options", async () => {
    const { session, connector } = await open(new FakeConnection());
    expect(session.endpoint).toEqual({ type: "tcp", host: "inverter.test", port: 502 });
    expect(session.options.unitId).toBe(1);
    expect(session.options.maxRegistersPerRequest).toBe(125);
    expect(session.healthy).toBe(true);
    expect(connector.attempts).toHaveLength(1);
  });

  it("should reject invalid options before connecting", async () => {
    const connector = new FakeConnector(new FakeConnection());
    await expect(
      Session.connect(
        { type: "tcp", host: "inverter.test" },
        { connector: connector.connect, maxRegistersPerRequest: 200 }
      )
    ).rejects.toBeInstanceOf(ConfigError);
    expect(connector.attempts).toHaveLength(0);
  });

  it("should use the bundled catalog by default", async () => {
    const connector = new FakeConnector(new FakeConnection());
    const session = await Session.connect(
      { type: "serial", path: "/dev/ttyUSB0" },
      { connector: connector.connect }
    );
    expect(session.table.has("active_power")).toBe(true);
    expect(session.endpoint).toEqual({ type: "serial", path: "/dev/ttyUSB0", baudRate: 9600 });
  });
});

describe("Session.get", () => {
  it("should read adjacent registers with one request", async () => {
    const connection = new FakeConnection({ 100: 1234, 101: 7 });
    const { session } = await open(connection);

    const values = await session.get(["A", "B"]);

    expect(values.A.value).toBe(123.4);
    expect(values.A.unit).toBe("V");
    expect(values.B.value).toBe(7);
    expect(connection.calls).toEqual([
      { op: "read", unitId: 1, address: 100, count: 2, space: "holding" },
    ]);
  });

  it("should return a single value for a single name", async () => {
    const connection = new FakeConnection({ 102: 0xfffe });
    const { session } = await open(connection);

    const value = await session.get("C");
    expect(value).toEqual({
      name: "C",
      value: -2,
      unit: "",
      scale: { numerator: 1, denominator: 1 },
      raw: [0xfffe],
    });
  });

  it("should split requests at the configured limit", async () => {
    const connection = new FakeConnection({ 100: 1, 101: 2, 102: 3 });
    const { session } = await open(connection, { maxRegistersPerRequest: 2 });

    const values = await session.get(["C", "A", "B"]);
    expect(Object.keys(values)).toEqual(["C", "A", "B"]);
    expect(connection.calls.map((c) => [c.address, c.count])).toEqual([
      [100, 2],
      [102, 1],
    ]);
  });

  it("should reject unknown names before touching the wire", async () => {
    const connection = new FakeConnection();
    const { session } = await open(connection);

    await expect(session.get(["A", "missing"])).rejects.toBeInstanceOf(UnknownRegisterError);
    expect(connection.calls).toHaveLength(0);
  });

  it("should not touch the wire for an empty request", async () => {
    const connection = new FakeConnection();
    const { session } = await open(connection);

    await expect(session.get([])).resolves.toEqual({});
    expect(connection.calls).toHaveLength(0);
  });

  it("should address the unit given per call", async () => {
    const connection = new FakeConnection();
    const { session } = await open(connection, { unitId: 2 });

    await session.get("B");
    await session.get("B", { unitId: 3 });
    expect(connection.calls.map((c) => c.unitId)).toEqual([2, 3]);
    await expect(session.get("B", { unitId: 300 })).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("Session.set", () => {
  it("should encode and write a register", async () => {
    const connection = new FakeConnection();
    const { session } = await open(connection);

    const ack = await session.set("limit", 70000);
    expect(ack).toEqual({ name: "limit", address: 200, count: 2, atomic: true });
    expect(connection.calls).toEqual([
      { op: "write", unitId: 1, address: 200, count: 2, values: [1, 4464] },
    ]);
  });

  it("should write enum labels", async () => {
    const connection = new FakeConnection();
    const { session } = await open(connection);

    await session.set("mode", "manual");
    expect(connection.get(210)).toBe(1);
  });

  it("should refuse bad writes before touching the wire", async () => {
    const connection = new FakeConnection();
    const { session } = await open(connection);

    await expect(session.set("A", 1)).rejects.toBeInstanceOf(NotWritableError);
    await expect(session.set("mode", "turbo")).rejects.toBeInstanceOf(EncodeError);
    await expect(session.set("nope", 1)).rejects.toBeInstanceOf(UnknownRegisterError);
    expect(connection.calls).toHaveLength(0);
  });

  it("should report which registers of a split write were confirmed", async () => {
    const connection = new FakeConnection();
    connection.supportsMultiWrite = false;
    connection.writeFailures.set(201, timeoutError());
    const { session } = await open(connection);

    const error = await session.set("limit", 70000).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PartialWriteFailure);
    expect(error).toMatchObject({ confirmed: [200], unconfirmed: [201] });
    expect(connection.get(200)).toBe(1);
  });

  it("should read the register back when asked to verify", async () => {
    const connection = new FakeConnection();
    const { session } = await open(connection);

    await session.set("limit", 70000, { verify: true });
    expect(connection.calls.map((c) => `${c.op}@${c.address}`)).toEqual(["write@200", "read@200"]);
  });

  it("should raise VerificationError when the read-back differs", async () => {
    const connection = new FakeConnection();
    connection.ignoreWrites = true;
    const { session } = await open(connection);

    const error = await session.set("limit", 70000, { verify: true }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(VerificationError);
    expect(error).toMatchObject({ register: "limit", expected: [1, 4464], actual: [0, 0] });
  });
});

describe("Session.heartbeat", () => {
  it("should write 1 to the heartbeat register", async () => {
    const connection = new FakeConnection();
    const { session } = await open(connection, { unitId: 4 });

    await expect(session.heartbeat()).resolves.toBe(true);
    expect(connection.calls).toEqual([
      { op: "write", unitId: 4, address: HEARTBEAT_REGISTER, count: 1, values: [1] },
    ]);
  });

  it("should resolve false and warn when the write fails", async () => {
    const connection = new FakeConnection();
    connection.writeFailures.set(HEARTBEAT_REGISTER, timeoutError());
    const warnings: string[] = [];
    const logger: Logger = {
      debug() {},
      info() {},
      warn: (message) => warnings.push(message),
      error() {},
    };
    const { session } = await open(connection, { logger });

    await expect(session.heartbeat()).resolves.toBe(false);
    expect(warnings).toEqual(["Heartbeat failed: Timed out"]);
  });
});

function recordingLogger() {
  const lines: string[] = [];
  const logger: Logger = {
    debug() {},
    info() {},
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
  };
  return { logger, lines };
}

const password = "test-secret";
const inverterChallenge = Buffer.alloc(16, 7);

/** Device side of the login handshake for user "installer". */
function loginDevice(options: { tamperDigest?: boolean } = {}): CustomHandler {
  return ({ payload }) => {
    if (payload[0] === 36) {
      return Buffer.concat([Buffer.from([36, 0x11]), inverterChallenge]);
    }
    const clientChallenge = payload.subarray(2, 18);
    const userLength = payload[18];
    const user = payload.subarray(19, 19 + userLength).toString("utf8");
    const macLength = payload[19 + userLength];
    const mac = payload.subarray(20 + userLength, 20 + userLength + macLength);
    if (user !== "installer" || !mac.equals(loginDigest(password, inverterChallenge))) {
      return Buffer.from([37, 0, 1]);
    }
    const answer = loginDigest(options.tamperDigest ? "other" : password, clientChallenge);
    return Buffer.concat([Buffer.from([37, 0, 0, answer.length]), answer]);
  };
}

describe("Session.login", () => {
  it("should complete the challenge handshake", async () => {
    const connection = new FakeConnection();
    connection.customHandler = loginDevice();
    const { logger, lines } = recordingLogger();
    const { session } = await open(connection, { logger, unitId: 0 });

    await expect(session.login("installer", password)).resolves.toBe(true);
    expect(connection.customCalls.map((c) => [c.unitId, c.functionCode, c.payload[0]])).toEqual([
      [0, 0x41, 36],
      [0, 0x41, 37],
    ]);
    expect(lines).toEqual([]);
  });

  it("should resolve false for rejected credentials", async () => {
    const connection = new FakeConnection();
    connection.customHandler = loginDevice();
    const { logger, lines } = recordingLogger();
    const { session } = await open(connection, { logger });

    await expect(session.login("installer", "wrong-secret")).resolves.toBe(false);
    expect(lines).toEqual(["warn Login as installer was rejected"]);
  });

  it("should flag an inverter that answers with the wrong digest", async () => {
    const connection = new FakeConnection();
    connection.customHandler = loginDevice({ tamperDigest: true });
    const { logger, lines } = recordingLogger();
    const { session } = await open(connection, { logger });

    await expect(session.login("installer", password)).resolves.toBe(true);
    expect(lines).toEqual([
      "error Inverter answered the login with a wrong digest of our challenge",
    ]);
  });

  it("should not repeat a failed handshake request", async () => {
    const connection = new FakeConnection();
    connection.customHandler = loginDevice();
    connection.customFailures.push(timeoutError());
    const { session } = await open(connection);

    await expect(session.login("installer", password)).rejects.toMatchObject({
      name: "TransportError",
      kind: "Timeout",
      attempts: 1,
    });
    expect(connection.customCalls).toHaveLength(1);
  });
});

const FILE_TYPE = 0x45;
const fileContent = Buffer.from("hello world!", "ascii");

/** Serves `file` through the upload procedure in frames of `frameLength`. */
function fileDevice(file: Buffer, frameLength: number, announcedCrc = crc16(file)): CustomHandler {
  return ({ payload }) => {
    const fileType = payload[2];
    switch (payload[0]) {
      case 0x05: {
        const answer = Buffer.from([0x05, 6, fileType, 0, 0, 0, 0, frameLength]);
        answer.writeUInt32BE(file.length, 3);
        return answer;
      }
      case 0x06: {
        const frameNo = payload.readUInt16BE(3);
        const data = file.subarray(frameNo * frameLength, (frameNo + 1) * frameLength);
        const header = Buffer.from([0x06, data.length + 3, fileType, 0, 0]);
        header.writeUInt16BE(frameNo, 3);
        return Buffer.concat([header, data]);
      }
      default: {
        const answer = Buffer.from([0x0c, 3, fileType, 0, 0]);
        answer.writeUInt16BE(announcedCrc, 3);
        return answer;
      }
    }
  };
}

describe("Session.getFile", () => {
  it("should start, read every frame and complete the upload", async () => {
    const connection = new FakeConnection();
    connection.customHandler = fileDevice(fileContent, 5);
    const { session } = await open(connection);

    const file = await session.getFile(FILE_TYPE, { customizedData: Buffer.from([1, 2]) });

    expect(file.toString("ascii")).toBe("hello world!");
    expect(connection.customCalls.map((c) => [...c.payload])).toEqual([
      [0x05, 3, FILE_TYPE, 1, 2],
      [0x06, 3, FILE_TYPE, 0, 0],
      [0x06, 3, FILE_TYPE, 0, 1],
      [0x06, 3, FILE_TYPE, 0, 2],
      [0x0c, 1, FILE_TYPE],
    ]);
  });

  it("should wait ten seconds before retrying a busy inverter", async () => {
    const connection = new FakeConnection();
    connection.customHandler = fileDevice(fileContent, 16);
    connection.customFailures.push(busyError());
    const delays: number[] = [];
    const { session } = await open(connection, {
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    await expect(session.getFile(FILE_TYPE)).resolves.toEqual(fileContent);
    expect(delays).toEqual([10_000]);
    expect(connection.customCalls).toHaveLength(4);
  });

  it("should raise PermissionDeniedError without retrying", async () => {
    const connection = new FakeConnection();
    connection.customHandler = fileDevice(fileContent, 5);
    connection.customFailures.push(new PermissionDeniedError());
    const { session } = await open(connection);

    const error = await session.getFile(FILE_TYPE).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PermissionDeniedError);
    expect(error).toMatchObject({ exceptionCode: 0x80, unitId: 1 });
    expect(connection.customCalls).toHaveLength(1);
    expect(session.healthy).toBe(true);
  });

  it("should reject a file whose CRC does not match", async () => {
    const connection = new FakeConnection();
    connection.customHandler = fileDevice(fileContent, 5, 0x1234);
    const { session } = await open(connection);

    const error = await session.getFile(FILE_TYPE).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: `Computed CRC 0x${crc16(fileContent).toString(16)} for file 0x45 does not match expected value 0x1234`,
    });
  });
});

describe("Session.reconnect", () => {
  it("should replace the connection", async () => {
    const first = new FakeConnection();
    const second = new FakeConnection({ 101: 8 });
    const connector = new FakeConnector(first, second);
    const session = await Session.connect(
      { type: "tcp", host: "inverter.test" },
      { table, connector: connector.connect, cooldownMs: 0 }
    );

    await session.reconnect();
    expect(first.closed).toBe(true);
    expect(connector.attempts).toHaveLength(2);
    expect(session.healthy).toBe(true);
    expect((await session.get("B")).value).toBe(8);
    expect(second.calls).toHaveLength(1);
  });
});

describe("Session.close", () => {
  it("should close the connection", async () => {
    const connection = new FakeConnection();
    const { session } = await open(connection);

    await session.close();
    expect(connection.closed).toBe(true);
    expect(session.healthy).toBe(false);
  });
});
