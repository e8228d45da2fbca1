import { describe, it, expect } from "vitest";
import { crc16 } from "../src/crc";
import { ConnectionError, PermissionDeniedError, TransportError } from "../src/errors";
import {
  ModbusSerialConnection,
  createModbusConnector,
  toTransportError,
} from "../src/modbus-connection";
import type { ModbusClientLike } from "../src/modbus-connection";

/** Scriptable stand-in for a modbus-serial client. */
class FakeClient implements ModbusClientLike {
  isOpen = false;
  id = 0;
  timeout = 0;
  log: string[] = [];
  failWith: unknown = null;
  connectFailure: unknown = null;
  /** Delay before a connect completes. */
  openAfterMs = 0;
  closes = 0;
  registers = new Map<number, number>();
  /** What `writeCustomFC` hands back; `null` answers with the whole frame. */
  customResult: unknown = null;

  async connectTCP(host: string, options: { port: number }): Promise<void> {
    this.log.push(`tcp ${host}:${options.port}`);
    if (this.openAfterMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.openAfterMs));
    }
    if (this.connectFailure) throw this.connectFailure;
    this.isOpen = true;
  }

  async connectRTUBuffered(path: string, options: { baudRate: number }): Promise<void> {
    this.log.push(`rtu ${path}@${options.baudRate}`);
    this.isOpen = true;
  }

  setID(id: number): void {
    this.id = id;
  }

  setTimeout(duration: number): void {
    this.timeout = duration;
  }

  async readHoldingRegisters(address: number, length: number): Promise<{ data: number[] }> {
    this.log.push(`fc3 ${address}+${length} unit ${this.id}`);
    return this.answer(address, length);
  }

  async readInputRegisters(address: number, length: number): Promise<{ data: number[] }> {
    this.log.push(`fc4 ${address}+${length} unit ${this.id}`);
    return this.answer(address, length);
  }

  async writeRegister(address: number, value: number): Promise<unknown> {
    this.log.push(`fc6 ${address}=${value}`);
    if (this.failWith) throw this.failWith;
    return { address, value };
  }

  async writeRegisters(address: number, values: number[]): Promise<unknown> {
    this.log.push(`fc16 ${address}=${values.join(",")}`);
    if (this.failWith) throw this.failWith;
    return { address, length: values.length };
  }

  writeCustomFC(
    address: number,
    functionCode: number,
    data: number[],
    next: (err: Error | null, result?: unknown) => void
  ): void {
    this.log.push(`fc${functionCode} unit ${address} ${Buffer.from(data).toString("hex")}`);
    if (this.failWith instanceof Error) {
      next(this.failWith);
      return;
    }
    if (this.customResult !== null) {
      next(null, this.customResult);
      return;
    }
    const body = Buffer.from([address, functionCode, data[0], 0x11]);
    const crc = Buffer.alloc(2);
    crc.writeUInt16LE(crc16(body));
    next(null, { buffer: Buffer.concat([body, crc]) });
  }

  close(callback: () => void): void {
    this.isOpen = false;
    this.closes++;
    callback();
  }

  private answer(address: number, length: number): { data: number[] } {
    if (this.failWith) throw this.failWith;
    const data: number[] = [];
    for (let a = address; a < address + length; a++) data.push(this.registers.get(a) ?? 0);
    return { data };
  }
}

function libraryError(message: string, extra: Record<string, unknown>): Error {
  return Object.assign(new Error(message), extra);
}

describe("toTransportError", () => {
  it("should map modbus exceptions to protocol errors with their code", () => {
    const err = toTransportError(
      libraryError("Modbus exception 2: Illegal data address", { modbusCode: 2 }),
      { address: 5 }
    );
    expect(err).toMatchObject({ kind: "ProtocolError", exceptionCode: 2, address: 5 });
    expect(err.retryable).toBe(false);
  });

  it("should treat busy devices as retryable", () => {
    const err = toTransportError(libraryError("Modbus exception 6: busy", { modbusCode: 6 }));
    expect(err.retryable).toBe(true);
  });

  it("should recognise timeouts", () => {
    expect(toTransportError(libraryError("Timed out", { errno: "ETIMEDOUT" })).kind).toBe(
      "Timeout"
    );
    expect(toTransportError(new Error("Timed out")).kind).toBe("Timeout");
  });

  it("should recognise closed and refused connections", () => {
    expect(toTransportError(libraryError("Port Not Open", { errno: "ECONNREFUSED" })).kind).toBe(
      "Refused"
    );
    expect(toTransportError(libraryError("socket hang up", { code: "ECONNRESET" })).kind).toBe(
      "Refused"
    );
  });

  it("should raise PermissionDeniedError for exception 0x80", () => {
    const err = toTransportError(libraryError("Modbus exception 128", { modbusCode: 0x80 }), {
      unitId: 2,
    });
    expect(err).toBeInstanceOf(PermissionDeniedError);
    expect(err).toMatchObject({ exceptionCode: 0x80, unitId: 2 });
    expect(err.retryable).toBe(false);
    expect(err.withContext({ attempts: 1 })).toBeInstanceOf(PermissionDeniedError);
  });

  it("should call anything else a protocol error", () => {
    const err = toTransportError(new Error("Data length error"));
    expect(err.kind).toBe("ProtocolError");
    expect(err.retryable).toBe(true);
  });

  it("should add context to an existing transport error", () => {
    const original = new TransportError("Timeout", "Timed out");
    expect(toTransportError(original, { unitId: 3 })).toMatchObject({
      kind: "Timeout",
      unitId: 3,
    });
  });
});

describe("ModbusSerialConnection", () => {
  it("should read holding and input registers for the given unit", async () => {
    const client = new FakeClient();
    client.registers.set(10, 99);
    const connection = new ModbusSerialConnection(client);

    await expect(connection.read(3, 10, 2, "holding")).resolves.toEqual([99, 0]);
    await expect(connection.read(4, 10, 1, "input")).resolves.toEqual([99]);
    expect(client.log).toEqual(["fc3 10+2 unit 3", "fc4 10+1 unit 4"]);
  });

  it("should use single and multiple register writes", async () => {
    const client = new FakeClient();
    const connection = new ModbusSerialConnection(client);

    await expect(connection.write(1, 20, [5])).resolves.toBe(true);
    await expect(connection.write(1, 30, [6, 7])).resolves.toBe(true);
    expect(client.log).toEqual(["fc6 20=5", "fc16 30=6,7"]);
    expect(connection.supportsMultiWrite).toBe(true);
  });

  it("should wrap library failures in transport errors", async () => {
    const client = new FakeClient();
    client.failWith = libraryError("Modbus exception 3: Illegal data value", { modbusCode: 3 });
    const connection = new ModbusSerialConnection(client);

    await expect(connection.write(1, 20, [5])).rejects.toMatchObject({
      name: "TransportError",
      exceptionCode: 3,
      unitId: 1,
      address: 20,
      count: 1,
    });
  });

  it("should strip the frame around a custom function code answer", async () => {
    const client = new FakeClient();
    const connection = new ModbusSerialConnection(client);

    const answer = await connection.customRequest(3, 0x41, Buffer.from([0x24, 1, 0]));
    expect([...answer]).toEqual([0x24, 0x11]);
    expect(client.log).toEqual(["fc65 unit 3 240100"]);
  });

  it("should pass a bare custom answer through", async () => {
    const client = new FakeClient();
    client.customResult = { buffer: Buffer.from([0x25, 0, 1]) };
    const connection = new ModbusSerialConnection(client);

    await expect(connection.customRequest(1, 0x41, Buffer.from([0x25]))).resolves.toEqual(
      Buffer.from([0x25, 0, 1])
    );
  });

  it("should map a refused custom request to PermissionDeniedError", async () => {
    const client = new FakeClient();
    client.failWith = libraryError("Modbus exception 128", { modbusCode: 0x80 });
    const connection = new ModbusSerialConnection(client);

    await expect(connection.customRequest(1, 0x41, Buffer.from([0x05]))).rejects.toBeInstanceOf(
      PermissionDeniedError
    );
  });

  it("should close the client once", async () => {
    const client = new FakeClient();
    client.isOpen = true;
    const connection = new ModbusSerialConnection(client);

    await connection.close();
    expect(client.isOpen).toBe(false);
    await expect(connection.close()).resolves.toBeUndefined();
  });
});

describe("createModbusConnector", () => {
  it("should connect over TCP and set the request timeout", async () => {
    const client = new FakeClient();
    const connect = createModbusConnector({ createClient: () => client });

    const connection = await connect({ type: "tcp", host: "10.0.0.5", port: 502 }, 1500);
    expect(connection).toBeInstanceOf(ModbusSerialConnection);
    expect(client.log).toEqual(["tcp 10.0.0.5:502"]);
    expect(client.timeout).toBe(1500);
  });

  it("should connect over a serial line", async () => {
    const client = new FakeClient();
    const connect = createModbusConnector({ createClient: () => client });

    await connect({ type: "serial", path: "/dev/ttyUSB0", baudRate: 9600 }, 1000);
    expect(client.log).toEqual(["rtu /dev/ttyUSB0@9600"]);
  });

  it("should close a connection that opens after the timeout", async () => {
    const client = new FakeClient();
    client.openAfterMs = 50;
    const connect = createModbusConnector({ createClient: () => client });

    await expect(connect({ type: "tcp", host: "10.0.0.5", port: 502 }, 10)).rejects.toThrow(
      "Cannot open connection to 10.0.0.5:502: timed out after 10ms"
    );
    await new Promise((resolve) => setTimeout(resolve, 80));
    expect(client.isOpen).toBe(false);
    expect(client.closes).toBe(1);
  });

  it("should raise ConnectionError when the connection is refused", async () => {
    const client = new FakeClient();
    client.connectFailure = libraryError("connect ECONNREFUSED", { code: "ECONNREFUSED" });
    const connect = createModbusConnector({ createClient: () => client });

    const error = await connect({ type: "tcp", host: "10.0.0.5", port: 502 }, 1000).catch(
      (err: unknown) => err
    );
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      endpoint: "10.0.0.5:502",
      message: "Cannot open connection to 10.0.0.5:502: connect ECONNREFUSED",
    });
  });
});
