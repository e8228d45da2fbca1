/**
 * The seam between the transaction engine and the wire. Framing and
 * checksums are the connection's business; the engine only sees register
 * words and {@link TransportError}s.
 */

import type { RawWords } from "./codec";
import type { RegisterSpace } from "./registers";

export interface TcpEndpoint {
  type: "tcp";
  host: string;
  /** Default: 502 */
  port: number;
}

export interface SerialEndpoint {
  type: "serial";
  path: string;
  baudRate: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: "none" | "even" | "odd";
}

export type Endpoint = TcpEndpoint | SerialEndpoint;

export interface Connection {
  /** @throws TransportError */
  read(unitId: number, address: number, count: number, space: RegisterSpace): Promise<RawWords>;
  /**
   * Write consecutive registers starting at `address`. Resolves `true` once
   * the device confirmed the write.
   *
   * @throws TransportError
   */
  write(unitId: number, address: number, values: RawWords): Promise<boolean>;
  /**
   * Exchange one request under a vendor function code. `payload` and the
   * answer hold the bytes after the function code.
   *
   * @throws TransportError
   */
  customRequest?(unitId: number, functionCode: number, payload: Buffer): Promise<Buffer>;
  /** Abandon the in-flight request, if the transport can. */
  cancel?(): void;
  close(): Promise<void>;
  /** Whether multi-register writes are applied by the device in one request. */
  readonly supportsMultiWrite: boolean;
}

/** Opens a connection. @throws ConnectionError */
export type Connector = (endpoint: Endpoint, timeoutMs: number) => Promise<Connection>;

export function describeEndpoint(endpoint: Endpoint): string {
  return endpoint.type === "tcp"
    ? `${endpoint.host}:${endpoint.port}`
    : `${endpoint.path}@${endpoint.baudRate}`;
}
