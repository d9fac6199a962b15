/**
 * Transport contracts shared by the byte-serial and Modbus RTU links.
 *
 * Read operations never reject: protocol and timeout failures collapse to
 * an absent value so the acquisition loop decides what a failed read means.
 */

export type TransportKind = 'serial' | 'modbus';

export interface Transport {
  readonly kind: TransportKind;

  /**
   * Endpoint identifiers currently present on the host (may be empty)
   */
  listAvailable(): Promise<string[]>;

  /**
   * Open the endpoint; rejects with ConnectionError when it cannot be opened
   */
  connect(endpoint: string, speed: number, timeout: number): Promise<void>;

  /**
   * Close the link. Safe to call when not connected.
   */
  disconnect(): Promise<void>;

  isConnected(): boolean;

  /**
   * Endpoint of the open link, null when disconnected
   */
  getEndpoint(): string | null;
}

/**
 * Raw byte transport
 */
export interface ByteTransport extends Transport {
  readonly kind: 'serial';
  write(data: Buffer): Promise<boolean>;
  read(size: number): Promise<Buffer>;
}

/**
 * Register-based transport (Modbus RTU)
 */
export interface RegisterTransport extends Transport {
  readonly kind: 'modbus';
  readRegisters(address: number, count: number, slaveId: number): Promise<number[] | null>;
  readCoils(address: number, count: number, slaveId: number): Promise<boolean[] | null>;
}

export type AnyTransport = ByteTransport | RegisterTransport;

export function isRegisterTransport(transport: AnyTransport): transport is RegisterTransport {
  return transport.kind === 'modbus';
}
