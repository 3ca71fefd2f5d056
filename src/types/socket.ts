/**
 * Socket abstraction for the controller connection.
 *
 * Decouples the ConnectionManager from `node:net` so tests can swap in an
 * in-memory fake without touching real network I/O. Delivery uses a
 * callback registration pattern rather than Node EventEmitter so that
 * implementations stay framework-agnostic.
 */

// ---------------------------------------------------------------------------
// Handler types
// ---------------------------------------------------------------------------

/** Receives raw bytes as they arrive. */
export type DataHandler = (chunk: Buffer) => void;

/** Invoked once when the peer closes its side (zero-length read). */
export type CloseHandler = () => void;

export type SocketErrorHandler = (error: Error) => void;

// ---------------------------------------------------------------------------
// Stream socket
// ---------------------------------------------------------------------------

/** A connected, bidirectional byte stream. */
export interface StreamSocket {
  /** Open the connection. Rejects when the endpoint is unreachable. */
  connect(host: string, port: number): Promise<void>;

  /**
   * Write bytes. Resolves once the data has been handed to the OS.
   * Rejects if the socket is closed or the write fails.
   */
  write(data: Buffer): Promise<void>;

  onData(handler: DataHandler): void;
  onClose(handler: CloseHandler): void;
  onError(handler: SocketErrorHandler): void;

  /** Close the socket and release resources. Safe to call more than once. */
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Creates stream sockets. Production code uses `NetSocketFactory`;
 * tests inject a FakeSocketFactory that creates in-memory fakes.
 */
export interface SocketFactory {
  createStreamSocket(): StreamSocket;
}
