// @ferry/tcp - TCP transport for ferry (Node.js only)
//
// Provides TCP-specific I/O: socket framing, the per-connection session
// engine, the acceptor and the client driver.

export { SocketFramed, connectFramed, type Endpoint } from "./framing.ts";
export { Session, type SessionState, type SessionOptions } from "./session.ts";
export { FileServer, type ServerConfig, defaultServerConfig } from "./server.ts";
export {
  FileClient,
  type ClientConfig,
  type ClientOptions,
  defaultClientConfig,
} from "./client.ts";

// Re-export the protocol vocabulary from core for convenience
export {
  type ByteStream,
  type Transfer,
  ConnectionError,
  TransferError,
  Status,
  ErrorMessage,
  isSafeFilename,
  DEFAULT_PORT,
} from "@ferry/core";
