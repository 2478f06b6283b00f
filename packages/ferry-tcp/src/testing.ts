// Helpers for tests that need a real TCP connection inside the test process.

import net from "node:net";
import { once } from "node:events";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

/** Both ends of one loopback TCP connection. */
export interface LoopbackPair {
  client: net.Socket;
  server: net.Socket;
  /** Destroy both sockets. */
  destroy(): void;
}

/** Connect two sockets over 127.0.0.1 on an ephemeral port. */
export async function loopbackPair(): Promise<LoopbackPair> {
  // The accepting side is half-open, as FileServer's sockets are.
  const listener = net.createServer({ allowHalfOpen: true });
  const accepted = once(listener, "connection");
  listener.listen(0, "127.0.0.1");
  await once(listener, "listening");

  const address = listener.address();
  if (address === null || typeof address === "string") {
    listener.close();
    throw new Error("loopback listener has no TCP address");
  }

  const client = net.createConnection({ host: "127.0.0.1", port: address.port });
  await once(client, "connect");
  const [server] = await accepted;
  // Existing connections survive; the listener just stops accepting.
  listener.close();

  if (!(server instanceof net.Socket)) {
    throw new Error("loopback listener produced no socket");
  }

  return {
    client,
    server,
    destroy() {
      client.destroy();
      server.destroy();
    },
  };
}

/** Create a scratch directory and return it with its cleanup. */
export async function scratchDir(prefix: string): Promise<{ dir: string; remove(): Promise<void> }> {
  const dir = await mkdtemp(path.join(tmpdir(), `ferry-${prefix}-`));
  return {
    dir,
    remove: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Deterministic pseudo-random bytes (xorshift32), so a failing comparison
 * can be reproduced.
 */
export function pseudoRandomBytes(length: number, seed: number): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed >>> 0 || 1;
  for (let i = 0; i < length; i++) {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    out[i] = state & 0xff;
  }
  return out;
}
