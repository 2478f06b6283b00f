// The three ferry commands: server, client and local.
//
// Each resolves to a process exit code; main.ts only parses flags and
// hands over.

import * as readline from "node:readline";
import path from "node:path";
import { type Transfer, describeError, ensureDirectory, logger } from "@ferry/core";
import { FileClient, FileServer } from "@ferry/tcp";
import { runRepl, type ReplOutput } from "./repl.ts";
import { LocalTransfer } from "./local.ts";

const log = logger("cli");

export interface ServerCommandOptions {
  port: number;
  host: string;
  dir: string;
}

export interface ClientCommandOptions {
  host: string;
  port: number;
}

export interface LocalCommandOptions {
  dir: string;
}

/**
 * Run a server until SIGINT or SIGTERM, then wait for open sessions to end.
 */
export async function runServer(options: ServerCommandOptions): Promise<number> {
  const servedDir = path.resolve(options.dir);
  if (!(await ensureDirectory(servedDir))) {
    console.error(`Warning: could not create ${servedDir}`);
  }

  const server = new FileServer({ port: options.port, host: options.host, servedDir });
  try {
    const address = await server.listen();
    console.log(`Server listening on port ${address.port}, serving directory: ${servedDir}`);
  } catch (e) {
    console.error(describeError(e));
    return 1;
  }

  await new Promise<void>((resolve) => {
    const stop = (signal: NodeJS.Signals) => {
      log("received %s, shutting down", signal);
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
      console.log("Shutting down, waiting for open sessions...");
      resolve();
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);
  });

  await server.close();
  return 0;
}

function consoleOutput(rl: readline.Interface): ReplOutput {
  return {
    log: (message) => console.log(message),
    error: (message) => console.error(message),
    prompt: () => rl.prompt(),
  };
}

async function interactive(transfer: Transfer): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
    terminal: process.stdin.isTTY,
  });
  try {
    await runRepl(transfer, rl, consoleOutput(rl));
  } finally {
    rl.close();
  }
}

/** Connect to a server and drive it interactively from stdin. */
export async function runClient(options: ClientCommandOptions): Promise<number> {
  let client: FileClient;
  try {
    client = await FileClient.connect({ host: options.host, port: options.port });
  } catch (e) {
    console.error(describeError(e));
    return 1;
  }

  console.log(`Connected to ${options.host}:${options.port}`);
  await interactive(client);
  return 0;
}

/** Drive a local directory interactively, without a server. */
export async function runLocal(options: LocalCommandOptions): Promise<number> {
  const transfer = new LocalTransfer({ dir: options.dir });
  if (!(await transfer.prepare())) {
    console.error(`Warning: could not create ${transfer.dir}`);
  }
  console.log(`Local mode, serving directory: ${transfer.dir}`);
  await interactive(transfer);
  return 0;
}
