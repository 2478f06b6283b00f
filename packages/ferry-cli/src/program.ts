// Command-line definition for ferry.
//
//   ferry server [--port <port>] [--dir <dir>] [--host <host>]
//   ferry client <host> [--port <port>]
//   ferry local [--dir <dir>]

import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_PORT, enableAllLogging, parsePort } from "@ferry/core";
import { runClient, runLocal, runServer } from "./commands.ts";

export function portOption(value: string): number {
  const port = parsePort(value);
  if (port === null) {
    throw new InvalidArgumentError("Expected a port number between 0 and 65535.");
  }
  return port;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("ferry")
    .description("Send files to and fetch files from a directory served over TCP")
    .option("-v, --verbose", "enable all ferry debug logging")
    .hook("preAction", (command) => {
      if (command.opts<{ verbose?: boolean }>().verbose) enableAllLogging();
    });

  program
    .command("server")
    .description("serve a directory")
    .option("-p, --port <port>", "port to listen on", portOption, DEFAULT_PORT)
    .option("-d, --dir <dir>", "directory to serve", process.cwd())
    .option("--host <host>", "address to bind", "0.0.0.0")
    .action(async (options: { port: number; dir: string; host: string }) => {
      process.exitCode = await runServer(options);
    });

  program
    .command("client")
    .description("connect to a server and run commands interactively")
    .argument("<host>", "server address")
    .option("-p, --port <port>", "server port", portOption, DEFAULT_PORT)
    .action(async (host: string, options: { port: number }) => {
      process.exitCode = await runClient({ host, port: options.port });
    });

  program
    .command("local")
    .description("run the interactive commands against a local directory")
    .option("-d, --dir <dir>", "directory to operate on", process.cwd())
    .action(async (options: { dir: string }) => {
      process.exitCode = await runLocal(options);
    });

  return program;
}
