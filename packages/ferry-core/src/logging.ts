// Namespaced debug logging.
//
// Every component logs under the `ferry:` namespace through the `debug`
// package. Output is off by default and switched on with the DEBUG
// environment variable, using the same pattern rules as any other
// debug-based library:
//
//   DEBUG=ferry:*              everything
//   DEBUG=ferry:session        only the per-connection engine
//   DEBUG=*,-ferry:client      everything except the client driver

import createDebug from "debug";

export type Logger = createDebug.Debugger;

/** Namespace prefix shared by all ferry loggers. */
export const LOG_NAMESPACE = "ferry";

/**
 * Create the logger for one component, e.g. `logger("server")` logs as
 * `ferry:server`.
 */
export function logger(component: string): Logger {
  return createDebug(`${LOG_NAMESPACE}:${component}`);
}

/** Turn on every ferry logger, keeping whatever DEBUG already enabled. */
export function enableAllLogging(): void {
  const current = createDebug.disable();
  const patterns = [current, `${LOG_NAMESPACE}:*`].filter(Boolean);
  createDebug.enable(patterns.join(","));
}
