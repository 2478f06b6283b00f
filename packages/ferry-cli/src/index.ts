// @ferry/cli - ferry command-line front end
//
// The interactive loop, local mode and the command definitions; main.ts is
// the executable entry.

export {
  type ReplInput,
  type ReplOutput,
  UNKNOWN_INPUT_HINT,
  parseInput,
  handleInput,
  runRepl,
} from "./repl.ts";
export { LocalTransfer, type LocalOptions } from "./local.ts";
export {
  runServer,
  runClient,
  runLocal,
  type ServerCommandOptions,
  type ClientCommandOptions,
  type LocalCommandOptions,
} from "./commands.ts";
export { buildProgram, portOption } from "./program.ts";
