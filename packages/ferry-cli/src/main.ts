// ferry command-line entry point.

import { buildProgram } from "./program.ts";

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
