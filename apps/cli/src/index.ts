import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerSolveCommand } from "./commands/solve";
import { registerConfigCommand } from "./commands/config";

program
  .name("diagoku")
  .description("diagoku - constraint-propagation Sudoku solver")
  .version("0.1.0", "-v, --version");

registerSolveCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
