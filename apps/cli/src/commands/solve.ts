import { Command } from "commander";
import bunyan from "bunyan";
import {
  formatGrid,
  getTopology,
  isValidSolution,
  renderGrid,
  solve,
} from "@diagoku/solver";
import { initConfig, setCliOverride, SolverSettings } from "../config";
import log from "../logger";
import { AssignmentVisualizer, runVisualizer, TerminalVisualizer } from "../visualize";

export const EXIT_SOLVED = 0;
export const EXIT_ERROR = 1;
export const EXIT_UNSOLVABLE = 2;
export const EXIT_NODE_LIMIT = 3;

export interface SolveCommandOptions {
  diagonal?: boolean;
  nakedTwins?: boolean;
  maxNodes?: string;
  visualize?: boolean;
  frameDelay?: string;
  json?: boolean;
}

export interface SolveRun {
  json: boolean;
  visualize: boolean;
  /** Receives every line meant for stdout */
  print: (line: string) => void;
  log: bunyan;
  /** Built from the settings when omitted */
  visualizer?: AssignmentVisualizer;
}

/** Turn the solve flags into config overrides; unset flags leave lower layers alone. */
export function applySolveFlags(opts: SolveCommandOptions): void {
  if (opts.diagonal !== undefined) setCliOverride("diagonal", String(opts.diagonal));
  if (opts.nakedTwins !== undefined) setCliOverride("nakedTwins", String(opts.nakedTwins));
  if (opts.maxNodes !== undefined) setCliOverride("maxNodes", opts.maxNodes);
  if (opts.frameDelay !== undefined) setCliOverride("frameDelayMs", opts.frameDelay);
}

/** Solve one puzzle and report it. Resolves to the process exit code. */
export async function executeSolve(
  grid: string,
  settings: SolverSettings,
  run: SolveRun
): Promise<number> {
  const topology = getTopology(settings.diagonal);
  const result = solve(grid, {
    diagonal: settings.diagonal,
    nakedTwins: settings.nakedTwins,
    maxNodes: settings.maxNodes,
    recordHistory: run.visualize,
  });

  if (run.json) {
    run.print(
      JSON.stringify({
        status: result.status,
        grid: result.status === "solved" ? formatGrid(result.values, topology) : null,
        stats: result.stats,
      })
    );
  }

  if (result.status === "unsolvable") {
    run.log.info({ stats: result.stats }, "Puzzle has no solution");
    if (!run.json) run.print("No solution");
    return EXIT_UNSOLVABLE;
  }

  if (result.status === "node-limit") {
    run.log.warn(
      { stats: result.stats, maxNodes: settings.maxNodes },
      "Search node budget exhausted"
    );
    if (!run.json) run.print(`Gave up after ${result.stats.nodes} search nodes`);
    return EXIT_NODE_LIMIT;
  }

  run.log.info(
    { ...result.stats, diagonal: settings.diagonal, valid: isValidSolution(result.values, topology) },
    "Puzzle solved"
  );
  if (!run.json) run.print(renderGrid(result.values, topology));

  if (run.visualize) {
    const visualizer =
      run.visualizer ?? new TerminalVisualizer(topology, settings.frameDelayMs);
    await runVisualizer(visualizer, result.values.history, run.log);
  }

  return EXIT_SOLVED;
}

export function registerSolveCommand(program: Command): void {
  program
    .command("solve <grid>")
    .description(
      "Solve a puzzle given as 81 characters: digits for givens, anything else for blanks"
    )
    .option("--diagonal", "Treat both main diagonals as units")
    .option("--no-diagonal", "Standard Sudoku without diagonal units")
    .option("--naked-twins", "Run the naked-twins strategy while reducing")
    .option("--no-naked-twins", "Skip naked twins even if the config turns it on")
    .option("--max-nodes <n>", "Give up after this many search nodes (0 = unlimited)")
    .option("--visualize", "Replay every assignment in the terminal after solving")
    .option("--frame-delay <ms>", "Pause between replayed frames")
    .option("--json", "Print the result as JSON")
    .action(async (grid: string, opts: SolveCommandOptions) => {
      try {
        applySolveFlags(opts);
        const settings = await initConfig();
        process.exitCode = await executeSolve(grid, settings, {
          json: Boolean(opts.json),
          visualize: Boolean(opts.visualize),
          print: (line) => console.log(line),
          log,
        });
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = EXIT_ERROR;
      }
    });
}
