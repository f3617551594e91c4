import { parseGrid } from "./grid";
import { search, SolveResult } from "./search";
import { getTopology } from "./topology";
import { SolveOptions } from "./types";

/**
 * Solve a puzzle given as an 81-character string.
 * Throws `GridFormatError` for a string of the wrong length; an
 * unsolvable puzzle is reported in the result, not thrown.
 */
export function solve(grid: string, options: SolveOptions = {}): SolveResult {
  const topology = getTopology(options.diagonal ?? true);
  const values = parseGrid(grid, topology, {
    recordHistory: options.recordHistory,
  });
  return search(values, topology, {
    nakedTwins: options.nakedTwins,
    maxNodes: options.maxNodes,
  });
}
