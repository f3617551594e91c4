import { CandidateMap, CandidateMapOptions } from "./candidates";
import { Topology } from "./topology";
import { Box, DIGITS } from "./types";

export class GridFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GridFormatError";
  }
}

/**
 * Turn an 81-character puzzle string into a candidate map. Digits 1-9
 * are givens; any other character, a space included, is an unknown box.
 * Line breaks are dropped so grids can be pasted one row per line.
 */
export function parseGrid(
  grid: string,
  topology: Topology,
  options: CandidateMapOptions = {}
): CandidateMap {
  const cells = grid.replace(/\r?\n/g, "");
  if (cells.length !== topology.boxes.length) {
    throw new GridFormatError(
      `Expected ${topology.boxes.length} cells, got ${cells.length}`
    );
  }

  const values: Partial<Record<Box, string>> = {};
  topology.boxes.forEach((box, i) => {
    const ch = cells[i];
    values[box] = DIGITS.includes(ch) ? ch : DIGITS;
  });
  return CandidateMap.from(values, options);
}

/** 81-character string, "." for any box that is not yet solved */
export function formatGrid(values: CandidateMap, topology: Topology): string {
  return topology.boxes
    .map((box) => {
      const digits = values.get(box);
      return digits.length === 1 ? digits : ".";
    })
    .join("");
}

function center(text: string, width: number): string {
  const pad = Math.max(0, width - text.length);
  // odd padding goes left when the width is odd too
  const left = Math.floor(pad / 2) + (pad & width & 1);
  return " ".repeat(left) + text + " ".repeat(pad - left);
}

/**
 * Render the board one row per line, with a column of "|" between
 * blocks and a separator line between block rows. Cells are padded to
 * the longest candidate string so partial solutions stay aligned.
 */
export function renderGrid(
  values: Readonly<Record<Box, string>> | CandidateMap,
  topology: Topology
): string {
  const get = (box: Box): string =>
    values instanceof CandidateMap ? values.get(box) : values[box];

  const width = 1 + Math.max(...topology.boxes.map((box) => get(box).length));
  const line = new Array<string>(3).fill("-".repeat(width * 3)).join("+");

  const lines: string[] = [];
  topology.rows.forEach((r, ri) => {
    let row = "";
    topology.cols.forEach((c, ci) => {
      row += center(get(`${r}${c}`), width);
      if (ci === 2 || ci === 5) row += "|";
    });
    lines.push(row);
    if (ri === 2 || ri === 5) lines.push(line);
  });
  return lines.join("\n");
}

/** True when every unit holds each digit exactly once. */
export function isValidSolution(values: CandidateMap, topology: Topology): boolean {
  return topology.units.every((unit) => {
    const seen = unit.map((box) => values.get(box)).sort().join("");
    return seen === DIGITS;
  });
}
