export type RowLabel = "A" | "B" | "C" | "D" | "E" | "F" | "G" | "H" | "I";
export type ColLabel = "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9";

/** A cell identified by row letter and column digit, e.g. "A1" or "I9" */
export type Box = `${RowLabel}${ColLabel}`;

/** Nine boxes that must jointly hold each digit once */
export type Unit = readonly Box[];

export const ROWS: readonly RowLabel[] = ["A", "B", "C", "D", "E", "F", "G", "H", "I"];
export const COLS: readonly ColLabel[] = ["1", "2", "3", "4", "5", "6", "7", "8", "9"];
export const DIGITS = "123456789";

/** Frozen copy of every box's candidates at the moment a box was resolved */
export type Snapshot = Readonly<Record<Box, string>>;

export type StrategyName = "eliminate" | "only-choice" | "naked-twins";

export interface Contradiction {
  /** The box whose candidate set would have become empty */
  box: Box;
  strategy: StrategyName;
}

export type StrategyResult<T> =
  | { ok: true; values: T }
  | { ok: false; contradiction: Contradiction };

export interface SearchStats {
  /** Search nodes entered, including the root */
  nodes: number;
  /** Nodes rejected by a contradiction or by failing every branch */
  deadEnds: number;
  maxDepth: number;
}

export interface SolveOptions {
  /** Add both main diagonals as units. Default true. */
  diagonal?: boolean;
  /** Run naked-twins inside the reduction loop. Default false. */
  nakedTwins?: boolean;
  /** Keep a snapshot per resolved box for replaying the solve. Default false. */
  recordHistory?: boolean;
  /** Stop after visiting this many search nodes. Unlimited when omitted or 0. */
  maxNodes?: number;
}
