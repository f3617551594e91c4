import { Box, COLS, ColLabel, ROWS, RowLabel, Unit } from "./types";

/**
 * Static layout of the board: boxes, units, and for every box the units
 * it belongs to and the peers it shares a unit with.
 */
export interface Topology {
  readonly diagonal: boolean;
  readonly rows: readonly RowLabel[];
  readonly cols: readonly ColLabel[];
  /** All 81 boxes in row-major order */
  readonly boxes: readonly Box[];
  readonly units: readonly Unit[];
  unitsOf(box: Box): readonly Unit[];
  peersOf(box: Box): ReadonlySet<Box>;
}

export interface TopologyOptions {
  diagonal: boolean;
}

/** Cross product of row and column labels, rows outermost */
export function cross(
  rows: readonly RowLabel[],
  cols: readonly ColLabel[]
): Box[] {
  const boxes: Box[] = [];
  for (const r of rows) {
    for (const c of cols) boxes.push(`${r}${c}`);
  }
  return boxes;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export function buildTopology({ diagonal }: TopologyOptions): Topology {
  const boxes = cross(ROWS, COLS);

  const rowUnits = ROWS.map((r) => cross([r], COLS));
  const colUnits = COLS.map((c) => cross(ROWS, [c]));
  const blockUnits: Box[][] = [];
  for (const rs of chunk(ROWS, 3)) {
    for (const cs of chunk(COLS, 3)) blockUnits.push(cross(rs, cs));
  }

  const units: Unit[] = [...rowUnits, ...colUnits, ...blockUnits];
  if (diagonal) {
    const reversed = [...COLS].reverse();
    units.push(ROWS.map((r, i): Box => `${r}${COLS[i]}`));
    units.push(ROWS.map((r, i): Box => `${r}${reversed[i]}`));
  }

  const unitMap = new Map<Box, readonly Unit[]>();
  const peerMap = new Map<Box, ReadonlySet<Box>>();
  for (const box of boxes) {
    const owning = units.filter((u) => u.includes(box));
    const peers = new Set<Box>(owning.flat());
    peers.delete(box);
    unitMap.set(box, Object.freeze(owning));
    peerMap.set(box, peers);
  }

  return Object.freeze({
    diagonal,
    rows: ROWS,
    cols: COLS,
    boxes: Object.freeze(boxes),
    units: Object.freeze(units.map((u) => Object.freeze(u))),
    unitsOf(box: Box): readonly Unit[] {
      return unitMap.get(box) ?? [];
    },
    peersOf(box: Box): ReadonlySet<Box> {
      return peerMap.get(box) ?? EMPTY_PEERS;
    },
  });
}

const EMPTY_PEERS: ReadonlySet<Box> = new Set();

const cache = new Map<boolean, Topology>();

/** Build once per process and share; a topology is never mutated. */
export function getTopology(diagonal: boolean): Topology {
  let topology = cache.get(diagonal);
  if (!topology) {
    topology = buildTopology({ diagonal });
    cache.set(diagonal, topology);
  }
  return topology;
}
