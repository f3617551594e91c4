import { CandidateMap } from "./candidates";
import { reducePuzzle } from "./reduce";
import { Topology } from "./topology";
import { Box, SearchStats } from "./types";

export interface SearchOptions {
  nakedTwins?: boolean;
  maxNodes?: number;
}

export type SolveResult =
  | { status: "solved"; values: CandidateMap; stats: SearchStats }
  | { status: "unsolvable"; stats: SearchStats }
  | { status: "node-limit"; stats: SearchStats };

type Branch =
  | { kind: "solved"; values: CandidateMap }
  | { kind: "rejected" }
  | { kind: "node-limit" };

/** Unsolved box with the fewest candidates; ties go to the earliest box in row-major order. */
export function selectBranchBox(
  values: CandidateMap,
  topology: Topology
): Box | null {
  let best: Box | null = null;
  let bestCount = Infinity;
  for (const box of topology.boxes) {
    const count = values.get(box).length;
    if (count > 1 && count < bestCount) {
      best = box;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Depth-first search over the candidate map. Each node reduces its map
 * to a fixed point, then branches on `selectBranchBox`, trying digits in
 * ascending order on a fresh copy so siblings never see each other's
 * writes. The first solved branch wins.
 */
export function search(
  values: CandidateMap,
  topology: Topology,
  options: SearchOptions = {}
): SolveResult {
  const stats: SearchStats = { nodes: 0, deadEnds: 0, maxDepth: 0 };
  // zero or a negative budget means unlimited
  const maxNodes = options.maxNodes && options.maxNodes > 0 ? options.maxNodes : Infinity;

  function visit(node: CandidateMap, depth: number): Branch {
    if (stats.nodes >= maxNodes) return { kind: "node-limit" };
    stats.nodes++;
    stats.maxDepth = Math.max(stats.maxDepth, depth);

    const reduced = reducePuzzle(node, topology, options);
    if (!reduced.ok) {
      stats.deadEnds++;
      return { kind: "rejected" };
    }

    const box = selectBranchBox(node, topology);
    if (box === null) return { kind: "solved", values: node };

    for (const digit of node.get(box)) {
      const child = node.copy();
      child.set(box, digit);
      const branch = visit(child, depth + 1);
      if (branch.kind !== "rejected") return branch;
    }

    stats.deadEnds++;
    return { kind: "rejected" };
  }

  const outcome = visit(values, 0);
  switch (outcome.kind) {
    case "solved":
      return { status: "solved", values: outcome.values, stats };
    case "node-limit":
      return { status: "node-limit", stats };
    case "rejected":
      return { status: "unsolvable", stats };
  }
}
