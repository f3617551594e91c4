import { CandidateMap } from "./candidates";
import { Topology } from "./topology";
import { Box, DIGITS, StrategyResult } from "./types";

/**
 * Remove every solved box's digit from all of its peers.
 * Fails on the first peer that would be left without candidates.
 */
export function eliminate(
  values: CandidateMap,
  topology: Topology
): StrategyResult<CandidateMap> {
  for (const box of topology.boxes) {
    const digit = values.get(box);
    if (digit.length !== 1) continue;

    for (const peer of topology.peersOf(box)) {
      const remaining = values.get(peer).replace(digit, "");
      if (remaining.length === 0) {
        return { ok: false, contradiction: { box: peer, strategy: "eliminate" } };
      }
      values.set(peer, remaining);
    }
  }
  return { ok: true, values };
}

/** A digit with a single possible home in a unit is placed there. */
export function onlyChoice(
  values: CandidateMap,
  topology: Topology
): StrategyResult<CandidateMap> {
  for (const unit of topology.units) {
    for (const digit of DIGITS) {
      const homes = unit.filter((box) => values.get(box).includes(digit));
      if (homes.length === 1) values.set(homes[0], digit);
    }
  }
  return { ok: true, values };
}

function sameDigits(a: string, b: string): boolean {
  return [...a].sort().join("") === [...b].sort().join("");
}

function findTwins(values: CandidateMap, unit: readonly Box[]): [Box, Box][] {
  const pairs: [Box, Box][] = [];
  for (let i = 0; i < unit.length; i++) {
    const first = values.get(unit[i]);
    if (first.length !== 2) continue;
    for (let j = i + 1; j < unit.length; j++) {
      if (sameDigits(first, values.get(unit[j]))) pairs.push([unit[i], unit[j]]);
    }
  }
  return pairs;
}

/**
 * Two boxes of a unit holding the same two candidates own those digits:
 * strip them from every other box of the unit. Repeats until a full pass
 * changes nothing, so applying it again is a no-op.
 */
export function nakedTwins(
  values: CandidateMap,
  topology: Topology
): StrategyResult<CandidateMap> {
  let changed = true;
  while (changed) {
    changed = false;
    for (const unit of topology.units) {
      for (const [a, b] of findTwins(values, unit)) {
        const pair = values.get(a);
        // an earlier pair in this unit may have broken this one up
        if (pair.length !== 2 || !sameDigits(pair, values.get(b))) continue;
        for (const box of unit) {
          if (box === a || box === b) continue;
          const remaining = values.get(box).replace(pair[0], "").replace(pair[1], "");
          if (remaining.length === 0) {
            return { ok: false, contradiction: { box, strategy: "naked-twins" } };
          }
          if (values.set(box, remaining)) changed = true;
        }
      }
    }
  }
  return { ok: true, values };
}
