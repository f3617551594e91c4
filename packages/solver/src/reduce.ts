import { CandidateMap } from "./candidates";
import { eliminate, nakedTwins, onlyChoice } from "./strategies";
import { Topology } from "./topology";
import { StrategyResult } from "./types";

export interface ReduceOptions {
  nakedTwins?: boolean;
}

/**
 * Apply the strategies until a full pass solves no new box.
 * The solved count never decreases and is bounded by the box count,
 * so the loop terminates.
 */
export function reducePuzzle(
  values: CandidateMap,
  topology: Topology,
  options: ReduceOptions = {}
): StrategyResult<CandidateMap> {
  const strategies = options.nakedTwins
    ? [eliminate, onlyChoice, nakedTwins]
    : [eliminate, onlyChoice];

  for (;;) {
    const before = values.solvedCount();

    for (const strategy of strategies) {
      const result = strategy(values, topology);
      if (!result.ok) return result;
    }

    if (values.solvedCount() === before) return { ok: true, values };
  }
}
