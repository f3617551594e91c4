export * from "./types";
export { buildTopology, getTopology, cross } from "./topology";
export type { Topology, TopologyOptions } from "./topology";
export { CandidateMap } from "./candidates";
export type { CandidateMapOptions } from "./candidates";
export { eliminate, onlyChoice, nakedTwins } from "./strategies";
export { reducePuzzle } from "./reduce";
export type { ReduceOptions } from "./reduce";
export { search, selectBranchBox } from "./search";
export type { SearchOptions, SolveResult } from "./search";
export {
  GridFormatError,
  parseGrid,
  formatGrid,
  renderGrid,
  isValidSolution,
} from "./grid";
export { solve } from "./solve";
