export interface ConfigData {
  /** "true" to add both main diagonals as units */
  diagonal: string;
  /** "true" to run naked twins inside the reduction loop */
  nakedTwins: string;
  /** Search node budget, "0" for unlimited */
  maxNodes: string;
  /** Pause between frames when replaying a solve */
  frameDelayMs: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "diagonal",
  "nakedTwins",
  "maxNodes",
  "frameDelayMs",
];

export const DEFAULTS: ConfigData = {
  diagonal: "true",
  nakedTwins: "false",
  maxNodes: "0",
  frameDelayMs: "40",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  diagonal: "DIAGOKU_DIAGONAL",
  nakedTwins: "DIAGOKU_NAKED_TWINS",
  maxNodes: "DIAGOKU_MAX_NODES",
  frameDelayMs: "DIAGOKU_FRAME_DELAY_MS",
};
