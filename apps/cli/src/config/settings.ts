import { ConfigData } from "./defaults";

/** Typed view of the resolved string config */
export interface SolverSettings {
  diagonal: boolean;
  nakedTwins: boolean;
  /** Undefined means no budget */
  maxNodes: number | undefined;
  frameDelayMs: number;
}

export function parseBoolean(key: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(value)) return true;
  if (["false", "0", "no", "off"].includes(value)) return false;
  throw new Error(`Invalid value for ${key}: "${raw}". Use true or false.`);
}

export function parseCount(key: string, raw: string): number {
  const value = raw.trim();
  if (!/^\d+$/.test(value)) {
    throw new Error(
      `Invalid value for ${key}: "${raw}". Use a non-negative integer.`
    );
  }
  return parseInt(value, 10);
}

export function parseSettings(config: ConfigData): SolverSettings {
  const maxNodes = parseCount("maxNodes", config.maxNodes);
  return {
    diagonal: parseBoolean("diagonal", config.diagonal),
    nakedTwins: parseBoolean("nakedTwins", config.nakedTwins),
    maxNodes: maxNodes === 0 ? undefined : maxNodes,
    frameDelayMs: parseCount("frameDelayMs", config.frameDelayMs),
  };
}

/** Throws if `raw` is not a valid value for `key` */
export function validateConfigValue(key: keyof ConfigData, raw: string): void {
  switch (key) {
    case "diagonal":
    case "nakedTwins":
      parseBoolean(key, raw);
      return;
    case "maxNodes":
    case "frameDelayMs":
      parseCount(key, raw);
      return;
  }
}
