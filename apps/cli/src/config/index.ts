export { CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults";
export type { ConfigData } from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigPath,
} from "./configFile";
export { resolveConfig, setCliOverride, clearCliOverrides } from "./resolve";
export {
  parseBoolean,
  parseCount,
  parseSettings,
  validateConfigValue,
} from "./settings";
export type { SolverSettings } from "./settings";
export { initConfig } from "./runtime";
