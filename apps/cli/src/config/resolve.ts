import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults";
import { readConfigFile } from "./configFile";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K]
): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) delete cliOverrides[key];
}

/** Defaults, then the config file, then the environment, then flags. */
export async function resolveConfig(): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const fileVal = fileConfig[key];
    if (fileVal !== undefined && fileVal !== "") {
      resolved[key] = String(fileVal);
    }

    const envVal = process.env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      resolved[key] = envVal;
    }

    const cliVal = cliOverrides[key];
    if (cliVal !== undefined && cliVal !== "") {
      resolved[key] = cliVal;
    }
  }

  return resolved;
}
