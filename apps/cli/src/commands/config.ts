import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  getConfigPath,
  validateConfigValue,
  CONFIG_KEYS,
  ENV_MAP,
  ConfigData,
} from "../config";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage solver defaults (~/.diagoku/config.json)");

  configCmd.action(async () => {
    await printConfigList();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isValidKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`
        );
        process.exit(1);
      }
      try {
        validateConfigValue(key, value);
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isValidKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`
        );
        process.exit(1);
      }
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      await printConfigList();
    });
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    console.log(`  ${key}: ${resolved[key]}  (${getSource(key, fileData)})`);
  }
  console.log("");
}

export function isValidKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

export function getSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>
): string {
  const envVal = process.env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  if (fileData[key] !== undefined && fileData[key] !== "") return "config file";
  return "default";
}
