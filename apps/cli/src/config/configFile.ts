import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import log from "../logger";
import { ConfigData } from "./defaults";

const DEFAULT_CONFIG_PATH = join(homedir(), ".diagoku", "config.json");

/** `DIAGOKU_CONFIG_PATH` moves the file, e.g. for per-project settings */
export function getConfigPath(): string {
  return process.env.DIAGOKU_CONFIG_PATH || DEFAULT_CONFIG_PATH;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isConfigRecord(value: unknown): value is Partial<ConfigData> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const path = getConfigPath();
  try {
    const raw = await readFile(path, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return isConfigRecord(parsed) ? parsed : {};
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return {};
    }
    if (err instanceof SyntaxError) {
      log.warn(
        { path },
        'Config file is malformed and was ignored. Run "diagoku config set" to recreate it.'
      );
      return {};
    }
    throw err;
  }
}

export async function writeConfigFile(
  data: Partial<ConfigData>
): Promise<void> {
  const path = getConfigPath();
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
