import { resolveConfig } from "./resolve";
import { parseSettings, SolverSettings } from "./settings";

/** Resolve every config layer and parse it into typed solver settings. */
export async function initConfig(): Promise<SolverSettings> {
  return parseSettings(await resolveConfig());
}
