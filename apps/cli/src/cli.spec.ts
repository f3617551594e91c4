import { strict as assert } from "assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import bunyan from "bunyan";
import { getTopology, parseGrid, Snapshot } from "@diagoku/solver";
import {
  clearCliOverrides,
  DEFAULTS,
  initConfig,
  ENV_MAP,
  CONFIG_KEYS,
  parseBoolean,
  parseCount,
  parseSettings,
  readConfigFile,
  resolveConfig,
  setCliOverride,
  SolverSettings,
  updateConfigFile,
  validateConfigValue,
} from "./config";
import { getSource, isValidKey } from "./commands/config";
import {
  applySolveFlags,
  executeSolve,
  EXIT_NODE_LIMIT,
  EXIT_SOLVED,
  EXIT_UNSOLVABLE,
} from "./commands/solve";
import {
  AssignmentVisualizer,
  runVisualizer,
  TerminalVisualizer,
} from "./visualize";

const DIAGONAL_PUZZLE =
  "2.............62....1....7...6..8...3...9...7...6..4...4....8....52.............3";
const DIAGONAL_SOLUTION =
  "267945381853716249491823576576438192384192657129657438642379815935281764718564923";

function testLogger(): { log: bunyan; messages: () => string[] } {
  const records: string[] = [];
  const sink = new Writable({
    write(chunk, _encoding, callback) {
      const record: { msg: string } = JSON.parse(String(chunk));
      records.push(record.msg);
      callback();
    },
  });
  const log = bunyan.createLogger({
    name: "diagoku-test",
    streams: [{ stream: sink, level: "trace" }],
  });
  return { log, messages: () => [...records] };
}

const SETTINGS: SolverSettings = {
  diagonal: true,
  nakedTwins: false,
  maxNodes: undefined,
  frameDelayMs: 0,
};

describe("Settings", () => {
  it("parses the defaults", () => {
    assert.deepEqual(parseSettings(DEFAULTS), {
      diagonal: true,
      nakedTwins: false,
      maxNodes: undefined,
      frameDelayMs: 40,
    });
  });

  it("keeps a positive node budget", () => {
    const settings = parseSettings({ ...DEFAULTS, maxNodes: "500", diagonal: "off" });
    assert.equal(settings.maxNodes, 500);
    assert.equal(settings.diagonal, false);
  });

  it("rejects values that do not parse", () => {
    assert.throws(() => parseBoolean("diagonal", "maybe"), /Invalid value for diagonal: "maybe"/);
    assert.throws(() => parseCount("maxNodes", "-1"), /non-negative integer/);
    assert.throws(() => parseCount("frameDelayMs", "1.5"), /non-negative integer/);
    assert.throws(() => validateConfigValue("nakedTwins", "2"), /true or false/);
    assert.doesNotThrow(() => validateConfigValue("maxNodes", "10000"));
  });

  it("recognizes config keys", () => {
    assert.equal(isValidKey("frameDelayMs"), true);
    assert.equal(isValidKey("serverUrl"), false);
  });
});

describe("Config resolution", () => {
  let dir: string;
  const savedEnv: Record<string, string | undefined> = {};
  const envNames = [...Object.values(ENV_MAP), "DIAGOKU_CONFIG_PATH"];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "diagoku-"));
    for (const name of envNames) {
      savedEnv[name] = process.env[name];
      delete process.env[name];
    }
    process.env.DIAGOKU_CONFIG_PATH = join(dir, "config.json");
  });

  afterEach(async () => {
    clearCliOverrides();
    for (const name of envNames) {
      const value = savedEnv[name];
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
    await rm(dir, { recursive: true, force: true });
  });

  it("falls back to defaults without a config file", async () => {
    assert.deepEqual(await readConfigFile(), {});
    assert.deepEqual(await resolveConfig(), DEFAULTS);
  });

  it("layers file, environment and flags in that order", async () => {
    await writeFile(
      join(dir, "config.json"),
      JSON.stringify({ diagonal: "false", maxNodes: "100", nakedTwins: "false" })
    );
    process.env.DIAGOKU_MAX_NODES = "200";
    setCliOverride("nakedTwins", "true");

    assert.deepEqual(await resolveConfig(), {
      diagonal: "false",
      nakedTwins: "true",
      maxNodes: "200",
      frameDelayMs: "40",
    });
  });

  it("lets --no-naked-twins override the environment", async () => {
    process.env.DIAGOKU_NAKED_TWINS = "true";
    applySolveFlags({ nakedTwins: false, diagonal: false, maxNodes: "7" });
    const settings = await initConfig();
    assert.equal(settings.nakedTwins, false);
    assert.equal(settings.diagonal, false);
    assert.equal(settings.maxNodes, 7);
  });

  it("leaves config values alone for flags that were not given", async () => {
    process.env.DIAGOKU_NAKED_TWINS = "true";
    applySolveFlags({});
    assert.equal((await initConfig()).nakedTwins, true);
  });

  it("ignores a malformed config file", async () => {
    await writeFile(join(dir, "config.json"), "{not json");
    assert.deepEqual(await readConfigFile(), {});
  });

  it("writes single keys into the config file", async () => {
    await updateConfigFile("frameDelayMs", "5");
    await updateConfigFile("diagonal", "false");
    const fileData = await readConfigFile();
    assert.deepEqual(fileData, { frameDelayMs: "5", diagonal: "false" });
    assert.equal(getSource("diagonal", fileData), "config file");
    assert.equal(getSource("maxNodes", fileData), "default");

    process.env.DIAGOKU_DIAGONAL = "true";
    assert.equal(getSource("diagonal", fileData), "env: DIAGOKU_DIAGONAL");
  });

  it("names an environment variable for every key", () => {
    for (const key of CONFIG_KEYS) assert.ok(ENV_MAP[key].startsWith("DIAGOKU_"));
  });
});

describe("executeSolve", () => {
  function capture(): { lines: string[]; print: (line: string) => void } {
    const lines: string[] = [];
    return { lines, print: (line) => lines.push(line) };
  }

  it("prints the solution as JSON", async () => {
    const out = capture();
    const { log, messages } = testLogger();
    const code = await executeSolve(DIAGONAL_PUZZLE, SETTINGS, {
      json: true,
      visualize: false,
      print: out.print,
      log,
    });
    assert.equal(code, EXIT_SOLVED);
    assert.equal(out.lines.length, 1);
    assert.deepEqual(JSON.parse(out.lines[0]), {
      status: "solved",
      grid: DIAGONAL_SOLUTION,
      stats: { nodes: 1, deadEnds: 0, maxDepth: 0 },
    });
    assert.deepEqual(messages(), ["Puzzle solved"]);
  });

  it("prints the rendered grid", async () => {
    const out = capture();
    const code = await executeSolve(DIAGONAL_PUZZLE, SETTINGS, {
      json: false,
      visualize: false,
      print: out.print,
      log: testLogger().log,
    });
    assert.equal(code, EXIT_SOLVED);
    const lines = out.lines[0].split("\n");
    assert.equal(lines[0], "2 6 7 |9 4 5 |3 8 1 ");
    assert.equal(lines[10], "7 1 8 |5 6 4 |9 2 3 ");
  });

  it("reports a puzzle without a solution", async () => {
    const out = capture();
    const { log, messages } = testLogger();
    const code = await executeSolve("55" + ".".repeat(79), SETTINGS, {
      json: false,
      visualize: false,
      print: out.print,
      log,
    });
    assert.equal(code, EXIT_UNSOLVABLE);
    assert.deepEqual(out.lines, ["No solution"]);
    assert.deepEqual(messages(), ["Puzzle has no solution"]);
  });

  it("stops at the node budget", async () => {
    const out = capture();
    const code = await executeSolve(
      ".".repeat(81),
      { ...SETTINGS, diagonal: false, maxNodes: 1 },
      { json: false, visualize: false, print: out.print, log: testLogger().log }
    );
    assert.equal(code, EXIT_NODE_LIMIT);
    assert.deepEqual(out.lines, ["Gave up after 1 search nodes"]);
  });

  it("hands the recorded history to the visualizer", async () => {
    const shown: number[] = [];
    const visualizer: AssignmentVisualizer = {
      async show(history) {
        shown.push(history.length);
      },
    };
    const code = await executeSolve(DIAGONAL_PUZZLE, SETTINGS, {
      json: true,
      visualize: true,
      print: capture().print,
      log: testLogger().log,
      visualizer,
    });
    assert.equal(code, EXIT_SOLVED);
    assert.equal(shown.length, 1);
    assert.ok(shown[0] > 0);
  });

  it("still succeeds when the visualizer fails", async () => {
    const { log, messages } = testLogger();
    const visualizer: AssignmentVisualizer = {
      async show() {
        throw new Error("no display");
      },
    };
    const code = await executeSolve(DIAGONAL_PUZZLE, SETTINGS, {
      json: true,
      visualize: true,
      print: capture().print,
      log,
      visualizer,
    });
    assert.equal(code, EXIT_SOLVED);
    assert.deepEqual(messages(), [
      "Puzzle solved",
      "Could not visualize the board; the solution above is unaffected",
    ]);
  });

  it("rejects a grid of the wrong length", async () => {
    await assert.rejects(
      executeSolve("123", SETTINGS, {
        json: false,
        visualize: false,
        print: capture().print,
        log: testLogger().log,
      }),
      /Expected 81 cells, got 3/
    );
  });
});

describe("TerminalVisualizer", () => {
  const topology = getTopology(true);
  const frame: Snapshot = parseGrid(DIAGONAL_SOLUTION, topology).snapshot();

  it("draws one frame per assignment", async () => {
    const chunks: string[] = [];
    const visualizer = new TerminalVisualizer(topology, 0, {
      isTTY: true,
      write: (chunk: string) => chunks.push(chunk),
    });
    await visualizer.show([frame, frame]);
    assert.equal(chunks.length, 6);
    assert.equal(chunks[1], "Assignment 1/2\n");
    assert.equal(chunks[4], "Assignment 2/2\n");
    assert.ok(chunks[2].startsWith("2 6 7 |9 4 5 |3 8 1 \n"));
  });

  it("refuses to draw without a terminal", async () => {
    const visualizer = new TerminalVisualizer(topology, 0, { write: () => true });
    await assert.rejects(visualizer.show([frame]), /interactive terminal/);
  });

  it("runVisualizer reports success", async () => {
    const { log, messages } = testLogger();
    const ok = await runVisualizer({ show: async () => undefined }, [frame], log);
    assert.equal(ok, true);
    assert.deepEqual(messages(), []);
  });
});
