import bunyan from "bunyan";

const LEVELS: readonly bunyan.LogLevelString[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

function levelFromEnv(raw: string | undefined): bunyan.LogLevelString {
  return LEVELS.find((level) => level === raw) ?? "info";
}

// stderr, so stdout carries nothing but the solved grid
const log = bunyan.createLogger({
  name: "diagoku",
  level: levelFromEnv(process.env.LOG_LEVEL),
  stream: process.stderr,
});

export default log;
