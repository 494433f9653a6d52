import bunyan from "bunyan";

const LEVELS: bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function parseLogLevel(value: string | undefined): bunyan.LogLevelString {
  const level = LEVELS.find((l) => l === value?.toLowerCase());
  return level ?? "info";
}

// stderr keeps command output on stdout clean
const log = bunyan.createLogger({
  name: "rpswager",
  streams: [{ stream: process.stderr, level: parseLogLevel(process.env.LOG_LEVEL) }],
});

export default log;
