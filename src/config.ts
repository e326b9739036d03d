export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export interface AppConfig {
  logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = (env.JURISDICTION_LOG_LEVEL ?? "info").trim().toLowerCase();

  return {
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  };
}
