import pino, { type Logger, type LevelWithSilent } from "pino";

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function resolveLevel(value: string | undefined): LevelWithSilent {
  return LEVELS.find((level) => level === value) ?? "warn";
}

// stderr keeps stdout free for command output and --json
const root = pino(
  {
    name: "lookalike",
    level: resolveLevel(process.env.LOOKALIKE_LOG_LEVEL),
  },
  pino.destination(2)
);

const children: Logger[] = [];

export function createLogger(module: string): Logger {
  const child = root.child({ module });
  children.push(child);
  return child;
}

/**
 * Change the level of the root logger and every module logger created so far.
 * Child loggers copy their level on creation, so they are updated one by one.
 */
export function setLogLevel(level: LevelWithSilent): void {
  root.level = level;
  for (const child of children) {
    child.level = level;
  }
}

export type { Logger };
