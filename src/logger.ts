import pino, { type DestinationStream, type Level, type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

// Level names as they are commonly passed around in CI configuration.
const LEVEL_ALIASES: Record<string, Level> = {
  warning: "warn",
  critical: "fatal"
};

const isLevel = (value: string): value is Level => {
  return (LOG_LEVELS as readonly string[]).includes(value);
};

export const parseLogLevel = (value: string): Level | null => {
  const lower = value.trim().toLowerCase();
  if (isLevel(lower)) return lower;
  return LEVEL_ALIASES[lower] ?? null;
};

export const createLogger = (level: Level, destination: DestinationStream = pino.destination(2)): Logger => {
  return pino(
    {
      level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label })
      }
    },
    destination
  );
};

export const silentLogger = (): Logger => pino({ level: "silent" });
