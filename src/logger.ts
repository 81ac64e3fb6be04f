import pino from "pino";
import pinoPretty from "pino-pretty";

function isLevel(value: string): value is pino.Level {
  return Object.prototype.hasOwnProperty.call(pino.levels.values, value);
}

function resolveLevel(): pino.LevelWithSilent {
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv === "silent") return "silent";
  if (fromEnv && isLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "development" ? "debug" : "info";
}

const level = resolveLevel();
const usePretty =
  process.env.LOG_PRETTY === "1" || process.env.NODE_ENV === "development";

const prettyStream = usePretty
  ? pinoPretty({
      colorize: true,
      translateTime: "SYS:standard",
    })
  : undefined;

export const logger = pino(
  {
    level,
    base: { name: "audit-collector" },
  },
  prettyStream ?? process.stdout
);

export type Logger = pino.Logger;
