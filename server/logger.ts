import pino from "pino";
import { config } from "./config";

export const logger = pino({
  level: config.logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { app: "kbo-boxscore-ingest" },
});

export type Logger = pino.Logger;

export function withSource(source: string): Logger {
  return logger.child({ source });
}
