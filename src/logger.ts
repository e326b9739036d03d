import pino, { Logger } from "pino";
import { loadConfig } from "./config";

export let logger: Logger = pino({
  level: loadConfig().logLevel,
  base: { service: "jurisdiction-classification" },
});

export function initLogger(level: string): void {
  logger = pino({ level, base: { service: "jurisdiction-classification" } });
}
