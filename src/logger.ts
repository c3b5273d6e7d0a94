import pino, { Logger } from "pino";

const SERVICE_NAME = "breeze-profile-reconciler";

export let logger: Logger = pino({
  level: "info",
  base: { service: SERVICE_NAME },
});

export function initLogger(level: string): void {
  logger = pino({ level, base: { service: SERVICE_NAME } });
}
