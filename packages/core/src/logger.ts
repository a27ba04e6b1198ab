import bunyan from "bunyan";
import config from "./config";

export type Logger = bunyan;

export function createLogger(name: string): Logger {
  return bunyan.createLogger({
    name: `hexlab-${name}`,
    level: config.logLevel,
  });
}
