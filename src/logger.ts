import pino from "pino";
import type { Logger } from "pino";

/** Used when the caller does not pass a logger. */
const silentLogger: Logger = pino({ level: "silent" });

/** Child logger tagging every line with the SDK module. */
export function createLogger(parent?: Logger): Logger {
  return (parent ?? silentLogger).child({ module: "qantani" });
}
