/**
 * Shared structured logger.
 *
 * Modules take a child logger tagged with their name:
 *
 * @example
 * ```ts
 * import logger from "@beacon/logger";
 *
 * const log = logger.child({ module: "responder" });
 * log.info({ port: 14006 }, "Query responder listening");
 * ```
 */

import pino, { type Logger } from "pino";

const logger = pino({
	name: "beacon",
	level: process.env.LOG_LEVEL || "info",
	base: { pid: process.pid },
	timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger };
export default logger;
