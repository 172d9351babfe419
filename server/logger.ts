import pino from "pino";
import type { LogLevel } from "./config";

export type Logger = pino.Logger;

export function createLogger(level: LogLevel): Logger {
	return pino({ name: "timekeeper", level });
}
