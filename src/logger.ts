import { LOG_TAG } from "./constants.js";

/** Human-readable progress goes to `info`, failures to `error`. */
export interface Logger {
  info(message: string): void;
  error(message: string): void;
}

/** stdout for progress, tagged stderr for diagnostics. */
export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  error: (message) => console.error(`${LOG_TAG} ${message}`),
};
