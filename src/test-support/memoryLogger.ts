import type { Logger } from "../logger.js";

export interface MemoryLogger extends Logger {
  infoLines: string[];
  errorLines: string[];
}

export function createMemoryLogger(): MemoryLogger {
  const infoLines: string[] = [];
  const errorLines: string[] = [];
  return {
    infoLines,
    errorLines,
    info: (message) => infoLines.push(message),
    error: (message) => errorLines.push(message),
  };
}
