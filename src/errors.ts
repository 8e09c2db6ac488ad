export type WaveformErrorCode =
  | "UsageError"
  | "DimensionError"
  | "InputNotFound"
  | "DecodeError"
  | "EncodeError";

/**
 * Base error for every failure that ends an invocation.
 *
 * `detail` carries structured context (a path, a limit) alongside the message.
 */
export class WaveformError extends Error {
  readonly code: WaveformErrorCode;
  readonly detail?: Record<string, unknown>;

  constructor(
    code: WaveformErrorCode,
    message: string,
    detail?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = code;
    this.code = code;
    this.detail = detail;
  }
}

export class UsageError extends WaveformError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super("UsageError", message, detail);
  }
}

export class DimensionError extends WaveformError {
  constructor(message: string, detail?: Record<string, unknown>) {
    super("DimensionError", message, detail);
  }
}

export class InputNotFoundError extends WaveformError {
  constructor(path: string) {
    super("InputNotFound", `Input file does not exist: ${path}`, { path });
  }
}

export class DecodeError extends WaveformError {
  constructor(message: string, detail?: Record<string, unknown>, cause?: unknown) {
    super("DecodeError", message, detail, { cause });
  }
}

export class EncodeError extends WaveformError {
  constructor(message: string, detail?: Record<string, unknown>, cause?: unknown) {
    super("EncodeError", message, detail, { cause });
  }
}

export function isWaveformError(e: unknown): e is WaveformError {
  return e instanceof WaveformError;
}
