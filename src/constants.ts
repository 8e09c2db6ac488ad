import type { Color } from "./types.js";

/** Largest accepted image width or height, in pixels. */
export const MAX_IMAGE_DIMENSION = 16384;

export const DEFAULT_WIDTH = 1920;
export const DEFAULT_HEIGHT = 300;

export const DEFAULT_BACKGROUND: Color = { r: 0, g: 0, b: 0, a: 255 };
export const DEFAULT_FOREGROUND: Color = { r: 255, g: 255, b: 255, a: 255 };

/** Tag prefixed to diagnostics written to stderr. */
export const LOG_TAG = "[waveform-image]";

export const PROGRAM_NAME = "waveform-image";
