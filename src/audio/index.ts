import { AudioFormatRegistry } from "./decoder.js";
import { aiffFormat } from "./aiff.js";
import { wavFormat } from "./wav.js";

/** Registry with every format this build can read. */
export function createDefaultRegistry(): AudioFormatRegistry {
  return new AudioFormatRegistry().register(wavFormat).register(aiffFormat);
}
