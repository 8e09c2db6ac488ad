import type { AudioFormat } from "./decoder.js";
import { BYTES_PER_SAMPLE, PcmDecoder, fourCC, viewOf, type PcmLayout, type SampleEncoding } from "./pcm.js";
import { DecodeError } from "../errors.js";

/**
 * IEEE 754 80-bit extended float, as the COMM chunk stores its sample rate:
 * sign and 15-bit exponent, then a 64-bit mantissa with an explicit integer bit.
 */
export function readExtended(view: DataView, offset: number): number {
  const signExp = view.getUint16(offset, false);
  const hi = view.getUint32(offset + 2, false);
  const lo = view.getUint32(offset + 6, false);
  const exponent = signExp & 0x7fff;
  if (exponent === 0 && hi === 0 && lo === 0) return 0;
  if (exponent === 0x7fff) return NaN;
  const magnitude = (hi * 2 ** 32 + lo) * 2 ** (exponent - 16383 - 63);
  return signExp & 0x8000 ? -magnitude : magnitude;
}

/**
 * Map an AIFF-C compression type onto a sample encoding. Samples are stored
 * left-justified, so a 12-bit stream reads as its 16-bit container.
 */
function resolveEncoding(
  compression: string,
  bitsPerSample: number,
): { encoding: SampleEncoding; littleEndian: boolean } | null {
  const containerBits = Math.ceil(bitsPerSample / 8) * 8;
  switch (compression) {
    case "NONE":
    case "twos":
    case "sowt": {
      const littleEndian = compression === "sowt";
      if (containerBits === 8) return { encoding: "int8", littleEndian };
      if (containerBits === 16) return { encoding: "int16", littleEndian };
      if (containerBits === 24) return { encoding: "int24", littleEndian };
      if (containerBits === 32) return { encoding: "int32", littleEndian };
      return null;
    }
    case "raw ":
      return containerBits === 8 ? { encoding: "uint8", littleEndian: false } : null;
    case "fl32":
    case "FL32":
      return { encoding: "float32", littleEndian: false };
    case "fl64":
    case "FL64":
      return { encoding: "float64", littleEndian: false };
    default:
      return null;
  }
}

/** Walk the FORM chunks of an AIFF or AIFF-C file and validate `COMM` and `SSND`. */
export function parseAiffHeader(bytes: Uint8Array): PcmLayout {
  const view = viewOf(bytes);
  if (bytes.byteLength < 12 || fourCC(view, 0) !== "FORM") {
    throw new DecodeError("Not an AIFF file");
  }
  const formType = fourCC(view, 8);
  if (formType !== "AIFF" && formType !== "AIFC") throw new DecodeError("Not an AIFF file");
  const isAifc = formType === "AIFC";

  let commOffset = -1;
  let commSize = 0;
  let ssndOffset = -1;
  let ssndSize = 0;
  let offset = 12;
  while (offset + 8 <= bytes.byteLength) {
    const id = fourCC(view, offset);
    const size = view.getUint32(offset + 4, false);
    if (id === "COMM" && commOffset < 0) {
      commOffset = offset + 8;
      commSize = size;
    } else if (id === "SSND" && ssndOffset < 0) {
      ssndOffset = offset + 8;
      ssndSize = size;
    }
    offset += 8 + size + (size & 1);
  }
  if (commOffset < 0 || ssndOffset < 0) throw new DecodeError("Missing COMM/SSND chunk");

  const commMinimum = isAifc ? 22 : 18;
  if (commSize < commMinimum || commOffset + commMinimum > bytes.byteLength) {
    throw new DecodeError("Truncated COMM chunk");
  }
  if (ssndSize < 8 || ssndOffset + 8 > bytes.byteLength) throw new DecodeError("Truncated SSND chunk");

  const channelCount = view.getInt16(commOffset, false);
  const declaredFrames = view.getUint32(commOffset + 2, false);
  const bitsPerSample = view.getInt16(commOffset + 6, false);
  const sampleRate = readExtended(view, commOffset + 8);
  const compression = isAifc ? fourCC(view, commOffset + 18) : "NONE";

  if (channelCount <= 0) throw new DecodeError("AIFF file declares no channels");
  if (!(sampleRate > 0) || !Number.isFinite(sampleRate)) {
    throw new DecodeError("AIFF file declares an invalid sample rate", { sampleRate });
  }
  const resolved = bitsPerSample > 0 ? resolveEncoding(compression, bitsPerSample) : null;
  if (!resolved) {
    throw new DecodeError(`Unsupported AIFF encoding (${compression.trim()}, ${bitsPerSample}-bit)`, {
      compression,
      bitsPerSample,
    });
  }

  const blockAlign = channelCount * BYTES_PER_SAMPLE[resolved.encoding];
  const skip = view.getUint32(ssndOffset, false);
  const dataOffset = ssndOffset + 8 + skip;
  const available = Math.max(0, Math.min(ssndSize - 8 - skip, bytes.byteLength - dataOffset));

  return {
    channelCount,
    sampleRate,
    encoding: resolved.encoding,
    littleEndian: resolved.littleEndian,
    dataOffset,
    blockAlign,
    frameCount: Math.min(declaredFrames, Math.floor(available / blockAlign)),
  };
}

export class AiffDecoder extends PcmDecoder {
  constructor(bytes: Uint8Array) {
    super("AIFF", bytes, parseAiffHeader(bytes));
  }
}

export const aiffFormat: AudioFormat = {
  name: "AIFF",
  extensions: [".aif", ".aiff", ".aifc"],
  canDecode(bytes) {
    if (bytes.byteLength < 12) return false;
    const view = viewOf(bytes);
    const formType = fourCC(view, 8);
    return fourCC(view, 0) === "FORM" && (formType === "AIFF" || formType === "AIFC");
  },
  createDecoder(bytes) {
    return new AiffDecoder(bytes);
  },
};
