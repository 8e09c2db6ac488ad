import type { AudioFormat } from "./decoder.js";
import { BYTES_PER_SAMPLE, PcmDecoder, fourCC, viewOf, type PcmLayout, type SampleEncoding } from "./pcm.js";
import { DecodeError } from "../errors.js";

const FORMAT_PCM = 1;
const FORMAT_IEEE_FLOAT = 3;
const FORMAT_EXTENSIBLE = 0xfffe;

function resolveEncoding(formatTag: number, bitsPerSample: number): SampleEncoding | null {
  if (formatTag === FORMAT_PCM) {
    switch (bitsPerSample) {
      case 8:
        return "uint8";
      case 16:
        return "int16";
      case 24:
        return "int24";
      case 32:
        return "int32";
    }
  }
  if (formatTag === FORMAT_IEEE_FLOAT) {
    if (bitsPerSample === 32) return "float32";
    if (bitsPerSample === 64) return "float64";
  }
  return null;
}

/** Walk every RIFF chunk, in any order, and validate the `fmt ` and `data` chunks. */
export function parseWavHeader(bytes: Uint8Array): PcmLayout {
  const view = viewOf(bytes);
  if (bytes.byteLength < 12 || fourCC(view, 0) !== "RIFF" || fourCC(view, 8) !== "WAVE") {
    throw new DecodeError("Not a RIFF/WAVE file");
  }

  let fmtOffset = -1;
  let fmtSize = 0;
  let dataOffset = -1;
  let dataSize = 0;
  let offset = 12;
  while (offset + 8 <= bytes.byteLength) {
    const id = fourCC(view, offset);
    const size = view.getUint32(offset + 4, true);
    if (id === "fmt " && fmtOffset < 0) {
      fmtOffset = offset + 8;
      fmtSize = size;
    } else if (id === "data" && dataOffset < 0) {
      dataOffset = offset + 8;
      dataSize = Math.min(size, bytes.byteLength - dataOffset);
    }
    // Chunks are word-aligned.
    offset += 8 + size + (size & 1);
  }
  if (fmtOffset < 0 || dataOffset < 0) throw new DecodeError("Missing fmt/data chunk");
  if (fmtSize < 16 || fmtOffset + 16 > bytes.byteLength) throw new DecodeError("Truncated fmt chunk");

  let formatTag = view.getUint16(fmtOffset, true);
  const channelCount = view.getUint16(fmtOffset + 2, true);
  const sampleRate = view.getUint32(fmtOffset + 4, true);
  const blockAlign = view.getUint16(fmtOffset + 12, true);
  const bitsPerSample = view.getUint16(fmtOffset + 14, true);
  if (formatTag === FORMAT_EXTENSIBLE) {
    if (fmtSize < 40 || fmtOffset + 26 > bytes.byteLength) {
      throw new DecodeError("Truncated WAVE_FORMAT_EXTENSIBLE header");
    }
    // First two bytes of the sub-format GUID hold the real format tag.
    formatTag = view.getUint16(fmtOffset + 24, true);
  }

  if (channelCount === 0) throw new DecodeError("WAV file declares no channels");
  if (sampleRate === 0) throw new DecodeError("WAV file declares a sample rate of 0");
  const encoding = resolveEncoding(formatTag, bitsPerSample);
  if (!encoding) {
    throw new DecodeError(`Unsupported WAV encoding (format ${formatTag}, ${bitsPerSample}-bit)`, {
      formatTag,
      bitsPerSample,
    });
  }

  const frameSize = channelCount * BYTES_PER_SAMPLE[encoding];
  if (blockAlign < frameSize) {
    throw new DecodeError(`WAV block align ${blockAlign} is smaller than one frame (${frameSize} bytes)`, {
      blockAlign,
      frameSize,
    });
  }

  return {
    channelCount,
    sampleRate,
    encoding,
    littleEndian: true,
    dataOffset,
    blockAlign,
    frameCount: Math.floor(dataSize / blockAlign),
  };
}

export class WavDecoder extends PcmDecoder {
  constructor(bytes: Uint8Array) {
    super("WAV", bytes, parseWavHeader(bytes));
  }
}

export const wavFormat: AudioFormat = {
  name: "WAV",
  extensions: [".wav", ".wave"],
  canDecode(bytes) {
    if (bytes.byteLength < 12) return false;
    const view = viewOf(bytes);
    return fourCC(view, 0) === "RIFF" && fourCC(view, 8) === "WAVE";
  },
  createDecoder(bytes) {
    return new WavDecoder(bytes);
  },
};
