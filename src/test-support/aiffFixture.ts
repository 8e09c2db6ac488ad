// Builds AIFF and AIFF-C byte streams in memory for decoder tests.

export type AiffCompression = "NONE" | "sowt" | "fl32" | "fl64";

export interface AiffFixtureOptions {
  sampleRate?: number;
  /** Integer sample width; ignored by the float compressions. */
  bits?: 8 | 16 | 24 | 32;
  /** Write an AIFF-C file with this compression type. Plain AIFF when unset. */
  compression?: AiffCompression;
  /** Insert an odd-sized chunk between `COMM` and `SSND`. */
  extraChunk?: boolean;
  /** Put `SSND` ahead of `COMM`. */
  soundFirst?: boolean;
}

/** Positive integer rate as an 80-bit extended float. */
function writeExtended(view: DataView, offset: number, rate: number): void {
  const e = Math.floor(Math.log2(rate));
  view.setUint16(offset, 16383 + e, false);
  view.setUint32(offset + 2, rate * 2 ** (31 - e), false);
  view.setUint32(offset + 6, 0, false);
}

function writeSample(view: DataView, offset: number, value: number, bits: number, compression: AiffCompression): void {
  const le = compression === "sowt";
  if (compression === "fl32") {
    view.setFloat32(offset, value, false);
    return;
  }
  if (compression === "fl64") {
    view.setFloat64(offset, value, false);
    return;
  }
  switch (bits) {
    case 8:
      view.setInt8(offset, Math.round(value * 128));
      return;
    case 16:
      view.setInt16(offset, Math.round(value * 32768), le);
      return;
    case 24: {
      const v = Math.round(value * 8388608);
      if (le) {
        view.setUint16(offset, v & 0xffff, true);
        view.setInt8(offset + 2, v >> 16);
      } else {
        view.setInt8(offset, v >> 16);
        view.setUint16(offset + 1, v & 0xffff, false);
      }
      return;
    }
    case 32:
      view.setInt32(offset, Math.round(value * 2147483648), le);
      return;
  }
}

/** Encode per-channel sample arrays (values in [-1, 1)) as an AIFF or AIFF-C file. */
export function buildAiff(channels: number[][], options: AiffFixtureOptions = {}): Uint8Array {
  const sampleRate = options.sampleRate ?? 8000;
  const aifc = options.compression !== undefined;
  const compression = options.compression ?? "NONE";
  const bits = compression === "fl32" ? 32 : compression === "fl64" ? 64 : (options.bits ?? 16);
  const bytesPerSample = bits / 8;
  const channelCount = channels.length;
  const frameCount = channels[0]?.length ?? 0;
  const blockAlign = channelCount * bytesPerSample;
  const dataSize = frameCount * blockAlign;
  const ssndSize = 8 + dataSize;
  const ssndPad = options.soundFirst ? ssndSize & 1 : 0;
  // AIFF-C appends the compression type and an empty, padded pascal-string name.
  const commSize = aifc ? 18 + 4 + 2 : 18;
  const extraSize = options.extraChunk ? 8 + 3 + 1 : 0;
  const totalSize = 12 + 8 + commSize + extraSize + 8 + ssndSize + ssndPad;

  const bytes = new Uint8Array(totalSize);
  const view = new DataView(bytes.buffer);
  const writeString = (offset: number, str: string) => {
    for (let i = 0; i < str.length; i++) view.setUint8(offset + i, str.charCodeAt(i));
  };

  writeString(0, "FORM");
  view.setUint32(4, totalSize - 8, false);
  writeString(8, aifc ? "AIFC" : "AIFF");

  const writeComm = (at: number) => {
    writeString(at, "COMM");
    view.setUint32(at + 4, commSize, false);
    view.setInt16(at + 8, channelCount, false);
    view.setUint32(at + 10, frameCount, false);
    view.setInt16(at + 14, bits, false);
    writeExtended(view, at + 16, sampleRate);
    if (aifc) writeString(at + 26, compression);
    return at + 8 + commSize;
  };

  const writeSound = (at: number) => {
    writeString(at, "SSND");
    view.setUint32(at + 4, ssndSize, false);
    for (let i = 0; i < frameCount; i++) {
      const frameStart = at + 16 + i * blockAlign;
      channels.forEach((samples, ch) => {
        writeSample(view, frameStart + ch * bytesPerSample, samples[i] ?? 0, bits, compression);
      });
    }
    return at + 8 + ssndSize + ssndPad;
  };

  const writeExtra = (at: number) => {
    if (!options.extraChunk) return at;
    writeString(at, "NAME");
    view.setUint32(at + 4, 3, false);
    writeString(at + 8, "abc");
    return at + 12;
  };

  if (options.soundFirst) {
    writeComm(writeExtra(writeSound(12)));
  } else {
    writeSound(writeExtra(writeComm(12)));
  }
  return bytes;
}
