// Builds WAV byte streams in memory for decoder and pipeline tests.

export type FixtureEncoding = "pcm8" | "pcm16" | "pcm24" | "pcm32" | "float32" | "float64";

export interface WavFixtureOptions {
  sampleRate?: number;
  encoding?: FixtureEncoding;
  /** Wrap the format in a WAVE_FORMAT_EXTENSIBLE header. */
  extensible?: boolean;
  /** Insert an odd-sized chunk between `fmt ` and `data`. */
  extraChunk?: boolean;
  /** Put the `data` chunk ahead of `fmt `. */
  dataFirst?: boolean;
  /** Declared frame stride; frames are zero-padded up to it. */
  blockAlign?: number;
}

const BITS: Record<FixtureEncoding, number> = {
  pcm8: 8,
  pcm16: 16,
  pcm24: 24,
  pcm32: 32,
  float32: 32,
  float64: 64,
};

function writeSample(view: DataView, offset: number, value: number, encoding: FixtureEncoding): void {
  switch (encoding) {
    case "pcm8":
      view.setUint8(offset, Math.round(value * 128) + 128);
      return;
    case "pcm16":
      view.setInt16(offset, Math.round(value * 32768), true);
      return;
    case "pcm24": {
      const v = Math.round(value * 8388608);
      view.setUint16(offset, v & 0xffff, true);
      view.setInt8(offset + 2, v >> 16);
      return;
    }
    case "pcm32":
      view.setInt32(offset, Math.round(value * 2147483648), true);
      return;
    case "float32":
      view.setFloat32(offset, value, true);
      return;
    case "float64":
      view.setFloat64(offset, value, true);
      return;
  }
}

/** Encode per-channel sample arrays (values in [-1, 1)) as a WAV file. */
export function buildWav(channels: number[][], options: WavFixtureOptions = {}): Uint8Array {
  const sampleRate = options.sampleRate ?? 8000;
  const encoding = options.encoding ?? "pcm16";
  const bits = BITS[encoding];
  const bytesPerSample = bits / 8;
  const channelCount = channels.length;
  const frameCount = channels[0]?.length ?? 0;
  const frameSize = channelCount * bytesPerSample;
  const blockAlign = options.blockAlign ?? frameSize;
  const dataSize = frameCount * blockAlign;
  const fmtSize = options.extensible ? 40 : 16;
  const extraSize = options.extraChunk ? 8 + 3 + 1 : 0;
  const dataPad = options.dataFirst ? dataSize & 1 : 0;
  const totalSize = 12 + 8 + fmtSize + extraSize + 8 + dataSize + dataPad;

  const bytes = new Uint8Array(totalSize);
  const view = new DataView(bytes.buffer);
  const writeString = (offset: number, str: string) => {
    for (let i = 0; i < str.length; i++) view.setUint8(offset + i, str.charCodeAt(i));
  };

  const formatTag = encoding.startsWith("float") ? 3 : 1;
  writeString(0, "RIFF");
  view.setUint32(4, totalSize - 8, true);
  writeString(8, "WAVE");

  const writeFmt = (at: number) => {
    writeString(at, "fmt ");
    view.setUint32(at + 4, fmtSize, true);
    view.setUint16(at + 8, options.extensible ? 0xfffe : formatTag, true);
    view.setUint16(at + 10, channelCount, true);
    view.setUint32(at + 12, sampleRate, true);
    view.setUint32(at + 16, sampleRate * blockAlign, true);
    view.setUint16(at + 20, blockAlign, true);
    view.setUint16(at + 22, bits, true);
    if (options.extensible) {
      view.setUint16(at + 24, 22, true);
      view.setUint16(at + 26, bits, true);
      view.setUint32(at + 28, 0, true);
      view.setUint16(at + 32, formatTag, true);
    }
    return at + 8 + fmtSize;
  };

  const writeData = (at: number) => {
    writeString(at, "data");
    view.setUint32(at + 4, dataSize, true);
    for (let i = 0; i < frameCount; i++) {
      const frameStart = at + 8 + i * blockAlign;
      channels.forEach((samples, ch) => {
        writeSample(view, frameStart + ch * bytesPerSample, samples[i] ?? 0, encoding);
      });
    }
    return at + 8 + dataSize + dataPad;
  };

  const writeExtra = (at: number) => {
    if (!options.extraChunk) return at;
    writeString(at, "LIST");
    view.setUint32(at + 4, 3, true);
    writeString(at + 8, "abc");
    return at + 12;
  };

  if (options.dataFirst) {
    writeFmt(writeExtra(writeData(12)));
  } else {
    writeData(writeExtra(writeFmt(12)));
  }
  return bytes;
}
