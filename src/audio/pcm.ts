import type { AudioDecoder } from "./decoder.js";

export type SampleEncoding = "uint8" | "int8" | "int16" | "int24" | "int32" | "float32" | "float64";

export const BYTES_PER_SAMPLE: Record<SampleEncoding, number> = {
  uint8: 1,
  int8: 1,
  int16: 2,
  int24: 3,
  int32: 4,
  float32: 4,
  float64: 8,
};

/** Where interleaved frames live inside a container and how to read them. */
export interface PcmLayout {
  channelCount: number;
  sampleRate: number;
  encoding: SampleEncoding;
  littleEndian: boolean;
  dataOffset: number;
  /** Bytes from one frame to the next; may exceed the packed sample size. */
  blockAlign: number;
  frameCount: number;
}

export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function fourCC(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3),
  );
}

/** One sample scaled to [-1, 1); integers are normalized by 2^(bits-1). */
export function readSample(
  view: DataView,
  offset: number,
  encoding: SampleEncoding,
  littleEndian: boolean,
): number {
  switch (encoding) {
    case "uint8":
      return (view.getUint8(offset) - 128) / 128;
    case "int8":
      return view.getInt8(offset) / 128;
    case "int16":
      return view.getInt16(offset, littleEndian) / 32768;
    case "int24": {
      const high = littleEndian ? view.getInt8(offset + 2) : view.getInt8(offset);
      const low = littleEndian ? view.getUint16(offset, true) : view.getUint16(offset + 1, false);
      return (high * 65536 + low) / 8388608;
    }
    case "int32":
      return view.getInt32(offset, littleEndian) / 2147483648;
    case "float32":
      return view.getFloat32(offset, littleEndian);
    case "float64":
      return view.getFloat64(offset, littleEndian);
  }
}

/** Random access over interleaved PCM frames held in memory. */
export class PcmDecoder implements AudioDecoder {
  readonly channelCount: number;
  readonly sampleRate: number;
  readonly totalSampleCount: number;
  private view: DataView;

  constructor(
    readonly formatName: string,
    bytes: Uint8Array,
    private layout: PcmLayout,
  ) {
    this.view = viewOf(bytes);
    this.channelCount = layout.channelCount;
    this.sampleRate = layout.sampleRate;
    this.totalSampleCount = layout.frameCount;
  }

  read(startSample: number, sampleCount: number): Float32Array[] {
    const { encoding, littleEndian, dataOffset, blockAlign } = this.layout;
    const bytesPerSample = BYTES_PER_SAMPLE[encoding];

    return Array.from({ length: this.channelCount }, (_, ch) => {
      const target = new Float32Array(sampleCount);
      for (let i = 0; i < sampleCount; i++) {
        const frame = startSample + i;
        if (frame < 0 || frame >= this.totalSampleCount) continue;
        const offset = dataOffset + frame * blockAlign + ch * bytesPerSample;
        target[i] = readSample(this.view, offset, encoding, littleEndian);
      }
      return target;
    });
  }
}
