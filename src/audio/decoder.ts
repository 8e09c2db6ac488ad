import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { DecodeError, isWaveformError } from "../errors.js";

/** Random-access reader over a decoded audio stream. */
export interface AudioDecoder {
  readonly formatName: string;
  readonly channelCount: number;
  readonly sampleRate: number;
  readonly totalSampleCount: number;
  /**
   * Read `sampleCount` frames starting at `startSample`, one array per
   * channel. Frames outside the stream read as silence.
   */
  read(startSample: number, sampleCount: number): Float32Array[];
}

export interface AudioFormat {
  readonly name: string;
  readonly extensions: readonly string[];
  /** Whether the header in `bytes` belongs to this format. */
  canDecode(bytes: Uint8Array): boolean;
  createDecoder(bytes: Uint8Array): AudioDecoder;
}

/** Duration in seconds of everything the decoder holds. */
export function decoderDuration(decoder: AudioDecoder): number {
  return decoder.sampleRate > 0 ? decoder.totalSampleCount / decoder.sampleRate : 0;
}

/**
 * Set of known formats. A file is matched by content first; the extension
 * only orders the candidates.
 */
export class AudioFormatRegistry {
  private formats: AudioFormat[] = [];

  register(format: AudioFormat): this {
    this.formats.push(format);
    return this;
  }

  /** Pick a decoder for in-memory bytes; `hintPath` ranks formats by extension. */
  createDecoder(bytes: Uint8Array, hintPath = ""): AudioDecoder {
    const ext = extname(hintPath).toLowerCase();
    const candidates = [...this.formats].sort(
      (a, b) => Number(b.extensions.includes(ext)) - Number(a.extensions.includes(ext)),
    );
    const format = candidates.find((f) => f.canDecode(bytes));
    if (!format) {
      throw new DecodeError("Failed to read input audio file.", {
        path: hintPath,
        message: "No registered audio format recognizes this file",
      });
    }
    try {
      return format.createDecoder(bytes);
    } catch (err) {
      if (isWaveformError(err)) throw err;
      throw new DecodeError(`Failed to decode ${format.name} data`, { path: hintPath }, err);
    }
  }

  async createDecoderFor(path: string): Promise<AudioDecoder> {
    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (err) {
      throw new DecodeError("Failed to read input audio file.", { path }, err);
    }
    return this.createDecoder(bytes, path);
  }
}
