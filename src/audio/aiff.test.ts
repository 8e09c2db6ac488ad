import { describe, it, expect } from "vitest";
import { AiffDecoder, aiffFormat, parseAiffHeader, readExtended } from "./aiff.js";
import { DecodeError } from "../errors.js";
import { buildAiff, type AiffCompression } from "../test-support/aiffFixture.js";
import { buildWav } from "../test-support/wavFixture.js";

const STEREO = [
  [0.5, -0.25, 0, -1],
  [-0.5, 0.25, 0.125, 0.75],
];

function channelsOf(decoder: AiffDecoder, start: number, count: number): number[][] {
  return decoder.read(start, count).map((channel) => Array.from(channel));
}

describe("readExtended", () => {
  it("decodes common sample rates", () => {
    const bytes = new Uint8Array([0x40, 0x0e, 0xac, 0x44, 0, 0, 0, 0, 0, 0]);
    expect(readExtended(new DataView(bytes.buffer), 0)).toBe(44100);
  });

  it("reads all-zero bytes as 0", () => {
    expect(readExtended(new DataView(new ArrayBuffer(10)), 0)).toBe(0);
  });
});

describe("parseAiffHeader", () => {
  it("reads the format and frame count of a plain AIFF file", () => {
    expect(parseAiffHeader(buildAiff(STEREO, { sampleRate: 44100 }))).toEqual({
      channelCount: 2,
      sampleRate: 44100,
      encoding: "int16",
      littleEndian: false,
      dataOffset: 54,
      blockAlign: 4,
      frameCount: 4,
    });
  });

  it("reads the compression type of an AIFF-C file", () => {
    const layout = parseAiffHeader(buildAiff(STEREO, { compression: "sowt" }));
    expect(layout.encoding).toBe("int16");
    expect(layout.littleEndian).toBe(true);
    expect(layout.dataOffset).toBe(60);
  });

  it("skips unknown chunks including their pad byte", () => {
    expect(parseAiffHeader(buildAiff(STEREO, { extraChunk: true })).dataOffset).toBe(66);
  });

  it("finds COMM when it follows SSND", () => {
    const layout = parseAiffHeader(buildAiff(STEREO, { soundFirst: true }));
    expect(layout.dataOffset).toBe(28);
    expect(layout.frameCount).toBe(4);
  });

  it("counts only complete frames of a truncated SSND chunk", () => {
    const bytes = buildAiff(STEREO);
    expect(parseAiffHeader(bytes.subarray(0, bytes.length - 3)).frameCount).toBe(3);
  });

  it("rejects files that are not AIFF", () => {
    expect(() => parseAiffHeader(buildWav(STEREO))).toThrow("Not an AIFF file");
  });

  it("rejects files without an SSND chunk", () => {
    const bytes = buildAiff(STEREO).slice(0, 38);
    expect(() => parseAiffHeader(bytes)).toThrow(DecodeError);
    expect(() => parseAiffHeader(bytes)).toThrow("Missing COMM/SSND chunk");
  });

  it("rejects a header with no channels", () => {
    const bytes = buildAiff(STEREO);
    new DataView(bytes.buffer).setInt16(20, 0, false);
    expect(() => parseAiffHeader(bytes)).toThrow("AIFF file declares no channels");
  });

  it("rejects compressed AIFF-C data", () => {
    const bytes = buildAiff(STEREO, { compression: "NONE" });
    bytes.set(new TextEncoder().encode("ulaw"), 38);
    expect(() => parseAiffHeader(bytes)).toThrow("Unsupported AIFF encoding (ulaw, 16-bit)");
  });
});

describe("AiffDecoder", () => {
  it.each([8, 16, 24, 32] as const)("decodes big-endian %i-bit samples", (bits) => {
    const decoder = new AiffDecoder(buildAiff(STEREO, { bits, sampleRate: 22050 }));
    expect(decoder.formatName).toBe("AIFF");
    expect(decoder.sampleRate).toBe(22050);
    expect(decoder.totalSampleCount).toBe(4);
    expect(channelsOf(decoder, 0, 4)).toEqual(STEREO);
  });

  const compressions: AiffCompression[] = ["NONE", "sowt", "fl32", "fl64"];

  it.each(compressions)("decodes AIFF-C %s samples", (compression) => {
    const decoder = new AiffDecoder(buildAiff(STEREO, { compression, bits: 24 }));
    expect(channelsOf(decoder, 0, 4)).toEqual(STEREO);
  });

  it("zero-fills frames past the end of the stream", () => {
    const decoder = new AiffDecoder(buildAiff(STEREO));
    expect(channelsOf(decoder, 3, 2)).toEqual([
      [-1, 0],
      [0.75, 0],
    ]);
  });
});

describe("aiffFormat", () => {
  it("recognizes FORM/AIFF and FORM/AIFC headers", () => {
    expect(aiffFormat.canDecode(buildAiff(STEREO))).toBe(true);
    expect(aiffFormat.canDecode(buildAiff(STEREO, { compression: "sowt" }))).toBe(true);
    expect(aiffFormat.canDecode(buildWav(STEREO))).toBe(false);
    expect(aiffFormat.canDecode(new Uint8Array(4))).toBe(false);
  });
});
