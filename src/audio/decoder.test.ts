import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AudioFormatRegistry, decoderDuration, type AudioDecoder, type AudioFormat } from "./decoder.js";
import { createDefaultRegistry } from "./index.js";
import { DecodeError } from "../errors.js";
import { buildAiff } from "../test-support/aiffFixture.js";
import { buildWav } from "../test-support/wavFixture.js";

function fakeFormat(name: string, extensions: string[], magic: string): AudioFormat {
  return {
    name,
    extensions,
    canDecode: (bytes) => new TextDecoder().decode(bytes.subarray(0, magic.length)) === magic,
    createDecoder: (): AudioDecoder => ({
      formatName: name,
      channelCount: 1,
      sampleRate: 10,
      totalSampleCount: 25,
      read: (_start, count) => [new Float32Array(count)],
    }),
  };
}

describe("decoderDuration", () => {
  it("divides frames by the sample rate", () => {
    const decoder = fakeFormat("X", [], "X").createDecoder(new Uint8Array());
    expect(decoderDuration(decoder)).toBe(2.5);
  });
});

describe("AudioFormatRegistry.createDecoder", () => {
  it("matches formats by content", () => {
    const registry = new AudioFormatRegistry()
      .register(fakeFormat("AAA", [".aaa"], "AAA"))
      .register(fakeFormat("BBB", [".bbb"], "BBB"));
    const bytes = new TextEncoder().encode("BBB-data");
    expect(registry.createDecoder(bytes, "mislabelled.aaa").formatName).toBe("BBB");
  });

  it("prefers the format whose extension matches when several recognize the bytes", () => {
    const registry = new AudioFormatRegistry()
      .register(fakeFormat("First", [".one"], "XY"))
      .register(fakeFormat("Second", [".two"], "XY"));
    const bytes = new TextEncoder().encode("XY");
    expect(registry.createDecoder(bytes, "clip.TWO").formatName).toBe("Second");
    expect(registry.createDecoder(bytes, "clip").formatName).toBe("First");
  });

  it("throws a DecodeError when nothing recognizes the bytes", () => {
    const registry = createDefaultRegistry();
    expect(() => registry.createDecoder(new TextEncoder().encode("not audio at all"))).toThrow(
      DecodeError,
    );
  });

  it("wraps unexpected decoder failures in a DecodeError", () => {
    const broken: AudioFormat = {
      name: "Broken",
      extensions: [],
      canDecode: () => true,
      createDecoder: () => {
        throw new TypeError("boom");
      },
    };
    const registry = new AudioFormatRegistry().register(broken);
    expect(() => registry.createDecoder(new Uint8Array(1), "x.bin")).toThrow(
      "Failed to decode Broken data",
    );
  });

  it("passes DecodeErrors from the format through unchanged", () => {
    const bytes = buildWav([[0.5]]);
    new DataView(bytes.buffer).setUint16(22, 0, true);
    expect(() => createDefaultRegistry().createDecoder(bytes)).toThrow(
      "WAV file declares no channels",
    );
  });
});

describe("AudioFormatRegistry.createDecoderFor", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "waveform-decoder-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("decodes a WAV file from disk", async () => {
    const path = join(dir, "tone.wav");
    await writeFile(path, buildWav([[0.5, -0.5, 0.25]], { sampleRate: 3 }));
    const decoder = await createDefaultRegistry().createDecoderFor(path);
    expect(decoder.formatName).toBe("WAV");
    expect(decoderDuration(decoder)).toBe(1);
    expect(decoder.read(0, 3).map((channel) => Array.from(channel))).toEqual([[0.5, -0.5, 0.25]]);
  });

  it("decodes an AIFF file from disk", async () => {
    const path = join(dir, "tone.aiff");
    await writeFile(path, buildAiff([[0.5, -0.5, 0.25]], { sampleRate: 3 }));
    const decoder = await createDefaultRegistry().createDecoderFor(path);
    expect(decoder.formatName).toBe("AIFF");
    expect(decoderDuration(decoder)).toBe(1);
    expect(decoder.read(0, 3).map((channel) => Array.from(channel))).toEqual([[0.5, -0.5, 0.25]]);
  });

  it("reports unreadable files as DecodeErrors", async () => {
    await expect(createDefaultRegistry().createDecoderFor(dir)).rejects.toBeInstanceOf(DecodeError);
  });

  it("picks the decoder by content when the extension is wrong", async () => {
    const path = join(dir, "actually-aiff.wav");
    await writeFile(path, buildAiff([[0.5]]));
    expect((await createDefaultRegistry().createDecoderFor(path)).formatName).toBe("AIFF");
  });
});
