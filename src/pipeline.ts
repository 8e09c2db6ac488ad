import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import type { AudioSegment, RenderConfig, SampleRange, TimeWindow } from "./types.js";
import type { AudioFormatRegistry } from "./audio/decoder.js";
import { decoderDuration } from "./audio/decoder.js";
import type { ImageEncoder } from "./image/encoder.js";
import type { Logger } from "./logger.js";
import { InputNotFoundError } from "./errors.js";
import { colorToDisplayString } from "./utils/colorUtils.js";
import { clampSampleRange, resolveTimeWindow, toSampleRange } from "./utils/timeWindow.js";
import { renderWaveform } from "./utils/waveform.js";

export interface PipelineDeps {
  formats: AudioFormatRegistry;
  encoder: ImageEncoder;
  logger: Logger;
}

export interface RenderResult {
  window: TimeWindow;
  range: SampleRange;
  channelCount: number;
  outputPath: string;
}

export function describeConfig(config: RenderConfig): string[] {
  const { canvas } = config;
  return [
    "=== Parameters ===",
    `Input: ${config.inputPath}`,
    `Output: ${config.outputPath}`,
    `Start: ${config.startSeconds} sec`,
    `End: ${config.endSeconds} sec`,
    `Width: ${canvas.width}`,
    `Height: ${canvas.height}`,
    `Background color: ${colorToDisplayString(canvas.backgroundColor)}`,
    `Waveform color: ${colorToDisplayString(canvas.foregroundColor)}`,
  ];
}

async function assertIsFile(path: string): Promise<void> {
  try {
    if ((await stat(path)).isFile()) return;
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code !== "ENOENT" && code !== "ENOTDIR") throw err;
  }
  throw new InputNotFoundError(path);
}

/**
 * Decode the configured window of the input, rasterize it and write the
 * image. Every failure surfaces as a WaveformError; nothing is written to
 * `outputPath` unless the whole image encoded.
 */
export async function renderWaveformImage(
  config: RenderConfig,
  deps: PipelineDeps,
): Promise<RenderResult> {
  const { formats, encoder, logger } = deps;
  for (const line of describeConfig(config)) logger.info(line);

  const inputPath = resolve(config.inputPath);
  await assertIsFile(inputPath);
  const decoder = await formats.createDecoderFor(inputPath);

  const window = resolveTimeWindow(config.startSeconds, config.endSeconds, decoderDuration(decoder));
  const range = clampSampleRange(
    toSampleRange(window, decoder.sampleRate),
    decoder.totalSampleCount,
  );

  const segment: AudioSegment = {
    channelCount: decoder.channelCount,
    sampleCount: range.sampleCount,
    sampleRate: decoder.sampleRate,
    samples: decoder.read(range.startSample, range.sampleCount),
  };
  const grid = renderWaveform(segment, config.canvas);

  const outputPath = resolve(config.outputPath);
  await encoder.writeToFile(grid, outputPath);
  logger.info(`Waveform image saved to: ${outputPath}`);

  return { window, range, channelCount: decoder.channelCount, outputPath };
}
