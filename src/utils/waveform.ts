import type { AudioSegment, CanvasSpec, ChannelBand, Envelope, PixelGrid } from "../types.js";
import { createPixelGrid, drawVerticalSegment } from "./pixelGrid.js";

/**
 * Horizontal strip for one channel. Bands are `height / channelCount` tall
 * (real-valued) and stacked top to bottom; `rowStart`/`rowEnd` are the whole
 * pixel rows the band owns, so adjacent bands never share a row.
 */
export function channelBand(channel: number, channelCount: number, height: number): ChannelBand {
  const bandHeight = height / channelCount;
  const top = channel * bandHeight;
  return {
    top,
    height: bandHeight,
    midY: top + bandHeight / 2,
    rowStart: Math.floor(top),
    rowEnd: channel === channelCount - 1 ? height : Math.floor(top + bandHeight),
  };
}

/** Samples `[start, end)` that map onto pixel column `column`. */
export function columnSampleRange(
  column: number,
  width: number,
  sampleCount: number,
): { start: number; end: number } {
  if (sampleCount <= 0 || width <= 0) return { start: 0, end: 0 };
  const start = Math.trunc((column / width) * sampleCount);
  const end = Math.trunc(((column + 1) / width) * sampleCount);
  return {
    start: Math.min(Math.max(start, 0), sampleCount - 1),
    end: Math.min(Math.max(end, 0), sampleCount),
  };
}

/**
 * Min/max of `samples[start..end)`, seeded at +1/-1. Returns null for an
 * empty range so callers never draw the seed values.
 */
export function computeEnvelope(
  samples: ArrayLike<number>,
  start: number,
  end: number,
): Envelope | null {
  if (end <= start) return null;
  let min = 1;
  let max = -1;
  for (let j = start; j < end; j++) {
    const s = samples[j]!;
    if (s < min) min = s;
    if (s > max) max = s;
  }
  return { min, max };
}

/** Vertical pixel coordinates of an envelope; positive values map upward. */
export function envelopeToRows(envelope: Envelope, band: ChannelBand): { y1: number; y2: number } {
  const halfHeight = band.height / 2;
  return {
    y1: band.midY - envelope.min * halfHeight,
    y2: band.midY - envelope.max * halfHeight,
  };
}

function clampToBand(y: number, band: ChannelBand): number {
  return Math.min(Math.max(y, band.rowStart), band.rowEnd - 1);
}

/**
 * Rasterize a per-column min/max envelope of every channel.
 *
 * Each column gets one vertical segment per channel, from the row of the
 * column's minimum to the row of its maximum. Values beyond [-1, 1] saturate
 * at the edge of their channel's band.
 */
export function renderWaveform(segment: AudioSegment, canvas: CanvasSpec): PixelGrid {
  const { width, height, backgroundColor, foregroundColor } = canvas;
  const grid = createPixelGrid(width, height, backgroundColor);

  const { channelCount, sampleCount, samples } = segment;
  if (channelCount <= 0 || sampleCount <= 0) return grid;

  for (let ch = 0; ch < channelCount; ch++) {
    const channel = samples[ch];
    if (!channel) continue;
    const band = channelBand(ch, channelCount, height);
    // More channels than rows: this one gets no row of its own.
    if (band.rowEnd <= band.rowStart) continue;

    for (let i = 0; i < width; i++) {
      const { start, end } = columnSampleRange(i, width, sampleCount);
      const envelope = computeEnvelope(channel, start, end);
      if (!envelope) continue;
      const { y1, y2 } = envelopeToRows(envelope, band);
      drawVerticalSegment(
        grid,
        i,
        clampToBand(y1, band),
        clampToBand(y2, band),
        foregroundColor,
        band.rowStart,
        band.rowEnd,
      );
    }
  }

  return grid;
}
