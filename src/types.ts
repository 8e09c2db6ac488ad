// Shared data model for the render pipeline.

export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** Decoded samples for the selected time window, one array per channel. */
export interface AudioSegment {
  channelCount: number;
  sampleCount: number;
  sampleRate: number;
  samples: Float32Array[];
}

/** Resolved absolute window, in seconds. */
export interface TimeWindow {
  startSeconds: number;
  endSeconds: number;
}

export interface SampleRange {
  startSample: number;
  sampleCount: number;
}

export interface CanvasSpec {
  width: number;
  height: number;
  backgroundColor: Color;
  foregroundColor: Color;
}

/** Row-major RGBA raster, 4 bytes per pixel. */
export interface PixelGrid {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Min/max sample values of one pixel column. */
export interface Envelope {
  min: number;
  max: number;
}

/** Horizontal strip of the canvas assigned to one channel. */
export interface ChannelBand {
  top: number;
  height: number;
  midY: number;
  rowStart: number;
  rowEnd: number;
}

export interface RenderConfig {
  inputPath: string;
  outputPath: string;
  startSeconds: number;
  endSeconds: number;
  canvas: CanvasSpec;
}
