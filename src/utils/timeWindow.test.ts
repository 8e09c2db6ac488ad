import { describe, it, expect } from "vitest";
import { clampSampleRange, resolveTimeWindow, toSampleRange } from "./timeWindow.js";

describe("resolveTimeWindow", () => {
  it("keeps an absolute window inside the duration", () => {
    expect(resolveTimeWindow(5, 30, 100)).toEqual({ startSeconds: 5, endSeconds: 30 });
  });

  it("treats an end of 0 as the end of the audio", () => {
    expect(resolveTimeWindow(5, 0, 100)).toEqual({ startSeconds: 5, endSeconds: 100 });
  });

  it("counts a negative end back from the end", () => {
    expect(resolveTimeWindow(5, -10, 100)).toEqual({ startSeconds: 5, endSeconds: 90 });
  });

  it("collapses a start past the end to a zero-length window", () => {
    expect(resolveTimeWindow(150, 0, 100)).toEqual({ startSeconds: 100, endSeconds: 100 });
  });

  it("clamps an end beyond the duration", () => {
    expect(resolveTimeWindow(0, 250, 100)).toEqual({ startSeconds: 0, endSeconds: 100 });
  });

  it("clamps a negative start to 0", () => {
    expect(resolveTimeWindow(-3, 20, 100)).toEqual({ startSeconds: 0, endSeconds: 20 });
  });

  it("lifts an end counted back past the start of the audio to 0", () => {
    expect(resolveTimeWindow(5, -150, 100)).toEqual({ startSeconds: 0, endSeconds: 0 });
  });

  it("returns an empty window for zero-length audio", () => {
    expect(resolveTimeWindow(0, 0, 0)).toEqual({ startSeconds: 0, endSeconds: 0 });
    expect(resolveTimeWindow(5, 30, 0)).toEqual({ startSeconds: 0, endSeconds: 0 });
  });
});

describe("toSampleRange", () => {
  it("converts seconds to samples", () => {
    expect(toSampleRange({ startSeconds: 5, endSeconds: 30 }, 1000)).toEqual({
      startSample: 5000,
      sampleCount: 25000,
    });
  });

  it("truncates fractional samples", () => {
    expect(toSampleRange({ startSeconds: 0.25, endSeconds: 1 }, 10)).toEqual({
      startSample: 2,
      sampleCount: 7,
    });
  });

  it("yields zero samples for a zero-length window", () => {
    expect(toSampleRange({ startSeconds: 100, endSeconds: 100 }, 44100)).toEqual({
      startSample: 4410000,
      sampleCount: 0,
    });
  });
});

describe("clampSampleRange", () => {
  it("leaves an in-range selection alone", () => {
    expect(clampSampleRange({ startSample: 10, sampleCount: 20 }, 100)).toEqual({
      startSample: 10,
      sampleCount: 20,
    });
  });

  it("shortens a selection running past the stream", () => {
    expect(clampSampleRange({ startSample: 90, sampleCount: 20 }, 100)).toEqual({
      startSample: 90,
      sampleCount: 10,
    });
  });

  it("pins a start past the stream to an empty selection", () => {
    expect(clampSampleRange({ startSample: 150, sampleCount: 5 }, 100)).toEqual({
      startSample: 100,
      sampleCount: 0,
    });
  });
});
