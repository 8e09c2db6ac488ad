import type { SampleRange, TimeWindow } from "../types.js";

/**
 * Resolve user-supplied start/end times against the audio's duration.
 *
 * `requestedEnd` of 0 means "to the end", a negative value counts back from
 * the end, a positive value is absolute. The start is clamped into
 * `[0, end]`, so a start past the end collapses to a zero-length window.
 */
export function resolveTimeWindow(
  requestedStart: number,
  requestedEnd: number,
  totalDuration: number,
): TimeWindow {
  let end =
    requestedEnd === 0
      ? totalDuration
      : requestedEnd < 0
        ? totalDuration + requestedEnd
        : requestedEnd;
  end = Math.min(totalDuration, end);
  // Counting back further than the whole file leaves nothing to render.
  if (end < 0) end = 0;
  const start = Math.min(Math.max(requestedStart, 0), end);
  return { startSeconds: start, endSeconds: end };
}

/** Convert a window to whole samples, truncating toward zero. */
export function toSampleRange(window: TimeWindow, sampleRate: number): SampleRange {
  const startSample = Math.max(0, Math.trunc(window.startSeconds * sampleRate));
  const sampleCount = Math.max(
    0,
    Math.trunc((window.endSeconds - window.startSeconds) * sampleRate),
  );
  return { startSample, sampleCount };
}

/** Shrink a range so it never reads past `totalSampleCount`. */
export function clampSampleRange(range: SampleRange, totalSampleCount: number): SampleRange {
  const startSample = Math.min(range.startSample, totalSampleCount);
  const sampleCount = Math.min(range.sampleCount, totalSampleCount - startSample);
  return { startSample, sampleCount };
}
