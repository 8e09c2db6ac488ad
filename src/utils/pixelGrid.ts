import type { Color, PixelGrid } from "../types.js";

const BYTES_PER_PIXEL = 4;

/** Allocate a grid with every pixel set to `fill`. */
export function createPixelGrid(width: number, height: number, fill: Color): PixelGrid {
  const grid: PixelGrid = {
    width,
    height,
    data: new Uint8Array(width * height * BYTES_PER_PIXEL),
  };
  fillPixelGrid(grid, fill);
  return grid;
}

export function fillPixelGrid(grid: PixelGrid, color: Color): void {
  const { data } = grid;
  for (let offset = 0; offset < data.length; offset += BYTES_PER_PIXEL) {
    data[offset] = color.r;
    data[offset + 1] = color.g;
    data[offset + 2] = color.b;
    data[offset + 3] = color.a;
  }
}

function inBounds(grid: PixelGrid, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < grid.width && y < grid.height;
}

export function getPixel(grid: PixelGrid, x: number, y: number): Color {
  if (!inBounds(grid, x, y)) {
    throw new RangeError(`Pixel (${x}, ${y}) outside ${grid.width}x${grid.height} grid`);
  }
  const offset = (y * grid.width + x) * BYTES_PER_PIXEL;
  return {
    r: grid.data[offset]!,
    g: grid.data[offset + 1]!,
    b: grid.data[offset + 2]!,
    a: grid.data[offset + 3]!,
  };
}

/** Out-of-bounds writes are ignored. */
export function setPixel(grid: PixelGrid, x: number, y: number, color: Color): void {
  if (!inBounds(grid, x, y)) return;
  const offset = (y * grid.width + x) * BYTES_PER_PIXEL;
  grid.data[offset] = color.r;
  grid.data[offset + 1] = color.g;
  grid.data[offset + 2] = color.b;
  grid.data[offset + 3] = color.a;
}

/**
 * Paint column `x` from the row containing `y1` to the row containing `y2`
 * (either order, both inclusive). Rows outside `[clipTop, clipBottom)` are
 * left untouched.
 */
export function drawVerticalSegment(
  grid: PixelGrid,
  x: number,
  y1: number,
  y2: number,
  color: Color,
  clipTop = 0,
  clipBottom = grid.height,
): void {
  const rowStart = Math.floor(Math.min(y1, y2));
  const rowEnd = Math.floor(Math.max(y1, y2)) + 1;
  const from = Math.max(rowStart, clipTop, 0);
  const to = Math.min(rowEnd, clipBottom, grid.height);
  for (let y = from; y < to; y++) {
    setPixel(grid, x, y, color);
  }
}
