import type { PixelGrid } from "../types.js";

/** Serializes a pixel grid into an image file format. */
export interface ImageEncoder {
  readonly formatName: string;
  encode(grid: PixelGrid): Buffer;
  /** Replace `path` with the encoded image only once encoding has succeeded. */
  writeToFile(grid: PixelGrid, path: string): Promise<void>;
}
