import { rename, rm, writeFile } from "node:fs/promises";
import { PNG } from "pngjs";
import type { PixelGrid } from "../types.js";
import type { ImageEncoder } from "./encoder.js";
import { EncodeError } from "../errors.js";

/** 8-bit RGBA PNG output. */
export class PngImageEncoder implements ImageEncoder {
  readonly formatName = "PNG";

  encode(grid: PixelGrid): Buffer {
    try {
      const png = new PNG({ width: grid.width, height: grid.height });
      png.data = Buffer.from(grid.data);
      return PNG.sync.write(png);
    } catch (err) {
      throw new EncodeError("Failed to save image.", { width: grid.width, height: grid.height }, err);
    }
  }

  async writeToFile(grid: PixelGrid, path: string): Promise<void> {
    const encoded = this.encode(grid);
    // Sibling temp file so the rename stays on one filesystem.
    const tempPath = `${path}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, encoded);
      await rename(tempPath, path);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw new EncodeError("Failed to save image.", { path }, err);
    }
  }
}
