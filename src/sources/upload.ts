import type { Stats } from "fs";
import { readFile, stat } from "fs/promises";
import { basename } from "path";
import { ValidationError, errorMessage } from "../errors";
import { IMAGE_EXTENSIONS, imageExtensionOf } from "./types";

function formatBytes(bytes: number): string {
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

/**
 * Read a photo submitted for matching. Only the archive's image formats are
 * accepted, up to `maxBytes`.
 */
export async function readUpload(photoPath: string, maxBytes: number): Promise<Buffer> {
  const filename = basename(photoPath);
  if (!imageExtensionOf(filename)) {
    throw new ValidationError(
      `Unsupported image format: ${filename} (accepted: ${IMAGE_EXTENSIONS.join(", ")})`
    );
  }

  let stats: Stats;
  try {
    stats = await stat(photoPath);
  } catch (error) {
    throw new ValidationError(`Cannot read photo ${photoPath}: ${errorMessage(error)}`);
  }
  if (!stats.isFile()) {
    throw new ValidationError(`Not a file: ${photoPath}`);
  }
  if (stats.size > maxBytes) {
    throw new ValidationError(
      `Photo is too large: ${formatBytes(stats.size)} (limit ${formatBytes(maxBytes)})`
    );
  }

  return readFile(photoPath);
}
