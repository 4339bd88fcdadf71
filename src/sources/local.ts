import type { Dirent } from "fs";
import { readdir, realpath, stat } from "fs/promises";
import { join } from "path";
import { createLogger } from "../logger";
import { IMAGE_EXTENSIONS, imageExtensionOf, type IdentityFolder, type ImageLocator } from "./types";

const logger = createLogger("image-locator");
const DEFAULT_MAX_DEPTH = 32;

interface DirectoryListing {
  files: string[];
  dirs: string[];
}

/** Code-unit order, independent of locale and of the platform's readdir order. */
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Derive the identity name from a folder name: "Tom_Hanks" -> "Tom Hanks".
 */
export function normalizeIdentityName(folderName: string): string {
  return folderName.replace(/_/g, " ").replace(/\s+/g, " ").trim();
}

function stemOf(filename: string): string | null {
  const ext = imageExtensionOf(filename);
  if (!ext) return null;
  return filename.slice(0, filename.length - ext.length - 1);
}

export function isFolderImage(filename: string): boolean {
  return stemOf(filename) === "folder";
}

export function isPosterImage(filename: string): boolean {
  return stemOf(filename)?.endsWith("-poster") ?? false;
}

async function entryKind(dirPath: string, entry: Dirent): Promise<"file" | "directory" | null> {
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "directory";
  if (!entry.isSymbolicLink()) return null;

  try {
    const target = await stat(join(dirPath, entry.name));
    if (target.isDirectory()) return "directory";
    return target.isFile() ? "file" : null;
  } catch (error) {
    logger.debug({ path: join(dirPath, entry.name), error }, "Skipping dangling symlink");
    return null;
  }
}

/**
 * Read a directory into sorted file and subdirectory names.
 * Hidden entries are skipped; symlinks are classified by their target.
 */
async function listDirectory(dirPath: string): Promise<DirectoryListing> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];
  const dirs: string[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const kind = await entryKind(dirPath, entry);
    if (kind === "file") files.push(entry.name);
    else if (kind === "directory") dirs.push(entry.name);
  }

  files.sort(compareNames);
  dirs.sort(compareNames);
  return { files, dirs };
}

/**
 * List the identity folders directly under the archive root, sorted by folder name.
 * Files at the top level are ignored. Throws if the root cannot be read.
 */
export async function listIdentityFolders(rootPath: string): Promise<IdentityFolder[]> {
  const { dirs } = await listDirectory(rootPath);
  return dirs.map((folderName) => ({
    name: normalizeIdentityName(folderName) || folderName,
    folderName,
    path: join(rootPath, folderName),
  }));
}

export interface LocalImageLocatorOptions {
  maxDepth?: number;
}

/**
 * Picks the representative photo of an identity folder:
 * 1. `folder.<ext>` directly inside the folder
 * 2. the first `*-poster.<ext>` of a pre-order walk (own files first, then
 *    subfolders, both sorted by name)
 *
 * Symlinked folders are followed once per real path, and the walk stops
 * descending after `maxDepth` levels.
 */
export class LocalImageLocator implements ImageLocator {
  private maxDepth: number;

  constructor(options?: LocalImageLocatorOptions) {
    this.maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  async locate(identityFolder: string): Promise<string | null> {
    const listing = await listDirectory(identityFolder);

    for (const ext of IMAGE_EXTENSIONS) {
      const match = listing.files.find(
        (file) => isFolderImage(file) && imageExtensionOf(file) === ext
      );
      if (match) {
        logger.debug({ identityFolder, image: match }, "Found folder image");
        return join(identityFolder, match);
      }
    }

    const visited = new Set<string>([await realpath(identityFolder)]);
    const poster = await this.findPoster(identityFolder, listing, 0, visited);
    if (poster) {
      logger.debug({ identityFolder, image: poster }, "Found poster image");
    } else {
      logger.debug({ identityFolder }, "No representative image found");
    }
    return poster;
  }

  private async findPoster(
    dirPath: string,
    listing: DirectoryListing,
    depth: number,
    visited: Set<string>
  ): Promise<string | null> {
    for (const file of listing.files) {
      if (isPosterImage(file)) return join(dirPath, file);
    }

    if (depth >= this.maxDepth) {
      logger.debug({ dirPath, maxDepth: this.maxDepth }, "Max depth reached");
      return null;
    }

    for (const dir of listing.dirs) {
      const subPath = join(dirPath, dir);

      let subListing: DirectoryListing;
      try {
        const real = await realpath(subPath);
        if (visited.has(real)) continue;
        visited.add(real);
        subListing = await listDirectory(subPath);
      } catch (error) {
        logger.debug({ dirPath: subPath, error }, "Skipping unreadable folder");
        continue;
      }

      const found = await this.findPoster(subPath, subListing, depth + 1, visited);
      if (found) return found;
    }

    return null;
  }
}
