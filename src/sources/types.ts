/** Image extensions accepted for identity photos and uploads, in `folder.<ext>` priority order. */
export const IMAGE_EXTENSIONS = ["jpg", "jpeg", "png", "gif", "bmp", "webp"] as const;

export type ImageExtension = (typeof IMAGE_EXTENSIONS)[number];

export interface IdentityFolder {
  /** Normalized identity name derived from the folder name */
  name: string;
  folderName: string;
  path: string;
}

export interface ImageLocator {
  locate(identityFolder: string): Promise<string | null>;
}

export function imageExtensionOf(filename: string): ImageExtension | null {
  const dot = filename.lastIndexOf(".");
  if (dot < 0) return null;
  const ext = filename.slice(dot + 1).toLowerCase();
  return IMAGE_EXTENSIONS.find((candidate) => candidate === ext) ?? null;
}
